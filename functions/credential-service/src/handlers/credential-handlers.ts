/**
 * GET /credentials
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { AuthError, toCredentialResponseBody } from '@s3bridge/bridge-core';
import type { CredentialIssuer } from '../services/issuer';
import { extractApiKey, parseCredentialRequest } from '../utils/request';
import { authErrorResponse, ok } from '../utils/response-helpers';

export async function handleGetCredentials(
  event: APIGatewayProxyEvent,
  issuer: CredentialIssuer,
  requestId: string
): Promise<APIGatewayProxyResult> {
  try {
    const { serviceId, durationSeconds } = parseCredentialRequest(event);

    const bundle = await issuer.issue({
      apiKey: extractApiKey(event),
      serviceId,
      requestedDurationSeconds: durationSeconds,
      requestId,
    });

    return ok(toCredentialResponseBody(bundle));
  } catch (error) {
    if (error instanceof AuthError) {
      return authErrorResponse(error);
    }
    throw error;
  }
}
