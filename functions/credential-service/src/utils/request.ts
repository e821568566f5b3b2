/**
 * Request parameter extraction
 */

import type { APIGatewayProxyEvent } from 'aws-lambda';
import { AuthError } from '@s3bridge/bridge-core';

const DURATION_PATTERN = /^-?\d+$/;

/**
 * Read the X-API-Key header, whatever casing the gateway delivered
 */
export function extractApiKey(event: APIGatewayProxyEvent): string | undefined {
  const headers = event.headers ?? {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === 'x-api-key' && value) {
      return value;
    }
  }
  return undefined;
}

export interface CredentialRequestParams {
  serviceId: string;
  durationSeconds?: number;
}

/**
 * Parse ?service=<id>&duration=<seconds>
 * @throws AuthError InvalidRequest
 */
export function parseCredentialRequest(event: APIGatewayProxyEvent): CredentialRequestParams {
  const params = event.queryStringParameters ?? {};
  const serviceId = params.service?.trim();

  if (!serviceId) {
    throw new AuthError('service parameter required', 'InvalidRequest');
  }

  const rawDuration = params.duration?.trim();
  if (rawDuration === undefined || rawDuration === '') {
    return { serviceId };
  }

  if (!DURATION_PATTERN.test(rawDuration)) {
    throw new AuthError('duration must be a whole number of seconds', 'InvalidRequest');
  }

  return { serviceId, durationSeconds: Number(rawDuration) };
}
