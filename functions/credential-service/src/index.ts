/**
 * Credential Service Lambda Handler
 *
 * Issues short-lived, scope-limited S3 credentials for registered services.
 *
 * Routes:
 * - GET /credentials?service=<id>&duration=<seconds> (X-API-Key header)
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { loadIssuerConfig } from './config';
import { handleGetCredentials } from './handlers/credential-handlers';
import { createCredentialIssuer } from './services/factory';
import type { CredentialIssuer } from './services/issuer';
import { internalError, methodNotAllowed, preflight } from './utils/response-helpers';

export type LambdaHandler = (
  event: APIGatewayProxyEvent,
  context: Context
) => Promise<APIGatewayProxyResult>;

/**
 * Build a handler around an issuer factory. The factory runs per request so
 * configuration changes are picked up without a cold start.
 */
export function createHandler(getIssuer: () => CredentialIssuer): LambdaHandler {
  return async (event, context) => {
    console.log('Request:', {
      method: event.httpMethod,
      path: event.path,
      requestId: context.awsRequestId,
    });

    const { httpMethod } = event;

    if (httpMethod === 'OPTIONS') {
      return preflight();
    }

    if (httpMethod !== 'GET') {
      return methodNotAllowed(httpMethod);
    }

    try {
      return await handleGetCredentials(event, getIssuer(), context.awsRequestId);
    } catch (error) {
      console.error('Unhandled error:', error);
      return internalError('Internal server error', context.awsRequestId);
    }
  };
}

export const handler = createHandler(() => createCredentialIssuer(loadIssuerConfig()));

export { CredentialIssuer, clampDuration, type IssueRequest } from './services/issuer';
export {
  StsRoleAuthority,
  buildSessionName,
  type RoleAuthority,
  type AssumeRoleRequest,
  type AssumedCredentials,
} from './services/role-authority';
export { loadIssuerConfig, type IssuerConfig } from './config';
