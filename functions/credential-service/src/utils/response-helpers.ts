/**
 * Response helpers for Lambda API Gateway responses
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import {
  httpStatusForKind,
  type AuthError,
  type CredentialErrorBody,
  type CredentialResponseBody,
} from '@s3bridge/bridge-core';

const DEFAULT_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-API-Key',
  // Credentials must never sit in an intermediate cache
  'Cache-Control': 'no-store',
};

function jsonResponse(statusCode: number, body: unknown): APIGatewayProxyResult {
  return {
    statusCode,
    headers: DEFAULT_HEADERS,
    body: JSON.stringify(body),
  };
}

/**
 * Create a 200 OK response
 */
export function ok(body: CredentialResponseBody): APIGatewayProxyResult {
  return jsonResponse(200, body);
}

export function errorResponse(statusCode: number, body: CredentialErrorBody): APIGatewayProxyResult {
  return jsonResponse(statusCode, body);
}

/**
 * CORS preflight response
 */
export function preflight(): APIGatewayProxyResult {
  return {
    statusCode: 200,
    headers: {
      ...DEFAULT_HEADERS,
      'Access-Control-Allow-Methods': 'GET,OPTIONS',
    },
    body: '',
  };
}

/**
 * Map an AuthError to its wire status and { error, message } body
 */
export function authErrorResponse(error: AuthError): APIGatewayProxyResult {
  return errorResponse(httpStatusForKind(error.kind), {
    error: error.kind,
    message: error.message,
  });
}

/**
 * Create a 405 Method Not Allowed response
 */
export function methodNotAllowed(method: string): APIGatewayProxyResult {
  return errorResponse(405, {
    error: 'Method Not Allowed',
    message: `Method ${method} not allowed`,
  });
}

/**
 * Create a 500 Internal Server Error response
 */
export function internalError(
  message = 'Internal Server Error',
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(500, { error: 'Internal Server Error', message, requestId });
}
