import type { BufferedResponse } from '../types/gateway.types.js';
import type { ErrorEnvelope } from '../types/openai.types.js';
import { GatewayError } from '../errors/base.js';
import { ModelError } from '../errors/backend.js';

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
};

export const CORS_PREFLIGHT_HEADERS: Readonly<Record<string, string>> = {
  ...CORS_HEADERS,
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

function describe(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}

/**
 * Normalises any thrown value into a GatewayError. Errors that are not already
 * classified become `server_error`; only their message survives.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  return new GatewayError(`Internal error: ${describe(error)}`, 'server_error', 500, error);
}

export function errorEnvelope(error: GatewayError): ErrorEnvelope {
  const message = error instanceof ModelError ? `Model error: ${error.message}` : error.message;
  return { error: { message, type: error.type } };
}

export function jsonResponse(
  statusCode: number,
  body: unknown,
  headers: Record<string, string> = {},
): BufferedResponse {
  return {
    kind: 'buffered',
    statusCode,
    headers: { 'Content-Type': 'application/json', ...CORS_HEADERS, ...headers },
    body: JSON.stringify(body),
  };
}

export function errorResponse(error: unknown): BufferedResponse {
  const mapped = toGatewayError(error);
  return jsonResponse(mapped.statusCode, errorEnvelope(mapped));
}
