import type { ZodIssue } from 'zod';
import type { InboundRequest, Result } from '../types/gateway.types.js';
import type { CompletionRequest } from '../types/openai.types.js';
import { ok, err } from '../types/gateway.types.js';
import { InvalidRequestError } from '../errors/request.js';
import { completionRequestSchema } from './requestSchema.js';

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes the body of an inbound request (base64 when flagged) and parses it
 * as a JSON object. An absent or blank body is an empty object.
 */
export function parseRequestBody(
  request: Pick<InboundRequest, 'body' | 'isBase64Encoded'>,
): Result<JsonObject, InvalidRequestError> {
  let text = request.body ?? '';
  if (request.isBase64Encoded && text !== '') {
    text = Buffer.from(text, 'base64').toString('utf-8');
  }
  if (text.trim() === '') {
    return ok({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err(new InvalidRequestError(`Invalid JSON: ${reason}`, e));
  }

  if (!isJsonObject(parsed)) {
    return err(new InvalidRequestError('Request body must be a JSON object'));
  }
  return ok(parsed);
}

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : 'body';
  return `Invalid '${path}': ${issue.message}`;
}

/**
 * Checks field types of a parsed body. Top-level `null` values count as absent,
 * unknown fields are kept.
 */
export function validateCompletionRequest(
  body: JsonObject,
): Result<CompletionRequest, InvalidRequestError> {
  const present = Object.fromEntries(Object.entries(body).filter(([, value]) => value !== null));
  const parsed = completionRequestSchema.safeParse(present);
  if (!parsed.success) {
    const [first] = parsed.error.issues;
    const message = first ? describeIssue(first) : 'Invalid request body';
    return err(new InvalidRequestError(message, parsed.error));
  }
  return ok(parsed.data);
}
