import type { BaseLogger } from 'pino';

export type HttpMethod = 'GET' | 'POST' | 'OPTIONS' | (string & {});

export interface InboundRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string | null;
  readonly isBase64Encoded?: boolean;
}

export type GatewayLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface InvocationContext {
  /** Per-invocation id from the host. A UUID is generated when absent. */
  requestId?: string;
  /** Aborted by the host when the client goes away mid-stream. */
  signal?: AbortSignal;
  /** Request-scoped logger; the gateway's own logger is used when absent. */
  logger?: GatewayLogger;
}

export type RouteName = 'list-models' | 'cors-preflight' | 'completion' | 'not-found';

export interface BufferedResponse {
  kind: 'buffered';
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface StreamingResponse {
  kind: 'stream';
  statusCode: number;
  headers: Record<string, string>;
  /** Server-sent event frames, each ending in a blank line. */
  events: AsyncIterable<string>;
}

export type GatewayResponse = BufferedResponse | StreamingResponse;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
