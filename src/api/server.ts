import { randomUUID } from 'node:crypto';
import { Readable } from 'node:stream';
import type { IncomingHttpHeaders } from 'node:http';
import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import type { Gateway } from '../gateway/gateway.js';
import type { InboundRequest } from '../types/gateway.types.js';
import { GatewayError } from '../errors/base.js';
import { errorResponse } from '../gateway/errorMapper.js';

export interface ApiServerDeps {
  gateway: Gateway;
  /** Pino logger used for request logging. Logging is off when omitted. */
  logger?: FastifyBaseLogger;
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function pathOf(url: string): string {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
}

/**
 * Creates a Fastify server that hands every request to the gateway.
 * Bodies reach the gateway unparsed so JSON errors map to the OpenAI envelope.
 * Does NOT call listen(). The caller does that, or uses server.inject() in tests.
 */
export function createApiServer(deps: ApiServerDeps): FastifyInstance {
  const app = deps.logger
    ? Fastify({ loggerInstance: deps.logger, genReqId: () => randomUUID() })
    : Fastify({ logger: false, genReqId: () => randomUUID() });

  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, body, done) => {
    done(null, body);
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Fastify's own client errors (oversized body, bad framing) keep their status.
    const mapped =
      error.statusCode !== undefined && error.statusCode < 500
        ? new GatewayError(error.message, 'invalid_request_error', error.statusCode, error)
        : error;
    const response = errorResponse(mapped);
    request.log.error({ err: error }, 'request failed before reaching the gateway');
    return reply.code(response.statusCode).headers(response.headers).send(response.body);
  });

  app.all('/*', async (request, reply) => {
    const inbound: InboundRequest = {
      method: request.method,
      path: pathOf(request.url),
      headers: flattenHeaders(request.headers),
      body: typeof request.body === 'string' ? request.body : null,
      isBase64Encoded: false,
    };

    const disconnect = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) disconnect.abort();
    });

    const response = await deps.gateway.handle(inbound, {
      requestId: request.id,
      signal: disconnect.signal,
      logger: request.log,
    });

    reply.code(response.statusCode).headers(response.headers);
    if (response.kind === 'stream') {
      return reply.send(Readable.from(response.events));
    }
    return reply.send(response.body);
  });

  return app;
}
