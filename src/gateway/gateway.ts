import { randomUUID } from 'node:crypto';
import type { BackendInvoker } from '../backends/backendInvoker.js';
import type { GenerationDefaults } from '../types/config.types.js';
import type {
  BufferedResponse,
  GatewayLogger,
  GatewayResponse,
  InboundRequest,
  InvocationContext,
} from '../types/gateway.types.js';
import type { ModelList } from '../types/openai.types.js';
import { NotFoundError } from '../errors/request.js';
import { parseRequestBody, validateCompletionRequest } from '../protocol/requestParser.js';
import { buildCompletion, toBackendRequest } from '../protocol/formatTranslator.js';
import { encodeCompletionStream } from '../protocol/streamEncoder.js';
import { resolveRoute } from './router.js';
import {
  CORS_HEADERS,
  CORS_PREFLIGHT_HEADERS,
  errorEnvelope,
  jsonResponse,
  toGatewayError,
} from './errorMapper.js';

export interface GatewayDeps {
  invoker: BackendInvoker;
  generation: GenerationDefaults;
  logger: GatewayLogger;
  /** Milliseconds since the epoch. */
  now?: () => number;
}

/** Fixed creation time reported for the single listed model. */
const MODEL_CREATED = 1677610602;

const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream; charset=utf-8',
  'Cache-Control': 'no-cache, no-transform',
  'X-Accel-Buffering': 'no',
};

/**
 * Translates OpenAI-style requests into backend invocations and back.
 * Holds no per-request state; one instance serves every request of a process.
 */
export class Gateway {
  private readonly invoker: BackendInvoker;
  private readonly generation: GenerationDefaults;
  private readonly logger: GatewayLogger;
  private readonly now: () => number;

  constructor(deps: GatewayDeps) {
    this.invoker = deps.invoker;
    this.generation = deps.generation;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  async handle(request: InboundRequest, context: InvocationContext = {}): Promise<GatewayResponse> {
    const logger = context.logger ?? this.logger;
    const route = resolveRoute(request);
    logger.debug({ method: request.method, path: request.path, route }, 'route resolved');

    try {
      switch (route) {
        case 'list-models':
          return this.listModels();
        case 'cors-preflight':
          return this.preflight();
        case 'completion':
          return await this.complete(request, context, logger);
        case 'not-found':
          return this.fail(new NotFoundError(), logger);
      }
    } catch (error) {
      return this.fail(error, logger);
    }
  }

  listModels(): BufferedResponse {
    const body: ModelList = {
      object: 'list',
      data: [
        {
          id: this.invoker.modelId,
          object: 'model',
          created: MODEL_CREATED,
          owned_by: 'sagemaker',
        },
      ],
    };
    return jsonResponse(200, body);
  }

  preflight(): BufferedResponse {
    return { kind: 'buffered', statusCode: 200, headers: { ...CORS_PREFLIGHT_HEADERS }, body: '' };
  }

  private async complete(
    request: InboundRequest,
    context: InvocationContext,
    logger: GatewayLogger,
  ): Promise<GatewayResponse> {
    const body = parseRequestBody(request);
    if (!body.ok) return this.fail(body.error, logger);

    const validated = validateCompletionRequest(body.value);
    if (!validated.ok) return this.fail(validated.error, logger);

    const translated = toBackendRequest(validated.value, this.generation);
    if (!translated.ok) return this.fail(translated.error, logger);

    const { shape, prompt, payload, stream, includeUsage } = translated.value;
    const meta = {
      requestId: context.requestId ?? randomUUID(),
      model: this.invoker.modelId,
      created: Math.floor(this.now() / 1000),
    };

    const started = this.now();
    const invocation = await this.invoker.invoke(payload, stream ? 'stream' : 'sync', {
      ...(context.signal ? { signal: context.signal } : {}),
    });

    if (invocation.mode === 'stream') {
      logger.info({ shape, requestId: meta.requestId, openMs: this.now() - started }, 'backend stream opened');
      return {
        kind: 'stream',
        statusCode: 200,
        headers: { ...SSE_HEADERS, ...CORS_HEADERS },
        events: encodeCompletionStream(invocation.fragments, {
          shape,
          meta,
          prompt,
          includeUsage,
          onError: (error) => {
            const mapped = toGatewayError(error);
            logger.error({ err: error, type: mapped.type }, 'backend stream failed');
            return errorEnvelope(mapped);
          },
        }),
      };
    }

    logger.info(
      { shape, requestId: meta.requestId, durationMs: this.now() - started },
      'backend invocation completed',
    );
    return jsonResponse(200, buildCompletion(shape, meta, invocation.result.generatedText, prompt));
  }

  private fail(error: unknown, logger: GatewayLogger): BufferedResponse {
    const mapped = toGatewayError(error);
    if (mapped.statusCode >= 500) {
      logger.error({ err: error, type: mapped.type }, mapped.message);
    } else {
      logger.warn({ type: mapped.type }, mapped.message);
    }
    return jsonResponse(mapped.statusCode, errorEnvelope(mapped));
  }
}
