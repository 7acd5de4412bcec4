import type {
  APIGatewayProxyEvent,
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from 'aws-lambda';
import { pino } from 'pino';
import type { Gateway } from '../gateway/gateway.js';
import type { InboundRequest } from '../types/gateway.types.js';
import { createGateway } from '../gateway/index.js';
import { loadConfig } from '../config/loader.js';
import { validateConfig } from '../config/validator.js';
import { ConfigurationError } from '../errors/backend.js';
import { errorResponse } from '../gateway/errorMapper.js';

export type ApiGatewayEvent = APIGatewayProxyEventV2 | APIGatewayProxyEvent;

type LambdaHandler = (
  event: ApiGatewayEvent,
  context: Pick<Context, 'awsRequestId'>,
) => Promise<APIGatewayProxyStructuredResultV2>;

function compactHeaders(headers: Record<string, string | undefined> | null): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (value !== undefined) result[name.toLowerCase()] = value;
  }
  return result;
}

/** Accepts both HTTP API (payload v2) and REST API (payload v1) events. */
export function toInboundRequest(event: ApiGatewayEvent): InboundRequest {
  const common = {
    headers: compactHeaders(event.headers),
    body: event.body ?? null,
    isBase64Encoded: event.isBase64Encoded,
  };
  if ('httpMethod' in event) {
    return { ...common, method: event.httpMethod, path: event.path };
  }
  return {
    ...common,
    method: event.requestContext.http.method,
    path: event.rawPath,
  };
}

async function collect(events: AsyncIterable<string>): Promise<string> {
  let body = '';
  for await (const frame of events) body += frame;
  return body;
}

/**
 * Builds a Lambda handler around a gateway. Streaming responses are buffered
 * into one SSE body, since a proxy integration returns a single payload.
 */
export function createLambdaHandler(gateway: Gateway): LambdaHandler {
  return async (event, context) => {
    const response = await gateway.handle(toInboundRequest(event), {
      requestId: context.awsRequestId,
    });
    const body = response.kind === 'stream' ? await collect(response.events) : response.body;
    return { statusCode: response.statusCode, headers: response.headers, body };
  };
}

let defaultHandler: LambdaHandler | undefined;

function createDefaultHandler(): LambdaHandler {
  const config = loadConfig();
  validateConfig(config);
  const logger = pino({ level: config.logLevel });
  return createLambdaHandler(createGateway(config, logger));
}

/**
 * Lambda entry point. The gateway and its backend client live for the whole container.
 * A configuration failure is answered as `server_error` and retried on the next event.
 */
export const handler: LambdaHandler = async (event, context) => {
  if (!defaultHandler) {
    try {
      defaultHandler = createDefaultHandler();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      pino().error({ err: error, requestId: context.awsRequestId }, 'gateway configuration failed');
      const response = errorResponse(new ConfigurationError(message));
      return { statusCode: response.statusCode, headers: response.headers, body: response.body };
    }
  }
  return defaultHandler(event, context);
};
