// Public API: explicit named exports only (no re-export *)

export type { InferenceBackend } from './backends/inferenceBackend.js';
export type {
  InboundRequest,
  InvocationContext,
  GatewayResponse,
  GatewayLogger,
} from './types/gateway.types.js';
export type { BackendPayload, BackendResult, Invocation, InvocationMode } from './types/backend.types.js';
export type {
  ChatCompletion,
  ChatMessage,
  CompletionRequest,
  ErrorEnvelope,
  ErrorType,
  TextCompletion,
} from './types/openai.types.js';
export type { AppConfig, BackendConfig } from './types/config.types.js';

export { Gateway, createGateway, resolveRoute } from './gateway/index.js';
export { createBackend, BackendInvoker, SageMakerBackend, HttpBackend } from './backends/index.js';
export { decodeEventStream } from './protocol/streamDecoder.js';
export { parseRequestBody } from './protocol/requestParser.js';
export { flattenMessages, toBackendRequest } from './protocol/formatTranslator.js';
export { GatewayError } from './errors/base.js';
export { InvalidRequestError, NotFoundError } from './errors/request.js';
export { BackendError, ModelError, ConfigurationError } from './errors/backend.js';
export { loadConfig } from './config/loader.js';
export { validateConfig, ConfigValidationError } from './config/validator.js';
export { createApiServer } from './api/server.js';
export { createLambdaHandler } from './lambda/handler.js';
