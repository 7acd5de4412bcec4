import type { AppConfig } from '../types/config.types.js';
import type { GatewayLogger } from '../types/gateway.types.js';
import type { InferenceBackend } from '../backends/inferenceBackend.js';
import { createBackend } from '../backends/backendFactory.js';
import { BackendInvoker } from '../backends/backendInvoker.js';
import { Gateway } from './gateway.js';

export { Gateway } from './gateway.js';
export type { GatewayDeps } from './gateway.js';
export { resolveRoute } from './router.js';

/**
 * Wires a gateway from configuration. Pass `backend` to substitute the
 * transport (tests, custom hosts); otherwise the configured one is built.
 */
export function createGateway(
  config: Pick<AppConfig, 'backend' | 'generation'>,
  logger: GatewayLogger,
  backend: InferenceBackend = createBackend(config.backend),
): Gateway {
  return new Gateway({
    invoker: new BackendInvoker(backend),
    generation: config.generation,
    logger,
  });
}
