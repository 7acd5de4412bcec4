import { GatewayError } from './base.js';

/** Transport or service failure talking to the backend. */
export class BackendError extends GatewayError {
  constructor(
    message: string,
    public readonly backendStatus?: number,
    cause?: unknown,
  ) {
    super(message, 'server_error', 500, cause);
  }
}

/** The backend accepted the request but the model failed to generate. */
export class ModelError extends GatewayError {
  constructor(
    message: string,
    public readonly backendStatus?: number,
    cause?: unknown,
  ) {
    super(message, 'model_error', 500, cause);
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string) {
    super(message, 'server_error', 500);
  }
}
