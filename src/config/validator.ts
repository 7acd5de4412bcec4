import type { AppConfig, BackendConfig } from '../types/config.types.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function validateBackend(backend: BackendConfig): void {
  // A missing endpoint name is not fatal: it is reported per request as server_error.
  if (backend.type === 'sagemaker') {
    if (!backend.region || backend.region.trim() === '') {
      throw new ConfigValidationError(
        'Backend type "sagemaker" requires region. Set AWS_REGION env var or provide in config.',
      );
    }
  }
  if (backend.type === 'http') {
    if (!backend.baseUrl || backend.baseUrl.trim() === '') {
      throw new ConfigValidationError('Backend type "http" requires baseUrl.');
    }
    if (!URL.canParse(backend.baseUrl)) {
      throw new ConfigValidationError(`Backend baseUrl is not a valid URL: ${backend.baseUrl}`);
    }
  }
}

export function validateConfig(config: AppConfig): void {
  validateBackend(config.backend);

  if (!Number.isInteger(config.api.port) || config.api.port < 1 || config.api.port > 65535) {
    throw new ConfigValidationError(
      `API port must be between 1 and 65535, got ${config.api.port}.`,
    );
  }

  if (!Number.isInteger(config.generation.maxTokens) || config.generation.maxTokens < 1) {
    throw new ConfigValidationError('generation.maxTokens must be a positive integer.');
  }

  if (config.generation.temperature < 0 || config.generation.temperature > 2) {
    throw new ConfigValidationError('generation.temperature must be between 0 and 2.');
  }
}
