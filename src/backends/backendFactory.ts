import type { BackendConfig } from '../types/config.types.js';
import type { InferenceBackend } from './inferenceBackend.js';
import { SageMakerBackend } from './sagemakerBackend.js';
import { HttpBackend } from './httpBackend.js';

export function createBackend(config: BackendConfig): InferenceBackend {
  switch (config.type) {
    case 'sagemaker':
      return new SageMakerBackend(config);
    case 'http':
      return new HttpBackend(config);
    default: {
      const _exhaustive: never = config;
      throw new Error(`Unknown backend type: ${(_exhaustive as { type: string }).type}`);
    }
  }
}
