import type { AppConfig } from '../types/config.types.js';

export const DEFAULT_CONFIG: AppConfig = {
  backend: {
    type: 'sagemaker',
    endpointName: '',
    region: 'eu-north-1',
  },
  api: {
    port: 8080,
    host: '127.0.0.1',
  },
  generation: {
    maxTokens: 100,
    temperature: 0.7,
  },
  logLevel: 'info',
};
