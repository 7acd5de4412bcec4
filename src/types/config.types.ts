export interface SageMakerBackendConfig {
  type: 'sagemaker';
  /** Empty until configured; completion requests then fail with server_error. */
  endpointName: string;
  region: string;
}

export interface HttpBackendConfig {
  type: 'http';
  /** Base URL of a container serving the SageMaker `/invocations` contract. */
  baseUrl: string;
  apiKey?: string;
  /** Reported as the model id by `/v1/models` and in responses. */
  modelId: string;
}

export type BackendConfig = SageMakerBackendConfig | HttpBackendConfig;

export interface ApiConfig {
  port: number;
  host: string;
}

export interface GenerationDefaults {
  maxTokens: number;
  temperature: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  backend: BackendConfig;
  api: ApiConfig;
  generation: GenerationDefaults;
  logLevel: LogLevel;
}
