export interface GenerationParameters {
  max_new_tokens: number;
  temperature: number;
  do_sample: true;
}

export interface BackendPayload {
  inputs: string;
  parameters: GenerationParameters;
  stream?: true;
}

export interface BackendResult {
  generatedText: string;
}

export interface BackendFragment {
  text: string;
}

export type InvocationMode = 'sync' | 'stream';

export interface SyncInvocation {
  mode: 'sync';
  result: BackendResult;
}

export interface StreamInvocation {
  mode: 'stream';
  /** Lazy and single-use: iterating twice is not supported. */
  fragments: AsyncIterable<BackendFragment>;
}

export type Invocation = SyncInvocation | StreamInvocation;

export interface InvokeOptions {
  signal?: AbortSignal;
}
