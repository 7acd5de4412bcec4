import type { BackendPayload, InvokeOptions } from '../types/backend.types.js';

/**
 * Transport to a text-generation backend. Implementations move bytes only;
 * decoding and OpenAI translation happen above this seam.
 */
export interface InferenceBackend {
  /** Endpoint or model name reported to clients. Empty when unconfigured. */
  readonly modelId: string;
  /** One round trip; resolves with the raw response body. */
  invoke(payload: BackendPayload, options?: InvokeOptions): Promise<string>;
  /** Resolves once the response channel is open. */
  openStream(payload: BackendPayload, options?: InvokeOptions): Promise<AsyncIterable<Uint8Array>>;
}
