import type { HttpBackendConfig } from '../types/config.types.js';
import type { BackendPayload, InvokeOptions } from '../types/backend.types.js';
import type { InferenceBackend } from './inferenceBackend.js';
import { BackendError, ModelError } from '../errors/backend.js';

/** SageMaker reports a failure inside the model container with this status. */
const MODEL_FAILURE_STATUS = 424;

/**
 * Talks to a model container over plain HTTP using the SageMaker container
 * contract (`POST /invocations`), e.g. a container run locally.
 */
export class HttpBackend implements InferenceBackend {
  readonly modelId: string;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;

  constructor(config: HttpBackendConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.modelId = config.modelId;
  }

  private headers(accept: string): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json', Accept: accept };
    if (this.apiKey) {
      h['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return h;
  }

  private async post(
    payload: BackendPayload,
    accept: string,
    signal: AbortSignal | undefined,
  ): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/invocations`, {
        method: 'POST',
        headers: this.headers(accept),
        body: JSON.stringify(payload),
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendError(`Backend request failed: ${reason}`, undefined, error);
    }

    if (!res.ok) {
      const detail = (await res.text()).trim();
      const message = `Backend request failed: ${res.status} ${res.statusText}${detail ? ` - ${detail}` : ''}`;
      throw res.status === MODEL_FAILURE_STATUS
        ? new ModelError(message, res.status)
        : new BackendError(message, res.status);
    }
    return res;
  }

  async invoke(payload: BackendPayload, options: InvokeOptions = {}): Promise<string> {
    const res = await this.post(payload, 'application/json', options.signal);
    return res.text();
  }

  async openStream(
    payload: BackendPayload,
    options: InvokeOptions = {},
  ): Promise<AsyncIterable<Uint8Array>> {
    const res = await this.post(payload, 'text/event-stream', options.signal);
    if (!res.body) {
      throw new BackendError('No response body for stream');
    }
    return readBody(res.body);
  }
}

async function* readBody(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      yield value;
    }
  } finally {
    // Cancelling releases the connection when the consumer stops early. An errored
    // body rejects the cancel with its stored error, which the read already raised.
    if (!finished) await reader.cancel().catch(() => undefined);
    reader.releaseLock();
  }
}
