import type {
  BackendFragment,
  BackendPayload,
  Invocation,
  InvocationMode,
  InvokeOptions,
} from '../types/backend.types.js';
import type { InferenceBackend } from './inferenceBackend.js';
import { ModelError } from '../errors/backend.js';
import { decodeEventStream } from '../protocol/streamDecoder.js';
import { extractFragmentText, extractGeneratedText } from './utils.js';

function parseResultBody(body: string): unknown {
  if (body.trim() === '') return {};
  try {
    return JSON.parse(body);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ModelError(`Backend returned invalid JSON: ${reason}`, undefined, e);
  }
}

async function* toFragments(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<BackendFragment, void, undefined> {
  for await (const event of decodeEventStream(chunks)) {
    yield { text: extractFragmentText(event) };
  }
}

/**
 * Invokes a backend in one of two modes and hands back a tagged result, so
 * callers branch on `mode` instead of inspecting what came back.
 */
export class BackendInvoker {
  constructor(private readonly backend: InferenceBackend) {}

  get modelId(): string {
    return this.backend.modelId;
  }

  async invoke(
    payload: BackendPayload,
    mode: InvocationMode,
    options: InvokeOptions = {},
  ): Promise<Invocation> {
    if (mode === 'stream') {
      const chunks = await this.backend.openStream(payload, options);
      return { mode, fragments: toFragments(chunks) };
    }
    const body = await this.backend.invoke(payload, options);
    return { mode, result: { generatedText: extractGeneratedText(parseResultBody(body)) } };
  }
}
