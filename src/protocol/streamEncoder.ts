import type { BackendFragment } from '../types/backend.types.js';
import type {
  ChatCompletionChunk,
  CompletionShape,
  ErrorEnvelope,
  TextCompletionChunk,
  Usage,
} from '../types/openai.types.js';
import type { CompletionMeta } from './formatTranslator.js';
import { buildUsage, completionId } from './formatTranslator.js';

export interface StreamEncodeOptions {
  shape: CompletionShape;
  meta: CompletionMeta;
  prompt: string;
  includeUsage: boolean;
  /** Converts a failure raised after the stream started into an error frame. */
  onError: (error: unknown) => ErrorEnvelope;
}

export function sseFrame(data: unknown): string {
  return `data: ${typeof data === 'string' ? data : JSON.stringify(data)}\n\n`;
}

export const DONE_FRAME = sseFrame('[DONE]');

export function chatChunk(
  meta: CompletionMeta,
  delta: ChatCompletionChunk['choices'][number]['delta'],
  finishReason: 'stop' | null = null,
): ChatCompletionChunk {
  return {
    id: completionId('chat', meta.requestId),
    object: 'chat.completion.chunk',
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
}

export function textChunk(
  meta: CompletionMeta,
  text: string,
  finishReason: 'stop' | null = null,
): TextCompletionChunk {
  return {
    id: completionId('text', meta.requestId),
    object: 'text_completion',
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, text, finish_reason: finishReason }],
  };
}

function usageChunk(
  shape: CompletionShape,
  meta: CompletionMeta,
  usage: Usage,
): ChatCompletionChunk | TextCompletionChunk {
  const base = shape === 'chat' ? chatChunk(meta, {}) : textChunk(meta, '');
  return { ...base, choices: [], usage };
}

/**
 * Re-emits backend fragments as OpenAI streaming frames.
 *
 * Chat streams open with an assistant role delta. Both shapes close with an
 * empty `stop` chunk, an optional usage chunk and `[DONE]`. A failure while
 * iterating becomes a single error frame followed by `[DONE]`.
 */
export async function* encodeCompletionStream(
  fragments: AsyncIterable<BackendFragment>,
  options: StreamEncodeOptions,
): AsyncGenerator<string, void, undefined> {
  const { shape, meta } = options;
  let generated = '';

  try {
    if (shape === 'chat') {
      yield sseFrame(chatChunk(meta, { role: 'assistant' }));
    }

    for await (const fragment of fragments) {
      if (fragment.text === '') continue;
      generated += fragment.text;
      yield sseFrame(
        shape === 'chat' ? chatChunk(meta, { content: fragment.text }) : textChunk(meta, fragment.text),
      );
    }

    yield sseFrame(shape === 'chat' ? chatChunk(meta, {}, 'stop') : textChunk(meta, '', 'stop'));
    if (options.includeUsage) {
      yield sseFrame(usageChunk(shape, meta, buildUsage(options.prompt, generated)));
    }
  } catch (error) {
    yield sseFrame(options.onError(error));
  }

  yield DONE_FRAME;
}
