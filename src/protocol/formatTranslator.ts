import type { Result } from '../types/gateway.types.js';
import type { BackendPayload } from '../types/backend.types.js';
import type { GenerationDefaults } from '../types/config.types.js';
import type {
  ChatCompletion,
  ChatMessage,
  CompletionRequest,
  CompletionShape,
  TextCompletion,
  Usage,
} from '../types/openai.types.js';
import { ok, err } from '../types/gateway.types.js';
import { InvalidRequestError } from '../errors/request.js';
import { countTokens } from './tokens.js';

export interface TranslatedRequest {
  shape: CompletionShape;
  /** Flattened prompt sent to the backend; also the basis of `prompt_tokens`. */
  prompt: string;
  payload: BackendPayload;
  stream: boolean;
  includeUsage: boolean;
}

export interface CompletionMeta {
  requestId: string;
  model: string;
  created: number;
}

export function messageText(content: ChatMessage['content']): string {
  if (content === undefined || content === null) return '';
  if (typeof content === 'string') return content;
  return content
    .filter((part) => part.type === 'text' && typeof part.text === 'string')
    .map((part) => part.text)
    .join('');
}

/**
 * Flattens a conversation into one prompt. System and assistant turns carry a
 * role label; user turns (and unrecognised roles) are bare.
 *
 * Example:
 *   [system "Be brief", user "Hi", assistant "Hello"] → "System: Be brief\nHi\nAssistant: Hello"
 */
export function flattenMessages(messages: ChatMessage[]): string {
  return messages
    .map((message) => {
      const text = messageText(message.content);
      switch (message.role) {
        case 'system':
          return `System: ${text}`;
        case 'assistant':
          return `Assistant: ${text}`;
        default:
          return text;
      }
    })
    .join('\n');
}

/**
 * Chooses the response shape from the payload: `messages` means chat,
 * otherwise `prompt` means a legacy text completion.
 */
export function toBackendRequest(
  request: CompletionRequest,
  defaults: GenerationDefaults,
): Result<TranslatedRequest, InvalidRequestError> {
  let shape: CompletionShape;
  let prompt: string;

  if (request.messages !== undefined) {
    if (request.messages.length === 0) {
      return err(new InvalidRequestError("'messages' must contain at least one message"));
    }
    shape = 'chat';
    prompt = flattenMessages(request.messages);
  } else if (request.prompt !== undefined) {
    shape = 'text';
    prompt = request.prompt;
  } else {
    return err(new InvalidRequestError("Request must include either 'messages' or 'prompt'"));
  }

  const stream = request.stream === true;
  return ok({
    shape,
    prompt,
    stream,
    includeUsage: stream && request.stream_options?.include_usage === true,
    payload: {
      inputs: prompt,
      parameters: {
        max_new_tokens: request.max_tokens ?? defaults.maxTokens,
        temperature: request.temperature ?? defaults.temperature,
        do_sample: true,
      },
      ...(stream ? { stream: true as const } : {}),
    },
  });
}

export function buildUsage(prompt: string, generatedText: string): Usage {
  const promptTokens = countTokens(prompt);
  const completionTokens = countTokens(generatedText);
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
  };
}

export function completionId(shape: CompletionShape, requestId: string): string {
  return shape === 'chat' ? `chatcmpl-${requestId}` : `cmpl-${requestId}`;
}

export function buildChatCompletion(
  meta: CompletionMeta,
  generatedText: string,
  prompt: string,
): ChatCompletion {
  return {
    id: completionId('chat', meta.requestId),
    object: 'chat.completion',
    created: meta.created,
    model: meta.model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: generatedText },
        finish_reason: 'stop',
      },
    ],
    usage: buildUsage(prompt, generatedText),
  };
}

export function buildTextCompletion(
  meta: CompletionMeta,
  generatedText: string,
  prompt: string,
): TextCompletion {
  return {
    id: completionId('text', meta.requestId),
    object: 'text_completion',
    created: meta.created,
    model: meta.model,
    choices: [{ index: 0, text: generatedText, finish_reason: 'stop' }],
    usage: buildUsage(prompt, generatedText),
  };
}

export function buildCompletion(
  shape: CompletionShape,
  meta: CompletionMeta,
  generatedText: string,
  prompt: string,
): ChatCompletion | TextCompletion {
  return shape === 'chat'
    ? buildChatCompletion(meta, generatedText, prompt)
    : buildTextCompletion(meta, generatedText, prompt);
}
