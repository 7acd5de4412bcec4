import { ModelError } from '../errors/backend.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the generated text from a sync backend response. Accepts
 * `{"generated_text": ...}` and the list form `[{"generated_text": ...}]`;
 * any other shape yields an empty string.
 */
export function extractGeneratedText(result: unknown): string {
  const first = Array.isArray(result) ? result[0] : result;
  if (isRecord(first) && typeof first['generated_text'] === 'string') {
    return first['generated_text'];
  }
  return '';
}

/**
 * Reads the text carried by one stream event:
 * `choices[0].delta.content`, else `choices[0].text`, else a non-special `token.text`.
 * An event with an `error` field is a model failure.
 */
export function extractFragmentText(event: unknown): string {
  if (!isRecord(event)) return '';

  const error = event['error'];
  if (error !== undefined && error !== null) {
    const message = isRecord(error) && typeof error['message'] === 'string' ? error['message'] : String(error);
    throw new ModelError(message);
  }

  const choices = event['choices'];
  if (Array.isArray(choices)) {
    const choice: unknown = choices[0];
    if (!isRecord(choice)) return '';
    const delta = choice['delta'];
    if (isRecord(delta) && typeof delta['content'] === 'string') return delta['content'];
    if (typeof choice['text'] === 'string') return choice['text'];
    return '';
  }

  const token = event['token'];
  if (isRecord(token) && token['special'] !== true && typeof token['text'] === 'string') {
    return token['text'];
  }
  return '';
}
