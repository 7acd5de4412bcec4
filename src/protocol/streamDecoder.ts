import { ModelError } from '../errors/backend.js';

const DATA_PREFIX = 'data: ';
const DONE_SENTINEL = '[DONE]';

type LineOutcome = { kind: 'skip' } | { kind: 'done' } | { kind: 'event'; event: unknown };

function decodeLine(rawLine: string): LineOutcome {
  const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
  if (!line.startsWith(DATA_PREFIX)) return { kind: 'skip' };

  const payload = line.slice(DATA_PREFIX.length);
  if (payload.trim() === DONE_SENTINEL) return { kind: 'done' };

  try {
    return { kind: 'event', event: JSON.parse(payload) };
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ModelError(`Malformed stream event: ${reason}`, undefined, e);
  }
}

/**
 * Decodes `data: <json>` lines from a byte stream into parsed events.
 *
 * Lines may be split across chunks; only the trailing partial line is held
 * between chunks. Lines without the prefix (keep-alives, `event:` fields) are
 * skipped. Iteration ends at `data: [DONE]` or when the input ends, and a
 * final unterminated line is still decoded.
 */
export async function* decodeEventStream(
  chunks: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<unknown, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      const outcome = decodeLine(line);
      if (outcome.kind === 'done') return;
      if (outcome.kind === 'event') yield outcome.event;
    }
  }

  buffer += decoder.decode();
  if (buffer !== '') {
    const outcome = decodeLine(buffer);
    if (outcome.kind === 'event') yield outcome.event;
  }
}
