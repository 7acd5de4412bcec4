import { describe, it, expect } from 'vitest';
import { decodeEventStream } from '../../../src/protocol/streamDecoder.js';
import { ModelError } from '../../../src/errors/backend.js';

const encoder = new TextEncoder();

async function* chunksOf(parts: Array<string | Uint8Array>): AsyncGenerator<Uint8Array | string> {
  for (const part of parts) yield part;
}

async function collect(parts: Array<string | Uint8Array>): Promise<unknown[]> {
  const events: unknown[] = [];
  for await (const event of decodeEventStream(chunksOf(parts))) events.push(event);
  return events;
}

describe('decodeEventStream', () => {
  it('yields each data event and stops at [DONE]', async () => {
    const events = await collect([
      encoder.encode('data: {"a":1}\n'),
      encoder.encode('data: {"a":2}\n'),
      encoder.encode('data: [DONE]\n'),
    ]);
    expect(events).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('ignores everything after [DONE]', async () => {
    const events = await collect(['data: {"a":1}\ndata: [DONE]\ndata: {"a":2}\n']);
    expect(events).toEqual([{ a: 1 }]);
  });

  it('handles several events in one chunk', async () => {
    const events = await collect(['data: {"a":1}\n\ndata: {"a":2}\n\n']);
    expect(events).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('reassembles a line split across chunks', async () => {
    const events = await collect(['data: {"choices":[{"de', 'lta":{"content":"Hi"}}]}\n', 'data: [DONE]\n']);
    expect(events).toEqual([{ choices: [{ delta: { content: 'Hi' } }] }]);
  });

  it('reassembles a multi-byte character split across chunks', async () => {
    const bytes = encoder.encode('data: {"text":"é"}\n');
    // "é" is two bytes; cut between them.
    const cut = bytes.indexOf(0xc3) + 1;
    const events = await collect([bytes.slice(0, cut), bytes.slice(cut)]);
    expect(events).toEqual([{ text: 'é' }]);
  });

  it('skips lines without the data prefix', async () => {
    const events = await collect([': keep-alive\n', '\n', 'event: message\n', 'data: {"a":1}\n']);
    expect(events).toEqual([{ a: 1 }]);
  });

  it('accepts CRLF line endings', async () => {
    const events = await collect(['data: {"a":1}\r\n', 'data: [DONE]\r\n']);
    expect(events).toEqual([{ a: 1 }]);
  });

  it('decodes a final line without a trailing newline', async () => {
    const events = await collect(['data: {"a":1}\ndata: {"a":2}']);
    expect(events).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it('ends cleanly when the input ends without [DONE]', async () => {
    const events = await collect(['data: {"a":1}\n']);
    expect(events).toEqual([{ a: 1 }]);
  });

  it('throws ModelError on a malformed event', async () => {
    await expect(collect(['data: NOT_JSON\n'])).rejects.toThrow(ModelError);
    await expect(collect(['data: NOT_JSON\n'])).rejects.toThrow(/^Malformed stream event: /);
  });

  it('closes the source when [DONE] arrives early', async () => {
    let closed = false;
    async function* source(): AsyncGenerator<string> {
      try {
        yield 'data: [DONE]\n';
        yield 'data: {"a":1}\n';
      } finally {
        closed = true;
      }
    }
    const events: unknown[] = [];
    for await (const event of decodeEventStream(source())) events.push(event);
    expect(events).toEqual([]);
    expect(closed).toBe(true);
  });
});
