import { describe, it, expect, vi } from 'vitest';
import { encodeCompletionStream, sseFrame, DONE_FRAME } from '../../../src/protocol/streamEncoder.js';
import type { BackendFragment } from '../../../src/types/backend.types.js';
import type { ErrorEnvelope } from '../../../src/types/openai.types.js';

const META = { requestId: 'req-1', model: 'test-endpoint', created: 1700000000 };

async function* fragments(texts: string[], failure?: Error): AsyncGenerator<BackendFragment> {
  for (const text of texts) yield { text };
  if (failure) throw failure;
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const frames: string[] = [];
  for await (const frame of stream) frames.push(frame);
  return frames;
}

function parseFrame(frame: string): unknown {
  return JSON.parse(frame.slice('data: '.length));
}

const onError = (error: unknown): ErrorEnvelope => ({
  error: { message: error instanceof Error ? error.message : 'unknown', type: 'server_error' },
});

describe('sseFrame', () => {
  it('frames JSON and raw strings', () => {
    expect(sseFrame({ a: 1 })).toBe('data: {"a":1}\n\n');
    expect(DONE_FRAME).toBe('data: [DONE]\n\n');
  });
});

describe('encodeCompletionStream', () => {
  it('emits role, content, stop and [DONE] frames for chat', async () => {
    const frames = await collect(
      encodeCompletionStream(fragments(['Hello', '', ' world']), {
        shape: 'chat',
        meta: META,
        prompt: 'Hi',
        includeUsage: false,
        onError,
      }),
    );

    expect(frames).toHaveLength(5);
    expect(parseFrame(frames[0] ?? '')).toEqual({
      id: 'chatcmpl-req-1',
      object: 'chat.completion.chunk',
      created: 1700000000,
      model: 'test-endpoint',
      choices: [{ index: 0, delta: { role: 'assistant' }, finish_reason: null }],
    });
    expect(parseFrame(frames[1] ?? '')).toMatchObject({
      choices: [{ index: 0, delta: { content: 'Hello' }, finish_reason: null }],
    });
    expect(parseFrame(frames[2] ?? '')).toMatchObject({
      choices: [{ index: 0, delta: { content: ' world' }, finish_reason: null }],
    });
    expect(parseFrame(frames[3] ?? '')).toMatchObject({
      choices: [{ index: 0, delta: {}, finish_reason: 'stop' }],
    });
    expect(frames[4]).toBe('data: [DONE]\n\n');
  });

  it('emits text chunks for legacy completions', async () => {
    const frames = await collect(
      encodeCompletionStream(fragments([' Paris']), {
        shape: 'text',
        meta: META,
        prompt: 'The capital of France is',
        includeUsage: false,
        onError,
      }),
    );

    expect(frames.map((f) => (f === DONE_FRAME ? f : parseFrame(f)))).toEqual([
      {
        id: 'cmpl-req-1',
        object: 'text_completion',
        created: 1700000000,
        model: 'test-endpoint',
        choices: [{ index: 0, text: ' Paris', finish_reason: null }],
      },
      {
        id: 'cmpl-req-1',
        object: 'text_completion',
        created: 1700000000,
        model: 'test-endpoint',
        choices: [{ index: 0, text: '', finish_reason: 'stop' }],
      },
      DONE_FRAME,
    ]);
  });

  it('adds a usage chunk when requested', async () => {
    const frames = await collect(
      encodeCompletionStream(fragments(['one two', ' three']), {
        shape: 'chat',
        meta: META,
        prompt: 'count to three',
        includeUsage: true,
        onError,
      }),
    );

    const usageFrame = frames[frames.length - 2] ?? '';
    expect(parseFrame(usageFrame)).toEqual({
      id: 'chatcmpl-req-1',
      object: 'chat.completion.chunk',
      created: 1700000000,
      model: 'test-endpoint',
      choices: [],
      usage: { prompt_tokens: 3, completion_tokens: 3, total_tokens: 6 },
    });
    expect(frames[frames.length - 1]).toBe(DONE_FRAME);
  });

  it('turns a mid-stream failure into an error frame followed by [DONE]', async () => {
    const handler = vi.fn(onError);
    const frames = await collect(
      encodeCompletionStream(fragments(['partial'], new Error('connection reset')), {
        shape: 'chat',
        meta: META,
        prompt: 'Hi',
        includeUsage: false,
        onError: handler,
      }),
    );

    expect(handler).toHaveBeenCalledTimes(1);
    expect(frames.slice(-2)).toEqual([
      'data: {"error":{"message":"connection reset","type":"server_error"}}\n\n',
      DONE_FRAME,
    ]);
  });

  it('closes the fragment source when the consumer stops early', async () => {
    let closed = false;
    async function* source(): AsyncGenerator<BackendFragment> {
      try {
        yield { text: 'a' };
        yield { text: 'b' };
      } finally {
        closed = true;
      }
    }
    const stream = encodeCompletionStream(source(), {
      shape: 'chat',
      meta: META,
      prompt: 'Hi',
      includeUsage: false,
      onError,
    });

    for await (const frame of stream) {
      if (frame.includes('"content":"a"')) break;
    }
    expect(closed).toBe(true);
  });
});
