import { describe, it, expect } from 'vitest';
import { extractFragmentText, extractGeneratedText } from '../../../src/backends/utils.js';
import { ModelError } from '../../../src/errors/backend.js';

describe('extractGeneratedText', () => {
  it('reads generated_text from an object', () => {
    expect(extractGeneratedText({ generated_text: 'hello' })).toBe('hello');
  });

  it('reads generated_text from the first element of a list', () => {
    expect(extractGeneratedText([{ generated_text: 'first' }, { generated_text: 'second' }])).toBe('first');
  });

  it('returns an empty string for other shapes', () => {
    expect(extractGeneratedText({})).toBe('');
    expect(extractGeneratedText({ generated_text: 7 })).toBe('');
    expect(extractGeneratedText([])).toBe('');
    expect(extractGeneratedText('text')).toBe('');
  });
});

describe('extractFragmentText', () => {
  it('reads choices[0].delta.content', () => {
    expect(extractFragmentText({ choices: [{ delta: { content: 'Hi' } }] })).toBe('Hi');
  });

  it('falls back to choices[0].text', () => {
    expect(extractFragmentText({ choices: [{ text: 'Hi' }] })).toBe('Hi');
  });

  it('reads token.text and skips special tokens', () => {
    expect(extractFragmentText({ token: { text: 'Hi', special: false } })).toBe('Hi');
    expect(extractFragmentText({ token: { text: '</s>', special: true } })).toBe('');
  });

  it('returns an empty string for events without text', () => {
    expect(extractFragmentText({ choices: [{ delta: {} }] })).toBe('');
    expect(extractFragmentText({ choices: [] })).toBe('');
    expect(extractFragmentText(null)).toBe('');
  });

  it('throws ModelError for an error event', () => {
    expect(() => extractFragmentText({ error: 'Request failed during generation' })).toThrow(ModelError);
    expect(() => extractFragmentText({ error: { message: 'out of memory' } })).toThrow('out of memory');
  });
});
