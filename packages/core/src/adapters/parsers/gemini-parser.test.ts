import { describe, it, expect } from 'vitest';
import { parseGeminiOutput } from './gemini-parser.js';

describe('parseGeminiOutput', () => {
  it('should read the response field', () => {
    expect(parseGeminiOutput('{"response":"X"}')).toBe('X');
  });

  it('should read the text field', () => {
    expect(parseGeminiOutput('{"text":"Y"}')).toBe('Y');
  });

  it('should prefer fields in order response, text, content, result', () => {
    expect(parseGeminiOutput(JSON.stringify({ result: 'r', content: 'c' }))).toBe('c');
    expect(parseGeminiOutput(JSON.stringify({ result: 'r', text: 't', response: 'p' }))).toBe('p');
  });

  it('should trim string answers', () => {
    expect(parseGeminiOutput(JSON.stringify({ response: '  spaced out \n' }))).toBe('spaced out');
  });

  it('should re-serialize non-string answers', () => {
    expect(parseGeminiOutput(JSON.stringify({ response: { parts: ['a', 'b'] } }))).toBe('{"parts":["a","b"]}');
    expect(parseGeminiOutput(JSON.stringify({ result: 42 }))).toBe('42');
  });

  it('should join array elements with newlines', () => {
    expect(parseGeminiOutput('[{"text":"a"},{"text":"b"}]')).toBe('a\nb');
  });

  it('should re-serialize array elements without a known field', () => {
    const stdout = JSON.stringify([{ response: 'first' }, { other: 1 }, 'loose']);
    expect(parseGeminiOutput(stdout)).toBe('first\n{"other":1}\nloose');
  });

  it('should return raw trimmed stdout for non-JSON input', () => {
    expect(parseGeminiOutput('  Loaded cached credentials.\nHello there  ')).toBe(
      'Loaded cached credentials.\nHello there',
    );
  });

  it('should return raw trimmed stdout when the object has no known field', () => {
    expect(parseGeminiOutput(' {"stats":{"models":1}} ')).toBe('{"stats":{"models":1}}');
  });

  it('should return raw trimmed stdout for an empty array or a scalar document', () => {
    expect(parseGeminiOutput(' [] ')).toBe('[]');
    expect(parseGeminiOutput('"just a string"\n')).toBe('"just a string"');
  });
});
