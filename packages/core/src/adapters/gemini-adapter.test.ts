import { describe, it, expect } from 'vitest';
import { GeminiAdapter } from './gemini-adapter.js';

const settings = { command: '/usr/local/bin/gemini', model: 'gemini-3-pro-preview' };

describe('GeminiAdapter', () => {
  it('should build a headless command with the prompt after -p', () => {
    const adapter = new GeminiAdapter({ ...settings, env: {} });
    const prompt = '--help is not a flag here';

    expect(adapter.name).toBe('gemini');
    expect(adapter.buildCommand(prompt)).toEqual([
      '/usr/local/bin/gemini',
      '--model', 'gemini-3-pro-preview',
      '-p', prompt,
      '--output-format', 'json',
    ]);
  });

  it('should export the shared Google key as GEMINI_API_KEY', () => {
    const adapter = new GeminiAdapter({ ...settings, env: { GOOGLE_API_KEY: 'test-google' } });
    expect(adapter.buildEnvironment()).toEqual({
      GOOGLE_API_KEY: 'test-google',
      GEMINI_API_KEY: 'test-google',
    });
  });

  it('should prefer the dedicated key over the shared one', () => {
    const adapter = new GeminiAdapter({
      ...settings,
      env: { GOOGLE_API_KEY: 'test-google', CROSSTALK_GEMINI_API_KEY: 'test-dedicated' },
    });
    expect(adapter.buildEnvironment().GEMINI_API_KEY).toBe('test-dedicated');
  });

  it('should leave an existing GEMINI_API_KEY alone when nothing is promoted', () => {
    const adapter = new GeminiAdapter({ ...settings, env: { GEMINI_API_KEY: 'test-existing' } });
    expect(adapter.buildEnvironment()).toEqual({ GEMINI_API_KEY: 'test-existing' });
  });

  it('should parse the JSON document', () => {
    const adapter = new GeminiAdapter({ ...settings, env: {} });
    expect(adapter.parseOutput('{"response":"  Hi  ","stats":{}}')).toBe('Hi');
  });
});
