import { describe, it, expect } from 'vitest';
import { CodexAdapter } from './codex-adapter.js';

const settings = { command: '/home/dev/.npm-global/bin/codex', model: 'gpt-5.3-codex' };

describe('CodexAdapter', () => {
  it('should build a non-interactive exec command ending with the prompt', () => {
    const adapter = new CodexAdapter({ ...settings, env: {} });
    const prompt = 'Compare "tabs" vs spaces; explain $HOME and `backticks`';

    expect(adapter.name).toBe('codex');
    expect(adapter.buildCommand(prompt)).toEqual([
      '/home/dev/.npm-global/bin/codex', 'exec',
      '--model', 'gpt-5.3-codex',
      '--json', '--full-auto', '--skip-git-repo-check',
      prompt,
    ]);
  });

  it('should keep a multi-line prompt as a single argument', () => {
    const adapter = new CodexAdapter({ ...settings, env: {} });
    const command = adapter.buildCommand('line one\nline two');
    expect(command.filter((arg) => arg === 'line one\nline two')).toHaveLength(1);
  });

  it('should pass the environment through when no key is configured', () => {
    const adapter = new CodexAdapter({ ...settings, env: { PATH: '/usr/bin', HOME: '/home/dev' } });
    expect(adapter.buildEnvironment()).toEqual({ PATH: '/usr/bin', HOME: '/home/dev' });
  });

  it('should export the shared OpenAI key under the variable codex reads', () => {
    const adapter = new CodexAdapter({ ...settings, env: { OPENAI_API_KEY: 'test-shared' } });
    expect(adapter.buildEnvironment()).toEqual({
      OPENAI_API_KEY: 'test-shared',
      CODEX_API_KEY: 'test-shared',
    });
  });

  it('should prefer the dedicated key over the shared one', () => {
    const adapter = new CodexAdapter({
      ...settings,
      env: { OPENAI_API_KEY: 'test-shared', CROSSTALK_CODEX_API_KEY: 'test-dedicated' },
    });
    expect(adapter.buildEnvironment().CODEX_API_KEY).toBe('test-dedicated');
  });

  it('should not mutate the source environment', () => {
    const env = { OPENAI_API_KEY: 'test-shared' };
    new CodexAdapter({ ...settings, env }).buildEnvironment();
    expect(env).toEqual({ OPENAI_API_KEY: 'test-shared' });
  });

  it('should parse the JSON-lines event log', () => {
    const adapter = new CodexAdapter({ ...settings, env: {} });
    const stdout = JSON.stringify({ type: 'item.completed', item: { type: 'agent_message', text: 'Done.' } });
    expect(adapter.parseOutput(stdout)).toBe('Done.');
  });
});
