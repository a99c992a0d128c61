import { describe, it, expect, beforeEach } from 'vitest';
import { join } from 'node:path';
import { ConfigService } from './config-service.js';
import type { ConfigStore, CrosstalkPrefs } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';

class MemoryConfigStore implements ConfigStore {
  constructor(public prefs: CrosstalkPrefs = {}) {}

  async getPrefs(): Promise<CrosstalkPrefs> {
    return { ...this.prefs };
  }

  async savePrefs(prefs: CrosstalkPrefs): Promise<void> {
    this.prefs = { ...prefs };
  }
}

const HOME = '/home/tester';

describe('ConfigService', () => {
  let store: MemoryConfigStore;

  beforeEach(() => {
    store = new MemoryConfigStore();
  });

  it('should fall back to defaults under the npm global prefix', async () => {
    const config = await new ConfigService(store, {}, HOME).resolve();

    expect(config.codex).toEqual({
      command: join(HOME, '.npm-global', 'bin', 'codex'),
      model: 'gpt-5.3-codex',
    });
    expect(config.gemini).toEqual({
      command: join(HOME, '.npm-global', 'bin', 'gemini'),
      model: 'gemini-3-pro-preview',
    });
    expect(config.projectPath).toBeNull();
    expect(config.timeouts).toEqual({ ask: 120, consensus: 180, debate: 300, council: 300 });
  });

  it('should prefer stored preferences over defaults', async () => {
    store.prefs = { codexModel: 'o4-mini', projectPath: '/work/app' };
    const config = await new ConfigService(store, {}, HOME).resolve();

    expect(config.codex.model).toBe('o4-mini');
    expect(config.projectPath).toBe('/work/app');
  });

  it('should prefer environment variables over preferences', async () => {
    store.prefs = { geminiCommand: '/opt/gemini', geminiModel: 'pref-model' };
    const env = { CROSSTALK_GEMINI_CMD: ' /usr/local/bin/gemini ', CROSSTALK_GEMINI_MODEL: '' };
    const config = await new ConfigService(store, env, HOME).resolve();

    expect(config.gemini).toEqual({ command: '/usr/local/bin/gemini', model: 'pref-model' });
  });

  it('should not share the timeout defaults between resolutions', async () => {
    const service = new ConfigService(store, {}, HOME);
    const first = await service.resolve();
    first.timeouts.ask = 1;

    expect((await service.resolve()).timeouts.ask).toBe(120);
  });

  it('should store a trimmed preference', async () => {
    const service = new ConfigService(store, {}, HOME);
    const prefs = await service.setPreference('codexModel', '  gpt-5 ');

    expect(prefs).toEqual({ codexModel: 'gpt-5' });
    expect(store.prefs).toEqual({ codexModel: 'gpt-5' });
  });

  it('should reject unknown keys and empty values', async () => {
    const service = new ConfigService(store, {}, HOME);

    await expect(service.setPreference('apiKey', 'x')).rejects.toThrow(ConfigError);
    await expect(service.setPreference('apiKey', 'x')).rejects.toThrow(
      'Unknown config key: apiKey. Valid keys: codexCommand, codexModel, geminiCommand, geminiModel, projectPath',
    );
    await expect(service.setPreference('codexModel', '  ')).rejects.toThrow('Empty value for config key: codexModel');
    expect(store.prefs).toEqual({});
  });

  it('should clear every preference on reset', async () => {
    store.prefs = { codexModel: 'a', geminiModel: 'b' };
    await new ConfigService(store, {}, HOME).reset();
    expect(store.prefs).toEqual({});
  });
});
