import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { JsonConfigStore } from './json-config-store.js';
import { setLogLevel } from '../shared/logger.js';

describe('JsonConfigStore', () => {
  let root: string;
  let store: JsonConfigStore;

  beforeEach(async () => {
    setLogLevel('error');
    root = await mkdtemp(join(tmpdir(), 'crosstalk-store-'));
    store = new JsonConfigStore(join(root, 'nested', 'config'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should return empty preferences when no file exists', async () => {
    expect(await store.getPrefs()).toEqual({});
  });

  it('should create the directory and round-trip preferences', async () => {
    await store.savePrefs({ codexModel: 'gpt-5', projectPath: '/work/app' });

    expect(await store.getPrefs()).toEqual({ codexModel: 'gpt-5', projectPath: '/work/app' });
    expect(JSON.parse(await readFile(store.prefsPath, 'utf-8'))).toEqual({
      codexModel: 'gpt-5',
      projectPath: '/work/app',
    });
  });

  it('should drop unknown keys and non-string values when reading', async () => {
    await store.savePrefs({});
    await writeFile(
      store.prefsPath,
      JSON.stringify({ geminiModel: ' flash ', codexModel: 42, theme: 'dark', projectPath: '' }),
      'utf-8',
    );

    expect(await store.getPrefs()).toEqual({ geminiModel: 'flash' });
  });

  it('should treat malformed JSON as empty preferences', async () => {
    await store.savePrefs({});
    await writeFile(store.prefsPath, '{not json', 'utf-8');

    expect(await store.getPrefs()).toEqual({});
  });
});
