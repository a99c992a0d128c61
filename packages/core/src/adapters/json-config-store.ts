import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PREF_KEYS, type ConfigStore, type CrosstalkPrefs } from '../ports/config-store.js';
import { createLogger } from '../shared/logger.js';
import { asRecord } from './parsers/values.js';

const log = createLogger('config-store');

/** Keeps only known keys holding non-empty strings. */
function sanitizePrefs(raw: unknown): CrosstalkPrefs {
  const record = asRecord(raw);
  const prefs: CrosstalkPrefs = {};
  for (const key of PREF_KEYS) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) {
      prefs[key] = value.trim();
    }
  }
  return prefs;
}

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get prefsPath(): string {
    return join(this.configDir, 'preferences.json');
  }

  async getPrefs(): Promise<CrosstalkPrefs> {
    try {
      const data = await readFile(this.prefsPath, 'utf-8');
      return sanitizePrefs(JSON.parse(data));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return {};
      }
      log.warn(`Ignoring unreadable preferences at ${this.prefsPath}:`, err);
      return {};
    }
  }

  async savePrefs(prefs: CrosstalkPrefs): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.prefsPath, JSON.stringify(sanitizePrefs(prefs), null, 2), 'utf-8');
  }
}
