import { homedir } from 'node:os';
import {
  DEFAULT_CODEX_MODEL,
  DEFAULT_GEMINI_MODEL,
  DEFAULT_TIMEOUTS,
  ENV_VARS,
  defaultCliPath,
  type CrosstalkConfig,
} from '../domain/config/crosstalk-config.js';
import { PREF_KEYS, type ConfigStore, type CrosstalkPrefs, type PrefKey } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

function isPrefKey(key: string): key is PrefKey {
  return PREF_KEYS.some((prefKey) => prefKey === key);
}

export class ConfigService {
  constructor(
    private configStore: ConfigStore,
    private env: NodeJS.ProcessEnv = process.env,
    private home: string = homedir(),
  ) {}

  async resolve(): Promise<CrosstalkConfig> {
    const prefs = await this.configStore.getPrefs();
    const fromEnv = (name: string): string => this.env[name]?.trim() ?? '';

    const config: CrosstalkConfig = {
      codex: {
        command: fromEnv(ENV_VARS.codexCommand) || prefs.codexCommand || defaultCliPath('codex', this.home),
        model: fromEnv(ENV_VARS.codexModel) || prefs.codexModel || DEFAULT_CODEX_MODEL,
      },
      gemini: {
        command: fromEnv(ENV_VARS.geminiCommand) || prefs.geminiCommand || defaultCliPath('gemini', this.home),
        model: fromEnv(ENV_VARS.geminiModel) || prefs.geminiModel || DEFAULT_GEMINI_MODEL,
      },
      projectPath: fromEnv(ENV_VARS.projectPath) || prefs.projectPath || null,
      timeouts: { ...DEFAULT_TIMEOUTS },
    };

    log.debug('resolve: codex', config.codex, 'gemini', config.gemini);
    return config;
  }

  async setPreference(key: string, value: string): Promise<CrosstalkPrefs> {
    if (!isPrefKey(key)) {
      throw new ConfigError(`Unknown config key: ${key}. Valid keys: ${PREF_KEYS.join(', ')}`);
    }
    if (!value.trim()) {
      throw new ConfigError(`Empty value for config key: ${key}`);
    }
    const prefs = await this.configStore.getPrefs();
    const next: CrosstalkPrefs = { ...prefs, [key]: value.trim() };
    await this.configStore.savePrefs(next);
    return next;
  }

  async reset(): Promise<void> {
    await this.configStore.savePrefs({});
  }
}
