import {
  CodexAdapter,
  ConfigService,
  GeminiAdapter,
  JsonConfigStore,
  Orchestrator,
  ProjectContext,
  type CrosstalkConfig,
} from '@crosstalk/core';
import { getConfigDir } from './adapters/xdg-paths.js';

export interface CrosstalkOptions {
  /** Directory holding preferences.json; defaults to the XDG config directory */
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface Runtime {
  config: CrosstalkConfig;
  orchestrator: Orchestrator;
}

export type RuntimeFactory = () => Promise<Runtime>;

export function createConfigService(options: CrosstalkOptions = {}): ConfigService {
  const env = options.env ?? process.env;
  const configStore = new JsonConfigStore(options.configDir ?? getConfigDir(env));
  return new ConfigService(configStore, env);
}

/**
 * Resolves configuration and wires both CLI adapters and the project context
 * into an orchestrator. Suitable for use as a programmatic API.
 */
export async function createCrosstalk(options: CrosstalkOptions = {}): Promise<Runtime> {
  const env = options.env ?? process.env;
  const config = await createConfigService(options).resolve();

  const orchestrator = new Orchestrator({
    codex: new CodexAdapter({ ...config.codex, env }),
    gemini: new GeminiAdapter({ ...config.gemini, env }),
    context: new ProjectContext({ defaultProjectPath: config.projectPath }),
    timeouts: config.timeouts,
  });

  return { config, orchestrator };
}
