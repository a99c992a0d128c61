import { homedir } from 'node:os';
import { join } from 'node:path';

export interface BackendSettings {
  /** Path to the CLI executable */
  command: string;
  model: string;
}

export interface TimeoutDefaults {
  ask: number;
  consensus: number;
  debate: number;
  council: number;
}

export interface CrosstalkConfig {
  codex: BackendSettings;
  gemini: BackendSettings;
  /** Default project root for context enrichment; null means the working directory */
  projectPath: string | null;
  timeouts: TimeoutDefaults;
}

/** Seconds allowed per adapter call, by operation. */
export const DEFAULT_TIMEOUTS: TimeoutDefaults = {
  ask: 120,
  consensus: 180,
  debate: 300,
  council: 300,
};

export const DEFAULT_CODEX_MODEL = 'gpt-5.3-codex';
export const DEFAULT_GEMINI_MODEL = 'gemini-3-pro-preview';

export const ENV_VARS = {
  codexCommand: 'CROSSTALK_CODEX_CMD',
  geminiCommand: 'CROSSTALK_GEMINI_CMD',
  codexModel: 'CROSSTALK_CODEX_MODEL',
  geminiModel: 'CROSSTALK_GEMINI_MODEL',
  projectPath: 'CROSSTALK_PROJECT_PATH',
} as const;

// MCP hosts launch servers without the user's shell PATH, so default to the
// npm global prefix rather than a bare command name.
export function defaultCliPath(binary: string, home: string = homedir()): string {
  return join(home, '.npm-global', 'bin', binary);
}
