export interface CrosstalkPrefs {
  codexCommand?: string;
  codexModel?: string;
  geminiCommand?: string;
  geminiModel?: string;
  projectPath?: string;
}

export type PrefKey = keyof CrosstalkPrefs;

export const PREF_KEYS: readonly PrefKey[] = [
  'codexCommand',
  'codexModel',
  'geminiCommand',
  'geminiModel',
  'projectPath',
];

export interface ConfigStore {
  getPrefs(): Promise<CrosstalkPrefs>;
  savePrefs(prefs: CrosstalkPrefs): Promise<void>;
}
