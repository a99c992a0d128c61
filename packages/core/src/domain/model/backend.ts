export type BackendName = 'codex' | 'gemini';

export const BACKENDS: readonly BackendName[] = ['codex', 'gemini'];

/** Human-facing names used inside prompts that quote a backend. */
export const BACKEND_DISPLAY_NAMES: Record<BackendName, string> = {
  codex: 'Codex',
  gemini: 'Gemini',
};

export function isBackendName(value: string): value is BackendName {
  return BACKENDS.some((backend) => backend === value);
}
