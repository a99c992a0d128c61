import { BACKEND_DISPLAY_NAMES, roundSeconds, type ModelResponse } from '@crosstalk/core';

export function displayName(model: string): string {
  return model === 'codex' || model === 'gemini' ? BACKEND_DISPLAY_NAMES[model] : model;
}

export function elapsedLabel(response: ModelResponse): string {
  return `${roundSeconds(response.elapsedSeconds)}s`;
}

/** Response body as a reader sees it: the answer, or the failure cause. */
export function bodyText(response: ModelResponse): string {
  return response.success ? response.response : `[error: ${response.error}]`;
}
