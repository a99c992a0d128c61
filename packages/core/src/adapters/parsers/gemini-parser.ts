import { isRecord } from './values.js';

const ANSWER_KEYS = ['response', 'text', 'content', 'result'] as const;

function answerField(obj: Record<string, unknown>): { found: true; value: unknown } | { found: false } {
  for (const key of ANSWER_KEYS) {
    if (key in obj) return { found: true, value: obj[key] };
  }
  return { found: false };
}

function fieldToText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : JSON.stringify(value);
}

function elementToText(element: unknown): string {
  if (!isRecord(element)) {
    return typeof element === 'string' ? element : JSON.stringify(element);
  }
  const field = answerField(element);
  return field.found ? fieldToText(field.value) : JSON.stringify(element);
}

/**
 * Extracts the answer from `gemini --output-format json`. Falls back to the
 * raw trimmed stdout whenever the document is not JSON or has an unknown shape.
 */
export function parseGeminiOutput(stdout: string): string {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    return stdout.trim();
  }

  if (isRecord(data)) {
    const field = answerField(data);
    if (field.found) return fieldToText(field.value);
  } else if (Array.isArray(data) && data.length > 0) {
    return data.map(elementToText).join('\n');
  }

  return stdout.trim();
}
