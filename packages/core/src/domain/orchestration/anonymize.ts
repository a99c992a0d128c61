import type { BackendResponses, AnonymizedAnswer } from './results.js';
import { responseTextOr } from '../model/model-response.js';

export const CALLER_SOURCE = 'claude';
export const FAILED_ANSWER_PLACEHOLDER = '[failed to respond]';

function labelFor(index: number): string {
  return `Model ${String.fromCharCode(65 + index)}`;
}

/**
 * Orders council answers for peer review. A caller opinion, when given, always
 * takes the first label so the backends keep a fixed relative order.
 */
export function anonymizeAnswers(
  stage1: BackendResponses,
  callerOpinion?: string,
): [AnonymizedAnswer[], Record<string, string>] {
  const entries: Array<{ source: string; text: string }> = [];
  if (callerOpinion?.trim()) {
    entries.push({ source: CALLER_SOURCE, text: callerOpinion });
  }
  entries.push(
    { source: 'codex', text: responseTextOr(stage1.codex, FAILED_ANSWER_PLACEHOLDER) },
    { source: 'gemini', text: responseTextOr(stage1.gemini, FAILED_ANSWER_PLACEHOLDER) },
  );

  const answers = entries.map((entry, i) => ({ label: labelFor(i), ...entry }));
  const labelMap: Record<string, string> = {};
  for (const answer of answers) {
    labelMap[answer.label] = answer.source;
  }
  return [answers, labelMap];
}
