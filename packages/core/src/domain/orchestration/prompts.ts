import type { AnonymizedAnswer } from './results.js';

export const NO_RESPONSE_PLACEHOLDER = '[no response]';

export function buildSynthesisPrompt(topic: string, codexAnswer: string, geminiAnswer: string): string {
  return `Two AI models were asked: "${topic}"

Codex's answer:
${codexAnswer}

Gemini's answer:
${geminiAnswer}

Synthesize these perspectives. Identify:
1. Points of agreement
2. Key differences
3. A balanced recommendation
Be concise and structured.`;
}

export function buildDebatePrompt(
  topic: string,
  opponentName: string,
  opponentAnswer: string,
  round: number,
): string {
  return `Topic: ${topic}

${opponentName}'s previous response:
${opponentAnswer}

This is round ${round} of a debate. Refine your position, address their points, and strengthen your argument.`;
}

export function buildPeerReviewPrompt(topic: string, answers: AnonymizedAnswer[]): string {
  const answersText = answers
    .map((answer) => `=== ${answer.label} ===\n${answer.text}`)
    .join('\n\n');
  const exampleRanking = answers
    .map((answer, i) => `${i + 1}. ${answer.label}`)
    .join('\n');

  return `You are reviewing answers that different AI models gave to the same question. The answers are anonymized; you do not know which model wrote which.

Question: ${topic}

${answersText}

For each answer:
- Note its main strengths and weaknesses
- Flag any factual, logical or technical errors

Then rank the answers from best to worst by label and recommend the one you would follow, explaining why.

Finish with your ranking in exactly this format, one label per line and nothing else:
FINAL RANKING:
${exampleRanking}`;
}
