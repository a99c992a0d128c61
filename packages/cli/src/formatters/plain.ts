import type { Outcome } from '../outcome.js';
import type { OutputFormatter } from './formatter.js';
import { bodyText, displayName } from './sections.js';
import type { ModelResponse } from '@crosstalk/core';

function section(title: string, response: ModelResponse): string {
  return `=== ${title} ===\n${bodyText(response)}`;
}

export function toPlainText(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'single':
      return bodyText(outcome.response);
    case 'both':
      return [
        section('Codex', outcome.responses.codex),
        section('Gemini', outcome.responses.gemini),
      ].join('\n\n');
    case 'consensus':
      return bodyText(outcome.result.synthesis);
    case 'debate':
      return outcome.result.rounds
        .flatMap((round) => [
          section(`Round ${round.round} - Codex`, round.codexResponse),
          section(`Round ${round.round} - Gemini`, round.geminiResponse),
        ])
        .join('\n\n');
    case 'council': {
      const { aggregateRankings, stage1 } = outcome.result;
      const ranking = aggregateRankings.length === 0
        ? 'No rankings available.'
        : aggregateRankings
          .map((r, i) => `${i + 1}. ${displayName(r.source)} (avg rank ${r.averageRank.toFixed(2)})`)
          .join('\n');
      return [
        `=== Ranking ===\n${ranking}`,
        section('Codex', stage1.codex),
        section('Gemini', stage1.gemini),
      ].join('\n\n');
    }
  }
}

export class PlainFormatter implements OutputFormatter {
  async renderComplete(outcome: Outcome): Promise<void> {
    console.log(toPlainText(outcome));
  }

  renderError(error: string): void {
    console.error(`Error: ${error}`);
  }
}
