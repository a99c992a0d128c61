import type { ModelResponse } from '@crosstalk/core';
import type { Outcome } from '../outcome.js';
import type { OutputFormatter } from './formatter.js';
import { displayName, elapsedLabel } from './sections.js';

const TITLES: Record<Outcome['kind'], string> = {
  single: 'Answer',
  both: 'Both Models',
  consensus: 'Consensus',
  debate: 'Debate',
  council: 'Council',
};

function responseSection(heading: string, response: ModelResponse): string {
  const meta = `_${displayName(response.model)}, ${elapsedLabel(response)}_`;
  const body = response.success ? response.response : `> **Error:** ${response.error}`;
  return `${heading}\n\n${meta}\n\n${body}`;
}

function outcomeBody(outcome: Outcome): string[] {
  switch (outcome.kind) {
    case 'single':
      return [responseSection(`## ${displayName(outcome.backend)}`, outcome.response)];
    case 'both':
      return [
        responseSection('## Codex', outcome.responses.codex),
        responseSection('## Gemini', outcome.responses.gemini),
      ];
    case 'consensus':
      return [
        responseSection('## Synthesis', outcome.result.synthesis),
        responseSection('## Codex', outcome.result.codexResponse),
        responseSection('## Gemini', outcome.result.geminiResponse),
      ];
    case 'debate':
      return outcome.result.rounds.flatMap((round) => [
        responseSection(`## Round ${round.round}: Codex`, round.codexResponse),
        responseSection(`## Round ${round.round}: Gemini`, round.geminiResponse),
      ]);
    case 'council': {
      const { aggregateRankings, labelMap, stage1, stage2 } = outcome.result;
      const rankingLines = aggregateRankings.length > 0
        ? aggregateRankings.map(
          (r) => `- **${displayName(r.source)}**: ${r.averageRank.toFixed(2)} avg rank (${r.rankingsCount} reviews)`,
        )
        : ['No rankings available.'];
      const labelLines = Object.entries(labelMap).map(([label, source]) => `- ${label}: ${displayName(source)}`);
      return [
        `## Rankings\n\n${rankingLines.join('\n')}`,
        `## Labels\n\n${labelLines.join('\n')}`,
        responseSection('## Stage 1: Codex', stage1.codex),
        responseSection('## Stage 1: Gemini', stage1.gemini),
        responseSection('## Stage 2: Codex Review', stage2.codex),
        responseSection('## Stage 2: Gemini Review', stage2.gemini),
      ];
    }
  }
}

export function toMarkdown(outcome: Outcome): string {
  return [
    `# Crosstalk ${TITLES[outcome.kind]}`,
    `**Prompt:** ${outcome.prompt}`,
    ...outcomeBody(outcome),
  ].join('\n\n');
}

export class MarkdownFormatter implements OutputFormatter {
  async renderComplete(outcome: Outcome): Promise<void> {
    console.log(toMarkdown(outcome));
  }

  renderError(error: string): void {
    console.error(`## Error\n\n${error}`);
  }
}
