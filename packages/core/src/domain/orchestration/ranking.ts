import type { AggregateRanking } from './results.js';

const LABEL_PATTERN = /[Mm]odel\s+[A-Za-z]\b/g;

function normalizeLabel(match: string): string {
  const letter = match.match(/[A-Za-z]$/)?.[0]?.toUpperCase();
  return letter ? `Model ${letter}` : match;
}

function uniqueInOrder(labels: string[]): string[] {
  return [...new Set(labels)];
}

/**
 * Reads a reviewer's ranking, best first. Prefers the numbered list after
 * "FINAL RANKING:", then any label mentioned in that section, then every label
 * mentioned anywhere in the text.
 */
export function parseRankingFromText(rankingText: string): string[] {
  const finalRankingIdx = rankingText.search(/FINAL RANKING:/i);
  if (finalRankingIdx !== -1) {
    const rankingSection = rankingText.slice(finalRankingIdx);
    const numberedMatches = rankingSection.match(/\d+\.\s*[Mm]odel\s+[A-Za-z]\b/g);
    if (numberedMatches) {
      return uniqueInOrder(
        numberedMatches
          .map((m) => m.match(/[Mm]odel\s+[A-Za-z]$/)?.[0] ?? '')
          .filter(Boolean)
          .map(normalizeLabel),
      );
    }
    const fallback = rankingSection.match(LABEL_PATTERN);
    return fallback ? uniqueInOrder(fallback.map(normalizeLabel)) : [];
  }
  const allMatches = rankingText.match(LABEL_PATTERN);
  return allMatches ? uniqueInOrder(allMatches.map(normalizeLabel)) : [];
}

export function calculateAggregateRankings(
  rankings: string[][],
  labelMap: Record<string, string>,
): AggregateRanking[] {
  const sourcePositions: Record<string, number[]> = {};

  for (const parsed of rankings) {
    for (let i = 0; i < parsed.length; i++) {
      const source = labelMap[parsed[i]];
      if (!source) continue;
      (sourcePositions[source] ??= []).push(i + 1);
    }
  }

  const aggregate: AggregateRanking[] = [];
  for (const [source, positions] of Object.entries(sourcePositions)) {
    const averageRank = Math.round((positions.reduce((a, b) => a + b, 0) / positions.length) * 100) / 100;
    aggregate.push({ source, averageRank, rankingsCount: positions.length });
  }

  aggregate.sort((a, b) => a.averageRank - b.averageRank);
  return aggregate;
}
