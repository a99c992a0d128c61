import { describe, it, expect } from 'vitest';
import { failed, succeeded } from '../model/model-response.js';
import { roundSeconds, serializeConsensus, serializeCouncil, serializeDebate, serializeResponse } from './serialize.js';

describe('serializeResponse', () => {
  it('should use snake_case keys, rounded seconds and a null error on success', () => {
    expect(serializeResponse(succeeded('codex', 'hi', 1.23456))).toEqual({
      model: 'codex',
      response: 'hi',
      elapsed_seconds: 1.23,
      success: true,
      error: null,
    });
  });

  it('should carry the error of a failed response', () => {
    expect(serializeResponse(failed('gemini', 'Timeout after 5s', 5.004))).toEqual({
      model: 'gemini',
      response: '',
      elapsed_seconds: 5,
      success: false,
      error: 'Timeout after 5s',
    });
  });
});

describe('roundSeconds', () => {
  it('should round to two decimals', () => {
    expect(roundSeconds(0.125)).toBe(0.13);
    expect(roundSeconds(12)).toBe(12);
  });
});

describe('composite results', () => {
  const codex = succeeded('codex', 'A', 1);
  const gemini = failed('gemini', 'boom', 2);

  it('should serialize a consensus result', () => {
    const result = serializeConsensus({
      codexResponse: codex,
      geminiResponse: gemini,
      synthesis: succeeded('gemini', 'S', 3),
    });
    expect(Object.keys(result)).toEqual(['codex_response', 'gemini_response', 'synthesis']);
    expect(result.synthesis.response).toBe('S');
    expect(result.gemini_response.error).toBe('boom');
  });

  it('should serialize debate rounds in order', () => {
    const result = serializeDebate({
      topic: 'Tabs or spaces?',
      rounds: [
        { round: 1, codexResponse: codex, geminiResponse: gemini },
        { round: 2, codexResponse: codex, geminiResponse: codex },
      ],
    });
    expect(result.topic).toBe('Tabs or spaces?');
    expect(result.rounds.map((r) => r.round)).toEqual([1, 2]);
    expect(result.rounds[1].gemini.response).toBe('A');
  });

  it('should serialize a council result', () => {
    const result = serializeCouncil({
      topic: 'Q',
      labelMap: { 'Model A': 'codex', 'Model B': 'gemini' },
      stage1: { codex, gemini },
      stage2: { codex, gemini },
      aggregateRankings: [{ source: 'codex', averageRank: 1, rankingsCount: 1 }],
    });
    expect(result.label_map).toEqual({ 'Model A': 'codex', 'Model B': 'gemini' });
    expect(result.stage1_individual.codex.response).toBe('A');
    expect(result.stage2_peer_review.gemini.success).toBe(false);
    expect(result.aggregate_rankings).toEqual([{ source: 'codex', average_rank: 1, rankings_count: 1 }]);
  });
});
