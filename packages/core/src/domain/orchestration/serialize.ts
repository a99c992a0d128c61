import type { ModelResponse } from '../model/model-response.js';
import type {
  AggregateRanking,
  BackendResponses,
  ConsensusResult,
  CouncilResult,
  DebateResult,
} from './results.js';

export interface SerializedResponse {
  model: string;
  response: string;
  elapsed_seconds: number;
  success: boolean;
  error: string | null;
}

export type SerializedBackendResponses = Record<keyof BackendResponses, SerializedResponse>;

export interface SerializedConsensus {
  codex_response: SerializedResponse;
  gemini_response: SerializedResponse;
  synthesis: SerializedResponse;
}

export interface SerializedDebate {
  topic: string;
  rounds: Array<{ round: number; codex: SerializedResponse; gemini: SerializedResponse }>;
}

export interface SerializedCouncil {
  topic: string;
  label_map: Record<string, string>;
  stage1_individual: SerializedBackendResponses;
  stage2_peer_review: SerializedBackendResponses;
  aggregate_rankings: Array<{ source: string; average_rank: number; rankings_count: number }>;
}

export function roundSeconds(seconds: number): number {
  return Math.round(seconds * 100) / 100;
}

export function serializeResponse(response: ModelResponse): SerializedResponse {
  return {
    model: response.model,
    response: response.response,
    elapsed_seconds: roundSeconds(response.elapsedSeconds),
    success: response.success,
    error: response.success ? null : response.error,
  };
}

export function serializeBackendResponses(responses: BackendResponses): SerializedBackendResponses {
  return {
    codex: serializeResponse(responses.codex),
    gemini: serializeResponse(responses.gemini),
  };
}

export function serializeConsensus(result: ConsensusResult): SerializedConsensus {
  return {
    codex_response: serializeResponse(result.codexResponse),
    gemini_response: serializeResponse(result.geminiResponse),
    synthesis: serializeResponse(result.synthesis),
  };
}

export function serializeDebate(result: DebateResult): SerializedDebate {
  return {
    topic: result.topic,
    rounds: result.rounds.map((round) => ({
      round: round.round,
      codex: serializeResponse(round.codexResponse),
      gemini: serializeResponse(round.geminiResponse),
    })),
  };
}

function serializeRanking(ranking: AggregateRanking) {
  return {
    source: ranking.source,
    average_rank: ranking.averageRank,
    rankings_count: ranking.rankingsCount,
  };
}

export function serializeCouncil(result: CouncilResult): SerializedCouncil {
  return {
    topic: result.topic,
    label_map: { ...result.labelMap },
    stage1_individual: serializeBackendResponses(result.stage1),
    stage2_peer_review: serializeBackendResponses(result.stage2),
    aggregate_rankings: result.aggregateRankings.map(serializeRanking),
  };
}
