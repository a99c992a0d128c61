import type { BackendName } from '../model/backend.js';
import type { ModelResponse } from '../model/model-response.js';

export type BackendResponses = Record<BackendName, ModelResponse>;

export interface ConsensusResult {
  codexResponse: ModelResponse;
  geminiResponse: ModelResponse;
  synthesis: ModelResponse;
}

export interface DebateRound {
  round: number;
  codexResponse: ModelResponse;
  geminiResponse: ModelResponse;
}

export interface DebateResult {
  topic: string;
  rounds: DebateRound[];
}

/** One answer as the reviewing models see it. */
export interface AnonymizedAnswer {
  label: string;
  /** Backend name, or "claude" for the caller-supplied opinion */
  source: string;
  text: string;
}

export interface AggregateRanking {
  source: string;
  averageRank: number;
  rankingsCount: number;
}

export interface CouncilResult {
  topic: string;
  /** Label shown to reviewers -> originating source; never included in any prompt */
  labelMap: Record<string, string>;
  stage1: BackendResponses;
  stage2: BackendResponses;
  aggregateRankings: AggregateRanking[];
}
