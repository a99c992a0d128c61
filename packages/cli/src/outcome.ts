import type {
  BackendName,
  BackendResponses,
  ConsensusResult,
  CouncilResult,
  DebateResult,
  ModelResponse,
} from '@crosstalk/core';

/** What a command produced, tagged by the operation that produced it. */
export type Outcome =
  | { kind: 'single'; prompt: string; backend: BackendName; response: ModelResponse }
  | { kind: 'both'; prompt: string; responses: BackendResponses }
  | { kind: 'consensus'; prompt: string; result: ConsensusResult }
  | { kind: 'debate'; prompt: string; result: DebateResult }
  | { kind: 'council'; prompt: string; result: CouncilResult };

export type OutcomeKind = Outcome['kind'];
