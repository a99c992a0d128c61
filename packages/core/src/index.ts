// Domain types
export type { BackendName } from './domain/model/backend.js';
export { BACKENDS, BACKEND_DISPLAY_NAMES, isBackendName } from './domain/model/backend.js';
export type { ModelResponse, ModelSuccess, ModelFailure } from './domain/model/model-response.js';
export { succeeded, failed, responseTextOr } from './domain/model/model-response.js';

export type { BackendSettings, TimeoutDefaults, CrosstalkConfig } from './domain/config/crosstalk-config.js';
export {
  DEFAULT_TIMEOUTS,
  DEFAULT_CODEX_MODEL,
  DEFAULT_GEMINI_MODEL,
  ENV_VARS,
  defaultCliPath,
} from './domain/config/crosstalk-config.js';

export type {
  BackendResponses,
  ConsensusResult,
  DebateRound,
  DebateResult,
  AnonymizedAnswer,
  AggregateRanking,
  CouncilResult,
} from './domain/orchestration/results.js';
export { anonymizeAnswers, CALLER_SOURCE, FAILED_ANSWER_PLACEHOLDER } from './domain/orchestration/anonymize.js';
export {
  buildSynthesisPrompt,
  buildDebatePrompt,
  buildPeerReviewPrompt,
  NO_RESPONSE_PLACEHOLDER,
} from './domain/orchestration/prompts.js';
export { parseRankingFromText, calculateAggregateRankings } from './domain/orchestration/ranking.js';
export type {
  SerializedResponse,
  SerializedBackendResponses,
  SerializedConsensus,
  SerializedDebate,
  SerializedCouncil,
} from './domain/orchestration/serialize.js';
export {
  roundSeconds,
  serializeResponse,
  serializeBackendResponses,
  serializeConsensus,
  serializeDebate,
  serializeCouncil,
} from './domain/orchestration/serialize.js';

// Port interfaces
export type { ModelAdapter } from './ports/model-adapter.js';
export type { PromptContext, ContextOptions } from './ports/prompt-context.js';
export type { ConfigStore, CrosstalkPrefs, PrefKey } from './ports/config-store.js';
export { PREF_KEYS } from './ports/config-store.js';

// Adapters
export { CliModelAdapter, KILL_GRACE_MS, MAX_TIMER_DELAY_MS } from './adapters/cli-model-adapter.js';
export type { CliAdapterOptions, ApiKeyPromotion } from './adapters/cli-model-adapter.js';
export { CodexAdapter } from './adapters/codex-adapter.js';
export { GeminiAdapter } from './adapters/gemini-adapter.js';
export { parseCodexOutput } from './adapters/parsers/codex-parser.js';
export { parseGeminiOutput } from './adapters/parsers/gemini-parser.js';
export { ProjectContext, loadContextFile, projectSlug } from './adapters/project-context.js';
export type { ProjectContextOptions } from './adapters/project-context.js';
export { JsonConfigStore } from './adapters/json-config-store.js';

// Application services
export {
  Orchestrator,
  clampRounds,
  MIN_DEBATE_ROUNDS,
  MAX_DEBATE_ROUNDS,
  DEFAULT_DEBATE_ROUNDS,
} from './services/orchestrator.js';
export type { AskOptions, CouncilOptions, OrchestratorDeps } from './services/orchestrator.js';
export { ConfigService } from './services/config-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export { CrosstalkError, ConfigError, UnknownBackendError } from './shared/errors.js';
