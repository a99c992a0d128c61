import { DEFAULT_TIMEOUTS, type TimeoutDefaults } from '../domain/config/crosstalk-config.js';
import { BACKEND_DISPLAY_NAMES, isBackendName, type BackendName } from '../domain/model/backend.js';
import { responseTextOr, type ModelResponse } from '../domain/model/model-response.js';
import { anonymizeAnswers } from '../domain/orchestration/anonymize.js';
import {
  NO_RESPONSE_PLACEHOLDER,
  buildDebatePrompt,
  buildPeerReviewPrompt,
  buildSynthesisPrompt,
} from '../domain/orchestration/prompts.js';
import { calculateAggregateRankings, parseRankingFromText } from '../domain/orchestration/ranking.js';
import type {
  BackendResponses,
  ConsensusResult,
  CouncilResult,
  DebateResult,
  DebateRound,
} from '../domain/orchestration/results.js';
import type { ModelAdapter } from '../ports/model-adapter.js';
import type { ContextOptions, PromptContext } from '../ports/prompt-context.js';
import { UnknownBackendError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('orchestrator');

export const MIN_DEBATE_ROUNDS = 1;
export const MAX_DEBATE_ROUNDS = 5;
export const DEFAULT_DEBATE_ROUNDS = 2;

export interface AskOptions extends ContextOptions {
  timeoutSeconds?: number;
}

export interface CouncilOptions extends AskOptions {
  /** The caller's own answer, reviewed anonymously alongside the backends' */
  claudeOpinion?: string;
}

export interface OrchestratorDeps {
  codex: ModelAdapter;
  gemini: ModelAdapter;
  context: PromptContext;
  timeouts?: Partial<TimeoutDefaults>;
}

export function clampRounds(rounds: number): number {
  if (!Number.isFinite(rounds)) return MIN_DEBATE_ROUNDS;
  return Math.max(MIN_DEBATE_ROUNDS, Math.min(Math.trunc(rounds), MAX_DEBATE_ROUNDS));
}

export class Orchestrator {
  private readonly adapters: Record<BackendName, ModelAdapter>;
  private readonly context: PromptContext;
  private readonly timeouts: TimeoutDefaults;

  constructor(deps: OrchestratorDeps) {
    this.adapters = { codex: deps.codex, gemini: deps.gemini };
    this.context = deps.context;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
  }

  async askSingle(backend: string, prompt: string, options: AskOptions = {}): Promise<ModelResponse> {
    if (!isBackendName(backend)) {
      throw new UnknownBackendError(backend);
    }
    const fullPrompt = await this.context.buildPrompt(prompt, options);
    log.info(`askSingle: dispatching to ${backend}`);
    return this.adapters[backend].ask(fullPrompt, options.timeoutSeconds ?? this.timeouts.ask);
  }

  async askBoth(prompt: string, options: AskOptions = {}): Promise<BackendResponses> {
    const fullPrompt = await this.context.buildPrompt(prompt, options);
    log.info('askBoth: dispatching to codex and gemini');
    return this.askPair(fullPrompt, fullPrompt, options.timeoutSeconds ?? this.timeouts.ask);
  }

  async consensus(topic: string, options: AskOptions = {}): Promise<ConsensusResult> {
    const timeout = options.timeoutSeconds ?? this.timeouts.consensus;
    const responses = await this.askBoth(topic, { ...options, timeoutSeconds: timeout });

    const synthesisPrompt = buildSynthesisPrompt(
      topic,
      this.answerOrError('codex', responses.codex),
      this.answerOrError('gemini', responses.gemini),
    );

    log.info('consensus: requesting synthesis from gemini');
    const synthesis = await this.adapters.gemini.ask(synthesisPrompt, timeout);

    return {
      codexResponse: responses.codex,
      geminiResponse: responses.gemini,
      synthesis,
    };
  }

  async debate(topic: string, rounds: number = DEFAULT_DEBATE_ROUNDS, options: AskOptions = {}): Promise<DebateResult> {
    const totalRounds = clampRounds(rounds);
    const timeout = options.timeoutSeconds ?? this.timeouts.debate;
    const fullTopic = await this.context.buildPrompt(topic, options);

    log.info(`debate: starting ${totalRounds} round(s)`);
    let previous = await this.askPair(fullTopic, fullTopic, timeout);
    const history: DebateRound[] = [
      { round: 1, codexResponse: previous.codex, geminiResponse: previous.gemini },
    ];

    for (let round = 2; round <= totalRounds; round++) {
      const codexPrompt = buildDebatePrompt(
        topic,
        BACKEND_DISPLAY_NAMES.gemini,
        responseTextOr(previous.gemini, NO_RESPONSE_PLACEHOLDER),
        round,
      );
      const geminiPrompt = buildDebatePrompt(
        topic,
        BACKEND_DISPLAY_NAMES.codex,
        responseTextOr(previous.codex, NO_RESPONSE_PLACEHOLDER),
        round,
      );

      log.debug(`debate: round ${round}`);
      previous = await this.askPair(codexPrompt, geminiPrompt, timeout);
      history.push({ round, codexResponse: previous.codex, geminiResponse: previous.gemini });
    }

    return { topic, rounds: history };
  }

  async council(topic: string, options: CouncilOptions = {}): Promise<CouncilResult> {
    const timeout = options.timeoutSeconds ?? this.timeouts.council;
    const fullTopic = await this.context.buildPrompt(topic, options);

    log.info('council: STAGE 1 - individual answers');
    const stage1 = await this.askPair(fullTopic, fullTopic, timeout);

    const [answers, labelMap] = anonymizeAnswers(stage1, options.claudeOpinion);
    log.debug('council: label mapping:', labelMap);

    log.info('council: STAGE 2 - peer review');
    const reviewPrompt = buildPeerReviewPrompt(topic, answers);
    const stage2 = await this.askPair(reviewPrompt, reviewPrompt, timeout);

    const rankings = [stage2.codex, stage2.gemini]
      .filter((review) => review.success)
      .map((review) => parseRankingFromText(review.response));
    const aggregateRankings = calculateAggregateRankings(rankings, labelMap);
    log.debug('council: aggregate rankings:', aggregateRankings);

    return { topic, labelMap, stage1, stage2, aggregateRankings };
  }

  // Both calls are started before either is awaited so their subprocesses overlap.
  private async askPair(codexPrompt: string, geminiPrompt: string, timeout: number): Promise<BackendResponses> {
    const codexCall = this.adapters.codex.ask(codexPrompt, timeout);
    const geminiCall = this.adapters.gemini.ask(geminiPrompt, timeout);
    const [codex, gemini] = await Promise.all([codexCall, geminiCall]);

    const successCount = [codex, gemini].filter((r) => r.success).length;
    log.info(`askPair: completed - ${successCount}/2 succeeded`);
    return { codex, gemini };
  }

  private answerOrError(backend: BackendName, response: ModelResponse): string {
    return response.success
      ? response.response
      : `[${BACKEND_DISPLAY_NAMES[backend]} error: ${response.error}]`;
  }
}
