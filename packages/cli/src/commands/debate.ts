import type { Command } from 'commander';
import { DEFAULT_DEBATE_ROUNDS, MAX_DEBATE_ROUNDS, MIN_DEBATE_ROUNDS } from '@crosstalk/core';
import {
  addCommonOptions,
  parseInteger,
  runOperation,
  toAskOptions,
  type CommandDeps,
  type CommonOptions,
} from './options.js';

interface DebateOptions extends CommonOptions {
  rounds: number;
}

export function registerDebateCommand(program: Command, deps: CommandDeps): void {
  addCommonOptions(
    program
      .command('debate')
      .description('Run a multi-round debate where each model answers the other')
      .argument('[topic...]', 'The debate topic')
      .option(
        '--rounds <n>',
        `Number of rounds (${MIN_DEBATE_ROUNDS}-${MAX_DEBATE_ROUNDS})`,
        parseInteger,
        DEFAULT_DEBATE_ROUNDS,
      ),
  ).action(async (topicParts: string[], opts: DebateOptions) => {
    await runOperation(topicParts, opts, deps, async ({ orchestrator }, prompt) => {
      const result = await orchestrator.debate(prompt, opts.rounds, toAskOptions(opts));
      return { kind: 'debate', prompt, result };
    });
  });
}
