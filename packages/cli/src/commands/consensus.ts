import type { Command } from 'commander';
import { addCommonOptions, runOperation, toAskOptions, type CommandDeps, type CommonOptions } from './options.js';

export function registerConsensusCommand(program: Command, deps: CommandDeps): void {
  addCommonOptions(
    program
      .command('consensus')
      .description('Ask both models, then have Gemini synthesize their answers')
      .argument('[topic...]', 'The question or topic'),
  ).action(async (topicParts: string[], opts: CommonOptions) => {
    await runOperation(topicParts, opts, deps, async ({ orchestrator }, prompt) => {
      const result = await orchestrator.consensus(prompt, toAskOptions(opts));
      return { kind: 'consensus', prompt, result };
    });
  });
}
