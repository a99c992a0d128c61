import type { Command } from 'commander';
import {
  addCommonOptions,
  readInputFile,
  runOperation,
  toAskOptions,
  type CommandDeps,
  type CommonOptions,
} from './options.js';

interface CouncilCommandOptions extends CommonOptions {
  opinion?: string;
  opinionFile?: string;
}

export function registerCouncilCommand(program: Command, deps: CommandDeps): void {
  addCommonOptions(
    program
      .command('council')
      .description('Answer independently, then peer-review the anonymized answers')
      .argument('[topic...]', 'The question or topic')
      .option('--opinion <text>', 'Your own answer, reviewed anonymously with the others')
      .option('--opinion-file <path>', 'Read your own answer from a file (- for stdin)'),
  ).action(async (topicParts: string[], opts: CouncilCommandOptions) => {
    await runOperation(topicParts, opts, deps, async ({ orchestrator }, prompt) => {
      const claudeOpinion = opts.opinionFile
        ? (deps.readInput ?? readInputFile)(opts.opinionFile)
        : opts.opinion;
      const result = await orchestrator.council(prompt, { ...toAskOptions(opts), claudeOpinion });
      return { kind: 'council', prompt, result };
    });
  });
}
