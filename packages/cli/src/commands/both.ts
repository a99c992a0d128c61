import type { Command } from 'commander';
import { addCommonOptions, runOperation, toAskOptions, type CommandDeps, type CommonOptions } from './options.js';

export function registerBothCommand(program: Command, deps: CommandDeps): void {
  addCommonOptions(
    program
      .command('both')
      .description('Ask Codex and Gemini the same prompt in parallel')
      .argument('[prompt...]', 'The prompt to send'),
  ).action(async (promptParts: string[], opts: CommonOptions) => {
    await runOperation(promptParts, opts, deps, async ({ orchestrator }, prompt) => {
      const responses = await orchestrator.askBoth(prompt, toAskOptions(opts));
      return { kind: 'both', prompt, responses };
    });
  });
}
