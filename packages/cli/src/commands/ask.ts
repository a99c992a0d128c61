import type { Command } from 'commander';
import { UnknownBackendError, isBackendName } from '@crosstalk/core';
import { addCommonOptions, runOperation, toAskOptions, type CommandDeps, type CommonOptions } from './options.js';

export function registerAskCommand(program: Command, deps: CommandDeps): void {
  addCommonOptions(
    program
      .command('ask')
      .description('Ask a single backend (codex or gemini)')
      .argument('<backend>', 'Backend to ask: codex or gemini')
      .argument('[prompt...]', 'The prompt to send'),
  ).action(async (backend: string, promptParts: string[], opts: CommonOptions) => {
    await runOperation(promptParts, opts, deps, async ({ orchestrator }, prompt) => {
      if (!isBackendName(backend)) {
        throw new UnknownBackendError(backend);
      }
      const response = await orchestrator.askSingle(backend, prompt, toAskOptions(opts));
      return { kind: 'single', prompt, backend, response };
    });
  });
}
