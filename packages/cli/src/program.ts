import { Command } from 'commander';
import { getConfigDir } from './adapters/xdg-paths.js';
import { registerAskCommand } from './commands/ask.js';
import { registerBothCommand } from './commands/both.js';
import { registerConfigCommand } from './commands/config.js';
import { registerConsensusCommand } from './commands/consensus.js';
import { registerCouncilCommand } from './commands/council.js';
import { registerDebateCommand } from './commands/debate.js';
import type { CommandDeps } from './commands/options.js';
import { registerServeCommand } from './commands/serve.js';
import { createConfigService, createCrosstalk, type CrosstalkOptions } from './runtime.js';

export interface ProgramOptions extends Partial<CommandDeps> {
  version: string;
  crosstalk?: CrosstalkOptions;
}

export function buildProgram(options: ProgramOptions): Command {
  const crosstalkOptions = options.crosstalk ?? {};
  const deps: CommandDeps = {
    createRuntime: options.createRuntime ?? (() => createCrosstalk(crosstalkOptions)),
    readInput: options.readInput,
    isTTY: options.isTTY,
  };

  const program = new Command();

  program
    .name('crosstalk')
    .description('Ask Codex and Gemini side by side: single answers, consensus, debate and peer-reviewed council')
    .version(options.version);

  registerAskCommand(program, deps);
  registerBothCommand(program, deps);
  registerConsensusCommand(program, deps);
  registerDebateCommand(program, deps);
  registerCouncilCommand(program, deps);
  registerConfigCommand(program, {
    createConfigService: () => createConfigService(crosstalkOptions),
    configDir: () => crosstalkOptions.configDir ?? getConfigDir(crosstalkOptions.env),
  });
  registerServeCommand(program, deps.createRuntime, options.version);
  return program;
}
