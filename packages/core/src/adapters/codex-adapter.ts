import { CliModelAdapter } from './cli-model-adapter.js';
import { parseCodexOutput } from './parsers/codex-parser.js';

/** Runs `codex exec` non-interactively and reads its JSON-lines event log. */
export class CodexAdapter extends CliModelAdapter {
  readonly name = 'codex';

  buildCommand(prompt: string): string[] {
    return [
      this.cliCommand, 'exec',
      '--model', this.model,
      '--json', '--full-auto', '--skip-git-repo-check',
      prompt,
    ];
  }

  override buildEnvironment(): NodeJS.ProcessEnv {
    return this.promoteApiKey(super.buildEnvironment(), {
      dedicated: 'CROSSTALK_CODEX_API_KEY',
      fallback: 'OPENAI_API_KEY',
      target: 'CODEX_API_KEY',
    });
  }

  parseOutput(stdout: string): string {
    return parseCodexOutput(stdout);
  }
}
