import { CliModelAdapter } from './cli-model-adapter.js';
import { parseGeminiOutput } from './parsers/gemini-parser.js';

/** Runs `gemini -p` in headless mode with JSON output. */
export class GeminiAdapter extends CliModelAdapter {
  readonly name = 'gemini';

  buildCommand(prompt: string): string[] {
    return [
      this.cliCommand,
      '--model', this.model,
      '-p', prompt,
      '--output-format', 'json',
    ];
  }

  override buildEnvironment(): NodeJS.ProcessEnv {
    return this.promoteApiKey(super.buildEnvironment(), {
      dedicated: 'CROSSTALK_GEMINI_API_KEY',
      fallback: 'GOOGLE_API_KEY',
      target: 'GEMINI_API_KEY',
    });
  }

  parseOutput(stdout: string): string {
    return parseGeminiOutput(stdout);
  }
}
