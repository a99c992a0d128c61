import type { ModelResponse } from '../domain/model/model-response.js';

export interface ModelAdapter {
  readonly name: string;
  buildCommand(prompt: string): string[];
  buildEnvironment(): NodeJS.ProcessEnv;
  parseOutput(stdout: string, stderr: string): string;
  /** Never rejects: every failure comes back as an unsuccessful response. */
  ask(prompt: string, timeoutSeconds?: number): Promise<ModelResponse>;
}
