import { spawn, type ChildProcess } from 'node:child_process';
import { performance } from 'node:perf_hooks';
import type { BackendSettings } from '../domain/config/crosstalk-config.js';
import { DEFAULT_TIMEOUTS } from '../domain/config/crosstalk-config.js';
import { failed, succeeded, type ModelResponse } from '../domain/model/model-response.js';
import type { ModelAdapter } from '../ports/model-adapter.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('cli-adapter');

/** Time a child gets to exit after SIGTERM before it is sent SIGKILL. */
export const KILL_GRACE_MS = 3000;

/** Largest delay a Node timer honors; longer delays fire immediately. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface ApiKeyPromotion {
  /** Variable dedicated to this backend; wins when set */
  dedicated: string;
  /** Shared variable used when the dedicated one is unset */
  fallback: string;
  /** Variable the CLI actually reads */
  target: string;
}

export interface CliAdapterOptions extends BackendSettings {
  /** Environment the child inherits; defaults to the current process environment */
  env?: NodeJS.ProcessEnv;
}

function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return `Error: ${String(err)}`;
}

function isMissingExecutable(err: Error): boolean {
  return 'code' in err && err.code === 'ENOENT';
}

export abstract class CliModelAdapter implements ModelAdapter {
  abstract readonly name: string;

  constructor(protected readonly options: CliAdapterOptions) {}

  get cliCommand(): string {
    return this.options.command;
  }

  get model(): string {
    return this.options.model;
  }

  abstract buildCommand(prompt: string): string[];

  abstract parseOutput(stdout: string, stderr: string): string;

  buildEnvironment(): NodeJS.ProcessEnv {
    return { ...(this.options.env ?? process.env) };
  }

  protected promoteApiKey(env: NodeJS.ProcessEnv, promotion: ApiKeyPromotion): NodeJS.ProcessEnv {
    const key = env[promotion.dedicated] || env[promotion.fallback];
    if (key) env[promotion.target] = key;
    return env;
  }

  ask(prompt: string, timeoutSeconds: number = DEFAULT_TIMEOUTS.ask): Promise<ModelResponse> {
    const [command, ...args] = this.buildCommand(prompt);
    const startedAt = performance.now();
    const elapsed = () => (performance.now() - startedAt) / 1000;

    return new Promise((resolve) => {
      let settled = false;
      let closed = false;
      let deadline: NodeJS.Timeout | undefined;

      const finish = (response: ModelResponse) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        if (response.success) {
          log.info(`ask: ${this.name} succeeded in ${response.elapsedSeconds.toFixed(2)}s`);
        } else {
          log.warn(`ask: ${this.name} failed after ${response.elapsedSeconds.toFixed(2)}s: ${response.error}`);
        }
        resolve(response);
      };

      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          env: this.buildEnvironment(),
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (err) {
        finish(failed(this.name, describeError(err), elapsed()));
        return;
      }

      log.debug(`ask: spawned ${this.name} (${command}) with PID ${child.pid ?? 'unknown'}`);

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

      deadline = setTimeout(() => {
        finish(failed(this.name, `Timeout after ${timeoutSeconds}s`, elapsed()));
        this.terminate(child, () => closed);
      }, Math.min(timeoutSeconds * 1000, MAX_TIMER_DELAY_MS));

      child.on('error', (err) => {
        if (settled) {
          log.debug(`ask: ${this.name} process error after completion:`, err.message);
          return;
        }
        if (isMissingExecutable(err)) {
          finish(failed(this.name, `CLI not found: ${command}`, elapsed()));
          return;
        }
        finish(failed(this.name, describeError(err), elapsed()));
      });

      child.on('close', (code, signal) => {
        closed = true;
        if (settled) return;

        const seconds = elapsed();
        // Buffer#toString substitutes U+FFFD for invalid sequences instead of throwing
        const stdout = Buffer.concat(stdoutChunks).toString('utf-8');
        const stderr = Buffer.concat(stderrChunks).toString('utf-8');
        const diagnostic = stderr.trim() || stdout.trim();

        if (code === null) {
          finish(failed(this.name, `Terminated by ${signal ?? 'unknown signal'}: ${diagnostic}`, seconds));
          return;
        }
        if (code !== 0) {
          finish(failed(this.name, `Exit code ${code}: ${diagnostic}`, seconds));
          return;
        }

        try {
          finish(succeeded(this.name, this.parseOutput(stdout, stderr), seconds));
        } catch (err) {
          finish(failed(this.name, describeError(err), seconds));
        }
      });
    });
  }

  private terminate(child: ChildProcess, hasClosed: () => boolean): void {
    try {
      child.kill('SIGTERM');
    } catch (err) {
      log.debug(`terminate: SIGTERM to ${this.name} failed:`, describeError(err));
    }

    const escalation = setTimeout(() => {
      if (hasClosed()) return;
      try {
        child.kill('SIGKILL');
      } catch (err) {
        log.debug(`terminate: SIGKILL to ${this.name} failed:`, describeError(err));
      }
    }, KILL_GRACE_MS);
    escalation.unref();
  }
}
