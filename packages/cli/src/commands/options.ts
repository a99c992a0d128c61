import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { InvalidArgumentError, Option, type Command } from 'commander';
import { CrosstalkError, setLogLevel, type AskOptions } from '@crosstalk/core';
import { createFormatter, OUTPUT_FORMATS, type OutputFormat } from '../formatters/index.js';
import type { Outcome } from '../outcome.js';
import type { Runtime, RuntimeFactory } from '../runtime.js';

export interface CommonOptions {
  file?: string;
  project?: string;
  context: boolean;
  timeout?: number;
  json?: boolean;
  format?: OutputFormat;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CommandDeps {
  createRuntime: RuntimeFactory;
  /** Reads a prompt file, `-` meaning stdin */
  readInput?: (path: string) => string;
  isTTY?: boolean;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

export function readInputFile(path: string): string {
  return readFileSync(path === '-' ? '/dev/stdin' : resolve(path), 'utf-8');
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('-f, --file <path>', 'Read prompt from file (- for stdin)')
    .option('--project <path>', 'Project whose shared context is prepended')
    .option('--no-context', 'Send the prompt without project context')
    .option('--timeout <seconds>', 'Per-call timeout in seconds', parsePositiveNumber)
    .option('--json', 'Output as JSON to stdout')
    .addOption(new Option('--format <type>', 'Output format').choices(OUTPUT_FORMATS))
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Errors only on stderr');
}

export function applyLogLevel(opts: Pick<CommonOptions, 'verbose' | 'quiet'>): void {
  if (opts.verbose) setLogLevel('debug');
  else if (opts.quiet) setLogLevel('error');
  else setLogLevel('warn');
}

export function resolvePrompt(parts: string[], opts: Pick<CommonOptions, 'file'>, deps: CommandDeps): string {
  const prompt = opts.file
    ? (deps.readInput ?? readInputFile)(opts.file).trim()
    : parts.join(' ').trim();
  if (!prompt) {
    throw new CrosstalkError('No prompt provided. Pass it as arguments or use -f <file>.', 'NO_PROMPT');
  }
  return prompt;
}

export function resolveFormat(opts: Pick<CommonOptions, 'json' | 'format'>, isTTY: boolean): OutputFormat {
  if (opts.json) return 'json';
  return opts.format ?? (isTTY ? 'pretty' : 'json');
}

export function toAskOptions(opts: CommonOptions): AskOptions {
  return {
    projectPath: opts.project,
    includeContext: opts.context,
    timeoutSeconds: opts.timeout,
  };
}

/**
 * Shared action body: resolves the prompt, runs the operation against a fresh
 * runtime and prints its outcome. Caller errors exit with status 1; model
 * failures are part of the printed outcome.
 */
export async function runOperation(
  parts: string[],
  opts: CommonOptions,
  deps: CommandDeps,
  operation: (runtime: Runtime, prompt: string) => Promise<Outcome>,
): Promise<void> {
  applyLogLevel(opts);
  const formatter = createFormatter(resolveFormat(opts, deps.isTTY ?? Boolean(process.stdout.isTTY)));

  try {
    const prompt = resolvePrompt(parts, opts, deps);
    const runtime = await deps.createRuntime();
    await formatter.renderComplete(await operation(runtime, prompt));
  } catch (err) {
    formatter.renderError(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
