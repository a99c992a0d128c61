import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { ContextOptions, PromptContext } from '../ports/prompt-context.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('project-context');

const CONTEXT_HEADER = '=== Shared Project Context (read-only) ===';
const CONTEXT_FOOTER = '=== End Shared Context ===';

export interface ProjectContextOptions {
  /** Used when a call gives no project path; falls back to the working directory */
  defaultProjectPath?: string | null;
  /** Home directory holding the per-project memory files */
  homeDir?: string;
}

/** Reads a context document; a missing or blank file reads as null. */
export async function loadContextFile(path: string): Promise<string | null> {
  try {
    const text = (await readFile(path, 'utf-8')).trim();
    return text || null;
  } catch {
    return null;
  }
}

/**
 * Memory directories are keyed by the absolute project path with separators dashed out.
 * The leading dash stays (`/home/dev/app` -> `-home-dev-app`), matching the directory names on disk.
 */
export function projectSlug(projectPath: string): string {
  return projectPath.replace(/[\\/]/g, '-');
}

export class ProjectContext implements PromptContext {
  private readonly homeDir: string;

  constructor(private readonly options: ProjectContextOptions = {}) {
    this.homeDir = options.homeDir ?? homedir();
  }

  resolveProjectPath(override?: string): string {
    if (override) return resolve(override);
    if (this.options.defaultProjectPath) return resolve(this.options.defaultProjectPath);
    return process.cwd();
  }

  projectNotesPath(projectPath: string): string {
    return join(projectPath, '.claude', 'CLAUDE.md');
  }

  memoryPath(projectPath: string): string {
    return join(this.homeDir, '.claude', 'projects', projectSlug(projectPath), 'memory', 'MEMORY.md');
  }

  async buildPrompt(prompt: string, options: ContextOptions = {}): Promise<string> {
    if (options.includeContext === false) return prompt;

    const projectPath = this.resolveProjectPath(options.projectPath);
    const [notes, memory] = await Promise.all([
      loadContextFile(this.projectNotesPath(projectPath)),
      loadContextFile(this.memoryPath(projectPath)),
    ]);

    if (!notes && !memory) {
      log.debug(`buildPrompt: no context documents for ${projectPath}`);
      return prompt;
    }

    const sections = [CONTEXT_HEADER, ''];
    if (notes) sections.push(`[CLAUDE.md]\n${notes}\n`);
    if (memory) sections.push(`[MEMORY.md]\n${memory}\n`);
    sections.push(CONTEXT_FOOTER, '', prompt);

    log.debug(`buildPrompt: added ${notes ? 'CLAUDE.md ' : ''}${memory ? 'MEMORY.md ' : ''}from ${projectPath}`);
    return sections.join('\n');
  }
}
