export interface ContextOptions {
  /** Project root override for this call */
  projectPath?: string;
  /** Defaults to true */
  includeContext?: boolean;
}

export interface PromptContext {
  buildPrompt(prompt: string, options?: ContextOptions): Promise<string>;
}
