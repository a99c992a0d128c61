import type { Outcome } from '../outcome.js';

export type OutputFormat = 'json' | 'md' | 'plain' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'md', 'plain', 'pretty'];

export interface OutputFormatter {
  renderComplete(outcome: Outcome): Promise<void>;
  renderError(error: string): void;
}
