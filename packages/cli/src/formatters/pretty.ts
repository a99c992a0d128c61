import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';
import type { Outcome } from '../outcome.js';
import type { OutputFormatter } from './formatter.js';
import { toMarkdown } from './markdown.js';

marked.use(markedTerminal());

export async function renderForTerminal(markdown: string): Promise<string> {
  const output = await marked.parse(markdown);
  // marked-terminal adds a trailing newline; trim for clean layout
  return output.trimEnd();
}

export class PrettyFormatter implements OutputFormatter {
  async renderComplete(outcome: Outcome): Promise<void> {
    console.log(await renderForTerminal(toMarkdown(outcome)));
  }

  renderError(error: string): void {
    console.error(`\n  Error: ${error}\n`);
  }
}
