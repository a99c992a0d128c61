import type { OutputFormat, OutputFormatter } from './formatter.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';
import { PrettyFormatter } from './pretty.js';

export function createFormatter(format: OutputFormat): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
      return new MarkdownFormatter();
    case 'plain':
      return new PlainFormatter();
    case 'pretty':
      return new PrettyFormatter();
  }
}

export type { OutputFormat, OutputFormatter } from './formatter.js';
export { OUTPUT_FORMATS } from './formatter.js';
