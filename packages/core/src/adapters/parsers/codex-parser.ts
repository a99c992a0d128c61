import { asRecord, asString } from './values.js';

function agentMessageTexts(item: Record<string, unknown>): string[] {
  const text = asString(item.text).trim();
  if (text) return [text];

  // Older CLI builds nest the message in a content array
  const content = item.content;
  if (!Array.isArray(content)) return [];
  const parts: string[] = [];
  for (const part of content) {
    const partText = asString(asRecord(part).text).trim();
    if (partText) parts.push(partText);
  }
  return parts;
}

/**
 * Extracts the final answer from `codex exec --json` output, a JSON-lines
 * event log. Only completed `agent_message` items count; everything else,
 * including lines that are not JSON, is ignored.
 */
export function parseCodexOutput(stdout: string): string {
  const messages: string[] = [];

  for (const rawLine of stdout.trim().split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    let payload: unknown;
    try {
      payload = JSON.parse(line);
    } catch {
      continue;
    }

    const event = asRecord(payload);
    if (asString(event.type) !== 'item.completed') continue;
    const item = asRecord(event.item);
    if (asString(item.type) !== 'agent_message') continue;
    messages.push(...agentMessageTexts(item));
  }

  if (messages.length > 0) return messages.join('\n\n');
  return stdout.trim();
}
