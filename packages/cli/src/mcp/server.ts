import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  DEFAULT_DEBATE_ROUNDS,
  createLogger,
  serializeBackendResponses,
  serializeConsensus,
  serializeCouncil,
  serializeDebate,
  serializeResponse,
  type AskOptions,
  type Orchestrator,
} from '@crosstalk/core';

const log = createLogger('mcp');

const contextArgs = {
  project_path: z.string().optional().describe('Project whose .claude/CLAUDE.md and memory are shared as context'),
  include_context: z.boolean().optional().describe('Prepend shared project context (default true)'),
  timeout: z.number().positive().optional().describe('Per-call timeout in seconds'),
};

type ContextArgs = {
  project_path?: string;
  include_context?: boolean;
  timeout?: number;
};

function toAskOptions(args: ContextArgs): AskOptions {
  return {
    projectPath: args.project_path,
    includeContext: args.include_context ?? true,
    timeoutSeconds: args.timeout,
  };
}

/** Runs a tool body, returning its value as pretty JSON or its failure as an error result. */
async function respond(tool: string, body: () => Promise<object>): Promise<CallToolResult> {
  try {
    const value = await body();
    return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`${tool} failed:`, message);
    return { content: [{ type: 'text' as const, text: `Error: ${message}` }], isError: true };
  }
}

export function createMcpServer(orchestrator: Orchestrator, version: string): McpServer {
  const server = new McpServer({ name: 'crosstalk', version });

  server.tool(
    'ask_codex',
    'Ask OpenAI Codex a question. Shared project context is prepended unless include_context is false.',
    { prompt: z.string().describe('The question or task'), ...contextArgs },
    async (args) =>
      respond('ask_codex', async () =>
        serializeResponse(await orchestrator.askSingle('codex', args.prompt, toAskOptions(args)))),
  );

  server.tool(
    'ask_gemini',
    'Ask Google Gemini a question. Shared project context is prepended unless include_context is false.',
    { prompt: z.string().describe('The question or task'), ...contextArgs },
    async (args) =>
      respond('ask_gemini', async () =>
        serializeResponse(await orchestrator.askSingle('gemini', args.prompt, toAskOptions(args)))),
  );

  server.tool(
    'ask_both_models',
    'Ask Codex and Gemini the same question in parallel and return both answers.',
    { prompt: z.string().describe('The question or task'), ...contextArgs },
    async (args) =>
      respond('ask_both_models', async () =>
        serializeBackendResponses(await orchestrator.askBoth(args.prompt, toAskOptions(args)))),
  );

  server.tool(
    'request_consensus',
    'Ask both models, then have Gemini synthesize points of agreement, key differences and a recommendation.',
    { topic: z.string().describe('The question or topic'), ...contextArgs },
    async (args) =>
      respond('request_consensus', async () =>
        serializeConsensus(await orchestrator.consensus(args.topic, toAskOptions(args)))),
  );

  server.tool(
    'request_debate',
    'Run a multi-round debate in which each model refines its position against the other.',
    {
      topic: z.string().describe('The debate topic'),
      rounds: z.number().int().optional().describe(`Number of rounds, clamped to 1-5 (default ${DEFAULT_DEBATE_ROUNDS})`),
      ...contextArgs,
    },
    async (args) =>
      respond('request_debate', async () =>
        serializeDebate(
          await orchestrator.debate(args.topic, args.rounds ?? DEFAULT_DEBATE_ROUNDS, toAskOptions(args)),
        )),
  );

  server.tool(
    'request_council',
    'Have both models answer, then peer-review all answers anonymously and rank them. ' +
      'Pass claude_opinion to have your own answer reviewed alongside theirs.',
    {
      topic: z.string().describe('The question or topic'),
      claude_opinion: z.string().optional().describe('Your own answer, reviewed anonymously'),
      ...contextArgs,
    },
    async (args) =>
      respond('request_council', async () =>
        serializeCouncil(
          await orchestrator.council(args.topic, { ...toAskOptions(args), claudeOpinion: args.claude_opinion }),
        )),
  );

  return server;
}
