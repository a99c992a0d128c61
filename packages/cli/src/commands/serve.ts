import type { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger, setLogLevel } from '@crosstalk/core';
import { createMcpServer } from '../mcp/server.js';
import type { RuntimeFactory } from '../runtime.js';

const log = createLogger('serve');

export function registerServeCommand(program: Command, createRuntime: RuntimeFactory, version: string): void {
  program
    .command('serve')
    .description('Serve the orchestration tools over MCP on stdio')
    .option('--verbose', 'Debug logging')
    .action(async (opts: { verbose?: boolean }) => {
      if (opts.verbose) setLogLevel('debug');

      const { config, orchestrator } = await createRuntime();
      const server = createMcpServer(orchestrator, version);
      await server.connect(new StdioServerTransport());
      log.info(`MCP server ready (codex: ${config.codex.model}, gemini: ${config.gemini.model})`);
    });
}
