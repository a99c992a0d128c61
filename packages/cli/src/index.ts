export { createCrosstalk, createConfigService } from './runtime.js';
export type { CrosstalkOptions, Runtime, RuntimeFactory } from './runtime.js';
export { createMcpServer } from './mcp/server.js';
export { buildProgram } from './program.js';
export type { Outcome, OutcomeKind } from './outcome.js';

// Re-export everything from core for advanced usage
export * from '@crosstalk/core';
