/**
 * Library entry point. The CLI lives in cli.ts.
 */
export * from './errors.js';
export * from './config/index.js';
export * from './llm/index.js';
export * from './mcp/gateway.js';
export * from './agents/index.js';
export * from './formatter/response.js';
export { createServer, startServer, InvestigationRequestSchema, type ServerDependencies } from './server/index.js';
export { VERSION } from './version.js';
