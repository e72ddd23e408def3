/**
 * Agents Module
 *
 * The runtime that executes agents and collectors, the delegation protocol
 * between them, and the investigation service that ties a query to a run.
 *
 * Hierarchy:
 * - agent (coordinator): plans and delegates, holds only delegation tools
 * - collector: calls MCP tools on its own servers, never delegates
 */

// Types
export * from './types.js';

// Runtime
export { AgentRuntime, type RuntimeDependencies, type RunOptions } from './runtime.js';
export {
  DelegationSurface,
  delegationDeclaration,
  delegationResult,
  QUERY_PARAMETER,
  type CollectorRunner,
  type CollectorRunOptions,
} from './delegation.js';
export { CollectorToolSurface } from './tools.js';
export { bindVariables, renderInstruction } from './prompt.js';

// Investigation
export {
  InvestigationService,
  buildBreakdown,
  buildMetrics,
  type AgentMetrics,
  type InvestigationDependencies,
  type InvestigationRequest,
  type InvestigationResult,
} from './investigation.js';
export { checkReadiness, type ReadinessCheck, type ReadinessReport } from './readiness.js';
