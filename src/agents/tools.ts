/**
 * Collector tool surface: the tools of a collector's declared servers,
 * namespaced `mcp__<server>__<tool>`, narrowed by the servers' allow-lists
 * and the collector's own `allowed_tools`. Calls run one at a time in the
 * order the model made them.
 */
import type { CollectorSpec } from '../config/model.js';
import { ToolInvocationError, ToolNotAuthorizedError } from '../errors.js';
import type { ToolCallPart, ToolDeclaration } from '../llm/types.js';
import { namespacedToolName, type ToolHandle, type ToolSession } from '../mcp/gateway.js';
import type { DispatchContext, ToolExecution, ToolSurface } from './types.js';

interface ToolRoute {
  handle: ToolHandle;
  tool: string;
}

function isAllowedByCollector(collector: CollectorSpec, server: string, tool: string): boolean {
  if (collector.allowedTools.length === 0) return true;
  return (
    collector.allowedTools.includes(tool) ||
    collector.allowedTools.includes(namespacedToolName(server, tool))
  );
}

export class CollectorToolSurface implements ToolSurface {
  readonly concurrent = false;

  private constructor(
    private readonly collector: CollectorSpec,
    readonly declarations: readonly ToolDeclaration[],
    private readonly routes: ReadonlyMap<string, ToolRoute>
  ) {}

  static async create(
    collector: CollectorSpec,
    session: ToolSession,
    signal?: AbortSignal
  ): Promise<CollectorToolSurface> {
    const declarations: ToolDeclaration[] = [];
    const routes = new Map<string, ToolRoute>();

    for (const server of collector.toolServers) {
      const handle = session.get(server);
      if (!handle) {
        throw new ToolInvocationError(server, 'connect', `MCP server '${server}' is not open for '${collector.id}'`);
      }

      for (const tool of await handle.list(signal)) {
        if (!isAllowedByCollector(collector, server, tool.name)) continue;
        const name = namespacedToolName(server, tool.name);
        declarations.push({ name, description: tool.description, parameters: tool.inputSchema });
        routes.set(name, { handle, tool: tool.name });
      }
    }

    return new CollectorToolSurface(collector, declarations, routes);
  }

  async execute(call: ToolCallPart, context: DispatchContext): Promise<ToolExecution> {
    const route = this.routes.get(call.name);
    if (!route) {
      throw new ToolNotAuthorizedError(call.name, this.collector.id);
    }
    const content = await route.handle.invoke(route.tool, call.arguments, context.signal);
    return { content, isError: false };
  }
}

