/**
 * Tool-Server Gateway
 *
 * Opens MCP connections (stdio subprocess or streamable HTTP), lists tools
 * filtered by each server's allow-list, and invokes them. Connections belong
 * to one collector run: a {@link ToolSession} opens the servers a run needs
 * and closes every handle when the run ends. Nothing is pooled across runs.
 *
 * Dependencies:
 * - @modelcontextprotocol/sdk: Official MCP client SDK for server communication
 *   - StdioClientTransport: Connects to MCP servers via subprocess stdio
 *   - StreamableHTTPClientTransport: Connects to MCP servers via HTTP
 */
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { ToolServerSpec } from '../config/model.js';
import { ToolInvocationError, ToolNotAuthorizedError, toErrorMessage } from '../errors.js';
import { isRecord, type JsonSchemaObject } from '../llm/types.js';
import { mcpLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const NAMESPACE_PREFIX = 'mcp__';
const NAMESPACE_SEPARATOR = '__';

export interface ToolDescriptor {
  server: string;
  name: string;
  description: string;
  inputSchema: JsonSchemaObject;
}

export interface ToolHandle {
  readonly server: string;
  list(signal?: AbortSignal): Promise<ToolDescriptor[]>;
  invoke(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

export type TransportFactory = (spec: ToolServerSpec) => Transport;

export function namespacedToolName(server: string, tool: string): string {
  return `${NAMESPACE_PREFIX}${server}${NAMESPACE_SEPARATOR}${tool}`;
}

export function createTransport(spec: ToolServerSpec): Transport {
  const { connection } = spec;
  if (connection.type === 'stdio') {
    return new StdioClientTransport({
      command: connection.command,
      args: [...connection.args],
      env: { ...getDefaultEnvironment(), ...connection.env },
    });
  }
  return new StreamableHTTPClientTransport(new URL(connection.url), {
    requestInit: { headers: { ...connection.headers } },
  });
}

/**
 * Joins text content with newlines; anything else is JSON-encoded so the
 * model still sees it.
 */
export function renderToolContent(content: unknown): string {
  if (!Array.isArray(content)) {
    return content === undefined ? '' : JSON.stringify(content);
  }
  return content
    .map((item: unknown) =>
      isRecord(item) && item['type'] === 'text' && typeof item['text'] === 'string'
        ? item['text']
        : JSON.stringify(item)
    )
    .join('\n');
}

function toInputSchema(schema: unknown): JsonSchemaObject {
  if (!isRecord(schema)) {
    return { type: 'object', properties: {} };
  }
  const properties = isRecord(schema['properties']) ? schema['properties'] : {};
  const required = Array.isArray(schema['required'])
    ? schema['required'].filter((item): item is string => typeof item === 'string')
    : undefined;
  return {
    ...schema,
    type: 'object',
    properties,
    ...(required ? { required } : {}),
  };
}

class McpToolHandle implements ToolHandle {
  private closed = false;

  constructor(
    private readonly spec: ToolServerSpec,
    private readonly client: Client
  ) {}

  get server(): string {
    return this.spec.id;
  }

  private isAllowed(name: string): boolean {
    return this.spec.tools.length === 0 || this.spec.tools.includes(name);
  }

  async list(signal?: AbortSignal): Promise<ToolDescriptor[]> {
    const descriptors: ToolDescriptor[] = [];
    let cursor: string | undefined;

    try {
      do {
        const page = await this.client.listTools(cursor ? { cursor } : undefined, signal ? { signal } : undefined);
        for (const tool of page.tools) {
          if (!this.isAllowed(tool.name)) continue;
          descriptors.push({
            server: this.spec.id,
            name: tool.name,
            description: tool.description ?? '',
            inputSchema: toInputSchema(tool.inputSchema),
          });
        }
        cursor = page.nextCursor;
      } while (cursor);
    } catch (error) {
      throw new ToolInvocationError(
        this.spec.id,
        'connect',
        `Listing tools on '${this.spec.id}' failed: ${toErrorMessage(error)}`,
        { cause: error }
      );
    }

    return descriptors;
  }

  async invoke(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<string> {
    if (!this.isAllowed(name)) {
      throw new ToolNotAuthorizedError(namespacedToolName(this.spec.id, name), this.spec.id);
    }

    let result: Awaited<ReturnType<Client['callTool']>>;
    try {
      result = await this.client.callTool({ name, arguments: args }, undefined, signal ? { signal } : undefined);
    } catch (error) {
      throw new ToolInvocationError(
        this.spec.id,
        'invoke',
        `Tool '${name}' on '${this.spec.id}' failed: ${toErrorMessage(error)}`,
        { tool: name, cause: error }
      );
    }

    const text = renderToolContent(result['content'] ?? result['toolResult']);
    if (result['isError'] === true) {
      throw new ToolInvocationError(
        this.spec.id,
        'invoke',
        `Tool '${name}' on '${this.spec.id}' returned an error: ${text}`,
        { tool: name }
      );
    }
    return text;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.client.close();
    } catch (error) {
      mcpLogger.warn({ server: this.spec.id, error: toErrorMessage(error) }, 'Error closing MCP server');
    }
    mcpLogger.debug({ server: this.spec.id }, 'MCP server closed');
  }
}

export interface ToolServerGatewayOptions {
  transportFactory?: TransportFactory;
}

export class ToolServerGateway {
  private readonly transportFactory: TransportFactory;

  constructor(options: ToolServerGatewayOptions = {}) {
    this.transportFactory = options.transportFactory ?? createTransport;
  }

  async open(spec: ToolServerSpec, signal?: AbortSignal): Promise<ToolHandle> {
    const client = new Client({ name: `fathom-${spec.id}`, version: VERSION });

    try {
      signal?.throwIfAborted();
      await client.connect(this.transportFactory(spec), signal ? { signal } : undefined);
    } catch (error) {
      try {
        await client.close();
      } catch (closeError) {
        mcpLogger.debug({ server: spec.id, error: toErrorMessage(closeError) }, 'Close after failed connect');
      }
      throw new ToolInvocationError(
        spec.id,
        'connect',
        `Could not connect to MCP server '${spec.id}': ${toErrorMessage(error)}`,
        { cause: error }
      );
    }

    mcpLogger.info({ server: spec.id, transport: spec.connection.type }, 'MCP server connected');
    return new McpToolHandle(spec, client);
  }
}

/**
 * The tool-server handles owned by one run.
 */
export class ToolSession {
  private closed = false;

  private constructor(private readonly handles: ReadonlyMap<string, ToolHandle>) {}

  /**
   * Opens every server concurrently. If any fails, the ones that opened are
   * closed again and the first failure is thrown.
   */
  static async open(
    gateway: ToolServerGateway,
    specs: readonly ToolServerSpec[],
    signal?: AbortSignal
  ): Promise<ToolSession> {
    const settled = await Promise.allSettled(specs.map((spec) => gateway.open(spec, signal)));
    const handles = new Map<string, ToolHandle>();
    const failures: unknown[] = [];

    for (const [index, outcome] of settled.entries()) {
      const spec = specs[index];
      if (outcome.status === 'rejected') {
        failures.push(outcome.reason);
      } else if (spec) {
        handles.set(spec.id, outcome.value);
      }
    }

    const session = new ToolSession(handles);
    if (failures.length > 0) {
      await session.close();
      throw failures[0];
    }
    return session;
  }

  get(server: string): ToolHandle | undefined {
    return this.handles.get(server);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all([...this.handles.values()].map((handle) => handle.close()));
  }
}

export async function withToolSession<T>(
  gateway: ToolServerGateway,
  specs: readonly ToolServerSpec[],
  signal: AbortSignal | undefined,
  fn: (session: ToolSession) => Promise<T>
): Promise<T> {
  const session = await ToolSession.open(gateway, specs, signal);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
