/**
 * API Server
 *
 * HTTP surface over the investigation service. Every response carries an
 * `X-Request-ID`; errors come back as `{ error: { code, message, requestId,
 * details } }` with the status of their error class.
 *
 * Endpoints:
 * - GET /health: Liveness
 * - GET /ready: Readiness, `?deep=true` also probes tool servers and the model
 * - GET /agents: Configured agents
 * - GET /agents/:name/schema: An agent's response schema
 * - POST /: Run one investigation
 * - POST /stream: Run one investigation with SSE progress events
 *
 * Dependencies:
 * - hono: Lightweight web framework for edge/Node.js
 * - @hono/node-server: Node.js adapter for Hono
 * - @hono/zod-validator: Request validation using Zod schemas
 */
import { randomUUID } from 'node:crypto';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { streamSSE } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { InvestigationService, MAX_TIMEOUT_SECONDS, type InvestigationResult } from '../agents/investigation.js';
import { checkReadiness } from '../agents/readiness.js';
import type { RunEvent } from '../agents/types.js';
import { getResponseSchemaFor, type Configuration } from '../config/model.js';
import { FathomError, toErrorMessage, toFathomError } from '../errors.js';
import type { ModelAdapter } from '../llm/types.js';
import { ToolServerGateway } from '../mcp/gateway.js';
import { serverLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const REQUEST_ID_HEADER = 'X-Request-ID';
const QUIET_PATHS = new Set(['/health', '/ready']);

type AppEnv = { Variables: { requestId: string } };

export interface ServerDependencies {
  configuration: Configuration;
  adapter: ModelAdapter;
  gateway?: ToolServerGateway;
}

export const InvestigationRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  agent: z.string().min(1).optional(),
  variables: z.record(z.string(), z.string()).optional(),
  timeoutSeconds: z.number().int().min(1).max(MAX_TIMEOUT_SECONDS).optional(),
});

function errorResponse(error: FathomError, requestId: string): Response {
  return new Response(JSON.stringify(error.toJSON(requestId)), {
    status: error.statusCode,
    headers: { 'Content-Type': 'application/json', [REQUEST_ID_HEADER]: requestId },
  });
}

function toHttpError(error: unknown): FathomError {
  if (error instanceof HTTPException) {
    return new FathomError(error.message, 'INVALID_REQUEST', error.status);
  }
  return toFathomError(error);
}

function resultPayload(result: InvestigationResult) {
  return {
    requestId: result.requestId,
    agent: result.agent,
    result: result.result,
    contentType: result.contentType,
    metrics: result.metrics,
    breakdown: result.breakdown,
  };
}

export function createServer(deps: ServerDependencies) {
  const { configuration, adapter } = deps;
  const gateway = deps.gateway ?? new ToolServerGateway();
  const service = new InvestigationService({ configuration, adapter, gateway });
  const app = new Hono<AppEnv>();

  app.use('/*', cors());

  app.use('/*', async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
    c.set('requestId', requestId);
    const start = Date.now();
    await next();
    c.res.headers.set(REQUEST_ID_HEADER, requestId);
    if (!QUIET_PATHS.has(c.req.path)) {
      const ms = Date.now() - start;
      serverLogger.info({ requestId, method: c.req.method, path: c.req.path, status: c.res.status, ms }, 'request');
    }
  });

  app.onError((err, c) => {
    const error = toHttpError(err);
    const requestId = c.get('requestId') ?? randomUUID();
    if (error.statusCode >= 500) {
      serverLogger.error({ requestId, code: error.code, error: error.message }, 'Request failed');
    } else {
      serverLogger.warn({ requestId, code: error.code, error: error.message }, 'Request rejected');
    }
    return errorResponse(error, requestId);
  });

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      version: VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/ready', async (c) => {
    const deep = c.req.query('deep') === 'true';
    const report = await checkReadiness({ configuration, adapter, gateway }, { deep });
    const body = {
      status: report.ready ? 'ready' : 'not_ready',
      agents: [...configuration.agents.keys()],
      checks: report.checks,
    };
    return report.ready ? c.json(body, 200) : c.json(body, 503);
  });

  app.get('/agents', (c) => {
    return c.json({
      agents: [...configuration.agents.values()].map((agent) => ({
        id: agent.id,
        description: agent.description,
        collectors: agent.collectors,
        responseSchema: agent.responseSchema ?? null,
        requestVariables: agent.requestVariables,
      })),
    });
  });

  app.get('/agents/:name/schema', (c) => {
    const agent = service.resolveAgent(c.req.param('name'));
    const schema = getResponseSchemaFor(configuration, agent);
    if (!schema) {
      return c.json({
        agent: agent.id,
        schema: null,
        format: configuration.defaultFormat,
        description: '',
        message: `Agent '${agent.id}' has no response schema`,
      });
    }
    return c.json({
      agent: agent.id,
      schema: schema.document,
      format: schema.mode,
      description: schema.description,
    });
  });

  // Rejections go through onError so they carry the request id.
  const validateBody = zValidator('json', InvestigationRequestSchema, (result) => {
    if (!result.success) {
      throw new FathomError('Invalid request body', 'INVALID_REQUEST', 400, {
        details: {
          issues: result.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
      });
    }
  });

  app.post('/', validateBody, async (c) => {
    const input = c.req.valid('json');
    const result = await service.investigate({
      ...input,
      requestId: c.get('requestId'),
      signal: c.req.raw.signal,
    });
    return c.json(resultPayload(result));
  });

  app.post('/stream', validateBody, async (c) => {
    const input = c.req.valid('json');
    const requestId = c.get('requestId');

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort(new Error('client disconnected')));

      let pending: Promise<void> = Promise.resolve();
      const observer = (event: RunEvent) => {
        pending = pending
          .then(() => stream.writeSSE({ event: event.type, data: JSON.stringify(event) }))
          .catch((error: unknown) => {
            serverLogger.debug({ requestId, error: toErrorMessage(error) }, 'Dropped stream event');
          });
      };

      try {
        const result = await service.investigate({
          ...input,
          requestId,
          signal: controller.signal,
          observer,
        });
        await pending;
        await stream.writeSSE({ event: 'result', data: JSON.stringify(resultPayload(result)) });
      } catch (err) {
        const error = toFathomError(err);
        serverLogger.warn({ requestId, code: error.code, error: error.message }, 'Streamed investigation failed');
        await pending;
        await stream.writeSSE({ event: 'error', data: JSON.stringify(error.toJSON(requestId)) });
      }
    });
  });

  return app;
}

export function startServer(port: number, deps: ServerDependencies): ReturnType<typeof serve> {
  serverLogger.info({ port, agents: deps.configuration.agents.size }, 'Starting Fathom server');

  const app = createServer(deps);
  const server = serve({
    fetch: app.fetch,
    port,
  });

  serverLogger.info({ port, url: `http://localhost:${port}` }, 'Server started');
  return server;
}
