/**
 * Readiness checks. The shallow check only needs a loaded configuration;
 * the deep check also opens and closes every tool server and pings the
 * model endpoint, naming each one that fails.
 */
import type { Configuration } from '../config/model.js';
import { toErrorMessage } from '../errors.js';
import type { ModelAdapter } from '../llm/types.js';
import type { ToolServerGateway } from '../mcp/gateway.js';

const DEEP_CHECK_TIMEOUT_MS = 10_000;

export interface ReadinessCheck {
  name: string;
  ok: boolean;
  error?: string;
}

export interface ReadinessReport {
  ready: boolean;
  checks: ReadinessCheck[];
}

export interface ReadinessDependencies {
  configuration?: Configuration;
  adapter: ModelAdapter;
  gateway: ToolServerGateway;
}

async function probe(name: string, check: () => Promise<unknown>): Promise<ReadinessCheck> {
  try {
    await check();
    return { name, ok: true };
  } catch (error) {
    return { name, ok: false, error: toErrorMessage(error) };
  }
}

export async function checkReadiness(
  deps: ReadinessDependencies,
  options: { deep?: boolean; timeoutMs?: number } = {}
): Promise<ReadinessReport> {
  const { configuration } = deps;
  const checks: ReadinessCheck[] = [
    configuration
      ? { name: 'configuration', ok: true }
      : { name: 'configuration', ok: false, error: 'configuration not loaded' },
  ];

  if (options.deep && configuration) {
    const signal = AbortSignal.timeout(options.timeoutMs ?? DEEP_CHECK_TIMEOUT_MS);
    const probes = [
      probe(`model:${deps.adapter.provider}`, () => deps.adapter.ping(signal)),
      ...[...configuration.toolServers.values()].map((server) =>
        probe(`mcp:${server.id}`, async () => {
          const handle = await deps.gateway.open(server, signal);
          try {
            await handle.list(signal);
          } finally {
            await handle.close();
          }
        })
      ),
    ];
    checks.push(...(await Promise.all(probes)));
  }

  return { ready: checks.every((check) => check.ok), checks };
}
