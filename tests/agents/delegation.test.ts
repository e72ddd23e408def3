import { describe, it, expect } from 'vitest';
import {
  DelegationSurface,
  delegationDeclaration,
  delegationResult,
  type CollectorRunOptions,
  type CollectorRunner,
} from '../../src/agents/delegation.js';
import { AgentRuntime } from '../../src/agents/runtime.js';
import type { DispatchContext, Run } from '../../src/agents/types.js';
import type { CollectorSpec, Configuration } from '../../src/config/model.js';
import { ToolInvocationError } from '../../src/errors.js';
import { ToolServerGateway } from '../../src/mcp/gateway.js';
import { agentSpec, buildConfiguration, collectorSpec, toolServerSpec } from '../helpers/configuration.js';
import { fakeServers, type FakeServers } from '../helpers/mcp.js';
import { ScriptedAdapter, callTools, reply, toolCall, usage } from '../helpers/scripted-adapter.js';

function runtimeFor(adapter: ScriptedAdapter, configuration: Configuration, fake: FakeServers = fakeServers({})) {
  return new AgentRuntime({
    adapter,
    configuration,
    gateway: new ToolServerGateway({ transportFactory: fake.transportFactory }),
  });
}

function finishedRun(specId: string, overrides: Partial<Run> = {}): Run {
  return {
    id: `run-${specId}`,
    specId,
    kind: 'collector',
    model: `model-${specId}`,
    transcript: [],
    usage: usage(0, 0),
    costUsd: 0,
    numTurns: 1,
    status: 'completed',
    truncated: false,
    output: '',
    children: [],
    startedAt: 0,
    finishedAt: 10,
    ...overrides,
  };
}

describe('delegationDeclaration', () => {
  it('should take a single required query', () => {
    expect(delegationDeclaration(collectorSpec('pods'))).toEqual({
      name: 'pods',
      description: 'pods collector',
      parameters: {
        type: 'object',
        properties: { query: { type: 'string', description: 'What pods should find out' } },
        required: ['query'],
      },
    });
  });
});

describe('delegationResult', () => {
  it('should return a completed run output', () => {
    const run = finishedRun('pods', { output: '3 pods running' });
    expect(delegationResult(run)).toEqual({ content: '3 pods running', isError: false, child: run });
  });

  it('should flag truncated output', () => {
    const run = finishedRun('pods', { output: 'web-1, web-2', truncated: true });
    expect(delegationResult(run).content).toBe(
      "web-1, web-2\n\n[truncated: collector 'pods' reached its output token limit]"
    );
  });

  it('should describe a run that did not complete', () => {
    const run = finishedRun('pods', {
      status: 'turn-limit-exceeded',
      error: new ToolInvocationError('k8s', 'invoke', 'slow'),
    });
    const result = delegationResult(run);
    expect(result.content).toBe("collector 'pods' turn-limit-exceeded: slow");
    expect(result.isError).toBe(true);
    expect(result.fatal).toBeUndefined();
  });

  it('should escalate a connect failure', () => {
    const error = new ToolInvocationError('k8s', 'connect', 'Could not connect');
    const result = delegationResult(finishedRun('pods', { status: 'failed', error }));
    expect(result.fatal).toBe(error);
  });
});

describe('DelegationSurface', () => {
  class RecordingRunner implements CollectorRunner {
    readonly calls: { collector: string; query: string; options: CollectorRunOptions }[] = [];

    async run(spec: CollectorSpec, query: string, options: CollectorRunOptions): Promise<Run> {
      this.calls.push({ collector: spec.id, query, options });
      return finishedRun(spec.id, { output: `answer for ${query}` });
    }
  }

  const triage = agentSpec('triage', { collectors: ['pods', 'nodes'] });
  const configuration = buildConfiguration({
    agents: [triage],
    collectors: [collectorSpec('pods', { timeoutMs: 60_000 }), collectorSpec('nodes', { timeoutMs: 200 })],
  });

  function context(deadline: number): DispatchContext {
    return {
      run: finishedRun('triage', { id: 'run-triage', kind: 'agent', status: 'running' }),
      signal: new AbortController().signal,
      deadline,
      variables: { cluster: 'prod' },
    };
  }

  it('should give the child no more time than the coordinator has left', async () => {
    const runner = new RecordingRunner();
    const surface = new DelegationSurface(triage, configuration, runner);

    await surface.execute(toolCall('pods', { query: 'pod health' }), context(Date.now() + 1_000));

    const timeoutMs = runner.calls[0]?.options.timeoutMs ?? Number.NaN;
    expect(timeoutMs).toBeGreaterThan(0);
    expect(timeoutMs).toBeLessThanOrEqual(1_000);
    expect(runner.calls[0]).toMatchObject({
      collector: 'pods',
      query: 'pod health',
      options: { parentRunId: 'run-triage', variables: { cluster: 'prod' } },
    });
  });

  it('should keep the collector budget when it is smaller', async () => {
    const runner = new RecordingRunner();
    const surface = new DelegationSurface(triage, configuration, runner);

    await surface.execute(toolCall('nodes', { query: 'node health' }), context(Date.now() + 60_000));

    expect(runner.calls[0]?.options.timeoutMs).toBe(200);
  });

  it('should declare only configured collectors', () => {
    const surface = new DelegationSurface(
      agentSpec('triage', { collectors: ['pods', 'missing'] }),
      configuration,
      new RecordingRunner()
    );
    expect(surface.declarations.map((declaration) => declaration.name)).toEqual(['pods']);
    expect(surface.concurrent).toBe(true);
  });
});

describe('delegation through the runtime', () => {
  const triage = agentSpec('triage', { collectors: ['pods', 'nodes'] });
  const configuration = buildConfiguration({
    agents: [triage],
    collectors: [collectorSpec('pods'), collectorSpec('nodes')],
  });

  it('should run collectors concurrently and keep results in call order', async () => {
    let nodesStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      nodesStarted = resolve;
    });
    const adapter = new ScriptedAdapter({
      'model-triage': [
        callTools(
          toolCall('pods', { query: 'pod health' }, 'd1'),
          toolCall('nodes', { query: 'node health' }, 'd2')
        ),
        reply('Pods and nodes are fine.'),
      ],
      // pods only answers once nodes is running too
      'model-pods': [
        async () => {
          await started;
          return reply('3 pods running', { usage: usage(100, 20) });
        },
      ],
      'model-nodes': [
        async () => {
          nodesStarted();
          return reply('2 nodes ready', { usage: usage(50, 10) });
        },
      ],
    });

    const run = await runtimeFor(adapter, configuration).run(triage, 'is the cluster healthy?');

    expect(run.status).toBe('completed');
    expect(run.output).toBe('Pods and nodes are fine.');
    expect(run.transcript.slice(3, 5).map((turn) => turn.parts)).toEqual([
      [{ type: 'tool-result', callId: 'd1', name: 'pods', content: '3 pods running', isError: false }],
      [{ type: 'tool-result', callId: 'd2', name: 'nodes', content: '2 nodes ready', isError: false }],
    ]);
    expect(run.children.map((child) => [child.specId, child.status, child.usage.totalTokens])).toEqual([
      ['pods', 'completed', 120],
      ['nodes', 'completed', 60],
    ]);
    expect(run.usage).toEqual({ promptTokens: 20, completionTokens: 10, totalTokens: 30 });
  });

  it('should give collectors their query and no delegation tools', async () => {
    const adapter = new ScriptedAdapter({
      'model-triage': [callTools(toolCall('pods', { query: 'pod health' }, 'd1')), reply('done')],
      'model-pods': [reply('3 pods running')],
    });

    await runtimeFor(adapter, configuration).run(triage, 'q');

    const request = adapter.callsTo('model-pods')[0];
    expect(request?.tools).toBeUndefined();
    expect(request?.turns).toEqual([
      { role: 'system', parts: [{ type: 'text', text: 'You are pods.' }] },
      { role: 'user', parts: [{ type: 'text', text: 'pod health' }] },
    ]);
    expect(adapter.callsTo('model-triage')[0]?.tools).toEqual([
      delegationDeclaration(collectorSpec('pods')),
      delegationDeclaration(collectorSpec('nodes')),
    ]);
  });

  it('should report a failed collector to the coordinator and carry on', async () => {
    const adapter = new ScriptedAdapter({
      'model-triage': [callTools(toolCall('pods', { query: 'pod health' }, 'd1')), reply('Could not check pods.')],
      'model-pods': [new Error('model offline')],
    });

    const run = await runtimeFor(adapter, configuration).run(triage, 'q');

    expect(run.status).toBe('completed');
    expect(run.transcript[3]?.parts).toEqual([
      { type: 'tool-result', callId: 'd1', name: 'pods', content: "collector 'pods' failed: model offline", isError: true },
    ]);
    expect(run.children[0]?.status).toBe('failed');
  });

  it('should reject an empty query without starting the collector', async () => {
    const adapter = new ScriptedAdapter({
      'model-triage': [callTools(toolCall('pods', { query: '  ' }, 'd1')), reply('ok')],
    });

    const run = await runtimeFor(adapter, configuration).run(triage, 'q');

    expect(run.transcript[3]?.parts).toEqual([
      {
        type: 'tool-result',
        callId: 'd1',
        name: 'pods',
        content: "Error: Delegation to 'pods' needs a non-empty string 'query' argument",
        isError: true,
      },
    ]);
    expect(adapter.callsTo('model-pods')).toEqual([]);
    expect(run.children).toEqual([]);
  });

  it('should refuse a collector the agent does not list', async () => {
    const adapter = new ScriptedAdapter({
      'model-triage': [callTools(toolCall('secrets', { query: 'dump' }, 'd1')), reply('ok')],
    });

    const run = await runtimeFor(adapter, configuration).run(triage, 'q');

    expect(run.transcript[3]?.parts).toEqual([
      {
        type: 'tool-result',
        callId: 'd1',
        name: 'secrets',
        content: "Error: Tool 'secrets' is not authorized for 'triage'",
        isError: true,
      },
    ]);
  });

  it('should fail the coordinator when a collector cannot reach its tool server', async () => {
    const withServer = buildConfiguration({
      agents: [triage],
      collectors: [collectorSpec('pods', { toolServers: ['k8s'] }), collectorSpec('nodes')],
      toolServers: [toolServerSpec('k8s')],
    });
    const adapter = new ScriptedAdapter({
      'model-triage': [callTools(toolCall('pods', { query: 'pod health' }, 'd1')), reply('unused')],
    });

    const run = await runtimeFor(adapter, withServer, fakeServers({}, { unreachable: ['k8s'] })).run(triage, 'q');

    expect(run.status).toBe('failed');
    expect(run.error).toBeInstanceOf(ToolInvocationError);
    expect(run.error?.message).toBe("Could not connect to MCP server 'k8s': spawn /usr/local/bin/k8s ENOENT");
    expect(run.numTurns).toBe(1);
    expect(run.children.map((child) => child.status)).toEqual(['failed']);
    expect(adapter.callsTo('model-triage')).toHaveLength(1);
  });

  describe('with a collector that calls a tool server', () => {
    const coordinator = agentSpec('triage', { collectors: ['namespaces'] });
    const withKube = buildConfiguration({
      agents: [coordinator],
      collectors: [collectorSpec('namespaces', { toolServers: ['kube'] })],
      toolServers: [toolServerSpec('kube')],
    });
    const kube = () => fakeServers({ kube: [{ name: 'list', handler: () => 'default\nkube-system' }] });
    const scripts = () =>
      new ScriptedAdapter({
        'model-triage': [
          callTools(toolCall('namespaces', { query: 'list namespaces' }, 'd1')),
          reply('2 namespaces'),
        ],
        'model-namespaces': [callTools(toolCall('mcp__kube__list', {}, 'c1')), reply('default, kube-system')],
      });

    it('should delegate once and make one tool call', async () => {
      const fake = kube();
      const run = await runtimeFor(scripts(), withKube, fake).run(coordinator, 'list namespaces');

      expect(run.status).toBe('completed');
      expect(run.output).toBe('2 namespaces');
      expect(run.children).toHaveLength(1);
      expect(run.children[0]?.transcript[3]?.parts).toEqual([
        { type: 'tool-result', callId: 'c1', name: 'mcp__kube__list', content: 'default\nkube-system', isError: false },
      ]);
      expect(fake.calls).toEqual([{ server: 'kube', tool: 'list', args: {} }]);
      expect(fake.closed).toEqual(['kube']);
    });

    it('should give the same outcome for the same responses', async () => {
      const outcomes: Array<[number, string, number]> = [];
      for (let attempt = 0; attempt < 2; attempt++) {
        const fake = kube();
        const run = await runtimeFor(scripts(), withKube, fake).run(coordinator, 'list namespaces');
        outcomes.push([run.numTurns, run.status, fake.calls.length]);
      }

      expect(outcomes).toEqual([
        [2, 'completed', 1],
        [2, 'completed', 1],
      ]);
    });
  });
});
