#!/usr/bin/env node
import { program } from 'commander';
import { InvestigationService } from './agents/investigation.js';
import { collectVariable, parseTimeoutSeconds } from './cli/options.js';
import { getConfiguration, loadConfiguration, resolveConfigPath } from './config/loader.js';
import { ConfigValidationError, toErrorMessage, toFathomError } from './errors.js';
import { createModelAdapter } from './llm/index.js';
import { startServer } from './server/index.js';
import { serverLogger, setupErrorHandlers } from './utils/logger.js';
import { VERSION } from './version.js';

function fail(error: unknown): never {
  if (error instanceof ConfigValidationError) {
    console.error(error.message);
  } else {
    const fathomError = toFathomError(error);
    console.error(`${fathomError.code}: ${fathomError.message}`);
  }
  process.exit(1);
}

program
  .name('fathom')
  .description('Bounded multi-agent investigations over MCP tool servers')
  .version(VERSION);

program
  .command('serve')
  .description('Start the Fathom API server')
  .option('-p, --port <number>', 'Port to listen on', process.env['PORT'] ?? '8000')
  .option('-c, --config <path>', 'Configuration file')
  .action((options: { port: string; config?: string }) => {
    setupErrorHandlers(serverLogger);
    try {
      const configuration = getConfiguration(options.config);
      startServer(parseInt(options.port, 10), {
        configuration,
        adapter: createModelAdapter(configuration.provider),
      });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('validate')
  .description('Check a configuration file and list every problem found')
  .option('-c, --config <path>', 'Configuration file')
  .action((options: { config?: string }) => {
    try {
      const configuration = loadConfiguration(resolveConfigPath(options.config));
      console.log(
        `${configuration.source} is valid: ${configuration.agents.size} agents, ` +
          `${configuration.collectors.size} subagents, ${configuration.toolServers.size} MCP servers`
      );
    } catch (error) {
      fail(error);
    }
  });

program
  .command('agents')
  .description('List configured agents')
  .option('-c, --config <path>', 'Configuration file')
  .action((options: { config?: string }) => {
    try {
      const configuration = getConfiguration(options.config);
      for (const agent of configuration.agents.values()) {
        const marker = agent.id === configuration.defaultAgent ? ' (default)' : '';
        console.log(`${agent.id}${marker}: ${agent.description}`);
        if (agent.collectors.length > 0) {
          console.log(`  subagents: ${agent.collectors.join(', ')}`);
        }
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('ask')
  .description('Run one investigation and print the result')
  .argument('<query>', 'Question to investigate')
  .option('-a, --agent <name>', 'Agent to run')
  .option('-c, --config <path>', 'Configuration file')
  .option('--var <key=value>', 'Request variable (repeatable)', collectVariable, {})
  .option('-t, --timeout <seconds>', 'Time budget override', parseTimeoutSeconds)
  .action(
    async (
      query: string,
      options: { agent?: string; config?: string; var: Record<string, string>; timeout?: number }
    ) => {
      try {
        const configuration = getConfiguration(options.config);
        const service = new InvestigationService({
          configuration,
          adapter: createModelAdapter(configuration.provider),
        });
        const result = await service.investigate({
          query,
          ...(options.agent ? { agent: options.agent } : {}),
          variables: options.var,
          ...(options.timeout ? { timeoutSeconds: options.timeout } : {}),
        });
        console.log(result.body);
        console.error(
          `[${result.agent}] ${result.metrics.numTurns} turns, ${result.metrics.usage.totalTokens} tokens, ` +
            `$${result.metrics.totalCostUsd.toFixed(4)}, ${result.metrics.durationMs}ms`
        );
      } catch (error) {
        fail(error);
      }
    }
  );

program.parseAsync().catch((error: unknown) => {
  console.error(toErrorMessage(error));
  process.exit(1);
});
