import pino from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

const LOG_DIR = process.env['LOG_DIR'];

if (LOG_DIR && !existsSync(LOG_DIR)) {
  mkdirSync(LOG_DIR, { recursive: true });
}

// Interpolated secrets live under these keys; raw values never reach a log line.
const REDACT_PATHS = [
  'api_key',
  'apiKey',
  'env',
  'headers',
  '*.api_key',
  '*.apiKey',
  '*.env',
  '*.headers',
];

function createLogger(name: string): pino.Logger {
  const options: pino.LoggerOptions = {
    name,
    level: process.env['LOG_LEVEL'] ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  };

  if (!LOG_DIR) {
    return pino(options);
  }

  return pino(
    options,
    pino.destination({
      dest: join(LOG_DIR, `${name}.log`),
      sync: false,
    })
  );
}

export const serverLogger = createLogger('server');
export const agentLogger = createLogger('agent');
export const configLogger = createLogger('config');
export const mcpLogger = createLogger('mcp');

export function setupErrorHandlers(logger: pino.Logger): void {
  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    // Give time for log to flush
    setTimeout(() => process.exit(1), 100);
  });

  process.on('unhandledRejection', (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ error: error.message, stack: error.stack }, 'Unhandled rejection');
  });
}
