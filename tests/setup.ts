/**
 * Global Test Setup
 *
 * Silences the pino loggers before any module creates them.
 */
process.env['LOG_LEVEL'] ??= 'silent';
delete process.env['LOG_DIR'];
