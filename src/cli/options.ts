/**
 * Argument parsers for the `fathom` command line. Commander reports an
 * `InvalidArgumentError` against the option that produced it.
 */
import { InvalidArgumentError } from 'commander';
import { MAX_TIMEOUT_SECONDS } from '../agents/investigation.js';

export function collectVariable(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Variables take the form key=value, got '${value}'`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!/^\d+$/.test(value.trim()) || seconds < 1 || seconds > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Expected whole seconds between 1 and ${MAX_TIMEOUT_SECONDS}, got '${value}'`);
  }
  return seconds;
}
