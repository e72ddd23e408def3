/**
 * Environment interpolation for configuration values.
 *
 * Supports `${VAR}` (required) and `${VAR:-default}` (falls back to the
 * default when VAR is unset). Applied once, at load time, to every string in
 * the parsed document. Problems are reported by variable name and document
 * path; resolved values are never included.
 */
import type { ConfigIssue } from '../errors.js';

export type Environment = Readonly<Record<string, string | undefined>>;

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export interface InterpolationResult<T> {
  value: T;
  issues: ConfigIssue[];
}

/**
 * Expands variables in one string. A variable that is unset and has no
 * default is left in place (so a later templating pass can fill it) and its
 * name is pushed onto `missing` when one is given.
 */
export function expandString(
  input: string,
  env: Environment,
  missing?: string[]
): string {
  return input.replace(VARIABLE_PATTERN, (match, name: string, fallback: string | undefined) => {
    const value = env[name];
    if (value !== undefined) {
      return value;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    missing?.push(name);
    return match;
  });
}

/**
 * Recursively expands every string in a parsed YAML document. Each
 * required-but-unset variable becomes one issue at its dotted path.
 */
export function interpolateDocument(
  document: unknown,
  env: Environment,
  path = ''
): InterpolationResult<unknown> {
  if (typeof document === 'string') {
    const missing: string[] = [];
    const value = expandString(document, env, missing);
    return {
      value,
      issues: missing.map((name) => ({
        path,
        message: `environment variable \${${name}} is not set and has no default`,
      })),
    };
  }

  if (Array.isArray(document)) {
    const issues: ConfigIssue[] = [];
    const value = document.map((item, index) => {
      const result = interpolateDocument(item, env, `${path}[${index}]`);
      issues.push(...result.issues);
      return result.value;
    });
    return { value, issues };
  }

  if (typeof document === 'object' && document !== null) {
    const issues: ConfigIssue[] = [];
    const value: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(document)) {
      const result = interpolateDocument(item, env, path ? `${path}.${key}` : key);
      issues.push(...result.issues);
      value[key] = result.value;
    }
    return { value, issues };
  }

  return { value: document, issues: [] };
}
