/**
 * Response Formatter
 *
 * Turns a coordinator's final text into the body a caller receives. Agents
 * without a response schema return their text as-is. With a schema, the text
 * is parsed into an object (fenced JSON block, then bare JSON, then
 * `**field**: value` markdown), validated with ajv and rendered either as
 * JSON (`machine`) or as markdown (`human`). Missing fields are reported,
 * never filled in.
 *
 * Dependencies:
 * - ajv: JSON Schema validation
 */
import type { ResponseSchema } from '../config/model.js';
import type { ResponseFormat } from '../config/schema.js';
import { SchemaValidationError, type SchemaIssue } from '../errors.js';
import { isRecord } from '../llm/types.js';
import { createAjv, type ErrorObject, type ValidateFunction } from './ajv.js';

export const CONTENT_TYPES = {
  text: 'text/plain; charset=utf-8',
  machine: 'application/json',
  human: 'text/markdown; charset=utf-8',
} as const;

const ROOT_FIELD = '(root)';

export interface FormattedResponse {
  contentType: string;
  body: string;
  data?: Record<string, unknown>;
}

export function contentTypeFor(mode?: ResponseFormat): string {
  return mode ? CONTENT_TYPES[mode] : CONTENT_TYPES.text;
}

const validators = new WeakMap<ResponseSchema, ValidateFunction>();

function validatorFor(schema: ResponseSchema): ValidateFunction {
  let validate = validators.get(schema);
  if (!validate) {
    validate = createAjv().compile({ ...schema.document });
    validators.set(schema, validate);
  }
  return validate;
}

function requiredFields(document: Readonly<Record<string, unknown>>): string[] {
  const required = document['required'];
  return Array.isArray(required) ? required.filter((field): field is string => typeof field === 'string') : [];
}

function propertyType(document: Readonly<Record<string, unknown>>, field: string): unknown {
  const properties = document['properties'];
  if (!isRecord(properties)) return undefined;
  const property = properties[field];
  return isRecord(property) ? property['type'] : undefined;
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function titleCase(field: string): string {
  return field
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function coerceScalar(value: string, type: unknown): unknown {
  if ((type === 'number' || type === 'integer') && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  if (type === 'boolean' && (value === 'true' || value === 'false')) {
    return value === 'true';
  }
  return value;
}

/**
 * Reads `**field**: value` lines, and `**field**:` followed by `- item`
 * bullets for array fields. The label may be the field name or its title-case
 * form. Only fields the schema requires are looked up.
 */
export function parseMarkdownFields(
  text: string,
  document: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const field of requiredFields(document)) {
    const label = `(?:${escapeRegExp(field)}|${escapeRegExp(titleCase(field))})`;
    const type = propertyType(document, field);

    if (type === 'array') {
      const match = new RegExp(`\\*\\*${label}\\*\\*:[ \\t]*\\n((?:[ \\t]*-[ \\t]*[^\\n]+\\n?)+)`, 'i').exec(text);
      const bullets = match?.[1];
      if (bullets) {
        result[field] = [...bullets.matchAll(/-[ \t]*`?([^`\n]+)`?/g)]
          .map((bullet) => (bullet[1] ?? '').trim())
          .filter((item) => item !== '');
      }
    } else {
      const match = new RegExp(`\\*\\*${label}\\*\\*:[ \\t]*\`?([^\`\\n]+)\`?`, 'i').exec(text);
      const value = match?.[1]?.trim();
      if (value) {
        result[field] = coerceScalar(value, type);
      }
    }
  }

  return result;
}

/**
 * Extracts an object from model text: a fenced ```json block, else the whole
 * text as JSON, else markdown fields when the schema requires any. Returns
 * undefined when nothing usable is found.
 */
export function parseStructuredResponse(
  text: string,
  document?: Readonly<Record<string, unknown>>
): Record<string, unknown> | undefined {
  const block = /```json\s*([\s\S]*?)\s*```/.exec(text)?.[1];
  if (block !== undefined) {
    const parsed = parseJsonObject(block);
    if (parsed) return parsed;
  }

  const direct = parseJsonObject(text.trim());
  if (direct) return direct;

  if (document && requiredFields(document).length > 0) {
    return parseMarkdownFields(text, document);
  }
  return undefined;
}

function issueFromAjv(error: ErrorObject): SchemaIssue {
  const path = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
  if (error.keyword === 'required' && typeof error.params['missingProperty'] === 'string') {
    const missing = error.params['missingProperty'];
    return { field: path ? `${path}.${missing}` : missing, message: 'missing required field' };
  }
  return { field: path || ROOT_FIELD, message: error.message ?? 'is invalid' };
}

export function validateResponse(data: Record<string, unknown>, schema: ResponseSchema): SchemaIssue[] {
  const validate = validatorFor(schema);
  if (validate(data)) return [];
  return (validate.errors ?? []).map(issueFromAjv);
}

function renderValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

export function formatHuman(data: Record<string, unknown>): string {
  const lines: string[] = [];

  for (const [field, value] of Object.entries(data)) {
    const label = titleCase(field);

    if (Array.isArray(value)) {
      lines.push(`**${label}**:`);
      for (const item of value) {
        lines.push(`  - ${renderValue(item)}`);
      }
    } else if (isRecord(value)) {
      lines.push(`**${label}**:`);
      for (const [key, item] of Object.entries(value)) {
        lines.push(`  - ${titleCase(key)}: ${renderValue(item)}`);
      }
    } else {
      lines.push(`**${label}**: ${renderValue(value)}`);
    }

    lines.push('');
  }

  return lines.join('\n').trim();
}

export function formatMachine(data: Record<string, unknown>): string {
  return JSON.stringify(data, null, 2);
}

export function formatResponse(rawText: string, schema?: ResponseSchema): FormattedResponse {
  if (!schema) {
    return { contentType: contentTypeFor(), body: rawText };
  }

  const data = parseStructuredResponse(rawText, schema.document);
  if (!data) {
    const required = requiredFields(schema.document);
    throw new SchemaValidationError(
      schema.id,
      required.length > 0
        ? required.map((field) => ({ field, message: 'missing required field' }))
        : [{ field: ROOT_FIELD, message: 'response does not contain a JSON object' }]
    );
  }

  const issues = validateResponse(data, schema);
  if (issues.length > 0) {
    throw new SchemaValidationError(schema.id, issues);
  }

  const body = schema.mode === 'machine' ? formatMachine(data) : formatHuman(data);
  return { contentType: contentTypeFor(schema.mode), body, data };
}
