import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';

// ajv ships CommonJS; under NodeNext the default import is the module object.
const Ajv = AjvModule.default;

export type { ErrorObject, ValidateFunction };

export function createAjv() {
  return new Ajv({ allErrors: true, strict: false });
}

/**
 * Compiles a JSON Schema document. Returns the compile error message instead
 * of throwing so the loader can collect it with its other issues.
 */
export function compileSchema(
  document: Record<string, unknown>
): { ok: true; validate: ValidateFunction } | { ok: false; error: string } {
  try {
    return { ok: true, validate: createAjv().compile(document) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
