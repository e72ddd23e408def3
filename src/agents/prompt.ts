/**
 * Instruction templating. `${name}` and `$name` are filled from the bound
 * variables, `$$` is a literal dollar, and unknown placeholders are left
 * untouched so the model still sees them.
 */
const PLACEHOLDER_PATTERN = /\$(?:(\$)|\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

export function renderInstruction(
  template: string,
  variables: Readonly<Record<string, string>>
): string {
  return template.replace(
    PLACEHOLDER_PATTERN,
    (match, escaped: string | undefined, braced: string | undefined, bare: string | undefined) => {
      if (escaped) return '$';
      const name = braced ?? bare;
      if (name !== undefined && Object.hasOwn(variables, name)) {
        return variables[name] ?? match;
      }
      return match;
    }
  );
}

/**
 * Static prompt variables, overridden by request variables the runnable
 * allows. Anything not on the allow-list is dropped.
 */
export function bindVariables(
  promptVariables: Readonly<Record<string, string>>,
  allowed: readonly string[],
  requestVariables: Readonly<Record<string, string>> = {}
): Record<string, string> {
  const bound: Record<string, string> = { ...promptVariables };
  for (const key of allowed) {
    const value = requestVariables[key];
    if (value !== undefined) {
      bound[key] = value;
    }
  }
  return bound;
}
