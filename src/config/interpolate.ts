import type { AssertionConfig } from '../types/index.js';

export type Variables = Record<string, string>;

/**
 * Interpolate ${VAR} and ${ENV.NAME} in a string
 */
export function interpolate(template: string, vars: Variables): string {
  return template.replace(
    /\$\{(ENV\.)?(\w+)\}/g,
    (_match: string, isEnv: string | undefined, name: string) => {
      if (isEnv) {
        return process.env[name] ?? '';
      }
      return vars[name] ?? '';
    }
  );
}

/**
 * Interpolate all string values in an object, recursing into arrays and objects
 */
export function interpolateObject(
  obj: object,
  vars: Variables
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = interpolateValue(value, vars);
  }
  return result;
}

function interpolateValue(value: unknown, vars: Variables): unknown {
  if (typeof value === 'string') {
    return interpolate(value, vars);
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateValue(item, vars));
  }
  if (typeof value === 'object' && value !== null) {
    return interpolateObject(value, vars);
  }
  return value;
}

/**
 * Resolve placeholders in assertion params. Types and messages are left as written.
 */
export function interpolateAssertions(
  assertions: readonly AssertionConfig[],
  vars: Variables
): AssertionConfig[] {
  return assertions.map((assertion) => ({
    ...assertion,
    params: interpolateObject(assertion.params, vars),
  }));
}
