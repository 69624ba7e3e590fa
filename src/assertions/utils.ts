/**
 * Stringify a tool result or argument value for matching.
 * Absent values become the empty string so pattern checks never see a placeholder.
 */
export function stringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  return JSON.stringify(value) ?? "";
}

/**
 * Parse a pattern string into regex and flags
 * Supports /pattern/flags syntax for flags (e.g., /hello/i for case insensitive).
 * The stateful g and y flags are dropped: a compiled pattern is reused across values.
 */
export function parsePattern(pattern: string): RegExp {
  const match = pattern.match(/^\/(.+)\/([gimsuy]*)$/);
  if (match) {
    return new RegExp(match[1], match[2].replace(/[gy]/g, ""));
  }
  return new RegExp(pattern);
}

export type CompiledPattern =
  | { ok: true; regex: RegExp }
  | { ok: false; error: string };

/**
 * Compile a pattern without throwing; an invalid expression is reported as an error value
 */
export function compilePattern(pattern: string): CompiledPattern {
  try {
    return { ok: true, regex: parsePattern(pattern) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Case-insensitive substring check; returns the patterns not found in text
 */
export function missingSubstrings(text: string, patterns: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return patterns.filter((p) => !lower.includes(p.toLowerCase()));
}

/**
 * Resolve a dot-notation path ("user.address.city") inside an object.
 * A key that itself contains dots wins over the nested path.
 */
export function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  if (Object.hasOwn(obj, path)) {
    return obj[path];
  }

  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (Array.isArray(current)) {
      current = current[Number(part)];
    } else if (isPlainObject(current) && Object.hasOwn(current, part)) {
      current = current[part];
    } else {
      return undefined;
    }
  }

  return current;
}

/**
 * Normalize a value to an array
 */
export function normalizeToArray(value: string | string[] | undefined): string[] {
  if (!value) return [];
  return Array.isArray(value) ? value : [value];
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
