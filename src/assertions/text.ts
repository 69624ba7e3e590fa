import {
  parseParams,
  ContentPatternsParamsSchema,
  ContentMatchesParamsSchema,
} from "./params.js";
import {
  pass,
  fail,
  configError,
  type ValidationResult,
  type Validator,
} from "./types.js";
import { compilePattern, missingSubstrings } from "./utils.js";

function excerpt(text: string): string {
  return text.length > 100 ? `${text.slice(0, 100)}...` : text;
}

abstract class ContentValidator<T> implements Validator {
  abstract readonly type: string;
  protected readonly config: T | undefined;
  protected readonly rejection: ValidationResult | undefined;

  protected constructor(parsed: { ok: true; value: T } | { ok: false; result: ValidationResult }) {
    this.config = parsed.ok ? parsed.value : undefined;
    this.rejection = parsed.ok ? undefined : parsed.result;
  }

  validate(content: string): ValidationResult {
    if (this.config === undefined) {
      return this.rejection ?? configError("invalid_params", "Missing params");
    }
    return this.check(content, this.config);
  }

  protected abstract check(content: string, config: T): ValidationResult;
}

type PatternsConfig = { patterns: string[] };

/**
 * Every pattern must appear in the response (case-insensitive)
 */
export class ContentIncludesValidator extends ContentValidator<PatternsConfig> {
  readonly type = "content_includes";

  constructor(params: Record<string, unknown> = {}) {
    super(parseParams("content_includes", ContentPatternsParamsSchema, params));
  }

  protected check(content: string, { patterns }: PatternsConfig): ValidationResult {
    const missing = missingSubstrings(content, patterns);
    return missing.length === 0
      ? pass({ patterns })
      : fail(`Response is missing: ${missing.join(", ")}`, {
          missing_patterns: missing,
          actual: excerpt(content),
        });
  }
}

/**
 * No pattern may appear in the response (case-insensitive)
 */
export class ContentExcludesValidator extends ContentValidator<PatternsConfig> {
  readonly type = "content_excludes";

  constructor(params: Record<string, unknown> = {}) {
    super(parseParams("content_excludes", ContentPatternsParamsSchema, params));
  }

  protected check(content: string, { patterns }: PatternsConfig): ValidationResult {
    const missing = new Set(missingSubstrings(content, patterns));
    const found = patterns.filter((p) => !missing.has(p));
    return found.length === 0
      ? pass({ patterns })
      : fail(`Response contains forbidden text: ${found.join(", ")}`, {
          found_patterns: found,
          actual: excerpt(content),
        });
  }
}

/**
 * The response must match a regex (/pattern/flags supported)
 */
export class ContentMatchesValidator extends ContentValidator<{ pattern: string }> {
  readonly type = "content_matches";

  constructor(params: Record<string, unknown> = {}) {
    super(parseParams("content_matches", ContentMatchesParamsSchema, params));
  }

  protected check(content: string, { pattern }: { pattern: string }): ValidationResult {
    const compiled = compilePattern(pattern);
    if (!compiled.ok) {
      return configError("invalid_regex", `Invalid pattern /${pattern}/`, {
        pattern,
        reason: compiled.error,
      });
    }
    return compiled.regex.test(content)
      ? pass({ pattern })
      : fail(`Response does not match /${pattern}/`, { pattern, actual: excerpt(content) });
  }
}
