/**
 * A tool result as it arrives in a tool message, before it is paired with a call
 */
export interface IncomingToolResult {
  id: string;
  name: string;
  content: string;
  error: string;
  latencyMs: number;
}

/**
 * Capabilities a call record exposes so one matching routine serves every record kind
 */
export interface ResultTarget<T> {
  id(entry: T): string;
  name(entry: T): string;
  isResolved(entry: T): boolean;
  apply(entry: T, result: IncomingToolResult): void;
}

/**
 * Pair a result with the first unresolved entry that it belongs to.
 *
 * A result carrying an ID only ever resolves an entry with the same ID; there is
 * no fallback to name matching when no ID matches. Results without an ID resolve
 * the first unresolved entry with the same tool name, so parallel un-IDed calls
 * to one tool are paired in call order.
 *
 * @returns the entry that was resolved, or undefined when the result was discarded
 */
export function matchResult<T>(
  entries: readonly T[],
  result: IncomingToolResult,
  target: ResultTarget<T>
): T | undefined {
  const matches =
    result.id !== ''
      ? (entry: T) => target.id(entry) === result.id
      : (entry: T) => target.name(entry) === result.name;

  const entry = entries.find((e) => !target.isResolved(e) && matches(e));
  if (entry !== undefined) {
    target.apply(entry, result);
  }
  return entry;
}
