import type { AssertionConfig } from "../types/index.js";

/**
 * Merge assertion lists from project -> suite -> turn.
 * Lists accumulate: every level's assertions run, in level order.
 */
export function mergeAssertions(
  ...levels: (readonly AssertionConfig[] | undefined)[]
): AssertionConfig[] {
  const merged: AssertionConfig[] = [];
  for (const level of levels) {
    if (level) {
      merged.push(...level);
    }
  }
  return merged;
}
