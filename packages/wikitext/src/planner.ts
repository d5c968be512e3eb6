import { ConfigError, type SplitBudgets } from "@wikicorpus/core";

export const DEFAULT_VALID_TEST_FRACTION = 0.1;

/** Throws `ConfigError` unless `tokens` is a non-negative safe integer. */
export function checkBudget(tokens: number): void {
  if (!Number.isSafeInteger(tokens) || tokens < 0) {
    throw new ConfigError({ message: `Token budget must be a non-negative integer, got ${tokens}` });
  }
}

/**
 * Divide a total token budget into train/valid/test budgets.
 *
 * valid and test each get `floor(total * fraction)`; train gets the rest, so
 * the three never sum to more than `total`.
 */
export function planSplits(
  totalTokens: number,
  validTestFraction: number = DEFAULT_VALID_TEST_FRACTION,
): SplitBudgets {
  checkBudget(totalTokens);
  if (!(validTestFraction >= 0 && validTestFraction <= 0.5)) {
    throw new ConfigError({ message: `Valid/test fraction must be within [0, 0.5], got ${validTestFraction}` });
  }
  const split = Math.floor(totalTokens * validTestFraction);
  return { train: totalTokens - 2 * split, valid: split, test: split };
}
