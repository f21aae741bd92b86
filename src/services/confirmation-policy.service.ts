/**
 * Highest height considered final enough to index.
 * A head below the confirmation depth yields 0; the caller compares it
 * against its own cursor and simply makes no progress.
 */
export function computeSafeHead(chainHead: number, confirmations: number): number {
  if (!Number.isInteger(confirmations) || confirmations < 0) {
    throw new RangeError(
      `Confirmation depth must be a non-negative integer, got ${confirmations}`
    );
  }
  if (!Number.isInteger(chainHead) || chainHead < 0) {
    throw new RangeError(`Chain head must be a non-negative integer, got ${chainHead}`);
  }
  return Math.max(0, chainHead - confirmations);
}
