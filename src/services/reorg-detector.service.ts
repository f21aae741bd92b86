import { ChainBlock } from "../utils/types/chain.types";

export type ContinuityCheck =
  | { kind: "linked" }
  | { kind: "unknown-parent" }
  | { kind: "fork"; expectedParent: string; actualParent: string };

/**
 * Compares a freshly fetched block against the hash recorded for its
 * predecessor. Without a recorded hash (first block after an empty store)
 * continuity cannot be judged and the block is accepted.
 */
export function checkContinuity(
  lastSeenHash: string | null,
  block: Pick<ChainBlock, "parentHash">
): ContinuityCheck {
  if (lastSeenHash === null) {
    return { kind: "unknown-parent" };
  }
  if (lastSeenHash.toLowerCase() === block.parentHash.toLowerCase()) {
    return { kind: "linked" };
  }
  return {
    kind: "fork",
    expectedParent: lastSeenHash,
    actualParent: block.parentHash,
  };
}

export interface RollbackWindow {
  /** exclusive lower bound */
  begin: number;
  /** inclusive upper bound */
  end: number;
}

/**
 * Range of blocks to delete after a fork is seen above `lastIndexed`.
 * Never rewinds below the configured start height.
 */
export function computeRollbackWindow(
  lastIndexed: number,
  reorgDepth: number,
  startHeight: number
): RollbackWindow {
  return {
    begin: Math.max(startHeight, lastIndexed - reorgDepth),
    end: lastIndexed,
  };
}
