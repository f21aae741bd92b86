import {
  checkContinuity,
  computeRollbackWindow,
} from "../../src/services/reorg-detector.service";
import { blockHash } from "../support/chain";

describe("checkContinuity", () => {
  it("accepts a block whose parent is the last seen hash", () => {
    expect(checkContinuity(blockHash(9), { parentHash: blockHash(9) })).toEqual({
      kind: "linked",
    });
  });

  it("compares hashes case-insensitively", () => {
    const hash = "0xABCDEF" + "0".repeat(58);

    expect(checkContinuity(hash, { parentHash: hash.toLowerCase() })).toEqual({
      kind: "linked",
    });
  });

  it("reports a fork with both hashes", () => {
    expect(checkContinuity(blockHash(9), { parentHash: blockHash(9, "b") })).toEqual({
      kind: "fork",
      expectedParent: blockHash(9),
      actualParent: blockHash(9, "b"),
    });
  });

  it("cannot judge a block without a recorded predecessor", () => {
    expect(checkContinuity(null, { parentHash: blockHash(9) })).toEqual({
      kind: "unknown-parent",
    });
  });
});

describe("computeRollbackWindow", () => {
  it("covers the reorg depth below the last indexed block", () => {
    expect(computeRollbackWindow(105, 3, 100)).toEqual({ begin: 102, end: 105 });
  });

  it("never goes below the start height", () => {
    expect(computeRollbackWindow(102, 10, 100)).toEqual({ begin: 100, end: 102 });
  });
});
