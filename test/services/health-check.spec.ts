import { evaluateHealth } from "../../src/services/health-check.service";
import { SyncState, SyncStatus } from "../../src/utils/types/sync.types";

const now = new Date("2024-06-01T12:00:00Z");
const stallThresholdMs = 600_000;

function status(overrides: Partial<SyncStatus> = {}): SyncStatus {
  return {
    state: SyncState.CATCH_UP,
    isRunning: true,
    isPaused: false,
    lastIndexed: 100,
    lastSeenHash: null,
    chainHead: 110,
    safeHead: 110,
    counters: {
      blocksProcessed: 0,
      recordsStored: 0,
      transactionsSkipped: 0,
      reorgs: 0,
      failedCycles: 0,
    },
    lastProgressAt: new Date("2024-06-01T11:59:00Z"),
    ...overrides,
  };
}

describe("evaluateHealth", () => {
  it("is UP while blocks are being indexed", () => {
    expect(evaluateHealth(status(), now, stallThresholdMs)).toEqual({
      status: "UP",
      reasons: [],
    });
  });

  it("is UP when caught up even without recent progress", () => {
    const caughtUp = status({ lastIndexed: 110, lastProgressAt: null });

    expect(evaluateHealth(caughtUp, now, stallThresholdMs).status).toBe("UP");
  });

  it("degrades when behind with no progress inside the threshold", () => {
    const stalled = status({ lastProgressAt: new Date("2024-06-01T11:40:00Z") });

    expect(evaluateHealth(stalled, now, stallThresholdMs)).toEqual({
      status: "DEGRADED",
      reasons: ["no block indexed within the stall threshold"],
    });
  });

  it("does not report a paused engine as stalled", () => {
    const paused = status({ isPaused: true, lastProgressAt: null });

    expect(evaluateHealth(paused, now, stallThresholdMs).status).toBe("UP");
  });

  it("degrades when the engine is not running", () => {
    const stopped = status({ isRunning: false, lastProgressAt: null });

    expect(evaluateHealth(stopped, now, stallThresholdMs)).toEqual({
      status: "DEGRADED",
      reasons: [
        "sync engine is not running",
        "no block indexed within the stall threshold",
      ],
    });
  });
});
