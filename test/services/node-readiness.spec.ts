import { waitForNodeSync } from "../../src/services/node-readiness.service";
import { FakeChainReader } from "../support/chain";
import { silentLogger } from "../support/runtime";

describe("waitForNodeSync", () => {
  const logger = silentLogger();

  it("returns at once when the node is not syncing", async () => {
    const reader = new FakeChainReader();
    const sleep = jest.fn(async (_ms: number) => undefined);

    await expect(waitForNodeSync(reader, logger, { backoffMs: 300000, sleep })).resolves.toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("sleeps the backoff between checks while the node syncs", async () => {
    const reader = new FakeChainReader();
    reader.syncing = [true, true, false];
    const sleep = jest.fn(async (_ms: number) => undefined);

    await expect(waitForNodeSync(reader, logger, { backoffMs: 300000, sleep })).resolves.toBe(2);
    expect(sleep.mock.calls).toEqual([[300000], [300000]]);
  });

  it("treats a failed status query as still syncing", async () => {
    const reader = new FakeChainReader();
    jest
      .spyOn(reader, "getSyncStatus")
      .mockRejectedValueOnce(new Error("connection refused"))
      .mockResolvedValueOnce(false);
    const sleep = jest.fn(async (_ms: number) => undefined);

    await expect(waitForNodeSync(reader, logger, { backoffMs: 1000, sleep })).resolves.toBe(1);
  });

  it("stops waiting once cancelled", async () => {
    const reader = new FakeChainReader();
    reader.syncing = [true, true, true];
    let cancelled = false;
    const sleep = jest.fn(async (_ms: number) => {
      cancelled = true;
    });

    await expect(
      waitForNodeSync(reader, logger, {
        backoffMs: 1000,
        sleep,
        isCancelled: () => cancelled,
      })
    ).resolves.toBe(1);
    expect(reader.syncing).toEqual([true, true]);
  });
});
