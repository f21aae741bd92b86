import { Logger } from "winston";
import { ChainReader } from "../utils/types/chain.types";
import { Sleep } from "../utils/retry";

export interface ReadinessOptions {
  backoffMs: number;
  sleep: Sleep;
  /** checked between waits; returning true aborts the gate */
  isCancelled?: () => boolean;
}

/**
 * Blocks until the node reports it is no longer syncing. A failed status
 * query counts as "not ready yet". Returns the number of waits performed.
 */
export async function waitForNodeSync(
  reader: Pick<ChainReader, "getSyncStatus">,
  logger: Logger,
  options: ReadinessOptions
): Promise<number> {
  let waits = 0;

  for (;;) {
    if (options.isCancelled?.()) {
      return waits;
    }

    let syncing: boolean;
    try {
      syncing = await reader.getSyncStatus();
    } catch (error) {
      logger.error("Could not query node sync status", { error });
      syncing = true;
    }

    if (!syncing) {
      logger.info("Ethereum node is synced");
      return waits;
    }

    logger.info("Waiting for Ethereum node to be in sync", {
      retryInMs: options.backoffMs,
    });
    waits++;
    await options.sleep(options.backoffMs);
  }
}
