import { Logger } from "winston";
import {
  ChainBlock,
  ChainReader,
  RetryPolicy,
  TransactionReceiptInfo,
} from "../utils/types/chain.types";
import { retryWithBackoff, Sleep } from "../utils/retry";

/**
 * Decorates a ChainReader with a per-call timeout and exponential backoff.
 */
export default class ResilientChainReader implements ChainReader {
  constructor(
    private inner: ChainReader,
    private policy: RetryPolicy,
    private logger: Logger,
    private sleep?: Sleep
  ) {}

  getBlock(height: number): Promise<ChainBlock> {
    return this.call(`getBlock(${height})`, () => this.inner.getBlock(height));
  }

  getTransactionReceipt(hash: string): Promise<TransactionReceiptInfo> {
    return this.call(`getTransactionReceipt(${hash})`, () =>
      this.inner.getTransactionReceipt(hash)
    );
  }

  getChainHeadHeight(): Promise<number> {
    return this.call("getChainHeadHeight", () => this.inner.getChainHeadHeight());
  }

  getSyncStatus(): Promise<boolean> {
    return this.call("getSyncStatus", () => this.inner.getSyncStatus());
  }

  private call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    return retryWithBackoff(operation, this.policy, run, {
      sleep: this.sleep,
      onRetry: (attempt, delayMs, error) => {
        this.logger.warn("Retrying RPC call", {
          operation,
          attempt,
          maxRetries: this.policy.maxRetries,
          delayMs,
          error,
        });
      },
    });
  }
}
