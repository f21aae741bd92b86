import {
  Block,
  JsonRpcApiProvider,
  TransactionResponse,
} from "ethers";
import { Logger } from "winston";
import {
  ChainBlock,
  ChainReader,
  RawTransaction,
  TransactionReceiptInfo,
} from "../utils/types/chain.types";

function toRawTransaction(tx: TransactionResponse): RawTransaction {
  return {
    hash: tx.hash,
    from: tx.from,
    to: tx.to,
    value: tx.value,
    gasPrice: tx.gasPrice,
    input: tx.data,
    blockNumber: tx.blockNumber ?? 0,
  };
}

function toChainBlock(block: Block): ChainBlock {
  if (!block.hash) {
    throw new Error(`Block ${block.number} has no hash (pending block)`);
  }

  return {
    number: block.number,
    hash: block.hash,
    parentHash: block.parentHash,
    timestamp: block.timestamp,
    transactions: block.prefetchedTransactions.map(toRawTransaction),
  };
}

/**
 * ChainReader backed by an ethers v6 JSON-RPC provider (http, ws or IPC).
 */
export default class EthersChainReader implements ChainReader {
  constructor(private provider: JsonRpcApiProvider, private logger: Logger) {}

  async getBlock(height: number): Promise<ChainBlock> {
    const block = await this.provider.getBlock(height, true);
    if (!block) {
      throw new Error(`Block ${height} not found`);
    }

    this.logger.debug("Retrieved block with transactions", {
      blockNumber: height,
      transactionCount: block.prefetchedTransactions.length,
    });
    return toChainBlock(block);
  }

  async getTransactionReceipt(hash: string): Promise<TransactionReceiptInfo> {
    const receipt = await this.provider.getTransactionReceipt(hash);
    if (!receipt) {
      throw new Error(`Receipt for ${hash} not found`);
    }

    return {
      gasUsed: receipt.gasUsed,
      status: receipt.status === null ? null : receipt.status === 1,
    };
  }

  async getChainHeadHeight(): Promise<number> {
    return this.provider.getBlockNumber();
  }

  /**
   * eth_syncing answers false once the node is in sync, or an object with
   * progress fields while it is still catching up.
   */
  async getSyncStatus(): Promise<boolean> {
    const result: unknown = await this.provider.send("eth_syncing", []);
    return result !== false && result !== null;
  }

  destroy(): void {
    this.provider.destroy();
  }
}
