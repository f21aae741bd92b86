import { Logger } from "winston";
import {
  ChainBlock,
  RawTransaction,
  TransactionReceiptInfo,
} from "../utils/types/chain.types";
import { StoredRecord } from "../utils/types/ledger.types";

/** Method id of transfer(address,uint256) */
export const TRANSFER_SELECTOR = "0xa9059cbb";

const SLOT_HEX_LENGTH = 64;
const ADDRESS_HEX_LENGTH = 40;
const ADDRESS_PADDING = "0".repeat(SLOT_HEX_LENGTH - ADDRESS_HEX_LENGTH);

export interface TokenTransfer {
  contractTo: string;
  contractValue: string;
  paddingValid: boolean;
}

export type SkipReason = "zero-value" | "missing-field";

export type DecodeResult =
  | { kind: "record"; record: StoredRecord }
  | { kind: "skip"; reason: SkipReason; detail: string };

/**
 * Parses `transfer(address,uint256)` calldata. Returns null when the input
 * does not carry the selector or is too short to hold both argument slots.
 */
export function parseTokenTransfer(input: string): TokenTransfer | null {
  const data = input.toLowerCase();
  if (!data.startsWith(TRANSFER_SELECTOR)) {
    return null;
  }

  const args = data.slice(TRANSFER_SELECTOR.length);
  if (args.length < SLOT_HEX_LENGTH * 2) {
    return null;
  }

  const addressSlot = args.slice(0, SLOT_HEX_LENGTH);
  const valueSlot = args.slice(SLOT_HEX_LENGTH, SLOT_HEX_LENGTH * 2);

  return {
    contractTo: `0x${addressSlot.slice(SLOT_HEX_LENGTH - ADDRESS_HEX_LENGTH)}`,
    contractValue: valueSlot,
    paddingValid:
      addressSlot.slice(0, SLOT_HEX_LENGTH - ADDRESS_HEX_LENGTH) === ADDRESS_PADDING,
  };
}

/**
 * A transaction that passed screening and only needs its receipt to become
 * a record.
 */
export interface Candidate {
  kind: "candidate";
  tx: RawTransaction;
  from: string;
  to: string | null;
  transfer: TokenTransfer | null;
}

export type Screening = Candidate | Extract<DecodeResult, { kind: "skip" }>;

/**
 * Turns a raw transaction and its receipt into the row persisted in ethtxs,
 * or an explicit skip. Never throws for a single bad transaction.
 *
 * `screen` needs no receipt, so callers fetch receipts for candidates only.
 */
export default class TransactionDecoder {
  constructor(private logger: Logger) {}

  screen(block: Pick<ChainBlock, "number">, tx: RawTransaction): Screening {
    const transfer = this.classify(tx);

    if (tx.value === 0n && !transfer) {
      return {
        kind: "skip",
        reason: "zero-value",
        detail: "zero value and not a token transfer call",
      };
    }

    if (tx.from === undefined) {
      this.logger.error("Cannot get 'from' item from transaction", {
        txHash: tx.hash,
        blockNumber: block.number,
      });
      return { kind: "skip", reason: "missing-field", detail: "from" };
    }

    if (tx.to === undefined) {
      this.logger.error("Cannot get 'to' item from transaction", {
        txHash: tx.hash,
        blockNumber: block.number,
      });
      return { kind: "skip", reason: "missing-field", detail: "to" };
    }

    return { kind: "candidate", tx, from: tx.from, to: tx.to, transfer };
  }

  toRecord(
    block: Pick<ChainBlock, "number" | "timestamp">,
    candidate: Candidate,
    receipt: TransactionReceiptInfo
  ): StoredRecord {
    const { tx, transfer } = candidate;
    return {
      time: new Date(block.timestamp * 1000),
      fromAddr: candidate.from,
      toAddr: candidate.to,
      value: tx.value.toString(),
      gas: receipt.gasUsed.toString(),
      gasPrice: (tx.gasPrice ?? 0n).toString(),
      block: block.number,
      txHash: tx.hash,
      contractTo: transfer?.contractTo ?? "",
      contractValue: transfer?.contractValue ?? "",
      status: receipt.status,
    };
  }

  decode(
    block: Pick<ChainBlock, "number" | "timestamp">,
    tx: RawTransaction,
    receipt: TransactionReceiptInfo
  ): DecodeResult {
    const screening = this.screen(block, tx);
    if (screening.kind === "skip") {
      return screening;
    }
    return { kind: "record", record: this.toRecord(block, screening, receipt) };
  }

  private classify(tx: RawTransaction): TokenTransfer | null {
    const input = tx.input.toLowerCase();
    if (!input.startsWith(TRANSFER_SELECTOR)) {
      return null;
    }

    const transfer = parseTokenTransfer(input);
    if (!transfer) {
      this.logger.warn("Transfer selector with truncated arguments", {
        txHash: tx.hash,
        inputLength: input.length,
      });
      return null;
    }

    if (!transfer.paddingValid) {
      this.logger.warn("Address argument does not have 24 leading zeros", {
        txHash: tx.hash,
        padding: input.slice(
          TRANSFER_SELECTOR.length,
          TRANSFER_SELECTOR.length + ADDRESS_PADDING.length
        ),
      });
    }

    return transfer;
  }
}
