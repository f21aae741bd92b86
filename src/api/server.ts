import express, { Request, Response } from "express";
import cors from "cors";
import { json } from "body-parser";
import { isAddress } from "ethers";
import { LedgerStore, StoredRecord } from "../utils/types/ledger.types";
import { SyncStatus } from "../utils/types/sync.types";
import { evaluateHealth } from "../services/health-check.service";

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 1000;

/** The part of the sync engine the API drives. */
export interface SyncControl {
  getStatus(): SyncStatus;
  pause(): void;
  resume(): void;
  requestRewind(blocks: number): void;
}

export interface ApiDependencies {
  engine: SyncControl;
  store: Pick<LedgerStore, "findByAddress">;
  stallThresholdMs: number;
  now?: () => Date;
}

function parseNonNegativeInt(raw: unknown, fallback: number): number | null {
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) {
    return null;
  }
  return Number(raw);
}

function serializeRecord(record: StoredRecord) {
  return {
    time: record.time.toISOString(),
    txfrom: record.fromAddr,
    txto: record.toAddr,
    value: record.value,
    gas: record.gas,
    gasprice: record.gasPrice,
    block: record.block,
    txhash: record.txHash,
    contract_to: record.contractTo,
    contract_value: record.contractValue,
    status: record.status,
  };
}

/**
 * Setup API server
 */
export function createApiServer(deps: ApiDependencies): express.Application {
  const app = express();
  const now = deps.now ?? (() => new Date());

  app.use(cors());
  app.use(json());

  app.get("/health", (_req: Request, res: Response) => {
    const sync = deps.engine.getStatus();
    const report = evaluateHealth(sync, now(), deps.stallThresholdMs);

    res.status(report.status === "UP" ? 200 : 503).json({
      status: report.status,
      reasons: report.reasons,
      timestamp: now().toISOString(),
      sync,
    });
  });

  app.get("/api/sync/status", (_req: Request, res: Response) => {
    res.json(deps.engine.getStatus());
  });

  app.post("/api/sync/pause", (_req: Request, res: Response) => {
    deps.engine.pause();
    res.json({ message: "Sync engine paused" });
  });

  app.post("/api/sync/resume", (_req: Request, res: Response) => {
    deps.engine.resume();
    res.json({ message: "Sync engine resumed" });
  });

  app.post("/api/sync/rewind", (req: Request, res: Response) => {
    const blocks: unknown = req.body?.blocks;

    if (typeof blocks !== "number" || !Number.isInteger(blocks) || blocks <= 0) {
      return res.status(400).json({
        error: "blocks must be a positive integer",
      });
    }

    deps.engine.requestRewind(blocks);
    return res.status(202).json({
      message: `Rewind of ${blocks} blocks scheduled for the next cycle`,
      blocks,
    });
  });

  app.get(
    "/api/transactions/:address",
    async (req: Request, res: Response) => {
      const { address } = req.params;

      if (!isAddress(address)) {
        return res.status(400).json({ error: `Invalid address: ${address}` });
      }

      const limit = parseNonNegativeInt(req.query.limit, DEFAULT_PAGE_SIZE);
      const offset = parseNonNegativeInt(req.query.offset, 0);
      if (limit === null || offset === null || limit === 0) {
        return res.status(400).json({
          error: "limit must be a positive integer and offset a non-negative integer",
        });
      }

      try {
        const records = await deps.store.findByAddress(address, {
          limit: Math.min(limit, MAX_PAGE_SIZE),
          offset,
        });
        return res.json({
          address,
          count: records.length,
          transactions: records.map(serializeRecord),
        });
      } catch (error) {
        return res.status(500).json({
          error: error instanceof Error ? error.message : "Query failed",
        });
      }
    }
  );

  return app;
}
