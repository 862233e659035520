import type { Db } from "./db.js";
import { Block, type BlockData } from "./ledger/block.js";
import { canonicalJson } from "./ledger/canonicalJson.js";
import type { AlertRecord } from "./types.js";
import { isRecord } from "./utils/isRecord.js";

/** Durable mirror of ledger blocks and alerts. */
export interface LedgerStore {
  saveBlock(channel: string, block: Block): void;
  loadBlocks(channel: string): Block[];
  saveAlert(alert: AlertRecord): void;
  recentAlerts(limit: number): AlertRecord[];
}

type BlockRowDb = {
  idx: number;
  timestamp: string;
  data: string;
  previous_hash: string;
  hash: string;
};

function parseBlockData(raw: string): BlockData {
  const parsed: unknown = JSON.parse(raw);
  return isRecord(parsed) ? parsed : { value: parsed };
}

function isAlertRecord(value: unknown): value is AlertRecord {
  return isRecord(value) && typeof value.rule === "string" && typeof value.severity === "string";
}

export class SqliteLedgerStore implements LedgerStore {
  private insertBlock;
  private selectBlocks;
  private insertAlert;
  private selectAlerts;

  constructor(private db: Db) {
    this.insertBlock = db.prepare(
      `INSERT INTO blocks (channel, idx, timestamp, data, previous_hash, hash)
       VALUES (@channel, @idx, @timestamp, @data, @previous_hash, @hash)`
    );
    this.selectBlocks = db.prepare(
      "SELECT idx, timestamp, data, previous_hash, hash FROM blocks WHERE channel = ? ORDER BY idx"
    );
    this.insertAlert = db.prepare(
      `INSERT INTO alerts (contract, rule, severity, vehicle_id, payload, created_at)
       VALUES (@contract, @rule, @severity, @vehicle_id, @payload, @created_at)`
    );
    this.selectAlerts = db.prepare("SELECT payload FROM alerts ORDER BY id DESC LIMIT ?");
  }

  saveBlock(channel: string, block: Block): void {
    this.insertBlock.run({
      channel,
      idx: block.index,
      timestamp: block.timestamp,
      data: canonicalJson(block.data),
      previous_hash: block.previousHash,
      hash: block.hash,
    });
  }

  loadBlocks(channel: string): Block[] {
    const rows = this.selectBlocks.all(channel) as BlockRowDb[];
    return rows.map(row => new Block(row.idx, row.timestamp, parseBlockData(row.data), row.previous_hash, row.hash));
  }

  saveAlert(alert: AlertRecord): void {
    this.insertAlert.run({
      contract: "contract" in alert ? alert.contract : null,
      rule: alert.rule,
      severity: alert.severity,
      vehicle_id: "vehicle_id" in alert ? alert.vehicle_id : null,
      payload: JSON.stringify(alert),
      created_at: Date.parse("reported_at" in alert ? alert.reported_at : alert.checked_at),
    });
  }

  /** Most recent alerts, oldest first. */
  recentAlerts(limit: number): AlertRecord[] {
    const rows = this.selectAlerts.all(limit) as { payload: string }[];
    const alerts: AlertRecord[] = [];
    for (const row of rows.reverse()) {
      const parsed: unknown = JSON.parse(row.payload);
      if (isAlertRecord(parsed)) alerts.push(parsed);
    }
    return alerts;
  }
}
