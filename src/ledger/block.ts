import { createHash } from "node:crypto";
import { canonicalJson } from "./canonicalJson.js";
import { isRecord } from "../utils/isRecord.js";

export type BlockData = Record<string, unknown>;

export interface BlockRow {
  index: number;
  timestamp: string;
  data: BlockData;
  previous_hash: string;
  hash: string;
}

export function calculateBlockHash(index: number, timestamp: string, data: BlockData, previousHash: string): string {
  const payload = canonicalJson({ index, timestamp, data, previous_hash: previousHash });
  return createHash("sha256").update(payload, "utf8").digest("hex");
}

/** Detached copy of a payload in the exact form that gets hashed. */
export function snapshotBlockData(data: BlockData): BlockData {
  const copy: unknown = JSON.parse(canonicalJson(data));
  return isRecord(copy) ? copy : {};
}

export class Block {
  readonly data: BlockData;
  readonly hash: string;

  constructor(
    readonly index: number,
    readonly timestamp: string,
    data: BlockData,
    readonly previousHash: string,
    hash?: string
  ) {
    // Never share payload objects with the caller
    this.data = snapshotBlockData(data);
    this.hash = hash ?? this.calculateHash();
  }

  calculateHash(): string {
    return calculateBlockHash(this.index, this.timestamp, this.data, this.previousHash);
  }

  toRow(): BlockRow {
    return {
      index: this.index,
      timestamp: this.timestamp,
      data: this.data,
      previous_hash: this.previousHash,
      hash: this.hash,
    };
  }
}
