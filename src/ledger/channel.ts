import { Block, type BlockData, type BlockRow } from "./block.js";

export const GENESIS_PREVIOUS_HASH = "0";

export type IntegrityReport =
  | { valid: true }
  | { valid: false; index: number; reason: "hash_mismatch" | "link_mismatch" };

/**
 * Append-only hash chain for one topic. Single writer: callers serialize appends.
 */
export class Channel {
  private chain: Block[] = [];

  constructor(
    readonly name: string,
    readonly description: string,
    private clock: () => Date = () => new Date()
  ) {}

  static create(name: string, description: string, clock?: () => Date): Channel {
    const channel = new Channel(name, description, clock);
    channel.chain.push(
      new Block(0, channel.clock().toISOString(), { type: "genesis", channel: name }, GENESIS_PREVIOUS_HASH)
    );
    return channel;
  }

  /** Rebuilds a channel from persisted blocks; stored hashes are kept as-is so tampering stays detectable. */
  static restore(name: string, description: string, blocks: Block[], clock?: () => Date): Channel {
    if (blocks.length === 0) return Channel.create(name, description, clock);
    const channel = new Channel(name, description, clock);
    channel.chain = [...blocks];
    return channel;
  }

  get blocks(): readonly Block[] {
    return this.chain;
  }

  get length(): number {
    return this.chain.length;
  }

  get latest(): Block | undefined {
    return this.chain[this.chain.length - 1];
  }

  /** Builds the block that would follow the current tip, without appending it. */
  nextBlock(data: BlockData): Block {
    return new Block(this.chain.length, this.clock().toISOString(), data, this.latest?.hash ?? GENESIS_PREVIOUS_HASH);
  }

  /** Appends a block built by `nextBlock`; throws when it no longer follows the tip. */
  append(block: Block): Block {
    if (block.index !== this.chain.length || block.previousHash !== (this.latest?.hash ?? GENESIS_PREVIOUS_HASH)) {
      throw new Error(`Block #${block.index} does not extend channel ${this.name}`);
    }
    this.chain.push(block);
    return block;
  }

  addData(data: BlockData): Block {
    return this.append(this.nextBlock(data));
  }

  verifyIntegrityDetailed(): IntegrityReport {
    for (let i = 1; i < this.chain.length; i++) {
      const current = this.chain[i];
      const previous = this.chain[i - 1];
      if (current.hash !== current.calculateHash()) {
        return { valid: false, index: i, reason: "hash_mismatch" };
      }
      if (current.previousHash !== previous.hash) {
        return { valid: false, index: i, reason: "link_mismatch" };
      }
    }
    return { valid: true };
  }

  verifyIntegrity(): boolean {
    return this.verifyIntegrityDetailed().valid;
  }

  toRows(): BlockRow[] {
    return this.chain.map(block => block.toRow());
  }
}
