import EventEmitter from "events";
import { config } from "./config.js";
import { Contract } from "./contract.js";
import type { Block, BlockRow } from "./ledger/block.js";
import { Channel } from "./ledger/channel.js";
import type { LedgerStore } from "./ledgerStore.js";
import { normalizeGpsRecord, type GpsRecordInput } from "./sampleAdapter.js";
import type {
  AlertRecord,
  ComplianceResult,
  ComplianceSample,
  GpsAlert,
  Result,
  RuleSet,
  SampleAlert,
  Violation,
} from "./types.js";

export const CHANNEL_DESCRIPTIONS = {
  vehicle: "Vehicle channel: live routes, depot exits and parking times",
  personnel: "Personnel channel: driver and marshaller identity and qualifications",
  schedule: "Schedule channel: ground-handling rosters, flight plans and route planning",
  regulation: "Regulation channel: authority directives and operator manuals",
  flight_info: "Flight info channel: actual arrival/departure times and stands",
  risk: "Risk channel: violation alarms and risk events",
} as const;

export type ChannelName = keyof typeof CHANNEL_DESCRIPTIONS;

export interface PlatformNode {
  nodeId: string;
  nodeType: string;
  organization: string;
}

export const DEFAULT_NODES: PlatformNode[] = [
  { nodeId: "node_1", nodeType: "ground_handler", organization: "Apron Ground Services" },
  { nodeId: "node_2", nodeType: "airline", organization: "Home Carrier Airlines" },
  { nodeId: "node_3", nodeType: "airport", organization: "International Airport Authority" },
  { nodeId: "node_4", nodeType: "regulator", organization: "Regional Civil Aviation Administration" },
];

export const DEFAULT_CONTRACT = "towing_safety";

export const GPS_ALERT_COLUMNS = [
  "vehicle_id",
  "rule",
  "violation",
  "severity",
  "violation_time",
  "sample",
  "checked_at",
] as const;

export interface GpsAlertTable {
  columns: typeof GPS_ALERT_COLUMNS;
  rows: GpsAlert[];
}

export interface ThresholdOverrides {
  speedThresholdKmh?: number;
  distanceThresholdM?: number;
}

export interface PlatformStatistics {
  total_blocks: number;
  blocks_per_channel: Record<string, number>;
  total_violations: number;
  violations_per_contract: Record<string, number>;
  alerts_cached: number;
}

export interface PlatformOptions {
  store?: LedgerStore;
  nodes?: PlatformNode[];
  contracts?: Contract[];
  clock?: () => Date;
  /** Number of persisted alerts reloaded into the cache at startup. */
  alertRestoreLimit?: number;
}

export interface BlockAppended {
  channel: ChannelName;
  block: Block;
}

// Regulator nodes are tagged either in English or with the authority marker used in source data
const REGULATOR_PATTERN = /regulat|监管/i;

function notFound(message: string): { ok: false; error: { kind: "NotFound"; message: string } } {
  return { ok: false, error: { kind: "NotFound", message } };
}

export function isChannelName(name: string): name is ChannelName {
  return Object.prototype.hasOwnProperty.call(CHANNEL_DESCRIPTIONS, name);
}

/**
 * Compliance platform: topic channels, participant nodes, contracts and the alert log.
 * Construct once at startup and pass it to whatever needs it.
 */
export class CompliancePlatform {
  readonly events = new EventEmitter();
  readonly nodes: PlatformNode[];
  private channels: Map<ChannelName, Channel> = new Map();
  private contracts: Map<string, Contract> = new Map();
  private alerts: AlertRecord[] = [];
  private store?: LedgerStore;
  private clock: () => Date;

  constructor(options: PlatformOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.store = options.store;
    this.nodes = options.nodes ?? DEFAULT_NODES.map(node => ({ ...node }));

    for (const [name, description] of Object.entries(CHANNEL_DESCRIPTIONS)) {
      if (!isChannelName(name)) continue;
      this.channels.set(name, this.openChannel(name, description));
    }

    const contracts = options.contracts ?? [new Contract(DEFAULT_CONTRACT, { ...config.towingSafety }, this.clock)];
    for (const contract of contracts) {
      this.contracts.set(contract.name, contract);
    }

    if (this.store) {
      this.alerts = this.store.recentAlerts(options.alertRestoreLimit ?? 1000);
    }

    console.log(`✓ Compliance platform ready: ${this.channels.size} channels, ${this.contracts.size} contracts`);
  }

  private openChannel(name: ChannelName, description: string): Channel {
    const stored = this.store?.loadBlocks(name) ?? [];
    if (stored.length > 0) {
      const channel = Channel.restore(name, description, stored, this.clock);
      if (!channel.verifyIntegrity()) {
        console.warn(`Restored channel ${name} fails integrity verification`);
      }
      return channel;
    }

    const channel = Channel.create(name, description, this.clock);
    for (const block of channel.blocks) this.store?.saveBlock(name, block);
    return channel;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  getChannel(name: string): Channel | undefined {
    return isChannelName(name) ? this.channels.get(name) : undefined;
  }

  listChannels(): { name: ChannelName; description: string; blocks: number }[] {
    return Array.from(this.channels, ([name, channel]) => ({
      name,
      description: channel.description,
      blocks: channel.length,
    }));
  }

  /** Subscribes to new alerts; returns the unsubscribe function. */
  onAlert(listener: (alert: AlertRecord) => void): () => void {
    this.events.on("alert", listener);
    return () => this.events.off("alert", listener);
  }

  onBlock(listener: (event: BlockAppended) => void): () => void {
    this.events.on("block", listener);
    return () => this.events.off("block", listener);
  }

  getContract(name: string): Contract | undefined {
    return this.contracts.get(name);
  }

  listContracts(): { name: string; rules: Readonly<RuleSet>; violations: number }[] {
    return Array.from(this.contracts.values(), contract => ({
      name: contract.name,
      rules: contract.rules,
      violations: contract.violations.length,
    }));
  }

  getNode(nodeId: string): PlatformNode | undefined {
    return this.nodes.find(node => node.nodeId === nodeId);
  }

  /** First node tagged as a regulatory authority, falling back to the last registered node. */
  getRegulatorNode(): PlatformNode | undefined {
    const regulator = this.nodes.find(
      node => REGULATOR_PATTERN.test(node.nodeType) || REGULATOR_PATTERN.test(node.organization)
    );
    return regulator ?? this.nodes[this.nodes.length - 1];
  }

  /**
   * Appends a payload to a channel, stamped with upload time and uploader.
   */
  uploadData(channelName: string, data: Record<string, unknown>, node?: PlatformNode): Result<Block> {
    if (!isChannelName(channelName)) return notFound(`Channel ${channelName} does not exist`);
    const channel = this.channels.get(channelName);
    if (!channel) return notFound(`Channel ${channelName} does not exist`);

    const payload: Record<string, unknown> = { ...data, _uploaded_at: this.now() };
    if (node) {
      payload._uploaded_by = node.nodeId;
      payload._organization = node.organization;
    } else {
      payload._uploaded_by = "anonymous";
    }

    // Persisted before it joins the in-memory chain
    const block = channel.nextBlock(payload);
    this.store?.saveBlock(channelName, block);
    channel.append(block);
    const appended: BlockAppended = { channel: channelName, block };
    this.events.emit("block", appended);
    console.log(`[ledger] channel=${channelName} block#${block.index} uploader=${String(payload._uploaded_by)}`);
    return { ok: true, value: block };
  }

  private recordAlert(alert: AlertRecord): void {
    this.alerts.push(alert);
    this.store?.saveAlert(alert);
    this.events.emit("alert", alert);
  }

  private reportRisk(payload: Record<string, unknown>): void {
    const result = this.uploadData("risk", payload, this.getRegulatorNode());
    if (!result.ok) throw new Error(result.error.message);
  }

  private logViolations(violations: Violation[], vehicleId?: string | null): void {
    const subject = vehicleId ? ` vehicle=${vehicleId}` : "";
    for (const v of violations) {
      console.warn(`⚠️  Violation${subject}: rule=${v.rule} severity=${v.severity} ${v.violation} (${v.timestamp})`);
    }
  }

  /**
   * Checks one sample. Non-compliant samples are written to the risk channel by the
   * regulator node and raise one alert per violation.
   */
  checkCompliance(contractName: string, sample: ComplianceSample | Record<string, unknown>): Result<ComplianceResult> {
    const contract = this.contracts.get(contractName);
    if (!contract) return notFound(`Contract ${contractName} does not exist`);

    const sampleData: Record<string, unknown> = { ...sample };
    const result = contract.checkCompliance(sampleData);

    if (!result.compliant) {
      const reportedAt = this.now();
      this.reportRisk({
        contract: contractName,
        violations: result.violations,
        sample_data: sampleData,
        reported_at: reportedAt,
      });

      for (const v of result.violations) {
        const alert: SampleAlert = {
          contract: contractName,
          rule: v.rule,
          violation: v.violation,
          severity: v.severity,
          violation_time: v.timestamp,
          sample_data: sampleData,
          reported_at: reportedAt,
        };
        this.recordAlert(alert);
      }
      this.logViolations(result.violations);
    }

    return { ok: true, value: result };
  }

  /**
   * Batch check over GPS fixes, in order. Overrides apply to this call only and never
   * touch the contract's stored thresholds.
   */
  runComplianceCheckOnGps(
    fixes: readonly GpsRecordInput[],
    contractName = DEFAULT_CONTRACT,
    overrides: ThresholdOverrides = {},
    maxRecords?: number
  ): Result<GpsAlertTable> {
    const contract = this.contracts.get(contractName);
    if (!contract) return notFound(`Contract ${contractName} does not exist`);

    const rules = contract.withOverrides({
      max_speed: overrides.speedThresholdKmh,
      min_distance: overrides.distanceThresholdM,
    });
    const selected = maxRecords !== undefined && maxRecords > 0 ? fixes.slice(0, maxRecords) : fixes;
    const rows: GpsAlert[] = [];

    for (const input of selected) {
      const { record, sample, vehicleId } = normalizeGpsRecord(input);
      const result = contract.evaluate(sample, rules);
      if (result.compliant) continue;

      const checkedAt = this.now();
      this.reportRisk({
        contract: contractName,
        violations: result.violations,
        sample_meta: { vehicle_record: record, checked_at: checkedAt },
      });

      for (const v of result.violations) {
        const alert: GpsAlert = {
          vehicle_id: vehicleId,
          rule: v.rule,
          violation: v.violation,
          severity: v.severity,
          violation_time: v.timestamp,
          sample: record,
          checked_at: checkedAt,
        };
        this.recordAlert(alert);
        rows.push(alert);
      }
      this.logViolations(result.violations, vehicleId);
    }

    console.log(`GPS compliance check: ${selected.length} records, ${rows.length} alerts`);
    return { ok: true, value: { columns: GPS_ALERT_COLUMNS, rows } };
  }

  updateContractRules(contractName: string, patch: RuleSet): Result<Readonly<RuleSet>> {
    const contract = this.contracts.get(contractName);
    if (!contract) return notFound(`Contract ${contractName} does not exist`);
    const rules = contract.updateRules(patch);
    console.log(`Contract ${contractName} rules updated: ${JSON.stringify(rules)}`);
    return { ok: true, value: rules };
  }

  verifyAllChannels(): Record<string, boolean> {
    const report: Record<string, boolean> = {};
    for (const [name, channel] of this.channels) {
      report[name] = channel.verifyIntegrity();
    }
    return report;
  }

  exportChannel(channelName: string): Result<BlockRow[]> {
    const channel = this.getChannel(channelName);
    if (!channel) return notFound(`Channel ${channelName} does not exist`);
    return { ok: true, value: channel.toRows() };
  }

  /** Most recent `limit` alerts, oldest first. */
  listAlerts(limit = 100): AlertRecord[] {
    if (limit <= 0) return [];
    return this.alerts.slice(-limit);
  }

  getStatistics(): PlatformStatistics {
    const blocksPerChannel: Record<string, number> = {};
    let totalBlocks = 0;
    for (const [name, channel] of this.channels) {
      blocksPerChannel[name] = channel.length;
      totalBlocks += channel.length;
    }

    const violationsPerContract: Record<string, number> = {};
    let totalViolations = 0;
    for (const [name, contract] of this.contracts) {
      violationsPerContract[name] = contract.violations.length;
      totalViolations += contract.violations.length;
    }

    return {
      total_blocks: totalBlocks,
      blocks_per_channel: blocksPerChannel,
      total_violations: totalViolations,
      violations_per_contract: violationsPerContract,
      alerts_cached: this.alerts.length,
    };
  }

  logPlatformStatus(): void {
    console.log(`Platform status:\n${JSON.stringify(this.getStatistics(), null, 2)}`);
  }
}
