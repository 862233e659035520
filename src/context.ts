import { config, type AppConfig } from "./config.js";
import { openDatabase, type Db } from "./db.js";
import { SqliteLedgerStore } from "./ledgerStore.js";
import { RecordLoader } from "./loader.js";
import { DataMatcher, type MatcherOptions } from "./matcher.js";
import { CompliancePlatform } from "./platform.js";
import type { RecordSet } from "./types.js";

export interface AppContext {
  config: AppConfig;
  records: RecordSet;
  matcher: DataMatcher;
  platform: CompliancePlatform;
  db: Db;
}

export interface ContextOptions {
  /** Preloaded records; skips reading the CSV directory. */
  records?: RecordSet;
  dbPath?: string;
  matcher?: MatcherOptions;
}

/** Builds everything the service needs, once, in dependency order. */
export function createAppContext(options: ContextOptions = {}): AppContext {
  const records = options.records ?? new RecordLoader(config.dataDir).loadAll();

  const matcher = new DataMatcher(records, options.matcher);
  matcher.matchAll();

  const db = openDatabase(options.dbPath ?? config.dbPath);
  const platform = new CompliancePlatform({ store: new SqliteLedgerStore(db) });

  return { config, records, matcher, platform, db };
}
