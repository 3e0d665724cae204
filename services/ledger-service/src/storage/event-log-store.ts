import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { EventSink, LedgerEvent as CoreLedgerEvent } from "@tokenledger/ledger-core";
import {
  canonicalJson,
  sha256Hex,
  type LedgerEvent,
  type LedgerEventRecord,
  type RegistryName,
} from "@tokenledger/shared";
import { toWireEvent } from "../wire.js";

interface EventRow {
  seq: number;
  event_hash: string;
  recorded_at: string;
  event_json: string;
}

interface ListParams {
  registry: string | null;
  assetId: string | null;
  after: number;
  limit: number;
}

export interface EventLogFilter {
  registry?: RegistryName;
  assetId?: string;
  after?: number;
  limit: number;
}

export interface EventLogStore extends EventSink {
  append(event: LedgerEvent): LedgerEventRecord;
  list(filter: EventLogFilter): LedgerEventRecord[];
  close(): void;
}

function toRecord(row: EventRow): LedgerEventRecord {
  const event: LedgerEvent = JSON.parse(row.event_json);
  return {
    seq: row.seq,
    eventHash: row.event_hash,
    recordedAt: row.recorded_at,
    event,
  };
}

export class SqliteEventLogStore implements EventLogStore {
  private readonly db: Database.Database;
  private readonly appendStmt: Database.Statement<[string, string, string, string, string, string]>;
  private readonly getStmt: Database.Statement<[number | bigint], EventRow>;
  private readonly listStmt: Database.Statement<[ListParams], EventRow>;

  private readonly ownsConnection: boolean;

  /**
   * Opens its own database for a path. Given the ledger backend's connection
   * instead, appends join the command's transaction.
   */
  constructor(source: string | Database.Database) {
    if (typeof source === "string") {
      if (source !== ":memory:") mkdirSync(dirname(source), { recursive: true });
      this.db = new Database(source);
      this.ownsConnection = true;
    } else {
      this.db = source;
      this.ownsConnection = false;
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        registry TEXT NOT NULL,
        asset_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        event_hash TEXT NOT NULL,
        recorded_at TEXT NOT NULL,
        event_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_ledger_events_asset
      ON ledger_events(registry, asset_id, seq);
    `);

    this.appendStmt = this.db.prepare<[string, string, string, string, string, string]>(`
      INSERT INTO ledger_events (registry, asset_id, event_type, event_hash, recorded_at, event_json)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.getStmt = this.db.prepare<[number | bigint], EventRow>(`
      SELECT seq, event_hash, recorded_at, event_json
      FROM ledger_events
      WHERE seq = ?
    `);

    this.listStmt = this.db.prepare<[ListParams], EventRow>(`
      SELECT seq, event_hash, recorded_at, event_json
      FROM ledger_events
      WHERE (@registry IS NULL OR registry = @registry)
        AND (@assetId IS NULL OR asset_id = @assetId)
        AND seq > @after
      ORDER BY seq ASC
      LIMIT @limit
    `);
  }

  deposit(event: CoreLedgerEvent): void {
    this.append(toWireEvent(event));
  }

  append(event: LedgerEvent): LedgerEventRecord {
    const info = this.appendStmt.run(
      event.registry,
      event.assetId,
      event.type,
      sha256Hex(canonicalJson(event)),
      new Date().toISOString(),
      JSON.stringify(event),
    );
    const row = this.getStmt.get(info.lastInsertRowid);
    if (!row) {
      throw new Error(`Event ${info.lastInsertRowid} missing after insert`);
    }
    return toRecord(row);
  }

  list(filter: EventLogFilter): LedgerEventRecord[] {
    return this.listStmt
      .all({
        registry: filter.registry ?? null,
        assetId: filter.assetId ?? null,
        after: filter.after ?? 0,
        limit: filter.limit,
      })
      .map(toRecord);
  }

  close(): void {
    if (this.ownsConnection) {
      this.db.close();
    }
  }
}
