import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { KeyValueBackend, KeyValueEntry } from "./backend.js";

interface ValueRow {
  value: string;
}

export class SqliteKeyValueBackend implements KeyValueBackend {
  private readonly db: Database.Database;
  private readonly getStmt: Database.Statement<[string, string], ValueRow>;
  private readonly putStmt: Database.Statement<[string, string, string]>;
  private readonly scanStmt: Database.Statement<[string, number, string], KeyValueEntry>;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS kv (
        namespace TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (namespace, key)
      );
    `);

    this.getStmt = this.db.prepare<[string, string], ValueRow>(`
      SELECT value
      FROM kv
      WHERE namespace = ? AND key = ?
      LIMIT 1
    `);

    this.putStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO kv (namespace, key, value)
      VALUES (?, ?, ?)
      ON CONFLICT(namespace, key) DO UPDATE SET
        value = excluded.value
    `);

    this.scanStmt = this.db.prepare<[string, number, string], KeyValueEntry>(`
      SELECT key, value
      FROM kv
      WHERE namespace = ? AND substr(key, 1, ?) = ?
      ORDER BY key ASC
    `);
  }

  get(namespace: string, key: string): string | undefined {
    return this.getStmt.get(namespace, key)?.value;
  }

  put(namespace: string, key: string, value: string): void {
    this.putStmt.run(namespace, key, value);
  }

  scan(namespace: string, prefix: string): KeyValueEntry[] {
    return this.scanStmt.all(namespace, prefix.length, prefix);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /** The underlying connection, for stores that must write in the same transactions. */
  get connection(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
