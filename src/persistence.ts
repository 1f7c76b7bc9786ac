import Database from "better-sqlite3";
import fsSync from "node:fs";
import path from "node:path";
import type { ArtifactKind } from "./types";

/**
 * Bump when the schema changes incompatibly. Older databases are wiped and
 * repopulated lazily (everything in them is derived data).
 */
export const SCHEMA_VERSION = 1;

const CACHE_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT
  );
  CREATE TABLE IF NOT EXISTS cache_entries (
    doc_id TEXT NOT NULL,
    version TEXT NOT NULL,
    kind TEXT NOT NULL,
    data BLOB,
    failure TEXT,
    stored_at INTEGER NOT NULL,
    PRIMARY KEY (doc_id, version, kind)
  );
`;

// FTS5 over an external-content table: index_records is the source of truth,
// index_fts is derived from it and can always be rebuilt.
const INDEX_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS index_records (
    rowid INTEGER PRIMARY KEY,
    doc_id TEXT NOT NULL UNIQUE,
    version TEXT NOT NULL,
    path TEXT NOT NULL,
    text TEXT NOT NULL,
    indexed_at INTEGER NOT NULL
  );
  CREATE VIRTUAL TABLE IF NOT EXISTS index_fts USING fts5(
    path,
    text,
    content='index_records',
    content_rowid='rowid',
    tokenize='porter unicode61'
  );
  CREATE TRIGGER IF NOT EXISTS index_records_ai AFTER INSERT ON index_records BEGIN
    INSERT INTO index_fts(rowid, path, text) VALUES (new.rowid, new.path, new.text);
  END;
  CREATE TRIGGER IF NOT EXISTS index_records_ad AFTER DELETE ON index_records BEGIN
    INSERT INTO index_fts(index_fts, rowid, path, text) VALUES ('delete', old.rowid, old.path, old.text);
  END;
  CREATE TRIGGER IF NOT EXISTS index_records_au AFTER UPDATE ON index_records BEGIN
    INSERT INTO index_fts(index_fts, rowid, path, text) VALUES ('delete', old.rowid, old.path, old.text);
    INSERT INTO index_fts(rowid, path, text) VALUES (new.rowid, new.path, new.text);
  END;
`;

const DROP_INDEX_SQL = `
  DROP TRIGGER IF EXISTS index_records_ai;
  DROP TRIGGER IF EXISTS index_records_ad;
  DROP TRIGGER IF EXISTS index_records_au;
  DROP TABLE IF EXISTS index_fts;
  DROP TABLE IF EXISTS index_records;
`;

/** One persisted artifact. Exactly one of `data` / `failure` is set. */
export interface CacheRow {
  doc_id: string;
  version: string;
  kind: string;
  data: Buffer | null;
  failure: string | null;
  stored_at: number;
}

/** True for SQLite errors that mean the file or an index structure is damaged. */
export function isCorruption(e: unknown): boolean {
  return e instanceof Database.SqliteError && /^SQLITE_(CORRUPT|NOTADB)/.test(e.code);
}

/**
 * Serializes write jobs: each job starts only after the previous one settled.
 * Readers never go through the queue.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /** Jobs waiting or running. */
  public get depth(): number {
    return this.queued;
  }

  public enqueue<T>(job: () => T | Promise<T>): Promise<T> {
    this.queued++;
    const run = this.tail.then(job);
    this.tail = run.then(
      () => {
        this.queued--;
      },
      () => {
        this.queued--;
      },
    );
    return run;
  }
}

/**
 * Owns the SQLite database holding both logical tables (artifact cache and
 * full-text index). All mutations go through {@link write}; reads use the
 * connection directly and see the last committed state (WAL).
 */
export class Persistence {
  /** Filesystem path of the database, or ":memory:". */
  public readonly storePath: string;
  private readonly verbose: boolean;
  private readonly queue = new WriteQueue();
  private database: Database.Database;

  /**
   * Open (creating if needed) the store.
   * @param storePath Database file path; ":memory:" for an ephemeral store.
   * @param verbose   Whether to emit verbose logging.
   */
  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
    this.database = this.open();
  }

  /** Raw connection for read statements. */
  public get db(): Database.Database {
    return this.database;
  }

  /**
   * Run `fn` as one transaction on the single writer path. Keep the body
   * synchronous: it executes inside a better-sqlite3 transaction.
   */
  public write<T>(fn: (db: Database.Database) => T): Promise<T> {
    return this.queue.enqueue(() => this.database.transaction(() => fn(this.database))());
  }

  /** `PRAGMA quick_check`; true when the file structure is intact. */
  public checkIntegrity(): boolean {
    try {
      const rows = this.database.prepare<[], { quick_check: string }>("PRAGMA quick_check").all();
      return rows.length === 1 && rows[0]?.quick_check === "ok";
    } catch (e) {
      if (isCorruption(e)) return false;
      throw e;
    }
  }

  /** Drop and recreate the index tables. Runs on the writer path. */
  public resetIndexTables(): Promise<void> {
    return this.write((db) => {
      db.exec(DROP_INDEX_SQL);
      db.exec(INDEX_SCHEMA_SQL);
    });
  }

  // -------------------- Artifact cache tier --------------------

  /** Every stored version of one artifact (normally zero or one row). */
  public getEntries(documentId: string, kind: ArtifactKind): CacheRow[] {
    return this.database
      .prepare<[string, string], CacheRow>(
        "SELECT doc_id, version, kind, data, failure, stored_at FROM cache_entries WHERE doc_id = ? AND kind = ?",
      )
      .all(documentId, kind);
  }

  /** Store an artifact, replacing every other version of the same (document, kind). */
  public putEntry(row: CacheRow): Promise<void> {
    return this.write((db) => {
      db.prepare("DELETE FROM cache_entries WHERE doc_id = ? AND kind = ? AND version <> ?").run(
        row.doc_id,
        row.kind,
        row.version,
      );
      db.prepare(
        `INSERT OR REPLACE INTO cache_entries (doc_id, version, kind, data, failure, stored_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
      ).run(row.doc_id, row.version, row.kind, row.data, row.failure, row.stored_at);
    });
  }

  /** Delete stored versions of one artifact other than `keepVersion`. */
  public deleteStaleEntries(documentId: string, kind: ArtifactKind, keepVersion: string): Promise<number> {
    return this.write(
      (db) =>
        db
          .prepare("DELETE FROM cache_entries WHERE doc_id = ? AND kind = ? AND version <> ?")
          .run(documentId, kind, keepVersion).changes,
    );
  }

  /**
   * Delete every entry whose (document, version) pair is no longer current.
   * @returns number of rows removed.
   */
  public sweepEntries(isCurrent: (documentId: string, version: string) => boolean): Promise<number> {
    return this.write((db) => {
      const pairs = db
        .prepare<[], { doc_id: string; version: string }>("SELECT DISTINCT doc_id, version FROM cache_entries")
        .all();
      const del = db.prepare("DELETE FROM cache_entries WHERE doc_id = ? AND version = ?");
      let removed = 0;
      for (const p of pairs) {
        if (!isCurrent(p.doc_id, p.version)) removed += del.run(p.doc_id, p.version).changes;
      }
      return removed;
    });
  }

  public countEntries(): number {
    const row = this.database.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM cache_entries").get();
    return row?.n ?? 0;
  }

  /** Wait for queued writes, then close the connection. */
  public async close(): Promise<void> {
    await this.queue.enqueue(() => undefined);
    this.database.close();
  }

  // -------------------- Open / migrate --------------------

  private open(): Database.Database {
    if (this.storePath !== ":memory:") {
      fsSync.mkdirSync(path.dirname(this.storePath), { recursive: true });
    }
    let db: Database.Database | undefined;
    try {
      db = new Database(this.storePath);
      return this.migrate(db);
    } catch (e) {
      db?.close();
      if (!isCorruption(e) || this.storePath === ":memory:") throw e;
      // Everything stored is derived data: set the damaged file aside and start over.
      const aside = `${this.storePath}.corrupt-${Date.now()}`;
      console.error(`[Index] Store at ${this.storePath} is unreadable; moved to ${aside}.`);
      fsSync.renameSync(this.storePath, aside);
      return this.migrate(new Database(this.storePath));
    }
  }

  private migrate(db: Database.Database): Database.Database {
    try {
      db.pragma("journal_mode = WAL");
    } catch (e) {
      // Not available for every storage mode; a damaged file fails again below.
      if (this.verbose) console.error(`[Index][verbose] journal_mode=WAL not applied: ${String(e)}`);
    }
    db.exec(CACHE_SCHEMA_SQL);
    const row = db
      .prepare<[], { value: string }>("SELECT value FROM meta WHERE key = 'schema_version'")
      .get();
    const stored = row ? Number(row.value) : 0;
    if (stored !== SCHEMA_VERSION) {
      if (stored > 0) {
        console.error(`[Index] Schema version ${stored} -> ${SCHEMA_VERSION}; clearing derived data.`);
        db.exec("DELETE FROM cache_entries;");
        db.exec(DROP_INDEX_SQL);
      }
      db.prepare("INSERT OR REPLACE INTO meta (key, value) VALUES ('schema_version', ?)").run(
        String(SCHEMA_VERSION),
      );
    }
    db.exec(INDEX_SCHEMA_SQL);
    if (this.verbose) console.error(`[Index][verbose] Store ready at ${this.storePath}`);
    return db;
  }
}
