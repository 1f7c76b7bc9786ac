import { IndexCorruptError } from "./errors";
import { isCorruption, type Persistence } from "./persistence";
import type { SearchHit } from "./types";

/** What the tree currently says about a document; undefined when it is gone or out of scope. */
export interface DocumentView {
  version: string;
  /** Scoped path. */
  path: string;
}

export type CurrentView = (documentId: string) => DocumentView | undefined;

export interface SearchIndexOptions {
  persistence: Persistence;
  /** Freshness source: records whose version differs are hidden from results. */
  currentView: CurrentView;
  verbose?: boolean;
  now?: () => number;
}

export interface IndexStats {
  /** Rows stored, fresh or not. */
  records: number;
  /** Rows whose version matches the current tree. */
  fresh: number;
}

interface HitRow {
  docId: string;
  version: string;
  path: string;
  indexedAt: number;
  score: number;
  snippet: string;
}

const SNIPPET_OPEN = ">>>";
const SNIPPET_CLOSE = "<<<";

/**
 * Turn free text into an FTS5 query: every word becomes a quoted phrase and
 * the phrases are ANDed. Returns null when nothing searchable is left.
 */
export function toMatchExpression(term: string): string | null {
  const tokens = term.match(/[\p{L}\p{N}_]+/gu);
  if (!tokens || tokens.length === 0) return null;
  return tokens.map((t) => `"${t}"`).join(" ");
}

function underPrefix(path: string, prefix: string): boolean {
  const p = prefix.replace(/\/+$/, "").toLowerCase();
  if (!p) return true;
  const lower = path.toLowerCase();
  return lower === p || lower.startsWith(p + "/");
}

/**
 * Persistent full-text index over extracted document text (SQLite FTS5).
 *
 * Records are keyed by document id and superseded on re-index. A record is
 * searchable only while its version matches the current tree; stale rows stay
 * on disk until the document is read again. When SQLite reports corruption the
 * index is rebuilt once and the operation retried.
 */
export class SearchIndex {
  private readonly persistence: Persistence;
  private readonly currentView: CurrentView;
  private readonly verbose: boolean;
  private readonly now: () => number;
  private lastIndexedAt = 0;

  public constructor(opts: SearchIndexOptions) {
    this.persistence = opts.persistence;
    this.currentView = opts.currentView;
    this.verbose = !!opts.verbose;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Check the store at startup; rebuild when asked to or when the index is damaged.
   */
  public async open(forceRebuild = false): Promise<void> {
    if (forceRebuild) {
      console.error("[Index] Rebuild requested at startup.");
      await this.rebuild();
      return;
    }
    if (!(await this.isIntact())) {
      console.error("[Index] Integrity check failed; rebuilding.");
      await this.rebuild();
    }
  }

  /** Add or replace the record for `documentId`. */
  public upsert(documentId: string, version: string, path: string, text: string): Promise<void> {
    return this.recovering("upsert", async () => {
      // Strictly increasing so ties on rank resolve by indexing order.
      const indexedAt = Math.max(this.now(), this.lastIndexedAt + 1);
      this.lastIndexedAt = indexedAt;
      await this.persistence.write((db) => {
        db.prepare(
          `INSERT INTO index_records (doc_id, version, path, text, indexed_at) VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(doc_id) DO UPDATE SET
             version = excluded.version, path = excluded.path, text = excluded.text, indexed_at = excluded.indexed_at`,
        ).run(documentId, version, path, text, indexedAt);
      });
      if (this.verbose) console.error(`[Index][verbose] Indexed ${path} (${text.length} chars)`);
    });
  }

  /**
   * Ranked matches for `term`, best first, at most `limit`. Only fresh records
   * are returned; `pathPrefix` restricts to a folder subtree (scoped path).
   */
  public query(term: string, pathPrefix?: string, limit = 10): Promise<SearchHit[]> {
    const match = toMatchExpression(term);
    if (!match || limit <= 0) return Promise.resolve([]);
    return this.recovering("query", async () => {
      const rows = this.persistence.db
        .prepare<[string], HitRow>(
          `SELECT r.doc_id AS docId, r.version AS version, r.path AS path, r.indexed_at AS indexedAt,
                  bm25(index_fts, 2.0, 1.0) AS score,
                  snippet(index_fts, 1, '${SNIPPET_OPEN}', '${SNIPPET_CLOSE}', '...', 16) AS snippet
             FROM index_fts JOIN index_records r ON r.rowid = index_fts.rowid
            WHERE index_fts MATCH ?
            ORDER BY score ASC, r.indexed_at DESC`,
        )
        .iterate(match);

      // Stale and out-of-prefix rows can outrank every fresh one, so read until enough are kept.
      const hits: SearchHit[] = [];
      for (const row of rows) {
        const view = this.currentView(row.docId);
        if (!view || view.version !== row.version) continue;
        if (pathPrefix && !underPrefix(view.path, pathPrefix)) continue;
        hits.push({ documentId: row.docId, path: view.path, rankScore: -row.score, snippet: row.snippet });
        if (hits.length >= limit) break;
      }
      return hits;
    });
  }

  /** Remove the record for a document (no-op if absent). */
  public invalidate(documentId: string): Promise<void> {
    return this.recovering("invalidate", async () => {
      await this.persistence.write((db) => {
        db.prepare("DELETE FROM index_records WHERE doc_id = ?").run(documentId);
      });
    });
  }

  /**
   * Drop the index and re-derive it from the extracted text held in the
   * artifact cache, keeping only versions that are still current.
   * @returns number of records restored.
   */
  public async rebuild(): Promise<number> {
    await this.persistence.resetIndexTables();
    const restored = await this.persistence.write((db) => {
      const rows = db
        .prepare<[], { doc_id: string; version: string; data: Buffer }>(
          "SELECT doc_id, version, data FROM cache_entries WHERE kind = 'extracted-text' AND data IS NOT NULL",
        )
        .all();
      const insert = db.prepare(
        "INSERT INTO index_records (doc_id, version, path, text, indexed_at) VALUES (?, ?, ?, ?, ?) ON CONFLICT(doc_id) DO NOTHING",
      );
      let n = 0;
      for (const row of rows) {
        const view = this.currentView(row.doc_id);
        if (!view || view.version !== row.version) continue;
        const indexedAt = Math.max(this.now(), this.lastIndexedAt + 1);
        this.lastIndexedAt = indexedAt;
        insert.run(row.doc_id, row.version, view.path, row.data.toString("utf8"), indexedAt);
        n++;
      }
      return n;
    });
    console.error(`[Index] Rebuilt; ${restored} record(s) restored from cache.`);
    return restored;
  }

  /** Whether a record exists for exactly this version of the document. */
  public has(documentId: string, version: string): boolean {
    const row = this.persistence.db
      .prepare<[string, string], { n: number }>("SELECT 1 AS n FROM index_records WHERE doc_id = ? AND version = ?")
      .get(documentId, version);
    return row !== undefined;
  }

  /** First `maxChars` of a fresh record's text, or undefined. */
  public preview(documentId: string, maxChars = 200): string | undefined {
    const row = this.persistence.db
      .prepare<[string], { version: string; text: string }>("SELECT version, text FROM index_records WHERE doc_id = ?")
      .get(documentId);
    const view = this.currentView(documentId);
    if (!row || !view || view.version !== row.version) return undefined;
    const flat = row.text.replace(/\s+/g, " ").trim();
    return flat.length > maxChars ? flat.slice(0, maxChars) + "..." : flat;
  }

  public stats(): IndexStats {
    const rows = this.persistence.db
      .prepare<[], { doc_id: string; version: string }>("SELECT doc_id, version FROM index_records")
      .all();
    let fresh = 0;
    for (const r of rows) {
      if (this.currentView(r.doc_id)?.version === r.version) fresh++;
    }
    return { records: rows.length, fresh };
  }

  private async isIntact(): Promise<boolean> {
    if (!this.persistence.checkIntegrity()) return false;
    try {
      // FTS5 commands are written as inserts, so this goes through the writer.
      await this.persistence.write((db) => {
        db.prepare("INSERT INTO index_fts(index_fts) VALUES ('integrity-check')").run();
      });
      return true;
    } catch (e) {
      if (isCorruption(e)) return false;
      throw e;
    }
  }

  private async recovering<T>(label: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (e) {
      if (!isCorruption(e)) throw e;
      console.error(`[Index] ${label} hit a corrupt index; rebuilding and retrying once.`);
      await this.rebuild();
      try {
        return await op();
      } catch (again) {
        if (isCorruption(again)) {
          throw new IndexCorruptError(`Search index still corrupt after rebuild (${label}).`, { cause: again });
        }
        throw again;
      }
    }
  }
}
