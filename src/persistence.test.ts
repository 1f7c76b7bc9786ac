import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Persistence, SCHEMA_VERSION, WriteQueue, isCorruption, type CacheRow } from "./persistence";
import { deferred } from "./testing/helpers";

function row(docId: string, version: string, data: string | null = "bytes"): CacheRow {
  return {
    doc_id: docId,
    version,
    kind: "raw-content",
    data: data === null ? null : Buffer.from(data),
    failure: data === null ? "could not decode" : null,
    stored_at: 1,
  };
}

describe("WriteQueue", () => {
  it("runs jobs one after another", async () => {
    const queue = new WriteQueue();
    const gate = deferred<void>();
    const order: string[] = [];
    const first = queue.enqueue(async () => {
      await gate.promise;
      order.push("first");
    });
    const second = queue.enqueue(() => {
      order.push("second");
    });
    expect(queue.depth).toBe(2);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
    expect(queue.depth).toBe(0);
  });

  it("keeps going after a failed job", async () => {
    const queue = new WriteQueue();
    const failed = queue.enqueue(() => {
      throw new Error("boom");
    });
    await expect(failed).rejects.toThrow("boom");
    await expect(queue.enqueue(() => 7)).resolves.toBe(7);
  });
});

describe("Persistence", () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "inkvault-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("keeps one version per artifact", async () => {
    const store = new Persistence(":memory:");
    await store.putEntry(row("D1", "1"));
    await store.putEntry(row("D1", "2", null));
    const rows = store.getEntries("D1", "raw-content");
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ version: "2", data: null, failure: "could not decode" });
    await store.close();
  });

  it("sweeps entries that are no longer current", async () => {
    const store = new Persistence(":memory:");
    await store.putEntry(row("D1", "1"));
    await store.putEntry(row("D2", "1"));
    await store.putEntry({ ...row("D2", "1"), kind: "extracted-text" });
    const removed = await store.sweepEntries((id) => id === "D1");
    expect(removed).toBe(2);
    expect(store.countEntries()).toBe(1);
    await store.close();
  });

  it("survives a restart on disk", async () => {
    const file = path.join(dir, "nested", "index.db");
    const first = new Persistence(file);
    await first.putEntry(row("D1", "1", "hello"));
    await first.close();

    const second = new Persistence(file);
    expect(second.getEntries("D1", "raw-content")[0]?.data?.toString("utf8")).toBe("hello");
    expect(second.checkIntegrity()).toBe(true);
    await second.close();
  });

  it("clears derived data written under another schema version", async () => {
    const file = path.join(dir, "index.db");
    const first = new Persistence(file);
    await first.putEntry(row("D1", "1"));
    await first.close();

    const raw = new Database(file);
    raw.prepare("UPDATE meta SET value = ? WHERE key = 'schema_version'").run(String(SCHEMA_VERSION + 1));
    raw.close();

    const second = new Persistence(file);
    expect(second.countEntries()).toBe(0);
    await second.close();
  });

  it("sets an unreadable file aside and starts empty", async () => {
    const file = path.join(dir, "index.db");
    fs.writeFileSync(file, "this is not a database file, just some text that fills a page".repeat(20));

    const store = new Persistence(file);
    expect(store.countEntries()).toBe(0);
    expect(fs.readdirSync(dir).some((f) => f.startsWith("index.db.corrupt-"))).toBe(true);
    await store.close();
  });

  it("recognises corruption errors", () => {
    expect(isCorruption(new Database.SqliteError("file is not a database", "SQLITE_NOTADB"))).toBe(true);
    expect(isCorruption(new Database.SqliteError("constraint failed", "SQLITE_CONSTRAINT"))).toBe(false);
    expect(isCorruption(new Error("SQLITE_CORRUPT"))).toBe(false);
  });
});
