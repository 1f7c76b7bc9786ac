import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { CacheStore, MemoryTier, type CacheStoreOptions } from "./cache-store";
import { ExtractionFailedError, NotFoundError, isAbortError } from "./errors";
import { PathResolver } from "./path-resolver";
import { Persistence } from "./persistence";
import { SearchIndex } from "./search-index";
import { SyncEngine } from "./sync-engine";
import { FakeRemote, deferred, doc, folder } from "./testing/helpers";
import { renderedPage, type FileType } from "./types";

describe("MemoryTier", () => {
  it("evicts the least recently used entry", () => {
    const tier = new MemoryTier<number>(2);
    tier.set("a", 1);
    tier.set("b", 2);
    expect(tier.get("a")).toBe(1);
    tier.set("c", 3);
    expect(tier.get("b")).toBeUndefined();
    expect(tier.get("a")).toBe(1);
    expect(tier.get("c")).toBe(3);
    expect(tier.size).toBe(2);
  });

  it("prunes by predicate", () => {
    const tier = new MemoryTier<number>(10);
    tier.set("a", 1);
    tier.set("b", 2);
    tier.set("c", 3);
    expect(tier.prune((_k, v) => v !== 2)).toBe(1);
    expect(tier.size).toBe(2);
  });
});

describe("CacheStore", () => {
  let remote: FakeRemote;
  let engine: SyncEngine;
  let persistence: Persistence;
  let resolver: PathResolver;
  let index: SearchIndex;
  let extract: Mock<(bytes: Buffer, fileType: FileType) => Promise<string>>;
  let clock: number;

  function makeStore(extra: Partial<CacheStoreOptions> = {}): CacheStore {
    return new CacheStore({
      persistence,
      remote,
      tree: () => engine.current,
      resolver,
      extractor: { extract },
      index,
      now: () => clock,
      ...extra,
    });
  }

  async function bumpPlan(version: string, content: string): Promise<void> {
    remote.fingerprint = `fp-${version}`;
    remote.items = [folder("F1", "Work"), doc("D1", "Plan", "F1", version)];
    remote.setContent("D1", version, content);
    await engine.sync();
  }

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    clock = 10_000;
    remote = new FakeRemote();
    remote.items = [folder("F1", "Work"), folder("F0", "Archive", "F1"), doc("D1", "Plan", "F1", "1")];
    remote.setContent("D1", "1", "%PDF v1");
    engine = new SyncEngine({ remote });
    await engine.sync();
    persistence = new Persistence(":memory:");
    resolver = new PathResolver(() => engine.current);
    index = new SearchIndex({
      persistence,
      currentView: (id) => {
        const meta = engine.current.items.get(id);
        const path = resolver.tryResolveId(id);
        return meta && path !== undefined ? { version: meta.version, path } : undefined;
      },
    });
    extract = vi.fn<(bytes: Buffer, fileType: FileType) => Promise<string>>(async (bytes) => `text of ${bytes.toString("utf8")}`);
  });

  afterEach(async () => {
    await persistence.close();
    vi.restoreAllMocks();
  });

  it("serves repeated reads from cache with identical bytes", async () => {
    const store = makeStore();
    const first = await store.get("D1", "extracted-text");
    const second = await store.get("D1", "extracted-text");
    expect(second.equals(first)).toBe(true);
    expect(first.toString()).toBe("text of %PDF v1");
    expect(remote.contentCalls).toBe(1);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(extract).toHaveBeenCalledWith(Buffer.from("%PDF v1"), "pdf", expect.any(AbortSignal));
  });

  it("serves from the persistent tier after a restart", async () => {
    await makeStore().get("D1", "extracted-text");
    const restarted = makeStore();
    expect((await restarted.get("D1", "extracted-text")).toString()).toBe("text of %PDF v1");
    expect(remote.contentCalls).toBe(1);
    expect(extract).toHaveBeenCalledTimes(1);
  });

  it("coalesces concurrent reads of the same artifact", async () => {
    const gate = deferred<void>();
    remote.gate = gate.promise;
    const store = makeStore();

    const reads = Array.from({ length: 5 }, () => store.get("D1", "extracted-text"));
    gate.resolve();
    const results = await Promise.all(reads);

    expect(new Set(results.map((r) => r.toString()))).toEqual(new Set(["text of %PDF v1"]));
    expect(remote.contentCalls).toBe(1);
    expect(extract).toHaveBeenCalledTimes(1);
  });

  it("refetches after a version bump instead of serving the old blob", async () => {
    const store = makeStore();
    expect(resolver.resolvePath("/Work/Plan")).toBe("D1");
    expect((await store.get("D1", "extracted-text")).toString()).toBe("text of %PDF v1");
    expect((await index.query("v1")).map((h) => h.documentId)).toEqual(["D1"]);

    await bumpPlan("2", "%PDF v2");
    // The old record is stale now and must not be served.
    expect(await index.query("v1")).toEqual([]);

    expect((await store.get("D1", "extracted-text")).toString()).toBe("text of %PDF v2");
    expect(remote.contentCalls).toBe(2);
    expect(extract).toHaveBeenCalledTimes(2);
    expect((await index.query("v2")).map((h) => h.path)).toEqual(["/Work/Plan"]);
    await vi.waitFor(() => expect(persistence.getEntries("D1", "extracted-text").map((r) => r.version)).toEqual(["2"]));
  });

  it("records extraction failures and does not call the extractor again", async () => {
    extract.mockRejectedValueOnce(new ExtractionFailedError("Unsupported stroke format"));
    const store = makeStore();

    await expect(store.get("D1", "extracted-text")).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(store.get("D1", "extracted-text")).rejects.toThrow("Unsupported stroke format");
    expect(await store.readText("D1")).toEqual({ text: "", failure: "Unsupported stroke format" });
    expect(await makeStore().readText("D1")).toEqual({ text: "", failure: "Unsupported stroke format" });
    expect(extract).toHaveBeenCalledTimes(1);
    expect(index.stats().records).toBe(0);
  });

  it("does not cache transient failures", async () => {
    remote.contents.clear();
    const store = makeStore();
    await expect(store.get("D1", "raw-content")).rejects.toBeInstanceOf(NotFoundError);

    remote.setContent("D1", "1", "%PDF late");
    expect((await store.get("D1", "raw-content")).toString()).toBe("%PDF late");
  });

  it("rejects unknown ids and folders", async () => {
    const store = makeStore();
    await expect(store.get("nope", "raw-content")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.get("F1", "raw-content")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("renders pages through the renderer when one is configured", async () => {
    await expect(makeStore().get("D1", renderedPage(0))).rejects.toThrow("No page renderer is configured.");

    const render = vi.fn(async () => Buffer.from("png-bytes"));
    const store = makeStore({ renderer: { render }, background: "#ffffff" });
    expect((await store.get("D1", renderedPage(2))).toString()).toBe("png-bytes");
    await store.get("D1", renderedPage(2));
    expect(render).toHaveBeenCalledTimes(1);
    expect(render).toHaveBeenCalledWith(Buffer.from("%PDF v1"), 2, "#ffffff", expect.any(AbortSignal));
  });

  it("lets a coalesced sibling finish when another caller aborts", async () => {
    const gate = deferred<void>();
    remote.gate = gate.promise;
    const store = makeStore();
    const ac = new AbortController();

    const leaving = store.get("D1", "extracted-text", ac.signal);
    const staying = store.get("D1", "extracted-text");
    ac.abort();
    const err = await leaving.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);

    gate.resolve();
    expect((await staying).toString()).toBe("text of %PDF v1");
    expect(extract).toHaveBeenCalledTimes(1);
  });

  it("lists folders through a TTL cache", async () => {
    const refreshTree = vi.fn(async () => undefined);
    const store = makeStore({ refreshTree, listingTtlMs: 60_000 });

    const first = await store.listFolder("F1");
    expect(first.map((m) => m.name)).toEqual(["Archive", "Plan"]);
    expect(refreshTree).toHaveBeenCalledTimes(1);

    clock += 59_000;
    expect(await store.listFolder("F1")).toBe(first);
    expect(refreshTree).toHaveBeenCalledTimes(1);

    clock += 2_000;
    await store.listFolder("F1");
    expect(refreshTree).toHaveBeenCalledTimes(2);
    expect((await store.listFolder(null)).map((m) => m.id)).toEqual(["F1"]);
  });

  it("indexes text on a later hit when the first index write failed", async () => {
    const upsert = vi.spyOn(index, "upsert").mockRejectedValueOnce(new Error("disk I/O error"));
    const store = makeStore();
    await store.get("D1", "extracted-text");
    expect(await index.query("v1")).toEqual([]);

    await store.get("D1", "extracted-text");
    expect((await index.query("v1")).map((h) => h.documentId)).toEqual(["D1"]);
    expect(upsert).toHaveBeenCalledTimes(2);

    await store.get("D1", "extracted-text");
    expect(upsert).toHaveBeenCalledTimes(2);
  });

  it("restores an invalidated record from the persistent tier", async () => {
    await makeStore().get("D1", "extracted-text");
    await index.invalidate("D1");
    expect(await index.query("v1")).toEqual([]);

    await makeStore().get("D1", "extracted-text");
    expect((await index.query("v1")).map((h) => h.documentId)).toEqual(["D1"]);
    expect(extract).toHaveBeenCalledTimes(1);
  });

  it("drops cached folder listings when the tree is swept", async () => {
    const store = makeStore();
    expect((await store.listFolder("F1")).map((m) => m.name)).toEqual(["Archive", "Plan"]);

    remote.fingerprint = "fp-2";
    remote.items = [folder("F1", "Work"), doc("D1", "Plan", "F1", "1")];
    await engine.sync();
    await store.sweep(engine.current);
    expect((await store.listFolder("F1")).map((m) => m.name)).toEqual(["Plan"]);
  });

  it("sweeps entries of replaced versions from both tiers", async () => {
    const store = makeStore();
    await store.get("D1", "extracted-text");
    expect(store.stats()).toEqual({ memoryEntries: 2, persistentEntries: 2, inflight: 0 });

    await bumpPlan("2", "%PDF v2");
    expect(await store.sweep(engine.current)).toBe(2);
    expect(store.stats()).toEqual({ memoryEntries: 0, persistentEntries: 0, inflight: 0 });
  });
});
