import { ExtractionFailedError, NotFoundError } from "./errors";
import type { Extractor, Renderer } from "./extractor";
import type { PathResolver } from "./path-resolver";
import type { CacheRow, Persistence } from "./persistence";
import type { RemoteSource } from "./remote-client";
import type { SearchIndex } from "./search-index";
import { SingleFlight } from "./single-flight";
import { pageIndexOf, type ArtifactKind, type DocumentMeta, type MetadataTree } from "./types";

/** A produced artifact, or the recorded reason it cannot be produced. */
type Artifact = { ok: true; data: Buffer } | { ok: false; failure: string };

interface MemoryEntry {
  version: string;
  artifact: Artifact;
}

/**
 * Capacity-bounded LRU keyed by (document, kind). Map iteration order is
 * insertion order, so re-inserting on access keeps the oldest entry first.
 */
export class MemoryTier<V> {
  private readonly entries = new Map<string, V>();
  private readonly capacity: number;

  public constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
  }

  public get size(): number {
    return this.entries.size;
  }

  public get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  public set(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, value);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  public delete(key: string): void {
    this.entries.delete(key);
  }

  /** Remove every entry for which `keep` returns false. */
  public prune(keep: (key: string, value: V) => boolean): number {
    let removed = 0;
    for (const [key, value] of this.entries) {
      if (!keep(key, value)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}

export interface CacheStoreOptions {
  persistence: Persistence;
  remote: RemoteSource;
  /** Current metadata tree; read on every call. */
  tree: () => MetadataTree;
  resolver: PathResolver;
  extractor: Extractor;
  renderer?: Renderer;
  /** Receives extracted text for lazy indexing. */
  index?: SearchIndex;
  /** Brings the tree up to date before a folder listing is recomputed. */
  refreshTree?: (signal?: AbortSignal) => Promise<unknown>;
  memoryEntries?: number;
  listingTtlMs?: number;
  /** Page background passed to the renderer. */
  background?: string;
  verbose?: boolean;
  now?: () => number;
}

export interface TextResult {
  text: string;
  /** Set when the document's content could not be decoded. */
  failure?: string;
}

export interface CacheStats {
  memoryEntries: number;
  persistentEntries: number;
  inflight: number;
}

function memoryKey(documentId: string, kind: ArtifactKind): string {
  return `${documentId}\u0000${kind}`;
}

function documentIdOf(key: string): string {
  const at = key.indexOf("\u0000");
  return at < 0 ? key : key.slice(0, at);
}

function byFolderThenName(a: DocumentMeta, b: DocumentMeta): number {
  if (a.kind !== b.kind) return a.kind === "folder" ? -1 : 1;
  return a.name.localeCompare(b.name, undefined, { sensitivity: "base" }) || a.id.localeCompare(b.id);
}

/**
 * Read-through artifact cache: memory LRU, then the persistent store, then
 * the remote and the content collaborators.
 *
 * Every tier is checked against the document's current version; a tier holding
 * another version counts as empty for that key and its entry is evicted
 * lazily. Concurrent requests for the same (document, version, kind) share one
 * load. Extraction failures are recorded as sentinels so the extractor is not
 * called again for the same version.
 */
export class CacheStore {
  private readonly persistence: Persistence;
  private readonly remote: RemoteSource;
  private readonly tree: () => MetadataTree;
  private readonly resolver: PathResolver;
  private readonly extractor: Extractor;
  private readonly renderer?: Renderer;
  private readonly index?: SearchIndex;
  private readonly refreshTree?: (signal?: AbortSignal) => Promise<unknown>;
  private readonly memory: MemoryTier<MemoryEntry>;
  private readonly listingTtlMs: number;
  private readonly background: string;
  private readonly verbose: boolean;
  private readonly now: () => number;
  private readonly flight = new SingleFlight<string, Artifact>();
  private readonly listings = new Map<string, { expiresAt: number; items: readonly DocumentMeta[] }>();

  public constructor(opts: CacheStoreOptions) {
    this.persistence = opts.persistence;
    this.remote = opts.remote;
    this.tree = opts.tree;
    this.resolver = opts.resolver;
    this.extractor = opts.extractor;
    this.renderer = opts.renderer;
    this.index = opts.index;
    this.refreshTree = opts.refreshTree;
    this.memory = new MemoryTier(opts.memoryEntries ?? 200);
    this.listingTtlMs = opts.listingTtlMs ?? 60_000;
    this.background = opts.background ?? "white";
    this.verbose = !!opts.verbose;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Artifact bytes for the document's current version.
   *
   * @throws {NotFoundError} if the document is not in the tree or its version is gone remotely.
   * @throws {ExtractionFailedError} if the content cannot be decoded (cached).
   */
  public async get(documentId: string, kind: ArtifactKind, signal?: AbortSignal): Promise<Buffer> {
    const meta = this.tree().items.get(documentId);
    if (!meta || meta.kind !== "document") {
      throw new NotFoundError(`No document with id '${documentId}'.`);
    }
    const artifact = await this.lookup(meta, kind, signal);
    if (!artifact.ok) throw new ExtractionFailedError(artifact.failure, documentId);
    return artifact.data;
  }

  /** Extracted text; a decode failure comes back as an empty text with the reason. */
  public async readText(documentId: string, signal?: AbortSignal): Promise<TextResult> {
    try {
      const data = await this.get(documentId, "extracted-text", signal);
      return { text: data.toString("utf8") };
    } catch (e) {
      if (e instanceof ExtractionFailedError) return { text: "", failure: e.message };
      throw e;
    }
  }

  /**
   * Children of a folder (null = library root), folders first, then by name.
   * Cached per folder for the listing TTL.
   */
  public async listFolder(folderId: string | null, signal?: AbortSignal): Promise<readonly DocumentMeta[]> {
    const key = folderId ?? "";
    const cached = this.listings.get(key);
    if (cached && cached.expiresAt > this.now()) return cached.items;
    if (this.refreshTree) await this.refreshTree(signal);
    const items = [...this.resolver.childrenOf(folderId)].sort(byFolderThenName);
    this.listings.set(key, { expiresAt: this.now() + this.listingTtlMs, items });
    return items;
  }

  /**
   * Drop entries whose version is no longer current in `tree`, in both tiers,
   * and every cached folder listing.
   * @returns number of persistent rows removed.
   */
  public async sweep(tree: MetadataTree): Promise<number> {
    const isCurrent = (documentId: string, version: string) => tree.items.get(documentId)?.version === version;
    // Listings describe the replaced tree.
    this.listings.clear();
    const fromMemory = this.memory.prune((key, entry) => isCurrent(documentIdOf(key), entry.version));
    const fromStore = await this.persistence.sweepEntries(isCurrent);
    if (this.verbose || fromStore > 0) {
      console.error(`[Cache] Swept ${fromStore} stored and ${fromMemory} in-memory entr${fromMemory === 1 ? "y" : "ies"}.`);
    }
    return fromStore;
  }

  public stats(): CacheStats {
    return {
      memoryEntries: this.memory.size,
      persistentEntries: this.persistence.countEntries(),
      inflight: this.flight.size,
    };
  }

  // -------------------- Tiers --------------------

  private async lookup(meta: DocumentMeta, kind: ArtifactKind, signal?: AbortSignal): Promise<Artifact> {
    const mkey = memoryKey(meta.id, kind);
    const hot = this.memory.get(mkey);
    if (hot) {
      if (hot.version === meta.version) {
        if (kind === "extracted-text") await this.feedIndex(meta, hot.artifact, true);
        return hot.artifact;
      }
      this.memory.delete(mkey);
    }
    const flightKey = `${mkey}\u0000${meta.version}`;
    return this.flight.run(flightKey, (s) => this.load(meta, kind, s), signal);
  }

  private async load(meta: DocumentMeta, kind: ArtifactKind, signal: AbortSignal): Promise<Artifact> {
    const rows = this.persistence.getEntries(meta.id, kind);
    const stored = rows.find((r) => r.version === meta.version);
    if (rows.some((r) => r.version !== meta.version)) {
      this.persistence.deleteStaleEntries(meta.id, kind, meta.version).catch((e: unknown) => {
        console.error(`[Cache] Failed to evict stale entries for ${meta.id}:`, e);
      });
    }
    if (stored) {
      const artifact: Artifact =
        stored.data !== null ? { ok: true, data: stored.data } : { ok: false, failure: stored.failure ?? "Unknown failure" };
      this.memory.set(memoryKey(meta.id, kind), { version: meta.version, artifact });
      if (this.verbose) console.error(`[Cache][verbose] Persistent hit ${meta.id} ${kind}`);
      if (kind === "extracted-text") await this.feedIndex(meta, artifact, true);
      return artifact;
    }

    if (this.verbose) console.error(`[Cache][verbose] Miss ${meta.id} ${kind}; producing`);
    const artifact = await this.produce(meta, kind, signal);
    await this.store(meta, kind, artifact);
    if (kind === "extracted-text") await this.feedIndex(meta, artifact, false);
    return artifact;
  }

  private async produce(meta: DocumentMeta, kind: ArtifactKind, signal: AbortSignal): Promise<Artifact> {
    if (kind === "raw-content") {
      return { ok: true, data: await this.remote.fetchContent(meta.id, meta.version, signal) };
    }

    const source = await this.lookup(meta, "raw-content", signal);
    if (!source.ok) throw new ExtractionFailedError(source.failure, meta.id);
    const raw = source.data;
    const fileType = meta.fileType ?? "notebook";
    if (kind === "extracted-text") {
      try {
        const text = await this.extractor.extract(raw, fileType, signal);
        return { ok: true, data: Buffer.from(text, "utf8") };
      } catch (e) {
        if (!(e instanceof ExtractionFailedError)) throw e;
        console.error(`[Cache] Extraction failed for ${meta.id} (${fileType}): ${e.message}`);
        return { ok: false, failure: e.message };
      }
    }

    const page = pageIndexOf(kind);
    if (page === null) throw new Error(`Unknown artifact kind '${kind}'`);
    if (!this.renderer) {
      // Not a property of the content, so nothing is recorded.
      throw new ExtractionFailedError("No page renderer is configured.", meta.id);
    }
    try {
      return { ok: true, data: await this.renderer.render(raw, page, this.background, signal) };
    } catch (e) {
      if (!(e instanceof ExtractionFailedError)) throw e;
      return { ok: false, failure: e.message };
    }
  }

  private async store(meta: DocumentMeta, kind: ArtifactKind, artifact: Artifact): Promise<void> {
    const row: CacheRow = {
      doc_id: meta.id,
      version: meta.version,
      kind,
      data: artifact.ok ? artifact.data : null,
      failure: artifact.ok ? null : artifact.failure,
      stored_at: this.now(),
    };
    await this.persistence.putEntry(row);
    this.memory.set(memoryKey(meta.id, kind), { version: meta.version, artifact });
  }

  /**
   * Hand extracted text to the index. On a cache hit (`onlyIfMissing`) the
   * record is written only when the index lacks this version, which repairs
   * a missed or invalidated record.
   */
  private async feedIndex(meta: DocumentMeta, artifact: Artifact, onlyIfMissing: boolean): Promise<void> {
    if (!this.index || !artifact.ok) return;
    const path = this.resolver.tryResolveId(meta.id);
    if (path === undefined) return;
    try {
      if (onlyIfMissing && this.index.has(meta.id, meta.version)) return;
      await this.index.upsert(meta.id, meta.version, path, artifact.data.toString("utf8"));
    } catch (e) {
      // Text stays cached; the next read of this version tries again.
      console.error(`[Cache] Indexing ${path} failed:`, e);
    }
  }
}
