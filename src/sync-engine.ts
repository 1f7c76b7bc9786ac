import { TreeInconsistentError } from "./errors";
import type { RemoteSource } from "./remote-client";
import { SingleFlight } from "./single-flight";
import { emptyTree, type DocumentMeta, type MetadataTree, type StateFingerprint } from "./types";

export type SyncState = "unsynced" | "synced" | "refreshing";

export interface SyncOutcome {
  /** False when the fingerprint matched and nothing was fetched. */
  changed: boolean;
  fingerprint: StateFingerprint;
  /** Items in the tree now being served. */
  itemCount: number;
  /** Ids whose metadata could not be fetched this round. */
  partial: readonly string[];
  /** Ids dropped by validation (cycles and orphans). */
  dropped: readonly string[];
}

/** Called after every tree swap. Runs in the background; failures are logged. */
export type TreeListener = (previous: MetadataTree, next: MetadataTree) => void | Promise<void>;

export interface SyncEngineOptions {
  remote: RemoteSource;
  /** Width of the metadata worker pool. */
  workers?: number;
  /** `ensureFresh` skips the network while the last sync is younger than this. */
  ttlMs?: number;
  verbose?: boolean;
  /** Clock; tests inject a fake. */
  now?: () => number;
}

export interface ValidatedTree {
  items: Map<string, DocumentMeta>;
  /** Items that sit on a parent cycle. */
  cycles: string[];
  /** Items whose ancestor chain does not reach the library root. */
  orphans: string[];
}

/**
 * Keep only items whose parent chain reaches the library root. Members of a
 * cycle and everything hanging below a missing or cyclic parent are dropped.
 */
export function validateTree(items: readonly DocumentMeta[]): ValidatedTree {
  const byId = new Map<string, DocumentMeta>();
  for (const m of items) byId.set(m.id, m);

  const verdicts = new Map<string, "ok" | "orphan" | "cycle">();
  for (const start of byId.values()) {
    if (verdicts.has(start.id)) continue;
    const chain: string[] = [];
    const position = new Map<string, number>();
    let verdict: "ok" | "orphan" = "ok";
    let cur: DocumentMeta = start;
    for (;;) {
      const known = verdicts.get(cur.id);
      if (known) {
        verdict = known === "ok" ? "ok" : "orphan";
        break;
      }
      const at = position.get(cur.id);
      if (at !== undefined) {
        for (const id of chain.slice(at)) verdicts.set(id, "cycle");
        chain.length = at;
        verdict = "orphan";
        break;
      }
      position.set(cur.id, chain.length);
      chain.push(cur.id);
      if (cur.parentId === null) break;
      const parent = byId.get(cur.parentId);
      if (!parent) {
        verdict = "orphan";
        break;
      }
      cur = parent;
    }
    for (const id of chain) verdicts.set(id, verdict);
  }

  const out: ValidatedTree = { items: new Map(), cycles: [], orphans: [] };
  for (const [id, meta] of byId) {
    const v = verdicts.get(id);
    if (v === "ok") out.items.set(id, meta);
    else if (v === "cycle") out.cycles.push(id);
    else out.orphans.push(id);
  }
  return out;
}

/**
 * Keeps the authoritative metadata tree in step with the remote.
 *
 * State machine: `unsynced -> refreshing -> synced`, and `synced <-> refreshing`
 * afterwards. A sync first compares fingerprints and stops there when nothing
 * changed. Otherwise it fetches and validates the whole tree and swaps it in as
 * one new object, so readers see either the old tree or the new one. Concurrent
 * `sync()` calls share one run.
 */
export class SyncEngine {
  private readonly remote: RemoteSource;
  private readonly workers: number;
  private readonly ttlMs: number;
  private readonly verbose: boolean;
  private readonly now: () => number;
  private readonly flight = new SingleFlight<"sync", SyncOutcome>();
  private readonly listeners = new Set<TreeListener>();
  private tree: MetadataTree = emptyTree();
  private status: SyncState = "unsynced";
  private lastSuccessAt: number | null = null;
  private outcome: SyncOutcome | null = null;
  private failure: Error | null = null;

  public constructor(opts: SyncEngineOptions) {
    this.remote = opts.remote;
    this.workers = opts.workers ?? 5;
    this.ttlMs = opts.ttlMs ?? 60_000;
    this.verbose = !!opts.verbose;
    this.now = opts.now ?? Date.now;
  }

  public get state(): SyncState {
    return this.status;
  }

  /** The tree currently served. Never mutated; replaced on change. */
  public get current(): MetadataTree {
    return this.tree;
  }

  /** Epoch ms of the last successful sync, or null before the first one. */
  public get lastSyncedAt(): number | null {
    return this.lastSuccessAt;
  }

  /** Result of the last successful sync. */
  public get lastOutcome(): SyncOutcome | null {
    return this.outcome;
  }

  /** Error of the last failed sync; cleared by the next success. */
  public get lastError(): Error | null {
    return this.failure;
  }

  /** Subscribe to tree swaps. Returns the unsubscribe function. */
  public onTreeReplaced(listener: TreeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Bring the tree up to date, or join the sync already running. On failure
   * the previous tree stays in place and the error propagates.
   */
  public sync(signal?: AbortSignal): Promise<SyncOutcome> {
    return this.flight.run("sync", (s) => this.runSync(s), signal);
  }

  /** Current tree, syncing first unless the last successful sync is within the TTL. */
  public async ensureFresh(signal?: AbortSignal): Promise<MetadataTree> {
    if (this.lastSuccessAt !== null && this.now() - this.lastSuccessAt < this.ttlMs) {
      return this.tree;
    }
    await this.sync(signal);
    return this.tree;
  }

  private async runSync(signal: AbortSignal): Promise<SyncOutcome> {
    const before = this.status;
    this.status = "refreshing";
    try {
      const fingerprint = await this.remote.fetchFingerprint(signal);
      if (fingerprint === this.tree.fingerprint) {
        this.status = "synced";
        this.lastSuccessAt = this.now();
        if (this.verbose) console.error(`[Sync][verbose] Fingerprint unchanged (${fingerprint}).`);
        return this.succeed({ changed: false, fingerprint, itemCount: this.tree.items.size, partial: [], dropped: [] });
      }

      const fetched = await this.remote.fetchTree(fingerprint, { workers: this.workers, signal });
      const items = [...fetched.items];
      for (const id of fetched.partial) {
        const old = this.tree.items.get(id);
        if (old) items.push({ ...old, partial: true });
      }
      if (fetched.partial.length > 0) {
        console.error(
          `[Sync] ${fetched.partial.length} item(s) could not be fetched; previous metadata kept where known. Next sync retries.`,
        );
      }

      const validated = validateTree(items);
      const dropped = [...validated.cycles, ...validated.orphans];
      if (validated.cycles.length > 0) {
        const err = new TreeInconsistentError(`Parent cycle among ${validated.cycles.length} item(s); dropped.`, validated.cycles);
        console.error(`[Sync] ${err.message} ids=${err.itemIds.join(",")}`);
      }
      if (validated.orphans.length > 0) {
        const err = new TreeInconsistentError(`${validated.orphans.length} orphaned item(s) dropped.`, validated.orphans);
        console.error(`[Sync] ${err.message} ids=${err.itemIds.join(",")}`);
      }

      const previous = this.tree;
      const next: MetadataTree = {
        // A partial tree must not short-circuit the next sync.
        fingerprint: fetched.partial.length > 0 ? null : fingerprint,
        items: validated.items,
        syncedAt: new Date(this.now()),
      };
      this.tree = next;
      this.status = "synced";
      this.lastSuccessAt = this.now();
      console.error(`[Sync] Tree replaced: ${next.items.size} item(s).`);
      this.notify(previous, next);
      return this.succeed({ changed: true, fingerprint, itemCount: next.items.size, partial: fetched.partial, dropped });
    } catch (e) {
      this.status = before === "refreshing" ? "unsynced" : before;
      this.failure = e instanceof Error ? e : new Error(String(e));
      throw e;
    }
  }

  private succeed(outcome: SyncOutcome): SyncOutcome {
    this.outcome = outcome;
    this.failure = null;
    return outcome;
  }

  private notify(previous: MetadataTree, next: MetadataTree): void {
    for (const listener of this.listeners) {
      Promise.resolve()
        .then(() => listener(previous, next))
        .catch((e: unknown) => {
          console.error(`[Sync] Tree listener failed: ${e instanceof Error ? e.message : String(e)}`);
        });
    }
  }
}
