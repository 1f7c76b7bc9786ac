import { CacheStore } from "./cache-store";
import type { Config } from "./config";
import { isAbortError } from "./errors";
import { defaultExtractor, type Extractor, type Renderer } from "./extractor";
import { PathResolver } from "./path-resolver";
import { Persistence } from "./persistence";
import { RemoteClient, type RemoteSource } from "./remote-client";
import { SearchIndex, type DocumentView } from "./search-index";
import { StatusManager } from "./status";
import { SyncEngine } from "./sync-engine";

/**
 * Everything a tool call needs, built once at startup and passed by reference.
 * There is no module-level state: two contexts never share anything.
 */
export interface AppContext {
  readonly config: Config;
  readonly persistence: Persistence;
  readonly remote: RemoteSource;
  readonly sync: SyncEngine;
  readonly resolver: PathResolver;
  readonly index: SearchIndex;
  readonly cache: CacheStore;
  readonly status: StatusManager;
  /**
   * Sync unless the tree is within its TTL. Once a tree has been served, a
   * failed refresh is logged and the previous tree stays in use.
   */
  refresh(signal?: AbortSignal): Promise<void>;
  /** First sync and index check. Sync failures are logged, not thrown. */
  warmUp(): Promise<void>;
  close(): Promise<void>;
}

/** Replacements for the collaborators `createContext` would otherwise build. */
export interface ContextOverrides {
  remote?: RemoteSource;
  extractor?: Extractor;
  renderer?: Renderer;
  /** Store location; defaults to `config.INDEX_PATH`. */
  storePath?: string;
  now?: () => number;
}

export function createContext(config: Config, overrides: ContextOverrides = {}): AppContext {
  const verbose = config.VERBOSE;
  const persistence = new Persistence(overrides.storePath ?? config.INDEX_PATH, verbose);
  const client =
    overrides.remote ??
    new RemoteClient({
      syncUrl: config.SYNC_URL,
      authUrl: config.AUTH_URL,
      credential: config.TOKEN,
      maxAttempts: config.MAX_ATTEMPTS,
      connections: config.HTTP_CONNECTIONS,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      verbose,
    });
  const ttlMs = config.CACHE_TTL * 1000;

  const sync = new SyncEngine({ remote: client, workers: config.PARALLEL_WORKERS, ttlMs, verbose, now: overrides.now });
  const resolver = new PathResolver(() => sync.current, config.ROOT_PATH);

  const currentView = (documentId: string): DocumentView | undefined => {
    const meta = sync.current.items.get(documentId);
    const path = resolver.tryResolveId(documentId);
    return meta && path !== undefined ? { version: meta.version, path } : undefined;
  };
  const refresh = async (signal?: AbortSignal): Promise<void> => {
    try {
      await sync.ensureFresh(signal);
    } catch (e) {
      if (sync.lastSyncedAt === null || isAbortError(e)) throw e;
      console.error(`[MCP] Refresh failed; serving the previous tree: ${e instanceof Error ? e.message : String(e)}`);
    }
  };
  const index = new SearchIndex({ persistence, currentView, verbose, now: overrides.now });

  const cache = new CacheStore({
    persistence,
    remote: client,
    tree: () => sync.current,
    resolver,
    extractor: overrides.extractor ?? defaultExtractor(verbose),
    renderer: overrides.renderer,
    index,
    refreshTree: refresh,
    memoryEntries: config.MEMORY_CACHE_ENTRIES,
    listingTtlMs: ttlMs,
    verbose,
    now: overrides.now,
  });
  sync.onTreeReplaced((_previous, next) => cache.sweep(next).then(() => undefined));

  const status = new StatusManager({ rootPath: resolver.scope });
  status.attach(() => {
    const tree = sync.current;
    let partial = 0;
    for (const m of tree.items.values()) if (m.partial) partial++;
    const last = sync.lastSyncedAt;
    return {
      sync: {
        state: sync.state,
        lastSyncedAt: last === null ? null : new Date(last).toISOString(),
        fingerprint: tree.fingerprint !== null,
        items: tree.items.size,
        partial,
        dropped: sync.lastOutcome?.dropped.length ?? 0,
        lastError: sync.lastError?.message ?? null,
      },
      documents: resolver.documents().length,
      index: index.stats(),
      cache: cache.stats(),
    };
  });

  return {
    config,
    persistence,
    remote: client,
    sync,
    resolver,
    index,
    cache,
    status,
    refresh,
    async warmUp() {
      try {
        const outcome = await sync.sync();
        console.error(`[MCP] Library synced: ${outcome.itemCount} item(s).`);
      } catch (e) {
        console.error("[MCP] Initial sync failed; tools will retry on demand:", e instanceof Error ? e.message : e);
      }
      await index.open(config.REBUILD_INDEX);
      status.markReady();
    },
    async close() {
      if (client instanceof RemoteClient) await client.close();
      await persistence.close();
    },
  };
}
