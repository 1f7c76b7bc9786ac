import type { CacheStats } from "./cache-store";
import { APP_VERSION } from "./config";
import type { IndexStats } from "./search-index";
import type { SyncState } from "./sync-engine";

/** Outcome of the most recent sync attempts. */
export interface SyncStatus {
  state: SyncState;
  /** ISO timestamp of the last successful sync. */
  lastSyncedAt: string | null;
  /** Whether the served tree carries a remote fingerprint (false before the first sync or after a partial one). */
  fingerprint: boolean;
  /** Items in the current tree. */
  items: number;
  /** Items left over from an earlier tree because their metadata could not be fetched. */
  partial: number;
  /** Items dropped by validation during the last tree replacement. */
  dropped: number;
  /** Message of the last failed sync; cleared by the next success. */
  lastError: string | null;
}

/** Values read from live components each time a snapshot is taken. */
export interface LiveStats {
  sync: SyncStatus;
  documents: number;
  index: IndexStats;
  cache: CacheStats;
}

/**
 * Snapshot served by `/health` and the status tool.
 *
 * ready = true once the first sync has completed (successfully or not) and the
 * index has been opened. Tools work before that, but the first call pays for
 * the sync.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  /** Root scope, "/" when the whole library is visible. */
  rootPath: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  documents: number;
  sync: SyncStatus;
  index: IndexStats | null;
  cache: CacheStats | null;
}

/**
 * Class wrapper around mutable server status state. One instance lives in the
 * application context; live numbers come from the probe installed there.
 */
export class StatusManager {
  private readonly data: ServerStatus;
  private probe: (() => LiveStats) | null = null;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      transport: initial?.transport ?? "unknown",
      rootPath: initial?.rootPath ?? "/",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      documents: initial?.documents ?? 0,
      sync: initial?.sync ?? {
        state: "unsynced",
        lastSyncedAt: null,
        fingerprint: false,
        items: 0,
        partial: 0,
        dropped: 0,
        lastError: null,
      },
      index: initial?.index ?? null,
      cache: initial?.cache ?? null,
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  /** Install the function that reads live component statistics. */
  public attach(probe: () => LiveStats) {
    this.probe = probe;
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Current snapshot, with live fields refreshed from the probe. */
  public getStatus(): ServerStatus {
    if (this.probe) {
      const live = this.probe();
      this.data.sync = live.sync;
      this.data.documents = live.documents;
      this.data.index = live.index;
      this.data.cache = live.cache;
    }
    return this.data;
  }
}
