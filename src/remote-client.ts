import { Agent, request, type Dispatcher } from "undici";
import { z } from "zod";
import { packBundle, type BundleFile } from "./bundle";
import {
  AuthExpiredError,
  NotFoundError,
  SourceUnavailableError,
  abortError,
  isAbortError,
} from "./errors";
import { DEFAULT_BACKOFF, backoffDelay, pause, type BackoffOptions } from "./retry";
import { SingleFlight } from "./single-flight";
import type { DocumentMeta, FileType, StateFingerprint } from "./types";
import { mapPool } from "./worker-pool";

/** One line of a blob index: `hash:type:id:subfiles:size`. */
export interface IndexEntry {
  hash: string;
  type: string;
  id: string;
  subfiles: number;
  size: number;
}

export interface FetchTreeOptions {
  /** Parallel item-metadata fetches (default 5). */
  workers?: number;
  signal?: AbortSignal;
}

export interface FetchTreeResult {
  /** Live items (deleted and trashed items are already dropped). */
  items: DocumentMeta[];
  /** Ids whose metadata could not be fetched after retries. */
  partial: string[];
}

/**
 * What the sync and cache layers need from the remote. {@link RemoteClient}
 * is the HTTP implementation; tests substitute in-process fakes.
 */
export interface RemoteSource {
  fetchFingerprint(signal?: AbortSignal): Promise<StateFingerprint>;
  fetchTree(fingerprint: StateFingerprint, opts?: FetchTreeOptions): Promise<FetchTreeResult>;
  fetchContent(documentId: string, version: string, signal?: AbortSignal): Promise<Buffer>;
}

export interface RemoteClientOptions {
  syncUrl: string;
  authUrl: string;
  /** Device token, or JSON `{"devicetoken": "...", "usertoken": "..."}`. */
  credential: string;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Persistent connections per origin (default 10). Excess requests queue. */
  connections?: number;
  /** Header and body timeout per request (default 60s). */
  timeoutMs?: number;
  /** Overrides the pooled agent (tests pass an undici MockAgent). */
  dispatcher?: Dispatcher;
  random?: () => number;
  verbose?: boolean;
}

const RootSchema = z.object({ hash: z.string().min(1), generation: z.number().optional() });

const CredentialSchema = z.object({
  devicetoken: z.string().default(""),
  usertoken: z.string().default(""),
});

const ItemMetadataSchema = z.object({
  visibleName: z.string().optional(),
  type: z.string().optional(),
  parent: z.string().optional(),
  deleted: z.boolean().optional(),
  pinned: z.boolean().optional(),
  lastModified: z.union([z.string(), z.number()]).optional(),
});

/** Parent id the remote uses for items in the trash. */
export const TRASH_PARENT = "trash";

const USER_TOKEN_PATH = "/token/json/2/user/new";
const ROOT_PATH = "/sync/v4/root";
const FILES_PATH = "/sync/v3/files";

type Attempt =
  | { kind: "response"; status: number; body: Buffer }
  | { kind: "network"; error: unknown };

/**
 * Split a credential string into device and user tokens.
 * Accepts token JSON or a bare device token.
 */
export function parseCredential(raw: string): { deviceToken: string; userToken: string } {
  const trimmed = raw.trim();
  if (trimmed.startsWith("{")) {
    try {
      const parsed = CredentialSchema.safeParse(JSON.parse(trimmed));
      if (parsed.success) {
        return { deviceToken: parsed.data.devicetoken, userToken: parsed.data.usertoken };
      }
    } catch {
      // not JSON after all: treat as a bare token
    }
  }
  return { deviceToken: trimmed, userToken: "" };
}

/**
 * Parse a blob index. The first line is the schema version; malformed lines
 * are skipped.
 */
export function parseIndex(content: Buffer | string): IndexEntry[] {
  const lines = content.toString().trim().split("\n").slice(1);
  const entries: IndexEntry[] = [];
  for (const line of lines) {
    const parts = line.trim().split(":");
    const subfiles = Number(parts[3]);
    const size = Number(parts[4]);
    if (parts.length < 5 || !parts[0] || !parts[2] || !Number.isFinite(subfiles) || !Number.isFinite(size)) {
      if (line.trim()) console.error(`[Remote] Skipping malformed index line: ${line.slice(0, 100)}`);
      continue;
    }
    entries.push({ hash: parts[0], type: parts[1], id: parts[2], subfiles, size });
  }
  return entries;
}

/** Infer the document format from its files, then from its name. */
export function inferFileType(files: readonly IndexEntry[], name: string): FileType {
  if (files.some((f) => f.id.toLowerCase().endsWith(".pdf"))) return "pdf";
  if (files.some((f) => f.id.toLowerCase().endsWith(".epub"))) return "epub";
  const lower = name.toLowerCase();
  if (lower.endsWith(".pdf")) return "pdf";
  if (lower.endsWith(".epub")) return "epub";
  return "notebook";
}

/**
 * Authenticated HTTP client for the library's sync API.
 *
 * - Connections come from one bounded undici pool shared by every caller.
 * - Timeouts, connection errors and 5xx are retried with exponential backoff
 *   and jitter; exhausting `maxAttempts` raises {@link SourceUnavailableError}.
 * - A 401 triggers exactly one token refresh and retry; a second 401 raises
 *   {@link AuthExpiredError}. Concurrent refreshes collapse into one.
 */
export class RemoteClient implements RemoteSource {
  private readonly syncUrl: string;
  private readonly authUrl: string;
  private readonly deviceToken: string;
  private userToken: string;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly backoff: BackoffOptions;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;
  private readonly refreshes = new SingleFlight<string, string>();
  private requestCount = 0;

  public constructor(opts: RemoteClientOptions) {
    this.syncUrl = opts.syncUrl.replace(/\/+$/, "");
    this.authUrl = opts.authUrl.replace(/\/+$/, "");
    const { deviceToken, userToken } = parseCredential(opts.credential);
    this.deviceToken = deviceToken;
    this.userToken = userToken;
    this.backoff = {
      maxAttempts: Math.max(1, opts.maxAttempts ?? DEFAULT_BACKOFF.maxAttempts),
      baseDelayMs: opts.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
      maxDelayMs: opts.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
      random: opts.random,
    };
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.verbose = !!opts.verbose;
    if (opts.dispatcher) {
      this.dispatcher = opts.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({ connections: opts.connections ?? 10, keepAliveTimeout: 30_000 });
      this.ownsDispatcher = true;
    }
  }

  /** Total HTTP requests issued (including retries and token refreshes). */
  public get requestsIssued(): number {
    return this.requestCount;
  }

  // -------------------- Public contract --------------------

  /** Current library fingerprint. One small request; never downloads metadata. */
  public async fetchFingerprint(signal?: AbortSignal): Promise<StateFingerprint> {
    const body = await this.get(`${this.syncUrl}${ROOT_PATH}`, signal);
    let json: unknown;
    try {
      json = JSON.parse(body.toString("utf8"));
    } catch {
      throw new SourceUnavailableError(
        `Invalid JSON from root endpoint: ${body.toString("utf8").slice(0, 200)}`,
        1,
      );
    }
    const parsed = RootSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceUnavailableError("Unexpected root response format; the remote API may have changed.", 1);
    }
    return parsed.data.hash;
  }

  /**
   * Full metadata listing for `fingerprint`. Item metadata is fetched through
   * a bounded worker pool; an item whose fetch fails after retries lands in
   * `partial` rather than failing the listing. Auth failures and cancellation
   * still abort the whole call.
   */
  public async fetchTree(fingerprint: StateFingerprint, opts: FetchTreeOptions = {}): Promise<FetchTreeResult> {
    const { signal } = opts;
    const entries = parseIndex(await this.getFile(fingerprint, signal));
    const partial: string[] = [];
    const metas = await mapPool(entries, opts.workers ?? 5, async (entry) => {
      try {
        return await this.fetchItem(entry, signal);
      } catch (e) {
        if (e instanceof SourceUnavailableError || e instanceof NotFoundError) {
          console.error(`[Remote] Metadata for ${entry.id} unavailable (${e.message}); marking partial.`);
          partial.push(entry.id);
          return null;
        }
        throw e;
      }
    });
    const items = metas.filter((m): m is DocumentMeta => m !== null);
    if (this.verbose) {
      console.error(
        `[Remote][verbose] Listed ${entries.length} entries: ${items.length} live, ${partial.length} partial`,
      );
    }
    return { items, partial };
  }

  /**
   * Raw bytes of one document version. PDF/EPUB documents yield their source
   * file; notebooks yield a bundle of their page files.
   *
   * @throws {NotFoundError} if the remote no longer has that version.
   */
  public async fetchContent(documentId: string, version: string, signal?: AbortSignal): Promise<Buffer> {
    let files: IndexEntry[];
    try {
      files = parseIndex(await this.getFile(version, signal));
    } catch (e) {
      if (e instanceof NotFoundError) {
        throw new NotFoundError(`Document ${documentId} version ${version} no longer exists remotely.`);
      }
      throw e;
    }
    const source = files.find((f) => /\.(pdf|epub)$/i.test(f.id));
    if (source) return this.getFile(source.hash, signal);

    const pages = files.filter((f) => !f.id.endsWith(".metadata"));
    const bundle: BundleFile[] = [];
    for (const f of pages) {
      bundle.push({ name: f.id, data: await this.getFile(f.hash, signal) });
    }
    return packBundle(bundle);
  }

  /** Release pooled connections (only when the client created the pool). */
  public async close(): Promise<void> {
    if (this.ownsDispatcher) await this.dispatcher.close();
  }

  // -------------------- Item metadata --------------------

  /** Metadata for one root-index entry; null for deleted, trashed or unreadable items. */
  public async fetchItem(entry: IndexEntry, signal?: AbortSignal): Promise<DocumentMeta | null> {
    const files = parseIndex(await this.getFile(entry.hash, signal));
    const metaFile = files.find((f) => f.id.endsWith(".metadata"));
    if (!metaFile) {
      console.error(`[Remote] Item ${entry.id} has no metadata file; skipping.`);
      return null;
    }
    const raw = await this.getFile(metaFile.hash, signal);
    let json: unknown;
    try {
      json = JSON.parse(raw.toString("utf8"));
    } catch {
      console.error(`[Remote] Unparseable metadata for ${entry.id} (blob ${metaFile.hash}); skipping.`);
      return null;
    }
    const parsed = ItemMetadataSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`[Remote] Unexpected metadata shape for ${entry.id}; skipping.`);
      return null;
    }
    const m = parsed.data;
    if (m.deleted || m.parent === TRASH_PARENT) return null;

    const name = m.visibleName ?? entry.id;
    const isFolder = m.type === "CollectionType";
    const ms = m.lastModified === undefined ? NaN : Number(m.lastModified);
    return {
      id: entry.id,
      parentId: m.parent ? m.parent : null,
      kind: isFolder ? "folder" : "document",
      fileType: isFolder ? undefined : inferFileType(files, name),
      name,
      version: entry.hash,
      modifiedAt: Number.isFinite(ms) ? new Date(ms) : null,
      pinned: m.pinned ?? false,
    };
  }

  // -------------------- Transport --------------------

  private getFile(hash: string, signal?: AbortSignal): Promise<Buffer> {
    return this.get(`${this.syncUrl}${FILES_PATH}/${encodeURIComponent(hash)}`, signal);
  }

  /** Authenticated GET with refresh-on-401 and transient retry. */
  private async get(url: string, signal?: AbortSignal): Promise<Buffer> {
    let refreshed = false;
    let token = this.userToken || (await this.refreshToken("", signal));
    for (let attempt = 1; ; ) {
      const res = await this.attempt("GET", url, token, signal);
      if (res.kind === "response") {
        if (res.status >= 200 && res.status < 300) return res.body;
        if (res.status === 401) {
          if (refreshed) throw new AuthExpiredError();
          refreshed = true;
          token = await this.refreshToken(token, signal);
          continue;
        }
        if (res.status === 404) throw new NotFoundError(`Not found: ${url}`);
        if (res.status < 500) {
          throw new SourceUnavailableError(`HTTP ${res.status} from ${url}`, attempt, res.status);
        }
      }
      if (attempt >= this.backoff.maxAttempts) {
        const status = res.kind === "response" ? res.status : undefined;
        const cause = res.kind === "network" ? res.error : undefined;
        throw new SourceUnavailableError(
          `Giving up on ${url} after ${attempt} attempts`,
          attempt,
          status,
          { cause },
        );
      }
      const delay = backoffDelay(attempt, this.backoff);
      if (this.verbose) {
        const why = res.kind === "response" ? `HTTP ${res.status}` : String(res.error);
        console.error(`[Remote][verbose] Attempt ${attempt} for ${url} failed (${why}); retrying in ${delay}ms`);
      }
      await pause(delay, signal);
      attempt++;
    }
  }

  /**
   * Exchange the device token for a fresh user token. Concurrent callers that
   * saw the same stale token share one exchange; a caller whose stale token was
   * already replaced gets the new one without another request.
   */
  private async refreshToken(stale: string, signal?: AbortSignal): Promise<string> {
    if (this.userToken && this.userToken !== stale) return this.userToken;
    if (!this.deviceToken) throw new AuthExpiredError("No device token available to refresh the session.");
    return this.refreshes.run(
      "user-token",
      async (inner) => {
        const url = `${this.authUrl}${USER_TOKEN_PATH}`;
        for (let attempt = 1; ; attempt++) {
          const res = await this.attempt("POST", url, this.deviceToken, inner);
          if (res.kind === "response") {
            const text = res.body.toString("utf8").trim();
            if (res.status >= 200 && res.status < 300 && text) {
              this.userToken = text;
              if (this.verbose) console.error(`[Remote][verbose] User token renewed`);
              return text;
            }
            if (res.status < 500) throw new AuthExpiredError(`Token renewal rejected (HTTP ${res.status}).`);
          }
          if (attempt >= this.backoff.maxAttempts) {
            throw new SourceUnavailableError(`Token renewal failed after ${attempt} attempts`, attempt);
          }
          await pause(backoffDelay(attempt, this.backoff), inner);
        }
      },
      signal,
    );
  }

  /** One HTTP exchange. Network-level failures are returned, aborts are thrown. */
  private async attempt(method: "GET" | "POST", url: string, bearer: string, signal?: AbortSignal): Promise<Attempt> {
    if (signal?.aborted) throw abortError(signal);
    this.requestCount++;
    try {
      const res = await request(url, {
        method,
        dispatcher: this.dispatcher,
        headers: { authorization: `Bearer ${bearer}` },
        signal,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      const body = Buffer.from(await res.body.arrayBuffer());
      return { kind: "response", status: res.statusCode, body };
    } catch (error) {
      if (signal?.aborted) throw abortError(signal);
      if (isAbortError(error)) throw error;
      return { kind: "network", error };
    }
  }
}
