import { NotFoundError, abortError } from "../errors";
import type { FetchTreeOptions, FetchTreeResult, RemoteSource } from "../remote-client";
import type { DocumentMeta, MetadataTree } from "../types";

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

/** A promise plus the functions that settle it. */
export function deferred<T>(): Deferred<T> {
  const handlers: { resolve: (value: T) => void; reject: (reason: unknown) => void } = {
    resolve: () => undefined,
    reject: () => undefined,
  };
  const promise = new Promise<T>((resolve, reject) => {
    handlers.resolve = resolve;
    handlers.reject = reject;
  });
  return {
    promise,
    resolve: (value) => handlers.resolve(value),
    reject: (reason) => handlers.reject(reason),
  };
}

export function folder(id: string, name: string, parentId: string | null = null, extra: Partial<DocumentMeta> = {}): DocumentMeta {
  return { id, parentId, kind: "folder", name, version: "1", modifiedAt: null, pinned: false, ...extra };
}

export function doc(
  id: string,
  name: string,
  parentId: string | null,
  version = "1",
  extra: Partial<DocumentMeta> = {},
): DocumentMeta {
  return {
    id,
    parentId,
    kind: "document",
    fileType: "pdf",
    name,
    version,
    modifiedAt: null,
    pinned: false,
    ...extra,
  };
}

export function treeOf(items: readonly DocumentMeta[], fingerprint: string | null = "fp-1"): MetadataTree {
  return { fingerprint, items: new Map(items.map((m) => [m.id, m])), syncedAt: new Date() };
}

/**
 * In-process remote with call counters. Tests mutate `items`, `fingerprint`
 * and `contents` to simulate remote changes.
 */
export class FakeRemote implements RemoteSource {
  public fingerprint = "fp-1";
  public items: DocumentMeta[] = [];
  /** Keyed by `${id}@${version}`. */
  public contents = new Map<string, Buffer>();
  public partial: string[] = [];
  public fingerprintCalls = 0;
  public treeCalls = 0;
  public contentCalls = 0;
  /** When set, the next fetch of any kind waits for it. */
  public gate: Promise<void> | null = null;
  public failWith: Error | null = null;

  public get totalCalls(): number {
    return this.fingerprintCalls + this.treeCalls + this.contentCalls;
  }

  public setContent(id: string, version: string, data: string | Buffer): void {
    this.contents.set(`${id}@${version}`, typeof data === "string" ? Buffer.from(data) : data);
  }

  public async fetchFingerprint(signal?: AbortSignal): Promise<string> {
    this.fingerprintCalls++;
    await this.wait(signal);
    return this.fingerprint;
  }

  public async fetchTree(_fingerprint: string, opts: FetchTreeOptions = {}): Promise<FetchTreeResult> {
    this.treeCalls++;
    await this.wait(opts.signal);
    return { items: [...this.items], partial: [...this.partial] };
  }

  public async fetchContent(documentId: string, version: string, signal?: AbortSignal): Promise<Buffer> {
    this.contentCalls++;
    await this.wait(signal);
    const data = this.contents.get(`${documentId}@${version}`);
    if (!data) throw new NotFoundError(`Document ${documentId} version ${version} no longer exists remotely.`);
    return data;
  }

  private async wait(signal?: AbortSignal): Promise<void> {
    if (this.gate) {
      const gate = this.gate;
      await new Promise<void>((resolve, reject) => {
        const onAbort = () => reject(abortError(signal));
        signal?.addEventListener("abort", onAbort, { once: true });
        gate.then(
          () => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
          },
          reject,
        );
      });
    }
    if (signal?.aborted) throw abortError(signal);
    if (this.failWith) throw this.failWith;
  }
}
