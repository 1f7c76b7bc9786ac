/**
 * Shared document-library types used throughout the sync, cache and index layers.
 */

export type ItemKind = "document" | "folder";

export type FileType = "notebook" | "pdf" | "epub";

/**
 * Metadata for a single library item as published by the remote.
 * Instances are never mutated; a changed item arrives as a new object in a new tree.
 */
export interface DocumentMeta {
  /** Stable opaque identifier. */
  readonly id: string;
  /** Parent folder id, or null for items directly under the library root. */
  readonly parentId: string | null;
  readonly kind: ItemKind;
  /** Present for documents only. */
  readonly fileType?: FileType;
  readonly name: string;
  /** Per-item revision token. Compared for equality only. */
  readonly version: string;
  readonly modifiedAt: Date | null;
  readonly pinned: boolean;
  /** Set when the latest metadata for this item could not be fetched and an older copy was kept. */
  readonly partial?: boolean;
}

/** Opaque token summarizing the whole remote library. */
export type StateFingerprint = string;

/**
 * Immutable snapshot of the library. Replaced wholesale on every successful sync.
 */
export interface MetadataTree {
  readonly fingerprint: StateFingerprint | null;
  readonly items: ReadonlyMap<string, DocumentMeta>;
  readonly syncedAt: Date;
}

export type ArtifactKind = "raw-content" | "extracted-text" | `rendered-page:${number}`;

/** Build the artifact kind for a rendered page (0-based page index). */
export function renderedPage(pageIndex: number): ArtifactKind {
  return `rendered-page:${pageIndex}`;
}

/** Parse the page index back out of a rendered-page artifact kind; null for other kinds. */
export function pageIndexOf(kind: ArtifactKind): number | null {
  const m = /^rendered-page:(\d+)$/.exec(kind);
  return m ? Number(m[1]) : null;
}

/** One row of the search index. Superseded (not appended) on re-index. */
export interface IndexRecord {
  readonly documentId: string;
  readonly version: string;
  readonly path: string;
  readonly text: string;
  readonly indexedAt: number;
}

export interface SearchHit {
  readonly documentId: string;
  readonly path: string;
  /** Larger is better. */
  readonly rankScore: number;
  readonly snippet: string;
}

/** Empty tree used before the first sync. */
export function emptyTree(): MetadataTree {
  return { fingerprint: null, items: new Map(), syncedAt: new Date(0) };
}
