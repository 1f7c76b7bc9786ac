import { NotFoundError } from "./errors";
import type { DocumentMeta, MetadataTree } from "./types";

/** Lookup tables derived from one tree; rebuilt only when the tree object changes. */
interface PathTables {
  readonly tree: MetadataTree;
  /** id -> absolute path from the library root. */
  readonly absPath: Map<string, string>;
  /** lower-cased absolute path -> items with that path (siblings may share names). */
  readonly byPath: Map<string, DocumentMeta[]>;
  /** parent id ("" for the library root) -> children. */
  readonly children: Map<string, DocumentMeta[]>;
  /** Configured scope folder; undefined when unscoped, null when the scope folder is missing. */
  readonly scopeId: string | null | undefined;
}

/** Collapse duplicate slashes and force a leading slash / no trailing slash. */
export function normalizePath(p: string): string {
  const parts = p.split("/").filter((s) => s.length > 0);
  return "/" + parts.join("/");
}

function newer(a: DocumentMeta, b: DocumentMeta): number {
  const ta = a.modifiedAt?.getTime() ?? -Infinity;
  const tb = b.modifiedAt?.getTime() ?? -Infinity;
  if (ta !== tb) return tb > ta ? 1 : -1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Sørensen–Dice similarity over character bigrams, in [0, 1]. */
function similarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;
  const grams = new Map<string, number>();
  for (let i = 0; i < a.length - 1; i++) {
    const g = a.slice(i, i + 2);
    grams.set(g, (grams.get(g) ?? 0) + 1);
  }
  let hits = 0;
  for (let i = 0; i < b.length - 1; i++) {
    const g = b.slice(i, i + 2);
    const n = grams.get(g) ?? 0;
    if (n > 0) {
      grams.set(g, n - 1);
      hits++;
    }
  }
  return (2 * hits) / (a.length + b.length - 2);
}

/**
 * Maps between hierarchical path strings and item ids, restricted to an
 * optional root scope. Paths handed out are always relative to the scope.
 *
 * Lookups are case-insensitive with exact-case matches preferred. When several
 * items share a path (same-named siblings) the most recently modified wins;
 * equal timestamps fall back to id order so the choice is stable.
 */
export class PathResolver {
  private readonly rootPath: string | undefined;
  private readonly getTree: () => MetadataTree;
  private tables: PathTables | null = null;

  /**
   * @param getTree  Returns the current tree (read on every call; swaps are picked up automatically).
   * @param rootPath Normalized scope such as "/Work", or undefined for the whole library.
   */
  public constructor(getTree: () => MetadataTree, rootPath?: string) {
    this.getTree = getTree;
    this.rootPath = rootPath ? normalizePath(rootPath) : undefined;
  }

  /** Configured scope ("/" when unscoped). */
  public get scope(): string {
    return this.rootPath ?? "/";
  }

  /**
   * Resolve a scoped path to an item id. "/" is the scope itself: the scope
   * folder's id, or null for the library root when unscoped.
   *
   * @throws {NotFoundError} if nothing in scope has that path.
   */
  public resolvePath(path: string): string | null {
    const t = this.current();
    const rel = normalizePath(path);
    if (t.scopeId === null) throw new NotFoundError(`Root folder '${this.rootPath}' does not exist.`);
    if (rel === "/") return t.scopeId ?? null;

    const abs = this.rootPath ? this.rootPath + rel : rel;
    const candidates = (t.byPath.get(abs.toLowerCase()) ?? []).filter((m) => this.inScope(t, m.id));
    const exact = candidates.filter((m) => t.absPath.get(m.id) === abs);
    const pool = exact.length > 0 ? exact : candidates;
    const best = [...pool].sort(newer)[0];
    if (!best) throw new NotFoundError(`Not found: '${rel}'`);
    return best.id;
  }

  /**
   * Scoped path of an item.
   * @throws {NotFoundError} if the id is unknown or outside the scope.
   */
  public resolveId(documentId: string): string {
    const t = this.current();
    const abs = t.absPath.get(documentId);
    if (abs === undefined || !this.inScope(t, documentId)) {
      throw new NotFoundError(`No item with id '${documentId}' in scope.`);
    }
    if (!this.rootPath) return abs;
    if (documentId === t.scopeId) return "/";
    return abs.slice(this.rootPath.length);
  }

  /** Scoped path of an item, or undefined instead of throwing. */
  public tryResolveId(documentId: string): string | undefined {
    const t = this.current();
    if (!t.absPath.has(documentId) || !this.inScope(t, documentId)) return undefined;
    return this.resolveId(documentId);
  }

  /** Direct children of a folder (null = library root), unsorted. */
  public childrenOf(folderId: string | null): readonly DocumentMeta[] {
    return this.current().children.get(folderId ?? "") ?? [];
  }

  /** Every document (not folder) in scope together with its scoped path. */
  public documents(): Array<{ meta: DocumentMeta; path: string }> {
    const t = this.current();
    const out: Array<{ meta: DocumentMeta; path: string }> = [];
    for (const meta of t.tree.items.values()) {
      if (meta.kind !== "document" || !this.inScope(t, meta.id)) continue;
      out.push({ meta, path: this.resolveId(meta.id) });
    }
    return out;
  }

  /** Names of in-scope documents that look like `query`, best first ("did you mean"). */
  public similar(query: string, limit = 5): string[] {
    const q = query.toLowerCase().split("/").filter(Boolean).pop() ?? "";
    if (!q) return [];
    return this.documents()
      .map(({ meta }) => {
        const name = meta.name.toLowerCase();
        const score = similarity(q, name) + (name.includes(q) ? 0.3 : 0);
        return { name: meta.name, score };
      })
      .filter((s) => s.score > 0.3)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map((s) => s.name);
  }

  // -------------------- Internals --------------------

  private inScope(t: PathTables, id: string): boolean {
    if (t.scopeId === undefined) return true;
    if (t.scopeId === null) return false;
    // Walk parents until we reach the scope folder or the library root.
    const seen = new Set<string>();
    let cur: string | null = id;
    while (cur !== null && !seen.has(cur)) {
      if (cur === t.scopeId) return true;
      seen.add(cur);
      cur = t.tree.items.get(cur)?.parentId ?? null;
    }
    return false;
  }

  private current(): PathTables {
    const tree = this.getTree();
    if (this.tables?.tree === tree) return this.tables;
    this.tables = this.build(tree);
    return this.tables;
  }

  private build(tree: MetadataTree): PathTables {
    const absPath = new Map<string, string>();
    const byPath = new Map<string, DocumentMeta[]>();
    const children = new Map<string, DocumentMeta[]>();

    const pathOf = (meta: DocumentMeta): string | undefined => {
      const known = absPath.get(meta.id);
      if (known !== undefined) return known;
      const names: string[] = [];
      const seen = new Set<string>();
      let cur: DocumentMeta | undefined = meta;
      while (cur) {
        if (seen.has(cur.id)) return undefined; // cycle; the sync layer normally drops these
        seen.add(cur.id);
        names.unshift(cur.name);
        if (cur.parentId === null) break;
        const parent = tree.items.get(cur.parentId);
        if (!parent) return undefined; // orphan
        cur = parent;
      }
      return "/" + names.join("/");
    };

    for (const meta of tree.items.values()) {
      const p = pathOf(meta);
      if (p === undefined) continue;
      absPath.set(meta.id, p);
      const key = p.toLowerCase();
      const list = byPath.get(key);
      if (list) list.push(meta);
      else byPath.set(key, [meta]);
      const parentKey = meta.parentId ?? "";
      const siblings = children.get(parentKey);
      if (siblings) siblings.push(meta);
      else children.set(parentKey, [meta]);
    }

    let scopeId: string | null | undefined;
    if (this.rootPath) {
      const matches = (byPath.get(this.rootPath.toLowerCase()) ?? []).filter((m) => m.kind === "folder");
      const exact = matches.filter((m) => absPath.get(m.id) === this.rootPath);
      scopeId = [...(exact.length ? exact : matches)].sort(newer)[0]?.id ?? null;
      if (scopeId === null && tree.items.size > 0) {
        console.error(`[MCP] Root folder '${this.rootPath}' not found in library; nothing is visible.`);
      }
    }
    return { tree, absPath, byPath, children, scopeId };
  }
}
