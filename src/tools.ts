import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { AppContext } from "./context";
import { isLibraryError, type LibraryError } from "./errors";
import { capOutput, grepLines, paginate } from "./pagination";
import { normalizePath } from "./path-resolver";

/** Structured error payload returned in place of a tool result. */
export interface ToolError {
  _error: {
    type: string;
    message: string;
    suggestion: string;
  };
}

export function isToolError(value: unknown): value is ToolError {
  return typeof value === "object" && value !== null && "_error" in value;
}

function toolError(type: string, message: string, suggestion: string): ToolError {
  return { _error: { type, message, suggestion } };
}

/**
 * Static tool schemas served by tools/list. Paths are always relative to the
 * configured root scope and use forward slashes.
 */
export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "library_browse",
    description:
      "List a folder of the document library. Returns folders first, then documents, each with its path, type and last-modified time.",
    inputSchema: {
      type: "object",
      properties: {
        path: {
          type: "string",
          description: "Folder path such as '/Work/Projects'. Omit or use '/' for the top level.",
        },
      },
    },
  },
  {
    name: "library_read",
    description:
      "Read the text of a document. Long documents are split into pages; use 'grep' to keep only matching lines.",
    inputSchema: {
      type: "object",
      properties: {
        path: { type: "string", description: "Document path, e.g. '/Work/Plan'." },
        page: { type: "number", description: "1-based page of the text to return (default 1).", minimum: 1 },
        grep: {
          type: "string",
          description: "Case-insensitive regular expression; only matching lines are returned.",
        },
        context: {
          type: "number",
          description: "Lines of context around each grep match (default 0, max 20).",
          minimum: 0,
          maximum: 20,
        },
      },
      required: ["path"],
    },
  },
  {
    name: "library_search",
    description:
      "Search document names, and the text of documents that have been read. Returns paths and snippets with matches marked >>>like this<<<; `match` says whether the name, the text or both matched.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Words to search for." },
        path: { type: "string", description: "Only search below this folder." },
        limit: { type: "number", description: "Maximum results (1-25, default 10).", minimum: 1, maximum: 25 },
      },
      required: ["query"],
    },
  },
  {
    name: "library_recent",
    description: "The most recently modified documents, newest first.",
    inputSchema: {
      type: "object",
      properties: {
        limit: { type: "number", description: "Maximum documents (1-50, default 10).", minimum: 1, maximum: 50 },
        preview: {
          type: "boolean",
          description: "Include the first lines of each document when its text is already indexed.",
        },
      },
    },
  },
  {
    name: "library_status",
    description: "Sync state, document count, cache and search index statistics.",
    inputSchema: { type: "object", properties: {} },
  },
];

const BrowseArgs = z.object({
  path: z.string().default("/"),
});

const ReadArgs = z.object({
  path: z.string().min(1),
  page: z.number().int().min(1).default(1),
  grep: z.string().min(1).optional(),
  context: z.number().int().min(0).max(20).default(0),
});

const SearchArgs = z.object({
  query: z.string().min(1),
  path: z.string().optional(),
  limit: z.number().int().min(1).max(25).default(10),
});

const RecentArgs = z.object({
  limit: z.number().int().min(1).max(50).default(10),
  preview: z.boolean().default(false),
});

function parseArgs<T extends z.ZodTypeAny>(tool: string, schema: T, raw: unknown): z.output<T> {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "arguments"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${tool}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Run one tool call. Library errors come back as `ToolError` payloads;
 * unknown tools and malformed arguments raise `McpError`.
 */
export async function callTool(ctx: AppContext, name: string, rawArgs: unknown, signal?: AbortSignal): Promise<unknown> {
  let pathHint: string | undefined;
  try {
    switch (name) {
      case "library_browse": {
        const args = parseArgs(name, BrowseArgs, rawArgs);
        pathHint = args.path;
        return await browse(ctx, args.path, signal);
      }
      case "library_read": {
        const args = parseArgs(name, ReadArgs, rawArgs);
        pathHint = args.path;
        return await read(ctx, args, signal);
      }
      case "library_search": {
        const args = parseArgs(name, SearchArgs, rawArgs);
        pathHint = args.path;
        return await search(ctx, args, signal);
      }
      case "library_recent": {
        const args = parseArgs(name, RecentArgs, rawArgs);
        return await recent(ctx, args, signal);
      }
      case "library_status":
        return ctx.status.getStatus();
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (e) {
    if (isLibraryError(e)) return describeError(ctx, e, pathHint);
    throw e;
  }
}

async function browse(ctx: AppContext, rawPath: string, signal?: AbortSignal) {
  const path = normalizePath(rawPath);
  await ctx.refresh(signal);
  const folderId = ctx.resolver.resolvePath(path);
  if (folderId !== null && ctx.sync.current.items.get(folderId)?.kind === "document") {
    return toolError("NotAFolder", `'${path}' is a document.`, "Use library_read to read it.");
  }
  const children = await ctx.cache.listFolder(folderId, signal);
  const entries = children.map((m) => ({
    name: m.name,
    path: ctx.resolver.resolveId(m.id),
    type: m.kind,
    ...(m.fileType ? { fileType: m.fileType } : {}),
    modifiedAt: m.modifiedAt ? m.modifiedAt.toISOString() : null,
    ...(m.pinned ? { pinned: true } : {}),
  }));
  return { path, entries };
}

async function read(ctx: AppContext, args: z.output<typeof ReadArgs>, signal?: AbortSignal) {
  await ctx.refresh(signal);
  const id = ctx.resolver.resolvePath(args.path);
  const meta = id === null ? undefined : ctx.sync.current.items.get(id);
  if (id === null || meta?.kind !== "document") {
    return toolError("NotADocument", `'${normalizePath(args.path)}' is a folder.`, "Use library_browse to list it.");
  }
  const path = ctx.resolver.resolveId(id);
  const { text, failure } = await ctx.cache.readText(id, signal);
  if (failure !== undefined) {
    return toolError(
      "ExtractionFailed",
      `${path}: ${failure}`,
      "The text of this document cannot be read; library_browse still lists it.",
    );
  }

  let body = text;
  let matches: number | undefined;
  if (args.grep !== undefined) {
    const found = grepLines(text, args.grep, args.context);
    body = found.text;
    matches = found.matches;
  }
  const page = paginate(body, ctx.config.PAGE_SIZE, args.page);
  const capped = capOutput(page.content, ctx.config.MAX_OUTPUT_CHARS);
  return {
    path,
    page: page.page,
    totalPages: page.totalPages,
    totalChars: page.totalChars,
    ...(matches !== undefined ? { matches } : {}),
    content: capped.text,
    ...(capped.truncated ? { truncated: true } : {}),
  };
}

interface SearchResult {
  path: string;
  match: "name" | "text" | "both";
  score?: number;
  snippet: string;
}

/** `name` with the first case-insensitive occurrence of `needle` marked, or undefined if absent. */
function markName(name: string, needle: string): string | undefined {
  const at = name.toLowerCase().indexOf(needle);
  if (at < 0) return undefined;
  return `${name.slice(0, at)}>>>${name.slice(at, at + needle.length)}<<<${name.slice(at + needle.length)}`;
}

function underFolder(path: string, prefix: string | undefined): boolean {
  if (prefix === undefined) return true;
  const p = prefix.toLowerCase();
  const lower = path.toLowerCase();
  return lower === p || lower.startsWith(p + "/");
}

async function search(ctx: AppContext, args: z.output<typeof SearchArgs>, signal?: AbortSignal) {
  await ctx.refresh(signal);
  const normalized = args.path !== undefined ? normalizePath(args.path) : undefined;
  if (normalized !== undefined && normalized !== "/") ctx.resolver.resolvePath(normalized);
  const prefix = normalized === "/" ? undefined : normalized;

  // Name matches come first, in path order; text hits fill the rest by rank.
  const needle = args.query.trim().toLowerCase();
  const byPath = new Map<string, SearchResult>();
  const named = needle
    ? ctx.resolver
        .documents()
        .filter(({ path }) => underFolder(path, prefix))
        .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    : [];
  for (const { meta, path } of named) {
    const snippet = markName(meta.name, needle);
    if (snippet !== undefined) byPath.set(path, { path, match: "name", snippet });
  }

  const hits = await ctx.index.query(args.query, prefix, args.limit);
  for (const h of hits) {
    const score = Number(h.rankScore.toFixed(4));
    const seen = byPath.get(h.path);
    if (seen) {
      seen.match = "both";
      seen.score = score;
      seen.snippet = h.snippet;
    } else {
      byPath.set(h.path, { path: h.path, match: "text", score, snippet: h.snippet });
    }
  }
  return { query: args.query, results: [...byPath.values()].slice(0, args.limit) };
}

async function recent(ctx: AppContext, args: z.output<typeof RecentArgs>, signal?: AbortSignal) {
  await ctx.refresh(signal);
  const docs = ctx.resolver.documents().sort((a, b) => {
    const ta = a.meta.modifiedAt?.getTime() ?? -Infinity;
    const tb = b.meta.modifiedAt?.getTime() ?? -Infinity;
    if (ta !== tb) return tb > ta ? 1 : -1;
    return a.meta.id < b.meta.id ? -1 : a.meta.id > b.meta.id ? 1 : 0;
  });
  return {
    documents: docs.slice(0, args.limit).map(({ meta, path }) => {
      const preview = args.preview ? ctx.index.preview(meta.id) : undefined;
      return {
        path,
        ...(meta.fileType ? { fileType: meta.fileType } : {}),
        modifiedAt: meta.modifiedAt ? meta.modifiedAt.toISOString() : null,
        ...(preview !== undefined ? { preview } : {}),
      };
    }),
  };
}

function describeError(ctx: AppContext, e: LibraryError, pathHint?: string): ToolError {
  switch (e.code) {
    case "NOT_FOUND": {
      const similar = pathHint ? ctx.resolver.similar(pathHint) : [];
      return toolError(
        "NotFound",
        e.message,
        similar.length > 0
          ? `Did you mean: ${similar.join(", ")}?`
          : "Use library_browse to see what the folder contains.",
      );
    }
    case "SOURCE_UNAVAILABLE":
      return toolError("SourceUnavailable", e.message, "The library service did not respond. Try again shortly.");
    case "AUTH_EXPIRED":
      return toolError("AuthExpired", e.message, "Register the device again and update LIBRARY_TOKEN.");
    case "EXTRACTION_FAILED":
      return toolError("ExtractionFailed", e.message, "The text of this document cannot be read.");
    case "INDEX_CORRUPT":
      return toolError("IndexCorrupt", e.message, "Restart the server with REBUILD_INDEX=true.");
    case "TREE_INCONSISTENT":
      return toolError("TreeInconsistent", e.message, "Try again after the next sync.");
    case "CONFIG":
      return toolError("Config", e.message, "Check the server configuration.");
  }
}
