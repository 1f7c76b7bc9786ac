import dotenv from "dotenv";
import fsSync from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// When running from an installed location, resolve ../.env (project root). Otherwise use default.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  /** Device token or `{"devicetoken","usertoken"}` JSON. */
  TOKEN: string;
  SYNC_URL: string;
  AUTH_URL: string;
  /** Folder-listing / metadata TTL in seconds. */
  CACHE_TTL: number;
  INDEX_PATH: string;
  REBUILD_INDEX: boolean;
  MAX_OUTPUT_CHARS: number;
  PAGE_SIZE: number;
  PARALLEL_WORKERS: number;
  /** Normalized root scope ("/Work"), or undefined for the whole library. */
  ROOT_PATH: string | undefined;
  MAX_ATTEMPTS: number;
  HTTP_CONNECTIONS: number;
  REQUEST_TIMEOUT_MS: number;
  MEMORY_CACHE_ENTRIES: number;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_SYNC_URL = "https://internal.cloud.remarkable.com";
export const DEFAULT_AUTH_URL = "https://webapp-prod.cloud.remarkable.engineering";

/** Default index location: a fixed path under the user's cache directory. */
export function defaultIndexPath(env: Env = process.env): string {
  const base = env.XDG_CACHE_HOME?.trim() || path.join(os.homedir(), ".cache");
  return path.join(base, "inkvault-mcp", "index.db");
}

// Tolerant truthy parsing (supports several common forms).
function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Parse a positive integer knob. Unset uses the default silently; garbage uses
 * the default with a warning. Values above `max` are clamped.
 */
function parseCount(env: Env, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    console.error(`[MCP] Invalid ${name}=${JSON.stringify(raw)}, using default ${fallback}.`);
    return fallback;
  }
  return Math.min(max, Math.floor(n));
}

/**
 * Normalize a root scope: "", "/" -> undefined; "Work/" -> "/Work".
 */
export function normalizeRootPath(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed || trimmed === "/") return undefined;
  const withSlash = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  return withSlash.replace(/\/+$/, "");
}

/**
 * Collect every environment knob into one validated struct. Called once at
 * startup; components receive only the fields they need.
 *
 * @throws {ConfigError} when the credential is missing.
 */
export function loadConfig(env: Env = process.env): Config {
  const TOKEN = env.LIBRARY_TOKEN?.trim() ?? "";
  if (!TOKEN) {
    throw new ConfigError(
      "LIBRARY_TOKEN is required (device token or token JSON from device registration).",
    );
  }

  const SYNC_URL = (env.LIBRARY_SYNC_URL?.trim() || DEFAULT_SYNC_URL).replace(/\/+$/, "");
  const AUTH_URL = (env.LIBRARY_AUTH_URL?.trim() || DEFAULT_AUTH_URL).replace(/\/+$/, "");

  return {
    TOKEN,
    SYNC_URL,
    AUTH_URL,
    CACHE_TTL: parseCount(env, "CACHE_TTL", 60),
    INDEX_PATH: env.INDEX_PATH?.trim() || defaultIndexPath(env),
    REBUILD_INDEX: parseFlag(env.REBUILD_INDEX),
    MAX_OUTPUT_CHARS: parseCount(env, "MAX_OUTPUT_CHARS", 50000),
    // Page size cannot exceed the output cap or a single page would be truncated.
    PAGE_SIZE: Math.min(
      parseCount(env, "PAGE_SIZE", 8000),
      parseCount(env, "MAX_OUTPUT_CHARS", 50000),
    ),
    PARALLEL_WORKERS: parseCount(env, "PARALLEL_WORKERS", 5, 64),
    ROOT_PATH: normalizeRootPath(env.ROOT_PATH),
    MAX_ATTEMPTS: parseCount(env, "MAX_ATTEMPTS", 4, 20),
    HTTP_CONNECTIONS: parseCount(env, "HTTP_CONNECTIONS", 10, 256),
    REQUEST_TIMEOUT_MS: parseCount(env, "REQUEST_TIMEOUT_MS", 60000),
    MEMORY_CACHE_ENTRIES: parseCount(env, "MEMORY_CACHE_ENTRIES", 200),
    VERBOSE: parseFlag(env.VERBOSE),
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
  };
}
