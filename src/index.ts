/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (a missing device token stops here).
 * 2. Build the application context: persistent store, remote client, sync
 *    engine, path resolver, artifact cache and search index.
 * 3. Warm up: first sync of the library tree, then open (or rebuild) the index.
 *    A failed first sync is logged; tools retry it on demand.
 * 4. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default): good for local editor integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http): enables polling
 *        /health for readiness & status.
 *
 * Exposed tools: library_browse, library_read, library_search,
 * library_recent, library_status (see tools.ts).
 *
 * Environment variables are documented in config.ts and .env.example.
 */
import { loadConfig, type Config } from "./config";
import { createContext } from "./context";
import { ConfigError } from "./errors";
import { createServer } from "./server";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

let config: Config;
try {
  config = loadConfig();
} catch (e) {
  if (e instanceof ConfigError) {
    console.error(`[MCP] ${e.message}`);
    process.exit(1);
  }
  throw e;
}

const ctx = createContext(config);
const shutdown = (signal: string) => {
  console.error(`[MCP] ${signal} received; closing.`);
  ctx.close().then(
    () => process.exit(0),
    (e: unknown) => {
      console.error("[MCP] Shutdown failed:", e);
      process.exit(1);
    },
  );
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

await ctx.warmUp();

// Choose transport: stdio (default) or streamable HTTP via MCP_TRANSPORT=http|stdio
const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  ctx.status.markTransport("http");
  await startHttpTransport(() => createServer(ctx), ctx.status);
} else {
  ctx.status.markTransport("stdio");
  await startStdioTransport(() => createServer(ctx));
}
