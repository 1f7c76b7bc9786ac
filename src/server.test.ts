import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config";
import { createContext, type AppContext } from "./context";
import { createServer } from "./server";
import { FakeRemote, doc, folder } from "./testing/helpers";

describe("createServer", () => {
  let ctx: AppContext;
  let client: Client;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const remote = new FakeRemote();
    remote.items = [folder("F1", "Work"), doc("D1", "Plan", "F1")];
    remote.setContent("D1", "1", "Quarterly goals");
    ctx = createContext(loadConfig({ LIBRARY_TOKEN: "test-secret", INDEX_PATH: ":memory:" }), {
      remote,
      extractor: { extract: async (bytes) => bytes.toString("utf8") },
    });
    await ctx.warmUp();

    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
    await createServer(ctx).connect(serverSide);
    client = new Client({ name: "test-client", version: "0.0.0" });
    await client.connect(clientSide);
  });

  afterEach(async () => {
    await client.close();
    await ctx.close();
    vi.restoreAllMocks();
  });

  it("lists the library tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual([
      "library_browse",
      "library_read",
      "library_search",
      "library_recent",
      "library_status",
    ]);
  });

  it("returns tool output as JSON text", async () => {
    const res = CallToolResultSchema.parse(await client.callTool({ name: "library_read", arguments: { path: "/Work/Plan" } }));
    expect(res.isError ?? false).toBe(false);
    const [block] = res.content;
    expect(block?.type).toBe("text");
    if (block?.type !== "text") return;
    expect(JSON.parse(block.text)).toEqual({
      path: "/Work/Plan",
      page: 1,
      totalPages: 1,
      totalChars: 15,
      content: "Quarterly goals",
    });
  });

  it("flags library errors", async () => {
    const res = CallToolResultSchema.parse(await client.callTool({ name: "library_read", arguments: { path: "/Nope" } }));
    expect(res.isError).toBe(true);
  });

  it("fails unknown tools at the protocol level", async () => {
    await expect(client.callTool({ name: "library_delete", arguments: {} })).rejects.toThrow(/Unknown tool: library_delete/);
  });
});
