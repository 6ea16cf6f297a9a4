import { describe, it, expect, afterEach } from "vitest";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ConfigSchema } from "../config.js";
import { createServer } from "../server.js";
import { SqliteSessionStore } from "../store/sqlite.js";
import type { ToolDeps } from "../tools.js";
import { ScriptedGenerator, consensusResponder } from "./fake-generator.js";

const TextResultSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
});

let client: Client | undefined;
let store: SqliteSessionStore | undefined;

async function connect(deps: ToolDeps): Promise<Client> {
  const server = createServer(deps);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const c = new Client({ name: "test-client", version: "0.0.0" });
  await c.connect(clientTransport);
  client = c;
  return c;
}

afterEach(async () => {
  await client?.close();
  client = undefined;
  await store?.close();
  store = undefined;
});

describe("MCP server", () => {
  it("registers the stateless tools without a store", async () => {
    const c = await connect({ config: ConfigSchema.parse({}), generator: new ScriptedGenerator(consensusResponder()) });
    const { tools } = await c.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(["consensus", "parse_ranking", "schulze"]);
  });

  it("adds the session tools when a store is present", async () => {
    store = new SqliteSessionStore(":memory:");
    await store.initialize();
    const c = await connect({
      config: ConfigSchema.parse({}),
      generator: new ScriptedGenerator(consensusResponder()),
      store,
    });
    const { tools } = await c.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(["consensus", "parse_ranking", "schulze", "session", "sessions"]);

    const listed = TextResultSchema.parse(await c.callTool({ name: "sessions", arguments: {} }));
    expect(listed.content[0].text).toBe("No sessions yet.");
  });

  it("answers a schulze call", async () => {
    const c = await connect({ config: ConfigSchema.parse({}), generator: new ScriptedGenerator(consensusResponder()) });
    const result = TextResultSchema.parse(
      await c.callTool({ name: "schulze", arguments: { rankings: [[1, 0, 2]], num_candidates: 3 } }),
    );
    expect(result.content[0].text.split("\n")[0]).toBe("Winner: candidate 2 (index 1)");
  });

  it("runs a consensus call under the request's abort signal", async () => {
    const generator = new ScriptedGenerator(consensusResponder());
    const c = await connect({ config: ConfigSchema.parse({}), generator });
    const result = TextResultSchema.parse(
      await c.callTool({ name: "consensus", arguments: { question: "Q", statements: ["a", "b"] } }),
    );
    expect(result.content[0].text.split("\n").slice(0, 3)).toEqual(["**Consensus statement**", "", "Candidate #1"]);
    expect(generator.calls[0].signal).toBeInstanceOf(AbortSignal);
  });
});
