/**
 * MCP server over stdio.
 *
 * Tools: consensus, schulze, parse_ranking, sessions, session.
 * stdout carries JSON-RPC, so all logging goes to stderr and log files.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getUserDataDir, resolveDataPath, type Config } from "./config.js";
import { createGenerators } from "./generators/index.js";
import { SqliteSessionStore } from "./store/sqlite.js";
import { createLogger, initFileLogging } from "./logger.js";
import { VERSION } from "./version.js";
import {
  ConsensusInputSchema,
  GetSessionInputSchema,
  ListSessionsInputSchema,
  ParseRankingInputSchema,
  SchulzeInputSchema,
  handleConsensus,
  handleGetSession,
  handleListSessions,
  handleParseRanking,
  handleSchulze,
  type ToolDeps,
} from "./tools.js";

const log = createLogger("server");

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

export function createServer(deps: ToolDeps): McpServer {
  const server = new McpServer({ name: "plenum", version: VERSION });

  server.tool(
    "consensus",
    "Synthesize one consensus statement from many participant statements",
    ConsensusInputSchema.shape,
    async (args, extra) => text(await handleConsensus(args, deps, extra.signal)),
  );

  server.tool(
    "schulze",
    "Run a Schulze election over complete rankings",
    SchulzeInputSchema.shape,
    async (args) => text(handleSchulze(args)),
  );

  server.tool(
    "parse_ranking",
    "Extract a ranking from raw model output",
    ParseRankingInputSchema.shape,
    async (args) => text(handleParseRanking(args)),
  );

  const store = deps.store;
  if (store) {
    server.tool(
      "sessions",
      "List recent consensus sessions",
      ListSessionsInputSchema.shape,
      async (args) => text(await handleListSessions(args, store)),
    );
    server.tool(
      "session",
      "Get one consensus session with its full transcript",
      GetSessionInputSchema.shape,
      async (args) => text(await handleGetSession(args, store)),
    );
  }

  return server;
}

export async function startStdioServer(config: Config): Promise<void> {
  initFileLogging(getUserDataDir(config), config.logging);

  const store = new SqliteSessionStore(resolveDataPath(config, config.database.path));
  await store.initialize();

  const server = createServer({ config, generator: createGenerators(config), store });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("MCP server running on stdio, model=" + config.generator.model +
    (config.rankingGenerator ? ", rankingModel=" + config.rankingGenerator.model : ""));
}
