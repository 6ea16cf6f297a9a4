#!/usr/bin/env node

/**
 * Plenum CLI: consensus statements from many participant opinions.
 *
 * Commands:
 *   plenum run "question" --statements <file> [--candidates 4] [--max-group-size 9] [--strategy own_groups_only]
 *   plenum check
 *   plenum history [--limit 20]
 *   plenum show <session_id> [--detailed]
 *   plenum init
 *   plenum serve
 */

import { parseArgs } from "node:util";
import { writeFileSync, existsSync } from "node:fs";
import { loadConfig, getUserDataDir, resolveDataPath, VotingStrategySchema, type Config } from "./config.js";
import { createGenerators } from "./generators/index.js";
import type { ITextGenerator } from "./generators/base.js";
import { ConsensusSession, type ConsensusResult } from "./orchestrator.js";
import { SqliteSessionStore } from "./store/sqlite.js";
import type { SessionRecord } from "./store/types.js";
import { loadStatementsFromFile } from "./statements.js";
import { renderDetailedReport, renderSummaryReport, writeReports } from "./report.js";
import { CancelledError } from "./errors.js";
import { seededRandom } from "./random.js";
import { setLogLevel, initFileLogging, truncate } from "./logger.js";
import { VERSION } from "./version.js";

const USAGE = `Usage: plenum <command> [options]

Commands:
  run <question>           Build a consensus statement from a statements file
  check                    Check that the configured generator is reachable
  history                  List recent sessions
  show <session_id>        Print a stored session as markdown
  init                     Create plenum.config.json
  serve                    Start the MCP server (stdio)

Options for run:
  --statements <file>      One statement per line ('#' comments, list markers allowed)
  --candidates <n>         Candidate statements per election (2-10)
  --max-group-size <n>     Statements per election before grouping (2-9)
  --strategy <s>           own_groups_only (default) or all_elections
  --retries <n>            Ranking attempts per voter (1-10)
  --model <name>           Override the configured model
  --ranking-model <name>   Predict rankings with a different model
  --concurrency <n>        Parallel generator calls per stage (default 1)
  --seed <n>               Seed the shuffles and fallback rankings
  --out <dir>              Report directory (default: from config)
  --no-save                Do not record the session in the database

Global options:
  --config <path>          Use this config file
  --verbose                Show info-level logs on stderr
  --debug                  Show all logs (debug level) on stderr
  --help                   Show this help
  --version                Show version

Environment:
  PLENUM_LOG_LEVEL         Set log level: error, warn (default), info, debug

Examples:
  plenum run "How should the city spend its parks budget?" --statements opinions.txt
  plenum run "Remote work policy?" --statements team.txt --max-group-size 5 --strategy all_elections
`;

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function parseIntOption(name: string, raw: string | undefined, min: number, max: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    fail(`--${name} must be an integer between ${min} and ${max} (got "${raw}")`);
  }
  return value;
}

async function main() {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.includes("--debug")) {
    setLogLevel("debug");
  } else if (rawArgs.includes("--verbose")) {
    setLogLevel("info");
  }

  // --config is global; pull it out before the command parses its own flags.
  let configPath: string | undefined;
  const args: string[] = [];
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (arg === "--verbose" || arg === "--debug") continue;
    if (arg === "--config") {
      configPath = rawArgs[++i];
      if (!configPath) fail("--config requires a path");
      continue;
    }
    args.push(arg);
  }

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log(`plenum v${VERSION}`);
    process.exit(0);
  }

  const command = args[0];
  if (command === "init") {
    cmdInit();
    return;
  }

  const config = loadConfig(configPath);
  if (command === "serve") {
    const { startStdioServer } = await import("./server.js");
    await startStdioServer(config);
    return;
  }

  initFileLogging(getUserDataDir(config), config.logging);

  switch (command) {
    case "run":
      await cmdRun(args.slice(1), config);
      break;
    case "check":
      await cmdCheck(config);
      break;
    case "history":
      await cmdHistory(args.slice(1), config);
      break;
    case "show":
      await cmdShow(args.slice(1), config);
      break;
    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

async function cmdRun(args: string[], config: Config) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      statements: { type: "string" },
      candidates: { type: "string" },
      "max-group-size": { type: "string" },
      strategy: { type: "string" },
      retries: { type: "string" },
      model: { type: "string" },
      "ranking-model": { type: "string" },
      concurrency: { type: "string" },
      seed: { type: "string" },
      out: { type: "string" },
      "no-save": { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  const question = positionals[0];
  if (!question) {
    console.error("Error: run requires a question\n");
    console.log('Usage: plenum run "your question" --statements <file>');
    process.exit(1);
  }
  if (!values.statements) fail("--statements <file> is required");

  const strategy = VotingStrategySchema.safeParse(values.strategy ?? config.consensus.votingStrategy);
  if (!strategy.success) {
    fail(`--strategy must be "own_groups_only" or "all_elections" (got "${values.strategy}")`);
  }

  const numCandidates = parseIntOption("candidates", values.candidates, 2, 10) ?? config.consensus.numCandidates;
  const maxGroupSize = parseIntOption("max-group-size", values["max-group-size"], 2, 9) ?? config.consensus.maxGroupSize;
  const maxRetries = parseIntOption("retries", values.retries, 1, 10) ?? config.consensus.maxRetries;
  const concurrency = parseIntOption("concurrency", values.concurrency, 1, 16);
  const seed = parseIntOption("seed", values.seed, 0, 2 ** 32 - 1);

  const statements = loadStatementsFromFile(values.statements);
  const generators = createGenerators(config, { model: values.model, rankingModel: values["ranking-model"] });

  console.log("Checking generator availability...");
  for (const generator of distinctGenerators(generators.statement, generators.ranking)) {
    const available = await generator.isAvailable();
    console.log(`  ${generator.name} (${generator.model}): ${available ? "OK" : "NOT AVAILABLE"}`);
    if (!available) fail(`model "${generator.model}" is not available`);
  }

  const store = values["no-save"] ? undefined : new SqliteSessionStore(resolveDataPath(config, config.database.path));
  await store?.initialize();

  console.log(`\nQuestion: "${question}"`);
  console.log(`  Participants: ${statements.length} | Candidates: ${numCandidates} | Max group: ${maxGroupSize}`);
  console.log(`  Voting: ${strategy.data}`);
  console.log("");

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log("\nCancelling...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const session = new ConsensusSession(generators, {
    store,
    random: seed !== undefined ? seededRandom(seed) : undefined,
  });

  let result: ConsensusResult;
  try {
    result = await session.run({
      question,
      statements,
      numCandidates,
      maxGroupSize,
      maxRetries,
      votingStrategy: strategy.data,
      concurrency: concurrency !== undefined
        ? { groups: concurrency, voters: concurrency, candidates: concurrency }
        : config.consensus.concurrency,
      templates: config.templates,
      sampling: config.sampling,
      signal: controller.signal,
      callbacks: {
        onCandidate: (e) =>
          console.log(`  [L${e.level + 1} G${e.groupIndex + 1}] candidate ${e.candidateIndex + 1}/${e.total}: ${truncate(e.text.replace(/\s+/g, " "), 80)}`),
        onRanking: (e) =>
          console.log(`  [L${e.level + 1} G${e.groupIndex + 1}] P${e.voterId + 1}: ${e.ranking.map((c) => c + 1).join(" > ")}${e.fallback ? " (random fallback)" : ""}`),
        onGroupWinner: (e) =>
          console.log(`  [L${e.level + 1} G${e.groupIndex + 1}] winner: statement ${e.winnerIndex + 1} (participants ${e.owners.map((o) => o + 1).join(", ")})\n`),
      },
    });
  } catch (err) {
    if (!(err instanceof CancelledError)) throw err;
    console.log("Cancelled.");
    process.exitCode = 130;
    return;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await store?.close();
  }

  console.log("=".repeat(60));
  console.log("CONSENSUS STATEMENT");
  console.log("=".repeat(60));
  console.log(result.statement);
  console.log("=".repeat(60));

  const paths = writeReports(result, values.out ?? resolveDataPath(config, config.reports.dir));
  console.log(`\nSession ${result.sessionId} | ${result.levels.length} levels | ${(result.durationMs / 1000).toFixed(1)}s`);
  console.log(`Reports:\n  ${paths.summary}\n  ${paths.detailed}`);
}

function distinctGenerators(...generators: ITextGenerator[]): ITextGenerator[] {
  return [...new Set(generators)];
}

async function cmdCheck(config: Config) {
  const { statement, ranking } = createGenerators(config);
  let allAvailable = true;

  for (const generator of distinctGenerators(statement, ranking)) {
    console.log(`Generator: ${generator.name} (${generator.model})`);
    let models: string[];
    try {
      models = await generator.listModels();
    } catch (err) {
      fail(`cannot reach ${generator.name}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const available = await generator.isAvailable();
    console.log(`  Model ${generator.model}: ${available ? "available" : "NOT AVAILABLE"}`);
    console.log(`  Served models: ${models.length > 0 ? models.join(", ") : "(none)"}\n`);
    if (!available) allAvailable = false;
  }
  if (!allAvailable) process.exit(1);
}

async function cmdHistory(args: string[], config: Config) {
  const { values } = parseArgs({
    args,
    options: { limit: { type: "string" } },
  });
  const limit = parseIntOption("limit", values.limit, 1, 1000) ?? 20;

  const store = new SqliteSessionStore(resolveDataPath(config, config.database.path));
  await store.initialize();
  try {
    const sessions = await store.listSessions(limit);
    if (sessions.length === 0) {
      console.log("No sessions yet.");
      return;
    }
    for (const s of sessions) {
      console.log(`  ${s.id} | ${s.status} | ${s.participantCount} participants | ${s.createdAt}`);
      console.log(`    ${truncate(s.question, 100)}`);
    }
  } finally {
    await store.close();
  }
}

function toResult(record: SessionRecord, statement: string): ConsensusResult {
  return {
    sessionId: record.id,
    question: record.question,
    statement,
    participants: record.participants,
    levels: record.levels,
    settings: record.settings,
    durationMs: record.durationMs,
  };
}

async function cmdShow(args: string[], config: Config) {
  const { values, positionals } = parseArgs({
    args,
    options: { detailed: { type: "boolean", default: false } },
    allowPositionals: true,
  });
  const id = positionals[0];
  if (!id) fail("show requires a session ID");

  const store = new SqliteSessionStore(resolveDataPath(config, config.database.path));
  await store.initialize();
  try {
    const record = await store.getSession(id);
    if (!record) fail(`session not found: ${id}`);
    if (record.statement === null) {
      console.log(`Session ${record.id} ${record.status}: ${record.error ?? "no statement"}`);
      return;
    }
    const result = toResult(record, record.statement);
    console.log(values.detailed ? renderDetailedReport(result) : renderSummaryReport(result));
  } finally {
    await store.close();
  }
}

function cmdInit() {
  const filename = "plenum.config.json";
  if (existsSync(filename)) {
    console.log(`${filename} already exists. Skipping.`);
    return;
  }

  const defaultConfig = {
    user: "default",
    generator: {
      name: "local",
      type: "ollama",
      model: "llama3.1",
      endpoint: "http://localhost:11434",
    },
    consensus: {
      numCandidates: 4,
      maxRetries: 3,
      maxGroupSize: 9,
      votingStrategy: "own_groups_only",
    },
    database: { path: "./data/plenum.db" },
    reports: { dir: "./reports" },
  };

  writeFileSync(filename, JSON.stringify(defaultConfig, null, 2) + "\n");
  console.log(`Created ${filename}`);
  console.log("Edit it to point at your model server.");
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : err);
  process.exit(1);
});
