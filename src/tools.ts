/**
 * MCP tool definitions: zod input schemas and the handlers behind them.
 *
 * Handlers return the text shown to the client and are kept free of the
 * transport so they can be called directly.
 */

import { z } from "zod";
import type { Config } from "./config.js";
import { VotingStrategySchema } from "./config.js";
import type { GeneratorPair, ITextGenerator } from "./generators/base.js";
import type { ISessionStore } from "./store/interfaces.js";
import { ConsensusSession } from "./orchestrator.js";
import { computeSchulze, formatMatrix, rankByVictories } from "./consensus/schulze.js";
import { parseRanking } from "./consensus/ranking-parser.js";
import { createLogger } from "./logger.js";

const log = createLogger("tools");

// --- Tool input schemas ---

export const ConsensusInputSchema = z.object({
  question: z.string().min(1).describe("The question participants answered"),
  statements: z.array(z.string().min(1)).min(1).describe("One statement per participant"),
  num_candidates: z
    .number()
    .int()
    .min(2)
    .max(10)
    .optional()
    .describe("Candidate statements per election (default: from config)"),
  max_group_size: z
    .number()
    .int()
    .min(2)
    .max(9)
    .optional()
    .describe("Statements per election before splitting into groups"),
  max_retries: z.number().int().min(1).max(10).optional().describe("Ranking attempts per voter"),
  voting_strategy: VotingStrategySchema.optional().describe(
    "own_groups_only = participants vote where their statement is; all_elections = everyone votes everywhere",
  ),
});

export const SchulzeInputSchema = z.object({
  rankings: z
    .array(z.array(z.number().int().min(0)))
    .min(1)
    .describe("One ranking per voter: 0-based candidate indices, most preferred first"),
  num_candidates: z.number().int().min(1).max(50).describe("Number of candidates"),
});

export const ParseRankingInputSchema = z.object({
  text: z.string().describe("Raw model output containing a ranking"),
  num_candidates: z.number().int().min(1).max(50).describe("Number of candidates ranked"),
});

export const ListSessionsInputSchema = z.object({
  limit: z.number().int().min(1).max(100).default(20).describe("Maximum sessions to list"),
});

export const GetSessionInputSchema = z.object({
  session_id: z.string().describe("Session ID"),
});

export type ConsensusInput = z.infer<typeof ConsensusInputSchema>;
export type SchulzeInput = z.infer<typeof SchulzeInputSchema>;
export type ParseRankingInput = z.infer<typeof ParseRankingInputSchema>;
export type ListSessionsInput = z.infer<typeof ListSessionsInputSchema>;
export type GetSessionInput = z.infer<typeof GetSessionInputSchema>;

// --- Handlers ---

export interface ToolDeps {
  config: Config;
  /** A pair when rankings come from their own model. */
  generator: ITextGenerator | GeneratorPair;
  store?: ISessionStore;
}

/** `signal` is the client's request cancellation. */
export async function handleConsensus(args: ConsensusInput, deps: ToolDeps, signal?: AbortSignal): Promise<string> {
  const { config } = deps;
  log.debug("consensus tool invoked:", args.statements.length, "statements");

  const session = new ConsensusSession(deps.generator, { store: deps.store });
  const result = await session.run({
    question: args.question,
    statements: args.statements,
    numCandidates: args.num_candidates ?? config.consensus.numCandidates,
    maxGroupSize: args.max_group_size ?? config.consensus.maxGroupSize,
    maxRetries: args.max_retries ?? config.consensus.maxRetries,
    votingStrategy: args.voting_strategy ?? config.consensus.votingStrategy,
    concurrency: config.consensus.concurrency,
    templates: config.templates,
    sampling: config.sampling,
    signal,
  });

  const elections = result.levels.reduce((n, level) => n + level.groups.length, 0);
  const fallbacks = result.levels
    .flatMap((level) => level.groups)
    .flatMap((group) => group.election?.ballots ?? [])
    .filter((ballot) => ballot.fallback).length;

  return [
    "**Consensus statement**",
    "",
    result.statement,
    "",
    `---\nSession ${result.sessionId} | ${result.participants.length} participants | ` +
      `${result.levels.length} levels | ${elections} elections | ${fallbacks} random fallbacks | ` +
      `${(result.durationMs / 1000).toFixed(1)}s`,
  ].join("\n");
}

export function handleSchulze(args: SchulzeInput): string {
  const rankings = new Map(args.rankings.map((ranking, voter) => [voter, ranking]));
  const { winner, pairwise, strongestPaths } = computeSchulze(rankings, args.num_candidates);
  const order = rankByVictories(strongestPaths).map((c) => c + 1);
  return [
    `Winner: candidate ${winner + 1} (index ${winner})`,
    `Order by victories: ${order.join(", ")}`,
    "",
    "Pairwise preferences:",
    formatMatrix(pairwise),
    "",
    "Strongest paths:",
    formatMatrix(strongestPaths),
  ].join("\n");
}

export function handleParseRanking(args: ParseRankingInput): string {
  const result = parseRanking(args.text, args.num_candidates);
  return JSON.stringify(
    result.ok
      ? { ok: true, ranking: result.ranking, log: result.log }
      : { ok: false, reason: result.error.reason, error: result.error.message, log: result.log },
    null,
    2,
  );
}

export async function handleListSessions(args: ListSessionsInput, store: ISessionStore): Promise<string> {
  const sessions = await store.listSessions(args.limit);
  if (sessions.length === 0) return "No sessions yet.";
  return sessions
    .map((s) => `${s.id} | ${s.status} | ${s.participantCount} participants | ${s.createdAt} | ${s.question}`)
    .join("\n");
}

export async function handleGetSession(args: GetSessionInput, store: ISessionStore): Promise<string> {
  const session = await store.getSession(args.session_id);
  if (!session) return `Session not found: ${args.session_id}`;
  return JSON.stringify(session, null, 2);
}
