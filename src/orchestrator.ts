/**
 * ConsensusSession turns many participant statements into one.
 *
 * Each election writes candidate statements from a set of inputs, predicts
 * how every voter ranks them and keeps the Schulze winner. When there are
 * more inputs than one election takes, they are split into groups, each
 * group elects a winner, and the winners go up a level. This repeats until
 * one election can handle what is left.
 */

import { randomUUID } from "node:crypto";
import type { GeneratorPair, ITextGenerator, SamplingParams } from "./generators/base.js";
import type { ISessionStore } from "./store/interfaces.js";
import type { SessionStatus } from "./store/types.js";
import type {
  ConsensusSettings,
  GroupRecord,
  LevelRecord,
  ProgressCallbacks,
  Voter,
  VoterId,
  VotingStrategy,
} from "./consensus/base.js";
import { generateCandidates } from "./consensus/candidates.js";
import { runElection } from "./consensus/election.js";
import { clampGroupSize, partitionGroups } from "./consensus/partition.js";
import {
  CancelledError,
  ConsensusFailedError,
  ElectionImpossibleError,
  InvariantViolationError,
  errorMessage,
  throwIfCancelled,
} from "./errors.js";
import { runPool } from "./pool.js";
import { defaultRandom, type RandomSource } from "./random.js";
import { buildCandidatePrompt, DEFAULT_CANDIDATE_TEMPLATE, DEFAULT_RANKING_TEMPLATE } from "./templates.js";
import { createLogger, createSessionLog, isValidSessionId, truncate, type SessionLog } from "./logger.js";

const log = createLogger("orchestrator");

export const MIN_CANDIDATES = 2;
export const MAX_CANDIDATES = 10;

export interface ConsensusOptions {
  question: string;
  statements: readonly string[];
  numCandidates?: number;
  maxRetries?: number;
  maxGroupSize?: number;
  votingStrategy?: VotingStrategy;
  concurrency?: Partial<ConsensusSettings["concurrency"]>;
  templates?: { candidateGeneration?: string; rankingPrediction?: string };
  sampling?: { statement?: SamplingParams; ranking?: SamplingParams };
  signal?: AbortSignal;
  callbacks?: ProgressCallbacks;
  /** Defaults to a random UUID. */
  sessionId?: string;
}

export interface ConsensusResult {
  sessionId: string;
  question: string;
  /** The final consensus statement. Always one of the generated candidates. */
  statement: string;
  participants: string[];
  levels: LevelRecord[];
  settings: ConsensusSettings;
  durationMs: number;
}

export interface ConsensusSessionDeps {
  store?: ISessionStore;
  random?: RandomSource;
}

const DEFAULT_STATEMENT_SAMPLING: SamplingParams = { temperature: 0.7, topP: 0.9, topK: 40 };
const DEFAULT_RANKING_SAMPLING: SamplingParams = { temperature: 0.2, topP: 0.9, topK: 40 };

/** One statement at some level, with the original participants behind it. */
interface Entry {
  statement: string;
  owners: VoterId[];
}

/** Everything a run needs, fixed at start. */
interface RunContext {
  question: string;
  participants: string[];
  settings: ConsensusSettings;
  candidateTemplate: string;
  rankingTemplate: string;
  statementSampling: SamplingParams;
  rankingSampling: SamplingParams;
  signal?: AbortSignal;
  callbacks: ProgressCallbacks;
  slog: SessionLog | null;
  levels: LevelRecord[];
}

interface GroupOutcome {
  record: GroupRecord;
  error?: Error;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(value)));
}

export class ConsensusSession {
  private readonly statementGenerator: ITextGenerator;
  private readonly rankingGenerator: ITextGenerator;
  private readonly store: ISessionStore | null;
  private readonly random: RandomSource;

  /** A single generator writes candidates and predicts rankings. A pair splits the two. */
  constructor(generators: ITextGenerator | GeneratorPair, deps: ConsensusSessionDeps = {}) {
    if ("statement" in generators) {
      this.statementGenerator = generators.statement;
      this.rankingGenerator = generators.ranking;
    } else {
      this.statementGenerator = generators;
      this.rankingGenerator = generators;
    }
    this.store = deps.store ?? null;
    this.random = deps.random ?? defaultRandom;
  }

  /** Candidates written for a group of `groupSize` statements. */
  static candidateCount(groupSize: number, numCandidates: number): number {
    return Math.max(MIN_CANDIDATES, Math.min(groupSize, numCandidates));
  }

  static resolveSettings(options: ConsensusOptions, model: string, rankingModel = model): ConsensusSettings {
    return {
      numCandidates: clampInt(options.numCandidates ?? 4, MIN_CANDIDATES, MAX_CANDIDATES),
      maxRetries: clampInt(options.maxRetries ?? 3, 1, 10),
      maxGroupSize: clampGroupSize(options.maxGroupSize ?? 9),
      votingStrategy: options.votingStrategy ?? "own_groups_only",
      concurrency: {
        groups: clampInt(options.concurrency?.groups ?? 1, 1, 16),
        voters: clampInt(options.concurrency?.voters ?? 1, 1, 16),
        candidates: clampInt(options.concurrency?.candidates ?? 1, 1, 16),
      },
      model,
      rankingModel,
    };
  }

  async run(options: ConsensusOptions): Promise<ConsensusResult> {
    const start = Date.now();
    const sessionId = options.sessionId ?? randomUUID();
    if (!isValidSessionId(sessionId)) {
      throw new InvariantViolationError(`Invalid session ID: "${sessionId}". Must be alphanumeric/hyphens/underscores, max 128 chars.`);
    }
    if (options.statements.length === 0) {
      throw new ElectionImpossibleError("at least one participant statement is required");
    }

    const settings = ConsensusSession.resolveSettings(
      options,
      this.statementGenerator.model,
      this.rankingGenerator.model,
    );
    if (options.maxGroupSize !== undefined && options.maxGroupSize !== settings.maxGroupSize) {
      log.warn(`max group size ${options.maxGroupSize} clamped to ${settings.maxGroupSize}`);
    }

    const ctx: RunContext = {
      question: options.question,
      participants: [...options.statements],
      settings,
      candidateTemplate: options.templates?.candidateGeneration ?? DEFAULT_CANDIDATE_TEMPLATE,
      rankingTemplate: options.templates?.rankingPrediction ?? DEFAULT_RANKING_TEMPLATE,
      statementSampling: options.sampling?.statement ?? DEFAULT_STATEMENT_SAMPLING,
      rankingSampling: options.sampling?.ranking ?? DEFAULT_RANKING_SAMPLING,
      signal: options.signal,
      callbacks: options.callbacks ?? {},
      slog: createSessionLog(sessionId),
      levels: [],
    };

    log.info("session start:", ctx.participants.length, "participants, model=" + settings.model,
      "rankingModel=" + settings.rankingModel,
      "strategy=" + settings.votingStrategy, "maxGroupSize=" + settings.maxGroupSize);
    ctx.slog?.write("info", `session ${sessionId} | question: ${ctx.question}`);
    ctx.slog?.write("info", `settings: ${JSON.stringify(settings)}`);

    const entries: Entry[] = ctx.participants.map((statement, id) => ({ statement, owners: [id] }));

    let statement: string;
    try {
      statement = await this.reduce(ctx, entries, 0);
    } catch (err) {
      const status: SessionStatus = err instanceof CancelledError ? "cancelled" : "failed";
      log.error(`session ${status}:`, errorMessage(err));
      ctx.slog?.write("error", `session ${status}: ${errorMessage(err)}`);
      await this.persist(sessionId, ctx, status, null, errorMessage(err), start);
      throw err;
    }

    const durationMs = Date.now() - start;
    log.info("session end:", ctx.levels.length, "levels,", durationMs + "ms");
    ctx.slog?.write("info", `final statement:\n${statement}`);
    await this.persist(sessionId, ctx, "completed", statement, null, start);

    return {
      sessionId,
      question: ctx.question,
      statement,
      participants: ctx.participants,
      levels: ctx.levels,
      settings,
      durationMs,
    };
  }

  /** Fold `entries` at `level` into one statement. */
  private async reduce(ctx: RunContext, entries: Entry[], level: number): Promise<string> {
    throwIfCancelled(ctx.signal);
    const { maxGroupSize } = ctx.settings;

    if (entries.length <= maxGroupSize) {
      log.info(`level ${level}: ${entries.length} statements, final election`);
      const outcome = await this.processGroup(ctx, entries, level, 0);
      ctx.levels.push({ level, inputCount: entries.length, groups: [outcome.record] });
      if (outcome.error) throw outcome.error;
      if (outcome.record.winner === undefined) {
        throw new ConsensusFailedError(`level ${level}: final election produced no winner`);
      }
      return outcome.record.winner;
    }

    const groups = partitionGroups(entries, maxGroupSize, this.random);
    log.info(`level ${level}: ${entries.length} statements in ${groups.length} groups (${groups.map((g) => g.length).join("/")})`);
    ctx.slog?.write("info", `level ${level}: ${groups.length} groups`);

    const outcomes = await runPool(
      groups.map((group, groupIndex) => () => this.processGroup(ctx, group, level, groupIndex)),
      { concurrency: ctx.settings.concurrency.groups },
    );

    // Merge only once every group of this level has settled.
    const records: GroupRecord[] = [];
    const next: Entry[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        if (outcome.reason instanceof CancelledError) throw outcome.reason;
        throw outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      }
      if (outcome.status === "skipped") continue;
      const { record } = outcome.value;
      records.push(record);
      if (record.winner !== undefined) next.push({ statement: record.winner, owners: record.owners });
    }
    ctx.levels.push({ level, inputCount: entries.length, groups: records });
    throwIfCancelled(ctx.signal);

    const failed = records.filter((r) => r.error !== undefined).length;
    if (failed > 0) log.warn(`level ${level}: ${failed}/${records.length} groups failed, continuing with ${next.length}`);

    if (next.length === 0) {
      throw new ConsensusFailedError(`level ${level}: every group failed to elect a statement`);
    }
    if (next.length === 1) {
      log.info(`level ${level}: a single winner remains, no further election`);
      return next[0].statement;
    }
    return this.reduce(ctx, next, level + 1);
  }

  private votersFor(ctx: RunContext, owners: VoterId[]): Voter[] {
    const ids = ctx.settings.votingStrategy === "all_elections"
      ? ctx.participants.map((_, id) => id)
      : owners;
    return ids.map((id) => ({ id, statement: ctx.participants[id] }));
  }

  /**
   * Run one election for a group. Failures other than cancellation are
   * returned on the outcome so sibling groups can carry on.
   */
  private async processGroup(ctx: RunContext, group: Entry[], level: number, groupIndex: number): Promise<GroupOutcome> {
    const owners = [...new Set(group.flatMap((e) => e.owners))].sort((a, b) => a - b);
    const statements = group.map((e) => e.statement);
    const record: GroupRecord = { level, groupIndex, statements, owners, candidates: [] };
    const where = `level ${level} group ${groupIndex + 1}`;
    const { callbacks } = ctx;

    try {
      throwIfCancelled(ctx.signal);
      const count = ConsensusSession.candidateCount(group.length, ctx.settings.numCandidates);
      log.debug(`${where}: ${group.length} statements, ${owners.length} owners, ${count} candidates`);

      const generated = await generateCandidates({
        generator: this.statementGenerator,
        question: ctx.question,
        statements,
        count,
        buildPrompt: (question, shuffled) => buildCandidatePrompt(ctx.candidateTemplate, question, shuffled),
        sampling: ctx.statementSampling,
        signal: ctx.signal,
        concurrency: ctx.settings.concurrency.candidates,
        random: this.random,
        onCandidate: (candidateIndex, text) =>
          callbacks.onCandidate?.({ level, groupIndex, candidateIndex, total: count, text }),
        onToken: callbacks.onToken
          ? (token) => callbacks.onToken?.({ level, groupIndex, stage: "candidate", token })
          : undefined,
        sessionLog: ctx.slog,
      });
      record.candidates = generated.candidates;

      if (generated.error instanceof CancelledError) throw generated.error;
      if (generated.candidates.length < MIN_CANDIDATES) {
        throw new ElectionImpossibleError(
          `${where}: only ${generated.candidates.length} of ${count} candidates were generated`,
          { cause: generated.error },
        );
      }

      const election = await runElection({
        generator: this.rankingGenerator,
        question: ctx.question,
        candidates: generated.candidates,
        voters: this.votersFor(ctx, owners),
        maxRetries: ctx.settings.maxRetries,
        template: ctx.rankingTemplate,
        sampling: ctx.rankingSampling,
        signal: ctx.signal,
        concurrency: ctx.settings.concurrency.voters,
        random: this.random,
        onRanking: (ballot) => callbacks.onRanking?.({ level, groupIndex, ...ballot }),
        onToken: callbacks.onToken
          ? (token) => callbacks.onToken?.({ level, groupIndex, stage: "ranking", token })
          : undefined,
        sessionLog: ctx.slog,
      });

      record.election = {
        winnerIndex: election.winnerIndex,
        ballots: election.ballots,
        excludedVoters: election.excludedVoters,
        pairwise: election.pairwise,
        strongestPaths: election.strongestPaths,
      };
      record.winner = generated.candidates[election.winnerIndex];
      log.info(`${where}: statement ${election.winnerIndex + 1} of ${generated.candidates.length} wins`);
      ctx.slog?.write("info", `${where} winner:\n${record.winner}`);
      callbacks.onGroupWinner?.({ level, groupIndex, statement: record.winner, owners, winnerIndex: election.winnerIndex });
      return { record };
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      record.error = error.message;
      log.warn(`${where} failed:`, truncate(error.message, 300));
      ctx.slog?.write("error", `${where} failed: ${error.message}`);
      return { record, error };
    }
  }

  private async persist(
    id: string,
    ctx: RunContext,
    status: SessionStatus,
    statement: string | null,
    error: string | null,
    startedAt: number,
  ): Promise<void> {
    if (!this.store) return;
    const now = Date.now();
    try {
      await this.store.saveSession({
        id,
        question: ctx.question,
        status,
        statement,
        error,
        participants: ctx.participants,
        levels: ctx.levels,
        settings: ctx.settings,
        durationMs: now - startedAt,
        createdAt: new Date(startedAt).toISOString(),
        updatedAt: new Date(now).toISOString(),
      });
    } catch (err) {
      log.warn("session store save failed:", errorMessage(err));
    }
  }
}
