import type { ITextGenerator, SamplingParams } from "../generators/base.js";
import { CancelledError, ElectionImpossibleError, errorMessage } from "../errors.js";
import { runPool } from "../pool.js";
import { defaultRandom, type RandomSource } from "../random.js";
import { createLogger, type SessionLog } from "../logger.js";
import { computeSchulze, type VoterId } from "./schulze.js";
import { predictRanking } from "./ranking.js";
import type { Ballot, ElectionRecord, Voter } from "./base.js";

const log = createLogger("election");

export interface ElectionOptions {
  generator: ITextGenerator;
  question: string;
  candidates: readonly string[];
  voters: readonly Voter[];
  maxRetries: number;
  template: string;
  sampling: SamplingParams;
  signal?: AbortSignal;
  concurrency?: number;
  random?: RandomSource;
  onRanking?: (ballot: Ballot) => void;
  onToken?: (token: string) => void;
  sessionLog?: SessionLog | null;
}

export interface ElectionResult extends ElectionRecord {
  rankings: Map<VoterId, number[]>;
}

/**
 * Collect one predicted ranking per voter and run a Schulze election.
 * A voter whose prediction fails outright is left out; cancellation aborts
 * the whole election.
 */
export async function runElection(options: ElectionOptions): Promise<ElectionResult> {
  const { candidates, voters, signal } = options;
  const random = options.random ?? defaultRandom;

  if (candidates.length < 2) {
    throw new ElectionImpossibleError(`an election needs at least 2 candidates, got ${candidates.length}`);
  }
  if (voters.length === 0) {
    throw new ElectionImpossibleError("an election needs at least one voter");
  }

  log.debug(`election: ${candidates.length} candidates, ${voters.length} voters`);

  const tasks = voters.map((voter) => async (): Promise<Ballot> => {
    const prediction = await predictRanking({
      generator: options.generator,
      question: options.question,
      voter,
      candidates,
      maxRetries: options.maxRetries,
      template: options.template,
      sampling: options.sampling,
      signal,
      random,
      onToken: options.onToken,
      sessionLog: options.sessionLog,
    });
    const ballot: Ballot = { voterId: voter.id, ...prediction };
    options.onRanking?.(ballot);
    return ballot;
  });

  const outcomes = await runPool(tasks, { concurrency: options.concurrency ?? 1 });

  const ballots: Ballot[] = [];
  const excludedVoters: VoterId[] = [];
  outcomes.forEach((outcome, slot) => {
    const voterId = voters[slot].id;
    if (outcome.status === "fulfilled") {
      ballots.push(outcome.value);
      return;
    }
    if (outcome.status === "rejected") {
      if (outcome.reason instanceof CancelledError) throw outcome.reason;
      log.warn(`participant ${voterId + 1} left out of the election:`, errorMessage(outcome.reason));
    }
    excludedVoters.push(voterId);
  });

  if (ballots.length === 0) {
    throw new ElectionImpossibleError("no voter produced a ranking");
  }

  const rankings = new Map<VoterId, number[]>(ballots.map((b) => [b.voterId, b.ranking]));
  const { winner, pairwise, strongestPaths } = computeSchulze(rankings, candidates.length);
  log.debug(`election winner: statement ${winner + 1} of ${candidates.length}`);

  return { winnerIndex: winner, rankings, ballots, excludedVoters, pairwise, strongestPaths };
}
