/**
 * Shared types for the consensus pipeline: progress events, ballots and the
 * records a finished run leaves behind.
 */

import type { Matrix, VoterId } from "./schulze.js";

export type { Matrix, VoterId } from "./schulze.js";

/** A participant as seen by an election: original index plus own statement. */
export interface Voter {
  id: VoterId;
  statement: string;
}

/** Where in the recursion an event happened. */
export interface GroupLocation {
  level: number;
  groupIndex: number;
}

export interface CandidateEvent extends GroupLocation {
  candidateIndex: number;
  total: number;
  text: string;
}

export interface RankingEvent extends GroupLocation {
  voterId: VoterId;
  /** 0-based candidate order, most preferred first. */
  ranking: number[];
  attempts: string[];
  fallback: boolean;
}

export interface GroupWinnerEvent extends GroupLocation {
  statement: string;
  owners: VoterId[];
  winnerIndex: number;
}

export type TokenStage = "candidate" | "ranking";

export interface TokenEvent extends GroupLocation {
  stage: TokenStage;
  token: string;
}

/** Optional observers. The pipeline never depends on them. */
export interface ProgressCallbacks {
  onCandidate?: (event: CandidateEvent) => void;
  onRanking?: (event: RankingEvent) => void;
  onGroupWinner?: (event: GroupWinnerEvent) => void;
  onToken?: (event: TokenEvent) => void;
}

/** One voter's contribution to an election. */
export interface Ballot {
  voterId: VoterId;
  ranking: number[];
  /** Per-attempt parse log, plus a final line when the ranking is random. */
  attempts: string[];
  fallback: boolean;
}

export interface ElectionRecord {
  winnerIndex: number;
  ballots: Ballot[];
  /** Voters whose prediction failed outright and who were left out. */
  excludedVoters: VoterId[];
  pairwise: Matrix;
  strongestPaths: Matrix;
}

export interface GroupRecord extends GroupLocation {
  statements: string[];
  /** Original participants the group's statements stand for, sorted. */
  owners: VoterId[];
  candidates: string[];
  election?: ElectionRecord;
  winner?: string;
  error?: string;
}

export interface LevelRecord {
  level: number;
  inputCount: number;
  groups: GroupRecord[];
}

export type VotingStrategy = "own_groups_only" | "all_elections";

/** Effective settings of a run, after clamping. */
export interface ConsensusSettings {
  numCandidates: number;
  maxRetries: number;
  maxGroupSize: number;
  votingStrategy: VotingStrategy;
  concurrency: { groups: number; voters: number; candidates: number };
  /** Model that writes candidates. */
  model: string;
  /** Model that predicts rankings. Equals `model` when one generator does both. */
  rankingModel: string;
}
