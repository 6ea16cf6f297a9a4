/**
 * Session store types.
 */

import type { ConsensusSettings, LevelRecord } from "../consensus/base.js";

export type SessionStatus = "completed" | "failed" | "cancelled";

/** A finished run, successful or not, with everything needed to report on it. */
export interface SessionRecord {
  id: string;
  question: string;
  status: SessionStatus;
  /** Final consensus statement; null unless completed. */
  statement: string | null;
  error: string | null;
  participants: string[];
  levels: LevelRecord[];
  settings: ConsensusSettings;
  durationMs: number;
  createdAt: string;
  updatedAt: string;
}

/** Listing row, without the per-level transcript. */
export interface SessionSummary {
  id: string;
  question: string;
  status: SessionStatus;
  statement: string | null;
  participantCount: number;
  levelCount: number;
  durationMs: number;
  createdAt: string;
}
