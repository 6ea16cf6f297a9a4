/**
 * Session store interface. Implementations persist whole session records;
 * the orchestrator writes once per run and never reads back.
 */

import type { SessionRecord, SessionSummary } from "./types.js";

export interface ISessionStore {
  /** Insert, or replace a record with the same id. */
  saveSession(record: SessionRecord): Promise<void>;
  getSession(id: string): Promise<SessionRecord | null>;
  /** Newest first. */
  listSessions(limit?: number): Promise<SessionSummary[]>;
  deleteSession(id: string): Promise<boolean>;

  // --- Lifecycle ---
  initialize(): Promise<void>;
  close(): Promise<void>;
}
