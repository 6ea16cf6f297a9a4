/**
 * SQLite session store using better-sqlite3.
 *
 * One row per session. The per-level transcript lives in a JSON column and
 * is validated with zod when read back.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { ISessionStore } from "./interfaces.js";
import type { SessionRecord, SessionStatus, SessionSummary } from "./types.js";

const MatrixSchema = z.array(z.array(z.number()));

const BallotSchema = z.object({
  voterId: z.number(),
  ranking: z.array(z.number()),
  attempts: z.array(z.string()),
  fallback: z.boolean(),
});

const GroupRecordSchema = z.object({
  level: z.number(),
  groupIndex: z.number(),
  statements: z.array(z.string()),
  owners: z.array(z.number()),
  candidates: z.array(z.string()),
  election: z
    .object({
      winnerIndex: z.number(),
      ballots: z.array(BallotSchema),
      excludedVoters: z.array(z.number()),
      pairwise: MatrixSchema,
      strongestPaths: MatrixSchema,
    })
    .optional(),
  winner: z.string().optional(),
  error: z.string().optional(),
});

const SessionBodySchema = z.object({
  participants: z.array(z.string()),
  levels: z.array(
    z.object({
      level: z.number(),
      inputCount: z.number(),
      groups: z.array(GroupRecordSchema),
    }),
  ),
  settings: z.object({
    numCandidates: z.number(),
    maxRetries: z.number(),
    maxGroupSize: z.number(),
    votingStrategy: z.enum(["own_groups_only", "all_elections"]),
    concurrency: z.object({ groups: z.number(), voters: z.number(), candidates: z.number() }),
    model: z.string(),
    rankingModel: z.string(),
  }),
});

const StatusSchema = z.enum(["completed", "failed", "cancelled"]);

interface SessionRow {
  id: string;
  question: string;
  status: string;
  statement: string | null;
  error: string | null;
  participant_count: number;
  level_count: number;
  duration_ms: number;
  body: string;
  created_at: string;
  updated_at: string;
}

type SummaryRow = Omit<SessionRow, "body" | "error" | "updated_at">;

function parseStatus(value: string): SessionStatus {
  return StatusSchema.parse(value);
}

export class SqliteSessionStore implements ISessionStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
  }

  async initialize(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        question TEXT NOT NULL,
        status TEXT NOT NULL,
        statement TEXT,
        error TEXT,
        participant_count INTEGER NOT NULL,
        level_count INTEGER NOT NULL,
        duration_ms INTEGER NOT NULL,
        body TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_created ON sessions(created_at);
    `);
  }

  async saveSession(record: SessionRecord): Promise<void> {
    const body = JSON.stringify({
      participants: record.participants,
      levels: record.levels,
      settings: record.settings,
    });
    this.db.prepare(`
      INSERT INTO sessions (id, question, status, statement, error, participant_count, level_count,
                            duration_ms, body, created_at, updated_at)
      VALUES (@id, @question, @status, @statement, @error, @participant_count, @level_count,
              @duration_ms, @body, @created_at, @updated_at)
      ON CONFLICT(id) DO UPDATE SET
        question = excluded.question, status = excluded.status, statement = excluded.statement,
        error = excluded.error, participant_count = excluded.participant_count,
        level_count = excluded.level_count, duration_ms = excluded.duration_ms,
        body = excluded.body, updated_at = excluded.updated_at
    `).run({
      id: record.id,
      question: record.question,
      status: record.status,
      statement: record.statement,
      error: record.error,
      participant_count: record.participants.length,
      level_count: record.levels.length,
      duration_ms: record.durationMs,
      body,
      created_at: record.createdAt,
      updated_at: record.updatedAt,
    });
  }

  async getSession(id: string): Promise<SessionRecord | null> {
    const row = this.db.prepare<[string], SessionRow>("SELECT * FROM sessions WHERE id = ?").get(id);
    if (!row) return null;

    const body = SessionBodySchema.parse(JSON.parse(row.body));
    return {
      id: row.id,
      question: row.question,
      status: parseStatus(row.status),
      statement: row.statement,
      error: row.error,
      participants: body.participants,
      levels: body.levels,
      settings: body.settings,
      durationMs: row.duration_ms,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async listSessions(limit = 20): Promise<SessionSummary[]> {
    const rows = this.db.prepare<[number], SummaryRow>(`
      SELECT id, question, status, statement, participant_count, level_count, duration_ms, created_at
      FROM sessions ORDER BY created_at DESC, rowid DESC LIMIT ?
    `).all(limit);
    return rows.map((row) => ({
      id: row.id,
      question: row.question,
      status: parseStatus(row.status),
      statement: row.statement,
      participantCount: row.participant_count,
      levelCount: row.level_count,
      durationMs: row.duration_ms,
      createdAt: row.created_at,
    }));
  }

  async deleteSession(id: string): Promise<boolean> {
    const result = this.db.prepare("DELETE FROM sessions WHERE id = ?").run(id);
    return result.changes > 0;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
