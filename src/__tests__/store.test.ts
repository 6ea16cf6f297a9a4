/**
 * SQLite session store tests.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { SqliteSessionStore } from "../store/sqlite.js";
import type { SessionRecord } from "../store/types.js";

let store: SqliteSessionStore;
let tmpDir: string;

beforeEach(async () => {
  tmpDir = mkdtempSync(join(tmpdir(), "plenum-test-"));
  store = new SqliteSessionStore(join(tmpDir, "nested", "test.db"));
  await store.initialize();
});

afterEach(async () => {
  await store.close();
  rmSync(tmpDir, { recursive: true, force: true });
});

// --- Helper ---

function record(id: string, overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id,
    question: "Where should the new park go?",
    status: "completed",
    statement: "Near the river",
    error: null,
    participants: ["By the river", "Downtown"],
    levels: [
      {
        level: 0,
        inputCount: 2,
        groups: [
          {
            level: 0,
            groupIndex: 0,
            statements: ["By the river", "Downtown"],
            owners: [0, 1],
            candidates: ["Near the river", "Downtown, by the river"],
            election: {
              winnerIndex: 0,
              ballots: [
                { voterId: 0, ranking: [0, 1], attempts: ["Attempt 1/3: Valid ranking: [1, 2]"], fallback: false },
                { voterId: 1, ranking: [1, 0], attempts: ["Attempt 1/3: Valid ranking: [2, 1]"], fallback: false },
              ],
              excludedVoters: [],
              pairwise: [[0, 1], [1, 0]],
              strongestPaths: [[0, 1], [1, 0]],
            },
            winner: "Near the river",
          },
        ],
      },
    ],
    settings: {
      numCandidates: 4,
      maxRetries: 3,
      maxGroupSize: 9,
      votingStrategy: "own_groups_only",
      concurrency: { groups: 1, voters: 1, candidates: 1 },
      model: "llama3.1",
      rankingModel: "llama3.1",
    },
    durationMs: 1234,
    createdAt: "2026-01-01T10:00:00.000Z",
    updatedAt: "2026-01-01T10:00:01.234Z",
    ...overrides,
  };
}

describe("SqliteSessionStore", () => {
  it("round-trips a session", async () => {
    const original = record("s1");
    await store.saveSession(original);
    expect(await store.getSession("s1")).toEqual(original);
  });

  it("returns null for an unknown id", async () => {
    expect(await store.getSession("missing")).toBeNull();
  });

  it("replaces a session saved twice", async () => {
    await store.saveSession(record("s1", { status: "failed", statement: null, error: "boom" }));
    await store.saveSession(record("s1"));
    const saved = await store.getSession("s1");
    expect(saved?.status).toBe("completed");
    expect(saved?.error).toBeNull();
    expect(await store.listSessions()).toHaveLength(1);
  });

  it("lists newest first with summary fields", async () => {
    await store.saveSession(record("old", { createdAt: "2026-01-01T00:00:00.000Z" }));
    await store.saveSession(record("new", { createdAt: "2026-02-01T00:00:00.000Z", status: "cancelled", statement: null }));

    const list = await store.listSessions();
    expect(list).toEqual([
      {
        id: "new",
        question: "Where should the new park go?",
        status: "cancelled",
        statement: null,
        participantCount: 2,
        levelCount: 1,
        durationMs: 1234,
        createdAt: "2026-02-01T00:00:00.000Z",
      },
      {
        id: "old",
        question: "Where should the new park go?",
        status: "completed",
        statement: "Near the river",
        participantCount: 2,
        levelCount: 1,
        durationMs: 1234,
        createdAt: "2026-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("respects the list limit", async () => {
    for (let i = 0; i < 5; i++) {
      await store.saveSession(record(`s${i}`, { createdAt: `2026-01-0${i + 1}T00:00:00.000Z` }));
    }
    const list = await store.listSessions(2);
    expect(list.map((s) => s.id)).toEqual(["s4", "s3"]);
  });

  it("deletes a session", async () => {
    await store.saveSession(record("s1"));
    expect(await store.deleteSession("s1")).toBe(true);
    expect(await store.deleteSession("s1")).toBe(false);
    expect(await store.getSession("s1")).toBeNull();
  });
});
