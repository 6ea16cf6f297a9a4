/**
 * Namespaced logger, no dependencies.
 *
 * Output goes to two places:
 *  1. stderr, filtered by --verbose/--debug or PLENUM_LOG_LEVEL
 *  2. files under <userDataDir>/logs/ once initFileLogging() has run
 *     - info.log            : info and above, appended across runs
 *     - sessions/<id>.log   : one per consensus session, every level,
 *                             full prompts and generator output
 *
 * stdout belongs to the MCP stdio transport, so nothing here writes to it.
 */

import {
  appendFileSync, readFileSync, writeFileSync,
  mkdirSync, statSync, readdirSync, unlinkSync,
} from "node:fs";
import { join } from "node:path";

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };
const LEVEL_TAGS: Record<LogLevel, string> = { error: "ERR", warn: "WRN", info: "INF", debug: "DBG" };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

// ── stderr level ────────────────────────────────────────────────────────

const envLevel = process.env.PLENUM_LOG_LEVEL;
let stderrLevel: number = isLogLevel(envLevel) ? LEVELS[envLevel] : LEVELS.warn;

export function setLogLevel(l: LogLevel): void {
  stderrLevel = LEVELS[l];
}

export function getLogLevel(): LogLevel {
  const names: LogLevel[] = ["error", "warn", "info", "debug"];
  return names.find((k) => LEVELS[k] === stderrLevel) ?? "warn";
}

// ── File logging ────────────────────────────────────────────────────────

export interface FileLoggingConfig {
  info?: {
    purge?: "date" | "size";
    maxDays?: number;
    maxBytes?: number;
  };
  sessions?: {
    purge?: "count" | "date" | "size";
    maxFiles?: number;
    maxDays?: number;
    maxBytes?: number;
  };
}

interface FileTargets {
  infoLogPath: string;
  sessionsDir: string;
}

let files: FileTargets | null = null;
let fileWriteFailures = 0;

/** Append a line, counting failures instead of letting a full disk break a session. */
function appendLine(path: string, line: string): void {
  try {
    appendFileSync(path, line);
  } catch (err) {
    fileWriteFailures++;
    if (fileWriteFailures === 1) {
      console.error(ts(), LEVEL_TAGS.warn, "[logger]", `log file write failed: ${errorMessage(err)}`);
    }
  }
}

/** Number of log lines that could not be written to disk since startup. */
export function getFileWriteFailures(): number {
  return fileWriteFailures;
}

/**
 * Start writing log files under `<userDataDir>/logs`. Old files are purged
 * according to `config` before anything new is written.
 */
export function initFileLogging(userDataDir: string, config?: FileLoggingConfig): void {
  const logsDir = join(userDataDir, "logs");
  const sessionsDir = join(logsDir, "sessions");
  mkdirSync(sessionsDir, { recursive: true });

  files = { infoLogPath: join(logsDir, "info.log"), sessionsDir };

  const info = config?.info;
  if ((info?.purge ?? "date") === "date") {
    dropInfoLinesOlderThan(files.infoLogPath, info?.maxDays ?? 30);
  } else {
    keepInfoTail(files.infoLogPath, info?.maxBytes ?? 50 * 1024 * 1024);
  }

  const sessions = config?.sessions;
  purgeSessionLogs(sessionsDir, {
    purge: sessions?.purge ?? "count",
    maxFiles: sessions?.maxFiles ?? 50,
    maxDays: sessions?.maxDays ?? 14,
    maxBytes: sessions?.maxBytes ?? 100 * 1024 * 1024,
  });
}

/** Stop writing log files (tests). */
export function disableFileLogging(): void {
  files = null;
}

// ── Formatting ──────────────────────────────────────────────────────────

function ts(): string {
  return new Date().toISOString().slice(11, 23);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Shorten a string for display. Session logs keep the full text. */
export function truncate(s: string, maxLen = 500): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen) + `... (${s.length} chars total)`;
}

function formatArgs(args: unknown[]): string {
  return args.map((a) => (typeof a === "string" ? a : JSON.stringify(a))).join(" ");
}

const STDERR_MAX_LINE = 800;

function log(level: LogLevel, tag: string, args: unknown[]): void {
  const lvl = LEVELS[level];
  const message = formatArgs(args);

  if (stderrLevel >= lvl) {
    const short = message.length > STDERR_MAX_LINE
      ? message.slice(0, STDERR_MAX_LINE) + `... (${message.length} chars, full in session log)`
      : message;
    console.error(ts(), LEVEL_TAGS[level], tag, short);
  }

  if (files && lvl <= LEVELS.info) {
    appendLine(files.infoLogPath, `${new Date().toISOString()} ${LEVEL_TAGS[level]} ${tag} ${message}\n`);
  }
}

// ── Per-session log ─────────────────────────────────────────────────────

export interface SessionLog {
  write: (level: LogLevel, message: string) => void;
  readonly path: string;
}

const SAFE_SESSION_ID = /^[a-zA-Z0-9_-]+$/;

export function isValidSessionId(sessionId: string): boolean {
  return SAFE_SESSION_ID.test(sessionId) && sessionId.length <= 128;
}

/**
 * Open `logs/sessions/<sessionId>.log`. Returns null when file logging is
 * off or the id would not be a safe file name.
 */
export function createSessionLog(sessionId: string): SessionLog | null {
  if (!files) return null;
  if (!isValidSessionId(sessionId)) {
    log("warn", "[logger]", [`rejected session id for log file: ${sessionId}`]);
    return null;
  }

  const path = join(files.sessionsDir, `${sessionId}.log`);
  return {
    write(level: LogLevel, message: string): void {
      appendLine(path, `${new Date().toISOString()} ${LEVEL_TAGS[level]} ${message}\n`);
    },
    path,
  };
}

// ── Purge ───────────────────────────────────────────────────────────────

function readIfExists(path: string): string | null {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

function dropInfoLinesOlderThan(path: string, maxDays: number): void {
  const content = readIfExists(path);
  if (content === null) return;
  const cutoff = new Date(Date.now() - maxDays * 24 * 60 * 60 * 1000).toISOString();
  // Lines start with a 24-char ISO timestamp, so string comparison orders them.
  const kept = content.split("\n").filter((line) => line.trim() === "" || line.slice(0, 24) >= cutoff);
  writeFileSync(path, kept.join("\n"));
}

function keepInfoTail(path: string, maxBytes: number): void {
  const content = readIfExists(path);
  if (content === null) return;
  const bytes = Buffer.from(content, "utf-8");
  if (bytes.length <= maxBytes) return;
  const tail = bytes.subarray(bytes.length - maxBytes);
  const cut = tail.indexOf(0x0a);
  writeFileSync(path, cut >= 0 ? tail.subarray(cut + 1) : tail);
}

interface SessionPurgePolicy {
  purge: "count" | "date" | "size";
  maxFiles: number;
  maxDays: number;
  maxBytes: number;
}

function purgeSessionLogs(dir: string, policy: SessionPurgePolicy): void {
  const logs = readdirSync(dir)
    .filter((name) => name.endsWith(".log"))
    .map((name) => {
      const path = join(dir, name);
      const stats = statSync(path);
      return { path, size: stats.size, mtimeMs: stats.mtimeMs };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs); // newest first

  let doomed: string[];
  switch (policy.purge) {
    case "count":
      doomed = logs.slice(policy.maxFiles).map((f) => f.path);
      break;
    case "date": {
      const cutoff = Date.now() - policy.maxDays * 24 * 60 * 60 * 1000;
      doomed = logs.filter((f) => f.mtimeMs < cutoff).map((f) => f.path);
      break;
    }
    case "size": {
      let total = 0;
      doomed = [];
      for (const f of logs) {
        total += f.size;
        if (total > policy.maxBytes) doomed.push(f.path);
      }
      break;
    }
  }

  for (const path of doomed) unlinkSync(path);
}

// ── Logger factory ──────────────────────────────────────────────────────

export type Logger = ReturnType<typeof createLogger>;

export function createLogger(namespace: string) {
  const tag = `[${namespace}]`;
  return {
    error: (...args: unknown[]) => log("error", tag, args),
    warn:  (...args: unknown[]) => log("warn", tag, args),
    info:  (...args: unknown[]) => log("info", tag, args),
    debug: (...args: unknown[]) => log("debug", tag, args),
  };
}
