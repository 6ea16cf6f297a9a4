import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  setLogLevel,
  getLogLevel,
  truncate,
  initFileLogging,
  disableFileLogging,
  createSessionLog,
  createLogger,
  isValidSessionId,
  getFileWriteFailures,
} from "../logger.js";

describe("setLogLevel / getLogLevel", () => {
  afterEach(() => setLogLevel("warn")); // reset

  it("defaults to warn", () => {
    setLogLevel("warn");
    expect(getLogLevel()).toBe("warn");
  });

  it("can set to debug", () => {
    setLogLevel("debug");
    expect(getLogLevel()).toBe("debug");
  });

  it("can set to error", () => {
    setLogLevel("error");
    expect(getLogLevel()).toBe("error");
  });
});

describe("truncate", () => {
  it("returns short strings unchanged", () => {
    expect(truncate("hello", 500)).toBe("hello");
  });

  it("truncates long strings with char count", () => {
    const long = "a".repeat(600);
    expect(truncate(long, 500)).toBe("a".repeat(500) + "... (600 chars total)");
  });

  it("respects custom maxLen", () => {
    expect(truncate("abcdef", 3)).toBe("abc... (6 chars total)");
  });
});

describe("isValidSessionId", () => {
  it("accepts file-safe ids only", () => {
    expect(isValidSessionId("a1b2-c3_d4")).toBe(true);
    expect(isValidSessionId("../etc/passwd")).toBe(false);
    expect(isValidSessionId("")).toBe(false);
    expect(isValidSessionId("x".repeat(129))).toBe(false);
  });
});

describe("file logging", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "plenum-logs-"));
    setLogLevel("error");
  });

  afterEach(() => {
    disableFileLogging();
    setLogLevel("warn");
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns no session log while file logging is off", () => {
    disableFileLogging();
    expect(createSessionLog("abc")).toBeNull();
  });

  it("writes session logs under logs/sessions", () => {
    initFileLogging(dir);
    const sessionLog = createSessionLog("abc");
    expect(sessionLog?.path).toBe(join(dir, "logs", "sessions", "abc.log"));
    sessionLog?.write("info", "hello");
    const content = readFileSync(join(dir, "logs", "sessions", "abc.log"), "utf-8");
    expect(content).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INF hello\n$/);
  });

  it("counts log lines that could not be written", () => {
    initFileLogging(dir);
    const sessionLog = createSessionLog("gone");
    rmSync(join(dir, "logs"), { recursive: true, force: true });
    const before = getFileWriteFailures();
    sessionLog?.write("info", "lost");
    expect(getFileWriteFailures()).toBe(before + 1);
  });

  it("rejects unsafe session ids", () => {
    initFileLogging(dir);
    expect(createSessionLog("../escape")).toBeNull();
  });

  it("writes info and above to info.log, not debug", () => {
    initFileLogging(dir);
    const log = createLogger("test");
    log.info("kept line");
    log.debug("dropped line");
    const content = readFileSync(join(dir, "logs", "info.log"), "utf-8");
    expect(content).toContain("INF [test] kept line");
    expect(content).not.toContain("dropped line");
  });

  it("purges the oldest session logs beyond maxFiles", () => {
    const sessionsDir = join(dir, "logs", "sessions");
    mkdirSync(sessionsDir, { recursive: true });
    const now = Date.now() / 1000;
    ["old", "mid", "new"].forEach((name, i) => {
      const path = join(sessionsDir, `${name}.log`);
      writeFileSync(path, "x\n");
      utimesSync(path, now - 300 + i * 100, now - 300 + i * 100);
    });

    initFileLogging(dir, { sessions: { purge: "count", maxFiles: 2 } });

    expect(readdirSync(sessionsDir).sort()).toEqual(["mid.log", "new.log"]);
  });

  it("trims info.log to whole lines within maxBytes of multibyte text", () => {
    mkdirSync(join(dir, "logs"), { recursive: true });
    // 19 bytes per line, 190 bytes in all.
    const line = "é".repeat(9) + "\n";
    writeFileSync(join(dir, "logs", "info.log"), line.repeat(10));

    initFileLogging(dir, { info: { purge: "size", maxBytes: 150 } });

    const content = readFileSync(join(dir, "logs", "info.log"), "utf-8");
    expect(content).toBe(line.repeat(7));
    expect(Buffer.byteLength(content)).toBe(133);
  });

  it("drops info.log lines older than maxDays", () => {
    mkdirSync(join(dir, "logs"), { recursive: true });
    const old = new Date(Date.now() - 10 * 24 * 60 * 60 * 1000).toISOString();
    const recent = new Date().toISOString();
    writeFileSync(join(dir, "logs", "info.log"), `${old} INF [x] stale\n${recent} INF [x] fresh\n`);

    initFileLogging(dir, { info: { purge: "date", maxDays: 5 } });

    const content = readFileSync(join(dir, "logs", "info.log"), "utf-8");
    expect(content).toBe(`${recent} INF [x] fresh\n`);
    expect(existsSync(join(dir, "logs", "sessions"))).toBe(true);
  });
});
