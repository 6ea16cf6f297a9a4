/**
 * Extract a candidate ranking from free-form model output.
 *
 * Expected shape: `{"ranking": [2, 1, 3]}` with 1-based candidate numbers.
 * Models wrap this in prose, reasoning sections, single-quoted dicts or
 * trailing commas, so parsing goes strict JSON, then a normalized retry,
 * then a plain pattern match on the `ranking` key. Nothing is evaluated.
 */

import { RankingParseError, type RankingParseFailure } from "../errors.js";
import { isPermutation } from "./schulze.js";

export type RankingParseResult =
  | { ok: true; ranking: number[]; log: string[] }
  | { ok: false; error: RankingParseError; log: string[] };

const REASONING_SECTION = /<(think|thinking|reasoning)>[\s\S]*?<\/\1>/gi;

/** Remove `<think>…</think>` style sections and trim. */
export function stripReasoning(text: string): string {
  return text.replace(REASONING_SECTION, "").trim();
}

/**
 * First balanced `{…}` substring. Braces inside quoted strings do not count.
 * Returns null when no object opens or the first one never closes.
 */
export function findJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/** Rewrite dict-like text into JSON: quotes, bare keys, trailing commas, literals. */
function normalizeLoose(src: string): string {
  return src
    .replace(/'((?:[^'\\]|\\.)*)'/g, (_m, body: string) => JSON.stringify(body.replace(/\\'/g, "'")))
    .replace(/([{,]\s*)([A-Za-z_][A-Za-z0-9_]*)(\s*:)/g, '$1"$2"$3')
    .replace(/,(\s*[}\]])/g, "$1")
    .replace(/\bTrue\b/g, "true")
    .replace(/\bFalse\b/g, "false")
    .replace(/\bNone\b/g, "null");
}

function tryJson(src: string): { value: unknown } | null {
  try {
    return { value: JSON.parse(src) };
  } catch {
    return null;
  }
}

const RANKING_KEY = /["']?ranking["']?\s*[:=]\s*\[([^\]]*)\]/i;

/**
 * Last resort: pull the list after a `ranking` key out of arbitrary text.
 * Digit items become numbers; anything else stays text and fails validation.
 */
function extractRankingByPattern(text: string): unknown[] | null {
  const match = RANKING_KEY.exec(text);
  if (!match) return null;
  return match[1]
    .split(",")
    .map((s) => s.trim().replace(/^["']|["']$/g, ""))
    .filter((s) => s !== "")
    .map((s) => (/^-?\d+$/.test(s) ? Number.parseInt(s, 10) : s));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Locate the `ranking` value. `undefined` means no object could be read at all. */
function locateRankingValue(text: string, log: string[]): { found: boolean; value: unknown } | undefined {
  const objectText = findJsonObject(text);
  if (objectText !== null) {
    const strict = tryJson(objectText);
    if (strict) {
      log.push("Parsed JSON object");
      return isRecord(strict.value) && "ranking" in strict.value
        ? { found: true, value: strict.value.ranking }
        : { found: false, value: undefined };
    }
    log.push("Strict JSON parse failed, retrying with normalized quotes and commas");
    const loose = tryJson(normalizeLoose(objectText));
    if (loose) {
      log.push("Parsed normalized object");
      return isRecord(loose.value) && "ranking" in loose.value
        ? { found: true, value: loose.value.ranking }
        : { found: false, value: undefined };
    }
  }

  const list = extractRankingByPattern(text);
  if (list) {
    log.push("Recovered ranking list by pattern match");
    return { found: true, value: list };
  }
  return undefined;
}

function toInteger(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

function fail(reason: RankingParseFailure, message: string, log: string[]): RankingParseResult {
  log.push(message);
  return { ok: false, error: new RankingParseError(reason, message), log };
}

/**
 * Parse a ranking of `numCandidates` candidates. The returned ranking is
 * 0-based and always a permutation. 1-based input is preferred; 0-based
 * input is accepted when the 1-based reading does not fit.
 */
export function parseRanking(rawText: string, numCandidates: number): RankingParseResult {
  const log: string[] = [];
  const text = stripReasoning(rawText);
  if (text.length !== rawText.trim().length) log.push("Removed reasoning section");

  const located = locateRankingValue(text, log);
  if (!located) return fail("no_json", "No JSON object found in response", log);
  if (!located.found) return fail("missing_field", "JSON has no 'ranking' field", log);
  if (!Array.isArray(located.value)) return fail("not_a_list", "'ranking' is not a list", log);

  const values: number[] = [];
  for (const item of located.value) {
    const n = toInteger(item);
    if (n === null) return fail("non_integer", `'ranking' holds a non-integer value: ${JSON.stringify(item)}`, log);
    values.push(n);
  }

  if (values.length !== numCandidates) {
    return fail("wrong_length", `Expected ${numCandidates} entries, got ${values.length}: [${values.join(", ")}]`, log);
  }

  const zeroBased = values.map((v) => v - 1);
  if (isPermutation(zeroBased, numCandidates)) {
    log.push(`Valid ranking: [${values.join(", ")}]`);
    return { ok: true, ranking: zeroBased, log };
  }
  if (isPermutation(values, numCandidates)) {
    log.push(`Valid 0-indexed ranking: [${values.join(", ")}]`);
    return { ok: true, ranking: values, log };
  }
  return fail("invalid_indices", `Invalid candidate numbers: [${values.join(", ")}]`, log);
}
