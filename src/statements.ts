import { readFileSync } from "node:fs";

const LIST_PREFIX = /^(?:\d+[.)]|[-*•])\s+/;

/**
 * One statement per non-empty line. Lines starting with `#` are comments;
 * list markers such as `1.`, `2)`, `-`, `*` and `•` are removed.
 */
export function parseStatements(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"))
    .map((line) => line.replace(LIST_PREFIX, "").trim())
    .filter((line) => line !== "");
}

export function loadStatementsFromFile(path: string): string[] {
  const statements = parseStatements(readFileSync(path, "utf-8"));
  if (statements.length === 0) {
    throw new Error(`No statements found in ${path}`);
  }
  return statements;
}
