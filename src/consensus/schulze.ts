/**
 * Schulze (Condorcet) election over complete rankings.
 *
 * Pairwise preferences are counted, then widened with a Floyd–Warshall
 * pass where a path is as strong as its weakest link. A candidate survives
 * when no rival beats it on strongest paths; ties go to the lowest index.
 */

import { InvariantViolationError } from "../errors.js";

/** Original participant index. */
export type VoterId = number;

/** `matrix[i][j]` for candidates i and j. */
export type Matrix = number[][];

export interface SchulzeResult {
  winner: number;
  pairwise: Matrix;
  strongestPaths: Matrix;
}

function squareMatrix(n: number): Matrix {
  return Array.from({ length: n }, () => new Array<number>(n).fill(0));
}

/** True when `ranking` lists every index in 0..n-1 exactly once. */
export function isPermutation(ranking: readonly number[], n: number): boolean {
  if (ranking.length !== n) return false;
  const seen = new Set<number>();
  for (const c of ranking) {
    if (!Number.isInteger(c) || c < 0 || c >= n || seen.has(c)) return false;
    seen.add(c);
  }
  return true;
}

export function computeSchulze(
  rankings: ReadonlyMap<VoterId, readonly number[]>,
  numCandidates: number,
): SchulzeResult {
  if (!Number.isInteger(numCandidates) || numCandidates < 1) {
    throw new InvariantViolationError(`candidate count must be a positive integer, got ${numCandidates}`);
  }

  const n = numCandidates;
  const pairwise = squareMatrix(n);

  for (const [voter, ranking] of rankings) {
    if (!isPermutation(ranking, n)) {
      throw new InvariantViolationError(
        `ranking of voter ${voter} is not a permutation of 0..${n - 1}: [${ranking.join(", ")}]`,
      );
    }
    for (let a = 0; a < n; a++) {
      for (let b = a + 1; b < n; b++) {
        pairwise[ranking[a]][ranking[b]]++;
      }
    }
  }

  const paths = squareMatrix(n);
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (i !== j) paths[i][j] = pairwise[i][j];
    }
  }

  // i is the intermediate, j the source, k the destination.
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (j === i) continue;
      for (let k = 0; k < n; k++) {
        if (k === i || k === j) continue;
        paths[j][k] = Math.max(paths[j][k], Math.min(paths[j][i], paths[i][k]));
      }
    }
  }

  let winner = 0;
  for (let i = 0; i < n; i++) {
    let beaten = false;
    for (let j = 0; j < n && !beaten; j++) {
      if (j !== i && paths[j][i] > paths[i][j]) beaten = true;
    }
    if (!beaten) {
      winner = i;
      break;
    }
  }

  return { winner, pairwise, strongestPaths: paths };
}

/** Per candidate, how many rivals it beats on strongest paths. */
export function countVictories(strongestPaths: Matrix): number[] {
  const n = strongestPaths.length;
  return strongestPaths.map((row, i) => {
    let wins = 0;
    for (let j = 0; j < n; j++) {
      if (j !== i && row[j] > strongestPaths[j][i]) wins++;
    }
    return wins;
  });
}

/** Every candidate, most victories first, ties by index. */
export function rankByVictories(strongestPaths: Matrix): number[] {
  const victories = countVictories(strongestPaths);
  return victories
    .map((wins, index) => ({ wins, index }))
    .sort((a, b) => b.wins - a.wins || a.index - b.index)
    .map((c) => c.index);
}

/** Markdown table with candidates labelled S1..Sn. */
export function formatMatrix(matrix: Matrix): string {
  const labels = matrix.map((_, i) => `S${i + 1}`);
  const lines = [
    `|    | ${labels.join(" | ")} |`,
    `|----|${labels.map(() => "----").join("|")}|`,
  ];
  matrix.forEach((row, i) => {
    lines.push(`| ${labels[i]} | ${row.join(" | ")} |`);
  });
  return lines.join("\n");
}
