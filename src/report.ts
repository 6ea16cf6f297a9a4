/**
 * Markdown reports for a finished session: a short summary for readers and
 * a detailed transcript with every ballot and matrix.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { GroupRecord } from "./consensus/base.js";
import { formatMatrix, rankByVictories } from "./consensus/schulze.js";
import type { ConsensusResult } from "./orchestrator.js";

function strategyLabel(result: ConsensusResult): string {
  return result.settings.votingStrategy === "all_elections"
    ? "every participant votes in every election"
    : "participants vote only in elections that include their statement";
}

function ownersLabel(owners: number[]): string {
  return owners.map((id) => `P${id + 1}`).join(", ");
}

function modelLine({ settings }: ConsensusResult): string {
  return settings.rankingModel === settings.model
    ? `**Model:** ${settings.model}`
    : `**Model:** ${settings.model} (rankings: ${settings.rankingModel})`;
}

export function renderSummaryReport(result: ConsensusResult): string {
  const lines = [
    "# Consensus Results",
    "",
    `**Question:** ${result.question}`,
    "",
    `**Session:** ${result.sessionId}`,
    `**Participants:** ${result.participants.length}`,
    `**Levels:** ${result.levels.length}`,
    modelLine(result),
    `**Voting:** ${strategyLabel(result)}`,
    `**Duration:** ${(result.durationMs / 1000).toFixed(1)}s`,
    "",
    "## Consensus Statement",
    "",
    result.statement,
    "",
  ];

  for (const level of result.levels) {
    lines.push(`## Level ${level.level + 1}`, "");
    for (const group of level.groups) {
      const label = `Group ${group.groupIndex + 1} (${ownersLabel(group.owners)})`;
      lines.push(group.winner !== undefined ? `- ${label}: winner selected` : `- ${label}: failed (${group.error ?? "no winner"})`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

function renderGroup(group: GroupRecord): string[] {
  const lines = [`### Group ${group.groupIndex + 1}`, "", `Participants represented: ${ownersLabel(group.owners)}`, ""];

  lines.push("#### Input statements", "");
  group.statements.forEach((s, i) => lines.push(`${i + 1}. ${s}`));
  lines.push("");

  if (group.candidates.length > 0) {
    lines.push("#### Candidates", "");
    group.candidates.forEach((c, i) => lines.push(`**Statement ${i + 1}:**`, "", c, ""));
  }

  const election = group.election;
  if (election) {
    lines.push("#### Ballots", "");
    for (const ballot of election.ballots) {
      const order = ballot.ranking.map((c) => `S${c + 1}`).join(" > ");
      lines.push(`- P${ballot.voterId + 1}: ${order}${ballot.fallback ? " (random fallback)" : ""}`);
      for (const attempt of ballot.attempts) lines.push(`  - ${attempt}`);
    }
    if (election.excludedVoters.length > 0) {
      lines.push(`- Left out: ${ownersLabel(election.excludedVoters)}`);
    }
    lines.push("");
    lines.push("#### Pairwise preferences", "", formatMatrix(election.pairwise), "");
    lines.push("#### Strongest paths", "", formatMatrix(election.strongestPaths), "");
    const order = rankByVictories(election.strongestPaths).map((c) => `S${c + 1}`).join(" > ");
    lines.push(`Order by victories: ${order}`, "");
    lines.push(`**Winner:** Statement ${election.winnerIndex + 1}`, "");
  }

  if (group.error !== undefined) {
    lines.push(`**Failed:** ${group.error}`, "");
  }
  return lines;
}

export function renderDetailedReport(result: ConsensusResult): string {
  const lines = [
    "# Consensus Transcript",
    "",
    `**Question:** ${result.question}`,
    `**Session:** ${result.sessionId}`,
    `**Settings:** ${result.settings.numCandidates} candidates, ${result.settings.maxRetries} ranking attempts, groups of at most ${result.settings.maxGroupSize}`,
    `**Voting:** ${strategyLabel(result)}`,
    "",
    "## Participant statements",
    "",
  ];
  result.participants.forEach((s, i) => lines.push(`- **P${i + 1}:** ${s}`));
  lines.push("");

  for (const level of result.levels) {
    lines.push(`## Level ${level.level + 1} (${level.inputCount} statements)`, "");
    for (const group of level.groups) lines.push(...renderGroup(group));
  }

  lines.push("## Final Consensus Statement", "", result.statement, "");
  return lines.join("\n");
}

export interface ReportPaths {
  summary: string;
  detailed: string;
}

export function writeReports(result: ConsensusResult, dir: string, prefix = "plenum"): ReportPaths {
  mkdirSync(dir, { recursive: true });
  const summary = join(dir, `${prefix}_results_${result.sessionId}.md`);
  const detailed = join(dir, `${prefix}_detailed_${result.sessionId}.md`);
  writeFileSync(summary, renderSummaryReport(result));
  writeFileSync(detailed, renderDetailedReport(result));
  return { summary, detailed };
}
