/**
 * Plenum: public API for using the consensus pipeline as a library.
 */

// --- Orchestration ---
export { ConsensusSession } from "./orchestrator.js";
export type { ConsensusOptions, ConsensusResult, ConsensusSessionDeps } from "./orchestrator.js";

// --- Consensus building blocks ---
export { computeSchulze, countVictories, rankByVictories, formatMatrix, isPermutation } from "./consensus/schulze.js";
export type { SchulzeResult, Matrix, VoterId } from "./consensus/schulze.js";
export { parseRanking, stripReasoning, findJsonObject } from "./consensus/ranking-parser.js";
export type { RankingParseResult } from "./consensus/ranking-parser.js";
export { generateCandidates } from "./consensus/candidates.js";
export { predictRanking, buildRankingSystemPrompt } from "./consensus/ranking.js";
export { runElection } from "./consensus/election.js";
export type { ElectionResult } from "./consensus/election.js";
export { partitionGroups, groupSizes, clampGroupSize, MAX_GROUP_SIZE } from "./consensus/partition.js";
export type {
  Ballot,
  CandidateEvent,
  ConsensusSettings,
  ElectionRecord,
  GroupRecord,
  GroupWinnerEvent,
  LevelRecord,
  ProgressCallbacks,
  RankingEvent,
  TokenEvent,
  Voter,
  VotingStrategy,
} from "./consensus/base.js";

// --- Generators ---
export { createGenerator, createGenerators, OllamaGenerator, OpenAICompatGenerator, calculateTimeout } from "./generators/index.js";
export type { ITextGenerator, GeneratorPair, GenerateOptions, GenerationResponse, SamplingParams } from "./generators/index.js";

// --- Templates, statements, reports ---
export {
  DEFAULT_CANDIDATE_TEMPLATE,
  DEFAULT_RANKING_TEMPLATE,
  buildCandidatePrompt,
  buildRankingPrompt,
  fillTemplate,
} from "./templates.js";
export { parseStatements, loadStatementsFromFile } from "./statements.js";
export { renderSummaryReport, renderDetailedReport, writeReports } from "./report.js";

// --- Store ---
export { SqliteSessionStore } from "./store/sqlite.js";
export type { ISessionStore } from "./store/interfaces.js";
export type { SessionRecord, SessionSummary, SessionStatus } from "./store/types.js";

// --- Config, errors, logging ---
export { ConfigSchema, loadConfig, getUserDataDir, resolveRankingGeneratorConfig } from "./config.js";
export type { Config, GeneratorConfig, RankingGeneratorConfig } from "./config.js";
export {
  GeneratorError,
  RankingParseError,
  InvariantViolationError,
  CancelledError,
  ElectionImpossibleError,
  ConsensusFailedError,
} from "./errors.js";
export { createLogger, setLogLevel, initFileLogging } from "./logger.js";
export { createServer } from "./server.js";
export { seededRandom } from "./random.js";
