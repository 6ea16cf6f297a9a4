import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { homedir } from "node:os";
import {
  CANDIDATE_PLACEHOLDERS,
  DEFAULT_CANDIDATE_TEMPLATE,
  DEFAULT_RANKING_TEMPLATE,
  RANKING_PLACEHOLDERS,
  missingPlaceholders,
} from "./templates.js";

// --- Schemas ---

export const GeneratorConfigSchema = z.object({
  /** Label used in logs. */
  name: z.string().default("local"),
  type: z.enum(["ollama", "openai-compat"]).default("ollama"),
  model: z.string().default("llama3.1").describe("Model name (e.g. 'llama3.1', 'qwen3')"),
  endpoint: z.string().default("http://localhost:11434").describe("API base URL"),
  apiKey: z.string().optional().describe("Bearer token for OpenAI-compatible providers"),
  /** Fixed idle timeout; when unset it scales with prompt length. */
  timeoutMs: z.number().int().min(1000).optional(),
});

/** A separate ranking model. Fields left out are taken from `generator`. */
export const RankingGeneratorConfigSchema = z.object({
  name: z.string().optional(),
  type: z.enum(["ollama", "openai-compat"]).optional(),
  model: z.string().describe("Model that predicts participant rankings"),
  endpoint: z.string().optional(),
  apiKey: z.string().optional(),
  timeoutMs: z.number().int().min(1000).optional(),
});

export const SamplingSchema = z.object({
  temperature: z.number().min(0).max(2),
  topP: z.number().min(0).max(1).optional(),
  topK: z.number().int().min(1).optional(),
});

export const VotingStrategySchema = z.enum(["own_groups_only", "all_elections"]);

export const ConcurrencySchema = z.object({
  groups: z.number().int().min(1).max(16).default(1),
  voters: z.number().int().min(1).max(16).default(1),
  candidates: z.number().int().min(1).max(16).default(1),
});

export const ConsensusConfigSchema = z.object({
  /** Candidate statements written per election. */
  numCandidates: z.number().int().min(2).max(10).default(4),
  /** Ranking attempts per voter before falling back to a random order. */
  maxRetries: z.number().int().min(1).max(10).default(3),
  /** Statements above this count are split into groups. */
  maxGroupSize: z.number().int().min(2).max(9).default(9),
  votingStrategy: VotingStrategySchema.default("own_groups_only"),
  concurrency: ConcurrencySchema.default({}),
});

export const TemplatesSchema = z
  .object({
    candidateGeneration: z.string().default(DEFAULT_CANDIDATE_TEMPLATE),
    rankingPrediction: z.string().default(DEFAULT_RANKING_TEMPLATE),
  })
  .superRefine((t, ctx) => {
    const candidateMissing = missingPlaceholders(t.candidateGeneration, CANDIDATE_PLACEHOLDERS);
    if (candidateMissing.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["candidateGeneration"],
        message: `missing placeholders: ${candidateMissing.map((p) => `{${p}}`).join(", ")}`,
      });
    }
    const rankingMissing = missingPlaceholders(t.rankingPrediction, RANKING_PLACEHOLDERS);
    if (rankingMissing.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["rankingPrediction"],
        message: `missing placeholders: ${rankingMissing.map((p) => `{${p}}`).join(", ")}`,
      });
    }
  });

export const ConfigSchema = z.object({
  /** User identifier. Determines the data directory: data/<user>/. */
  user: z.string().default("default"),

  generator: GeneratorConfigSchema.default({}),

  /** Unset: rankings are predicted by `generator`. */
  rankingGenerator: RankingGeneratorConfigSchema.optional(),

  sampling: z
    .object({
      /** Candidate statement writing: creative. */
      statement: SamplingSchema.default({ temperature: 0.7, topP: 0.9, topK: 40 }),
      /** Ranking prediction: close to deterministic. */
      ranking: SamplingSchema.default({ temperature: 0.2, topP: 0.9, topK: 40 }),
    })
    .default({}),

  consensus: ConsensusConfigSchema.default({}),

  templates: TemplatesSchema.default({}),

  database: z
    .object({
      path: z.string().default("./data/plenum.db"),
    })
    .default({}),

  reports: z
    .object({
      dir: z.string().default("./reports"),
    })
    .default({}),

  logging: z
    .object({
      /** info.log purge policy */
      info: z.object({
        purge: z.enum(["date", "size"]).default("date"),
        maxDays: z.number().int().min(1).default(30),
        maxBytes: z.number().int().min(0).default(50 * 1024 * 1024),
      }).default({}),
      /** logs/sessions/ purge policy */
      sessions: z.object({
        purge: z.enum(["count", "date", "size"]).default("count"),
        maxFiles: z.number().int().min(1).default(50),
        maxDays: z.number().int().min(1).default(14),
        maxBytes: z.number().int().min(0).default(100 * 1024 * 1024),
      }).default({}),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type RankingGeneratorConfig = z.infer<typeof RankingGeneratorConfigSchema>;
export type ConsensusConfig = z.infer<typeof ConsensusConfigSchema>;
export type ConcurrencyConfig = z.infer<typeof ConcurrencySchema>;
export type SamplingConfig = z.infer<typeof SamplingSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesSchema>;

/** Full settings of the ranking generator, or null when `generator` ranks too. */
export function resolveRankingGeneratorConfig(config: Config): GeneratorConfig | null {
  const ranking = config.rankingGenerator;
  if (!ranking) return null;
  const base = config.generator;
  return {
    name: ranking.name ?? `${base.name}-ranking`,
    type: ranking.type ?? base.type,
    model: ranking.model,
    endpoint: ranking.endpoint ?? base.endpoint,
    apiKey: ranking.apiKey ?? base.apiKey,
    timeoutMs: ranking.timeoutMs ?? base.timeoutMs,
  };
}

/** Directory of the loaded config file, null when defaults are in use. */
let loadedConfigDir: string | null = null;

/** Forget the loaded config location. Tests only. */
export function resetLoadedConfigDir(): void {
  loadedConfigDir = null;
}

/**
 * Base data directory for a user.
 * - With a config file: <configDir>/data/<user>/
 * - Otherwise: $XDG_DATA_HOME/plenum/<user> (fallback ~/.local/share/plenum/<user>)
 */
export function getUserDataDir(config: Config): string {
  if (loadedConfigDir) {
    return resolve(loadedConfigDir, "data", config.user);
  }
  const xdg = process.env.XDG_DATA_HOME || resolve(homedir(), ".local", "share");
  return resolve(xdg, "plenum", config.user);
}

/**
 * Resolve a configured path: relative paths are taken from the config
 * file's directory, or the user data directory when defaults are in use.
 */
export function resolveDataPath(config: Config, path: string): string {
  return resolve(loadedConfigDir ?? getUserDataDir(config), path);
}

// --- Loader ---

export const CONFIG_FILENAMES = ["plenum.config.json", ".plenumrc.json"];

function parseConfigFile(path: string): Config {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return ConfigSchema.parse(raw);
}

export function loadConfig(explicitPath?: string): Config {
  if (explicitPath) {
    loadedConfigDir = dirname(resolve(explicitPath));
    return parseConfigFile(explicitPath);
  }

  for (const filename of CONFIG_FILENAMES) {
    const fullPath = resolve(process.cwd(), filename);
    if (existsSync(fullPath)) {
      loadedConfigDir = dirname(fullPath);
      return parseConfigFile(fullPath);
    }
  }

  loadedConfigDir = null;
  return ConfigSchema.parse({});
}
