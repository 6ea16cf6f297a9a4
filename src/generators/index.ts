import type { GeneratorPair, ITextGenerator } from "./base.js";
import { resolveRankingGeneratorConfig, type Config, type GeneratorConfig } from "../config.js";
import { OllamaGenerator } from "./ollama.js";
import { OpenAICompatGenerator } from "./openai-compat.js";
import { createLogger } from "../logger.js";

const log = createLogger("generators");

export function createGenerator(config: GeneratorConfig): ITextGenerator {
  switch (config.type) {
    case "openai-compat":
      log.debug("creating OpenAICompatGenerator for", config.name, "model=" + config.model);
      return new OpenAICompatGenerator(config);
    case "ollama":
      log.debug("creating OllamaGenerator for", config.name, "model=" + config.model);
      return new OllamaGenerator(config);
  }
}

/**
 * Generators for both stages. Without a `rankingGenerator` block one
 * instance serves both. `model` overrides the statement model only.
 */
export function createGenerators(config: Config, overrides: { model?: string; rankingModel?: string } = {}): GeneratorPair {
  const statement = createGenerator({ ...config.generator, model: overrides.model ?? config.generator.model });
  const rankingConfig = resolveRankingGeneratorConfig(config);
  if (overrides.rankingModel !== undefined) {
    return { statement, ranking: createGenerator({ ...(rankingConfig ?? config.generator), model: overrides.rankingModel }) };
  }
  return { statement, ranking: rankingConfig ? createGenerator(rankingConfig) : statement };
}

export { OllamaGenerator } from "./ollama.js";
export { OpenAICompatGenerator } from "./openai-compat.js";
export { calculateTimeout } from "./base.js";
export type { ITextGenerator, GeneratorPair, GenerateOptions, GenerationResponse, SamplingParams, TokenUsage } from "./base.js";
