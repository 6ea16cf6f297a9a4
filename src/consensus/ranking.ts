import type { ITextGenerator, SamplingParams } from "../generators/base.js";
import { CancelledError, errorMessage, throwIfCancelled } from "../errors.js";
import { defaultRandom, randomPermutation, type RandomSource } from "../random.js";
import { buildRankingPrompt } from "../templates.js";
import { createLogger, type SessionLog } from "../logger.js";
import { parseRanking } from "./ranking-parser.js";
import type { Voter } from "./base.js";

const log = createLogger("ranking");

export const FALLBACK_MESSAGE = "All ranking attempts failed, using a random ranking";

/**
 * Size of the example ranking shown in the system prompt. Never equal to
 * the real candidate count, so the model cannot copy the example.
 */
export function exampleSize(numCandidates: number): number {
  return numCandidates > 3 ? numCandidates - 1 : numCandidates + 1;
}

export function buildRankingSystemPrompt(numCandidates: number, random: RandomSource = defaultRandom): string {
  const size = exampleSize(numCandidates);
  const example = randomPermutation(size, random).map((i) => i + 1);
  return `You predict how a person would rank options, based on what they said.

Reply with ONLY a JSON object in exactly this form:
{"ranking": [...]}

"ranking" is a list of ${numCandidates} numbers from 1 to ${numCandidates}:
- the first number is the option they would prefer most
- the last number is the option they would prefer least
- every number from 1 to ${numCandidates} appears exactly once

Example with ${size} options:
{"ranking": [${example.join(", ")}]}

No explanation, only the JSON object.`;
}

export interface RankingPredictionOptions {
  generator: ITextGenerator;
  question: string;
  voter: Voter;
  candidates: readonly string[];
  maxRetries: number;
  /** Ranking template with the required placeholders. */
  template: string;
  sampling: SamplingParams;
  signal?: AbortSignal;
  random?: RandomSource;
  onToken?: (token: string) => void;
  sessionLog?: SessionLog | null;
}

export interface RankingPrediction {
  /** 0-based candidate order, most preferred first. */
  ranking: number[];
  attempts: string[];
  /** True when every attempt failed and the ranking is random. */
  fallback: boolean;
}

/**
 * Ask the generator how one voter would rank the candidates. Generator and
 * parse failures are retried up to `maxRetries` times, after which a random
 * permutation is returned. Only cancellation rejects.
 */
export async function predictRanking(options: RankingPredictionOptions): Promise<RankingPrediction> {
  const { generator, question, voter, candidates, template, sampling, signal } = options;
  const random = options.random ?? defaultRandom;
  const numCandidates = candidates.length;
  const maxRetries = Math.max(1, Math.floor(options.maxRetries));

  const prompt = buildRankingPrompt(template, {
    question,
    participantStatement: voter.statement,
    participantNum: voter.id + 1,
    candidates,
  });
  const systemPrompt = buildRankingSystemPrompt(numCandidates, random);
  options.sessionLog?.write("debug", `ranking prompt for participant ${voter.id + 1}:\n${prompt}`);

  const attempts: string[] = [];
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    throwIfCancelled(signal);
    const prefix = `Attempt ${attempt}/${maxRetries}:`;

    let content: string;
    try {
      const response = await generator.generate({ prompt, systemPrompt, sampling, signal, onToken: options.onToken });
      content = response.content;
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      attempts.push(`${prefix} generator error: ${errorMessage(err)}`);
      log.warn(`participant ${voter.id + 1}, ${prefix} generator error:`, errorMessage(err));
      continue;
    }
    options.sessionLog?.write("debug", `participant ${voter.id + 1} ${prefix} response:\n${content}`);

    const result = parseRanking(content, numCandidates);
    const summary = result.log[result.log.length - 1] ?? "";
    attempts.push(`${prefix} ${summary}`);
    if (result.ok) {
      log.debug(`participant ${voter.id + 1}: ranking parsed on attempt ${attempt}`);
      return { ranking: result.ranking, attempts, fallback: false };
    }
    log.warn(`participant ${voter.id + 1}, ${prefix}`, result.error.message);
  }

  attempts.push(FALLBACK_MESSAGE);
  log.warn(`participant ${voter.id + 1}: ${FALLBACK_MESSAGE}`);
  return { ranking: randomPermutation(numCandidates, random), attempts, fallback: true };
}
