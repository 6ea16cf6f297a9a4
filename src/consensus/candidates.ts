import type { ITextGenerator, SamplingParams } from "../generators/base.js";
import { CancelledError, errorMessage, throwIfCancelled } from "../errors.js";
import { runPool } from "../pool.js";
import { defaultRandom, shuffle, type RandomSource } from "../random.js";
import { createLogger, truncate, type SessionLog } from "../logger.js";
import { stripReasoning } from "./ranking-parser.js";

const log = createLogger("candidates");

export interface CandidateGenerationOptions {
  generator: ITextGenerator;
  question: string;
  statements: readonly string[];
  count: number;
  /** Fills the candidate template for one shuffled ordering of the statements. */
  buildPrompt: (question: string, statements: readonly string[]) => string;
  sampling: SamplingParams;
  signal?: AbortSignal;
  concurrency?: number;
  random?: RandomSource;
  onCandidate?: (candidateIndex: number, text: string) => void;
  onToken?: (token: string) => void;
  sessionLog?: SessionLog | null;
}

export interface CandidateGenerationResult {
  /** Non-empty candidates in slot order. May be shorter than requested. */
  candidates: string[];
  /** The failure that stopped generation early, if any. */
  error?: Error;
}

/**
 * Write up to `count` candidate statements. Every call sees the statements
 * in a fresh random order. The first failed call, or cancellation, stops new
 * calls; whatever was already written is returned alongside the error.
 */
export async function generateCandidates(options: CandidateGenerationOptions): Promise<CandidateGenerationResult> {
  const { generator, question, statements, count, buildPrompt, sampling, signal } = options;
  const random = options.random ?? defaultRandom;

  const tasks = Array.from({ length: count }, (_, slot) => async (): Promise<string> => {
    throwIfCancelled(signal);
    const prompt = buildPrompt(question, shuffle(statements, random));
    options.sessionLog?.write("debug", `candidate ${slot + 1}/${count} prompt:\n${prompt}`);

    const response = await generator.generate({ prompt, sampling, signal, onToken: options.onToken });
    const text = stripReasoning(response.content);
    options.sessionLog?.write("debug", `candidate ${slot + 1}/${count} response (${response.durationMs}ms):\n${response.content}`);

    if (text === "") {
      log.warn(`candidate ${slot + 1}/${count} came back empty, skipping`);
    } else {
      log.debug(`candidate ${slot + 1}/${count}:`, truncate(text, 200));
      options.onCandidate?.(slot, text);
    }
    return text;
  });

  const outcomes = await runPool(tasks, { concurrency: options.concurrency ?? 1, stopOnError: true });

  const candidates: string[] = [];
  let error: Error | undefined;
  for (const outcome of outcomes) {
    if (outcome.status === "fulfilled") {
      if (outcome.value !== "") candidates.push(outcome.value);
    } else if (outcome.status === "rejected" && !error) {
      error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
    }
  }

  if (error) {
    if (error instanceof CancelledError) log.info(`candidate generation cancelled after ${candidates.length}/${count}`);
    else log.warn(`candidate generation stopped after ${candidates.length}/${count}:`, errorMessage(error));
  }
  return error ? { candidates, error } : { candidates };
}
