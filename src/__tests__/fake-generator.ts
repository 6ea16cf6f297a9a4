/**
 * In-process text generators for tests. No network.
 */

import type { GenerateOptions, GenerationResponse, ITextGenerator } from "../generators/base.js";
import { throwIfCancelled } from "../errors.js";

export type Responder = (options: GenerateOptions, callIndex: number) => string | Promise<string>;

export class ScriptedGenerator implements ITextGenerator {
  readonly name = "fake";
  readonly calls: GenerateOptions[] = [];

  constructor(
    private readonly respond: Responder,
    readonly model = "fake-model",
  ) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async listModels(): Promise<string[]> {
    return [this.model];
  }

  async generate(options: GenerateOptions): Promise<GenerationResponse> {
    throwIfCancelled(options.signal);
    const index = this.calls.length;
    this.calls.push(options);
    const content = await this.respond(options, index);
    throwIfCancelled(options.signal);
    options.onToken?.(content);
    return { content, durationMs: 0 };
  }
}

/** Number of "Statement N:" headers in a ranking prompt. */
export function countCandidates(prompt: string): number {
  return (prompt.match(/^Statement \d+:$/gm) ?? []).length;
}

/**
 * Candidate calls (no system prompt) answer "Candidate #n"; ranking calls
 * answer the identity ranking, so the first candidate always wins.
 */
export function consensusResponder(produced: string[] = []): Responder {
  return (options) => {
    if (options.systemPrompt === undefined) {
      const text = `Candidate #${produced.length + 1}`;
      produced.push(text);
      return text;
    }
    const k = countCandidates(options.prompt);
    return JSON.stringify({ ranking: Array.from({ length: k }, (_, i) => i + 1) });
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
