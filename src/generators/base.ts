/**
 * Text generator interface.
 *
 * A generator wraps one model behind an HTTP API and turns a prompt into
 * text. The consensus pipeline only ever talks to this interface.
 */

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface SamplingParams {
  temperature: number;
  topP?: number;
  topK?: number;
}

export interface GenerateOptions {
  prompt: string;
  systemPrompt?: string;
  sampling: SamplingParams;
  /** Aborts the in-flight request; the call then rejects with CancelledError. */
  signal?: AbortSignal;
  /** Called with each streamed fragment as it arrives. */
  onToken?: (token: string) => void;
  timeoutMs?: number;
}

export interface GenerationResponse {
  /** Full generated text, untrimmed. */
  content: string;
  tokens?: TokenUsage;
  durationMs: number;
}

export interface ITextGenerator {
  /** Label used in logs (e.g. "ollama"). */
  readonly name: string;
  readonly model: string;

  /** True when the endpoint answers and serves the configured model. */
  isAvailable(): Promise<boolean>;

  /** Model names the endpoint serves. */
  listModels(): Promise<string[]>;

  /** Rejects with GeneratorError on failure, CancelledError on abort. */
  generate(options: GenerateOptions): Promise<GenerationResponse>;
}

/** Candidate writing and ranking prediction may run on different models. */
export interface GeneratorPair {
  statement: ITextGenerator;
  ranking: ITextGenerator;
}

/**
 * Idle timeout for a streamed generation, scaled by prompt size:
 * 15s base + 15ms per estimated token, capped at 10 minutes.
 */
export function calculateTimeout(promptLength: number): number {
  const estimatedTokens = Math.ceil(promptLength / 4);
  return Math.min(15_000 + estimatedTokens * 15, 600_000);
}
