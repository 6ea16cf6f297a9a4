import { z } from "zod";
import type { ITextGenerator, GenerateOptions, GenerationResponse, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { httpRequest } from "./http.js";
import type { GeneratorConfig } from "../config.js";
import { GeneratorError, errorMessage } from "../errors.js";
import { createLogger, truncate } from "../logger.js";

const log = createLogger("ollama");

const StreamChunkSchema = z.object({
  response: z.string().optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const TagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Generator for Ollama's native API.
 * Streams POST /api/generate as NDJSON, one JSON object per line; lines that
 * do not parse are logged and skipped.
 */
export class OllamaGenerator implements ITextGenerator {
  readonly name: string;
  readonly model: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number | undefined;

  constructor(config: GeneratorConfig) {
    this.name = config.name;
    this.model = config.model;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs;
  }

  async listModels(): Promise<string[]> {
    const raw = await httpRequest({
      method: "GET",
      url: `${this.endpoint}/api/tags`,
      timeoutMs: 5000,
      label: this.name,
    });
    const parsed = TagsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new GeneratorError("protocol", `${this.name}: unexpected /api/tags response`);
    }
    return parsed.data.models.map((m) => m.name);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const models = await this.listModels();
      const available = models.some((m) => m.startsWith(this.model));
      log.debug(this.name, "isAvailable:", available, "model=" + this.model);
      return available;
    } catch (err) {
      log.debug(this.name, "isAvailable: false,", errorMessage(err));
      return false;
    }
  }

  async generate(options: GenerateOptions): Promise<GenerationResponse> {
    const { prompt, systemPrompt, sampling, signal, onToken } = options;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs ?? calculateTimeout(prompt.length);
    const start = Date.now();
    log.debug(this.name, "generate start, model=" + this.model + ", prompt length:", prompt.length);

    const body = {
      model: this.model,
      prompt,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      stream: true,
      options: {
        temperature: sampling.temperature,
        ...(sampling.topP !== undefined ? { top_p: sampling.topP } : {}),
        ...(sampling.topK !== undefined ? { top_k: sampling.topK } : {}),
      },
    };

    let content = "";
    let tokens: TokenUsage | undefined;

    await httpRequest({
      method: "POST",
      url: `${this.endpoint}/api/generate`,
      body,
      timeoutMs,
      signal,
      label: this.name,
      onLine: (line) => {
        let json: unknown;
        try {
          json = JSON.parse(line);
        } catch {
          log.warn(this.name, "skipping malformed stream line:", truncate(line, 200));
          return;
        }
        const chunk = StreamChunkSchema.safeParse(json);
        if (!chunk.success) {
          log.warn(this.name, "skipping unrecognized stream chunk:", truncate(line, 200));
          return;
        }
        if (chunk.data.error) {
          throw new GeneratorError("protocol", `${this.name}: ${chunk.data.error}`);
        }
        if (chunk.data.response) {
          content += chunk.data.response;
          onToken?.(chunk.data.response);
        }
        if (chunk.data.done && (chunk.data.prompt_eval_count !== undefined || chunk.data.eval_count !== undefined)) {
          tokens = {
            inputTokens: chunk.data.prompt_eval_count ?? 0,
            outputTokens: chunk.data.eval_count ?? 0,
          };
        }
      },
    });

    const durationMs = Date.now() - start;
    log.info(this.name, "generate complete:", durationMs + "ms" +
      (tokens ? `, ${tokens.inputTokens + tokens.outputTokens} tokens` : ""));

    return { content, tokens, durationMs };
  }
}
