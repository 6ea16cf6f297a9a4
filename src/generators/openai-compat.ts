import { z } from "zod";
import type { ITextGenerator, GenerateOptions, GenerationResponse, TokenUsage } from "./base.js";
import { calculateTimeout } from "./base.js";
import { httpRequest } from "./http.js";
import type { GeneratorConfig } from "../config.js";
import { GeneratorError, errorMessage } from "../errors.js";
import { createLogger, truncate } from "../logger.js";

const log = createLogger("openai-compat");

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

const StreamEventSchema = z.object({
  choices: z
    .array(z.object({ delta: z.object({ content: z.string().nullish() }).optional() }))
    .default([]),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number() })
    .nullish(),
  error: z.object({ message: z.string() }).optional(),
});

const ModelsSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

/**
 * Generator for any OpenAI-compatible chat completions API: LM Studio,
 * vLLM, llama.cpp, LocalAI, Ollama's /v1, hosted providers.
 *
 * Streams POST /v1/chat/completions as server-sent events until `[DONE]`.
 */
export class OpenAICompatGenerator implements ITextGenerator {
  readonly name: string;
  readonly model: string;
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number | undefined;

  constructor(config: GeneratorConfig) {
    this.name = config.name;
    this.model = config.model;
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
  }

  private authHeaders(): Record<string, string> {
    return this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
  }

  async listModels(): Promise<string[]> {
    const raw = await httpRequest({
      method: "GET",
      url: `${this.endpoint}/v1/models`,
      headers: this.authHeaders(),
      timeoutMs: 5000,
      label: this.name,
    });
    const parsed = ModelsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new GeneratorError("protocol", `${this.name}: unexpected /v1/models response`);
    }
    return parsed.data.data.map((m) => m.id);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const models = await this.listModels();
      const found = models.some((id) => id === this.model || id.includes(this.model));
      log.debug(this.name, "isAvailable:", found, "model=" + this.model);
      return found;
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

    const messages: ChatMessage[] = [];
    if (systemPrompt) messages.push({ role: "system", content: systemPrompt });
    messages.push({ role: "user", content: prompt });

    const body = {
      model: this.model,
      messages,
      stream: true,
      temperature: sampling.temperature,
      ...(sampling.topP !== undefined ? { top_p: sampling.topP } : {}),
      ...(sampling.topK !== undefined ? { top_k: sampling.topK } : {}),
    };

    let content = "";
    let tokens: TokenUsage | undefined;
    let finished = false;

    await httpRequest({
      method: "POST",
      url: `${this.endpoint}/v1/chat/completions`,
      body,
      headers: { ...this.authHeaders(), Accept: "text/event-stream" },
      timeoutMs,
      signal,
      label: this.name,
      onLine: (line) => {
        // SSE comments, event names and anything after [DONE] carry no text.
        if (finished || !line.startsWith("data:")) return;
        const data = line.slice(5).trim();
        if (data === "[DONE]") {
          finished = true;
          return;
        }
        let json: unknown;
        try {
          json = JSON.parse(data);
        } catch {
          log.warn(this.name, "skipping malformed stream event:", truncate(data, 200));
          return;
        }
        const event = StreamEventSchema.safeParse(json);
        if (!event.success) {
          log.warn(this.name, "skipping unrecognized stream event:", truncate(data, 200));
          return;
        }
        if (event.data.error) {
          throw new GeneratorError("protocol", `${this.name}: ${event.data.error.message}`);
        }
        for (const choice of event.data.choices) {
          const piece = choice.delta?.content;
          if (piece) {
            content += piece;
            onToken?.(piece);
          }
        }
        if (event.data.usage) {
          tokens = {
            inputTokens: event.data.usage.prompt_tokens,
            outputTokens: event.data.usage.completion_tokens,
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
