import { describe, it, expect } from "vitest";
import {
  predictRanking,
  buildRankingSystemPrompt,
  exampleSize,
  FALLBACK_MESSAGE,
} from "../consensus/ranking.js";
import { CancelledError, GeneratorError } from "../errors.js";
import { seededRandom } from "../random.js";
import { DEFAULT_RANKING_TEMPLATE } from "../templates.js";
import { ScriptedGenerator } from "./fake-generator.js";

const sampling = { temperature: 0.2, topP: 0.9, topK: 40 };
const candidates = ["More parks", "More buses", "More trams"];
const voter = { id: 2, statement: "I want trams" };

function options(generator: ScriptedGenerator, signal?: AbortSignal) {
  return {
    generator,
    question: "How should the city spend?",
    voter,
    candidates,
    maxRetries: 3,
    template: DEFAULT_RANKING_TEMPLATE,
    sampling,
    signal,
    random: seededRandom(3),
  };
}

describe("exampleSize", () => {
  it("never equals the real candidate count", () => {
    expect(exampleSize(2)).toBe(3);
    expect(exampleSize(3)).toBe(4);
    expect(exampleSize(4)).toBe(3);
    expect(exampleSize(10)).toBe(9);
  });
});

describe("buildRankingSystemPrompt", () => {
  it("describes the expected list and shows a differently sized example", () => {
    const prompt = buildRankingSystemPrompt(4, seededRandom(1));
    expect(prompt).toContain('"ranking" is a list of 4 numbers from 1 to 4');
    const example = /Example with 3 options:\n\{"ranking": \[([^\]]*)\]\}/.exec(prompt);
    expect(example).not.toBeNull();
    expect(example?.[1].split(", ").map(Number).sort()).toEqual([1, 2, 3]);
  });
});

describe("predictRanking", () => {
  it("returns the parsed ranking on the first valid answer", async () => {
    const generator = new ScriptedGenerator(() => '{"ranking": [3, 1, 2]}');

    const result = await predictRanking(options(generator));

    expect(result).toEqual({
      ranking: [2, 0, 1],
      attempts: ["Attempt 1/3: Valid ranking: [3, 1, 2]"],
      fallback: false,
    });
    expect(generator.calls).toHaveLength(1);
  });

  it("sends the voter's statement and the candidates", async () => {
    const generator = new ScriptedGenerator(() => '{"ranking": [1, 2, 3]}');
    await predictRanking(options(generator));

    const call = generator.calls[0];
    expect(call.prompt).toContain("## Participant 3 wrote:\nI want trams");
    expect(call.prompt).toContain("Statement 3:\nMore trams");
    expect(call.systemPrompt).toContain('"ranking" is a list of 3 numbers from 1 to 3');
    expect(call.sampling).toEqual(sampling);
  });

  it("retries after a generator error", async () => {
    const generator = new ScriptedGenerator((_o, i) => {
      if (i === 0) throw new GeneratorError("connection", "down");
      return '{"ranking": [1, 3, 2]}';
    });

    const result = await predictRanking(options(generator));

    expect(result).toEqual({
      ranking: [0, 2, 1],
      attempts: ["Attempt 1/3: generator error: down", "Attempt 2/3: Valid ranking: [1, 3, 2]"],
      fallback: false,
    });
  });

  it("falls back to a random permutation when every attempt fails", async () => {
    const generator = new ScriptedGenerator(() => "no idea");

    const result = await predictRanking(options(generator));

    expect(generator.calls).toHaveLength(3);
    expect(result.fallback).toBe(true);
    expect(result.attempts).toEqual([
      "Attempt 1/3: No JSON object found in response",
      "Attempt 2/3: No JSON object found in response",
      "Attempt 3/3: No JSON object found in response",
      FALLBACK_MESSAGE,
    ]);
    expect([...result.ranking].sort()).toEqual([0, 1, 2]);
  });

  it("stops retrying when cancelled", async () => {
    const controller = new AbortController();
    const generator = new ScriptedGenerator(() => {
      controller.abort();
      return "garbage";
    });

    await expect(predictRanking(options(generator, controller.signal))).rejects.toBeInstanceOf(CancelledError);
    expect(generator.calls).toHaveLength(1);
  });
});
