import { describe, it, expect } from "vitest";
import { generateCandidates } from "../consensus/candidates.js";
import { CancelledError, GeneratorError } from "../errors.js";
import { seededRandom } from "../random.js";
import { ScriptedGenerator, delay } from "./fake-generator.js";

const statements = ["parks", "bikes", "buses", "trams"];
const sampling = { temperature: 0.7, topP: 0.9, topK: 40 };

function buildPrompt(question: string, ordered: readonly string[]): string {
  return `${question}|${ordered.join(",")}`;
}

describe("generateCandidates", () => {
  it("writes one candidate per slot from shuffled statements", async () => {
    const generator = new ScriptedGenerator((_o, i) => `<think>draft</think> Draft ${i}`);
    const events: Array<[number, string]> = [];

    const result = await generateCandidates({
      generator,
      question: "Q",
      statements,
      count: 3,
      buildPrompt,
      sampling,
      random: seededRandom(1),
      onCandidate: (slot, text) => events.push([slot, text]),
    });

    expect(result).toEqual({ candidates: ["Draft 0", "Draft 1", "Draft 2"] });
    expect(events).toEqual([[0, "Draft 0"], [1, "Draft 1"], [2, "Draft 2"]]);
    expect(generator.calls).toHaveLength(3);
    for (const call of generator.calls) {
      const [question, list] = call.prompt.split("|");
      expect(question).toBe("Q");
      expect(list.split(",").sort()).toEqual([...statements].sort());
      expect(call.systemPrompt).toBeUndefined();
      expect(call.sampling).toEqual(sampling);
    }
  });

  it("does not reorder the caller's statements", async () => {
    const input = [...statements];
    await generateCandidates({
      generator: new ScriptedGenerator(() => "x"),
      question: "Q",
      statements: input,
      count: 2,
      buildPrompt,
      sampling,
      random: seededRandom(4),
    });
    expect(input).toEqual(statements);
  });

  it("stops at the first failure and keeps earlier candidates", async () => {
    const generator = new ScriptedGenerator((_o, i) => {
      if (i === 1) throw new GeneratorError("status", "boom");
      return `Draft ${i}`;
    });

    const result = await generateCandidates({ generator, question: "Q", statements, count: 4, buildPrompt, sampling });

    expect(result.candidates).toEqual(["Draft 0"]);
    expect(result.error).toBeInstanceOf(GeneratorError);
    expect(generator.calls).toHaveLength(2);
  });

  it("skips empty output without failing", async () => {
    const generator = new ScriptedGenerator((_o, i) => (i === 0 ? "<think>only thoughts</think>" : `Draft ${i}`));
    const slots: number[] = [];

    const result = await generateCandidates({
      generator,
      question: "Q",
      statements,
      count: 2,
      buildPrompt,
      sampling,
      onCandidate: (slot) => slots.push(slot),
    });

    expect(result).toEqual({ candidates: ["Draft 1"] });
    expect(slots).toEqual([1]);
  });

  it("returns a CancelledError when the signal is already aborted", async () => {
    const generator = new ScriptedGenerator(() => "x");
    const controller = new AbortController();
    controller.abort();

    const result = await generateCandidates({
      generator,
      question: "Q",
      statements,
      count: 3,
      buildPrompt,
      sampling,
      signal: controller.signal,
    });

    expect(result.candidates).toEqual([]);
    expect(result.error).toBeInstanceOf(CancelledError);
    expect(generator.calls).toHaveLength(0);
  });

  it("keeps slot order when calls finish out of order", async () => {
    const generator = new ScriptedGenerator(async (_o, i) => {
      await delay((3 - i) * 10);
      return `C${i}`;
    });

    const result = await generateCandidates({
      generator,
      question: "Q",
      statements,
      count: 3,
      buildPrompt,
      sampling,
      concurrency: 3,
    });

    expect(result.candidates).toEqual(["C0", "C1", "C2"]);
  });
});
