import { describe, expect, it } from "vitest";
import { ARGO_SCHEMA } from "../../config/schema";
import { FORBIDDEN_OPERATIONS, OUTPUT_FORMAT, PromptComposer, renderPromptMessages, selectChunks } from "../../llm/prompt";
import type { ContextChunk, HistoryTurn } from "../../types";

function chunk(id: string, text: string, score: number): ContextChunk {
  return { id, text, embedding: [], score };
}

const composer = new PromptComposer({ schema: ARGO_SCHEMA, maxContextChars: 25, maxHistoryTurns: 2, maxRows: 1000 });

const HISTORY: HistoryTurn[] = [
  { question: "first?", answer: "one" },
  { question: "second?", answer: "two" },
  { question: "third?", answer: "three" }
];

describe("selectChunks", () => {
  it("keeps the best chunks that fit and drops the weakest first", () => {
    const selected = selectChunks([chunk("a", "0123456789", 0.9), chunk("b", "0123456789", 0.5), chunk("c", "0123456789", 0.7)], 25);
    expect(selected.map((entry) => entry.id)).toEqual(["a", "c"]);
  });

  it("returns nothing when the best chunk alone is too long", () => {
    expect(selectChunks([chunk("a", "x".repeat(30), 0.9)], 25)).toEqual([]);
  });
});

describe("PromptComposer", () => {
  it("builds a frozen prompt with trimmed question and recent history", () => {
    const prompt = composer.compose("  max temperature?  ", HISTORY, [chunk("a", "short note", 0.4)]);
    expect(prompt.question).toBe("max temperature?");
    expect(prompt.history).toEqual(HISTORY.slice(1));
    expect(prompt.chunks.map((entry) => entry.id)).toEqual(["a"]);
    expect(prompt.constraints).toEqual({
      allowedTables: [
        {
          table: "argo_profiles",
          columns: ["id", "platform_id", "cycle_number", "timestamp", "latitude", "longitude", "pressure", "temperature", "salinity"]
        }
      ],
      forbiddenOperations: [...FORBIDDEN_OPERATIONS],
      outputFormat: OUTPUT_FORMAT,
      maxRows: 1000
    });
    expect(Object.isFrozen(prompt)).toBe(true);
    expect(Object.isFrozen(prompt.constraints)).toBe(true);
  });

  it("is deterministic", () => {
    const chunks = [chunk("a", "alpha", 0.2), chunk("b", "beta", 0.8)];
    expect(composer.compose("q", HISTORY, chunks)).toEqual(composer.compose("q", HISTORY, chunks));
  });

  it("lists the schema and the forbidden operations in the system instructions", () => {
    const { system } = composer.compose("q", [], []);
    expect(system).toContain("Table argo_profiles:");
    expect(system).toContain("  - salinity (DOUBLE PRECISION) - Practical salinity (PSU)");
    expect(system).toContain("- more than one statement");
    expect(system).toContain("Return at most 1000 rows.");
  });

  it("drops history entirely when no turns are kept", () => {
    const noHistory = new PromptComposer({ schema: ARGO_SCHEMA, maxContextChars: 100, maxHistoryTurns: 0, maxRows: 10 });
    expect(noHistory.compose("q", HISTORY, []).history).toEqual([]);
  });
});

describe("renderPromptMessages", () => {
  it("replays history, then context and question, then corrections", () => {
    const prompt = composer.compose("Where is float 42?", [{ question: "hi", answer: "hello" }], [chunk("a", "Float 42 is north.", 1)]);
    const messages = renderPromptMessages(prompt, ["Fix the query."]);
    expect(messages.map((message) => message.role)).toEqual(["system", "user", "assistant", "user", "user"]);
    expect(messages[3].content).toBe(
      "Background notes about the floats (may help pick platform ids or regions):\n[1] Float 42 is north.\n\nQuestion: Where is float 42?"
    );
    expect(messages[4].content).toBe("Fix the query.");
  });

  it("sends the bare question when there is no context", () => {
    const messages = renderPromptMessages(composer.compose("How many floats?", [], []));
    expect(messages).toHaveLength(2);
    expect(messages[1]).toEqual({ role: "user", content: "Question: How many floats?" });
  });
});
