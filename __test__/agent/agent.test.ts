import { describe, it, expect } from "vitest";
import {
  Agent,
  GenerationError,
  samplingFor,
  toConversationTurns,
} from "../../agent/src/index";

describe("samplingFor", () => {
  it("uses the category defaults", () => {
    expect(samplingFor({ category: "dialogue", messages: [] })).toEqual({
      temperature: 0.9,
      maxTokens: 400,
    });
    expect(samplingFor({ category: "analytics", messages: [] })).toEqual({
      temperature: 0.2,
      maxTokens: 500,
    });
  });

  it("lets explicit values win and keeps at least one token", () => {
    expect(
      samplingFor({ category: "planning", messages: [], temperature: 0, maxTokens: 0.4 }),
    ).toEqual({ temperature: 0, maxTokens: 1 });
    expect(samplingFor({ category: "planning", messages: [], maxTokens: 64.9 }).maxTokens).toBe(64);
  });
});

describe("toConversationTurns", () => {
  it("joins system messages and merges consecutive roles", () => {
    const result = toConversationTurns(
      [
        { role: "system", content: "You are Elin." },
        { role: "user", content: "hi" },
        { role: "user", content: "are you there?" },
        { role: "system", content: " Keep it short. " },
        { role: "assistant", content: "here!" },
      ],
      "fallback",
    );
    expect(result).toEqual({
      system: "You are Elin.\n\nKeep it short.",
      turns: [
        { role: "user", content: "hi\n\nare you there?" },
        { role: "assistant", content: "here!" },
      ],
    });
  });

  it("opens with a user turn and falls back to the default system prompt", () => {
    const result = toConversationTurns([{ role: "assistant", content: "morning" }], "fallback");
    expect(result.system).toBe("fallback");
    expect(result.turns).toEqual([
      { role: "user", content: "(continue)" },
      { role: "assistant", content: "morning" },
    ]);
  });

  it("does not mutate the input messages", () => {
    const messages = [
      { role: "user" as const, content: "a" },
      { role: "user" as const, content: "b" },
    ];
    toConversationTurns(messages, "fallback");
    expect(messages[0].content).toBe("a");
  });
});

describe("Agent", () => {
  it("reports its provider and model", () => {
    const agent = new Agent({ provider: "openai", model: "gpt-4o-mini", apiKey: "test-secret" });
    expect(agent.getProvider()).toBe("openai");
    expect(agent.getModel()).toBe("gpt-4o-mini");
  });

  it("has no embeddings on anthropic", async () => {
    const agent = new Agent({
      provider: "anthropic",
      model: "claude-3-5-sonnet-20241022",
      apiKey: "test-secret",
    });
    await expect(agent.embed("hello")).resolves.toBeNull();
  });
});

describe("GenerationError", () => {
  it("carries the category and the cause", () => {
    const cause = new Error("rate limited");
    const error = new GenerationError("dialogue generation failed", "dialogue", cause);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("GenerationError");
    expect(error.category).toBe("dialogue");
    expect(error.cause).toBe(cause);
  });
});
