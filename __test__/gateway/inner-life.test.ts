import { describe, it, expect } from "vitest";
import type {
  GenerateRequest,
  LLMResponse,
  TextGenerator,
} from "../../agent/src/index.js";
import { parseKindredConfig } from "../../runtime/src/config.js";
import type { DayPlanRequest } from "../../runtime/src/day-plan.js";
import type { MemoryGroup } from "../../runtime/src/memory/compression.js";
import type { MemoryRecord } from "../../runtime/src/types.js";
import {
  buildCompressionPrompt,
  createDayPlanner,
  GeneratedMemoryCompressor,
} from "../../gateway/src/inner-life.js";

class CannedGenerator implements TextGenerator {
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly reply: string | Error) {}

  async generate(request: GenerateRequest): Promise<LLMResponse> {
    this.requests.push(request);
    if (this.reply instanceof Error) throw this.reply;
    return {
      content: this.reply,
      category: request.category,
      usage: { inputTokens: 0, outputTokens: 0 },
    };
  }

  async embed(): Promise<number[] | null> {
    return null;
  }
}

const life = parseKindredConfig({}).life;

const request: DayPlanRequest = {
  day: "2026-10-24",
  weekday: "Saturday",
  weekend: true,
  character: {
    personaId: "default",
    mood: "playful",
    energyLevel: 70,
    currentActivity: "free",
    location: "home",
    lastMessageAt: null,
    updatedAt: 0,
  },
  previous: null,
};

describe("createDayPlanner", () => {
  it("plans through the planning category", async () => {
    const generator = new CannedGenerator(
      '{"dayMood":"sunny","activities":[{"activity":"social","description":"flea market","start":"10:00","end":"13:00","location":"old town","importance":6}]}',
    );
    const planner = createDayPlanner(generator, {
      personaName: "Elin",
      personaSheet: "You are Elin.",
      life,
    });

    const plan = await planner(request);

    expect(plan).toEqual({
      day: "2026-10-24",
      dayMood: "sunny",
      activities: [
        {
          days: "all",
          from: "10:00",
          to: "13:00",
          activity: "social",
          location: "old town",
          importance: 6,
          description: "flea market",
        },
      ],
    });
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0].category).toBe("planning");
    expect(generator.requests[0].maxTokens).toBe(800);
    expect(generator.requests[0].messages[1]).toEqual({
      role: "user",
      content: "Plan Saturday, 2026-10-24.",
    });
    expect(generator.requests[0].messages[0].content).toContain("- day: Saturday 2026-10-24 (weekend)");
  });

  it("rejects a reply without a usable plan", async () => {
    const planner = createDayPlanner(new CannedGenerator("No plans, just vibes."), {
      personaName: "Elin",
      personaSheet: "You are Elin.",
      life,
    });
    await expect(planner(request)).rejects.toThrow("planning reply held no valid activities");
  });

  it("passes generation failures through", async () => {
    const planner = createDayPlanner(new CannedGenerator(new Error("rate limited")), {
      personaName: "Elin",
      personaSheet: "You are Elin.",
      life,
    });
    await expect(planner(request)).rejects.toThrow("rate limited");
  });
});

function record(id: number, content: string, overrides: Partial<MemoryRecord> = {}): MemoryRecord {
  return {
    id,
    personaId: "default",
    content,
    memoryType: "event",
    importance: 5,
    emotionalIntensity: 8,
    accessCount: 0,
    createdAt: 0,
    lastAccessedAt: 0,
    ...overrides,
  };
}

const group: MemoryGroup = {
  key: "2026-10-11|event|high",
  day: "2026-10-11",
  memoryType: "event",
  band: "high",
  memories: [
    record(1, "Got the job offer"),
    record(2, "Celebrated with pizza", { emotionalIntensity: 8.5, accessCount: 5 }),
  ],
};

describe("GeneratedMemoryCompressor", () => {
  it("condenses a group through the analytics category", async () => {
    const generator = new CannedGenerator("  Landed the job and celebrated.  ");
    const compressor = new GeneratedMemoryCompressor(generator, "Elin");

    expect(await compressor.compress(group)).toBe("Landed the job and celebrated.");
    const [sent] = generator.requests;
    expect(sent.category).toBe("analytics");
    expect(sent.maxTokens).toBe(250);
    expect(sent.messages[0].content).toBe(buildCompressionPrompt("Elin", group));
    expect(sent.messages[1].content).toBe(
      "[intensity 8.0] Got the job offer\n[intensity 8.5, recalled 5x] Celebrated with pizza",
    );
  });

  it("builds the prompt from the group", () => {
    expect(buildCompressionPrompt("Elin", group)).toBe(
      [
        "You keep the memory of Elin, a companion, about the operator.",
        "Condense these 2 event memories from 2026-10-11 into one or two sentences.",
        "These moments were emotionally intense; keep how they felt.",
        "Reply with the summary text only.",
      ].join("\n"),
    );
  });

  it("lets a generation failure reach the memory system", async () => {
    const compressor = new GeneratedMemoryCompressor(new CannedGenerator(new Error("timeout")), "Elin");
    await expect(compressor.compress(group)).rejects.toThrow("timeout");
  });
});
