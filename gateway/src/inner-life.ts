import type { TextGenerator } from "../../agent/src/index.js";
import type { LifeConfig } from "../../runtime/src/config.js";
import {
  buildPlanningPrompt,
  parseDayPlan,
  type DayPlan,
  type DayPlanRequest,
  type DayPlanner,
} from "../../runtime/src/day-plan.js";
import type {
  MemoryCompressor,
  MemoryGroup,
} from "../../runtime/src/memory/compression.js";

export interface DayPlannerOptions {
  personaName: string;
  personaSheet: string;
  life: LifeConfig;
}

/**
 * Day planner backed by the `planning` generation category. Rejects when the
 * reply holds no valid plan, so the cycle keeps the schedule table.
 */
export function createDayPlanner(
  generator: TextGenerator,
  options: DayPlannerOptions,
): DayPlanner {
  return async (request: DayPlanRequest): Promise<DayPlan> => {
    const response = await generator.generate({
      category: "planning",
      maxTokens: 800,
      messages: [
        {
          role: "system",
          content: buildPlanningPrompt(
            options.personaName,
            options.personaSheet,
            request,
            options.life,
          ),
        },
        { role: "user", content: `Plan ${request.weekday}, ${request.day}.` },
      ],
    });

    const plan = parseDayPlan(response.content, request.day);
    if (!plan) {
      throw new Error("planning reply held no valid activities");
    }
    return plan;
  };
}

const BAND_HINTS: Record<MemoryGroup["band"], string> = {
  high: "These moments were emotionally intense; keep how they felt.",
  medium: "Keep what mattered emotionally, drop small details.",
  low: "Keep only the lasting facts.",
};

/**
 * Condenses aged memory groups through the `analytics` category.
 */
export class GeneratedMemoryCompressor implements MemoryCompressor {
  constructor(
    private readonly generator: TextGenerator,
    private readonly personaName: string,
  ) {}

  async compress(group: MemoryGroup): Promise<string> {
    const response = await this.generator.generate({
      category: "analytics",
      maxTokens: 250,
      messages: [
        {
          role: "system",
          content: buildCompressionPrompt(this.personaName, group),
        },
        {
          role: "user",
          content: group.memories
            .map(
              (record) =>
                `[intensity ${record.emotionalIntensity.toFixed(1)}${record.accessCount > 3 ? `, recalled ${record.accessCount}x` : ""}] ${record.content}`,
            )
            .join("\n"),
        },
      ],
    });
    return response.content.trim();
  }
}

export function buildCompressionPrompt(personaName: string, group: MemoryGroup): string {
  return [
    `You keep the memory of ${personaName}, a companion, about the operator.`,
    `Condense these ${group.memories.length} ${group.memoryType} memories from ${group.day} into one or two sentences.`,
    BAND_HINTS[group.band],
    "Reply with the summary text only.",
  ].join("\n");
}
