/**
 * day-plan.ts: Model-written plans for one day of the persona's life.
 *
 * Once per day the cycle asks a DayPlanner for a plan, validates it and keeps
 * it in the meta table under `day_plan:<YYYY-MM-DD>`. While a plan exists for
 * the day it replaces the static schedule table; otherwise the table applies.
 */

import { z } from "zod";
import type { LifeConfig, ScheduleEntry } from "./config";
import type { CharacterRepository } from "./persona-store";
import { ACTIVITIES, type CharacterState } from "./types";

export const DAY_PLAN_KEY_PREFIX = "day_plan:";
export const LAST_PLANNING_KEY = "last_planning_day";

export interface PlannedActivity extends ScheduleEntry {
  description: string;
}

export interface DayPlan {
  day: string;
  dayMood?: string;
  activities: PlannedActivity[];
}

export interface DayPlanRequest {
  day: string;
  weekday: string;
  weekend: boolean;
  character: CharacterState;
  /** Yesterday's plan, so the new one can vary. */
  previous: DayPlan | null;
}

/** Writes a plan for the requested day. Rejects when no plan could be made. */
export type DayPlanner = (request: DayPlanRequest) => Promise<DayPlan>;

const clockTime = z
  .string()
  .trim()
  .regex(/^([01]?\d|2[0-4]):[0-5]\d$/)
  .transform((value) => value.padStart(5, "0"));

const plannedActivitySchema = z.object({
  activity: z.enum(ACTIVITIES).exclude(["sleeping"]),
  description: z.string().trim().min(1).max(200),
  start: clockTime,
  end: clockTime,
  location: z.string().trim().min(1).max(80).default("home"),
  importance: z.coerce.number().int().min(1).max(10).default(5),
});

const planSchema = z.object({
  dayMood: z.string().trim().max(200).optional(),
  activities: z.array(z.unknown()).max(12),
});

const storedPlanSchema = z.object({
  day: z.string(),
  dayMood: z.string().optional(),
  activities: z
    .array(
      z.object({
        days: z.literal("all"),
        from: z.string(),
        to: z.string(),
        activity: z.enum(ACTIVITIES),
        location: z.string(),
        importance: z.number(),
        description: z.string(),
      }),
    )
    .min(1),
});

/**
 * Parse a model reply into a plan for `day`. Activities that fail validation
 * or end before they start are dropped; a reply with no usable activity
 * yields null.
 */
export function parseDayPlan(raw: string, day: string): DayPlan | null {
  const match = raw.match(/\{[\s\S]*\}/);
  if (!match) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch {
    return null;
  }

  const plan = planSchema.safeParse(parsed);
  if (!plan.success) return null;

  const activities: PlannedActivity[] = [];
  for (const candidate of plan.data.activities) {
    const entry = plannedActivitySchema.safeParse(candidate);
    if (!entry.success || entry.data.start >= entry.data.end) continue;
    activities.push({
      days: "all",
      from: entry.data.start,
      to: entry.data.end,
      activity: entry.data.activity,
      location: entry.data.location,
      importance: entry.data.importance,
      description: entry.data.description,
    });
  }
  if (activities.length === 0) return null;

  activities.sort((a, b) => a.from.localeCompare(b.from));
  return { day, dayMood: plan.data.dayMood, activities };
}

export function loadDayPlan(
  state: CharacterRepository,
  personaId: string,
  day: string,
): DayPlan | null {
  const raw = state.getMeta(personaId, DAY_PLAN_KEY_PREFIX + day);
  if (raw === null) return null;
  try {
    const result = storedPlanSchema.safeParse(JSON.parse(raw));
    return result.success && result.data.day === day ? result.data : null;
  } catch {
    return null;
  }
}

export function saveDayPlan(
  state: CharacterRepository,
  personaId: string,
  plan: DayPlan,
): void {
  state.setMeta(personaId, DAY_PLAN_KEY_PREFIX + plan.day, JSON.stringify(plan));
}

/** The life config with the day's plan in place of the schedule table. */
export function withDayPlan(life: LifeConfig, plan: DayPlan | null): LifeConfig {
  if (!plan) return life;
  return { ...life, schedule: plan.activities };
}

export function buildPlanningPrompt(
  personaName: string,
  personaSheet: string,
  request: DayPlanRequest,
  life: LifeConfig,
): string {
  const { character } = request;
  const lines = [
    `You are ${personaName}, planning your own day.`,
    "",
    "## Context",
    `- day: ${request.weekday} ${request.day} (${request.weekend ? "weekend" : "workday"})`,
    `- mood: ${character.mood}, energy ${character.energyLevel}/100`,
    `- you sleep from ${formatHour(life.sleepHours.start)} to ${formatHour(life.sleepHours.end)}`,
    `- who you are: ${personaSheet.trim().slice(0, 300)}`,
    "",
    "## Rules",
    "- Plan 4 to 7 activities between waking up and going to sleep.",
    "- On a weekend do not plan work.",
    `- activity is one of: ${ACTIVITIES.filter((activity) => activity !== "sleeping").join(", ")}.`,
    "- importance is 1 (can skip) to 10 (critical).",
    "",
    "Reply with JSON only:",
    '{"dayMood":string,"activities":[{"activity":string,"description":string,"start":"HH:MM","end":"HH:MM","location":string,"importance":number}]}',
  ];

  if (request.previous) {
    lines.push(
      "",
      "## Yesterday (vary it)",
      ...request.previous.activities.map(
        (entry) => `- ${entry.from}-${entry.to} ${entry.activity}: ${entry.description}`,
      ),
    );
  }

  return lines.join("\n");
}

function formatHour(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}
