/**
 * initiative.ts: Decides whether the persona writes first.
 *
 * decide() is pure: the clock and the random draw are injected, nothing is
 * read from or written to the store. Hard gates short-circuit to a blocked
 * decision; otherwise a base probability is multiplied by six factors, the
 * contextual bonuses are added on top, and the sum is clamped once.
 */

import type { InitiativeConfig, MultiplierTable } from "./config";
import { clamp, isWithinSleepHours, type RandomSource } from "./life-rhythm";
import type {
  Activity,
  CharacterState,
  Mood,
  RelationshipState,
  VirtualLifeContext,
} from "./types";

const HOUR_MS = 60 * 60 * 1000;

export type InitiativeFactor =
  | "timeSinceLastMessage"
  | "mood"
  | "energy"
  | "activity"
  | "intimacy"
  | "timeOfDay"
  | "dayOfWeek";

export type InitiativeBonus =
  | "activityCompleted"
  | "upcomingImportant"
  | "longSilence"
  | "heightenedMood";

export type BlockReason =
  | "sleep hours"
  | "cooldown"
  | "daily cap reached"
  | "initiative in flight";

export interface InitiativeInput {
  character: CharacterState;
  relationship: RelationshipState;
  life: VirtualLifeContext;
  lastMessageAt: number | null;
  initiativesToday: number;
  /** Sleep window comes from the life config; the engine only reads it. */
  sleepHours: { start: number; end: number };
}

export interface InitiativeDecision {
  shouldSend: boolean;
  probability: number;
  reason: string;
  blockedBy?: BlockReason;
  factors?: Record<InitiativeFactor, number>;
  bonuses?: Partial<Record<InitiativeBonus, number>>;
  draw?: number;
}

// ── Factors ─────────────────────────────────────────────────────────────────

function lookup(table: MultiplierTable, tag: string): number {
  const value = table[tag];
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : table.default;
}

export function timeSinceFactor(
  elapsedMs: number | null,
  config: InitiativeConfig,
): number {
  if (elapsedMs === null) return config.silenceCurve.neverMessaged;
  if (!Number.isFinite(elapsedMs)) return 1;
  const hours = Math.max(0, elapsedMs) / HOUR_MS;
  const steps = [...config.silenceCurve.steps].sort(
    (a, b) => a.underHours - b.underHours,
  );
  for (const step of steps) {
    if (hours < step.underHours) return step.multiplier;
  }
  return config.silenceCurve.plateau;
}

export function moodFactor(mood: Mood, config: InitiativeConfig): number {
  return lookup(config.moodMultipliers, mood);
}

/**
 * Piecewise-linear curve over 0–100: rises from `atEmpty` to `peak` at
 * `peakAt`, then falls to `atFull`. Tired and overloaded both reach out less.
 */
export function energyFactor(energy: number, config: InitiativeConfig): number {
  if (!Number.isFinite(energy)) return 1;
  const { atEmpty, peakAt, peak, atFull } = config.energyCurve;
  const level = clamp(energy, 0, 100);
  if (level <= peakAt) {
    return atEmpty + (peak - atEmpty) * (level / peakAt);
  }
  return peak - (peak - atFull) * ((level - peakAt) / (100 - peakAt));
}

export function activityFactor(
  activity: Activity,
  config: InitiativeConfig,
): number {
  return lookup(config.activityMultipliers, activity);
}

export function intimacyFactor(
  intimacy: number,
  config: InitiativeConfig,
): number {
  if (!Number.isFinite(intimacy)) return 1;
  const { floor, ceiling } = config.intimacy;
  return floor + (ceiling - floor) * (clamp(intimacy, 0, 100) / 100);
}

export function timeOfDayFactor(
  now: Date,
  sleepHours: { start: number; end: number },
  config: InitiativeConfig,
): number {
  const hour = now.getHours();
  if (isWithinSleepHours(hour, sleepHours)) return config.timeOfDay.sleep;
  const band = config.timeOfDay.bands.find(
    (candidate) => hour >= candidate.from && hour < candidate.to,
  );
  return band ? band.multiplier : config.timeOfDay.fallback;
}

export function dayOfWeekFactor(now: Date, config: InitiativeConfig): number {
  const day = now.getDay();
  if (day === 0 || day === 6) return config.dayOfWeek.weekend;
  if (day === 5) return config.dayOfWeek.friday;
  return config.dayOfWeek.weekday;
}

// ── Bonuses ─────────────────────────────────────────────────────────────────

function contextBonuses(
  input: InitiativeInput,
  elapsedMs: number | null,
  now: Date,
  config: InitiativeConfig,
): Partial<Record<InitiativeBonus, number>> {
  const bonuses: Partial<Record<InitiativeBonus, number>> = {};
  const { life } = input;

  if (life.status === "completed") {
    bonuses.activityCompleted = config.bonuses.activityCompleted;
  }

  if (
    typeof life.nextActivityAt === "number" &&
    typeof life.nextActivityImportance === "number"
  ) {
    const minutesUntil = (life.nextActivityAt - now.getTime()) / 60_000;
    if (
      minutesUntil > 0 &&
      minutesUntil <= config.upcomingWindowMinutes &&
      life.nextActivityImportance >= config.upcomingImportanceMin
    ) {
      bonuses.upcomingImportant = config.bonuses.upcomingImportant;
    }
  }

  if (elapsedMs !== null && elapsedMs > config.longSilenceHours * HOUR_MS) {
    bonuses.longSilence = config.bonuses.longSilence;
  }

  if (config.heightenedMoods.some((mood) => mood === input.character.mood)) {
    bonuses.heightenedMood = config.bonuses.heightenedMood;
  }

  return bonuses;
}

// ── Reasons ─────────────────────────────────────────────────────────────────

const FACTOR_NAMES: readonly InitiativeFactor[] = [
  "timeSinceLastMessage",
  "mood",
  "energy",
  "activity",
  "intimacy",
  "timeOfDay",
  "dayOfWeek",
];

const BONUS_NAMES: readonly InitiativeBonus[] = [
  "activityCompleted",
  "upcomingImportant",
  "longSilence",
  "heightenedMood",
];

const FACTOR_LABELS: Record<InitiativeFactor, [string, string]> = {
  timeSinceLastMessage: ["long silence", "talked recently"],
  mood: ["good mood", "low mood"],
  energy: ["full of energy", "low energy"],
  activity: ["free time", "busy"],
  intimacy: ["close relationship", "still getting acquainted"],
  timeOfDay: ["lively hour", "quiet hour"],
  dayOfWeek: ["weekend", "weekday"],
};

const BONUS_LABELS: Record<InitiativeBonus, string> = {
  activityCompleted: "activity just completed",
  upcomingImportant: "important activity soon",
  longSilence: "missing the operator",
  heightenedMood: "heightened mood",
};

function dominantReason(
  factors: Record<InitiativeFactor, number>,
  bonuses: Partial<Record<InitiativeBonus, number>>,
): string {
  let reason = "routine check";
  let weight = 0;

  for (const name of FACTOR_NAMES) {
    const multiplier = factors[name];
    const deviation = Math.abs(multiplier - 1);
    if (deviation > weight) {
      weight = deviation;
      reason = FACTOR_LABELS[name][multiplier > 1 ? 0 : 1];
    }
  }

  for (const name of BONUS_NAMES) {
    const bonus = bonuses[name];
    if (bonus !== undefined && bonus > weight) {
      weight = bonus;
      reason = BONUS_LABELS[name];
    }
  }

  return reason;
}

// ── Decision ────────────────────────────────────────────────────────────────

function blocked(reason: BlockReason): InitiativeDecision {
  return { shouldSend: false, probability: 0, reason, blockedBy: reason };
}

/**
 * Decide whether to send an unprompted message now.
 */
export function decide(
  input: InitiativeInput,
  config: InitiativeConfig,
  now: Date = new Date(),
  random: RandomSource = Math.random,
): InitiativeDecision {
  if (isWithinSleepHours(now.getHours(), input.sleepHours)) {
    return blocked("sleep hours");
  }

  const elapsedMs =
    input.lastMessageAt === null || !Number.isFinite(input.lastMessageAt)
      ? null
      : Math.max(0, now.getTime() - input.lastMessageAt);

  if (elapsedMs !== null && elapsedMs < config.cooldownHours * HOUR_MS) {
    return blocked("cooldown");
  }

  if (input.initiativesToday >= config.dailyCap) {
    return blocked("daily cap reached");
  }

  const factors: Record<InitiativeFactor, number> = {
    timeSinceLastMessage: timeSinceFactor(elapsedMs, config),
    mood: moodFactor(input.character.mood, config),
    energy: energyFactor(input.character.energyLevel, config),
    activity: activityFactor(input.character.currentActivity, config),
    intimacy: intimacyFactor(input.relationship.intimacyLevel, config),
    timeOfDay: timeOfDayFactor(now, input.sleepHours, config),
    dayOfWeek: dayOfWeekFactor(now, config),
  };

  const product = Object.values(factors).reduce(
    (acc, multiplier) => acc * multiplier,
    config.baseProbability,
  );

  const bonuses = contextBonuses(input, elapsedMs, now, config);
  const bonusTotal = Math.min(
    config.bonuses.maxTotal,
    Object.values(bonuses).reduce((acc, bonus) => acc + bonus, 0),
  );

  const probability = clamp(product + bonusTotal, 0, 1);
  const draw = random();

  return {
    shouldSend: draw < probability,
    probability,
    reason: dominantReason(factors, bonuses),
    factors,
    bonuses,
    draw,
  };
}

// ── Topics ──────────────────────────────────────────────────────────────────

const ACTIVITY_TOPICS: Partial<Record<Activity, string[]>> = {
  working: [
    "share how work is going",
    "vent about something tricky at work",
  ],
  hobby: ["show progress on a hobby project", "share a new idea for a project"],
  social: ["tell about meeting friends"],
  resting: ["share a lazy, cozy moment"],
  commuting: ["share something spotted on the way"],
};

const UPBEAT_MOODS: readonly Mood[] = ["radiant", "excited", "happy", "playful"];
const LOW_MOODS: readonly Mood[] = ["sad", "down", "anxious"];

/**
 * Pick what a proactive message is about, skipping the last three topics used.
 */
export function pickInitiativeTopic(
  character: CharacterState,
  recentTopics: string[],
  random: RandomSource = Math.random,
): string {
  const topics: string[] = [...(ACTIVITY_TOPICS[character.currentActivity] ?? [])];

  if (UPBEAT_MOODS.includes(character.mood)) {
    topics.push("share some good news", "tell what inspired you today");
  } else if (LOW_MOODS.includes(character.mood)) {
    topics.push("share what is on your mind", "ask for a little support");
  }

  topics.push(
    "ask how their day is going",
    "tell about your day",
    "suggest doing something together",
    "bring up a shared memory",
  );

  const recent = new Set(recentTopics.slice(-3));
  const fresh = topics.filter((topic) => !recent.has(topic));
  const pool = fresh.length > 0 ? fresh : topics;
  const index = Math.min(
    pool.length - 1,
    Math.floor(clamp(random(), 0, 1) * pool.length),
  );
  return pool[index];
}
