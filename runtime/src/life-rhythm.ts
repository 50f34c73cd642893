/**
 * life-rhythm.ts: State-transition rules for the persona's simulated life.
 *
 * The consciousness cycle calls advanceState() on every tick and the
 * coordinator calls reactToExchange() after every conversation turn; both go
 * through the same clamping so energy and intimacy stay in [0, 100].
 */

import type { LifeConfig, ScheduleEntry } from "./config";
import type { CharacterDefaults } from "./persona-store";
import type {
  Activity,
  CharacterState,
  Mood,
  RelationshipState,
  StateEventType,
  VirtualLifeContext,
} from "./types";

export type RandomSource = () => number;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MINUTES = 24 * 60;

// ── Clock helpers ───────────────────────────────────────────────────────────

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export function clampLevel(value: number): number {
  return Math.round(clamp(value, 0, 100));
}

export function isWithinSleepHours(
  hour: number,
  sleepHours: { start: number; end: number },
): boolean {
  const { start, end } = sleepHours;
  if (start === end) return false;
  if (start < end) return hour >= start && hour < end;
  return hour >= start || hour < end;
}

export function isWeekend(date: Date): boolean {
  const day = date.getDay();
  return day === 0 || day === 6;
}

/** Local calendar day key, e.g. "2026-10-21". */
export function dayKey(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function startOfLocalDay(date: Date): number {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate(),
  ).getTime();
}

function minutesOfDay(date: Date): number {
  return date.getHours() * 60 + date.getMinutes();
}

function parseClock(value: string): number {
  const [hours, minutes] = value.split(":").map(Number);
  return hours * 60 + minutes;
}

function appliesOn(entry: ScheduleEntry, date: Date): boolean {
  if (entry.days === "all") return true;
  return entry.days === "weekends" ? isWeekend(date) : !isWeekend(date);
}

// ── Schedule ────────────────────────────────────────────────────────────────

export interface ScheduledSlot {
  activity: Activity;
  location: string;
  importance: number;
}

/**
 * What the persona is doing at `now` according to the schedule table.
 * Sleep hours always win; gaps in the table are free time at the default location.
 */
export function resolveScheduledActivity(
  now: Date,
  life: LifeConfig,
): ScheduledSlot {
  if (isWithinSleepHours(now.getHours(), life.sleepHours)) {
    return { activity: "sleeping", location: life.defaultLocation, importance: 10 };
  }

  const minute = minutesOfDay(now);
  const entry = life.schedule.find(
    (candidate) =>
      appliesOn(candidate, now) &&
      minute >= parseClock(candidate.from) &&
      minute < parseClock(candidate.to),
  );
  if (!entry) {
    return { activity: "free", location: life.defaultLocation, importance: 1 };
  }
  return {
    activity: entry.activity,
    location: entry.location,
    importance: entry.importance,
  };
}

/** Starting character for a fresh database: baseline mood and energy, scheduled activity. */
export function initialCharacter(now: Date, life: LifeConfig): CharacterDefaults {
  const slot = resolveScheduledActivity(now, life);
  return {
    mood: life.baselineMood,
    energyLevel: clampLevel(life.energyBaseline),
    currentActivity: slot.activity,
    location: slot.location,
  };
}

/**
 * Build the virtual-life context the initiative engine reads: whether the
 * previous activity just finished and what is scheduled next today.
 */
export function buildLifeContext(
  now: Date,
  previousActivity: Activity,
  life: LifeConfig,
): VirtualLifeContext {
  const current = resolveScheduledActivity(now, life);
  const justFinished =
    previousActivity !== current.activity &&
    previousActivity !== "free" &&
    previousActivity !== "unknown" &&
    previousActivity !== "sleeping";

  const context: VirtualLifeContext = {
    status: justFinished ? "completed" : "active",
    activityImportance: current.importance,
  };

  const minute = minutesOfDay(now);
  const upcoming = life.schedule
    .filter(
      (entry) =>
        appliesOn(entry, now) &&
        entry.activity !== current.activity &&
        parseClock(entry.from) > minute &&
        parseClock(entry.from) < DAY_MINUTES,
    )
    .sort((a, b) => parseClock(a.from) - parseClock(b.from))[0];

  if (upcoming) {
    context.nextActivity = upcoming.activity;
    context.nextActivityAt =
      startOfLocalDay(now) + parseClock(upcoming.from) * 60_000;
    context.nextActivityImportance = upcoming.importance;
  }

  return context;
}

// ── Tick transition ─────────────────────────────────────────────────────────

export interface StateTransition {
  next: CharacterState;
  changes: Record<string, { from: unknown; to: unknown }>;
  eventType: StateEventType;
  description: string;
}

/**
 * Advance the character by `elapsedMs`: energy drifts toward the baseline while
 * awake and recovers during sleep hours, mood may drift with a chance that
 * grows with elapsed time, and activity follows the schedule table.
 */
export function advanceState(
  state: CharacterState,
  elapsedMs: number,
  now: Date,
  life: LifeConfig,
  random: RandomSource = Math.random,
): StateTransition {
  const hours = Math.max(0, elapsedMs) / HOUR_MS;
  const asleep = isWithinSleepHours(now.getHours(), life.sleepHours);
  const currentEnergy = Number.isFinite(state.energyLevel)
    ? state.energyLevel
    : life.energyBaseline;

  let energy: number;
  if (asleep) {
    energy = currentEnergy + life.energyRecoveryPerHour * hours;
  } else if (currentEnergy > life.energyBaseline) {
    energy = Math.max(
      life.energyBaseline,
      currentEnergy - life.energyDecayPerHour * hours,
    );
  } else {
    energy = Math.min(
      life.energyBaseline,
      currentEnergy + life.energyDecayPerHour * hours,
    );
  }

  let mood: Mood = state.mood;
  let drifted = false;
  const shiftChance = clamp(life.moodVolatility * hours, 0, 1);
  if (shiftChance > 0 && random() < shiftChance) {
    if (mood !== life.baselineMood && random() < 0.6) {
      mood = life.baselineMood;
    } else {
      const index = Math.min(
        life.moodPalette.length - 1,
        Math.floor(clamp(random(), 0, 1) * life.moodPalette.length),
      );
      mood = life.moodPalette[index] ?? life.baselineMood;
    }
    drifted = mood !== state.mood;
  }

  const slot = resolveScheduledActivity(now, life);
  const next: CharacterState = {
    ...state,
    mood,
    energyLevel: clampLevel(energy),
    currentActivity: slot.activity,
    location: slot.location,
    updatedAt: now.getTime(),
  };

  const changes = diffState(state, next);
  const parts: string[] = [];
  if (changes.currentActivity) parts.push(`now ${slot.activity} at ${slot.location}`);
  if (changes.mood) parts.push(`mood ${state.mood} → ${mood}`);
  if (changes.energyLevel) {
    parts.push(`energy ${state.energyLevel} → ${next.energyLevel}`);
  }

  return {
    next,
    changes,
    eventType: drifted ? "random" : "automatic",
    description: parts.length > 0 ? parts.join(", ") : "no change",
  };
}

function diffState(
  before: CharacterState,
  after: CharacterState,
): Record<string, { from: unknown; to: unknown }> {
  const changes: Record<string, { from: unknown; to: unknown }> = {};
  const keys = ["mood", "energyLevel", "currentActivity", "location"] as const;
  for (const key of keys) {
    if (before[key] !== after[key]) {
      changes[key] = { from: before[key], to: after[key] };
    }
  }
  return changes;
}

// ── Exchange transition ─────────────────────────────────────────────────────

const POSITIVE_WORDS = [
  "thanks",
  "thank you",
  "love",
  "great",
  "awesome",
  "glad",
  "happy",
  "haha",
  "miss you",
  "wonderful",
];
const NEGATIVE_WORDS = [
  "sad",
  "tired",
  "awful",
  "terrible",
  "angry",
  "upset",
  "lonely",
  "stressed",
  "hate",
  "bad day",
];
const LOW_MOODS: readonly Mood[] = ["sad", "down", "irritated", "anxious", "tired"];

export function detectTone(text: string): "positive" | "negative" | "neutral" {
  const lower = text.toLowerCase();
  if (NEGATIVE_WORDS.some((word) => lower.includes(word))) return "negative";
  if (POSITIVE_WORDS.some((word) => lower.includes(word))) return "positive";
  return "neutral";
}

/**
 * Character after the operator wrote `userMessage`: the mood leans toward the
 * tone of the message, the exchange costs a little energy and resets the
 * last-message timer.
 */
export function reactToExchange(
  state: CharacterState,
  userMessage: string,
  now: Date,
  life: LifeConfig,
): CharacterState {
  const tone = detectTone(userMessage);
  let mood = state.mood;
  if (tone === "positive") {
    mood = LOW_MOODS.includes(mood) ? "calm" : mood === "happy" ? "playful" : "happy";
  } else if (tone === "negative") {
    mood = "thoughtful";
  }

  return {
    ...state,
    mood,
    energyLevel: clampLevel(state.energyLevel - life.energyCostPerExchange),
    lastMessageAt: now.getTime(),
    updatedAt: now.getTime(),
  };
}

export function relationshipAfterExchange(
  relationship: RelationshipState,
  now: Date,
  life: LifeConfig,
): RelationshipState {
  return {
    ...relationship,
    intimacyLevel: clamp(
      relationship.intimacyLevel + life.intimacyGainPerExchange,
      0,
      100,
    ),
    interactionCount: relationship.interactionCount + 1,
    lastInteractionAt: now.getTime(),
  };
}
