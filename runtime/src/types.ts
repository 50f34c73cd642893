// ── Tags ────────────────────────────────────────────────────────────────────

export const MOODS = [
  "radiant",
  "excited",
  "happy",
  "playful",
  "neutral",
  "calm",
  "thoughtful",
  "anxious",
  "sad",
  "tired",
  "irritated",
  "down",
] as const;

/** `unknown` is the fallback for any tag the store or a model hands back that is not in the set. */
export type Mood = (typeof MOODS)[number] | "unknown";

export const ACTIVITIES = [
  "free",
  "working",
  "sleeping",
  "social",
  "hobby",
  "resting",
  "commuting",
] as const;

export type Activity = (typeof ACTIVITIES)[number] | "unknown";

export type MemoryType = "fact" | "preference" | "event" | "emotion";
export const MEMORY_TYPES: readonly MemoryType[] = [
  "fact",
  "preference",
  "event",
  "emotion",
];

export type ConversationKind = "response" | "initiative";
export type StateEventType = "automatic" | "random" | "triggered";

export function parseMood(value: unknown): Mood {
  const normalized = String(value ?? "")
    .trim()
    .toLowerCase();
  return MOODS.find((mood) => mood === normalized) ?? "unknown";
}

export function parseActivity(value: unknown): Activity {
  const normalized = String(value ?? "")
    .trim()
    .toLowerCase();
  return ACTIVITIES.find((activity) => activity === normalized) ?? "unknown";
}

export function parseMemoryType(value: unknown): MemoryType {
  const normalized = String(value ?? "")
    .trim()
    .toLowerCase();
  return MEMORY_TYPES.find((type) => type === normalized) ?? "fact";
}

// ── State ───────────────────────────────────────────────────────────────────

export interface CharacterState {
  personaId: string;
  mood: Mood;
  energyLevel: number;
  currentActivity: Activity;
  location: string;
  lastMessageAt: number | null;
  updatedAt: number;
}

export interface RelationshipState {
  personaId: string;
  intimacyLevel: number;
  interactionCount: number;
  lastInteractionAt: number | null;
}

/**
 * What the persona's virtual life looks like right now, beyond the character
 * row: whether the current activity just ended and what comes next.
 */
export interface VirtualLifeContext {
  status?: "planned" | "active" | "completed";
  activityImportance?: number;
  nextActivity?: Activity;
  nextActivityAt?: number;
  nextActivityImportance?: number;
}

// ── History ─────────────────────────────────────────────────────────────────

export interface ConversationRecord {
  id: number;
  personaId: string;
  userMessage: string;
  response: string;
  moodBefore: Mood;
  moodAfter: Mood;
  kind: ConversationKind;
  topic?: string;
  createdAt: number;
}

export interface MemoryRecord {
  id: number;
  personaId: string;
  content: string;
  memoryType: MemoryType;
  importance: number;
  emotionalIntensity: number;
  accessCount: number;
  createdAt: number;
  lastAccessedAt: number;
  embedding?: number[];
  sourceConversationId?: number;
}

export interface StateEvent {
  id: number;
  personaId: string;
  eventType: StateEventType;
  description: string;
  changes: Record<string, unknown>;
  trigger: string;
  createdAt: number;
}
