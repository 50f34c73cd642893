import type { CharacterState, Mood } from "../../runtime/src/types.js";

export type DelayClass = "quick" | "normal" | "slow";

export interface Pacing {
  messageCount: number;
  delayClass: DelayClass;
}

/** What the coordinator hands to a transport. */
export interface OutboundDelivery {
  messages: string[];
  pacing: Pacing;
}

export interface TypingLimits {
  minMs: number;
  maxMs: number;
  pauseMs: number;
}

export const WORDS_PER_MINUTE: Record<DelayClass, number> = {
  quick: 100,
  normal: 60,
  slow: 40,
};

export const MAX_MESSAGES = 3;
const SENTENCE_SPLIT_THRESHOLD = 160;

const SLOW_MOODS: readonly Mood[] = ["tired", "sad", "down"];
const QUICK_MOODS: readonly Mood[] = [
  "radiant",
  "excited",
  "happy",
  "playful",
  "irritated",
];

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function resolveTypingLimits(
  env: NodeJS.ProcessEnv = process.env,
): TypingLimits {
  return {
    minMs: parsePositiveInt(env.KINDRED_TYPING_MIN_MS, 800),
    maxMs: parsePositiveInt(env.KINDRED_TYPING_MAX_MS, 8_000),
    pauseMs: parsePositiveInt(env.KINDRED_TYPING_PAUSE_MS, 1_200),
  };
}

export function resolveDelayClass(mood: Mood, energyLevel: number): DelayClass {
  if (energyLevel < 30 || SLOW_MOODS.includes(mood)) return "slow";
  if (energyLevel >= 70 && QUICK_MOODS.includes(mood)) return "quick";
  return "normal";
}

/**
 * Break a reply into at most `maxMessages` chat messages. Paragraphs become
 * separate messages; a single long paragraph is split at sentence ends.
 */
export function splitIntoMessages(
  text: string,
  maxMessages: number = MAX_MESSAGES,
): string[] {
  const cleaned = text.replace(/\r\n/g, "\n").trim();
  if (!cleaned) return [];
  const limit = Math.max(1, Math.floor(maxMessages));

  let parts = cleaned
    .split(/\n\s*\n/)
    .map((part) => part.trim())
    .filter(Boolean);

  if (parts.length === 1 && parts[0].length > SENTENCE_SPLIT_THRESHOLD) {
    const sentences = (parts[0].match(/[^.!?…]+[.!?…]*/g) ?? [parts[0]])
      .map((sentence) => sentence.trim())
      .filter(Boolean);
    parts = groupSentences(sentences, limit);
  }

  if (parts.length > limit) {
    const head = parts.slice(0, limit - 1);
    head.push(parts.slice(limit - 1).join("\n\n"));
    parts = head;
  }
  return parts;
}

function groupSentences(sentences: string[], limit: number): string[] {
  if (sentences.length <= 1) return sentences;
  const perMessage = Math.ceil(sentences.length / limit);
  const groups: string[] = [];
  for (let i = 0; i < sentences.length; i += perMessage) {
    groups.push(sentences.slice(i, i + perMessage).join(" "));
  }
  return groups;
}

export function planDelivery(
  text: string,
  character: Pick<CharacterState, "mood" | "energyLevel">,
): OutboundDelivery {
  const messages = splitIntoMessages(text);
  return {
    messages,
    pacing: {
      messageCount: messages.length,
      delayClass: resolveDelayClass(character.mood, character.energyLevel),
    },
  };
}

/**
 * How long to show the typing indicator before sending `message`.
 */
export function typingDelayMs(
  message: string,
  delayClass: DelayClass,
  limits: TypingLimits = resolveTypingLimits(),
): number {
  const words = message.split(/\s+/).filter(Boolean).length;
  const raw = (words / WORDS_PER_MINUTE[delayClass]) * 60_000;
  return Math.round(Math.max(limits.minMs, Math.min(limits.maxMs, raw)));
}
