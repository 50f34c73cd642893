import type { MemoryRecord } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

export const SIMILARITY_WEIGHT = 0.85;
export const IMPORTANCE_WEIGHT = 0.1;
export const RECENCY_WEIGHT = 0.05;
export const RECENCY_HALF_SCALE_DAYS = 30;

export function similarityFromDistance(distance: number): number {
  if (!Number.isFinite(distance)) return 0;
  return 1 / (1 + Math.max(0, distance));
}

export function recencyFactor(createdAt: number, now: number): number {
  const ageDays = Math.max(0, now - createdAt) / DAY_MS;
  return Math.exp(-ageDays / RECENCY_HALF_SCALE_DAYS);
}

/**
 * Relevance of a similarity hit. Importance and recency together add at most
 * 0.15, so a similarity lead above 0.15 / 0.85 always wins.
 */
export function relevanceScore(
  similarity: number,
  importance: number,
  createdAt: number,
  now: number,
): number {
  return (
    SIMILARITY_WEIGHT * similarity +
    IMPORTANCE_WEIGHT * (importance / 10) +
    RECENCY_WEIGHT * recencyFactor(createdAt, now)
  );
}

/** Importance plus emotional weight plus how often the memory has been used. */
export function effectiveImportance(record: MemoryRecord): number {
  return (
    record.importance +
    record.emotionalIntensity * 0.3 +
    record.accessCount * 0.1
  );
}

/**
 * Importance after consolidation: frequently and recently used memories gain
 * a point, long-untouched mild ones lose a point.
 */
export function consolidatedImportance(record: MemoryRecord, now: number): number {
  const idleDays = Math.max(0, now - record.lastAccessedAt) / DAY_MS;
  let importance = record.importance;

  if (record.accessCount >= 3 && idleDays <= 7) {
    importance += 1;
  } else if (
    idleDays > 30 &&
    record.importance < 6 &&
    record.emotionalIntensity < 5
  ) {
    importance -= 1;
  }

  return Math.max(1, Math.min(10, importance));
}

/** Lowest effective importance first, oldest first among equals. */
export function evictionOrder(a: MemoryRecord, b: MemoryRecord): number {
  return (
    effectiveImportance(a) - effectiveImportance(b) ||
    a.createdAt - b.createdAt ||
    a.id - b.id
  );
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 2);
}
