import { dayKey } from "../life-rhythm";
import type { MemoryRecord, MemoryType } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type IntensityBand = "high" | "medium" | "low";

/** Aged memories from one day that share a type and an emotional intensity band. */
export interface MemoryGroup {
  key: string;
  day: string;
  memoryType: MemoryType;
  band: IntensityBand;
  memories: MemoryRecord[];
}

/**
 * Condenses a group of memories into one summary text. Rejecting, or resolving
 * to blank text, leaves the group as it was.
 */
export interface MemoryCompressor {
  compress(group: MemoryGroup): Promise<string>;
}

export interface CompressionOptions {
  minAgeDays: number;
  minGroupSize: number;
  maxGroupSize: number;
}

export function intensityBand(intensity: number): IntensityBand {
  if (intensity >= 8) return "high";
  if (intensity >= 6) return "medium";
  return "low";
}

/**
 * Groups of at least `minGroupSize` memories older than `minAgeDays`, keyed by
 * local day, type and intensity band. Oversized groups are cut into chunks of
 * `maxGroupSize`; a trailing chunk below the minimum is left alone.
 */
export function groupForCompression(
  records: MemoryRecord[],
  now: number,
  options: CompressionOptions,
): MemoryGroup[] {
  const cutoff = now - options.minAgeDays * DAY_MS;
  const buckets = new Map<string, MemoryGroup>();

  for (const record of records) {
    if (record.createdAt > cutoff) continue;
    const day = dayKey(new Date(record.createdAt));
    const band = intensityBand(record.emotionalIntensity);
    const key = `${day}|${record.memoryType}|${band}`;
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.memories.push(record);
    } else {
      buckets.set(key, { key, day, memoryType: record.memoryType, band, memories: [record] });
    }
  }

  const size = Math.max(options.minGroupSize, options.maxGroupSize);
  const groups: MemoryGroup[] = [];
  for (const key of [...buckets.keys()].sort()) {
    const bucket = buckets.get(key);
    if (!bucket) continue;
    const ordered = [...bucket.memories].sort(
      (a, b) => a.createdAt - b.createdAt || a.id - b.id,
    );
    for (let start = 0; start < ordered.length; start += size) {
      const chunk = ordered.slice(start, start + size);
      if (chunk.length < options.minGroupSize) continue;
      groups.push({
        ...bucket,
        key: start === 0 ? key : `${key}#${start / size}`,
        memories: chunk,
      });
    }
  }
  return groups;
}

/** Fields of the record that replaces a compressed group. */
export function summaryOf(
  group: MemoryGroup,
  content: string,
): {
  content: string;
  memoryType: MemoryType;
  importance: number;
  emotionalIntensity: number;
  createdAt: number;
} {
  const { memories } = group;
  const intensity =
    memories.reduce((sum, record) => sum + record.emotionalIntensity, 0) /
    Math.max(1, memories.length);
  return {
    content,
    memoryType: group.memoryType,
    importance: Math.max(...memories.map((record) => record.importance)),
    emotionalIntensity: Math.round(intensity * 10) / 10,
    createdAt: Math.max(...memories.map((record) => record.createdAt)),
  };
}
