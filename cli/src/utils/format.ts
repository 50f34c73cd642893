import type { InitiativeDecision } from "../../../runtime/src/initiative.js";
import type { RetrievedMemory } from "../../../runtime/src/memory/memory-system.js";
import type { MemoryRecord } from "../../../runtime/src/types.js";

export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, Math.max(0, max - 1))}…` : flat;
}

export function formatTimestamp(ms: number | null): string {
  if (ms === null) return "never";
  return new Date(ms).toISOString().replace("T", " ").slice(0, 16);
}

/** One line per memory, for list and search output. */
export function formatMemoryLine(record: MemoryRecord): string {
  return `#${record.id} ${record.memoryType.padEnd(10)} imp ${String(record.importance).padStart(2)}  ${truncate(record.content, 80)}`;
}

export function formatRetrievedLine(hit: RetrievedMemory): string {
  const similarity =
    hit.similarity === undefined ? "" : ` sim ${hit.similarity.toFixed(3)}`;
  return `${formatMemoryLine(hit.record)}  (score ${hit.score.toFixed(3)}${similarity})`;
}

/**
 * Plain-text breakdown of an initiative decision: verdict, probability, then
 * each factor and bonus that contributed.
 */
export function formatDecision(decision: InitiativeDecision): string[] {
  const lines = [
    `send: ${decision.shouldSend ? "yes" : "no"}`,
    `probability: ${(decision.probability * 100).toFixed(1)}%`,
    `reason: ${decision.reason}`,
  ];
  if (decision.blockedBy) {
    lines.push(`blocked by: ${decision.blockedBy}`);
    return lines;
  }
  if (decision.draw !== undefined) {
    lines.push(`draw: ${decision.draw.toFixed(3)}`);
  }
  if (decision.factors) {
    lines.push("factors:");
    for (const [name, value] of Object.entries(decision.factors)) {
      lines.push(`  ${name.padEnd(22)} ×${value.toFixed(2)}`);
    }
  }
  const bonuses = Object.entries(decision.bonuses ?? {});
  if (bonuses.length > 0) {
    lines.push("bonuses:");
    for (const [name, value] of bonuses) {
      lines.push(`  ${name.padEnd(22)} +${(value ?? 0).toFixed(2)}`);
    }
  }
  return lines;
}
