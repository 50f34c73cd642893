/**
 * memory-system.ts: Hybrid memory: similarity retrieval over an embedding
 * index with a keyword fallback, access bookkeeping and daily consolidation.
 *
 * Writes (store, consolidate, forget) are serialized on the system's own lock.
 * Retrieval never waits for it; the access bump it performs is a single
 * SQLite transaction.
 */

import type { MemoryConfig } from "../config";
import { startOfLocalDay } from "../life-rhythm";
import {
  clampImportance,
  isVector,
  type MemoryFilters,
  type MemoryRepository,
} from "../persona-store";
import { StateLock } from "../state-lock";
import type { MemoryRecord, MemoryType } from "../types";
import {
  consolidatedImportance,
  effectiveImportance,
  evictionOrder,
  relevanceScore,
  similarityFromDistance,
  tokenize,
} from "./scoring";
import {
  groupForCompression,
  summaryOf,
  type MemoryCompressor,
  type MemoryGroup,
} from "./compression";
import {
  InMemorySimilarityIndex,
  type IndexMetadata,
  type SimilarityIndex,
} from "./similarity-index";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface Embedder {
  /** Resolves to null when the provider has no embedding model. */
  embed(text: string): Promise<number[] | null>;
}

export interface StoreMemoryInput {
  content: string;
  memoryType: MemoryType;
  importance: number;
  emotionalIntensity?: number;
  embedding?: number[];
  sourceConversationId?: number;
  createdAt?: number;
}

export interface RetrieveOptions {
  limit?: number;
  minImportance?: number;
  /** Overrides the configured similarity floor. */
  minSimilarity?: number;
  filters?: { memoryType?: MemoryType };
  now?: number;
}

export type RetrievalPath = "similarity" | "keyword";

export interface RetrievedMemory {
  record: MemoryRecord;
  score: number;
  similarity?: number;
}

export interface RetrievalResult {
  path: RetrievalPath;
  degradedReason?: string;
  memories: RetrievedMemory[];
}

export interface ConsolidationReport {
  ranAt: number;
  reviewed: number;
  promoted: number;
  demoted: number;
  evictedDaily: number;
  evictedWorking: number;
  compressedGroups: number;
  compressedMemories: number;
  remaining: number;
}

export interface MemoryStats {
  total: number;
  byType: Record<MemoryType, number>;
  indexed: number | null;
  averageImportance: number;
}

export interface MemorySystemOptions {
  personaId: string;
  repository: MemoryRepository;
  config: MemoryConfig;
  index?: SimilarityIndex;
  embedder?: Embedder | null;
  compressor?: MemoryCompressor | null;
}

export class MemorySystem {
  private readonly personaId: string;
  private readonly repository: MemoryRepository;
  private readonly config: MemoryConfig;
  private readonly index: SimilarityIndex;
  private readonly embedder: Embedder | null;
  private readonly compressor: MemoryCompressor | null;
  private readonly writeLock = new StateLock();

  constructor(options: MemorySystemOptions) {
    this.personaId = options.personaId;
    this.repository = options.repository;
    this.config = options.config;
    this.index = options.index ?? new InMemorySimilarityIndex();
    this.embedder = options.embedder ?? null;
    this.compressor = options.compressor ?? null;
  }

  /** Load every stored embedding into the index. Returns how many were indexed. */
  async hydrate(): Promise<number> {
    let indexed = 0;
    for (const record of this.repository.listEmbedded(this.personaId)) {
      if (!record.embedding) continue;
      try {
        await this.index.upsert(record.id, record.embedding, this.metadataOf(record));
        indexed += 1;
      } catch (error) {
        console.warn(
          JSON.stringify({
            type: "memory_index_hydrate_failed",
            memory_id: record.id,
            error: errorMessage(error),
          }),
        );
      }
    }
    return indexed;
  }

  async store(input: StoreMemoryInput): Promise<MemoryRecord> {
    const embedding = isVector(input.embedding)
      ? input.embedding
      : await this.tryEmbed(input.content);

    return this.writeLock.runExclusive(async () => {
      const record = this.repository.insert({
        personaId: this.personaId,
        content: input.content,
        memoryType: input.memoryType,
        importance: input.importance,
        emotionalIntensity: input.emotionalIntensity,
        embedding: embedding ?? undefined,
        sourceConversationId: input.sourceConversationId,
        createdAt: input.createdAt,
      });

      await this.indexRecord(record);
      return record;
    });
  }

  /**
   * Most relevant memories for `query`, best first. Falls back to keyword
   * matching whenever the embedding service or the index cannot answer.
   * Similarity hits below the floor are dropped, so an answered query may
   * come back empty.
   */
  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const limit = Math.max(1, Math.floor(options.limit ?? this.config.retrievalLimit));
    const now = options.now ?? Date.now();

    let result: RetrievalResult;
    try {
      result = await this.retrieveBySimilarity(query, limit, options, now);
    } catch (error) {
      const reason = errorMessage(error);
      console.warn(
        JSON.stringify({ type: "memory_retrieval_degraded", reason }),
      );
      result = {
        path: "keyword",
        degradedReason: reason,
        memories: this.retrieveByKeyword(query, limit, options),
      };
    }

    return { ...result, memories: this.recordAccess(result.memories, now) };
  }

  /**
   * Daily pass: rewrite importance, condense aged groups when a compressor is
   * wired, then evict beyond the daily cap and the working cap.
   */
  async consolidate(now = Date.now()): Promise<ConsolidationReport> {
    return this.writeLock.runExclusive(async () => {
      const records = this.repository.list(this.personaId);

      const updates: Array<{ id: number; importance: number }> = [];
      let promoted = 0;
      let demoted = 0;
      const rewritten = records.map((record) => {
        const importance = consolidatedImportance(record, now);
        if (importance === record.importance) return record;
        if (importance > record.importance) promoted += 1;
        else demoted += 1;
        updates.push({ id: record.id, importance });
        return { ...record, importance };
      });
      this.repository.updateImportance(updates);
      const changed = new Set(updates.map((update) => update.id));

      const compression = await this.compressAged(rewritten, now);
      const working = compression.records;

      const dayStart = startOfLocalDay(new Date(now));
      const createdToday = working.filter(
        (record) => record.createdAt >= dayStart && record.createdAt < dayStart + DAY_MS,
      );
      const dailyEvictions = pickEvictions(createdToday, this.config.dailyMemoryCap);
      const evicted = new Set(dailyEvictions.map((record) => record.id));

      const survivors = working.filter((record) => !evicted.has(record.id));
      const workingEvictions = pickEvictions(survivors, this.config.workingMemoryCap);
      for (const record of workingEvictions) evicted.add(record.id);

      const evictedIds = [...evicted];
      this.repository.delete(evictedIds);
      await this.removeFromIndex(evictedIds);

      for (const record of working) {
        if (evicted.has(record.id) || !record.embedding || !changed.has(record.id)) continue;
        await this.indexRecord(record);
      }

      const report: ConsolidationReport = {
        ranAt: now,
        reviewed: records.length,
        promoted,
        demoted,
        evictedDaily: dailyEvictions.length,
        evictedWorking: workingEvictions.length,
        compressedGroups: compression.groups,
        compressedMemories: compression.memories,
        remaining: working.length - evictedIds.length,
      };
      console.log(JSON.stringify({ type: "memory_consolidation", ...report }));
      return report;
    });
  }

  /** Resolves once no store, consolidation or forget is running. */
  async whenIdle(): Promise<void> {
    await this.writeLock.runExclusive(() => undefined);
  }

  list(filters: MemoryFilters = {}): MemoryRecord[] {
    return this.repository.list(this.personaId, filters);
  }

  get(id: number): MemoryRecord | null {
    const record = this.repository.get(id);
    return record && record.personaId === this.personaId ? record : null;
  }

  async forget(id: number): Promise<boolean> {
    return this.writeLock.runExclusive(async () => {
      if (!this.get(id)) return false;
      const removed = this.repository.delete([id]) > 0;
      await this.removeFromIndex([id]);
      return removed;
    });
  }

  async stats(): Promise<MemoryStats> {
    const records = this.repository.list(this.personaId);
    const total = records.length;
    const importanceSum = records.reduce((acc, record) => acc + record.importance, 0);

    let indexed: number | null = null;
    try {
      indexed = await this.index.size();
    } catch (error) {
      console.warn(
        JSON.stringify({ type: "memory_index_size_failed", error: errorMessage(error) }),
      );
    }

    return {
      total,
      byType: this.repository.countByType(this.personaId),
      indexed,
      averageImportance: total > 0 ? Number((importanceSum / total).toFixed(2)) : 0,
    };
  }

  // ── Retrieval paths ─────────────────────────────────────────────────────

  private async retrieveBySimilarity(
    query: string,
    limit: number,
    options: RetrieveOptions,
    now: number,
  ): Promise<RetrievalResult> {
    if (!this.embedder) {
      throw new Error("no embedding service configured");
    }
    const vector = await this.embedder.embed(query);
    if (!isVector(vector)) {
      throw new Error("embedding service returned no vector");
    }

    const hits = await this.index.query(vector, limit * 4, {
      personaId: this.personaId,
      memoryType: options.filters?.memoryType,
      minImportance: options.minImportance,
    });
    if (hits.length === 0) {
      throw new Error("similarity index returned no candidates");
    }

    const floor = options.minSimilarity ?? this.config.minSimilarity;
    const stale: number[] = [];
    const scored: Array<RetrievedMemory & { order: number }> = [];
    hits.forEach((hit, order) => {
      const record = this.repository.get(hit.id);
      if (!record || record.personaId !== this.personaId) {
        stale.push(hit.id);
        return;
      }
      if (
        typeof options.minImportance === "number" &&
        record.importance < options.minImportance
      ) {
        return;
      }
      const similarity = similarityFromDistance(hit.distance);
      if (similarity < floor) return;
      scored.push({
        record,
        similarity,
        score: relevanceScore(similarity, record.importance, record.createdAt, now),
        order,
      });
    });
    if (stale.length > 0) await this.removeFromIndex(stale);

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        b.record.importance - a.record.importance ||
        b.record.createdAt - a.record.createdAt ||
        a.record.id - b.record.id,
    );

    return {
      path: "similarity",
      memories: scored
        .slice(0, limit)
        .map(({ record, score, similarity }) => ({ record, score, similarity })),
    };
  }

  private retrieveByKeyword(
    query: string,
    limit: number,
    options: RetrieveOptions,
  ): RetrievedMemory[] {
    const tokens = [...new Set(tokenize(query))];
    if (tokens.length === 0) return [];

    const candidates = this.repository.list(this.personaId, {
      memoryType: options.filters?.memoryType,
      minImportance: options.minImportance,
    });

    const matched: RetrievedMemory[] = [];
    for (const record of candidates) {
      const words = new Set(tokenize(record.content));
      const hits = tokens.filter((token) => words.has(token)).length;
      if (hits === 0) continue;
      matched.push({ record, score: hits / tokens.length });
    }

    matched.sort(
      (a, b) =>
        b.record.importance - a.record.importance ||
        b.record.createdAt - a.record.createdAt ||
        a.record.id - b.record.id,
    );
    return matched.slice(0, limit);
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private recordAccess(memories: RetrievedMemory[], now: number): RetrievedMemory[] {
    if (memories.length === 0) return memories;
    this.repository.touch(
      memories.map((memory) => memory.record.id),
      now,
    );
    return memories.map((memory) => ({
      ...memory,
      record: {
        ...memory.record,
        accessCount: memory.record.accessCount + 1,
        lastAccessedAt: now,
      },
    }));
  }

  private async tryEmbed(text: string): Promise<number[] | null> {
    if (!this.embedder) return null;
    try {
      const vector = await this.embedder.embed(text);
      return isVector(vector) ? vector : null;
    } catch (error) {
      console.warn(
        JSON.stringify({ type: "memory_embedding_failed", error: errorMessage(error) }),
      );
      return null;
    }
  }

  /**
   * Replace each aged group with one summary record. A group whose summary
   * fails keeps its original records.
   */
  private async compressAged(
    records: MemoryRecord[],
    now: number,
  ): Promise<{ records: MemoryRecord[]; groups: number; memories: number }> {
    const settings = this.config.compression;
    if (!this.compressor || !settings.enabled) {
      return { records, groups: 0, memories: 0 };
    }

    const replaced = new Set<number>();
    const summaries: MemoryRecord[] = [];
    for (const group of groupForCompression(records, now, settings)) {
      const summary = await this.compressGroup(this.compressor, group);
      if (!summary) continue;
      for (const record of group.memories) replaced.add(record.id);
      summaries.push(summary);
    }

    if (summaries.length > 0) {
      console.log(
        JSON.stringify({
          type: "memory_compression",
          groups: summaries.length,
          memories: replaced.size,
        }),
      );
    }
    return {
      records: [...records.filter((record) => !replaced.has(record.id)), ...summaries],
      groups: summaries.length,
      memories: replaced.size,
    };
  }

  private async compressGroup(
    compressor: MemoryCompressor,
    group: MemoryGroup,
  ): Promise<MemoryRecord | null> {
    let content: string;
    try {
      content = (await compressor.compress(group)).trim();
    } catch (error) {
      console.warn(
        JSON.stringify({
          type: "memory_compression_failed",
          group: group.key,
          error: errorMessage(error),
        }),
      );
      return null;
    }
    if (!content) {
      console.warn(
        JSON.stringify({
          type: "memory_compression_failed",
          group: group.key,
          error: "empty summary",
        }),
      );
      return null;
    }

    const embedding = await this.tryEmbed(content);
    const summary = this.repository.insert({
      personaId: this.personaId,
      ...summaryOf(group, content),
      embedding: embedding ?? undefined,
    });
    const ids = group.memories.map((record) => record.id);
    this.repository.delete(ids);
    await this.removeFromIndex(ids);
    if (summary.embedding) await this.indexRecord(summary);
    return summary;
  }

  private async indexRecord(record: MemoryRecord): Promise<void> {
    if (!record.embedding) return;
    try {
      await this.index.upsert(record.id, record.embedding, this.metadataOf(record));
    } catch (error) {
      console.warn(
        JSON.stringify({
          type: "memory_index_upsert_failed",
          memory_id: record.id,
          error: errorMessage(error),
        }),
      );
    }
  }

  private async removeFromIndex(ids: number[]): Promise<void> {
    if (ids.length === 0) return;
    try {
      await this.index.remove(ids);
    } catch (error) {
      console.warn(
        JSON.stringify({
          type: "memory_index_remove_failed",
          ids,
          error: errorMessage(error),
        }),
      );
    }
  }

  private metadataOf(record: MemoryRecord): IndexMetadata {
    return {
      personaId: record.personaId,
      memoryType: record.memoryType,
      importance: clampImportance(record.importance),
      createdAt: record.createdAt,
    };
  }
}

function pickEvictions(records: MemoryRecord[], cap: number): MemoryRecord[] {
  const overflow = records.length - Math.max(0, cap);
  if (overflow <= 0) return [];
  return [...records].sort(evictionOrder).slice(0, overflow);
}

export function describeMemory(record: MemoryRecord): string {
  return `[${record.memoryType}, importance ${record.importance}, weight ${effectiveImportance(record).toFixed(1)}] ${record.content}`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
