import type { MemoryType } from "../types";

export interface IndexMetadata {
  personaId: string;
  memoryType: MemoryType;
  importance: number;
  createdAt: number;
}

export interface IndexFilters {
  personaId?: string;
  memoryType?: MemoryType;
  minImportance?: number;
}

export interface IndexHit {
  id: number;
  /** Cosine distance in [0, 2]. */
  distance: number;
  metadata: IndexMetadata;
}

/**
 * Nearest-neighbour lookup over memory embeddings. Implementations may be
 * remote; every method is async and may reject, in which case retrieval falls
 * back to the keyword path.
 */
export interface SimilarityIndex {
  upsert(id: number, vector: number[], metadata: IndexMetadata): Promise<void>;
  query(vector: number[], k: number, filters?: IndexFilters): Promise<IndexHit[]>;
  remove(ids: number[]): Promise<void>;
  size(): Promise<number>;
}

interface IndexEntry {
  vector: number[];
  norm: number;
  metadata: IndexMetadata;
}

export class InMemorySimilarityIndex implements SimilarityIndex {
  private readonly entries = new Map<number, IndexEntry>();

  async upsert(id: number, vector: number[], metadata: IndexMetadata): Promise<void> {
    const norm = vectorNorm(vector);
    if (norm === 0) {
      throw new Error(`Cannot index memory ${id}: zero vector`);
    }
    this.entries.set(id, { vector: [...vector], norm, metadata: { ...metadata } });
  }

  async query(
    vector: number[],
    k: number,
    filters: IndexFilters = {},
  ): Promise<IndexHit[]> {
    const norm = vectorNorm(vector);
    if (norm === 0 || k <= 0) return [];

    const hits: IndexHit[] = [];
    for (const [id, entry] of this.entries) {
      if (!matches(entry.metadata, filters)) continue;
      if (entry.vector.length !== vector.length) continue;
      hits.push({
        id,
        distance: cosineDistance(vector, norm, entry.vector, entry.norm),
        metadata: { ...entry.metadata },
      });
    }

    hits.sort((a, b) => a.distance - b.distance || a.id - b.id);
    return hits.slice(0, k);
  }

  async remove(ids: number[]): Promise<void> {
    for (const id of ids) this.entries.delete(id);
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}

function matches(metadata: IndexMetadata, filters: IndexFilters): boolean {
  if (filters.personaId && metadata.personaId !== filters.personaId) return false;
  if (filters.memoryType && metadata.memoryType !== filters.memoryType) return false;
  if (
    typeof filters.minImportance === "number" &&
    metadata.importance < filters.minImportance
  ) {
    return false;
  }
  return true;
}

function vectorNorm(vector: number[]): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

function cosineDistance(
  a: number[],
  normA: number,
  b: number[],
  normB: number,
): number {
  let dot = 0;
  for (let i = 0; i < a.length; i++) dot += a[i] * b[i];
  const cosine = Math.max(-1, Math.min(1, dot / (normA * normB)));
  return 1 - cosine;
}
