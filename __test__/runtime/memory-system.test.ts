import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { parseKindredConfig } from "../../runtime/src/config";
import type { MemoryCompressor, MemoryGroup } from "../../runtime/src/memory/compression";
import { MemorySystem, type Embedder } from "../../runtime/src/memory/memory-system";
import { InMemorySimilarityIndex } from "../../runtime/src/memory/similarity-index";
import { PersonaStore } from "../../runtime/src/persona-store";

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;
const NOW = new Date(2026, 9, 21, 12, 0).getTime();
const VOCABULARY = ["hiking", "coffee", "music", "work"];

/** One dimension per known word plus a small constant, so no text embeds to zero. */
class KeywordEmbedder implements Embedder {
  calls = 0;

  async embed(text: string): Promise<number[] | null> {
    this.calls += 1;
    const lower = text.toLowerCase();
    return [...VOCABULARY.map((word) => (lower.includes(word) ? 1 : 0)), 0.01];
  }
}

class ScriptedCompressor implements MemoryCompressor {
  readonly groups: MemoryGroup[] = [];

  constructor(private readonly reply: (group: MemoryGroup) => Promise<string>) {}

  async compress(group: MemoryGroup): Promise<string> {
    this.groups.push(group);
    return this.reply(group);
  }
}

class FailingEmbedder implements Embedder {
  async embed(): Promise<number[] | null> {
    throw new Error("embedding service unavailable");
  }
}

describe("MemorySystem", () => {
  let store: PersonaStore;

  beforeEach(() => {
    store = PersonaStore.create(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  function system(
    options: {
      embedder?: Embedder | null;
      index?: InMemorySimilarityIndex;
      compressor?: MemoryCompressor;
      memory?: object;
    } = {},
  ): MemorySystem {
    return new MemorySystem({
      personaId: "elin",
      repository: store.memories,
      config: parseKindredConfig({ memory: options.memory ?? {} }).memory,
      embedder: options.embedder ?? null,
      index: options.index,
      compressor: options.compressor,
    });
  }

  describe("similarity retrieval", () => {
    it("stores with an embedding and ranks the closest memory first", async () => {
      const memory = system({ embedder: new KeywordEmbedder() });
      await memory.store({ content: "Loves hiking in the hills", memoryType: "preference", importance: 4, createdAt: NOW });
      await memory.store({ content: "Needs coffee before work", memoryType: "fact", importance: 9, createdAt: NOW });
      await memory.store({ content: "Plays music on Sundays", memoryType: "fact", importance: 6, createdAt: NOW });

      const result = await memory.retrieve("any hiking plans?", { limit: 2, now: NOW });

      expect(result.path).toBe("similarity");
      expect(result.degradedReason).toBeUndefined();
      expect(result.memories[0].record.content).toBe("Loves hiking in the hills");
      expect(result.memories[0].similarity).toBeCloseTo(1, 10);
      expect(result.memories[0].score).toBeCloseTo(0.85 + 0.04 + 0.05, 10);
      // the other two share no word with the query and fall below the floor
      expect(result.memories).toHaveLength(1);
    });

    it("neither returns nor reinforces a memory unrelated to the query", async () => {
      const memory = system({ embedder: new KeywordEmbedder() });
      const unrelated = await memory.store({
        content: "Needs coffee",
        memoryType: "fact",
        importance: 4,
        createdAt: NOW - 40 * DAY,
      });

      for (let i = 0; i < 3; i++) {
        const result = await memory.retrieve("any hiking plans?", { now: NOW });
        expect(result).toEqual({ path: "similarity", memories: [] });
      }
      expect(memory.get(unrelated.id)?.accessCount).toBe(0);
      expect(memory.get(unrelated.id)?.lastAccessedAt).toBe(NOW - 40 * DAY);

      const report = await memory.consolidate(NOW);
      expect(report.promoted).toBe(0);
      expect(report.demoted).toBe(1);
      expect(memory.get(unrelated.id)?.importance).toBe(3);
    });

    it("lets a caller lower the similarity floor", async () => {
      const memory = system({ embedder: new KeywordEmbedder() });
      await memory.store({ content: "Needs coffee", memoryType: "fact", importance: 4, createdAt: NOW });

      const result = await memory.retrieve("any hiking plans?", { minSimilarity: 0, now: NOW });
      expect(result.memories.map((hit) => hit.record.content)).toEqual(["Needs coffee"]);
      expect(result.memories[0].similarity).toBeLessThan(0.55);
    });

    it("bumps the access count of returned memories", async () => {
      const memory = system({ embedder: new KeywordEmbedder() });
      const stored = await memory.store({ content: "Morning coffee ritual", memoryType: "fact", importance: 5, createdAt: NOW - DAY });

      const first = await memory.retrieve("coffee", { now: NOW });
      expect(first.memories[0].record.accessCount).toBe(1);
      expect(first.memories[0].record.lastAccessedAt).toBe(NOW);

      await memory.retrieve("coffee", { now: NOW + 1_000 });
      const reread = memory.get(stored.id);
      expect(reread?.accessCount).toBe(2);
      expect(reread?.lastAccessedAt).toBe(NOW + 1_000);
    });

    it("respects the importance floor and type filter", async () => {
      const memory = system({ embedder: new KeywordEmbedder() });
      await memory.store({ content: "hiking once", memoryType: "event", importance: 2, createdAt: NOW });
      await memory.store({ content: "hiking every weekend", memoryType: "preference", importance: 8, createdAt: NOW });

      const floor = await memory.retrieve("hiking", { minImportance: 5, now: NOW });
      expect(floor.memories.map((hit) => hit.record.content)).toEqual(["hiking every weekend"]);

      const typed = await memory.retrieve("hiking", {
        filters: { memoryType: "event" },
        now: NOW,
      });
      expect(typed.memories.map((hit) => hit.record.content)).toEqual(["hiking once"]);
    });

    it("hydrates a fresh index from stored embeddings", async () => {
      await system({ embedder: new KeywordEmbedder() }).store({
        content: "music festival in July",
        memoryType: "event",
        importance: 7,
        createdAt: NOW,
      });

      const index = new InMemorySimilarityIndex();
      const reopened = system({ embedder: new KeywordEmbedder(), index });
      expect(await reopened.hydrate()).toBe(1);

      const result = await reopened.retrieve("music", { now: NOW });
      expect(result.path).toBe("similarity");
      expect(result.memories).toHaveLength(1);
    });

    it("drops index entries whose record is gone", async () => {
      const index = new InMemorySimilarityIndex();
      const memory = system({ embedder: new KeywordEmbedder(), index });
      const gone = await memory.store({ content: "work deadline", memoryType: "event", importance: 5, createdAt: NOW });
      await memory.store({ content: "work trip", memoryType: "event", importance: 5, createdAt: NOW });
      store.memories.delete([gone.id]);

      const result = await memory.retrieve("work", { now: NOW });
      expect(result.memories.map((hit) => hit.record.content)).toEqual(["work trip"]);
      expect(await index.size()).toBe(1);
    });
  });

  describe("keyword fallback", () => {
    beforeEach(() => {
      const seed = [
        { content: "Walked the dog by the river", importance: 3, createdAt: NOW - 2 * DAY },
        { content: "The dog is called Pepper", importance: 8, createdAt: NOW - 3 * DAY },
        { content: "River swimming in summer", importance: 8, createdAt: NOW - DAY },
        { content: "Allergic to cats", importance: 9, createdAt: NOW },
      ];
      for (const entry of seed) {
        store.memories.insert({ personaId: "elin", memoryType: "fact", ...entry });
      }
    });

    it("reports the keyword path when no embedder is configured", async () => {
      const result = await system().retrieve("dog river", { now: NOW });
      expect(result.path).toBe("keyword");
      expect(result.degradedReason).toBe("no embedding service configured");
      expect(result.memories.map((hit) => hit.record.content)).toEqual([
        "River swimming in summer",
        "The dog is called Pepper",
        "Walked the dog by the river",
      ]);
      expect(result.memories.map((hit) => hit.score)).toEqual([0.5, 0.5, 1]);
    });

    it("falls back when the embedding service throws", async () => {
      const result = await system({ embedder: new FailingEmbedder() }).retrieve("pepper", {
        now: NOW,
      });
      expect(result.path).toBe("keyword");
      expect(result.degradedReason).toBe("embedding service unavailable");
      expect(result.memories.map((hit) => hit.record.content)).toEqual([
        "The dog is called Pepper",
      ]);
      expect(result.memories[0].record.accessCount).toBe(1);
    });

    it("falls back when the index has no candidates", async () => {
      const result = await system({ embedder: new KeywordEmbedder() }).retrieve("cats", {
        now: NOW,
      });
      expect(result.path).toBe("keyword");
      expect(result.degradedReason).toBe("similarity index returned no candidates");
      expect(result.memories.map((hit) => hit.record.content)).toEqual(["Allergic to cats"]);
    });

    it("returns nothing for a query without usable words", async () => {
      const result = await system().retrieve("a b", { now: NOW });
      expect(result.memories).toEqual([]);
    });
  });

  describe("consolidation", () => {
    const CONSOLIDATE_AT = new Date(2026, 9, 21, 4, 0).getTime();

    it("evicts the least important of today's memories down to the daily cap", async () => {
      const memory = system({ memory: { dailyMemoryCap: 50 } });
      const low: number[] = [];
      for (let i = 0; i < 60; i++) {
        const record = store.memories.insert({
          personaId: "elin",
          content: `note ${i}`,
          memoryType: "fact",
          importance: i % 6 === 0 ? 2 : 7,
          createdAt: CONSOLIDATE_AT - (60 - i) * 1_000,
        });
        if (record.importance === 2) low.push(record.id);
      }
      expect(low).toHaveLength(10);

      const report = await memory.consolidate(CONSOLIDATE_AT);

      expect(report).toEqual({
        ranAt: CONSOLIDATE_AT,
        reviewed: 60,
        promoted: 0,
        demoted: 0,
        evictedDaily: 10,
        evictedWorking: 0,
        compressedGroups: 0,
        compressedMemories: 0,
        remaining: 50,
      });
      for (const id of low) {
        expect(memory.get(id)).toBeNull();
      }
      expect(store.memories.count("elin")).toBe(50);
    });

    it("evicts the ten weakest of sixty memories against a working cap of fifty", async () => {
      const memory = system({ memory: { workingMemoryCap: 50 } });
      const low: number[] = [];
      for (let i = 0; i < 60; i++) {
        const record = store.memories.insert({
          personaId: "elin",
          content: `older note ${i}`,
          memoryType: "event",
          importance: i % 6 === 3 ? 2 : 7,
          createdAt: CONSOLIDATE_AT - 2 * DAY - i * 1_000,
        });
        if (record.importance === 2) low.push(record.id);
      }

      const report = await memory.consolidate(CONSOLIDATE_AT);

      expect(report.evictedDaily).toBe(0);
      expect(report.evictedWorking).toBe(10);
      expect(report.remaining).toBe(50);
      expect(low.map((id) => memory.get(id))).toEqual(Array(10).fill(null));
      expect(memory.list().every((record) => record.importance === 7)).toBe(true);
    });

    it("evicts the oldest among equals down to the working cap", async () => {
      const memory = system({ memory: { workingMemoryCap: 5 } });
      const ids: number[] = [];
      for (let day = 8; day >= 2; day--) {
        ids.push(
          store.memories.insert({
            personaId: "elin",
            content: `day ${day}`,
            memoryType: "event",
            importance: 6,
            createdAt: CONSOLIDATE_AT - day * DAY,
          }).id,
        );
      }

      const report = await memory.consolidate(CONSOLIDATE_AT);

      expect(report.evictedDaily).toBe(0);
      expect(report.evictedWorking).toBe(2);
      expect(report.remaining).toBe(5);
      expect(memory.list().map((record) => record.content)).toEqual([
        "day 2",
        "day 3",
        "day 4",
        "day 5",
        "day 6",
      ]);
      expect(ids.slice(0, 2).map((id) => memory.get(id))).toEqual([null, null]);
    });

    it("promotes used memories and demotes forgotten mild ones", async () => {
      const memory = system();
      const used = store.memories.insert({ personaId: "elin", content: "used", memoryType: "fact", importance: 5, createdAt: CONSOLIDATE_AT - 3 * DAY });
      store.memories.touch([used.id, used.id, used.id], CONSOLIDATE_AT - DAY);
      const stale = store.memories.insert({ personaId: "elin", content: "stale", memoryType: "fact", importance: 4, createdAt: CONSOLIDATE_AT - 40 * DAY });

      const report = await memory.consolidate(CONSOLIDATE_AT);

      expect(report.promoted).toBe(1);
      expect(report.demoted).toBe(1);
      expect(memory.get(used.id)?.importance).toBe(6);
      expect(memory.get(stale.id)?.importance).toBe(3);
    });
  });

  describe("compression", () => {
    const CONSOLIDATE_AT = new Date(2026, 9, 21, 4, 0).getTime();
    const AGED = CONSOLIDATE_AT - 10 * DAY;

    function seedAgedGroup(): number[] {
      const ids: number[] = [];
      [4, 6, 5, 5].forEach((importance, i) => {
        ids.push(
          store.memories.insert({
            personaId: "elin",
            content: `bike repair step ${i}`,
            memoryType: "event",
            importance,
            emotionalIntensity: 7,
            createdAt: AGED + i * MINUTE,
          }).id,
        );
      });
      // a different intensity band, too small to condense
      for (let i = 0; i < 2; i++) {
        store.memories.insert({
          personaId: "elin",
          content: `rainy commute ${i}`,
          memoryType: "event",
          importance: 5,
          emotionalIntensity: 2,
          createdAt: AGED + i * MINUTE,
        });
      }
      // too recent
      store.memories.insert({
        personaId: "elin",
        content: "new bike bell",
        memoryType: "event",
        importance: 5,
        emotionalIntensity: 7,
        createdAt: CONSOLIDATE_AT - 2 * DAY,
      });
      return ids;
    }

    it("replaces an aged group with one summary", async () => {
      const compressor = new ScriptedCompressor(async () => "  Spent a week fixing the bike together.  ");
      const memory = system({ compressor });
      const originals = seedAgedGroup();

      const report = await memory.consolidate(CONSOLIDATE_AT);

      expect(report.reviewed).toBe(7);
      expect(report.compressedGroups).toBe(1);
      expect(report.compressedMemories).toBe(4);
      expect(report.remaining).toBe(4);
      expect(compressor.groups).toHaveLength(1);
      expect(compressor.groups[0].band).toBe("medium");
      expect(compressor.groups[0].day).toBe("2026-10-11");
      expect(compressor.groups[0].memories.map((record) => record.id)).toEqual(originals);

      expect(originals.map((id) => memory.get(id))).toEqual([null, null, null, null]);
      const summary = memory.list().find((record) => record.content === "Spent a week fixing the bike together.");
      expect(summary).toMatchObject({
        memoryType: "event",
        importance: 6,
        emotionalIntensity: 7,
        createdAt: AGED + 3 * MINUTE,
      });
      expect(store.memories.count("elin")).toBe(4);
    });

    it("keeps the group when the summary cannot be written", async () => {
      const memory = system({
        compressor: new ScriptedCompressor(async () => {
          throw new Error("analytics quota exhausted");
        }),
      });
      const originals = seedAgedGroup();

      const report = await memory.consolidate(CONSOLIDATE_AT);

      expect(report.compressedGroups).toBe(0);
      expect(report.compressedMemories).toBe(0);
      expect(report.remaining).toBe(7);
      expect(originals.every((id) => memory.get(id) !== null)).toBe(true);
    });

    it("keeps the group when the summary is blank", async () => {
      const memory = system({ compressor: new ScriptedCompressor(async () => "   ") });
      seedAgedGroup();

      const report = await memory.consolidate(CONSOLIDATE_AT);
      expect(report.compressedGroups).toBe(0);
      expect(store.memories.count("elin")).toBe(7);
    });

    it("skips compression when it is switched off", async () => {
      const compressor = new ScriptedCompressor(async () => "summary");
      const memory = system({ compressor, memory: { compression: { enabled: false } } });
      seedAgedGroup();

      await memory.consolidate(CONSOLIDATE_AT);
      expect(compressor.groups).toEqual([]);
    });

    it("indexes the summary in place of the originals", async () => {
      const index = new InMemorySimilarityIndex();
      const memory = system({
        embedder: new KeywordEmbedder(),
        index,
        compressor: new ScriptedCompressor(async () => "Loves music festivals"),
      });
      for (let i = 0; i < 3; i++) {
        await memory.store({
          content: `music night ${i}`,
          memoryType: "event",
          importance: 5,
          createdAt: AGED + i * MINUTE,
        });
      }
      expect(await index.size()).toBe(3);

      await memory.consolidate(CONSOLIDATE_AT);

      expect(await index.size()).toBe(1);
      const result = await memory.retrieve("music", { now: CONSOLIDATE_AT });
      expect(result.memories.map((hit) => hit.record.content)).toEqual(["Loves music festivals"]);
    });
  });

  it("forgets a memory and removes it from the index", async () => {
    const index = new InMemorySimilarityIndex();
    const memory = system({ embedder: new KeywordEmbedder(), index });
    const record = await memory.store({ content: "coffee with oat milk", memoryType: "preference", importance: 5, createdAt: NOW });

    expect(await memory.forget(record.id)).toBe(true);
    expect(await memory.forget(record.id)).toBe(false);
    expect(await index.size()).toBe(0);
  });

  it("summarises stored memories", async () => {
    const memory = system({ embedder: new KeywordEmbedder() });
    await memory.store({ content: "coffee", memoryType: "preference", importance: 4, createdAt: NOW });
    await memory.store({ content: "music", memoryType: "event", importance: 7, createdAt: NOW });

    expect(await memory.stats()).toEqual({
      total: 2,
      byType: { fact: 0, preference: 1, event: 1, emotion: 0 },
      indexed: 2,
      averageImportance: 5.5,
    });
  });
});
