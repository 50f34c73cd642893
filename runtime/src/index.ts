import type { KindredConfig } from "./config";
import { ConsciousnessCycle } from "./consciousness";
import { initialCharacter, type RandomSource } from "./life-rhythm";
import type { MemoryCompressor } from "./memory/compression";
import { MemorySystem, type Embedder } from "./memory/memory-system";
import type { SimilarityIndex } from "./memory/similarity-index";
import { PersonaStore } from "./persona-store";
import { StateLock } from "./state-lock";
import type { CharacterState, RelationshipState } from "./types";

export interface RuntimeOptions {
  config: KindredConfig;
  databasePath: string;
  embedder?: Embedder | null;
  compressor?: MemoryCompressor | null;
  index?: SimilarityIndex;
  random?: RandomSource;
  clock?: () => Date;
}

/**
 * Kindred Runtime - owns the store, the memory subsystem, the state lock and
 * the consciousness cycle for one persona.
 */
export class Runtime {
  readonly config: KindredConfig;
  readonly store: PersonaStore;
  readonly memory: MemorySystem;
  readonly lock: StateLock;
  readonly cycle: ConsciousnessCycle;

  private constructor(
    config: KindredConfig,
    store: PersonaStore,
    memory: MemorySystem,
    lock: StateLock,
    cycle: ConsciousnessCycle,
  ) {
    this.config = config;
    this.store = store;
    this.memory = memory;
    this.lock = lock;
    this.cycle = cycle;
  }

  /**
   * Open the database, hydrate the similarity index and wire the cycle.
   * The cycle is not started.
   */
  static async create(options: RuntimeOptions): Promise<Runtime> {
    const { config } = options;
    const store = PersonaStore.create(options.databasePath);
    const memory = new MemorySystem({
      personaId: config.persona.id,
      repository: store.memories,
      config: config.memory,
      index: options.index,
      embedder: options.embedder,
      compressor: options.compressor,
    });
    const indexed = await memory.hydrate();
    if (indexed > 0) {
      console.log(`🧠 Indexed ${indexed} memories`);
    }

    const lock = new StateLock();
    const cycle = new ConsciousnessCycle({
      store,
      memory,
      lock,
      config,
      random: options.random,
      clock: options.clock,
    });

    store.loadLiveState(config.persona.id, initialCharacter(new Date(), config.life));
    return new Runtime(config, store, memory, lock, cycle);
  }

  get personaId(): string {
    return this.config.persona.id;
  }

  snapshot(now: Date = new Date()): {
    character: CharacterState;
    relationship: RelationshipState;
  } {
    return this.store.loadLiveState(
      this.personaId,
      initialCharacter(now, this.config.life),
      now.getTime(),
    );
  }

  /**
   * Stop the cycle and close the database once every started tick (with its
   * delivery and consolidation), memory write and state change has finished.
   */
  async shutdown(): Promise<void> {
    this.cycle.stop();
    await this.cycle.whenIdle();
    await this.memory.whenIdle();
    await this.lock.runExclusive(() => undefined);
    this.store.close();
  }
}

export * from "./types";
export * from "./config";
export * from "./initiative";
export * from "./life-rhythm";
export * from "./persona";
export * from "./persona-store";
export * from "./state-lock";
export * from "./consciousness";
export * from "./day-plan";
export * from "./memory/memory-system";
export * from "./memory/compression";
export * from "./memory/similarity-index";
export * from "./memory/scoring";
