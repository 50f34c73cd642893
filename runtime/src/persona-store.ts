import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { clampLevel } from "./life-rhythm";
import {
  parseActivity,
  parseMemoryType,
  parseMood,
  type Activity,
  type CharacterState,
  type ConversationKind,
  type ConversationRecord,
  type MemoryRecord,
  type MemoryType,
  type Mood,
  type RelationshipState,
  type StateEvent,
  type StateEventType,
} from "./types";

export interface CharacterDefaults {
  mood: Mood;
  energyLevel: number;
  currentActivity: Activity;
  location: string;
}

export interface NewConversation {
  personaId: string;
  userMessage: string;
  response: string;
  moodBefore: Mood;
  moodAfter: Mood;
  kind: ConversationKind;
  topic?: string;
  createdAt?: number;
}

export interface NewMemory {
  personaId: string;
  content: string;
  memoryType: MemoryType;
  importance: number;
  emotionalIntensity?: number;
  embedding?: number[];
  sourceConversationId?: number;
  createdAt?: number;
}

export interface MemoryFilters {
  memoryType?: MemoryType;
  minImportance?: number;
  createdFrom?: number;
  createdTo?: number;
  limit?: number;
}

export interface NewStateEvent {
  personaId: string;
  eventType: StateEventType;
  description: string;
  changes: Record<string, unknown>;
  trigger: string;
  createdAt?: number;
}

interface CharacterRow {
  persona_id: string;
  mood: string | null;
  energy_level: number | null;
  current_activity: string | null;
  location: string | null;
  last_message_at: number | null;
  updated_at: number;
}

interface RelationshipRow {
  persona_id: string;
  intimacy_level: number | null;
  interaction_count: number | null;
  last_interaction_at: number | null;
}

interface ConversationRow {
  id: number;
  persona_id: string;
  user_message: string;
  response: string;
  mood_before: string | null;
  mood_after: string | null;
  kind: string;
  topic: string | null;
  created_at: number;
}

interface MemoryRow {
  id: number;
  persona_id: string;
  content: string;
  memory_type: string;
  importance: number | null;
  emotional_intensity: number | null;
  access_count: number | null;
  created_at: number;
  last_accessed_at: number | null;
  embedding: string | null;
  source_conversation_id: number | null;
}

interface StateEventRow {
  id: number;
  persona_id: string;
  event_type: string;
  description: string;
  changes: string;
  trigger: string;
  created_at: number;
}

// ── Live state ──────────────────────────────────────────────────────────────

export class CharacterRepository {
  constructor(private readonly db: Database.Database) {}

  ensure(personaId: string, defaults: CharacterDefaults, now = Date.now()): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO character_state (
          persona_id, mood, energy_level, current_activity, location, last_message_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, NULL, ?)`,
      )
      .run(
        personaId,
        defaults.mood,
        defaults.energyLevel,
        defaults.currentActivity,
        defaults.location,
        now,
      );

    this.db
      .prepare(
        `INSERT OR IGNORE INTO relationship_state (
          persona_id, intimacy_level, interaction_count, last_interaction_at
        ) VALUES (?, 0, 0, NULL)`,
      )
      .run(personaId);
  }

  getCharacter(personaId: string): CharacterState | null {
    const row = this.db
      .prepare(`SELECT * FROM character_state WHERE persona_id = ?`)
      .get(personaId) as CharacterRow | undefined;
    return row ? rowToCharacter(row) : null;
  }

  saveCharacter(state: CharacterState): void {
    this.db
      .prepare(
        `INSERT INTO character_state (
          persona_id, mood, energy_level, current_activity, location, last_message_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(persona_id) DO UPDATE SET
          mood = excluded.mood,
          energy_level = excluded.energy_level,
          current_activity = excluded.current_activity,
          location = excluded.location,
          last_message_at = excluded.last_message_at,
          updated_at = excluded.updated_at`,
      )
      .run(
        state.personaId,
        state.mood,
        clampLevel(state.energyLevel),
        state.currentActivity,
        state.location,
        state.lastMessageAt,
        state.updatedAt,
      );
  }

  getRelationship(personaId: string): RelationshipState | null {
    const row = this.db
      .prepare(`SELECT * FROM relationship_state WHERE persona_id = ?`)
      .get(personaId) as RelationshipRow | undefined;
    return row ? rowToRelationship(row) : null;
  }

  saveRelationship(state: RelationshipState): void {
    this.db
      .prepare(
        `INSERT INTO relationship_state (
          persona_id, intimacy_level, interaction_count, last_interaction_at
        ) VALUES (?, ?, ?, ?)
        ON CONFLICT(persona_id) DO UPDATE SET
          intimacy_level = excluded.intimacy_level,
          interaction_count = excluded.interaction_count,
          last_interaction_at = excluded.last_interaction_at`,
      )
      .run(
        state.personaId,
        Math.max(0, Math.min(100, state.intimacyLevel)),
        Math.max(0, Math.floor(state.interactionCount)),
        state.lastInteractionAt,
      );
  }

  getMeta(personaId: string, key: string): string | null {
    const row = this.db
      .prepare(`SELECT value FROM meta WHERE persona_id = ? AND key = ?`)
      .get(personaId, key) as { value?: string } | undefined;
    return typeof row?.value === "string" ? row.value : null;
  }

  setMeta(personaId: string, key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO meta (persona_id, key, value) VALUES (?, ?, ?)
         ON CONFLICT(persona_id, key) DO UPDATE SET value = excluded.value`,
      )
      .run(personaId, key, value);
  }
}

// ── Append-only history ─────────────────────────────────────────────────────

export class HistoryRepository {
  constructor(private readonly db: Database.Database) {}

  appendConversation(input: NewConversation): ConversationRecord {
    const createdAt = input.createdAt ?? Date.now();
    const result = this.db
      .prepare(
        `INSERT INTO conversations (
          persona_id, user_message, response, mood_before, mood_after, kind, topic, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.personaId,
        input.userMessage,
        input.response,
        input.moodBefore,
        input.moodAfter,
        input.kind,
        input.topic ?? null,
        createdAt,
      );

    return {
      id: Number(result.lastInsertRowid),
      personaId: input.personaId,
      userMessage: input.userMessage,
      response: input.response,
      moodBefore: input.moodBefore,
      moodAfter: input.moodAfter,
      kind: input.kind,
      topic: input.topic,
      createdAt,
    };
  }

  /** Most recent first. */
  recentConversations(personaId: string, limit = 20): ConversationRecord[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM conversations
         WHERE persona_id = ?
         ORDER BY created_at DESC, id DESC
         LIMIT ?`,
      )
      .all(personaId, Math.max(1, Math.min(200, limit))) as ConversationRow[];
    return rows.map(rowToConversation);
  }

  countInitiativesSince(personaId: string, sinceMs: number): number {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS count FROM conversations
         WHERE persona_id = ? AND kind = 'initiative' AND created_at >= ?`,
      )
      .get(personaId, sinceMs) as { count?: number } | undefined;
    return Number(row?.count || 0);
  }

  /** Oldest first, so the last entries are the most recent topics. */
  recentInitiativeTopics(personaId: string, limit = 3): string[] {
    const rows = this.db
      .prepare(
        `SELECT topic FROM conversations
         WHERE persona_id = ? AND kind = 'initiative' AND topic IS NOT NULL
         ORDER BY created_at DESC, id DESC
         LIMIT ?`,
      )
      .all(personaId, Math.max(1, limit)) as Array<{ topic: string }>;
    return rows.map((row) => row.topic).reverse();
  }

  appendStateEvent(input: NewStateEvent): StateEvent {
    const createdAt = input.createdAt ?? Date.now();
    const result = this.db
      .prepare(
        `INSERT INTO state_events (
          persona_id, event_type, description, changes, trigger, created_at
        ) VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.personaId,
        input.eventType,
        input.description,
        safeStringify(input.changes),
        input.trigger,
        createdAt,
      );

    return {
      id: Number(result.lastInsertRowid),
      personaId: input.personaId,
      eventType: input.eventType,
      description: input.description,
      changes: input.changes,
      trigger: input.trigger,
      createdAt,
    };
  }

  recentStateEvents(personaId: string, limit = 20): StateEvent[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM state_events
         WHERE persona_id = ?
         ORDER BY created_at DESC, id DESC
         LIMIT ?`,
      )
      .all(personaId, Math.max(1, Math.min(200, limit))) as StateEventRow[];
    return rows.map(rowToStateEvent);
  }
}

// ── Memories ────────────────────────────────────────────────────────────────

export class MemoryRepository {
  constructor(private readonly db: Database.Database) {}

  insert(input: NewMemory): MemoryRecord {
    const createdAt = input.createdAt ?? Date.now();
    const importance = clampImportance(input.importance);
    const intensity = Math.max(0, input.emotionalIntensity ?? 0);
    const embedding = isVector(input.embedding) ? input.embedding : undefined;

    const result = this.db
      .prepare(
        `INSERT INTO memories (
          persona_id, content, memory_type, importance, emotional_intensity,
          access_count, created_at, last_accessed_at, embedding, source_conversation_id
        ) VALUES (?, ?, ?, ?, ?, 0, ?, ?, ?, ?)`,
      )
      .run(
        input.personaId,
        input.content,
        input.memoryType,
        importance,
        intensity,
        createdAt,
        createdAt,
        embedding ? JSON.stringify(embedding) : null,
        input.sourceConversationId ?? null,
      );

    return {
      id: Number(result.lastInsertRowid),
      personaId: input.personaId,
      content: input.content,
      memoryType: input.memoryType,
      importance,
      emotionalIntensity: intensity,
      accessCount: 0,
      createdAt,
      lastAccessedAt: createdAt,
      embedding,
      sourceConversationId: input.sourceConversationId,
    };
  }

  get(id: number): MemoryRecord | null {
    const row = this.db
      .prepare(`SELECT * FROM memories WHERE id = ?`)
      .get(id) as MemoryRow | undefined;
    return row ? rowToMemory(row) : null;
  }

  /** Newest first, insertion order breaking ties. */
  list(personaId: string, filters: MemoryFilters = {}): MemoryRecord[] {
    const clauses = ["persona_id = ?"];
    const params: Array<string | number> = [personaId];

    if (filters.memoryType) {
      clauses.push("memory_type = ?");
      params.push(filters.memoryType);
    }
    if (typeof filters.minImportance === "number") {
      clauses.push("COALESCE(importance, 1) >= ?");
      params.push(filters.minImportance);
    }
    if (typeof filters.createdFrom === "number") {
      clauses.push("created_at >= ?");
      params.push(filters.createdFrom);
    }
    if (typeof filters.createdTo === "number") {
      clauses.push("created_at < ?");
      params.push(filters.createdTo);
    }

    let sql = `SELECT * FROM memories WHERE ${clauses.join(" AND ")}
               ORDER BY created_at DESC, id DESC`;
    if (typeof filters.limit === "number") {
      sql += " LIMIT ?";
      params.push(Math.max(1, Math.floor(filters.limit)));
    }

    const rows = this.db.prepare(sql).all(...params) as MemoryRow[];
    return rows.map(rowToMemory);
  }

  /** Only records carrying a usable embedding, for hydrating the similarity index. */
  listEmbedded(personaId: string): MemoryRecord[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM memories WHERE persona_id = ? AND embedding IS NOT NULL ORDER BY id ASC`,
      )
      .all(personaId) as MemoryRow[];
    return rows.map(rowToMemory).filter((record) => record.embedding);
  }

  count(personaId: string): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS count FROM memories WHERE persona_id = ?`)
      .get(personaId) as { count?: number } | undefined;
    return Number(row?.count || 0);
  }

  countByType(personaId: string): Record<MemoryType, number> {
    const rows = this.db
      .prepare(
        `SELECT memory_type, COUNT(*) AS count FROM memories
         WHERE persona_id = ? GROUP BY memory_type`,
      )
      .all(personaId) as Array<{ memory_type: string; count: number }>;

    const counts: Record<MemoryType, number> = {
      fact: 0,
      preference: 0,
      event: 0,
      emotion: 0,
    };
    for (const row of rows) {
      counts[parseMemoryType(row.memory_type)] += Number(row.count || 0);
    }
    return counts;
  }

  touch(ids: number[], now = Date.now()): void {
    if (ids.length === 0) return;
    const statement = this.db.prepare(
      `UPDATE memories SET access_count = COALESCE(access_count, 0) + 1, last_accessed_at = ? WHERE id = ?`,
    );
    const run = this.db.transaction((batch: number[]) => {
      for (const id of batch) statement.run(now, id);
    });
    run(ids);
  }

  updateImportance(updates: Array<{ id: number; importance: number }>): void {
    if (updates.length === 0) return;
    const statement = this.db.prepare(
      `UPDATE memories SET importance = ? WHERE id = ?`,
    );
    const run = this.db.transaction(
      (batch: Array<{ id: number; importance: number }>) => {
        for (const update of batch) {
          statement.run(clampImportance(update.importance), update.id);
        }
      },
    );
    run(updates);
  }

  delete(ids: number[]): number {
    if (ids.length === 0) return 0;
    const statement = this.db.prepare(`DELETE FROM memories WHERE id = ?`);
    const run = this.db.transaction((batch: number[]) => {
      let removed = 0;
      for (const id of batch) removed += statement.run(id).changes;
      return removed;
    });
    return run(ids);
  }
}

// ── Facade ──────────────────────────────────────────────────────────────────

export class PersonaStore {
  private readonly db: Database.Database;
  readonly state: CharacterRepository;
  readonly history: HistoryRepository;
  readonly memories: MemoryRepository;

  private constructor(db: Database.Database) {
    this.db = db;
    this.state = new CharacterRepository(db);
    this.history = new HistoryRepository(db);
    this.memories = new MemoryRepository(db);
  }

  static create(path: string): PersonaStore {
    const dir = dirname(path);
    if (path !== ":memory:" && dir && !existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");

    const store = new PersonaStore(db);
    store.initializeSchema();
    return store;
  }

  /** Live character and relationship rows, created from `defaults` on first use. */
  loadLiveState(
    personaId: string,
    defaults: CharacterDefaults,
    now = Date.now(),
  ): { character: CharacterState; relationship: RelationshipState } {
    this.state.ensure(personaId, defaults, now);
    const character = this.state.getCharacter(personaId);
    const relationship = this.state.getRelationship(personaId);
    if (!character || !relationship) {
      throw new Error(`Live state for persona "${personaId}" could not be created`);
    }
    return { character, relationship };
  }

  close(): void {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS character_state (
        persona_id TEXT PRIMARY KEY,
        mood TEXT,
        energy_level INTEGER,
        current_activity TEXT,
        location TEXT,
        last_message_at INTEGER,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS relationship_state (
        persona_id TEXT PRIMARY KEY,
        intimacy_level REAL NOT NULL DEFAULT 0,
        interaction_count INTEGER NOT NULL DEFAULT 0,
        last_interaction_at INTEGER
      );

      CREATE TABLE IF NOT EXISTS conversations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        persona_id TEXT NOT NULL,
        user_message TEXT NOT NULL,
        response TEXT NOT NULL,
        mood_before TEXT,
        mood_after TEXT,
        kind TEXT NOT NULL DEFAULT 'response',
        topic TEXT,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS memories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        persona_id TEXT NOT NULL,
        content TEXT NOT NULL,
        memory_type TEXT NOT NULL DEFAULT 'fact',
        importance INTEGER,
        emotional_intensity REAL NOT NULL DEFAULT 0,
        access_count INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        last_accessed_at INTEGER,
        embedding TEXT,
        source_conversation_id INTEGER,
        FOREIGN KEY (source_conversation_id) REFERENCES conversations(id) ON DELETE SET NULL
      );

      CREATE TABLE IF NOT EXISTS state_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        persona_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        description TEXT NOT NULL,
        changes TEXT NOT NULL DEFAULT '{}',
        trigger TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS meta (
        persona_id TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (persona_id, key)
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_persona ON conversations(persona_id, kind, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_memories_persona ON memories(persona_id, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_state_events_persona ON state_events(persona_id, created_at DESC);
    `);
  }
}

// ── Row mapping ─────────────────────────────────────────────────────────────

function rowToCharacter(row: CharacterRow): CharacterState {
  return {
    personaId: String(row.persona_id),
    mood: parseMood(row.mood),
    energyLevel: clampLevel(Number(row.energy_level ?? 50)),
    currentActivity: parseActivity(row.current_activity),
    location: row.location ? String(row.location) : "unknown",
    lastMessageAt:
      typeof row.last_message_at === "number" ? row.last_message_at : null,
    updatedAt: Number(row.updated_at || 0),
  };
}

function rowToRelationship(row: RelationshipRow): RelationshipState {
  return {
    personaId: String(row.persona_id),
    intimacyLevel: Math.max(0, Math.min(100, Number(row.intimacy_level ?? 0))),
    interactionCount: Number(row.interaction_count || 0),
    lastInteractionAt:
      typeof row.last_interaction_at === "number"
        ? row.last_interaction_at
        : null,
  };
}

function rowToConversation(row: ConversationRow): ConversationRecord {
  return {
    id: Number(row.id),
    personaId: String(row.persona_id),
    userMessage: String(row.user_message),
    response: String(row.response),
    moodBefore: parseMood(row.mood_before),
    moodAfter: parseMood(row.mood_after),
    kind: row.kind === "initiative" ? "initiative" : "response",
    topic: row.topic ?? undefined,
    createdAt: Number(row.created_at || 0),
  };
}

function rowToMemory(row: MemoryRow): MemoryRecord {
  const createdAt = Number(row.created_at || 0);
  return {
    id: Number(row.id),
    personaId: String(row.persona_id),
    content: String(row.content),
    memoryType: parseMemoryType(row.memory_type),
    importance:
      typeof row.importance === "number" ? clampImportance(row.importance) : 1,
    emotionalIntensity: Math.max(0, Number(row.emotional_intensity || 0)),
    accessCount: Number(row.access_count || 0),
    createdAt,
    lastAccessedAt:
      typeof row.last_accessed_at === "number" ? row.last_accessed_at : createdAt,
    embedding: parseEmbedding(row.embedding),
    sourceConversationId:
      typeof row.source_conversation_id === "number"
        ? row.source_conversation_id
        : undefined,
  };
}

function rowToStateEvent(row: StateEventRow): StateEvent {
  const eventType: StateEventType =
    row.event_type === "random" || row.event_type === "triggered"
      ? row.event_type
      : "automatic";
  return {
    id: Number(row.id),
    personaId: String(row.persona_id),
    eventType,
    description: String(row.description),
    changes: safeParseJson(row.changes),
    trigger: String(row.trigger),
    createdAt: Number(row.created_at || 0),
  };
}

// ── Helpers ─────────────────────────────────────────────────────────────────

export function clampImportance(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.round(Math.max(1, Math.min(10, value)));
}

export function isVector(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((entry) => typeof entry === "number" && Number.isFinite(entry))
  );
}

function parseEmbedding(value: string | null): number[] | undefined {
  if (!value) return undefined;
  try {
    const parsed: unknown = JSON.parse(value);
    return isVector(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value ?? {});
  } catch {
    return "{}";
  }
}

function safeParseJson(value: unknown): Record<string, unknown> {
  if (typeof value !== "string" || !value.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return {};
  } catch {
    return {};
  }
}
