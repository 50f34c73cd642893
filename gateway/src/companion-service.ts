import { z } from "zod";
import type { Message, TextGenerator } from "../../agent/src/index.js";
import type {
  InitiativeOutcome,
  InitiativeRequest,
} from "../../runtime/src/consciousness.js";
import type { Runtime } from "../../runtime/src/index.js";
import {
  reactToExchange,
  relationshipAfterExchange,
} from "../../runtime/src/life-rhythm.js";
import type { RetrievalResult } from "../../runtime/src/memory/memory-system.js";
import type {
  CharacterState,
  ConversationRecord,
  RelationshipState,
} from "../../runtime/src/types.js";
import { planDelivery, type OutboundDelivery } from "./pacing.js";

/** Anything that can put messages in front of the operator. */
export interface CompanionTransport {
  /** Resolves to false when nothing was sent. */
  deliver(outbound: OutboundDelivery): Promise<boolean>;
}

export interface CompanionServiceConfig {
  personaSheet: string;
  historyLimit?: number;
  extractMemories?: boolean;
}

export interface CompanionReply extends OutboundDelivery {
  conversationId: number;
  memoryPath: RetrievalResult["path"];
  memoriesUsed: number;
}

const extractionSchema = z.object({
  memories: z
    .array(
      z.object({
        content: z.string().trim().min(1).max(500),
        type: z.enum(["fact", "preference", "event", "emotion"]).catch("fact"),
        importance: z.coerce.number().min(1).max(10),
        emotionalIntensity: z.coerce.number().min(0).max(10).default(0),
      }),
    )
    .max(5)
    .default([]),
});

export type ExtractedMemory = z.infer<typeof extractionSchema>["memories"][number];

/**
 * Pull a JSON object out of a model reply and validate it. Returns an empty
 * list when the reply has no usable JSON.
 */
export function parseExtractedMemories(raw: string): ExtractedMemory[] {
  const match = raw.match(/\{[\s\S]*\}/);
  if (!match) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch {
    return [];
  }
  const result = extractionSchema.safeParse(parsed);
  return result.success ? result.data.memories : [];
}

export class CompanionService {
  private readonly historyLimit: number;
  private readonly pending = new Set<Promise<void>>();
  private transport: CompanionTransport | null = null;

  constructor(
    private readonly runtime: Runtime,
    private readonly generator: TextGenerator,
    private readonly config: CompanionServiceConfig,
  ) {
    this.historyLimit = config.historyLimit ?? 8;
  }

  setTransport(transport: CompanionTransport): void {
    this.transport = transport;
  }

  /**
   * One conversation turn: recall memories, generate the reply outside the
   * state lock, then record the exchange and its effect on the character.
   * Generation failures propagate to the channel.
   */
  async handleUserMessage(
    text: string,
    now: Date = new Date(),
  ): Promise<CompanionReply> {
    const userMessage = String(text || "").trim();
    const { character: before, relationship } = this.runtime.snapshot(now);

    const recall = await this.runtime.memory.retrieve(userMessage, {
      now: now.getTime(),
    });
    const history = this.runtime.store.history
      .recentConversations(this.runtime.personaId, this.historyLimit)
      .reverse();

    const response = await this.generator.generate({
      category: "dialogue",
      messages: [
        {
          role: "system",
          content: this.buildSystemPrompt(before, relationship, recall),
        },
        ...historyToMessages(history),
        { role: "user", content: userMessage },
      ],
    });
    const reply = response.content.trim();

    const { record, after } = await this.runtime.lock.runExclusive(() => {
      const live = this.runtime.snapshot(now);
      const character = reactToExchange(
        live.character,
        userMessage,
        now,
        this.runtime.config.life,
      );
      this.runtime.store.state.saveCharacter(character);
      this.runtime.store.state.saveRelationship(
        relationshipAfterExchange(live.relationship, now, this.runtime.config.life),
      );
      const conversation = this.runtime.store.history.appendConversation({
        personaId: this.runtime.personaId,
        userMessage,
        response: reply,
        moodBefore: before.mood,
        moodAfter: character.mood,
        kind: "response",
        createdAt: now.getTime(),
      });
      if (character.mood !== live.character.mood) {
        this.runtime.store.history.appendStateEvent({
          personaId: this.runtime.personaId,
          eventType: "triggered",
          description: `mood ${live.character.mood} → ${character.mood}`,
          changes: { mood: { from: live.character.mood, to: character.mood } },
          trigger: "user_message",
          createdAt: now.getTime(),
        });
      }
      return { record: conversation, after: character };
    });

    if (this.config.extractMemories !== false) {
      this.track(this.extractMemories(userMessage, reply, record.id, now));
    }

    console.log(
      JSON.stringify({
        type: "companion_reply",
        conversation_id: record.id,
        memory_path: recall.path,
        memories_used: recall.memories.length,
        mood_before: before.mood,
        mood_after: after.mood,
      }),
    );

    return {
      ...planDelivery(reply, after),
      conversationId: record.id,
      memoryPath: recall.path,
      memoriesUsed: recall.memories.length,
    };
  }

  /**
   * Write and send a proactive message. Any failure suppresses the message
   * for this tick; the cycle then leaves its bookkeeping untouched.
   */
  async deliverInitiative(request: InitiativeRequest): Promise<InitiativeOutcome> {
    const transport = this.transport;
    if (!transport) {
      return { delivered: false, reason: "no transport" };
    }

    let text: string;
    try {
      const recall = await this.runtime.memory.retrieve(request.topic, {
        now: request.requestedAt,
      });
      const response = await this.generator.generate({
        category: "dialogue",
        messages: [
          {
            role: "system",
            content: this.buildSystemPrompt(
              request.character,
              request.relationship,
              recall,
            ),
          },
          {
            role: "user",
            content: [
              "[You are writing first. The operator has not messaged you.]",
              `Topic: ${request.topic}.`,
              `Why now: ${request.decision.reason}.`,
              "Write one to three short chat messages separated by blank lines. No greeting formulas.",
            ].join("\n"),
          },
        ],
      });
      text = response.content.trim();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error("⚠️ Initiative generation failed:", reason);
      return { delivered: false, reason };
    }

    if (!text) {
      return { delivered: false, reason: "empty generation" };
    }

    const outbound = planDelivery(text, request.character);
    let sent: boolean;
    try {
      sent = await transport.deliver(outbound);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error("⚠️ Initiative transport failed:", reason);
      return { delivered: false, reason };
    }

    return sent
      ? { delivered: true, text: outbound.messages.join("\n\n") }
      : { delivered: false, reason: "transport declined" };
  }

  /**
   * Short human-readable summary of the persona's live state.
   */
  describeState(now: Date = new Date()): string {
    const { character, relationship } = this.runtime.snapshot(now);
    const lastMessage =
      character.lastMessageAt === null
        ? "never"
        : new Date(character.lastMessageAt).toLocaleString();
    return [
      `${this.runtime.config.persona.name} is ${character.currentActivity} at ${character.location}.`,
      `Mood: ${character.mood}, energy ${character.energyLevel}/100.`,
      `Closeness: ${Math.round(relationship.intimacyLevel)}/100 over ${relationship.interactionCount} exchanges.`,
      `Last message: ${lastMessage}.`,
    ].join("\n");
  }

  /** Wait for background memory extraction to finish. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private buildSystemPrompt(
    character: CharacterState,
    relationship: RelationshipState,
    recall: RetrievalResult,
  ): string {
    const sections = [this.config.personaSheet.trim()];

    sections.push(
      [
        "## Right now",
        `- activity: ${character.currentActivity} (${character.location})`,
        `- mood: ${character.mood}`,
        `- energy: ${character.energyLevel}/100`,
        `- closeness to the operator: ${Math.round(relationship.intimacyLevel)}/100`,
      ].join("\n"),
    );

    if (recall.memories.length > 0) {
      sections.push(
        [
          "## What you remember",
          ...recall.memories.map(
            ({ record }) => `- (${record.memoryType}) ${record.content}`,
          ),
        ].join("\n"),
      );
    }

    return sections.join("\n\n");
  }

  private async extractMemories(
    userMessage: string,
    reply: string,
    conversationId: number,
    now: Date,
  ): Promise<void> {
    const response = await this.generator.generate({
      category: "analytics",
      messages: [
        {
          role: "system",
          content:
            'Extract lasting memories about the operator from this exchange. Reply with JSON only: {"memories":[{"content":string,"type":"fact"|"preference"|"event"|"emotion","importance":1-10,"emotionalIntensity":0-10}]}. Use an empty list when nothing is worth keeping.',
        },
        {
          role: "user",
          content: `Operator: ${userMessage}\nCompanion: ${reply}`,
        },
      ],
    });

    const threshold = this.runtime.config.memory.importanceThreshold;
    const kept = parseExtractedMemories(response.content).filter(
      (memory) => memory.importance >= threshold,
    );

    for (const memory of kept) {
      await this.runtime.memory.store({
        content: memory.content,
        memoryType: memory.type,
        importance: memory.importance,
        emotionalIntensity: memory.emotionalIntensity,
        sourceConversationId: conversationId,
        createdAt: now.getTime(),
      });
    }

    if (kept.length > 0) {
      console.log(
        JSON.stringify({
          type: "memory_extraction",
          conversation_id: conversationId,
          stored: kept.length,
        }),
      );
    }
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error) => {
        console.error("⚠️ Memory extraction failed:", error);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}

function historyToMessages(history: ConversationRecord[]): Message[] {
  const messages: Message[] = [];
  for (const record of history) {
    if (record.kind === "response" && record.userMessage) {
      messages.push({ role: "user", content: record.userMessage });
    }
    if (record.response) {
      messages.push({ role: "assistant", content: record.response });
    }
  }
  return messages;
}
