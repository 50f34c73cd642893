import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type {
  GenerateRequest,
  LLMResponse,
  TextGenerator,
  UsageCategory,
} from "../../agent/src/index.js";
import { parseKindredConfig } from "../../runtime/src/config.js";
import type { InitiativeRequest } from "../../runtime/src/consciousness.js";
import { Runtime } from "../../runtime/src/index.js";
import {
  CompanionService,
  parseExtractedMemories,
  type CompanionTransport,
} from "../../gateway/src/companion-service.js";
import type { OutboundDelivery } from "../../gateway/src/pacing.js";

const NOW = new Date(2026, 9, 21, 18, 30);

/** Scripted generator: one canned reply (or failure) per usage category. */
class ScriptedGenerator implements TextGenerator {
  readonly requests: GenerateRequest[] = [];

  constructor(private readonly script: Partial<Record<UsageCategory, string | Error>>) {}

  async generate(request: GenerateRequest): Promise<LLMResponse> {
    this.requests.push(request);
    const scripted = this.script[request.category];
    if (scripted instanceof Error) throw scripted;
    return {
      content: scripted ?? "",
      category: request.category,
      usage: { inputTokens: 0, outputTokens: 0 },
    };
  }

  async embed(): Promise<number[] | null> {
    return null;
  }

  systemPromptOf(index: number): string {
    return this.requests[index]?.messages[0]?.content ?? "";
  }
}

class RecordingTransport implements CompanionTransport {
  readonly sent: OutboundDelivery[] = [];

  constructor(private readonly result: boolean | Error = true) {}

  async deliver(outbound: OutboundDelivery): Promise<boolean> {
    if (this.result instanceof Error) throw this.result;
    this.sent.push(outbound);
    return this.result;
  }
}

const EXTRACTION = JSON.stringify({
  memories: [
    { content: "Operator loves ramen", type: "preference", importance: 6 },
    { content: "Said hi", type: "event", importance: 2 },
  ],
});

describe("CompanionService", () => {
  let runtime: Runtime;

  beforeEach(async () => {
    runtime = await Runtime.create({
      config: parseKindredConfig({}),
      databasePath: ":memory:",
      random: () => 0,
      clock: () => NOW,
    });
    const { character } = runtime.snapshot(NOW);
    runtime.store.state.saveCharacter({
      ...character,
      mood: "calm",
      energyLevel: 55,
      currentActivity: "hobby",
      location: "home",
      lastMessageAt: null,
      updatedAt: NOW.getTime(),
    });
  });

  afterEach(async () => {
    await runtime.shutdown();
  });

  function service(
    generator: TextGenerator,
    options: { extractMemories?: boolean } = {},
  ): CompanionService {
    return new CompanionService(runtime, generator, {
      personaSheet: "# Elin\nYou are Elin.",
      ...options,
    });
  }

  describe("handleUserMessage", () => {
    it("replies in paced messages and records the exchange", async () => {
      const generator = new ScriptedGenerator({
        dialogue: "Glad to hear it!\n\nTell me more?",
        analytics: EXTRACTION,
      });
      const companion = service(generator);

      const reply = await companion.handleUserMessage("  thanks, that was great  ", NOW);
      await companion.drain();

      expect(reply.messages).toEqual(["Glad to hear it!", "Tell me more?"]);
      expect(reply.pacing).toEqual({ messageCount: 2, delayClass: "normal" });
      expect(reply.memoryPath).toBe("keyword");
      expect(reply.memoriesUsed).toBe(0);

      const [conversation] = runtime.store.history.recentConversations(runtime.personaId, 1);
      expect(conversation.id).toBe(reply.conversationId);
      expect(conversation.userMessage).toBe("thanks, that was great");
      expect(conversation.response).toBe("Glad to hear it!\n\nTell me more?");
      expect(conversation.moodBefore).toBe("calm");
      expect(conversation.moodAfter).toBe("happy");

      const { character, relationship } = runtime.snapshot(NOW);
      expect(character.energyLevel).toBe(54);
      expect(character.lastMessageAt).toBe(NOW.getTime());
      expect(relationship.intimacyLevel).toBe(1);
      expect(relationship.interactionCount).toBe(1);

      const [event] = runtime.store.history.recentStateEvents(runtime.personaId, 1);
      expect(event.eventType).toBe("triggered");
      expect(event.description).toBe("mood calm → happy");
      expect(event.trigger).toBe("user_message");
    });

    it("stores extracted memories above the importance threshold", async () => {
      const generator = new ScriptedGenerator({ dialogue: "Yum!", analytics: EXTRACTION });
      const companion = service(generator);

      const reply = await companion.handleUserMessage("had ramen for lunch", NOW);
      await companion.drain();

      const memories = runtime.memory.list();
      expect(memories).toHaveLength(1);
      expect(memories[0].content).toBe("Operator loves ramen");
      expect(memories[0].memoryType).toBe("preference");
      expect(memories[0].importance).toBe(6);
      expect(memories[0].sourceConversationId).toBe(reply.conversationId);
      expect(generator.requests.map((request) => request.category)).toEqual([
        "dialogue",
        "analytics",
      ]);
    });

    it("puts recalled memories and the live state into the system prompt", async () => {
      runtime.store.memories.insert({
        personaId: runtime.personaId,
        content: "Operator loves ramen",
        memoryType: "preference",
        importance: 6,
        createdAt: NOW.getTime(),
      });
      const generator = new ScriptedGenerator({ dialogue: "Ramen again?" });
      const companion = service(generator, { extractMemories: false });

      const reply = await companion.handleUserMessage("ramen tonight?", NOW);

      expect(reply.memoriesUsed).toBe(1);
      const prompt = generator.systemPromptOf(0);
      expect(prompt.startsWith("# Elin\nYou are Elin.\n\n## Right now\n")).toBe(true);
      expect(prompt).toContain("- activity: hobby (home)");
      expect(prompt).toContain("- mood: calm");
      expect(prompt).toContain("## What you remember\n- (preference) Operator loves ramen");
      expect(generator.requests).toHaveLength(1);
    });

    it("sends earlier turns oldest first", async () => {
      const generator = new ScriptedGenerator({ dialogue: "ok" });
      const companion = service(generator, { extractMemories: false });

      await companion.handleUserMessage("first", NOW);
      await companion.handleUserMessage("second", new Date(NOW.getTime() + 60_000));

      expect(generator.requests[1].messages.slice(1)).toEqual([
        { role: "user", content: "first" },
        { role: "assistant", content: "ok" },
        { role: "user", content: "second" },
      ]);
    });

    it("propagates generation failures without recording anything", async () => {
      const companion = service(new ScriptedGenerator({ dialogue: new Error("upstream 503") }));

      await expect(companion.handleUserMessage("hello", NOW)).rejects.toThrow("upstream 503");
      expect(runtime.store.history.recentConversations(runtime.personaId, 5)).toEqual([]);
      expect(runtime.snapshot(NOW).relationship.interactionCount).toBe(0);
    });

    it("keeps the reply when memory extraction fails", async () => {
      const companion = service(
        new ScriptedGenerator({ dialogue: "sure", analytics: new Error("timeout") }),
      );

      const reply = await companion.handleUserMessage("remember my birthday", NOW);
      await companion.drain();

      expect(reply.messages).toEqual(["sure"]);
      expect(runtime.memory.list()).toEqual([]);
    });
  });

  describe("deliverInitiative", () => {
    function request(): InitiativeRequest {
      const { character, relationship } = runtime.snapshot(NOW);
      return {
        character,
        relationship,
        life: { status: "active", activityImportance: 4 },
        decision: { shouldSend: true, probability: 0.6, reason: "free time" },
        topic: "show progress on a hobby project",
        requestedAt: NOW.getTime(),
      };
    }

    it("reports no transport", async () => {
      const companion = service(new ScriptedGenerator({ dialogue: "hey" }));
      expect(await companion.deliverInitiative(request())).toEqual({
        delivered: false,
        reason: "no transport",
      });
    });

    it("writes about the topic and hands the messages to the transport", async () => {
      const generator = new ScriptedGenerator({
        dialogue: "I finished the sketch!\n\nWant to see?",
      });
      const transport = new RecordingTransport();
      const companion = service(generator);
      companion.setTransport(transport);

      const outcome = await companion.deliverInitiative(request());

      expect(outcome).toEqual({ delivered: true, text: "I finished the sketch!\n\nWant to see?" });
      expect(transport.sent).toEqual([
        {
          messages: ["I finished the sketch!", "Want to see?"],
          pacing: { messageCount: 2, delayClass: "normal" },
        },
      ]);
      expect(generator.requests.map((sent) => sent.category)).toEqual(["dialogue"]);
      expect(generator.requests[0].messages[1].content).toBe(
        [
          "[You are writing first. The operator has not messaged you.]",
          "Topic: show progress on a hobby project.",
          "Why now: free time.",
          "Write one to three short chat messages separated by blank lines. No greeting formulas.",
        ].join("\n"),
      );
    });

    it("suppresses the message on every kind of failure", async () => {
      const declined = service(new ScriptedGenerator({ dialogue: "hey" }));
      declined.setTransport(new RecordingTransport(false));
      expect(await declined.deliverInitiative(request())).toEqual({
        delivered: false,
        reason: "transport declined",
      });

      const broken = service(new ScriptedGenerator({ dialogue: "hey" }));
      broken.setTransport(new RecordingTransport(new Error("chat not found")));
      expect(await broken.deliverInitiative(request())).toEqual({
        delivered: false,
        reason: "chat not found",
      });

      const failing = service(new ScriptedGenerator({ dialogue: new Error("rate limited") }));
      failing.setTransport(new RecordingTransport());
      expect(await failing.deliverInitiative(request())).toEqual({
        delivered: false,
        reason: "rate limited",
      });

      const empty = service(new ScriptedGenerator({ dialogue: "   " }));
      const transport = new RecordingTransport();
      empty.setTransport(transport);
      expect(await empty.deliverInitiative(request())).toEqual({
        delivered: false,
        reason: "empty generation",
      });
      expect(transport.sent).toEqual([]);
    });

    it("records a delivered initiative when driven by the cycle", async () => {
      const transport = new RecordingTransport();
      const companion = service(new ScriptedGenerator({ dialogue: "thinking of you" }));
      companion.setTransport(transport);
      runtime.cycle.onInitiative((initiative) => companion.deliverInitiative(initiative));

      const report = await runtime.cycle.tick(NOW);

      expect(report.delivered).toBe(true);
      expect(transport.sent[0].messages).toEqual(["thinking of you"]);
      const [record] = runtime.store.history.recentConversations(runtime.personaId, 1);
      expect(record.kind).toBe("initiative");
      expect(record.response).toBe("thinking of you");
    });
  });

  it("describes the live state", () => {
    const companion = service(new ScriptedGenerator({}));
    expect(companion.describeState(NOW)).toBe(
      [
        "Elin is hobby at home.",
        "Mood: calm, energy 55/100.",
        "Closeness: 0/100 over 0 exchanges.",
        "Last message: never.",
      ].join("\n"),
    );
  });
});

describe("parseExtractedMemories", () => {
  it("reads JSON wrapped in prose and fills defaults", () => {
    expect(
      parseExtractedMemories(
        'Sure! {"memories":[{"content":" Has a cat ","type":"pet","importance":"7"}]} done',
      ),
    ).toEqual([
      { content: "Has a cat", type: "fact", importance: 7, emotionalIntensity: 0 },
    ]);
  });

  it("returns nothing for unusable replies", () => {
    expect(parseExtractedMemories("nothing to keep")).toEqual([]);
    expect(parseExtractedMemories("{not json}")).toEqual([]);
    expect(parseExtractedMemories('{"memories":[{"content":"x","importance":11}]}')).toEqual([]);
  });
});
