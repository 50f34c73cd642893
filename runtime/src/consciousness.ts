/**
 * consciousness.ts: Periodic driver of the persona's inner life.
 *
 * Every tick first lets the day planner write today's plan (once per waking
 * day), advances the character by the time elapsed since the previous
 * tick, asks the initiative engine whether to write first, hands a positive
 * decision to the registered handler, and runs memory consolidation once a
 * day. The last tick time and the last consolidation day live in the store's
 * meta table, so a restarted daemon resumes where it stopped.
 */

import type { KindredConfig, LifeConfig } from "./config";
import {
  LAST_PLANNING_KEY,
  loadDayPlan,
  saveDayPlan,
  withDayPlan,
  type DayPlan,
  type DayPlanner,
} from "./day-plan";
import {
  decide,
  pickInitiativeTopic,
  type InitiativeDecision,
} from "./initiative";
import {
  advanceState,
  buildLifeContext,
  dayKey,
  initialCharacter,
  isWeekend,
  isWithinSleepHours,
  startOfLocalDay,
  type RandomSource,
} from "./life-rhythm";
import type { ConsolidationReport, MemorySystem } from "./memory/memory-system";
import type { PersonaStore } from "./persona-store";
import type { StateLock } from "./state-lock";
import type {
  CharacterState,
  RelationshipState,
  StateEventType,
  VirtualLifeContext,
} from "./types";

// ── Types ───────────────────────────────────────────────────────────────────

export type CycleState = "idle" | "ticking" | "consolidating";

export interface InitiativeRequest {
  character: CharacterState;
  relationship: RelationshipState;
  life: VirtualLifeContext;
  decision: InitiativeDecision;
  topic: string;
  requestedAt: number;
}

export type InitiativeOutcome =
  | { delivered: true; text: string }
  | { delivered: false; reason: string };

export type InitiativeHandler = (
  request: InitiativeRequest,
) => Promise<InitiativeOutcome>;

export interface TickReport {
  tickAt: number;
  skipped?: string;
  elapsedMs?: number;
  plan?: DayPlan;
  event?: { eventType: StateEventType; description: string };
  decision?: InitiativeDecision;
  delivered?: boolean;
  consolidation?: ConsolidationReport;
}

export interface ConsciousnessCycleOptions {
  store: PersonaStore;
  memory: MemorySystem;
  lock: StateLock;
  config: KindredConfig;
  random?: RandomSource;
  /** Stamps delivered initiatives. */
  clock?: () => Date;
}

export const LAST_TICK_KEY = "last_tick_at";
export const LAST_CONSOLIDATION_KEY = "last_consolidation_day";

// ── Cycle ───────────────────────────────────────────────────────────────────

export class ConsciousnessCycle {
  private readonly store: PersonaStore;
  private readonly memory: MemorySystem;
  private readonly lock: StateLock;
  private readonly config: KindredConfig;
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly personaId: string;
  private readonly activeTicks = new Set<Promise<TickReport>>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private handler: InitiativeHandler | null = null;
  private planner: DayPlanner | null = null;
  private state: CycleState = "idle";
  private initiativeInFlight = false;
  private lastTick: TickReport | null = null;

  constructor(options: ConsciousnessCycleOptions) {
    this.store = options.store;
    this.memory = options.memory;
    this.lock = options.lock;
    this.config = options.config;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
    this.personaId = options.config.persona.id;
  }

  /**
   * Register who writes and delivers a proactive message.
   */
  onInitiative(handler: InitiativeHandler): void {
    this.handler = handler;
  }

  /**
   * Register who writes the day's plan. Without one the schedule table applies.
   */
  onPlanDay(planner: DayPlanner): void {
    this.planner = planner;
  }

  /**
   * The life config in force on `now`'s day: today's plan when one was made,
   * the schedule table otherwise.
   */
  lifeOn(now: Date): LifeConfig {
    return withDayPlan(
      this.config.life,
      loadDayPlan(this.store.state, this.personaId, dayKey(now)),
    );
  }

  start(): void {
    if (this.timer) return;

    const intervalMs = this.config.cycle.tickIntervalMinutes * 60_000;
    console.log(
      `🌙 Consciousness cycle started (every ${this.config.cycle.tickIntervalMinutes} min)`,
    );

    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        console.error("⚠️ Consciousness tick error:", err);
      });
    }, intervalMs);

    this.tick().catch((err) => {
      console.error("⚠️ Consciousness tick error:", err);
    });
  }

  /**
   * Stop scheduling. A tick already running finishes on its own.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log("🌙 Consciousness cycle stopped");
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getState(): CycleState {
    return this.state;
  }

  getStatus(): {
    running: boolean;
    state: CycleState;
    initiativeInFlight: boolean;
    lastTickAt: number | null;
    lastConsolidationDay: string | null;
    lastDecision: InitiativeDecision | null;
  } {
    const lastTickAt = Number(
      this.store.state.getMeta(this.personaId, LAST_TICK_KEY),
    );
    return {
      running: this.isRunning(),
      state: this.state,
      initiativeInFlight: this.initiativeInFlight,
      lastTickAt: Number.isFinite(lastTickAt) && lastTickAt > 0 ? lastTickAt : null,
      lastConsolidationDay: this.store.state.getMeta(
        this.personaId,
        LAST_CONSOLIDATION_KEY,
      ),
      lastDecision: this.lastTick?.decision ?? null,
    };
  }

  /**
   * Run one tick. Overlapping calls while the state is being advanced or
   * memories are consolidating are skipped.
   */
  async tick(now: Date = new Date()): Promise<TickReport> {
    if (this.state !== "idle") {
      return { tickAt: now.getTime(), skipped: `cycle is ${this.state}` };
    }

    const run = this.runTick(now);
    this.activeTicks.add(run);
    try {
      return await run;
    } finally {
      this.activeTicks.delete(run);
    }
  }

  /**
   * Resolves once every started tick, including its delivery and
   * consolidation, has finished.
   */
  async whenIdle(): Promise<void> {
    while (this.activeTicks.size > 0) {
      await Promise.allSettled([...this.activeTicks]);
    }
  }

  private async runTick(now: Date): Promise<TickReport> {
    const tickAt = now.getTime();
    this.state = "ticking";
    let report: TickReport;
    let plan: DayPlan | null = null;
    let request: InitiativeRequest | null = null;
    try {
      plan = await this.planIfDue(now);
      const prepared = await this.lock.runExclusive(() => this.advance(now));
      report = prepared.report;
      request = prepared.request;
    } finally {
      this.state = "idle";
    }
    if (plan) report.plan = plan;

    console.log(
      JSON.stringify({
        type: "consciousness_tick",
        tick_at: tickAt,
        elapsed_ms: report.elapsedMs,
        event: report.event?.description,
        should_send: report.decision?.shouldSend ?? false,
        probability: report.decision
          ? Number(report.decision.probability.toFixed(4))
          : 0,
        reason: report.decision?.reason,
      }),
    );

    if (request) {
      report.delivered = await this.deliver(request);
    }

    const consolidation = await this.consolidateIfDue(now);
    if (consolidation) report.consolidation = consolidation;

    this.lastTick = report;
    return report;
  }

  // ── Steps ───────────────────────────────────────────────────────────────

  /**
   * Ask the planner for today's plan on the first waking tick of the day.
   * One attempt per day; a failed attempt leaves the schedule table in force.
   */
  private async planIfDue(now: Date): Promise<DayPlan | null> {
    const planner = this.planner;
    const { life } = this.config;
    if (!planner || isWithinSleepHours(now.getHours(), life.sleepHours)) {
      return null;
    }

    const today = dayKey(now);
    if (this.store.state.getMeta(this.personaId, LAST_PLANNING_KEY) === today) {
      return null;
    }
    this.store.state.setMeta(this.personaId, LAST_PLANNING_KEY, today);

    const yesterday = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
    const { character } = this.store.loadLiveState(
      this.personaId,
      initialCharacter(now, life),
      now.getTime(),
    );

    try {
      const plan = await planner({
        day: today,
        weekday: now.toLocaleDateString("en-US", { weekday: "long" }),
        weekend: isWeekend(now),
        character,
        previous: loadDayPlan(this.store.state, this.personaId, dayKey(yesterday)),
      });
      if (plan.day !== today || plan.activities.length === 0) {
        throw new Error(`planner returned no activities for ${today}`);
      }
      saveDayPlan(this.store.state, this.personaId, plan);
      console.log(`📅 Planned ${plan.activities.length} activities for ${today}`);
      return plan;
    } catch (error) {
      console.warn(
        "⚠️ Day planning failed, keeping the schedule table:",
        error instanceof Error ? error.message : error,
      );
      return null;
    }
  }

  private advance(now: Date): {
    report: TickReport;
    request: InitiativeRequest | null;
  } {
    const tickAt = now.getTime();
    const { initiative } = this.config;
    const life = this.lifeOn(now);
    const { character, relationship } = this.store.loadLiveState(
      this.personaId,
      initialCharacter(now, life),
      tickAt,
    );

    const storedTick = Number(
      this.store.state.getMeta(this.personaId, LAST_TICK_KEY),
    );
    const previousTick =
      Number.isFinite(storedTick) && storedTick > 0
        ? storedTick
        : character.updatedAt;
    const elapsedMs = Math.max(0, tickAt - previousTick);

    const transition = advanceState(character, elapsedMs, now, life, this.random);
    this.store.state.saveCharacter(transition.next);
    this.store.state.setMeta(this.personaId, LAST_TICK_KEY, String(tickAt));

    if (Object.keys(transition.changes).length > 0) {
      this.store.history.appendStateEvent({
        personaId: this.personaId,
        eventType: transition.eventType,
        description: transition.description,
        changes: transition.changes,
        trigger: "consciousness_tick",
        createdAt: tickAt,
      });
    }

    const lifeContext = buildLifeContext(now, character.currentActivity, life);
    const decision: InitiativeDecision = this.initiativeInFlight
      ? {
          shouldSend: false,
          probability: 0,
          reason: "initiative in flight",
          blockedBy: "initiative in flight",
        }
      : decide(
          {
            character: transition.next,
            relationship,
            life: lifeContext,
            lastMessageAt: transition.next.lastMessageAt,
            initiativesToday: this.store.history.countInitiativesSince(
              this.personaId,
              startOfLocalDay(now),
            ),
            sleepHours: life.sleepHours,
          },
          initiative,
          now,
          this.random,
        );

    const report: TickReport = {
      tickAt,
      elapsedMs,
      event: {
        eventType: transition.eventType,
        description: transition.description,
      },
      decision,
    };

    if (!decision.shouldSend || !this.handler) {
      return { report, request: null };
    }

    this.initiativeInFlight = true;
    const topic = pickInitiativeTopic(
      transition.next,
      this.store.history.recentInitiativeTopics(this.personaId, 3),
      this.random,
    );
    return {
      report,
      request: {
        character: transition.next,
        relationship,
        life: lifeContext,
        decision,
        topic,
        requestedAt: tickAt,
      },
    };
  }

  /**
   * Generation and delivery run outside the lock; bookkeeping only commits
   * when the transport confirmed delivery, stamped with the delivery time.
   */
  private async deliver(request: InitiativeRequest): Promise<boolean> {
    const handler = this.handler;
    try {
      if (!handler) return false;

      let outcome: InitiativeOutcome;
      try {
        outcome = await handler(request);
      } catch (error) {
        console.error("⚠️ Initiative delivery failed:", error);
        return false;
      }

      if (!outcome.delivered) {
        console.log(
          JSON.stringify({ type: "initiative_suppressed", reason: outcome.reason }),
        );
        return false;
      }

      const text = outcome.text;
      const deliveredAt = Math.max(request.requestedAt, this.clock().getTime());
      await this.lock.runExclusive(() => {
        const current = this.store.state.getCharacter(this.personaId);
        const character = current ?? request.character;
        // an exchange that committed while this was in flight may be newer
        const lastMessageAt = Math.max(character.lastMessageAt ?? 0, deliveredAt);
        this.store.history.appendConversation({
          personaId: this.personaId,
          userMessage: "",
          response: text,
          moodBefore: request.character.mood,
          moodAfter: character.mood,
          kind: "initiative",
          topic: request.topic,
          createdAt: deliveredAt,
        });
        this.store.state.saveCharacter({
          ...character,
          lastMessageAt,
          updatedAt: Math.max(character.updatedAt, deliveredAt),
        });
      });

      console.log(
        JSON.stringify({
          type: "initiative_delivered",
          topic: request.topic,
          reason: request.decision.reason,
          probability: Number(request.decision.probability.toFixed(4)),
        }),
      );
      return true;
    } finally {
      this.initiativeInFlight = false;
    }
  }

  private async consolidateIfDue(now: Date): Promise<ConsolidationReport | null> {
    if (now.getHours() < this.config.memory.consolidationHour) return null;

    const today = dayKey(now);
    const lastDay = this.store.state.getMeta(this.personaId, LAST_CONSOLIDATION_KEY);
    if (lastDay === today || this.state !== "idle") return null;

    this.state = "consolidating";
    try {
      const report = await this.memory.consolidate(now.getTime());
      this.store.state.setMeta(this.personaId, LAST_CONSOLIDATION_KEY, today);
      return report;
    } catch (error) {
      console.error("⚠️ Memory consolidation failed:", error);
      return null;
    } finally {
      this.state = "idle";
    }
  }
}
