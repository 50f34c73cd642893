import { config } from "dotenv";
import { homedir } from "os";
import { join } from "path";
import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ACTIVITIES, MOODS } from "./types";

/**
 * Resolve the Kindred home directory (~/.kindred unless KINDRED_HOME is set).
 */
export function getKindredDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.KINDRED_HOME || join(homedir(), ".kindred");
}

/**
 * Load environment variables from ~/.kindred/.env and set default timezone.
 * Only the first call loads anything.
 */
let envLoaded = false;
export function ensureEnvLoaded(): void {
  if (envLoaded) return;
  config({ path: join(getKindredDir(), ".env") });
  if (!process.env.TZ) {
    process.env.TZ = "Europe/Berlin";
  }
  envLoaded = true;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n- ${issues.join("\n- ")}` : message);
    this.name = "ConfigError";
  }
}

// ── Schema ──────────────────────────────────────────────────────────────────

const multiplier = z.number().nonnegative();

/** Tag → multiplier table. The `default` entry covers every tag the table omits. */
const multiplierTable = z
  .object({ default: z.number().positive() })
  .catchall(multiplier);

const hourOfDay = z.number().int().min(0).max(24);
const clockTime = z
  .string()
  .regex(/^([01]\d|2[0-4]):[0-5]\d$/, "expected HH:MM");

const scheduleEntrySchema = z.object({
  days: z.enum(["weekdays", "weekends", "all"]).default("all"),
  from: clockTime,
  to: clockTime,
  activity: z.enum(ACTIVITIES),
  location: z.string().min(1),
  importance: z.number().int().min(1).max(10).default(5),
});

const initiativeSchema = z.object({
  baseProbability: z.number().min(0).max(1).default(0.3),
  cooldownHours: z.number().nonnegative().default(2),
  dailyCap: z.number().int().nonnegative().default(8),
  silenceCurve: z
    .object({
      steps: z
        .array(z.object({ underHours: z.number().positive(), multiplier }))
        .default([
          { underHours: 1, multiplier: 0.3 },
          { underHours: 2, multiplier: 0.6 },
          { underHours: 4, multiplier: 0.9 },
          { underHours: 8, multiplier: 1.2 },
          { underHours: 12, multiplier: 1.6 },
        ]),
      plateau: multiplier.default(2.0),
      neverMessaged: multiplier.default(2.0),
    })
    .default({}),
  moodMultipliers: multiplierTable.default({
    default: 1.0,
    radiant: 1.4,
    excited: 1.35,
    happy: 1.2,
    playful: 1.25,
    neutral: 1.0,
    calm: 0.9,
    thoughtful: 0.85,
    anxious: 0.8,
    sad: 0.7,
    tired: 0.6,
    irritated: 0.5,
    down: 0.45,
  }),
  activityMultipliers: multiplierTable.default({
    default: 1.0,
    free: 1.3,
    resting: 1.15,
    hobby: 1.1,
    commuting: 0.9,
    social: 0.8,
    working: 0.5,
    sleeping: 0.2,
  }),
  energyCurve: z
    .object({
      atEmpty: multiplier.default(0.4),
      peakAt: z.number().gt(0).lt(100).default(60),
      peak: multiplier.default(1.2),
      atFull: multiplier.default(0.8),
    })
    .default({})
    .refine((curve) => curve.peak > curve.atEmpty && curve.peak > curve.atFull, {
      message: "energy curve peak must exceed both ends",
    }),
  intimacy: z
    .object({
      floor: multiplier.default(0.6),
      ceiling: multiplier.default(1.4),
    })
    .default({}),
  timeOfDay: z
    .object({
      sleep: multiplier.default(0.2),
      fallback: multiplier.default(1.0),
      bands: z
        .array(z.object({ from: hourOfDay, to: hourOfDay, multiplier }))
        .default([
          { from: 0, to: 6, multiplier: 0.3 },
          { from: 6, to: 9, multiplier: 0.8 },
          { from: 9, to: 12, multiplier: 1.0 },
          { from: 12, to: 14, multiplier: 1.0 },
          { from: 14, to: 18, multiplier: 1.1 },
          { from: 18, to: 21, multiplier: 1.15 },
          { from: 21, to: 23, multiplier: 0.9 },
          { from: 23, to: 24, multiplier: 0.5 },
        ]),
    })
    .default({}),
  dayOfWeek: z
    .object({
      weekday: multiplier.default(1.0),
      friday: multiplier.default(1.1),
      weekend: multiplier.default(1.2),
    })
    .default({}),
  bonuses: z
    .object({
      activityCompleted: z.number().min(0).max(1).default(0.3),
      upcomingImportant: z.number().min(0).max(1).default(0.2),
      longSilence: z.number().min(0).max(1).default(0.2),
      heightenedMood: z.number().min(0).max(1).default(0.15),
      maxTotal: z.number().min(0).max(1).default(0.5),
    })
    .default({}),
  upcomingWindowMinutes: z.number().positive().default(60),
  upcomingImportanceMin: z.number().int().min(1).max(10).default(7),
  longSilenceHours: z.number().positive().default(12),
  heightenedMoods: z
    .array(z.enum(MOODS))
    .default(["radiant", "excited", "anxious", "irritated"]),
});

const lifeSchema = z.object({
  sleepHours: z
    .object({ start: hourOfDay, end: hourOfDay })
    .default({ start: 23, end: 7 }),
  energyBaseline: z.number().min(0).max(100).default(55),
  energyDecayPerHour: z.number().nonnegative().default(3),
  energyRecoveryPerHour: z.number().nonnegative().default(10),
  energyCostPerExchange: z.number().nonnegative().default(1),
  moodVolatility: z.number().min(0).max(1).default(0.15),
  baselineMood: z.enum(MOODS).default("calm"),
  moodPalette: z
    .array(z.enum(MOODS))
    .min(1)
    .default(["happy", "playful", "calm", "thoughtful", "tired", "excited"]),
  defaultLocation: z.string().min(1).default("home"),
  intimacyGainPerExchange: z.number().min(0).max(100).default(1),
  schedule: z
    .array(scheduleEntrySchema)
    .default([
      { days: "weekdays", from: "07:00", to: "09:00", activity: "resting", location: "home", importance: 3 },
      { days: "weekdays", from: "09:00", to: "13:00", activity: "working", location: "studio", importance: 7 },
      { days: "weekdays", from: "13:00", to: "14:00", activity: "free", location: "cafe", importance: 2 },
      { days: "weekdays", from: "14:00", to: "18:00", activity: "working", location: "studio", importance: 7 },
      { days: "weekdays", from: "18:00", to: "20:00", activity: "hobby", location: "home", importance: 4 },
      { days: "weekdays", from: "20:00", to: "23:00", activity: "free", location: "home", importance: 2 },
      { days: "weekends", from: "07:00", to: "11:00", activity: "free", location: "home", importance: 2 },
      { days: "weekends", from: "11:00", to: "15:00", activity: "social", location: "city", importance: 6 },
      { days: "weekends", from: "15:00", to: "19:00", activity: "hobby", location: "home", importance: 4 },
      { days: "weekends", from: "19:00", to: "23:00", activity: "free", location: "home", importance: 2 },
    ]),
});

const memorySchema = z.object({
  workingMemoryCap: z.number().int().positive().default(200),
  dailyMemoryCap: z.number().int().positive().default(40),
  importanceThreshold: z.number().int().min(1).max(10).default(3),
  consolidationHour: z.number().int().min(0).max(23).default(4),
  retrievalLimit: z.number().int().positive().default(5),
  /** Similarity hits below this `1/(1+distance)` value are not relevant. */
  minSimilarity: z.number().min(0).max(1).default(0.55),
  compression: z
    .object({
      enabled: z.boolean().default(true),
      minAgeDays: z.number().nonnegative().default(7),
      minGroupSize: z.number().int().min(2).default(3),
      maxGroupSize: z.number().int().min(2).default(10),
    })
    .default({}),
});

const configSchema = z.object({
  persona: z
    .object({
      id: z.string().min(1).default("default"),
      name: z.string().min(1).default("Elin"),
    })
    .default({}),
  initiative: initiativeSchema.default({}),
  life: lifeSchema.default({}),
  memory: memorySchema.default({}),
  cycle: z
    .object({ tickIntervalMinutes: z.number().positive().default(30) })
    .default({}),
  agent: z
    .object({
      provider: z.enum(["openai", "anthropic"]).default("openai"),
      model: z.string().min(1).default("gpt-4o-mini"),
      embeddingModel: z.string().min(1).default("text-embedding-3-small"),
      timeoutMs: z.number().int().positive().default(30_000),
      maxRetries: z.number().int().nonnegative().default(2),
    })
    .default({}),
  telegram: z
    .object({
      enabled: z.boolean().default(false),
      ownerUserId: z.number().int().optional(),
      ownerChatId: z.number().int().optional(),
      pollTimeoutSec: z.number().int().positive().default(25),
      retryBaseMs: z.number().int().positive().default(1000),
      retryMaxMs: z.number().int().positive().default(30_000),
    })
    .default({}),
  gateway: z
    .object({ port: z.number().int().positive().default(18790) })
    .default({}),
});

export type KindredConfig = z.infer<typeof configSchema>;
export type InitiativeConfig = KindredConfig["initiative"];
export type LifeConfig = KindredConfig["life"];
export type MemoryConfig = KindredConfig["memory"];
export type ScheduleEntry = LifeConfig["schedule"][number];
export type MultiplierTable = z.infer<typeof multiplierTable>;

// ── Loading ─────────────────────────────────────────────────────────────────

/**
 * Validate a raw config object, fill defaults and freeze the result.
 */
export function parseKindredConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = {},
): KindredConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      "Invalid Kindred config",
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }
  return deepFreeze(applyEnvOverrides(result.data, env));
}

/**
 * Load ~/.kindred/config.json. A missing file yields the defaults; a file that
 * is not JSON or fails validation throws a ConfigError.
 */
export function loadKindredConfig(
  dir: string = getKindredDir(),
  env: NodeJS.ProcessEnv = process.env,
): KindredConfig {
  const configPath = join(dir, "config.json");
  if (!existsSync(configPath)) return parseKindredConfig({}, env);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseKindredConfig(raw, env);
}

export function getDatabasePath(dir: string = getKindredDir()): string {
  return join(dir, "kindred.db");
}

function applyEnvOverrides(
  base: KindredConfig,
  env: NodeJS.ProcessEnv,
): KindredConfig {
  const provider = env.KINDRED_PROVIDER;
  return {
    ...base,
    cycle: {
      tickIntervalMinutes: parsePositiveNumber(
        env.KINDRED_TICK_MINUTES,
        base.cycle.tickIntervalMinutes,
      ),
    },
    agent: {
      ...base.agent,
      provider:
        provider === "openai" || provider === "anthropic"
          ? provider
          : base.agent.provider,
      model: env.KINDRED_MODEL || base.agent.model,
    },
    telegram: {
      ...base.telegram,
      enabled:
        env.KINDRED_TELEGRAM_ENABLED !== undefined
          ? env.KINDRED_TELEGRAM_ENABLED === "true"
          : base.telegram.enabled,
      ownerUserId:
        parseOptionalInt(env.KINDRED_TELEGRAM_OWNER_USER_ID) ??
        base.telegram.ownerUserId,
      ownerChatId:
        parseOptionalInt(env.KINDRED_TELEGRAM_OWNER_CHAT_ID) ??
        base.telegram.ownerChatId,
    },
    gateway: {
      port: parsePositiveNumber(env.PORT, base.gateway.port),
    },
  };
}

export function parsePositiveNumber(
  value: string | undefined,
  fallback: number,
): number {
  const parsed = Number.parseFloat(value || "");
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
