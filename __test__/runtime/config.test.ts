import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  ConfigError,
  getDatabasePath,
  getKindredDir,
  loadKindredConfig,
  parseKindredConfig,
} from "../../runtime/src/config";

describe("parseKindredConfig", () => {
  it("fills every section with defaults", () => {
    const config = parseKindredConfig({});
    expect(config.persona).toEqual({ id: "default", name: "Elin" });
    expect(config.initiative.baseProbability).toBe(0.3);
    expect(config.initiative.cooldownHours).toBe(2);
    expect(config.initiative.dailyCap).toBe(8);
    expect(config.memory.workingMemoryCap).toBe(200);
    expect(config.memory.dailyMemoryCap).toBe(40);
    expect(config.cycle.tickIntervalMinutes).toBe(30);
    expect(config.agent.provider).toBe("openai");
    expect(config.gateway.port).toBe(18790);
    expect(config.life.sleepHours).toEqual({ start: 23, end: 7 });
  });

  it("returns a frozen config", () => {
    const config = parseKindredConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.initiative.silenceCurve.steps)).toBe(true);
  });

  it("keeps explicit values next to defaults", () => {
    const config = parseKindredConfig({
      persona: { name: "Mara" },
      initiative: { dailyCap: 3 },
    });
    expect(config.persona).toEqual({ id: "default", name: "Mara" });
    expect(config.initiative.dailyCap).toBe(3);
    expect(config.initiative.cooldownHours).toBe(2);
  });

  it("collects every validation issue", () => {
    try {
      parseKindredConfig({
        initiative: { baseProbability: 2 },
        agent: { provider: "local" },
      });
      expect.unreachable("config should not validate");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toMatch(/^initiative\.baseProbability: /);
      expect(error.issues[1]).toMatch(/^agent\.provider: /);
    }
  });

  it("rejects an energy curve whose peak is not the maximum", () => {
    expect(() =>
      parseKindredConfig({
        initiative: { energyCurve: { atEmpty: 1.5, peak: 1.2 } },
      }),
    ).toThrow(ConfigError);
  });

  it("applies environment overrides", () => {
    const config = parseKindredConfig(
      {},
      {
        KINDRED_TICK_MINUTES: "5",
        KINDRED_PROVIDER: "anthropic",
        KINDRED_MODEL: "claude-3-haiku-20240307",
        KINDRED_TELEGRAM_ENABLED: "true",
        KINDRED_TELEGRAM_OWNER_USER_ID: "42",
        PORT: "4000",
      },
    );
    expect(config.cycle.tickIntervalMinutes).toBe(5);
    expect(config.agent.provider).toBe("anthropic");
    expect(config.agent.model).toBe("claude-3-haiku-20240307");
    expect(config.telegram.enabled).toBe(true);
    expect(config.telegram.ownerUserId).toBe(42);
    expect(config.gateway.port).toBe(4000);
  });

  it("ignores malformed environment overrides", () => {
    const config = parseKindredConfig(
      {},
      { KINDRED_TICK_MINUTES: "soon", KINDRED_PROVIDER: "local", PORT: "-1" },
    );
    expect(config.cycle.tickIntervalMinutes).toBe(30);
    expect(config.agent.provider).toBe("openai");
    expect(config.gateway.port).toBe(18790);
  });
});

describe("loadKindredConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "kindred-test-config-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("uses defaults when config.json is missing", () => {
    const config = loadKindredConfig(tmpDir, {});
    expect(config.persona.name).toBe("Elin");
  });

  it("reads config.json from the given directory", () => {
    writeFileSync(
      join(tmpDir, "config.json"),
      JSON.stringify({ memory: { retrievalLimit: 3 } }),
    );
    expect(loadKindredConfig(tmpDir, {}).memory.retrievalLimit).toBe(3);
  });

  it("throws a ConfigError for unparseable JSON", () => {
    writeFileSync(join(tmpDir, "config.json"), "{ not json");
    expect(() => loadKindredConfig(tmpDir, {})).toThrow(ConfigError);
  });

  it("resolves paths under KINDRED_HOME", () => {
    expect(getKindredDir({ KINDRED_HOME: tmpDir })).toBe(tmpDir);
    expect(getDatabasePath(tmpDir)).toBe(join(tmpDir, "kindred.db"));
  });
});
