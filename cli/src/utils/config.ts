import { existsSync, readFileSync } from "fs";
import { join } from "path";
import chalk from "chalk";
import { Agent } from "../../../agent/src/index.js";
import {
  ConfigError,
  ensureEnvLoaded,
  getDatabasePath,
  getKindredDir,
  loadKindredConfig,
  type KindredConfig,
} from "../../../runtime/src/config.js";
import { Runtime } from "../../../runtime/src/index.js";
import { GeneratedMemoryCompressor } from "../../../gateway/src/inner-life.js";

export function getConfigPath(dir: string = getKindredDir()): string {
  return join(dir, "config.json");
}

export function getEnvPath(dir: string = getKindredDir()): string {
  return join(dir, ".env");
}

/**
 * Load and validate the config, printing validation issues instead of a
 * stack trace. Returns null when the config is unusable.
 */
export function loadCliConfig(): KindredConfig | null {
  ensureEnvLoaded();
  try {
    return loadKindredConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.log(chalk.red(`\n❌ ${error.message}\n`));
      console.log(chalk.gray(`Fix ${getConfigPath()} or run: kindred init\n`));
      return null;
    }
    throw error;
  }
}

/**
 * Open the runtime against the local database. With an API key for the
 * configured provider, consolidation condenses aged memories; similarity
 * search is wired only for OpenAI, which provides the embeddings.
 */
export async function openRuntime(config: KindredConfig): Promise<Runtime> {
  const apiKey =
    config.agent.provider === "anthropic"
      ? process.env.ANTHROPIC_API_KEY
      : process.env.OPENAI_API_KEY;
  const agent = apiKey
    ? new Agent({
        provider: config.agent.provider,
        model: config.agent.model,
        embeddingModel: config.agent.embeddingModel,
        apiKey,
        timeoutMs: config.agent.timeoutMs,
        maxRetries: config.agent.maxRetries,
      })
    : null;
  return Runtime.create({
    config,
    databasePath: getDatabasePath(),
    embedder: agent && config.agent.provider === "openai" ? agent : null,
    compressor: agent ? new GeneratedMemoryCompressor(agent, config.persona.name) : null,
  });
}

/**
 * Run `fn` with an open runtime and always close it afterwards.
 */
export async function withRuntime(
  fn: (runtime: Runtime) => Promise<void> | void,
): Promise<void> {
  const config = loadCliConfig();
  if (!config) return;
  const runtime = await openRuntime(config);
  try {
    await fn(runtime);
  } finally {
    await runtime.shutdown();
  }
}

const SECRET_KEY_PATTERN = /KEY|TOKEN|PASS|SECRET/;

/**
 * Read ~/.kindred/.env as display lines, masking secret values.
 */
export function readMaskedEnv(path: string = getEnvPath()): string[] {
  if (!existsSync(path)) return [];
  const lines: string[] = [];
  for (const line of readFileSync(path, "utf-8").split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const separator = trimmed.indexOf("=");
    if (separator <= 0) continue;
    const key = trimmed.slice(0, separator);
    lines.push(
      SECRET_KEY_PATTERN.test(key)
        ? `${key}=${"*".repeat(8)}`
        : trimmed,
    );
  }
  return lines;
}

/**
 * Merge `values` into an env file body, replacing existing keys in place.
 */
export function mergeEnvContent(
  existing: string,
  values: Record<string, string>,
): string {
  const pending = new Map(Object.entries(values));
  const lines = existing
    .split("\n")
    .map((line) => {
      const separator = line.indexOf("=");
      if (separator <= 0 || line.trim().startsWith("#")) return line;
      const key = line.slice(0, separator).trim();
      const value = pending.get(key);
      if (value === undefined) return line;
      pending.delete(key);
      return `${key}=${value}`;
    });
  for (const [key, value] of pending) {
    lines.push(`${key}=${value}`);
  }
  return lines.filter((line) => line.trim() !== "").join("\n") + "\n";
}
