import chalk from "chalk";
import type { Runtime } from "../../../runtime/src/index.js";
import { MEMORY_TYPES } from "../../../runtime/src/types.js";
import { withRuntime } from "../utils/config.js";
import {
  formatMemoryLine,
  formatRetrievedLine,
  formatTimestamp,
} from "../utils/format.js";

export interface MemoryCommandOptions {
  type?: string;
  limit?: string;
  minImportance?: string;
}

export async function memoryCommand(
  action?: string,
  args: string[] = [],
  options: MemoryCommandOptions = {},
): Promise<void> {
  const normalizedAction = String(action || "help")
    .trim()
    .toLowerCase();

  if (normalizedAction === "help") {
    showHelp();
    return;
  }

  await withRuntime(async (runtime) => {
    switch (normalizedAction) {
      case "list":
        listMemories(runtime, options);
        return;
      case "search": {
        const query = args.join(" ").trim();
        if (!query) {
          console.log(chalk.red("\n❌ Search query required\n"));
          console.log(chalk.gray("Usage: kindred memory search <query>\n"));
          return;
        }
        await searchMemories(runtime, query, options);
        return;
      }
      case "consolidate":
        await consolidateMemories(runtime);
        return;
      case "forget":
        await forgetMemory(runtime, args[0]);
        return;
      case "stats":
      case "status":
        await showStats(runtime);
        return;
      default:
        console.log(chalk.red(`\n❌ Unknown memory action '${normalizedAction}'\n`));
        showHelp();
    }
  });
}

function parseLimit(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function listMemories(runtime: Runtime, options: MemoryCommandOptions): void {
  const memoryType = options.type
    ? MEMORY_TYPES.find((type) => type === options.type?.trim().toLowerCase())
    : undefined;
  if (options.type && !memoryType) {
    console.log(chalk.red(`\n❌ Unknown memory type '${options.type}'\n`));
    return;
  }
  const minImportance = options.minImportance
    ? Number.parseFloat(options.minImportance)
    : undefined;

  const records = runtime.memory.list({
    memoryType,
    minImportance: Number.isFinite(minImportance) ? minImportance : undefined,
    limit: parseLimit(options.limit, 25),
  });

  console.log(chalk.cyan.bold(`\n🧠 Memories (${records.length})\n`));
  if (records.length === 0) {
    console.log(chalk.gray("No memories stored yet.\n"));
    return;
  }
  for (const record of records) {
    console.log(formatMemoryLine(record));
    console.log(
      chalk.gray(
        `   created ${formatTimestamp(record.createdAt)} · accessed ${record.accessCount}x · last ${formatTimestamp(record.lastAccessedAt)}`,
      ),
    );
  }
  console.log();
}

async function searchMemories(
  runtime: Runtime,
  query: string,
  options: MemoryCommandOptions,
): Promise<void> {
  console.log(chalk.cyan.bold(`\n🔍 Search: "${query}"\n`));
  const result = await runtime.memory.retrieve(query, {
    limit: parseLimit(options.limit, 5),
  });
  console.log(
    chalk.gray(
      `path: ${result.path}${result.degradedReason ? ` (${result.degradedReason})` : ""}\n`,
    ),
  );
  if (result.memories.length === 0) {
    console.log(chalk.gray("No matching memories.\n"));
    return;
  }
  for (const hit of result.memories) {
    console.log(formatRetrievedLine(hit));
  }
  console.log();
}

async function consolidateMemories(runtime: Runtime): Promise<void> {
  const report = await runtime.memory.consolidate();
  console.log(chalk.green("\n✅ Consolidation complete\n"));
  console.log(`Reviewed:         ${report.reviewed}`);
  console.log(`Promoted:         ${report.promoted}`);
  console.log(`Demoted:          ${report.demoted}`);
  console.log(`Evicted (today):  ${report.evictedDaily}`);
  console.log(`Evicted (cap):    ${report.evictedWorking}`);
  console.log(`Compressed:       ${report.compressedMemories} into ${report.compressedGroups}`);
  console.log(`Remaining:        ${report.remaining}\n`);
}

async function forgetMemory(runtime: Runtime, rawId: string | undefined): Promise<void> {
  const id = Number.parseInt(rawId || "", 10);
  if (!Number.isFinite(id)) {
    console.log(chalk.red("\n❌ Memory id required\n"));
    console.log(chalk.gray("Usage: kindred memory forget <id>\n"));
    return;
  }
  const removed = await runtime.memory.forget(id);
  if (!removed) {
    console.log(chalk.yellow(`\nNo memory with id ${id}.\n`));
    return;
  }
  console.log(chalk.green(`\n✅ Forgot memory #${id}\n`));
}

async function showStats(runtime: Runtime): Promise<void> {
  const stats = await runtime.memory.stats();
  console.log(chalk.cyan.bold("\n📊 Memory Statistics\n"));
  console.log(`Total:              ${stats.total}`);
  console.log(`Indexed:            ${stats.indexed ?? "n/a"}`);
  console.log(`Average importance: ${stats.averageImportance.toFixed(2)}`);
  console.log(chalk.bold("\nBy type"));
  for (const [type, count] of Object.entries(stats.byType)) {
    console.log(`  ${type.padEnd(12)} ${count}`);
  }
  console.log();
}

function showHelp(): void {
  console.log(chalk.cyan.bold("\n🧠 Kindred Memory CLI\n"));
  console.log("Usage: kindred memory <action> [args]\n");
  console.log("Actions:");
  console.log("  list [--type <type>] [--limit <n>]   Recent memories");
  console.log("  search <query> [--limit <n>]         Ranked retrieval");
  console.log("  consolidate                          Run consolidation now");
  console.log("  forget <id>                          Delete one memory");
  console.log("  stats                                Counts per type");
  console.log(chalk.gray("\nExamples:"));
  console.log(chalk.gray("  kindred memory list --type preference"));
  console.log(chalk.gray('  kindred memory search "weekend plans"'));
  console.log(chalk.gray("  kindred memory forget 42\n"));
}
