#!/usr/bin/env -S npx tsx
import { program } from "commander";
import chalk from "chalk";

import { initCommand } from "./commands/init.js";
import { stateCommand } from "./commands/state.js";

program
  .name("kindred")
  .description(chalk.cyan("💫 Kindred companion CLI"))
  .version("0.1.0");

// Onboarding
program
  .command("init")
  .description("Set up provider keys, Telegram and the persona")
  .action(initCommand);

// Inspection
program
  .command("state")
  .description("Show the persona's current mood, energy, activity and closeness")
  .option("-e, --events <count>", "Number of recent state events (default: 5)")
  .action(stateCommand);

program
  .command("decide")
  .description("Dry-run the initiative decision against the stored state")
  .option("--at <time>", "Evaluate at this local time instead of now")
  .action(async (options: { at?: string }) => {
    const { decideCommand } = await import("./commands/decide.js");
    return decideCommand(options);
  });

// Management commands
program
  .command("memory <action>")
  .description("Manage memories (list|search|consolidate|forget|stats)")
  .argument("[args...]", "Search query or memory id")
  .option("-t, --type <type>", "Filter list by memory type")
  .option("-n, --limit <count>", "Maximum number of rows")
  .option("--min-importance <value>", "Filter list by minimum importance")
  .action(
    async (
      action: string,
      args: string[],
      options: { type?: string; limit?: string; minImportance?: string },
    ) => {
      const { memoryCommand } = await import("./commands/memory.js");
      return memoryCommand(action, args, options);
    },
  );

program
  .command("persona [action]")
  .description("Manage the persona sheet (show|path|edit|reset)")
  .action(async (action?: string) => {
    const { personaCommand } = await import("./commands/persona.js");
    return personaCommand(action);
  });

program
  .command("config [action]")
  .description("Inspect configuration (show|path)")
  .action(async (action?: string) => {
    const { configCommand } = await import("./commands/config.js");
    return configCommand(action);
  });

program.parseAsync().catch((error) => {
  console.error(
    chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`),
  );
  process.exit(1);
});
