import chalk from "chalk";
import { getDatabasePath } from "../../../runtime/src/config.js";
import { getPersonaPath } from "../../../runtime/src/persona.js";
import {
  getConfigPath,
  getEnvPath,
  loadCliConfig,
  readMaskedEnv,
} from "../utils/config.js";

export async function configCommand(action?: string): Promise<void> {
  switch (action) {
    case "show":
      showConfig();
      break;
    case "path":
      showPaths();
      break;
    default:
      showHelp();
  }
}

function showConfig(): void {
  const config = loadCliConfig();
  if (!config) return;

  console.log(chalk.cyan.bold("\n⚙️  Kindred Configuration\n"));
  console.log(chalk.gray(`Config file: ${getConfigPath()} (defaults filled in)`));
  console.log(JSON.stringify(config, null, 2));

  const envLines = readMaskedEnv();
  console.log(chalk.gray(`\nEnvironment file: ${getEnvPath()}`));
  if (envLines.length === 0) {
    console.log(chalk.gray("  (empty)"));
  }
  for (const line of envLines) {
    console.log(line);
  }
  console.log();
}

function showPaths(): void {
  console.log(`config:   ${getConfigPath()}`);
  console.log(`env:      ${getEnvPath()}`);
  console.log(`database: ${getDatabasePath()}`);
  console.log(`persona:  ${getPersonaPath()}`);
}

function showHelp(): void {
  console.log(chalk.cyan.bold("\n⚙️  Configuration Management\n"));
  console.log("Usage: kindred config <action>\n");
  console.log("Actions:");
  console.log("  show   Print the effective configuration (secrets masked)");
  console.log("  path   Print where config, env, database and persona live\n");
}
