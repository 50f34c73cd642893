import chalk from "chalk";
import { execSync } from "child_process";
import {
  getPersonaPath,
  loadPersona,
  resetPersona,
} from "../../../runtime/src/persona.js";
import { loadCliConfig } from "../utils/config.js";

/**
 * kindred persona [action]
 *
 * Actions:
 *   show   : Print the current persona.md
 *   path   : Print where persona.md lives
 *   edit   : Open persona.md in $EDITOR
 *   reset  : Restore the default persona sheet
 */
export async function personaCommand(action?: string): Promise<void> {
  const config = loadCliConfig();
  if (!config) return;
  const name = config.persona.name;

  switch (action) {
    case "show": {
      console.log(loadPersona(name));
      break;
    }

    case "path": {
      console.log(getPersonaPath());
      break;
    }

    case "edit": {
      const personaPath = getPersonaPath();
      loadPersona(name);
      const editor = process.env.EDITOR || "nano";
      console.log(chalk.cyan(`Opening ${personaPath} in ${editor}...`));
      try {
        execSync(`${editor} "${personaPath}"`, { stdio: "inherit" });
        console.log(
          chalk.green("✅ Persona updated. Restart the gateway to apply."),
        );
      } catch (error) {
        console.error(
          chalk.red(
            `Failed to open editor: ${error instanceof Error ? error.message : String(error)}`,
          ),
        );
      }
      break;
    }

    case "reset": {
      resetPersona(name);
      console.log(
        chalk.green("✅ Persona reset to default. Restart the gateway to apply."),
      );
      break;
    }

    default:
      console.log(chalk.cyan(`${name} — persona sheet\n`));
      console.log("Usage: kindred persona <action>\n");
      console.log("Actions:");
      console.log("  show   — Print the current persona.md");
      console.log("  path   — Print the persona.md location");
      console.log("  edit   — Open persona.md in your editor");
      console.log("  reset  — Restore the default persona");
      break;
  }
}
