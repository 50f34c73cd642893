import chalk from "chalk";
import { decide } from "../../../runtime/src/initiative.js";
import { buildLifeContext, startOfLocalDay } from "../../../runtime/src/life-rhythm.js";
import { withRuntime } from "../utils/config.js";
import { formatDecision } from "../utils/format.js";

/**
 * kindred decide: evaluate the initiative gate against the stored state
 * without advancing it or sending anything.
 */
export async function decideCommand(options: { at?: string } = {}): Promise<void> {
  const now = options.at ? new Date(options.at) : new Date();
  if (Number.isNaN(now.getTime())) {
    console.log(chalk.red(`\n❌ Invalid time '${options.at}'\n`));
    console.log(chalk.gray("Example: kindred decide --at 2026-10-21T18:00\n"));
    return;
  }

  await withRuntime((runtime) => {
    const { initiative } = runtime.config;
    const life = runtime.cycle.lifeOn(now);
    const { character, relationship } = runtime.snapshot(now);
    const decision = decide(
      {
        character,
        relationship,
        life: buildLifeContext(now, character.currentActivity, life),
        lastMessageAt: character.lastMessageAt,
        initiativesToday: runtime.store.history.countInitiativesSince(
          runtime.personaId,
          startOfLocalDay(now),
        ),
        sleepHours: life.sleepHours,
      },
      initiative,
      now,
    );

    console.log(chalk.cyan.bold(`\n🎲 Initiative check at ${now.toLocaleString()}\n`));
    const paint = decision.shouldSend ? chalk.green : chalk.yellow;
    const [verdict, ...details] = formatDecision(decision);
    console.log(paint(verdict));
    for (const line of details) {
      console.log(line);
    }
    console.log(chalk.gray("\nDry run: state was not advanced and nothing was sent.\n"));
  });
}
