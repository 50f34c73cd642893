import chalk from "chalk";
import { loadDayPlan } from "../../../runtime/src/day-plan.js";
import { buildLifeContext, dayKey } from "../../../runtime/src/life-rhythm.js";
import { withRuntime } from "../utils/config.js";
import { formatTimestamp, truncate } from "../utils/format.js";

/**
 * kindred state: the persona's current mood, energy, activity and closeness,
 * plus the latest state events.
 */
export async function stateCommand(options: { events?: string } = {}): Promise<void> {
  await withRuntime((runtime) => {
    const now = new Date();
    const { character, relationship } = runtime.snapshot(now);
    const life = buildLifeContext(now, character.currentActivity, runtime.cycle.lifeOn(now));
    const cycle = runtime.cycle.getStatus();

    console.log(chalk.cyan.bold(`\n💫 ${runtime.config.persona.name}\n`));
    console.log(`Mood:        ${chalk.bold(character.mood)}`);
    console.log(`Energy:      ${character.energyLevel}/100`);
    console.log(`Activity:    ${character.currentActivity} @ ${character.location}`);
    if (life.nextActivity && life.nextActivityAt !== undefined) {
      console.log(
        chalk.gray(`             next: ${life.nextActivity} at ${formatTimestamp(life.nextActivityAt)}`),
      );
    }
    console.log(`Last message: ${formatTimestamp(character.lastMessageAt)}`);
    console.log(`Updated:     ${formatTimestamp(character.updatedAt)}`);

    const plan = loadDayPlan(runtime.store.state, runtime.personaId, dayKey(now));
    console.log(chalk.bold("\nToday"));
    if (!plan) {
      console.log(chalk.gray("  following the schedule table"));
    } else {
      if (plan.dayMood) console.log(chalk.gray(`  ${plan.dayMood}`));
      for (const entry of plan.activities) {
        console.log(
          `  ${entry.from}-${entry.to} ${entry.activity.padEnd(9)} ${truncate(entry.description, 50)} @ ${entry.location}`,
        );
      }
    }

    console.log(chalk.bold("\nRelationship"));
    console.log(`  intimacy:     ${relationship.intimacyLevel.toFixed(1)}/100`);
    console.log(`  interactions: ${relationship.interactionCount}`);
    console.log(`  last:         ${formatTimestamp(relationship.lastInteractionAt)}`);

    console.log(chalk.bold("\nCycle"));
    console.log(`  last tick:          ${formatTimestamp(cycle.lastTickAt)}`);
    console.log(`  last consolidation: ${cycle.lastConsolidationDay ?? "never"}`);

    const limit = Number.parseInt(options.events || "", 10);
    const events = runtime.store.history.recentStateEvents(
      runtime.personaId,
      Number.isFinite(limit) && limit > 0 ? limit : 5,
    );
    console.log(chalk.bold("\nRecent events"));
    if (events.length === 0) {
      console.log(chalk.gray("  none"));
    }
    for (const event of events) {
      console.log(
        `  ${chalk.gray(formatTimestamp(event.createdAt))} ${event.eventType.padEnd(10)} ${truncate(event.description, 70)}`,
      );
    }
    console.log();
  });
}
