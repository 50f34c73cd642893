import inquirer from "inquirer";
import chalk from "chalk";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import ora from "ora";
import { Agent, type LLMProvider } from "../../../agent/src/index.js";
import {
  ConfigError,
  getKindredDir,
  parseKindredConfig,
} from "../../../runtime/src/config.js";
import { getPersonaPath, loadPersona } from "../../../runtime/src/persona.js";
import {
  getConfigPath,
  getEnvPath,
  mergeEnvContent,
} from "../utils/config.js";

export interface InitAnswers {
  personaName: string;
  provider: LLMProvider;
  model: string;
  telegramEnabled: boolean;
  telegramOwnerUserId?: number;
}

const MODELS: Record<LLMProvider, string[]> = {
  openai: ["gpt-4o-mini", "gpt-4o"],
  anthropic: ["claude-3-5-sonnet-20240620", "claude-3-haiku-20240307"],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/**
 * Fold the init answers into an existing config.json document, keeping every
 * setting the wizard does not ask about.
 */
export function buildConfigDocument(
  existing: unknown,
  answers: InitAnswers,
): Record<string, unknown> {
  const base = isRecord(existing) ? existing : {};
  const telegram: Record<string, unknown> = {
    ...section(base, "telegram"),
    enabled: answers.telegramEnabled,
  };
  if (answers.telegramOwnerUserId !== undefined) {
    telegram.ownerUserId = answers.telegramOwnerUserId;
  }
  return {
    ...base,
    persona: { ...section(base, "persona"), name: answers.personaName },
    agent: {
      ...section(base, "agent"),
      provider: answers.provider,
      model: answers.model,
    },
    telegram,
  };
}

function readExistingConfig(path: string): unknown {
  if (!existsSync(path)) return {};
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    console.log(
      chalk.yellow(
        `⚠️  Ignoring unreadable ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ),
    );
    return {};
  }
}

export async function initCommand(): Promise<void> {
  console.log(chalk.cyan.bold("\n💫 Welcome to Kindred!\n"));
  console.log("Let's set up your companion...\n");

  const configDir = getKindredDir();
  const envPath = getEnvPath(configDir);
  const configPath = getConfigPath(configDir);

  if (existsSync(envPath)) {
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
      {
        type: "confirm",
        name: "overwrite",
        message: "Kindred is already configured. Update the existing configuration?",
        default: false,
      },
    ]);

    if (!overwrite) {
      console.log(chalk.yellow("\n👋 Setup cancelled.\n"));
      return;
    }
  }

  // 1. Persona
  const { personaName } = await inquirer.prompt<{ personaName: string }>([
    {
      type: "input",
      name: "personaName",
      message: "What is your companion's name?",
      default: "Elin",
      validate: (input: string) => input.trim().length > 0 || "Name required",
    },
  ]);

  // 2. Text generation
  const { provider } = await inquirer.prompt<{ provider: LLMProvider }>([
    {
      type: "list",
      name: "provider",
      message: "Choose your LLM provider:",
      choices: [
        { name: "OpenAI (enables similarity memory)", value: "openai" },
        { name: "Anthropic", value: "anthropic" },
      ],
    },
  ]);

  const keyName = provider === "openai" ? "OPENAI_API_KEY" : "ANTHROPIC_API_KEY";
  const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
    {
      type: "password",
      name: "apiKey",
      message: `Enter your ${provider === "openai" ? "OpenAI" : "Anthropic"} API key:`,
      validate: (input: string) => input.length > 0 || "API key required",
    },
  ]);

  const { model } = await inquirer.prompt<{ model: string }>([
    {
      type: "list",
      name: "model",
      message: "Choose default model:",
      choices: MODELS[provider],
    },
  ]);

  // 3. Telegram
  const { telegramEnabled } = await inquirer.prompt<{ telegramEnabled: boolean }>([
    {
      type: "confirm",
      name: "telegramEnabled",
      message: "Connect a Telegram bot now?",
      default: true,
    },
  ]);

  const envValues: Record<string, string> = { [keyName]: apiKey };
  let telegramOwnerUserId: number | undefined;
  if (telegramEnabled) {
    const telegram = await inquirer.prompt<{ token: string; ownerId: string }>([
      {
        type: "password",
        name: "token",
        message: "Telegram bot token (from @BotFather):",
        validate: (input: string) => input.length > 0 || "Token required",
      },
      {
        type: "input",
        name: "ownerId",
        message: "Your Telegram user id:",
        validate: (input: string) =>
          /^-?\d+$/.test(input.trim()) || "User id must be a number",
      },
    ]);
    envValues.TELEGRAM_BOT_TOKEN = telegram.token;
    telegramOwnerUserId = Number.parseInt(telegram.ownerId.trim(), 10);
  }

  const answers: InitAnswers = {
    personaName: personaName.trim(),
    provider,
    model,
    telegramEnabled,
    telegramOwnerUserId,
  };
  const document = buildConfigDocument(readExistingConfig(configPath), answers);

  try {
    parseKindredConfig(document);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.log(chalk.red(`\n❌ ${error.message}\n`));
      return;
    }
    throw error;
  }

  // 4. Write files
  mkdirSync(configDir, { recursive: true });
  const existingEnv = existsSync(envPath) ? readFileSync(envPath, "utf-8") : "";
  writeFileSync(envPath, mergeEnvContent(existingEnv, envValues));
  writeFileSync(configPath, JSON.stringify(document, null, 2));
  loadPersona(answers.personaName, configDir);

  console.log(chalk.green("\n✅ Configuration saved!"));
  console.log(chalk.gray(`   Config: ${configPath}`));
  console.log(chalk.gray(`   Env: ${envPath}`));
  console.log(chalk.gray(`   Persona: ${getPersonaPath(configDir)}\n`));

  // 5. Connection check
  const spinner = ora("Testing connection to LLM...").start();
  try {
    const agent = new Agent({ provider, model, apiKey, maxRetries: 0 });
    await agent.generate({
      category: "analytics",
      maxTokens: 5,
      messages: [{ role: "user", content: "Reply with OK." }],
    });
    spinner.succeed("Connection verified");
  } catch (error) {
    spinner.fail(
      `Connection failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    console.log(chalk.gray("   Check the API key in the env file and try again.\n"));
  }

  console.log(chalk.cyan("Next steps:"));
  console.log(chalk.gray("  kindred state        # see what your companion is up to"));
  console.log(chalk.gray("  npm start            # run the gateway\n"));
}
