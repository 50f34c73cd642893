import { Agent } from "../../agent/src/index.js";
import { Runtime } from "../../runtime/src/index.js";
import {
  ensureEnvLoaded,
  getDatabasePath,
  getKindredDir,
  loadKindredConfig,
} from "../../runtime/src/config.js";
import { loadPersona } from "../../runtime/src/persona.js";
import { CompanionService } from "./companion-service.js";
import { createDayPlanner, GeneratedMemoryCompressor } from "./inner-life.js";
import { TelegramChannel } from "./channels/telegram.js";
import { buildStatusServer } from "./server.js";

ensureEnvLoaded();

async function start() {
  console.log("🔧 Initializing Kindred runtime...");
  const config = loadKindredConfig();
  const dir = getKindredDir();

  const agent = new Agent({
    provider: config.agent.provider,
    model: config.agent.model,
    embeddingModel: config.agent.embeddingModel,
    apiKey:
      config.agent.provider === "anthropic"
        ? process.env.ANTHROPIC_API_KEY
        : process.env.OPENAI_API_KEY,
    timeoutMs: config.agent.timeoutMs,
    maxRetries: config.agent.maxRetries,
  });

  const runtime = await Runtime.create({
    config,
    databasePath: getDatabasePath(dir),
    embedder: config.agent.provider === "openai" ? agent : null,
    compressor: new GeneratedMemoryCompressor(agent, config.persona.name),
  });
  console.log(`✅ Runtime initialized (persona "${config.persona.id}")`);

  const personaSheet = loadPersona(config.persona.name, dir);
  console.log("✅ Loaded persona.md");

  const companion = new CompanionService(runtime, agent, { personaSheet });

  const telegramChannel = new TelegramChannel(
    {
      enabled: config.telegram.enabled,
      botToken: process.env.TELEGRAM_BOT_TOKEN,
      ownerUserId: config.telegram.ownerUserId,
      ownerChatId: config.telegram.ownerChatId,
      pollTimeoutSec: config.telegram.pollTimeoutSec,
      retryBaseMs: config.telegram.retryBaseMs,
      retryMaxMs: config.telegram.retryMaxMs,
      personaName: config.persona.name,
    },
    companion,
  );
  companion.setTransport(telegramChannel);

  const app = await buildStatusServer({
    runtime,
    telegramStatus: () => telegramChannel.getStatus(),
    logger: true,
  });

  const port = config.gateway.port;
  await app.listen({ port, host: "127.0.0.1" });
  console.log(`🚀 Gateway running on http://127.0.0.1:${port}`);

  await telegramChannel.start().catch((error) => {
    console.warn(
      "⚠️ Telegram channel startup failed:",
      error instanceof Error ? error.message : error,
    );
  });

  runtime.cycle.onInitiative((request) => companion.deliverInitiative(request));
  runtime.cycle.onPlanDay(
    createDayPlanner(agent, {
      personaName: config.persona.name,
      personaSheet,
      life: config.life,
    }),
  );
  runtime.cycle.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("\n🛑 Shutting down gateway...");
    runtime.cycle.stop();
    await telegramChannel.stop();
    await companion.drain();
    await app.close();
    await runtime.shutdown();
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
  process.on("SIGINT", () => {
    shutdown().catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}

start().catch((error) => {
  console.error("Fatal error starting gateway:", error);
  process.exit(1);
});
