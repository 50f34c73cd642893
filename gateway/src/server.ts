import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import type { Runtime } from "../../runtime/src/index.js";
import type { TelegramChannelStatus } from "./channels/telegram.js";

export interface StatusServerDeps {
  runtime: Runtime;
  telegramStatus: () => TelegramChannelStatus;
  version?: string;
  logger?: boolean;
}

/**
 * Local HTTP surface: a liveness probe and a read-only status document.
 */
export async function buildStatusServer(
  deps: StatusServerDeps,
): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.logger ?? false });
  await app.register(cors, { origin: false });

  app.get("/health", async () => {
    return { status: "ok" };
  });

  app.get("/api/status", async () => {
    const { character, relationship } = deps.runtime.snapshot();
    return {
      status: "running",
      version: deps.version ?? "0.1.0",
      uptime: process.uptime(),
      persona: deps.runtime.config.persona,
      character,
      relationship,
      cycle: deps.runtime.cycle.getStatus(),
      memory: await deps.runtime.memory.stats(),
      telegram: deps.telegramStatus(),
    };
  });

  return app;
}
