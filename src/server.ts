import express from "express";
import { Client, Events, GatewayIntentBits, Partials } from "discord.js";
import type { Server } from "http";
import { initCompanionSystems, type CompanionSystems } from "./index.js";
import { toIncomingMessage } from "./discord/adapter.js";
import { describeError } from "./errors.js";
import { buildHealthReport } from "./health.js";
import { loadEnv } from "./utils/env.js";
import { logger } from "./utils/logger.js";

// ============================================
// 🩺 HEALTH ENDPOINT
// ============================================

function createHttpApp(systems: Pick<CompanionSystems, "memory">) {
  const app = express();
  const startedAt = Date.now();

  app.get("/health", async (_req, res) => {
    res.json(await buildHealthReport(systems.memory, startedAt));
  });

  return app;
}

// ============================================
// 🤖 DISCORD CLIENT
// ============================================

async function main() {
  const env = loadEnv();
  const systems = initCompanionSystems(env);

  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    partials: [Partials.Channel],
  });

  client.once(Events.ClientReady, (ready) => {
    logger.info(`🤖 Logged in as ${ready.user.tag}`);
  });

  client.on(Events.MessageCreate, (message) => {
    const incoming = toIncomingMessage(message);
    if (!incoming) return;

    systems.handleMessage(incoming).catch((err) => {
      logger.error(`Failed to deliver reply to ${incoming.subjectId}:`, err);
    });
  });

  const server: Server = createHttpApp(systems).listen(env.PORT, () => {
    logger.info(`🩺 Health endpoint listening on :${env.PORT}`);
  });

  // ============================================
  // 🛡️ GRACEFUL SHUTDOWN
  // ============================================
  async function gracefulShutdown(signal: string) {
    logger.info(`🛑 Received ${signal} - shutting down...`);
    try {
      await client.destroy();
    } catch (err) {
      logger.error(`Error while closing Discord client: ${describeError(err)}`);
    }
    server.close(() => process.exit(0));
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  await client.login(env.DISCORD_BOT_TOKEN);
}

main().catch((err) => {
  logger.error(`Startup failed: ${describeError(err)}`);
  process.exit(1);
});
