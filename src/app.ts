import "dotenv/config";
import TelegramBot from "node-telegram-bot-api";
import { initBot } from "./bot";
import { initServer } from "./server";
import { loadConfig } from "./config";
import { connectDatabase, MongoMediaRepository } from "./db/media";
import { configureLogger, logger } from "./utils/logger";
import { Config, MediaRepository } from "./types";

/**
 * Lets every numeric admin know the bot is up
 */
async function notifyAdmins(
  bot: TelegramBot,
  config: Config,
  media: MediaRepository
): Promise<void> {
  const total = await media.count();
  const statusMessage =
    `🤖 Bot started\n\n` +
    `🗄 Database: ✅ (${total} files)\n` +
    `📡 Monitored chats: ${config.telegram.channels.length}\n` +
    `🚀 Server: ✅ port ${config.server.port}\n\n` +
    `Started at: ${new Date().toISOString()}`;

  for (const admin of config.telegram.admins) {
    if (typeof admin !== "number") continue;
    try {
      await bot.sendMessage(admin, statusMessage);
    } catch (error) {
      logger.error(
        { err: error, admin },
        "Failed to send startup notification to admin"
      );
    }
  }
}

/**
 * Initialize the application
 */
async function initialize(): Promise<void> {
  try {
    logger.info("Starting application...");
    const config = loadConfig(process.env);
    configureLogger(config.logging);

    const connection = await connectDatabase(
      config.database.uri,
      config.database.name
    );
    const media = new MongoMediaRepository(connection, config.database.collection);
    await media.syncIndexes();

    // Initialize Telegram bot
    const bot = await initBot(config, media);

    // Initialize Express server
    initServer(media, config.server.port);

    await notifyAdmins(bot, config, media).catch((error) =>
      logger.error({ err: error }, "Failed to notify admins")
    );

    const shutdown = async (signal: string) => {
      logger.info({ signal }, "Shutting down");
      try {
        await bot.stopPolling();
        await connection.close();
      } catch (error) {
        logger.error({ err: error }, "Error during shutdown");
      }
      process.exit(0);
    };
    process.once("SIGINT", (signal) => void shutdown(signal));
    process.once("SIGTERM", (signal) => void shutdown(signal));

    logger.info("Application initialized successfully");
  } catch (error) {
    logger.fatal({ err: error }, "Failed to initialize application");
    process.exit(1);
  }
}

// Start the application
void initialize();
