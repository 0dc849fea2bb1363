import TelegramBot from "node-telegram-bot-api";
import { logger } from "../utils/logger";
import { Config, MediaRepository } from "../types";
import { BotContext } from "./context";
import { BOT_COMMANDS, handleText } from "./handlers";
import { handleInlineQuery } from "./inline";
import { handlePost } from "./indexer";

function logFailure(event: string) {
  return (error: unknown) => logger.error({ err: error, event }, "Handler failed");
}

/**
 * Initialize and configure the Telegram bot
 */
export async function initBot(
  config: Config,
  media: MediaRepository
): Promise<TelegramBot> {
  const bot = new TelegramBot(config.telegram.token, {
    polling: { autoStart: false },
  });
  const me = await bot.getMe();
  const ctx: BotContext = { bot, config, media, botUsername: me.username || "" };

  // Register event handlers
  bot.on("text", (msg) => {
    handleText(ctx, msg).catch(logFailure("text"));
  });
  bot.on("message", (msg) => {
    handlePost(ctx, msg).catch(logFailure("message"));
  });
  bot.on("channel_post", (msg) => {
    handlePost(ctx, msg).catch(logFailure("channel_post"));
  });
  bot.on("inline_query", (query) => {
    handleInlineQuery(ctx, query).catch(logFailure("inline_query"));
  });
  bot.on("polling_error", (error) => {
    logger.error({ err: error }, "Polling error");
  });

  bot.setMyCommands(BOT_COMMANDS).catch(logFailure("setMyCommands"));

  await bot.startPolling();
  logger.info({ username: me.username }, "Bot is running...");
  return bot;
}
