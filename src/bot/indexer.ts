import TelegramBot from "node-telegram-bot-api";
import { toMediaFile } from "../services/media";
import { isListed } from "../utils/helpers";
import { logger } from "../utils/logger";
import { BotContext } from "./context";

/**
 * Stores the attachment of a post from a monitored channel or group
 */
export async function handlePost(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  if (!isListed(ctx.config.telegram.channels, msg.chat)) return;

  const file = toMediaFile(msg);
  if (!file) return;

  try {
    const result = await ctx.media.save(file);
    if (result === "duplicate") {
      logger.warn(
        { fileName: file.file_name, chatId: file.chat_id },
        "File is already saved in database"
      );
    } else {
      logger.info(
        { fileName: file.file_name, fileType: file.file_type, chatId: file.chat_id },
        "File saved in database"
      );
    }
  } catch (error) {
    logger.error(
      { err: error, fileName: file.file_name, messageId: msg.message_id },
      "Error saving file"
    );
  }
}
