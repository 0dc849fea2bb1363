import TelegramBot from "node-telegram-bot-api";
import { toMediaFile } from "./media";
import { chatRef, wait } from "../utils/helpers";
import { logger } from "../utils/logger";
import { MediaRepository, Principal, SaveResult } from "../types";

/**
 * The part of the Bot API used to copy old posts
 */
export type ForwardingBot = Pick<TelegramBot, "forwardMessage" | "deleteMessage">;

export interface BackfillOptions {
  bot: ForwardingBot;
  media: MediaRepository;
  /** chat that receives the temporary forwarded copies */
  dumpChat: Principal;
  /** pause between messages, in milliseconds */
  delay?: number;
}

export interface BackfillSummary {
  saved: number;
  duplicate: number;
  skipped: number;
  failed: number;
}

type MessageOutcome = SaveResult | "skipped";

async function indexMessage(
  chatId: number,
  messageId: number,
  { bot, media, dumpChat }: BackfillOptions
): Promise<MessageOutcome> {
  // forwarding is how the bot learns the file ids of an old post
  const copy = await bot.forwardMessage(chatRef(dumpChat), chatId, messageId, {
    disable_notification: true,
  });

  try {
    const file = toMediaFile(copy);
    if (!file) return "skipped";
    return await media.save({ ...file, chat_id: chatId, message_id: messageId });
  } finally {
    await bot
      .deleteMessage(copy.chat.id, copy.message_id)
      .catch((error: unknown) =>
        logger.warn({ err: error, messageId: copy.message_id }, "Could not delete forwarded copy")
      );
  }
}

/**
 * Indexes past posts of a channel, given the ids of its media messages
 */
export async function indexHistory(
  chatId: number,
  messageIds: AsyncIterable<number>,
  options: BackfillOptions
): Promise<BackfillSummary> {
  const summary: BackfillSummary = { saved: 0, duplicate: 0, skipped: 0, failed: 0 };

  for await (const messageId of messageIds) {
    try {
      const outcome = await indexMessage(chatId, messageId, options);
      summary[outcome] += 1;
    } catch (error) {
      summary.failed += 1;
      logger.error({ err: error, chatId, messageId }, "Error indexing old post");
    }
    if (options.delay) await wait(options.delay);
  }

  logger.info({ chatId, ...summary }, "Channel history indexed");
  return summary;
}
