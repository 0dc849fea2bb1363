import fs from "fs";
import TelegramBot from "node-telegram-bot-api";
import { extractMedia } from "../services/media";
import { chatRef, isListed, parseCommand } from "../utils/helpers";
import { logger } from "../utils/logger";
import { BotContext } from "./context";

const MAX_MESSAGE_LENGTH = 4096;
const PROCESSING_TEXT = "Processing...⏳";

export const ADMIN_COMMANDS = new Set(["channel", "logger", "delete", "stats"]);

export const BOT_COMMANDS: TelegramBot.BotCommand[] = [
  { command: "start", description: "Start the bot" },
  { command: "help", description: "Show available commands" },
  { command: "total", description: "Show the number of saved files" },
];

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function replyProcessing(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<TelegramBot.Message> {
  return ctx.bot.sendMessage(msg.chat.id, PROCESSING_TEXT, {
    reply_to_message_id: msg.message_id,
  });
}

async function editReply(
  ctx: BotContext,
  reply: TelegramBot.Message,
  text: string
): Promise<void> {
  await ctx.bot.editMessageText(text, {
    chat_id: reply.chat.id,
    message_id: reply.message_id,
  });
}

/**
 * Start command handler
 */
export async function handleStart(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  const { channelLink, startMessage } = ctx.config.telegram;
  const keyboard: TelegramBot.InlineKeyboardButton[][] = [
    [
      { text: "Search here", switch_inline_query_current_chat: "" },
      { text: "Go inline", switch_inline_query: "" },
    ],
  ];
  if (channelLink) {
    keyboard.push([{ text: "Join channel", url: `https://t.me/${channelLink}` }]);
  }

  await ctx.bot.sendMessage(msg.chat.id, startMessage, {
    reply_markup: { inline_keyboard: keyboard },
  });
}

export async function handleHelp(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  const lines = [
    "🤖 *Media search bot* 🤖",
    "",
    "Available commands:",
    "/start - start using the bot",
    "/help - show this help",
    "/total - number of saved files",
  ];
  if (isListed(ctx.config.telegram.admins, msg.from)) {
    lines.push(
      "/stats - saved files per type",
      "/channel - information about the monitored chats",
      "/logger - send the log file",
      "/delete - reply to a file to remove it from the database"
    );
  }
  lines.push(
    "",
    "To search, type my username followed by some keywords in any chat. " +
      "Add `| video`, `| audio` or `| document` to filter by type."
  );

  await ctx.bot.sendMessage(msg.chat.id, lines.join("\n"), {
    parse_mode: "Markdown",
  });
}

/**
 * Show total files in database
 */
export async function handleTotal(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  const reply = await replyProcessing(ctx, msg);
  try {
    const total = await ctx.media.count();
    await editReply(ctx, reply, `📁 Saved files: ${total}`);
  } catch (error) {
    logger.error({ err: error }, "Failed to count files");
    await editReply(ctx, reply, `Error: ${errorMessage(error)}`);
  }
}

export async function handleStats(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  const reply = await replyProcessing(ctx, msg);
  try {
    const counts = await ctx.media.countByType();
    const total = Object.values(counts).reduce((sum, n) => sum + n, 0);
    const lines = Object.entries(counts)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([type, count]) => `${type}: ${count}`);
    await editReply(
      ctx,
      reply,
      [`📊 Saved files: ${total}`, ...lines].join("\n")
    );
  } catch (error) {
    logger.error({ err: error }, "Failed to collect stats");
    await editReply(ctx, reply, `Error: ${errorMessage(error)}`);
  }
}

/**
 * Send basic information of the monitored chats
 */
export async function handleChannel(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  for (const channel of ctx.config.telegram.channels) {
    try {
      const chat = await ctx.bot.getChat(chatRef(channel));
      const text = JSON.stringify(chat, null, 2);

      if (text.length > MAX_MESSAGE_LENGTH) {
        const name = chat.title || chat.first_name || String(chat.id);
        await ctx.bot.sendDocument(
          msg.chat.id,
          Buffer.from(text, "utf8"),
          { reply_to_message_id: msg.message_id },
          { filename: `${name}.txt`, contentType: "text/plain" }
        );
      } else {
        await ctx.bot.sendMessage(msg.chat.id, text);
      }
    } catch (error) {
      logger.error({ err: error, channel }, "Failed to get chat information");
      await ctx.bot.sendMessage(
        msg.chat.id,
        `Error for ${chatRef(channel)}: ${errorMessage(error)}`
      );
    }
  }
}

/**
 * Send log file
 */
export async function handleLogger(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  const logFile = ctx.config.logging.file;
  try {
    if (!fs.existsSync(logFile)) {
      await ctx.bot.sendMessage(msg.chat.id, `Log file ${logFile} not found`);
      return;
    }
    await ctx.bot.sendDocument(msg.chat.id, logFile);
  } catch (error) {
    await ctx.bot.sendMessage(msg.chat.id, errorMessage(error));
  }
}

function hasMedia(msg: TelegramBot.Message): boolean {
  return Boolean(
    msg.document ||
      msg.video ||
      msg.audio ||
      msg.photo ||
      msg.animation ||
      msg.sticker ||
      msg.voice ||
      msg.video_note
  );
}

/**
 * Delete the replied file from the database
 */
export async function handleDelete(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  const target = msg.reply_to_message;
  if (!target || !hasMedia(target)) {
    await ctx.bot.sendMessage(
      msg.chat.id,
      "Reply to the file you want to delete with /delete",
      { reply_to_message_id: msg.message_id }
    );
    return;
  }

  const reply = await replyProcessing(ctx, msg);
  const media = extractMedia(target);
  if (!media) {
    await editReply(ctx, reply, "This is not a supported file format");
    return;
  }

  try {
    const removed = await ctx.media.remove(media.attachment.file_unique_id);
    await editReply(
      ctx,
      reply,
      removed
        ? "File successfully deleted from database"
        : "File not found in database"
    );
  } catch (error) {
    logger.error({ err: error }, "Failed to delete file");
    await editReply(ctx, reply, `Error: ${errorMessage(error)}`);
  }
}

/**
 * Text message handler - dispatches bot commands
 */
export async function handleText(
  ctx: BotContext,
  msg: TelegramBot.Message
): Promise<void> {
  const command = parseCommand(msg.text);
  if (!command) return;

  if (
    ADMIN_COMMANDS.has(command.name) &&
    !isListed(ctx.config.telegram.admins, msg.from)
  ) {
    logger.warn(
      { command: command.name, userId: msg.from?.id },
      "Admin command used by non-admin"
    );
    return;
  }

  switch (command.name) {
    case "start":
      return handleStart(ctx, msg);
    case "help":
      return handleHelp(ctx, msg);
    case "total":
      return handleTotal(ctx, msg);
    case "stats":
      return handleStats(ctx, msg);
    case "channel":
      return handleChannel(ctx, msg);
    case "logger":
      return handleLogger(ctx, msg);
    case "delete":
      return handleDelete(ctx, msg);
  }
}
