import TelegramBot from "node-telegram-bot-api";
import { parseInlineQuery, parseOffset, searchMedia } from "../services/search";
import { formatFileSize, isListed } from "../utils/helpers";
import { logger } from "../utils/logger";
import { MediaFile } from "../types";
import { BotContext } from "./context";

export function isInlineQueryAllowed(
  ctx: BotContext,
  query: TelegramBot.InlineQuery
): boolean {
  const { authUsers } = ctx.config.telegram;
  return authUsers.length === 0 || isListed(authUsers, query.from);
}

/**
 * Link opening Telegram's share dialog with the configured text
 */
export function buildShareUrl(template: string, botUsername: string): string {
  const text = template.split("{username}").join(`@${botUsername}`);
  return `https://t.me/share/url?url=${encodeURIComponent(text)}`;
}

/**
 * Builds the inline result sending a stored file
 */
export function toInlineResult(
  file: MediaFile,
  query: string,
  shareUrl: string
): TelegramBot.InlineQueryResult {
  const reply_markup: TelegramBot.InlineKeyboardMarkup = {
    inline_keyboard: [
      [
        { text: "Search again", switch_inline_query_current_chat: query },
        { text: "Share bot", url: shareUrl },
      ],
    ],
  };
  const description = `Size: ${formatFileSize(file.file_size)}\nType: ${file.file_type}`;
  const caption = file.caption || "";

  switch (file.file_type) {
    case "video":
      return {
        type: "video",
        id: file._id,
        video_file_id: file.file_id,
        title: file.file_name,
        description,
        caption,
        reply_markup,
      };
    case "audio":
      return {
        type: "audio",
        id: file._id,
        audio_file_id: file.file_id,
        caption,
        reply_markup,
      };
    case "document":
      return {
        type: "document",
        id: file._id,
        document_file_id: file.file_id,
        title: file.file_name,
        description,
        caption,
        reply_markup,
      };
  }
}

/**
 * Inline query handler - answers with a page of matching files
 */
export async function handleInlineQuery(
  ctx: BotContext,
  query: TelegramBot.InlineQuery
): Promise<void> {
  const { bot, config, media } = ctx;

  if (!isInlineQueryAllowed(ctx, query)) {
    await bot.answerInlineQuery(query.id, [], {
      cache_time: 0,
      switch_pm_text: "You have to subscribe to use this bot",
      switch_pm_parameter: "subscribe",
    });
    return;
  }

  const { keywords } = parseInlineQuery(query.query);
  const offset = parseOffset(query.offset);
  const shareUrl = buildShareUrl(config.telegram.shareText, ctx.botUsername);

  try {
    const { files, nextOffset } = await searchMedia(
      media,
      query.query,
      config.search,
      offset
    );

    if (files.length > 0) {
      await bot.answerInlineQuery(
        query.id,
        files.map((file) => toInlineResult(file, query.query, shareUrl)),
        {
          is_personal: true,
          cache_time: config.search.cacheTime,
          switch_pm_text: `📁 Results${keywords ? ` for ${keywords}` : ""}`,
          switch_pm_parameter: "start",
          next_offset: nextOffset,
        }
      );
      return;
    }

    await bot.answerInlineQuery(query.id, [], {
      is_personal: true,
      cache_time: config.search.cacheTime,
      switch_pm_text: `❌ No results${keywords ? ` for "${keywords}"` : ""}`,
      switch_pm_parameter: "okay",
    });
  } catch (error) {
    logger.error(
      { err: error, query: query.query, offset },
      "Error answering inline query"
    );
    await bot.answerInlineQuery(query.id, [], { cache_time: 0 });
  }
}
