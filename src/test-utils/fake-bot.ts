import TelegramBot from "node-telegram-bot-api";
import { vi } from "vitest";
import { BotApi, BotContext } from "../bot/context";
import { loadConfig } from "../config";
import { MediaRepository } from "../types";

export const ADMIN_ID = 1001;
export const USER_ID = 2002;
export const CHANNEL_ID = -1001234567890;
export const BOT_USERNAME = "MediaSearchBot";

export function makeConfig(env: Record<string, string> = {}) {
  return loadConfig({
    BOT_TOKEN: "test-token",
    ADMINS: String(ADMIN_ID),
    CHANNELS: `${CHANNEL_ID} @files_group`,
    DATABASE_URI: "mongodb://localhost:27017",
    DATABASE_NAME: "test",
    LOG_FILE: "test.log",
    ...env,
  });
}

export function makeFakeBot() {
  let nextMessageId = 500;
  const sent = (chatId: TelegramBot.ChatId): TelegramBot.Message => ({
    message_id: nextMessageId++,
    date: 0,
    chat: { id: Number(chatId), type: "private" },
  });

  return {
    sendMessage: vi.fn<BotApi["sendMessage"]>(async (chatId) => sent(chatId)),
    editMessageText: vi.fn<BotApi["editMessageText"]>(async () => true),
    sendDocument: vi.fn<BotApi["sendDocument"]>(async (chatId) => sent(chatId)),
    getChat: vi.fn<BotApi["getChat"]>(),
    answerInlineQuery: vi.fn<BotApi["answerInlineQuery"]>(async () => true),
  };
}

export function makeContext(
  media: MediaRepository,
  env: Record<string, string> = {}
): { ctx: BotContext; bot: ReturnType<typeof makeFakeBot> } {
  const bot = makeFakeBot();
  return {
    ctx: { bot, config: makeConfig(env), media, botUsername: BOT_USERNAME },
    bot,
  };
}

export function makeMessage(
  overrides: Partial<TelegramBot.Message> = {}
): TelegramBot.Message {
  return {
    message_id: 10,
    date: 0,
    chat: { id: USER_ID, type: "private" },
    from: { id: USER_ID, is_bot: false, first_name: "Test" },
    ...overrides,
  };
}
