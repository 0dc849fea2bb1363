import TelegramBot from "node-telegram-bot-api";
import { Config, MediaRepository } from "../types";

/**
 * The part of the Bot API the handlers rely on
 */
export type BotApi = Pick<
  TelegramBot,
  | "sendMessage"
  | "editMessageText"
  | "sendDocument"
  | "getChat"
  | "answerInlineQuery"
>;

export interface BotContext {
  bot: BotApi;
  config: Config;
  media: MediaRepository;
  /** username of the running bot, without "@" */
  botUsername: string;
}
