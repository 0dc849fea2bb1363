import "dotenv/config";
import bigInt from "big-integer";
import TelegramBot from "node-telegram-bot-api";
import { Api, TelegramClient } from "telegram";
import { LogLevel } from "telegram/extensions/Logger";
import { StringSession } from "telegram/sessions";
import { loadBackfillConfig, loadConfig, parsePrincipals } from "../config";
import { connectDatabase, MongoMediaRepository } from "../db/media";
import { indexHistory } from "../services/backfill";
import { chatRef } from "../utils/helpers";
import { configureLogger, logger } from "../utils/logger";
import { Principal } from "../types";

const FORWARD_DELAY = 1000;

type HistoryEntity = Parameters<TelegramClient["iterMessages"]>[0];

/**
 * Yields the ids of document, video and audio posts, oldest first
 */
async function* mediaMessageIds(
  client: TelegramClient,
  entity: HistoryEntity
): AsyncGenerator<number> {
  for await (const message of client.iterMessages(entity, { reverse: true })) {
    if (message.media instanceof Api.MessageMediaDocument) {
      yield message.id;
    }
  }
}

/**
 * Indexes the existing posts of the given chats, or of every monitored chat
 */
async function backfill(): Promise<void> {
  const config = loadConfig(process.env);
  configureLogger(config.logging);
  const options = loadBackfillConfig(process.env, config);

  const requested = parsePrincipals(process.argv.slice(2).join(" "));
  const channels: Principal[] =
    requested.length > 0 ? requested : config.telegram.channels;

  const connection = await connectDatabase(config.database.uri, config.database.name);
  const media = new MongoMediaRepository(connection, config.database.collection);
  await media.syncIndexes();

  const bot = new TelegramBot(config.telegram.token, { polling: false });
  const client = new TelegramClient(
    new StringSession(options.session),
    options.apiId,
    options.apiHash,
    { connectionRetries: 5 }
  );
  client.setLogLevel(LogLevel.WARN);

  try {
    await client.connect();
    if (!(await client.checkAuthorization())) {
      throw new Error("USER_SESSION is not an authorized user session");
    }
    // fills the entity cache so channels can be found by id
    await client.getDialogs({});

    for (const channel of channels) {
      try {
        const chat = await bot.getChat(chatRef(channel));
        const entity = typeof channel === "string" ? channel : bigInt(chat.id);
        logger.info({ chatId: chat.id, title: chat.title }, "Indexing channel history");
        await indexHistory(chat.id, mediaMessageIds(client, entity), {
          bot,
          media,
          dumpChat: options.dumpChat,
          delay: FORWARD_DELAY,
        });
      } catch (error) {
        logger.error({ err: error, channel: chatRef(channel) }, "Error indexing channel");
      }
    }
  } finally {
    await client.disconnect();
    await connection.close();
  }
}

backfill().then(
  () => process.exit(0),
  (error: unknown) => {
    logger.fatal({ err: error }, "Backfill failed");
    process.exit(1);
  }
);
