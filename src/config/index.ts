import { isLogLevel } from "../utils/logger";
import { BackfillConfig, Config, Principal } from "../types";

export const DEFAULT_START_MESSAGE =
  "Hi! I can search the files posted to our channel.\n\n" +
  "Use the buttons below, or type my username followed by a few keywords in any chat.";

export const DEFAULT_SHARE_TEXT =
  "Hi! Files from our channel can now be searched with {username}";

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n- ${problems.join("\n- ")}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * Splits a whitespace separated list of ids and usernames
 */
export function parsePrincipals(value: string | undefined): Principal[] {
  if (!value) return [];
  return value
    .split(/\s+/)
    .filter((item) => item.length > 0)
    .map((item) =>
      /^-?\d+$/.test(item) ? Number(item) : item.replace(/^@/, "").toLowerCase()
    );
}

export function parseBoolean(value: string | undefined): boolean {
  return /^(1|true|yes|on)$/i.test((value || "").trim());
}

/**
 * Builds the application config from environment variables
 */
export function loadConfig(env: Env): Config {
  const problems: string[] = [];

  const required = (name: string): string => {
    const value = env[name]?.trim();
    if (!value) {
      problems.push(`${name} is required`);
      return "";
    }
    return value;
  };

  const integer = (
    name: string,
    fallback: number,
    min: number,
    max: number
  ): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      problems.push(`${name} must be an integer between ${min} and ${max}`);
      return fallback;
    }
    return value;
  };

  const logLevel = env.LOG_LEVEL?.trim() || "info";
  if (!isLogLevel(logLevel)) {
    problems.push(
      "LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, silent"
    );
  }

  const token = required("BOT_TOKEN");
  const admins = parsePrincipals(required("ADMINS"));
  const channels = parsePrincipals(required("CHANNELS"));
  const authUsers = parsePrincipals(env.AUTH_USERS);

  const config: Config = {
    telegram: {
      token,
      admins,
      channels,
      // admins can always search once the allowlist is in use
      authUsers: authUsers.length > 0 ? [...authUsers, ...admins] : [],
      channelLink: (env.CHANNEL_LINK || "").trim().replace(/^@/, ""),
      startMessage: env.START_MESSAGE || DEFAULT_START_MESSAGE,
      shareText: env.SHARE_BUTTON_TEXT || DEFAULT_SHARE_TEXT,
    },
    search: {
      maxResults: integer("MAX_RESULTS", 10, 1, 50),
      cacheTime: integer("CACHE_TIME", 300, 0, 86400),
      useCaptionFilter: parseBoolean(env.USE_CAPTION_FILTER),
    },
    database: {
      uri: required("DATABASE_URI"),
      name: required("DATABASE_NAME"),
      collection: env.COLLECTION_NAME?.trim() || "Telegram_files",
    },
    logging: {
      level: logLevel,
      file: env.LOG_FILE?.trim() || "TelegramBot.log",
    },
    server: {
      port: integer("PORT", 3000, 0, 65535),
    },
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}

/**
 * Reads the user session settings needed to walk channel history
 */
export function loadBackfillConfig(env: Env, config: Config): BackfillConfig {
  const problems: string[] = [];

  const session = env.USER_SESSION?.trim() || "";
  if (!session) problems.push("USER_SESSION is required");

  const apiId = Number(env.API_ID?.trim());
  if (!Number.isInteger(apiId) || apiId <= 0) {
    problems.push("API_ID must be a positive integer");
  }

  const apiHash = env.API_HASH?.trim() || "";
  if (!apiHash) problems.push("API_HASH is required");

  // forwarded copies land here; the first numeric admin by default
  const dumpChat = env.BACKFILL_CHAT?.trim()
    ? parsePrincipals(env.BACKFILL_CHAT)[0]
    : config.telegram.admins.find((admin) => typeof admin === "number");
  if (dumpChat === undefined) {
    problems.push("BACKFILL_CHAT is required when no admin is given by id");
  }

  if (problems.length > 0 || dumpChat === undefined) {
    throw new ConfigError(problems);
  }

  return { session, apiId, apiHash, dumpChat };
}
