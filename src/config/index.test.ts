import { describe, expect, it } from "vitest";
import {
  ConfigError,
  DEFAULT_SHARE_TEXT,
  DEFAULT_START_MESSAGE,
  loadBackfillConfig,
  loadConfig,
  parseBoolean,
  parsePrincipals,
} from "./index";

const baseEnv = {
  BOT_TOKEN: "test-token",
  ADMINS: "1001",
  CHANNELS: "-1001234567890",
  DATABASE_URI: "mongodb://localhost:27017",
  DATABASE_NAME: "media",
};

describe("parsePrincipals", () => {
  it("keeps numeric ids as numbers and normalizes usernames", () => {
    expect(parsePrincipals(" 123 @Alice\n-100200  bob ")).toEqual([
      123,
      "alice",
      -100200,
      "bob",
    ]);
    expect(parsePrincipals(undefined)).toEqual([]);
  });
});

describe("parseBoolean", () => {
  it("accepts the usual truthy spellings", () => {
    expect(parseBoolean("TRUE")).toBe(true);
    expect(parseBoolean("1")).toBe(true);
    expect(parseBoolean("no")).toBe(false);
    expect(parseBoolean(undefined)).toBe(false);
  });
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(baseEnv);

    expect(config.telegram).toEqual({
      token: "test-token",
      admins: [1001],
      channels: [-1001234567890],
      authUsers: [],
      channelLink: "",
      startMessage: DEFAULT_START_MESSAGE,
      shareText: DEFAULT_SHARE_TEXT,
    });
    expect(config.search).toEqual({
      maxResults: 10,
      cacheTime: 300,
      useCaptionFilter: false,
    });
    expect(config.database.collection).toBe("Telegram_files");
    expect(config.logging).toEqual({ level: "info", file: "TelegramBot.log" });
    expect(config.server.port).toBe(3000);
  });

  it("adds admins to a non-empty allowlist", () => {
    const config = loadConfig({ ...baseEnv, AUTH_USERS: "42 @Carol" });
    expect(config.telegram.authUsers).toEqual([42, "carol", 1001]);
  });

  it("reads optional settings", () => {
    const config = loadConfig({
      ...baseEnv,
      MAX_RESULTS: "25",
      USE_CAPTION_FILTER: "yes",
      CHANNEL_LINK: "@MyChannel",
      COLLECTION_NAME: "files",
    });
    expect(config.search.maxResults).toBe(25);
    expect(config.search.useCaptionFilter).toBe(true);
    expect(config.telegram.channelLink).toBe("MyChannel");
    expect(config.database.collection).toBe("files");
  });

  it("reports every missing variable at once", () => {
    try {
      loadConfig({});
      expect.unreachable("loadConfig should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toEqual([
          "BOT_TOKEN is required",
          "ADMINS is required",
          "CHANNELS is required",
          "DATABASE_URI is required",
          "DATABASE_NAME is required",
        ]);
      }
    }
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ ...baseEnv, LOG_LEVEL: "verbose" })).toThrow(
      ConfigError
    );
    expect(loadConfig({ ...baseEnv, LOG_LEVEL: " warn " }).logging.level).toBe(
      "warn"
    );
  });

  it("trims the log file path", () => {
    expect(loadConfig({ ...baseEnv, LOG_FILE: " logs/bot.log " }).logging.file).toBe(
      "logs/bot.log"
    );
  });

  it("rejects out of range numbers", () => {
    expect(() => loadConfig({ ...baseEnv, MAX_RESULTS: "0" })).toThrow(
      "MAX_RESULTS must be an integer between 1 and 50"
    );
  });
});

describe("loadBackfillConfig", () => {
  const config = loadConfig(baseEnv);

  it("reads the user session and defaults the target chat to an admin", () => {
    expect(
      loadBackfillConfig(
        { USER_SESSION: "test-session", API_ID: "12345", API_HASH: "test-hash" },
        config
      )
    ).toEqual({
      session: "test-session",
      apiId: 12345,
      apiHash: "test-hash",
      dumpChat: 1001,
    });
  });

  it("accepts an explicit target chat", () => {
    expect(
      loadBackfillConfig(
        {
          USER_SESSION: "test-session",
          API_ID: "12345",
          API_HASH: "test-hash",
          BACKFILL_CHAT: "@Dump_Chat",
        },
        config
      ).dumpChat
    ).toBe("dump_chat");
  });

  it("lists every missing setting", () => {
    const noNumericAdmin = loadConfig({ ...baseEnv, ADMINS: "alice" });
    try {
      loadBackfillConfig({ API_ID: "abc" }, noNumericAdmin);
      expect.unreachable("loadBackfillConfig should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toEqual([
          "USER_SESSION is required",
          "API_ID must be a positive integer",
          "API_HASH is required",
          "BACKFILL_CHAT is required when no admin is given by id",
        ]);
      }
    }
  });
});
