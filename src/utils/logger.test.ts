import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { configureLogger, isLogLevel, logger } from "./logger";

describe("isLogLevel", () => {
  it("accepts pino levels and silent", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("fatal")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("configureLogger", () => {
  let dir: string | undefined;

  afterEach(() => {
    configureLogger({ level: "silent", file: "unused.log" });
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("replaces the shared logger with one at the configured level", () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "media-bot-log-"));

    const created = configureLogger({
      level: "warn",
      file: path.join(dir, "bot.log"),
    });

    expect(created.level).toBe("warn");
    expect(logger).toBe(created);
  });
});
