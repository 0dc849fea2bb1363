import { describe, expect, it } from "vitest";
import { extractMedia, toMediaFile } from "./media";
import { CHANNEL_ID, makeMessage } from "../test-utils/fake-bot";

const now = new Date("2026-03-01T12:00:00Z");
const channel = { id: CHANNEL_ID, type: "channel" as const };

describe("toMediaFile", () => {
  it("builds a document entry with a normalized name", () => {
    const msg = makeMessage({
      message_id: 7,
      chat: channel,
      caption: " Great book ",
      document: {
        file_id: "doc-id",
        file_unique_id: "doc-uid",
        file_name: "My_Book-v2.pdf",
        file_size: 2048,
        mime_type: "application/pdf",
      },
    });

    expect(toMediaFile(msg, now)).toEqual({
      _id: "doc-uid",
      file_id: "doc-id",
      file_name: "My Book v2 pdf",
      file_size: 2048,
      file_type: "document",
      mime_type: "application/pdf",
      caption: "Great book",
      chat_id: CHANNEL_ID,
      message_id: 7,
      indexed_at: now,
    });
  });

  it("falls back to the audio title", () => {
    const msg = makeMessage({
      chat: channel,
      audio: {
        file_id: "audio-id",
        file_unique_id: "audio-uid",
        duration: 180,
        title: "Song_Title",
      },
    });

    const file = toMediaFile(msg, now);
    expect(file?.file_type).toBe("audio");
    expect(file?.file_name).toBe("Song Title");
    expect(file?.file_size).toBe(0);
    expect(file?.mime_type).toBeNull();
    expect(file?.caption).toBeNull();
  });

  it("falls back to the first caption line, then to the type", () => {
    const video = {
      file_id: "video-id",
      file_unique_id: "video-uid",
      width: 1280,
      height: 720,
      duration: 60,
    };

    const withCaption = makeMessage({
      message_id: 7,
      chat: channel,
      caption: "First line\nsecond line",
      video,
    });
    expect(toMediaFile(withCaption, now)?.file_name).toBe("First line");

    const bare = makeMessage({ message_id: 7, chat: channel, video });
    expect(toMediaFile(bare, now)?.file_name).toBe("video 7");
  });

  it("skips names made only of separators", () => {
    const document = {
      file_id: "doc-id",
      file_unique_id: "doc-uid",
      file_name: "-.-",
    };

    const captioned = makeMessage({
      message_id: 7,
      chat: channel,
      caption: "Real_Name",
      document,
    });
    expect(toMediaFile(captioned, now)?.file_name).toBe("Real Name");

    const bare = makeMessage({
      message_id: 7,
      chat: channel,
      document: { ...document, file_name: "___" },
    });
    expect(toMediaFile(bare, now)?.file_name).toBe("document 7");
  });

  it("ignores messages without a supported attachment", () => {
    const msg = makeMessage({
      chat: channel,
      photo: [{ file_id: "p", file_unique_id: "pu", width: 1, height: 1 }],
    });
    expect(extractMedia(msg)).toBeNull();
    expect(toMediaFile(msg, now)).toBeNull();
  });
});
