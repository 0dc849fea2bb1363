import TelegramBot from "node-telegram-bot-api";
import { normalizeFileName } from "../utils/helpers";
import { FILE_TYPES, FileType, MediaFile } from "../types";

interface Attachment {
  file_id: string;
  file_unique_id: string;
  file_name?: string;
  file_size?: number;
  mime_type?: string;
  title?: string;
}

export interface ExtractedMedia {
  fileType: FileType;
  attachment: Attachment;
}

/**
 * Returns the first supported attachment of a message
 */
export function extractMedia(msg: TelegramBot.Message): ExtractedMedia | null {
  for (const fileType of FILE_TYPES) {
    const attachment: Attachment | undefined = msg[fileType];
    if (attachment) {
      return { fileType, attachment };
    }
  }
  return null;
}

/**
 * Builds the document stored for a message carrying a supported attachment
 */
export function toMediaFile(
  msg: TelegramBot.Message,
  now: Date = new Date()
): MediaFile | null {
  const media = extractMedia(msg);
  if (!media) return null;

  const { fileType, attachment } = media;
  const caption = msg.caption?.trim() || null;
  // a name made only of separators normalizes to nothing
  const fileName =
    [attachment.file_name, attachment.title, caption?.split("\n")[0]]
      .map((candidate) => normalizeFileName(candidate || ""))
      .find((candidate) => candidate.length > 0) ||
    `${fileType} ${msg.message_id}`;

  return {
    _id: attachment.file_unique_id,
    file_id: attachment.file_id,
    file_name: fileName,
    file_size: attachment.file_size ?? 0,
    file_type: fileType,
    mime_type: attachment.mime_type ?? null,
    caption,
    chat_id: msg.chat.id,
    message_id: msg.message_id,
    indexed_at: now,
  };
}
