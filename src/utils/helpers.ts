import { Principal } from "../types";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Formats a byte count as a human readable size, e.g. "1.50 MB"
 */
export function formatFileSize(bytes: number): string {
  let size = Math.max(0, bytes);
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  return `${size.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

/**
 * Replaces separators commonly used in file names with spaces
 */
export function normalizeFileName(name: string): string {
  return name
    .replace(/[_\-.+]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface ParsedCommand {
  name: string;
  args: string;
}

/**
 * Parses "/command@botname args" into its parts
 */
export function parseCommand(text: string | undefined): ParsedCommand | null {
  const match = /^\/([a-zA-Z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(
    (text || "").trim()
  );
  if (!match) return null;
  return { name: match[1].toLowerCase(), args: (match[2] || "").trim() };
}

/**
 * Checks whether a user (by id or username) is in a list of principals
 */
export function isListed(
  list: Principal[],
  user: { id: number; username?: string } | undefined
): boolean {
  if (!user) return false;
  const username = user.username?.toLowerCase();
  return list.some((entry) =>
    typeof entry === "number" ? entry === user.id : entry === username
  );
}

/** Bot API chat reference for a principal */
export function chatRef(principal: Principal): string | number {
  return typeof principal === "number" ? principal : `@${principal}`;
}

/**
 * Waits for the given number of milliseconds
 */
export const wait = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));
