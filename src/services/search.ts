import { escapeRegExp } from "../utils/helpers";
import {
  FILE_TYPES,
  FileType,
  MediaFile,
  MediaRepository,
  SearchCriteria,
} from "../types";

const SEPARATOR = "[\\s.+\\-_]";

export interface InlineQueryText {
  keywords: string;
  fileType?: string;
}

export interface SearchOptions {
  maxResults: number;
  useCaptionFilter: boolean;
}

export interface SearchResult {
  files: MediaFile[];
  total: number;
  nextOffset: string;
}

/**
 * Splits "keywords | type" into its parts
 */
export function parseInlineQuery(query: string): InlineQueryText {
  const text = query.trim();
  const bar = text.indexOf("|");
  if (bar === -1) {
    return { keywords: text };
  }

  const keywords = text.slice(0, bar).trim();
  const fileType = text.slice(bar + 1).trim().toLowerCase();
  return fileType ? { keywords, fileType } : { keywords };
}

/**
 * Builds the case-insensitive pattern matched against names and captions.
 * A single keyword must stand on its own (word boundary or separator);
 * several keywords must appear in order.
 */
export function buildSearchPattern(keywords: string): RegExp {
  const words = keywords
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map(escapeRegExp);

  if (words.length === 0) {
    return /./i;
  }

  if (words.length === 1) {
    const edge = `(\\b|${SEPARATOR})`;
    return new RegExp(`${edge}${words[0]}${edge}`, "i");
  }

  return new RegExp(words.join(`.*${SEPARATOR}`), "i");
}

function isFileType(value: string): value is FileType {
  return FILE_TYPES.some((type) => type === value);
}

/**
 * Returns null when the requested type can never match a stored file
 */
export function buildSearchCriteria(
  text: InlineQueryText,
  useCaptionFilter: boolean
): SearchCriteria | null {
  const criteria: SearchCriteria = {
    pattern: buildSearchPattern(text.keywords),
    fields: useCaptionFilter ? ["file_name", "caption"] : ["file_name"],
  };
  if (text.fileType === undefined) {
    return criteria;
  }
  return isFileType(text.fileType)
    ? { ...criteria, fileType: text.fileType }
    : null;
}

/**
 * In-process equivalent of the database filter built from the criteria
 */
export function matchesCriteria(
  file: MediaFile,
  criteria: SearchCriteria
): boolean {
  if (criteria.fileType !== undefined && file.file_type !== criteria.fileType) {
    return false;
  }
  return criteria.fields.some((field) => {
    const value = file[field];
    return value !== null && criteria.pattern.test(value);
  });
}

/**
 * Parses an inline query offset; anything but a non-negative integer is 0
 */
export function parseOffset(offset: string | undefined): number {
  return offset && /^\d+$/.test(offset) ? Number(offset) : 0;
}

export async function searchMedia(
  repository: MediaRepository,
  query: string,
  options: SearchOptions,
  offset = 0
): Promise<SearchResult> {
  const criteria = buildSearchCriteria(
    parseInlineQuery(query),
    options.useCaptionFilter
  );
  if (!criteria) {
    return { files: [], total: 0, nextOffset: "" };
  }

  const { files, total } = await repository.search(
    criteria,
    offset,
    options.maxResults
  );

  const next = offset + options.maxResults;
  return {
    files,
    total,
    nextOffset: next < total ? String(next) : "",
  };
}
