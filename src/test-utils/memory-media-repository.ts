import { matchesCriteria } from "../services/search";
import {
  MediaFile,
  MediaRepository,
  SaveResult,
  SearchCriteria,
  SearchPage,
} from "../types";

/**
 * In-memory stand-in for the MongoDB repository
 */
export class MemoryMediaRepository implements MediaRepository {
  readonly files: MediaFile[] = [];

  async save(file: MediaFile): Promise<SaveResult> {
    if (this.files.some((stored) => stored._id === file._id)) {
      return "duplicate";
    }
    this.files.push(file);
    return "saved";
  }

  async remove(uniqueId: string): Promise<boolean> {
    const index = this.files.findIndex((file) => file._id === uniqueId);
    if (index === -1) return false;
    this.files.splice(index, 1);
    return true;
  }

  async count(): Promise<number> {
    return this.files.length;
  }

  async countByType(): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const file of this.files) {
      counts[file.file_type] = (counts[file.file_type] || 0) + 1;
    }
    return counts;
  }

  async search(
    criteria: SearchCriteria,
    offset: number,
    limit: number
  ): Promise<SearchPage> {
    // newest first, like a reversed natural order
    const matches = [...this.files]
      .reverse()
      .filter((file) => matchesCriteria(file, criteria));
    return {
      files: matches.slice(offset, offset + limit),
      total: matches.length,
    };
  }
}

export function makeMediaFile(overrides: Partial<MediaFile> = {}): MediaFile {
  return {
    _id: "unique-1",
    file_id: "file-1",
    file_name: "Example File mkv",
    file_size: 1024,
    file_type: "document",
    mime_type: "application/octet-stream",
    caption: null,
    chat_id: -1001234567890,
    message_id: 1,
    indexed_at: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  };
}
