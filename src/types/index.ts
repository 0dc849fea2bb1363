export type FileType = "document" | "video" | "audio";

export const FILE_TYPES: readonly FileType[] = ["document", "video", "audio"];

/** A user or chat reference: numeric id or username without "@" */
export type Principal = number | string;

export interface MediaFile {
  _id: string;
  file_id: string;
  file_name: string;
  file_size: number;
  file_type: FileType;
  mime_type: string | null;
  caption: string | null;
  chat_id: number;
  message_id: number;
  indexed_at: Date;
}

export type SaveResult = "saved" | "duplicate";

export interface SearchCriteria {
  pattern: RegExp;
  fields: Array<"file_name" | "caption">;
  fileType?: FileType;
}

export interface SearchPage {
  files: MediaFile[];
  total: number;
}

export interface MediaRepository {
  save(file: MediaFile): Promise<SaveResult>;
  remove(uniqueId: string): Promise<boolean>;
  count(): Promise<number>;
  countByType(): Promise<Record<string, number>>;
  search(
    criteria: SearchCriteria,
    offset: number,
    limit: number
  ): Promise<SearchPage>;
}

export interface Config {
  telegram: {
    token: string;
    admins: Principal[];
    channels: Principal[];
    authUsers: Principal[];
    channelLink: string;
    startMessage: string;
    shareText: string;
  };
  search: {
    maxResults: number;
    cacheTime: number;
    useCaptionFilter: boolean;
  };
  database: {
    uri: string;
    name: string;
    collection: string;
  };
  logging: {
    level: string;
    file: string;
  };
  server: {
    port: number;
  };
}

export interface BackfillConfig {
  session: string;
  apiId: number;
  apiHash: string;
  dumpChat: Principal;
}
