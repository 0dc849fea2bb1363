import mongoose, { Connection, FilterQuery, Model, Schema } from "mongoose";
import { logger } from "../utils/logger";
import { wait } from "../utils/helpers";
import {
  FILE_TYPES,
  MediaFile,
  MediaRepository,
  SaveResult,
  SearchCriteria,
  SearchPage,
} from "../types";

const MAX_RETRIES = 3;
const BASE_DELAY = 1000;
const DUPLICATE_KEY = 11000;

const mediaSchema = new Schema<MediaFile>(
  {
    _id: { type: String, required: true },
    file_id: { type: String, required: true },
    file_name: { type: String, required: true },
    file_size: { type: Number, required: true },
    file_type: { type: String, enum: [...FILE_TYPES], required: true },
    mime_type: { type: String, default: null },
    caption: { type: String, default: null },
    chat_id: { type: Number, required: true },
    message_id: { type: Number, required: true },
    indexed_at: { type: Date, default: Date.now },
  },
  { versionKey: false }
);

mediaSchema.index({ file_name: "text" });
mediaSchema.index({ file_type: 1 });

/**
 * Translates search criteria into a MongoDB filter
 */
export function toMongoFilter(criteria: SearchCriteria): FilterQuery<MediaFile> {
  const { pattern } = criteria;
  const conditions = criteria.fields.map(
    (field): FilterQuery<MediaFile> =>
      field === "file_name"
        ? { file_name: { $regex: pattern } }
        : { caption: { $regex: pattern } }
  );
  const match: FilterQuery<MediaFile> =
    conditions.length === 1 ? conditions[0] : { $or: conditions };

  return criteria.fileType ? { ...match, file_type: criteria.fileType } : match;
}

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY;
}

/**
 * Opens a connection, retrying with exponential backoff
 */
export async function connectDatabase(
  uri: string,
  dbName: string,
  retries = MAX_RETRIES
): Promise<Connection> {
  try {
    logger.info(
      { attempt: MAX_RETRIES - retries + 1, maxAttempts: MAX_RETRIES },
      "Connecting to MongoDB"
    );
    const connection = await mongoose
      .createConnection(uri, { dbName, serverSelectionTimeoutMS: 10000 })
      .asPromise();
    logger.info({ dbName }, "Connected to MongoDB");
    return connection;
  } catch (error) {
    logger.error({ err: error }, "MongoDB connection failed");

    if (retries > 1) {
      const delay = BASE_DELAY * Math.pow(2, MAX_RETRIES - retries);
      logger.info({ delay }, "Retrying MongoDB connection");
      await wait(delay);
      return connectDatabase(uri, dbName, retries - 1);
    }
    throw error;
  }
}

export class MongoMediaRepository implements MediaRepository {
  private readonly model: Model<MediaFile>;

  constructor(connection: Connection, collection: string) {
    this.model = connection.model<MediaFile>("Media", mediaSchema, collection);
  }

  async syncIndexes(): Promise<void> {
    await this.model.syncIndexes();
  }

  async save(file: MediaFile): Promise<SaveResult> {
    try {
      await this.model.create(file);
      return "saved";
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return "duplicate";
      }
      throw error;
    }
  }

  async remove(uniqueId: string): Promise<boolean> {
    const result = await this.model.deleteOne({ _id: uniqueId }).exec();
    return result.deletedCount > 0;
  }

  async count(): Promise<number> {
    return this.model.estimatedDocumentCount().exec();
  }

  async countByType(): Promise<Record<string, number>> {
    const rows = await this.model
      .aggregate<{ _id: string; count: number }>([
        { $group: { _id: "$file_type", count: { $sum: 1 } } },
      ])
      .exec();
    return Object.fromEntries(rows.map((row) => [row._id, row.count]));
  }

  async search(
    criteria: SearchCriteria,
    offset: number,
    limit: number
  ): Promise<SearchPage> {
    const filter = toMongoFilter(criteria);
    const [files, total] = await Promise.all([
      this.model
        .find(filter)
        .sort({ $natural: -1 })
        .skip(offset)
        .limit(limit)
        .lean<MediaFile[]>()
        .exec(),
      this.model.countDocuments(filter).exec(),
    ]);
    return { files, total };
  }
}
