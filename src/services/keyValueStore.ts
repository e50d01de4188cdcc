import { Collection } from "mongodb";
import logger from "../utils/logger";
import { getDb, withMongoRetry } from "./mongo";

export type StoredValue = string | number | boolean | null;

/**
 * Durable key-value state for one installation. Writes are plain
 * overwrites; `toggle` is the only read-modify-write and is atomic.
 */
export interface KeyValueStore {
  getMany(keys: readonly string[]): Promise<Map<string, StoredValue>>;
  setMany(entries: Record<string, StoredValue>): Promise<void>;
  remove(keys: readonly string[]): Promise<void>;
  /** Flips a boolean (missing counts as `defaultValue`) and returns the new value */
  toggle(key: string, defaultValue: boolean): Promise<boolean>;
}

interface PreferenceDocument {
  _id: string;
  value: StoredValue;
  updated_at: string;
}

export class MongoKeyValueStore implements KeyValueStore {
  constructor(private readonly collectionName = "preferences") {}

  private async collection(): Promise<Collection<PreferenceDocument>> {
    const database = await getDb();
    return database.collection<PreferenceDocument>(this.collectionName);
  }

  async getMany(keys: readonly string[]): Promise<Map<string, StoredValue>> {
    return withMongoRetry(async () => {
      const col = await this.collection();
      const docs = await col.find({ _id: { $in: [...keys] } }).toArray();
      return new Map(docs.map((doc) => [doc._id, doc.value]));
    });
  }

  async setMany(entries: Record<string, StoredValue>): Promise<void> {
    const keys = Object.keys(entries);
    if (keys.length === 0) return;

    await withMongoRetry(async () => {
      const col = await this.collection();
      const now = new Date().toISOString();
      await col.bulkWrite(
        keys.map((key) => ({
          updateOne: {
            filter: { _id: key },
            update: { $set: { value: entries[key], updated_at: now } },
            upsert: true,
          },
        }))
      );
    });
    logger.debug(`Preferences written: ${keys.join(", ")}`);
  }

  async remove(keys: readonly string[]): Promise<void> {
    if (keys.length === 0) return;
    await withMongoRetry(async () => {
      const col = await this.collection();
      await col.deleteMany({ _id: { $in: [...keys] } });
    });
  }

  async toggle(key: string, defaultValue: boolean): Promise<boolean> {
    return withMongoRetry(async () => {
      const col = await this.collection();
      // Pipeline update so the read and the write happen in one server-side step
      const doc = await col.findOneAndUpdate(
        { _id: key },
        [
          {
            $set: {
              value: { $not: [{ $ifNull: ["$value", defaultValue] }] },
              updated_at: new Date().toISOString(),
            },
          },
        ],
        { upsert: true, returnDocument: "after" }
      );
      return doc?.value === true;
    });
  }
}
