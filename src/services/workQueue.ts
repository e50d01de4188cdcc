import { Collection, ObjectId } from "mongodb";
import logger from "../utils/logger";
import { NotificationPayload } from "../types";
import { getDb, withMongoRetry } from "./mongo";

export type WorkState = "ENQUEUED" | "RUNNING" | "SUCCEEDED" | "FAILED" | "CANCELLED";

/** RUNNING work untouched for this long is taken to be abandoned by a crashed runner */
export const CLAIM_LEASE_MS = 10 * 60 * 1000;

export interface WorkRequest {
  runAt: Date;
  tags: string[];
  payload: NotificationPayload;
}

export interface WorkRecord {
  id: string;
  uniqueName: string | null;
  tags: string[];
  runAt: Date;
  /** Stored as written; the worker validates it before use */
  payload: unknown;
  state: WorkState;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Durable delayed execution. Work survives restarts and is picked up by
 * the work runner once `runAt` has passed.
 */
export interface WorkQueue {
  enqueue(request: WorkRequest): Promise<string>;
  /** Replaces pending work with the same name */
  enqueueUniqueWork(name: string, request: WorkRequest): Promise<string>;
  cancelUniqueWork(name: string): Promise<number>;
  cancelAllWorkByTag(tag: string): Promise<number>;
  getPendingCount(tag: string): Promise<number>;
  listPending(tag: string): Promise<WorkRecord[]>;
  /**
   * Moves due ENQUEUED work, and RUNNING work whose lease ran out, to
   * RUNNING and counts the attempt
   */
  claimDueWork(now: Date, limit: number): Promise<WorkRecord[]>;
  markSucceeded(id: string): Promise<void>;
  markForRetry(id: string, runAt: Date, error: string): Promise<void>;
  markFailed(id: string, error: string): Promise<void>;
}

interface WorkDocument {
  _id: ObjectId;
  unique_name: string | null;
  tags: string[];
  run_at: Date;
  payload: unknown;
  state: WorkState;
  attempts: number;
  last_error: string | null;
  created_at: Date;
  updated_at: Date;
}

function toRecord(doc: WorkDocument): WorkRecord {
  return {
    id: doc._id.toHexString(),
    uniqueName: doc.unique_name,
    tags: doc.tags,
    runAt: doc.run_at,
    payload: doc.payload,
    state: doc.state,
    attempts: doc.attempts,
    lastError: doc.last_error,
    createdAt: doc.created_at,
    updatedAt: doc.updated_at,
  };
}

export class MongoWorkQueue implements WorkQueue {
  constructor(private readonly collectionName = "scheduled_work") {}

  private async collection(): Promise<Collection<WorkDocument>> {
    const database = await getDb();
    return database.collection<WorkDocument>(this.collectionName);
  }

  async ensureIndexes(): Promise<void> {
    await withMongoRetry(async () => {
      const col = await this.collection();
      await col.createIndex({ state: 1, run_at: 1 });
      await col.createIndex({ state: 1, updated_at: 1 });
      await col.createIndex({ tags: 1, state: 1 });
      await col.createIndex(
        { unique_name: 1 },
        { unique: true, partialFilterExpression: { state: "ENQUEUED" } }
      );
    });
  }

  async enqueue(request: WorkRequest): Promise<string> {
    return this.insert(null, request);
  }

  async enqueueUniqueWork(name: string, request: WorkRequest): Promise<string> {
    await this.cancelUniqueWork(name);
    return this.insert(name, request);
  }

  async cancelUniqueWork(name: string): Promise<number> {
    return this.cancelWhere({ unique_name: name });
  }

  async cancelAllWorkByTag(tag: string): Promise<number> {
    const cancelled = await this.cancelWhere({ tags: tag });
    if (cancelled > 0) logger.info(`Cancelled ${cancelled} work item(s) tagged ${tag}`);
    return cancelled;
  }

  async getPendingCount(tag: string): Promise<number> {
    return withMongoRetry(async () => {
      const col = await this.collection();
      return col.countDocuments({ tags: tag, state: "ENQUEUED" });
    });
  }

  async listPending(tag: string): Promise<WorkRecord[]> {
    return withMongoRetry(async () => {
      const col = await this.collection();
      const docs = await col.find({ tags: tag, state: "ENQUEUED" }).sort({ run_at: 1 }).toArray();
      return docs.map(toRecord);
    });
  }

  async claimDueWork(now: Date, limit: number): Promise<WorkRecord[]> {
    const claimed: WorkRecord[] = [];
    const leaseExpiredBefore = new Date(now.getTime() - CLAIM_LEASE_MS);
    const col = await withMongoRetry(() => this.collection());
    while (claimed.length < limit) {
      const doc = await withMongoRetry(() =>
        col.findOneAndUpdate(
          {
            $or: [
              { state: "ENQUEUED", run_at: { $lte: now } },
              { state: "RUNNING", updated_at: { $lte: leaseExpiredBefore } },
            ],
          },
          { $set: { state: "RUNNING", updated_at: now }, $inc: { attempts: 1 } },
          { sort: { run_at: 1 }, returnDocument: "after" }
        )
      );
      if (!doc) break;
      claimed.push(toRecord(doc));
    }
    return claimed;
  }

  async markSucceeded(id: string): Promise<void> {
    await this.setState(id, { state: "SUCCEEDED", last_error: null });
  }

  async markForRetry(id: string, runAt: Date, error: string): Promise<void> {
    await this.setState(id, { state: "ENQUEUED", run_at: runAt, last_error: error });
  }

  async markFailed(id: string, error: string): Promise<void> {
    await this.setState(id, { state: "FAILED", last_error: error });
  }

  private async insert(uniqueName: string | null, request: WorkRequest): Promise<string> {
    return withMongoRetry(async () => {
      const col = await this.collection();
      const now = new Date();
      const doc: WorkDocument = {
        _id: new ObjectId(),
        unique_name: uniqueName,
        tags: request.tags,
        run_at: request.runAt,
        payload: request.payload,
        state: "ENQUEUED",
        attempts: 0,
        last_error: null,
        created_at: now,
        updated_at: now,
      };
      await col.insertOne(doc);
      return doc._id.toHexString();
    });
  }

  private async cancelWhere(filter: { unique_name: string } | { tags: string }): Promise<number> {
    return withMongoRetry(async () => {
      const col = await this.collection();
      const result = await col.updateMany(
        { ...filter, state: "ENQUEUED" },
        { $set: { state: "CANCELLED", updated_at: new Date() } }
      );
      return result.modifiedCount;
    });
  }

  private async setState(
    id: string,
    update: Partial<Pick<WorkDocument, "state" | "run_at" | "last_error">>
  ): Promise<void> {
    await withMongoRetry(async () => {
      const col = await this.collection();
      await col.updateOne({ _id: new ObjectId(id) }, { $set: { ...update, updated_at: new Date() } });
    });
  }
}
