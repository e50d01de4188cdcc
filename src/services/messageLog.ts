import { Collection, Filter, ObjectId } from "mongodb";
import logger from "../utils/logger";
import { ReminderType } from "../types";
import { getDb, withMongoRetry } from "./mongo";

export interface MessageLogEntry {
  _id?: ObjectId;
  phone_number: string;
  twilio_sid: string;
  notification_id: number;
  ekadashi_id?: number;
  notification_type?: ReminderType;
  title: string;
  sent_at: string;
  status?: string;
  error_code?: number | string;
}

export interface MessageLogWriter {
  appendMessageLog(entry: MessageLogEntry): Promise<void>;
}

export interface MessageStats {
  total: number;
  byType: Record<string, number>;
  byStatus: Record<string, number>;
  recent: MessageLogEntry[];
}

interface CountBucket {
  _id: string | null;
  count: number;
}

function toCounts(rows: CountBucket[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of rows) {
    counts[row._id ?? "unknown"] = row.count;
  }
  return counts;
}

/** Every delivered reminder, with the delivery status Twilio reports back */
export class MessageLog implements MessageLogWriter {
  constructor(private readonly collectionName = "message_log") {}

  private async collection(): Promise<Collection<MessageLogEntry>> {
    const database = await getDb();
    return database.collection<MessageLogEntry>(this.collectionName);
  }

  async appendMessageLog(entry: MessageLogEntry): Promise<void> {
    try {
      await withMongoRetry(async () => {
        const col = await this.collection();
        await col.insertOne({ ...entry });
      });
      logger.info(`Message logged: sid=${entry.twilio_sid} notification=${entry.notification_id}`);
    } catch (error) {
      logger.error("Message log append error:", error);
    }
  }

  async updateMessageLogStatus(
    twilioSid: string,
    status: string,
    errorCode?: number | string
  ): Promise<boolean> {
    try {
      const update: Partial<MessageLogEntry> = { status };
      if (errorCode !== undefined) update.error_code = errorCode;
      const result = await withMongoRetry(async () => {
        const col = await this.collection();
        return col.updateOne({ twilio_sid: twilioSid }, { $set: update });
      });
      return result.matchedCount > 0;
    } catch (error) {
      logger.error("Message log status update error:", error);
      return false;
    }
  }

  async getMessageStats(options?: { startDate?: string; endDate?: string }): Promise<MessageStats> {
    const filter: Filter<MessageLogEntry> = {};
    if (options?.startDate || options?.endDate) {
      filter.sent_at = {
        ...(options.startDate ? { $gte: options.startDate } : {}),
        ...(options.endDate ? { $lte: options.endDate } : {}),
      };
    }

    return withMongoRetry(async () => {
      const col = await this.collection();
      const [total, byTypeAgg, byStatusAgg, recent] = await Promise.all([
        col.countDocuments(filter),
        col
          .aggregate<CountBucket>([
            { $match: filter },
            { $group: { _id: "$notification_type", count: { $sum: 1 } } },
          ])
          .toArray(),
        col
          .aggregate<CountBucket>([{ $match: filter }, { $group: { _id: "$status", count: { $sum: 1 } } }])
          .toArray(),
        col.find(filter).sort({ sent_at: -1 }).limit(50).toArray(),
      ]);

      return { total, byType: toCounts(byTypeAgg), byStatus: toCounts(byStatusAgg), recent };
    });
  }
}
