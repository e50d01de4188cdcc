import dns from "dns";
import { Db, MongoClient, MongoClientOptions } from "mongodb";
import { config } from "../config";
import logger from "../utils/logger";

// SRV lookups over IPv6 time out on some hosting networks
dns.setDefaultResultOrder("ipv4first");

const DEFAULT_DB_NAME = "ekadashi_reminders";

const CLIENT_OPTIONS: MongoClientOptions = {
  serverSelectionTimeoutMS: 30000,
  connectTimeoutMS: 20000,
  retryWrites: true,
  retryReads: true,
  maxPoolSize: 10,
  minPoolSize: 1,
  maxIdleTimeMS: 25 * 60 * 1000,
};

const CONNECTION_ERROR_MARKERS = ["econnreset", "etimeout", "querysrv", "query_srv", "timed out", "secureconnect"];

/** True for errors after which the client must be rebuilt, such as an idle socket the server closed */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "MongoServerSelectionError") return true;

  const message = error.message.toLowerCase();
  if (CONNECTION_ERROR_MARKERS.some((marker) => message.includes(marker))) return true;

  const cause: unknown = error.cause;
  return typeof cause === "object" && cause !== null && "code" in cause && cause.code === "ECONNRESET";
}

/** Database named in the URI path, else `fallback` */
export function databaseNameFromUri(uri: string, fallback = DEFAULT_DB_NAME): string {
  try {
    return new URL(uri).pathname.replace(/^\//, "") || fallback;
  } catch {
    return fallback;
  }
}

/**
 * One lazily opened client shared by the preference store, the work
 * queue and the message log. Concurrent callers wait on the same connect.
 */
export class MongoConnection {
  private client: MongoClient | null = null;
  private pending: Promise<Db> | null = null;

  constructor(
    private readonly uri: string,
    private readonly options: MongoClientOptions = CLIENT_OPTIONS
  ) {}

  getDb(): Promise<Db> {
    if (!this.uri) {
      return Promise.reject(new Error("MONGODB_URI is not set in environment variables"));
    }
    if (!this.pending) {
      this.pending = this.connect().catch((error: unknown) => {
        this.pending = null;
        throw error;
      });
    }
    return this.pending;
  }

  /** Runs `operation`; after a connection error the client is rebuilt and the operation tried once more */
  async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (!isConnectionError(error)) throw error;
      logger.warn("MongoDB connection error, reconnecting for one more try:", error);
      await this.close();
      return operation();
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    this.pending = null;
    if (!client) return;

    try {
      await client.close();
      logger.info("MongoDB connection closed");
    } catch (error) {
      logger.warn("Error closing MongoDB client:", error);
    }
  }

  private async connect(): Promise<Db> {
    try {
      const client = new MongoClient(this.uri, this.options);
      await client.connect();
      this.client = client;
      const db = client.db(databaseNameFromUri(this.uri));
      logger.info(`Connected to MongoDB database: ${db.databaseName}`);
      return db;
    } catch (error) {
      logger.error("Error connecting to MongoDB:", error);
      throw error;
    }
  }
}

const connection = new MongoConnection(config.mongo.uri);

export function getDb(): Promise<Db> {
  return connection.getDb();
}

export function withMongoRetry<T>(operation: () => Promise<T>): Promise<T> {
  return connection.withRetry(operation);
}

export function connectMongo(): Promise<Db> {
  return connection.getDb();
}

export function closeMongo(): Promise<void> {
  return connection.close();
}
