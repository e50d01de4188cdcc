import cron, { ScheduledTask } from "node-cron";
import { config } from "../config";
import logger from "../utils/logger";
import { NotificationPayload, REMINDER_TYPES, ReminderType } from "../types";
import { NotificationPresenter } from "../services/twilio";
import { WorkQueue, WorkRecord } from "../services/workQueue";

export const MAX_ATTEMPTS = 3;
export const BASE_BACKOFF_MS = 30 * 1000;
const BATCH_SIZE = 25;

/** Delay before the next try after `attempt` failed tries (1-based) */
export function backoffDelayMs(attempt: number): number {
  return BASE_BACKOFF_MS * 2 ** (attempt - 1);
}

function isReminderType(value: unknown): value is ReminderType {
  return REMINDER_TYPES.some((type) => type === value);
}

export function parseNotificationPayload(value: unknown): NotificationPayload | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("title" in value) || !("body" in value) || !("notificationId" in value)) return null;
  const { title, body, notificationId } = value;
  if (typeof title !== "string" || typeof body !== "string" || typeof notificationId !== "number") {
    return null;
  }

  const payload: NotificationPayload = { title, body, notificationId };
  if ("ekadashiId" in value && typeof value.ekadashiId === "number") {
    payload.ekadashiId = value.ekadashiId;
  }
  if ("notificationType" in value && isReminderType(value.notificationType)) {
    payload.notificationType = value.notificationType;
  }
  return payload;
}

export interface WorkRunSummary {
  succeeded: number;
  retried: number;
  failed: number;
}

/**
 * Polls the work queue on a cron tick and presents every due
 * notification. Failed deliveries are retried with exponential backoff
 * until MAX_ATTEMPTS tries have been made.
 */
export class WorkRunner {
  private task: ScheduledTask | null = null;
  private isTicking = false;

  constructor(
    private readonly queue: WorkQueue,
    private readonly presenter: NotificationPresenter,
    private readonly cronExpression: string = config.schedules.workRunnerCron,
    private readonly now: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.task) {
      logger.warn("Work runner is already running");
      return;
    }

    this.task = cron.schedule(this.cronExpression, async () => {
      await this.tick();
    });

    logger.info(`Work runner started (${this.cronExpression})`);
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info("Work runner stopped");
  }

  /** Runs everything due now; overlapping ticks are skipped */
  async tick(): Promise<WorkRunSummary | null> {
    if (this.isTicking) {
      logger.debug("Previous work runner tick still in progress, skipping");
      return null;
    }
    this.isTicking = true;
    try {
      return await this.runDueWork();
    } catch (error) {
      logger.error("Error running due work:", error);
      return null;
    } finally {
      this.isTicking = false;
    }
  }

  async runDueWork(): Promise<WorkRunSummary> {
    const summary: WorkRunSummary = { succeeded: 0, retried: 0, failed: 0 };

    let batch: WorkRecord[];
    do {
      batch = await this.queue.claimDueWork(this.now(), BATCH_SIZE);
      for (const record of batch) {
        const result = await this.execute(record);
        summary[result]++;
      }
    } while (batch.length === BATCH_SIZE);

    if (summary.succeeded + summary.retried + summary.failed > 0) {
      logger.info(
        `Work run finished: ${summary.succeeded} sent, ${summary.retried} retrying, ${summary.failed} failed`
      );
    }
    return summary;
  }

  private async execute(record: WorkRecord): Promise<keyof WorkRunSummary> {
    const payload = parseNotificationPayload(record.payload);
    if (!payload) {
      logger.error(`Work ${record.id} has a malformed payload, not retrying`);
      await this.queue.markFailed(record.id, "malformed payload");
      return "failed";
    }

    // A reclaimed lease counts as an attempt, so abandoned work can run out of tries
    if (record.attempts > MAX_ATTEMPTS) {
      logger.error(`Notification ${payload.notificationId} abandoned after ${MAX_ATTEMPTS} attempts`);
      await this.queue.markFailed(record.id, record.lastError ?? "abandoned while running");
      return "failed";
    }

    try {
      await this.presenter.present(payload);
      await this.queue.markSucceeded(record.id);
      logger.info(`Notification ${payload.notificationId} delivered: ${payload.title}`);
      return "succeeded";
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (record.attempts < MAX_ATTEMPTS) {
        const retryAt = new Date(this.now().getTime() + backoffDelayMs(record.attempts));
        logger.warn(
          `Notification ${payload.notificationId} failed (attempt ${record.attempts}), retrying at ${retryAt.toISOString()}: ${message}`
        );
        await this.queue.markForRetry(record.id, retryAt, message);
        return "retried";
      }

      logger.error(`Notification ${payload.notificationId} failed after ${record.attempts} attempts: ${message}`);
      await this.queue.markFailed(record.id, message);
      return "failed";
    }
  }
}
