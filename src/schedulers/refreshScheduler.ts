import cron, { ScheduledTask } from "node-cron";
import { config } from "../config";
import logger from "../utils/logger";
import { CalendarSession } from "../services/calendarSession";

/** Re-runs the calendar session daily so reminders for newly upcoming events get installed */
export class RefreshScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private readonly session: Pick<CalendarSession, "refresh">,
    private readonly cronExpression: string = config.schedules.refreshCron
  ) {}

  start(): void {
    if (this.task) {
      logger.warn("Refresh scheduler is already running");
      return;
    }

    this.task = cron.schedule(this.cronExpression, async () => {
      try {
        await this.session.refresh();
      } catch (error) {
        logger.error("Scheduled calendar refresh failed:", error);
      }
    });

    logger.info(`Refresh scheduler started (${this.cronExpression})`);
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info("Refresh scheduler stopped");
  }
}
