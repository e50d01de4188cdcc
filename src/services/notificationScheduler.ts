import logger from "../utils/logger";
import messageTemplateService, { MessageTemplateService } from "../utils/messageTemplates";
import timezoneService from "../utils/timezone";
import {
  EkadashiDate,
  LocalizedTexts,
  NotificationPayload,
  NotificationSettings,
  REMINDER_TYPES,
  ReminderOutcome,
  ReminderType,
  ScheduledReminder,
} from "../types";
import { WorkQueue, WorkRecord } from "./workQueue";

export const NOTIFICATION_TAG = "ekadashi_notification";
export const TEST_NOTIFICATION_TAG = "ekadashi_test";

const HOUR_MS = 60 * 60 * 1000;

/** Offset of each reminder from the instant it is anchored to */
const REMINDER_OFFSETS_MS: Record<ReminderType, number> = {
  "2day": -48 * HOUR_MS,
  "1day": -24 * HOUR_MS,
  start: 0,
  parana: 0,
};

export function eventTag(ekadashiId: number): string {
  return `ekadashi_${ekadashiId}`;
}

export function workKeyFor(ekadashiId: number, type: ReminderType): string {
  return `ekadashi_${ekadashiId}_${type}`;
}

export function notificationIdFor(ekadashiId: number, type: ReminderType): number {
  return ekadashiId * 10 + REMINDER_TYPES.indexOf(type);
}

/** Reminder types switched on in `settings`, in scheduling order */
export function enabledReminderTypes(settings: NotificationSettings): ReminderType[] {
  const flags: Record<ReminderType, boolean> = {
    "2day": settings.remind2Days,
    "1day": settings.remind1Day,
    start: settings.remindOnStart,
    parana: settings.remindOnParana,
  };
  return REMINDER_TYPES.filter((type) => flags[type]);
}

export interface NotificationSettingsStore {
  getNotificationSettings(): Promise<NotificationSettings>;
  updateNotificationSettings(settings: Partial<NotificationSettings>): Promise<boolean>;
}

export class NotificationScheduler {
  constructor(
    private readonly queue: WorkQueue,
    private readonly settings: NotificationSettingsStore,
    private readonly templates: MessageTemplateService = messageTemplateService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Enqueues the enabled reminders of one event and reports each one.
   * Stops at the first instant that does not parse and returns what was
   * decided up to that point.
   */
  async scheduleForEventDetailed(
    ekadashi: EkadashiDate,
    enabledTypes: readonly ReminderType[],
    texts: LocalizedTexts
  ): Promise<ReminderOutcome[]> {
    const outcomes: ReminderOutcome[] = [];
    await this.collectOutcomes(ekadashi, enabledTypes, texts, outcomes);
    return outcomes;
  }

  /** Number of reminders enqueued for one event; never throws */
  async scheduleForEvent(
    ekadashi: EkadashiDate,
    enabledTypes: readonly ReminderType[],
    texts: LocalizedTexts
  ): Promise<number> {
    const outcomes: ReminderOutcome[] = [];
    try {
      await this.collectOutcomes(ekadashi, enabledTypes, texts, outcomes);
    } catch (error) {
      logger.error(`Error scheduling notifications for Ekadashi ${ekadashi.id}:`, error);
    }
    return outcomes.filter((outcome) => outcome.status === "ENQUEUED").length;
  }

  private async collectOutcomes(
    ekadashi: EkadashiDate,
    enabledTypes: readonly ReminderType[],
    texts: LocalizedTexts,
    outcomes: ReminderOutcome[]
  ): Promise<void> {
    for (const type of REMINDER_TYPES) {
      if (!enabledTypes.includes(type)) continue;

      const anchorIso = type === "parana" ? ekadashi.paranaStartIso : ekadashi.fastingStartIso;
      const anchor = timezoneService.parseInstant(anchorIso);
      if (!anchor) {
        logger.error(`Error scheduling notifications for Ekadashi ${ekadashi.id}: unparsable instant "${anchorIso}"`);
        return;
      }

      const reminder = this.buildReminder(
        ekadashi,
        type,
        new Date(anchor.getTime() + REMINDER_OFFSETS_MS[type]),
        texts
      );

      if (reminder.triggerAt.getTime() <= this.now().getTime()) {
        logger.debug(`Skipping ${reminder.workKey}: trigger time is in the past`);
        outcomes.push({ status: "SKIPPED", reminder });
        continue;
      }

      await this.queue.enqueueUniqueWork(reminder.workKey, {
        runAt: reminder.triggerAt,
        tags: [NOTIFICATION_TAG, eventTag(ekadashi.id)],
        payload: reminder.payload,
      });
      logger.debug(`Scheduled ${reminder.workKey} at ${reminder.triggerAt.toISOString()}`);
      outcomes.push({ status: "ENQUEUED", reminder });
    }
  }

  /** Schedules every event with the stored flags; nothing when the master gate is off */
  async scheduleAll(ekadashis: readonly EkadashiDate[], texts: LocalizedTexts): Promise<number> {
    const settings = await this.settings.getNotificationSettings();
    if (!settings.enabled) {
      logger.info("Notifications disabled, nothing scheduled");
      return 0;
    }

    const enabledTypes = enabledReminderTypes(settings);
    let total = 0;
    for (const ekadashi of ekadashis) {
      total += await this.scheduleForEvent(ekadashi, enabledTypes, texts);
    }
    logger.info(`Scheduled ${total} notifications for ${ekadashis.length} Ekadashis`);
    return total;
  }

  async cancelAll(): Promise<void> {
    await this.queue.cancelAllWorkByTag(NOTIFICATION_TAG);
  }

  async cancelForEvent(ekadashiId: number): Promise<void> {
    await this.queue.cancelAllWorkByTag(eventTag(ekadashiId));
  }

  /**
   * Queues a notification to run at once. Its id is negative so it never
   * collides with a scheduled reminder. Returns the id.
   */
  async showImmediate(title: string, body: string): Promise<number> {
    const notificationId = -this.now().getTime();
    await this.queue.enqueue({
      runAt: this.now(),
      tags: [TEST_NOTIFICATION_TAG],
      payload: { title, body, notificationId },
    });
    logger.info("Test notification queued");
    return notificationId;
  }

  async getPendingCount(): Promise<number> {
    try {
      return await this.queue.getPendingCount(NOTIFICATION_TAG);
    } catch (error) {
      logger.error("Error getting pending count:", error);
      return 0;
    }
  }

  async listPending(): Promise<WorkRecord[]> {
    return this.queue.listPending(NOTIFICATION_TAG);
  }

  async getNotificationSettings(): Promise<NotificationSettings> {
    return this.settings.getNotificationSettings();
  }

  /** Persists the flags; switching the master gate off cancels everything pending */
  async updateNotificationSettings(update: Partial<NotificationSettings>): Promise<boolean> {
    const saved = await this.settings.updateNotificationSettings(update);
    if (saved && update.enabled === false) {
      await this.cancelAll();
      logger.info("Notifications disabled, pending reminders cancelled");
    }
    return saved;
  }

  private buildReminder(
    ekadashi: EkadashiDate,
    type: ReminderType,
    triggerAt: Date,
    texts: LocalizedTexts
  ): ScheduledReminder {
    const { title, body } = this.templates.buildReminderText(
      type,
      ekadashi.name,
      ekadashi.fastingStartIso,
      texts
    );
    const payload: NotificationPayload = {
      title,
      body,
      notificationId: notificationIdFor(ekadashi.id, type),
      ekadashiId: ekadashi.id,
      notificationType: type,
    };
    return { workKey: workKeyFor(ekadashi.id, type), ekadashiId: ekadashi.id, type, triggerAt, payload };
  }
}
