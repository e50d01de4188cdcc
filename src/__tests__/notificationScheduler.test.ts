import { beforeEach, describe, expect, it } from "vitest";
import {
  NOTIFICATION_TAG,
  NotificationScheduler,
  TEST_NOTIFICATION_TAG,
  enabledReminderTypes,
  notificationIdFor,
  workKeyFor,
} from "../services/notificationScheduler";
import { SettingsService } from "../services/settingsService";
import { MessageTemplateService } from "../utils/messageTemplates";
import { MemoryKeyValueStore } from "./mocks/memoryKeyValueStore";
import { MemoryWorkQueue } from "./mocks/memoryWorkQueue";
import { makeEkadashi } from "./mocks/fixtures";

const DEFAULT_TYPES = ["2day", "1day", "start"] as const;

describe("NotificationScheduler", () => {
  let queue: MemoryWorkQueue;
  let settings: SettingsService;
  let now: Date;
  let scheduler: NotificationScheduler;

  beforeEach(() => {
    queue = new MemoryWorkQueue();
    settings = new SettingsService(new MemoryKeyValueStore());
    now = new Date("2026-01-01T00:00:00+05:30");
    scheduler = new NotificationScheduler(queue, settings, new MessageTemplateService(), () => now);
  });

  describe("keys and ids", () => {
    it("should derive work keys and notification ids from the event and type", () => {
      expect(workKeyFor(12, "2day")).toBe("ekadashi_12_2day");
      expect(notificationIdFor(12, "2day")).toBe(120);
      expect(notificationIdFor(12, "1day")).toBe(121);
      expect(notificationIdFor(12, "start")).toBe(122);
      expect(notificationIdFor(3, "parana")).toBe(33);
    });

    it("should list enabled reminder types in scheduling order", () => {
      expect(
        enabledReminderTypes({
          enabled: true,
          remind2Days: false,
          remind1Day: true,
          remindOnStart: false,
          remindOnParana: true,
        })
      ).toEqual(["1day", "parana"]);
    });
  });

  describe("scheduleForEventDetailed", () => {
    it("should skip reminders whose trigger is already past", async () => {
      now = new Date("2026-02-11T00:00:00+05:30");
      const outcomes = await scheduler.scheduleForEventDetailed(makeEkadashi(), DEFAULT_TYPES, {});

      expect(outcomes.map((outcome) => [outcome.status, outcome.reminder.type])).toEqual([
        ["SKIPPED", "2day"],
        ["ENQUEUED", "1day"],
        ["ENQUEUED", "start"],
      ]);
      expect(outcomes[0].reminder.triggerAt).toEqual(new Date("2026-02-10T06:45:00+05:30"));
      expect([...queue.pendingByName().keys()]).toEqual(["ekadashi_1_1day", "ekadashi_1_start"]);
    });

    it("should enqueue each reminder with its trigger, tags and payload", async () => {
      await scheduler.scheduleForEventDetailed(makeEkadashi(), ["1day", "parana"], {});
      const pending = queue.pendingByName();

      const dayBefore = pending.get("ekadashi_1_1day");
      expect(dayBefore?.runAt).toEqual(new Date("2026-02-11T06:45:00+05:30"));
      expect(dayBefore?.tags).toEqual([NOTIFICATION_TAG, "ekadashi_1"]);
      expect(dayBefore?.payload).toEqual({
        title: "Ekadashi Tomorrow!",
        body: "Vijaya Ekadashi is tomorrow. Fasting starts at 06:45 AM",
        notificationId: 11,
        ekadashiId: 1,
        notificationType: "1day",
      });

      const parana = pending.get("ekadashi_1_parana");
      expect(parana?.runAt).toEqual(new Date("2026-02-13T07:10:00+05:30"));
      expect(parana?.payload).toEqual({
        title: "Parana Time",
        body: "Vijaya Ekadashi - You can break your fast now.",
        notificationId: 13,
        ekadashiId: 1,
        notificationType: "parana",
      });
    });

    it("should stop at an unparsable parana instant and keep what came before", async () => {
      const outcomes = await scheduler.scheduleForEventDetailed(
        makeEkadashi({ paranaStartIso: "not a date" }),
        ["2day", "1day", "start", "parana"],
        {}
      );
      expect(outcomes.map((outcome) => outcome.reminder.type)).toEqual(["2day", "1day", "start"]);
      expect(await scheduler.getPendingCount()).toBe(3);
    });
  });

  describe("scheduleForEvent", () => {
    it("should replace earlier work for the same event and type", async () => {
      expect(await scheduler.scheduleForEvent(makeEkadashi(), DEFAULT_TYPES, {})).toBe(3);
      expect(await scheduler.scheduleForEvent(makeEkadashi(), DEFAULT_TYPES, {})).toBe(3);

      expect(queue.pendingByName().size).toBe(3);
      expect(queue.records.filter((record) => record.state === "CANCELLED")).toHaveLength(3);
    });

    it("should return zero for an event with an unparsable fasting start", async () => {
      const broken = makeEkadashi({ fastingStartIso: "" });
      expect(await scheduler.scheduleForEvent(broken, DEFAULT_TYPES, {})).toBe(0);
      expect(queue.records).toHaveLength(0);
    });

    it("should return the count so far when the queue fails", async () => {
      let calls = 0;
      queue.enqueueUniqueWork = async () => {
        calls++;
        if (calls === 2) throw new Error("queue down");
        return String(calls);
      };
      expect(await scheduler.scheduleForEvent(makeEkadashi(), DEFAULT_TYPES, {})).toBe(1);
    });
  });

  describe("scheduleAll", () => {
    const events = [1, 2, 3, 4].map((id) =>
      makeEkadashi({
        id,
        fastingStartIso: `2026-02-1${id}T06:45:00+05:30`,
        paranaStartIso: `2026-02-1${id + 1}T07:10:00+05:30`,
      })
    );

    it("should schedule every event and cancel them all again", async () => {
      expect(await scheduler.scheduleAll(events, {})).toBe(12);
      expect(await scheduler.getPendingCount()).toBe(12);

      await scheduler.cancelAll();
      expect(await scheduler.getPendingCount()).toBe(0);
    });

    it("should keep going past an event that fails", async () => {
      const broken = makeEkadashi({ id: 9, fastingStartIso: "garbage" });
      expect(await scheduler.scheduleAll([broken, events[0]], {})).toBe(3);
    });

    it("should schedule nothing when notifications are switched off", async () => {
      await settings.updateNotificationSettings({ enabled: false });
      expect(await scheduler.scheduleAll(events, {})).toBe(0);
      expect(queue.records).toHaveLength(0);
    });

    it("should honour the stored reminder flags", async () => {
      await settings.updateNotificationSettings({ remind2Days: false, remindOnParana: true });
      await scheduler.scheduleAll([events[0]], {});
      expect([...queue.pendingByName().keys()]).toEqual([
        "ekadashi_1_1day",
        "ekadashi_1_start",
        "ekadashi_1_parana",
      ]);
    });

    it("should cancel one event without touching the others", async () => {
      await scheduler.scheduleAll(events, {});
      await scheduler.cancelForEvent(2);

      const pendingIds = (await scheduler.listPending()).map((record) => record.uniqueName);
      expect(pendingIds).toHaveLength(9);
      expect(pendingIds.some((name) => name?.startsWith("ekadashi_2_"))).toBe(false);
    });
  });

  describe("settings", () => {
    it("should cancel pending reminders when the master switch is turned off", async () => {
      await scheduler.scheduleForEvent(makeEkadashi(), DEFAULT_TYPES, {});
      expect(await scheduler.updateNotificationSettings({ enabled: false })).toBe(true);

      expect(await scheduler.getPendingCount()).toBe(0);
      expect((await scheduler.getNotificationSettings()).enabled).toBe(false);
    });

    it("should leave pending reminders alone for other changes", async () => {
      await scheduler.scheduleForEvent(makeEkadashi(), DEFAULT_TYPES, {});
      await scheduler.updateNotificationSettings({ remindOnParana: true });
      expect(await scheduler.getPendingCount()).toBe(3);
    });
  });

  describe("showImmediate", () => {
    it("should queue a due notification with a negative id", async () => {
      const id = await scheduler.showImmediate("Hari Om!", "Test notification");

      expect(id).toBe(-now.getTime());
      expect(queue.records).toHaveLength(1);
      expect(queue.records[0]).toMatchObject({
        uniqueName: null,
        runAt: now,
        tags: [TEST_NOTIFICATION_TAG],
        payload: { title: "Hari Om!", body: "Test notification", notificationId: id },
      });
      expect(await scheduler.getPendingCount()).toBe(0);
    });
  });

  it("should report zero pending when the queue cannot be read", async () => {
    queue.getPendingCount = async () => {
      throw new Error("queue down");
    };
    expect(await scheduler.getPendingCount()).toBe(0);
  });
});
