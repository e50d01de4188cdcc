import { beforeEach, describe, expect, it } from "vitest";
import {
  BASE_BACKOFF_MS,
  MAX_ATTEMPTS,
  WorkRunner,
  backoffDelayMs,
  parseNotificationPayload,
} from "../schedulers/workRunner";
import { NOTIFICATION_TAG } from "../services/notificationScheduler";
import { CLAIM_LEASE_MS } from "../services/workQueue";
import { FakePresenter } from "./mocks/fakePresenter";
import { MemoryWorkQueue } from "./mocks/memoryWorkQueue";

const T0 = new Date("2026-02-11T01:15:00Z");

describe("WorkRunner", () => {
  let queue: MemoryWorkQueue;
  let presenter: FakePresenter;
  let now: Date;
  let runner: WorkRunner;

  async function enqueueReminder(notificationId = 11, runAt = T0): Promise<string> {
    return queue.enqueue({
      runAt,
      tags: [NOTIFICATION_TAG, "ekadashi_1"],
      payload: {
        title: "Ekadashi Tomorrow!",
        body: "Vijaya Ekadashi is tomorrow. Fasting starts at 06:45 AM",
        notificationId,
        ekadashiId: 1,
        notificationType: "1day",
      },
    });
  }

  beforeEach(() => {
    queue = new MemoryWorkQueue();
    presenter = new FakePresenter();
    now = T0;
    runner = new WorkRunner(queue, presenter, "* * * * *", () => now);
  });

  it("should double the backoff after each failed attempt", () => {
    expect(backoffDelayMs(1)).toBe(BASE_BACKOFF_MS);
    expect(backoffDelayMs(2)).toBe(60_000);
    expect(backoffDelayMs(3)).toBe(120_000);
  });

  it("should present due work and mark it succeeded", async () => {
    const id = await enqueueReminder();

    expect(await runner.tick()).toEqual({ succeeded: 1, retried: 0, failed: 0 });
    expect(presenter.presented).toEqual([
      {
        title: "Ekadashi Tomorrow!",
        body: "Vijaya Ekadashi is tomorrow. Fasting starts at 06:45 AM",
        notificationId: 11,
        ekadashiId: 1,
        notificationType: "1day",
      },
    ]);
    expect(queue.get(id)?.state).toBe("SUCCEEDED");
  });

  it("should leave work that is not yet due", async () => {
    const id = await enqueueReminder(11, new Date(T0.getTime() + 1000));

    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 0, failed: 0 });
    expect(queue.get(id)?.state).toBe("ENQUEUED");
  });

  it("should retry with backoff and give up after the last attempt", async () => {
    presenter.failuresLeft = MAX_ATTEMPTS;
    const id = await enqueueReminder();

    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 1, failed: 0 });
    expect(queue.get(id)).toMatchObject({
      state: "ENQUEUED",
      attempts: 1,
      runAt: new Date(T0.getTime() + 30_000),
      lastError: "delivery failed",
    });

    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 0, failed: 0 });

    now = new Date(T0.getTime() + 30_000);
    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 1, failed: 0 });
    expect(queue.get(id)?.runAt).toEqual(new Date(T0.getTime() + 90_000));

    now = new Date(T0.getTime() + 90_000);
    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 0, failed: 1 });
    expect(queue.get(id)).toMatchObject({ state: "FAILED", attempts: 3, lastError: "delivery failed" });
    expect(presenter.presented).toHaveLength(0);
  });

  it("should succeed on a retry after a transient failure", async () => {
    presenter.failuresLeft = 1;
    const id = await enqueueReminder();

    await runner.tick();
    now = new Date(T0.getTime() + 30_000);
    expect(await runner.tick()).toEqual({ succeeded: 1, retried: 0, failed: 0 });
    expect(queue.get(id)).toMatchObject({ state: "SUCCEEDED", attempts: 2, lastError: null });
  });

  it("should fail a malformed payload without retrying", async () => {
    const id = await enqueueReminder();
    queue.records[0].payload = { title: 42 };

    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 0, failed: 1 });
    expect(queue.get(id)).toMatchObject({ state: "FAILED", attempts: 1, lastError: "malformed payload" });
    expect(presenter.presented).toHaveLength(0);
  });

  it("should drain more than one batch in a single tick", async () => {
    for (let i = 0; i < 30; i++) {
      await enqueueReminder(100 + i);
    }
    expect(await runner.tick()).toEqual({ succeeded: 30, retried: 0, failed: 0 });
  });

  it("should skip a tick while the previous one is still running", async () => {
    await enqueueReminder();
    const first = runner.tick();
    expect(await runner.tick()).toBeNull();
    expect(await first).toEqual({ succeeded: 1, retried: 0, failed: 0 });
  });

  it("should deliver work left running by a runner that crashed", async () => {
    const id = await enqueueReminder();
    expect(await queue.claimDueWork(T0, 25)).toHaveLength(1);
    expect(queue.get(id)?.state).toBe("RUNNING");

    now = new Date(T0.getTime() + 60 * 60 * 1000);
    const restarted = new WorkRunner(queue, presenter, "* * * * *", () => now);

    expect(await restarted.tick()).toEqual({ succeeded: 1, retried: 0, failed: 0 });
    expect(queue.get(id)).toMatchObject({ state: "SUCCEEDED", attempts: 2 });
    expect(presenter.presented).toHaveLength(1);
  });

  it("should not reclaim running work before its lease runs out", async () => {
    const id = await enqueueReminder();
    await queue.claimDueWork(T0, 25);

    now = new Date(T0.getTime() + CLAIM_LEASE_MS - 1000);
    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 0, failed: 0 });
    expect(queue.get(id)).toMatchObject({ state: "RUNNING", attempts: 1 });
  });

  it("should fail work whose lease ran out on its last attempt", async () => {
    const id = await enqueueReminder();
    for (let claim = 0; claim < MAX_ATTEMPTS; claim++) {
      await queue.claimDueWork(new Date(T0.getTime() + claim * CLAIM_LEASE_MS), 25);
    }
    expect(queue.get(id)?.attempts).toBe(MAX_ATTEMPTS);

    now = new Date(T0.getTime() + MAX_ATTEMPTS * CLAIM_LEASE_MS);
    expect(await runner.tick()).toEqual({ succeeded: 0, retried: 0, failed: 1 });
    expect(queue.get(id)).toMatchObject({
      state: "FAILED",
      attempts: MAX_ATTEMPTS + 1,
      lastError: "abandoned while running",
    });
    expect(presenter.presented).toHaveLength(0);
  });

  it("should return null when the queue cannot be read", async () => {
    queue.claimDueWork = async () => {
      throw new Error("queue down");
    };
    expect(await runner.tick()).toBeNull();
  });
});

describe("parseNotificationPayload", () => {
  it("should keep the optional fields when they are valid", () => {
    expect(
      parseNotificationPayload({
        title: "Parana Time",
        body: "Break the fast",
        notificationId: 13,
        ekadashiId: 1,
        notificationType: "parana",
        extra: true,
      })
    ).toEqual({
      title: "Parana Time",
      body: "Break the fast",
      notificationId: 13,
      ekadashiId: 1,
      notificationType: "parana",
    });
  });

  it("should drop an unknown reminder type", () => {
    expect(
      parseNotificationPayload({ title: "t", body: "b", notificationId: -5, notificationType: "weekly" })
    ).toEqual({ title: "t", body: "b", notificationId: -5 });
  });

  it("should reject payloads missing a required field", () => {
    expect(parseNotificationPayload(null)).toBeNull();
    expect(parseNotificationPayload("text")).toBeNull();
    expect(parseNotificationPayload({ title: "t", body: "b" })).toBeNull();
    expect(parseNotificationPayload({ title: "t", body: "b", notificationId: "11" })).toBeNull();
  });
});
