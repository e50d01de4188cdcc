import { NextFunction, Request, Response, Router } from "express";
import { config } from "../config";
import logger from "../utils/logger";
import messageTemplateService from "../utils/messageTemplates";
import timezoneService from "../utils/timezone";
import { LocationPermission, NotificationSettings } from "../types";
import { CalendarSession, RefreshOptions } from "../services/calendarSession";
import { EkadashiService } from "../services/ekadashiService";
import { LocationService } from "../services/locationService";
import { MessageLog } from "../services/messageLog";
import { NotificationScheduler } from "../services/notificationScheduler";
import { DeviceLocationFeed } from "../services/positioning";
import { SettingsService, isNotificationSettingKey } from "../services/settingsService";
import { WorkRunner } from "../schedulers/workRunner";

export interface ApiDependencies {
  settings: SettingsService;
  ekadashiService: EkadashiService;
  locationService: LocationService;
  scheduler: NotificationScheduler;
  session: CalendarSession;
  feed: DeviceLocationFeed;
  workRunner: WorkRunner;
  messageLog: MessageLog;
  apiKey?: string;
}

export interface LocationReport {
  latitude: number;
  longitude: number;
  accuracy?: number;
}

/** Settings changes reuse a recent location instead of waiting on a new fix */
const SETTINGS_REFRESH: RefreshOptions = { preferFreshCache: true };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Validates a reported position; null when either coordinate is missing or out of range */
export function parseLocationReport(body: unknown): LocationReport | null {
  if (!isRecord(body)) return null;
  const latitude = toNumber(body.latitude);
  const longitude = toNumber(body.longitude);
  if (latitude === null || longitude === null) return null;
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) return null;

  const accuracy = toNumber(body.accuracy);
  return accuracy !== null && accuracy >= 0 ? { latitude, longitude, accuracy } : { latitude, longitude };
}

/** Boolean notification flags from a request body; unknown keys and non-booleans are rejected */
export function parseNotificationUpdate(body: unknown): Partial<NotificationSettings> | null {
  if (!isRecord(body)) return null;
  const update: Partial<NotificationSettings> = {};
  for (const [key, value] of Object.entries(body)) {
    if (!isNotificationSettingKey(key) || typeof value !== "boolean") return null;
    update[key] = value;
  }
  return Object.keys(update).length > 0 ? update : null;
}

export function parsePermission(value: unknown): LocationPermission | null {
  return value === "granted" || value === "denied" || value === "undetermined" ? value : null;
}

function getApiKey(req: Request): string | null {
  const auth = req.headers.authorization;
  if (auth?.startsWith("Bearer ")) return auth.slice(7).trim();
  const key = req.headers["x-api-key"];
  if (typeof key === "string") return key.trim();
  return null;
}

function requireApiKey(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      res.status(503).json({ error: "API is not configured (API_KEY missing)" });
      return;
    }
    const provided = getApiKey(req);
    if (!provided || provided !== apiKey) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  };
}

function sendError(res: Response, label: string, error: unknown): void {
  logger.error(`${label}:`, error);
  res.status(500).json({ error: label });
}

export function createApiRouter(deps: ApiDependencies): Router {
  const { settings, ekadashiService, locationService, scheduler, session, feed, workRunner, messageLog } =
    deps;
  const router = Router();

  router.use(requireApiKey(deps.apiKey ?? config.apiKey));

  /** GET /api/settings - All preferences */
  router.get("/settings", async (_req: Request, res: Response) => {
    try {
      res.json(await settings.getPreferences());
    } catch (error) {
      sendError(res, "Failed to read settings", error);
    }
  });

  /** PUT /api/settings/notifications - Update reminder flags and reinstall reminders */
  router.put("/settings/notifications", async (req: Request, res: Response) => {
    const update = parseNotificationUpdate(req.body);
    if (!update) {
      res.status(400).json({ error: "Expected boolean notification flags" });
      return;
    }
    try {
      if (!(await scheduler.updateNotificationSettings(update))) {
        res.status(500).json({ error: "Failed to save notification settings" });
        return;
      }
      const state = await session.refresh(SETTINGS_REFRESH);
      res.json({ notifications: await scheduler.getNotificationSettings(), scheduled: state.scheduled });
    } catch (error) {
      sendError(res, "Failed to update notification settings", error);
    }
  });

  /** POST /api/settings/notifications/:key/toggle - Flip one flag */
  router.post("/settings/notifications/:key/toggle", async (req: Request, res: Response) => {
    const { key } = req.params;
    if (!isNotificationSettingKey(key)) {
      res.status(400).json({ error: `Unknown notification setting: ${key}` });
      return;
    }
    try {
      const value = await settings.toggleNotificationSetting(key);
      if (value === null) {
        res.status(500).json({ error: "Failed to toggle notification setting" });
        return;
      }
      if (key === "enabled" && !value) {
        await scheduler.cancelAll();
      }
      const state = await session.refresh(SETTINGS_REFRESH);
      res.json({ key, value, scheduled: state.scheduled });
    } catch (error) {
      sendError(res, "Failed to toggle notification setting", error);
    }
  });

  /** PUT /api/settings/location - Switch between auto-detect and a selected city */
  router.put("/settings/location", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const autoDetect = isRecord(body) ? body.autoDetect : undefined;
    if (typeof autoDetect !== "boolean") {
      res.status(400).json({ error: "autoDetect (boolean) is required" });
      return;
    }
    const cityId = isRecord(body) && typeof body.cityId === "string" ? body.cityId : null;
    const city = cityId ? ekadashiService.getCityById(cityId) : null;
    if (!autoDetect && !city) {
      res.status(400).json({ error: "A known cityId is required when autoDetect is off" });
      return;
    }

    try {
      const current = await settings.getLocationSettings();
      const timezone = city ? city.timezone : current.currentTimezone;
      if (!(await settings.updateLocationSettings(autoDetect, cityId, timezone))) {
        res.status(500).json({ error: "Failed to save location settings" });
        return;
      }
      res.json(await session.refresh(SETTINGS_REFRESH));
    } catch (error) {
      sendError(res, "Failed to update location settings", error);
    }
  });

  /** PUT /api/settings/language */
  router.put("/settings/language", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const languageCode = isRecord(body) ? body.languageCode : undefined;
    if (typeof languageCode !== "string" || !messageTemplateService.getSupportedLanguages().includes(languageCode)) {
      res.status(400).json({
        error: "Unsupported language",
        supported: messageTemplateService.getSupportedLanguages(),
      });
      return;
    }
    try {
      await settings.setLanguageCode(languageCode);
      res.json(await session.refresh(SETTINGS_REFRESH));
    } catch (error) {
      sendError(res, "Failed to update language", error);
    }
  });

  /** POST /api/settings/reset - Restore defaults (the location cache is kept) */
  router.post("/settings/reset", async (_req: Request, res: Response) => {
    try {
      if (!(await settings.resetToDefaults())) {
        res.status(500).json({ error: "Failed to reset settings" });
        return;
      }
      res.json(await session.refresh(SETTINGS_REFRESH));
    } catch (error) {
      sendError(res, "Failed to reset settings", error);
    }
  });

  /** PUT /api/permissions/location - Record the user's location consent */
  router.put("/permissions/location", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const permission = parsePermission(isRecord(body) ? body.permission : undefined);
    if (!permission) {
      res.status(400).json({ error: "permission must be granted, denied or undetermined" });
      return;
    }
    if (!(await settings.setLocationPermission(permission))) {
      res.status(500).json({ error: "Failed to save permission" });
      return;
    }
    res.json({ permission });
  });

  /** PUT /api/device/timezone - Timezone identifier reported by the phone */
  router.put("/device/timezone", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const timezoneId = isRecord(body) ? body.timezoneId : undefined;
    if (typeof timezoneId !== "string" || timezoneId.trim() === "") {
      res.status(400).json({ error: "timezoneId is required" });
      return;
    }
    if (!(await settings.setDeviceTimezoneId(timezoneId.trim()))) {
      res.status(500).json({ error: "Failed to save device timezone" });
      return;
    }
    res.json({
      timezoneId: timezoneId.trim(),
      timezone: timezoneService.bucketFromDeviceTimezoneId(timezoneId),
    });
  });

  /** GET /api/location/current - Run the location cascade */
  router.get("/location/current", async (req: Request, res: Response) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), config.location.overallTimeoutMs);
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });
    try {
      const result = await locationService.resolveCurrentLocation({
        signal: controller.signal,
        preferFreshCache: req.query.preferFreshCache === "true",
      });
      res.json(result);
    } catch (error) {
      sendError(res, "Failed to resolve location", error);
    } finally {
      clearTimeout(timer);
    }
  });

  /** GET /api/location/cached */
  router.get("/location/cached", async (_req: Request, res: Response) => {
    try {
      const cached = await locationService.getCachedLocation();
      if (!cached) {
        res.status(404).json({ error: "No cached location" });
        return;
      }
      res.json(cached);
    } catch (error) {
      sendError(res, "Failed to read cached location", error);
    }
  });

  /** POST /api/location/report - A position fix pushed by the phone */
  router.post("/location/report", (req: Request, res: Response) => {
    const report = parseLocationReport(req.body);
    if (!report) {
      res.status(400).json({ error: "latitude and longitude must be valid coordinates" });
      return;
    }
    const fix = feed.report(report);
    res.status(202).json({ accepted: true, timestamp: fix.timestamp });
  });

  /** DELETE /api/location/cache */
  router.delete("/location/cache", async (_req: Request, res: Response) => {
    try {
      await locationService.clearCache();
      res.status(204).end();
    } catch (error) {
      sendError(res, "Failed to clear location cache", error);
    }
  });

  /** GET /api/cities - Catalogue grouped by country */
  router.get("/cities", (_req: Request, res: Response) => {
    res.json(ekadashiService.getCitiesByCountry());
  });

  /** GET /api/ekadashis - Calendar for the current bucket (?upcoming=true for the future only) */
  router.get("/ekadashis", async (req: Request, res: Response) => {
    try {
      const preferences = await settings.getPreferences();
      const requested = req.query.timezone;
      const timezone = timezoneService.isSupportedBucket(requested)
        ? requested
        : preferences.location.currentTimezone;
      const ekadashis =
        req.query.upcoming === "true"
          ? ekadashiService.getUpcomingEkadashis(timezone, preferences.languageCode, new Date())
          : ekadashiService.getEkadashis(timezone, preferences.languageCode);
      res.json({ timezone, ekadashis });
    } catch (error) {
      sendError(res, "Failed to load Ekadashis", error);
    }
  });

  /** GET /api/ekadashis/:id */
  router.get("/ekadashis/:id", async (req: Request, res: Response) => {
    const id = parseInt(req.params.id, 10);
    if (!Number.isFinite(id)) {
      res.status(400).json({ error: "id must be a number" });
      return;
    }
    try {
      const preferences = await settings.getPreferences();
      const ekadashi = ekadashiService.getEkadashiById(
        id,
        preferences.location.currentTimezone,
        preferences.languageCode
      );
      if (!ekadashi) {
        res.status(404).json({ error: `Ekadashi ${id} not found` });
        return;
      }
      res.json(ekadashi);
    } catch (error) {
      sendError(res, "Failed to load Ekadashi", error);
    }
  });

  /** GET /api/session - Result of the last refresh */
  router.get("/session", (_req: Request, res: Response) => {
    const state = session.getLastState();
    if (!state) {
      res.status(404).json({ error: "No session yet" });
      return;
    }
    res.json(state);
  });

  /** POST /api/notifications/test - Send a test notification right away */
  router.post("/notifications/test", async (_req: Request, res: Response) => {
    try {
      const { languageCode } = await settings.getPreferences();
      const notificationId = await scheduler.showImmediate(
        messageTemplateService.translate("notif_test_title", languageCode),
        messageTemplateService.translate("notif_test_body", languageCode)
      );
      const summary = await workRunner.tick();
      res.json({ notificationId, delivered: summary ? summary.succeeded > 0 : false });
    } catch (error) {
      sendError(res, "Failed to send test notification", error);
    }
  });

  /** GET /api/notifications/pending */
  router.get("/notifications/pending", async (_req: Request, res: Response) => {
    try {
      const [count, items] = await Promise.all([scheduler.getPendingCount(), scheduler.listPending()]);
      res.json({ count, items });
    } catch (error) {
      sendError(res, "Failed to list pending notifications", error);
    }
  });

  /** POST /api/notifications/reschedule - Cancel and reinstall every reminder */
  router.post("/notifications/reschedule", async (_req: Request, res: Response) => {
    try {
      const state = await session.refresh();
      res.json({ timezone: state.timezone, scheduled: state.scheduled });
    } catch (error) {
      sendError(res, "Failed to reschedule notifications", error);
    }
  });

  /** DELETE /api/notifications - Cancel everything pending (flags unchanged) */
  router.delete("/notifications", async (_req: Request, res: Response) => {
    try {
      await scheduler.cancelAll();
      res.status(204).end();
    } catch (error) {
      sendError(res, "Failed to cancel notifications", error);
    }
  });

  /** DELETE /api/notifications/:ekadashiId - Cancel one event's reminders */
  router.delete("/notifications/:ekadashiId", async (req: Request, res: Response) => {
    const id = parseInt(req.params.ekadashiId, 10);
    if (!Number.isFinite(id)) {
      res.status(400).json({ error: "ekadashiId must be a number" });
      return;
    }
    try {
      await scheduler.cancelForEvent(id);
      res.status(204).end();
    } catch (error) {
      sendError(res, "Failed to cancel notifications", error);
    }
  });

  /** GET /api/notifications/log - Delivery stats (optional startDate, endDate) */
  router.get("/notifications/log", async (req: Request, res: Response) => {
    try {
      const startDate = typeof req.query.startDate === "string" ? req.query.startDate : undefined;
      const endDate = typeof req.query.endDate === "string" ? req.query.endDate : undefined;
      res.json(await messageLog.getMessageStats({ startDate, endDate }));
    } catch (error) {
      sendError(res, "Failed to load message log", error);
    }
  });

  return router;
}
