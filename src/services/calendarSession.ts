import logger from "../utils/logger";
import messageTemplateService, { MessageTemplateService } from "../utils/messageTemplates";
import timezoneService from "../utils/timezone";
import {
  CityInfo,
  EkadashiDate,
  LocationErrorCode,
  LocationServiceResult,
  ResolvedLocation,
  TimezoneBucket,
  UserPreferences,
} from "../types";
import { EkadashiService } from "./ekadashiService";
import { ResolveOptions } from "./locationService";
import { NotificationScheduler } from "./notificationScheduler";
import { SettingsService } from "./settingsService";

export type LocationStatus =
  | "detected"
  | "manual"
  | "permission_denied"
  | "services_disabled"
  | "unavailable";

export interface SessionState {
  timezone: TimezoneBucket;
  locationStatus: LocationStatus;
  /** Banner text for the degraded statuses */
  statusMessage?: string;
  location?: ResolvedLocation;
  city?: CityInfo;
  events: EkadashiDate[];
  scheduled: number;
  refreshedAt: Date;
}

export interface LocationResolver {
  resolveCurrentLocation(options?: ResolveOptions): Promise<LocationServiceResult>;
}

export interface RefreshOptions {
  /** Serve a location cache younger than the freshness window instead of waiting on providers */
  preferFreshCache?: boolean;
}

export interface CalendarSessionDependencies {
  settings: SettingsService;
  ekadashiService: EkadashiService;
  locationService: LocationResolver;
  scheduler: NotificationScheduler;
  templates?: MessageTemplateService;
  overallTimeoutMs: number;
  now?: () => Date;
}

const STATUS_MESSAGE_KEYS: Partial<Record<LocationStatus, string>> = {
  permission_denied: "location_denied",
  services_disabled: "location_disabled",
  unavailable: "location_unavailable",
};

interface ResolvedBucket {
  timezone: TimezoneBucket;
  status: LocationStatus;
  location?: ResolvedLocation;
  city?: CityInfo;
}

/**
 * Settings -> location -> timezone bucket -> event view -> reminders.
 * Run at startup, on the daily refresh and after every settings change.
 */
export class CalendarSession {
  private readonly settings: SettingsService;
  private readonly ekadashiService: EkadashiService;
  private readonly locationService: LocationResolver;
  private readonly scheduler: NotificationScheduler;
  private readonly templates: MessageTemplateService;
  private readonly overallTimeoutMs: number;
  private readonly now: () => Date;
  private lastState: SessionState | null = null;
  /** Tail of the refresh chain; refreshes run one after another */
  private inFlight: Promise<unknown> = Promise.resolve();

  constructor(deps: CalendarSessionDependencies) {
    this.settings = deps.settings;
    this.ekadashiService = deps.ekadashiService;
    this.locationService = deps.locationService;
    this.scheduler = deps.scheduler;
    this.templates = deps.templates ?? messageTemplateService;
    this.overallTimeoutMs = deps.overallTimeoutMs;
    this.now = deps.now ?? (() => new Date());
  }

  getLastState(): SessionState | null {
    return this.lastState;
  }

  /** Timezone identifier the device reported, else the host's own */
  getDeviceTimezoneId(preferences: UserPreferences): string {
    return preferences.deviceTimezoneId ?? timezoneService.getHostTimezoneId();
  }

  /**
   * Queues a refresh behind any that is still running, so each one reads
   * preferences after the previous one has installed its reminders.
   */
  refresh(options: RefreshOptions = {}): Promise<SessionState> {
    const run = this.inFlight.then(() => this.runRefresh(options));
    this.inFlight = run.catch((error: unknown) => {
      logger.debug("Queued refresh failed:", error);
    });
    return run;
  }

  private async runRefresh(options: RefreshOptions): Promise<SessionState> {
    const preferences = await this.settings.getPreferences();
    const resolved = preferences.location.autoDetect
      ? await this.detectBucket(preferences, options.preferFreshCache ?? false)
      : this.manualBucket(preferences);

    if (resolved.timezone !== preferences.location.currentTimezone) {
      logger.info(`Timezone changed: ${preferences.location.currentTimezone} -> ${resolved.timezone}`);
    }
    await this.settings.setCurrentTimezone(resolved.timezone);

    const events = this.ekadashiService.getUpcomingEkadashis(
      resolved.timezone,
      preferences.languageCode,
      this.now()
    );
    const scheduled = await this.reschedule(events, preferences);

    const messageKey = STATUS_MESSAGE_KEYS[resolved.status];
    const state: SessionState = {
      timezone: resolved.timezone,
      locationStatus: resolved.status,
      ...(messageKey
        ? { statusMessage: this.templates.translate(messageKey, preferences.languageCode) }
        : {}),
      ...(resolved.location ? { location: resolved.location } : {}),
      ...(resolved.city ? { city: resolved.city } : {}),
      events,
      scheduled,
      refreshedAt: this.now(),
    };
    this.lastState = state;
    logger.info(
      `Session refreshed: ${state.timezone} (${state.locationStatus}), ${events.length} upcoming, ${scheduled} reminders`
    );
    return state;
  }

  private async reschedule(events: EkadashiDate[], preferences: UserPreferences): Promise<number> {
    try {
      await this.scheduler.cancelAll();
      if (!preferences.notifications.enabled) return 0;
      const texts = this.templates.getLocalizedTexts(preferences.languageCode);
      return await this.scheduler.scheduleAll(events, texts);
    } catch (error) {
      logger.error("Error rescheduling notifications:", error);
      return 0;
    }
  }

  private manualBucket(preferences: UserPreferences): ResolvedBucket {
    const cityId = preferences.location.selectedCityId;
    const city = cityId ? this.ekadashiService.getCityById(cityId) : null;
    if (city) {
      return { timezone: city.timezone, status: "manual", city };
    }
    if (cityId) logger.warn(`Selected city ${cityId} is not in the catalogue`);
    return { timezone: preferences.location.currentTimezone, status: "manual" };
  }

  private async detectBucket(
    preferences: UserPreferences,
    preferFreshCache: boolean
  ): Promise<ResolvedBucket> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.overallTimeoutMs);
    let result: LocationServiceResult;
    try {
      result = await this.locationService.resolveCurrentLocation({
        signal: controller.signal,
        preferFreshCache,
      });
    } catch (error) {
      logger.error("Location resolution threw:", error);
      return { timezone: preferences.location.currentTimezone, status: "unavailable" };
    } finally {
      clearTimeout(timer);
    }

    if (result.success) {
      return { timezone: result.location.timezone, status: "detected", location: result.location };
    }
    return this.bucketForFailure(result.code, preferences);
  }

  private bucketForFailure(code: LocationErrorCode, preferences: UserPreferences): ResolvedBucket {
    const current = preferences.location.currentTimezone;
    switch (code) {
      case "PERMISSION_DENIED": {
        const deviceTimezoneId = this.getDeviceTimezoneId(preferences);
        const timezone = timezoneService.bucketFromDeviceTimezoneId(deviceTimezoneId);
        logger.info(`Location permission denied, using device timezone ${deviceTimezoneId} -> ${timezone}`);
        return { timezone, status: "permission_denied" };
      }
      case "LOCATION_DISABLED":
        logger.info("Location services disabled, keeping current timezone");
        return { timezone: current, status: "services_disabled" };
      case "TIMEOUT":
      case "NO_LOCATION":
      case "LOCATION_ERROR":
        logger.warn(`Location unavailable (${code}), keeping current timezone`);
        return { timezone: current, status: "unavailable" };
      default: {
        const unhandled: never = code;
        throw new Error(`Unhandled location error: ${String(unhandled)}`);
      }
    }
  }
}
