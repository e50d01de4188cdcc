import { config } from "../config";
import logger from "../utils/logger";
import timezoneService from "../utils/timezone";
import {
  LocationErrorCode,
  LocationServiceResult,
  LocationSource,
  ResolvedLocation,
  TimezoneBucket,
} from "../types";
import { KeyValueStore } from "./keyValueStore";
import {
  GPS_PROVIDER,
  LegacyLocationManager,
  LocationPermissions,
  LocationSubscription,
  NETWORK_PROVIDER,
  PositionFix,
  PositionListener,
  PositioningClient,
} from "./positioning";

export const LOCATION_CACHE_KEYS = {
  LATITUDE: "cached_latitude",
  LONGITUDE: "cached_longitude",
  CITY: "cached_city",
  TIMEZONE: "cached_timezone",
  TIMESTAMP: "cached_timestamp",
} as const;

const CACHE_KEY_LIST: string[] = Object.values(LOCATION_CACHE_KEYS);

/** Legacy providers asked for an active update, best first */
const LEGACY_PROVIDER_PRIORITY = [GPS_PROVIDER, NETWORK_PROVIDER];

export const HOME_BASE = {
  latitude: 28.6139,
  longitude: 77.209,
  cityName: "New Delhi",
  timezone: "IST",
} as const;

export interface LocationServiceOptions {
  fixTimeoutMs: number;
  legacyUpdateTimeoutMs: number;
  cacheFreshMs: number;
  homeBaseFallback: boolean;
}

export interface ResolveOptions {
  signal?: AbortSignal;
  /** Serve a cache younger than the freshness window without touching any provider */
  preferFreshCache?: boolean;
}

export interface CityNameLookup {
  getCityName(latitude: number, longitude: number): Promise<string>;
}

export interface LocationDependencies {
  client: PositioningClient;
  legacy: LegacyLocationManager;
  permissions: LocationPermissions;
  geocoder: CityNameLookup;
  store: KeyValueStore;
}

class LocationAbortedError extends Error {
  constructor() {
    super("Location resolution aborted");
    this.name = "LocationAbortedError";
  }
}

function failure(code: LocationErrorCode, message: string): LocationServiceResult {
  return { success: false, code, message };
}

/**
 * Resolves the user's position through a chain of progressively
 * weaker sources, falling back to the persisted cache.
 */
export class LocationService {
  private readonly client: PositioningClient;
  private readonly legacy: LegacyLocationManager;
  private readonly permissions: LocationPermissions;
  private readonly geocoder: CityNameLookup;
  private readonly store: KeyValueStore;

  constructor(
    deps: LocationDependencies,
    private readonly options: LocationServiceOptions = config.location
  ) {
    this.client = deps.client;
    this.legacy = deps.legacy;
    this.permissions = deps.permissions;
    this.geocoder = deps.geocoder;
    this.store = deps.store;
  }

  async hasLocationPermission(): Promise<boolean> {
    return this.permissions.hasLocationPermission();
  }

  async isLocationEnabled(): Promise<boolean> {
    return this.permissions.isLocationEnabled();
  }

  async resolveCurrentLocation(options: ResolveOptions = {}): Promise<LocationServiceResult> {
    const { signal, preferFreshCache = false } = options;

    try {
      if (!(await this.permissions.hasLocationPermission())) {
        return failure("PERMISSION_DENIED", "Location permission not granted");
      }

      if (!(await this.permissions.isLocationEnabled())) {
        const cached = await this.getCachedLocation();
        if (cached) {
          logger.info("Location services disabled, returning cached location");
          return { success: true, location: cached, source: "cache" };
        }
        return failure("LOCATION_DISABLED", "Location services are disabled");
      }

      if (preferFreshCache) {
        const fresh = await this.getFreshCachedLocation();
        if (fresh) return { success: true, location: fresh, source: "cache" };
      }

      const fix = await this.waitForFix(
        (listener) =>
          this.client.requestLocationUpdates(
            { priority: "high_accuracy", intervalMs: 1000, maxUpdates: 1 },
            listener
          ),
        this.options.fixTimeoutMs,
        signal
      );
      if (fix) return this.fromFix(fix, "fresh");
      logger.warn("No fresh fix within timeout, trying legacy providers");

      const provider = LEGACY_PROVIDER_PRIORITY.find((name) => this.legacy.isProviderEnabled(name));
      if (provider) {
        const legacyFix = await this.waitForFix(
          (listener) => this.legacy.requestLocationUpdates(provider, listener),
          this.options.legacyUpdateTimeoutMs,
          signal
        );
        if (legacyFix) return this.fromFix(legacyFix, "legacy_active");
      }

      const passive = this.newestPassiveFix();
      if (passive) return this.fromFix(passive, "legacy_passive");

      const lastKnown = await this.client.getLastLocation();
      this.throwIfAborted(signal);
      if (lastKnown) return this.fromFix(lastKnown, "last_known");

      const cached = await this.getCachedLocation();
      if (cached) {
        logger.info("All providers failed, returning cached location");
        return { success: true, location: cached, source: "cache" };
      }

      if (this.options.homeBaseFallback) {
        logger.info(`No location source available, using home base ${HOME_BASE.cityName}`);
        return {
          success: true,
          location: { ...HOME_BASE, capturedAt: new Date() },
          source: "home_base",
        };
      }

      return failure("NO_LOCATION", "Could not determine location");
    } catch (error) {
      if (error instanceof LocationAbortedError) {
        logger.warn("Location resolution aborted");
        const cached = await this.safeCachedLocation();
        return cached
          ? { success: true, location: cached, source: "cache" }
          : failure("TIMEOUT", "Location request timed out");
      }

      logger.error("Error resolving location:", error);
      const cached = await this.safeCachedLocation();
      return cached
        ? { success: true, location: cached, source: "cache" }
        : failure("LOCATION_ERROR", error instanceof Error ? error.message : String(error));
    }
  }

  /** Last persisted location regardless of age */
  async getCachedLocation(): Promise<ResolvedLocation | null> {
    const values = await this.store.getMany(CACHE_KEY_LIST);
    const latitude = values.get(LOCATION_CACHE_KEYS.LATITUDE);
    const longitude = values.get(LOCATION_CACHE_KEYS.LONGITUDE);
    const cityName = values.get(LOCATION_CACHE_KEYS.CITY);
    const timezone = values.get(LOCATION_CACHE_KEYS.TIMEZONE);
    const timestamp = values.get(LOCATION_CACHE_KEYS.TIMESTAMP);

    if (
      typeof latitude !== "number" ||
      typeof longitude !== "number" ||
      typeof timestamp !== "number" ||
      !timezoneService.isSupportedBucket(timezone)
    ) {
      return null;
    }

    return {
      latitude,
      longitude,
      cityName: typeof cityName === "string" ? cityName : "Unknown",
      timezone,
      capturedAt: new Date(timestamp),
    };
  }

  /** Cached location younger than the freshness window, or null */
  async getFreshCachedLocation(now: Date = new Date()): Promise<ResolvedLocation | null> {
    const cached = await this.getCachedLocation();
    if (!cached) return null;
    const age = now.getTime() - cached.capturedAt.getTime();
    if (age > this.options.cacheFreshMs) {
      logger.debug(`Cached location expired (age: ${age}ms)`);
      return null;
    }
    return cached;
  }

  async cacheLocation(location: ResolvedLocation): Promise<void> {
    await this.store.setMany({
      [LOCATION_CACHE_KEYS.LATITUDE]: location.latitude,
      [LOCATION_CACHE_KEYS.LONGITUDE]: location.longitude,
      [LOCATION_CACHE_KEYS.CITY]: location.cityName,
      [LOCATION_CACHE_KEYS.TIMEZONE]: location.timezone,
      [LOCATION_CACHE_KEYS.TIMESTAMP]: location.capturedAt.getTime(),
    });
  }

  async clearCache(): Promise<void> {
    await this.store.remove(CACHE_KEY_LIST);
    logger.info("Location cache cleared");
  }

  private async safeCachedLocation(): Promise<ResolvedLocation | null> {
    try {
      return await this.getCachedLocation();
    } catch (error) {
      logger.error("Error reading cached location:", error);
      return null;
    }
  }

  private newestPassiveFix(): PositionFix | null {
    let newest: PositionFix | null = null;
    for (const provider of this.legacy.getProviders(true)) {
      const fix = this.legacy.getLastKnownLocation(provider);
      if (fix && (!newest || fix.timestamp > newest.timestamp)) {
        newest = fix;
      }
    }
    return newest;
  }

  private async fromFix(fix: PositionFix, source: LocationSource): Promise<LocationServiceResult> {
    const cityName = await this.geocoder.getCityName(fix.latitude, fix.longitude);
    const timezone: TimezoneBucket = timezoneService.bucketFromCoordinates(fix.latitude, fix.longitude);
    const location: ResolvedLocation = {
      latitude: fix.latitude,
      longitude: fix.longitude,
      cityName,
      timezone,
      capturedAt: new Date(fix.timestamp),
    };

    try {
      await this.cacheLocation(location);
    } catch (error) {
      logger.error("Error caching location:", error);
    }

    logger.info(`Location resolved from ${source}: ${cityName} (${timezone})`);
    return { success: true, location, source };
  }

  private throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) throw new LocationAbortedError();
  }

  /**
   * Waits for the first fix of a subscription. Resolves null on timeout,
   * rejects on abort; the subscription is removed either way.
   */
  private waitForFix(
    subscribe: (listener: PositionListener) => LocationSubscription,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<PositionFix | null> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new LocationAbortedError());
        return;
      }

      let settled = false;
      let subscription: LocationSubscription | null = null;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const onAbort = () => finish(null, new LocationAbortedError());
      const finish = (fix: PositionFix | null, error?: Error) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        subscription?.remove();
        if (error) {
          reject(error);
        } else {
          resolve(fix);
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      timer = setTimeout(() => finish(null), timeoutMs);
      try {
        subscription = subscribe((fix) => finish(fix));
      } catch (error) {
        finish(null, error instanceof Error ? error : new Error(String(error)));
        return;
      }
      // the listener may have fired before the handle existed
      if (settled) subscription.remove();
    });
  }
}
