import { EventEmitter } from "events";
import axios from "axios";
import logger from "../utils/logger";

export interface PositionFix {
  latitude: number;
  longitude: number;
  accuracy?: number;
  /** epoch millis when the fix was taken */
  timestamp: number;
  provider: string;
}

export type PositionListener = (fix: PositionFix) => void;

/** Handle returned by every subscription; removing twice is harmless */
export interface LocationSubscription {
  remove(): void;
}

export interface LocationRequest {
  priority: "high_accuracy" | "balanced";
  intervalMs: number;
  maxUpdates?: number;
}

/** The primary ("fused") positioning client */
export interface PositioningClient {
  requestLocationUpdates(request: LocationRequest, listener: PositionListener): LocationSubscription;
  getLastLocation(): Promise<PositionFix | null>;
}

/** Lower-level named providers, queried one by one */
export interface LegacyLocationManager {
  getProviders(enabledOnly: boolean): string[];
  isProviderEnabled(provider: string): boolean;
  getLastKnownLocation(provider: string): PositionFix | null;
  requestLocationUpdates(provider: string, listener: PositionListener): LocationSubscription;
}

export interface LocationPermissions {
  hasLocationPermission(): Promise<boolean>;
  isLocationEnabled(): Promise<boolean>;
}

export const GPS_PROVIDER = "gps";
export const NETWORK_PROVIDER = "network";

/**
 * A provider whose fixes arrive from outside: the user's phone posts them to
 * the API or shares a WhatsApp location. It is the primary positioning client
 * and doubles as the "gps" legacy provider. A fix reported within
 * `currentFixMs` counts as current and is handed to new subscribers at once.
 */
export class DeviceLocationFeed implements PositioningClient {
  private readonly emitter = new EventEmitter();
  private lastFix: PositionFix | null = null;

  constructor(
    private readonly currentFixMs = 60 * 1000,
    private readonly now: () => number = Date.now
  ) {}

  report(fix: Omit<PositionFix, "provider" | "timestamp"> & { timestamp?: number }): PositionFix {
    const reported: PositionFix = {
      latitude: fix.latitude,
      longitude: fix.longitude,
      accuracy: fix.accuracy,
      timestamp: fix.timestamp ?? this.now(),
      provider: GPS_PROVIDER,
    };
    this.lastFix = reported;
    logger.info(`Device reported location: ${reported.latitude}, ${reported.longitude}`);
    this.emitter.emit("fix", reported);
    return reported;
  }

  requestLocationUpdates(request: LocationRequest, listener: PositionListener): LocationSubscription {
    let delivered = 0;
    const onFix = (fix: PositionFix) => {
      delivered++;
      if (request.maxUpdates !== undefined && delivered >= request.maxUpdates) {
        this.emitter.off("fix", onFix);
      }
      listener(fix);
    };
    this.emitter.on("fix", onFix);

    const current = this.lastFix;
    if (current && this.now() - current.timestamp <= this.currentFixMs) {
      onFix(current);
    }
    return { remove: () => this.emitter.off("fix", onFix) };
  }

  async getLastLocation(): Promise<PositionFix | null> {
    return this.lastFix;
  }

  getLastKnownFix(): PositionFix | null {
    return this.lastFix;
  }

  listenerCount(): number {
    return this.emitter.listenerCount("fix");
  }
}

interface IpLookupResponse {
  latitude?: unknown;
  longitude?: unknown;
  error?: unknown;
}

export interface HttpRequestOptions {
  params?: Record<string, string>;
  timeout?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpGetter {
  get<T>(url: string, options?: HttpRequestOptions): Promise<{ data: T }>;
}

/**
 * Coarse "network" provider: geolocates the host's public IP. Useful for a
 * self-hosted install that sits in the same city as its user.
 */
export class IpGeolocationProvider {
  private lastFix: PositionFix | null = null;

  constructor(
    private readonly url: string,
    private readonly http: HttpGetter = axios,
    private readonly timeoutMs = 5000
  ) {}

  /** Aborting `signal` cancels the request and resolves null */
  async lookup(signal?: AbortSignal): Promise<PositionFix | null> {
    try {
      const response = await this.http.get<IpLookupResponse>(this.url, { timeout: this.timeoutMs, signal });
      const { latitude, longitude, error } = response.data;
      if (error || typeof latitude !== "number" || typeof longitude !== "number") {
        logger.warn("IP geolocation returned no coordinates");
        return null;
      }
      this.lastFix = {
        latitude,
        longitude,
        accuracy: 5000,
        timestamp: Date.now(),
        provider: NETWORK_PROVIDER,
      };
      return this.lastFix;
    } catch (error) {
      if (signal?.aborted) {
        logger.debug("IP geolocation lookup cancelled");
      } else {
        logger.warn("IP geolocation lookup failed:", error);
      }
      return null;
    }
  }

  getLastKnownFix(): PositionFix | null {
    return this.lastFix;
  }
}

/**
 * Named legacy providers over the device feed ("gps") and IP
 * geolocation ("network"). Only the providers listed at construction
 * count as enabled.
 */
export class LocationProviderManager implements LegacyLocationManager {
  constructor(
    private readonly feed: DeviceLocationFeed,
    private readonly network: IpGeolocationProvider,
    private readonly enabledProviders: readonly string[] = [GPS_PROVIDER, NETWORK_PROVIDER]
  ) {}

  getProviders(enabledOnly: boolean): string[] {
    const all = [GPS_PROVIDER, NETWORK_PROVIDER];
    return enabledOnly ? all.filter((provider) => this.isProviderEnabled(provider)) : all;
  }

  isProviderEnabled(provider: string): boolean {
    return this.enabledProviders.includes(provider);
  }

  getLastKnownLocation(provider: string): PositionFix | null {
    if (!this.isProviderEnabled(provider)) return null;
    if (provider === GPS_PROVIDER) return this.feed.getLastKnownFix();
    return this.network.getLastKnownFix();
  }

  requestLocationUpdates(provider: string, listener: PositionListener): LocationSubscription {
    if (provider === GPS_PROVIDER) {
      return this.feed.requestLocationUpdates(
        { priority: "balanced", intervalMs: 1000 },
        listener
      );
    }

    const controller = new AbortController();
    if (provider === NETWORK_PROVIDER) {
      this.network
        .lookup(controller.signal)
        .then((fix) => {
          if (!controller.signal.aborted && fix) listener(fix);
        })
        .catch((error) => logger.error("Error delivering network fix:", error));
    }
    return {
      remove: () => controller.abort(),
    };
  }
}

export interface PermissionSource {
  getLocationPermission(): Promise<"granted" | "denied" | "undetermined">;
}

/**
 * Permission is the user's stored consent; positioning counts as enabled
 * when at least one provider is switched on.
 */
export class StoredLocationPermissions implements LocationPermissions {
  constructor(
    private readonly source: PermissionSource,
    private readonly providers: LegacyLocationManager
  ) {}

  async hasLocationPermission(): Promise<boolean> {
    return (await this.source.getLocationPermission()) === "granted";
  }

  async isLocationEnabled(): Promise<boolean> {
    return this.providers.getProviders(true).length > 0;
  }
}
