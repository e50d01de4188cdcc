import logger from "../utils/logger";
import timezoneService from "../utils/timezone";
import {
  DEFAULT_LANGUAGE,
  DEFAULT_TIMEZONE,
  LocationPermission,
  LocationSettings,
  NotificationSettings,
  TimezoneBucket,
  UserPreferences,
} from "../types";
import { KeyValueStore, StoredValue } from "./keyValueStore";

export const SETTINGS_KEYS = {
  NOTIFICATIONS_ENABLED: "notifications_enabled",
  REMIND_2_DAYS: "remind_two_days_before",
  REMIND_1_DAY: "remind_one_day_before",
  REMIND_ON_START: "remind_on_day",
  REMIND_ON_PARANA: "remind_on_parana",
  AUTO_DETECT_LOCATION: "auto_detect_location",
  SELECTED_CITY_ID: "selected_city_id",
  CURRENT_TIMEZONE: "current_timezone",
  LANGUAGE_CODE: "language_code",
  LOCATION_PERMISSION: "location_permission",
  DEVICE_TIMEZONE_ID: "device_timezone_id",
} as const;

const NOTIFICATION_KEYS: Record<keyof NotificationSettings, string> = {
  enabled: SETTINGS_KEYS.NOTIFICATIONS_ENABLED,
  remind2Days: SETTINGS_KEYS.REMIND_2_DAYS,
  remind1Day: SETTINGS_KEYS.REMIND_1_DAY,
  remindOnStart: SETTINGS_KEYS.REMIND_ON_START,
  remindOnParana: SETTINGS_KEYS.REMIND_ON_PARANA,
};

export const DEFAULT_NOTIFICATION_SETTINGS: NotificationSettings = {
  enabled: true,
  remind2Days: true,
  remind1Day: true,
  remindOnStart: true,
  remindOnParana: false,
};

export const DEFAULT_PREFERENCES: UserPreferences = {
  notifications: DEFAULT_NOTIFICATION_SETTINGS,
  location: {
    autoDetect: true,
    selectedCityId: null,
    currentTimezone: DEFAULT_TIMEZONE,
  },
  languageCode: DEFAULT_LANGUAGE,
  locationPermission: "undetermined",
  deviceTimezoneId: null,
};

const ALL_KEYS: string[] = Object.values(SETTINGS_KEYS);

function asBoolean(value: StoredValue | undefined, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function asString(value: StoredValue | undefined): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

function asPermission(value: StoredValue | undefined): LocationPermission {
  return value === "granted" || value === "denied" ? value : "undetermined";
}

export function isNotificationSettingKey(value: string): value is keyof NotificationSettings {
  return Object.keys(NOTIFICATION_KEYS).includes(value);
}

/**
 * User preferences over the key-value store. Reads fall back to defaults,
 * writes report success as a boolean and never throw.
 */
export class SettingsService {
  constructor(private readonly store: KeyValueStore) {}

  async getPreferences(): Promise<UserPreferences> {
    try {
      const values = await this.store.getMany(ALL_KEYS);
      return this.fromValues(values);
    } catch (error) {
      logger.error("Error reading preferences, using defaults:", error);
      return DEFAULT_PREFERENCES;
    }
  }

  async getNotificationSettings(): Promise<NotificationSettings> {
    const preferences = await this.getPreferences();
    return preferences.notifications;
  }

  async updateNotificationSettings(settings: Partial<NotificationSettings>): Promise<boolean> {
    const entries: Record<string, StoredValue> = {};
    for (const [field, key] of Object.entries(NOTIFICATION_KEYS)) {
      if (!isNotificationSettingKey(field)) continue;
      const value = settings[field];
      if (value !== undefined) {
        entries[key] = value;
      }
    }
    return this.write(entries, "notification settings");
  }

  /** Returns the new value, or null when the store rejected the write */
  async toggleNotificationSetting(field: keyof NotificationSettings): Promise<boolean | null> {
    try {
      return await this.store.toggle(
        NOTIFICATION_KEYS[field],
        DEFAULT_NOTIFICATION_SETTINGS[field]
      );
    } catch (error) {
      logger.error(`Error toggling notification setting ${field}:`, error);
      return null;
    }
  }

  async getLocationSettings(): Promise<LocationSettings> {
    const preferences = await this.getPreferences();
    return preferences.location;
  }

  async updateLocationSettings(
    autoDetect: boolean,
    cityId: string | null,
    timezone: TimezoneBucket
  ): Promise<boolean> {
    return this.write(
      {
        [SETTINGS_KEYS.AUTO_DETECT_LOCATION]: autoDetect,
        [SETTINGS_KEYS.SELECTED_CITY_ID]: autoDetect ? null : cityId,
        [SETTINGS_KEYS.CURRENT_TIMEZONE]: timezone,
      },
      "location settings"
    );
  }

  async setCurrentTimezone(timezone: TimezoneBucket): Promise<boolean> {
    return this.write({ [SETTINGS_KEYS.CURRENT_TIMEZONE]: timezone }, "current timezone");
  }

  async setLanguageCode(code: string): Promise<boolean> {
    return this.write({ [SETTINGS_KEYS.LANGUAGE_CODE]: code }, "language code");
  }

  async getLocationPermission(): Promise<LocationPermission> {
    const preferences = await this.getPreferences();
    return preferences.locationPermission;
  }

  async setLocationPermission(permission: LocationPermission): Promise<boolean> {
    return this.write({ [SETTINGS_KEYS.LOCATION_PERMISSION]: permission }, "location permission");
  }

  async setDeviceTimezoneId(timezoneId: string): Promise<boolean> {
    return this.write({ [SETTINGS_KEYS.DEVICE_TIMEZONE_ID]: timezoneId }, "device timezone");
  }

  async resetToDefaults(): Promise<boolean> {
    try {
      await this.store.remove(ALL_KEYS);
      logger.info("Preferences reset to defaults");
      return true;
    } catch (error) {
      logger.error("Error resetting preferences:", error);
      return false;
    }
  }

  private async write(entries: Record<string, StoredValue>, label: string): Promise<boolean> {
    try {
      await this.store.setMany(entries);
      return true;
    } catch (error) {
      logger.error(`Error saving ${label}:`, error);
      return false;
    }
  }

  private fromValues(values: Map<string, StoredValue>): UserPreferences {
    const defaults = DEFAULT_NOTIFICATION_SETTINGS;
    const storedTimezone = values.get(SETTINGS_KEYS.CURRENT_TIMEZONE);

    return {
      notifications: {
        enabled: asBoolean(values.get(SETTINGS_KEYS.NOTIFICATIONS_ENABLED), defaults.enabled),
        remind2Days: asBoolean(values.get(SETTINGS_KEYS.REMIND_2_DAYS), defaults.remind2Days),
        remind1Day: asBoolean(values.get(SETTINGS_KEYS.REMIND_1_DAY), defaults.remind1Day),
        remindOnStart: asBoolean(values.get(SETTINGS_KEYS.REMIND_ON_START), defaults.remindOnStart),
        remindOnParana: asBoolean(
          values.get(SETTINGS_KEYS.REMIND_ON_PARANA),
          defaults.remindOnParana
        ),
      },
      location: {
        autoDetect: asBoolean(values.get(SETTINGS_KEYS.AUTO_DETECT_LOCATION), true),
        selectedCityId: asString(values.get(SETTINGS_KEYS.SELECTED_CITY_ID)),
        currentTimezone: timezoneService.isSupportedBucket(storedTimezone)
          ? storedTimezone
          : DEFAULT_TIMEZONE,
      },
      languageCode: asString(values.get(SETTINGS_KEYS.LANGUAGE_CODE)) ?? DEFAULT_LANGUAGE,
      locationPermission: asPermission(values.get(SETTINGS_KEYS.LOCATION_PERMISSION)),
      deviceTimezoneId: asString(values.get(SETTINGS_KEYS.DEVICE_TIMEZONE_ID)),
    };
  }
}
