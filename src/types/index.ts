export const SUPPORTED_TIMEZONES = ["IST", "EST", "CST", "MST", "PST"] as const;
export type TimezoneBucket = (typeof SUPPORTED_TIMEZONES)[number];

export const DEFAULT_TIMEZONE: TimezoneBucket = "IST";
export const DEFAULT_LANGUAGE = "en";

export type ReminderType = "2day" | "1day" | "start" | "parana";

/** Order matters: the index is the ordinal used for notification ids */
export const REMINDER_TYPES: readonly ReminderType[] = ["2day", "1day", "start", "parana"];

export interface EkadashiTiming {
  date: string;
  fasting_start: string;
  parana_start: string;
  parana_end: string;
}

export type LocalizedField = Record<string, string>;

/** One entry of data/ekadashi_data.json */
export interface EkadashiRecord {
  id: number;
  paksha?: string;
  month?: string;
  name: LocalizedField;
  description?: LocalizedField;
  story?: LocalizedField;
  fasting_rules?: LocalizedField;
  benefits?: LocalizedField;
  timing: Partial<Record<TimezoneBucket, EkadashiTiming>>;
}

export interface EkadashiDataset {
  ekadashis: EkadashiRecord[];
}

/** An Ekadashi flattened for one timezone bucket and language */
export interface EkadashiDate {
  id: number;
  name: string;
  date: string;
  fastStartTime: string;
  fastBreakTime: string;
  description: string;
  story: string;
  fastingRules: string;
  benefits: string;
  paksha: string;
  month: string;
  fastingStartIso: string;
  paranaStartIso: string;
  paranaEndIso: string;
}

export interface CityInfo {
  id: string;
  name: string;
  country: string;
  timezone: TimezoneBucket;
}

export interface ResolvedLocation {
  latitude: number;
  longitude: number;
  cityName: string;
  timezone: TimezoneBucket;
  capturedAt: Date;
}

export type LocationErrorCode =
  | "PERMISSION_DENIED"
  | "LOCATION_DISABLED"
  | "TIMEOUT"
  | "NO_LOCATION"
  | "LOCATION_ERROR";

export type LocationSource =
  | "fresh"
  | "legacy_active"
  | "legacy_passive"
  | "last_known"
  | "cache"
  | "home_base";

export type LocationServiceResult =
  | { success: true; location: ResolvedLocation; source: LocationSource }
  | { success: false; code: LocationErrorCode; message: string };

export type LocationPermission = "granted" | "denied" | "undetermined";

export interface NotificationSettings {
  enabled: boolean;
  remind2Days: boolean;
  remind1Day: boolean;
  remindOnStart: boolean;
  remindOnParana: boolean;
}

export interface LocationSettings {
  autoDetect: boolean;
  selectedCityId: string | null;
  currentTimezone: TimezoneBucket;
}

export interface UserPreferences {
  notifications: NotificationSettings;
  location: LocationSettings;
  languageCode: string;
  locationPermission: LocationPermission;
  deviceTimezoneId: string | null;
}

/** Localization dictionary for one language: message key -> template */
export type LocalizedTexts = Record<string, string>;

export interface NotificationPayload {
  title: string;
  body: string;
  notificationId: number;
  ekadashiId?: number;
  notificationType?: ReminderType;
}

export interface ScheduledReminder {
  workKey: string;
  ekadashiId: number;
  type: ReminderType;
  triggerAt: Date;
  payload: NotificationPayload;
}

export type ReminderOutcome =
  | { status: "ENQUEUED"; reminder: ScheduledReminder }
  | { status: "SKIPPED"; reminder: ScheduledReminder };
