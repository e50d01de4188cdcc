import {
  DEFAULT_TIMEZONE,
  SUPPORTED_TIMEZONES,
  TimezoneBucket,
} from "../types";

interface BoundingBox {
  timezone: TimezoneBucket;
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/**
 * Coarse boxes for the supported regions, inclusive on every edge.
 * Adjacent US boxes share their longitude edge; the first box in this
 * order wins, so -85 is Eastern, -102 Central and -115 Mountain.
 */
export const TIMEZONE_BOXES: readonly BoundingBox[] = [
  { timezone: "IST", minLat: 6, maxLat: 37, minLng: 68, maxLng: 97 },
  { timezone: "EST", minLat: 24, maxLat: 50, minLng: -85, maxLng: -67 },
  { timezone: "CST", minLat: 24, maxLat: 50, minLng: -102, maxLng: -85 },
  { timezone: "MST", minLat: 24, maxLat: 50, minLng: -115, maxLng: -102 },
  { timezone: "PST", minLat: 24, maxLat: 50, minLng: -125, maxLng: -115 },
];

const DEVICE_TIMEZONE_MAP: Record<string, TimezoneBucket> = {
  "Asia/Kolkata": "IST",
  "Asia/Calcutta": "IST",
  "America/New_York": "EST",
  "America/Detroit": "EST",
  "America/Toronto": "EST",
  "America/Indiana/Indianapolis": "EST",
  "America/Kentucky/Louisville": "EST",
  "US/Eastern": "EST",
  EST5EDT: "EST",
  "America/Chicago": "CST",
  "America/Winnipeg": "CST",
  "US/Central": "CST",
  CST6CDT: "CST",
  "America/Denver": "MST",
  "America/Phoenix": "MST",
  "America/Boise": "MST",
  "America/Edmonton": "MST",
  "US/Mountain": "MST",
  "US/Arizona": "MST",
  MST7MDT: "MST",
  "America/Los_Angeles": "PST",
  "America/Vancouver": "PST",
  "America/Tijuana": "PST",
  "US/Pacific": "PST",
  PST8PDT: "PST",
};

/** Substring hints for North American identifiers missing from the table, checked in order */
const NORTH_AMERICA_HINTS: ReadonlyArray<[string, TimezoneBucket]> = [
  ["Pacific", "PST"],
  ["Los_Angeles", "PST"],
  ["Vancouver", "PST"],
  ["Mountain", "MST"],
  ["Denver", "MST"],
  ["Phoenix", "MST"],
  ["Central", "CST"],
  ["Chicago", "CST"],
  ["Indiana/Knox", "CST"],
  ["Eastern", "EST"],
  ["New_York", "EST"],
  ["Indiana", "EST"],
  ["Kentucky", "EST"],
  ["Detroit", "EST"],
];

const NORTH_AMERICA_PREFIXES = ["America/", "US/", "Canada/"];

export class TimezoneService {
  isSupportedBucket(value: unknown): value is TimezoneBucket {
    return (
      typeof value === "string" &&
      SUPPORTED_TIMEZONES.some((timezone) => timezone === value)
    );
  }

  /**
   * Maps coordinates to a supported bucket. Anything outside every box
   * (including the rest of the world) falls back to IST.
   */
  bucketFromCoordinates(latitude: number, longitude: number): TimezoneBucket {
    const match = TIMEZONE_BOXES.find(
      (box) =>
        latitude >= box.minLat &&
        latitude <= box.maxLat &&
        longitude >= box.minLng &&
        longitude <= box.maxLng
    );
    return match ? match.timezone : DEFAULT_TIMEZONE;
  }

  /**
   * Used when location permission is denied: the device still reports an
   * IANA identifier, which is good enough to pick a bucket.
   */
  bucketFromDeviceTimezoneId(timezoneId: string): TimezoneBucket {
    const id = timezoneId.trim();
    const direct = DEVICE_TIMEZONE_MAP[id];
    if (direct) {
      return direct;
    }

    if (NORTH_AMERICA_PREFIXES.some((prefix) => id.startsWith(prefix))) {
      const hint = NORTH_AMERICA_HINTS.find(([fragment]) => id.includes(fragment));
      if (hint) {
        return hint[1];
      }
    }

    return DEFAULT_TIMEZONE;
  }

  /** Host timezone identifier, used when the device never reported one */
  getHostTimezoneId(): string {
    return Intl.DateTimeFormat().resolvedOptions().timeZone || "UTC";
  }

  /**
   * Formats the wall-clock time of an offset-carrying ISO string
   * ("2026-02-12T06:45:00+05:30" -> "06:45 AM") without converting it to
   * the host timezone.
   */
  formatTimeFromIso(isoString: string): string {
    const timeMatch = isoString.match(/T(\d{2}):(\d{2})/);
    if (!timeMatch) {
      return "";
    }
    const hours = parseInt(timeMatch[1], 10);
    const minutes = timeMatch[2];
    const period = hours >= 12 ? "PM" : "AM";
    const displayHours = hours > 12 ? hours - 12 : hours === 0 ? 12 : hours;
    return `${String(displayHours).padStart(2, "0")}:${minutes} ${period}`;
  }

  /** "06:41 AM - 10:30 AM", or empty when either end is missing */
  formatParanaWindow(startIso: string, endIso: string): string {
    const start = this.formatTimeFromIso(startIso);
    const end = this.formatTimeFromIso(endIso);
    if (!start || !end) {
      return "";
    }
    return `${start} - ${end}`;
  }

  /** Local calendar date of an offset-carrying ISO string */
  localDateOfIso(isoString: string): string | null {
    const dateMatch = isoString.match(/^(\d{4}-\d{2}-\d{2})T/);
    return dateMatch ? dateMatch[1] : null;
  }

  /** Parses an ISO instant, returning null for anything Date cannot read */
  parseInstant(isoString: string): Date | null {
    if (!isoString) {
      return null;
    }
    const parsed = new Date(isoString);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
}

export default new TimezoneService();
