import path from "path";
import dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  port: intFromEnv("PORT", 3000),
  nodeEnv: process.env.NODE_ENV || "development",
  apiKey: process.env.API_KEY || "",

  mongo: {
    uri: process.env.MONGODB_URI || "",
  },

  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID || "",
    authToken: process.env.TWILIO_AUTH_TOKEN || "",
    whatsappFrom: process.env.TWILIO_WHATSAPP_FROM || "",
    notifyTo: process.env.NOTIFY_WHATSAPP_TO || "",
    statusCallbackUrl: process.env.TWILIO_STATUS_CALLBACK_URL || undefined,
  },

  data: {
    ekadashiFile:
      process.env.EKADASHI_DATA_FILE ||
      path.resolve(process.cwd(), "data/ekadashi_data.json"),
    citiesFile:
      process.env.CITIES_FILE || path.resolve(process.cwd(), "data/cities.json"),
    translationsFile:
      process.env.TRANSLATIONS_FILE ||
      path.resolve(process.cwd(), "data/translations.json"),
  },

  webhooks: {
    publicBaseUrl: process.env.PUBLIC_BASE_URL || "",
  },

  geocoder: {
    enabled: process.env.GEOCODER_ENABLED !== "false",
    baseUrl: process.env.GEOCODER_BASE_URL || "https://nominatim.openstreetmap.org",
    userAgent: process.env.GEOCODER_USER_AGENT || "ekadashi-reminders/1.0",
    timeoutMs: intFromEnv("GEOCODER_TIMEOUT_MS", 5000),
  },

  location: {
    ipGeolocationUrl: process.env.IP_GEOLOCATION_URL || "https://ipapi.co/json/",
    // comma-separated subset of "gps,network"
    legacyProviders: (process.env.LEGACY_LOCATION_PROVIDERS ?? "network")
      .split(",")
      .map((provider) => provider.trim())
      .filter((provider) => provider.length > 0),
    fixTimeoutMs: intFromEnv("LOCATION_FIX_TIMEOUT_MS", 30000),
    legacyUpdateTimeoutMs: intFromEnv("LEGACY_UPDATE_TIMEOUT_MS", 5000),
    overallTimeoutMs: intFromEnv("LOCATION_OVERALL_TIMEOUT_MS", 45000),
    cacheFreshMs: intFromEnv("LOCATION_CACHE_FRESH_MS", 5 * 60 * 1000),
    // Hosts with no positioning at all (CI boxes, containers) may opt into the home base
    homeBaseFallback: process.env.LOCATION_HOME_BASE_FALLBACK === "true",
  },

  schedules: {
    workRunnerCron: process.env.WORK_RUNNER_CRON || "* * * * *",
    refreshCron: process.env.REFRESH_CRON || "0 3 * * *",
  },

  logLevel: process.env.LOG_LEVEL || "info",
};

const requiredVars = [
  "MONGODB_URI",
  "TWILIO_ACCOUNT_SID",
  "TWILIO_AUTH_TOKEN",
  "TWILIO_WHATSAPP_FROM",
  "NOTIFY_WHATSAPP_TO",
];

/** Throws on the first missing required environment variable. Called by the entry point only. */
export function validateConfig(): void {
  for (const varName of requiredVars) {
    if (!process.env[varName]) {
      throw new Error(`Missing required environment variable: ${varName}`);
    }
  }
}
