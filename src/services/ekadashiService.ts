import { readFile } from "fs/promises";
import logger from "../utils/logger";
import timezoneService from "../utils/timezone";
import {
  CityInfo,
  DEFAULT_LANGUAGE,
  EkadashiDate,
  EkadashiRecord,
  EkadashiTiming,
  LocalizedField,
  SUPPORTED_TIMEZONES,
  TimezoneBucket,
} from "../types";

export interface EkadashiDataFiles {
  ekadashiFile: string;
  citiesFile: string;
}

export interface DatasetIssue {
  ekadashiId: number;
  timezone: TimezoneBucket;
  problem: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toLocalizedField(value: unknown): LocalizedField | undefined {
  if (!isRecord(value)) return undefined;
  const field: LocalizedField = {};
  for (const [language, text] of Object.entries(value)) {
    if (typeof text === "string") field[language] = text;
  }
  return field;
}

function toTiming(value: unknown): EkadashiTiming | undefined {
  if (!isRecord(value)) return undefined;
  const { date, fasting_start, parana_start, parana_end } = value;
  if (
    typeof date !== "string" ||
    typeof fasting_start !== "string" ||
    typeof parana_start !== "string" ||
    typeof parana_end !== "string"
  ) {
    return undefined;
  }
  return { date, fasting_start, parana_start, parana_end };
}

function toEkadashiRecord(value: unknown): EkadashiRecord | null {
  if (!isRecord(value) || typeof value.id !== "number" || !isRecord(value.timing)) {
    return null;
  }
  const name = toLocalizedField(value.name);
  if (!name) return null;

  const timing: EkadashiRecord["timing"] = {};
  for (const timezone of SUPPORTED_TIMEZONES) {
    const parsed = toTiming(value.timing[timezone]);
    if (parsed) timing[timezone] = parsed;
  }

  return {
    id: value.id,
    paksha: typeof value.paksha === "string" ? value.paksha : undefined,
    month: typeof value.month === "string" ? value.month : undefined,
    name,
    description: toLocalizedField(value.description),
    story: toLocalizedField(value.story),
    fasting_rules: toLocalizedField(value.fasting_rules),
    benefits: toLocalizedField(value.benefits),
    timing,
  };
}

function toCity(value: unknown): CityInfo | null {
  if (!isRecord(value)) return null;
  const { id, name, country, timezone } = value;
  if (
    typeof id !== "string" ||
    typeof name !== "string" ||
    typeof country !== "string" ||
    !timezoneService.isSupportedBucket(timezone)
  ) {
    return null;
  }
  return { id, name, country, timezone };
}

function localize(field: LocalizedField | undefined, languageCode: string, fallback = ""): string {
  return field?.[languageCode] ?? field?.[DEFAULT_LANGUAGE] ?? fallback;
}

/**
 * Immutable Ekadashi dataset and city catalogue. Load once with
 * initializeData(); views are memoised per timezone and language.
 */
export class EkadashiService {
  private records: EkadashiRecord[] = [];
  private cities: CityInfo[] = [];
  private isDataLoaded = false;
  private cache = new Map<string, EkadashiDate[]>();

  constructor(private readonly files: EkadashiDataFiles) {}

  get loaded(): boolean {
    return this.isDataLoaded;
  }

  async initializeData(): Promise<void> {
    if (this.isDataLoaded) return;

    try {
      const raw: unknown = JSON.parse(await readFile(this.files.ekadashiFile, "utf8"));
      const list = isRecord(raw) && Array.isArray(raw.ekadashis) ? raw.ekadashis : [];
      this.records = [];
      for (const entry of list) {
        const record = toEkadashiRecord(entry);
        if (record) {
          this.records.push(record);
        } else {
          logger.warn("Skipping malformed Ekadashi entry", { entry });
        }
      }
      logger.info(`Ekadashi data loaded: ${this.records.length} entries`);
    } catch (error) {
      logger.error("Critical error loading Ekadashi data, continuing with an empty calendar:", error);
      this.records = [];
    }

    try {
      const raw: unknown = JSON.parse(await readFile(this.files.citiesFile, "utf8"));
      const list = isRecord(raw) && Array.isArray(raw.cities) ? raw.cities : [];
      this.cities = list.flatMap((entry) => {
        const city = toCity(entry);
        return city ? [city] : [];
      });
    } catch (error) {
      logger.error("Error loading city catalogue:", error);
      this.cities = [];
    }

    this.cache.clear();
    this.isDataLoaded = true;
  }

  /** All Ekadashis that have timing for `timezone`, in `languageCode`, sorted by date */
  getEkadashis(timezone: TimezoneBucket, languageCode: string): EkadashiDate[] {
    if (!this.isDataLoaded) {
      logger.warn("Ekadashi data not loaded yet. Returning empty list.");
      return [];
    }

    const cacheKey = `${timezone}_${languageCode}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const ekadashis: EkadashiDate[] = [];
    for (const record of this.records) {
      const timing = record.timing[timezone];
      if (!timing) continue;

      ekadashis.push({
        id: record.id,
        name: localize(record.name, languageCode),
        date: timing.date,
        fastStartTime: timezoneService.formatTimeFromIso(timing.fasting_start),
        fastBreakTime: timezoneService.formatParanaWindow(timing.parana_start, timing.parana_end),
        description: localize(record.description, languageCode),
        story: localize(record.story, languageCode, "Story coming soon..."),
        fastingRules: localize(
          record.fasting_rules,
          languageCode,
          "Standard Ekadashi fasting rules apply."
        ),
        benefits: localize(record.benefits, languageCode, "Grants spiritual merit."),
        paksha: record.paksha ?? "",
        month: record.month ?? "",
        fastingStartIso: timing.fasting_start,
        paranaStartIso: timing.parana_start,
        paranaEndIso: timing.parana_end,
      });
    }

    ekadashis.sort((a, b) => a.date.localeCompare(b.date) || a.id - b.id);
    this.cache.set(cacheKey, ekadashis);
    return ekadashis;
  }

  /**
   * Ekadashis whose parana window has not closed yet. Entries with an
   * unreadable parana end are kept so the scheduler can report them.
   */
  getUpcomingEkadashis(timezone: TimezoneBucket, languageCode: string, now: Date): EkadashiDate[] {
    return this.getEkadashis(timezone, languageCode).filter((ekadashi) => {
      const paranaEnd = timezoneService.parseInstant(ekadashi.paranaEndIso);
      return paranaEnd === null || paranaEnd.getTime() > now.getTime();
    });
  }

  getEkadashiById(id: number, timezone: TimezoneBucket, languageCode: string): EkadashiDate | null {
    return this.getEkadashis(timezone, languageCode).find((e) => e.id === id) ?? null;
  }

  /**
   * Batch check of the dataset: start < parana start <= parana end, and
   * the listed date is the local date of the fasting start.
   */
  validateDataset(): DatasetIssue[] {
    const issues: DatasetIssue[] = [];
    for (const record of this.records) {
      for (const timezone of SUPPORTED_TIMEZONES) {
        const timing = record.timing[timezone];
        if (!timing) continue;
        const report = (problem: string) =>
          issues.push({ ekadashiId: record.id, timezone, problem });

        const start = timezoneService.parseInstant(timing.fasting_start);
        const paranaStart = timezoneService.parseInstant(timing.parana_start);
        const paranaEnd = timezoneService.parseInstant(timing.parana_end);
        if (!start || !paranaStart || !paranaEnd) {
          report("unparsable instant");
          continue;
        }
        if (start.getTime() >= paranaStart.getTime()) {
          report("fasting start is not before parana start");
        }
        if (paranaStart.getTime() > paranaEnd.getTime()) {
          report("parana start is after parana end");
        }
        if (timezoneService.localDateOfIso(timing.fasting_start) !== timing.date) {
          report("date does not match the local date of fasting start");
        }
      }
    }
    return issues;
  }

  getCities(): CityInfo[] {
    return this.cities;
  }

  getCitiesByCountry(): Record<string, CityInfo[]> {
    const result: Record<string, CityInfo[]> = {};
    for (const city of this.cities) {
      (result[city.country] ??= []).push(city);
    }
    return result;
  }

  getCityById(cityId: string): CityInfo | null {
    return this.cities.find((city) => city.id === cityId) ?? null;
  }
}
