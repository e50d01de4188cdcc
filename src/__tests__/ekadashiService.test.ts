import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { EkadashiService } from "../services/ekadashiService";
import { DATA_FILES } from "./mocks/fixtures";

describe("EkadashiService", () => {
  describe("with the shipped dataset", () => {
    const service = new EkadashiService(DATA_FILES);

    beforeAll(async () => {
      await service.initializeData();
    });

    it("should load every event sorted by date", () => {
      const ekadashis = service.getEkadashis("IST", "en");
      expect(service.loaded).toBe(true);
      expect(ekadashis.map((e) => e.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it("should flatten timing and texts for the bucket", () => {
      const vijaya = service.getEkadashiById(1, "IST", "en");
      expect(vijaya).toMatchObject({
        name: "Vijaya Ekadashi",
        date: "2026-02-12",
        fastStartTime: "06:45 AM",
        fastBreakTime: "07:10 AM - 10:30 AM",
        paksha: "Krishna",
        month: "Phalguna",
        fastingStartIso: "2026-02-12T06:45:00+05:30",
      });

      const central = service.getEkadashiById(1, "CST", "en");
      expect(central?.date).toBe("2026-02-11");
      expect(central?.fastStartTime).toBe("07:05 AM");
      expect(central?.fastBreakTime).toBe("07:30 AM - 11:15 AM");
    });

    it("should fall back to English for missing translations", () => {
      const tamil = service.getEkadashiById(1, "IST", "ta");
      expect(tamil?.name).toBe("விஜயா ஏகாதசி");
      expect(tamil?.description).toBe("Vijaya Ekadashi falls in the Krishna paksha of Phalguna.");
      expect(tamil?.story).toBe("The story of Vijaya Ekadashi is recited on the day of the fast.");
    });

    it("should memoise views per bucket and language", () => {
      expect(service.getEkadashis("EST", "en")).toBe(service.getEkadashis("EST", "en"));
      expect(service.getEkadashis("EST", "en")).not.toBe(service.getEkadashis("EST", "hi"));
    });

    it("should keep only events whose parana has not ended", () => {
      const upcoming = service.getUpcomingEkadashis("IST", "en", new Date("2026-11-01T00:00:00Z"));
      expect(upcoming.map((e) => e.id)).toEqual([5, 6, 7, 8, 9]);
    });

    it("should drop an event at the exact end of its parana window", () => {
      const atEnd = new Date("2026-03-30T10:30:00+05:30");
      const upcoming = service.getUpcomingEkadashis("IST", "en", atEnd);
      expect(upcoming[0].id).toBe(5);

      const justBefore = new Date(atEnd.getTime() - 1);
      expect(service.getUpcomingEkadashis("IST", "en", justBefore)[0].id).toBe(4);
    });

    it("should satisfy the timing invariants in every bucket", () => {
      expect(service.validateDataset()).toEqual([]);
    });

    it("should serve the city catalogue", () => {
      const byCountry = service.getCitiesByCountry();
      expect(service.getCities()).toHaveLength(31);
      expect(byCountry["India"]).toHaveLength(10);
      expect(byCountry["United States"]).toHaveLength(21);
      expect(service.getCityById("chicago")?.timezone).toBe("CST");
      expect(service.getCityById("denver")?.timezone).toBe("MST");
    });

    it("should return null for an unknown city", () => {
      expect(service.getCityById("atlantis")).toBeNull();
    });
  });

  describe("with custom data files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "ekadashi-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    async function load(ekadashis: unknown[]): Promise<EkadashiService> {
      const ekadashiFile = path.join(dir, "ekadashi.json");
      await writeFile(ekadashiFile, JSON.stringify({ ekadashis }));
      const service = new EkadashiService({ ekadashiFile, citiesFile: DATA_FILES.citiesFile });
      await service.initializeData();
      return service;
    }

    const timing = {
      date: "2026-05-01",
      fasting_start: "2026-05-01T06:00:00+05:30",
      parana_start: "2026-05-02T06:30:00+05:30",
      parana_end: "2026-05-02T10:00:00+05:30",
    };

    it("should skip malformed entries and keep the rest", async () => {
      const service = await load([
        { id: 1, name: { en: "Good" }, timing: { IST: timing } },
        { id: "two", name: { en: "Bad id" }, timing: { IST: timing } },
        { id: 3, timing: { IST: timing } },
      ]);
      expect(service.getEkadashis("IST", "en").map((e) => e.name)).toEqual(["Good"]);
    });

    it("should apply default texts when an event has none", async () => {
      const service = await load([{ id: 1, name: { en: "Plain" }, timing: { IST: timing } }]);
      const [plain] = service.getEkadashis("IST", "en");
      expect(plain.story).toBe("Story coming soon...");
      expect(plain.fastingRules).toBe("Standard Ekadashi fasting rules apply.");
      expect(plain.benefits).toBe("Grants spiritual merit.");
      expect(plain.description).toBe("");
    });

    it("should leave out events without timing for the bucket", async () => {
      const service = await load([{ id: 1, name: { en: "India only" }, timing: { IST: timing } }]);
      expect(service.getEkadashis("PST", "en")).toEqual([]);
    });

    it("should report records that break the timing invariants", async () => {
      const service = await load([
        {
          id: 7,
          name: { en: "Broken" },
          timing: {
            IST: { ...timing, date: "2026-04-30" },
            EST: {
              date: "2026-05-01",
              fasting_start: "2026-05-01T07:00:00-04:00",
              parana_start: "2026-05-01T06:00:00-04:00",
              parana_end: "2026-05-01T05:00:00-04:00",
            },
          },
        },
      ]);
      expect(service.validateDataset()).toEqual([
        { ekadashiId: 7, timezone: "IST", problem: "date does not match the local date of fasting start" },
        { ekadashiId: 7, timezone: "EST", problem: "fasting start is not before parana start" },
        { ekadashiId: 7, timezone: "EST", problem: "parana start is after parana end" },
      ]);
    });

    it("should keep events with an unreadable parana end in the upcoming view", async () => {
      const service = await load([
        { id: 1, name: { en: "Odd" }, timing: { IST: { ...timing, parana_end: "soon" } } },
      ]);
      expect(service.getUpcomingEkadashis("IST", "en", new Date("2027-01-01T00:00:00Z"))).toHaveLength(1);
    });

    it("should come up empty when the dataset file is missing", async () => {
      const service = new EkadashiService({
        ekadashiFile: path.join(dir, "missing.json"),
        citiesFile: path.join(dir, "missing-cities.json"),
      });
      await service.initializeData();
      expect(service.loaded).toBe(true);
      expect(service.getEkadashis("IST", "en")).toEqual([]);
      expect(service.getCities()).toEqual([]);
    });

    it("should return nothing before the data is loaded", () => {
      const service = new EkadashiService(DATA_FILES);
      expect(service.getEkadashis("IST", "en")).toEqual([]);
    });
  });
});
