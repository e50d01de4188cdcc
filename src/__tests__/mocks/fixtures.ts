import path from "path";
import { EkadashiDate } from "../../types";

export const DATA_FILES = {
  ekadashiFile: path.resolve(__dirname, "../../../data/ekadashi_data.json"),
  citiesFile: path.resolve(__dirname, "../../../data/cities.json"),
  translationsFile: path.resolve(__dirname, "../../../data/translations.json"),
};

export function makeEkadashi(overrides: Partial<EkadashiDate> = {}): EkadashiDate {
  return {
    id: 1,
    name: "Vijaya Ekadashi",
    date: "2026-02-12",
    fastStartTime: "06:45 AM",
    fastBreakTime: "07:10 AM - 10:30 AM",
    description: "",
    story: "Story coming soon...",
    fastingRules: "Standard Ekadashi fasting rules apply.",
    benefits: "Grants spiritual merit.",
    paksha: "Krishna",
    month: "Phalguna",
    fastingStartIso: "2026-02-12T06:45:00+05:30",
    paranaStartIso: "2026-02-13T07:10:00+05:30",
    paranaEndIso: "2026-02-13T10:30:00+05:30",
    ...overrides,
  };
}
