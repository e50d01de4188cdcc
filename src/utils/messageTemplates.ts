import { readFile } from "fs/promises";
import { DEFAULT_LANGUAGE, LocalizedTexts, ReminderType } from "../types";
import logger from "./logger";
import timezoneService from "./timezone";

/** English text used when the dictionary has no entry for a key */
export const DEFAULT_TEXTS: LocalizedTexts = {
  notif_test_title: "Hari Om!",
  notif_test_body: "Your notifications are working perfectly!",
  notif_2day_title: "Upcoming Ekadashi",
  notif_2day_body: "is in 2 days. Prepare for your fast.",
  notif_1day_title: "Ekadashi Tomorrow!",
  notif_1day_body: "is tomorrow. Fasting starts at",
  notif_start_title: "Ekadashi Starts Now",
  notif_start_body: "Today is",
  notif_start_suffix: "Fasting begins now.",
  notif_parana_title: "Parana Time",
  notif_parana_body: "- You can break your fast now.",
};

const REMINDER_LAYOUTS: Record<ReminderType, { titleKey: string; body: string; keys: string[] }> = {
  "2day": {
    titleKey: "notif_2day_title",
    body: "{name} {notif_2day_body}",
    keys: ["notif_2day_body"],
  },
  "1day": {
    titleKey: "notif_1day_title",
    body: "{name} {notif_1day_body} {time}",
    keys: ["notif_1day_body"],
  },
  start: {
    titleKey: "notif_start_title",
    body: "{notif_start_body} {name}. {notif_start_suffix}",
    keys: ["notif_start_body", "notif_start_suffix"],
  },
  parana: {
    titleKey: "notif_parana_title",
    body: "{name} {notif_parana_body}",
    keys: ["notif_parana_body"],
  },
};

export interface ReminderText {
  title: string;
  body: string;
}

export class MessageTemplateService {
  private dictionary: Record<string, LocalizedTexts> = {};

  async loadTranslations(file: string): Promise<void> {
    try {
      const raw: unknown = JSON.parse(await readFile(file, "utf8"));
      const dictionary: Record<string, LocalizedTexts> = {};
      if (typeof raw === "object" && raw !== null) {
        for (const [language, entries] of Object.entries(raw)) {
          if (typeof entries !== "object" || entries === null) continue;
          const texts: LocalizedTexts = {};
          for (const [key, value] of Object.entries(entries)) {
            if (typeof value === "string") texts[key] = value;
          }
          dictionary[language] = texts;
        }
      }
      this.dictionary = dictionary;
      logger.info(`Translations loaded: ${Object.keys(dictionary).join(", ")}`);
    } catch (error) {
      logger.error("Error loading translations, using built-in English texts:", error);
      this.dictionary = {};
    }
  }

  getSupportedLanguages(): string[] {
    return Object.keys(this.dictionary);
  }

  /** Texts for `languageCode`, with English filling any gaps */
  getLocalizedTexts(languageCode: string): LocalizedTexts {
    return {
      ...(this.dictionary[DEFAULT_LANGUAGE] ?? {}),
      ...(this.dictionary[languageCode] ?? {}),
    };
  }

  translate(key: string, languageCode: string): string {
    return this.getLocalizedTexts(languageCode)[key] ?? DEFAULT_TEXTS[key] ?? key;
  }

  /** Replaces `{key}` placeholders; values are inserted literally */
  formatTemplate(template: string, data: Record<string, string>): string {
    let message = template;
    for (const [key, value] of Object.entries(data)) {
      message = message.replace(new RegExp(`\\{${key}\\}`, "g"), () => value);
    }
    return message;
  }

  /**
   * Title and body of one reminder. The event name is placed around the
   * dictionary fragments; a missing key falls back to DEFAULT_TEXTS.
   */
  buildReminderText(
    type: ReminderType,
    ekadashiName: string,
    fastingStartIso: string,
    texts: LocalizedTexts
  ): ReminderText {
    const layout = REMINDER_LAYOUTS[type];
    const data: Record<string, string> = {
      name: ekadashiName,
      time: timezoneService.formatTimeFromIso(fastingStartIso),
    };
    for (const key of layout.keys) {
      data[key] = texts[key] ?? DEFAULT_TEXTS[key] ?? "";
    }

    return {
      title: texts[layout.titleKey] ?? DEFAULT_TEXTS[layout.titleKey] ?? "",
      body: this.formatTemplate(layout.body, data),
    };
  }
}

export default new MessageTemplateService();
