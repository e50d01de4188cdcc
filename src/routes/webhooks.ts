import { NextFunction, Request, Response, Router } from "express";
import { config } from "../config";
import logger from "../utils/logger";
import { CalendarSession } from "../services/calendarSession";
import { MessageLog } from "../services/messageLog";
import { DeviceLocationFeed } from "../services/positioning";
import { SettingsService } from "../services/settingsService";
import { TwilioService } from "../services/twilio";

export interface WebhookDependencies {
  feed: DeviceLocationFeed;
  settings: SettingsService;
  session: CalendarSession;
  twilioService: TwilioService;
  messageLog: MessageLog;
  /** Public base URL Twilio calls; signatures are only checked when set */
  publicBaseUrl?: string;
  notifyTo?: string;
}

export interface SharedLocation {
  phoneNumber: string;
  latitude: number;
  longitude: number;
}

function stringField(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

/** Strips the "whatsapp:" channel prefix Twilio puts on addresses */
export function normalizePhoneNumber(address: string): string {
  return address.replace(/^whatsapp:/, "").trim();
}

/** A WhatsApp location share carries Latitude/Longitude form fields */
export function parseSharedLocation(body: unknown): SharedLocation | null {
  const from = stringField(body, "From");
  const latitudeText = stringField(body, "Latitude");
  const longitudeText = stringField(body, "Longitude");
  if (!from || !latitudeText || !longitudeText) return null;

  const latitude = parseFloat(latitudeText);
  const longitude = parseFloat(longitudeText);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;

  return { phoneNumber: normalizePhoneNumber(from), latitude, longitude };
}

function formParams(body: unknown): Record<string, string> {
  const params: Record<string, string> = {};
  if (typeof body !== "object" || body === null) return params;
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === "string") params[key] = value;
  }
  return params;
}

export function createWebhookRouter(deps: WebhookDependencies): Router {
  const { feed, settings, session, twilioService, messageLog } = deps;
  const publicBaseUrl = deps.publicBaseUrl ?? config.webhooks.publicBaseUrl;
  const notifyTo = deps.notifyTo ?? config.twilio.notifyTo;
  const router = Router();

  router.use((req: Request, res: Response, next: NextFunction) => {
    if (!publicBaseUrl) {
      next();
      return;
    }
    const signature = req.header("X-Twilio-Signature") ?? "";
    const url = `${publicBaseUrl}${req.originalUrl}`;
    if (!twilioService.validateWebhookSignature(url, formParams(req.body), signature)) {
      logger.warn(`Rejected webhook with invalid signature: ${req.originalUrl}`);
      res.status(403).send("Forbidden");
      return;
    }
    next();
  });

  // Twilio webhook endpoint for incoming WhatsApp messages
  router.post("/whatsapp", async (req: Request, res: Response) => {
    // Respond to Twilio immediately to avoid timeout
    res.status(200).send("OK");

    const from = stringField(req.body, "From");
    if (!from) {
      logger.warn("Invalid webhook payload: missing From");
      return;
    }
    const phoneNumber = normalizePhoneNumber(from);
    if (phoneNumber !== notifyTo) {
      logger.warn(`Ignoring message from unknown number ${phoneNumber}`);
      return;
    }

    const shared = parseSharedLocation(req.body);
    if (!shared) {
      logger.info(`Message from ${phoneNumber} is not a location share, ignoring`);
      return;
    }

    try {
      feed.report({ latitude: shared.latitude, longitude: shared.longitude });
      // sharing a location is explicit consent
      await settings.setLocationPermission("granted");
      const state = await session.refresh();
      const place = state.location ? `${state.location.cityName} ` : "";
      await twilioService.sendMessage(
        phoneNumber,
        `Location received: ${place}(${state.timezone}). ${state.scheduled} reminders scheduled.`
      );
    } catch (error) {
      logger.error(`Error processing location share from ${phoneNumber}:`, error);
    }
  });

  // Twilio status callback endpoint for message delivery status
  router.post("/status", async (req: Request, res: Response) => {
    const messageSid = stringField(req.body, "MessageSid");
    const messageStatus = stringField(req.body, "MessageStatus");
    const errorCode = stringField(req.body, "ErrorCode");

    logger.info("Message status update:", { messageSid, messageStatus, errorCode });
    if (!messageSid || !messageStatus) {
      res.status(400).send("Missing MessageSid or MessageStatus");
      return;
    }

    await messageLog.updateMessageLogStatus(messageSid, messageStatus, errorCode);
    res.status(200).send("OK");
  });

  return router;
}
