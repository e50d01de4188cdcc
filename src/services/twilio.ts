import twilio from "twilio";
import { config } from "../config";
import logger from "../utils/logger";
import { NotificationPayload } from "../types";
import { MessageLogWriter } from "./messageLog";

export interface OutboundMessage {
  from: string;
  to: string;
  body: string;
  statusCallback?: string;
}

/** The part of the Twilio REST client this service uses */
export interface MessageClient {
  messages: {
    create(params: OutboundMessage): Promise<{ sid: string; status: string }>;
  };
}

/** Shows a notification to the user */
export interface NotificationPresenter {
  present(payload: NotificationPayload): Promise<string>;
}

export interface TwilioOptions {
  authToken: string;
  whatsappFrom: string;
  notifyTo: string;
  statusCallbackUrl?: string;
}

export function createTwilioClient(accountSid: string, authToken: string): MessageClient {
  return twilio(accountSid, authToken);
}

/** Formats a notification as a WhatsApp message: bold title, then the body */
export function formatNotificationMessage(payload: Pick<NotificationPayload, "title" | "body">): string {
  return `*${payload.title}*\n${payload.body}`;
}

export class TwilioService implements NotificationPresenter {
  constructor(
    private readonly client: MessageClient,
    private readonly messageLog: MessageLogWriter,
    private readonly options: TwilioOptions = config.twilio
  ) {}

  /**
   * Sends the notification to the configured WhatsApp number and logs the
   * delivery. Throws when Twilio rejects the message so the worker can retry.
   */
  async present(payload: NotificationPayload): Promise<string> {
    const sid = await this.sendMessage(this.options.notifyTo, formatNotificationMessage(payload));
    await this.messageLog.appendMessageLog({
      phone_number: this.options.notifyTo,
      twilio_sid: sid,
      notification_id: payload.notificationId,
      ekadashi_id: payload.ekadashiId,
      notification_type: payload.notificationType,
      title: payload.title,
      sent_at: new Date().toISOString(),
    });
    return sid;
  }

  /**
   * Sends a WhatsApp message using Twilio
   */
  async sendMessage(to: string, message: string): Promise<string> {
    try {
      const result = await this.client.messages.create({
        from: `whatsapp:${this.options.whatsappFrom}`,
        to: `whatsapp:${to}`,
        body: message,
        ...(this.options.statusCallbackUrl ? { statusCallback: this.options.statusCallbackUrl } : {}),
      });

      logger.info(`Message sent to ${to}: ${result.sid}`);
      return result.sid;
    } catch (error) {
      logger.error(`Error sending message to ${to}:`, error);
      throw error;
    }
  }

  /**
   * Validates webhook signature
   */
  validateWebhookSignature(
    url: string,
    params: Record<string, string>,
    signature: string
  ): boolean {
    try {
      return twilio.validateRequest(this.options.authToken, signature, url, params);
    } catch (error) {
      logger.error("Error validating webhook signature:", error);
      return false;
    }
  }
}
