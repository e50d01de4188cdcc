import express from "express";
import { config, validateConfig } from "./config";
import { createApiRouter } from "./routes/api";
import { createWebhookRouter } from "./routes/webhooks";
import { RefreshScheduler } from "./schedulers/refreshScheduler";
import { WorkRunner } from "./schedulers/workRunner";
import { CalendarSession } from "./services/calendarSession";
import { EkadashiService } from "./services/ekadashiService";
import { ReverseGeocoder } from "./services/geocoder";
import { MongoKeyValueStore } from "./services/keyValueStore";
import { LocationService } from "./services/locationService";
import { MessageLog } from "./services/messageLog";
import { closeMongo, connectMongo } from "./services/mongo";
import { NotificationScheduler } from "./services/notificationScheduler";
import {
  DeviceLocationFeed,
  IpGeolocationProvider,
  LocationProviderManager,
  StoredLocationPermissions,
} from "./services/positioning";
import { SettingsService } from "./services/settingsService";
import { TwilioService, createTwilioClient } from "./services/twilio";
import { MongoWorkQueue } from "./services/workQueue";
import logger from "./utils/logger";
import messageTemplateService from "./utils/messageTemplates";

async function main(): Promise<void> {
  validateConfig();
  await connectMongo();

  const store = new MongoKeyValueStore();
  const settings = new SettingsService(store);
  const ekadashiService = new EkadashiService(config.data);
  await ekadashiService.initializeData();
  await messageTemplateService.loadTranslations(config.data.translationsFile);

  const datasetIssues = ekadashiService.validateDataset();
  for (const issue of datasetIssues) {
    logger.warn(`Dataset issue: Ekadashi ${issue.ekadashiId} (${issue.timezone}): ${issue.problem}`);
  }

  const feed = new DeviceLocationFeed();
  const providers = new LocationProviderManager(
    feed,
    new IpGeolocationProvider(config.location.ipGeolocationUrl),
    config.location.legacyProviders
  );
  const locationService = new LocationService({
    client: feed,
    legacy: providers,
    permissions: new StoredLocationPermissions(settings, providers),
    geocoder: new ReverseGeocoder(),
    store,
  });

  const workQueue = new MongoWorkQueue();
  await workQueue.ensureIndexes();
  const messageLog = new MessageLog();
  const twilioService = new TwilioService(
    createTwilioClient(config.twilio.accountSid, config.twilio.authToken),
    messageLog
  );
  const scheduler = new NotificationScheduler(workQueue, settings);
  const workRunner = new WorkRunner(workQueue, twilioService);

  const session = new CalendarSession({
    settings,
    ekadashiService,
    locationService,
    scheduler,
    overallTimeoutMs: config.location.overallTimeoutMs,
  });
  const refreshScheduler = new RefreshScheduler(session);

  const app = express();
  app.use(express.urlencoded({ extended: true }));
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      ekadashisLoaded: ekadashiService.loaded,
    });
  });

  app.use(
    "/api",
    createApiRouter({
      settings,
      ekadashiService,
      locationService,
      scheduler,
      session,
      feed,
      workRunner,
      messageLog,
    })
  );
  app.use("/webhook", createWebhookRouter({ feed, settings, session, twilioService, messageLog }));

  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  workRunner.start();
  refreshScheduler.start();
  await session.refresh();
  logger.info("Ekadashi reminders are ready!");

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    workRunner.stop();
    refreshScheduler.stop();
    server.close(() => {
      closeMongo()
        .catch((error) => logger.error("Error closing MongoDB:", error))
        .finally(() => process.exit(0));
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error) => {
  logger.error("Fatal error during startup:", error);
  process.exit(1);
});
