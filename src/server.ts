import "dotenv/config";
import { createApp, createServices } from "./app";
import { connectDatabase, disconnectDatabase } from "./database/connection";
import { createMongoStores } from "./database/persistence";
import type { BookingEvent } from "./scheduling/bookingOrchestrator";
import type { CatalogStore, SchedulingStore } from "./scheduling/ports";
import { loadConfig } from "./utils/config";
import type { AppConfig } from "./utils/config";
import { getLogger } from "./utils/logger";
import { createMemoryStores } from "./utils/store";

const config = loadConfig();
const logger = getLogger();

async function resolveStores(
  appConfig: AppConfig,
): Promise<{ catalog: CatalogStore; scheduling: SchedulingStore }> {
  if (!appConfig.databaseUrl) {
    logger.warn("DATABASE_URL/MONGODB_URI not set, using in-memory mode");
    return createMemoryStores();
  }
  try {
    await connectDatabase(appConfig.databaseUrl);
    logger.info("MongoDB connected");
    return createMongoStores(logger);
  } catch (error) {
    logger.error({ err: error }, "MongoDB initialization failed, using in-memory mode");
    return createMemoryStores();
  }
}

function auditBookingEvent(event: BookingEvent): void {
  logger.info({ audit: true, ...event }, "booking event");
}

async function bootstrap(): Promise<void> {
  const stores = await resolveStores(config);
  const services = createServices({ stores, config, logger, onEvent: auditBookingEvent });
  const app = createApp(services);

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, storage: stores.scheduling.kind }, "scheduling API listening");
  });

  let shuttingDown = false;
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  for (const signal of signals) {
    process.on(signal, () => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info({ signal }, "shutting down");
      server.close((closeError) => {
        disconnectDatabase()
          .then(() => {
            if (closeError) {
              throw closeError;
            }
            logger.info("server closed");
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, "error during shutdown");
            process.exitCode = 1;
          });
      });
    });
  }
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ err: error }, "failed to start");
  process.exitCode = 1;
});
