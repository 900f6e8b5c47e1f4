import dotenv from "dotenv";
import { Server } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { errorMessage } from "./errors";
import { ActiveDatabase } from "./services/active-database";
import { DatabaseDownloader } from "./services/database-downloader";
import { DatabaseValidator } from "./services/database-validator";
import { GeoLookupService } from "./services/geo-lookup-service";
import { RetentionStore } from "./services/retention-store";
import { UpdateScheduler } from "./services/update-scheduler";
import { logger, isLogLevel } from "./utils/logger";

// Load environment variables from .env
dotenv.config();

async function main() {
  const config = loadConfig();
  if (isLogLevel(config.logging.level)) {
    logger.setLevel(config.logging.level);
  }

  const slot = new ActiveDatabase();
  const scheduler = new UpdateScheduler(
    {
      slot,
      store: new RetentionStore({
        dataDir: config.database.dataDir,
        maxGenerations: config.database.maxGenerations,
      }),
      validator: new DatabaseValidator({
        minSizeBytes: config.database.minSizeBytes,
        minSizeRatio: config.database.minSizeRatio,
      }),
      downloader: new DatabaseDownloader({
        url: config.database.url,
        timeoutMs: config.database.downloadTimeoutMs,
      }),
    },
    {
      updateIntervalMs: config.database.updateIntervalMs,
      ...config.startup,
    }
  );

  logger.info("Starting GeoIP API", {
    bind: `${config.server.host}:${config.server.port}`,
    dataDir: config.database.dataDir,
  });

  // Never listen without a database
  await scheduler.start();

  const app = createApp(new GeoLookupService(slot), config.access);
  const server: Server = app.listen(config.server.port, config.server.host, () => {
    const base = `http://${config.server.host}:${config.server.port}`;
    logger.info(`Server is running on ${base}`);
    logger.info(`API endpoints: GET ${base}/{ip_address}, GET ${base}/health`);
  });

  let shuttingDown = false;

  // Clean shutdown function
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down gracefully...");

    try {
      await scheduler.stop();
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      await slot.clear();
    } catch (err) {
      logger.error("Error during shutdown", { error: errorMessage(err) });
      process.exitCode = 1;
    }

    process.exit();
  };

  // Listen for termination signals to close connections
  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err) => {
  logger.error("Failed to start GeoIP API", { error: errorMessage(err) });
  process.exit(1);
});
