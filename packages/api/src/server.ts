import { pathToFileURL } from "url";
import type { Server } from "http";
import { loadConfig } from "../../../src/config";
import type { AppConfig } from "../../../src/config";
import { createReviewScraper } from "../../../src/scraper";
import { logger } from "../../../src/logger";
import { createApp } from "./index";

export function startServer(config: AppConfig = loadConfig()): Server {
  const scraper = createReviewScraper(config);
  const app = createApp(scraper);

  const server = app.listen(config.port, config.host, () =>
    logger.info(`Review API running on ${config.host}:${config.port}`),
  );

  const shutdown = async () => {
    logger.info("Shutting down...");
    await scraper.dispose();
    server.close(() => process.exit(0));
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  return server;
}

const isMain = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  startServer();
}
