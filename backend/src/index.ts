import { CACHE_DURATION_SECONDS, UPDATE_INTERVAL_SECONDS, config } from "./config";
import { createTransitCache } from "./cache/transitCache";
import { createFeedClient } from "./feed/client";
import { MtaFeedFetcher } from "./feed/fetcher";
import { createApp } from "./http/app";
import { RefreshLoop } from "./polling/refreshLoop";
import { logger } from "./utils/logger";

logger.info("Initializing cache with fallback data...");
const cache = createTransitCache({ trackedLines: config.trackedLines });
const client = createFeedClient();
const fetcher = new MtaFeedFetcher(client, config.trackedLines);
const loop = new RefreshLoop({ cache, fetcher });

const app = createApp({
  cache,
  refresher: loop,
  trackedLines: config.trackedLines,
  feedTelemetry: () => client.getTelemetry(),
  exposeErrors: config.exposeErrors,
});

loop.start();

const server = app.listen(config.port, () => {
  logger.info(`Transit relay listening on http://localhost:${config.port}`, {
    trackedLines: config.trackedLines,
    cacheDurationSeconds: CACHE_DURATION_SECONDS,
    updateIntervalSeconds: UPDATE_INTERVAL_SECONDS,
  });
});

const shutdown = () => {
  logger.info("Shutting down server...");
  loop.stop();
  server.close(() => {
    process.exit(0);
  });
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
