// =============================================================================
// @postwatch/server — Entry point
// =============================================================================
// Loads config, wires the worker, starts the self-ping, serves the control
// surface, and starts polling. Refuses to start on invalid configuration.
// Sets keepAliveTimeout and headersTimeout for hosted platforms.
// =============================================================================

import {
  type Config,
  ConfigurationError,
  createLogger,
  loadConfig,
} from "@postwatch/shared";
import { createWorker } from "@postwatch/worker";
import { createApp } from "./server.js";
import { startSelfPing } from "./self-ping.js";

let config: Config;
try {
  config = loadConfig();
} catch (err) {
  createLogger().fatal("Refusing to start: configuration is invalid", {
    issues: err instanceof ConfigurationError ? err.issues : undefined,
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
}

const logger = createLogger({ level: config.LOG_LEVEL });
const worker = createWorker(config, logger);
const selfPing = startSelfPing({ config, logger });
const { httpServer, shutdown } = createApp({ config, logger, worker, selfPing });

// Marker first, so neither the loop nor an early POST /start re-announces
// the last delivered item
await worker.restore();

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("postwatch server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    sourceUrl: config.SOURCE_URL,
    checkIntervalSeconds: config.CHECK_INTERVAL,
    recipients: config.EMAIL_RECEIVERS.length,
  });
});

worker.start();

function handleShutdown() {
  shutdown()
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error("Shutdown error", {
        error: err instanceof Error ? err.message : String(err),
      });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);

// Re-export types for consumers
export type { AppDependencies, AppInstance } from "./server.js";
export { createApp } from "./server.js";
