import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const config = loadRuntimeConfig();
const logger = createLogger(config.logLevel);
const app = buildApp(config, { logger });

let shuttingDown = false;
function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");
  app
    .close()
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    logger.info({ host: config.host, port: config.port }, "SmartPay webhook outbox listening");
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "Failed to start");
    process.exit(1);
  });
