import config from "./config";
import { createApp } from "./app";
import { logger } from "./utils/logger";

const app = createApp();

const server = app.listen(config.port, config.host, () => {
  logger.info(`Receipt points service listening on http://${config.host}:${config.port}`);
});

function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down`);
  server.close((err) => {
    if (err) {
      logger.error("Error while closing server", err);
      process.exitCode = 1;
    }
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
