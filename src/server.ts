import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { startServer } from "./http/server.js";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const { server, port } = await startServer({
  port: config.port,
  logger,
  language: config.language,
  maxDocuments: config.maxDocuments,
});

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  server.close((err) => {
    if (err) logger.error({ err }, "close failed");
    process.exit(err ? 1 : 0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

logger.info({ port }, "listening");
