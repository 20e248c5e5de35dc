import {
  createMetrics,
  createRecognizerFromConfig,
  loadServiceConfig,
  logger,
  maxImageSizeBytes,
  readEnv,
  validateServiceConfig,
} from "@filament/core";
import { createApp } from "./app";
import { createHttpServer } from "./server";

// Multipart framing on top of the largest allowed image.
const MULTIPART_OVERHEAD_BYTES = 1024 * 1024;

async function main(): Promise<void> {
  const env = readEnv();
  const config = loadServiceConfig(env);
  validateServiceConfig(config, env);
  logger.level = config.logLevel;

  logger.info("Starting Filament Recognition Service...");
  logger.info({ provider: config.vision.provider, model: config.vision.model }, `Model: ${config.vision.model}`);

  const metrics = createMetrics();
  const recognizer = createRecognizerFromConfig(config, { metrics, env });
  logger.info({ provider: recognizer.provider }, "Recognizer initialized");

  const app = createApp({ config, recognizer, metrics, logger });
  const server = createHttpServer(app, {
    maxBodyBytes: maxImageSizeBytes(config) + MULTIPART_OVERHEAD_BYTES,
    logger,
  });

  server.listen(config.port, config.host, () => {
    logger.info({ host: config.host, port: config.port }, `Server: ${config.host}:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) logger.error({ err }, "Server close failed");
      process.exit(err ? 1 : 0);
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start service");
  process.exit(1);
});
