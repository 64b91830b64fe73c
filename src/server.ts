import "dotenv/config";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { SERVICE_VERSION } from "./constants.js";
import { ModelLifecycle } from "./engine/lifecycle.js";
import { startWhisperServer } from "./engine/whisper_server.js";
import { createLogger } from "./logger.js";

const cfg = loadConfig();
const logger = createLogger(cfg.logLevel);
const lifecycle = new ModelLifecycle((signal) => startWhisperServer(cfg, logger, signal), logger);

const start = async () => {
  const app = await buildApp({ config: cfg, logger, lifecycle });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "Error during shutdown");
          process.exit(1);
        }
      );
    });
  }

  // Requests arriving before the model is ready wait on it instead of failing
  lifecycle.startLoadingAsync();

  await app.listen({ port: cfg.port, host: cfg.host });
  logger.info(
    { version: SERVICE_VERSION, model: cfg.whisperModel, device: cfg.whisperDevice },
    "Transcription service started"
  );
};

start().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start server");
  process.exit(1);
});
