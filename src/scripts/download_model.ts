import "dotenv/config";
import { loadConfig } from "../config.js";
import { ensureEngineModels } from "../engine/model_store.js";
import { createLogger } from "../logger.js";

// Pre-fetches the configured model so the first boot does not download it
async function main() {
  const cfg = loadConfig(process.env, { requireApiKeys: false });
  const logger = createLogger(cfg.logLevel);

  logger.info(
    { model: cfg.whisperModel, computeType: cfg.whisperComputeType, modelsDir: cfg.modelsDir },
    "Fetching model files"
  );
  const paths = await ensureEngineModels(cfg, logger);
  logger.info(paths, "Model files ready");
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
