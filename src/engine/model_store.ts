import path from "node:path";
import { createWriteStream } from "node:fs";
import { access, mkdir, rename, rm } from "node:fs/promises";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { FastifyBaseLogger } from "fastify";
import { fetch, type Dispatcher } from "undici";
import type { ServiceConfig } from "../config.js";
import { VAD_MODEL_URL, type ComputeType } from "../constants.js";
import { errorMessage } from "../errors.js";

export interface DownloadOptions {
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

export interface EngineModelPaths {
  modelPath: string;
  vadModelPath: string | null;
}

export function modelFileName(model: string, computeType: ComputeType): string {
  return computeType === "float16" ? `ggml-${model}.bin` : `ggml-${model}-${computeType}.bin`;
}

/**
 * Makes sure every file the engine needs is on disk, downloading the missing
 * ones. Used at model load time and by the download-model script.
 */
export async function ensureEngineModels(
  cfg: Pick<ServiceConfig, "modelsDir" | "modelBaseUrl" | "whisperModel" | "whisperComputeType" | "enableVadFilter">,
  log: FastifyBaseLogger,
  options: DownloadOptions = {}
): Promise<EngineModelPaths> {
  const filename = modelFileName(cfg.whisperModel, cfg.whisperComputeType);
  const modelPath = await ensureModelFile(
    `${cfg.modelBaseUrl}/${filename}`,
    path.join(cfg.modelsDir, filename),
    log,
    options
  );

  let vadModelPath: string | null = null;
  if (cfg.enableVadFilter) {
    vadModelPath = await ensureModelFile(
      VAD_MODEL_URL,
      path.join(cfg.modelsDir, path.basename(new URL(VAD_MODEL_URL).pathname)),
      log,
      options
    );
  }

  return { modelPath, vadModelPath };
}

export async function ensureModelFile(
  url: string,
  destPath: string,
  log: FastifyBaseLogger,
  options: DownloadOptions = {}
): Promise<string> {
  if (await fileExists(destPath)) {
    log.debug({ modelPath: destPath }, "Model file already present");
    return destPath;
  }

  await mkdir(path.dirname(destPath), { recursive: true });
  const partPath = `${destPath}.part`;

  log.info({ url, modelPath: destPath }, "Downloading model file");
  try {
    const res = await fetch(url, { dispatcher: options.dispatcher, signal: options.signal });
    if (!res.ok || !res.body) {
      throw new Error(`Download failed: HTTP ${res.status}`);
    }

    const totalBytes = Number(res.headers.get("content-length") || 0);
    await pipeline(Readable.fromWeb(res.body), progressReporter(totalBytes, destPath, log), createWriteStream(partPath));
    await rename(partPath, destPath);
  } catch (err) {
    await rm(partPath, { force: true });
    throw new Error(`Failed to download ${url}: ${errorMessage(err)}`, { cause: err });
  }

  log.info({ modelPath: destPath }, "Model file downloaded");
  return destPath;
}

function progressReporter(totalBytes: number, destPath: string, log: FastifyBaseLogger): Transform {
  let downloaded = 0;
  let lastReported = 0;
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      downloaded += chunk.length;
      if (totalBytes > 0) {
        const pct = Math.floor((downloaded / totalBytes) * 100);
        if (pct >= lastReported + 10) {
          lastReported = pct - (pct % 10);
          log.info({ modelPath: destPath, progress: `${lastReported}%` }, "Model download progress");
        }
      }
      callback(null, chunk);
    },
  });
}

function fileExists(p: string): Promise<boolean> {
  return access(p)
    .then(() => true)
    .catch(() => false);
}
