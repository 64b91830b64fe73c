import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import { z } from "zod";
import {
  COMPUTE_TYPES,
  DEFAULT_ALLOWED_FORMATS,
  DEFAULT_MODEL_BASE_URL,
  DEFAULT_WHISPER_MODEL,
  MAX_TIMER_MS,
  isValidModel,
} from "./constants.js";

const BoolEnv = z.preprocess((v) => {
  if (typeof v !== "string") return v;
  const normalized = v.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return v;
}, z.boolean());

const CsvEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) =>
      v
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    );

const UrlEnv = z
  .string()
  .url()
  .transform((v) => v.replace(/\/+$/, ""));

// Accept the compute type names used by CTranslate2 deployments too
const ComputeTypeEnv = z.preprocess((v) => {
  if (typeof v !== "string") return v;
  const normalized = v.trim().toLowerCase();
  if (normalized === "int8") return "q8_0";
  if (normalized === "float32") return "float16";
  return normalized;
}, z.enum(COMPUTE_TYPES));

const ConfigSchema = z
  .object({
    host: z.string().default("0.0.0.0"),
    port: z.coerce.number().int().min(1).max(65535).default(8080),
    logLevel: z.preprocess(
      (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
      z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
    ),

    apiKeys: CsvEnv(""),
    corsOrigins: CsvEnv("*"),

    whisperModel: z
      .string()
      .default(DEFAULT_WHISPER_MODEL)
      .refine(isValidModel, (v) => ({ message: `Unknown whisper model "${v}"` })),
    whisperDevice: z.enum(["auto", "cpu", "cuda"]).default("auto"),
    whisperComputeType: ComputeTypeEnv.default("q8_0"),
    whisperThreads: z.coerce.number().int().min(1).optional(),
    whisperServerBin: z.string().default("whisper-server"),
    whisperServerPort: z.coerce.number().int().min(1).max(65535).default(8178),
    modelsDir: z.string(),
    modelBaseUrl: UrlEnv.default(DEFAULT_MODEL_BASE_URL),
    enableVadFilter: BoolEnv.default(true),

    defaultLanguage: z.string().trim().min(1).default("auto"),
    defaultTemperature: z.coerce.number().min(0).max(1).default(0),
    defaultBeamSize: z.coerce.number().int().min(1).max(10).default(5),

    maxFileSizeMb: z.coerce.number().int().min(1).default(25),
    allowedAudioFormats: CsvEnv(DEFAULT_ALLOWED_FORMATS).transform((formats) =>
      formats.map((f) => f.replace(/^\.+/, "").toLowerCase())
    ),
    tempDir: z.string(),
    ffmpegCmd: z.string().default("ffmpeg"),

    modelLoadTimeoutMs: z.coerce.number().int().min(1_000).max(MAX_TIMER_MS).default(600_000),
    modelReadyTimeoutMs: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(300_000),
    inferenceTimeoutMs: z.coerce.number().int().min(60_000).max(MAX_TIMER_MS).default(7_200_000), // 2 hours
  })
  .transform((cfg) => ({
    ...cfg,
    maxFileSizeBytes: cfg.maxFileSizeMb * 1024 * 1024,
  }));

export type ServiceConfig = Readonly<z.infer<typeof ConfigSchema>>;

export interface LoadConfigOptions {
  // The model download script has no HTTP surface and runs without keys
  requireApiKeys?: boolean;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): ServiceConfig {
  const result = ConfigSchema.safeParse({
    host: env.HOST,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,

    apiKeys: env.API_KEYS,
    corsOrigins: env.CORS_ORIGINS,

    whisperModel: env.WHISPER_MODEL,
    whisperDevice: env.WHISPER_DEVICE,
    whisperComputeType: env.WHISPER_COMPUTE_TYPE,
    whisperThreads: env.WHISPER_THREADS,
    whisperServerBin: env.WHISPER_SERVER_BIN,
    whisperServerPort: env.WHISPER_SERVER_PORT,
    modelsDir: env.WHISPER_MODELS_DIR || path.join(rootDir, "models"),
    modelBaseUrl: env.MODEL_BASE_URL,
    enableVadFilter: env.ENABLE_VAD_FILTER,

    defaultLanguage: env.DEFAULT_LANGUAGE,
    defaultTemperature: env.DEFAULT_TEMPERATURE,
    defaultBeamSize: env.DEFAULT_BEAM_SIZE,

    maxFileSizeMb: env.MAX_FILE_SIZE_MB,
    allowedAudioFormats: env.ALLOWED_AUDIO_FORMATS,
    tempDir: env.TEMP_DIR || os.tmpdir(),
    ffmpegCmd: env.FFMPEG_CMD,

    modelLoadTimeoutMs: env.MODEL_LOAD_TIMEOUT_MS,
    modelReadyTimeoutMs: env.MODEL_READY_TIMEOUT_MS,
    inferenceTimeoutMs: env.INFERENCE_TIMEOUT_MS,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const parsed = result.data;

  if ((options.requireApiKeys ?? true) && parsed.apiKeys.length === 0) {
    throw new Error("No API keys configured. Set API_KEYS to a comma-separated list of keys.");
  }

  if (parsed.allowedAudioFormats.length === 0) {
    throw new Error("ALLOWED_AUDIO_FORMATS must list at least one format.");
  }

  // Only create directories that are actually needed (uploaded audio)
  ensureDir(parsed.tempDir);

  return parsed;
}
