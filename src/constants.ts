/**
 * Centralized model configuration
 * This is the single source of truth for model names and defaults
 */

export const SERVICE_VERSION = "1.0.0";

// Default model to use across the application
export const DEFAULT_WHISPER_MODEL = "small";

// Valid ggml model names published for whisper.cpp
export const VALID_WHISPER_MODELS = [
  // Multilingual models
  "tiny",
  "base",
  "small",
  "medium",
  "large-v1",
  "large-v2",
  "large-v3",
  "large-v3-turbo",

  // English-only models
  "tiny.en",
  "base.en",
  "small.en",
  "medium.en",
] as const;

export type WhisperModel = (typeof VALID_WHISPER_MODELS)[number];

// Helper function to validate model names
export function isValidModel(model: string): model is WhisperModel {
  return VALID_WHISPER_MODELS.some((m) => m === model);
}

// Quantization variants of the ggml files; float16 is the unsuffixed file
export const COMPUTE_TYPES = ["float16", "q8_0", "q5_1", "q5_0"] as const;
export type ComputeType = (typeof COMPUTE_TYPES)[number];

export const DEFAULT_MODEL_BASE_URL =
  "https://huggingface.co/ggerganov/whisper.cpp/resolve/main";
export const VAD_MODEL_URL =
  "https://huggingface.co/ggml-org/whisper-vad/resolve/main/ggml-silero-v5.1.2.bin";

export const DEFAULT_ALLOWED_FORMATS = "mp3,wav,m4a,ogg,flac,webm";

// Upload streaming
export const UPLOAD_CHUNK_BYTES = 8 * 1024;

// Sidecar polling while the model loads
export const HEALTH_POLL_INTERVAL_MS = 500;
export const HEALTH_PROBE_TIMEOUT_MS = 2_000;

// Hint sent with 503 while the model is still warming up
export const MODEL_RETRY_AFTER_SECONDS = 30;

// Upper bound for decoded PCM kept in memory (16 kHz mono s16le ≈ 1.8 MB/min)
export const MAX_DECODED_AUDIO_BYTES = 512 * 1024 * 1024;

// Node timers fire at once for delays above this
export const MAX_TIMER_MS = 2_147_483_647;
