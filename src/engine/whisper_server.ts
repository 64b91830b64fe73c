import path from "node:path";
import readline from "node:readline";
import { spawn, type ChildProcess } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";
import type { FastifyBaseLogger } from "fastify";
import { fetch, FormData, File, type Dispatcher } from "undici";
import { z } from "zod";
import type { ServiceConfig } from "../config.js";
import { HEALTH_POLL_INTERVAL_MS, HEALTH_PROBE_TIMEOUT_MS, MAX_DECODED_AUDIO_BYTES } from "../constants.js";
import { errorMessage } from "../errors.js";
import { runCommand } from "../utils/process.js";
import type { EngineSegment, EngineTranscribeOptions, EngineTranscription, SpeechEngine } from "./engine.js";
import { ensureEngineModels } from "./model_store.js";
import whisperLanguages from "../../data/whisper_languages.json" with { type: "json" };

// whisper-server's OpenAI-compatible verbose_json output
const VerboseJsonSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  segments: z
    .array(
      z.object({
        id: z.number().int().optional(),
        start: z.number(),
        end: z.number(),
        text: z.string(),
      })
    )
    .default([]),
});

type VerboseJson = z.infer<typeof VerboseJsonSchema>;

export type AudioDecoder = (audioPath: string) => Promise<Buffer>;

export interface WhisperServerEngineOptions {
  baseUrl: string;
  inferenceTimeoutMs: number;
  // Whether the server was started with a VAD model
  vadEnabled: boolean;
  decodeAudio: AudioDecoder;
  log: FastifyBaseLogger;
  child?: ChildProcess;
  dispatcher?: Dispatcher;
}

export class WhisperServerEngine implements SpeechEngine {
  // whisper-server answers one inference at a time; nothing documents more
  readonly concurrentSafe = false;
  private readonly opts: WhisperServerEngineOptions;

  constructor(opts: WhisperServerEngineOptions) {
    this.opts = opts;
  }

  async transcribe(audioPath: string, opts: EngineTranscribeOptions): Promise<EngineTranscription> {
    if (opts.vadFilter !== this.opts.vadEnabled) {
      this.opts.log.warn(
        { requested: opts.vadFilter, active: this.opts.vadEnabled },
        "VAD setting differs from the one the engine was started with"
      );
    }

    const wav = await this.opts.decodeAudio(audioPath);
    const form = new FormData();
    form.append("file", new File([wav], `${path.parse(audioPath).name}.wav`, { type: "audio/wav" }));
    form.append("response_format", "verbose_json");
    form.append("language", opts.language);
    form.append("temperature", String(opts.temperature));
    form.append("beam_size", String(opts.beamSize));
    if (opts.initialPrompt) {
      form.append("prompt", opts.initialPrompt);
    }

    const response = await fetch(`${this.opts.baseUrl}/inference`, {
      method: "POST",
      body: form,
      signal: AbortSignal.timeout(this.opts.inferenceTimeoutMs),
      dispatcher: this.opts.dispatcher,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`whisper-server inference failed: ${response.status} ${errorText}`);
    }

    const raw = VerboseJsonSchema.parse(await response.json());
    return {
      segments: iterateSegments(raw),
      info: { language: raw.language ? normalizeLanguage(raw.language) : null },
    };
  }

  async close(): Promise<void> {
    const child = this.opts.child;
    if (!child || child.exitCode !== null || child.signalCode !== null) return;
    const exited = new Promise<void>((resolve) => child.once("exit", () => resolve()));
    child.kill("SIGTERM");
    await exited;
  }
}

async function* iterateSegments(raw: VerboseJson): AsyncGenerator<EngineSegment> {
  let idx = 0;
  for (const s of raw.segments) {
    yield { id: s.id ?? idx, start: s.start, end: s.end, text: s.text };
    idx++;
  }
}

const languageCodes = new Map<string, string>(Object.entries(whisperLanguages));

/** Maps whisper's full language names ("italian") to their codes ("it"). */
export function normalizeLanguage(reported: string): string {
  const key = reported.trim().toLowerCase();
  return languageCodes.get(key) ?? key;
}

export function ffmpegDecoder(ffmpegCmd: string, timeoutMs: number): AudioDecoder {
  return async (audioPath) => {
    // 16 kHz mono PCM is what whisper consumes; keep it in memory, not on disk
    const { stdout } = await runCommand(
      ffmpegCmd,
      [
        "-nostdin",
        "-hide_banner",
        "-loglevel", "error",
        "-i", audioPath,
        "-ac", "1",
        "-ar", "16000",
        "-c:a", "pcm_s16le",
        "-f", "wav",
        "pipe:1",
      ],
      { timeoutMs, maxBufferBytes: MAX_DECODED_AUDIO_BYTES }
    );
    return stdout;
  };
}

/**
 * Engine factory used in production: fetches missing model files, starts
 * whisper-server on a loopback port and waits until it reports healthy.
 * Aborting `signal` stops the download or the wait and kills the child.
 */
export async function startWhisperServer(
  cfg: ServiceConfig,
  log: FastifyBaseLogger,
  signal?: AbortSignal
): Promise<WhisperServerEngine> {
  const { modelPath, vadModelPath } = await ensureEngineModels(cfg, log, { signal });
  signal?.throwIfAborted();

  const args = ["-m", modelPath, "--host", "127.0.0.1", "--port", String(cfg.whisperServerPort)];
  if (cfg.whisperDevice === "cpu") {
    args.push("--no-gpu");
  }
  if (cfg.whisperThreads) {
    args.push("-t", String(cfg.whisperThreads));
  }
  if (vadModelPath) {
    args.push("--vad", "--vad-model", vadModelPath);
  }

  log.info(
    {
      model: cfg.whisperModel,
      device: cfg.whisperDevice,
      computeType: cfg.whisperComputeType,
      bin: cfg.whisperServerBin,
    },
    "Starting whisper-server"
  );

  const child = spawn(cfg.whisperServerBin, args, { stdio: ["ignore", "pipe", "pipe"] });
  child.on("error", (err) => log.error({ err }, "whisper-server process error"));
  child.on("exit", (code, exitSignal) => log.warn({ code, signal: exitSignal }, "whisper-server exited"));
  for (const stream of [child.stdout, child.stderr]) {
    if (!stream) continue;
    readline.createInterface({ input: stream }).on("line", (line) => {
      log.debug({ source: "whisper-server" }, line);
    });
  }

  const baseUrl = `http://127.0.0.1:${cfg.whisperServerPort}`;
  try {
    await waitForHealth(baseUrl, child, cfg.modelLoadTimeoutMs, signal);
  } catch (err) {
    child.kill("SIGKILL");
    throw err;
  }

  return new WhisperServerEngine({
    baseUrl,
    inferenceTimeoutMs: cfg.inferenceTimeoutMs,
    vadEnabled: vadModelPath !== null,
    decodeAudio: ffmpegDecoder(cfg.ffmpegCmd, cfg.inferenceTimeoutMs),
    log,
    child,
  });
}

async function waitForHealth(
  baseUrl: string,
  child: ChildProcess,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<void> {
  const exit: { reason: string | null } = { reason: null };
  child.once("error", (err) => {
    exit.reason = `could not be started: ${err.message}`;
  });
  child.once("exit", (code, exitSignal) => {
    exit.reason = `exited during startup (${exitSignal ?? `code ${code}`})`;
  });

  const deadline = Date.now() + timeoutMs;
  let lastProbeError = "no response";
  while (Date.now() < deadline) {
    signal?.throwIfAborted();
    if (exit.reason) {
      throw new Error(`whisper-server ${exit.reason}`);
    }
    try {
      const res = await fetch(`${baseUrl}/health`, { signal: AbortSignal.timeout(HEALTH_PROBE_TIMEOUT_MS) });
      await res.body?.cancel();
      if (res.ok) return;
      lastProbeError = `HTTP ${res.status}`;
    } catch (err) {
      // Not listening yet while the model is being read
      lastProbeError = errorMessage(err);
    }
    await sleep(HEALTH_POLL_INTERVAL_MS, undefined, { signal });
  }

  throw new Error(`whisper-server did not become healthy within ${timeoutMs} ms (last probe: ${lastProbeError})`);
}
