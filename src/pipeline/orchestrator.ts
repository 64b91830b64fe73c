import type { FastifyBaseLogger } from "fastify";
import type { SpeechEngine } from "../engine/engine.js";
import type {
  TempArtifact,
  TranscriptionDefaults,
  TranscriptionRequestParams,
  TranscriptionResult,
} from "../types.js";
import { checkAudioFormat, discardArtifact, ingestUpload } from "./ingest.js";
import { resolveTranscriptionParams, type TranscriptionInvoker } from "./transcribe.js";

export interface EngineProvider {
  waitUntilReady(timeoutMs: number): Promise<SpeechEngine>;
}

export interface OrchestratorOptions {
  tempDir: string;
  maxBytes: number;
  allowedFormats: readonly string[];
  defaults: TranscriptionDefaults;
  readyTimeoutMs: number;
}

export class RequestOrchestrator {
  private readonly models: EngineProvider;
  private readonly invoker: TranscriptionInvoker;
  private readonly opts: OrchestratorOptions;
  private cleanupFailures = 0;

  constructor(models: EngineProvider, invoker: TranscriptionInvoker, opts: OrchestratorOptions) {
    this.models = models;
    this.invoker = invoker;
    this.opts = opts;
  }

  get cleanupWarnings(): number {
    return this.cleanupFailures;
  }

  /**
   * Validate -> ingest -> resolve params -> wait for model -> transcribe.
   * The temp file is gone before this settles, whichever way it settles.
   */
  async handle(
    source: AsyncIterable<Uint8Array | string>,
    filename: string | undefined,
    params: TranscriptionRequestParams,
    log: FastifyBaseLogger
  ): Promise<TranscriptionResult> {
    checkAudioFormat(filename, this.opts.allowedFormats);

    let artifact: TempArtifact | null = null;
    try {
      artifact = await ingestUpload(source, filename, {
        tempDir: this.opts.tempDir,
        maxBytes: this.opts.maxBytes,
        allowedFormats: this.opts.allowedFormats,
        log,
      });
      log.info({ tempPath: artifact.path, fileSizeBytes: artifact.byteSize }, "File saved to temp");

      const effective = resolveTranscriptionParams(params, this.opts.defaults);
      const engine = await this.models.waitUntilReady(this.opts.readyTimeoutMs);
      const output = await this.invoker.run(engine, artifact.path, effective, log);

      return {
        text: output.text,
        language: output.language,
        durationSeconds: output.durationSeconds,
        segments: output.segments,
      };
    } finally {
      if (artifact) {
        const warning = await discardArtifact(artifact, log);
        if (warning) this.cleanupFailures += 1;
      }
    }
  }
}
