import { performance } from "node:perf_hooks";
import type { FastifyBaseLogger } from "fastify";
import type { SpeechEngine } from "../engine/engine.js";
import type {
  EffectiveTranscriptionParams,
  TranscriptionDefaults,
  TranscriptionRequestParams,
  TranscriptSegment,
} from "../types.js";
import { InferenceError, errorMessage } from "../errors.js";

export interface InvocationOutput {
  text: string;
  language: string;
  durationSeconds: number;
  segments?: TranscriptSegment[];
}

export function resolveTranscriptionParams(
  params: TranscriptionRequestParams,
  defaults: TranscriptionDefaults
): EffectiveTranscriptionParams {
  return {
    language: params.language || defaults.language,
    temperature: params.temperature ?? defaults.temperature,
    beamSize: params.beamSize ?? defaults.beamSize,
    initialPrompt: params.initialPrompt || undefined,
    includeSegments: params.includeSegments,
    vadFilter: defaults.vadFilter,
  };
}

/**
 * Runs the engine on one file and folds its segment stream into a transcript.
 * Calls are serialized unless the engine says it can take concurrent work.
 */
export class TranscriptionInvoker {
  private readonly log: FastifyBaseLogger;
  private chain: Promise<void> = Promise.resolve();

  constructor(log: FastifyBaseLogger) {
    this.log = log;
  }

  run(
    engine: SpeechEngine,
    audioPath: string,
    params: EffectiveTranscriptionParams,
    log: FastifyBaseLogger = this.log
  ): Promise<InvocationOutput> {
    const task = () => this.invoke(engine, audioPath, params, log);
    if (engine.concurrentSafe) return task();

    const run = this.chain.then(task);
    // The next caller waits for this run to settle, not to succeed
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async invoke(
    engine: SpeechEngine,
    audioPath: string,
    params: EffectiveTranscriptionParams,
    log: FastifyBaseLogger
  ): Promise<InvocationOutput> {
    const startTime = performance.now();

    log.info(
      {
        audioPath,
        language: params.language,
        temperature: params.temperature,
        beamSize: params.beamSize,
        vadFilter: params.vadFilter,
      },
      "Starting transcription"
    );

    try {
      const { segments, info } = await engine.transcribe(audioPath, {
        language: params.language,
        temperature: params.temperature,
        beamSize: params.beamSize,
        initialPrompt: params.initialPrompt,
        vadFilter: params.vadFilter,
      });

      const textParts: string[] = [];
      const collected: TranscriptSegment[] = [];

      for await (const segment of segments) {
        const text = segment.text.trim();
        textParts.push(text);
        if (params.includeSegments) {
          collected.push({ id: segment.id, start: segment.start, end: segment.end, text });
        }
      }

      const text = textParts.join(" ");
      const language = info.language || params.language;
      const durationSeconds = (performance.now() - startTime) / 1000;

      log.info(
        {
          durationSeconds,
          detectedLanguage: language,
          textLength: text.length,
          segmentsCount: params.includeSegments ? collected.length : undefined,
        },
        "Transcription completed"
      );

      return {
        text,
        language,
        durationSeconds,
        segments: params.includeSegments ? collected : undefined,
      };
    } catch (err) {
      log.error({ err, audioPath }, "Transcription failed");
      throw new InferenceError(errorMessage(err), { cause: err });
    }
  }
}
