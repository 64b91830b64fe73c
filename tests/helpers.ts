import os from "node:os";
import path from "node:path";
import { mkdtemp } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { pino } from "pino";
import type {
  EngineSegment,
  EngineTranscribeOptions,
  EngineTranscription,
  SpeechEngine,
} from "../src/engine/engine.js";

export const silentLogger = pino({ level: "silent" });

export function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "transcribe-test-"));
}

export async function* streamOf(...chunks: Array<Uint8Array | string>): AsyncGenerator<Uint8Array | string> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const DEFAULT_SEGMENTS: EngineSegment[] = [
  { id: 0, start: 0, end: 1.5, text: " Good morning. " },
  { id: 1, start: 1.5, end: 3, text: "How are you? " },
];

export interface FakeEngineOptions {
  segments?: EngineSegment[];
  language?: string | null;
  error?: Error;
  concurrentSafe?: boolean;
  delayMs?: number;
  onTranscribe?: (audioPath: string) => Promise<void> | void;
}

export class FakeEngine implements SpeechEngine {
  readonly concurrentSafe: boolean;
  readonly calls: Array<{ audioPath: string; opts: EngineTranscribeOptions }> = [];
  closed = 0;
  maxActive = 0;
  private active = 0;
  private readonly options: FakeEngineOptions;

  constructor(options: FakeEngineOptions = {}) {
    this.options = options;
    this.concurrentSafe = options.concurrentSafe ?? false;
  }

  async transcribe(audioPath: string, opts: EngineTranscribeOptions): Promise<EngineTranscription> {
    this.calls.push({ audioPath, opts });
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await this.options.onTranscribe?.(audioPath);
      if (this.options.delayMs) {
        await sleep(this.options.delayMs);
      }
      if (this.options.error) {
        throw this.options.error;
      }
    } finally {
      this.active -= 1;
    }

    return {
      segments: yieldSegments(this.options.segments ?? DEFAULT_SEGMENTS),
      info: { language: this.options.language === undefined ? "en" : this.options.language },
    };
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

async function* yieldSegments(segments: EngineSegment[]): AsyncGenerator<EngineSegment> {
  for (const segment of segments) {
    yield segment;
  }
}
