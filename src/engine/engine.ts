export interface EngineSegment {
  id: number;
  start: number;
  end: number;
  text: string;
}

export interface EngineTranscribeOptions {
  language: string; // "auto" asks the engine to detect
  temperature: number;
  beamSize: number;
  initialPrompt?: string;
  vadFilter: boolean;
}

export interface EngineTranscription {
  // Produced lazily, read once, in order
  segments: AsyncIterable<EngineSegment>;
  info: {
    language?: string | null;
  };
}

/**
 * A loaded speech-recognition engine. Owned by ModelLifecycle and borrowed
 * for one transcription call at a time unless `concurrentSafe` is set.
 */
export interface SpeechEngine {
  readonly concurrentSafe: boolean;
  transcribe(audioPath: string, opts: EngineTranscribeOptions): Promise<EngineTranscription>;
  close(): Promise<void>;
}

// The signal aborts when the lifecycle shuts down before the engine is ready
export type EngineFactory<E extends SpeechEngine = SpeechEngine> = (signal: AbortSignal) => Promise<E>;
