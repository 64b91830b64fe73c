export interface TranscriptionRequestParams {
  language?: string;
  temperature?: number; // 0..1
  beamSize?: number; // 1..10
  initialPrompt?: string;
  includeSegments: boolean;
}

// Parameters after defaults were applied; what the engine actually receives
export interface EffectiveTranscriptionParams {
  language: string;
  temperature: number;
  beamSize: number;
  initialPrompt?: string;
  includeSegments: boolean;
  vadFilter: boolean;
}

export interface TranscriptionDefaults {
  language: string;
  temperature: number;
  beamSize: number;
  vadFilter: boolean;
}

export interface TranscriptSegment {
  id: number;
  start: number; // seconds
  end: number; // seconds
  text: string;
}

export interface TranscriptionResult {
  readonly text: string;
  readonly language: string;
  readonly durationSeconds: number;
  readonly segments?: readonly TranscriptSegment[];
}

export interface TempArtifact {
  path: string;
  byteSize: number;
}

export type LoadState =
  | { status: "uninitialized" }
  | { status: "loading"; startedAt: number }
  | { status: "ready"; startedAt: number; readyAt: number }
  | { status: "failed"; startedAt: number; message: string };

export interface StatusSnapshot {
  state: LoadState["status"];
  engineLoaded: boolean;
  error?: string;
  loadDurationMs?: number;
}

// HTTP payloads

export interface TranscriptionResponse {
  text: string;
  language: string;
  duration_seconds: number;
  segments?: TranscriptSegment[];
}

export interface HealthCheckResponse {
  status: "healthy" | "degraded" | "unhealthy";
  state: LoadState["status"];
  model: string;
  device: string;
  version: string;
  error?: string;
  cleanup_warnings: number;
}

export interface ModelsResponse {
  models: string[];
  active: string;
}

export interface ErrorResponse {
  error: string;
  detail: string;
  request_id: string;
}
