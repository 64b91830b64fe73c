import { randomUUID } from "node:crypto";
import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import { z } from "zod";
import type { ServiceConfig } from "./config.js";
import { SERVICE_VERSION, VALID_WHISPER_MODELS } from "./constants.js";
import type { ModelLifecycle } from "./engine/lifecycle.js";
import { requireApiKey } from "./auth/apiKey.js";
import {
  InvalidRequestError,
  ModelUnavailableError,
  ServiceError,
  UnauthorizedError,
} from "./errors.js";
import { RequestOrchestrator } from "./pipeline/orchestrator.js";
import { TranscriptionInvoker } from "./pipeline/transcribe.js";
import type {
  ErrorResponse,
  HealthCheckResponse,
  ModelsResponse,
  TranscriptionResponse,
} from "./types.js";

const blankToUndefined = (v: unknown) => (v === "" ? undefined : v);

const BoolParam = z.preprocess((v) => {
  if (typeof v !== "string") return v;
  const normalized = v.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return v;
}, z.boolean());

const TranscribeQuerySchema = z.object({
  language: z.preprocess(blankToUndefined, z.string().trim().min(1).optional()),
  temperature: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).optional()),
  beam_size: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(10).optional()),
  initial_prompt: z.preprocess(blankToUndefined, z.string().optional()),
  include_segments: BoolParam.default(false),
});

export interface AppOptions {
  config: ServiceConfig;
  logger: FastifyBaseLogger;
  lifecycle: ModelLifecycle;
}

function errorBody(error: string, detail: string, requestId: string): ErrorResponse {
  return { error, detail, request_id: requestId };
}

export async function buildApp({ config, logger, lifecycle }: AppOptions) {
  const app = Fastify({
    loggerInstance: logger,
    genReqId: () => randomUUID(),
    requestIdLogLabel: "request_id",
    requestTimeout: 0, // long recordings take minutes to transcribe
  });

  const orchestrator = new RequestOrchestrator(lifecycle, new TranscriptionInvoker(logger), {
    tempDir: config.tempDir,
    maxBytes: config.maxFileSizeBytes,
    allowedFormats: config.allowedAudioFormats,
    defaults: {
      language: config.defaultLanguage,
      temperature: config.defaultTemperature,
      beamSize: config.defaultBeamSize,
      vadFilter: config.enableVadFilter,
    },
    readyTimeoutMs: config.modelReadyTimeoutMs,
  });

  await app.register(cors, {
    origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins,
  });

  // One byte over the ceiling lets ingestion see the overflow and report it
  await app.register(multipart, {
    limits: { fileSize: config.maxFileSizeBytes + 1, files: 1 },
    throwFileSizeLimit: false,
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ServiceError) {
      if (error instanceof ModelUnavailableError && error.retryAfterSeconds !== undefined) {
        reply.header("Retry-After", String(error.retryAfterSeconds));
      }
      if (error instanceof UnauthorizedError) {
        reply.header("WWW-Authenticate", "ApiKey");
      }

      if (error.statusCode >= 500) {
        request.log.error({ err: error, kind: error.kind }, "Request failed");
      } else {
        request.log.info({ kind: error.kind, detail: error.message }, "Request rejected");
      }
      return reply.code(error.statusCode).send(errorBody(error.kind, error.message, request.id));
    }

    const status = error.statusCode;
    if (status !== undefined && status >= 400 && status < 500) {
      request.log.info({ err: error }, "Request rejected");
      const kind = status === 413 ? "FileTooLarge" : "InvalidRequest";
      return reply.code(status).send(errorBody(kind, error.message, request.id));
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.code(500).send(errorBody("InternalError", "Internal server error", request.id));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .code(404)
      .send(errorBody("NotFound", `Route ${request.method} ${request.url} not found`, request.id));
  });

  app.addHook("onClose", async () => {
    await lifecycle.shutdown();
  });

  app.get("/health", async (_request, reply) => {
    const snapshot = lifecycle.getStatusSnapshot();
    const body: HealthCheckResponse = {
      status:
        snapshot.state === "ready" ? "healthy" : snapshot.state === "failed" ? "unhealthy" : "degraded",
      state: snapshot.state,
      model: config.whisperModel,
      device: config.whisperDevice,
      version: SERVICE_VERSION,
      error: snapshot.error,
      cleanup_warnings: orchestrator.cleanupWarnings,
    };
    return reply.code(body.status === "unhealthy" ? 503 : 200).send(body);
  });

  app.get("/api/v1/models", async (): Promise<ModelsResponse> => {
    return { models: [...VALID_WHISPER_MODELS], active: config.whisperModel };
  });

  app.post(
    "/api/v1/transcribe",
    { preHandler: requireApiKey(config.apiKeys) },
    async (request): Promise<TranscriptionResponse> => {
      const query = TranscribeQuerySchema.safeParse(request.query);
      if (!query.success) {
        const issues = query.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ");
        throw new InvalidRequestError(`Invalid query parameters: ${issues}`);
      }

      if (!request.isMultipart()) {
        throw new InvalidRequestError("No file uploaded");
      }
      const part = await request.file();
      if (!part) {
        throw new InvalidRequestError("No file uploaded");
      }

      const params = query.data;
      request.log.info(
        {
          filename: part.filename,
          language: params.language,
          includeSegments: params.include_segments,
        },
        "Transcription request received"
      );

      try {
        const result = await orchestrator.handle(
          part.file,
          part.filename,
          {
            language: params.language,
            temperature: params.temperature,
            beamSize: params.beam_size,
            initialPrompt: params.initial_prompt,
            includeSegments: params.include_segments,
          },
          request.log
        );

        return {
          text: result.text,
          language: result.language,
          duration_seconds: result.durationSeconds,
          ...(result.segments ? { segments: [...result.segments] } : {}),
        };
      } finally {
        // Drain whatever the handler did not read so the connection can finish
        if (!part.file.readableEnded) {
          part.file.resume();
        }
      }
    }
  );

  return app;
}
