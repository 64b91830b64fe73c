import path from "node:path";
import crypto from "node:crypto";
import { open, rm } from "node:fs/promises";
import type { FastifyBaseLogger } from "fastify";
import type { TempArtifact } from "../types.js";
import { UPLOAD_CHUNK_BYTES } from "../constants.js";
import {
  CleanupWarning,
  FileTooLargeError,
  ServiceError,
  StorageError,
  UnsupportedFormatError,
  errorMessage,
} from "../errors.js";

export interface IngestOptions {
  tempDir: string;
  maxBytes: number;
  allowedFormats: readonly string[];
  log: FastifyBaseLogger;
  chunkBytes?: number;
}

/**
 * Returns the lowercased extension of `filename` when it is an allowed audio
 * format. Throws UnsupportedFormatError otherwise, before any byte is read.
 */
export function checkAudioFormat(filename: string | undefined, allowedFormats: readonly string[]): string {
  if (!filename) {
    throw new UnsupportedFormatError(null, allowedFormats);
  }
  const ext = path.extname(filename).replace(/^\./, "").toLowerCase();
  if (!ext || !allowedFormats.includes(ext)) {
    throw new UnsupportedFormatError(ext, allowedFormats);
  }
  return ext;
}

/**
 * Streams an upload into a fresh temp file, enforcing the size ceiling on
 * every piece written. On any failure the partial file is removed before the
 * error propagates. On success the caller owns the file.
 */
export async function ingestUpload(
  source: AsyncIterable<Uint8Array | string>,
  filename: string | undefined,
  opts: IngestOptions
): Promise<TempArtifact> {
  const ext = checkAudioFormat(filename, opts.allowedFormats);
  const tempPath = path.join(opts.tempDir, `audio_${crypto.randomUUID()}.${ext}`);

  try {
    const byteSize = await writeBounded(source, tempPath, opts.maxBytes, opts.chunkBytes ?? UPLOAD_CHUNK_BYTES);
    return { path: tempPath, byteSize };
  } catch (err) {
    await rm(tempPath, { force: true }).catch((rmErr: unknown) => {
      opts.log.warn({ err: new CleanupWarning(tempPath, rmErr) }, "Failed to remove partial upload");
    });
    if (err instanceof ServiceError) throw err;
    throw new StorageError(`Failed to save uploaded file: ${errorMessage(err)}`, { cause: err });
  }
}

async function writeBounded(
  source: AsyncIterable<Uint8Array | string>,
  tempPath: string,
  maxBytes: number,
  chunkBytes: number
): Promise<number> {
  const handle = await open(tempPath, "wx");
  let written = 0;
  try {
    for await (const chunk of source) {
      const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      for (let offset = 0; offset < buf.length; offset += chunkBytes) {
        const piece = buf.subarray(offset, offset + chunkBytes);
        written += piece.length;
        if (written > maxBytes) {
          throw new FileTooLargeError(maxBytes);
        }
        await handle.write(piece);
      }
    }
    return written;
  } finally {
    await handle.close();
  }
}

/**
 * Best-effort removal of a request's temp file. Returns the warning instead of
 * throwing so it can never replace the request's own outcome.
 */
export async function discardArtifact(
  artifact: TempArtifact,
  log: FastifyBaseLogger
): Promise<CleanupWarning | null> {
  try {
    await rm(artifact.path, { force: true });
    log.debug({ tempPath: artifact.path }, "Temp file cleaned up");
    return null;
  } catch (err) {
    const warning = new CleanupWarning(artifact.path, err);
    log.warn({ err: warning, tempPath: artifact.path }, "Temp file cleanup failed");
    return warning;
  }
}
