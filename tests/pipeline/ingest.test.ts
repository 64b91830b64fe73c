import path from "node:path";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CleanupWarning, FileTooLargeError, StorageError, UnsupportedFormatError } from "../../src/errors.js";
import { checkAudioFormat, discardArtifact, ingestUpload } from "../../src/pipeline/ingest.js";
import { makeTempDir, silentLogger, streamOf } from "../helpers.js";

const allowedFormats = ["mp3", "wav"];

describe("checkAudioFormat", () => {
  test("should return the lowercased extension", () => {
    expect(checkAudioFormat("Interview.MP3", allowedFormats)).toBe("mp3");
  });

  test("should list the allowed formats when rejecting", () => {
    expect(() => checkAudioFormat("notes.xyz", allowedFormats)).toThrow(
      "Unsupported audio format: xyz. Allowed formats: mp3, wav"
    );
  });

  test("should reject names without an extension", () => {
    expect(() => checkAudioFormat("recording", allowedFormats)).toThrow(
      "Unsupported audio format: none. Allowed formats: mp3, wav"
    );
  });

  test("should reject a missing filename", () => {
    expect(() => checkAudioFormat(undefined, allowedFormats)).toThrow("File must have a filename");
    expect(() => checkAudioFormat("", allowedFormats)).toThrow(UnsupportedFormatError);
  });
});

describe("ingestUpload", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  const options = (maxBytes: number) => ({ tempDir, maxBytes, allowedFormats, log: silentLogger });

  test("should write the upload to a uniquely named temp file", async () => {
    const payload = Buffer.alloc(20_000, 7);

    const artifact = await ingestUpload(streamOf(payload.subarray(0, 12_000), payload.subarray(12_000)), "talk.mp3", options(1024 * 1024));

    expect(artifact.byteSize).toBe(20_000);
    expect(path.dirname(artifact.path)).toBe(tempDir);
    expect(path.basename(artifact.path)).toMatch(/^audio_[0-9a-f-]{36}\.mp3$/);
    expect(await readFile(artifact.path)).toEqual(payload);
  });

  test("should use distinct paths for uploads with the same name", async () => {
    const first = await ingestUpload(streamOf("a"), "same.wav", options(10));
    const second = await ingestUpload(streamOf("b"), "same.wav", options(10));

    expect(first.path).not.toBe(second.path);
  });

  test("should normalize the extension of the temp file", async () => {
    const artifact = await ingestUpload(streamOf("abc"), "Clip.WAV", options(10));

    expect(artifact.path.endsWith(".wav")).toBe(true);
  });

  test("should accept an upload of exactly the maximum size", async () => {
    const artifact = await ingestUpload(streamOf(Buffer.alloc(1000)), "a.mp3", options(1000));

    expect(artifact.byteSize).toBe(1000);
  });

  test("should reject an upload over the maximum size and leave no file behind", async () => {
    const err = await ingestUpload(streamOf(Buffer.alloc(600), Buffer.alloc(600)), "a.mp3", options(1000)).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(FileTooLargeError);
    expect(err).toMatchObject({ statusCode: 413, limitBytes: 1000 });
    expect(await readdir(tempDir)).toEqual([]);
  });

  test("should reject an unsupported format without reading the body", async () => {
    let pulled = false;
    async function* source() {
      pulled = true;
      yield Buffer.from("data");
    }

    await expect(ingestUpload(source(), "notes.xyz", options(1000))).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(pulled).toBe(false);
    expect(await readdir(tempDir)).toEqual([]);
  });

  test("should turn a broken source into a StorageError and remove the partial file", async () => {
    async function* source() {
      yield Buffer.alloc(100);
      throw new Error("connection reset");
    }

    const err = await ingestUpload(source(), "a.mp3", options(1000)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ statusCode: 500, message: "Failed to save uploaded file: connection reset" });
    expect(await readdir(tempDir)).toEqual([]);
  });

  test("should report a missing temp directory as a StorageError", async () => {
    const err = await ingestUpload(streamOf("abc"), "a.mp3", {
      ...options(1000),
      tempDir: path.join(tempDir, "missing"),
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
  });
});

describe("discardArtifact", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("should delete the temp file", async () => {
    const filePath = path.join(tempDir, "audio_1.mp3");
    await writeFile(filePath, "abc");

    await expect(discardArtifact({ path: filePath, byteSize: 3 }, silentLogger)).resolves.toBeNull();
    expect(existsSync(filePath)).toBe(false);
  });

  test("should accept a file that is already gone", async () => {
    await expect(discardArtifact({ path: path.join(tempDir, "gone.mp3"), byteSize: 0 }, silentLogger)).resolves.toBeNull();
  });

  test("should return a warning instead of throwing when removal fails", async () => {
    const dirPath = path.join(tempDir, "audio_2.mp3");
    await mkdir(dirPath);
    await writeFile(path.join(dirPath, "inner"), "x");

    const warning = await discardArtifact({ path: dirPath, byteSize: 0 }, silentLogger);

    expect(warning).toBeInstanceOf(CleanupWarning);
    expect(warning?.path).toBe(dirPath);
  });
});
