import { describe, expect, test } from "vitest";
import { InferenceError } from "../../src/errors.js";
import { TranscriptionInvoker, resolveTranscriptionParams } from "../../src/pipeline/transcribe.js";
import type { EffectiveTranscriptionParams } from "../../src/types.js";
import { FakeEngine, silentLogger } from "../helpers.js";

const params: EffectiveTranscriptionParams = {
  language: "auto",
  temperature: 0,
  beamSize: 5,
  includeSegments: false,
  vadFilter: true,
};

describe("TranscriptionInvoker", () => {
  test("should join trimmed segment texts with single spaces", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);

    const output = await invoker.run(new FakeEngine(), "/tmp/audio_1.wav", params);

    expect(output.text).toBe("Good morning. How are you?");
    expect(output.segments).toBeUndefined();
    expect(output.durationSeconds).toBeGreaterThanOrEqual(0);
  });

  test("should return trimmed segments when asked", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);

    const output = await invoker.run(new FakeEngine(), "/tmp/audio_1.wav", { ...params, includeSegments: true });

    expect(output.segments).toEqual([
      { id: 0, start: 0, end: 1.5, text: "Good morning." },
      { id: 1, start: 1.5, end: 3, text: "How are you?" },
    ]);
  });

  test("should keep every segment in emitted order", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);
    const engine = new FakeEngine({
      segments: [
        { id: 0, start: 0, end: 2, text: "  First. " },
        { id: 1, start: 2, end: 4, text: "\tSecond.\n" },
        { id: 2, start: 4, end: 5.5, text: "Third." },
      ],
    });

    const output = await invoker.run(engine, "/tmp/audio_1.wav", { ...params, includeSegments: true });

    expect(output.text).toBe("First. Second. Third.");
    expect(output.segments?.map((s) => s.text)).toEqual(["First.", "Second.", "Third."]);
    expect(output.segments?.map((s) => s.id)).toEqual([0, 1, 2]);
  });

  test("should return empty text for silence", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);

    const output = await invoker.run(new FakeEngine({ segments: [] }), "/tmp/audio_1.wav", {
      ...params,
      includeSegments: true,
    });

    expect(output.text).toBe("");
    expect(output.segments).toEqual([]);
  });

  test("should prefer the detected language and fall back to the requested one", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);

    const detected = await invoker.run(new FakeEngine({ language: "de" }), "/tmp/a.wav", params);
    const fallback = await invoker.run(new FakeEngine({ language: null }), "/tmp/a.wav", {
      ...params,
      language: "fr",
    });

    expect(detected.language).toBe("de");
    expect(fallback.language).toBe("fr");
  });

  test("should pass the effective options to the engine", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);
    const engine = new FakeEngine();

    await invoker.run(engine, "/tmp/audio_2.mp3", {
      language: "fr",
      temperature: 0.2,
      beamSize: 3,
      initialPrompt: "Glossary: sourdough, levain",
      includeSegments: false,
      vadFilter: false,
    });

    expect(engine.calls).toEqual([
      {
        audioPath: "/tmp/audio_2.mp3",
        opts: {
          language: "fr",
          temperature: 0.2,
          beamSize: 3,
          initialPrompt: "Glossary: sourdough, levain",
          vadFilter: false,
        },
      },
    ]);
  });

  test("should wrap engine failures in InferenceError", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);
    const engine = new FakeEngine({ error: new Error("decoder crashed") });

    const err = await invoker.run(engine, "/tmp/a.wav", params).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InferenceError);
    expect(err).toMatchObject({ kind: "InferenceError", statusCode: 500, message: "Transcription failed: decoder crashed" });
  });

  test("should run one transcription at a time on an engine that is not concurrent-safe", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);
    const engine = new FakeEngine({ delayMs: 20 });

    await Promise.all([
      invoker.run(engine, "/tmp/a.wav", params),
      invoker.run(engine, "/tmp/b.wav", params),
      invoker.run(engine, "/tmp/c.wav", params),
    ]);

    expect(engine.maxActive).toBe(1);
    expect(engine.calls.map((c) => c.audioPath)).toEqual(["/tmp/a.wav", "/tmp/b.wav", "/tmp/c.wav"]);
  });

  test("should let a concurrent-safe engine take overlapping calls", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);
    const engine = new FakeEngine({ delayMs: 20, concurrentSafe: true });

    await Promise.all([
      invoker.run(engine, "/tmp/a.wav", params),
      invoker.run(engine, "/tmp/b.wav", params),
      invoker.run(engine, "/tmp/c.wav", params),
    ]);

    expect(engine.maxActive).toBe(3);
  });

  test("should keep serving after a failed transcription", async () => {
    const invoker = new TranscriptionInvoker(silentLogger);
    const failing = invoker.run(new FakeEngine({ error: new Error("out of memory") }), "/tmp/a.wav", params);
    const next = invoker.run(new FakeEngine(), "/tmp/b.wav", params);

    await expect(failing).rejects.toBeInstanceOf(InferenceError);
    await expect(next).resolves.toMatchObject({ text: "Good morning. How are you?" });
  });
});

describe("resolveTranscriptionParams", () => {
  const defaults = { language: "auto", temperature: 0, beamSize: 5, vadFilter: true };

  test("should fill missing values from the defaults", () => {
    expect(resolveTranscriptionParams({ includeSegments: false }, defaults)).toEqual({
      language: "auto",
      temperature: 0,
      beamSize: 5,
      initialPrompt: undefined,
      includeSegments: false,
      vadFilter: true,
    });
  });

  test("should keep explicit values including a zero temperature", () => {
    const resolved = resolveTranscriptionParams(
      { language: "es", temperature: 0, beamSize: 1, initialPrompt: "Hola", includeSegments: true },
      { ...defaults, temperature: 0.4 }
    );

    expect(resolved).toEqual({
      language: "es",
      temperature: 0,
      beamSize: 1,
      initialPrompt: "Hola",
      includeSegments: true,
      vadFilter: true,
    });
  });

  test("should treat an empty language or prompt as absent", () => {
    const resolved = resolveTranscriptionParams({ language: "", initialPrompt: "", includeSegments: false }, defaults);

    expect(resolved.language).toBe("auto");
    expect(resolved.initialPrompt).toBeUndefined();
  });
});
