import type { FastifyBaseLogger } from "fastify";
import type { EngineFactory, SpeechEngine } from "./engine.js";
import type { LoadState, StatusSnapshot } from "../types.js";
import { ModelUnavailableError, errorMessage } from "../errors.js";

const ENGINE_SHUT_DOWN = "engine shut down";

/**
 * Owns the speech engine and drives it through
 * uninitialized -> loading -> ready | failed. Ready and failed are final
 * until shutdown, which leaves every state failed.
 *
 * The load promise doubles as the readiness signal: it is created once,
 * never rejects, and every waiter awaits the same instance, so a waiter that
 * wakes up is guaranteed to observe the state the load left behind.
 */
export class ModelLifecycle<E extends SpeechEngine = SpeechEngine> {
  private readonly factory: EngineFactory<E>;
  private readonly log: FastifyBaseLogger;
  private state: LoadState = { status: "uninitialized" };
  private engine: E | null = null;
  private loading: Promise<void> | null = null;
  private readonly abort = new AbortController();

  constructor(factory: EngineFactory<E>, log: FastifyBaseLogger) {
    this.factory = factory;
    this.log = log;
  }

  /** Kicks off the load without waiting for it. Repeated calls are no-ops. */
  startLoadingAsync(): void {
    this.ensureLoading();
  }

  /**
   * Resolves with the engine once it is ready. Starts the load if nobody has.
   * Rejects with ModelUnavailableError when the load failed or did not finish
   * within `timeoutMs`.
   */
  async waitUntilReady(timeoutMs: number): Promise<E> {
    const loading = this.ensureLoading();

    if (this.state.status === "loading") {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      });
      try {
        await Promise.race([loading, timeout]);
      } finally {
        clearTimeout(timer);
      }
    }

    const state = this.state;
    if (state.status === "ready" && this.engine) return this.engine;
    if (state.status === "failed") throw ModelUnavailableError.loadFailed(state.message);
    throw ModelUnavailableError.timeout(timeoutMs);
  }

  getStatusSnapshot(): StatusSnapshot {
    const state = this.state;
    switch (state.status) {
      case "ready":
        return {
          state: state.status,
          engineLoaded: this.engine !== null,
          loadDurationMs: state.readyAt - state.startedAt,
        };
      case "failed":
        return { state: state.status, engineLoaded: false, error: state.message };
      default:
        return { state: state.status, engineLoaded: false };
    }
  }

  /**
   * Releases the engine at process exit. A load still in flight is aborted and
   * awaited so an engine that arrives late is closed too. There is no reload
   * afterwards: waiters get a load failure.
   */
  async shutdown(): Promise<void> {
    const startedAt = "startedAt" in this.state ? this.state.startedAt : Date.now();
    this.abort.abort();
    if (!this.loading) {
      this.loading = Promise.resolve();
    }
    await this.loading;

    const engine = this.engine;
    this.engine = null;
    this.state = { status: "failed", startedAt, message: ENGINE_SHUT_DOWN };
    if (engine) {
      await engine.close();
      this.log.info("Speech engine closed");
    }
  }

  private ensureLoading(): Promise<void> {
    if (!this.loading) {
      this.state = { status: "loading", startedAt: Date.now() };
      // Defer the factory so a synchronous prefix cannot block the caller
      this.loading = new Promise<void>((resolve) => setImmediate(resolve)).then(() => this.load());
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    const startedAt = this.state.status === "loading" ? this.state.startedAt : Date.now();
    const signal = this.abort.signal;
    if (signal.aborted) {
      this.state = { status: "failed", startedAt, message: ENGINE_SHUT_DOWN };
      return;
    }

    this.log.info("Loading speech model");
    try {
      const engine = await this.factory(signal);
      if (signal.aborted) {
        this.state = { status: "failed", startedAt, message: ENGINE_SHUT_DOWN };
        await engine.close();
        this.log.info("Speech engine closed after a shutdown during load");
        return;
      }
      this.engine = engine;
      this.state = { status: "ready", startedAt, readyAt: Date.now() };
      this.log.info({ loadDurationMs: Date.now() - startedAt }, "Speech model loaded successfully");
    } catch (err) {
      const message = signal.aborted ? ENGINE_SHUT_DOWN : errorMessage(err);
      this.state = { status: "failed", startedAt, message };
      if (signal.aborted) {
        this.log.info({ err }, "Speech model load aborted by shutdown");
      } else {
        this.log.error({ err }, "Failed to load speech model");
      }
    }
  }
}
