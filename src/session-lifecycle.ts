// Speaking Coach - Recording lifecycle
// State machine per session: IDLE → STARTING → RECORDING → STOPPING → IDLE.
//
// start(): allocate recognizer + push stream with bounded retries, reset
//          utterance data, spawn the stream consumer.
// stop():  drain the consumer, give the recognizer a grace period for
//          trailing results, stop it, consolidate, and always tear down.
// A consumer that exits on its own (time limit, cancellation, fatal error)
// goes through the same finish path; its result is kept for the next stop().

import type { StreamingConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { createRecognitionEventHandler } from "./recognition-events.js";
import type { RecognizerFactory, RecognizerSession } from "./recognizer.js";
import { consolidateFragments } from "./result-consolidator.js";
import type { StreamingSessionState } from "./session-state.js";
import { StreamConsumer, processAudioBuffer } from "./stream-consumer.js";
import { RecordingPhase, type HealthStatus, type StartResult, type StopResult } from "./types.js";
import { sleep } from "./utils/deferred.js";

export const START_FAILED_MESSAGE = "Recording failed, try again";
export const NO_SPEECH_MESSAGE = "No speech detected. Please try speaking again.";

export type RecordingEndedCallback = (sessionKey: string, result: StopResult) => void;

export interface SessionLifecycleOptions {
  recognizerFactory: RecognizerFactory;
  config: StreamingConfig;
  logger: Logger;
  /** Invoked when a recording ends without a stop call. */
  onRecordingEnded?: RecordingEndedCallback;
  now?: () => number;
}

export class SessionLifecycle {
  private readonly factory: RecognizerFactory;
  private readonly config: StreamingConfig;
  private readonly logger: Logger;
  private readonly onRecordingEnded: RecordingEndedCallback | undefined;
  private readonly now: () => number;

  constructor(options: SessionLifecycleOptions) {
    this.factory = options.recognizerFactory;
    this.config = options.config;
    this.logger = options.logger;
    this.onRecordingEnded = options.onRecordingEnded;
    this.now = options.now ?? Date.now;
  }

  /** Start a recording. Never throws; failures come back as a displayable message. */
  async start(session: StreamingSessionState): Promise<StartResult> {
    const state = session.streaming;
    const key = session.key;

    if (state.phase !== RecordingPhase.IDLE) {
      this.logger.warn(`[${key}] Start called while ${state.phase}`);
      return { success: false, message: "Already recording", errorKind: "AlreadyRecording" };
    }

    if (this.factory.configurationError) {
      state.lastError = this.factory.configurationError;
      this.logger.error(`[${key}] Cannot start recording: ${this.factory.configurationError}`);
      return {
        success: false,
        message: `${START_FAILED_MESSAGE} (speech service is not configured)`,
        errorKind: "ConfigurationInvalid",
      };
    }

    const startedAt = this.now();
    state.phase = RecordingPhase.STARTING;
    state.retryCount = 0;
    state.lastError = null;

    for (let attempt = 0; attempt <= state.maxRetries; attempt++) {
      if (state.phase !== RecordingPhase.STARTING) {
        this.logger.warn(`[${key}] Session released during start retries`);
        return { success: false, message: START_FAILED_MESSAGE, errorKind: "RecognizerSetupFailed" };
      }
      const generation = state.generation + 1;
      let recognizer: RecognizerSession | null = null;
      try {
        state.generation = generation;
        // Events are accepted only once isActive is set below.
        const events = createRecognitionEventHandler(state, generation, key, this.logger);
        recognizer = this.factory.create(key, events);
        await recognizer.start();

        if (state.generation !== generation) {
          // Released (evicted or removed) while the recognizer was connecting.
          this.closeQuietly(recognizer, key);
          this.logger.warn(`[${key}] Session released during start; discarding recognizer`);
          return { success: false, message: START_FAILED_MESSAGE, errorKind: "RecognizerSetupFailed" };
        }

        state.resetForNewUtterance();
        state.recognizer = recognizer;
        state.isActive = true;
        state.isRecording = true;
        state.recordingStartTime = this.now();
        state.phase = RecordingPhase.RECORDING;
        this.spawnConsumer(session);

        const elapsed = (this.now() - startedAt) / 1000;
        this.logger.info(`[${key}] Recording started (attempt ${attempt + 1})`);
        this.logger.info(`TIMING: start completed in ${elapsed.toFixed(2)}s`);
        return { success: true, message: "Recording started..." };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        state.lastError = message;
        this.logger.warn(`[${key}] Recording start attempt ${attempt + 1} failed: ${message}`);
        this.closeQuietly(recognizer, key);

        if (attempt < state.maxRetries) {
          state.retryCount++;
          await sleep(this.config.retryDelayMs);
        }
      }
    }

    state.phase = RecordingPhase.IDLE;
    state.isRecording = false;
    state.isActive = false;
    const attempts = state.maxRetries + 1;
    this.logger.error(`[${key}] Failed to start recording after ${attempts} attempts: ${state.lastError ?? "unknown error"}`);
    return {
      success: false,
      message: `${START_FAILED_MESSAGE} (failed after ${attempts} attempts: ${state.lastError ?? "unknown error"})`,
      errorKind: "RecognizerSetupFailed",
    };
  }

  /**
   * Stop the current recording and consolidate its results. When the
   * recording already ended by itself, that result is returned once, marked
   * `replayed`.
   */
  async stop(session: StreamingSessionState): Promise<StopResult> {
    const state = session.streaming;

    if (state.phase !== RecordingPhase.RECORDING) {
      if (state.phase === RecordingPhase.IDLE && state.pendingResult) {
        const pending = state.pendingResult;
        state.pendingResult = null;
        return { ...pending, replayed: true };
      }
      this.logger.warn(`[${session.key}] Stop called but not recording`);
      return { success: false, transcript: "Not currently recording", report: null, errorKind: "NotRecording" };
    }

    return this.finish(session);
  }

  healthCheck(session: StreamingSessionState): HealthStatus {
    const status = session.checkHealth(this.config.maxChunksProcessed, this.now());
    if (!status.healthy) {
      this.logger.warn(`[${session.key}] Session unhealthy: ${status.reason}`);
    }
    return status;
  }

  private spawnConsumer(session: StreamingSessionState): void {
    const state = session.streaming;
    const generation = state.generation;
    const consumer = new StreamConsumer(session, this.config, this.logger, this.now);

    state.consumer = consumer.run().then(
      () => this.handleConsumerExit(session, generation),
      (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`[${session.key}] Consumer task failed: ${message}`);
        return this.handleConsumerExit(session, generation);
      },
    );
  }

  /** Auto-stop when the consumer ended while the recording was still open. */
  private async handleConsumerExit(session: StreamingSessionState, generation: number): Promise<void> {
    const state = session.streaming;
    if (state.generation !== generation || state.phase !== RecordingPhase.RECORDING) {
      return;
    }

    this.logger.warn(`[${session.key}] Recording ended without a stop request: ${state.lastError ?? "consumer exited"}`);
    const result = await this.finish(session, true);
    try {
      this.onRecordingEnded?.(session.key, result);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[${session.key}] onRecordingEnded callback failed: ${message}`);
    }
  }

  private async finish(session: StreamingSessionState, fromConsumer = false): Promise<StopResult> {
    const state = session.streaming;
    const key = session.key;
    const startedAt = this.now();

    state.phase = RecordingPhase.STOPPING;
    state.isRecording = false;
    state.audioQueue.wake();

    let result: StopResult;
    try {
      if (!fromConsumer && state.consumer) {
        await state.consumer;
      }

      // Whatever the consumer left behind (e.g. after a fatal error) goes out now.
      await processAudioBuffer(state, this.config.windowSamples, true, this.logger, key);

      await sleep(this.config.stopGraceMs);

      if (state.recognizer) {
        const apiStart = this.now();
        await state.recognizer.stop();
        this.logger.info(`[${key}] Recognizer stopped in ${((this.now() - apiStart) / 1000).toFixed(2)}s`);
      }

      result = this.buildResult(session);
      const elapsed = (this.now() - startedAt) / 1000;
      this.logger.info(`TIMING: stop completed in ${elapsed.toFixed(2)}s`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      state.lastError = message;
      this.logger.error(`[${key}] Failed to stop recording: ${message}`);
      result = { success: false, transcript: `Failed to stop recording: ${message}`, report: null, errorKind: "StopFailed" };
    } finally {
      const closeError = session.releaseStreamingResources();
      if (closeError) {
        this.logger.error(`[${key}] Error closing recognizer: ${closeError}`);
      }
      state.consumer = null;
      this.logger.info(`[${key}] Streaming resources released. Chat history preserved: ${session.chatHistory.length} turns`);
    }

    if (fromConsumer) {
      state.pendingResult = result;
    }
    return result;
  }

  /** Consolidate fragments, falling back to the last partial text. */
  private buildResult(session: StreamingSessionState): StopResult {
    const state = session.streaming;
    const key = session.key;
    const outcome = consolidateFragments(state.fragments, this.logger, key);

    if (outcome.ok) {
      this.logger.info(`[${key}] Session finalized: '${outcome.report.displayText}'`);
      return { success: true, transcript: outcome.report.displayText, report: outcome.report };
    }

    const partial = state.currentPartialText.trim();
    this.logger.warn(`[${key}] No validated results (${outcome.kind}), using partial: '${partial}'`);
    const errorKind = state.canceled && outcome.kind === "NoSpeechDetected" ? "RecognitionCanceled" : outcome.kind;
    return { success: false, transcript: partial || NO_SPEECH_MESSAGE, report: null, errorKind };
  }

  private closeQuietly(recognizer: RecognizerSession | null, key: string): void {
    if (!recognizer) return;
    try {
      recognizer.close();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[${key}] Error closing failed recognizer: ${message}`);
    }
  }
}
