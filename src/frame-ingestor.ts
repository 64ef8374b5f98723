// Speaking Coach - Frame ingestor
// Producer side of a session's audio queue. Called from the transport for
// every inbound frame; it gates, resamples and enqueues without ever waiting.
//
// Frames are routed by the session key the transport tags them with. There is
// no "first recording session" fallback: an untagged or unknown frame is
// dropped rather than leaked into another user's recording.

import type { StreamingConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { flattenSamples, hasSpeech, resample } from "./audio-processing.js";
import type { SessionRegistry } from "./session-registry.js";
import type { AudioFrame } from "./types.js";

export type FrameDropReason =
  | "session_not_found"
  | "not_recording"
  | "backpressure"
  | "silence"
  | "resampling_degenerate"
  | "queue_full"
  | "invalid_frame";

export type IngestOutcome =
  | { queued: true; samples: number; depth: number }
  | { queued: false; reason: FrameDropReason };

export class FrameIngestor {
  private readonly registry: SessionRegistry;
  private readonly config: StreamingConfig;
  private readonly logger: Logger;
  private framesReceived = 0;

  constructor(registry: SessionRegistry, config: StreamingConfig, logger: Logger) {
    this.registry = registry;
    this.config = config;
    this.logger = logger;
  }

  /**
   * Route one frame into its session's queue. Never throws and never waits;
   * the outcome is informational.
   */
  ingest(sessionKey: string, frame: AudioFrame): IngestOutcome {
    try {
      return this.ingestFrame(sessionKey, frame);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[${sessionKey}] Dropping frame after unexpected error: ${message}`);
      return { queued: false, reason: "invalid_frame" };
    }
  }

  private ingestFrame(sessionKey: string, frame: AudioFrame): IngestOutcome {
    // 1. Resolve the owning session
    const session = this.registry.get(sessionKey);
    if (!session) {
      return { queued: false, reason: "session_not_found" };
    }
    const state = session.streaming;
    if (!state.isRecording || !state.isActive) {
      return { queued: false, reason: "not_recording" };
    }
    session.touch();

    // 2. Backpressure: never block the producer, drop instead
    const depth = state.audioQueue.size;
    if (depth > this.config.queueCriticalDepth) {
      state.drops.backpressure++;
      this.logger.error(`[${sessionKey}] Queue overflow (${depth}) - dropping frame`);
      return { queued: false, reason: "backpressure" };
    }

    // 3. Flatten
    const samples = flattenSamples(frame.samples);

    // 4. Voice-activity gate
    if (!hasSpeech(samples, this.config.silenceThreshold)) {
      state.drops.silence++;
      this.logger.debug(`[${sessionKey}] Silence detected - skipping frame`);
      return { queued: false, reason: "silence" };
    }

    // 5. Resample to the recognizer rate
    // The transport may reuse its frame buffer, so never queue the caller's array itself.
    let resampled = samples === frame.samples ? samples.slice() : samples;
    if (frame.sampleRate !== this.config.targetSampleRate) {
      try {
        resampled = resample(samples, frame.sampleRate, this.config.targetSampleRate);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        state.drops.resampling++;
        this.logger.warn(`[${sessionKey}] ${message} - dropping frame`);
        return { queued: false, reason: "resampling_degenerate" };
      }
      if (resampled.length === 0) {
        state.drops.resampling++;
        this.logger.warn(
          `[${sessionKey}] Invalid resampling: ${frame.sampleRate}Hz -> ${this.config.targetSampleRate}Hz ` +
            `resulted in 0 samples`,
        );
        return { queued: false, reason: "resampling_degenerate" };
      }
    }

    // 6. Enqueue without blocking
    if (!state.audioQueue.tryEnqueue(resampled)) {
      state.drops.queueFull++;
      this.logger.error(`[${sessionKey}] Queue full - dropping frame`);
      return { queued: false, reason: "queue_full" };
    }

    state.framesQueued++;
    this.framesReceived++;
    if (this.framesReceived % 10 === 0) {
      this.logger.debug(`METRICS: audio_chunks_received=${this.framesReceived} queue_size=${depth + 1}`);
    }
    if (depth > this.config.queueWarnDepth && depth % 5 === 0) {
      this.logger.warn(`[${sessionKey}] Audio queue high pressure: ${depth} items`);
    }

    return { queued: true, samples: resampled.length, depth: state.audioQueue.size };
  }

  /** Frames accepted across all sessions since startup. */
  get totalFramesQueued(): number {
    return this.framesReceived;
  }
}
