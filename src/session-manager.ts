// Speaking Coach - Session Manager
// Session-facing API over the registry, the frame ingestor and the recording
// lifecycle. The transport talks only to this class.
//
// Privacy: audio frames are in-memory only, never written to disk.

import { v4 as uuidv4 } from "uuid";
import { DEFAULT_STREAMING_CONFIG, type StreamingConfig } from "./config.js";
import { FrameIngestor, type IngestOutcome } from "./frame-ingestor.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { RecognizerFactory } from "./recognizer.js";
import { SessionLifecycle, type RecordingEndedCallback } from "./session-lifecycle.js";
import { SessionRegistry } from "./session-registry.js";
import type { StreamingSessionState } from "./session-state.js";
import {
  RecordingPhase,
  type AudioFrame,
  type HealthStatus,
  type StartResult,
  type StopResult,
} from "./types.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  recognizerFactory: RecognizerFactory;
  config?: StreamingConfig;
  logger?: Logger;
  /** Notified when a recording ends without a stop request, including sweep force-stops. */
  onRecordingEnded?: RecordingEndedCallback;
  now?: () => number;
}

export interface SweepResult {
  /** Sessions whose recording was force-stopped as unhealthy. */
  stopped: string[];
  /** Sessions removed for being idle too long. */
  evicted: string[];
}

export class SessionManager {
  readonly config: StreamingConfig;
  private readonly registry: SessionRegistry;
  private readonly ingestor: FrameIngestor;
  private readonly lifecycle: SessionLifecycle;
  private readonly logger: Logger;
  private readonly onRecordingEnded: RecordingEndedCallback | undefined;
  private readonly now: () => number;

  constructor(deps: SessionManagerDeps) {
    this.config = deps.config ?? DEFAULT_STREAMING_CONFIG;
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.onRecordingEnded = deps.onRecordingEnded;
    const now = deps.now ?? Date.now;
    this.now = now;

    this.registry = new SessionRegistry(this.config, this.logger, now);
    this.ingestor = new FrameIngestor(this.registry, this.config, this.logger);
    this.lifecycle = new SessionLifecycle({
      recognizerFactory: deps.recognizerFactory,
      config: this.config,
      logger: this.logger,
      onRecordingEnded: deps.onRecordingEnded,
      now,
    });

    if (deps.recognizerFactory.configurationError) {
      this.logger.warn(`Speech recognizer unavailable: ${deps.recognizerFactory.configurationError}`);
    }
  }

  /** Create a session under a fresh key. */
  createSession(): string {
    const key = uuidv4();
    this.registry.getOrCreate(key);
    return key;
  }

  getSession(key: string): StreamingSessionState | undefined {
    return this.registry.get(key);
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  get recordingCount(): number {
    return this.registry.listActiveRecording().length;
  }

  /** Start recording for `key`, creating the session if needed. */
  startRecording(key: string): Promise<StartResult> {
    return this.lifecycle.start(this.registry.getOrCreate(key));
  }

  async stopRecording(key: string): Promise<StopResult> {
    const session = this.registry.get(key);
    if (!session) {
      this.logger.warn(`Stop requested for unknown session ${key}`);
      return { success: false, transcript: "Session not found", report: null, errorKind: "SessionNotFound" };
    }
    session.touch(this.now());
    return this.lifecycle.stop(session);
  }

  /** Fire-and-forget frame delivery; the outcome is informational. */
  queueAudioFrame(key: string, frame: AudioFrame): IngestOutcome {
    return this.ingestor.ingest(key, frame);
  }

  /** Latest in-progress (or last final) text of the current recording. */
  getPartialText(key: string): string {
    return this.registry.get(key)?.streaming.currentPartialText ?? "";
  }

  healthCheck(key: string): HealthStatus {
    const session = this.registry.get(key);
    if (!session) {
      return { healthy: false, reason: "session not found" };
    }
    return this.lifecycle.healthCheck(session);
  }

  /**
   * Force-stop unhealthy recordings, then evict sessions idle for longer
   * than `sessionIdleSeconds`.
   */
  async sweep(): Promise<SweepResult> {
    const stopped: string[] = [];

    for (const key of this.registry.listActiveRecording()) {
      const session = this.registry.get(key);
      if (!session || session.streaming.phase !== RecordingPhase.RECORDING) continue;

      const health = this.lifecycle.healthCheck(session);
      if (health.healthy) continue;

      this.logger.warn(`Force-stopping unhealthy session ${key}: ${health.reason}`);
      const result = await this.lifecycle.stop(session);
      stopped.push(key);
      this.notifyRecordingEnded(key, result);
    }

    const evicted = this.registry.evictOlderThan(this.config.sessionIdleSeconds);
    return { stopped, evicted };
  }

  /** Stop any recording in progress and forget the session. */
  async removeSession(key: string): Promise<boolean> {
    const session = this.registry.get(key);
    if (!session) return false;

    if (session.streaming.phase === RecordingPhase.RECORDING) {
      await this.lifecycle.stop(session);
    } else {
      const closeError = session.releaseStreamingResources();
      if (closeError) {
        this.logger.error(`Error releasing resources of session ${key}: ${closeError}`);
      }
    }
    return this.registry.remove(key);
  }

  async shutdown(): Promise<void> {
    const keys = this.registry.keys();
    this.logger.info(`Shutting down ${keys.length} session(s)`);
    await Promise.all(keys.map((key) => this.removeSession(key)));
  }

  private notifyRecordingEnded(key: string, result: StopResult): void {
    try {
      this.onRecordingEnded?.(key, result);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[${key}] onRecordingEnded callback failed: ${message}`);
    }
  }
}
