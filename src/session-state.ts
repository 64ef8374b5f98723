// Speaking Coach - Per-session state
// A session owns its long-lived conversation history and one StreamingState
// holding the transient data of the current (or last) recording.
//
// Privacy: audio is in-memory only and discarded once pushed to the recognizer.

import { AudioQueue } from "./audio-queue.js";
import type { RecognizerSession } from "./recognizer.js";
import {
  RecordingPhase,
  type ChatTurn,
  type HealthStatus,
  type RecognitionFragment,
  type StopResult,
} from "./types.js";
import type { StreamingConfig } from "./config.js";
import type { IeltsTest } from "./ielts-test.js";

export interface DropCounts {
  backpressure: number;
  silence: number;
  resampling: number;
  queueFull: number;
}

function emptyDropCounts(): DropCounts {
  return { backpressure: 0, silence: 0, resampling: 0, queueFull: 0 };
}

export class StreamingState {
  phase: RecordingPhase = RecordingPhase.IDLE;
  /** Actively accepting frames. Implies isActive. */
  isRecording = false;
  /** Recognizer resources allocated and not yet torn down. */
  isActive = false;

  readonly audioQueue: AudioQueue;
  /** Resampled samples waiting for a full recognizer window. */
  audioBuffer: number[] = [];
  /** Final recognizer results in emission order. Append-only during a recording. */
  fragments: RecognitionFragment[] = [];
  currentPartialText = "";

  recordingStartTime: number | null = null;
  maxRecordingSeconds: number;
  retryCount = 0;
  maxRetries: number;
  lastError: string | null = null;
  /** The recognizer canceled this recording's stream. */
  canceled = false;
  /** Windows written to the recognizer during this recording. */
  chunksProcessed = 0;
  framesQueued = 0;
  drops: DropCounts = emptyDropCounts();

  /** Incremented on every start; recognizer events bound to an older generation are ignored. */
  generation = 0;
  recognizer: RecognizerSession | null = null;
  consumer: Promise<void> | null = null;
  /** Result of a recording that ended without a stop call, returned by the next stop. */
  pendingResult: StopResult | null = null;

  constructor(config: Pick<StreamingConfig, "queueCapacity" | "maxRecordingSeconds" | "maxRetries">) {
    this.audioQueue = new AudioQueue(config.queueCapacity);
    this.maxRecordingSeconds = config.maxRecordingSeconds;
    this.maxRetries = config.maxRetries;
  }

  /** Clear utterance-scoped data. Flags, retry bookkeeping and the recognizer handle are left alone. */
  resetForNewUtterance(): void {
    this.fragments = [];
    this.currentPartialText = "";
    this.audioBuffer = [];
    this.audioQueue.clear();
    this.recordingStartTime = null;
    this.chunksProcessed = 0;
    this.framesQueued = 0;
    this.drops = emptyDropCounts();
    this.pendingResult = null;
    this.canceled = false;
  }

  elapsedSeconds(now: number = Date.now()): number {
    return this.recordingStartTime === null ? 0 : (now - this.recordingStartTime) / 1000;
  }
}

export class StreamingSessionState {
  readonly key: string;
  readonly createdAt: number;
  lastSeenAt: number;
  readonly chatHistory: ChatTurn[] = [];
  /** Structured test in progress, if any. Survives recordings like the chat history. */
  ieltsTest: IeltsTest | null = null;
  readonly streaming: StreamingState;

  constructor(key: string, config: StreamingConfig, now: number = Date.now()) {
    this.key = key;
    this.createdAt = now;
    this.lastSeenAt = now;
    this.streaming = new StreamingState(config);
  }

  touch(now: number = Date.now()): void {
    this.lastSeenAt = now;
  }

  /**
   * Reports whether the streaming state is degraded: too many windows
   * processed, or the recording has run past its time limit.
   */
  checkHealth(maxChunksProcessed: number, now: number = Date.now()): HealthStatus {
    const s = this.streaming;
    if (s.chunksProcessed > maxChunksProcessed) {
      return { healthy: false, reason: `processed ${s.chunksProcessed} chunks (limit ${maxChunksProcessed})` };
    }
    if (s.recordingStartTime !== null && s.elapsedSeconds(now) > s.maxRecordingSeconds) {
      return { healthy: false, reason: `exceeded maximum duration of ${s.maxRecordingSeconds}s` };
    }
    return { healthy: true, reason: null };
  }

  /**
   * Synchronously tear down streaming resources: detach and close the
   * recognizer, stop accepting audio, drop queued audio. Used on eviction and
   * after every stop. Conversation history is preserved.
   *
   * @returns an error message if closing the recognizer threw, otherwise null.
   */
  releaseStreamingResources(): string | null {
    const s = this.streaming;
    // Anything still bound to the released recording (events, a start in flight) is now stale.
    s.generation++;
    let closeError: string | null = null;
    const recognizer = s.recognizer;
    s.recognizer = null;
    if (recognizer) {
      try {
        recognizer.close();
      } catch (err) {
        closeError = err instanceof Error ? err.message : String(err);
        s.lastError = closeError;
      }
    }
    s.isRecording = false;
    s.isActive = false;
    s.audioQueue.clear();
    s.audioBuffer = [];
    s.phase = RecordingPhase.IDLE;
    return closeError;
  }
}
