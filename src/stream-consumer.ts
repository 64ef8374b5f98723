// Speaking Coach - Stream consumer
// One background task per recording. Drains the session's audio queue,
// batches items into the sample buffer and pushes fixed-size windows to the
// recognizer. Queue pressure shortens the dequeue wait and, past a critical
// depth, triggers an emergency drain that bypasses batching.

import { toPcm16 } from "./audio-processing.js";
import type { StreamingConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { StreamingSessionState, StreamingState } from "./session-state.js";

export interface ConsumerStats {
  /** Queue items moved into the sample buffer. */
  itemsConsumed: number;
  batchesSent: number;
  windowsWritten: number;
  writeErrors: number;
  queueOverflows: number;
  queueWarnings: number;
  avgQueueDepth: number;
}

/**
 * Push buffered samples to the recognizer: every full window, and with
 * `force` the remainder as well. A failed write is logged and that window is
 * discarded; the next one is still attempted.
 *
 * @returns the number of windows written.
 */
export async function processAudioBuffer(
  state: StreamingState,
  windowSamples: number,
  force: boolean,
  logger: Logger,
  sessionKey: string,
): Promise<{ written: number; failed: number }> {
  let written = 0;
  let failed = 0;

  while (state.recognizer) {
    const buffered = state.audioBuffer.length;
    if (buffered === 0 || (buffered < windowSamples && !force)) break;

    const take = buffered >= windowSamples ? windowSamples : buffered;
    const window = state.audioBuffer.slice(0, take);
    state.audioBuffer = state.audioBuffer.slice(take);

    try {
      await state.recognizer.write(toPcm16(window));
      state.chunksProcessed++;
      written++;
      logger.debug(`[${sessionKey}] Processed ${take} samples (chunk #${state.chunksProcessed})`);
    } catch (err) {
      failed++;
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`[${sessionKey}] Error writing audio window: ${message}`);
    }
  }

  return { written, failed };
}

export class StreamConsumer {
  private readonly session: StreamingSessionState;
  private readonly config: StreamingConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly stats: ConsumerStats;
  private depthSamples = 0;
  private depthTotal = 0;

  constructor(session: StreamingSessionState, config: StreamingConfig, logger: Logger, now: () => number = Date.now) {
    this.session = session;
    this.config = config;
    this.logger = logger;
    this.now = now;
    this.stats = {
      itemsConsumed: 0,
      batchesSent: 0,
      windowsWritten: 0,
      writeErrors: 0,
      queueOverflows: 0,
      queueWarnings: 0,
      avgQueueDepth: 0,
    };
  }

  /**
   * Run until the session stops recording or is torn down. Always resolves;
   * a fatal error ends the loop with isRecording=false.
   */
  async run(): Promise<ConsumerStats> {
    const state = this.session.streaming;
    const key = this.session.key;
    const startedAt = this.now();
    let batch: Float32Array[] = [];
    let lastFlushAt = startedAt;

    this.logger.info(`[${key}] Audio consumer starting: recording=${state.isRecording}, active=${state.isActive}`);

    try {
      while (state.isActive && state.isRecording) {
        const current = this.now();
        if (
          state.recordingStartTime !== null &&
          current - state.recordingStartTime > state.maxRecordingSeconds * 1000
        ) {
          this.logger.warn(`[${key}] Recording time limit reached`);
          state.lastError = `Recording time limit of ${state.maxRecordingSeconds}s reached`;
          state.isRecording = false;
          break;
        }

        const depth = state.audioQueue.size;
        this.recordDepth(depth);

        if (depth > this.config.emergencyDrainDepth) {
          this.stats.queueOverflows++;
          const drainCount = Math.min(depth - this.config.emergencyDrainTarget, this.config.emergencyDrainMaxItems);
          const drained = state.audioQueue.drain(drainCount);
          // Batched items were dequeued earlier, so they go first.
          await this.flushItems([...batch, ...drained], true);
          batch = [];
          lastFlushAt = this.now();
          continue;
        }

        if (depth > this.config.consumerWarnDepth) {
          this.stats.queueWarnings++;
        }

        const item = await state.audioQueue.take(this.dequeueTimeout(depth));
        if (item) {
          batch.push(item);
          const shouldFlush =
            batch.length >= this.config.maxBatchItems ||
            depth > this.config.batchFlushDepth ||
            this.now() - lastFlushAt > this.config.batchTimeoutMs;

          if (shouldFlush && state.isRecording) {
            await this.flushItems(batch, false);
            batch = [];
            lastFlushAt = this.now();
          }
        } else if (batch.length > 0 && state.isRecording) {
          await this.flushItems(batch, false);
          batch = [];
          lastFlushAt = this.now();
        }
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[${key}] Fatal error in consumer loop: ${message}`);
      state.lastError = message;
      state.isRecording = false;
    } finally {
      // Everything still pending goes out once, in arrival order.
      try {
        const remaining = [...batch, ...state.audioQueue.drain()];
        if (remaining.length > 0 || state.audioBuffer.length > 0) {
          await this.flushItems(remaining, true);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`[${key}] Error processing final batch: ${message}`);
      }

      const elapsed = (this.now() - startedAt) / 1000;
      this.logger.info(`[${key}] Audio consumer stopped`);
      this.logger.info(`METRICS: consumer_final ${this.formatStats()}`);
      this.logger.info(`TIMING: consumer loop completed in ${elapsed.toFixed(2)}s`);
    }

    return { ...this.stats };
  }

  /** Shorter waits while the queue is backing up, a relaxed wait when it is empty. */
  private dequeueTimeout(depth: number): number {
    if (depth > this.config.fastDequeueDepth) return this.config.dequeueTimeoutFastMs;
    if (depth > this.config.normalDequeueDepth) return this.config.dequeueTimeoutNormalMs;
    return this.config.dequeueTimeoutIdleMs;
  }

  private recordDepth(depth: number): void {
    this.depthSamples++;
    this.depthTotal += depth;
    this.stats.avgQueueDepth = this.depthTotal / this.depthSamples;
  }

  private async flushItems(items: Float32Array[], force: boolean): Promise<void> {
    const state = this.session.streaming;
    for (const item of items) {
      for (let i = 0; i < item.length; i++) {
        state.audioBuffer.push(item[i]);
      }
    }
    this.stats.itemsConsumed += items.length;

    const { written, failed } = await processAudioBuffer(
      state,
      this.config.windowSamples,
      force,
      this.logger,
      this.session.key,
    );
    this.stats.windowsWritten += written;
    this.stats.writeErrors += failed;

    if (items.length === 0) return;
    this.stats.batchesSent++;
    if (this.stats.batchesSent % this.config.performanceLogEveryBatches === 0) {
      this.logger.info(`METRICS: consumer_performance ${this.formatStats()}`);
    }
  }

  private formatStats(): string {
    const s = this.stats;
    return (
      `session=${this.session.key} items_consumed=${s.itemsConsumed} batches_sent=${s.batchesSent} ` +
      `windows_written=${s.windowsWritten} write_errors=${s.writeErrors} ` +
      `avg_queue_depth=${s.avgQueueDepth.toFixed(1)} overflows=${s.queueOverflows} queue_warnings=${s.queueWarnings}`
    );
  }
}
