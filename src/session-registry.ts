// Speaking Coach - Session registry
// Map from session key to session state, shared by the request handlers and
// the frame-delivery path.
//
// Every method is synchronous and O(1) or O(sessions), so on the single JS
// thread each call runs to completion without interleaving; that is the
// mutual exclusion. Nothing here may await recognizer or queue I/O.

import type { StreamingConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { StreamingSessionState } from "./session-state.js";

export class SessionRegistry {
  private sessions: Map<string, StreamingSessionState> = new Map();
  private readonly config: StreamingConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: StreamingConfig, logger: Logger, now: () => number = Date.now) {
    this.config = config;
    this.logger = logger;
    this.now = now;
  }

  /** Look up a session, creating it on a miss. Never fails. */
  getOrCreate(key: string): StreamingSessionState {
    const existing = this.sessions.get(key);
    if (existing) {
      existing.touch(this.now());
      return existing;
    }

    const session = new StreamingSessionState(key, this.config, this.now());
    this.sessions.set(key, session);
    this.logger.info(`Created session ${key}`);
    this.logger.info(`METRICS: sessions_total=${this.sessions.size}`);
    return session;
  }

  get(key: string): StreamingSessionState | undefined {
    return this.sessions.get(key);
  }

  /**
   * Remove a session without touching its resources. Callers that may still
   * hold a recognizer should stop the recording first.
   */
  remove(key: string): boolean {
    const removed = this.sessions.delete(key);
    if (removed) {
      this.logger.info(`Removed session ${key}`);
      this.logger.info(`METRICS: sessions_total=${this.sessions.size}`);
    }
    return removed;
  }

  /** Keys of sessions that are recording and still hold their resources. */
  listActiveRecording(): string[] {
    const keys: string[] = [];
    for (const [key, session] of this.sessions) {
      if (session.streaming.isRecording && session.streaming.isActive) {
        keys.push(key);
      }
    }
    return keys;
  }

  /**
   * Release resources of, and remove, every session not touched within
   * `maxAgeSeconds`. Returns the evicted keys.
   */
  evictOlderThan(maxAgeSeconds: number): string[] {
    const cutoff = this.now() - maxAgeSeconds * 1000;
    const evicted: string[] = [];

    for (const [key, session] of this.sessions) {
      if (session.lastSeenAt >= cutoff) continue;

      const closeError = session.releaseStreamingResources();
      if (closeError) {
        this.logger.error(`Error releasing resources of session ${key}: ${closeError}`);
      }
      this.sessions.delete(key);
      evicted.push(key);
    }

    if (evicted.length > 0) {
      this.logger.info(`Evicted ${evicted.length} idle session(s): ${evicted.join(", ")}`);
      this.logger.info(`METRICS: sessions_total=${this.sessions.size}`);
    }
    return evicted;
  }

  get size(): number {
    return this.sessions.size;
  }

  keys(): string[] {
    return [...this.sessions.keys()];
  }
}
