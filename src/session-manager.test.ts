/**
 * Unit tests for session-manager.ts
 */

import { describe, it, expect, vi } from "vitest";
import { DEFAULT_STREAMING_CONFIG, type StreamingConfig } from "./config.js";
import { silentLogger } from "./logger.js";
import { SessionManager } from "./session-manager.js";
import { FakeRecognizerFactory } from "./testing/fake-recognizer.js";
import { makeFragment } from "./testing/fragments.js";
import { RecordingPhase } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function createManager(overrides: Partial<StreamingConfig> = {}, now?: () => number) {
  const factory = new FakeRecognizerFactory();
  const onRecordingEnded = vi.fn();
  const manager = new SessionManager({
    recognizerFactory: factory,
    config: {
      ...DEFAULT_STREAMING_CONFIG,
      retryDelayMs: 0,
      stopGraceMs: 0,
      dequeueTimeoutFastMs: 5,
      dequeueTimeoutNormalMs: 5,
      dequeueTimeoutIdleMs: 5,
      ...overrides,
    },
    logger: silentLogger,
    onRecordingEnded,
    now,
  });
  return { manager, factory, onRecordingEnded };
}

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

// ─── Sessions ───────────────────────────────────────────────────────────────────

describe("SessionManager", () => {
  it("creates sessions under fresh v4 keys", () => {
    const { manager } = createManager();
    const a = manager.createSession();
    const b = manager.createSession();

    expect(a).toMatch(UUID_V4);
    expect(b).not.toBe(a);
    expect(manager.sessionCount).toBe(2);
    expect(manager.getSession(a)?.streaming.phase).toBe(RecordingPhase.IDLE);
  });

  it("records, routes frames by key and returns the consolidated transcript", async () => {
    const { manager, factory } = createManager();
    const key = manager.createSession();
    const other = manager.createSession();

    expect((await manager.startRecording(key)).success).toBe(true);
    expect(manager.recordingCount).toBe(1);

    const frame = { sampleRate: 16000, samples: new Float32Array(160).fill(0.5) };
    expect(manager.queueAudioFrame(key, frame).queued).toBe(true);
    expect(manager.queueAudioFrame(other, frame)).toEqual({ queued: false, reason: "not_recording" });
    expect(manager.queueAudioFrame("missing", frame)).toEqual({ queued: false, reason: "session_not_found" });

    const recognizer = factory.latest;
    recognizer?.events.onPartial("good mor");
    expect(manager.getPartialText(key)).toBe("good mor");
    recognizer?.events.onFinal(makeFragment({ text: "Good morning." }));
    expect(manager.getPartialText(key)).toBe("Good morning.");

    const result = await manager.stopRecording(key);
    expect(result.success).toBe(true);
    expect(result.transcript).toBe("Good morning.");
    expect(manager.recordingCount).toBe(0);
    expect(recognizer?.samples).toHaveLength(160);
  });

  it("creates the session when recording starts under an unknown key", async () => {
    const { manager } = createManager();
    expect((await manager.startRecording("client-chosen")).success).toBe(true);
    expect(manager.getSession("client-chosen")).toBeDefined();
    await manager.stopRecording("client-chosen");
  });

  it("reports unknown sessions", async () => {
    const { manager } = createManager();
    expect(await manager.stopRecording("missing")).toEqual({
      success: false,
      transcript: "Session not found",
      report: null,
      errorKind: "SessionNotFound",
    });
    expect(manager.getPartialText("missing")).toBe("");
    expect(manager.healthCheck("missing")).toEqual({ healthy: false, reason: "session not found" });
  });

  // ─── Sweep ────────────────────────────────────────────────────────────────────

  describe("sweep", () => {
    it("force-stops unhealthy recordings and reports their results", async () => {
      const { manager, onRecordingEnded } = createManager({ maxChunksProcessed: 3 });
      const key = manager.createSession();
      await manager.startRecording(key);
      const session = manager.getSession(key);
      if (session) session.streaming.chunksProcessed = 4;

      const { stopped, evicted } = await manager.sweep();

      expect(stopped).toEqual([key]);
      expect(evicted).toEqual([]);
      expect(session?.streaming.phase).toBe(RecordingPhase.IDLE);
      expect(onRecordingEnded).toHaveBeenCalledTimes(1);
      expect(onRecordingEnded).toHaveBeenCalledWith(
        key,
        expect.objectContaining({ success: false, errorKind: "NoSpeechDetected" }),
      );
    });

    it("leaves healthy recordings alone", async () => {
      const { manager } = createManager();
      const key = manager.createSession();
      await manager.startRecording(key);

      expect(await manager.sweep()).toEqual({ stopped: [], evicted: [] });
      expect(manager.getSession(key)?.streaming.phase).toBe(RecordingPhase.RECORDING);
      await manager.stopRecording(key);
    });

    it("evicts sessions idle past the limit", async () => {
      let clock = 0;
      const { manager } = createManager({}, () => clock);
      const stale = manager.createSession();
      clock = 1_000_000;
      const fresh = manager.createSession();

      clock = 1_800_001;
      const { evicted } = await manager.sweep();

      expect(evicted).toEqual([stale]);
      expect(manager.getSession(stale)).toBeUndefined();
      expect(manager.getSession(fresh)).toBeDefined();
    });
  });

  // ─── Teardown ─────────────────────────────────────────────────────────────────

  describe("removeSession", () => {
    it("stops an active recording before forgetting the session", async () => {
      const { manager, factory } = createManager();
      const key = manager.createSession();
      await manager.startRecording(key);

      expect(await manager.removeSession(key)).toBe(true);
      expect(factory.latest?.stopped).toBe(true);
      expect(factory.latest?.closed).toBe(true);
      expect(manager.sessionCount).toBe(0);
    });

    it("returns false for an unknown key", async () => {
      const { manager } = createManager();
      expect(await manager.removeSession("missing")).toBe(false);
    });
  });

  it("shutdown releases every session", async () => {
    const { manager, factory } = createManager();
    const a = manager.createSession();
    manager.createSession();
    await manager.startRecording(a);

    await manager.shutdown();

    expect(manager.sessionCount).toBe(0);
    expect(factory.created.every((r) => r.closed)).toBe(true);
  });
});
