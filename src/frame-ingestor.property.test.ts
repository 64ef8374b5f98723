/**
 * Property-based tests for the frame ingestor: queue bound and routing.
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { DEFAULT_STREAMING_CONFIG } from "./config.js";
import { FrameIngestor } from "./frame-ingestor.js";
import { silentLogger } from "./logger.js";
import { SessionRegistry } from "./session-registry.js";

const frameArb = fc.record({
  session: fc.constantFrom("a", "b", "c"),
  sampleRate: fc.constantFrom(8000, 16000, 22050, 44100, 48000),
  length: fc.integer({ min: 0, max: 1200 }),
  amplitude: fc.constantFrom(0, 0.005, 0.02, 0.5, 1),
  // Occasionally let the consumer catch up.
  consume: fc.integer({ min: 0, max: 3 }),
});

describe("FrameIngestor properties", () => {
  it("never grows a queue past its capacity and only feeds recording sessions", () => {
    fc.assert(
      fc.property(fc.array(frameArb, { maxLength: 150 }), (frames) => {
        const config = DEFAULT_STREAMING_CONFIG;
        const registry = new SessionRegistry(config, silentLogger);
        const ingestor = new FrameIngestor(registry, config, silentLogger);

        // "a" and "b" record; "c" exists but is idle.
        for (const key of ["a", "b", "c"]) registry.getOrCreate(key);
        for (const key of ["a", "b"]) {
          const state = registry.get(key)?.streaming;
          if (state) {
            state.isRecording = true;
            state.isActive = true;
          }
        }

        const queuedPerSession = new Map<string, number>();
        for (const f of frames) {
          const outcome = ingestor.ingest(f.session, {
            sampleRate: f.sampleRate,
            samples: new Float32Array(f.length).fill(f.amplitude),
          });
          if (outcome.queued) {
            queuedPerSession.set(f.session, (queuedPerSession.get(f.session) ?? 0) + 1);
            expect(outcome.samples).toBeGreaterThan(0);
          }

          const state = registry.get(f.session)?.streaming;
          if (state) {
            expect(state.audioQueue.size).toBeLessThanOrEqual(config.queueCapacity);
            state.audioQueue.drain(f.consume);
          }
        }

        expect(queuedPerSession.get("c") ?? 0).toBe(0);
        expect(registry.get("c")?.streaming.audioQueue.size).toBe(0);
      }),
    );
  });
});
