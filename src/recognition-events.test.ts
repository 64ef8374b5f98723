/**
 * Unit tests for recognition-events.ts
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_STREAMING_CONFIG } from "./config.js";
import { silentLogger } from "./logger.js";
import { createRecognitionEventHandler } from "./recognition-events.js";
import { StreamingState } from "./session-state.js";
import { makeFragment } from "./testing/fragments.js";

function activeState(generation = 1): StreamingState {
  const state = new StreamingState(DEFAULT_STREAMING_CONFIG);
  state.generation = generation;
  state.isActive = true;
  state.isRecording = true;
  return state;
}

describe("createRecognitionEventHandler", () => {
  it("overwrites the partial-text slot on each partial event", () => {
    const state = activeState();
    const events = createRecognitionEventHandler(state, 1, "k", silentLogger);
    events.onPartial("hel");
    events.onPartial("hello wor");
    expect(state.currentPartialText).toBe("hello wor");
  });

  it("appends final fragments in emission order and mirrors their text", () => {
    const state = activeState();
    const events = createRecognitionEventHandler(state, 1, "k", silentLogger);
    const first = makeFragment({ text: "Hello there." });
    const second = makeFragment({ text: "  How are you?  " });
    events.onFinal(first);
    events.onFinal(second);

    expect(state.fragments).toEqual([first, second]);
    expect(state.currentPartialText).toBe("How are you?");
  });

  it("keeps the previous partial text when a final has no display text", () => {
    const state = activeState();
    const events = createRecognitionEventHandler(state, 1, "k", silentLogger);
    events.onPartial("so far");
    events.onFinal({ RecognitionStatus: "Success" });
    expect(state.currentPartialText).toBe("so far");
    expect(state.fragments).toHaveLength(1);
  });

  it("records no-match details without stopping the recording", () => {
    const state = activeState();
    const events = createRecognitionEventHandler(state, 1, "k", silentLogger);
    events.onNoMatch("No match: InitialSilenceTimeout");
    expect(state.lastError).toBe("No match: InitialSilenceTimeout");
    expect(state.isRecording).toBe(true);
  });

  it("stops the recording on cancellation and wakes the consumer", async () => {
    const state = activeState();
    const events = createRecognitionEventHandler(state, 1, "k", silentLogger);
    const waiting = state.audioQueue.take(10_000);

    events.onCanceled("Connection was closed by the remote host");

    expect(state.isRecording).toBe(false);
    expect(state.canceled).toBe(true);
    expect(state.lastError).toBe("Connection was closed by the remote host");
    expect(await waiting).toBeNull();
  });

  it("uses a default message for a cancellation without details", () => {
    const state = activeState();
    createRecognitionEventHandler(state, 1, "k", silentLogger).onCanceled("");
    expect(state.lastError).toBe("Recognition canceled");
  });

  describe("stale events", () => {
    it("ignores events bound to an older generation", () => {
      const state = activeState(2);
      const stale = createRecognitionEventHandler(state, 1, "k", silentLogger);

      stale.onPartial("old");
      stale.onFinal(makeFragment({ text: "Old words." }));
      stale.onCanceled("late cancel");

      expect(state.currentPartialText).toBe("");
      expect(state.fragments).toEqual([]);
      expect(state.isRecording).toBe(true);
      expect(state.canceled).toBe(false);
    });

    it("ignores events once resources are released", () => {
      const state = activeState();
      const events = createRecognitionEventHandler(state, 1, "k", silentLogger);
      state.isActive = false;

      events.onFinal(makeFragment({ text: "Too late." }));
      expect(state.fragments).toEqual([]);
    });
  });
});
