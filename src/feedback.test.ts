/**
 * Unit tests for feedback.ts
 */

import { describe, it, expect } from "vitest";
import { findActionableFeedbackPoint, formatFeedbackTip } from "./feedback.js";
import { makeReport } from "./testing/fragments.js";

describe("findActionableFeedbackPoint", () => {
  it("picks the lowest-scoring phoneme below the threshold", () => {
    const report = makeReport({
      text: "I think so.",
      words: [
        { word: "i", phonemes: [["ay", 95]] },
        { word: "think", phonemes: [["th", 42], ["ih", 55], ["ng", 80], ["k", 90]] },
        { word: "so", phonemes: [["s", 58], ["ow", 88]] },
      ],
    });

    expect(findActionableFeedbackPoint([report])).toEqual({
      word: "think",
      phoneme: "th",
      accuracyScore: 42,
      sentence: "I think so.",
    });
  });

  it("returns null when every phoneme meets the threshold", () => {
    const report = makeReport({ text: "Good morning.", words: [{ word: "good", phonemes: [["g", 60]] }] });
    expect(findActionableFeedbackPoint([report])).toBeNull();
    expect(findActionableFeedbackPoint([report], 61)).toEqual({
      word: "good",
      phoneme: "g",
      accuracyScore: 60,
      sentence: "Good morning.",
    });
  });

  it("looks across reports and keeps the earliest point on ties", () => {
    const first = makeReport({ text: "Very well.", words: [{ word: "very", phonemes: [["v", 30]] }] });
    const second = makeReport({ text: "Three trees.", words: [{ word: "three", phonemes: [["th", 30]] }] });

    expect(findActionableFeedbackPoint([first, second])?.sentence).toBe("Very well.");
    expect(findActionableFeedbackPoint([second, first])?.sentence).toBe("Three trees.");
  });

  it("skips missing reports", () => {
    const report = makeReport({ text: "Yes.", words: [{ word: "yes", phonemes: [["y", 20]] }] });
    expect(findActionableFeedbackPoint([null, undefined, report])?.phoneme).toBe("y");
    expect(findActionableFeedbackPoint([null, undefined])).toBeNull();
    expect(findActionableFeedbackPoint([])).toBeNull();
  });
});

describe("formatFeedbackTip", () => {
  it("names the sentence, sound, word and rounded score", () => {
    expect(
      formatFeedbackTip({ word: "think", phoneme: "th", accuracyScore: 41.6, sentence: "I think so." }),
    ).toBe('In "I think so.", the "th" sound in "think" scored 42/100.');
  });
});
