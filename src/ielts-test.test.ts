/**
 * Unit tests for ielts-test.ts
 */

import { describe, it, expect } from "vitest";
import { IeltsTest, NOT_IN_PROGRESS_MESSAGE, calculateOverallBandScore } from "./ielts-test.js";
import { SAMPLE_QUESTIONS } from "./testing/ielts.js";
import { makeReport } from "./testing/fragments.js";
import { IeltsPhase } from "./types.js";

function answerAll(test: IeltsTest, count: number): void {
  for (let i = 0; i < count; i++) {
    test.recordAnswer(`answer ${i}`, null);
  }
}

describe("IeltsTest", () => {
  it("opens on the first part 1 question", () => {
    const test = new IeltsTest(SAMPLE_QUESTIONS);
    expect(test.phase).toBe(IeltsPhase.IN_PROGRESS);
    expect(test.currentPrompt).toEqual({
      part: 1,
      topic: "Weather",
      questionIndex: 0,
      question: "Do you like rainy days?",
    });
  });

  it("records an answer against the open question and moves on", () => {
    const test = new IeltsTest(SAMPLE_QUESTIONS);
    const report = makeReport({ text: "Yes I do." });

    expect(test.recordAnswer("Yes I do.", report)).toEqual({
      ok: true,
      kind: "question",
      prompt: { part: 1, topic: "Weather", questionIndex: 1, question: "What is the weather like today?" },
    });
    expect(test.answers[1]).toEqual([{ part: 1, question: "Do you like rainy days?", transcript: "Yes I do.", report }]);
  });

  it("ends the part after its last question and refuses further answers", () => {
    const test = new IeltsTest(SAMPLE_QUESTIONS);
    test.recordAnswer("Yes I do.", null);

    expect(test.recordAnswer("It is sunny.", null)).toEqual({ ok: true, kind: "part_ended", part: 1 });
    expect(test.phase).toBe(IeltsPhase.PART_ENDED);
    expect(test.recordAnswer("extra", null)).toEqual({ ok: false, message: NOT_IN_PROGRESS_MESSAGE });
    expect(test.answers[1]).toHaveLength(2);
  });

  it("gives part 2 a single cue-card turn", () => {
    const test = new IeltsTest(SAMPLE_QUESTIONS);
    answerAll(test, 2);

    expect(test.continueToNextPart()).toEqual({
      ok: true,
      kind: "question",
      prompt: {
        part: 2,
        topic: "Describe a park you enjoy",
        questionIndex: 0,
        question: "You should say where it is and why you go there.",
      },
    });
    expect(test.recordAnswer("The park near my flat.", null)).toEqual({ ok: true, kind: "part_ended", part: 2 });
  });

  it("walks through all three parts to completion", () => {
    const test = new IeltsTest(SAMPLE_QUESTIONS);
    answerAll(test, 2);
    test.continueToNextPart();
    answerAll(test, 1);

    expect(test.continueToNextPart()).toEqual({
      ok: true,
      kind: "question",
      prompt: { part: 3, topic: "Cities", questionIndex: 0, question: "Do cities need more parks?" },
    });
    answerAll(test, 2);
    expect(test.phase).toBe(IeltsPhase.PART_ENDED);

    expect(test.continueToNextPart()).toEqual({ ok: true, kind: "completed" });
    expect(test.phase).toBe(IeltsPhase.TEST_COMPLETED);
    expect(test.answers[3].map((a) => a.question)).toEqual(["Do cities need more parks?", "How will cities change?"]);
  });

  it("refuses to continue before the part has ended", () => {
    const test = new IeltsTest(SAMPLE_QUESTIONS);
    expect(test.continueToNextPart()).toEqual({ ok: false, message: "Part 1 has not ended yet" });

    answerAll(test, 2);
    test.phase = IeltsPhase.GENERATING_FEEDBACK;
    expect(test.continueToNextPart()).toEqual({ ok: false, message: "Wait for the feedback before continuing" });
  });

  it("formats the transcript per part", () => {
    const test = new IeltsTest(SAMPLE_QUESTIONS);
    test.recordAnswer("Yes.", null);
    test.recordAnswer("Sunny.", null);
    test.continueToNextPart();
    test.recordAnswer("A big park.", null);

    expect(test.partTranscript(1)).toBe(
      "Q: Do you like rainy days?\nA: Yes.\n\nQ: What is the weather like today?\nA: Sunny.",
    );
    expect(test.fullTranscript()).toBe(
      "--- Part 1 Answers ---\n" +
        "Q: Do you like rainy days?\nA: Yes.\n\nQ: What is the weather like today?\nA: Sunny." +
        "\n\n---\n\n" +
        "--- Part 2 Answers ---\n" +
        "Q: You should say where it is and why you go there.\nA: A big park.",
    );
  });

  it("has an empty transcript before any answer", () => {
    expect(new IeltsTest(SAMPLE_QUESTIONS).fullTranscript()).toBe("");
  });
});

describe("calculateOverallBandScore", () => {
  it("rounds the mean to the nearest half band", () => {
    expect(calculateOverallBandScore([6.5, 6, 6])).toBe(6);
    expect(calculateOverallBandScore([7, 7, 6])).toBe(6.5);
  });

  it("rounds a quarter band up", () => {
    expect(calculateOverallBandScore([6, 6.5])).toBe(6.5);
    expect(calculateOverallBandScore([6.5, 7])).toBe(7);
  });

  it("is 0 with no scores", () => {
    expect(calculateOverallBandScore([])).toBe(0);
  });
});
