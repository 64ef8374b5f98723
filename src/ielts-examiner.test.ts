/**
 * Unit tests for ielts-examiner.ts
 */

import { describe, it, expect, vi } from "vitest";
import type { OpenAIClient } from "./conversation-coach.js";
import { IeltsExaminer } from "./ielts-examiner.js";
import { IeltsTest } from "./ielts-test.js";
import { silentLogger } from "./logger.js";
import { FINAL_REPORT_REPLY, PART_FEEDBACK_REPLY, SAMPLE_QUESTIONS } from "./testing/ielts.js";
import { IeltsPhase } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function createChatClient(...contents: Array<string | null>) {
  const create = vi.fn();
  for (const content of contents) {
    create.mockResolvedValueOnce({ choices: [{ message: { content } }] });
  }
  const client: OpenAIClient = { chat: { completions: { create } } };
  return { client, create };
}

function testAfterPartOne(): IeltsTest {
  const test = new IeltsTest(SAMPLE_QUESTIONS);
  test.recordAnswer("Yes I do.", null);
  test.recordAnswer("It is sunny.", null);
  return test;
}

function completedTest(): IeltsTest {
  const test = testAfterPartOne();
  test.continueToNextPart();
  test.recordAnswer("The park near my flat.", null);
  test.continueToNextPart();
  test.recordAnswer("Yes, more parks.", null);
  test.recordAnswer("They will grow.", null);
  test.continueToNextPart();
  return test;
}

const EXPECTED_CRITERION = { strength: "Clear ideas", improvementArea: "Link sentences" };

// ─── Part feedback ──────────────────────────────────────────────────────────────

describe("IeltsExaminer.partFeedback", () => {
  it("sends the part's answers and maps the reply", async () => {
    const { client, create } = createChatClient(PART_FEEDBACK_REPLY);
    const examiner = new IeltsExaminer(client, { model: "test-model", logger: silentLogger });
    const test = testAfterPartOne();

    const result = await examiner.partFeedback(test, "s1");

    expect(result).toEqual({
      ok: true,
      value: {
        part: 1,
        positiveHighlight: "Relevant answers",
        keyImprovementArea: "Extend your answers",
        fluencyAndCoherence: EXPECTED_CRITERION,
        lexicalResource: EXPECTED_CRITERION,
        grammaticalRangeAndAccuracy: EXPECTED_CRITERION,
        pronunciation: EXPECTED_CRITERION,
      },
    });
    expect(test.phase).toBe(IeltsPhase.PART_ENDED);

    const params = create.mock.calls[0][0];
    expect(params.model).toBe("test-model");
    expect(params.response_format).toEqual({ type: "json_object" });
    expect(params.messages[1]).toEqual({
      role: "user",
      content: "Part 1\n\nQ: Do you like rainy days?\nA: Yes I do.\n\nQ: What is the weather like today?\nA: It is sunny.",
    });
  });

  it("returns cached feedback without asking again", async () => {
    const { client, create } = createChatClient(PART_FEEDBACK_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = testAfterPartOne();

    const first = await examiner.partFeedback(test, "s1");
    const second = await examiner.partFeedback(test, "s1");

    expect(second).toEqual(first);
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("is unavailable while a part is still in progress", async () => {
    const { client, create } = createChatClient(PART_FEEDBACK_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });

    expect(await examiner.partFeedback(new IeltsTest(SAMPLE_QUESTIONS), "s1")).toEqual({
      ok: false,
      message: "Feedback is available once a part has ended",
    });
    expect(create).not.toHaveBeenCalled();
  });

  it("refuses a second request while the first is being generated", async () => {
    const { client } = createChatClient(PART_FEEDBACK_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = testAfterPartOne();

    const first = examiner.partFeedback(test, "s1");
    expect(test.phase).toBe(IeltsPhase.GENERATING_FEEDBACK);
    expect(await examiner.partFeedback(test, "s1")).toEqual({
      ok: false,
      message: "Feedback is already being generated",
    });
    expect((await first).ok).toBe(true);
  });

  it("reports a reply that does not match the expected shape and lets the part be retried", async () => {
    const { client } = createChatClient(JSON.stringify({ positive_highlight: "Good" }), PART_FEEDBACK_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = testAfterPartOne();

    expect(await examiner.partFeedback(test, "s1")).toEqual({
      ok: false,
      message: "Could not generate feedback, please try again",
    });
    expect(test.phase).toBe(IeltsPhase.PART_ENDED);
    expect(test.feedback.size).toBe(0);

    expect((await examiner.partFeedback(test, "s1")).ok).toBe(true);
  });

  it("treats an empty or non-JSON reply as a failure", async () => {
    const { client } = createChatClient(null, "not json");
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = testAfterPartOne();

    expect((await examiner.partFeedback(test, "s1")).ok).toBe(false);
    expect((await examiner.partFeedback(test, "s1")).ok).toBe(false);
  });
});

// ─── Final report ───────────────────────────────────────────────────────────────

describe("IeltsExaminer.finalReport", () => {
  it("recomputes the overall band from the criterion scores", async () => {
    const { client } = createChatClient(FINAL_REPORT_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = completedTest();

    const result = await examiner.finalReport(test, "s1");

    expect(result).toEqual({
      ok: true,
      value: {
        fluencyAndCoherence: { score: 6.5, justification: "Mostly fluent" },
        lexicalResource: { score: 6, justification: "Adequate range" },
        grammaticalRangeAndAccuracy: { score: 6, justification: "Some errors" },
        overallBandScore: 6,
        summary: "A solid performance.",
        recommendations: ["Use more linking words"],
      },
    });
    expect(test.phase).toBe(IeltsPhase.TEST_COMPLETED);
  });

  it("includes earlier part feedback in the request", async () => {
    const { client, create } = createChatClient(PART_FEEDBACK_REPLY, FINAL_REPORT_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = testAfterPartOne();
    await examiner.partFeedback(test, "s1");
    test.continueToNextPart();
    test.recordAnswer("The park near my flat.", null);
    test.continueToNextPart();
    test.recordAnswer("Yes, more parks.", null);
    test.recordAnswer("They will grow.", null);
    test.continueToNextPart();

    await examiner.finalReport(test, "s1");

    const content: string = create.mock.calls[1][0].messages[1].content;
    expect(content.startsWith("Transcript:\n--- Part 1 Answers ---\n")).toBe(true);
    expect(content.endsWith(
      "Feedback given during the test:\nPart 1: highlight: Relevant answers; improve: Extend your answers",
    )).toBe(true);
  });

  it("is cached once generated", async () => {
    const { client, create } = createChatClient(FINAL_REPORT_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = completedTest();

    await examiner.finalReport(test, "s1");
    const again = await examiner.finalReport(test, "s1");

    expect(again.ok).toBe(true);
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("is unavailable before the test is completed", async () => {
    const { client } = createChatClient(FINAL_REPORT_REPLY);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });

    expect(await examiner.finalReport(testAfterPartOne(), "s1")).toEqual({
      ok: false,
      message: "The final report is available once all three parts are completed",
    });
  });

  it("rejects criterion scores outside the band range", async () => {
    const reply = JSON.stringify({
      fluency_and_coherence: { score: 11, justification: "?" },
      lexical_resource: { score: 6, justification: "" },
      grammatical_range_and_accuracy: { score: 6, justification: "" },
      summary: "",
    });
    const { client } = createChatClient(reply);
    const examiner = new IeltsExaminer(client, { logger: silentLogger });
    const test = completedTest();

    expect(await examiner.finalReport(test, "s1")).toEqual({
      ok: false,
      message: "Could not generate the final report, please try again",
    });
    expect(test.finalReport).toBeNull();
  });
});
