/**
 * Unit tests for question-bank.ts
 */

import { describe, it, expect } from "vitest";
import { JsonQuestionBank, loadQuestionBank, parseQuestionSets } from "./question-bank.js";
import { SAMPLE_QUESTIONS } from "./testing/ielts.js";

const OTHER_SET = {
  part1: { topic: "Music", questions: ["Do you play an instrument?"] },
  part2: { topic: "Describe a concert", cueCard: "Say where it was." },
  part3: { topic: "Culture", questions: ["Is live music important?"] },
};

describe("JsonQuestionBank", () => {
  it("picks a set with the injected random source", () => {
    expect(new JsonQuestionBank([SAMPLE_QUESTIONS, OTHER_SET], () => 0).getRandomTest()).toEqual(SAMPLE_QUESTIONS);
    expect(new JsonQuestionBank([SAMPLE_QUESTIONS, OTHER_SET], () => 0.99).getRandomTest()).toEqual(OTHER_SET);
  });

  it("hands out copies that callers cannot use to change the bank", () => {
    const bank = new JsonQuestionBank([SAMPLE_QUESTIONS], () => 0);
    const first = bank.getRandomTest();
    first.part1.questions.push("Injected?");

    expect(bank.getRandomTest().part1.questions).toEqual(["Do you like rainy days?", "What is the weather like today?"]);
  });

  it("rejects an empty bank", () => {
    expect(() => new JsonQuestionBank([])).toThrow("Question bank is empty");
  });
});

describe("parseQuestionSets", () => {
  it("parses valid question sets", () => {
    expect(parseQuestionSets(JSON.stringify([OTHER_SET]))).toEqual([OTHER_SET]);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseQuestionSets("{nope")).toThrow("Question file is not valid JSON");
  });

  it("names the first invalid field", () => {
    const broken = { ...OTHER_SET, part2: { topic: "Describe a concert" } };
    expect(() => parseQuestionSets(JSON.stringify([broken]))).toThrow("Invalid question file at 0.part2.cueCard");
  });

  it("rejects a part with no questions", () => {
    const broken = { ...OTHER_SET, part3: { topic: "Culture", questions: [] } };
    expect(() => parseQuestionSets(JSON.stringify([broken]))).toThrow("Invalid question file at 0.part3.questions");
  });

  it("rejects an empty file", () => {
    expect(() => parseQuestionSets("[]")).toThrow("Invalid question file at <root>");
  });
});

describe("loadQuestionBank", () => {
  it("loads the bundled question file", () => {
    const bank = loadQuestionBank(new URL("../data/ielts-questions.json", import.meta.url));
    expect(bank.size).toBe(3);
  });
});
