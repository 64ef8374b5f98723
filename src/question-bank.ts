// Speaking Coach - IELTS question bank
// Question sets are data: a JSON file validated on load. The test flow only
// sees the QuestionBank interface.

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { IeltsQuestionSet } from "./types.js";

export interface QuestionBank {
  /** A fresh copy of one complete test, chosen at random. */
  getRandomTest(): IeltsQuestionSet;
}

const questionListSchema = z.array(z.string().min(1)).min(1);

const questionSetSchema = z.object({
  part1: z.object({ topic: z.string().min(1), questions: questionListSchema }),
  part2: z.object({ topic: z.string().min(1), cueCard: z.string().min(1) }),
  part3: z.object({ topic: z.string().min(1), questions: questionListSchema }),
}) satisfies z.ZodType<IeltsQuestionSet>;

const questionFileSchema = z.array(questionSetSchema).min(1);

export class JsonQuestionBank implements QuestionBank {
  private readonly sets: readonly IeltsQuestionSet[];
  private readonly random: () => number;

  /**
   * @param random - returns a number in [0, 1); injectable for tests.
   * @throws Error if there are no question sets.
   */
  constructor(sets: readonly IeltsQuestionSet[], random: () => number = Math.random) {
    if (sets.length === 0) {
      throw new Error("Question bank is empty");
    }
    this.sets = sets;
    this.random = random;
  }

  get size(): number {
    return this.sets.length;
  }

  getRandomTest(): IeltsQuestionSet {
    const index = Math.min(this.sets.length - 1, Math.floor(this.random() * this.sets.length));
    return structuredClone(this.sets[index]);
  }
}

/**
 * Parse and validate question sets from JSON text.
 *
 * @throws Error naming the first invalid field.
 */
export function parseQuestionSets(text: string): IeltsQuestionSet[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new Error("Question file is not valid JSON");
  }
  const parsed = questionFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid question file at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
  }
  return parsed.data;
}

/** Load a JSON question file from disk. */
export function loadQuestionBank(path: string | URL): JsonQuestionBank {
  return new JsonQuestionBank(parseQuestionSets(readFileSync(path, "utf-8")));
}
