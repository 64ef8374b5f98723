// Speaking Coach - IELTS test state machine
// Walks a candidate through the three parts of a speaking test. Parts 1 and 3
// are short questions answered one recording each; part 2 is a single long
// turn on a cue card. The test pauses after every part so feedback can be
// requested before continuing.

import {
  IeltsPhase,
  type ConsolidatedReport,
  type IeltsAnswer,
  type IeltsFinalReport,
  type IeltsPart,
  type IeltsPartFeedback,
  type IeltsPrompt,
  type IeltsQuestionSet,
} from "./types.js";

export type IeltsStep =
  | { ok: true; kind: "question"; prompt: IeltsPrompt }
  | { ok: true; kind: "part_ended"; part: IeltsPart }
  | { ok: true; kind: "completed" }
  | { ok: false; message: string };

export const NOT_IN_PROGRESS_MESSAGE = "IELTS test is not in progress";

export class IeltsTest {
  readonly questions: IeltsQuestionSet;
  phase: IeltsPhase = IeltsPhase.IN_PROGRESS;
  part: IeltsPart = 1;
  questionIndex = 0;
  readonly answers: Record<IeltsPart, IeltsAnswer[]> = { 1: [], 2: [], 3: [] };
  /** Feedback already generated, per part. */
  readonly feedback = new Map<IeltsPart, IeltsPartFeedback>();
  finalReport: IeltsFinalReport | null = null;

  constructor(questions: IeltsQuestionSet) {
    this.questions = questions;
  }

  get currentPrompt(): IeltsPrompt {
    if (this.part === 2) {
      const { topic, cueCard } = this.questions.part2;
      return { part: 2, topic, questionIndex: 0, question: cueCard };
    }
    const { topic, questions } = this.part === 1 ? this.questions.part1 : this.questions.part3;
    return { part: this.part, topic, questionIndex: this.questionIndex, question: questions[this.questionIndex] };
  }

  get isLastQuestionOfPart(): boolean {
    if (this.part === 2) return true;
    const questions = this.part === 1 ? this.questions.part1.questions : this.questions.part3.questions;
    return this.questionIndex >= questions.length - 1;
  }

  /** Store the answer to the current question and move to the next one, or end the part. */
  recordAnswer(transcript: string, report: ConsolidatedReport | null): IeltsStep {
    if (this.phase !== IeltsPhase.IN_PROGRESS) {
      return { ok: false, message: NOT_IN_PROGRESS_MESSAGE };
    }

    const prompt = this.currentPrompt;
    this.answers[this.part].push({ part: this.part, question: prompt.question, transcript, report });

    if (this.isLastQuestionOfPart) {
      this.phase = IeltsPhase.PART_ENDED;
      return { ok: true, kind: "part_ended", part: this.part };
    }
    this.questionIndex++;
    return { ok: true, kind: "question", prompt: this.currentPrompt };
  }

  /** Leave an ended part: open the next one, or complete the test after part 3. */
  continueToNextPart(): IeltsStep {
    if (this.phase === IeltsPhase.GENERATING_FEEDBACK) {
      return { ok: false, message: "Wait for the feedback before continuing" };
    }
    if (this.phase !== IeltsPhase.PART_ENDED) {
      return { ok: false, message: `Part ${this.part} has not ended yet` };
    }

    if (this.part === 3) {
      this.phase = IeltsPhase.TEST_COMPLETED;
      return { ok: true, kind: "completed" };
    }
    this.part = this.part === 1 ? 2 : 3;
    this.questionIndex = 0;
    this.phase = IeltsPhase.IN_PROGRESS;
    return { ok: true, kind: "question", prompt: this.currentPrompt };
  }

  /** Question and answer pairs of one part, blank-line separated. */
  partTranscript(part: IeltsPart): string {
    return this.answers[part].map((answer) => `Q: ${answer.question}\nA: ${answer.transcript}`).join("\n\n");
  }

  /** Every answered part under a "Part N" heading. Empty when nothing was answered. */
  fullTranscript(): string {
    const blocks: string[] = [];
    for (const part of [1, 2, 3] as const) {
      if (this.answers[part].length > 0) {
        blocks.push(`--- Part ${part} Answers ---\n${this.partTranscript(part)}`);
      }
    }
    return blocks.join("\n\n---\n\n");
  }
}

/** Mean band score rounded to the nearest half band; .25 and .75 round up. */
export function calculateOverallBandScore(scores: readonly number[]): number {
  if (scores.length === 0) return 0;
  const average = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return Math.round(average * 2) / 2;
}
