// Speaking Coach - IELTS examiner
// Asks the chat model for structured feedback on one finished part and for
// the final band-score report. Replies are JSON, validated with zod and
// mapped to camelCase. Both results are cached on the test, and the overall
// band is always recomputed from the criterion scores.

import { z } from "zod";
import type { OpenAIClient } from "./conversation-coach.js";
import { calculateOverallBandScore, type IeltsTest } from "./ielts-test.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import { IeltsPhase, type CriterionFeedback, type IeltsFinalReport, type IeltsPartFeedback } from "./types.js";

export type ExaminerResult<T> = { ok: true; value: T } | { ok: false; message: string };

export interface IeltsExaminerOptions {
  model?: string;
  logger?: Logger;
}

// ─── LLM reply schemas ──────────────────────────────────────────────────────────

const criterionFeedbackSchema = z.object({
  strength: z.string(),
  improvement_area: z.string(),
});

const partFeedbackSchema = z.object({
  positive_highlight: z.string(),
  key_improvement_area: z.string(),
  fluency_and_coherence: criterionFeedbackSchema,
  lexical_resource: criterionFeedbackSchema,
  grammatical_range_and_accuracy: criterionFeedbackSchema,
  pronunciation: criterionFeedbackSchema,
});

const criterionScoreSchema = z.object({
  score: z.number().min(0).max(9),
  justification: z.string(),
});

const finalReportSchema = z.object({
  fluency_and_coherence: criterionScoreSchema,
  lexical_resource: criterionScoreSchema,
  grammatical_range_and_accuracy: criterionScoreSchema,
  summary: z.string(),
  recommendations: z.array(z.string()).default([]),
});

// ─── Prompts ────────────────────────────────────────────────────────────────────

const PART_FEEDBACK_SYSTEM_PROMPT =
  "You are an experienced IELTS speaking examiner. Assess the candidate's answers for one part of the test. " +
  "Reply with a JSON object with the keys positive_highlight, key_improvement_area, fluency_and_coherence, " +
  "lexical_resource, grammatical_range_and_accuracy and pronunciation. Each of the last four is an object " +
  "with the keys strength and improvement_area. Pronunciation is inferred from the transcript only.";

const FINAL_REPORT_SYSTEM_PROMPT =
  "You are an experienced IELTS speaking examiner. Write the final report for a complete speaking test. " +
  "Reply with a JSON object with the keys fluency_and_coherence, lexical_resource and " +
  "grammatical_range_and_accuracy, each an object with a band score (0-9, in steps of 0.5) and a " +
  "justification, plus summary (a short paragraph) and recommendations (a list of short strings).";

export class IeltsExaminer {
  private readonly openai: OpenAIClient;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(openaiClient: OpenAIClient, options: IeltsExaminerOptions = {}) {
    this.openai = openaiClient;
    this.model = options.model ?? "gpt-4o-mini";
    this.logger = options.logger ?? createConsoleLogger("IeltsExaminer");
  }

  /** Feedback on the part that just ended. Available only between parts. */
  async partFeedback(test: IeltsTest, sessionKey: string): Promise<ExaminerResult<IeltsPartFeedback>> {
    if (test.phase === IeltsPhase.GENERATING_FEEDBACK) {
      return { ok: false, message: "Feedback is already being generated" };
    }
    if (test.phase !== IeltsPhase.PART_ENDED) {
      return { ok: false, message: "Feedback is available once a part has ended" };
    }

    const part = test.part;
    const cached = test.feedback.get(part);
    if (cached) {
      this.logger.info(`[${sessionKey}] Using cached feedback for part ${part}`);
      return { ok: true, value: cached };
    }
    if (test.answers[part].length === 0) {
      return { ok: false, message: "No answers were given in this part" };
    }

    test.phase = IeltsPhase.GENERATING_FEEDBACK;
    try {
      const raw = await this.complete(PART_FEEDBACK_SYSTEM_PROMPT, `Part ${part}\n\n${test.partTranscript(part)}`);
      const parsed = partFeedbackSchema.parse(raw);
      const feedback: IeltsPartFeedback = {
        part,
        positiveHighlight: parsed.positive_highlight,
        keyImprovementArea: parsed.key_improvement_area,
        fluencyAndCoherence: toCriterionFeedback(parsed.fluency_and_coherence),
        lexicalResource: toCriterionFeedback(parsed.lexical_resource),
        grammaticalRangeAndAccuracy: toCriterionFeedback(parsed.grammatical_range_and_accuracy),
        pronunciation: toCriterionFeedback(parsed.pronunciation),
      };
      test.feedback.set(part, feedback);
      return { ok: true, value: feedback };
    } catch (err) {
      this.logger.error(`[${sessionKey}] Part ${part} feedback failed: ${errorMessage(err)}`);
      return { ok: false, message: "Could not generate feedback, please try again" };
    } finally {
      test.phase = IeltsPhase.PART_ENDED;
    }
  }

  /** Band-score report over the whole test. Available once the test is completed. */
  async finalReport(test: IeltsTest, sessionKey: string): Promise<ExaminerResult<IeltsFinalReport>> {
    if (test.finalReport) {
      return { ok: true, value: test.finalReport };
    }
    if (test.phase === IeltsPhase.GENERATING_FEEDBACK) {
      return { ok: false, message: "Feedback is already being generated" };
    }
    if (test.phase !== IeltsPhase.TEST_COMPLETED) {
      return { ok: false, message: "The final report is available once all three parts are completed" };
    }

    test.phase = IeltsPhase.GENERATING_FEEDBACK;
    try {
      const raw = await this.complete(FINAL_REPORT_SYSTEM_PROMPT, buildFinalReportInput(test));
      const parsed = finalReportSchema.parse(raw);
      const report: IeltsFinalReport = {
        fluencyAndCoherence: parsed.fluency_and_coherence,
        lexicalResource: parsed.lexical_resource,
        grammaticalRangeAndAccuracy: parsed.grammatical_range_and_accuracy,
        overallBandScore: calculateOverallBandScore([
          parsed.fluency_and_coherence.score,
          parsed.lexical_resource.score,
          parsed.grammatical_range_and_accuracy.score,
        ]),
        summary: parsed.summary,
        recommendations: parsed.recommendations,
      };
      test.finalReport = report;
      this.logger.info(`[${sessionKey}] Final IELTS report: overall band ${report.overallBandScore}`);
      return { ok: true, value: report };
    } catch (err) {
      this.logger.error(`[${sessionKey}] Final report failed: ${errorMessage(err)}`);
      return { ok: false, message: "Could not generate the final report, please try again" };
    } finally {
      test.phase = IeltsPhase.TEST_COMPLETED;
    }
  }

  /** One JSON-mode completion, parsed. Throws on an empty or non-JSON reply. */
  private async complete(system: string, user: string): Promise<unknown> {
    const startedAt = Date.now();
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
      response_format: { type: "json_object" },
      temperature: 0.3,
    });
    this.logger.info(`TIMING: examiner reply generated in ${((Date.now() - startedAt) / 1000).toFixed(2)}s`);

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error("LLM returned empty response");
    }
    try {
      return JSON.parse(content);
    } catch {
      throw new Error(`Failed to parse LLM response as JSON: ${content.slice(0, 200)}`);
    }
  }
}

function toCriterionFeedback(raw: z.infer<typeof criterionFeedbackSchema>): CriterionFeedback {
  return { strength: raw.strength, improvementArea: raw.improvement_area };
}

/** Full transcript followed by the feedback already given per part, if any. */
function buildFinalReportInput(test: IeltsTest): string {
  const sections = [`Transcript:\n${test.fullTranscript()}`];
  const prior = [...test.feedback.values()].map(
    (feedback) =>
      `Part ${feedback.part}: highlight: ${feedback.positiveHighlight}; improve: ${feedback.keyImprovementArea}`,
  );
  if (prior.length > 0) {
    sections.push(`Feedback given during the test:\n${prior.join("\n")}`);
  }
  return sections.join("\n\n");
}
