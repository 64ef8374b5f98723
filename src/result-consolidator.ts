// Speaking Coach - Result consolidation
// Merges the final recognizer fragments of one recording into a single
// transcript + pronunciation report.
//
// Word and phoneme scores are per-unit and additive across utterance
// segments, so they are concatenated unchanged. The aggregate scores of the
// primary result are recomputed as a word-count weighted average over the
// fragments instead of inheriting the first fragment's values.

import { z } from "zod";
import type { Logger } from "./logger.js";
import type { ConsolidatedReport, RecognitionFragment } from "./types.js";

// ─── Recognizer payload schema (detailed output + pronunciation assessment) ─────

const phonemeSchema = z.object({
  Phoneme: z.string(),
  PronunciationAssessment: z.object({
    AccuracyScore: z.number(),
    ErrorType: z.string().optional(),
  }),
});

const wordSchema = z.object({
  Word: z.string(),
  Offset: z.number().optional(),
  Duration: z.number().optional(),
  PronunciationAssessment: z.object({
    AccuracyScore: z.number(),
    ErrorType: z.string().optional(),
  }),
  Phonemes: z.array(phonemeSchema).default([]),
});

const pronunciationSchema = z.object({
  AccuracyScore: z.number(),
  FluencyScore: z.number(),
  CompletenessScore: z.number(),
  PronScore: z.number(),
  ProsodyScore: z.number().optional(),
});

const nbestSchema = z.object({
  Confidence: z.number(),
  Display: z.string(),
  PronunciationAssessment: pronunciationSchema,
  Words: z.array(wordSchema),
});

export const recognizerReportSchema = z
  .object({
    Id: z.string().default(""),
    RecognitionStatus: z.string().min(1),
    DisplayText: z.string(),
    Offset: z.number().default(0),
    Duration: z.number(),
    SNR: z.number().optional(),
    NBest: z.array(nbestSchema).min(1),
  })
  .superRefine((report, ctx) => {
    if (report.NBest[0].Words.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["NBest", 0, "Words"],
        message: "Primary result has no words",
      });
    }
  });

type RecognizerReport = z.infer<typeof recognizerReportSchema>;

export type ConsolidationOutcome =
  | { ok: true; report: ConsolidatedReport }
  | { ok: false; kind: "NoSpeechDetected" | "MalformedRecognizerOutput"; message: string };

// ─── Helpers ────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function primaryResult(fragment: Record<string, unknown>): Record<string, unknown> | null {
  const nbest = fragment["NBest"];
  if (Array.isArray(nbest) && nbest.length > 0 && isRecord(nbest[0])) {
    return nbest[0];
  }
  return null;
}

const AGGREGATE_SCORE_KEYS = [
  "AccuracyScore",
  "FluencyScore",
  "CompletenessScore",
  "PronScore",
  "ProsodyScore",
] as const;

/** Word-count weighted running average of the aggregate pronunciation scores. */
class AggregateScoreAverager {
  private sums = new Map<string, { weighted: number; weight: number }>();

  add(assessment: unknown, wordCount: number): void {
    if (!isRecord(assessment)) return;
    const weight = Math.max(1, wordCount);
    for (const key of AGGREGATE_SCORE_KEYS) {
      const value = assessment[key];
      if (typeof value !== "number" || !Number.isFinite(value)) continue;
      const entry = this.sums.get(key) ?? { weighted: 0, weight: 0 };
      entry.weighted += value * weight;
      entry.weight += weight;
      this.sums.set(key, entry);
    }
  }

  /** Overwrite each averaged key on the target assessment. */
  applyTo(assessment: Record<string, unknown>): void {
    for (const [key, { weighted, weight }] of this.sums) {
      assessment[key] = weighted / weight;
    }
  }
}

function toConsolidatedReport(parsed: RecognizerReport, fragmentCount: number): ConsolidatedReport {
  return {
    id: parsed.Id,
    recognitionStatus: parsed.RecognitionStatus,
    displayText: parsed.DisplayText,
    offset: parsed.Offset,
    duration: parsed.Duration,
    snr: parsed.SNR ?? null,
    nbest: parsed.NBest.map((n) => ({
      confidence: n.Confidence,
      display: n.Display,
      assessment: {
        accuracyScore: n.PronunciationAssessment.AccuracyScore,
        fluencyScore: n.PronunciationAssessment.FluencyScore,
        completenessScore: n.PronunciationAssessment.CompletenessScore,
        pronScore: n.PronunciationAssessment.PronScore,
        prosodyScore: n.PronunciationAssessment.ProsodyScore ?? null,
      },
      words: n.Words.map((w) => ({
        word: w.Word,
        accuracyScore: w.PronunciationAssessment.AccuracyScore,
        errorType: w.PronunciationAssessment.ErrorType ?? "None",
        offset: w.Offset ?? null,
        duration: w.Duration ?? null,
        phonemes: w.Phonemes.map((p) => ({
          phoneme: p.Phoneme,
          accuracyScore: p.PronunciationAssessment.AccuracyScore,
          errorType: p.PronunciationAssessment.ErrorType ?? "None",
        })),
      })),
    })),
    fragmentCount,
  };
}

// ─── Consolidation ──────────────────────────────────────────────────────────────

/**
 * Merge fragments (in emission order) into one validated report. Pure
 * function of `fragments`; the input objects are not modified.
 */
export function consolidateFragments(
  fragments: readonly RecognitionFragment[],
  logger?: Logger,
  sessionKey: string = "-",
): ConsolidationOutcome {
  if (fragments.length === 0) {
    logger?.warn(`[${sessionKey}] No speech fragments to consolidate`);
    return { ok: false, kind: "NoSpeechDetected", message: "No speech fragments to consolidate" };
  }

  const startedAt = Date.now();
  const textParts: string[] = [];
  const allWords: unknown[] = [];
  let totalDuration = 0;
  const averager = new AggregateScoreAverager();

  for (const fragment of fragments) {
    const displayText = fragment["DisplayText"];
    if (typeof displayText === "string" && displayText.trim()) {
      textParts.push(displayText.trim());
    }

    const duration = fragment["Duration"];
    if (typeof duration === "number" && Number.isFinite(duration)) {
      totalDuration += duration;
    }

    const primary = primaryResult(fragment);
    if (primary) {
      const words = Array.isArray(primary["Words"]) ? primary["Words"] : [];
      allWords.push(...words);
      averager.add(primary["PronunciationAssessment"], words.length);
    }
  }

  const transcript = textParts.join(" ");

  // First fragment is the structural template; the inputs stay untouched.
  const consolidated = structuredClone(fragments[0]);
  consolidated["DisplayText"] = transcript;
  consolidated["Duration"] = totalDuration;

  const primary = primaryResult(consolidated);
  if (primary) {
    primary["Words"] = allWords;
    primary["Lexical"] = transcript;
    primary["Display"] = transcript;
    primary["ITN"] = transcript;
    primary["MaskedITN"] = transcript;
    const assessment = primary["PronunciationAssessment"];
    if (isRecord(assessment)) {
      averager.applyTo(assessment);
    }
  }

  const parsed = recognizerReportSchema.safeParse(consolidated);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    logger?.error(`[${sessionKey}] Consolidated report failed validation: ${issues}`);
    logger?.error(`[${sessionKey}] Original fragments: ${JSON.stringify(fragments)}`);
    return { ok: false, kind: "MalformedRecognizerOutput", message: `Recognizer output failed validation: ${issues}` };
  }

  const report = toConsolidatedReport(parsed.data, fragments.length);
  const elapsed = (Date.now() - startedAt) / 1000;
  logger?.info(
    `[${sessionKey}] Consolidated ${fragments.length} fragments with ${allWords.length} total words`,
  );
  logger?.info(`METRICS: fragments_consolidated=${fragments.length} total_words=${allWords.length}`);
  logger?.info(`TIMING: consolidation completed in ${elapsed.toFixed(3)}s`);
  return { ok: true, report };
}
