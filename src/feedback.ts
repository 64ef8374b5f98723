// Speaking Coach - Pronunciation feedback selection

import type { ConsolidatedReport, FeedbackPoint } from "./types.js";

export const DEFAULT_FEEDBACK_THRESHOLD = 60;

/**
 * Pick the single worst phoneme scoring below `threshold` across recent
 * reports. On ties the earliest occurrence wins. Returns null when every
 * phoneme meets the threshold or no report carries phoneme scores.
 */
export function findActionableFeedbackPoint(
  reports: ReadonlyArray<ConsolidatedReport | null | undefined>,
  threshold: number = DEFAULT_FEEDBACK_THRESHOLD,
): FeedbackPoint | null {
  let worst: FeedbackPoint | null = null;

  for (const report of reports) {
    const primary = report?.nbest[0];
    if (!report || !primary) continue;

    for (const word of primary.words) {
      for (const phoneme of word.phonemes) {
        if (phoneme.accuracyScore >= threshold) continue;
        if (worst === null || phoneme.accuracyScore < worst.accuracyScore) {
          worst = {
            word: word.word,
            phoneme: phoneme.phoneme,
            accuracyScore: phoneme.accuracyScore,
            sentence: report.displayText,
          };
        }
      }
    }
  }

  return worst;
}

/** One-line tip for the coach prompt and the client. */
export function formatFeedbackTip(point: FeedbackPoint): string {
  return (
    `In "${point.sentence}", the "${point.phoneme}" sound in "${point.word}" ` +
    `scored ${Math.round(point.accuracyScore)}/100.`
  );
}
