// Small IELTS question set and examiner replies shared by tests.

import type { IeltsQuestionSet } from "../types.js";

export const SAMPLE_QUESTIONS: IeltsQuestionSet = {
  part1: { topic: "Weather", questions: ["Do you like rainy days?", "What is the weather like today?"] },
  part2: { topic: "Describe a park you enjoy", cueCard: "You should say where it is and why you go there." },
  part3: { topic: "Cities", questions: ["Do cities need more parks?", "How will cities change?"] },
};

const criterion = { strength: "Clear ideas", improvement_area: "Link sentences" };

export const PART_FEEDBACK_REPLY = JSON.stringify({
  positive_highlight: "Relevant answers",
  key_improvement_area: "Extend your answers",
  fluency_and_coherence: criterion,
  lexical_resource: criterion,
  grammatical_range_and_accuracy: criterion,
  pronunciation: criterion,
});

export const FINAL_REPORT_REPLY = JSON.stringify({
  fluency_and_coherence: { score: 6.5, justification: "Mostly fluent" },
  lexical_resource: { score: 6, justification: "Adequate range" },
  grammatical_range_and_accuracy: { score: 6, justification: "Some errors" },
  summary: "A solid performance.",
  recommendations: ["Use more linking words"],
});
