// Speaking Coach - Shared TypeScript interfaces and types

// ─── Recording State Machine ────────────────────────────────────────────────────

export enum RecordingPhase {
  IDLE = "idle",
  STARTING = "starting",
  RECORDING = "recording",
  STOPPING = "stopping",
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

/**
 * Raw samples as delivered by the transport: a flat mono array, or one array
 * per channel. Values are floats in [-1, 1].
 */
export type FrameSamples = Float32Array | ReadonlyArray<number | ReadonlyArray<number>>;

export interface AudioFrame {
  sampleRate: number;
  samples: FrameSamples;
}

// ─── Errors ─────────────────────────────────────────────────────────────────────

export type StreamingErrorKind =
  | "ConfigurationInvalid"
  | "RecognizerSetupFailed"
  | "QueueOverflow"
  | "SilenceDetected"
  | "ResamplingDegenerate"
  | "RecognitionCanceled"
  | "NoSpeechDetected"
  | "MalformedRecognizerOutput"
  | "NotRecording"
  | "AlreadyRecording"
  | "SessionNotFound"
  | "StopFailed";

// ─── Recognizer payloads ────────────────────────────────────────────────────────

/**
 * One finalized utterance as emitted by the recognizer: the parsed detailed
 * JSON result. Kept untyped until consolidation validates it.
 */
export type RecognitionFragment = Record<string, unknown>;

export interface PhonemeResult {
  phoneme: string;
  accuracyScore: number;
  errorType: string;
}

export interface WordResult {
  word: string;
  accuracyScore: number;
  errorType: string;
  offset: number | null;
  duration: number | null;
  phonemes: PhonemeResult[];
}

export interface PronunciationScores {
  accuracyScore: number;
  fluencyScore: number;
  completenessScore: number;
  pronScore: number;
  prosodyScore: number | null;
}

export interface NBestResult {
  confidence: number;
  display: string;
  assessment: PronunciationScores;
  words: WordResult[];
}

/** Transcript and pronunciation assessment for one whole recording. Never mutated once built. */
export interface ConsolidatedReport {
  id: string;
  recognitionStatus: string;
  displayText: string;
  offset: number;
  /** Total duration in recognizer ticks (100 ns units). */
  duration: number;
  snr: number | null;
  nbest: NBestResult[];
  fragmentCount: number;
}

// ─── Lifecycle results ──────────────────────────────────────────────────────────

export interface StartResult {
  success: boolean;
  message: string;
  errorKind?: StreamingErrorKind;
}

export interface StopResult {
  success: boolean;
  /** Final transcript on success; best-effort partial text or an error message otherwise. */
  transcript: string;
  report: ConsolidatedReport | null;
  errorKind?: StreamingErrorKind;
  /** Set when stop() hands back a result that already ended by itself and was delivered then. */
  replayed?: boolean;
}

export interface HealthStatus {
  healthy: boolean;
  reason: string | null;
}

// ─── Conversation ───────────────────────────────────────────────────────────────

export interface ChatTurn {
  role: "user" | "coach";
  text: string;
  /** Only populated for user turns. */
  pronunciationReport?: ConsolidatedReport | null;
  feedbackTip?: string | null;
}

export interface FeedbackPoint {
  word: string;
  phoneme: string;
  accuracyScore: number;
  sentence: string;
}

// ─── IELTS Test ─────────────────────────────────────────────────────────────────

export type IeltsPart = 1 | 2 | 3;

export enum IeltsPhase {
  IN_PROGRESS = "in_progress",
  PART_ENDED = "part_ended",
  GENERATING_FEEDBACK = "generating_feedback",
  TEST_COMPLETED = "test_completed",
}

/** One complete test: short questions for parts 1 and 3, a cue card for part 2. */
export interface IeltsQuestionSet {
  part1: { topic: string; questions: string[] };
  part2: { topic: string; cueCard: string };
  part3: { topic: string; questions: string[] };
}

/** What the candidate is being asked right now. */
export interface IeltsPrompt {
  part: IeltsPart;
  topic: string;
  questionIndex: number;
  /** The question text; for part 2 the cue card. */
  question: string;
}

export interface IeltsAnswer {
  part: IeltsPart;
  question: string;
  transcript: string;
  report: ConsolidatedReport | null;
}

export interface CriterionFeedback {
  strength: string;
  improvementArea: string;
}

export interface IeltsPartFeedback {
  part: IeltsPart;
  positiveHighlight: string;
  keyImprovementArea: string;
  fluencyAndCoherence: CriterionFeedback;
  lexicalResource: CriterionFeedback;
  grammaticalRangeAndAccuracy: CriterionFeedback;
  pronunciation: CriterionFeedback;
}

export interface CriterionScore {
  /** Band score, 0 to 9 in steps of 0.5. */
  score: number;
  justification: string;
}

export interface IeltsFinalReport {
  fluencyAndCoherence: CriterionScore;
  lexicalResource: CriterionScore;
  grammaticalRangeAndAccuracy: CriterionScore;
  /** Mean of the three criterion scores rounded to the nearest half band. */
  overallBandScore: number;
  summary: string;
  recommendations: string[];
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | { type: "start_recording" }
  | { type: "stop_recording" }
  | { type: "get_partial" }
  | { type: "start_ielts_test" }
  | { type: "continue_ielts_test" }
  | { type: "get_ielts_feedback" }
  | { type: "get_ielts_report" }
  | { type: "reset_ielts_test" };

export type ServerMessage =
  | { type: "session"; sessionKey: string }
  | { type: "recording_started"; message: string }
  | {
      type: "recording_result";
      success: boolean;
      transcript: string;
      report: ConsolidatedReport | null;
      errorKind?: StreamingErrorKind;
      autoStopped: boolean;
    }
  | { type: "partial_transcript"; text: string }
  | { type: "coach_reply"; text: string; feedback: FeedbackPoint | null; audioBytes: number }
  | { type: "ielts_question"; prompt: IeltsPrompt }
  | { type: "ielts_part_ended"; part: IeltsPart }
  | { type: "ielts_test_completed" }
  | { type: "ielts_feedback"; feedback: IeltsPartFeedback }
  | { type: "ielts_report"; report: IeltsFinalReport }
  | { type: "ielts_reset" }
  | { type: "audio_format_error"; message: string }
  | { type: "error"; message: string; recoverable: boolean };

// ─── Utilities ──────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}
