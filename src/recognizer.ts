// Speaking Coach - Recognizer port
// The streaming engine only talks to the speech recognizer through these
// interfaces, so the cloud SDK can be swapped for an in-process fake in tests.

import type { RecognitionFragment } from "./types.js";

/** Callbacks the recognizer invokes asynchronously while a recording is open. */
export interface RecognizerEvents {
  /** In-progress text for the still-open utterance. */
  onPartial(text: string): void;
  /** A finalized utterance's structured result (detailed JSON, parsed). */
  onFinal(fragment: RecognitionFragment): void;
  /** The recognizer heard audio but could not match any speech. */
  onNoMatch(details: string): void;
  /** The recognizer gave up on this stream; no further results will arrive. */
  onCanceled(details: string): void;
}

/**
 * One recognizer handle plus its push-input stream, owned by exactly one
 * session for one recording.
 */
export interface RecognizerSession {
  /** Begin continuous recognition. Rejects if the service cannot be reached. */
  start(): Promise<void>;
  /** Push 16-bit signed little-endian PCM, 16kHz mono. */
  write(pcm: Buffer): Promise<void>;
  /** Ask the recognizer to finish; trailing final events may still arrive before this resolves. */
  stop(): Promise<void>;
  /** Detach all callbacks, close the push stream and release the handle. Idempotent. */
  close(): void;
}

export interface RecognizerFactory {
  /**
   * Non-null when the factory cannot create recognizers at all (missing
   * credentials). Every start short-circuits on it.
   */
  readonly configurationError: string | null;
  /**
   * Allocate a recognizer and push stream wired to `events`.
   * @throws Error if the handle cannot be allocated.
   */
  create(sessionKey: string, events: RecognizerEvents): RecognizerSession;
}
