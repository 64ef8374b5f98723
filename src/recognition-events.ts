// Speaking Coach - Recognition event handler
// Binds recognizer callbacks to a session's streaming state. The recognizer
// posts into the state (partial-text slot, fragment list); nothing here ever
// drives the recognizer.

import type { Logger } from "./logger.js";
import type { RecognizerEvents } from "./recognizer.js";
import type { StreamingState } from "./session-state.js";
import type { RecognitionFragment } from "./types.js";

/**
 * Create the event callbacks for one recording. `generation` pins the
 * callbacks to the recording that created them: once the state has moved on
 * to a newer recording, late events from the old recognizer are ignored.
 */
export function createRecognitionEventHandler(
  state: StreamingState,
  generation: number,
  sessionKey: string,
  logger: Logger,
): RecognizerEvents {
  const isCurrent = (): boolean => state.generation === generation && state.isActive;

  return {
    onPartial(text: string): void {
      if (!isCurrent()) return;
      state.currentPartialText = text;
      logger.debug(`[${sessionKey}] Partial: '${text}'`);
    },

    onFinal(fragment: RecognitionFragment): void {
      if (!isCurrent()) {
        logger.debug(`[${sessionKey}] Ignoring final result from a closed recording`);
        return;
      }
      state.fragments.push(fragment);
      const displayText = fragment["DisplayText"];
      if (typeof displayText === "string" && displayText.trim()) {
        state.currentPartialText = displayText.trim();
      }
      logger.info(`[${sessionKey}] Fragment received (fragment_num=${state.fragments.length})`);
    },

    onNoMatch(details: string): void {
      if (!isCurrent()) return;
      state.lastError = details || "No speech could be recognized";
      logger.warn(`[${sessionKey}] No speech could be recognized`);
    },

    onCanceled(details: string): void {
      if (!isCurrent()) return;
      state.lastError = details || "Recognition canceled";
      state.canceled = true;
      state.isRecording = false;
      // Release a consumer waiting on an empty queue so it sees the flag now.
      state.audioQueue.wake();
      logger.error(`[${sessionKey}] Recognition canceled: ${state.lastError}`);
    },
  };
}
