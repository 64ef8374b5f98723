// Speaking Coach - Conversation coach
// Turns a finished recording into the coach's next conversational turn:
// pick one pronunciation point worth mentioning, ask the chat model for a
// short reply, and voice it.

import { findActionableFeedbackPoint, formatFeedbackTip } from "./feedback.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import type { StreamingSessionState } from "./session-state.js";
import type { TTSEngine } from "./tts-engine.js";
import type { ChatTurn, ConsolidatedReport, FeedbackPoint } from "./types.js";

// ─── OpenAI chat client interface (for testability / dependency injection) ──────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: string; content: string }>;
        response_format?: { type: string };
        temperature?: number;
        max_tokens?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface CoachReply {
  replyText: string;
  feedback: FeedbackPoint | null;
  audio: Buffer | null;
}

export interface ConversationCoachOptions {
  model?: string;
  /** Turns of history sent with each request. */
  historyTurns?: number;
  /** Reports scanned for a feedback point, most recent first. */
  feedbackWindow?: number;
  feedbackThreshold?: number;
  logger?: Logger;
}

export const FALLBACK_REPLY = "Sorry, I had trouble thinking of a reply. Could you say that again?";

const SYSTEM_PROMPT =
  "You are a friendly English speaking partner. Keep replies to two or three short sentences, " +
  "ask a follow-up question to keep the conversation going, and never use markdown.";

export class ConversationCoach {
  private readonly openai: OpenAIClient;
  private readonly tts: TTSEngine | null;
  private readonly model: string;
  private readonly historyTurns: number;
  private readonly feedbackWindow: number;
  private readonly feedbackThreshold: number;
  private readonly logger: Logger;

  constructor(openaiClient: OpenAIClient, ttsEngine: TTSEngine | null, options: ConversationCoachOptions = {}) {
    this.openai = openaiClient;
    this.tts = ttsEngine;
    this.model = options.model ?? "gpt-4o-mini";
    this.historyTurns = options.historyTurns ?? 10;
    this.feedbackWindow = options.feedbackWindow ?? 3;
    this.feedbackThreshold = options.feedbackThreshold ?? 60;
    this.logger = options.logger ?? createConsoleLogger("ConversationCoach");
  }

  /**
   * Record the user's turn, generate and record the coach's reply, and
   * synthesize it. Model and TTS failures degrade the reply; they never throw.
   */
  async respond(
    session: StreamingSessionState,
    transcript: string,
    report: ConsolidatedReport | null,
  ): Promise<CoachReply> {
    const recentReports = [
      report,
      ...session.chatHistory
        .filter((turn) => turn.role === "user")
        .map((turn) => turn.pronunciationReport ?? null)
        .reverse(),
    ].slice(0, this.feedbackWindow);

    const feedback = findActionableFeedbackPoint(recentReports, this.feedbackThreshold);
    const feedbackTip = feedback ? formatFeedbackTip(feedback) : null;

    session.chatHistory.push({ role: "user", text: transcript, pronunciationReport: report, feedbackTip });

    const replyText = await this.generateReply(session.chatHistory, feedbackTip, session.key);
    session.chatHistory.push({ role: "coach", text: replyText });

    let audio: Buffer | null = null;
    if (this.tts) {
      try {
        audio = await this.tts.synthesize(replyText);
      } catch (err) {
        this.logger.error(`[${session.key}] TTS failed: ${errorMessage(err)}`);
      }
    }

    return { replyText, feedback, audio };
  }

  private async generateReply(history: readonly ChatTurn[], feedbackTip: string | null, key: string): Promise<string> {
    const messages: Array<{ role: string; content: string }> = [{ role: "system", content: SYSTEM_PROMPT }];
    if (feedbackTip) {
      messages.push({
        role: "system",
        content: `Pronunciation note for the learner: ${feedbackTip} Mention it briefly and kindly, then continue the chat.`,
      });
    }
    for (const turn of history.slice(-this.historyTurns)) {
      messages.push({ role: turn.role === "coach" ? "assistant" : "user", content: turn.text });
    }

    try {
      const startedAt = Date.now();
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages,
        temperature: 0.7,
        max_tokens: 200,
      });
      const content = response.choices[0]?.message.content?.trim();
      this.logger.info(`TIMING: coach reply generated in ${((Date.now() - startedAt) / 1000).toFixed(2)}s`);
      if (!content) {
        this.logger.warn(`[${key}] Chat model returned an empty reply`);
        return FALLBACK_REPLY;
      }
      return content;
    } catch (err) {
      this.logger.error(`[${key}] Chat model request failed: ${errorMessage(err)}`);
      return FALLBACK_REPLY;
    }
  }
}
