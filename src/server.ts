// Speaking Coach - WebSocket Handler and Express Server
// One WebSocket connection = one session. JSON messages drive the recording
// lifecycle and the IELTS test; binary messages carry SC-prefixed audio frames.
//
// Privacy: audio frames are in-memory only, never written to disk.
//          Session data lives in server memory only.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import { decodeAudioFrame } from "./audio-frame-codec.js";
import type { ConversationCoach } from "./conversation-coach.js";
import type { IeltsExaminer } from "./ielts-examiner.js";
import { IeltsTest, NOT_IN_PROGRESS_MESSAGE, type IeltsStep } from "./ielts-test.js";
import { createConsoleLogger, errorMessage, type Logger } from "./logger.js";
import type { QuestionBank } from "./question-bank.js";
import type { SessionManager } from "./session-manager.js";
import { IeltsPhase, type ClientMessage, type ServerMessage, type StopResult } from "./types.js";

// ─── Client message validation ──────────────────────────────────────────────────

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("start_recording") }),
  z.object({ type: z.literal("stop_recording") }),
  z.object({ type: z.literal("get_partial") }),
  z.object({ type: z.literal("start_ielts_test") }),
  z.object({ type: z.literal("continue_ielts_test") }),
  z.object({ type: z.literal("get_ielts_feedback") }),
  z.object({ type: z.literal("get_ielts_report") }),
  z.object({ type: z.literal("reset_ielts_test") }),
]) satisfies z.ZodType<ClientMessage>;

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  sessionManager: SessionManager;
  /** Conversation coach; when absent, results are delivered without a reply. */
  coach?: ConversationCoach | null;
  /** Question sets for the IELTS test; when absent, the test cannot be started. */
  questionBank?: QuestionBank | null;
  /** Part feedback and the final report; when absent, the test runs without them. */
  examiner?: IeltsExaminer | null;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Deliver a recording that ended without a stop request to its connection. */
  notifyRecordingEnded(sessionKey: string, result: StopResult): void;
  /** Start listening on the given port (0 for an ephemeral one). Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Close all connections, stop listening and shut down every session. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    sessionManager,
    coach = null,
    questionBank = null,
    examiner = null,
    logger = createConsoleLogger("Server"),
  } = options;
  const connections = new Map<string, WebSocket>();

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/sessions", (_req, res) => {
    res.json({ sessions: sessionManager.sessionCount, recording: sessionManager.recordingCount });
  });

  const wss = new WebSocketServer({ server: httpServer });
  const ctx: HandlerContext = { sessionManager, coach, questionBank, examiner, logger };

  wss.on("connection", (ws: WebSocket) => {
    const sessionKey = sessionManager.createSession();
    connections.set(sessionKey, ws);
    handleConnection(ws, sessionKey, ctx, () => connections.delete(sessionKey));
  });

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    notifyRecordingEnded(sessionKey: string, result: StopResult): void {
      const ws = connections.get(sessionKey);
      if (!ws) {
        logger.warn(`Recording of session ${sessionKey} ended with no connection to notify`);
        return;
      }
      deliverResult(ws, sessionKey, result, true, ctx).catch((err: unknown) => {
        logger.error(`Failed to deliver auto-stopped result for session ${sessionKey}: ${errorMessage(err)}`);
      });
    },
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const boundPort = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${boundPort}`);
          resolve(boundPort);
        });
      });
    },
    async close(): Promise<void> {
      for (const client of wss.clients) {
        client.close();
      }
      await new Promise<void>((resolve, reject) => {
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
      await sessionManager.shutdown();
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

interface HandlerContext {
  sessionManager: SessionManager;
  coach: ConversationCoach | null;
  questionBank: QuestionBank | null;
  examiner: IeltsExaminer | null;
  logger: Logger;
}

function handleConnection(ws: WebSocket, sessionKey: string, ctx: HandlerContext, onClosed: () => void): void {
  const { sessionManager, logger } = ctx;
  let closed = false;

  logger.info(`New WebSocket connection, session ${sessionKey}`);
  sendMessage(ws, { type: "session", sessionKey });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, sessionKey, toBuffer(data), ctx);
      } else {
        handleTextMessage(ws, sessionKey, toBuffer(data).toString("utf-8"), ctx);
      }
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Error handling message for session ${sessionKey}: ${message}`);
      sendMessage(ws, { type: "error", message, recoverable: true });
    }
  });

  const cleanup = (reason: string) => {
    if (closed) return;
    closed = true;
    onClosed();
    logger.info(`WebSocket ${reason}, session ${sessionKey}`);
    sessionManager.removeSession(sessionKey).catch((err: unknown) => {
      logger.error(`Error removing session ${sessionKey}: ${errorMessage(err)}`);
    });
  };

  ws.on("close", () => cleanup("closed"));
  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${sessionKey}: ${err.message}`);
    cleanup("errored");
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Binary Message Handler (Audio Frames) ──────────────────────────────────────

function handleBinaryMessage(ws: WebSocket, sessionKey: string, data: Buffer, ctx: HandlerContext): void {
  const decoded = decodeAudioFrame(data);
  if (!decoded.ok) {
    sendMessage(ws, { type: "audio_format_error", message: decoded.error });
    return;
  }

  // Always routed by this connection's own key, never by "whoever is recording".
  const outcome = ctx.sessionManager.queueAudioFrame(sessionKey, decoded.frame);
  if (!outcome.queued && outcome.reason !== "silence") {
    ctx.logger.debug(`Frame ${decoded.header.seq} of session ${sessionKey} dropped: ${outcome.reason}`);
  }
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleTextMessage(ws: WebSocket, sessionKey: string, text: string, ctx: HandlerContext): void {
  const { sessionManager, logger } = ctx;

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    sendMessage(ws, { type: "error", message: "Message is not valid JSON", recoverable: true });
    return;
  }
  const parsed = clientMessageSchema.safeParse(raw);
  if (!parsed.success) {
    sendMessage(ws, { type: "error", message: "Unknown or malformed message", recoverable: true });
    return;
  }

  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => {
      const message = errorMessage(err);
      logger.error(`Async error for session ${sessionKey}: ${message}`);
      sendMessage(ws, { type: "error", message, recoverable: true });
    });
  };

  const message = parsed.data;
  switch (message.type) {
    case "start_recording":
      catchAsync(handleStartRecording(ws, sessionKey, ctx));
      break;

    case "stop_recording":
      catchAsync(handleStopRecording(ws, sessionKey, ctx));
      break;

    case "get_partial":
      sendMessage(ws, { type: "partial_transcript", text: sessionManager.getPartialText(sessionKey) });
      break;

    case "start_ielts_test":
      handleStartIeltsTest(ws, sessionKey, ctx);
      break;

    case "continue_ielts_test": {
      const test = requireIeltsTest(ws, sessionKey, ctx);
      if (test) sendIeltsStep(ws, test.continueToNextPart());
      break;
    }

    case "get_ielts_feedback":
      catchAsync(handleIeltsFeedback(ws, sessionKey, ctx));
      break;

    case "get_ielts_report":
      catchAsync(handleIeltsReport(ws, sessionKey, ctx));
      break;

    case "reset_ielts_test": {
      const session = sessionManager.getSession(sessionKey);
      if (session) session.ieltsTest = null;
      sendMessage(ws, { type: "ielts_reset" });
      break;
    }

    default: {
      const exhaustiveCheck: never = message;
      throw new Error(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

async function handleStartRecording(ws: WebSocket, sessionKey: string, ctx: HandlerContext): Promise<void> {
  // During a test, answers are only recorded while a question is open.
  const test = ctx.sessionManager.getSession(sessionKey)?.ieltsTest;
  if (test && test.phase !== IeltsPhase.IN_PROGRESS) {
    sendMessage(ws, { type: "error", message: NOT_IN_PROGRESS_MESSAGE, recoverable: true });
    return;
  }

  const result = await ctx.sessionManager.startRecording(sessionKey);
  if (result.success) {
    sendMessage(ws, { type: "recording_started", message: result.message });
  } else {
    sendMessage(ws, { type: "error", message: result.message, recoverable: true });
  }
}

async function handleStopRecording(ws: WebSocket, sessionKey: string, ctx: HandlerContext): Promise<void> {
  const result = await ctx.sessionManager.stopRecording(sessionKey);
  await deliverResult(ws, sessionKey, result, result.replayed === true, ctx);
}

/**
 * Send the recording result. A successful recording then becomes the answer
 * to the open IELTS question or, outside a test, gets the coach's reply.
 */
async function deliverResult(
  ws: WebSocket,
  sessionKey: string,
  result: StopResult,
  autoStopped: boolean,
  ctx: HandlerContext,
): Promise<void> {
  sendMessage(ws, {
    type: "recording_result",
    success: result.success,
    transcript: result.transcript,
    report: result.report,
    errorKind: result.errorKind,
    autoStopped,
  });

  const session = ctx.sessionManager.getSession(sessionKey);
  // A replayed result was already acted on when it was first delivered.
  if (!result.success || !session || result.replayed) return;

  if (session.ieltsTest) {
    sendIeltsStep(ws, session.ieltsTest.recordAnswer(result.transcript, result.report));
    return;
  }
  if (!ctx.coach) return;

  const reply = await ctx.coach.respond(session, result.transcript, result.report);
  sendMessage(ws, {
    type: "coach_reply",
    text: reply.replyText,
    feedback: reply.feedback,
    audioBytes: reply.audio?.length ?? 0,
  });
  if (reply.audio && ws.readyState === WebSocket.OPEN) {
    ws.send(reply.audio, { binary: true });
  }
}

// ─── IELTS Test Handlers ────────────────────────────────────────────────────────

const NO_ACTIVE_TEST_MESSAGE = "No active IELTS test. Start a test first.";

function handleStartIeltsTest(ws: WebSocket, sessionKey: string, ctx: HandlerContext): void {
  const session = ctx.sessionManager.getSession(sessionKey);
  if (!ctx.questionBank || !session) {
    sendMessage(ws, { type: "error", message: "IELTS test is not available", recoverable: false });
    return;
  }

  const test = new IeltsTest(ctx.questionBank.getRandomTest());
  session.ieltsTest = test;
  ctx.logger.info(`IELTS test started for session ${sessionKey}: part 1 topic "${test.questions.part1.topic}"`);
  sendMessage(ws, { type: "ielts_question", prompt: test.currentPrompt });
}

function requireIeltsTest(ws: WebSocket, sessionKey: string, ctx: HandlerContext): IeltsTest | null {
  const test = ctx.sessionManager.getSession(sessionKey)?.ieltsTest ?? null;
  if (!test) {
    sendMessage(ws, { type: "error", message: NO_ACTIVE_TEST_MESSAGE, recoverable: true });
  }
  return test;
}

async function handleIeltsFeedback(ws: WebSocket, sessionKey: string, ctx: HandlerContext): Promise<void> {
  const test = requireIeltsTest(ws, sessionKey, ctx);
  if (!test) return;
  if (!ctx.examiner) {
    sendMessage(ws, { type: "error", message: "IELTS feedback is not available", recoverable: false });
    return;
  }

  const result = await ctx.examiner.partFeedback(test, sessionKey);
  if (result.ok) {
    sendMessage(ws, { type: "ielts_feedback", feedback: result.value });
  } else {
    sendMessage(ws, { type: "error", message: result.message, recoverable: true });
  }
}

async function handleIeltsReport(ws: WebSocket, sessionKey: string, ctx: HandlerContext): Promise<void> {
  const test = requireIeltsTest(ws, sessionKey, ctx);
  if (!test) return;
  if (!ctx.examiner) {
    sendMessage(ws, { type: "error", message: "IELTS feedback is not available", recoverable: false });
    return;
  }

  const result = await ctx.examiner.finalReport(test, sessionKey);
  if (result.ok) {
    sendMessage(ws, { type: "ielts_report", report: result.value });
  } else {
    sendMessage(ws, { type: "error", message: result.message, recoverable: true });
  }
}

function sendIeltsStep(ws: WebSocket, step: IeltsStep): void {
  if (!step.ok) {
    sendMessage(ws, { type: "error", message: step.message, recoverable: true });
    return;
  }
  switch (step.kind) {
    case "question":
      sendMessage(ws, { type: "ielts_question", prompt: step.prompt });
      break;
    case "part_ended":
      sendMessage(ws, { type: "ielts_part_ended", part: step.part });
      break;
    case "completed":
      sendMessage(ws, { type: "ielts_test_completed" });
      break;
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
