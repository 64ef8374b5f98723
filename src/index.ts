// Speaking Coach - Entry point
// Wires up the streaming engine, the conversation coach, the IELTS test and the server.

import "dotenv/config";
import OpenAI from "openai";
import { AzureRecognizerFactory } from "./azure-recognizer.js";
import { loadAppConfig } from "./config.js";
import { ConversationCoach } from "./conversation-coach.js";
import type { OpenAIClient } from "./conversation-coach.js";
import { IeltsExaminer } from "./ielts-examiner.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { loadQuestionBank, type QuestionBank } from "./question-bank.js";
import { createAppServer, type AppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { TTSEngine } from "./tts-engine.js";
import type { OpenAITTSClient } from "./tts-engine.js";

export const APP_NAME = "Speaking Coach";
export const APP_VERSION = "0.1.0";

const log = createConsoleLogger("Init");
const config = loadAppConfig();

// ─── Speech recognizer ──────────────────────────────────────────────────────────

log.info("Creating Azure speech recognizer factory...");
const recognizerFactory = new AzureRecognizerFactory(config.speech, createConsoleLogger("Recognizer"));
if (recognizerFactory.configurationError) {
  // Keep serving: every recording attempt reports the problem to the client.
  log.error(`${recognizerFactory.configurationError}. Recording is disabled until it is fixed.`);
}

// ─── Conversation coach ─────────────────────────────────────────────────────────

let coach: ConversationCoach | null = null;
let examiner: IeltsExaminer | null = null;
if (config.openaiApiKey) {
  log.info(`Initializing ConversationCoach (${config.coachModel}) and TTSEngine (voice ${config.ttsVoice})...`);
  const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });
  const ttsEngine = new TTSEngine(openaiClient as unknown as OpenAITTSClient, { voice: config.ttsVoice });
  coach = new ConversationCoach(openaiClient as unknown as OpenAIClient, ttsEngine, {
    model: config.coachModel,
    logger: createConsoleLogger("ConversationCoach"),
  });
  examiner = new IeltsExaminer(openaiClient as unknown as OpenAIClient, {
    model: config.coachModel,
    logger: createConsoleLogger("IeltsExaminer"),
  });
} else {
  log.warn("OPENAI_API_KEY is not set; recordings are transcribed and scored without coach replies");
}

// ─── IELTS question bank ────────────────────────────────────────────────────────

let questionBank: QuestionBank | null = null;
const questionsPath = config.ieltsQuestionsPath ?? new URL("../data/ielts-questions.json", import.meta.url);
try {
  const bank = loadQuestionBank(questionsPath);
  log.info(`Loaded ${bank.size} IELTS question sets`);
  questionBank = bank;
} catch (err) {
  log.error(`IELTS questions could not be loaded from ${String(questionsPath)}: ${errorMessage(err)}. The IELTS test is disabled.`);
}

// ─── Session manager + server ───────────────────────────────────────────────────

let server: AppServer | null = null;

const sessionManager = new SessionManager({
  recognizerFactory,
  config: config.streaming,
  logger: createConsoleLogger("Streaming"),
  onRecordingEnded: (sessionKey, result) => server?.notifyRecordingEnded(sessionKey, result),
});

server = createAppServer({ sessionManager, coach, questionBank, examiner, logger: createConsoleLogger("Server") });

const sweepTimer = setInterval(() => {
  sessionManager.sweep().then(
    ({ stopped, evicted }) => {
      if (stopped.length > 0 || evicted.length > 0) {
        log.info(`Sweep: force-stopped ${stopped.length}, evicted ${evicted.length}`);
      }
    },
    (err: unknown) => log.error(`Session sweep failed: ${errorMessage(err)}`),
  );
}, config.streaming.sweepIntervalMs);
sweepTimer.unref();

const shutdown = (signal: string) => {
  log.info(`${signal} received, shutting down`);
  clearInterval(sweepTimer);
  const closing = server ? server.close() : sessionManager.shutdown();
  closing.then(
    () => process.exit(0),
    (err: unknown) => {
      log.error(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

server.listen(config.port).then(
  (port) => {
    log.info(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    log.info("Pipeline: browser frames → resample/VAD → queue → Azure pronunciation assessment → coach → TTS");
  },
  (err: unknown) => {
    log.error(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  },
);
