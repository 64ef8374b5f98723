// Speaking Coach - Azure Speech recognizer adapter
// Continuous recognition over a push stream with pronunciation assessment.
// Each final result's detailed JSON (NBest, words, phonemes, scores) is handed
// to the session as a fragment.
//
// Privacy: audio is pushed straight to the service, never written to disk.

import * as sdk from "microsoft-cognitiveservices-speech-sdk";
import type { SpeechCredentials } from "./config.js";
import { errorMessage, type Logger } from "./logger.js";
import type { RecognizerEvents, RecognizerFactory, RecognizerSession } from "./recognizer.js";
import type { RecognitionFragment } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const SAMPLE_RATE = 16000;
const BITS_PER_SAMPLE = 16;
const CHANNELS = 1;

/** Silence that closes an utterance segment. */
const SEGMENTATION_SILENCE_MS = "3000";
/** Silence tolerated before the first word. */
const INITIAL_SILENCE_MS = "5000";

// ─── Session ────────────────────────────────────────────────────────────────────

class AzureRecognizerSession implements RecognizerSession {
  private readonly recognizer: sdk.SpeechRecognizer;
  private readonly pushStream: sdk.PushAudioInputStream;
  private closed = false;

  constructor(
    speechConfig: sdk.SpeechConfig,
    private readonly sessionKey: string,
    events: RecognizerEvents,
    private readonly logger: Logger,
  ) {
    const format = sdk.AudioStreamFormat.getWaveFormatPCM(SAMPLE_RATE, BITS_PER_SAMPLE, CHANNELS);
    this.pushStream = sdk.AudioInputStream.createPushStream(format);
    const audioConfig = sdk.AudioConfig.fromStreamInput(this.pushStream);
    this.recognizer = new sdk.SpeechRecognizer(speechConfig, audioConfig);

    // Unscripted assessment: no reference text, no miscue detection.
    const assessment = new sdk.PronunciationAssessmentConfig(
      "",
      sdk.PronunciationAssessmentGradingSystem.HundredMark,
      sdk.PronunciationAssessmentGranularity.Phoneme,
      false,
    );
    assessment.enableProsodyAssessment = true;
    assessment.applyTo(this.recognizer);

    this.attach(events);
  }

  private attach(events: RecognizerEvents): void {
    this.recognizer.recognizing = (_sender, event) => {
      events.onPartial(event.result.text);
    };

    this.recognizer.recognized = (_sender, event) => {
      const result = event.result;
      if (result.reason === sdk.ResultReason.RecognizedSpeech) {
        const json = result.properties.getProperty(sdk.PropertyId.SpeechServiceResponse_JsonResult);
        const fragment = parseFragment(json);
        if (fragment) {
          events.onFinal(fragment);
        } else {
          this.logger.error(`[${this.sessionKey}] Discarding unparseable recognizer result`);
        }
      } else if (result.reason === sdk.ResultReason.NoMatch) {
        const details = sdk.NoMatchDetails.fromResult(result);
        events.onNoMatch(`No match: ${sdk.NoMatchReason[details.reason]}`);
      }
    };

    this.recognizer.canceled = (_sender, event) => {
      // End of stream is the normal close of the push stream, not a failure.
      if (event.reason === sdk.CancellationReason.EndOfStream) return;
      events.onCanceled(event.errorDetails || sdk.CancellationReason[event.reason]);
    };
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.recognizer.startContinuousRecognitionAsync(
        () => resolve(),
        (err: string) => reject(new Error(`Failed to start recognition: ${err}`)),
      );
    });
  }

  write(pcm: Buffer): Promise<void> {
    // The SDK takes an ArrayBuffer it may hold on to, so hand it its own copy.
    const chunk = new ArrayBuffer(pcm.byteLength);
    new Uint8Array(chunk).set(pcm);
    return new Promise((resolve, reject) => {
      setImmediate(() => {
        if (this.closed) {
          reject(new Error("Push stream is closed"));
          return;
        }
        try {
          this.pushStream.write(chunk);
          resolve();
        } catch (err) {
          reject(err instanceof Error ? err : new Error(String(err)));
        }
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.recognizer.stopContinuousRecognitionAsync(
        () => resolve(),
        (err: string) => reject(new Error(`Failed to stop recognition: ${err}`)),
      );
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.recognizer.recognizing = () => {};
    this.recognizer.recognized = () => {};
    this.recognizer.canceled = () => {};

    try {
      this.pushStream.close();
    } finally {
      this.recognizer.close(undefined, (err: string) => {
        this.logger.warn(`[${this.sessionKey}] Recognizer close reported: ${err}`);
      });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseFragment(json: string): RecognitionFragment | null {
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/**
 * Creates one Azure recognizer per recording. Missing credentials are
 * reported through `configurationError` instead of throwing, so the server
 * can still start and answer every recording attempt with a clear failure.
 */
export class AzureRecognizerFactory implements RecognizerFactory {
  readonly configurationError: string | null;
  private readonly speechConfig: sdk.SpeechConfig | null;
  private readonly logger: Logger;

  constructor(credentials: SpeechCredentials, logger: Logger) {
    this.logger = logger;
    if (!credentials.key || !credentials.region) {
      this.configurationError = "AZURE_SPEECH_KEY and AZURE_SPEECH_REGION must be set";
      this.speechConfig = null;
      return;
    }

    let speechConfig: sdk.SpeechConfig | null = null;
    let configurationError: string | null = null;
    try {
      speechConfig = sdk.SpeechConfig.fromSubscription(credentials.key, credentials.region);
      speechConfig.speechRecognitionLanguage = credentials.language;
      speechConfig.outputFormat = sdk.OutputFormat.Detailed;
      speechConfig.requestWordLevelTimestamps();
      speechConfig.setProfanity(sdk.ProfanityOption.Raw);
      speechConfig.setProperty(sdk.PropertyId.Speech_SegmentationSilenceTimeoutMs, SEGMENTATION_SILENCE_MS);
      speechConfig.setProperty(sdk.PropertyId.SpeechServiceConnection_InitialSilenceTimeoutMs, INITIAL_SILENCE_MS);
    } catch (err) {
      configurationError = `Invalid speech configuration: ${errorMessage(err)}`;
      speechConfig = null;
    }
    this.speechConfig = speechConfig;
    this.configurationError = configurationError;
  }

  create(sessionKey: string, events: RecognizerEvents): RecognizerSession {
    if (!this.speechConfig) {
      throw new Error(this.configurationError ?? "Speech service is not configured");
    }
    return new AzureRecognizerSession(this.speechConfig, sessionKey, events, this.logger);
  }
}
