// Speaking Coach - Configuration
// Tuning constants for the streaming pipeline plus process-level settings.
// All thresholds are configuration so deployments can tune them without
// touching the consumer or ingestor algorithms.

export interface StreamingConfig {
  /** Sample rate the recognizer expects. Default: 16000 */
  targetSampleRate: number;
  /** Peak absolute amplitude below which a frame is treated as silence. Default: 0.01 */
  silenceThreshold: number;

  /** Hard capacity of a session's audio queue. Default: 50 */
  queueCapacity: number;
  /** Depth at which the ingestor starts logging pressure warnings. Default: 30 */
  queueWarnDepth: number;
  /** Depth above which the ingestor drops new frames outright. Default: 45 */
  queueCriticalDepth: number;

  /** Samples pushed to the recognizer per window. Default: 8000 */
  windowSamples: number;
  /** Dequeued items held before flushing a batch to the buffer. Default: 8 */
  maxBatchItems: number;
  /** Queue depth above which every dequeued item flushes the batch. Default: 5 */
  batchFlushDepth: number;
  /** Maximum time a batch may wait before flushing. Default: 100 */
  batchTimeoutMs: number;

  /** Dequeue wait when depth > fastDequeueDepth. Default: 50 */
  dequeueTimeoutFastMs: number;
  /** Dequeue wait when depth > normalDequeueDepth. Default: 100 */
  dequeueTimeoutNormalMs: number;
  /** Dequeue wait when the queue is (nearly) empty. Default: 500 */
  dequeueTimeoutIdleMs: number;
  fastDequeueDepth: number;
  normalDequeueDepth: number;

  /** Consumer-side depth that triggers an emergency drain. Default: 20 */
  emergencyDrainDepth: number;
  /** Depth an emergency drain tries to leave behind. Default: 10 */
  emergencyDrainTarget: number;
  /** Upper bound on items taken in one emergency drain. Default: 15 */
  emergencyDrainMaxItems: number;
  /** Consumer-side depth that counts as a queue warning. Default: 10 */
  consumerWarnDepth: number;

  /** Batches between performance summaries. Default: 50 */
  performanceLogEveryBatches: number;

  maxRecordingSeconds: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Grace period for trailing final results before the recognizer is stopped. Default: 500 */
  stopGraceMs: number;
  /** Windows processed before a session is considered degraded. Default: 10000 */
  maxChunksProcessed: number;

  /** Sessions untouched for this long are evicted by the sweep. Default: 1800 */
  sessionIdleSeconds: number;
  sweepIntervalMs: number;
}

export const DEFAULT_STREAMING_CONFIG: StreamingConfig = {
  targetSampleRate: 16000,
  silenceThreshold: 0.01,

  queueCapacity: 50,
  queueWarnDepth: 30,
  queueCriticalDepth: 45,

  windowSamples: 8000,
  maxBatchItems: 8,
  batchFlushDepth: 5,
  batchTimeoutMs: 100,

  dequeueTimeoutFastMs: 50,
  dequeueTimeoutNormalMs: 100,
  dequeueTimeoutIdleMs: 500,
  fastDequeueDepth: 5,
  normalDequeueDepth: 2,

  emergencyDrainDepth: 20,
  emergencyDrainTarget: 10,
  emergencyDrainMaxItems: 15,
  consumerWarnDepth: 10,

  performanceLogEveryBatches: 50,

  maxRecordingSeconds: 600,
  maxRetries: 3,
  retryDelayMs: 1000,
  stopGraceMs: 500,
  maxChunksProcessed: 10000,

  sessionIdleSeconds: 1800,
  sweepIntervalMs: 60_000,
};

/** Environment variable name for each overridable streaming setting. */
const STREAMING_ENV_KEYS: ReadonlyArray<readonly [keyof StreamingConfig, string]> = [
  ["targetSampleRate", "STREAM_TARGET_SAMPLE_RATE"],
  ["silenceThreshold", "STREAM_SILENCE_THRESHOLD"],
  ["queueCapacity", "STREAM_QUEUE_CAPACITY"],
  ["queueWarnDepth", "STREAM_QUEUE_WARN_DEPTH"],
  ["queueCriticalDepth", "STREAM_QUEUE_CRITICAL_DEPTH"],
  ["windowSamples", "STREAM_WINDOW_SAMPLES"],
  ["maxBatchItems", "STREAM_MAX_BATCH_ITEMS"],
  ["batchFlushDepth", "STREAM_BATCH_FLUSH_DEPTH"],
  ["batchTimeoutMs", "STREAM_BATCH_TIMEOUT_MS"],
  ["dequeueTimeoutFastMs", "STREAM_DEQUEUE_TIMEOUT_FAST_MS"],
  ["dequeueTimeoutNormalMs", "STREAM_DEQUEUE_TIMEOUT_NORMAL_MS"],
  ["dequeueTimeoutIdleMs", "STREAM_DEQUEUE_TIMEOUT_IDLE_MS"],
  ["fastDequeueDepth", "STREAM_FAST_DEQUEUE_DEPTH"],
  ["normalDequeueDepth", "STREAM_NORMAL_DEQUEUE_DEPTH"],
  ["emergencyDrainDepth", "STREAM_EMERGENCY_DRAIN_DEPTH"],
  ["emergencyDrainTarget", "STREAM_EMERGENCY_DRAIN_TARGET"],
  ["emergencyDrainMaxItems", "STREAM_EMERGENCY_DRAIN_MAX_ITEMS"],
  ["consumerWarnDepth", "STREAM_CONSUMER_WARN_DEPTH"],
  ["performanceLogEveryBatches", "STREAM_PERFORMANCE_LOG_EVERY"],
  ["maxRecordingSeconds", "STREAM_MAX_RECORDING_SECONDS"],
  ["maxRetries", "STREAM_MAX_RETRIES"],
  ["retryDelayMs", "STREAM_RETRY_DELAY_MS"],
  ["stopGraceMs", "STREAM_STOP_GRACE_MS"],
  ["maxChunksProcessed", "STREAM_MAX_CHUNKS_PROCESSED"],
  ["sessionIdleSeconds", "STREAM_SESSION_IDLE_SECONDS"],
  ["sweepIntervalMs", "STREAM_SWEEP_INTERVAL_MS"],
];

/**
 * Builds a StreamingConfig from defaults, explicit overrides and STREAM_*
 * environment variables (in increasing priority: defaults, env, overrides).
 * Env values that are not finite non-negative numbers are ignored.
 */
export function loadStreamingConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<StreamingConfig> = {},
): StreamingConfig {
  const config: StreamingConfig = { ...DEFAULT_STREAMING_CONFIG };

  for (const [key, envName] of STREAMING_ENV_KEYS) {
    const raw = env[envName];
    if (raw === undefined || raw.trim() === "") continue;
    const value = Number(raw);
    if (Number.isFinite(value) && value >= 0) {
      config[key] = value;
    }
  }

  return { ...config, ...overrides };
}

// ─── Process configuration ──────────────────────────────────────────────────────

export interface SpeechCredentials {
  key: string | undefined;
  region: string | undefined;
  language: string;
}

export interface AppConfig {
  port: number;
  speech: SpeechCredentials;
  openaiApiKey: string | undefined;
  coachModel: string;
  ttsVoice: string;
  /** IELTS question file; the bundled sample set when unset. */
  ieltsQuestionsPath: string | undefined;
  streaming: StreamingConfig;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env.PORT || "3000", 10);
  return {
    port: Number.isNaN(port) ? 3000 : port,
    speech: {
      key: nonEmpty(env.AZURE_SPEECH_KEY),
      region: nonEmpty(env.AZURE_SPEECH_REGION),
      language: nonEmpty(env.SPEECH_LANGUAGE) ?? "en-US",
    },
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    coachModel: nonEmpty(env.COACH_MODEL) ?? "gpt-4o-mini",
    ttsVoice: nonEmpty(env.TTS_VOICE) ?? "nova",
    ieltsQuestionsPath: nonEmpty(env.IELTS_QUESTIONS_PATH),
    streaming: loadStreamingConfig(env),
  };
}
