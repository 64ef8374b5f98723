// Speaking Coach - TTS Engine
// Converts coach replies to spoken audio via the OpenAI speech API.
//
// Pre-TTS time enforcement: the reply's duration is estimated from its word
// count at a calibrated speaking rate; replies over the cap lose trailing
// sentences before synthesis.

// ─── Config ─────────────────────────────────────────────────────────────────────

export interface TTSConfig {
  voice: string;
  model: string;
  maxDurationSeconds: number;
  calibratedWPM: number;
}

export const DEFAULT_TTS_CONFIG: TTSConfig = {
  voice: "nova",
  model: "tts-1",
  maxDurationSeconds: 60,
  calibratedWPM: 150,
};

// ─── OpenAI TTS client interface (for testability / dependency injection) ────────

/**
 * Minimal interface for the OpenAI audio speech API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAITTSClient {
  audio: {
    speech: {
      create(params: { model: string; voice: string; input: string }): Promise<{
        arrayBuffer(): Promise<ArrayBuffer>;
      }>;
    };
  };
}

// ─── Text helpers ───────────────────────────────────────────────────────────────

/** Remove markdown emphasis and heading characters the voice would read out. */
export function cleanTextForSpeech(text: string): string {
  return text.replace(/[*#_]/g, "");
}

function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// ─── Engine ─────────────────────────────────────────────────────────────────────

export class TTSEngine {
  private readonly openai: OpenAITTSClient;
  private readonly config: TTSConfig;

  constructor(openaiClient: OpenAITTSClient, config: Partial<TTSConfig> = {}) {
    this.openai = openaiClient;
    this.config = { ...DEFAULT_TTS_CONFIG, ...config };
  }

  /** Estimated spoken duration in seconds. */
  estimateDuration(text: string, wpm: number = this.config.calibratedWPM): number {
    const words = countWords(text);
    if (words === 0 || wpm <= 0) return 0;
    return (words / wpm) * 60;
  }

  /**
   * Drop trailing sentences until the text fits in `maxSeconds`. The first
   * sentence is always kept, even if it alone is too long.
   */
  trimToFit(text: string, maxSeconds: number, wpm: number = this.config.calibratedWPM): string {
    if (this.estimateDuration(text, wpm) <= maxSeconds) {
      return text;
    }

    const sentences = splitSentences(text);
    if (sentences.length <= 1) {
      return text;
    }

    let kept = sentences.length;
    while (kept > 1 && this.estimateDuration(sentences.slice(0, kept).join(" "), wpm) > maxSeconds) {
      kept--;
    }
    return sentences.slice(0, kept).join(" ");
  }

  /** Clean, trim and synthesize `text`. Rejects when the speech API fails. */
  async synthesize(text: string): Promise<Buffer> {
    const script = this.trimToFit(cleanTextForSpeech(text), this.config.maxDurationSeconds);

    const response = await this.openai.audio.speech.create({
      model: this.config.model,
      voice: this.config.voice,
      input: script,
    });

    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}
