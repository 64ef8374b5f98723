// Speaking Coach - Audio processing helpers
// Flattening, voice-activity gating, resampling and PCM conversion for
// inbound browser frames.
//
// Audio Format Contract (recognizer side): mono, LINEAR16, 16kHz.

import type { FrameSamples } from "./types.js";

/** Zero crossings of the sinc kernel on each side of the centre tap. */
const SINC_ZERO_CROSSINGS = 16;

/**
 * Flatten a frame to one mono sample array. Nested per-channel arrays are
 * concatenated in order; a single-row frame (the common [1, N] shape)
 * flattens to its row.
 */
export function flattenSamples(samples: FrameSamples): Float32Array {
  if (samples instanceof Float32Array) {
    return samples;
  }

  let length = 0;
  for (const entry of samples) {
    length += typeof entry === "number" ? 1 : entry.length;
  }

  const flat = new Float32Array(length);
  let offset = 0;
  for (const entry of samples) {
    if (typeof entry === "number") {
      flat[offset++] = entry;
    } else {
      for (const value of entry) {
        flat[offset++] = value;
      }
    }
  }
  return flat;
}

/** Peak absolute amplitude of a frame. Returns 0 for an empty frame. */
export function peakAmplitude(samples: Float32Array): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i++) {
    const magnitude = Math.abs(samples[i]);
    if (magnitude > peak) peak = magnitude;
  }
  return peak;
}

/** Voice-activity gate: true when the frame's peak reaches the threshold. */
export function hasSpeech(samples: Float32Array, threshold: number): boolean {
  return peakAmplitude(samples) >= threshold;
}

// ─── Polyphase windowed-sinc resampler ──────────────────────────────────────────

/** Largest phase count kept as a precomputed bank; rarer ratios compute taps per sample. */
export const MAX_BANK_PHASES = 512;

/** Filter banks kept at once, least recently used evicted first. */
export const MAX_CACHED_BANKS = 4;

interface FilterKernel {
  up: number;
  down: number;
  cutoff: number;
  halfWidth: number;
  /** Taps on each side of the base index. */
  reach: number;
}

interface FilterBank extends FilterKernel {
  /** One tap row per phase; row[k] weights input index base + k - (reach - 1). */
  phases: Float64Array[];
}

const filterBanks = new Map<string, FilterBank>();

function gcd(a: number, b: number): number {
  while (b !== 0) {
    [a, b] = [b, a % b];
  }
  return a;
}

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

/** Blackman window over t in [-1, 1]; zero outside. */
function blackman(t: number): number {
  if (t <= -1 || t >= 1) return 0;
  return 0.42 + 0.5 * Math.cos(Math.PI * t) + 0.08 * Math.cos(2 * Math.PI * t);
}

function buildKernel(fromRate: number, toRate: number): FilterKernel {
  const divisor = gcd(fromRate, toRate);
  // Low-pass at the lower of the two Nyquist frequencies, relative to the input rate.
  const cutoff = Math.min(1, toRate / fromRate);
  const halfWidth = SINC_ZERO_CROSSINGS / cutoff;
  return {
    up: toRate / divisor,
    down: fromRate / divisor,
    cutoff,
    halfWidth,
    reach: Math.ceil(halfWidth),
  };
}

function fillTaps(kernel: FilterKernel, frac: number, row: Float64Array): void {
  const { cutoff, halfWidth, reach } = kernel;
  for (let k = 0; k < row.length; k++) {
    const x = k - (reach - 1) - frac;
    row[k] = cutoff * sinc(cutoff * x) * blackman(x / halfWidth);
  }
}

function getFilterBank(kernel: FilterKernel, key: string): FilterBank {
  const cached = filterBanks.get(key);
  if (cached) {
    // Re-insert to mark as most recently used.
    filterBanks.delete(key);
    filterBanks.set(key, cached);
    return cached;
  }

  const phases: Float64Array[] = [];
  for (let p = 0; p < kernel.up; p++) {
    const row = new Float64Array(2 * kernel.reach);
    fillTaps(kernel, p / kernel.up, row);
    phases.push(row);
  }

  const bank: FilterBank = { ...kernel, phases };
  filterBanks.set(key, bank);
  while (filterBanks.size > MAX_CACHED_BANKS) {
    const oldest = filterBanks.keys().next();
    if (oldest.done) break;
    filterBanks.delete(oldest.value);
  }
  return bank;
}

/** Number of filter banks currently cached. */
export function cachedFilterBankCount(): number {
  return filterBanks.size;
}

/**
 * Resample with a polyphase windowed-sinc filter. Output length is
 * floor(input.length * toRate / fromRate); a zero-length result means the
 * frame was too short for the rate change. Taps that fall outside the frame
 * are dropped and the remaining taps renormalised, so frame edges keep unit
 * gain.
 *
 * Ratios needing more than MAX_BANK_PHASES phases are not banked: their taps
 * are computed for each output sample into one scratch row.
 *
 * @throws Error if either rate is not a positive integer.
 */
export function resample(input: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (!Number.isInteger(fromRate) || fromRate <= 0 || !Number.isInteger(toRate) || toRate <= 0) {
    throw new Error(`Invalid resampling rates: ${fromRate}Hz -> ${toRate}Hz`);
  }
  if (fromRate === toRate) {
    return input.slice();
  }

  const outputLength = Math.floor((input.length * toRate) / fromRate);
  const output = new Float32Array(outputLength);
  if (outputLength === 0) {
    return output;
  }

  const kernel = buildKernel(fromRate, toRate);
  const { up, down, reach } = kernel;
  const bank = up <= MAX_BANK_PHASES ? getFilterBank(kernel, `${fromRate}:${toRate}`) : null;
  const scratch = new Float64Array(bank ? 0 : 2 * reach);
  const lastIndex = input.length - 1;

  for (let i = 0; i < outputLength; i++) {
    const position = i * down;
    const base = Math.floor(position / up);
    const phase = position % up;
    let row: Float64Array = scratch;
    if (bank) {
      row = bank.phases[phase];
    } else {
      fillTaps(kernel, phase / up, scratch);
    }
    const first = base - (reach - 1);

    let acc = 0;
    let norm = 0;
    const kStart = Math.max(0, -first);
    const kEnd = Math.min(row.length - 1, lastIndex - first);
    for (let k = kStart; k <= kEnd; k++) {
      const tap = row[k];
      acc += input[first + k] * tap;
      norm += tap;
    }
    output[i] = norm !== 0 ? acc / norm : 0;
  }

  return output;
}

/** Convert float samples in [-1, 1] to 16-bit little-endian PCM, clamping out-of-range values. */
export function toPcm16(samples: ArrayLike<number>): Buffer {
  const pcm = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    let value = samples[i];
    if (Number.isNaN(value)) value = 0;
    else if (value > 1) value = 1;
    else if (value < -1) value = -1;
    pcm.writeInt16LE(Math.round(value * 32767), i * 2);
  }
  return pcm;
}
