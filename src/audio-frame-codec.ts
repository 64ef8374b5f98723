/**
 * Binary frame codec for SC-prefixed audio frames.
 *
 * Wire format: [0x53 0x43 magic ("SC")][type byte 0x41][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][payload bytes]
 *
 * Header: { sampleRate, channels, seq }. Payload: interleaved float32
 * little-endian samples in [-1, 1].
 */

import type { AudioFrame } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const SC_MAGIC_0 = 0x53; // 'S'
const SC_MAGIC_1 = 0x43; // 'C'
const TYPE_AUDIO = 0x41; // 'A'

/** Minimum valid frame size: 2 (magic) + 1 (type) + 3 (header len) = 6 bytes */
const MIN_FRAME_SIZE = 6;

/** Maximum header JSON size in bytes */
const MAX_HEADER_JSON_BYTES = 4096;

/** Maximum sample payload per frame (1 MB) */
const MAX_PAYLOAD_BYTES = 1024 * 1024;

const MAX_CHANNELS = 8;
const MAX_SAMPLE_RATE = 384000;

const BYTES_PER_SAMPLE = 4;

export interface AudioFrameHeader {
  sampleRate: number;
  channels: number;
  seq: number;
}

export type DecodeResult =
  | { ok: true; header: AudioFrameHeader; frame: AudioFrame }
  | { ok: false; error: string };

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode interleaved float samples into the SC-prefixed wire format.
 * Produces: [0x53 0x43][0x41][uint24 header len][header JSON][float32 LE samples]
 */
export function encodeAudioFrame(header: AudioFrameHeader, samples: ArrayLike<number>): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  const totalLen = MIN_FRAME_SIZE + headerJson.length + samples.length * BYTES_PER_SAMPLE;
  const buf = Buffer.alloc(totalLen);

  let offset = 0;
  buf[offset++] = SC_MAGIC_0;
  buf[offset++] = SC_MAGIC_1;
  buf[offset++] = TYPE_AUDIO;

  // Write uint24 big-endian header length
  buf[offset++] = (headerJson.length >> 16) & 0xff;
  buf[offset++] = (headerJson.length >> 8) & 0xff;
  buf[offset++] = headerJson.length & 0xff;

  headerJson.copy(buf, offset);
  offset += headerJson.length;

  for (let i = 0; i < samples.length; i++) {
    buf.writeFloatLE(samples[i], offset);
    offset += BYTES_PER_SAMPLE;
  }

  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isValidAudioFrameHeader(obj: unknown): obj is AudioFrameHeader {
  if (typeof obj !== "object" || obj === null) return false;
  if (!("sampleRate" in obj) || !("channels" in obj) || !("seq" in obj)) return false;
  const { sampleRate, channels, seq } = obj;

  if (typeof sampleRate !== "number" || !Number.isInteger(sampleRate)) return false;
  if (sampleRate <= 0 || sampleRate > MAX_SAMPLE_RATE) return false;
  if (typeof channels !== "number" || !Number.isInteger(channels)) return false;
  if (channels < 1 || channels > MAX_CHANNELS) return false;
  if (typeof seq !== "number" || !Number.isInteger(seq) || seq < 0) return false;

  return true;
}

/**
 * Decode an SC-prefixed audio frame. The samples are always one mono
 * Float32Array; multi-channel payloads are downmixed.
 */
export function decodeAudioFrame(data: Buffer): DecodeResult {
  if (!Buffer.isBuffer(data) || data.length < MIN_FRAME_SIZE) {
    return { ok: false, error: "Frame too short" };
  }
  if (data[0] !== SC_MAGIC_0 || data[1] !== SC_MAGIC_1) {
    return { ok: false, error: "Missing SC frame prefix" };
  }
  if (data[2] !== TYPE_AUDIO) {
    return { ok: false, error: `Unsupported frame type 0x${data[2].toString(16)}` };
  }

  // Read uint24 big-endian header length
  const headerLen = (data[3] << 16) | (data[4] << 8) | data[5];
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) {
    return { ok: false, error: `Invalid header length ${headerLen}` };
  }
  if (data.length < MIN_FRAME_SIZE + headerLen) {
    return { ok: false, error: "Frame truncated inside header" };
  }

  let header: unknown;
  try {
    header = JSON.parse(data.toString("utf-8", MIN_FRAME_SIZE, MIN_FRAME_SIZE + headerLen));
  } catch {
    return { ok: false, error: "Header is not valid JSON" };
  }
  if (!isValidAudioFrameHeader(header)) {
    return { ok: false, error: "Header must carry integer sampleRate, channels and seq" };
  }

  const payload = data.subarray(MIN_FRAME_SIZE + headerLen);
  if (payload.length > MAX_PAYLOAD_BYTES) {
    return { ok: false, error: `Payload of ${payload.length} bytes exceeds ${MAX_PAYLOAD_BYTES}` };
  }
  const frameBytes = header.channels * BYTES_PER_SAMPLE;
  if (payload.length % frameBytes !== 0) {
    return {
      ok: false,
      error: `Payload length (${payload.length}) is not a multiple of ${frameBytes} (${header.channels} channel float32)`,
    };
  }

  // Interleaved channels are averaged per sample-frame into one mono track.
  const perChannel = payload.length / frameBytes;
  const samples = new Float32Array(perChannel);
  for (let i = 0; i < perChannel; i++) {
    let sum = 0;
    for (let c = 0; c < header.channels; c++) {
      sum += payload.readFloatLE((i * header.channels + c) * BYTES_PER_SAMPLE);
    }
    samples[i] = sum / header.channels;
  }

  return { ok: true, header, frame: { sampleRate: header.sampleRate, samples } };
}

/** Check for the 0x53 0x43 magic prefix. */
export function isAudioFrame(data: Buffer): boolean {
  if (!Buffer.isBuffer(data) || data.length < 2) return false;
  return data[0] === SC_MAGIC_0 && data[1] === SC_MAGIC_1;
}
