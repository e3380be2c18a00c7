/**
 * Minimal RIFF/WAVE codec for speech input. Decodes integer PCM (8, 16, 24
 * and 32 bit) and 32-bit float, then produces the mono 16 kHz 16-bit
 * little-endian PCM that LINEAR16 recognisers take.
 */

import { UnsupportedAudioError } from "../errors/catalog.js";

export const TARGET_SAMPLE_RATE = 16_000;

const FORMAT_PCM = 1;
const FORMAT_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

export interface DecodedWav {
  sampleRate: number;
  channelCount: number;
  /** Mono samples in [-1, 1]. */
  samples: Float32Array;
}

interface WavFormat {
  format: number;
  channelCount: number;
  sampleRate: number;
  bitsPerSample: number;
}

function fourCC(view: DataView, offset: number): string {
  return String.fromCharCode(
    view.getUint8(offset),
    view.getUint8(offset + 1),
    view.getUint8(offset + 2),
    view.getUint8(offset + 3),
  );
}

export function isWav(bytes: Uint8Array): boolean {
  if (bytes.byteLength < 12) return false;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return fourCC(view, 0) === "RIFF" && fourCC(view, 8) === "WAVE";
}

function readFormat(view: DataView, offset: number, size: number): WavFormat {
  if (size < 16) {
    throw new UnsupportedAudioError("WAV fmt chunk too short", { size });
  }
  let format = view.getUint16(offset, true);
  if (format === FORMAT_EXTENSIBLE && size >= 26) {
    // First two bytes of the sub-format GUID carry the real format tag.
    format = view.getUint16(offset + 24, true);
  }
  return {
    format,
    channelCount: view.getUint16(offset + 2, true),
    sampleRate: view.getUint32(offset + 4, true),
    bitsPerSample: view.getUint16(offset + 14, true),
  };
}

function sampleReader(
  fmt: WavFormat,
): (view: DataView, offset: number) => number {
  if (fmt.format === FORMAT_FLOAT && fmt.bitsPerSample === 32) {
    return (view, offset) => view.getFloat32(offset, true);
  }
  if (fmt.format === FORMAT_PCM) {
    switch (fmt.bitsPerSample) {
      case 8:
        return (view, offset) => (view.getUint8(offset) - 128) / 128;
      case 16:
        return (view, offset) => view.getInt16(offset, true) / 0x8000;
      case 24:
        return (view, offset) => {
          let v =
            view.getUint8(offset) |
            (view.getUint8(offset + 1) << 8) |
            (view.getUint8(offset + 2) << 16);
          if (v & 0x800000) v -= 0x1000000;
          return v / 0x800000;
        };
      case 32:
        return (view, offset) => view.getInt32(offset, true) / 0x80000000;
    }
  }
  throw new UnsupportedAudioError(
    `Unsupported WAV encoding: format ${fmt.format}, ${fmt.bitsPerSample} bits`,
    { format: fmt.format, bitsPerSample: fmt.bitsPerSample },
  );
}

/** Decodes a WAV file and averages its channels into one. */
export function decodeWav(bytes: Uint8Array): DecodedWav {
  if (!isWav(bytes)) {
    throw new UnsupportedAudioError("Audio is not a RIFF/WAVE file");
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  let fmt: WavFormat | undefined;
  let dataOffset = -1;
  let dataSize = 0;

  let offset = 12;
  while (offset + 8 <= view.byteLength) {
    const id = fourCC(view, offset);
    const size = view.getUint32(offset + 4, true);
    const body = offset + 8;
    if (id === "fmt ") {
      fmt = readFormat(view, body, size);
    } else if (id === "data") {
      dataOffset = body;
      // Streaming writers may leave the size unset or too large.
      dataSize = Math.min(size, view.byteLength - body);
      break;
    }
    offset = body + size + (size % 2);
  }

  if (!fmt) throw new UnsupportedAudioError("WAV file has no fmt chunk");
  if (dataOffset < 0) throw new UnsupportedAudioError("WAV file has no data chunk");
  if (fmt.channelCount < 1 || fmt.sampleRate < 1) {
    throw new UnsupportedAudioError("WAV header is invalid", {
      channelCount: fmt.channelCount,
      sampleRate: fmt.sampleRate,
    });
  }

  const read = sampleReader(fmt);
  const bytesPerSample = fmt.bitsPerSample / 8;
  const frameSize = bytesPerSample * fmt.channelCount;
  const frameCount = Math.floor(dataSize / frameSize);
  const samples = new Float32Array(frameCount);

  for (let frame = 0; frame < frameCount; frame++) {
    const base = dataOffset + frame * frameSize;
    let sum = 0;
    for (let ch = 0; ch < fmt.channelCount; ch++) {
      sum += read(view, base + ch * bytesPerSample);
    }
    samples[frame] = sum / fmt.channelCount;
  }

  return { sampleRate: fmt.sampleRate, channelCount: fmt.channelCount, samples };
}

/** Linear-interpolation resampler. */
export function resample(
  samples: Float32Array,
  fromRate: number,
  toRate: number,
): Float32Array {
  if (fromRate === toRate || samples.length === 0) return samples;
  const outLength = Math.max(1, Math.round((samples.length * toRate) / fromRate));
  const out = new Float32Array(outLength);
  const step = fromRate / toRate;
  const last = samples.length - 1;
  for (let i = 0; i < outLength; i++) {
    const pos = i * step;
    const i0 = Math.min(Math.floor(pos), last);
    const i1 = Math.min(i0 + 1, last);
    const frac = pos - i0;
    out[i] = (samples[i0] ?? 0) * (1 - frac) + (samples[i1] ?? 0) * frac;
  }
  return out;
}

export function encodePcm16(samples: Float32Array): Uint8Array {
  const out = new Uint8Array(samples.length * 2);
  const view = new DataView(out.buffer);
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i] ?? 0));
    view.setInt16(i * 2, Math.round(s < 0 ? s * 0x8000 : s * 0x7fff), true);
  }
  return out;
}

/** WAV bytes to headerless mono 16 kHz 16-bit little-endian PCM. */
export function toLinear16(bytes: Uint8Array): Uint8Array {
  const decoded = decodeWav(bytes);
  return encodePcm16(
    resample(decoded.samples, decoded.sampleRate, TARGET_SAMPLE_RATE),
  );
}
