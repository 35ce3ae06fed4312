// Voice Moderation Relay - Sample-rate converter + WAV encoder
// Decimates float chunks by an integer factor and packs them as 16-bit linear PCM
// in a canonical 44-byte-header WAV container.

/** Size of the canonical RIFF/WAVE header */
export const WAV_HEADER_BYTES = 44;

const BYTES_PER_SAMPLE = 2;
const PCM_FORMAT_TAG = 1;
const INT16_SCALE = 32767;

export interface EncodeOptions {
  /** Rate of the incoming samples in Hz */
  sampleRate: number;
  /** Keep every Nth sample */
  downsampleFactor: number;
  channelCount: number;
  /** A chunk is too quiet unless some kept sample has |s| strictly above this */
  silenceThreshold: number;
}

export interface EncodedChunk {
  bytes: Buffer;
  tooQuiet: boolean;
}

export interface WavHeader {
  riffSize: number;
  audioFormat: number;
  channelCount: number;
  sampleRate: number;
  byteRate: number;
  blockAlign: number;
  bitsPerSample: number;
  dataLength: number;
}

/**
 * Sample rate written to the header after decimation.
 */
export function decimatedSampleRate(sampleRate: number, downsampleFactor: number): number {
  return Math.max(1, Math.floor(sampleRate / Math.max(1, downsampleFactor)));
}

function writeWavHeader(target: Buffer, dataLength: number, sampleRate: number, channels: number): void {
  let offset = 0;

  // RIFF header
  target.write("RIFF", offset, "ascii"); offset += 4;
  target.writeUInt32LE(36 + dataLength, offset); offset += 4;
  target.write("WAVE", offset, "ascii"); offset += 4;

  // fmt chunk
  target.write("fmt ", offset, "ascii"); offset += 4;
  target.writeUInt32LE(16, offset); offset += 4;
  target.writeUInt16LE(PCM_FORMAT_TAG, offset); offset += 2;
  target.writeUInt16LE(channels, offset); offset += 2;
  target.writeUInt32LE(sampleRate, offset); offset += 4;
  target.writeUInt32LE(sampleRate * channels * BYTES_PER_SAMPLE, offset); offset += 4;
  target.writeUInt16LE(channels * BYTES_PER_SAMPLE, offset); offset += 2;
  target.writeUInt16LE(BYTES_PER_SAMPLE * 8, offset); offset += 2;

  // data chunk
  target.write("data", offset, "ascii"); offset += 4;
  target.writeUInt32LE(dataLength, offset);
}

/**
 * Reusable encoder. Owns a single scratch buffer that grows to the largest chunk
 * seen and is overwritten on every call; callers get an independent copy.
 */
export class WavEncoder {
  private scratch: Buffer = Buffer.alloc(0);

  encode(samples: ArrayLike<number>, options: EncodeOptions): EncodedChunk {
    const factor = Math.max(1, Math.floor(options.downsampleFactor));
    const outputCount = Math.ceil(samples.length / factor);
    const dataLength = outputCount * BYTES_PER_SAMPLE;
    const total = WAV_HEADER_BYTES + dataLength;

    if (this.scratch.length < total) {
      this.scratch = Buffer.alloc(total);
    }

    let tooQuiet = true;
    let offset = WAV_HEADER_BYTES;
    for (let i = 0; i < samples.length; i += factor) {
      const sample = samples[i];
      if (tooQuiet && Math.abs(sample) > options.silenceThreshold) {
        tooQuiet = false;
      }
      const clamped = Math.max(-1, Math.min(1, sample));
      // trunc rounds toward zero; `|| 0` folds NaN and -0 to 0
      this.scratch.writeInt16LE(Math.trunc(clamped * INT16_SCALE) || 0, offset);
      offset += BYTES_PER_SAMPLE;
    }

    writeWavHeader(
      this.scratch,
      dataLength,
      decimatedSampleRate(options.sampleRate, factor),
      options.channelCount,
    );

    return { bytes: Buffer.from(this.scratch.subarray(0, total)), tooQuiet };
  }
}

/**
 * Parse a canonical 44-byte WAV header.
 * @returns Parsed header, or null if the buffer is short or the chunk IDs do not match.
 */
export function parseWavHeader(bytes: Buffer): WavHeader | null {
  if (bytes.length < WAV_HEADER_BYTES) {
    return null;
  }

  if (
    bytes.toString("ascii", 0, 4) !== "RIFF" ||
    bytes.toString("ascii", 8, 12) !== "WAVE" ||
    bytes.toString("ascii", 12, 16) !== "fmt " ||
    bytes.toString("ascii", 36, 40) !== "data"
  ) {
    return null;
  }

  return {
    riffSize: bytes.readUInt32LE(4),
    audioFormat: bytes.readUInt16LE(20),
    channelCount: bytes.readUInt16LE(22),
    sampleRate: bytes.readUInt32LE(24),
    byteRate: bytes.readUInt32LE(28),
    blockAlign: bytes.readUInt16LE(32),
    bitsPerSample: bytes.readUInt16LE(34),
    dataLength: bytes.readUInt32LE(40),
  };
}

/**
 * Read the 16-bit samples that follow the header.
 */
export function readWavSamples(bytes: Buffer): Int16Array {
  const count = Math.floor((bytes.length - WAV_HEADER_BYTES) / BYTES_PER_SAMPLE);
  const out = new Int16Array(Math.max(0, count));
  for (let i = 0; i < out.length; i++) {
    out[i] = bytes.readInt16LE(WAV_HEADER_BYTES + i * BYTES_PER_SAMPLE);
  }
  return out;
}
