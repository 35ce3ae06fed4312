// Voice Moderation Relay - Chunk Accumulator
// Collects incoming samples into a fixed-size buffer and hands back one complete
// chunk each time the buffer fills.
//
// Audio is held in memory only; a completed chunk is copied out and the buffer reused.

import { ConfigurationError } from "./errors.js";

/** Sample rate the moderation backend expects; higher source rates are decimated to it. */
export const TARGET_SAMPLE_RATE = 16000;

export const DEFAULT_SAMPLE_RATE = 16000;
export const DEFAULT_CHANNEL_COUNT = 1;

/** Largest rate the WAV header's 32-bit sample rate field holds. */
export const MAX_SAMPLE_RATE = 0xffffffff;
/** Largest channel count whose 16-bit block align (channels x 2 bytes) fits the WAV header. */
export const MAX_CHANNEL_COUNT = 32767;

/** Mono or interleaved multi-channel samples, nominally in [-1, 1]. */
export type SampleFrame = ArrayLike<number>;

export interface ChunkerConfig {
  chunkDurationSeconds: number;
  sampleRate: number;
  channelCount: number;
}

export interface ChunkLayout extends ChunkerConfig {
  samplesPerChunk: number;
  downsampleFactor: number;
}

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * @throws ConfigurationError if either value is not a positive integer or does not fit a WAV header.
 */
export function assertAudioFormat(sampleRate: number, channelCount: number): void {
  assertPositiveInteger("sampleRate", sampleRate);
  assertPositiveInteger("channelCount", channelCount);
  if (sampleRate > MAX_SAMPLE_RATE) {
    throw new ConfigurationError(`sampleRate must be at most ${MAX_SAMPLE_RATE}, got ${sampleRate}`);
  }
  if (channelCount > MAX_CHANNEL_COUNT) {
    throw new ConfigurationError(`channelCount must be at most ${MAX_CHANNEL_COUNT}, got ${channelCount}`);
  }
}

/**
 * Derive chunk size and decimation factor from a configuration.
 * @throws ConfigurationError if any field is not a positive integer or the format is out of range.
 */
export function deriveChunkLayout(config: ChunkerConfig): ChunkLayout {
  assertPositiveInteger("chunkDurationSeconds", config.chunkDurationSeconds);
  assertAudioFormat(config.sampleRate, config.channelCount);

  return {
    ...config,
    samplesPerChunk: config.sampleRate * config.channelCount * config.chunkDurationSeconds,
    downsampleFactor: Math.max(1, Math.floor(config.sampleRate / TARGET_SAMPLE_RATE)),
  };
}

/**
 * Fixed-capacity sample buffer.
 *
 * A frame that does not fit in the remaining capacity is truncated: the samples
 * past the chunk boundary are dropped, not carried into the next chunk.
 *
 * Not safe for concurrent producers; a single caller is expected to drive `append`.
 */
export class ChunkAccumulator {
  private buffer: Float32Array | null = null;
  private cursor = 0;
  private currentLayout: ChunkLayout | null = null;
  private sampleRate = DEFAULT_SAMPLE_RATE;
  private channelCount = DEFAULT_CHANNEL_COUNT;

  /**
   * (Re)configure the accumulator. Any partially filled chunk is discarded.
   * Omitted sample rate / channel count keep their previous values.
   */
  configure(chunkDurationSeconds: number, sampleRate?: number, channelCount?: number): ChunkLayout {
    const layout = deriveChunkLayout({
      chunkDurationSeconds,
      sampleRate: sampleRate ?? this.sampleRate,
      channelCount: channelCount ?? this.channelCount,
    });

    this.sampleRate = layout.sampleRate;
    this.channelCount = layout.channelCount;
    this.currentLayout = layout;
    this.buffer = new Float32Array(layout.samplesPerChunk);
    this.cursor = 0;
    return layout;
  }

  get isConfigured(): boolean {
    return this.currentLayout !== null;
  }

  /** @throws ConfigurationError if `configure` has not been called. */
  get layout(): ChunkLayout {
    if (!this.currentLayout) {
      throw new ConfigurationError("Chunk accumulator is not configured. Call configure() first.");
    }
    return this.currentLayout;
  }

  /** Samples written into the current, incomplete chunk. */
  get bufferedSamples(): number {
    return this.cursor;
  }

  /**
   * Copy as much of `frame` as fits. Returns the completed chunk (a new array of
   * exactly `samplesPerChunk` samples) when the buffer fills, otherwise null.
   *
   * @throws ConfigurationError if `configure` has not been called.
   */
  append(frame: SampleFrame): Float32Array | null {
    if (!this.buffer || !this.currentLayout) {
      throw new ConfigurationError("Chunk accumulator is not configured. Call configure() first.");
    }

    const capacity = this.buffer.length;
    const copyLen = Math.min(frame.length, capacity - this.cursor);
    if (frame instanceof Float32Array) {
      this.buffer.set(frame.subarray(0, copyLen), this.cursor);
    } else {
      for (let i = 0; i < copyLen; i++) {
        this.buffer[this.cursor + i] = frame[i];
      }
    }
    this.cursor += copyLen;

    if (this.cursor < capacity) {
      return null;
    }

    const chunk = this.buffer.slice();
    this.cursor = 0;
    return chunk;
  }

  /** Drop the partial chunk, keeping the configuration. */
  reset(): void {
    this.cursor = 0;
  }
}
