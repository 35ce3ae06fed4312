// Voice Moderation Relay - Chunk strategies
// Three interchangeable ways to turn a live sample stream into uploadable WAV chunks:
//   fixed          every sample is kept; a chunk is dropped at encode time if it never gets loud
//   silence_filter only samples above the threshold are kept (per-sample gate)
//   vad            only frames the voice activity detector classifies as speech are kept

import { ChunkAccumulator, type ChunkLayout, type SampleFrame } from "./chunk-accumulator.js";
import { VoiceActivityDetector, type VADOptions } from "./voice-activity-detector.js";
import { WavEncoder } from "./wav-encoder.js";

export const DEFAULT_FIXED_SILENCE_THRESHOLD = 0.021;
export const DEFAULT_SILENCE_FILTER_THRESHOLD = 0.02;
export const DEFAULT_VAD_ENCODE_SILENCE_THRESHOLD = 0;

export type ChunkerStrategy =
  | { kind: "fixed"; silenceThreshold?: number }
  | { kind: "silence_filter"; threshold?: number }
  | { kind: "vad"; vad?: Partial<VADOptions>; encodeSilenceThreshold?: number };

export type ChunkerStrategyKind = ChunkerStrategy["kind"];

/**
 * Common contract for every strategy.
 */
export interface AudioChunker {
  readonly kind: ChunkerStrategyKind;
  /** Current layout. Throws ConfigurationError before the first configure(). */
  readonly layout: ChunkLayout;
  readonly isConfigured: boolean;
  /** Reset all buffered state and apply a new layout. */
  configure(chunkDurationSeconds: number, sampleRate?: number, channelCount?: number): ChunkLayout;
  /** Feed a frame; returns a complete chunk when one is ready. */
  append(frame: SampleFrame): Float32Array | null;
  /** Encode a chunk as WAV, or null when it is too quiet to be worth uploading. */
  encode(chunk: Float32Array): Buffer | null;
}

abstract class AccumulatingChunker implements AudioChunker {
  abstract readonly kind: ChunkerStrategyKind;
  protected readonly accumulator = new ChunkAccumulator();
  private readonly encoder = new WavEncoder();

  constructor(protected readonly silenceThreshold: number) {}

  get layout(): ChunkLayout {
    return this.accumulator.layout;
  }

  get isConfigured(): boolean {
    return this.accumulator.isConfigured;
  }

  configure(chunkDurationSeconds: number, sampleRate?: number, channelCount?: number): ChunkLayout {
    return this.accumulator.configure(chunkDurationSeconds, sampleRate, channelCount);
  }

  abstract append(frame: SampleFrame): Float32Array | null;

  encode(chunk: Float32Array): Buffer | null {
    const { sampleRate, downsampleFactor, channelCount } = this.layout;
    const { bytes, tooQuiet } = this.encoder.encode(chunk, {
      sampleRate,
      downsampleFactor,
      channelCount,
      silenceThreshold: this.silenceThreshold,
    });
    return tooQuiet ? null : bytes;
  }
}

/**
 * Buffers every sample. Silence is handled per chunk: a chunk whose peak never
 * exceeds the threshold encodes to null and is not uploaded.
 */
export class FixedChunker extends AccumulatingChunker {
  readonly kind = "fixed";

  constructor(silenceThreshold = DEFAULT_FIXED_SILENCE_THRESHOLD) {
    super(silenceThreshold);
  }

  append(frame: SampleFrame): Float32Array | null {
    return this.accumulator.append(frame);
  }
}

/**
 * Keeps only samples whose magnitude exceeds the threshold.
 *
 * Trade-off for callers: fewer, denser uploads, but a chunk can cover much more
 * wall-clock time than its nominal duration (a short burst of speech may wait a
 * long while before it is moderated), and the quiet context around speech is lost.
 */
export class SilenceFilterChunker extends AccumulatingChunker {
  readonly kind = "silence_filter";

  constructor(threshold = DEFAULT_SILENCE_FILTER_THRESHOLD) {
    super(threshold);
  }

  append(frame: SampleFrame): Float32Array | null {
    const loud: number[] = [];
    for (let i = 0; i < frame.length; i++) {
      if (Math.abs(frame[i]) > this.silenceThreshold) {
        loud.push(frame[i]);
      }
    }
    if (loud.length === 0) return null;
    return this.accumulator.append(loud);
  }
}

/**
 * Runs frames through a voice activity detector and accumulates only voiced samples.
 * The detector is rebuilt for the current sample rate on every configure().
 */
export class VADChunker extends AccumulatingChunker {
  readonly kind = "vad";
  private vad: VoiceActivityDetector | null = null;

  constructor(
    private readonly vadOptions: Partial<VADOptions> = {},
    encodeSilenceThreshold = DEFAULT_VAD_ENCODE_SILENCE_THRESHOLD,
  ) {
    super(encodeSilenceThreshold);
  }

  /** The detector for the current configuration, or null before configure(). */
  get detector(): VoiceActivityDetector | null {
    return this.vad;
  }

  configure(chunkDurationSeconds: number, sampleRate?: number, channelCount?: number): ChunkLayout {
    const layout = super.configure(chunkDurationSeconds, sampleRate, channelCount);
    this.vad = new VoiceActivityDetector(layout.sampleRate, this.vadOptions);
    this.vad.reset();
    return layout;
  }

  append(frame: SampleFrame): Float32Array | null {
    if (!this.vad) {
      // Surfaces the accumulator's ConfigurationError
      return this.accumulator.append(frame);
    }
    const voiced = this.vad.process(frame);
    if (voiced.length === 0) return null;
    return this.accumulator.append(voiced);
  }
}

/**
 * Build the chunker for a strategy.
 */
export function createAudioChunker(strategy: ChunkerStrategy = { kind: "fixed" }): AudioChunker {
  switch (strategy.kind) {
    case "fixed":
      return new FixedChunker(strategy.silenceThreshold);
    case "silence_filter":
      return new SilenceFilterChunker(strategy.threshold);
    case "vad":
      return new VADChunker(strategy.vad, strategy.encodeSilenceThreshold);
    default: {
      const exhaustiveCheck: never = strategy;
      throw new Error(`Unknown chunker strategy: ${(exhaustiveCheck as { kind: string }).kind}`);
    }
  }
}
