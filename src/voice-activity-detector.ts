// Voice Moderation Relay - Voice Activity Detector
// Frame-level energy + zero-crossing-rate classifier that filters a sample stream
// down to its voiced portions, with trailing hangover and a matching pre-roll.

/**
 * Tuning for the VAD. Defaults are tuned for ~48kHz voice chat audio and work at 16kHz.
 */
export interface VADOptions {
  /** Mean squared energy a frame must exceed to count as speech. Default: 0.0001 */
  energyThreshold: number;
  /** Zero-crossing rate (crossings per sample) a frame must stay below. Default: 0.2 */
  zcrThreshold: number;
  /** How long speech stays "on" after the signal drops, in milliseconds. Default: 500 */
  hangoverMs: number;
  /** Smoothing factor for the running energy estimate (0..1, higher = slower). Default: 0.95 */
  energyAlpha: number;
}

export const DEFAULT_VAD_OPTIONS: VADOptions = {
  energyThreshold: 0.0001,
  zcrThreshold: 0.2,
  hangoverMs: 500,
  energyAlpha: 0.95,
};

/** Frames per second of analysis (10ms frames) */
const FRAMES_PER_SECOND = 100;

const clamp01 = (v: number) => Math.min(1, Math.max(0, v));

export interface FrameFeatures {
  /** Mean of squared samples */
  energy: number;
  /** Sign changes between consecutive samples divided by the frame length */
  zcr: number;
}

/**
 * Compute energy and zero-crossing rate for one analysis frame.
 * A crossing is counted between samples on opposite sides of zero (`>= 0` vs `< 0`).
 */
export function computeFrameFeatures(frame: Float32Array): FrameFeatures {
  if (frame.length === 0) return { energy: 0, zcr: 0 };

  let energy = 0;
  let zeroCrossings = 0;
  for (let i = 0; i < frame.length; i++) {
    const s = frame[i];
    energy += s * s;
    if (i > 0 && (s >= 0) !== (frame[i - 1] >= 0)) {
      zeroCrossings++;
    }
  }

  return { energy: energy / frame.length, zcr: zeroCrossings / frame.length };
}

/**
 * Streaming voice activity detector.
 *
 * Input is cut into ~10ms frames. Each frame is pushed into a delay queue of
 * `hangoverFrames` frames; once the queue is over that length the oldest frame is
 * released, and kept only if the *current* frame is voiced. Output is therefore
 * delayed by exactly `hangoverFrames` frames, which gives a lead-in before detected
 * speech equal to the trailing hangover after it.
 *
 * One instance per chunker. Not safe for concurrent producers.
 */
export class VoiceActivityDetector {
  readonly sampleRate: number;
  readonly frameSize: number;
  readonly hangoverFrames: number;

  private readonly energyThreshold: number;
  private readonly zcrThreshold: number;
  private readonly alpha: number;

  // Rolling state
  private frameBuffer: Float32Array;
  private frameBufferIndex: number;
  private hangoverRemaining: number;
  private runningEnergyValue: number;
  private delayQueue: Float32Array[];

  constructor(sampleRate: number, options: Partial<VADOptions> = {}) {
    const opts = { ...DEFAULT_VAD_OPTIONS, ...options };

    this.sampleRate = Math.max(1, Math.floor(sampleRate));
    this.energyThreshold = Math.max(0, opts.energyThreshold);
    this.zcrThreshold = clamp01(opts.zcrThreshold);
    this.alpha = clamp01(opts.energyAlpha);

    this.frameSize = Math.max(1, Math.floor(this.sampleRate / FRAMES_PER_SECOND));
    const framesPerSecond = Math.max(1, Math.floor(this.sampleRate / this.frameSize));
    this.hangoverFrames = Math.max(0, Math.round((opts.hangoverMs / 1000) * framesPerSecond));

    this.frameBuffer = new Float32Array(this.frameSize);
    this.frameBufferIndex = 0;
    this.hangoverRemaining = 0;
    this.runningEnergyValue = 0;
    this.delayQueue = [];
  }

  /** Exponential moving average of frame energy, for diagnostics. */
  get runningEnergy(): number {
    return this.runningEnergyValue;
  }

  /** Frames currently held back in the delay queue. */
  get pendingFrames(): number {
    return this.delayQueue.length;
  }

  /**
   * Feed samples and return the voiced samples released by this call (possibly empty).
   * Incomplete trailing frames are kept for the next call.
   */
  process(samples: ArrayLike<number>): Float32Array {
    if (samples.length === 0) return new Float32Array(0);

    const released: Float32Array[] = [];
    for (let i = 0; i < samples.length; i++) {
      this.frameBuffer[this.frameBufferIndex++] = samples[i];
      if (this.frameBufferIndex >= this.frameSize) {
        const frame = this.processFrame();
        if (frame) released.push(frame);
        this.frameBufferIndex = 0;
      }
    }

    if (released.length === 0) return new Float32Array(0);
    const out = new Float32Array(released.length * this.frameSize);
    released.forEach((frame, idx) => out.set(frame, idx * this.frameSize));
    return out;
  }

  /** Classify the full frame buffer; returns the delayed frame to emit, if any. */
  private processFrame(): Float32Array | null {
    const { energy, zcr } = computeFrameFeatures(this.frameBuffer);

    this.runningEnergyValue = this.alpha * this.runningEnergyValue + (1 - this.alpha) * energy;

    let isVoice = false;
    if (energy > this.energyThreshold && zcr < this.zcrThreshold) {
      isVoice = true;
      this.hangoverRemaining = this.hangoverFrames;
    } else if (this.hangoverRemaining > 0) {
      isVoice = true;
      this.hangoverRemaining--;
    }

    this.delayQueue.push(this.frameBuffer.slice());

    if (this.delayQueue.length > this.hangoverFrames) {
      const delayed = this.delayQueue.shift();
      if (delayed && isVoice) return delayed;
    }
    return null;
  }

  /** Clear the frame buffer, running energy, hangover counter and delay queue. */
  reset(): void {
    this.frameBuffer.fill(0);
    this.frameBufferIndex = 0;
    this.hangoverRemaining = 0;
    this.runningEnergyValue = 0;
    this.delayQueue = [];
  }
}
