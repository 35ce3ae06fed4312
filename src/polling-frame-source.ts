// Voice Moderation Relay - Polling frame source
// Reads new samples from a capture device's ring buffer on a timer and forwards them
// to the sink in frames of at most sampleRate / 10 samples.

import type { FrameSink, FrameSource } from "./frame-source.js";
import { createConsoleLogger, type Logger } from "./logger.js";

/**
 * A capture device that records into a looping buffer of `bufferLength` samples.
 */
export interface CaptureDevice {
  readonly name: string;
  readonly sampleRate: number;
  readonly channelCount: number;
  readonly bufferLength: number;
  isAvailable(): boolean;
  /** Omitted when the platform has no permission model. */
  hasPermission?(): boolean;
  start(): void;
  stop(): void;
  /** Index of the next sample the device will write, in [0, bufferLength). */
  getPosition(): number;
  /** Fill `destination` from the ring buffer starting at `offset`. Never wraps. */
  read(offset: number, destination: Float32Array): void;
}

export interface PollingFrameSourceOptions {
  /** Poll interval in milliseconds. Default: 20 */
  pollIntervalMs?: number;
  logger?: Logger;
}

const DEFAULT_POLL_INTERVAL_MS = 20;

export class PollingFrameSource implements FrameSource {
  readonly name: string;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;
  private readonly maxFrameSamples: number;

  private timer: ReturnType<typeof setInterval> | null = null;
  private readPosition = 0;
  private permissionCache: boolean | null = null;

  constructor(
    private readonly device: CaptureDevice,
    private readonly sink: FrameSink,
    options: PollingFrameSourceOptions = {},
  ) {
    this.name = `device:${device.name}`;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger ?? createConsoleLogger("PollingFrameSource");
    this.maxFrameSamples = Math.max(1, Math.floor(device.sampleRate / 10));
  }

  get isRecording(): boolean {
    return this.timer !== null;
  }

  /**
   * Device present and permission granted. The permission answer is cached after
   * the first check; call refreshPermissionCache() after the user changes it.
   */
  canRecord(): boolean {
    if (!this.device.isAvailable()) return false;
    if (this.permissionCache === null) {
      this.permissionCache = this.device.hasPermission ? this.device.hasPermission() : true;
    }
    return this.permissionCache;
  }

  refreshPermissionCache(): void {
    this.permissionCache = null;
  }

  start(): void {
    if (this.timer) return;
    if (!this.canRecord()) {
      this.logger.warn(`Cannot record from "${this.device.name}": device unavailable or permission denied`);
      return;
    }

    this.device.start();
    this.sink.configureAudio(this.device.sampleRate, this.device.channelCount);
    this.readPosition = this.device.getPosition();
    this.timer = setInterval(() => this.poll(), this.pollIntervalMs);
    this.logger.info(
      `Recording from "${this.device.name}" at ${this.device.sampleRate}Hz x${this.device.channelCount}`,
    );
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.device.stop();
    this.logger.info(`Stopped recording from "${this.device.name}"`);
  }

  dispose(): void {
    this.stop();
  }

  /** Forward everything written since the last poll. Exposed for tests. */
  poll(): void {
    const bufferLength = this.device.bufferLength;
    const position = this.device.getPosition();
    if (position === this.readPosition) return;

    let available =
      position > this.readPosition ? position - this.readPosition : bufferLength - this.readPosition + position;

    while (available > 0) {
      const count = Math.min(available, this.maxFrameSamples, bufferLength - this.readPosition);
      const frame = new Float32Array(count);
      this.device.read(this.readPosition, frame);
      this.sink.onFrame(frame);
      this.readPosition = (this.readPosition + count) % bufferLength;
      available -= count;
    }
  }
}
