// Voice Moderation Relay - Frame source contracts
// A frame source delivers variable-length sample arrays at irregular intervals
// (a polled capture device, a networked voice stream...). It pushes them into a
// FrameSink, normally the ModerationOrchestrator.

import type { SampleFrame } from "./chunk-accumulator.js";

export interface FrameSink {
  /** Report the real device format once known. Discards any partial chunk. */
  configureAudio(sampleRate?: number, channelCount?: number): void;
  onFrame(frame: SampleFrame): void;
}

export interface FrameSource {
  readonly name: string;
  readonly isRecording: boolean;
  /** Whether audio may be captured right now (device present, permission granted...). */
  canRecord(): boolean;
  start(): void;
  stop(): void;
  dispose(): void;
}
