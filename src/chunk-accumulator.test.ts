// Unit tests for ChunkAccumulator

import { describe, it, expect } from "vitest";
import { ChunkAccumulator, deriveChunkLayout } from "./chunk-accumulator.js";
import { ConfigurationError } from "./errors.js";

function ramp(start: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => (start + i) / 1000);
}

describe("deriveChunkLayout", () => {
  it("computes samples per chunk from duration, rate and channels", () => {
    const layout = deriveChunkLayout({ chunkDurationSeconds: 2, sampleRate: 48000, channelCount: 2 });
    expect(layout.samplesPerChunk).toBe(192000);
    expect(layout.downsampleFactor).toBe(3);
  });

  it("never decimates below the target rate", () => {
    expect(deriveChunkLayout({ chunkDurationSeconds: 1, sampleRate: 8000, channelCount: 1 }).downsampleFactor).toBe(1);
    expect(deriveChunkLayout({ chunkDurationSeconds: 1, sampleRate: 44100, channelCount: 1 }).downsampleFactor).toBe(2);
  });

  it.each([
    ["chunkDurationSeconds", { chunkDurationSeconds: 0, sampleRate: 16000, channelCount: 1 }],
    ["sampleRate", { chunkDurationSeconds: 1, sampleRate: -1, channelCount: 1 }],
    ["channelCount", { chunkDurationSeconds: 1, sampleRate: 16000, channelCount: 1.5 }],
  ])("rejects a non-positive-integer %s", (name, config) => {
    expect(() => deriveChunkLayout(config)).toThrow(ConfigurationError);
    expect(() => deriveChunkLayout(config)).toThrow(name);
  });

  it("rejects formats a WAV header cannot describe", () => {
    expect(() => deriveChunkLayout({ chunkDurationSeconds: 1, sampleRate: 16000, channelCount: 32768 })).toThrow(
      "channelCount must be at most 32767, got 32768",
    );
    expect(() => deriveChunkLayout({ chunkDurationSeconds: 1, sampleRate: 0x100000000, channelCount: 1 })).toThrow(
      ConfigurationError,
    );
    expect(deriveChunkLayout({ chunkDurationSeconds: 1, sampleRate: 16000, channelCount: 2 }).samplesPerChunk).toBe(32000);
  });
});

describe("ChunkAccumulator", () => {
  it("throws before configure()", () => {
    const acc = new ChunkAccumulator();
    expect(acc.isConfigured).toBe(false);
    expect(() => acc.append([0.1])).toThrow(ConfigurationError);
    expect(() => acc.layout).toThrow(ConfigurationError);
  });

  it("defaults to 16kHz mono", () => {
    const layout = new ChunkAccumulator().configure(1);
    expect(layout.sampleRate).toBe(16000);
    expect(layout.channelCount).toBe(1);
    expect(layout.samplesPerChunk).toBe(16000);
  });

  it("returns null until the buffer fills, then the full chunk", () => {
    const acc = new ChunkAccumulator();
    acc.configure(1, 4, 1);

    expect(acc.append([0.1, 0.2])).toBeNull();
    expect(acc.bufferedSamples).toBe(2);

    const chunk = acc.append(new Float32Array([0.3, 0.4]));
    expect(chunk).not.toBeNull();
    expect(Array.from(chunk ?? [])).toEqual(Array.from(new Float32Array([0.1, 0.2, 0.3, 0.4])));
    expect(acc.bufferedSamples).toBe(0);
  });

  it("drops the part of a frame that straddles the chunk boundary", () => {
    const acc = new ChunkAccumulator();
    acc.configure(1, 5, 1);

    acc.append(ramp(0, 3));
    const chunk = acc.append(ramp(3, 4));

    expect(chunk?.length).toBe(5);
    expect(Array.from(chunk ?? [])).toEqual(Array.from(new Float32Array(ramp(0, 5))));
    // samples 5 and 6 were discarded, not carried over
    expect(acc.bufferedSamples).toBe(0);
    expect(acc.append(ramp(100, 1))).toBeNull();
    expect(acc.bufferedSamples).toBe(1);
  });

  it("returns an independent copy of the chunk", () => {
    const acc = new ChunkAccumulator();
    acc.configure(1, 2, 1);
    const first = acc.append([0.5, 0.5]);
    const second = acc.append([-0.5, -0.5]);
    expect(Array.from(first ?? [])).toEqual([0.5, 0.5]);
    expect(Array.from(second ?? [])).toEqual([-0.5, -0.5]);
  });

  it("discards the partial chunk on reconfigure and keeps omitted format values", () => {
    const acc = new ChunkAccumulator();
    acc.configure(1, 8, 2);
    acc.append([0.1, 0.1, 0.1]);

    const layout = acc.configure(2);
    expect(layout.sampleRate).toBe(8);
    expect(layout.channelCount).toBe(2);
    expect(layout.samplesPerChunk).toBe(32);
    expect(acc.bufferedSamples).toBe(0);
  });

  it("reset() empties the buffer but keeps the layout", () => {
    const acc = new ChunkAccumulator();
    acc.configure(1, 4, 1);
    acc.append([0.1, 0.2, 0.3]);
    acc.reset();
    expect(acc.bufferedSamples).toBe(0);
    expect(acc.layout.samplesPerChunk).toBe(4);
    expect(acc.append([1, 1, 1])).toBeNull();
  });
});
