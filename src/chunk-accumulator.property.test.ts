// Property-Based Tests for ChunkAccumulator
// Chunks are always exactly samplesPerChunk long and contain the input prefix of each
// chunk window, with boundary-straddling tails dropped.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { ChunkAccumulator } from "./chunk-accumulator.js";

/** Reference model: replay frames against a plain array, truncating at each boundary. */
function expectedChunks(frames: number[][], capacity: number): number[][] {
  const chunks: number[][] = [];
  let current: number[] = [];
  for (const frame of frames) {
    const take = frame.slice(0, capacity - current.length);
    current.push(...take);
    if (current.length === capacity) {
      chunks.push(current);
      current = [];
    }
  }
  return chunks;
}

const arbitrarySample = fc.float({ min: -1, max: 1, noNaN: true });

describe("ChunkAccumulator properties", () => {
  it("every emitted chunk has exactly samplesPerChunk samples and matches the truncating model", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 64 }),
        fc.array(fc.array(arbitrarySample, { maxLength: 100 }), { maxLength: 40 }),
        (capacity, frames) => {
          const acc = new ChunkAccumulator();
          acc.configure(1, capacity, 1);

          const emitted: number[][] = [];
          for (const frame of frames) {
            const chunk = acc.append(frame);
            if (chunk) {
              expect(chunk.length).toBe(capacity);
              emitted.push(Array.from(chunk));
            }
          }

          const expected = expectedChunks(frames, capacity).map((chunk) => Array.from(new Float32Array(chunk)));
          expect(emitted).toEqual(expected);
        },
      ),
      { numRuns: 200 },
    );
  });

  it("buffered sample count never exceeds the chunk size", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 32 }),
        fc.array(fc.integer({ min: 0, max: 80 }), { maxLength: 50 }),
        (capacity, frameLengths) => {
          const acc = new ChunkAccumulator();
          acc.configure(1, capacity, 1);
          for (const length of frameLengths) {
            acc.append(new Float32Array(length));
            expect(acc.bufferedSamples).toBeGreaterThanOrEqual(0);
            expect(acc.bufferedSamples).toBeLessThan(capacity);
          }
        },
      ),
    );
  });
});
