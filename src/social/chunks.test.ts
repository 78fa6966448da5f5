import { describe, expect, it } from 'vitest';
import { contentRange, planChunks, sliceChunk } from './chunks';

const MiB = 1024 * 1024;

describe('planChunks', () => {
  it('sends a file no larger than the chunk size as one chunk', () => {
    const plan = planChunks(3 * MiB, 10 * MiB);
    expect(plan).toEqual({
      videoSize: 3 * MiB,
      chunkSize: 3 * MiB,
      totalChunkCount: 1,
      chunks: [{ index: 0, start: 0, end: 3 * MiB - 1 }],
    });
  });

  it('treats a file of exactly one chunk as a single chunk', () => {
    const plan = planChunks(10 * MiB, 10 * MiB);
    expect(plan.totalChunkCount).toBe(1);
    expect(plan.chunks[0]).toEqual({ index: 0, start: 0, end: 10 * MiB - 1 });
  });

  it('folds the remainder into the last chunk', () => {
    const plan = planChunks(25, 10);
    expect(plan.totalChunkCount).toBe(2);
    expect(plan.chunkSize).toBe(10);
    expect(plan.chunks).toEqual([
      { index: 0, start: 0, end: 9 },
      { index: 1, start: 10, end: 24 },
    ]);
  });

  it('splits evenly divisible sizes into equal chunks', () => {
    const plan = planChunks(30, 10);
    expect(plan.chunks.map((c) => c.end - c.start + 1)).toEqual([10, 10, 10]);
  });

  it('rejects empty files and bad chunk sizes', () => {
    expect(() => planChunks(0, 10)).toThrow(RangeError);
    expect(() => planChunks(10, 0)).toThrow(RangeError);
    expect(() => planChunks(10.5, 4)).toThrow(RangeError);
  });
});

describe('chunk helpers', () => {
  it('formats an inclusive content range', () => {
    expect(contentRange({ index: 1, start: 10, end: 24 }, 25)).toBe('bytes 10-24/25');
  });

  it('reassembles the original bytes from its chunks', () => {
    const data = Buffer.from(Array.from({ length: 1000 }, (_, i) => (i * 7) % 256));
    for (const chunkSize of [1, 3, 64, 999, 1000, 4096]) {
      const plan = planChunks(data.length, chunkSize);
      const rebuilt = Buffer.concat(plan.chunks.map((c) => sliceChunk(data, c)));
      expect(rebuilt.equals(data)).toBe(true);
    }
  });
});
