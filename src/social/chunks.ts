export interface ChunkRange {
  index: number;
  start: number; // first byte, inclusive
  end: number; // last byte, inclusive
}

export interface ChunkPlan {
  videoSize: number;
  chunkSize: number;
  totalChunkCount: number;
  chunks: ChunkRange[];
}

/**
 * Splits `videoSize` bytes the way the TikTok upload contract expects:
 * a file no larger than `chunkSize` goes up whole, otherwise there are
 * floor(size / chunkSize) chunks and the last one absorbs the remainder.
 */
export function planChunks(videoSize: number, chunkSize: number): ChunkPlan {
  if (!Number.isInteger(videoSize) || videoSize <= 0) {
    throw new RangeError(`video size must be a positive integer, got ${videoSize}`);
  }
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${chunkSize}`);
  }

  if (videoSize <= chunkSize) {
    return {
      videoSize,
      chunkSize: videoSize,
      totalChunkCount: 1,
      chunks: [{ index: 0, start: 0, end: videoSize - 1 }],
    };
  }

  const totalChunkCount = Math.floor(videoSize / chunkSize);
  const chunks: ChunkRange[] = [];
  for (let index = 0; index < totalChunkCount; index++) {
    const start = index * chunkSize;
    const end = index === totalChunkCount - 1 ? videoSize - 1 : start + chunkSize - 1;
    chunks.push({ index, start, end });
  }
  return { videoSize, chunkSize, totalChunkCount, chunks };
}

export function contentRange(chunk: ChunkRange, total: number): string {
  return `bytes ${chunk.start}-${chunk.end}/${total}`;
}

export function sliceChunk(data: Buffer, chunk: ChunkRange): Buffer {
  return data.subarray(chunk.start, chunk.end + 1);
}
