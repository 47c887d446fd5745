/**
 * Overlapping text chunks for detectors with a bounded input size
 */

import type { ChunkInfo } from "./types.js";

export function chunkContent(
  content: string,
  maxChunkSize: number,
  overlapSize: number,
): ChunkInfo[] {
  if (maxChunkSize <= 0 || overlapSize < 0 || overlapSize >= maxChunkSize) {
    throw new RangeError(
      `Invalid chunking: maxChunkSize=${maxChunkSize}, overlapSize=${overlapSize}`,
    );
  }

  if (content.length <= maxChunkSize) {
    return [
      {
        index: 0,
        total: 1,
        content,
        startOffset: 0,
        endOffset: content.length,
      },
    ];
  }

  const chunks: ChunkInfo[] = [];
  let startOffset = 0;

  while (startOffset < content.length) {
    const endOffset = Math.min(startOffset + maxChunkSize, content.length);

    chunks.push({
      index: chunks.length,
      total: 0,
      content: content.slice(startOffset, endOffset),
      startOffset,
      endOffset,
    });

    startOffset = endOffset - overlapSize;
    if (startOffset >= content.length - overlapSize) {
      break;
    }
  }

  for (const chunk of chunks) {
    chunk.total = chunks.length;
  }

  return chunks;
}
