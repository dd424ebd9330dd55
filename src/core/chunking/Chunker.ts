/**
 * Splits decoded document text into overlapping chunks for embedding.
 *
 * Windows are measured in characters. Each window is `targetSize` long and the
 * next one starts `overlap` characters before the previous end. A window that
 * stops short of the end of the text snaps back to the last sentence or
 * paragraph boundary within `lookBack` characters when there is one.
 */

import { createHash } from 'node:crypto';
import { InvalidParametersError } from '../utils/errors.js';
import { chunkIdFor, type Chunk, type DocumentId, type OwnerId } from '../entities/Document.js';

export const DEFAULT_LOOK_BACK = 100;

const BOUNDARY_CHARS = new Set(['\n', '.', '!', '?']);

export interface ChunkOptions {
  targetSize: number;
  overlap: number;
  /** How far before the hard cutoff to look for a boundary */
  lookBack?: number;
}

export type ChunkSpan = {
  index: number;
  text: string;
  start: number;
  end: number;
};

export function validateChunkOptions({ targetSize, overlap, lookBack }: ChunkOptions): void {
  if (!Number.isInteger(targetSize) || targetSize < 1) {
    throw new InvalidParametersError(`targetSize must be a positive integer, got ${targetSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= targetSize) {
    throw new InvalidParametersError(
      `overlap must be an integer with 0 <= overlap < targetSize (${targetSize}), got ${overlap}`
    );
  }
  if (lookBack !== undefined && (!Number.isInteger(lookBack) || lookBack < 0)) {
    throw new InvalidParametersError(`lookBack must be a non-negative integer, got ${lookBack}`);
  }
}

export function chunkText(text: string, options: ChunkOptions): ChunkSpan[] {
  validateChunkOptions(options);
  const { targetSize, overlap } = options;
  const lookBack = Math.min(options.lookBack ?? DEFAULT_LOOK_BACK, targetSize);

  const spans: ChunkSpan[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + targetSize, text.length);
    if (end < text.length) {
      end = snapToBoundary(text, start, end, overlap, lookBack);
      if (isHighSurrogate(text, end - 1)) {
        // keep the pair whole, shrinking only while the next window still moves forward
        end = end - 1 > start + overlap ? end - 1 : end + 1;
      }
    }

    const span = text.slice(start, end);
    if (span.trim().length > 0) {
      spans.push({ index: spans.length, text: span, start, end });
    }

    if (end >= text.length) break;
    start = end - overlap;
    if (isHighSurrogate(text, start - 1)) start++;
  }

  return spans;
}

function isHighSurrogate(text: string, i: number): boolean {
  if (i < 0 || i >= text.length) return false;
  const code = text.charCodeAt(i);
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * The snapped end never lets the following window start at or before `start`.
 */
function snapToBoundary(
  text: string,
  start: number,
  end: number,
  overlap: number,
  lookBack: number
): number {
  const floor = Math.max(start + overlap, end - lookBack);
  for (let i = end - 1; i >= floor; i--) {
    if (BOUNDARY_CHARS.has(text[i])) {
      return i + 1;
    }
  }
  return end;
}

export function fingerprint(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Chunk a document and attach ids and fingerprints.
 */
export function buildChunks(
  documentId: DocumentId,
  ownerId: OwnerId,
  text: string,
  options: ChunkOptions
): Chunk[] {
  return chunkText(text, options).map(span => ({
    id: chunkIdFor(documentId, span.index),
    documentId,
    ownerId,
    index: span.index,
    text: span.text,
    start: span.start,
    end: span.end,
    fingerprint: fingerprint(span.text),
    targetSize: options.targetSize,
    overlap: options.overlap,
  }));
}
