import type { ChunkId, OwnerId } from './Document.js';

export type AnswerMode = 'whole' | 'stream';

/**
 * Permanent record of an answered question. The whole-answer and the
 * streaming path both write exactly this shape.
 */
export type HistoryRecord = {
  id: string;
  ownerId: OwnerId;
  question: string;
  answer: string;
  elapsedMs: number;
  chunkCount: number;
  chunkIds: ChunkId[];
  backend: string;
  mode: AnswerMode;
  /** ISO date string */
  createdAt: string;
};
