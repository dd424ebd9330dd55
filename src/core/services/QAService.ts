/**
 * Question answering over an owner's documents: whole answers, streamed
 * sessions, history, suggestions and usage reporting.
 */

import type { Chunk, Document, DocumentId, OwnerId } from '../entities/Document.js';
import type { HistoryRecord } from '../entities/History.js';
import type { EmbeddingProvider } from '../embedding/EmbeddingProvider.js';
import type { VectorBackendKind, VectorIndex } from '../vector/VectorIndex.js';
import type { DocumentStore } from '../store/DocumentStore.js';
import type { RetrievalEngine } from '../retrieval/RetrievalEngine.js';
import type { FallbackChain, FallbackNotice } from '../generation/FallbackChain.js';
import {
  validateGenerationSettings,
  type GenerationBackendKind,
  type GenerationSettings,
} from '../generation/GenerationBackend.js';
import { StreamingSession } from '../streaming/StreamingSession.js';
import type { AppConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import {
  InvalidParametersError,
  NotFoundError,
  QuotaExceededError,
  SessionCancelledError,
  errorKind,
  getErrorMessage,
  isCancellation,
  type ErrorKind,
} from '../utils/errors.js';

const logger = getLogger('qa');

export const MAX_QUESTION_LENGTH = 2000;
export const MAX_BATCH_SIZE = 20;
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const QUESTION_WORDS = ['what', 'how', 'when', 'where', 'why'] as const;

export type QuestionWord = (typeof QUESTION_WORDS)[number];

const SUGGESTION_TEMPLATES = [
  (title: string) => `What is the main topic of "${title}"?`,
  (title: string) => `Can you summarize the key points of "${title}"?`,
  (title: string) => `What are the important facts mentioned in "${title}"?`,
];

export interface AskOptions {
  k?: number;
  maxContextLength?: number;
  documentIds?: DocumentId[];
  generation?: GenerationSettings;
  signal?: AbortSignal;
}

export type AskResult = {
  answer: string;
  elapsedMs: number;
  chunkIds: string[];
  backend: string;
  fallbacks: FallbackNotice[];
};

export type BatchItem =
  | { question: string; status: 'answered'; result: AskResult }
  | { question: string; status: 'failed'; kind: ErrorKind; message: string };

export type QueryPatterns = {
  ownerId: OwnerId;
  periodDays: number;
  totalQueries: number;
  meanResponseMs: number;
  /** Questions containing each word; one question may count for several */
  questionTypes: Record<QuestionWord, number>;
  /** UTC hour with the most questions, earliest on ties; null without questions */
  peakHour: number | null;
  queriesPerDay: number;
};

export type UsageReport = {
  ownerId: OwnerId;
  periodDays: number;
  documents: { total: number; recent: number; chunks: number };
  queries: {
    total: number;
    recent: number;
    meanResponseMs: number;
    /** Query count per UTC day (YYYY-MM-DD) within the period */
    daily: Record<string, number>;
  };
  limits: {
    maxDocuments: number;
    maxQueriesPerHour: number;
    documentsRemaining: number;
    rateLimitEnabled: boolean;
  };
};

export type OwnerExport = {
  ownerId: OwnerId;
  exportedAt: string;
  documents: Document[];
  chunks: Chunk[];
  history: HistoryRecord[];
};

export type BackendStatus = {
  generation: Array<{ name: string; kind: GenerationBackendKind }>;
  vector: { kind: VectorBackendKind; dimension: number };
  embedding: { name: string; dimension: number };
};

export interface QAServiceDeps {
  retrieval: RetrievalEngine;
  chain: FallbackChain;
  store: DocumentStore;
  index: VectorIndex;
  embedder: EmbeddingProvider;
  retrievalDefaults: Pick<AppConfig['retrieval'], 'topK' | 'maxContextLength'>;
  streaming: AppConfig['streaming'];
  limits: AppConfig['limits'];
  now?: () => number;
}

export class QAService {
  private readonly now: () => number;

  constructor(private readonly deps: QAServiceDeps) {
    this.now = deps.now ?? Date.now;
  }

  async ask(ownerId: OwnerId, question: string, options: AskOptions = {}): Promise<AskResult> {
    const text = validateQuestion(question);
    const generation = validateGenerationSettings(options.generation);
    await this.checkRateLimit(ownerId);

    const startedAt = this.now();
    const bundle = await this.deps.retrieval.retrieve(ownerId, text, {
      k: options.k ?? this.deps.retrievalDefaults.topK,
      maxContextLength: options.maxContextLength ?? this.deps.retrievalDefaults.maxContextLength,
      documentIds: options.documentIds,
      signal: options.signal,
    });
    const { answer, backend, fallbacks } = await this.deps.chain.generate(text, bundle.items, {
      signal: options.signal,
      generation,
    });
    const elapsedMs = this.now() - startedAt;
    const chunkIds = bundle.items.map(item => item.chunkId);

    await this.deps.store.appendHistory({
      ownerId,
      question: text,
      answer,
      elapsedMs,
      chunkCount: chunkIds.length,
      chunkIds,
      backend,
      mode: 'whole',
    });
    logger.info({ ownerId, backend, elapsedMs, chunks: chunkIds.length }, 'Question answered');

    return { answer, elapsedMs, chunkIds, backend, fallbacks };
  }

  /**
   * Validate and rate-limit now; the returned session does the work once
   * its events are read.
   */
  async stream(ownerId: OwnerId, question: string, options: Omit<AskOptions, 'signal'> = {}): Promise<StreamingSession> {
    const text = validateQuestion(question);
    const generation = validateGenerationSettings(options.generation);
    await this.checkRateLimit(ownerId);

    return new StreamingSession(
      {
        retrieval: this.deps.retrieval,
        chain: this.deps.chain,
        store: this.deps.store,
        bufferSize: this.deps.streaming.bufferSize,
        now: this.now,
      },
      {
        ownerId,
        question: text,
        k: options.k ?? this.deps.retrievalDefaults.topK,
        maxContextLength: options.maxContextLength ?? this.deps.retrievalDefaults.maxContextLength,
        documentIds: options.documentIds,
        generation,
      }
    );
  }

  /**
   * Answer questions one after another. A failed question is reported in
   * its slot and the batch goes on; cancellation ends the whole batch.
   */
  async askMany(ownerId: OwnerId, questions: string[], options: AskOptions = {}): Promise<BatchItem[]> {
    if (questions.length === 0) {
      throw new InvalidParametersError('At least one question is required');
    }
    if (questions.length > MAX_BATCH_SIZE) {
      throw new InvalidParametersError(`At most ${MAX_BATCH_SIZE} questions per batch, got ${questions.length}`);
    }

    const items: BatchItem[] = [];
    for (const [i, question] of questions.entries()) {
      try {
        const result = await this.ask(ownerId, question, options);
        items.push({ question, status: 'answered', result });
      } catch (error) {
        if (isCancellation(error, options.signal)) throw new SessionCancelledError();
        logger.warn({ ownerId, position: i + 1, err: getErrorMessage(error) }, 'Batch question failed');
        items.push({ question, status: 'failed', kind: errorKind(error), message: getErrorMessage(error) });
      }
    }
    logger.info(
      { ownerId, total: items.length, failed: items.filter(item => item.status === 'failed').length },
      'Batch answered'
    );
    return items;
  }

  async history(ownerId: OwnerId, limit = 20): Promise<HistoryRecord[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidParametersError(`limit must be a positive integer, got ${limit}`);
    }
    return this.deps.store.listHistory(ownerId, limit);
  }

  /**
   * Up to three template questions built from the most recent document
   * titles, or from one document when an id is given.
   */
  async suggestQuestions(ownerId: OwnerId, documentId?: DocumentId): Promise<string[]> {
    let documents: Document[];
    if (documentId) {
      const document = await this.deps.store.getDocument(ownerId, documentId);
      if (!document) {
        throw new NotFoundError(`Document ${documentId} not found`, { context: { ownerId } });
      }
      documents = [document];
    } else {
      documents = (await this.deps.store.listDocuments(ownerId)).reverse().slice(0, SUGGESTION_TEMPLATES.length);
    }
    if (documents.length === 0) return [];

    return SUGGESTION_TEMPLATES.map((template, i) => template(documents[i % documents.length].title));
  }

  async usageReport(ownerId: OwnerId, days = 30): Promise<UsageReport> {
    if (!Number.isInteger(days) || days < 1) {
      throw new InvalidParametersError(`days must be a positive integer, got ${days}`);
    }
    const since = this.now() - days * DAY_MS;
    const [documents, chunks, history] = await Promise.all([
      this.deps.store.listDocuments(ownerId),
      this.deps.store.listChunks(ownerId),
      this.deps.store.listHistory(ownerId),
    ]);

    const recentQueries = history.filter(record => Date.parse(record.createdAt) >= since);
    const daily: Record<string, number> = {};
    for (const record of recentQueries) {
      const day = record.createdAt.slice(0, 10);
      daily[day] = (daily[day] ?? 0) + 1;
    }
    const totalElapsed = recentQueries.reduce((sum, record) => sum + record.elapsedMs, 0);
    const { maxDocumentsPerUser, maxQueriesPerHour, rateLimitEnabled } = this.deps.limits;

    return {
      ownerId,
      periodDays: days,
      documents: {
        total: documents.length,
        recent: documents.filter(doc => Date.parse(doc.createdAt) >= since).length,
        chunks: chunks.length,
      },
      queries: {
        total: history.length,
        recent: recentQueries.length,
        meanResponseMs: recentQueries.length === 0 ? 0 : Math.round((totalElapsed / recentQueries.length) * 100) / 100,
        daily,
      },
      limits: {
        maxDocuments: maxDocumentsPerUser,
        maxQueriesPerHour,
        documentsRemaining: Math.max(0, maxDocumentsPerUser - documents.length),
        rateLimitEnabled,
      },
    };
  }

  async queryPatterns(ownerId: OwnerId, days = 7): Promise<QueryPatterns> {
    if (!Number.isInteger(days) || days < 1) {
      throw new InvalidParametersError(`days must be a positive integer, got ${days}`);
    }
    const since = this.now() - days * DAY_MS;
    const recent = (await this.deps.store.listHistory(ownerId)).filter(
      record => Date.parse(record.createdAt) >= since
    );

    const questionTypes: Record<QuestionWord, number> = { what: 0, how: 0, when: 0, where: 0, why: 0 };
    const hours = new Array<number>(24).fill(0);
    let totalElapsed = 0;
    for (const record of recent) {
      const words = new Set(record.question.toLowerCase().match(/[a-z]+/g) ?? []);
      for (const word of QUESTION_WORDS) {
        if (words.has(word)) questionTypes[word]++;
      }
      hours[new Date(record.createdAt).getUTCHours()]++;
      totalElapsed += record.elapsedMs;
    }
    const peak = Math.max(...hours);

    return {
      ownerId,
      periodDays: days,
      totalQueries: recent.length,
      meanResponseMs: recent.length === 0 ? 0 : Math.round(totalElapsed / recent.length),
      questionTypes,
      peakHour: peak === 0 ? null : hours.indexOf(peak),
      queriesPerDay: Math.round((recent.length / days) * 100) / 100,
    };
  }

  async exportOwnerData(ownerId: OwnerId): Promise<OwnerExport> {
    const [documents, chunks, history] = await Promise.all([
      this.deps.store.listDocuments(ownerId),
      this.deps.store.listChunks(ownerId),
      this.deps.store.listHistory(ownerId),
    ]);
    return { ownerId, exportedAt: new Date(this.now()).toISOString(), documents, chunks, history };
  }

  backendStatus(): BackendStatus {
    return {
      generation: this.deps.chain.backends.map(backend => ({ name: backend.name, kind: backend.kind })),
      vector: { kind: this.deps.index.kind, dimension: this.deps.index.dimension },
      embedding: { name: this.deps.embedder.name, dimension: this.deps.embedder.dimension },
    };
  }

  private async checkRateLimit(ownerId: OwnerId): Promise<void> {
    const { rateLimitEnabled, maxQueriesPerHour } = this.deps.limits;
    if (!rateLimitEnabled) return;
    const recent = await this.deps.store.countQueriesSince(ownerId, new Date(this.now() - HOUR_MS));
    if (recent >= maxQueriesPerHour) {
      logger.warn({ ownerId, recent, maxQueriesPerHour }, 'Rate limit reached');
      throw new QuotaExceededError(`Rate limit exceeded: at most ${maxQueriesPerHour} questions per hour`, {
        context: { ownerId },
      });
    }
  }
}

/**
 * Trimmed question text; empty or overlong questions are rejected.
 */
export function validateQuestion(question: string): string {
  const text = question.trim();
  if (text.length === 0) {
    throw new InvalidParametersError('Question must not be empty');
  }
  if (text.length > MAX_QUESTION_LENGTH) {
    throw new InvalidParametersError(
      `Question is ${text.length} characters long; the maximum is ${MAX_QUESTION_LENGTH}`
    );
  }
  return text;
}
