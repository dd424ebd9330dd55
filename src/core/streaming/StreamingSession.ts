/**
 * One streamed question. A producer task runs retrieval and the generation
 * chain and feeds events into a bounded channel; the consumer reads them
 * through `events()`. Leaving the loop early cancels the session.
 */

import { nanoid } from 'nanoid';
import type { DocumentId, OwnerId } from '../entities/Document.js';
import type { RetrievalEngine } from '../retrieval/RetrievalEngine.js';
import type { FallbackChain } from '../generation/FallbackChain.js';
import type { GenerationSettings } from '../generation/GenerationBackend.js';
import type { DocumentStore } from '../store/DocumentStore.js';
import { getLogger } from '../utils/logger.js';
import {
  GroundworkError,
  SessionCancelledError,
  errorKind,
  getErrorMessage,
  isCancellation,
  throwIfCancelled,
  type ErrorKind,
} from '../utils/errors.js';
import { BoundedChannel } from './BoundedChannel.js';

const logger = getLogger('streaming');

export type StreamEvent =
  | { type: 'status'; status: 'searching' | 'generating' | 'fallback'; message: string; backend?: string }
  | { type: 'chunk'; content: string }
  | { type: 'complete'; elapsedMs: number; chunkCount: number; backend: string }
  | { type: 'error'; kind: ErrorKind; message: string };

export type SessionState = 'init' | 'searching' | 'generating' | 'completed' | 'errored' | 'cancelled';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  init: ['searching', 'cancelled'],
  searching: ['generating', 'errored', 'cancelled'],
  generating: ['completed', 'errored', 'cancelled'],
  completed: [],
  errored: [],
  cancelled: [],
};

export interface SessionRequest {
  ownerId: OwnerId;
  question: string;
  k: number;
  maxContextLength: number;
  documentIds?: DocumentId[];
  generation?: GenerationSettings;
}

export interface StreamingSessionDeps {
  retrieval: RetrievalEngine;
  chain: FallbackChain;
  store: DocumentStore;
  bufferSize: number;
  now?: () => number;
}

export class StreamingSession {
  readonly id = nanoid();
  private current: SessionState = 'init';
  private readonly controller = new AbortController();
  private readonly channel: BoundedChannel<StreamEvent>;
  private consumed = false;
  private readonly now: () => number;

  constructor(
    private readonly deps: StreamingSessionDeps,
    readonly request: SessionRequest
  ) {
    this.channel = new BoundedChannel<StreamEvent>(deps.bufferSize);
    this.now = deps.now ?? Date.now;
  }

  get state(): SessionState {
    return this.current;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  /**
   * Starts the session and yields its events. May be iterated only once.
   */
  async *events(): AsyncGenerator<StreamEvent> {
    if (this.consumed) {
      throw new GroundworkError('Session events can only be consumed once', 'invalid_parameters', {
        context: { sessionId: this.id },
      });
    }
    this.consumed = true;

    const producer = this.produce();
    try {
      for await (const event of this.channel) {
        yield event;
      }
    } finally {
      if (!this.isTerminal) this.cancel();
      await producer;
    }
  }

  /** Stop the session; nothing is emitted afterwards */
  cancel(): void {
    if (this.isTerminal) return;
    this.transition('cancelled');
    logger.debug({ sessionId: this.id }, 'Session cancelled');
    this.controller.abort(new SessionCancelledError());
    this.channel.cancel();
  }

  private async produce(): Promise<void> {
    const { ownerId, question, k, maxContextLength, documentIds, generation } = this.request;
    const signal = this.controller.signal;
    const startedAt = this.now();
    if (this.current === 'cancelled') return;

    try {
      this.transition('searching');
      await this.emit({ type: 'status', status: 'searching', message: 'Searching documents' });
      const bundle = await this.deps.retrieval.retrieve(ownerId, question, {
        k,
        maxContextLength,
        documentIds,
        signal,
      });

      throwIfCancelled(signal);
      this.transition('generating');
      await this.emit({
        type: 'status',
        status: 'generating',
        message: `Generating answer from ${bundle.items.length} context chunk(s)`,
      });

      let answer = '';
      let backend = '';
      for await (const event of this.deps.chain.stream(question, bundle.items, { signal, generation })) {
        switch (event.type) {
          case 'fragment':
            answer += event.content;
            await this.emit({ type: 'chunk', content: event.content });
            break;
          case 'fallback':
            await this.emit({
              type: 'status',
              status: 'fallback',
              message: `${event.notice.from} failed (${event.notice.reason}); trying ${event.notice.to}`,
              backend: event.notice.to,
            });
            break;
          case 'done':
            backend = event.backend;
            break;
        }
      }

      throwIfCancelled(signal);
      const elapsedMs = this.now() - startedAt;
      await this.deps.store.appendHistory({
        ownerId,
        question,
        answer,
        elapsedMs,
        chunkCount: bundle.items.length,
        chunkIds: bundle.items.map(item => item.chunkId),
        backend,
        mode: 'stream',
      });

      throwIfCancelled(signal);
      this.transition('completed');
      logger.info({ sessionId: this.id, ownerId, backend, elapsedMs }, 'Streamed answer completed');
      await this.channel.push({ type: 'complete', elapsedMs, chunkCount: bundle.items.length, backend });
    } catch (error) {
      if (this.state === 'cancelled' || isCancellation(error, signal)) {
        if (!this.isTerminal) this.transition('cancelled');
        return;
      }
      this.transition('errored');
      logger.error({ sessionId: this.id, ownerId, err: getErrorMessage(error) }, 'Streaming session failed');
      await this.channel.push({ type: 'error', kind: errorKind(error), message: getErrorMessage(error) });
    } finally {
      this.channel.close();
    }
  }

  private async emit(event: StreamEvent): Promise<void> {
    throwIfCancelled(this.controller.signal);
    const accepted = await this.channel.push(event);
    if (!accepted) throw new SessionCancelledError();
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new GroundworkError(`Invalid session transition ${this.current} -> ${next}`, 'internal', {
        context: { sessionId: this.id },
      });
    }
    this.current = next;
  }
}
