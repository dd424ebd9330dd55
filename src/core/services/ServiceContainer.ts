/**
 * Service container for dependency wiring and lifetime management.
 * Builds every collaborator lazily from one configuration record.
 */

import { JsonFileDocumentStore, type DocumentStore } from '../store/DocumentStore.js';
import { createEmbeddingProvider, type EmbeddingProvider } from '../embedding/index.js';
import { createVectorIndex, type VectorIndex } from '../vector/index.js';
import { createGenerationChain, type FallbackChain } from '../generation/index.js';
import { RetrievalEngine } from '../retrieval/RetrievalEngine.js';
import { IngestionService } from '../ingestion/IngestionService.js';
import { QAService } from './QAService.js';
import { loadConfig, type AppConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger('services');

/**
 * Service container interface defining all available services
 */
export interface IServiceContainer {
  config: AppConfig;
  store: DocumentStore;
  embedder: EmbeddingProvider;
  vectorIndex: VectorIndex;
  chain: FallbackChain;
  retrieval: RetrievalEngine;
  ingestion: IngestionService;
  qa: QAService;
}

export class ServiceContainer implements IServiceContainer {
  private static instance?: ServiceContainer;

  private _store?: DocumentStore;
  private _embedder?: EmbeddingProvider;
  private _vectorIndex?: VectorIndex;
  private _chain?: FallbackChain;
  private _retrieval?: RetrievalEngine;
  private _ingestion?: IngestionService;
  private _qa?: QAService;

  constructor(readonly config: AppConfig) {}

  /**
   * Get the shared container, loading configuration on first use
   */
  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer(loadConfig());
    }
    return ServiceContainer.instance;
  }

  /**
   * Close and forget the shared container
   */
  static async reset(): Promise<void> {
    const current = ServiceContainer.instance;
    ServiceContainer.instance = undefined;
    await current?.close();
  }

  // ============================================================================
  // Service Getters (Lazy Initialization)
  // ============================================================================

  get store(): DocumentStore {
    if (!this._store) {
      this._store = new JsonFileDocumentStore(this.config.paths.store);
    }
    return this._store;
  }

  get embedder(): EmbeddingProvider {
    if (!this._embedder) {
      this._embedder = createEmbeddingProvider(this.config.embedding);
    }
    return this._embedder;
  }

  get vectorIndex(): VectorIndex {
    if (!this._vectorIndex) {
      this._vectorIndex = createVectorIndex(this.config.vector);
    }
    return this._vectorIndex;
  }

  get chain(): FallbackChain {
    if (!this._chain) {
      this._chain = createGenerationChain(this.config.generation);
    }
    return this._chain;
  }

  get retrieval(): RetrievalEngine {
    if (!this._retrieval) {
      this._retrieval = new RetrievalEngine({
        embedder: this.embedder,
        index: this.vectorIndex,
        store: this.store,
        searchTimeoutMs: this.config.retrieval.searchTimeoutMs,
      });
    }
    return this._retrieval;
  }

  get ingestion(): IngestionService {
    if (!this._ingestion) {
      this._ingestion = new IngestionService({
        store: this.store,
        index: this.vectorIndex,
        embedder: this.embedder,
        chunking: this.config.chunking,
        limits: this.config.limits,
      });
    }
    return this._ingestion;
  }

  get qa(): QAService {
    if (!this._qa) {
      this._qa = new QAService({
        retrieval: this.retrieval,
        chain: this.chain,
        store: this.store,
        index: this.vectorIndex,
        embedder: this.embedder,
        retrievalDefaults: this.config.retrieval,
        streaming: this.config.streaming,
        limits: this.config.limits,
      });
    }
    return this._qa;
  }

  // ============================================================================
  // Service Registration (for testing/mocking)
  // ============================================================================

  registerStore(store: DocumentStore): void {
    this._store = store;
    this.resetDependents();
  }

  registerEmbedder(embedder: EmbeddingProvider): void {
    this._embedder = embedder;
    this.resetDependents();
  }

  registerVectorIndex(index: VectorIndex): void {
    this._vectorIndex = index;
    this.resetDependents();
  }

  registerChain(chain: FallbackChain): void {
    this._chain = chain;
    this._qa = undefined;
  }

  /**
   * Prepare the vector backend; the first call creates its index if needed
   */
  async init(): Promise<void> {
    await this.vectorIndex.init();
  }

  /**
   * Release backend connections and wait for pending snapshot writes
   */
  async close(): Promise<void> {
    if (this._vectorIndex) {
      await this._vectorIndex.close();
      logger.debug({ backend: this._vectorIndex.kind }, 'Vector index closed');
    }
  }

  private resetDependents(): void {
    this._retrieval = undefined;
    this._ingestion = undefined;
    this._qa = undefined;
  }
}

/**
 * Get the shared service container instance
 */
export function getServices(): ServiceContainer {
  return ServiceContainer.getInstance();
}
