export * from './core/entities/Document.js';
export type { AnswerMode, HistoryRecord } from './core/entities/History.js';
export { buildChunks, chunkText, fingerprint, type ChunkOptions, type ChunkSpan } from './core/chunking/Chunker.js';
export * from './core/embedding/index.js';
export * from './core/vector/index.js';
export * from './core/store/DocumentStore.js';
export * from './core/retrieval/RetrievalEngine.js';
export * from './core/generation/index.js';
export { NO_CONTEXT_ANSWER } from './core/generation/prompts.js';
export * from './core/streaming/StreamingSession.js';
export { BoundedChannel } from './core/streaming/BoundedChannel.js';
export * from './core/ingestion/IngestionService.js';
export * from './core/services/QAService.js';
export { ServiceContainer, getServices, type IServiceContainer } from './core/services/ServiceContainer.js';
export { loadConfig, parseConfig, type AppConfig } from './core/utils/config.js';
export * from './core/utils/errors.js';
export { getLogger } from './core/utils/logger.js';
