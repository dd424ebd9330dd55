import type { VectorBackendConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import type { VectorIndex } from './VectorIndex.js';
import { MemoryVectorIndex } from './MemoryVectorIndex.js';
import { MastraPgVectorGateway, PgVectorIndex } from './PgVectorIndex.js';
import { ElasticClientGateway, ElasticsearchVectorIndex } from './ElasticsearchVectorIndex.js';

export * from './VectorIndex.js';
export { MemoryVectorIndex, PgVectorIndex, ElasticsearchVectorIndex };

const logger = getLogger('vector');

/**
 * Select the index variant once from configuration. A server variant that
 * cannot connect fails on first use; it is never swapped for another variant.
 */
export function createVectorIndex(config: VectorBackendConfig): VectorIndex {
  logger.debug({ backend: config.kind, dimension: config.dimension }, 'Creating vector index');
  switch (config.kind) {
    case 'pgvector':
      return new PgVectorIndex({
        dimension: config.dimension,
        indexName: config.indexName,
        gateway: new MastraPgVectorGateway(config.connectionString),
      });
    case 'elasticsearch':
      return new ElasticsearchVectorIndex({
        dimension: config.dimension,
        index: config.index,
        gateway: new ElasticClientGateway(config.node),
      });
    default:
      return new MemoryVectorIndex({ dimension: config.dimension, persistPath: config.persistPath });
  }
}
