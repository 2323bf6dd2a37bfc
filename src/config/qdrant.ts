import { QdrantClient } from '@qdrant/js-client-rest';
import { AppConfig } from './index';

/**
 * Create a Qdrant client for the configured server
 */
export function createQdrantClient(config: AppConfig['vectorStore']): QdrantClient {
  return new QdrantClient({
    url: config.qdrantUrl,
    apiKey: config.qdrantApiKey
  });
}
