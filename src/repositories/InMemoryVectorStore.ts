import { IndexedRecord, VectorHit } from '../types/models';
import { VectorStore } from './VectorStore';

/**
 * Process-local vector store with brute-force cosine search
 */
export class InMemoryVectorStore implements VectorStore {
  private records = new Map<string, IndexedRecord>();
  private dimensions: number | null = null;

  async initialize(dimensions: number): Promise<void> {
    this.dimensions = dimensions;
    console.log(`✅ In-memory vector store ready (${dimensions} dimensions)`);
  }

  async upsert(records: IndexedRecord[]): Promise<void> {
    for (const record of records) {
      if (this.dimensions !== null && record.embedding.length !== this.dimensions) {
        throw new Error(`Embedding for ${record.id} has ${record.embedding.length} dimensions, expected ${this.dimensions}`);
      }
      this.records.set(record.id, {
        ...record,
        embedding: [...record.embedding],
        metadata: { ...record.metadata }
      });
    }
  }

  async query(embedding: number[], limit: number, offset: number = 0): Promise<VectorHit[]> {
    const hits = [...this.records.values()].map(record => ({
      record,
      distance: 1 - cosineSimilarity(embedding, record.embedding)
    }));

    hits.sort((a, b) => a.distance - b.distance || a.record.id.localeCompare(b.record.id));
    return hits.slice(offset, offset + limit);
  }

  async get(id: string): Promise<IndexedRecord | null> {
    return this.records.get(id) || null;
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
