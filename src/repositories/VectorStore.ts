import { IndexedRecord, VectorHit } from '../types/models';

/**
 * Storage for encrypted records and their embeddings.
 * Upserting an existing id replaces the record.
 */
export interface VectorStore {
  initialize(dimensions: number): Promise<void>;
  upsert(records: IndexedRecord[]): Promise<void>;
  /** Nearest neighbours by cosine distance, closest first */
  query(embedding: number[], limit: number, offset?: number): Promise<VectorHit[]>;
  get(id: string): Promise<IndexedRecord | null>;
  count(): Promise<number>;
}
