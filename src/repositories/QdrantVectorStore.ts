import { QdrantClient } from '@qdrant/js-client-rest';
import { v5 as uuidv5 } from 'uuid';
import { AccountType, IndexedRecord, VectorHit } from '../types/models';
import { VectorStore } from './VectorStore';

// Qdrant point ids must be UUIDs or integers; email ids map onto v5 UUIDs
const POINT_NAMESPACE = '6f1c2a52-3d4b-5e8f-9a0b-1c2d3e4f5a6b';

const ACCOUNT_TYPES: AccountType[] = ['personal', 'work', 'school'];

type Payload = Record<string, unknown> | null | undefined;

/**
 * QdrantVectorStore keeps encrypted email records in a Qdrant collection
 */
export class QdrantVectorStore implements VectorStore {
  constructor(
    private readonly client: QdrantClient,
    private readonly collectionName: string = 'email_embeddings'
  ) {}

  static pointId(emailId: string): string {
    return uuidv5(emailId, POINT_NAMESPACE);
  }

  async initialize(dimensions: number): Promise<void> {
    try {
      const collections = await this.client.getCollections();
      const collectionExists = collections.collections.some(col => col.name === this.collectionName);

      if (!collectionExists) {
        await this.client.createCollection(this.collectionName, {
          vectors: {
            size: dimensions,
            distance: 'Cosine'
          }
        });
        console.log(`✅ Created Qdrant collection: ${this.collectionName}`);
      } else {
        console.log(`✅ Qdrant collection already exists: ${this.collectionName}`);
      }
    } catch (error) {
      console.error('❌ Failed to initialize Qdrant collection:', error);
      throw error;
    }
  }

  async upsert(records: IndexedRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    try {
      await this.client.upsert(this.collectionName, {
        wait: true,
        points: records.map(record => ({
          id: QdrantVectorStore.pointId(record.id),
          vector: record.embedding,
          payload: {
            email_id: record.metadata.emailId,
            encrypted_document: record.encryptedDocument,
            encrypted_subject: record.metadata.encryptedSubject,
            encrypted_sender: record.metadata.encryptedSender,
            date: record.metadata.date,
            account_type: record.metadata.accountType
          }
        }))
      });
    } catch (error) {
      console.error('❌ Failed to upsert records in Qdrant:', error);
      throw error;
    }
  }

  async query(embedding: number[], limit: number, offset: number = 0): Promise<VectorHit[]> {
    try {
      const results = await this.client.search(this.collectionName, {
        vector: embedding,
        limit,
        offset,
        with_payload: true,
        with_vector: false
      });

      return results.map(result => ({
        record: this.toRecord(result.payload, []),
        distance: 1 - result.score
      }));
    } catch (error) {
      console.error('❌ Failed to search Qdrant:', error);
      throw error;
    }
  }

  async get(id: string): Promise<IndexedRecord | null> {
    try {
      const result = await this.client.retrieve(this.collectionName, {
        ids: [QdrantVectorStore.pointId(id)],
        with_payload: true,
        with_vector: true
      });

      if (!result || result.length === 0) {
        return null;
      }

      const point = result[0];
      return this.toRecord(point.payload, isNumberArray(point.vector) ? point.vector : []);
    } catch (error) {
      console.error('❌ Failed to retrieve record from Qdrant:', error);
      throw error;
    }
  }

  async count(): Promise<number> {
    const result = await this.client.count(this.collectionName, { exact: true });
    return result.count;
  }

  private toRecord(payload: Payload, embedding: number[]): IndexedRecord {
    const emailId = readString(payload, 'email_id');
    const accountType = readString(payload, 'account_type');

    return {
      id: emailId,
      encryptedDocument: readString(payload, 'encrypted_document'),
      embedding,
      metadata: {
        emailId,
        encryptedSubject: readString(payload, 'encrypted_subject'),
        encryptedSender: readString(payload, 'encrypted_sender'),
        date: readString(payload, 'date'),
        accountType: ACCOUNT_TYPES.find(type => type === accountType) || 'personal'
      }
    };
  }
}

function readString(payload: Payload, key: string): string {
  const value = payload ? payload[key] : undefined;
  return typeof value === 'string' ? value : '';
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(item => typeof item === 'number');
}
