/**
 * PrivacyAwareIndex wraps the vector store: content is embedded as
 * plaintext, stored encrypted, and re-checked by the prompt guard on the way out
 */

import { EmailMessage, IndexedRecord, SearchResult, VectorHit } from '../../types/models';
import { VectorStore } from '../../repositories/VectorStore';
import { EmbeddingProvider } from '../embedding/EmbeddingProvider';
import { DataEncryptor, DECRYPTION_FAILED } from '../security/DataEncryptor';
import { PromptGuard } from '../security/PromptGuard';

export const DOCUMENT_BODY_CHARS = 1000;

export interface PrivacyAwareIndexOptions {
  fetchMultiplier?: number; // over-fetch factor per round while hits are being dropped
  debug?: boolean;
}

export class PrivacyAwareIndex {
  private readonly fetchMultiplier: number;
  private readonly debug: boolean;

  constructor(
    private readonly store: VectorStore,
    private readonly embedder: EmbeddingProvider,
    private readonly encryptor: DataEncryptor,
    private readonly guard: PromptGuard,
    options: PrivacyAwareIndexOptions = {}
  ) {
    this.fetchMultiplier = Math.max(1, options.fetchMultiplier || 2);
    this.debug = options.debug || false;
  }

  async initialize(): Promise<void> {
    await this.store.initialize(this.embedder.dimensions);
  }

  static buildDocument(email: EmailMessage): string {
    return [
      `Subject: ${email.subject}`,
      `From: ${email.sender}`,
      `Date: ${formatDay(email.date)}`,
      `Body: ${email.body.slice(0, DOCUMENT_BODY_CHARS)}`
    ].join('\n');
  }

  /**
   * Indexes the relevant messages of a batch. Re-indexing an id replaces
   * its record. Returns the number of records written.
   */
  async upsert(messages: EmailMessage[]): Promise<number> {
    const relevant = messages.filter(message => message.isRelevant);
    if (relevant.length === 0) {
      return 0;
    }

    try {
      const documents = relevant.map(message => PrivacyAwareIndex.buildDocument(message));
      const embeddings = await this.embedder.embed(documents);

      const records: IndexedRecord[] = relevant.map((message, index) => ({
        id: message.id,
        encryptedDocument: this.encryptor.encrypt(documents[index]),
        embedding: embeddings[index],
        metadata: {
          emailId: message.id,
          encryptedSubject: this.encryptor.encrypt(message.subject),
          encryptedSender: this.encryptor.encrypt(message.sender),
          date: isNaN(message.date.getTime()) ? '' : message.date.toISOString(),
          accountType: message.accountType
        }
      }));

      await this.store.upsert(records);

      if (this.debug) {
        console.log(`🔍 [INDEX] Upserted ${records.length} records`);
      }
      return records.length;
    } catch (error) {
      console.error('❌ Failed to index emails:', error);
      throw error;
    }
  }

  /**
   * Returns up to k decrypted hits, closest first. Hits that fail the prompt
   * guard are dropped and do not count toward k; the store is queried again
   * past them until k safe hits are found or it runs out.
   */
  async search(query: string, k: number): Promise<SearchResult[]> {
    if (k <= 0) {
      return [];
    }

    try {
      const [embedding] = await this.embedder.embed([query]);
      const results: SearchResult[] = [];
      const batchSize = k * this.fetchMultiplier;
      let offset = 0;

      while (results.length < k) {
        const hits = await this.store.query(embedding, batchSize, offset);

        for (const hit of hits) {
          const result = this.openHit(hit);
          if (result) {
            results.push(result);
            if (results.length === k) {
              break;
            }
          }
        }

        if (hits.length < batchSize) {
          break;
        }
        offset += hits.length;
      }

      return results;
    } catch (error) {
      console.error('❌ Failed to search index:', error);
      throw error;
    }
  }

  /**
   * Decrypted view of a stored record, without the guard
   */
  async getDecrypted(emailId: string): Promise<SearchResult | null> {
    const record = await this.store.get(emailId);
    if (!record) {
      return null;
    }
    return this.decryptRecord(record, 0);
  }

  async count(): Promise<number> {
    return this.store.count();
  }

  private openHit(hit: VectorHit): SearchResult | null {
    const result = this.decryptRecord(hit.record, hit.distance);

    if (result.document === DECRYPTION_FAILED) {
      console.warn(`⚠️ [INDEX] Skipping record ${result.emailId}: stored content could not be decrypted`);
      return null;
    }

    if (!this.guard.validate(result.document) || !this.guard.validate(result.subject)) {
      console.warn(`🛡️ [SECURITY] Excluded retrieved record ${result.emailId} due to potential prompt injection`);
      return null;
    }

    return result;
  }

  private decryptRecord(record: IndexedRecord, distance: number): SearchResult {
    return {
      emailId: record.metadata.emailId,
      document: this.encryptor.decrypt(record.encryptedDocument),
      subject: this.encryptor.decrypt(record.metadata.encryptedSubject),
      sender: this.encryptor.decrypt(record.metadata.encryptedSender),
      date: record.metadata.date,
      accountType: record.metadata.accountType,
      distance
    };
  }
}

function formatDay(date: Date): string {
  return isNaN(date.getTime()) ? 'unknown' : date.toISOString().slice(0, 10);
}
