/**
 * Core data models for the private mail assistant
 */

export type AccountType = 'personal' | 'work' | 'school';

export interface EmailMessage {
  id: string;
  threadId?: string;
  sender: string;
  to: string[];
  cc: string[];
  subject: string;
  body: string; // plaintext
  date: Date;
  isUnread: boolean;
  hasAttachments: boolean;
  headers: MessageHeaders;
  labels: string[]; // provider label ids, e.g. CATEGORY_PROMOTIONS
  isRelevant: boolean; // set by the filtering pipeline, starts false
  accountType: AccountType;
}

/**
 * Header map with case-insensitive lookup. Keys are stored lower-cased.
 */
export class MessageHeaders {
  private readonly values = new Map<string, string>();

  constructor(entries: Iterable<[string, string]> = []) {
    for (const [name, value] of entries) {
      this.set(name, value);
    }
  }

  static fromRecord(record: Record<string, string>): MessageHeaders {
    return new MessageHeaders(Object.entries(record));
  }

  set(name: string, value: string): void {
    this.values.set(name.toLowerCase(), value);
  }

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

export type SyncState = 'idle' | 'syncing' | 'completed' | 'error';

export interface SyncStatus {
  state: SyncState;
  progress: number; // safe emails processed in the current run
  message: string;
  isReady: boolean;
}

/**
 * Wire shape of the status object exposed to the API layer
 */
export interface SystemStatusResponse {
  is_authenticated: boolean;
  sync_state: SyncState;
  sync_progress: number;
  sync_message: string;
  is_ready: boolean;
}

export interface IndexedRecordMetadata {
  emailId: string;
  encryptedSubject: string;
  encryptedSender: string;
  date: string; // ISO-8601, plaintext for filtering
  accountType: AccountType;
}

export interface IndexedRecord {
  id: string;
  encryptedDocument: string;
  embedding: number[]; // computed over the plaintext document
  metadata: IndexedRecordMetadata;
}

export interface VectorHit {
  record: IndexedRecord;
  distance: number; // cosine distance, lower is closer
}

export type PIILabel = 'EMAIL' | 'PHONE' | 'SSN' | 'IP_ADDRESS';

export interface PIIMappingEntry {
  placeholder: string;
  original: string;
}

export type PIIMapping = PIIMappingEntry[];

export type ClassificationStage =
  | 'vip_sender'
  | 'provider_category'
  | 'heuristic_spam'
  | 'mailing_list'
  | 'content_qualifier'
  | 'recency'
  | 'no_match'
  | 'ml_spam';

export interface ClassificationVerdict {
  relevant: boolean;
  stage: ClassificationStage;
  reason: string;
  mlSpam?: boolean; // undefined when the ML stage did not run
}

export interface SearchResult {
  emailId: string;
  document: string;
  subject: string;
  sender: string;
  date: string;
  accountType: AccountType;
  distance: number;
}

export interface AnswerSource {
  sender: string;
  subject: string;
  date: string;
  distance: number;
}

export interface AnswerResult {
  answer: string;
  sources: AnswerSource[];
}
