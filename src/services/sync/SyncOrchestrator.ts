/**
 * SyncOrchestrator drives paginated ingestion: fetch a page, screen it,
 * classify it, index what is relevant, and track progress and readiness
 */

import { EmailMessage } from '../../types/models';
import { ProviderNotAuthenticatedError, SyncCancelledError, SyncInProgressError } from '../../types/errors';
import { MailProvider, MailPage } from '../email/MailProvider';
import { PrivacyAwareIndex } from '../search/PrivacyAwareIndex';
import { IngestionGate } from './IngestionGate';
import { SyncStatusStore } from './SyncStatusStore';

export const DEFAULT_PROVIDER_QUERY = 'newer_than:1m -category:promotions -category:social -in:spam -in:trash';

export interface SyncSettings {
  query?: string;
  maxEmails?: number;
  pageSize?: number;
  readinessDays?: number;
  fetchAttempts?: number;
  upsertAttempts?: number;
  retryDelayMs?: number;
  debug?: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class SyncOrchestrator {
  private readonly query: string;
  private readonly maxEmails: number;
  private readonly pageSize: number;
  private readonly readinessDays: number;
  private readonly fetchAttempts: number;
  private readonly upsertAttempts: number;
  private readonly retryDelayMs: number;
  private readonly debug: boolean;

  private currentRun: Promise<void> | null = null;
  private abortController: AbortController | null = null;

  constructor(
    private readonly provider: MailProvider,
    private readonly gate: IngestionGate,
    private readonly index: PrivacyAwareIndex,
    private readonly status: SyncStatusStore,
    settings: SyncSettings = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.query = settings.query ?? DEFAULT_PROVIDER_QUERY;
    this.maxEmails = settings.maxEmails ?? 500;
    this.pageSize = settings.pageSize ?? 50;
    this.readinessDays = settings.readinessDays ?? 7;
    this.fetchAttempts = Math.max(1, settings.fetchAttempts ?? 3);
    this.upsertAttempts = Math.max(1, settings.upsertAttempts ?? 2);
    this.retryDelayMs = settings.retryDelayMs ?? 500;
    this.debug = settings.debug || false;
  }

  get isRunning(): boolean {
    return this.currentRun !== null;
  }

  /**
   * Starts a run in the background and returns its promise, which never
   * rejects: failures end up in the status store. Throws synchronously when
   * a run is already in progress or the provider is not authenticated.
   */
  start(): Promise<void> {
    if (!this.provider.isAuthenticated()) {
      throw new ProviderNotAuthenticatedError();
    }
    if (!this.status.begin('Starting sync...')) {
      throw new SyncInProgressError();
    }

    const controller = new AbortController();
    this.abortController = controller;
    console.log(`🔄 [SYNC] Starting sync from ${this.provider.name}`);

    const run = this.run(controller.signal).finally(() => {
      this.currentRun = null;
      this.abortController = null;
    });
    this.currentRun = run;
    return run;
  }

  /**
   * Requests cancellation; the run stops before its next page
   */
  cancel(): void {
    if (this.abortController && !this.abortController.signal.aborted) {
      console.log('🔄 [SYNC] Cancellation requested');
      this.abortController.abort();
    }
  }

  /**
   * Resolves true once the current run has settled, false on timeout
   */
  async waitForIdle(timeoutMs: number): Promise<boolean> {
    const run = this.currentRun;
    if (!run) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([run.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const readinessCutoff = this.now().getTime() - this.readinessDays * DAY_MS;
    const seen = new Set<string>();
    let cursor: string | undefined;
    let progress = 0;
    let indexed = 0;

    try {
      while (progress < this.maxEmails) {
        if (signal.aborted) {
          throw new SyncCancelledError(`Sync cancelled after ${progress} emails`);
        }

        const remaining = this.maxEmails - progress;
        const page = await this.fetchPageWithRetry(cursor, Math.min(this.pageSize, remaining));
        if (page.messages.length === 0) {
          break;
        }

        const safe = this.gate.screen(page.messages).slice(0, remaining);
        progress += safe.length;

        // repeats count toward progress but are classified and indexed once
        const fresh = safe.filter(message => {
          if (seen.has(message.id)) {
            return false;
          }
          seen.add(message.id);
          return true;
        });

        const relevant = await this.gate.classify(fresh);
        indexed += await this.indexWithRetry(relevant);

        this.status.report(progress, `Fetched ${progress} emails...`);
        this.debugLog(`Page: ${page.messages.length} fetched, ${safe.length} safe, ${fresh.length} new, ${relevant.length} relevant`);

        if (this.oldestTime(page.messages) < readinessCutoff) {
          this.status.markReady();
        }

        cursor = page.nextCursor;
        if (!cursor) {
          break;
        }
      }

      this.status.complete(`Sync complete. Processed ${progress} emails.`);
      console.log(`✅ [SYNC] Sync complete: ${progress} processed, ${indexed} indexed`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.status.fail(`Error: ${message}`);
      console.error(`❌ [SYNC] Sync failed after ${progress} emails:`, message);
    }
  }

  private async fetchPageWithRetry(cursor: string | undefined, maxResults: number): Promise<MailPage> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.fetchAttempts; attempt++) {
      try {
        return await this.provider.fetchPage(this.query, cursor, maxResults);
      } catch (error) {
        lastError = error;
        if (error instanceof ProviderNotAuthenticatedError) {
          throw error;
        }
        console.error(`❌ [SYNC] Attempt ${attempt} to fetch page failed:`, error instanceof Error ? error.message : error);

        if (attempt < this.fetchAttempts) {
          await this.delay(this.retryDelayMs * Math.pow(2, attempt - 1));
        }
      }
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new Error(`Failed to fetch page after ${this.fetchAttempts} attempts: ${reason}`);
  }

  /**
   * Returns the number of records written; a page that still fails after
   * the last attempt is logged and skipped
   */
  private async indexWithRetry(messages: EmailMessage[]): Promise<number> {
    if (messages.length === 0) {
      return 0;
    }

    for (let attempt = 1; attempt <= this.upsertAttempts; attempt++) {
      try {
        return await this.index.upsert(messages);
      } catch (error) {
        console.error(`❌ [SYNC] Attempt ${attempt} to index ${messages.length} emails failed:`, error instanceof Error ? error.message : error);
        if (attempt < this.upsertAttempts) {
          await this.delay(this.retryDelayMs * Math.pow(2, attempt - 1));
        }
      }
    }

    console.warn(`⚠️ [SYNC] Skipping ${messages.length} emails that could not be indexed`);
    return 0;
  }

  private oldestTime(messages: EmailMessage[]): number {
    const times = messages.map(message => message.date.getTime()).filter(time => !Number.isNaN(time));
    return times.length > 0 ? Math.min(...times) : Infinity;
  }

  private debugLog(message: string): void {
    if (this.debug) {
      console.log(`🔍 [SYNC] ${message}`);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
