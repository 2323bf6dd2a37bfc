/**
 * Gmail-backed MailProvider: lists message ids by query, then fetches
 * full messages in rate-limited chunks
 */

import { google, gmail_v1 } from 'googleapis';
import { AccountType, EmailMessage } from '../../types/models';
import { ProviderNotAuthenticatedError } from '../../types/errors';
import { MailPage, MailProvider } from './MailProvider';
import { GmailMessageParser } from './GmailMessageParser';

export type GmailAuthClient = InstanceType<typeof google.auth.OAuth2>;

export interface GmailProviderOptions {
  chunkSize?: number; // detail fetches per chunk
  chunkDelayMs?: number;
  accountType?: AccountType;
  maxRequestsPerSecond?: number;
}

export class GmailProvider implements MailProvider {
  readonly name = 'gmail';
  private gmail: gmail_v1.Gmail;
  private parser: GmailMessageParser;
  private rateLimiter: RateLimiter;
  private readonly chunkSize: number;
  private readonly chunkDelayMs: number;

  constructor(
    private readonly authClient: GmailAuthClient,
    options: GmailProviderOptions = {}
  ) {
    this.gmail = google.gmail({ version: 'v1', auth: authClient });
    this.parser = new GmailMessageParser(options.accountType || 'personal');
    this.rateLimiter = new RateLimiter(options.maxRequestsPerSecond || 10);
    this.chunkSize = options.chunkSize || 15;
    this.chunkDelayMs = options.chunkDelayMs ?? 100;
  }

  isAuthenticated(): boolean {
    const credentials = this.authClient.credentials;
    return Boolean(credentials && (credentials.refresh_token || credentials.access_token));
  }

  /**
   * Fetches one page of messages. A detail fetch that fails is logged and
   * skipped; a failed list call, or a page whose detail fetches all fail,
   * is thrown to the caller.
   */
  async fetchPage(query: string, cursor: string | undefined, maxResults: number): Promise<MailPage> {
    if (!this.isAuthenticated()) {
      throw new ProviderNotAuthenticatedError();
    }

    await this.rateLimiter.waitForSlot();

    let listing: gmail_v1.Schema$ListMessagesResponse;
    try {
      const response = await this.gmail.users.messages.list({
        userId: 'me',
        q: query,
        pageToken: cursor,
        maxResults,
        includeSpamTrash: false
      });
      listing = response.data;
    } catch (error) {
      await this.handleApiError(error);
      throw error;
    }

    const ids = (listing.messages || [])
      .map(message => message.id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);

    const { messages, failures } = await this.fetchMessagesChunked(ids);

    if (ids.length > 0 && failures.length === ids.length) {
      const authFailure = failures.find(reason => reason instanceof ProviderNotAuthenticatedError);
      if (authFailure) {
        throw authFailure;
      }
      throw new Error(`All ${ids.length} message fetches failed for page`);
    }

    return {
      messages,
      nextCursor: listing.nextPageToken || undefined
    };
  }

  private async fetchMessagesChunked(ids: string[]): Promise<{ messages: EmailMessage[]; failures: unknown[] }> {
    const emails: EmailMessage[] = [];
    const failures: unknown[] = [];

    for (let i = 0; i < ids.length; i += this.chunkSize) {
      const chunk = ids.slice(i, i + this.chunkSize);
      const results = await Promise.allSettled(chunk.map(id => this.fetchMessage(id)));

      results.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          if (result.value) {
            emails.push(result.value);
          }
        } else {
          failures.push(result.reason);
          console.error(`❌ Failed to fetch message ${chunk[index]}:`, result.reason instanceof Error ? result.reason.message : result.reason);
        }
      });

      if (i + this.chunkSize < ids.length && this.chunkDelayMs > 0) {
        await this.delay(this.chunkDelayMs);
      }
    }

    return { messages: emails, failures };
  }

  private async fetchMessage(id: string): Promise<EmailMessage | null> {
    await this.rateLimiter.waitForSlot();

    try {
      const response = await this.gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'full'
      });
      return this.parser.parseMessage(response.data);
    } catch (error) {
      await this.handleApiError(error);
      throw error;
    }
  }

  private async handleApiError(error: unknown): Promise<void> {
    const code = typeof error === 'object' && error !== null && 'code' in error ? Number(error.code) : NaN;

    if (code === 429) {
      console.warn('⚠️ Gmail API rate limit exceeded, backing off');
      await this.delay(1000);
    } else if (code === 401) {
      console.warn('⚠️ Gmail API authentication failed, refresh token may be revoked');
      throw new ProviderNotAuthenticatedError('Gmail authentication failed - refresh token may be revoked');
    } else if (code >= 500) {
      console.warn('⚠️ Gmail API server error');
      await this.delay(500);
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * Sliding-window limiter for Gmail API quotas
 */
class RateLimiter {
  private requests: number[] = [];
  private readonly windowMs = 1000;

  constructor(private readonly maxRequestsPerSecond: number) {}

  async waitForSlot(): Promise<void> {
    const now = Date.now();
    this.requests = this.requests.filter(time => now - time < this.windowMs);

    if (this.requests.length >= this.maxRequestsPerSecond) {
      const oldestRequest = Math.min(...this.requests);
      const waitTime = this.windowMs - (now - oldestRequest) + 10;

      if (waitTime > 0) {
        await new Promise(resolve => setTimeout(resolve, waitTime));
        return this.waitForSlot();
      }
    }

    this.requests.push(now);
  }
}
