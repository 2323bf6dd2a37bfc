/**
 * MailProvider over a JSON mailbox fixture, for demos and local development.
 * Messages carry an age in days so the mailbox never goes stale.
 */

import { promises as fs } from 'fs';
import Joi from 'joi';
import { AccountType, EmailMessage, MessageHeaders } from '../../types/models';
import { MailPage, MailProvider } from './MailProvider';

export interface DemoMailboxEntry {
  id: string;
  threadId?: string;
  sender: string;
  to?: string[];
  cc?: string[];
  subject: string;
  body: string;
  ageDays: number;
  isUnread?: boolean;
  hasAttachments?: boolean;
  headers?: Record<string, string>;
  labels?: string[];
  accountType?: AccountType;
}

const entrySchema = Joi.object<DemoMailboxEntry>({
  id: Joi.string().required(),
  threadId: Joi.string().optional(),
  sender: Joi.string().required(),
  to: Joi.array().items(Joi.string()).default([]),
  cc: Joi.array().items(Joi.string()).default([]),
  subject: Joi.string().allow('').required(),
  body: Joi.string().allow('').required(),
  ageDays: Joi.number().min(0).required(),
  isUnread: Joi.boolean().optional(),
  hasAttachments: Joi.boolean().default(false),
  headers: Joi.object().pattern(Joi.string(), Joi.string()).default({}),
  labels: Joi.array().items(Joi.string()).default([]),
  accountType: Joi.string().valid('personal', 'work', 'school').default('personal')
});

const mailboxSchema = Joi.array<DemoMailboxEntry[]>().items(entrySchema);

const DAY_MS = 24 * 60 * 60 * 1000;
const UNIT_DAYS: Record<string, number> = { d: 1, m: 30, y: 365 };

export class DemoMailProvider implements MailProvider {
  readonly name = 'demo';
  private entries: DemoMailboxEntry[] | null = null;

  constructor(
    private readonly source: string | DemoMailboxEntry[],
    private readonly now: () => Date = () => new Date()
  ) {}

  isAuthenticated(): boolean {
    return true;
  }

  async fetchPage(query: string, cursor: string | undefined, maxResults: number): Promise<MailPage> {
    const entries = await this.load();
    const matching = entries.filter(entry => this.matchesQuery(entry, query));

    const offset = cursor ? parseInt(cursor, 10) : 0;
    if (Number.isNaN(offset) || offset < 0) {
      throw new Error(`Invalid demo mailbox cursor: ${cursor}`);
    }

    const slice = matching.slice(offset, offset + maxResults);
    const nextOffset = offset + slice.length;

    return {
      messages: slice.map(entry => this.toMessage(entry)),
      nextCursor: slice.length > 0 && nextOffset < matching.length ? String(nextOffset) : undefined
    };
  }

  private async load(): Promise<DemoMailboxEntry[]> {
    if (this.entries) {
      return this.entries;
    }

    try {
      const raw: unknown = typeof this.source === 'string'
        ? JSON.parse(await fs.readFile(this.source, 'utf-8'))
        : this.source;

      const { error, value } = mailboxSchema.validate(raw);
      if (error) {
        throw new Error(`Invalid demo mailbox: ${error.message}`);
      }

      this.entries = value;
      console.log(`✅ Loaded demo mailbox with ${value.length} messages`);
      return value;
    } catch (error) {
      console.error('❌ Failed to load demo mailbox:', error);
      throw error;
    }
  }

  /**
   * Honors the noise-filter terms of a provider query: -category:x, -in:x
   * and newer_than:N(d|m|y)
   */
  private matchesQuery(entry: DemoMailboxEntry, query: string): boolean {
    const labels = (entry.labels || []).map(label => label.toUpperCase());

    for (const term of query.split(/\s+/).filter(Boolean)) {
      const excluded = term.match(/^-(category|in):(\w+)$/i);
      if (excluded) {
        const label = excluded[1].toLowerCase() === 'category'
          ? `CATEGORY_${excluded[2].toUpperCase()}`
          : excluded[2].toUpperCase();
        if (labels.includes(label)) {
          return false;
        }
        continue;
      }

      const newer = term.match(/^newer_than:(\d+)([dmy])$/i);
      if (newer) {
        const days = parseInt(newer[1], 10) * UNIT_DAYS[newer[2].toLowerCase()];
        if (entry.ageDays > days) {
          return false;
        }
      }
    }

    return true;
  }

  private toMessage(entry: DemoMailboxEntry): EmailMessage {
    const labels = entry.labels || [];
    return {
      id: entry.id,
      threadId: entry.threadId,
      sender: entry.sender,
      to: entry.to || [],
      cc: entry.cc || [],
      subject: entry.subject,
      body: entry.body,
      date: new Date(this.now().getTime() - entry.ageDays * DAY_MS),
      isUnread: entry.isUnread ?? labels.includes('UNREAD'),
      hasAttachments: entry.hasAttachments || false,
      headers: MessageHeaders.fromRecord(entry.headers || {}),
      labels,
      isRelevant: false,
      accountType: entry.accountType || 'personal'
    };
  }
}
