/**
 * Heuristic relevance chain: an ordered, short-circuiting set of rules that
 * decides whether a message is worth retaining
 */

import { ClassificationVerdict, EmailMessage } from '../../types/models';
import {
  ACTION_ITEM_PATTERNS,
  BulkPrecedence,
  DEFAULT_IMPORTANT_KEYWORDS,
  DEFAULT_SPAM_KEYWORDS,
  ListHeader,
  MARKETING_FOOTER_PHRASES,
  RECENCY_WINDOW_DAYS,
  REJECTED_CATEGORIES,
  SENDER_MARKETING_PATTERNS,
  categoriesFromLabels
} from './constants';

export interface RelevanceClassifierOptions {
  vipSenders?: string[];
  importantKeywords?: string[];
  spamKeywords?: string[];
  recencyDays?: number;
  now?: () => Date;
}

const LIST_HEADERS = Object.values(ListHeader);
const BULK_PRECEDENCE_VALUES: string[] = Object.values(BulkPrecedence);

export class RelevanceClassifier {
  private readonly vipSenders: string[];
  private readonly importantKeywords: string[];
  private readonly spamKeywords: string[];
  private readonly recencyDays: number;
  private readonly now: () => Date;

  constructor(options: RelevanceClassifierOptions = {}) {
    this.vipSenders = (options.vipSenders || []).map(s => s.toLowerCase()).filter(s => s.length > 0);
    this.importantKeywords = (options.importantKeywords || DEFAULT_IMPORTANT_KEYWORDS).map(k => k.toLowerCase());
    this.spamKeywords = (options.spamKeywords || DEFAULT_SPAM_KEYWORDS).map(k => k.toLowerCase());
    this.recencyDays = options.recencyDays ?? RECENCY_WINDOW_DAYS;
    this.now = options.now || (() => new Date());
  }

  isVipSender(email: EmailMessage): boolean {
    const sender = email.sender.toLowerCase();
    return this.vipSenders.some(vip => sender.includes(vip));
  }

  /**
   * Runs the chain and returns the first rule that decides
   */
  classify(email: EmailMessage): ClassificationVerdict {
    const subject = email.subject.toLowerCase();
    const sender = email.sender.toLowerCase();
    const body = email.body.toLowerCase();

    if (this.isVipSender(email)) {
      return { relevant: true, stage: 'vip_sender', reason: 'Sender is on the important senders list' };
    }

    const rejectedCategory = categoriesFromLabels(email.labels).find(c => REJECTED_CATEGORIES.has(c));
    if (rejectedCategory) {
      return { relevant: false, stage: 'provider_category', reason: `Provider category: ${rejectedCategory}` };
    }

    const spamKeyword = this.spamKeywords.find(keyword => subject.includes(keyword));
    if (spamKeyword) {
      return { relevant: false, stage: 'heuristic_spam', reason: `Subject contains spam keyword "${spamKeyword}"` };
    }

    const marketingSender = SENDER_MARKETING_PATTERNS.find(pattern => sender.includes(pattern));
    if (marketingSender) {
      return { relevant: false, stage: 'heuristic_spam', reason: `Sender matches marketing pattern "${marketingSender}"` };
    }

    const footer = MARKETING_FOOTER_PHRASES.find(phrase => body.includes(phrase));
    if (footer) {
      return { relevant: false, stage: 'heuristic_spam', reason: `Body contains marketing footer "${footer}"` };
    }

    const listHeader = LIST_HEADERS.find(header => email.headers.has(header));
    if (listHeader) {
      return { relevant: false, stage: 'mailing_list', reason: `Mailing list header ${listHeader}` };
    }

    const precedence = (email.headers.get('precedence') || '').trim().toLowerCase();
    if (BULK_PRECEDENCE_VALUES.includes(precedence)) {
      return { relevant: false, stage: 'mailing_list', reason: `Precedence: ${precedence}` };
    }

    const importantKeyword = this.importantKeywords.find(keyword => subject.includes(keyword));
    if (importantKeyword) {
      return { relevant: true, stage: 'content_qualifier', reason: `Subject contains important keyword "${importantKeyword}"` };
    }

    if (subject.startsWith('re:')) {
      return { relevant: true, stage: 'content_qualifier', reason: 'Reply thread' };
    }

    if (ACTION_ITEM_PATTERNS.some(pattern => pattern.test(email.body))) {
      return { relevant: true, stage: 'content_qualifier', reason: 'Body contains an action item' };
    }

    if (this.isRecent(email.date)) {
      return { relevant: true, stage: 'recency', reason: `Received within the last ${this.recencyDays} days` };
    }

    return { relevant: false, stage: 'no_match', reason: 'No relevance rule matched' };
  }

  private isRecent(date: Date): boolean {
    const time = date.getTime();
    if (Number.isNaN(time)) {
      return false;
    }
    const cutoff = this.now().getTime() - this.recencyDays * 24 * 60 * 60 * 1000;
    return time >= cutoff;
  }
}
