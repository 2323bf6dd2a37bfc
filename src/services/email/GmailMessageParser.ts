/**
 * Converts Gmail API messages into EmailMessage models
 */

import { gmail_v1 } from 'googleapis';
import { AccountType, EmailMessage, MessageHeaders } from '../../types/models';

export class GmailMessageParser {
  constructor(private readonly accountType: AccountType = 'personal') {}

  /**
   * Parses a message fetched with format=full. Returns null when the
   * message has no id or payload.
   */
  parseMessage(message: gmail_v1.Schema$Message): EmailMessage | null {
    if (!message.id || !message.payload) {
      return null;
    }

    const headers = this.extractHeaders(message.payload);
    const labels = message.labelIds || [];

    return {
      id: message.id,
      threadId: message.threadId || undefined,
      sender: (headers.get('from') || '').trim(),
      to: this.parseAddressList(headers.get('to')),
      cc: this.parseAddressList(headers.get('cc')),
      subject: headers.get('subject') || '(No Subject)',
      body: this.extractBody(message.payload),
      date: this.parseDate(message.internalDate, headers.get('date')),
      isUnread: labels.includes('UNREAD'),
      hasAttachments: this.hasAttachments(message.payload),
      headers,
      labels,
      isRelevant: false,
      accountType: this.accountType
    };
  }

  private extractHeaders(payload: gmail_v1.Schema$MessagePart): MessageHeaders {
    const headers = new MessageHeaders();

    for (const header of payload.headers || []) {
      if (header.name && header.value !== null && header.value !== undefined) {
        headers.set(header.name, header.value);
      }
    }

    return headers;
  }

  /**
   * Prefers text/plain parts; falls back to stripped text/html
   */
  private extractBody(payload: gmail_v1.Schema$MessagePart): string {
    if (payload.body?.data) {
      const content = this.decodeBase64Url(payload.body.data);
      return payload.mimeType === 'text/html' ? this.stripHtml(content) : content;
    }

    const result = { text: '', html: '' };
    this.collectParts(payload.parts || [], result);
    return result.text || this.stripHtml(result.html);
  }

  private collectParts(parts: gmail_v1.Schema$MessagePart[], result: { text: string; html: string }): void {
    for (const part of parts) {
      if (part.filename) {
        continue; // attachment
      }
      if (part.mimeType === 'text/plain' && part.body?.data) {
        result.text += this.decodeBase64Url(part.body.data);
      } else if (part.mimeType === 'text/html' && part.body?.data) {
        result.html += this.decodeBase64Url(part.body.data);
      } else if (part.parts) {
        this.collectParts(part.parts, result);
      }
    }
  }

  private decodeBase64Url(data: string): string {
    const base64 = data.replace(/-/g, '+').replace(/_/g, '/');
    const padded = base64 + '='.repeat((4 - (base64.length % 4)) % 4);

    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(padded)) {
      console.error('❌ Failed to decode message body: invalid base64 data');
      return '';
    }

    return Buffer.from(padded, 'base64').toString('utf-8');
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<\/?(h[1-6]|p|div|br|li|tr)[^>]*>/gi, ' ')
      .replace(/<[^>]*>/g, '')
      .replace(/&nbsp;/g, ' ')
      .replace(/&lt;/g, '<')
      .replace(/&gt;/g, '>')
      .replace(/&quot;/g, '"')
      .replace(/&#39;/g, "'")
      .replace(/&amp;/g, '&')
      .replace(/\s+/g, ' ')
      .trim();
  }

  private parseDate(internalDate: string | null | undefined, dateHeader: string | undefined): Date {
    if (internalDate) {
      const millis = parseInt(internalDate, 10);
      if (!Number.isNaN(millis) && millis > 0) {
        return new Date(millis);
      }
    }
    return dateHeader ? new Date(dateHeader) : new Date(NaN);
  }

  /**
   * Splits an address header on commas outside quotes and angle brackets
   */
  private parseAddressList(header: string | undefined): string[] {
    if (!header) {
      return [];
    }

    const addresses: string[] = [];
    let current = '';
    let inQuotes = false;
    let inAngleBrackets = false;

    for (const char of header) {
      if (char === '"' && !inAngleBrackets) {
        inQuotes = !inQuotes;
      } else if (char === '<' && !inQuotes) {
        inAngleBrackets = true;
      } else if (char === '>' && !inQuotes) {
        inAngleBrackets = false;
      } else if (char === ',' && !inQuotes && !inAngleBrackets) {
        this.pushAddress(addresses, current);
        current = '';
        continue;
      }
      current += char;
    }
    this.pushAddress(addresses, current);

    return addresses;
  }

  private pushAddress(addresses: string[], raw: string): void {
    const trimmed = raw.trim();
    if (!trimmed) {
      return;
    }
    const angle = trimmed.match(/<([^>]+)>/);
    const address = angle ? angle[1].trim() : trimmed.replace(/^["']|["']$/g, '');
    if (address.includes('@') && !addresses.includes(address)) {
      addresses.push(address);
    }
  }

  private hasAttachments(payload: gmail_v1.Schema$MessagePart): boolean {
    const visit = (parts: gmail_v1.Schema$MessagePart[]): boolean =>
      parts.some(part => Boolean(part.filename && part.body?.attachmentId) || visit(part.parts || []));
    return visit(payload.parts || []);
  }
}
