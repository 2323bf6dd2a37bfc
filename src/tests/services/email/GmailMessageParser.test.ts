/**
 * Unit tests for GmailMessageParser
 */

import { gmail_v1 } from 'googleapis';
import { GmailMessageParser } from '../../../services/email/GmailMessageParser';

const encode = (text: string): string => Buffer.from(text, 'utf-8').toString('base64url');

describe('GmailMessageParser', () => {
  let parser: GmailMessageParser;

  beforeEach(() => {
    parser = new GmailMessageParser('work');
  });

  const buildMessage = (overrides: Partial<gmail_v1.Schema$Message> = {}): gmail_v1.Schema$Message => ({
    id: 'gm-1',
    threadId: 'th-1',
    labelIds: ['INBOX', 'UNREAD'],
    internalDate: '1716199200000',
    payload: {
      mimeType: 'text/plain',
      headers: [
        { name: 'From', value: 'Alice Smith <alice@example.com>' },
        { name: 'To', value: '"Doe, John" <john@example.com>, bob@example.com' },
        { name: 'Cc', value: 'carol@example.com' },
        { name: 'Subject', value: 'Quarterly plan' },
        { name: 'List-Unsubscribe', value: '<mailto:u@example.com>' }
      ],
      body: { data: encode('Hello team, see the plan.') }
    },
    ...overrides
  });

  it('should parse headers, addresses and body', () => {
    const email = parser.parseMessage(buildMessage());

    expect(email).not.toBeNull();
    expect(email?.id).toBe('gm-1');
    expect(email?.threadId).toBe('th-1');
    expect(email?.sender).toBe('Alice Smith <alice@example.com>');
    expect(email?.to).toEqual(['john@example.com', 'bob@example.com']);
    expect(email?.cc).toEqual(['carol@example.com']);
    expect(email?.subject).toBe('Quarterly plan');
    expect(email?.body).toBe('Hello team, see the plan.');
    expect(email?.date.toISOString()).toBe('2024-05-20T10:00:00.000Z');
    expect(email?.isUnread).toBe(true);
    expect(email?.isRelevant).toBe(false);
    expect(email?.accountType).toBe('work');
  });

  it('should expose headers case-insensitively', () => {
    const email = parser.parseMessage(buildMessage());

    expect(email?.headers.has('list-unsubscribe')).toBe(true);
    expect(email?.headers.get('LIST-UNSUBSCRIBE')).toBe('<mailto:u@example.com>');
  });

  it('should prefer text/plain in multipart messages and detect attachments', () => {
    const email = parser.parseMessage(buildMessage({
      payload: {
        mimeType: 'multipart/mixed',
        headers: [{ name: 'Subject', value: 'Report' }],
        parts: [
          {
            mimeType: 'multipart/alternative',
            parts: [
              { mimeType: 'text/plain', body: { data: encode('Plain body') } },
              { mimeType: 'text/html', body: { data: encode('<p>HTML body</p>') } }
            ]
          },
          { mimeType: 'application/pdf', filename: 'report.pdf', body: { attachmentId: 'att-1' } }
        ]
      }
    }));

    expect(email?.body).toBe('Plain body');
    expect(email?.hasAttachments).toBe(true);
  });

  it('should strip HTML when no plain part exists', () => {
    const email = parser.parseMessage(buildMessage({
      payload: {
        mimeType: 'text/html',
        headers: [],
        body: { data: encode('<div>Hi&nbsp;there</div><style>p{}</style><p>Tom &amp; Jerry</p>') }
      }
    }));

    expect(email?.body).toBe('Hi there Tom & Jerry');
    expect(email?.subject).toBe('(No Subject)');
    expect(email?.hasAttachments).toBe(false);
  });

  it('should fall back to the Date header', () => {
    const email = parser.parseMessage(buildMessage({
      internalDate: null,
      payload: {
        headers: [{ name: 'Date', value: 'Mon, 20 May 2024 10:00:00 +0000' }],
        body: { data: encode('x') }
      }
    }));

    expect(email?.date.toISOString()).toBe('2024-05-20T10:00:00.000Z');
  });

  it('should return null for messages without a payload', () => {
    expect(parser.parseMessage({ id: 'gm-2' })).toBeNull();
  });
});
