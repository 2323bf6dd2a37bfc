import { EmailMessage } from '../../types/models';

export interface MailPage {
  messages: EmailMessage[];
  nextCursor?: string;
}

/**
 * Source of mail pages. Cursors are opaque to callers.
 */
export interface MailProvider {
  readonly name: string;
  isAuthenticated(): boolean;
  fetchPage(query: string, cursor: string | undefined, maxResults: number): Promise<MailPage>;
}
