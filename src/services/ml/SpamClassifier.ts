import { EmailMessage } from '../../types/models';

export type SpamLabel = 'spam' | 'ham';

/**
 * Binary spam/ham model behind the ML filtering stage
 */
export interface SpamClassifier {
  classify(text: string): Promise<SpamLabel>;
}

export const SPAM_INPUT_BODY_CHARS = 512;

/**
 * Text the spam model sees for a message
 */
export function buildSpamInput(email: Pick<EmailMessage, 'subject' | 'body'>): string {
  return `Subject: ${email.subject}\n\n${email.body.slice(0, SPAM_INPUT_BODY_CHARS)}`;
}
