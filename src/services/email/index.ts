/**
 * Mail provider exports
 */

export { MailProvider, MailPage } from './MailProvider';
export { GmailProvider, GmailProviderOptions, GmailAuthClient } from './GmailProvider';
export { GmailMessageParser } from './GmailMessageParser';
export { DemoMailProvider, DemoMailboxEntry } from './DemoMailProvider';
