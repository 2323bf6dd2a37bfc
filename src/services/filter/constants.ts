/**
 * Keyword tables and provider enumerations used by the relevance classifier
 */

export const DEFAULT_SPAM_KEYWORDS = [
  'unsubscribe',
  'promotion',
  'sale',
  'discount',
  'offer',
  'deal',
  'marketing',
  'newsletter',
  'advertisement',
  'sponsored',
  'free trial'
];

export const DEFAULT_IMPORTANT_KEYWORDS = [
  'meeting',
  'deadline',
  'urgent',
  'important',
  'assignment',
  'project',
  'schedule',
  'appointment',
  'interview'
];

export const SENDER_MARKETING_PATTERNS = ['marketing'];

export const MARKETING_FOOTER_PHRASES = ['unsubscribe', 'view in browser', 'update preferences'];

export const ACTION_ITEM_PATTERNS: RegExp[] = [
  /\bplease\b.*\b(action|review|respond|call|meet)\b/i,
  /\b(need|required|must|should)\b/i,
  /\b(deadline|due|meeting|call|appointment)\b/i,
  /\b(attachment|attached|document|file)\b/i
];

export const RECENCY_WINDOW_DAYS = 30;

export enum ProviderCategory {
  Promotions = 'promotions',
  Social = 'social',
  Updates = 'updates',
  Forums = 'forums',
  Primary = 'primary'
}

/**
 * Gmail label ids mapped onto provider categories
 */
export const GMAIL_CATEGORY_LABELS: Record<string, ProviderCategory> = {
  CATEGORY_PROMOTIONS: ProviderCategory.Promotions,
  CATEGORY_SOCIAL: ProviderCategory.Social,
  CATEGORY_UPDATES: ProviderCategory.Updates,
  CATEGORY_FORUMS: ProviderCategory.Forums,
  CATEGORY_PERSONAL: ProviderCategory.Primary
};

export const REJECTED_CATEGORIES: ReadonlySet<ProviderCategory> = new Set([
  ProviderCategory.Promotions,
  ProviderCategory.Social
]);

export enum ListHeader {
  ListId = 'list-id',
  ListUnsubscribe = 'list-unsubscribe',
  ListPost = 'list-post',
  ListHelp = 'list-help',
  ListSubscribe = 'list-subscribe',
  ListArchive = 'list-archive',
  ListOwner = 'list-owner'
}

export enum BulkPrecedence {
  Bulk = 'bulk',
  List = 'list',
  Junk = 'junk'
}

export function categoriesFromLabels(labels: string[]): ProviderCategory[] {
  const categories: ProviderCategory[] = [];
  for (const label of labels) {
    const category = GMAIL_CATEGORY_LABELS[label.toUpperCase()];
    if (category && !categories.includes(category)) {
      categories.push(category);
    }
  }
  return categories;
}
