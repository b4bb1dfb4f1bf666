// Fixed Gmail system labels and inbox categories with their display names.
// These ids are predefined by Gmail and cannot be renamed, so they are seeded
// once instead of going through the hierarchy walk.

export const SYSTEM_LABELS = {
  INBOX: 'Inbox',
  SENT: 'Sent',
  UNREAD: 'Unread',
  IMPORTANT: 'Important',
  STARRED: 'Starred',
  DRAFT: 'Draft',
  CHAT: 'Chat',
  TRASH: 'Trash',
  SPAM: 'Spam',
} as const

export const SYSTEM_CATEGORIES = {
  CATEGORY_PERSONAL: 'Primary',
  CATEGORY_SOCIAL: 'Social',
  CATEGORY_PROMOTIONS: 'Promotions',
  CATEGORY_UPDATES: 'Updates',
  CATEGORY_FORUMS: 'Forums',
} as const

export type SystemLabelId = keyof typeof SYSTEM_LABELS
export type SystemCategoryId = keyof typeof SYSTEM_CATEGORIES

export function isSystemLabelId(id: string): id is SystemLabelId {
  return Object.hasOwn(SYSTEM_LABELS, id)
}

export function isSystemCategoryId(id: string): id is SystemCategoryId {
  return Object.hasOwn(SYSTEM_CATEGORIES, id)
}
