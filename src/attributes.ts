// Message attribute catalogue: the searchable fields of a Gmail message.
// Usage:
//   const { From, Subject, Date, Has } = MessageAttribute
//   mailbox.messages.where(From.eq('a@example.com').and(Date.gt('2024-01-01')).and(Has.flags.attachment))

import {
  ComparableAttribute,
  EnumerativeAttribute,
  EquatableAttribute,
  FlagAttribute,
  type Operand,
} from './query-attributes.js'

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/** Normalize a date-like operand to an ISO date (YYYY-MM-DD). Unparseable values pass through.
 *  Date instances use their local calendar day; strings and timestamps use the UTC day. */
export function toIsoDate(value: Operand): string {
  if (value instanceof Date) {
    if (isNaN(value.getTime())) return String(value)
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`
  }
  const date = new Date(typeof value === 'boolean' ? NaN : value)
  if (isNaN(date.getTime())) return String(value)
  return date.toISOString().slice(0, 10)
}

export const MessageAttribute = {
  From: new EquatableAttribute('from', 'from'),
  To: new EquatableAttribute('to', 'to'),
  Cc: new EquatableAttribute('cc', 'cc'),
  Bcc: new EquatableAttribute('bcc', 'bcc'),
  Subject: new EquatableAttribute('subject', 'subject'),
  FileName: new EquatableAttribute('filename'),
  Label: new EquatableAttribute('label'),
  Date: new ComparableAttribute({ name: 'date', greater: 'after', less: 'before' }, 'date', toIsoDate),
  Size: new ComparableAttribute({ name: 'size', greater: 'larger', less: 'smaller' }, 'size'),
  Has: new EnumerativeAttribute('has', {
    attachment: new FlagAttribute('attachment'),
    youtubeVideo: new FlagAttribute('youtube'),
    googleDrive: new FlagAttribute('drive'),
    googleDocs: new FlagAttribute('document'),
    googleSheets: new FlagAttribute('spreadsheet'),
    googleSlides: new FlagAttribute('presentation'),
    userLabel: new FlagAttribute('userlabels'),
  }),
  Is: new EnumerativeAttribute('is', {
    unread: new FlagAttribute('unread'),
    read: new FlagAttribute('read'),
    starred: new FlagAttribute('starred'),
    important: new FlagAttribute('important'),
  }),
}
