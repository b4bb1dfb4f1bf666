// Library entry point.
//   import { Mailbox, MessageAttribute } from 'mailquery'

export { Mailbox, type MailboxOptions } from './mailbox.js'
export { MessageAttribute, toIsoDate } from './attributes.js'
export {
  Operator,
  Predicate,
  Expression,
  EquatableAttribute,
  ComparableAttribute,
  FlagAttribute,
  EnumerativeAttribute,
  predicate,
  and,
  or,
  compile,
  type Attribute,
  type Clause,
  type Ordering,
  type OrderableField,
  type Direction,
  type CompileOptions,
} from './query-attributes.js'
export { Query, BulkAction, BulkActionContext, applyOrdering } from './query.js'
export { Message, type MessageBody, type AttachmentMeta, type LabelRef, type MessageError } from './message.js'
export { BaseLabel, Label, SystemLabel, UserLabel, Category, type LabelOptions } from './labels.js'
export { LabelAccessor, type SystemLabelProxies, type CategoryProxies } from './label-accessor.js'
export { LabelNode, LabelProxy, LabelNamespace, LabelRoot, describeTree } from './label-hierarchy.js'
export { LabelRegistry } from './label-registry.js'
export { GmailTransport, type MailTransport, type RemoteLabel, type RemoteMessage } from './transport.js'
export { systemClock, type Clock, type MailboxSettings } from './context.js'
export { loadConfig, type Config } from './config.js'
export { authenticate, createOAuth2Client, readStoredAccount } from './auth.js'
export * from './api-utils.js'
