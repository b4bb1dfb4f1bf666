// Entry point for label access: `mailbox.labels`.
//   mailbox.labels.system.inbox        fixed system labels
//   mailbox.labels.categories.social   fixed inbox categories
//   mailbox.labels.user.resolve('Work/Clients')   user label tree
//
// refresh() fetches the flat label list, reconciles it into a brand new
// registry and only then swaps it in and bumps the generation. The rebuild
// between the awaited fetch and the swap is synchronous, so no reader can
// see a half-built tree.

import type { NotFoundError, TransportError } from './api-utils.js'
import type { MailboxContext } from './context.js'
import { LabelNode, LabelRoot, reconcileLabels, type EntitySource, type LabelKind, type LabelProxy } from './label-hierarchy.js'
import { LabelRegistry } from './label-registry.js'
import { Category, SystemLabel, UserLabel, type BaseLabel } from './labels.js'
import {
  SYSTEM_CATEGORIES,
  SYSTEM_LABELS,
  isSystemCategoryId,
  isSystemLabelId,
  type SystemCategoryId,
  type SystemLabelId,
} from './system-labels.js'

export interface SystemLabelProxies {
  inbox: LabelProxy
  sent: LabelProxy
  unread: LabelProxy
  important: LabelProxy
  starred: LabelProxy
  draft: LabelProxy
  chat: LabelProxy
  trash: LabelProxy
  spam: LabelProxy
}

export interface CategoryProxies {
  primary: LabelProxy
  social: LabelProxy
  promotions: LabelProxy
  updates: LabelProxy
  forums: LabelProxy
}

export class LabelAccessor implements EntitySource {
  readonly system: SystemLabelProxies
  readonly categories: CategoryProxies
  readonly user = new LabelRoot()

  private registry = new LabelRegistry<LabelNode>()
  private fixedNodes: LabelNode[]
  private currentGeneration = 0

  constructor(private readonly context: MailboxContext) {
    const system = (id: SystemLabelId) => this.fixedNode(id, SYSTEM_LABELS[id], 'system')
    const category = (id: SystemCategoryId) => this.fixedNode(id, SYSTEM_CATEGORIES[id], 'category')

    this.system = {
      inbox: system('INBOX'),
      sent: system('SENT'),
      unread: system('UNREAD'),
      important: system('IMPORTANT'),
      starred: system('STARRED'),
      draft: system('DRAFT'),
      chat: system('CHAT'),
      trash: system('TRASH'),
      spam: system('SPAM'),
    }
    this.categories = {
      primary: category('CATEGORY_PERSONAL'),
      social: category('CATEGORY_SOCIAL'),
      promotions: category('CATEGORY_PROMOTIONS'),
      updates: category('CATEGORY_UPDATES'),
      forums: category('CATEGORY_FORUMS'),
    }

    this.fixedNodes = [...Object.values(this.categories), ...Object.values(this.system)].map((proxy) => proxy.node)
    for (const node of this.fixedNodes) this.registry.set(node)
  }

  private fixedNode(id: string, name: string, kind: LabelKind): LabelProxy {
    return new LabelNode(id, name, kind, this).proxy
  }

  /** Bumped on every refresh; entities cached under an older value are refetched. */
  get generation(): number {
    return this.currentGeneration
  }

  getById(id: string): LabelNode | NotFoundError {
    return this.registry.getById(id)
  }

  getByName(name: string): LabelNode | NotFoundError {
    return this.registry.getByName(name)
  }

  hasId(id: string): boolean {
    return this.registry.hasId(id)
  }

  /** Every registered node: categories, system labels, then user labels in tree order. */
  nodes(): LabelNode[] {
    return this.registry.nodes()
  }

  async load(node: LabelNode): Promise<BaseLabel | TransportError> {
    const remote = await this.context.transport.getLabel(node.id)
    if (remote instanceof Error) return remote

    switch (node.kind) {
      case 'category':
        return new Category(this.context, remote)
      case 'system':
        return new SystemLabel(this.context, remote)
      case 'user':
        return new UserLabel(this.context, remote)
    }
  }

  /** Fetch the remote label list and reconcile the user tree. Returns the evicted nodes. */
  async refresh(): Promise<LabelNode[] | TransportError> {
    const remote = await this.context.transport.listLabels()
    if (remote instanceof Error) return remote

    const next = new LabelRegistry<LabelNode>()
    for (const node of this.fixedNodes) next.set(node)

    const userLabels = remote.filter(
      (label) => label.type === 'user' && !isSystemLabelId(label.id) && !isSystemCategoryId(label.id),
    )

    const evicted = reconcileLabels({
      root: this.user,
      labels: userLabels,
      previous: this.registry,
      next,
      createNode: (label) => new LabelNode(label.id, label.name, 'user', this),
    })

    this.registry = next
    this.currentGeneration++
    return evicted
  }
}
