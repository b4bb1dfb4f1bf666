// Label tree built from Gmail's flat, slash-delimited label names.
// "Work", "Work/Clients" and "Work/Clients/Acme" become Root -> Work -> Clients -> Acme.
//
// reconcileLabels() rebuilds the tree on every refresh but reuses the node of
// any label id it has seen before, re-parenting and renaming it in place. A
// LabelProxy a caller obtained before the refresh therefore still points at
// the same node afterwards. Nodes whose id disappeared are evicted: detached
// from the tree and left out of the new registry.
//
// Entities (the Label / Category objects with live counts) are fetched lazily
// per node and cached together with the accessor generation they were
// fetched under. Every refresh bumps the generation, so the next entity()
// call after a refresh refetches.

import { NotFoundError, type TransportError } from './api-utils.js'
import type { LabelRegistry } from './label-registry.js'
import type { BaseLabel } from './labels.js'

export type LabelKind = 'user' | 'system' | 'category'

/** Where nodes get their entities from; implemented by LabelAccessor. */
export interface EntitySource {
  readonly generation: number
  load(node: LabelNode): Promise<BaseLabel | TransportError>
}

// ---------------------------------------------------------------------------
// Namespaces and proxies
// ---------------------------------------------------------------------------

/** One level of the public label namespace: a named child per path segment. */
export class LabelNamespace {
  private entries = new Map<string, LabelProxy>()

  get children(): ReadonlyMap<string, LabelProxy> {
    return this.entries
  }

  names(): string[] {
    return [...this.entries.keys()]
  }

  child(segment: string): LabelProxy | undefined {
    return this.entries.get(segment)
  }

  /** Walk a slash-delimited path below this level, e.g. `resolve('Clients/Acme')`. */
  resolve(path: string): LabelProxy | NotFoundError {
    const exact = this.entries.get(path)
    if (exact) return exact

    // Keys can span several segments when an intermediate label doesn't exist.
    const segments = path.split('/')
    for (let take = segments.length - 1; take > 0; take--) {
      const next = this.entries.get(segments.slice(0, take).join('/'))
      if (next) return next.resolve(segments.slice(take).join('/'))
    }
    return new NotFoundError({ resource: `label path "${path}"` })
  }

  /** Replace this level's entries; only the reconciler calls this. */
  regenerate(entries: Map<string, LabelProxy>): void {
    this.entries = entries
  }
}

/** Stable handle to a label node. Survives refreshes as long as the label id exists. */
export class LabelProxy extends LabelNamespace {
  constructor(readonly node: LabelNode) {
    super()
  }

  get id(): string {
    return this.node.id
  }

  get name(): string {
    return this.node.name
  }

  entity(): Promise<BaseLabel | TransportError | NotFoundError> {
    return this.node.entity()
  }
}

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

export class LabelNode {
  parent: LabelNode | null = null
  children = new Map<string, LabelNode>()
  readonly proxy: LabelProxy
  private cached: { entity: BaseLabel; generation: number } | null = null
  private evicted = false

  constructor(
    readonly id: string,
    public name: string,
    readonly kind: LabelKind,
    private source: EntitySource,
  ) {
    this.proxy = new LabelProxy(this)
  }

  get isEvicted(): boolean {
    return this.evicted
  }

  /** The entity for this label, fetched on first access and again after each refresh. */
  async entity(): Promise<BaseLabel | TransportError | NotFoundError> {
    if (this.evicted) return new NotFoundError({ resource: `label "${this.name}" (${this.id})` })

    const generation = this.source.generation
    if (this.cached && this.cached.generation === generation) return this.cached.entity

    const entity = await this.source.load(this)
    if (entity instanceof Error) return entity
    this.cached = { entity, generation }
    return entity
  }

  /** Drop the cached entity so the next access refetches it. */
  invalidate(): void {
    this.cached = null
  }

  /** Detach a node whose label no longer exists remotely. */
  evict(): void {
    this.evicted = true
    this.cached = null
    this.parent = null
    this.children = new Map()
    this.proxy.regenerate(new Map())
  }
}

/** The virtual root above all top-level user labels. */
export class LabelRoot extends LabelNamespace {
  nodes = new Map<string, LabelNode>()
}

// ---------------------------------------------------------------------------
// Reconciliation
// ---------------------------------------------------------------------------

export interface LabelListing {
  id: string
  name: string
}

export interface ReconcileInput {
  root: LabelRoot
  /** User labels only: system labels and categories never enter the walk. */
  labels: LabelListing[]
  previous: LabelRegistry<LabelNode>
  next: LabelRegistry<LabelNode>
  createNode: (label: LabelListing) => LabelNode
}

function depth(path: string): number {
  return path.split('/').length
}

/**
 * Place `candidates` below `parent` (null for the root). `prefix` is the full
 * name of the parent; every candidate's name starts with `prefix + '/'`.
 * Returns the new children of that level keyed by their local segment.
 */
function reconcileLevel(
  parent: LabelNode | null,
  prefix: string,
  candidates: LabelListing[],
  input: ReconcileInput,
): Map<string, LabelNode> {
  const children = new Map<string, LabelNode>()
  const descendants = new Map<LabelNode, LabelListing[]>()

  const local = candidates
    .map((label) => ({ label, rest: prefix ? label.name.slice(prefix.length + 1) : label.name }))
    .sort((a, b) => depth(a.rest) - depth(b.rest))

  for (const { label, rest } of local) {
    const owner = [...children.entries()].find(([segment]) => rest.startsWith(`${segment}/`))
    if (owner) {
      descendants.get(owner[1])?.push(label)
      continue
    }

    const reused = input.previous.getById(label.id)
    const node = reused instanceof Error ? input.createNode(label) : reused
    node.name = label.name
    node.parent = parent
    children.set(rest, node)
    descendants.set(node, [])
    input.next.set(node)
  }

  for (const node of children.values()) {
    node.children = reconcileLevel(node, node.name, descendants.get(node) ?? [], input)
  }

  return children
}

function regenerateNamespace(level: LabelNamespace, children: Map<string, LabelNode>): void {
  level.regenerate(new Map([...children].map(([segment, node]) => [segment, node.proxy])))
  for (const node of children.values()) {
    regenerateNamespace(node.proxy, node.children)
  }
}

/**
 * Rebuild the user-label tree under `root` from the flat remote listing,
 * registering every placed node in `next`. Nodes known to `previous` are
 * reused by id. Returns the nodes that were evicted.
 */
export function reconcileLabels(input: ReconcileInput): LabelNode[] {
  const { root, previous, next } = input

  root.nodes = reconcileLevel(null, '', input.labels, input)
  regenerateNamespace(root, root.nodes)

  const evicted = previous.nodes().filter((node) => !next.hasId(node.id))
  for (const node of evicted) node.evict()
  return evicted
}

/** Indented outline of the namespace, one line per label: `Work`, `  Clients`, ... */
export function describeTree(level: LabelNamespace, indent = ''): string[] {
  return [...level.children].flatMap(([segment, proxy]) => [
    `${indent}${segment}`,
    ...describeTree(proxy, `${indent}  `),
  ])
}
