// Bidirectional id <-> name index of label nodes.
// Both maps are always written together: set() drops whatever stale entry
// the node's id or name previously pointed at, so a lookup by id and a lookup
// by name can never disagree.

import { NotFoundError } from './api-utils.js'

/** The minimum a registry needs from a node. */
export interface RegistryEntry {
  readonly id: string
  readonly name: string
}

export class LabelRegistry<N extends RegistryEntry = RegistryEntry> {
  private byId = new Map<string, N>()
  private byName = new Map<string, N>()

  get size(): number {
    return this.byId.size
  }

  getById(id: string): N | NotFoundError {
    return this.byId.get(id) ?? new NotFoundError({ resource: `label id "${id}"` })
  }

  getByName(name: string): N | NotFoundError {
    return this.byName.get(name) ?? new NotFoundError({ resource: `label "${name}"` })
  }

  hasId(id: string): boolean {
    return this.byId.has(id)
  }

  hasName(name: string): boolean {
    return this.byName.has(name)
  }

  set(node: N): void {
    const previous = this.byId.get(node.id)
    if (previous) this.unlinkName(previous)

    const squatter = this.byName.get(node.name)
    if (squatter) this.byId.delete(squatter.id)

    this.byId.set(node.id, node)
    this.byName.set(node.name, node)
  }

  popById(id: string): N | NotFoundError {
    const node = this.getById(id)
    if (node instanceof Error) return node
    this.pop(node)
    return node
  }

  popByName(name: string): N | NotFoundError {
    const node = this.getByName(name)
    if (node instanceof Error) return node
    this.pop(node)
    return node
  }

  pop(node: N): void {
    this.byId.delete(node.id)
    this.unlinkName(node)
  }

  private unlinkName(node: N): void {
    if (this.byName.get(node.name) === node) {
      this.byName.delete(node.name)
      return
    }
    // Renamed after it was registered: find the entry by identity.
    for (const [name, entry] of this.byName) {
      if (entry === node) this.byName.delete(name)
    }
  }

  clear(): void {
    this.byId.clear()
    this.byName.clear()
  }

  nodes(): N[] {
    return [...this.byId.values()]
  }
}
