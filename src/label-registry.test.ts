import { describe, expect, test } from 'vitest'
import { NotFoundError } from './api-utils.js'
import { LabelRegistry } from './label-registry.js'

interface Entry {
  id: string
  name: string
}

describe('LabelRegistry', () => {
  test('looks up by id and by name', () => {
    const registry = new LabelRegistry<Entry>()
    const work = { id: 'Label_1', name: 'Work' }
    registry.set(work)

    expect(registry.getById('Label_1')).toBe(work)
    expect(registry.getByName('Work')).toBe(work)
    expect(registry.size).toBe(1)
  })

  test('misses return NotFoundError', () => {
    const registry = new LabelRegistry<Entry>()
    expect(registry.getById('Label_9')).toBeInstanceOf(NotFoundError)
    expect(registry.getByName('Nope')).toBeInstanceOf(NotFoundError)
  })

  test('re-setting a renamed node drops its old name', () => {
    const registry = new LabelRegistry<Entry>()
    const node = { id: 'Label_1', name: 'Work' }
    registry.set(node)
    node.name = 'Job'
    registry.set(node)

    expect(registry.hasName('Work')).toBe(false)
    expect(registry.getByName('Job')).toBe(node)
    expect(registry.size).toBe(1)
  })

  test('taking over a name evicts the previous holder entirely', () => {
    const registry = new LabelRegistry<Entry>()
    const old = { id: 'Label_1', name: 'Work' }
    const replacement = { id: 'Label_2', name: 'Work' }
    registry.set(old)
    registry.set(replacement)

    expect(registry.hasId('Label_1')).toBe(false)
    expect(registry.getByName('Work')).toBe(replacement)
    expect(registry.nodes()).toEqual([replacement])
  })

  test('pop removes both directions', () => {
    const registry = new LabelRegistry<Entry>()
    const work = { id: 'Label_1', name: 'Work' }
    const home = { id: 'Label_2', name: 'Home' }
    registry.set(work)
    registry.set(home)

    expect(registry.popById('Label_1')).toBe(work)
    expect(registry.hasName('Work')).toBe(false)
    expect(registry.popByName('Home')).toBe(home)
    expect(registry.hasId('Label_2')).toBe(false)
    expect(registry.size).toBe(0)
    expect(registry.popById('Label_1')).toBeInstanceOf(NotFoundError)
  })

  test('pop finds a node renamed after registration', () => {
    const registry = new LabelRegistry<Entry>()
    const node = { id: 'Label_1', name: 'Work' }
    registry.set(node)
    node.name = 'Job'
    registry.pop(node)

    expect(registry.hasName('Work')).toBe(false)
    expect(registry.hasId('Label_1')).toBe(false)
  })

  test('clear empties the registry', () => {
    const registry = new LabelRegistry<Entry>()
    registry.set({ id: 'Label_1', name: 'Work' })
    registry.clear()
    expect(registry.size).toBe(0)
    expect(registry.hasName('Work')).toBe(false)
  })
})
