import { describe, expect, test } from 'vitest'
import { ApiError, ValidationError } from './api-utils.js'
import { Label, UserLabel, buildLabelBody } from './labels.js'
import type { Mailbox } from './mailbox.js'
import { fakeMailbox } from './test-helpers.js'

async function created(mailbox: Mailbox, name: string) {
  const label = await mailbox.createLabel({ name })
  if (label instanceof Error) throw label
  return label
}

describe('buildLabelBody', () => {
  test('includes only the given fields', () => {
    expect(buildLabelBody('Work', {})).toEqual({ name: 'Work' })
    expect(buildLabelBody(undefined, { textColor: '#000000' })).toEqual({ color: { textColor: '#000000' } })
    expect(buildLabelBody(undefined, { labelListVisibility: 'labelHide', backgroundColor: '#ffffff' })).toEqual({
      labelListVisibility: 'labelHide',
      color: { backgroundColor: '#ffffff' },
    })
  })
})

describe('UserLabel', () => {
  test('create sends default visibility and registers the label', async () => {
    const { mailbox, transport } = fakeMailbox()
    const projects = await created(mailbox, 'Projects')

    expect(transport.callsTo('createLabel')[0]?.args).toEqual([
      { name: 'Projects', labelListVisibility: 'labelShow', messageListVisibility: 'show' },
    ])
    expect(projects).toBeInstanceOf(UserLabel)
    expect(projects.name).toBe('Projects')
    expect(mailbox.labels.user.child('Projects')?.id).toBe(projects.id)
  })

  test('create passes a transport error through', async () => {
    const { mailbox, transport } = fakeMailbox()
    await created(mailbox, 'Projects')
    expect(await mailbox.createLabel({ name: 'Projects' })).toBeInstanceOf(ApiError)
    expect(transport.callsTo('createLabel')).toHaveLength(2)
  })

  test('createChild nests below the label and links both ways', async () => {
    const { mailbox } = fakeMailbox()
    const projects = await created(mailbox, 'Projects')
    const alpha = await projects.createChild('Alpha')
    if (alpha instanceof Error) throw alpha

    expect(alpha.name).toBe('Projects/Alpha')
    const parent = await alpha.parent()
    if (parent instanceof Error) throw parent
    expect(parent?.id).toBe(projects.id)
    expect(await projects.parent()).toBeNull()

    const children = await projects.children()
    if (children instanceof Error) throw children
    expect(children.map((c) => c.name)).toEqual(['Projects/Alpha'])
  })

  test('update without fields is rejected before any call', async () => {
    const { mailbox, transport } = fakeMailbox()
    const projects = await created(mailbox, 'Projects')
    expect(await projects.update({})).toBeInstanceOf(ValidationError)
    expect(transport.callsTo('updateLabel')).toEqual([])
  })

  test('update renames the label and its subtree', async () => {
    const { mailbox } = fakeMailbox()
    const projects = await created(mailbox, 'Projects')
    await projects.createChild('Alpha')

    const renamed = await projects.update({ name: 'Archive' })
    if (renamed instanceof Error) throw renamed
    expect(renamed.name).toBe('Archive')
    expect(mailbox.labels.user.names()).toEqual(['Archive'])
    expect(mailbox.labels.user.child('Archive')?.names()).toEqual(['Alpha'])
  })

  test('recursive delete removes every label below', async () => {
    const { mailbox, transport } = fakeMailbox()
    const projects = await created(mailbox, 'Projects')
    await projects.createChild('Alpha')
    await created(mailbox, 'Other')

    expect(await projects.delete({ recursive: true })).toBeUndefined()
    expect(transport.callsTo('deleteLabel')).toHaveLength(2)
    expect(mailbox.labels.user.names()).toEqual(['Other'])
  })

  test('plain delete leaves the children in place', async () => {
    const { mailbox } = fakeMailbox()
    const projects = await created(mailbox, 'Projects')
    await projects.createChild('Alpha')

    await projects.delete()
    expect(mailbox.labels.user.names()).toEqual(['Projects/Alpha'])
  })
})

describe('Label.contains', () => {
  test('a label contains itself and its descendants only', async () => {
    const { mailbox } = fakeMailbox()
    const work = await created(mailbox, 'Work')
    const clients = await work.createChild('Clients')
    const workshop = await created(mailbox, 'Workshop')
    if (clients instanceof Error) throw clients

    expect(work).toBeInstanceOf(Label)
    expect(work.contains(work)).toBe(true)
    expect(work.contains(clients)).toBe(true)
    expect(clients.contains(work)).toBe(false)
    expect(work.contains(workshop)).toBe(false)
  })
})
