import { describe, expect, test } from 'vitest'
import { ApiError } from './api-utils.js'
import { MessageAttribute } from './attributes.js'
import { Category } from './labels.js'
import { assertOk, fakeMailbox, makeMessage, type FakeTransport, type MessageFixture } from './test-helpers.js'

const { From, Subject, Is } = MessageAttribute
const Sent = MessageAttribute.Date

function messageId(n: number): string {
  return `m${String(n).padStart(3, '0')}`
}

function seedMany(transport: FakeTransport, count: number, fixture: Partial<MessageFixture> = {}): void {
  for (let n = 0; n < count; n++) transport.seedMessage(makeMessage({ ...fixture, id: messageId(n) }))
}

describe('Query.messageIds', () => {
  test('follows page tokens and shrinks the last page to the limit', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 200)

    const ids = await mailbox.messages.limit(120).messageIds()
    assertOk(ids)
    expect(ids).toHaveLength(120)
    expect(ids[119]).toBe('m119')
    expect(transport.callsTo('listMessages').map((c) => c.args)).toEqual([
      [{ maxResults: 120 }],
      [{ maxResults: 70, pageToken: '50' }],
      [{ maxResults: 20, pageToken: '100' }],
    ])
  })

  test('a null limit reads every page at the maximum page size', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 120)

    const ids = await mailbox.messages.limit(null).messageIds()
    assertOk(ids)
    expect(ids).toHaveLength(120)
    expect(transport.callsTo('listMessages').map((c) => c.args)).toEqual([
      [{ maxResults: 500 }],
      [{ maxResults: 500, pageToken: '50' }],
      [{ maxResults: 500, pageToken: '100' }],
    ])
  })

  test('stops after one page when fewer messages than the limit exist', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 30)

    const ids = await mailbox.messages.messageIds()
    assertOk(ids)
    expect(ids).toHaveLength(30)
    expect(transport.callsTo('listMessages')).toHaveLength(1)
  })

  test('the default limit is the batch size, or 25 without batching', async () => {
    expect(fakeMailbox().mailbox.messages.describe().limit).toBe(100)
    expect(fakeMailbox({ batchSize: 10 }).mailbox.messages.describe().limit).toBe(10)
    expect(fakeMailbox({ batchSize: null }).mailbox.messages.describe().limit).toBe(25)
  })

  test('sends the filter, labels and trash flag', async () => {
    const { mailbox, transport } = fakeMailbox()
    await mailbox.messages
      .where(From.eq('a@example.com').and(Is.flags.unread))
      .labels(mailbox.labels.system.inbox)
      .includeTrash()
      .messageIds()

    expect(transport.callsTo('listMessages')[0]?.args).toEqual([
      { q: '(from:"a@example.com" is:unread)', labelIds: ['INBOX'], includeSpamTrash: true, maxResults: 100 },
    ])
  })

  test('trashed messages are only listed with includeTrash', async () => {
    const { mailbox, transport } = fakeMailbox()
    transport.seedMessage(makeMessage({ id: 'kept' }))
    transport.seedMessage(makeMessage({ id: 'binned', labelIds: ['TRASH'] }))

    expect(await mailbox.messages.messageIds()).toEqual(['kept'])
    expect(await mailbox.messages.includeTrash().messageIds()).toEqual(['kept', 'binned'])
  })

  test('no filter sends no search string', async () => {
    const { mailbox, transport } = fakeMailbox()
    expect(mailbox.messages.searchString()).toBeNull()
    await mailbox.messages.messageIds()
    expect(transport.callsTo('listMessages')[0]?.args).toEqual([{ maxResults: 100 }])
  })

  test('truncated operands when the mailbox asks for them', () => {
    const { mailbox } = fakeMailbox({ truncateOperands: true })
    expect(mailbox.messages.where(Subject.eq('hello world')).searchString()).toBe('subject:"hello"')
    expect(fakeMailbox().mailbox.messages.where(Subject.eq('hello world')).searchString()).toBe('subject:"hello world"')
  })
})

describe('Query.execute', () => {
  test('fetches in batches and waits between them', async () => {
    const { mailbox, transport, clock } = fakeMailbox({ batchSize: 2 })
    seedMany(transport, 5)

    const messages = await mailbox.messages.limit(10).execute()
    assertOk(messages)
    expect(messages.map((m) => m.id)).toEqual(['m000', 'm001', 'm002', 'm003', 'm004'])
    expect(transport.callsTo('batchGetMessages').map((c) => c.args[0])).toEqual([
      ['m000', 'm001'],
      ['m002', 'm003'],
      ['m004'],
    ])
    expect(clock.sleeps).toEqual([1000, 1000, 1000])
  })

  test('only sleeps for the part of the delay the batch did not use', async () => {
    const { mailbox, transport, clock } = fakeMailbox({ batchSize: 2 })
    clock.tick = 300
    seedMany(transport, 4)

    assertOk(await mailbox.messages.limit(4).execute())
    expect(transport.callsTo('batchGetMessages')).toHaveLength(2)
    expect(clock.sleeps).toEqual([700, 700])
  })

  test('no sleep when a batch takes longer than the delay', async () => {
    const { mailbox, transport, clock } = fakeMailbox({ batchSize: 2, batchDelayMs: 200 })
    clock.tick = 300
    seedMany(transport, 4)

    assertOk(await mailbox.messages.limit(4).execute())
    expect(transport.callsTo('batchGetMessages')).toHaveLength(2)
    expect(clock.sleeps).toEqual([])
  })

  test('without a batch size messages are fetched one by one', async () => {
    const { mailbox, transport, clock } = fakeMailbox({ batchSize: null })
    seedMany(transport, 3)

    const messages = await mailbox.messages.execute()
    assertOk(messages)
    expect(messages).toHaveLength(3)
    expect(transport.callsTo('getMessage')).toHaveLength(3)
    expect(transport.callsTo('batchGetMessages')).toEqual([])
    expect(clock.sleeps).toEqual([])
  })

  test('orders by several keys, first key first', async () => {
    const { mailbox, transport } = fakeMailbox()
    transport.seedMessage(makeMessage({ id: 'a', date: 3000, subject: 'b' }))
    transport.seedMessage(makeMessage({ id: 'b', date: 1000, subject: 'a' }))
    transport.seedMessage(makeMessage({ id: 'c', date: 2000, subject: 'c' }))
    transport.seedMessage(makeMessage({ id: 'd', date: 3000, subject: 'a' }))

    const byDate = await mailbox.messages.orderBy(Sent.asc()).execute()
    assertOk(byDate)
    expect(byDate.map((m) => m.id)).toEqual(['b', 'c', 'a', 'd'])

    const newestThenSubject = await mailbox.messages.orderBy([Sent.desc(), Subject.asc()]).execute()
    assertOk(newestThenSubject)
    expect(newestThenSubject.map((m) => m.id)).toEqual(['d', 'a', 'c', 'b'])
  })

  test('returns the first transport error as is', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 3)
    const failure = new ApiError({ reason: 'quota' })
    transport.failNext('listMessages', failure)
    expect(await mailbox.messages.execute()).toBe(failure)

    transport.failNext('batchGetMessages')
    expect(await mailbox.messages.execute()).toBeInstanceOf(ApiError)
  })
})

describe('Query.describe', () => {
  test('summarizes every setting', () => {
    const { mailbox } = fakeMailbox()
    const query = mailbox.messages
      .where(Is.flags.unread)
      .labels(mailbox.labels.system.inbox)
      .limit(10)
      .orderBy(Sent.desc())

    expect(query.describe()).toEqual({
      where: 'is:unread',
      labels: ['Inbox'],
      limit: 10,
      include_trash: false,
      order_by: ['date desc'],
    })
  })
})

describe('bulk actions', () => {
  test('nothing happens unless the scope is committed', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 3, { labelIds: ['INBOX', 'UNREAD'] })

    const scope = mailbox.messages.bulk.markIsRead()
    const entered = await scope.enter()
    assertOk(entered)
    expect(scope.ids).toEqual(['m000', 'm001', 'm002'])
    expect(scope.isCommitted).toBe(false)
    expect(await scope.exit()).toBe(0)
    expect(transport.callsTo('batchModifyMessages')).toEqual([])
  })

  test('a committed scope applies the action once on exit', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 3, { labelIds: ['INBOX', 'UNREAD'] })

    const scope = mailbox.messages.bulk.markIsRead()
    expect(await scope.run((s) => s.commit())).toBe(3)
    expect(await scope.exit()).toBe(0)

    expect(transport.callsTo('batchModifyMessages').map((c) => c.args)).toEqual([
      [['m000', 'm001', 'm002'], { removeLabelIds: ['UNREAD'] }],
    ])
    expect(transport.messages.get('m000')?.labelIds).toEqual(['INBOX'])
  })

  test('execute acts immediately', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 3)

    expect(await mailbox.messages.bulk.delete().execute()).toBe(3)
    expect(transport.messages.size).toBe(0)
  })

  test('an empty result set makes no call', async () => {
    const { mailbox, transport } = fakeMailbox()
    const scope = mailbox.messages.bulk.archive()
    expect(await scope.run((s) => s.commit())).toBe(0)
    expect(scope.isEmpty).toBe(true)
    expect(transport.callsTo('batchModifyMessages')).toEqual([])
  })

  test('label, star and importance changes', async () => {
    const { mailbox, transport } = fakeMailbox()
    const workId = transport.seedLabel('Work')
    assertOk(await mailbox.labels.refresh())
    seedMany(transport, 1)
    const work = mailbox.labels.user.child('Work')
    if (!work) throw new Error('Work label missing')

    const bulk = mailbox.messages.bulk
    assertOk(await bulk.addLabels(work).execute())
    assertOk(await bulk.markIsStarred().execute())
    assertOk(await bulk.markIsImportant(false).execute())
    assertOk(await bulk.archive().execute())

    expect(transport.callsTo('batchModifyMessages').map((c) => c.args[1])).toEqual([
      { addLabelIds: [workId] },
      { addLabelIds: ['STARRED'] },
      { removeLabelIds: ['IMPORTANT'] },
      { removeLabelIds: ['INBOX'] },
    ])
    expect(transport.messages.get('m000')?.labelIds).toEqual([workId, 'STARRED'])
  })

  test('changeCategoryTo only adds the new category', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 2, { labelIds: ['INBOX', 'CATEGORY_SOCIAL'] })
    const updates = await mailbox.labels.categories.updates.entity()
    if (!(updates instanceof Category)) throw new Error('expected a category')

    const scope = mailbox.messages.bulk.changeCategoryTo(updates)
    assertOk(scope)
    expect(await scope.execute()).toBe(2)
    expect(transport.callsTo('batchModifyMessages')[0]?.args).toEqual([
      ['m000', 'm001'],
      { addLabelIds: ['CATEGORY_UPDATES'] },
    ])
  })

  test('a failed listing skips the callback', async () => {
    const { mailbox, transport } = fakeMailbox()
    transport.failNext('listMessages')
    let called = false

    const result = await mailbox.messages.bulk.archive().run(() => {
      called = true
    })
    expect(result).toBeInstanceOf(ApiError)
    expect(called).toBe(false)
  })

  test('a committed action still runs when the callback throws', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 2, { labelIds: ['INBOX'] })

    const scope = mailbox.messages.bulk.archive()
    await expect(
      scope.run((s) => {
        s.commit()
        throw new Error('callback failed')
      }),
    ).rejects.toThrow('callback failed')
    expect(transport.callsTo('batchModifyMessages').map((c) => c.args)).toEqual([
      [['m000', 'm001'], { removeLabelIds: ['INBOX'] }],
    ])
    expect(scope.isCommitted).toBe(false)
  })

  test('an uncommitted scope does nothing when the callback throws', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 2)

    await expect(
      mailbox.messages.bulk.delete().run(() => {
        throw new Error('callback failed')
      }),
    ).rejects.toThrow('callback failed')
    expect(transport.callsTo('batchDeleteMessages')).toEqual([])
    expect(transport.messages.size).toBe(2)
  })

  test('a failed action is returned', async () => {
    const { mailbox, transport } = fakeMailbox()
    seedMany(transport, 1)
    transport.failNext('batchModifyMessages')

    expect(await mailbox.messages.bulk.archive().run((s) => s.commit())).toBeInstanceOf(ApiError)
  })
})
