import { describe, it, expect } from 'vitest'
import { openDatabase } from '../sqlite'
import { SqliteDocumentStore } from '../sqlite-document-store'
import { StorageUnavailableError } from '../../errors'
import { createTestStore } from '../../../tests/helpers/test-store'

describe('SqliteDocumentStore', () => {
  it('assigns ids on insert and returns documents in insertion order', () => {
    const store = createTestStore()
    const first = store.insertOne('quiz', { user_id: 'u1', score: 10 })
    const second = store.insertOne('quiz', { user_id: 'u1', score: 20 })
    store.insertOne('quiz', { user_id: 'u2', score: 30 })

    expect(first).not.toBe(second)
    expect(store.find('quiz', { user_id: 'u1' })).toEqual([
      { id: first, body: { user_id: 'u1', score: 10 } },
      { id: second, body: { user_id: 'u1', score: 20 } }
    ])
  })

  it('keeps collections apart', () => {
    const store = createTestStore()
    store.insertOne('quiz', { user_id: 'u1' })

    expect(store.find('resume', { user_id: 'u1' })).toEqual([])
    expect(store.findOne('resume', { user_id: 'u1' })).toBeNull()
  })

  it('round-trips nested JSON bodies', () => {
    const store = createTestStore()
    const body = {
      user_id: 'u1',
      skills: ['SQL', 'Go'],
      experiences: [{ company: 'Acme', role: 'Engineer', start: '2020', end: '2022', description: null }]
    }
    const id = store.insertOne('resume', body)

    expect(store.findOne('resume', { user_id: 'u1' })).toEqual({ id, body })
  })

  it('upserts by filter: inserts once, then replaces the same document', () => {
    const store = createTestStore()

    const created = store.replaceOne('resume', { user_id: 'u1' }, { user_id: 'u1', email: 'a@example.com' }, { upsert: true })
    expect(created.matched).toBe(false)
    expect(created.upsertedId).toEqual(expect.any(String))

    const replaced = store.replaceOne('resume', { user_id: 'u1' }, { user_id: 'u1', summary: 'Hello' }, { upsert: true })
    expect(replaced).toEqual({ matched: true, upsertedId: null })

    expect(store.find('resume', { user_id: 'u1' })).toEqual([
      { id: created.upsertedId, body: { user_id: 'u1', summary: 'Hello' } }
    ])
  })

  it('does not insert when upsert is off and nothing matches', () => {
    const store = createTestStore()
    const result = store.replaceOne('resume', { user_id: 'ghost' }, { user_id: 'ghost' }, { upsert: false })

    expect(result).toEqual({ matched: false, upsertedId: null })
    expect(store.find('resume', { user_id: 'ghost' })).toEqual([])
  })

  it('rejects a second resume document for the same user', () => {
    const store = createTestStore()
    store.insertOne('resume', { user_id: 'u1' })

    expect(() => store.insertOne('resume', { user_id: 'u1' })).toThrow(StorageUnavailableError)
  })

  it('allows any number of quiz documents per user', () => {
    const store = createTestStore()
    for (let i = 0; i < 3; i++) {
      store.insertOne('quiz', { user_id: 'u1', score: i })
    }
    expect(store.find('quiz', { user_id: 'u1' })).toHaveLength(3)
  })

  it('lists collection names alphabetically', () => {
    const store = createTestStore()
    expect(store.listCollections()).toEqual([])

    store.insertOne('resume', { user_id: 'u1' })
    store.insertOne('quiz', { user_id: 'u1' })

    expect(store.listCollections()).toEqual(['quiz', 'resume'])
  })

  it('reports a closed database as StorageUnavailableError', () => {
    const db = openDatabase(':memory:')
    const store = new SqliteDocumentStore(db, 'closed.db')
    db.close()

    expect(() => store.find('quiz', { user_id: 'u1' })).toThrow(StorageUnavailableError)
  })

  it('refuses filter fields that are not plain identifiers', () => {
    const store = createTestStore()
    expect(() => store.find('quiz', { 'user_id") OR 1=1 --': 'x' })).toThrow('Document store find failed')
  })
})
