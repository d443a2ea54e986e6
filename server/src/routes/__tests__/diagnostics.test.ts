import { describe, expect, it } from 'vitest'
import { collectStoreDiagnostics } from '../diagnostics'
import type { DocumentStore } from '../../db/document-store'
import { StorageUnavailableError } from '../../errors'
import { createTestStore } from '../../../tests/helpers/test-store'

describe('collectStoreDiagnostics', () => {
  it('reports a missing store without failing', () => {
    expect(collectStoreDiagnostics(() => null)).toEqual({
      backend: '✅ Running',
      database: '⚠️ Available but not initialized',
      database_url: '❌ Not Set',
      database_name: null,
      connection_status: 'Not Connected',
      collections: []
    })
  })

  it('lists the collections of a working store', () => {
    const store = createTestStore('coach.db')
    store.insertOne('quiz', { user_id: 'user-1' })
    store.insertOne('resume', { user_id: 'user-1' })

    expect(collectStoreDiagnostics(() => store, 'data/coach.db')).toEqual({
      backend: '✅ Running',
      database: '✅ Connected & Working',
      database_url: '✅ Set',
      database_name: 'coach.db',
      connection_status: 'Connected',
      collections: ['quiz', 'resume']
    })
  })

  it('caps the collection list at ten names', () => {
    const store = createTestStore()
    for (let index = 0; index < 12; index += 1) {
      store.insertOne(`collection_${String(index).padStart(2, '0')}`, { index })
    }

    expect(collectStoreDiagnostics(() => store).collections).toHaveLength(10)
  })

  it('folds a listing failure into the report', () => {
    const healthy = createTestStore('broken.db')
    const broken: DocumentStore = {
      name: healthy.name,
      insertOne: (collection, body) => healthy.insertOne(collection, body),
      find: (collection, filter) => healthy.find(collection, filter),
      findOne: (collection, filter) => healthy.findOne(collection, filter),
      replaceOne: (collection, filter, body, options) => healthy.replaceOne(collection, filter, body, options),
      listCollections: () => {
        throw new Error('disk I/O error while reading the sqlite_master table of the database')
      }
    }

    const report = collectStoreDiagnostics(() => broken, 'broken.db')

    expect(report.connection_status).toBe('Connected')
    expect(report.database).toBe('⚠️ Connected but Error: disk I/O error while reading the sqlite_master tab')
    expect(report.collections).toEqual([])
  })

  it('folds a store that cannot be opened into the report', () => {
    const report = collectStoreDiagnostics(() => {
      throw new StorageUnavailableError('Unable to open document store')
    }, 'missing/dir/coach.db')

    expect(report.database).toBe('❌ Error: Unable to open document store')
    expect(report.database_name).toBeNull()
    expect(report.connection_status).toBe('Not Connected')
  })
})
