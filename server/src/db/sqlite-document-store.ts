import { randomUUID } from 'node:crypto'
import type Database from 'better-sqlite3'
import { StorageUnavailableError } from '../errors'
import { logger } from '../logger'
import {
  isDocumentBody,
  type DocumentBody,
  type DocumentFilter,
  type DocumentStore,
  type ReplaceResult,
  type StoredDocument
} from './document-store'

type DocumentRow = {
  id: string
  body: string
}

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

function buildWhere(collection: string, filter: DocumentFilter): { whereClause: string; params: Array<string | number> } {
  const clauses = ['collection = ?']
  const params: Array<string | number> = [collection]

  for (const [field, value] of Object.entries(filter)) {
    if (!FIELD_NAME.test(field)) {
      throw new Error(`Unsupported filter field: ${field}`)
    }
    clauses.push('json_extract(body, ?) = ?')
    params.push(`$.${field}`, value)
  }

  return { whereClause: `WHERE ${clauses.join(' AND ')}`, params }
}

function parseRow(row: DocumentRow): StoredDocument {
  const body: unknown = JSON.parse(row.body)
  if (!isDocumentBody(body)) {
    throw new Error(`Document ${row.id} is not a JSON object`)
  }
  return { id: row.id, body }
}

/**
 * DocumentStore over the `documents` table. Bodies are JSON text; filters
 * compare top-level fields through json_extract.
 */
export class SqliteDocumentStore implements DocumentStore {
  private log = logger.child({ module: 'SqliteDocumentStore' })

  constructor(
    private readonly db: Database.Database,
    readonly name: string
  ) {}

  insertOne(collection: string, body: DocumentBody): string {
    return this.guard('insertOne', collection, () => {
      const id = randomUUID()
      this.db
        .prepare<[string, string, string]>('INSERT INTO documents (id, collection, body) VALUES (?, ?, ?)')
        .run(id, collection, JSON.stringify(body))
      return id
    })
  }

  find(collection: string, filter: DocumentFilter): StoredDocument[] {
    return this.guard('find', collection, () => {
      const { whereClause, params } = buildWhere(collection, filter)
      const rows = this.db
        .prepare<Array<string | number>, DocumentRow>(`SELECT id, body FROM documents ${whereClause} ORDER BY seq ASC`)
        .all(...params)
      return rows.map(parseRow)
    })
  }

  findOne(collection: string, filter: DocumentFilter): StoredDocument | null {
    return this.guard('findOne', collection, () => {
      const { whereClause, params } = buildWhere(collection, filter)
      const row = this.db
        .prepare<Array<string | number>, DocumentRow>(`SELECT id, body FROM documents ${whereClause} ORDER BY seq ASC LIMIT 1`)
        .get(...params)
      return row ? parseRow(row) : null
    })
  }

  replaceOne(
    collection: string,
    filter: DocumentFilter,
    body: DocumentBody,
    options: { upsert: boolean }
  ): ReplaceResult {
    return this.guard('replaceOne', collection, () => {
      const { whereClause, params } = buildWhere(collection, filter)
      const text = JSON.stringify(body)

      const replace = this.db.transaction((): ReplaceResult => {
        const existing = this.db
          .prepare<Array<string | number>, { id: string }>(`SELECT id FROM documents ${whereClause} ORDER BY seq ASC LIMIT 1`)
          .get(...params)

        if (existing) {
          this.db.prepare<[string, string]>('UPDATE documents SET body = ? WHERE id = ?').run(text, existing.id)
          return { matched: true, upsertedId: null }
        }
        if (!options.upsert) {
          return { matched: false, upsertedId: null }
        }

        const id = randomUUID()
        this.db
          .prepare<[string, string, string]>('INSERT INTO documents (id, collection, body) VALUES (?, ?, ?)')
          .run(id, collection, text)
        return { matched: false, upsertedId: id }
      })

      return replace.immediate()
    })
  }

  listCollections(): string[] {
    return this.guard('listCollections', '*', () =>
      this.db
        .prepare<[], { collection: string }>('SELECT DISTINCT collection FROM documents ORDER BY collection')
        .all()
        .map((row) => row.collection)
    )
  }

  private guard<T>(operation: string, collection: string, run: () => T): T {
    try {
      return run()
    } catch (error) {
      this.log.error({ err: error, operation, collection }, 'Document store operation failed')
      throw new StorageUnavailableError(`Document store ${operation} failed`, { cause: error })
    }
  }
}
