import path from 'node:path'
import { env } from '../config/env'
import { NotConfiguredError, StorageUnavailableError } from '../errors'
import type { DocumentStore, DocumentStoreProvider } from './document-store'
import { getDb } from './sqlite'
import { SqliteDocumentStore } from './sqlite-document-store'

let sharedStore: DocumentStore | null = null

/**
 * Process-wide store backed by DATABASE_PATH, or null when it is not configured.
 */
export const getDocumentStore: DocumentStoreProvider = () => {
  if (sharedStore) return sharedStore

  let db: ReturnType<typeof getDb>
  try {
    db = getDb()
  } catch (error) {
    throw new StorageUnavailableError('Unable to open document store', { cause: error })
  }
  if (!db || !env.DATABASE_PATH) return null

  sharedStore = new SqliteDocumentStore(db, path.basename(env.DATABASE_PATH))
  return sharedStore
}

export function requireStore(provider: DocumentStoreProvider): DocumentStore {
  const store = provider()
  if (!store) {
    throw new NotConfiguredError('Database not configured')
  }
  return store
}
