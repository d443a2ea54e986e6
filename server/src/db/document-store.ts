export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

/** The native shape of a stored document, minus its store-assigned id. */
export type DocumentBody = { [key: string]: JsonValue }

export interface StoredDocument {
  id: string
  body: DocumentBody
}

/** Equality match on top-level fields. */
export type DocumentFilter = Record<string, string | number>

export interface ReplaceResult {
  matched: boolean
  upsertedId: string | null
}

/**
 * Collection-addressed document store. Every write touches a single document
 * and is atomic on its own; nothing spans documents.
 */
export interface DocumentStore {
  readonly name: string
  insertOne(collection: string, body: DocumentBody): string
  /** Matching documents in insertion order. */
  find(collection: string, filter: DocumentFilter): StoredDocument[]
  findOne(collection: string, filter: DocumentFilter): StoredDocument | null
  replaceOne(collection: string, filter: DocumentFilter, body: DocumentBody, options: { upsert: boolean }): ReplaceResult
  listCollections(): string[]
}

export type DocumentStoreProvider = () => DocumentStore | null

export const isDocumentBody = (value: unknown): value is DocumentBody =>
  typeof value === 'object' && value !== null && !Array.isArray(value)
