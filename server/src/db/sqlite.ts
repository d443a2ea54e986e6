import Database from 'better-sqlite3'
import fs from 'node:fs'
import path from 'node:path'
import { env } from '../config/env'
import { logger } from '../logger'
import { runMigrations } from './migrations'

type SQLiteOpenOptions = Database.Options & { uri?: boolean }

let db: Database.Database | null = null

/**
 * Opens the process-wide database on first use.
 * Returns null when DATABASE_PATH is not set.
 */
export function getDb(): Database.Database | null {
  if (db) {
    return db
  }
  if (!env.DATABASE_PATH) {
    return null
  }

  db = openDatabase(env.DATABASE_PATH)
  return db
}

export function openDatabase(databasePath: string, migrationsDir?: string): Database.Database {
  const isFileUri = databasePath.startsWith('file:')
  const isMemory = databasePath === ':memory:'
  const dbPath = isFileUri || isMemory ? databasePath : path.resolve(databasePath)

  // SQLite URIs (file:...) may be in-memory or virtual, so only plain paths get a directory.
  if (!isFileUri && !isMemory && !fs.existsSync(path.dirname(dbPath))) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  logger.info({ dbPath }, 'Opening SQLite database')

  const openOptions: SQLiteOpenOptions = {}

  // Enable URI mode so better-sqlite3 respects query parameters like ?mode=memory&cache=shared.
  if (isFileUri) {
    openOptions.uri = true
  }

  const database = new Database(dbPath, openOptions)
  database.pragma('journal_mode = WAL')
  database.pragma('busy_timeout = 15000')
  database.pragma('synchronous = NORMAL')

  runMigrations(database, migrationsDir)

  return database
}

export function closeDb(): void {
  if (!db) return
  logger.info('Closing SQLite database')
  db.close()
  db = null
}
