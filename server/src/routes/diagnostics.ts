import type { RequestHandler } from 'express'
import type { StoreDiagnostics } from '@shared/types'
import type { DocumentStoreProvider } from '../db/document-store'
import { logger } from '../logger'
import { truncate } from '../utils/truncate'

const ERROR_SNIPPET_LIMIT = 50
const COLLECTION_LIMIT = 10

const describeError = (error: unknown): string =>
  truncate(error instanceof Error ? error.message : String(error), ERROR_SNIPPET_LIMIT)

/**
 * Reports store configuration and connectivity. Never fails: every problem
 * is folded into the report.
 */
export function collectStoreDiagnostics(storeProvider: DocumentStoreProvider, databasePath?: string): StoreDiagnostics {
  const report: StoreDiagnostics = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: databasePath ? '✅ Set' : '❌ Not Set',
    database_name: null,
    connection_status: 'Not Connected',
    collections: []
  }

  try {
    const store = storeProvider()
    if (!store) {
      report.database = '⚠️ Available but not initialized'
      return report
    }

    report.database = '✅ Available'
    report.database_name = store.name
    report.connection_status = 'Connected'
    try {
      report.collections = store.listCollections().slice(0, COLLECTION_LIMIT)
      report.database = '✅ Connected & Working'
    } catch (error) {
      logger.warn({ err: error }, 'Store diagnostics could not list collections')
      report.database = `⚠️ Connected but Error: ${describeError(error)}`
    }
  } catch (error) {
    logger.warn({ err: error }, 'Store diagnostics could not open the store')
    report.database = `❌ Error: ${describeError(error)}`
  }

  return report
}

export function buildDiagnosticsHandler(storeProvider: DocumentStoreProvider, databasePath?: string): RequestHandler {
  return (_req, res) => {
    res.json(collectStoreDiagnostics(storeProvider, databasePath))
  }
}
