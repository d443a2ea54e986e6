/**
 * Store connectivity report served by GET /test.
 * Values are human-readable status markers rather than booleans.
 */
export interface StoreDiagnostics {
  backend: string
  database: string
  database_url: string | null
  database_name: string | null
  connection_status: "Connected" | "Not Connected"
  collections: string[]
}
