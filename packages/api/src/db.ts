// ---------------------------------------------------------------------------
// PostgreSQL connection
//
// One pool per process, opened lazily on first use so that importing the app
// (tests, the Lambda cold start) does not require DATABASE_URL.
// ---------------------------------------------------------------------------

import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres'
import type { PgDatabase } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'
import { getConfig } from './config'
import * as schema from './db/schema'

export type Db = NodePgDatabase<typeof schema>

/** Either the pooled database or an open transaction on it. */
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>

let pool: Pool | null = null
let dbInstance: Db | null = null

function getPool(): Pool {
  if (pool) return pool

  const { DATABASE_URL, DB_POOL_MAX } = getConfig()
  if (!DATABASE_URL) {
    throw new Error('DATABASE_URL is not set')
  }

  pool = new Pool({
    connectionString: DATABASE_URL,
    max: DB_POOL_MAX,
    connectionTimeoutMillis: 10_000,
    idleTimeoutMillis: 30_000,
  })

  // An idle client dropping its connection must not take the process down.
  pool.on('error', (err) => {
    console.error('Unexpected error on idle database client', err)
  })

  return pool
}

export function getDb(): Db {
  if (dbInstance) return dbInstance
  dbInstance = drizzle(getPool(), { schema })
  return dbInstance
}

export async function closeDb(): Promise<void> {
  if (!pool) return
  await pool.end()
  pool = null
  dbInstance = null
}
