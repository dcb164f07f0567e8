// ---------------------------------------------------------------------------
// Unit of work
//
// Runs a service operation against a FleetStore bound to one SERIALIZABLE
// transaction. PostgreSQL aborts one side of a conflicting pair with
// SQLSTATE 40001; the whole operation is then replayed from the start.
// ---------------------------------------------------------------------------

import type { FleetStore, RunInTransaction } from '@cabdesk/domain'
import type { Db } from '../db'
import { createFleetStore } from '../repositories'

const SERIALIZATION_FAILURE = '40001'
const DEADLOCK_DETECTED = '40P01'

export const MAX_TRANSACTION_ATTEMPTS = 3

function sqlState(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) return null
  if ('code' in error && typeof error.code === 'string') return error.code
  if ('cause' in error) return sqlState(error.cause)
  return null
}

export function isRetryableTransactionError(error: unknown): boolean {
  const code = sqlState(error)
  return code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED
}

export function createTransactionRunner(db: Pick<Db, 'transaction'>, tenantId: string): RunInTransaction<FleetStore> {
  return async <T>(work: (store: FleetStore) => Promise<T>): Promise<T> => {
    for (let attempt = 1; ; attempt++) {
      try {
        return await db.transaction((tx) => work(createFleetStore(tx, tenantId)), {
          isolationLevel: 'serializable',
        })
      } catch (error) {
        if (attempt >= MAX_TRANSACTION_ATTEMPTS || !isRetryableTransactionError(error)) throw error
        console.warn(`[transaction] serialization conflict, retrying (attempt ${attempt + 1}/${MAX_TRANSACTION_ATTEMPTS})`)
      }
    }
  }
}
