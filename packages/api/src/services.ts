// ---------------------------------------------------------------------------
// Per-request composition: the engine's services over one tenant's data.
// ---------------------------------------------------------------------------

import { consoleLogger, createFleetServices, type FleetServices } from '@cabdesk/domain'
import { getConfig } from './config'
import type { Db } from './db'
import { createTransactionRunner } from './lib/transaction'
import { createFleetStore } from './repositories'

export function buildServices(db: Db, tenantId: string): FleetServices {
  return createFleetServices({
    store: createFleetStore(db, tenantId),
    transaction: createTransactionRunner(db, tenantId),
    autoCloseWindowDays: getConfig().OVERRIDE_AUTO_CLOSE_DAYS,
    logger: consoleLogger,
  })
}
