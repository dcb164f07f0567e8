// ---------------------------------------------------------------------------
// PostgreSQL implementation of the domain store ports.
//
// Every store is bound to one executor (the pool or an open transaction) and
// one tenant; every query it runs is filtered by that tenant.
// ---------------------------------------------------------------------------

import type { FleetStore } from '@cabdesk/domain'
import type { Executor } from '../db'
import { createAttributeStore } from './attribute.repository'
import { createLeaseStore } from './lease.repository'
import { createProfileStore } from './profile.repository'

export function createFleetStore(db: Executor, tenantId: string): FleetStore {
  return {
    ...createLeaseStore(db, tenantId),
    ...createAttributeStore(db, tenantId),
    ...createProfileStore(db, tenantId),
  }
}
