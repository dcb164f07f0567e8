// ---------------------------------------------------------------------------
// Composition root for the engine: one store, one transaction runner, every
// service wired to them.
// ---------------------------------------------------------------------------

import type { RunInTransaction } from './shared/types'
import type { CalendarDate } from './shared/calendar-date'
import type { Logger } from './shared/logger'
import type { LeaseStore } from './lease/ports'
import type { AttributeStore } from './attribute/ports'
import type { ProfileStore } from './profile/ports'
import { createLeaseRateResolver, type LeaseRateResolver } from './lease/resolver'
import { createOverrideService, type OverrideService } from './lease/override-service'
import { createRatePlanService, type RatePlanService } from './lease/plan-service'
import { createAttributeService, type AttributeService } from './attribute/service'
import { createProfileService, type ProfileService } from './profile/service'

/** Everything the engine needs from persistence. */
export type FleetStore = LeaseStore & AttributeStore & ProfileStore

export interface FleetServices {
  readonly leaseRates: LeaseRateResolver
  readonly overrides: OverrideService
  readonly ratePlans: RatePlanService
  readonly attributes: AttributeService
  readonly profiles: ProfileService
}

export interface FleetServicesOptions {
  readonly store: FleetStore
  readonly transaction: RunInTransaction<FleetStore>
  readonly today?: () => CalendarDate
  readonly autoCloseWindowDays?: number
  readonly logger?: Logger
}

export function createFleetServices(options: FleetServicesOptions): FleetServices {
  const { store, transaction, today, autoCloseWindowDays, logger } = options
  const shared = {
    store,
    transaction,
    ...(today !== undefined ? { today } : {}),
    ...(logger !== undefined ? { logger } : {}),
  }
  return {
    leaseRates: createLeaseRateResolver({ store, ...(logger !== undefined ? { logger } : {}) }),
    overrides: createOverrideService({
      ...shared,
      ...(autoCloseWindowDays !== undefined ? { autoCloseWindowDays } : {}),
    }),
    ratePlans: createRatePlanService(shared),
    attributes: createAttributeService(shared),
    profiles: createProfileService(shared),
  }
}
