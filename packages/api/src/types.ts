// ---------------------------------------------------------------------------
// Hono application types
// ---------------------------------------------------------------------------

import type { FleetServices } from '@cabdesk/domain'

/**
 * Variables injected into Hono context by the tenant middleware.
 * Every handler mounted under the /api/v1/* prefix can rely on these being
 * present; the middleware aborts with 4xx before reaching the handler if
 * the tenant cannot be resolved.
 */
export type AppVariables = {
  /** The UUID of the resolved tenant for this request. */
  tenantId: string
  /** The engine's services, bound to the resolved tenant. */
  services: FleetServices
}

/** Hono environment type used when constructing the app and all sub-routers. */
export type AppEnv = { Variables: AppVariables }
