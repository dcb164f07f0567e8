import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { logger } from 'hono/logger'
import type { AppEnv } from './types'
import { tenantMiddleware } from './middleware/tenant'
import { leaseRateOverridesHandler } from './handlers/lease-rate-overrides'
import { leaseRatesHandler } from './handlers/lease-rates'
import { ratePlansHandler } from './handlers/rate-plans'
import { shiftProfilesHandler } from './handlers/shift-profiles'
import { shiftsHandler } from './handlers/shifts'
import { attributeTypesHandler, shiftAttributesHandler } from './handlers/attributes'

const app = new Hono<AppEnv>()

// ---------------------------------------------------------------------------
// Global middleware (applies to all routes including /health)
// ---------------------------------------------------------------------------
app.use('*', logger())
app.use('*', cors())

// ---------------------------------------------------------------------------
// Public routes: no tenant required
// ---------------------------------------------------------------------------
app.get('/health', (c) => {
  return c.json({ status: 'ok' as const, timestamp: new Date().toISOString() })
})

// ---------------------------------------------------------------------------
// Tenant-protected API: all routes under /api/v1 require a resolved tenant.
//
// The tenant middleware extracts the subdomain from the Host header (or the
// X-Tenant-Slug header for local development) and populates:
//   - c.get('tenantId')  the tenant's UUID
//   - c.get('services')  the rate and profile engine bound to that tenant
// ---------------------------------------------------------------------------
const v1 = new Hono<AppEnv>()
v1.use('*', tenantMiddleware)

v1.route('/lease-rate-overrides', leaseRateOverridesHandler)
v1.route('/lease-rates', leaseRatesHandler)
v1.route('/rate-plans', ratePlansHandler)
v1.route('/shift-profiles', shiftProfilesHandler)
v1.route('/shifts', shiftsHandler)
v1.route('/attribute-types', attributeTypesHandler)
v1.route('/shift-attributes', shiftAttributesHandler)

app.route('/api/v1', v1)

// ---------------------------------------------------------------------------
// 404 fallback
// ---------------------------------------------------------------------------
app.notFound((c) => c.json({ error: 'Not found', code: 'NOT_FOUND' }, 404))

export { app }
