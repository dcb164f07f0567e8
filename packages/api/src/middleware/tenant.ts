// ---------------------------------------------------------------------------
// Multi-tenant middleware
//
// Extracts the tenant slug from the incoming Host header subdomain, resolves
// the tenant record from the database, then populates the Hono context with:
//   - tenantId  (string UUID)
//   - services  (the engine's services over that tenant's rows)
//
// Routes protected by this middleware will abort with 400/403/404 if the
// tenant cannot be resolved, so downstream handlers are guaranteed a valid
// context.
// ---------------------------------------------------------------------------

import type { Context, Next } from 'hono'
import type { AppEnv } from '../types'
import { getDb } from '../db'
import { findTenantBySlug } from '../repositories/tenant.repository'
import { buildServices } from '../services'

// Root-level subdomains that do not represent a tenant.
const NON_TENANT_SUBDOMAINS = new Set(['www', 'api', 'app', 'mail'])

/**
 * Extracts the subdomain segment from a Host header value.
 *
 * Examples:
 *   metro.cabdesk.io  → "metro"
 *   www.cabdesk.io    → null  (reserved subdomain)
 *   cabdesk.io        → null  (no subdomain)
 *   localhost         → null  (local without X-Tenant-Slug)
 */
function extractSubdomain(host: string): string | null {
  const hostname = host.split(':')[0] ?? ''
  const parts = hostname.split('.')

  if (parts.length >= 3) {
    const sub = parts[0] ?? ''
    if (!sub || NON_TENANT_SUBDOMAINS.has(sub)) return null
    return sub
  }

  return null
}

/**
 * Resolution order:
 *   1. Host header subdomain (production)
 *   2. X-Tenant-Slug header (local development / testing convenience)
 */
export async function tenantMiddleware(c: Context<AppEnv>, next: Next): Promise<Response | void> {
  const host = c.req.header('host') ?? ''
  const slug = extractSubdomain(host) ?? c.req.header('x-tenant-slug') ?? null

  if (!slug) {
    return c.json({ error: 'Tenant slug could not be determined from Host header', code: 'TENANT_REQUIRED' }, 400)
  }

  const db = getDb()
  const tenant = await findTenantBySlug(db, slug)
  if (!tenant) {
    return c.json({ error: 'Tenant not found', code: 'TENANT_NOT_FOUND' }, 404)
  }

  // SUSPENDED  → 403: the fleet's staff should know the account is blocked.
  // OFFBOARDED → 404: indistinguishable from an unknown slug.
  if (tenant.status === 'SUSPENDED') {
    return c.json({ error: 'Tenant account is suspended', code: 'TENANT_SUSPENDED' }, 403)
  }
  if (tenant.status === 'OFFBOARDED') {
    return c.json({ error: 'Tenant not found', code: 'TENANT_NOT_FOUND' }, 404)
  }

  c.set('tenantId', tenant.id)
  c.set('services', buildServices(db, tenant.id))

  await next()
}
