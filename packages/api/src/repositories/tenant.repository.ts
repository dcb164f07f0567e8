import { eq } from 'drizzle-orm'
import type { Executor } from '../db'
import { tenants, type TenantRow } from '../db/schema'

export type TenantStatus = TenantRow['status']

export interface Tenant {
  readonly id: string
  readonly slug: string
  readonly name: string
  readonly status: TenantStatus
}

export async function findTenantBySlug(db: Executor, slug: string): Promise<Tenant | null> {
  const [row] = await db
    .select({ id: tenants.id, slug: tenants.slug, name: tenants.name, status: tenants.status })
    .from(tenants)
    .where(eq(tenants.slug, slug))
    .limit(1)
  return row ?? null
}
