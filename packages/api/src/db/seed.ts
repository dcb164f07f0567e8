/**
 * Seed script: creates a demo tenant with the system shift profiles, a small
 * fleet and a rate plan for local development.
 * Run with: npm run db:seed (uses tsx to execute TypeScript directly)
 *
 * Idempotent: rows keyed by a unique index are inserted with ON CONFLICT DO
 * NOTHING, the rest only when the tenant has none yet.
 */
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { and, eq } from 'drizzle-orm'
import { z } from 'zod'
import { CAB_CATEGORIES, DAYS_OF_WEEK, SHIFT_TYPES, type CabCategory, type ShiftType } from '@cabdesk/domain'
import { closeDb, getDb } from '../db'
import { cabCategory, shareCategory, shiftType } from '../lib/validation'
import { cabShifts, cabs, drivers, rateEntries, ratePlans, shiftProfiles, tenants } from './schema'

const SystemProfileSchema = z.object({
  code: z.string(),
  name: z.string(),
  description: z.string(),
  cabCategory: cabCategory.nullable(),
  shareCategory: shareCategory.nullable(),
  hasAirportLicense: z.boolean().nullable(),
  shiftType: shiftType.nullable(),
  category: z.string(),
  colorCode: z.string(),
  displayOrder: z.number().int(),
})

function loadSystemProfiles(): z.infer<typeof SystemProfileSchema>[] {
  const file = fileURLToPath(new URL('../../seed-data/system-profiles.json', import.meta.url))
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'))
  return z.array(SystemProfileSchema).parse(raw)
}

const BASE_RATES: Record<CabCategory, Record<ShiftType, number>> = {
  SEDAN: { DAY: 45, NIGHT: 55 },
  HANDICAP_VAN: { DAY: 50, NIGHT: 60 },
}
const AIRPORT_SURCHARGE = 10

async function main(): Promise<void> {
  const db = getDb()
  console.log('🌱  Seeding database …')

  // ---------------------------------------------------------------------------
  // Tenant
  // ---------------------------------------------------------------------------
  await db
    .insert(tenants)
    .values({ slug: 'demo', name: 'Demo Cab Co-op' })
    .onConflictDoNothing({ target: tenants.slug })
  const [tenant] = await db.select().from(tenants).where(eq(tenants.slug, 'demo')).limit(1)
  if (!tenant) throw new Error('Demo tenant was not created')

  // ---------------------------------------------------------------------------
  // System profiles
  // ---------------------------------------------------------------------------
  const profiles = loadSystemProfiles()
  await db
    .insert(shiftProfiles)
    .values(
      profiles.map((profile) => ({
        tenantId: tenant.id,
        ...profile,
        isSystemProfile: true,
        createdBy: 'system',
      })),
    )
    .onConflictDoNothing({ target: [shiftProfiles.tenantId, shiftProfiles.code] })

  // ---------------------------------------------------------------------------
  // Owner, driver, cab & shifts
  // ---------------------------------------------------------------------------
  const existingDrivers = await db.select().from(drivers).where(eq(drivers.tenantId, tenant.id))
  let owner = existingDrivers.find((driver) => driver.isOwner)
  if (!owner) {
    const inserted = await db
      .insert(drivers)
      .values([
        { tenantId: tenant.id, name: 'Dana Okafor', isOwner: true },
        { tenantId: tenant.id, name: 'Sam Patel', isOwner: false },
      ])
      .returning()
    owner = inserted.find((driver) => driver.isOwner)
  }
  if (!owner) throw new Error('Demo owner was not created')

  await db
    .insert(cabs)
    .values({ tenantId: tenant.id, cabNumber: '101', ownerId: owner.id })
    .onConflictDoNothing({ target: [cabs.tenantId, cabs.cabNumber] })
  const [cab] = await db
    .select()
    .from(cabs)
    .where(and(eq(cabs.tenantId, tenant.id), eq(cabs.cabNumber, '101')))
    .limit(1)
  if (!cab) throw new Error('Demo cab was not created')

  await db
    .insert(cabShifts)
    .values(
      SHIFT_TYPES.map((type) => ({
        tenantId: tenant.id,
        cabId: cab.id,
        shiftType: type,
        cabCategory: 'SEDAN' as const,
        shareCategory: 'VOTING_SHARE' as const,
        hasAirportLicense: true,
      })),
    )
    .onConflictDoNothing({ target: [cabShifts.cabId, cabShifts.shiftType] })

  // ---------------------------------------------------------------------------
  // Rate plan
  // ---------------------------------------------------------------------------
  const [existingPlan] = await db.select().from(ratePlans).where(eq(ratePlans.tenantId, tenant.id)).limit(1)
  if (!existingPlan) {
    const [plan] = await db
      .insert(ratePlans)
      .values({ tenantId: tenant.id, name: 'Standard 2026', effectiveFrom: '2026-01-01' })
      .returning()
    if (!plan) throw new Error('Demo rate plan was not created')

    const entries = CAB_CATEGORIES.flatMap((category) =>
      [false, true].flatMap((airport) =>
        SHIFT_TYPES.flatMap((type) =>
          DAYS_OF_WEEK.map((day) => ({
            planId: plan.id,
            cabCategory: category,
            hasAirportLicense: airport,
            shiftType: type,
            dayOfWeek: day,
            baseRate: String(BASE_RATES[category][type] + (airport ? AIRPORT_SURCHARGE : 0)),
            distanceRate: '0.1500',
          })),
        ),
      ),
    )
    await db.insert(rateEntries).values(entries)
  }

  console.log('✅  Seed complete')
  console.log(`   Tenant: ${tenant.slug}  |  Profiles: ${profiles.length}  |  Cab: ${cab.cabNumber}`)
}

main()
  .catch((err: unknown) => {
    console.error('Seed failed:', err)
    process.exitCode = 1
  })
  .finally(() => {
    void closeDb()
  })
