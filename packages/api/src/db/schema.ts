// ---------------------------------------------------------------------------
// Database schema
//
// Every tenant-owned table carries tenant_id; child tables (rate entries,
// profile requirements) inherit tenant scope through their parent.
// ---------------------------------------------------------------------------

import { sql } from 'drizzle-orm'
import {
  boolean,
  date,
  index,
  integer,
  numeric,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const tenantStatus = pgEnum('tenant_status', ['ACTIVE', 'SUSPENDED', 'OFFBOARDED'])
export const shiftType = pgEnum('shift_type', ['DAY', 'NIGHT'])
export const dayOfWeek = pgEnum('day_of_week', [
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
  'SUNDAY',
])
export const cabCategory = pgEnum('cab_category', ['SEDAN', 'HANDICAP_VAN'])
export const shareCategory = pgEnum('share_category', ['VOTING_SHARE', 'NON_VOTING_SHARE'])

// ---------------------------------------------------------------------------
// Tenancy and fleet
// ---------------------------------------------------------------------------

export const tenants = pgTable('tenants', {
  id: uuid('id').primaryKey().defaultRandom(),
  slug: text('slug').notNull().unique(),
  name: text('name').notNull(),
  status: tenantStatus('status').notNull().default('ACTIVE'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
})

export const drivers = pgTable(
  'drivers',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    isOwner: boolean('is_owner').notNull().default(false),
  },
  (table) => ({
    tenantIdx: index('drivers_tenant_id_idx').on(table.tenantId),
  }),
)

export const cabs = pgTable(
  'cabs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    cabNumber: text('cab_number').notNull(),
    ownerId: uuid('owner_id').references(() => drivers.id),
  },
  (table) => ({
    tenantNumberUnique: uniqueIndex('cabs_tenant_number_unique').on(table.tenantId, table.cabNumber),
  }),
)

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

export const shiftProfiles = pgTable(
  'shift_profiles',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    code: text('code').notNull(),
    name: text('name').notNull(),
    description: text('description'),
    cabCategory: cabCategory('cab_category'),
    shareCategory: shareCategory('share_category'),
    hasAirportLicense: boolean('has_airport_license'),
    shiftType: shiftType('shift_type'),
    category: text('category'),
    colorCode: text('color_code'),
    displayOrder: integer('display_order').notNull().default(0),
    isActive: boolean('is_active').notNull().default(true),
    isSystemProfile: boolean('is_system_profile').notNull().default(false),
    usageCount: integer('usage_count').notNull().default(0),
    createdBy: text('created_by'),
    updatedBy: text('updated_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    tenantCodeUnique: uniqueIndex('shift_profiles_tenant_code_unique').on(table.tenantId, table.code),
    tenantActiveIdx: index('shift_profiles_tenant_active_idx').on(table.tenantId, table.isActive),
  }),
)

// ---------------------------------------------------------------------------
// Shifts and dynamic attributes
// ---------------------------------------------------------------------------

export const cabShifts = pgTable(
  'cab_shifts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    cabId: uuid('cab_id').notNull().references(() => cabs.id, { onDelete: 'cascade' }),
    shiftType: shiftType('shift_type').notNull(),
    cabCategory: cabCategory('cab_category').notNull(),
    shareCategory: shareCategory('share_category').notNull(),
    hasAirportLicense: boolean('has_airport_license').notNull().default(false),
    currentProfileId: uuid('current_profile_id').references(() => shiftProfiles.id),
  },
  (table) => ({
    cabShiftUnique: uniqueIndex('cab_shifts_cab_shift_type_unique').on(table.cabId, table.shiftType),
    tenantIdx: index('cab_shifts_tenant_id_idx').on(table.tenantId),
  }),
)

export const attributeTypes = pgTable(
  'attribute_types',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    code: text('code').notNull(),
    name: text('name').notNull(),
    description: text('description'),
    isActive: boolean('is_active').notNull().default(true),
  },
  (table) => ({
    tenantCodeUnique: uniqueIndex('attribute_types_tenant_code_unique').on(table.tenantId, table.code),
  }),
)

export const shiftAttributeValues = pgTable(
  'shift_attribute_values',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    shiftId: uuid('shift_id').notNull().references(() => cabShifts.id, { onDelete: 'cascade' }),
    attributeTypeId: uuid('attribute_type_id').notNull().references(() => attributeTypes.id),
    value: text('value'),
    startDate: date('start_date', { mode: 'string' }).notNull(),
    endDate: date('end_date', { mode: 'string' }),
    notes: text('notes'),
  },
  (table) => ({
    shiftTypeIdx: index('shift_attribute_values_shift_type_idx').on(table.shiftId, table.attributeTypeId),
  }),
)

export const profileAttributeRequirements = pgTable(
  'profile_attribute_requirements',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    profileId: uuid('profile_id').notNull().references(() => shiftProfiles.id, { onDelete: 'cascade' }),
    attributeTypeId: uuid('attribute_type_id').notNull().references(() => attributeTypes.id),
    isRequired: boolean('is_required').notNull().default(true),
    expectedValue: text('expected_value'),
  },
  (table) => ({
    profileTypeUnique: uniqueIndex('profile_attribute_requirements_unique').on(
      table.profileId,
      table.attributeTypeId,
    ),
  }),
)

export const shiftProfileAssignments = pgTable(
  'shift_profile_assignments',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    shiftId: uuid('shift_id').notNull().references(() => cabShifts.id, { onDelete: 'cascade' }),
    profileId: uuid('profile_id').notNull().references(() => shiftProfiles.id, { onDelete: 'restrict' }),
    startDate: date('start_date', { mode: 'string' }).notNull(),
    endDate: date('end_date', { mode: 'string' }),
    reason: text('reason'),
    assignedBy: text('assigned_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    // Backstop for the service rule: at most one open assignment per shift.
    openPerShiftUnique: uniqueIndex('shift_profile_assignments_open_unique')
      .on(table.shiftId)
      .where(sql`${table.endDate} IS NULL`),
    shiftIdx: index('shift_profile_assignments_shift_idx').on(table.shiftId, table.startDate),
  }),
)

// ---------------------------------------------------------------------------
// Lease rates
// ---------------------------------------------------------------------------

export const leaseRateOverrides = pgTable(
  'lease_rate_overrides',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    ownerId: uuid('owner_id').notNull().references(() => drivers.id),
    cabId: uuid('cab_id').references(() => cabs.id),
    shiftType: shiftType('shift_type'),
    dayOfWeek: dayOfWeek('day_of_week'),
    leaseRate: numeric('lease_rate', { precision: 10, scale: 2 }).notNull(),
    startDate: date('start_date', { mode: 'string' }).notNull(),
    endDate: date('end_date', { mode: 'string' }),
    isActive: boolean('is_active').notNull().default(true),
    priority: integer('priority').notNull().default(0),
    notes: text('notes'),
    createdBy: text('created_by'),
    updatedBy: text('updated_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    ownerIdx: index('lease_rate_overrides_owner_idx').on(table.tenantId, table.ownerId, table.isActive),
    datesIdx: index('lease_rate_overrides_dates_idx').on(table.startDate, table.endDate),
  }),
)

export const ratePlans = pgTable(
  'rate_plans',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    tenantId: uuid('tenant_id').notNull().references(() => tenants.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    effectiveFrom: date('effective_from', { mode: 'string' }).notNull(),
    effectiveTo: date('effective_to', { mode: 'string' }),
    isActive: boolean('is_active').notNull().default(true),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    tenantDatesIdx: index('rate_plans_tenant_dates_idx').on(table.tenantId, table.effectiveFrom),
  }),
)

export const rateEntries = pgTable(
  'rate_entries',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    planId: uuid('plan_id').notNull().references(() => ratePlans.id, { onDelete: 'cascade' }),
    cabCategory: cabCategory('cab_category').notNull(),
    hasAirportLicense: boolean('has_airport_license').notNull(),
    shiftType: shiftType('shift_type').notNull(),
    dayOfWeek: dayOfWeek('day_of_week').notNull(),
    baseRate: numeric('base_rate', { precision: 10, scale: 2 }).notNull(),
    distanceRate: numeric('distance_rate', { precision: 10, scale: 4 }).notNull().default('0'),
    notes: text('notes'),
  },
  (table) => ({
    entryKeyUnique: uniqueIndex('rate_entries_key_unique').on(
      table.planId,
      table.cabCategory,
      table.hasAirportLicense,
      table.shiftType,
      table.dayOfWeek,
    ),
  }),
)

export type TenantRow = typeof tenants.$inferSelect
export type LeaseRateOverrideRow = typeof leaseRateOverrides.$inferSelect
export type RatePlanRow = typeof ratePlans.$inferSelect
export type RateEntryRow = typeof rateEntries.$inferSelect
export type ShiftProfileRow = typeof shiftProfiles.$inferSelect
export type CabShiftRow = typeof cabShifts.$inferSelect
export type AttributeTypeRow = typeof attributeTypes.$inferSelect
export type ShiftAttributeValueRow = typeof shiftAttributeValues.$inferSelect
export type ShiftProfileAssignmentRow = typeof shiftProfileAssignments.$inferSelect
