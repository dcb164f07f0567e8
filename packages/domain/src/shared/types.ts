// ---------------------------------------------------------------------------
// Shared primitives used across all bounded contexts.
// Nothing in this file may import from a sibling context.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Branding utility
// ---------------------------------------------------------------------------

/** Nominal / branded type: prevents accidental substitution of e.g. CabId for DriverId. */
export type Brand<T, B extends string> = T & { readonly __brand: B }

// ---------------------------------------------------------------------------
// Cross-cutting ID types
// ---------------------------------------------------------------------------

/** Identifies a driver. Owners are drivers flagged with `isOwner`. */
export type DriverId = Brand<string, 'DriverId'>

/** Identifies a cab (medallion). */
export type CabId = Brand<string, 'CabId'>

/** Identifies a single cab shift (a DAY or NIGHT slot of one cab). */
export type ShiftId = Brand<string, 'ShiftId'>

export const toDriverId = (raw: string): DriverId => raw as DriverId
export const toCabId = (raw: string): CabId => raw as CabId
export const toShiftId = (raw: string): ShiftId => raw as ShiftId

// ---------------------------------------------------------------------------
// Static fleet enumerations
// ---------------------------------------------------------------------------

export type ShiftType = 'DAY' | 'NIGHT'

export const SHIFT_TYPES: readonly ShiftType[] = ['DAY', 'NIGHT'] as const

export type DayOfWeek =
  | 'MONDAY'
  | 'TUESDAY'
  | 'WEDNESDAY'
  | 'THURSDAY'
  | 'FRIDAY'
  | 'SATURDAY'
  | 'SUNDAY'

/** Monday-first, matching how owners read a rate card. */
export const DAYS_OF_WEEK: readonly DayOfWeek[] = [
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
  'SUNDAY',
] as const

/** Physical category of the cab working a shift. */
export type CabCategory = 'SEDAN' | 'HANDICAP_VAN'

export const CAB_CATEGORIES: readonly CabCategory[] = ['SEDAN', 'HANDICAP_VAN'] as const

/** Ownership share class of the shift. */
export type ShareCategory = 'VOTING_SHARE' | 'NON_VOTING_SHARE'

export const SHARE_CATEGORIES: readonly ShareCategory[] = ['VOTING_SHARE', 'NON_VOTING_SHARE'] as const

/**
 * The fixed, enumerated properties of a shift used for coarse profile
 * filtering and default rate lookup.
 */
export interface ShiftStaticAttributes {
  readonly cabCategory: CabCategory
  readonly shareCategory: ShareCategory
  readonly hasAirportLicense: boolean
  readonly shiftType: ShiftType
}

// ---------------------------------------------------------------------------
// Unit of work
// ---------------------------------------------------------------------------

/**
 * Runs `work` against a store bound to a single transaction. Implementations
 * commit when the returned promise resolves and roll back when it rejects.
 */
export type RunInTransaction<S> = <T>(work: (store: S) => Promise<T>) => Promise<T>
