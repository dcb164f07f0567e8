import { describe, it, expect } from 'vitest'
import {
  matchesStatic,
  profileDeletionBlocker,
  rankStaticMatches,
  satisfiesRequirement,
  toProfileId,
  type ShiftProfile,
  type ShiftStaticAttributes,
} from '../index'

function makeProfile(overrides: Partial<ShiftProfile> = {}): ShiftProfile {
  return {
    id: toProfileId('p-1'),
    code: 'ANY',
    name: 'Any shift',
    description: null,
    cabCategory: null,
    shareCategory: null,
    hasAirportLicense: null,
    shiftType: null,
    category: null,
    colorCode: null,
    displayOrder: 0,
    isActive: true,
    isSystemProfile: false,
    usageCount: 0,
    requirements: [],
    createdBy: null,
    updatedBy: null,
    createdAt: new Date('2025-01-01T00:00:00Z'),
    updatedAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides,
  }
}

const nightSedan: ShiftStaticAttributes = {
  cabCategory: 'SEDAN',
  shareCategory: 'VOTING_SHARE',
  hasAirportLicense: true,
  shiftType: 'NIGHT',
}

// ---------------------------------------------------------------------------
// Requirement truth table
// ---------------------------------------------------------------------------
describe('satisfiesRequirement', () => {
  it('fails a required attribute that is missing', () => {
    expect(satisfiesRequirement({ isRequired: true, expectedValue: null }, null)).toBe(false)
    expect(satisfiesRequirement({ isRequired: true, expectedValue: 'YES' }, null)).toBe(false)
  })

  it('accepts any value of a required attribute without an expected value', () => {
    expect(satisfiesRequirement({ isRequired: true, expectedValue: null }, 'anything')).toBe(true)
    expect(satisfiesRequirement({ isRequired: true, expectedValue: null }, '')).toBe(true)
  })

  it('compares a required attribute with its expected value', () => {
    expect(satisfiesRequirement({ isRequired: true, expectedValue: 'E-ZPASS' }, 'E-ZPASS')).toBe(true)
    expect(satisfiesRequirement({ isRequired: true, expectedValue: 'E-ZPASS' }, 'I-PASS')).toBe(false)
  })

  it('accepts absence of an excluded attribute', () => {
    expect(satisfiesRequirement({ isRequired: false, expectedValue: null }, null)).toBe(true)
    expect(satisfiesRequirement({ isRequired: false, expectedValue: 'X' }, null)).toBe(true)
  })

  it('fails presence of an excluded attribute whatever its value', () => {
    expect(satisfiesRequirement({ isRequired: false, expectedValue: null }, 'X')).toBe(false)
    expect(satisfiesRequirement({ isRequired: false, expectedValue: 'X' }, 'X')).toBe(false)
    expect(satisfiesRequirement({ isRequired: false, expectedValue: 'X' }, 'Y')).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// Static matching
// ---------------------------------------------------------------------------
describe('matchesStatic', () => {
  it('ignores wildcard filters', () => {
    const profile = makeProfile({ shareCategory: 'VOTING_SHARE', hasAirportLicense: true })
    expect(matchesStatic(profile, nightSedan)).toBe(true)
  })

  it('fails when any filter differs', () => {
    expect(matchesStatic(makeProfile({ shareCategory: 'NON_VOTING_SHARE' }), nightSedan)).toBe(false)
    expect(matchesStatic(makeProfile({ hasAirportLicense: false }), nightSedan)).toBe(false)
    expect(matchesStatic(makeProfile({ cabCategory: 'HANDICAP_VAN' }), nightSedan)).toBe(false)
    expect(matchesStatic(makeProfile({ shiftType: 'DAY' }), nightSedan)).toBe(false)
  })

  it('matches a profile with every filter equal', () => {
    expect(matchesStatic(makeProfile({ ...nightSedan }), nightSedan)).toBe(true)
  })

  it('matches everything with no filters', () => {
    expect(matchesStatic(makeProfile(), nightSedan)).toBe(true)
  })
})

describe('rankStaticMatches', () => {
  it('keeps active matches ordered by display order then code', () => {
    const profiles = [
      makeProfile({ id: toProfileId('p-3'), code: 'C', displayOrder: 2 }),
      makeProfile({ id: toProfileId('p-2'), code: 'B', displayOrder: 1 }),
      makeProfile({ id: toProfileId('p-1'), code: 'A', displayOrder: 2 }),
      makeProfile({ id: toProfileId('p-4'), code: 'D', displayOrder: 0, isActive: false }),
      makeProfile({ id: toProfileId('p-5'), code: 'E', displayOrder: 0, shiftType: 'DAY' }),
    ]
    expect(rankStaticMatches(profiles, nightSedan).map((p) => p.code)).toEqual(['B', 'A', 'C'])
  })
})

// ---------------------------------------------------------------------------
// Deletion rule
// ---------------------------------------------------------------------------
describe('profileDeletionBlocker', () => {
  it('blocks system profiles', () => {
    expect(profileDeletionBlocker(makeProfile({ code: 'SYS', isSystemProfile: true }))).toBe(
      'Cannot delete system profile: SYS',
    )
  })

  it('blocks profiles in use', () => {
    expect(profileDeletionBlocker(makeProfile({ usageCount: 3 }))).toBe('Cannot delete profile in use by 3 shifts')
  })

  it('names the system flag first when both apply', () => {
    expect(profileDeletionBlocker(makeProfile({ code: 'SYS', isSystemProfile: true, usageCount: 2 }))).toBe(
      'Cannot delete system profile: SYS',
    )
  })

  it('allows unused custom profiles', () => {
    expect(profileDeletionBlocker(makeProfile())).toBeNull()
  })
})
