// ---------------------------------------------------------------------------
// @cabdesk/domain public surface
//
// Pure rate & profile resolution engine. No I/O: persistence is reached only
// through the store ports each context declares.
// ---------------------------------------------------------------------------

// shared
export * from './shared/types'
export * from './shared/errors'
export * from './shared/calendar-date'
export * from './shared/logger'

// temporal
export * from './temporal/index'

// lease
export * from './lease/index'
export * from './lease/ports'
export * from './lease/resolver'
export * from './lease/override-service'
export * from './lease/plan-service'

// attribute
export * from './attribute/index'
export * from './attribute/ports'
export * from './attribute/service'

// profile
export * from './profile/index'
export * from './profile/ports'
export * from './profile/matcher'
export * from './profile/service'

// composition
export * from './services'
