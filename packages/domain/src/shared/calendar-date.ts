// ---------------------------------------------------------------------------
// Calendar dates
//
// Shift, override and plan dates carry no time-of-day. They travel as
// ISO `yyyy-MM-dd` strings, which also order correctly under plain string
// comparison.
// ---------------------------------------------------------------------------

import { addDays as addDaysToDate, format, getDay, isValid, parse } from 'date-fns'
import type { Brand, DayOfWeek } from './types'
import { ValidationError } from './errors'

export type CalendarDate = Brand<string, 'CalendarDate'>

const ISO_FORMAT = 'yyyy-MM-dd'
const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}$/

// date-fns getDay(): 0 = Sunday … 6 = Saturday
const DAY_BY_INDEX: readonly DayOfWeek[] = [
  'SUNDAY',
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
]

function toLocalDate(date: CalendarDate): Date {
  return parse(date, ISO_FORMAT, new Date())
}

/** Returns true when `raw` is a real `yyyy-MM-dd` date. */
export function isCalendarDate(raw: string): raw is CalendarDate {
  if (!ISO_PATTERN.test(raw)) return false
  const parsed = parse(raw, ISO_FORMAT, new Date())
  // Rejects 2025-02-30 and friends, which parse() would roll over.
  return isValid(parsed) && format(parsed, ISO_FORMAT) === raw
}

/**
 * Validates and brands an ISO calendar date string.
 *
 * @throws {ValidationError} if `raw` is not a real `yyyy-MM-dd` date.
 */
export function toCalendarDate(raw: string): CalendarDate {
  if (!isCalendarDate(raw)) {
    throw new ValidationError(`Invalid calendar date: ${raw}`)
  }
  return raw
}

/** The local calendar date of a JS Date. */
export function calendarDateOf(value: Date): CalendarDate {
  return format(value, ISO_FORMAT) as CalendarDate
}

export function todayDate(now: Date = new Date()): CalendarDate {
  return calendarDateOf(now)
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return calendarDateOf(addDaysToDate(toLocalDate(date), days))
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function dayOfWeekOf(date: CalendarDate): DayOfWeek {
  const day = DAY_BY_INDEX[getDay(toLocalDate(date))]
  if (day === undefined) {
    throw new ValidationError(`Cannot determine day of week for ${date}`)
  }
  return day
}
