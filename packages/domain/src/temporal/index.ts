// ---------------------------------------------------------------------------
// Temporal overlap guard
// Date-window arithmetic shared by overrides, rate plans, attribute values
// and profile assignments. A null end date means "open-ended".
// ---------------------------------------------------------------------------

import type { CalendarDate } from '../shared/calendar-date'
import { ConflictError, ValidationError } from '../shared/errors'

/** An inclusive [startDate, endDate] window; `endDate: null` is unbounded. */
export interface DateWindow {
  readonly startDate: CalendarDate
  readonly endDate: CalendarDate | null
}

/** A windowed record that can also be switched off independently of its dates. */
export interface ActivatableWindow extends DateWindow {
  readonly isActive?: boolean
}

/**
 * Returns true when [aStart, aEnd] and [bStart, bEnd] share at least one day.
 * Both bounds are inclusive.
 */
export function overlaps(
  aStart: CalendarDate,
  aEnd: CalendarDate | null,
  bStart: CalendarDate,
  bEnd: CalendarDate | null,
): boolean {
  return (bEnd === null || aStart <= bEnd) && (aEnd === null || bStart <= aEnd)
}

export function windowsOverlap(a: DateWindow, b: DateWindow): boolean {
  return overlaps(a.startDate, a.endDate, b.startDate, b.endDate)
}

/**
 * Returns true when the record applies on `date`: not switched off, started,
 * and not yet ended.
 */
export function activeOn(record: ActivatableWindow, date: CalendarDate): boolean {
  if (record.isActive === false) return false
  return date >= record.startDate && (record.endDate === null || date <= record.endDate)
}

/**
 * @throws {ValidationError} if the window ends before it starts.
 */
export function assertValidWindow(window: DateWindow, label = 'Record'): void {
  if (window.endDate !== null && window.endDate < window.startDate) {
    throw new ValidationError(
      `${label} end date ${window.endDate} cannot be before start date ${window.startDate}`,
    )
  }
}

/**
 * Returns the first candidate whose window overlaps `window`, skipping the
 * record identified by `excludeId` (the record being edited).
 */
export function findOverlapping<T extends DateWindow & { readonly id: string }>(
  candidates: readonly T[],
  window: DateWindow,
  excludeId?: string,
): T | undefined {
  return candidates.find((candidate) => candidate.id !== excludeId && windowsOverlap(candidate, window))
}

/**
 * Enforces "at most one record per key at a time".
 *
 * @throws {ConflictError} naming the first overlapping candidate.
 */
export function assertNoOverlap<T extends DateWindow & { readonly id: string }>(
  candidates: readonly T[],
  window: DateWindow,
  options: { excludeId?: string; describe: (conflict: T) => string },
): void {
  const conflict = findOverlapping(candidates, window, options.excludeId)
  if (conflict) {
    throw new ConflictError(options.describe(conflict), conflict.id)
  }
}

/** Human-readable window, e.g. "2025-01-01 to ongoing". */
export function formatWindow(window: DateWindow): string {
  return `${window.startDate} to ${window.endDate ?? 'ongoing'}`
}
