/**
 * Cycling Module
 *
 * Picks the day's reading from every list. Each list rotates independently
 * at its own length, so lists only line up again after the least common
 * multiple of their lengths.
 */

import type { BookSet, Reading, ReadingSequence } from './readings'
import { InvalidConfigError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Days in one pass of the plan; day indices run 0..PLAN_DAYS-1. */
export const PLAN_DAYS = 365

// ============================================================================
// Helpers
// ============================================================================

function gcd(a: number, b: number): number {
  while (b !== 0) {
    const t = b
    b = a % b
    a = t
  }
  return a
}

function assertDayIndex(dayIndex: number): void {
  if (!Number.isInteger(dayIndex) || dayIndex < 0) {
    throw new RangeError(`Day index must be a non-negative integer, got ${dayIndex}`)
  }
}

// ============================================================================
// Public API
// ============================================================================

/** Position within a sequence of the given length for a day. */
export function readingIndex(length: number, dayIndex: number): number {
  return dayIndex % length
}

/** Per-list positions for a day, in list order. */
export function readingIndices(bookSet: BookSet, dayIndex: number): number[] {
  assertDayIndex(dayIndex)
  return bookSet.map((sequence) => readingIndex(sequence.length, dayIndex))
}

export function getReading(sequence: ReadingSequence, dayIndex: number): Reading {
  assertDayIndex(dayIndex)
  const reading = sequence[readingIndex(sequence.length, dayIndex)]
  if (reading === undefined) {
    throw new InvalidConfigError('Cannot select from an empty reading sequence')
  }
  return reading
}

/** One reading per list for the given day. */
export function selectReadings(bookSet: BookSet, dayIndex: number): Reading[] {
  return bookSet.map((sequence) => getReading(sequence, dayIndex))
}

/** Days until every list is back at its first reading. */
export function cyclePeriod(bookSet: BookSet): number {
  return bookSet.reduce((acc, sequence) => (acc / gcd(acc, sequence.length)) * sequence.length, 1)
}
