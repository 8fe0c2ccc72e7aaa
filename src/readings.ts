/**
 * Readings
 *
 * Expands book/chapter-count lists into flat reading sequences and assembles
 * the ten sequences of the plan into a BookSet.
 */

import { Result, Ok, Err } from './result'
import { InvalidConfigError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** One chapter to read. */
export type Reading = Readonly<{
  book: string
  chapter: number
}>

/** A book and how many chapters it has, as configured. */
export type BookEntry = Readonly<{
  book: string
  chapters: number
}>

/** Canonical book order, then ascending chapter. Never empty. */
export type ReadingSequence = readonly Reading[]

/** The plan's sequences in list order. */
export type BookSet = readonly ReadingSequence[]

/** Number of parallel lists in the plan. */
export const LIST_COUNT = 10

export { InvalidConfigError } from './errors'

// ============================================================================
// Formatting
// ============================================================================

export function formatReading(reading: Reading): string {
  return `${reading.book} ${reading.chapter}`
}

// ============================================================================
// Chapter Expansion
// ============================================================================

/**
 * Enumerate every chapter of every book, in input order.
 * Fails on an empty book name or a chapter count below one.
 */
export function expandChapters(books: readonly BookEntry[]): Result<ReadingSequence, InvalidConfigError> {
  const readings: Reading[] = []

  for (const entry of books) {
    if (entry.book.trim() === '') {
      return Err(new InvalidConfigError('Book name must not be empty'))
    }
    if (!Number.isInteger(entry.chapters) || entry.chapters < 1) {
      return Err(new InvalidConfigError(
        `Book '${entry.book}' has invalid chapter count ${entry.chapters}: must be an integer >= 1`
      ))
    }

    for (let chapter = 1; chapter <= entry.chapters; chapter++) {
      readings.push(Object.freeze({ book: entry.book, chapter }))
    }
  }

  return Ok(Object.freeze(readings))
}

// ============================================================================
// List Set
// ============================================================================

/**
 * Expand all ten configured lists. The returned sequences keep list order.
 */
export function buildBookSet(lists: readonly (readonly BookEntry[])[]): Result<BookSet, InvalidConfigError> {
  if (lists.length !== LIST_COUNT) {
    return Err(new InvalidConfigError(`Plan requires exactly ${LIST_COUNT} lists, got ${lists.length}`))
  }

  const sequences: ReadingSequence[] = []
  for (const [i, books] of lists.entries()) {
    const expanded = expandChapters(books)
    if (!expanded.ok) {
      return Err(new InvalidConfigError(`List ${i + 1}: ${expanded.error.message}`))
    }
    if (expanded.value.length === 0) {
      return Err(new InvalidConfigError(`List ${i + 1} has no readings`))
    }
    sequences.push(expanded.value)
  }

  return Ok(Object.freeze(sequences))
}
