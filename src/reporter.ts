/**
 * Reading Reporter
 *
 * Year mode lists every day of the plan. Daily mode advances the bookmark,
 * then prints the day's readings with the text of each chapter.
 */

import type { BookSet, Reading } from './readings'
import { formatReading } from './readings'
import { PLAN_DAYS, selectReadings } from './cycling'
import type { BookmarkStore } from './bookmark'
import type { Translation } from './translations'
import { type ChapterFetcher, formatChapterBlock } from './fetch-chapter'
import { FetchFailureError } from './errors'
import { Logger } from './logger'

// ============================================================================
// Types
// ============================================================================

/** What to do when one chapter's text cannot be fetched. */
export type FetchErrorPolicy = 'skip' | 'abort'

export const FETCH_ERROR_POLICIES: readonly FetchErrorPolicy[] = ['skip', 'abort']

export type Writer = (line: string) => void

export type DailyReportInput = {
  bookSet: BookSet
  store: BookmarkStore
  fetcher: ChapterFetcher
  /** Overrides the stored translation for this run; persisted only with forceSave. */
  requestedTranslation?: Translation | undefined
  forceSave?: boolean
  onFetchError?: FetchErrorPolicy
  write: Writer
  writeError?: Writer
  logger?: Logger
}

export type DailyReport = {
  dayIndex: number
  translation: Translation
  readings: Reading[]
  failures: FetchFailureError[]
}

// ============================================================================
// Year Mode
// ============================================================================

export function formatYearLine(day: number, readings: readonly Reading[]): string {
  return [String(day), ...readings.map(formatReading)].join(', ')
}

/** One line per day, numbered from 1. */
export function yearReport(bookSet: BookSet, days: number = PLAN_DAYS): string[] {
  const lines: string[] = []
  for (let i = 0; i < days; i++) {
    lines.push(formatYearLine(i + 1, selectReadings(bookSet, i)))
  }
  return lines
}

// ============================================================================
// Daily Mode
// ============================================================================

export function resolveTranslation(stored: Translation, requested: Translation | undefined): Translation {
  return requested ?? stored
}

/**
 * The bookmark is synced before any fetch, so a failed fetch never loses the
 * day's advance.
 */
export async function dailyReport(input: DailyReportInput): Promise<DailyReport> {
  const { bookSet, store, fetcher, write } = input
  const writeError = input.writeError ?? write
  const policy = input.onFetchError ?? 'skip'
  const logger = input.logger ?? Logger.silent()

  await store.sync({
    requestedTranslation: input.requestedTranslation,
    forceSave: input.forceSave ?? false,
  })

  const dayIndex = store.getDayIndex()
  const translation = resolveTranslation(store.getTranslation(), input.requestedTranslation)
  const readings = selectReadings(bookSet, dayIndex)

  write(`Translation: ${translation}`)
  write(`TODAY ${readings.map(formatReading).join(', ')}`)

  const failures: FetchFailureError[] = []
  for (const reading of readings) {
    const result = await fetcher(reading.book, reading.chapter, translation)
    if (result.ok) {
      write(formatChapterBlock(reading, result.value))
      continue
    }

    logger.error('Chapter fetch failed', result.error, { book: reading.book, chapter: reading.chapter, translation })
    if (policy === 'abort') {
      throw result.error
    }
    failures.push(result.error)
    writeError(`Could not fetch ${formatReading(reading)}: ${result.error.message}`)
  }

  return { dayIndex, translation, readings, failures }
}
