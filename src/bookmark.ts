/**
 * Bookmark Store
 *
 * Tracks which day of the plan the reader is on. The day index advances at
 * most once per calendar day; an explicit settings save rewrites the stored
 * translation without touching the day.
 *
 * Persistence is delegated to a BookmarkAdapter so the rollover rule can be
 * exercised without a file system.
 */

import { Result, Ok, Err, unwrap } from './result'
import { MissingTranslationError } from './errors'
import { type LocalDateTime, dateOf, daysBetween, localNow } from './time-date'
import type { Translation } from './translations'
import { PLAN_DAYS } from './cycling'
import { Logger } from './logger'

export { MissingTranslationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Bookmark = {
  dayIndex: number
  lastUpdated: LocalDateTime
  translation: Translation
}

/** Persistence for the single bookmark record. */
export type BookmarkAdapter = {
  /** Where the record lives, for messages and logs. */
  readonly location: string
  /** The stored record, or null when none exists yet. */
  load(): Promise<Bookmark | null>
  /** Replace the stored record. */
  save(bookmark: Bookmark): Promise<void>
  close(): Promise<void>
}

export type MockBookmarkAdapter = BookmarkAdapter & {
  /** Every record passed to save(), oldest first. */
  readonly saves: Bookmark[]
}

export type AdvanceOptions = {
  now: LocalDateTime
  forceSave: boolean
  requestedTranslation?: Translation | undefined
}

export type AdvanceOutcome = {
  bookmark: Bookmark
  /** The day index moved forward. */
  advanced: boolean
  /** The record changed and must be persisted. */
  saved: boolean
}

export type SyncOptions = {
  requestedTranslation?: Translation | undefined
  forceSave?: boolean
}

export type SyncAction = 'created' | 'advanced' | 'saved' | 'unchanged'

export type SyncResult = {
  bookmark: Bookmark
  action: SyncAction
}

export type BookmarkStore = {
  /** Load the record, creating or rolling it over as needed, and persist changes. */
  sync(options?: SyncOptions): Promise<SyncResult>
  /** The record as of the last sync, or null before the first one. */
  getBookmark(): Bookmark | null
  getDayIndex(): number
  getTranslation(): Translation
}

export type BookmarkStoreOptions = {
  clock?: () => LocalDateTime
  logger?: Logger
}

// ============================================================================
// Rollover Rule
// ============================================================================

export function createBookmark(
  translation: Translation | undefined,
  now: LocalDateTime
): Result<Bookmark, MissingTranslationError> {
  if (!translation) {
    return Err(new MissingTranslationError(
      'Cannot create a bookmark without a translation; pass one with --translation'
    ))
  }
  return Ok({ dayIndex: 0, lastUpdated: now, translation })
}

/** Calendar days between the last update and now, ignoring time of day. */
export function elapsedDays(bookmark: Bookmark, now: LocalDateTime): number {
  return daysBetween(dateOf(bookmark.lastUpdated), dateOf(now))
}

/** The day after dayIndex; the last day of the plan wraps to 0. */
export function nextDayIndex(dayIndex: number): number {
  return dayIndex < PLAN_DAYS - 1 ? dayIndex + 1 : 0
}

/**
 * Map a persisted index into the plan year. Older bookmarks may hold 365,
 * which reads as day 0; any other value outside 0-364 gives null.
 */
export function storedDayIndex(value: number): number | null {
  if (!Number.isInteger(value) || value < 0 || value > PLAN_DAYS) return null
  return value === PLAN_DAYS ? 0 : value
}

/**
 * Apply one invocation's worth of rollover. Advances by a single day however
 * many calendar days have passed, and never when the clock has gone backwards.
 */
export function advanceBookmark(
  bookmark: Bookmark,
  opts: AdvanceOptions
): Result<AdvanceOutcome, MissingTranslationError> {
  const advanced = elapsedDays(bookmark, opts.now) > 0

  if (!advanced && !opts.forceSave) {
    return Ok({ bookmark, advanced: false, saved: false })
  }

  let translation = bookmark.translation
  if (opts.forceSave) {
    if (!opts.requestedTranslation) {
      return Err(new MissingTranslationError(
        'Cannot save settings without a translation; pass one with --translation'
      ))
    }
    translation = opts.requestedTranslation
  }

  return Ok({
    bookmark: {
      dayIndex: advanced ? nextDayIndex(bookmark.dayIndex) : bookmark.dayIndex,
      lastUpdated: opts.now,
      translation,
    },
    advanced,
    saved: true,
  })
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockBookmarkAdapter(initial: Bookmark | null = null): MockBookmarkAdapter {
  let stored: Bookmark | null = initial ? { ...initial } : null
  const saves: Bookmark[] = []

  return {
    location: 'memory',
    saves,

    async load() {
      return stored ? { ...stored } : null
    },

    async save(bookmark: Bookmark) {
      stored = { ...bookmark }
      saves.push({ ...bookmark })
    },

    async close() {},
  }
}

// ============================================================================
// Store
// ============================================================================

export function createBookmarkStore(
  adapter: BookmarkAdapter,
  options: BookmarkStoreOptions = {}
): BookmarkStore {
  const clock = options.clock ?? localNow
  const logger = options.logger ?? Logger.silent()
  let current: Bookmark | null = null

  function requireCurrent(): Bookmark {
    if (!current) throw new Error('Bookmark has not been loaded; call sync() first')
    return current
  }

  return {
    async sync(opts: SyncOptions = {}) {
      const now = clock()
      const existing = await adapter.load()

      if (!existing) {
        const created = unwrap(createBookmark(opts.requestedTranslation, now))
        await adapter.save(created)
        logger.info('Bookmark created', { location: adapter.location, translation: created.translation })
        current = created
        return { bookmark: created, action: 'created' }
      }

      const outcome = unwrap(advanceBookmark(existing, {
        now,
        forceSave: opts.forceSave ?? false,
        requestedTranslation: opts.requestedTranslation,
      }))
      current = outcome.bookmark

      if (!outcome.saved) {
        logger.debug('Bookmark unchanged', { dayIndex: existing.dayIndex })
        return { bookmark: outcome.bookmark, action: 'unchanged' }
      }

      await adapter.save(outcome.bookmark)
      if (outcome.advanced) {
        logger.info('Bookmark advanced', { from: existing.dayIndex, to: outcome.bookmark.dayIndex })
        return { bookmark: outcome.bookmark, action: 'advanced' }
      }
      logger.info('Bookmark settings saved', { translation: outcome.bookmark.translation })
      return { bookmark: outcome.bookmark, action: 'saved' }
    },

    getBookmark() {
      return current
    },

    getDayIndex() {
      return requireCurrent().dayIndex
    },

    getTranslation() {
      return requireCurrent().translation
    },
  }
}
