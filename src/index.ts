/**
 * horner-plan
 *
 * Public API exports
 */

// Error system
export {
  HornerPlanError, HornerPlanErrorCode,
  InvalidConfigError, MissingTranslationError, InvalidDataError,
  FetchFailureError, ParseError, UsageError,
} from './errors'
export type { HornerPlanErrorCode as HornerPlanErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  parseDate, parseTime, parseDateTime, parseStoredTimestamp,
  makeDate, makeTime, makeDateTime, fromJsDate, localNow,
  dateOf, timeOf, addDays, daysBetween,
} from './time-date'

// Translations
export type { Translation } from './translations'
export { TRANSLATIONS, DEFAULT_TRANSLATION, isTranslation, parseTranslation } from './translations'

// Readings and list expansion
export type { Reading, BookEntry, ReadingSequence, BookSet } from './readings'
export { LIST_COUNT, expandChapters, buildBookSet, formatReading } from './readings'

// Plan configuration
export type { PlanConfig, PlanList } from './plan-config'
export { DEFAULT_PLAN_PATH, validatePlanConfig, loadPlanConfig, planBookSet } from './plan-config'

// Daily selection
export { PLAN_DAYS, readingIndex, readingIndices, getReading, selectReadings, cyclePeriod } from './cycling'

// Bookmark store
export type {
  Bookmark, BookmarkAdapter, MockBookmarkAdapter, BookmarkStore, BookmarkStoreOptions,
  AdvanceOptions, AdvanceOutcome, SyncOptions, SyncAction, SyncResult,
} from './bookmark'
export {
  createBookmark, elapsedDays, nextDayIndex, storedDayIndex, advanceBookmark,
  createMockBookmarkAdapter, createBookmarkStore,
} from './bookmark'
export { createJsonFileAdapter, decodeBookmark, encodeBookmark } from './json-file-adapter'
export type { SqliteBookmarkAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Chapter fetching
export type { ChapterFetcher, BibleGatewayOptions } from './fetch-chapter'
export { createBibleGatewayFetcher, extractPassageText, passageUrl, formatChapterBlock } from './fetch-chapter'

// Reporting
export type { FetchErrorPolicy, Writer, DailyReportInput, DailyReport } from './reporter'
export { FETCH_ERROR_POLICIES, formatYearLine, yearReport, resolveTranslation, dailyReport } from './reporter'

// Settings and logging
export type { Settings, StoreKind, Env } from './config'
export { loadSettings, DEFAULT_FETCH_BASE_URL, DEFAULT_FETCH_TIMEOUT_MS } from './config'
export type { LogLevel } from './logger'
export { Logger } from './logger'
