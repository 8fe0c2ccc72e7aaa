/**
 * Translations
 *
 * Bible editions the chapter fetcher can request.
 */

import { Result, Ok, Err } from './result'
import { UsageError } from './errors'

export const TRANSLATIONS = ['NASB1995', 'NIV', 'ASV', 'ESV', 'KJV', 'NKJV'] as const

export type Translation = (typeof TRANSLATIONS)[number]

export const DEFAULT_TRANSLATION: Translation = 'NASB1995'

export function isTranslation(value: unknown): value is Translation {
  return typeof value === 'string' && (TRANSLATIONS as readonly string[]).includes(value)
}

export function parseTranslation(value: string): Result<Translation, UsageError> {
  if (isTranslation(value)) return Ok(value)
  return Err(new UsageError(
    `Invalid translation '${value}' (choose from ${TRANSLATIONS.join(', ')})`
  ))
}
