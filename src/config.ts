/**
 * Runtime Settings
 *
 * Resolves where state, logs and the plan live, and how chapters are fetched,
 * from environment variables with per-user defaults.
 */

import { homedir } from 'os'
import { join, resolve } from 'path'
import { InvalidConfigError } from './errors'
import { DEFAULT_PLAN_PATH } from './plan-config'

export type StoreKind = 'json' | 'sqlite'

export type Settings = {
  store: StoreKind
  bookmarkPath: string
  planPath: string
  /** null disables logging. */
  logFile: string | null
  fetchTimeoutMs: number
  fetchBaseUrl: string
}

export type Env = Record<string, string | undefined>

export const DEFAULT_FETCH_TIMEOUT_MS = 15000
export const DEFAULT_FETCH_BASE_URL = 'https://www.biblegateway.com'

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined
}

function expandHome(path: string, home: string): string {
  if (path === '~') return home
  if (path.startsWith('~/')) return join(home, path.slice(2))
  return resolve(path)
}

export function loadSettings(env: Env = process.env, home: string = homedir()): Settings {
  const storeValue = nonEmpty(env['HORNER_STORE']) ?? 'json'
  if (storeValue !== 'json' && storeValue !== 'sqlite') {
    throw new InvalidConfigError(`HORNER_STORE must be 'json' or 'sqlite', got '${storeValue}'`)
  }
  const store: StoreKind = storeValue === 'sqlite' ? 'sqlite' : 'json'

  const defaultBookmark = store === 'sqlite' ? '~/.horner_bible_readings.db' : '~/.horner_bible_readings.json'
  const bookmarkPath = expandHome(nonEmpty(env['HORNER_BOOKMARK']) ?? defaultBookmark, home)

  const planValue = nonEmpty(env['HORNER_PLAN'])
  const planPath = planValue ? expandHome(planValue, home) : DEFAULT_PLAN_PATH

  const logValue = nonEmpty(env['HORNER_LOG']) ?? '~/.horner_bible_readings.log'
  const logFile = logValue === 'off' ? null : expandHome(logValue, home)

  const timeoutValue = nonEmpty(env['HORNER_FETCH_TIMEOUT_MS'])
  let fetchTimeoutMs = DEFAULT_FETCH_TIMEOUT_MS
  if (timeoutValue !== undefined) {
    fetchTimeoutMs = /^\d+$/.test(timeoutValue) ? parseInt(timeoutValue, 10) : NaN
    if (!(fetchTimeoutMs > 0)) {
      throw new InvalidConfigError(`HORNER_FETCH_TIMEOUT_MS must be a positive integer, got '${timeoutValue}'`)
    }
  }

  const fetchBaseUrl = (nonEmpty(env['HORNER_FETCH_BASE_URL']) ?? DEFAULT_FETCH_BASE_URL).replace(/\/+$/, '')
  if (!/^https?:\/\//.test(fetchBaseUrl)) {
    throw new InvalidConfigError(`HORNER_FETCH_BASE_URL must be an http(s) URL, got '${fetchBaseUrl}'`)
  }

  return { store, bookmarkPath, planPath, logFile, fetchTimeoutMs, fetchBaseUrl }
}
