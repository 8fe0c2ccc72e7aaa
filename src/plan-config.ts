/**
 * Plan Configuration
 *
 * Loads and validates the declarative description of the reading lists.
 * The algorithms in readings.ts and cycling.ts only see validated BookEntry
 * lists, so another plan file can be swapped in without touching them.
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import { Result, Ok, Err } from './result'
import { InvalidConfigError } from './errors'
import { type BookEntry, type BookSet, buildBookSet } from './readings'

// ============================================================================
// Types
// ============================================================================

export type PlanList = {
  name: string
  books: BookEntry[]
}

export type PlanConfig = {
  name: string
  /** Informational; not enforced. */
  readingsStart?: number
  /** Informational; not enforced. */
  readingsEnd?: number
  lists: PlanList[]
}

/** The plan shipped with the package. */
export const DEFAULT_PLAN_PATH = resolve(__dirname, '..', 'data', 'horner-plan.json')

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function validateBook(raw: unknown, where: string): Result<BookEntry, InvalidConfigError> {
  if (!isRecord(raw)) {
    return Err(new InvalidConfigError(`${where}: expected an object with book and chapters`))
  }
  const book = raw['book']
  const chapters = raw['chapters']
  if (typeof book !== 'string' || book.trim() === '') {
    return Err(new InvalidConfigError(`${where}: book must be a non-empty string`))
  }
  if (typeof chapters !== 'number' || !Number.isInteger(chapters) || chapters < 1) {
    return Err(new InvalidConfigError(`${where} (${book}): chapters must be an integer >= 1`))
  }
  return Ok({ book, chapters })
}

function validateList(raw: unknown, index: number): Result<PlanList, InvalidConfigError> {
  const where = `lists[${index}]`
  if (!isRecord(raw)) {
    return Err(new InvalidConfigError(`${where}: expected an object with name and books`))
  }
  const name = raw['name'] ?? `list_${index + 1}`
  if (typeof name !== 'string') {
    return Err(new InvalidConfigError(`${where}: name must be a string`))
  }
  const books = raw['books']
  if (!Array.isArray(books) || books.length === 0) {
    return Err(new InvalidConfigError(`${where} (${name}): books must be a non-empty array`))
  }

  const entries: BookEntry[] = []
  for (const [j, book] of books.entries()) {
    const entry = validateBook(book, `${where}.books[${j}]`)
    if (!entry.ok) return entry
    entries.push(entry.value)
  }
  return Ok({ name, books: entries })
}

function optionalInteger(raw: Record<string, unknown>, key: string): Result<number | undefined, InvalidConfigError> {
  const value = raw[key]
  if (value === undefined) return Ok(undefined)
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return Err(new InvalidConfigError(`${key} must be an integer`))
  }
  return Ok(value)
}

export function validatePlanConfig(raw: unknown): Result<PlanConfig, InvalidConfigError> {
  if (!isRecord(raw)) {
    return Err(new InvalidConfigError('Plan configuration must be a JSON object'))
  }

  const name = raw['name'] ?? 'Unnamed plan'
  if (typeof name !== 'string') {
    return Err(new InvalidConfigError('name must be a string'))
  }

  const readingsStart = optionalInteger(raw, 'readingsStart')
  if (!readingsStart.ok) return readingsStart
  const readingsEnd = optionalInteger(raw, 'readingsEnd')
  if (!readingsEnd.ok) return readingsEnd

  const lists = raw['lists']
  if (!Array.isArray(lists)) {
    return Err(new InvalidConfigError('lists must be an array'))
  }

  const validated: PlanList[] = []
  for (const [i, list] of lists.entries()) {
    const result = validateList(list, i)
    if (!result.ok) return result
    validated.push(result.value)
  }

  const config: PlanConfig = { name, lists: validated }
  if (readingsStart.value !== undefined) config.readingsStart = readingsStart.value
  if (readingsEnd.value !== undefined) config.readingsEnd = readingsEnd.value
  return Ok(config)
}

// ============================================================================
// Loading
// ============================================================================

export function loadPlanConfig(path: string = DEFAULT_PLAN_PATH): Result<PlanConfig, InvalidConfigError> {
  let content: string
  try {
    content = readFileSync(path, 'utf8')
  } catch (e) {
    return Err(new InvalidConfigError(`Cannot read plan file ${path}: ${e instanceof Error ? e.message : String(e)}`))
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (e) {
    return Err(new InvalidConfigError(`Plan file ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`))
  }

  return validatePlanConfig(parsed)
}

/** Expand a validated plan into its reading sequences. */
export function planBookSet(config: PlanConfig): Result<BookSet, InvalidConfigError> {
  return buildBookSet(config.lists.map((list) => list.books))
}
