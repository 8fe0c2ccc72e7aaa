/**
 * JSON File Adapter
 *
 * Keeps the bookmark in a single JSON file:
 *
 *   {"day_index_number": 12, "last_updated": "2024-03-01T07:45:10", "translation": "ESV"}
 *
 * Every save rewrites the whole file through a temporary sibling and a rename,
 * so readers see either the old record or the new one.
 */

import { readFile, writeFile, rename, mkdir, rm } from 'fs/promises'
import { dirname } from 'path'
import { storedDayIndex, type Bookmark, type BookmarkAdapter } from './bookmark'
import { InvalidDataError } from './errors'
import { parseStoredTimestamp } from './time-date'
import { isTranslation } from './translations'

export { InvalidDataError } from './errors'

// ============================================================================
// Serialization
// ============================================================================

type BookmarkFile = {
  day_index_number: number
  last_updated: string
  translation: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate a parsed bookmark document. Older files may store the index as a
 * string, or as 365 for the first day of a new cycle.
 */
export function decodeBookmark(raw: unknown, location: string): Bookmark {
  if (!isRecord(raw)) {
    throw new InvalidDataError(`Bookmark file ${location} must contain a JSON object`)
  }

  const rawIndex = raw['day_index_number']
  const numeric = typeof rawIndex === 'string' && /^\d+$/.test(rawIndex.trim()) ? parseInt(rawIndex, 10) : rawIndex
  const dayIndex = typeof numeric === 'number' ? storedDayIndex(numeric) : null
  if (dayIndex === null) {
    throw new InvalidDataError(`Bookmark file ${location} has invalid day_index_number: ${JSON.stringify(rawIndex)}`)
  }

  const rawUpdated = raw['last_updated']
  if (typeof rawUpdated !== 'string') {
    throw new InvalidDataError(`Bookmark file ${location} is missing last_updated`)
  }
  const lastUpdated = parseStoredTimestamp(rawUpdated)
  if (!lastUpdated.ok) {
    throw new InvalidDataError(`Bookmark file ${location} has invalid last_updated: ${lastUpdated.error.message}`)
  }

  const translation = raw['translation']
  if (!isTranslation(translation)) {
    throw new InvalidDataError(`Bookmark file ${location} has unsupported translation: ${JSON.stringify(translation)}`)
  }

  return { dayIndex, lastUpdated: lastUpdated.value, translation }
}

export function encodeBookmark(bookmark: Bookmark): BookmarkFile {
  return {
    day_index_number: bookmark.dayIndex,
    last_updated: bookmark.lastUpdated,
    translation: bookmark.translation,
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createJsonFileAdapter(filePath: string): BookmarkAdapter {
  return {
    location: filePath,

    async load() {
      let content: string
      try {
        content = await readFile(filePath, 'utf8')
      } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null
        throw e
      }

      let parsed: unknown
      try {
        parsed = JSON.parse(content)
      } catch (e) {
        throw new InvalidDataError(
          `Bookmark file ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`
        )
      }
      return decodeBookmark(parsed, filePath)
    },

    async save(bookmark: Bookmark) {
      await mkdir(dirname(filePath), { recursive: true })
      const tmpPath = `${filePath}.${process.pid}.tmp`
      try {
        await writeFile(tmpPath, JSON.stringify(encodeBookmark(bookmark)), 'utf8')
        await rename(tmpPath, filePath)
      } catch (e) {
        await rm(tmpPath, { force: true })
        throw e
      }
    },

    async close() {},
  }
}
