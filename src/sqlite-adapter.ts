/**
 * SQLite Adapter
 *
 * Bookmark persistence in a SQLite file using better-sqlite3.
 * The bookmark table holds at most one row.
 */
import Database from 'better-sqlite3'
import { mkdirSync } from 'fs'
import { dirname } from 'path'
import { storedDayIndex, type Bookmark, type BookmarkAdapter } from './bookmark'
import { InvalidDataError } from './errors'
import { parseStoredTimestamp } from './time-date'
import { isTranslation } from './translations'

export { InvalidDataError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getSchemaVersion(): Promise<number>
}

export type SqliteBookmarkAdapter = BookmarkAdapter & SqliteExtras

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_VERSION = 1

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS bookmark (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    day_index INTEGER NOT NULL CHECK (day_index BETWEEN 0 AND 364),
    last_updated TEXT NOT NULL,
    translation TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// SQL Row Types
// ============================================================================

type BookmarkRow = {
  id: number
  day_index: number
  last_updated: string
  translation: string
}

type SchemaVersionRow = {
  v: number | null
}

type TableRow = {
  name: string
}

function toBookmark(row: BookmarkRow, location: string): Bookmark {
  const lastUpdated = parseStoredTimestamp(row.last_updated)
  if (!lastUpdated.ok) {
    throw new InvalidDataError(`Bookmark in ${location} has invalid last_updated: ${lastUpdated.error.message}`)
  }
  if (!isTranslation(row.translation)) {
    throw new InvalidDataError(`Bookmark in ${location} has unsupported translation: '${row.translation}'`)
  }
  const dayIndex = storedDayIndex(row.day_index)
  if (dayIndex === null) {
    throw new InvalidDataError(`Bookmark in ${location} has invalid day_index: ${row.day_index}`)
  }
  return { dayIndex, lastUpdated: lastUpdated.value, translation: row.translation }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteBookmarkAdapter> {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true })
  }
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  // Seed initial schema version if empty
  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const adapter: SqliteBookmarkAdapter = {
    location: path,

    async load() {
      const row = db.prepare('SELECT * FROM bookmark WHERE id = 1').get() as BookmarkRow | undefined
      return row ? toBookmark(row, path) : null
    },

    async save(bookmark: Bookmark) {
      try {
        db.prepare(`
          INSERT INTO bookmark (id, day_index, last_updated, translation) VALUES (1, ?, ?, ?)
          ON CONFLICT(id) DO UPDATE SET
            day_index = excluded.day_index,
            last_updated = excluded.last_updated,
            translation = excluded.translation
        `).run(bookmark.dayIndex, bookmark.lastUpdated, bookmark.translation)
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e)
        if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
        throw e
      }
    },

    async close() {
      db.close()
    },

    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name"
      ).all() as TableRow[]
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    },
  }

  return adapter
}
