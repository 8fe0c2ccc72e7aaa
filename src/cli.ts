#!/usr/bin/env node

import minimist from 'minimist'
import { HornerPlanError, UsageError } from './errors'
import { unwrap } from './result'
import { loadSettings, type Settings } from './config'
import { loadPlanConfig, planBookSet } from './plan-config'
import { type Translation, parseTranslation, TRANSLATIONS } from './translations'
import { createBookmarkStore, type BookmarkAdapter } from './bookmark'
import { createJsonFileAdapter } from './json-file-adapter'
import { createSqliteAdapter } from './sqlite-adapter'
import { createBibleGatewayFetcher, type ChapterFetcher } from './fetch-chapter'
import { dailyReport, yearReport, FETCH_ERROR_POLICIES, type FetchErrorPolicy, type Writer } from './reporter'
import { Logger } from './logger'

export type CliOptions = {
  mode: 'daily' | 'year'
  translation?: Translation
  saveSettings: boolean
  onFetchError: FetchErrorPolicy
  help: boolean
}

export type CliIo = {
  write: Writer
  writeError: Writer
  /** Replaces the network fetcher; used by tests. */
  fetcher?: ChapterFetcher
  logger?: Logger
}

export const HELP_TEXT = `
horner-plan - Horner Bible reading plan

USAGE:
    horner-plan [options]

OPTIONS:
    -d, --daily                   Print today's readings with chapter text (default)
    -y, --year                    Print the readings for every day of the year
    -t, --translation <name>      Translation: ${TRANSLATIONS.join(', ')}
    -s, --save-settings           Save the translation to the bookmark file
    --on-fetch-error <policy>     skip (default) or abort when a chapter cannot be fetched
    -h, --help                    Show this help

ENVIRONMENT:
    HORNER_BOOKMARK               Bookmark file (default: ~/.horner_bible_readings.json)
    HORNER_STORE                  json (default) or sqlite
    HORNER_PLAN                   Plan file (default: bundled Horner plan)
    HORNER_LOG                    Log file, or 'off' (default: ~/.horner_bible_readings.log)
    HORNER_FETCH_TIMEOUT_MS       Timeout per chapter request (default: 15000)

EXAMPLES:
    horner-plan -t ESV -s
    horner-plan --year
    horner-plan -t KJV --on-fetch-error abort
`

const BOOLEAN_FLAGS = ['daily', 'year', 'save-settings', 'save_settings', 'help']
const STRING_FLAGS = ['translation', 'on-fetch-error']
const ALIASES: Record<string, string> = {
  d: 'daily',
  y: 'year',
  t: 'translation',
  s: 'save-settings',
  h: 'help',
}

function stringFlag(value: unknown, flag: string): string | undefined {
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new UsageError(`--${flag} may be given only once`)
  }
  if (value === '') {
    throw new UsageError(`--${flag} requires a value`)
  }
  return value
}

export function parseCliArgs(argv: string[]): CliOptions {
  const known = new Set([...BOOLEAN_FLAGS, ...STRING_FLAGS, ...Object.keys(ALIASES)])
  const args = minimist(argv, {
    alias: ALIASES,
    boolean: BOOLEAN_FLAGS,
    string: STRING_FLAGS,
    default: {
      'on-fetch-error': 'skip',
    },
    unknown: (arg) => {
      if (!arg.startsWith('-')) {
        throw new UsageError(`Unexpected argument: ${arg}`)
      }
      const name = arg.replace(/^-+/, '').split('=')[0] ?? ''
      if (!known.has(name)) {
        throw new UsageError(`Unknown option: ${arg}`)
      }
      return true
    },
  })

  const options: CliOptions = {
    mode: args['year'] === true ? 'year' : 'daily',
    saveSettings: args['save-settings'] === true || args['save_settings'] === true,
    onFetchError: 'skip',
    help: args['help'] === true,
  }

  const translation = stringFlag(args['translation'], 'translation')
  if (translation !== undefined) {
    options.translation = unwrap(parseTranslation(translation))
  }

  const policy = stringFlag(args['on-fetch-error'], 'on-fetch-error') ?? 'skip'
  const matched = FETCH_ERROR_POLICIES.find((p) => p === policy)
  if (!matched) {
    throw new UsageError(`--on-fetch-error must be one of ${FETCH_ERROR_POLICIES.join(', ')}, got '${policy}'`)
  }
  options.onFetchError = matched

  return options
}

async function openAdapter(settings: Settings): Promise<BookmarkAdapter> {
  if (settings.store === 'sqlite') {
    return createSqliteAdapter(settings.bookmarkPath)
  }
  return createJsonFileAdapter(settings.bookmarkPath)
}

/**
 * Run one invocation and return the process exit status.
 * Configuration and bootstrap errors are thrown before anything is written.
 */
export async function run(options: CliOptions, settings: Settings, io: CliIo): Promise<number> {
  if (options.help) {
    io.write(HELP_TEXT)
    return 0
  }

  const logger = io.logger ?? Logger.silent()
  const plan = unwrap(loadPlanConfig(settings.planPath))
  const bookSet = unwrap(planBookSet(plan))
  logger.debug('Plan loaded', { name: plan.name, path: settings.planPath, lists: bookSet.length })

  if (options.mode === 'year') {
    for (const line of yearReport(bookSet)) {
      io.write(line)
    }
    return 0
  }

  const adapter = await openAdapter(settings)
  try {
    const store = createBookmarkStore(adapter, { logger })
    const fetcher = io.fetcher ?? createBibleGatewayFetcher({
      baseUrl: settings.fetchBaseUrl,
      timeoutMs: settings.fetchTimeoutMs,
      logger,
    })

    const report = await dailyReport({
      bookSet,
      store,
      fetcher,
      requestedTranslation: options.translation,
      forceSave: options.saveSettings,
      onFetchError: options.onFetchError,
      write: io.write,
      writeError: io.writeError,
      logger,
    })
    return report.failures.length > 0 ? 1 : 0
  } finally {
    await adapter.close()
  }
}

function showError(message: string): void {
  console.error(`Error: ${message}`)
  console.error('Use --help for usage information')
  process.exitCode = 1
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let logger = Logger.silent()
  try {
    const options = parseCliArgs(argv)
    const settings = loadSettings()
    logger = Logger.getInstance(settings.logFile)

    process.exitCode = await run(options, settings, {
      write: (line) => console.log(line),
      writeError: (line) => console.error(line),
      logger,
    })
  } catch (error) {
    if (error instanceof HornerPlanError) {
      logger.error('Run failed', error, { code: error.code })
      showError(error.message)
      return
    }
    logger.error('Unexpected failure', error)
    throw error
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
}
