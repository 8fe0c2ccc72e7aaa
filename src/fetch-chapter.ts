/**
 * Chapter Fetching
 *
 * Retrieves the text of one chapter in a given translation. Failures come back
 * as FetchFailureError results; the caller decides whether to skip or abort.
 */

import { DOMParser } from 'linkedom'
import { Result, Ok, Err } from './result'
import { FetchFailureError } from './errors'
import type { Reading } from './readings'
import type { Translation } from './translations'
import { DEFAULT_FETCH_BASE_URL, DEFAULT_FETCH_TIMEOUT_MS } from './config'
import { Logger } from './logger'

export { FetchFailureError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ChapterFetcher = (
  book: string,
  chapter: number,
  translation: Translation
) => Promise<Result<string, FetchFailureError>>

export type BibleGatewayOptions = {
  baseUrl?: string
  timeoutMs?: number
  fetchImpl?: typeof fetch
  logger?: Logger
}

/** The parts of a parsed element this module touches. */
type TextElement = {
  textContent: string | null
  remove(): void
}

// Footnote and cross-reference markers, and the footnote blocks they point to
const NOISE_SELECTOR = [
  '.passage-text sup.crossreference',
  '.passage-text sup.footnote',
  '.passage-text .footnotes',
  '.passage-text .crossrefs',
  '.passage-text .full-chap-link',
  '.passage-text .passage-other-trans',
].join(', ')

const BLOCK_SELECTOR = '.passage-text h3, .passage-text p'

// ============================================================================
// Helpers
// ============================================================================

export function passageUrl(baseUrl: string, book: string, chapter: number, translation: Translation): string {
  const search = encodeURIComponent(`${book} ${chapter}`)
  return `${baseUrl}/passage/?search=${search}&version=${translation}&interface=print`
}

/**
 * Pull the readable passage out of a printable passage page: headings and
 * paragraphs in document order, one per line, with footnote and
 * cross-reference markers removed. Returns null when the page has no passage.
 */
export function extractPassageText(html: string): string | null {
  const doc = new DOMParser().parseFromString(html, 'text/html')

  const noise: TextElement[] = Array.from(doc.querySelectorAll(NOISE_SELECTOR))
  for (const element of noise) {
    element.remove()
  }

  const blocks: TextElement[] = Array.from(doc.querySelectorAll(BLOCK_SELECTOR))
  const lines = blocks
    .map((element) => (element.textContent ?? '').replace(/\s+/g, ' ').trim())
    .filter((line) => line !== '')

  return lines.length > 0 ? lines.join('\n') : null
}

/** Printable block for one chapter: a blank line, the title, the text. */
export function formatChapterBlock(reading: Reading, text: string): string {
  return `\n${reading.book} ${reading.chapter}\n${text}\n`
}

// ============================================================================
// Factory
// ============================================================================

export function createBibleGatewayFetcher(options: BibleGatewayOptions = {}): ChapterFetcher {
  const baseUrl = options.baseUrl ?? DEFAULT_FETCH_BASE_URL
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
  const fetchImpl = options.fetchImpl ?? fetch
  const logger = options.logger ?? Logger.silent()

  return async (book, chapter, translation) => {
    const reading: Reading = { book, chapter }
    const url = passageUrl(baseUrl, book, chapter, translation)
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetchImpl(url, {
        signal: controller.signal,
        headers: { accept: 'text/html' },
      })
      if (!response.ok) {
        return Err(new FetchFailureError(
          reading,
          `${book} ${chapter} (${translation}) request failed with HTTP ${response.status}`,
          response.status
        ))
      }

      const text = extractPassageText(await response.text())
      if (text === null) {
        return Err(new FetchFailureError(reading, `${book} ${chapter} (${translation}) returned no passage text`))
      }

      logger.debug('Fetched chapter', { book, chapter, translation, length: text.length })
      return Ok(text)
    } catch (e) {
      if (controller.signal.aborted) {
        return Err(new FetchFailureError(reading, `${book} ${chapter} (${translation}) timed out after ${timeoutMs}ms`))
      }
      return Err(new FetchFailureError(
        reading,
        `${book} ${chapter} (${translation}) could not be fetched: ${e instanceof Error ? e.message : String(e)}`
      ))
    } finally {
      clearTimeout(timer)
    }
  }
}
