import { appendFileSync, mkdirSync } from 'fs'
import { dirname } from 'path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Appends timestamped lines to a log file. A logger without a file
 * accepts every call and writes nothing.
 *
 * Writes are synchronous: the CLI is a short blocking run and the log
 * must be complete when the process exits.
 */
export class Logger {
  private static instance: Logger | undefined
  private readonly logFile: string | null
  private initialized = false

  private constructor(logFile: string | null) {
    this.logFile = logFile
  }

  static getInstance(logFile: string | null = null): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(logFile)
    }
    return Logger.instance
  }

  static toFile(logFile: string): Logger {
    return new Logger(logFile)
  }

  static silent(): Logger {
    return new Logger(null)
  }

  get file(): string | null {
    return this.logFile
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta)
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta)
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta)
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    const errorInfo = error instanceof Error ? { error: error.message, stack: error.stack } : error === undefined ? {} : { error: String(error) }
    this.write('error', message, { ...errorInfo, ...meta })
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.logFile) return

    if (!this.initialized) {
      mkdirSync(dirname(this.logFile), { recursive: true })
      this.initialized = true
    }

    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ''
    const logLine = `${new Date().toISOString()} | ${level.toUpperCase()}: ${message}${suffix}\n`
    appendFileSync(this.logFile, logLine)
  }
}
