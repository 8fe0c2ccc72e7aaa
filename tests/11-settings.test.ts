/**
 * Segment 11: Settings, Logging & Errors
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadSettings, DEFAULT_FETCH_BASE_URL, DEFAULT_FETCH_TIMEOUT_MS } from '../src/config';
import { DEFAULT_PLAN_PATH } from '../src/plan-config';
import { Logger } from '../src/logger';
import {
  HornerPlanError,
  HornerPlanErrorCode,
  InvalidConfigError,
  MissingTranslationError,
  InvalidDataError,
  FetchFailureError,
  ParseError,
  UsageError,
} from '../src/errors';
import { isTranslation, parseTranslation } from '../src/translations';

describe('Segment 11: Settings, Logging & Errors', () => {
  describe('1. loadSettings', () => {
    const home = '/home/reader';

    it('uses per-user defaults', () => {
      expect(loadSettings({}, home)).toEqual({
        store: 'json',
        bookmarkPath: '/home/reader/.horner_bible_readings.json',
        planPath: DEFAULT_PLAN_PATH,
        logFile: '/home/reader/.horner_bible_readings.log',
        fetchTimeoutMs: DEFAULT_FETCH_TIMEOUT_MS,
        fetchBaseUrl: DEFAULT_FETCH_BASE_URL,
      });
    });

    it('sqlite store changes the default bookmark file', () => {
      expect(loadSettings({ HORNER_STORE: 'sqlite' }, home).bookmarkPath).toBe('/home/reader/.horner_bible_readings.db');
    });

    it('expands ~ in overrides', () => {
      const settings = loadSettings({ HORNER_BOOKMARK: '~/state/bm.json', HORNER_PLAN: '~/plans/short.json' }, home);
      expect(settings.bookmarkPath).toBe('/home/reader/state/bm.json');
      expect(settings.planPath).toBe('/home/reader/plans/short.json');
    });

    it('off disables logging', () => {
      expect(loadSettings({ HORNER_LOG: 'off' }, home).logFile).toBeNull();
    });

    it('reads the fetch settings', () => {
      const settings = loadSettings({
        HORNER_FETCH_TIMEOUT_MS: '2500',
        HORNER_FETCH_BASE_URL: 'http://localhost:8080/',
      }, home);
      expect(settings.fetchTimeoutMs).toBe(2500);
      expect(settings.fetchBaseUrl).toBe('http://localhost:8080');
    });

    it('rejects an unknown store', () => {
      expect(() => loadSettings({ HORNER_STORE: 'redis' }, home)).toThrow(
        "HORNER_STORE must be 'json' or 'sqlite', got 'redis'"
      );
    });

    it('rejects a zero timeout', () => {
      expect(() => loadSettings({ HORNER_FETCH_TIMEOUT_MS: '0' }, home)).toThrow(InvalidConfigError);
    });

    it('rejects a non-numeric timeout', () => {
      expect(() => loadSettings({ HORNER_FETCH_TIMEOUT_MS: 'soon' }, home)).toThrow(InvalidConfigError);
    });

    it('rejects a non-http base URL', () => {
      expect(() => loadSettings({ HORNER_FETCH_BASE_URL: 'ftp://example.test' }, home)).toThrow(InvalidConfigError);
    });
  });

  describe('2. Logger', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'horner-log-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('writes leveled lines with meta', () => {
      const file = join(dir, 'logs', 'plan.log');
      const logger = Logger.toFile(file);
      logger.info('Bookmark advanced', { from: 3, to: 4 });
      logger.warn('Slow fetch');

      const lines = readFileSync(file, 'utf8').trimEnd().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \| INFO: Bookmark advanced \{"from":3,"to":4\}$/);
      expect(lines[1]).toMatch(/ \| WARN: Slow fetch$/);
    });

    it('records error messages', () => {
      const file = join(dir, 'plan.log');
      Logger.toFile(file).error('Run failed', new UsageError('bad flag'), { code: 'USAGE' });
      const content = readFileSync(file, 'utf8');
      expect(content).toContain('ERROR: Run failed {"error":"bad flag","stack":');
      expect(content).toContain('"code":"USAGE"}');
    });

    it('silent logger writes nothing', () => {
      const logger = Logger.silent();
      logger.error('nothing', new Error('x'));
      expect(logger.file).toBeNull();
      expect(existsSync(join(dir, 'plan.log'))).toBe(false);
    });
  });

  describe('3. Errors', () => {
    it('base class carries the code', () => {
      const err = new HornerPlanError(HornerPlanErrorCode.USAGE, 'x');
      expect(err).toBeInstanceOf(Error);
      expect(err.code).toBe('USAGE');
      expect(err.name).toBe('HornerPlanError');
    });

    it.each([
      [new InvalidConfigError('m'), 'INVALID_CONFIG', 'InvalidConfigError'],
      [new MissingTranslationError('m'), 'MISSING_TRANSLATION', 'MissingTranslationError'],
      [new InvalidDataError('m'), 'INVALID_DATA', 'InvalidDataError'],
      [new ParseError('m'), 'PARSE_ERROR', 'ParseError'],
      [new UsageError('m'), 'USAGE', 'UsageError'],
      [new FetchFailureError({ book: 'Ruth', chapter: 1 }, 'm'), 'FETCH_FAILURE', 'FetchFailureError'],
    ])('%s has its code and name', (err, code, name) => {
      expect(err).toBeInstanceOf(HornerPlanError);
      expect(err.code).toBe(code);
      expect(err.name).toBe(name);
      expect(err.message).toBe('m');
    });

    it('FetchFailureError keeps reading and status', () => {
      const err = new FetchFailureError({ book: 'Ruth', chapter: 1 }, 'm', 404);
      expect(err.reading).toEqual({ book: 'Ruth', chapter: 1 });
      expect(err.status).toBe(404);
    });
  });

  describe('4. Translations', () => {
    it('isTranslation checks the fixed set', () => {
      expect(isTranslation('NASB1995')).toBe(true);
      expect(isTranslation('esv')).toBe(false);
      expect(isTranslation(3)).toBe(false);
    });

    it('parseTranslation returns a UsageError for others', () => {
      const r = parseTranslation('NRSV');
      expect(r.ok).toBe(false);
      if (!r.ok) expect(r.error).toBeInstanceOf(UsageError);
    });
  });
});
