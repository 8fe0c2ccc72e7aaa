/**
 * Segment 05: Bookmark Store
 *
 * The day index advances at most once per calendar day; a settings save
 * rewrites the translation without moving the day.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  createBookmark,
  elapsedDays,
  nextDayIndex,
  storedDayIndex,
  advanceBookmark,
  createMockBookmarkAdapter,
  createBookmarkStore,
  type Bookmark,
  type MockBookmarkAdapter,
} from '../src/bookmark';
import { MissingTranslationError } from '../src/errors';
import { parseDateTime, addDays, dateOf, makeDateTime, timeOf, type LocalDateTime } from '../src/time-date';

function datetime(s: string): LocalDateTime {
  const r = parseDateTime(s);
  if (!r.ok) throw new Error(`Invalid test datetime: ${s}`);
  return r.value;
}

function daysLater(dt: LocalDateTime, n: number): LocalDateTime {
  return makeDateTime(addDays(dateOf(dt), n), timeOf(dt));
}

/** A clock that returns whatever `now` is set to. */
function controllableClock(start: LocalDateTime) {
  const state = { now: start };
  return { state, clock: () => state.now };
}

describe('Segment 05: Bookmark Store', () => {
  const morning = datetime('2024-03-01T07:00:00');

  describe('1. Pure rollover rule', () => {
    const bookmark: Bookmark = { dayIndex: 10, lastUpdated: morning, translation: 'ESV' };

    it('createBookmark starts at day 0', () => {
      const r = createBookmark('ESV', morning);
      expect(r.ok && r.value).toEqual({ dayIndex: 0, lastUpdated: morning, translation: 'ESV' });
    });

    it('createBookmark without a translation fails', () => {
      const r = createBookmark(undefined, morning);
      expect(r.ok).toBe(false);
      if (!r.ok) expect(r.error).toBeInstanceOf(MissingTranslationError);
    });

    it('elapsedDays ignores time of day', () => {
      const late = { ...bookmark, lastUpdated: datetime('2024-03-01T23:59:59') };
      expect(elapsedDays(late, datetime('2024-03-02T00:00:01'))).toBe(1);
      expect(elapsedDays(bookmark, datetime('2024-03-01T23:59:59'))).toBe(0);
    });

    it('nextDayIndex increments and wraps after the last day', () => {
      expect(nextDayIndex(0)).toBe(1);
      expect(nextDayIndex(363)).toBe(364);
      expect(nextDayIndex(364)).toBe(0);
      expect(nextDayIndex(365)).toBe(0);
    });

    it('storedDayIndex reads 365 as day 0 and rejects larger values', () => {
      expect(storedDayIndex(0)).toBe(0);
      expect(storedDayIndex(364)).toBe(364);
      expect(storedDayIndex(365)).toBe(0);
      expect(storedDayIndex(366)).toBeNull();
      expect(storedDayIndex(-1)).toBeNull();
      expect(storedDayIndex(2.5)).toBeNull();
    });

    it('same day without force leaves the record alone', () => {
      const r = advanceBookmark(bookmark, { now: datetime('2024-03-01T21:00:00'), forceSave: false });
      expect(r.ok && r.value).toEqual({ bookmark, advanced: false, saved: false });
    });

    it('a later day advances by one', () => {
      const now = datetime('2024-03-02T06:00:00');
      const r = advanceBookmark(bookmark, { now, forceSave: false });
      expect(r.ok && r.value).toEqual({
        bookmark: { dayIndex: 11, lastUpdated: now, translation: 'ESV' },
        advanced: true,
        saved: true,
      });
    });

    it('several missed days still advance by one', () => {
      const r = advanceBookmark(bookmark, { now: datetime('2024-03-09T06:00:00'), forceSave: false });
      expect(r.ok && r.value.bookmark.dayIndex).toBe(11);
    });

    it('a clock moved backwards does not advance', () => {
      const r = advanceBookmark(bookmark, { now: datetime('2024-02-27T06:00:00'), forceSave: false });
      expect(r.ok && r.value.saved).toBe(false);
    });

    it('force save on the same day changes translation and timestamp only', () => {
      const now = datetime('2024-03-01T20:00:00');
      const r = advanceBookmark(bookmark, { now, forceSave: true, requestedTranslation: 'KJV' });
      expect(r.ok && r.value).toEqual({
        bookmark: { dayIndex: 10, lastUpdated: now, translation: 'KJV' },
        advanced: false,
        saved: true,
      });
    });

    it('force save on a later day also advances', () => {
      const now = datetime('2024-03-02T20:00:00');
      const r = advanceBookmark(bookmark, { now, forceSave: true, requestedTranslation: 'NIV' });
      expect(r.ok && r.value.bookmark).toEqual({ dayIndex: 11, lastUpdated: now, translation: 'NIV' });
    });

    it('force save without a translation fails', () => {
      const r = advanceBookmark(bookmark, { now: morning, forceSave: true });
      expect(r.ok).toBe(false);
      if (!r.ok) {
        expect(r.error.message).toBe('Cannot save settings without a translation; pass one with --translation');
      }
    });

    it('an unforced translation request is not persisted', () => {
      const r = advanceBookmark(bookmark, {
        now: datetime('2024-03-02T06:00:00'),
        forceSave: false,
        requestedTranslation: 'ASV',
      });
      expect(r.ok && r.value.bookmark.translation).toBe('ESV');
    });
  });

  describe('2. Store with mock adapter', () => {
    let adapter: MockBookmarkAdapter;

    beforeEach(() => {
      adapter = createMockBookmarkAdapter();
    });

    it('bootstraps a missing bookmark', async () => {
      const store = createBookmarkStore(adapter, { clock: () => morning });
      const result = await store.sync({ requestedTranslation: 'ESV' });
      expect(result.action).toBe('created');
      expect(adapter.saves).toEqual([{ dayIndex: 0, lastUpdated: morning, translation: 'ESV' }]);
      expect(store.getDayIndex()).toBe(0);
      expect(store.getTranslation()).toBe('ESV');
    });

    it('refuses to bootstrap without a translation', async () => {
      const store = createBookmarkStore(adapter, { clock: () => morning });
      await expect(store.sync()).rejects.toBeInstanceOf(MissingTranslationError);
      expect(adapter.saves).toEqual([]);
    });

    it('second run on the same day does not write', async () => {
      const { state, clock } = controllableClock(morning);
      const store = createBookmarkStore(adapter, { clock });
      await store.sync({ requestedTranslation: 'ESV' });

      state.now = datetime('2024-03-01T22:30:00');
      const result = await store.sync();
      expect(result.action).toBe('unchanged');
      expect(store.getDayIndex()).toBe(0);
      expect(adapter.saves).toHaveLength(1);
    });

    it('run on the next day advances to 1', async () => {
      const { state, clock } = controllableClock(morning);
      const store = createBookmarkStore(adapter, { clock });
      await store.sync({ requestedTranslation: 'ESV' });

      state.now = datetime('2024-03-02T05:00:00');
      const result = await store.sync();
      expect(result.action).toBe('advanced');
      expect(store.getDayIndex()).toBe(1);
      expect(adapter.saves[1]).toEqual({ dayIndex: 1, lastUpdated: state.now, translation: 'ESV' });
    });

    it('force save keeps the day and records the new translation', async () => {
      const { state, clock } = controllableClock(morning);
      const store = createBookmarkStore(adapter, { clock });
      await store.sync({ requestedTranslation: 'ESV' });

      state.now = datetime('2024-03-01T12:00:00');
      const result = await store.sync({ requestedTranslation: 'NKJV', forceSave: true });
      expect(result.action).toBe('saved');
      expect(result.bookmark).toEqual({ dayIndex: 0, lastUpdated: state.now, translation: 'NKJV' });
    });

    it('365 daily advances return to day 0', async () => {
      const { state, clock } = controllableClock(morning);
      const store = createBookmarkStore(adapter, { clock });
      await store.sync({ requestedTranslation: 'ESV' });

      const seen: number[] = [];
      for (let i = 1; i <= 365; i++) {
        state.now = daysLater(morning, i);
        await store.sync();
        seen.push(store.getDayIndex());
      }
      expect(seen[0]).toBe(1);
      expect(seen[363]).toBe(364);
      expect(seen[364]).toBe(0);
      expect(Math.max(...seen)).toBe(364);
    });

    it('accessors throw before the first sync', () => {
      const store = createBookmarkStore(adapter);
      expect(store.getBookmark()).toBeNull();
      expect(() => store.getDayIndex()).toThrow('Bookmark has not been loaded; call sync() first');
    });

    it('continues from an existing record', async () => {
      const existing = createMockBookmarkAdapter({
        dayIndex: 200,
        lastUpdated: datetime('2024-02-28T09:00:00'),
        translation: 'ASV',
      });
      const store = createBookmarkStore(existing, { clock: () => morning });
      const result = await store.sync({ requestedTranslation: 'KJV' });
      expect(result.bookmark).toEqual({ dayIndex: 201, lastUpdated: morning, translation: 'ASV' });
    });
  });
});
