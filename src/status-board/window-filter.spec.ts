import type { CalendarDate } from './status-board.types';
import {
  applyWindow,
  computeAnchoredWindow,
  computeWindow,
  resolveWindowMode,
} from './window-filter';

const date = (day: number, month = 1, year = 2026): CalendarDate => ({
  year,
  month,
  day,
});

describe('window filter', () => {
  describe('computeAnchoredWindow', () => {
    it('runs from the last Friday to today mid-week', () => {
      // 2026-01-07 is a Wednesday.
      expect(computeAnchoredWindow(date(7), 'friday', false)).toEqual({
        start: date(2),
        end: date(7),
      });
    });

    it('closes the window three days after the anchor on Monday', () => {
      const window = computeAnchoredWindow(date(5), 'friday', false);
      expect(window).toEqual({ start: date(2), end: date(5) });
    });

    it('stays on today when today is the anchor day unless rollback is enabled', () => {
      expect(computeAnchoredWindow(date(9), 'friday', false)).toEqual({
        start: date(9),
        end: date(9),
      });
      expect(computeAnchoredWindow(date(9), 'friday', true)).toEqual({
        start: date(2),
        end: date(9),
      });
    });

    it('crosses month boundaries', () => {
      // 2026-01-03 is a Saturday; the previous Friday is 2026-01-02.
      expect(computeAnchoredWindow(date(3), 'friday', false)).toEqual({
        start: date(2),
        end: date(3),
      });
      // 2026-01-01 is a Thursday; the previous Friday is 2025-12-26.
      expect(computeAnchoredWindow(date(1), 'friday', false)).toEqual({
        start: date(26, 12, 2025),
        end: date(1),
      });
    });

    it('supports other anchor weekdays', () => {
      // Monday anchor: Thursday 2026-01-08 closes the nominal span.
      expect(computeAnchoredWindow(date(8), 'monday', false)).toEqual({
        start: date(5),
        end: date(8),
      });
    });
  });

  it('reports bounds per mode', () => {
    const base = { today: date(7), anchorWeekday: 'friday' as const, rollbackOnAnchorDay: false };

    expect(computeWindow({ ...base, mode: 'none' })).toBeNull();
    expect(computeWindow({ ...base, mode: 'today-only' })).toEqual({
      mode: 'today-only',
      start: date(7),
      end: date(7),
    });
    expect(computeWindow({ ...base, mode: 'friday-to-today' })).toEqual({
      mode: 'friday-to-today',
      start: date(2),
      end: date(7),
    });
  });

  it('gives the today-only toggle precedence', () => {
    expect(resolveWindowMode({ anchored: true, todayOnly: true })).toBe('today-only');
    expect(resolveWindowMode({ anchored: true, todayOnly: false })).toBe('friday-to-today');
    expect(resolveWindowMode({ anchored: false, todayOnly: false })).toBe('none');
  });

  describe('applyWindow', () => {
    const events = [
      { id: 'before', localDate: date(1) },
      { id: 'start', localDate: date(2) },
      { id: 'middle', localDate: date(5) },
      { id: 'today', localDate: date(7) },
      { id: 'after', localDate: date(8) },
    ];
    const base = { today: date(7), anchorWeekday: 'friday' as const, rollbackOnAnchorDay: false };

    it('keeps records inside the inclusive bounds', () => {
      const result = applyWindow(events, { ...base, mode: 'friday-to-today' });
      expect(result.events.map((event) => event.id)).toEqual(['start', 'middle', 'today']);
    });

    it('keeps only today in today-only mode', () => {
      const result = applyWindow(events, { ...base, mode: 'today-only' });
      expect(result.events.map((event) => event.id)).toEqual(['today']);
    });

    it('keeps everything without a window', () => {
      const result = applyWindow(events, { ...base, mode: 'none' });
      expect(result.events).toHaveLength(5);
      expect(result.window).toBeNull();
    });
  });
});
