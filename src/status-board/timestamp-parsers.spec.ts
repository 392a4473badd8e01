import {
  parseDateAndTime,
  parseIsoLike,
  parseLegacyDateTime,
} from './timestamp-parsers';

describe('timestamp parsers', () => {
  describe('parseIsoLike', () => {
    it('parses a naive timestamp without an offset', () => {
      expect(parseIsoLike('2026-01-06T09:15:00')).toEqual({
        local: {
          year: 2026,
          month: 1,
          day: 6,
          hour: 9,
          minute: 15,
          second: 0,
          millisecond: 0,
        },
        offsetMs: null,
      });
    });

    it('reads fractions and explicit offsets', () => {
      const parsed = parseIsoLike('2026-01-06 09:15:00.5+05:30');
      expect(parsed?.local.millisecond).toBe(500);
      expect(parsed?.offsetMs).toBe(19800000);
      expect(parseIsoLike('2026-01-06T09:15:00+0530')?.offsetMs).toBe(19800000);
      expect(parseIsoLike('2026-01-06T09:15:00Z')?.offsetMs).toBe(0);
      expect(parseIsoLike('2026-01-06T09:15:00-04:00')?.offsetMs).toBe(-14400000);
    });

    it('treats a bare date as midnight', () => {
      expect(parseIsoLike('2026-01-06')?.local).toEqual({
        year: 2026,
        month: 1,
        day: 6,
        hour: 0,
        minute: 0,
        second: 0,
        millisecond: 0,
      });
    });

    it('rejects malformed or impossible values', () => {
      expect(parseIsoLike('2026-13-06T09:15:00')).toBeNull();
      expect(parseIsoLike('2026-02-30T09:15:00')).toBeNull();
      expect(parseIsoLike('06/01/2026 09:15:00')).toBeNull();
      expect(parseIsoLike('yesterday')).toBeNull();
    });
  });

  describe('parseLegacyDateTime', () => {
    it('parses day-first values and drops the zone label', () => {
      expect(parseLegacyDateTime('06/01/2026 18:45:10 IST')?.local).toEqual({
        year: 2026,
        month: 1,
        day: 6,
        hour: 18,
        minute: 45,
        second: 10,
        millisecond: 0,
      });
      expect(parseLegacyDateTime('6/1/2026 8:05')?.local).toMatchObject({
        day: 6,
        month: 1,
        hour: 8,
        minute: 5,
        second: 0,
      });
    });

    it('discards any trailing zone label', () => {
      expect(parseLegacyDateTime('06/01/2026 18:45:10 GMT+05:30')?.local).toMatchObject({
        day: 6,
        hour: 18,
        minute: 45,
        second: 10,
      });
      expect(parseLegacyDateTime('06/01/2026 18:45 Asia/Kolkata')?.offsetMs).toBeNull();
    });

    it('rejects impossible dates', () => {
      expect(parseLegacyDateTime('31/04/2026 10:00:00 IST')).toBeNull();
      expect(parseLegacyDateTime('2026-01-06T10:00:00')).toBeNull();
    });
  });

  describe('parseDateAndTime', () => {
    it('accepts year-first and day-first dates', () => {
      expect(parseDateAndTime('2026-01-05', '10:15:00')?.local).toMatchObject({
        year: 2026,
        month: 1,
        day: 5,
        hour: 10,
        minute: 15,
      });
      expect(parseDateAndTime('05-01-2026', '9:05')?.local).toMatchObject({
        year: 2026,
        month: 1,
        day: 5,
        hour: 9,
        minute: 5,
        second: 0,
      });
    });

    it('converts twelve-hour clock times', () => {
      expect(parseDateAndTime('05/01/2026', '06:30 PM')?.local.hour).toBe(18);
      expect(parseDateAndTime('05/01/2026', '12:10 AM')?.local.hour).toBe(0);
    });

    it('rejects invalid clock values', () => {
      expect(parseDateAndTime('2026-01-05', '25:00')).toBeNull();
      expect(parseDateAndTime('2026-01-05', '13:00 PM')).toBeNull();
      expect(parseDateAndTime('Jan 5', '10:00')).toBeNull();
    });
  });
});
