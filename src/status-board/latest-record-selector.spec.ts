import {
  latestPerUser,
  latestPerUserPreferringToday,
  selectLatestRecords,
  sortNewestFirst,
} from './latest-record-selector';

const today = { year: 2026, month: 1, day: 7 };

const record = (id: string, userId: string, instant: number, day = 7) => ({
  id,
  userId,
  instant,
  localDate: { year: 2026, month: 1, day },
});

describe('latest record selector', () => {
  it('keeps the newest record per user', () => {
    const records = [
      record('u1-t1', 'U1', 100),
      record('u1-t3', 'U1', 300),
      record('u2-t2', 'U2', 200),
      record('u1-t2', 'U1', 200),
    ];

    expect(latestPerUser(records).map((row) => row.id)).toEqual(['u1-t3', 'u2-t2']);
  });

  it('breaks ties by input order', () => {
    const records = [
      record('first', 'U1', 100),
      record('second', 'U1', 100),
      record('other', 'U2', 100),
    ];

    expect(sortNewestFirst(records).map((row) => row.id)).toEqual([
      'first',
      'second',
      'other',
    ]);
    expect(latestPerUser(records).map((row) => row.id)).toEqual(['first', 'other']);
  });

  it('does not reorder its input', () => {
    const records = [record('a', 'U1', 100), record('b', 'U1', 200)];
    latestPerUser(records);
    expect(records.map((row) => row.id)).toEqual(['a', 'b']);
  });

  describe('prefer today', () => {
    const records = [
      record('u1-today', 'U1', 1000, 7),
      // Mis-dated into the future; newer but not today.
      record('u1-tomorrow', 'U1', 5000, 8),
      record('u2-yesterday', 'U2', 500, 6),
      record('u2-older', 'U2', 100, 5),
      record('u3-today-early', 'U3', 900, 7),
      record('u3-today-late', 'U3', 1100, 7),
    ];

    it('represents users active today by their newest event today', () => {
      expect(latestPerUserPreferringToday(records, today).map((row) => row.id)).toEqual([
        'u3-today-late',
        'u1-today',
        'u2-yesterday',
      ]);
    });

    it('differs from the default selection only for users active today', () => {
      expect(
        selectLatestRecords(records, { preferToday: false, today }).map((row) => row.id),
      ).toEqual(['u1-tomorrow', 'u3-today-late', 'u2-yesterday']);
    });
  });
});
