import type { CalendarDate, LocalDateTime } from './status-board.types';

const MS_PER_SECOND = 1000;
const MS_PER_DAY = 24 * 60 * 60 * MS_PER_SECOND;

const formatters = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

export type LocalResolution =
  | { kind: 'exact'; instant: number }
  | { kind: 'shifted'; instant: number }
  | { kind: 'ambiguous'; candidates: [number, number] };

/** Wall-clock reading of `instant` in `timeZone`. */
export const getZonedDateTime = (
  instant: number,
  timeZone: string,
): LocalDateTime => {
  const values: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }

  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour === 24 ? 0 : values.hour,
    minute: values.minute,
    second: values.second,
    millisecond: ((instant % MS_PER_SECOND) + MS_PER_SECOND) % MS_PER_SECOND,
  };
};

export const wallClockAsUtc = (local: LocalDateTime): number =>
  Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second,
    local.millisecond,
  );

/** Offset of `timeZone` from UTC at `instant`, in milliseconds. */
export const getOffsetMs = (instant: number, timeZone: string): number =>
  wallClockAsUtc(getZonedDateTime(instant, timeZone)) - instant;

export const isValidLocalDateTime = (local: LocalDateTime): boolean => {
  if (
    !Number.isInteger(local.year) ||
    local.month < 1 ||
    local.month > 12 ||
    local.day < 1 ||
    local.day > daysInMonth(local.year, local.month)
  ) {
    return false;
  }

  return (
    local.hour >= 0 &&
    local.hour <= 23 &&
    local.minute >= 0 &&
    local.minute <= 59 &&
    local.second >= 0 &&
    local.second <= 59 &&
    local.millisecond >= 0 &&
    local.millisecond <= 999
  );
};

/**
 * Maps a wall-clock reading in `timeZone` to an absolute instant.
 *
 * Readings that fall in a clock-forward gap are moved to the first instant
 * after the gap. Readings that occur twice (clock-back fold) are reported as
 * ambiguous with both candidates.
 */
export const resolveLocalDateTime = (
  local: LocalDateTime,
  timeZone: string,
): LocalResolution => {
  const naive = wallClockAsUtc(local);
  const before = getOffsetMs(naive - MS_PER_DAY, timeZone);
  const after = getOffsetMs(naive + MS_PER_DAY, timeZone);
  const offsets = new Set([before, getOffsetMs(naive, timeZone), after]);

  const matches = Array.from(offsets)
    .map((offset) => naive - offset)
    .filter((candidate) => getOffsetMs(candidate, timeZone) === naive - candidate)
    .sort((a, b) => a - b);
  const unique = Array.from(new Set(matches));

  if (unique.length === 1) {
    return { kind: 'exact', instant: unique[0] };
  }
  if (unique.length > 1) {
    return { kind: 'ambiguous', candidates: [unique[0], unique[unique.length - 1]] };
  }

  // Gap: the transition instant lies between the two readings of the wall clock.
  let low = Math.floor((naive - after) / MS_PER_SECOND);
  let high = Math.ceil((naive - before) / MS_PER_SECOND);
  while (high - low > 1) {
    const middle = Math.floor((low + high) / 2);
    if (getOffsetMs(middle * MS_PER_SECOND, timeZone) === after) {
      high = middle;
    } else {
      low = middle;
    }
  }
  return { kind: 'shifted', instant: high * MS_PER_SECOND };
};

export const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

export const toEpochDay = (date: CalendarDate): number =>
  Math.floor(Date.UTC(date.year, date.month - 1, date.day) / MS_PER_DAY);

export const fromEpochDay = (epochDay: number): CalendarDate => {
  const value = new Date(epochDay * MS_PER_DAY);
  return {
    year: value.getUTCFullYear(),
    month: value.getUTCMonth() + 1,
    day: value.getUTCDate(),
  };
};

export const addDays = (date: CalendarDate, days: number): CalendarDate =>
  fromEpochDay(toEpochDay(date) + days);

export const compareDates = (a: CalendarDate, b: CalendarDate): number =>
  toEpochDay(a) - toEpochDay(b);

export const isSameDate = (a: CalendarDate, b: CalendarDate): boolean =>
  compareDates(a, b) === 0;

/** 0 = Sunday … 6 = Saturday. */
export const weekdayIndex = (date: CalendarDate): number =>
  new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();

export const todayIn = (now: Date, timeZone: string): CalendarDate => {
  const { year, month, day } = getZonedDateTime(now.getTime(), timeZone);
  return { year, month, day };
};

const pad = (value: number, width = 2): string =>
  String(Math.abs(value)).padStart(width, '0');

/** `DD-MM-YYYY` */
export const formatDisplayDate = (date: CalendarDate): string =>
  `${pad(date.day)}-${pad(date.month)}-${pad(date.year, 4)}`;

/** `HH:MM:SS` */
export const formatClockTime = (time: {
  hour: number;
  minute: number;
  second: number;
}): string => `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;

/** ISO-8601 with the zone's offset, e.g. `2026-01-06T09:00:00+05:30`. */
export const formatZonedIso = (instant: number, timeZone: string): string => {
  const local = getZonedDateTime(instant, timeZone);
  const offsetMinutes = Math.round(getOffsetMs(instant, timeZone) / 60000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);

  return (
    `${pad(local.year, 4)}-${pad(local.month)}-${pad(local.day)}` +
    `T${formatClockTime(local)}` +
    `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`
  );
};
