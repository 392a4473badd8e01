import type { LocalDateTime } from './status-board.types';
import { isValidLocalDateTime } from './zoned-time';

export interface ParsedTimestamp {
  local: LocalDateTime;
  /** Explicit UTC offset carried by the string, in milliseconds. */
  offsetMs: number | null;
}

const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// 06/01/2026 09:15:00 IST
const LEGACY_DAY_FIRST =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})[ T]+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+\S+)?$/;

const DATE_YEAR_FIRST = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const DATE_DAY_FIRST = /^(\d{1,2})[-/](\d{1,2})[-/](\d{4})$/;
const CLOCK_TIME =
  /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(?:\s*(AM|PM))?(?:\s+[A-Za-z][\w/+-]*)?$/i;

const toMilliseconds = (fraction: string | undefined): number =>
  fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;

const parseOffset = (value: string): number => {
  if (value.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = value.startsWith('-') ? -1 : 1;
  const digits = value.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes) * 60000;
};

const validated = (
  local: LocalDateTime,
  offsetMs: number | null,
): ParsedTimestamp | null =>
  isValidLocalDateTime(local) ? { local, offsetMs } : null;

/** `YYYY-MM-DD[(T| )HH:MM[:SS[.fff]]][Z|±HH:MM]` */
export const parseIsoLike = (value: string): ParsedTimestamp | null => {
  const match = ISO_LIKE.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  return validated(
    {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: hour ? Number(hour) : 0,
      minute: minute ? Number(minute) : 0,
      second: second ? Number(second) : 0,
      millisecond: toMilliseconds(fraction),
    },
    offset ? parseOffset(offset) : null,
  );
};

/** `DD/MM/YYYY HH:MM[:SS] <label>`; the trailing zone label is discarded. */
export const parseLegacyDateTime = (value: string): ParsedTimestamp | null => {
  const match = LEGACY_DAY_FIRST.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, day, month, year, hour, minute, second] = match;
  return validated(
    {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: second ? Number(second) : 0,
      millisecond: 0,
    },
    null,
  );
};

/** Separate date (`YYYY-MM-DD`, `DD-MM-YYYY` or `DD/MM/YYYY`) and clock time fields. */
export const parseDateAndTime = (
  date: string,
  time: string,
): ParsedTimestamp | null => {
  const trimmedDate = date.trim();
  const yearFirst = DATE_YEAR_FIRST.exec(trimmedDate);
  const dayFirst = yearFirst ? null : DATE_DAY_FIRST.exec(trimmedDate);
  const clock = CLOCK_TIME.exec(time.trim());

  if (!clock || (!yearFirst && !dayFirst)) {
    return null;
  }

  let year: number;
  let month: number;
  let day: number;
  if (yearFirst) {
    [year, month, day] = [yearFirst[1], yearFirst[2], yearFirst[3]].map(Number);
  } else if (dayFirst) {
    [day, month, year] = [dayFirst[1], dayFirst[2], dayFirst[3]].map(Number);
  } else {
    return null;
  }

  const [, rawHour, minute, second, fraction, meridiem] = clock;
  let hour = Number(rawHour);
  if (meridiem) {
    if (hour < 1 || hour > 12) {
      return null;
    }
    const isPm = meridiem.toUpperCase() === 'PM';
    hour = (hour % 12) + (isPm ? 12 : 0);
  }

  return validated(
    {
      year,
      month,
      day,
      hour,
      minute: Number(minute),
      second: second ? Number(second) : 0,
      millisecond: toMilliseconds(fraction),
    },
    null,
  );
};
