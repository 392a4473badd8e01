import type { CalendarDate, TimedEvent } from './status-board.types';
import { isSameDate } from './zoned-time';

type Selectable = Pick<TimedEvent, 'userId' | 'instant' | 'localDate'>;

/** Newest first; `Array.prototype.sort` is stable so equal instants keep input order. */
export const sortNewestFirst = <T extends Selectable>(events: readonly T[]): T[] =>
  [...events].sort((a, b) => b.instant - a.instant);

export const latestPerUser = <T extends Selectable>(events: readonly T[]): T[] => {
  const seen = new Set<string>();
  return sortNewestFirst(events).filter((event) => {
    if (seen.has(event.userId)) {
      return false;
    }
    seen.add(event.userId);
    return true;
  });
};

/**
 * Latest record per user, taking today's records first: a user with any
 * activity today is represented by today's newest event, everyone else by
 * their newest event overall.
 */
export const latestPerUserPreferringToday = <T extends Selectable>(
  events: readonly T[],
  today: CalendarDate,
): T[] => {
  const todays = events.filter((event) => isSameDate(event.localDate, today));
  const earlier = events.filter((event) => !isSameDate(event.localDate, today));

  const fromToday = latestPerUser(todays);
  const coveredUsers = new Set(fromToday.map((event) => event.userId));
  const fallback = latestPerUser(earlier).filter(
    (event) => !coveredUsers.has(event.userId),
  );

  return sortNewestFirst([...fromToday, ...fallback]);
};

export interface SelectionOptions {
  preferToday: boolean;
  today: CalendarDate;
}

export const selectLatestRecords = <T extends Selectable>(
  events: readonly T[],
  options: SelectionOptions,
): T[] =>
  options.preferToday
    ? latestPerUserPreferringToday(events, options.today)
    : latestPerUser(events);
