import type {
  CalendarDate,
  TimedEvent,
  Weekday,
  WindowBounds,
  WindowMode,
} from './status-board.types';
import { WEEKDAYS } from './status-board.types';
import { addDays, compareDates, weekdayIndex } from './zoned-time';

/** Days from the anchor day to the day that closes the nominal window (Fri → Mon). */
const NOMINAL_SPAN_DAYS = 3;

export interface WindowOptions {
  mode: WindowMode;
  today: CalendarDate;
  anchorWeekday: Weekday;
  rollbackOnAnchorDay: boolean;
}

export interface WindowedEvents<T> {
  events: T[];
  window: WindowBounds | null;
}

/**
 * Picks the effective mode when both toggles are on; the today-only view
 * takes precedence over the anchored window.
 */
export const resolveWindowMode = (toggles: {
  anchored: boolean;
  todayOnly: boolean;
}): WindowMode => {
  if (toggles.todayOnly) {
    return 'today-only';
  }
  return toggles.anchored ? 'friday-to-today' : 'none';
};

export const computeAnchoredWindow = (
  today: CalendarDate,
  anchorWeekday: Weekday,
  rollbackOnAnchorDay: boolean,
): { start: CalendarDate; end: CalendarDate } => {
  const anchorIndex = WEEKDAYS.indexOf(anchorWeekday);
  const todayIndex = weekdayIndex(today);
  let daysSinceAnchor = (todayIndex - anchorIndex + 7) % 7;
  if (daysSinceAnchor === 0 && rollbackOnAnchorDay) {
    daysSinceAnchor = 7;
  }

  const start = addDays(today, -daysSinceAnchor);
  const closesNominalSpan = todayIndex === (anchorIndex + NOMINAL_SPAN_DAYS) % 7;
  const end = closesNominalSpan ? addDays(start, NOMINAL_SPAN_DAYS) : today;

  return { start, end };
};

export const computeWindow = (options: WindowOptions): WindowBounds | null => {
  switch (options.mode) {
    case 'none':
      return null;
    case 'today-only':
      return { mode: 'today-only', start: options.today, end: options.today };
    case 'friday-to-today':
      return {
        mode: 'friday-to-today',
        ...computeAnchoredWindow(
          options.today,
          options.anchorWeekday,
          options.rollbackOnAnchorDay,
        ),
      };
  }
};

export const isWithinWindow = (date: CalendarDate, window: WindowBounds): boolean =>
  compareDates(date, window.start) >= 0 && compareDates(date, window.end) <= 0;

export const applyWindow = <T extends Pick<TimedEvent, 'localDate'>>(
  events: readonly T[],
  options: WindowOptions,
): WindowedEvents<T> => {
  const window = computeWindow(options);
  if (!window) {
    return { events: [...events], window: null };
  }

  return {
    events: events.filter((event) => isWithinWindow(event.localDate, window)),
    window,
  };
};
