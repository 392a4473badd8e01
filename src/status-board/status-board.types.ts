export const EVENT_TYPES = [
  'Punch In',
  'Break Start',
  'Break End',
  'Punch Out',
  'On Leave',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type DisplayStatus =
  | 'active'
  | 'on break'
  | 'on leave'
  | 'left for the day'
  | 'unknown';

export type WorkMode = 'In Office' | 'Work from home' | 'Unknown';

export type AmbiguityPolicy = 'assume-utc' | 'assume-local' | 'tag-or-utc';

export const VIEW_MODES = ['latest-per-user', 'all-events'] as const;
export type ViewMode = (typeof VIEW_MODES)[number];

export const WINDOW_MODES = ['friday-to-today', 'today-only', 'none'] as const;
export type WindowMode = (typeof WINDOW_MODES)[number];

export const WEEKDAYS = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
] as const;
export type Weekday = (typeof WEEKDAYS)[number];

export type TimestampEncoding = 'sort_key' | 'datetime' | 'datetime_iso' | 'date+time';

export type DropReason =
  | 'invalid-record'
  | 'missing-user-id'
  | 'missing-timestamp'
  | 'unparseable-timestamp'
  | 'ambiguous-local-time';

/** A civil calendar date with a 1-based month. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface LocalDateTime extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

/** A raw record after shape validation, before its timestamp is resolved. */
export interface RawEvent {
  userId: string;
  name: string;
  event: string;
  note: string;
  isAtApprovedLocation: boolean | null;
  timezone: string | null;
  sortKey: string | null;
  datetime: string | null;
  datetimeIso: string | null;
  date: string | null;
  time: string | null;
}

export interface TimedEvent extends RawEvent {
  /** Position of the record in the loaded batch. */
  sourceIndex: number;
  /** Epoch milliseconds. */
  instant: number;
  encoding: TimestampEncoding;
  localDate: CalendarDate;
  localTime: { hour: number; minute: number; second: number };
}

export interface NormalizedEvent extends TimedEvent {
  displayStatus: DisplayStatus;
  workMode: WorkMode;
  displayDate: string;
  displayTime: string;
}

export interface DroppedRecord {
  index: number;
  reason: DropReason;
  encoding?: TimestampEncoding;
}

export interface ViewRow {
  userId: string;
  name: string;
  nameAndStatus: string;
  status: DisplayStatus;
  workMode: WorkMode;
  date: string;
  event: string;
  time: string;
  instant: string;
}

export interface WindowBounds {
  mode: Exclude<WindowMode, 'none'>;
  start: CalendarDate;
  end: CalendarDate;
}

export interface DisplayZone {
  timeZone: string;
  label: string;
}
