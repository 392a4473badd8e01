import {
  classifyStatus,
  classifyWorkMode,
  composeNameAndStatus,
} from './status-classifier';
import type {
  AmbiguityPolicy,
  CalendarDate,
  DisplayZone,
  DropReason,
  DroppedRecord,
  NormalizedEvent,
  TimedEvent,
  ViewMode,
  ViewRow,
  Weekday,
  WindowBounds,
  WindowMode,
} from './status-board.types';
import { NormalizationResult, normalizeEvents } from './timestamp-normalizer';
import { selectLatestRecords, sortNewestFirst } from './latest-record-selector';
import { applyWindow } from './window-filter';
import {
  formatClockTime,
  formatDisplayDate,
  formatZonedIso,
  todayIn,
} from './zoned-time';

export const VIEW_COLUMNS = [
  'Name & Status',
  'Work mode',
  'Date',
  'Event',
  'Time',
] as const;

export interface ViewOptions {
  zone: DisplayZone;
  policy: AmbiguityPolicy;
  view: ViewMode;
  window: WindowMode;
  anchorWeekday: Weekday;
  rollbackOnAnchorDay: boolean;
  preferToday: boolean;
  leftForDayMarker: string;
}

export interface StatusViewSummary {
  totalRecords: number;
  normalizedRecords: number;
  droppedRecords: number;
  droppedByReason: Partial<Record<DropReason, number>>;
  windowedRecords: number;
  rowCount: number;
  window: { mode: WindowBounds['mode']; start: string; end: string } | null;
  earliestInstant: string | null;
  latestInstant: string | null;
  lastEventAt: string | null;
  timeZone: string;
  timeZoneLabel: string;
  caption: string;
}

export interface StatusView {
  view: ViewMode;
  columns: readonly string[];
  rows: ViewRow[];
  summary: StatusViewSummary;
}

export const toNormalizedEvent = (
  event: TimedEvent,
  zone: DisplayZone,
  context: { today: CalendarDate; leftForDayMarker: string },
): NormalizedEvent => ({
  ...event,
  displayStatus: classifyStatus(event, context),
  workMode: classifyWorkMode(event.isAtApprovedLocation),
  displayDate: formatDisplayDate(event.localDate),
  displayTime: `${formatClockTime(event.localTime)} ${zone.label}`,
});

export const toViewRow = (event: NormalizedEvent, zone: DisplayZone): ViewRow => ({
  userId: event.userId,
  name: event.name,
  nameAndStatus: composeNameAndStatus(event.name, event.displayStatus),
  status: event.displayStatus,
  workMode: event.workMode,
  date: event.displayDate,
  event: event.event,
  time: event.displayTime,
  instant: formatZonedIso(event.instant, zone.timeZone),
});

const countByReason = (
  dropped: readonly DroppedRecord[],
): Partial<Record<DropReason, number>> =>
  dropped.reduce<Partial<Record<DropReason, number>>>((counts, record) => {
    counts[record.reason] = (counts[record.reason] ?? 0) + 1;
    return counts;
  }, {});

const newestInstant = (events: readonly { instant: number }[]): number | null =>
  events.reduce<number | null>(
    (latest, event) => (latest === null || event.instant > latest ? event.instant : latest),
    null,
  );

const oldestInstant = (events: readonly { instant: number }[]): number | null =>
  events.reduce<number | null>(
    (earliest, event) =>
      earliest === null || event.instant < earliest ? event.instant : earliest,
    null,
  );

const buildCaption = (
  view: ViewMode,
  zone: DisplayZone,
  window: StatusViewSummary['window'],
): string => {
  const subject =
    view === 'latest-per-user' ? 'Shows the latest status per user' : 'Shows all events';
  const base = `${subject} — ${zone.label} (${zone.timeZone}).`;
  if (!window) {
    return base;
  }
  return window.mode === 'today-only'
    ? `${base} (today: ${window.start})`
    : `${base} (window: ${window.start} → ${window.end})`;
};

/** Classifies, windows and selects already-normalized events into one view. */
export const assembleView = (
  normalized: NormalizationResult,
  totalRecords: number,
  now: Date,
  options: ViewOptions,
): StatusView => {
  const { zone } = options;
  const today = todayIn(now, zone.timeZone);
  const classified = normalized.events.map((event) =>
    toNormalizedEvent(event, zone, {
      today,
      leftForDayMarker: options.leftForDayMarker,
    }),
  );

  const windowed = applyWindow(classified, {
    mode: options.window,
    today,
    anchorWeekday: options.anchorWeekday,
    rollbackOnAnchorDay: options.rollbackOnAnchorDay,
  });

  const selected =
    options.view === 'latest-per-user'
      ? selectLatestRecords(windowed.events, {
          preferToday: options.preferToday,
          today,
        })
      : sortNewestFirst(windowed.events);

  const window = windowed.window
    ? {
        mode: windowed.window.mode,
        start: formatDisplayDate(windowed.window.start),
        end: formatDisplayDate(windowed.window.end),
      }
    : null;
  const earliest = oldestInstant(selected);
  const latest = newestInstant(selected);
  const lastEvent = newestInstant(normalized.events);

  return {
    view: options.view,
    columns: VIEW_COLUMNS,
    rows: selected.map((event) => toViewRow(event, zone)),
    summary: {
      totalRecords,
      normalizedRecords: normalized.events.length,
      droppedRecords: normalized.dropped.length,
      droppedByReason: countByReason(normalized.dropped),
      windowedRecords: windowed.events.length,
      rowCount: selected.length,
      window,
      earliestInstant: earliest === null ? null : formatZonedIso(earliest, zone.timeZone),
      latestInstant: latest === null ? null : formatZonedIso(latest, zone.timeZone),
      lastEventAt: lastEvent === null ? null : formatZonedIso(lastEvent, zone.timeZone),
      timeZone: zone.timeZone,
      timeZoneLabel: zone.label,
      caption: buildCaption(options.view, zone, window),
    },
  };
};

/** Full pass over one loaded batch: normalize → classify → window → select → assemble. */
export const buildStatusView = (
  records: readonly unknown[],
  now: Date,
  options: ViewOptions,
): StatusView =>
  assembleView(
    normalizeEvents(records, { zone: options.zone, policy: options.policy }),
    records.length,
    now,
    options,
  );
