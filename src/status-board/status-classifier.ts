import type {
  CalendarDate,
  DisplayStatus,
  EventType,
  TimedEvent,
  WorkMode,
} from './status-board.types';
import { EVENT_TYPES } from './status-board.types';
import { isSameDate } from './zoned-time';

export const DEFAULT_LEFT_FOR_DAY_MARKER = 'left for the day';

export const STATUS_INDICATORS: Record<DisplayStatus, string> = {
  active: '🟢',
  'on break': '🟠',
  'on leave': '🔴',
  'left for the day': '🔵',
  unknown: '⚪',
};

const BASE_STATUS: Record<Exclude<EventType, 'Punch Out'>, DisplayStatus> = {
  'Punch In': 'active',
  'Break Start': 'on break',
  'Break End': 'active',
  'On Leave': 'on leave',
};

export interface ClassificationContext {
  today: CalendarDate;
  leftForDayMarker?: string;
}

export const toEventType = (label: string): EventType | null => {
  const normalized = label.trim().toLowerCase();
  return EVENT_TYPES.find((type) => type.toLowerCase() === normalized) ?? null;
};

export const classifyStatus = (
  event: Pick<TimedEvent, 'event' | 'note' | 'localDate'>,
  context: ClassificationContext,
): DisplayStatus => {
  const type = toEventType(event.event);
  if (!type) {
    return 'unknown';
  }

  if (type !== 'Punch Out') {
    return BASE_STATUS[type];
  }

  // Punch Out reads as an extended absence unless it happened today or is marked.
  const marker = (context.leftForDayMarker ?? DEFAULT_LEFT_FOR_DAY_MARKER).toLowerCase();
  const marked = marker.length > 0 && event.note.toLowerCase().includes(marker);
  return marked || isSameDate(event.localDate, context.today)
    ? 'left for the day'
    : 'on leave';
};

export const classifyWorkMode = (isAtApprovedLocation: boolean | null): WorkMode => {
  if (isAtApprovedLocation === null) {
    return 'Unknown';
  }
  return isAtApprovedLocation ? 'In Office' : 'Work from home';
};

export const composeNameAndStatus = (name: string, status: DisplayStatus): string =>
  `${name} ${STATUS_INDICATORS[status]} ${status}`.trimStart();
