import { z } from 'zod';
import type { DropReason, RawEvent } from './status-board.types';

const toApprovalFlag = (value: unknown): boolean | null => {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    if (value.trim().toLowerCase() === 'true') return true;
    if (value.trim().toLowerCase() === 'false') return false;
  }

  return null;
};

// Scalars are stringified; objects, arrays and blanks read as absent.
const toText = (value: unknown): string | null => {
  if (
    typeof value !== 'string' &&
    typeof value !== 'number' &&
    typeof value !== 'boolean'
  ) {
    return null;
  }
  const text = String(value).trim();
  return text.length > 0 ? text : null;
};

const optionalText = z.unknown().transform(toText);

const timestampText = z.unknown().transform((value) => {
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();
  return text ? text : null;
});

export const rawEventSchema = z.object({
  user_id: z
    .unknown()
    .transform((value) => (typeof value === 'boolean' ? null : toText(value))),
  name: optionalText,
  event: optionalText,
  note: z.unknown().transform((value) => toText(value) ?? ''),
  is_at_approved_location: z.unknown().transform(toApprovalFlag),
  timezone: timestampText,
  sort_key: timestampText,
  datetime: timestampText,
  datetime_iso: timestampText,
  date: timestampText,
  time: timestampText,
});

export type RawEventParseResult =
  | { ok: true; event: RawEvent }
  | { ok: false; reason: Extract<DropReason, 'invalid-record' | 'missing-user-id'> };

/** Validates the shape of one loaded record and maps it to field names used internally. */
export const parseRawEvent = (value: unknown): RawEventParseResult => {
  const parsed = rawEventSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: 'invalid-record' };
  }

  const record = parsed.data;
  if (!record.user_id) {
    return { ok: false, reason: 'missing-user-id' };
  }

  return {
    ok: true,
    event: {
      userId: record.user_id,
      name: record.name ?? '',
      event: record.event ?? '',
      note: record.note,
      isAtApprovedLocation: record.is_at_approved_location,
      timezone: record.timezone,
      sortKey: record.sort_key,
      datetime: record.datetime,
      datetimeIso: record.datetime_iso,
      date: record.date,
      time: record.time,
    },
  };
};
