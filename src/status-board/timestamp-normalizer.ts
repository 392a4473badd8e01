import { parseRawEvent } from './raw-event.schema';
import type {
  AmbiguityPolicy,
  DisplayZone,
  DroppedRecord,
  RawEvent,
  TimedEvent,
  TimestampEncoding,
} from './status-board.types';
import {
  ParsedTimestamp,
  parseDateAndTime,
  parseIsoLike,
  parseLegacyDateTime,
} from './timestamp-parsers';
import { getZonedDateTime, resolveLocalDateTime, wallClockAsUtc } from './zoned-time';

type TimestampField = 'sortKey' | 'datetime' | 'datetimeIso' | 'date' | 'time';

export interface NormalizeOptions {
  zone: DisplayZone;
  policy: AmbiguityPolicy;
  rules?: readonly TimestampRule[];
}

export type RuleOutcome =
  | { ok: true; instant: number }
  | { ok: false; reason: 'unparseable-timestamp' | 'ambiguous-local-time' };

export interface TimestampRule {
  encoding: TimestampEncoding;
  /** Source field names, used in error messages. */
  sourceFields: readonly string[];
  fields: readonly TimestampField[];
  interpret(event: RawEvent, options: NormalizeOptions): RuleOutcome;
}

export interface NormalizationResult {
  events: TimedEvent[];
  dropped: DroppedRecord[];
}

export class TimestampSchemaError extends Error {
  constructor(readonly expectedFields: readonly string[]) {
    super(
      `No record carries a recognized timestamp field (expected one of: ${expectedFields.join(', ')})`,
    );
    this.name = 'TimestampSchemaError';
  }
}

const matchesDisplayZone = (tag: string | null, zone: DisplayZone): boolean => {
  if (!tag) {
    return false;
  }
  const normalized = tag.trim().toLowerCase();
  return (
    normalized === zone.label.toLowerCase() ||
    normalized === zone.timeZone.toLowerCase()
  );
};

export const isWrittenInLocalTime = (
  policy: AmbiguityPolicy,
  tag: string | null,
  zone: DisplayZone,
): boolean => {
  switch (policy) {
    case 'assume-local':
      return true;
    case 'assume-utc':
      return false;
    case 'tag-or-utc':
      return matchesDisplayZone(tag, zone);
  }
};

const toInstant = (
  parsed: ParsedTimestamp | null,
  asLocal: boolean,
  zone: DisplayZone,
): RuleOutcome => {
  if (!parsed) {
    return { ok: false, reason: 'unparseable-timestamp' };
  }

  if (parsed.offsetMs !== null) {
    return { ok: true, instant: wallClockAsUtc(parsed.local) - parsed.offsetMs };
  }

  if (!asLocal) {
    return { ok: true, instant: wallClockAsUtc(parsed.local) };
  }

  const resolution = resolveLocalDateTime(parsed.local, zone.timeZone);
  if (resolution.kind === 'ambiguous') {
    return { ok: false, reason: 'ambiguous-local-time' };
  }
  return { ok: true, instant: resolution.instant };
};

const isoRule = (
  encoding: 'sort_key' | 'datetime_iso',
  field: 'sortKey' | 'datetimeIso',
): TimestampRule => ({
  encoding,
  sourceFields: [encoding],
  fields: [field],
  interpret: (event, { policy, zone }) =>
    toInstant(
      parseIsoLike(event[field] ?? ''),
      isWrittenInLocalTime(policy, event.timezone, zone),
      zone,
    ),
});

/** Evaluated in order per record; the first rule whose fields are all present decides. */
export const TIMESTAMP_RULES: readonly TimestampRule[] = [
  isoRule('sort_key', 'sortKey'),
  {
    encoding: 'datetime',
    sourceFields: ['datetime'],
    fields: ['datetime'],
    interpret: (event, { zone }) =>
      toInstant(parseLegacyDateTime(event.datetime ?? ''), true, zone),
  },
  isoRule('datetime_iso', 'datetimeIso'),
  {
    encoding: 'date+time',
    sourceFields: ['date', 'time'],
    fields: ['date', 'time'],
    interpret: (event, { zone }) =>
      toInstant(parseDateAndTime(event.date ?? '', event.time ?? ''), true, zone),
  },
];

export const selectTimestampRule = (
  event: RawEvent,
  rules: readonly TimestampRule[] = TIMESTAMP_RULES,
): TimestampRule | undefined =>
  rules.find((rule) => rule.fields.every((field) => event[field] !== null));

/**
 * Resolves one absolute instant per record. Records that fail shape
 * validation or whose timestamp cannot be resolved are returned in `dropped`.
 */
export const normalizeEvents = (
  records: readonly unknown[],
  options: NormalizeOptions,
): NormalizationResult => {
  const rules = options.rules ?? TIMESTAMP_RULES;
  const events: TimedEvent[] = [];
  const dropped: DroppedRecord[] = [];
  let shapedRecords = 0;
  let timestampedRecords = 0;

  records.forEach((record, index) => {
    const parsed = parseRawEvent(record);
    if (!parsed.ok) {
      dropped.push({ index, reason: parsed.reason });
      return;
    }
    shapedRecords += 1;

    const rule = selectTimestampRule(parsed.event, rules);
    if (!rule) {
      dropped.push({ index, reason: 'missing-timestamp' });
      return;
    }
    timestampedRecords += 1;

    const outcome = rule.interpret(parsed.event, options);
    if (!outcome.ok) {
      dropped.push({ index, reason: outcome.reason, encoding: rule.encoding });
      return;
    }

    const local = getZonedDateTime(outcome.instant, options.zone.timeZone);
    events.push({
      ...parsed.event,
      sourceIndex: index,
      instant: outcome.instant,
      encoding: rule.encoding,
      localDate: { year: local.year, month: local.month, day: local.day },
      localTime: { hour: local.hour, minute: local.minute, second: local.second },
    });
  });

  if (shapedRecords > 0 && timestampedRecords === 0) {
    throw new TimestampSchemaError(rules.flatMap((rule) => rule.sourceFields));
  }

  return { events, dropped };
};
