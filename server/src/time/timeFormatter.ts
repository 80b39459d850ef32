import type { TimePrecision } from '../launches/launch';
import { logDebug } from '../observability/logger';
import { ONE_DAY_MS } from './durations';

export interface FormatContext {
  now: number;
  timeZone: string;
}

interface DisplayFields {
  weekday: string;
  monthShort: string;
  day: string;
  hour: string;
  minute: string;
  dayPeriod: string;
}

export const UNKNOWN_TIME_LABEL = 'Unknown';

const displayFormatters = new Map<string, Intl.DateTimeFormat>();
const calendarFormatters = new Map<string, Intl.DateTimeFormat>();

function cachedFormatter(
  cache: Map<string, Intl.DateTimeFormat>,
  timeZone: string,
  options: Intl.DateTimeFormatOptions
): Intl.DateTimeFormat {
  let formatter = cache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', { ...options, timeZone });
    cache.set(timeZone, formatter);
  }
  return formatter;
}

function partsOf(formatter: Intl.DateTimeFormat, instant: number): Map<string, string> {
  const parts = new Map<string, string>();
  for (const part of formatter.formatToParts(new Date(instant))) {
    if (part.type !== 'literal') parts.set(part.type, part.value);
  }
  return parts;
}

function displayFields(instant: number, timeZone: string): DisplayFields {
  const parts = partsOf(
    cachedFormatter(displayFormatters, timeZone, {
      weekday: 'short',
      month: 'short',
      day: 'numeric',
      hour: 'numeric',
      minute: '2-digit',
      hour12: true
    }),
    instant
  );
  return {
    weekday: parts.get('weekday') ?? '',
    monthShort: parts.get('month') ?? '',
    day: parts.get('day') ?? '',
    hour: parts.get('hour') ?? '',
    minute: parts.get('minute') ?? '',
    dayPeriod: (parts.get('dayPeriod') ?? '').toUpperCase()
  };
}

/** Date civile `YYYY-MM-DD` de l'instant dans le fuseau donné. */
export function calendarDate(instant: number, timeZone: string): string {
  const parts = partsOf(
    cachedFormatter(calendarFormatters, timeZone, {
      year: 'numeric',
      month: '2-digit',
      day: '2-digit'
    }),
    instant
  );
  return `${parts.get('year')}-${parts.get('month')}-${parts.get('day')}`;
}

function previousCalendarDate(date: string): string {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day - 1)).toISOString().slice(0, 10);
}

export function isSameCalendarDay(a: number, b: number, timeZone: string): boolean {
  return calendarDate(a, timeZone) === calendarDate(b, timeZone);
}

export function isPreviousCalendarDay(instant: number, now: number, timeZone: string): boolean {
  return calendarDate(instant, timeZone) === previousCalendarDate(calendarDate(now, timeZone));
}

function clockTime(fields: DisplayFields): string {
  return `${fields.hour}:${fields.minute} ${fields.dayPeriod}`;
}

function formatExact(instant: number, { now, timeZone }: FormatContext): string {
  const fields = displayFields(instant, timeZone);
  const time = clockTime(fields);
  const absolute = `${fields.weekday}, ${fields.monthShort} ${fields.day} ${time}`;

  if (instant > now + 7 * ONE_DAY_MS) return absolute;
  if (isSameCalendarDay(instant, now, timeZone)) return `Today ${time}`;
  if (isPreviousCalendarDay(instant, now, timeZone)) return `Yesterday ${time}`;
  if (instant < now - 7 * ONE_DAY_MS) return absolute;
  if (instant < now) return `Last ${fields.weekday} ${time}`;
  return `${fields.weekday} ${time}`;
}

// Précision grossière : on reste en UTC pour ne pas inventer une heure locale.
function formatCoarse(
  instant: number,
  now: number,
  options: Intl.DateTimeFormatOptions,
  currentLabel: string
): string {
  const formatter = new Intl.DateTimeFormat('en-US', { ...options, timeZone: 'UTC' });
  const label = formatter.format(new Date(instant));
  return label === formatter.format(new Date(now)) ? currentLabel : label;
}

/**
 * Libellé court d'un horaire de lancement relatif à `now`
 * (« Today 3:05 PM », « Last Wed 9:30 AM », « This Month »...).
 */
export function formatRelative(
  instant: number,
  precision: TimePrecision | null | undefined,
  context: FormatContext
): string {
  switch (precision ?? 'exact') {
    case 'exact':
    case 'hour':
      return formatExact(instant, context);
    case 'day':
      return formatCoarse(instant, context.now, { weekday: 'short' }, 'Today');
    case 'month':
      return formatCoarse(instant, context.now, { month: 'long' }, 'This Month');
    case 'year':
      return formatCoarse(instant, context.now, { year: 'numeric' }, 'This Year');
    case 'quarter':
    case 'half':
      logDebug('time_precision_unsupported', { precision, instant });
      return UNKNOWN_TIME_LABEL;
  }
}
