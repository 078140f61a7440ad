import { CivilDate, PeriodBounds, PeriodKind } from '../types';

const PERIOD_ALIASES = new Map<string, PeriodKind>([
  ['day', 'day'],
  ['today', 'day'],
  ['week', 'week'],
  ['thisweek', 'week'],
  ['month', 'month'],
  ['thismonth', 'month']
]);

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric'
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
};

const wallClockParts = (instant: Date, timeZone: string): Record<string, number> => {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== 'literal') {
      parts[part.type] = Number(part.value);
    }
  }
  return parts;
};

/**
 * Offset of the zone from UTC at the given instant, in milliseconds
 */
const zoneOffset = (instant: Date, timeZone: string): number => {
  const p = wallClockParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000;
  return asUtc - wholeSeconds;
};

/**
 * Throws a RangeError for an unknown IANA zone name
 */
export const assertTimeZone = (timeZone: string): void => {
  formatterFor(timeZone);
};

export const resolvePeriodKind = (value: string): PeriodKind | null =>
  PERIOD_ALIASES.get(value.toLowerCase()) ?? null;

/**
 * Calendar date of an instant as seen on a wall clock in the zone
 */
export const toCivilDate = (instant: Date, timeZone: string): CivilDate => {
  const p = wallClockParts(instant, timeZone);
  return { year: p.year, month: p.month, day: p.day };
};

/**
 * Calendar arithmetic on a civil date; month and year roll over as needed
 */
export const addDays = (date: CivilDate, days: number): CivilDate => {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate()
  };
};

export const formatCivilDate = (date: CivilDate): string =>
  `${date.year}-${String(date.month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;

/**
 * Parse `YYYY-MM-DD`. Returns null for malformed or impossible dates.
 */
export const parseCivilDate = (value: string): CivilDate | null => {
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;

  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  const check = addDays(date, 0);
  if (check.year !== date.year || check.month !== date.month || check.day !== date.day) {
    return null;
  }
  return date;
};

/**
 * First instant of a civil date in the zone. Where midnight does not exist
 * on the wall clock, this is the first instant after the gap.
 */
export const startOfCivilDay = (date: CivilDate, timeZone: string): Date => {
  const guess = Date.UTC(date.year, date.month - 1, date.day);
  const firstOffset = zoneOffset(new Date(guess), timeZone);
  const candidate = guess - firstOffset;
  const secondOffset = zoneOffset(new Date(candidate), timeZone);
  if (secondOffset === firstOffset) {
    return new Date(candidate);
  }
  const adjusted = guess - secondOffset;
  return new Date(zoneOffset(new Date(adjusted), timeZone) === secondOffset ? adjusted : candidate);
};

/**
 * Half-open period containing a civil date
 */
export const boundsForDate = (kind: PeriodKind, date: CivilDate, timeZone: string): PeriodBounds => {
  let startDate: CivilDate;
  let endDate: CivilDate;

  switch (kind) {
    case 'day':
      startDate = date;
      endDate = addDays(date, 1);
      break;
    case 'week': {
      const weekday = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
      startDate = addDays(date, -((weekday + 6) % 7));
      endDate = addDays(startDate, 7);
      break;
    }
    case 'month':
      startDate = { year: date.year, month: date.month, day: 1 };
      endDate = date.month === 12
        ? { year: date.year + 1, month: 1, day: 1 }
        : { year: date.year, month: date.month + 1, day: 1 };
      break;
  }

  return {
    kind,
    start: startOfCivilDay(startDate, timeZone),
    end: startOfCivilDay(endDate, timeZone),
    startDate,
    endDate
  };
};

/**
 * Half-open period containing an instant, as UTC instants
 */
export const bounds = (kind: PeriodKind, referenceInstant: Date, timeZone: string): PeriodBounds =>
  boundsForDate(kind, toCivilDate(referenceInstant, timeZone), timeZone);

export const formatPeriodLabel = (period: PeriodBounds): string => {
  switch (period.kind) {
    case 'day':
      return formatCivilDate(period.startDate);
    case 'week':
      return `${formatCivilDate(period.startDate)} → ${formatCivilDate(addDays(period.endDate, -1))}`;
    case 'month':
      return formatCivilDate(period.startDate).slice(0, 7);
  }
};

export const isWithin = (instant: Date, period: PeriodBounds): boolean =>
  instant.getTime() >= period.start.getTime() && instant.getTime() < period.end.getTime();
