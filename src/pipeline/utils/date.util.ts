import { REPORT_TZ_OFFSET_HOURS } from '../config/pipeline.constants';
import { Period, ReportScope } from '../types/pipeline.types';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const MONTHS = [
  'jan',
  'feb',
  'mar',
  'apr',
  'may',
  'jun',
  'jul',
  'aug',
  'sep',
  'oct',
  'nov',
  'dec',
];

// e.g. "Sat Feb 07 11:01:48 +0000 2026"
const LEGACY_TIMESTAMP_RE =
  /^[A-Za-z]{3} ([A-Za-z]{3}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

export function parseDateToIso(value: string): string {
  if (!value) {
    return '';
  }
  const legacy = value.trim().match(LEGACY_TIMESTAMP_RE);
  if (legacy) {
    const [, mon, day, hh, mm, ss, sign, offH, offM, year] = legacy;
    const month = MONTHS.indexOf(mon.toLowerCase());
    if (month === -1) {
      return '';
    }
    const offsetMs =
      (sign === '-' ? -1 : 1) *
      (Number(offH) * HOUR_MS + Number(offM) * 60000);
    const utc =
      Date.UTC(
        Number(year),
        month,
        Number(day),
        Number(hh),
        Number(mm),
        Number(ss),
      ) - offsetMs;
    return new Date(utc).toISOString();
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return '';
  }
  return date.toISOString();
}

export function computeAgeHours(
  iso: string,
  now: Date = new Date(),
): number | null {
  if (!iso) {
    return null;
  }
  const parsed = new Date(iso);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  return (now.getTime() - parsed.getTime()) / HOUR_MS;
}

/**
 * Returns a Date whose UTC fields read as wall-clock time in the report
 * timezone. Only use the `getUTC*` accessors on the result.
 */
export function toZoned(
  date: Date,
  offsetHours = REPORT_TZ_OFFSET_HOURS,
): Date {
  return new Date(date.getTime() + offsetHours * HOUR_MS);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatDateYYYYMMDD(zoned: Date): string {
  return `${zoned.getUTCFullYear()}-${pad(zoned.getUTCMonth() + 1)}-${pad(zoned.getUTCDate())}`;
}

export function formatFileStamp(
  date: Date,
  offsetHours = REPORT_TZ_OFFSET_HOURS,
): string {
  const z = toZoned(date, offsetHours);
  return `${z.getUTCFullYear()}${pad(z.getUTCMonth() + 1)}${pad(z.getUTCDate())}_${pad(z.getUTCHours())}${pad(z.getUTCMinutes())}${pad(z.getUTCSeconds())}`;
}

/** File stamp with a millisecond suffix, for artifacts written more than once a second. */
export function formatPreciseFileStamp(
  date: Date,
  offsetHours = REPORT_TZ_OFFSET_HOURS,
): string {
  const millis = String(date.getUTCMilliseconds()).padStart(3, '0');
  return `${formatFileStamp(date, offsetHours)}_${millis}`;
}

export function formatZonedIso(
  date: Date,
  offsetHours = REPORT_TZ_OFFSET_HOURS,
): string {
  const z = toZoned(date, offsetHours);
  const sign = offsetHours < 0 ? '-' : '+';
  const abs = Math.abs(offsetHours);
  const offset = `${sign}${pad(Math.floor(abs))}:${pad(Math.round((abs % 1) * 60))}`;
  return `${formatDateYYYYMMDD(z)}T${pad(z.getUTCHours())}:${pad(z.getUTCMinutes())}:${pad(z.getUTCSeconds())}.${pad(z.getUTCMilliseconds(), 3)}${offset}`;
}

// Absolute instant of local midnight for the given local calendar date.
function localMidnight(
  year: number,
  month: number,
  day: number,
  offsetHours: number,
): Date {
  return new Date(Date.UTC(year, month, day) - offsetHours * HOUR_MS);
}

function isoWeekMonday(weekYear: number): number {
  const jan4 = new Date(Date.UTC(weekYear, 0, 4));
  const dayIndex = (jan4.getUTCDay() + 6) % 7;
  return jan4.getTime() - dayIndex * DAY_MS;
}

function isoWeekLabel(mondayUtc: number): string {
  const thursday = new Date(mondayUtc + 3 * DAY_MS);
  const weekYear = thursday.getUTCFullYear();
  const week =
    Math.round((mondayUtc - isoWeekMonday(weekYear)) / (7 * DAY_MS)) + 1;
  return `${weekYear}-W${pad(week)}`;
}

function dailyPeriod(
  year: number,
  month: number,
  day: number,
  offsetHours: number,
): Period {
  const start = localMidnight(year, month, day, offsetHours);
  return {
    scope: 'daily',
    start,
    end: new Date(start.getTime() + DAY_MS),
    label: formatDateYYYYMMDD(new Date(Date.UTC(year, month, day))),
  };
}

function weeklyPeriod(mondayUtc: number, offsetHours: number): Period {
  const start = new Date(mondayUtc - offsetHours * HOUR_MS);
  return {
    scope: 'weekly',
    start,
    end: new Date(start.getTime() + 7 * DAY_MS),
    label: isoWeekLabel(mondayUtc),
  };
}

function monthlyPeriod(
  year: number,
  month: number,
  offsetHours: number,
): Period {
  return {
    scope: 'monthly',
    start: localMidnight(year, month, 1, offsetHours),
    end: localMidnight(year, month + 1, 1, offsetHours),
    label: `${year}-${pad(month + 1)}`,
  };
}

function parseCalendarDate(
  raw: string,
): { y: number; m: number; d: number } | null {
  const match = raw.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return null;
  }
  const y = Number(match[1]);
  const m = Number(match[2]) - 1;
  const d = Number(match[3]);
  const probe = new Date(Date.UTC(y, m, d));
  if (probe.getUTCMonth() !== m || probe.getUTCDate() !== d) {
    return null;
  }
  return { y, m, d };
}

/**
 * The period of `scope` that contains `now`. Daily periods are 24h slices
 * starting at local midnight, weekly ones are ISO weeks (Monday start),
 * monthly ones are calendar months.
 */
export function currentPeriod(
  scope: Exclude<ReportScope, 'single'>,
  now: Date = new Date(),
  offsetHours = REPORT_TZ_OFFSET_HOURS,
): Period {
  const z = toZoned(now, offsetHours);
  const y = z.getUTCFullYear();
  const m = z.getUTCMonth();
  const d = z.getUTCDate();
  if (scope === 'daily') {
    return dailyPeriod(y, m, d, offsetHours);
  }
  if (scope === 'monthly') {
    return monthlyPeriod(y, m, offsetHours);
  }
  const dayIndex = (z.getUTCDay() + 6) % 7;
  return weeklyPeriod(Date.UTC(y, m, d) - dayIndex * DAY_MS, offsetHours);
}

/**
 * Accepts `YYYY-MM-DD` (daily, or the week containing it), `GGGG-Www`
 * (weekly) and `YYYY-MM` (monthly). Returns null for anything else.
 */
export function parsePeriod(
  scope: Exclude<ReportScope, 'single'>,
  raw: string,
  offsetHours = REPORT_TZ_OFFSET_HOURS,
): Period | null {
  const value = raw.trim();
  if (scope === 'daily') {
    const date = parseCalendarDate(value);
    return date ? dailyPeriod(date.y, date.m, date.d, offsetHours) : null;
  }

  if (scope === 'monthly') {
    const match = value.match(/^(\d{4})-(\d{2})$/);
    if (!match) {
      return null;
    }
    const month = Number(match[2]) - 1;
    if (month < 0 || month > 11) {
      return null;
    }
    return monthlyPeriod(Number(match[1]), month, offsetHours);
  }

  const weekMatch = value.match(/^(\d{4})-W(\d{2})$/i);
  if (weekMatch) {
    const weekYear = Number(weekMatch[1]);
    const week = Number(weekMatch[2]);
    if (week < 1 || week > 53) {
      return null;
    }
    const monday = isoWeekMonday(weekYear) + (week - 1) * 7 * DAY_MS;
    const period = weeklyPeriod(monday, offsetHours);
    return period.label.startsWith(`${weekYear}-`) ? period : null;
  }
  const date = parseCalendarDate(value);
  if (!date) {
    return null;
  }
  const day = new Date(Date.UTC(date.y, date.m, date.d));
  const dayIndex = (day.getUTCDay() + 6) % 7;
  return weeklyPeriod(day.getTime() - dayIndex * DAY_MS, offsetHours);
}

export function isWithinPeriod(
  iso: string,
  period: Pick<Period, 'start' | 'end'>,
): boolean {
  const time = new Date(iso).getTime();
  if (Number.isNaN(time)) {
    return false;
  }
  return time >= period.start.getTime() && time < period.end.getTime();
}
