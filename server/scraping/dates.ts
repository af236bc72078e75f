import { format, isValid, parse, subDays } from 'date-fns';
import type { CalendarDate } from '../../shared/types';

const ISO_FORMAT = 'yyyy-MM-dd';
const US_FORMATS = ['MMM d, yyyy', 'MMMM d, yyyy'] as const;

/** `Month D, YYYY` with abbreviated or full month names, including the `Sept` variant. */
export const US_DATE_PATTERN =
  /\b(?:Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|Jun(?:e)?|Jul(?:y)?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)\s+\d{1,2},\s+\d{4}\b/;

const URL_DATE_PATTERN = /\/(\d{4})\/(\d{2})\/(\d{2})\//;
const ISO_PREFIX_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:$|[T\s])/;

// Parsing needs a reference date; any fixed one works since every token is present.
const REFERENCE = new Date(2000, 0, 1);

const fromParts = (year: string, month: string, day: string): CalendarDate | null => {
  const candidate = `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
  return isCalendarDate(candidate) ? candidate : null;
};

export const isCalendarDate = (value: string): value is CalendarDate => {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  return isValid(parse(value, ISO_FORMAT, REFERENCE));
};

export const toCalendarDate = (date: Date): CalendarDate => format(date, ISO_FORMAT);

export const todayIso = (now: Date = new Date()): CalendarDate => toCalendarDate(now);

export const subtractDays = (date: CalendarDate, days: number): CalendarDate =>
  toCalendarDate(subDays(parse(date, ISO_FORMAT, REFERENCE), days));

/**
 * Parses strings such as `Nov 29, 2025`, `November 29, 2025` or `Sept 5, 2025`.
 * Returns null when the text does not match an accepted format; never throws.
 */
export const parseUsDateString = (text: string): CalendarDate | null => {
  const fixed = text.trim().replace(/\s+/g, ' ').replace(/\bSept\b/i, 'Sep');
  if (!fixed) return null;
  for (const pattern of US_FORMATS) {
    const parsed = parse(fixed, pattern, REFERENCE);
    if (isValid(parsed)) {
      return toCalendarDate(parsed);
    }
  }
  return null;
};

/** First `Month D, YYYY` occurrence in free text. */
export const findUsDate = (text: string): CalendarDate | null => {
  const match = text.match(US_DATE_PATTERN);
  return match ? parseUsDateString(match[0]) : null;
};

/** Date encoded in the URL path as `/YYYY/MM/DD/`. */
export const dateFromUrlPath = (url: string): CalendarDate | null => {
  const match = url.match(URL_DATE_PATTERN);
  if (!match) return null;
  return fromParts(match[1], match[2], match[3]);
};

/** Calendar date of an ISO-8601 timestamp such as `2025-12-16T10:00:00-05:00`, taken as written. */
export const dateFromIsoTimestamp = (value: string): CalendarDate | null => {
  const match = value.trim().match(ISO_PREFIX_PATTERN);
  if (!match) return null;
  return fromParts(match[1], match[2], match[3]);
};
