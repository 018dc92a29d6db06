import { DateTime } from 'luxon';
import { ParseError } from '../errors.js';

const DATE_TOKEN_RE = /^(\d{2})(\d{2})(\d{2})/;

const pad2 = (value: number): string => value.toString().padStart(2, '0');

const fromTokenParts = (source: string, yy: string, mm: string, dd: string): DateTime => {
  const date = DateTime.utc(2000 + Number(yy), Number(mm), Number(dd));
  if (!date.isValid) {
    throw new ParseError(source, `Invalid calendar date in "${source}": ${date.invalidExplanation ?? date.invalidReason ?? 'unknown'}`);
  }
  return date;
};

/**
 * Extracts the `YYMMDD` token from names like `TLST04A00879_250720070000` and returns
 * the UTC calendar date it encodes. Throws ParseError for anything else.
 */
export const parseDate = (name: string): DateTime => {
  const segment = name.split('_')[1];
  if (!segment) {
    throw new ParseError(name, `Partition name "${name}" has no date segment.`);
  }
  const match = DATE_TOKEN_RE.exec(segment);
  if (!match) {
    throw new ParseError(name, `Partition name "${name}" does not start its date segment with YYMMDD.`);
  }
  return fromTokenParts(name, match[1], match[2], match[3]);
};

export const parseDateToken = (token: string): DateTime => {
  const match = /^(\d{2})(\d{2})(\d{2})$/.exec(token);
  if (!match) {
    throw new ParseError(token, `"${token}" is not a YYMMDD token.`);
  }
  return fromTokenParts(token, match[1], match[2], match[3]);
};

/** Monday of the ISO week containing `date`. */
export const weekAnchor = (date: DateTime): DateTime => date.startOf('day').minus({ days: date.weekday - 1 });

export const formatDateToken = (date: DateTime): string => `${pad2(date.year % 100)}${pad2(date.month)}${pad2(date.day)}`;

export const toIsoDate = (date: DateTime): string => `${date.year.toString().padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`;

export const daysBetween = (later: DateTime, earlier: DateTime): number =>
  Math.floor(later.startOf('day').diff(earlier.startOf('day'), 'days').days);
