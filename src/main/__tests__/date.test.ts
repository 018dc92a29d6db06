import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { ParseError } from '../errors.js';
import { daysBetween, formatDateToken, parseDate, parseDateToken, toIsoDate, weekAnchor } from '../utils/date.js';

describe('parseDate', () => {
  it('reads the YYMMDD token of the second segment', () => {
    const date = parseDate('TLST04A00879_250720070000');
    expect(toIsoDate(date)).toBe('2025-07-20');
    expect(date.hour).toBe(0);
    expect(date.zoneName).toBe('UTC');
  });

  it('is deterministic', () => {
    const name = 'X_240229235959';
    expect(parseDate(name).toMillis()).toBe(parseDate(name).toMillis());
    expect(toIsoDate(parseDate(name))).toBe('2024-02-29');
  });

  it.each([
    ['no separator', 'TLST04A00879'],
    ['empty segment', 'TLST04A00879_'],
    ['letters', 'TLST04A00879_25O720070000'],
    ['month 13', 'TLST04A00879_251301070000'],
    ['Feb 30', 'TLST04A00879_250230070000'],
    ['too short', 'TLST04A00879_2507']
  ])('rejects %s', (_label, name) => {
    expect(() => parseDate(name)).toThrow(ParseError);
  });

  it('carries the partition name on the error', () => {
    try {
      parseDate('cam_991399');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError && error.key).toBe('cam_991399');
      expect(error instanceof ParseError && error.kind).toBe('parse');
    }
  });
});

describe('weekAnchor', () => {
  it('maps Monday through Sunday to the same Monday', () => {
    for (const token of ['250714', '250715', '250716', '250717', '250718', '250719', '250720']) {
      expect(formatDateToken(weekAnchor(parseDateToken(token)))).toBe('250714');
    }
    expect(formatDateToken(weekAnchor(parseDateToken('250721')))).toBe('250721');
  });

  it('returns a Monday at most six days earlier for every day of two years', () => {
    let date = DateTime.utc(2024, 1, 1);
    while (date.year < 2026) {
      const anchor = weekAnchor(date);
      expect(anchor.weekday).toBe(1);
      const gap = daysBetween(date, anchor);
      expect(gap).toBeGreaterThanOrEqual(0);
      expect(gap).toBeLessThanOrEqual(6);
      date = date.plus({ days: 1 });
    }
  });

  it('crosses year boundaries', () => {
    expect(toIsoDate(weekAnchor(parseDateToken('250101')))).toBe('2024-12-30');
  });
});

describe('formatDateToken', () => {
  it('zero pads every field', () => {
    expect(formatDateToken(DateTime.utc(2003, 4, 5))).toBe('030405');
  });

  it('round trips through parseDateToken', () => {
    expect(formatDateToken(parseDateToken('251231'))).toBe('251231');
  });
});

describe('daysBetween', () => {
  it('counts whole calendar days', () => {
    expect(daysBetween(DateTime.utc(2025, 9, 1, 23, 59), parseDateToken('250707'))).toBe(56);
    expect(daysBetween(parseDateToken('250707'), parseDateToken('250707'))).toBe(0);
  });
});
