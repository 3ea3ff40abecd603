import type { TimeRange } from '../types/index.js';

const SECONDS_PER_HOUR = 3600;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/**
 * Seconds as decimal hours with at most two places: 9000 -> "2.5", 0 -> "0".
 * For messages and totals only; workbook cells take {@link exactHours}.
 */
export function formatHours(seconds: number): string {
  const hours = seconds / SECONDS_PER_HOUR;
  return hours.toFixed(2).replace(/\.?0+$/, '');
}

/**
 * Seconds as unrounded decimal hours, so that `hoursToSeconds` gives the
 * same whole seconds back: 1200 -> "0.3333333333333333".
 */
export function exactHours(seconds: number): string {
  return String(seconds / SECONDS_PER_HOUR);
}

export function hoursToSeconds(hours: number): number {
  return Math.round(hours * SECONDS_PER_HOUR);
}

/**
 * Parse a decimal hours cell. Returns undefined for anything that is not a
 * plain decimal number ("2.5", "3", ".75").
 */
export function parseHours(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Accepts only real calendar dates in YYYY-MM-DD form.
 */
export function parseDate(text: string): string | undefined {
  const trimmed = text.trim();
  const match = DATE_PATTERN.exec(trimmed);
  if (!match) return undefined;

  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(m) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    return undefined;
  }
  return trimmed;
}

/**
 * Calendar day of a Jira timestamp as recorded by Jira, without shifting it
 * into the local timezone.
 */
export function entryDate(started: string): string {
  const day = started.slice(0, 10);
  return parseDate(day) ?? '';
}

/**
 * Jira expects `started` with an explicit offset; worklogs are placed at the
 * start of the day in UTC.
 */
export function toJiraStarted(date: string): string {
  return `${date}T00:00:00.000+0000`;
}

export function toIsoDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export interface DateWindow {
  start: string;
  end: string;
}

/**
 * First and last day of the current or previous calendar month relative to `now`.
 */
export function monthWindow(range: TimeRange, now: Date = new Date()): DateWindow {
  const offset = range === 'previous' ? -1 : 0;
  const first = new Date(now.getFullYear(), now.getMonth() + offset, 1);
  const last = new Date(now.getFullYear(), now.getMonth() + offset + 1, 0);
  return { start: toIsoDate(first), end: toIsoDate(last) };
}

export function inWindow(date: string, window: DateWindow): boolean {
  return date >= window.start && date <= window.end;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
