/**
 * Date coercion for raw and persisted cells.
 *
 * Accepted shapes:
 *   YYYY-MM-DD, optionally followed by a time (T or space separated,
 *   hour-only allowed as in "2024-05-01T05") and a zone (Z, ±HH:MM, ±HHMM)
 *   MM/DD/YYYY, YYYY/MM/DD, DD.MM.YYYY
 */

const DAY_MS = 24 * 60 * 60 * 1000;

interface Temporal {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** Minutes east of UTC; 0 when the value carries no zone. */
  offsetMinutes: number;
}

const ISO_RE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2})(?::(\d{2})(?::(\d{2})(?:\.\d+)?)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const US_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const YMD_SLASH_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;
const DOTTED_RE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

function parseOffset(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function isRealDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1 || day > 31) return false;
  const probe = new Date(Date.UTC(year, month - 1, day));
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}

function dateOnly(year: number, month: number, day: number): Temporal | null {
  if (!isRealDate(year, month, day)) return null;
  return { year, month, day, hour: 0, minute: 0, second: 0, offsetMinutes: 0 };
}

function parseTemporal(value: unknown): Temporal | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return {
      year: value.getUTCFullYear(),
      month: value.getUTCMonth() + 1,
      day: value.getUTCDate(),
      hour: value.getUTCHours(),
      minute: value.getUTCMinutes(),
      second: value.getUTCSeconds(),
      offsetMinutes: 0,
    };
  }
  if (typeof value !== "string") return null;
  const v = value.trim();
  if (v === "") return null;

  const iso = ISO_RE.exec(v);
  if (iso) {
    const base = dateOnly(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (!base) return null;
    const hour = iso[4] ? Number(iso[4]) : 0;
    const minute = iso[5] ? Number(iso[5]) : 0;
    const second = iso[6] ? Number(iso[6]) : 0;
    if (hour > 23 || minute > 59 || second > 59) return null;
    return { ...base, hour, minute, second, offsetMinutes: parseOffset(iso[7]) };
  }

  const us = US_RE.exec(v);
  if (us) return dateOnly(Number(us[3]), Number(us[1]), Number(us[2]));

  const ymd = YMD_SLASH_RE.exec(v);
  if (ymd) return dateOnly(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));

  const dotted = DOTTED_RE.exec(v);
  if (dotted) return dateOnly(Number(dotted[3]), Number(dotted[2]), Number(dotted[1]));

  return null;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * Calendar date (YYYY-MM-DD) of a cell, or null when it does not parse.
 * The time of day is discarded; the date is the one written in the value.
 */
export function toCalendarDate(value: unknown): string | null {
  const t = parseTemporal(value);
  if (!t) return null;
  return `${pad(t.year, 4)}-${pad(t.month)}-${pad(t.day)}`;
}

/** Epoch milliseconds of a cell. Values without a zone are read as UTC. */
export function toUtcInstant(value: unknown): number | null {
  const t = parseTemporal(value);
  if (!t) return null;
  return (
    Date.UTC(t.year, t.month - 1, t.day, t.hour, t.minute, t.second) -
    t.offsetMinutes * 60 * 1000
  );
}

/** Whole days elapsed between an instant and now (floored). */
export function wholeDaysBetween(fromMs: number, now: Date): number {
  return Math.floor((now.getTime() - fromMs) / DAY_MS);
}

/** UTC date stamp used in output file names: 2024_05_01. */
export function fileDateStamp(now: Date): string {
  return `${pad(now.getUTCFullYear(), 4)}_${pad(now.getUTCMonth() + 1)}_${pad(now.getUTCDate())}`;
}

/** Calendar date n days before `now` (UTC). */
export function daysAgo(now: Date, n: number): string {
  const shifted = new Date(now.getTime() - n * DAY_MS);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}
