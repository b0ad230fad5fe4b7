/**
 * @ledgerline/ledger — Date normalization.
 *
 * Every stored transaction date and every query bound goes through
 * toUtcInstant() before comparison, so comparisons are plain string
 * comparisons of "YYYY-MM-DDTHH:mm:ss.sssZ" values.
 *
 * Rules:
 * - Date-only strings are UTC days
 * - Datetimes without an offset are read as UTC, never as local time
 * - Datetimes with an offset are converted to UTC
 */

import type { YearMonth } from "@ledgerline/types";
import { LedgerError } from "./types.js";

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const LOCAL_DATETIME = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d{1,9})?)?$/;
const ZONED_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:\d{2})$/;

/** Which end of a day a date-only value stands for. */
export type DayEdge = "start" | "end";

function isRealDay(year: string, month: string, day: string): boolean {
  const probe = new Date(`${year}-${month}-${day}T00:00:00.000Z`);
  return (
    !Number.isNaN(probe.getTime()) &&
    probe.toISOString().slice(0, 10) === `${year}-${month}-${day}`
  );
}

/**
 * Normalize a date or datetime string to a UTC ISO instant.
 * Returns undefined when the value is not a real calendar date.
 */
export function toUtcInstant(value: string, edge: DayEdge = "start"): string | undefined {
  const trimmed = value.trim();

  const dateOnly = DATE_ONLY.exec(trimmed);
  if (dateOnly !== null) {
    const [, year = "", month = "", day = ""] = dateOnly;
    if (!isRealDay(year, month, day)) return undefined;
    const time = edge === "start" ? "00:00:00.000" : "23:59:59.999";
    return `${year}-${month}-${day}T${time}Z`;
  }

  const local = LOCAL_DATETIME.exec(trimmed);
  if (local !== null) {
    const [, year = "", month = "", day = "", hour = "", minute = "", second = "00", fraction = ""] =
      local;
    if (!isRealDay(year, month, day)) return undefined;
    const millis = fraction.slice(1).padEnd(3, "0").slice(0, 3);
    const parsed = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}Z`);
    if (Number.isNaN(parsed.getTime())) return undefined;
    return parsed.toISOString();
  }

  if (ZONED_DATETIME.test(trimmed)) {
    const parsed = new Date(trimmed.replace(" ", "T"));
    if (Number.isNaN(parsed.getTime())) return undefined;
    return parsed.toISOString();
  }

  return undefined;
}

/**
 * toUtcInstant() that throws INVALID_DATE instead of returning undefined.
 */
export function requireUtcInstant(value: string, edge: DayEdge = "start"): string {
  const instant = toUtcInstant(value, edge);
  if (instant === undefined) {
    throw new LedgerError("INVALID_DATE", `Invalid date: "${value}"`);
  }
  return instant;
}

/**
 * Calendar month (UTC) of a date or datetime string.
 */
export function monthOf(value: string): YearMonth {
  return requireUtcInstant(value).slice(0, 7);
}

/**
 * First and last instant of a "YYYY-MM" month, both inclusive.
 */
export function monthBounds(yearMonth: YearMonth): { readonly start: string; readonly end: string } {
  const match = /^(\d{4})-(0[1-9]|1[0-2])$/.exec(yearMonth);
  if (match === null) {
    throw new LedgerError("INVALID_DATE", `Invalid month: "${yearMonth}"`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return {
    start: `${yearMonth}-01T00:00:00.000Z`,
    end: `${yearMonth}-${String(lastDay).padStart(2, "0")}T23:59:59.999Z`,
  };
}
