/**
 * @ledgerline/budget — "YYYY-MM" month arithmetic.
 *
 * Months are zero-padded, so string order is chronological order.
 */

import { isYearMonth } from "@ledgerline/types";
import type { YearMonth } from "@ledgerline/types";
import { BudgetError } from "./types.js";

export function assertYearMonth(value: string): YearMonth {
  if (!isYearMonth(value)) {
    throw new BudgetError("INVALID_YEAR_MONTH", `Invalid month "${value}", expected YYYY-MM`, {
      yearMonth: value,
    });
  }
  return value;
}

function split(yearMonth: YearMonth): [number, number] {
  const valid = assertYearMonth(yearMonth);
  return [Number(valid.slice(0, 4)), Number(valid.slice(5, 7))];
}

function join(year: number, month: number): YearMonth {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

/** The month before, wrapping January to the previous December. */
export function previousMonth(yearMonth: YearMonth): YearMonth {
  const [year, month] = split(yearMonth);
  return month === 1 ? join(year - 1, 12) : join(year, month - 1);
}
