// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — Trading Calendar
// ═══════════════════════════════════════════════════════════════════════════════
//
// Determines the most recent completed disclosure window.
//
//   Block-deal disclosures close at 18:30 exchange time (IST):
//     at/after cutoff on a trading day → to_date = today
//     otherwise                        → to_date = last trading day before today
//   from_date = 5 trading days before to_date (6 trading days inclusive)
//
// Worked check: now = Tue 17-Feb-2026 19:00 IST
//   to_date = 17-02-2026; stepping back 16, 13, 12, 11, 10 → from_date = 10-02-2026
//
// Dates are plain ISO strings ("YYYY-MM-DD"); arithmetic goes through UTC
// midnight so the host time zone never leaks into the result.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { DisclosureWindow } from '../types/market';
import type { CutoffTime } from './config';
import type { Logger } from './logger';
import { silentLogger } from './logger';

const DAY_MS = 24 * 60 * 60 * 1000;

/** How far back to look for the window's end day */
export const MAX_TO_DATE_LOOKBACK = 10;
/** Calendar-day bound on the walk from to_date back to from_date */
export const MAX_FROM_DATE_LOOKBACK_DAYS = 30;
/** Trading-day steps between to_date and from_date */
export const WINDOW_TRADING_STEPS = 5;


// ─── DATE HELPERS ────────────────────────────────────────────────────────────

export function addDays(isoDate: string, days: number): string {
  const [y, m, d] = isoDate.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d) + days * DAY_MS).toISOString().slice(0, 10);
}

export function daysBetween(fromIso: string, toIso: string): number {
  return Math.round((Date.parse(`${toIso}T00:00:00Z`) - Date.parse(`${fromIso}T00:00:00Z`)) / DAY_MS);
}

/** 0 = Sunday … 6 = Saturday */
export function weekdayOf(isoDate: string): number {
  return new Date(`${isoDate}T00:00:00Z`).getUTCDay();
}

/** ISO date → DD-MM-YYYY, the format the deal endpoint expects */
export function formatExchangeDate(isoDate: string): string {
  const [y, m, d] = isoDate.split('-');
  return `${d}-${m}-${y}`;
}

/** Wall-clock date and time at the exchange for a given instant */
export function toExchangeClock(now: Date, utcOffsetMinutes: number): { date: string; hour: number; minute: number } {
  const shifted = new Date(now.getTime() + utcOffsetMinutes * 60 * 1000);
  return {
    date: shifted.toISOString().slice(0, 10),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
  };
}


// ═══════════════════════════════════════════════════════════════════════════════
// TRADING CALENDAR
// ═══════════════════════════════════════════════════════════════════════════════

export interface TradingCalendarOptions {
  /** ISO dates the exchange is closed (weekends are implicit) */
  holidays: ReadonlySet<string>;
  /** Exchange offset from UTC in minutes (IST = 330) */
  utcOffsetMinutes: number;
  logger?: Logger;
}

export class TradingCalendar {
  private readonly holidays: ReadonlySet<string>;
  private readonly utcOffsetMinutes: number;
  private readonly log: Logger;

  constructor(options: TradingCalendarOptions) {
    this.holidays = options.holidays;
    this.utcOffsetMinutes = options.utcOffsetMinutes;
    this.log = options.logger ?? silentLogger;
  }

  isTradingDay(isoDate: string): boolean {
    const weekday = weekdayOf(isoDate);
    if (weekday === 0 || weekday === 6) return false;
    return !this.holidays.has(isoDate);
  }

  /**
   * Most recent completed disclosure window, or null when no trading day
   * exists within the lookback (the primary deal source must then be skipped).
   */
  currentWindow(now: Date, cutoff: CutoffTime): DisclosureWindow | null {
    const clock = toExchangeClock(now, this.utcOffsetMinutes);
    const today = clock.date;
    const pastCutoff = clock.hour * 60 + clock.minute >= cutoff.hour * 60 + cutoff.minute;

    let toDate: string | null = null;
    if (pastCutoff && this.isTradingDay(today)) {
      toDate = today;
      this.log.info('Past cutoff on a trading day — today closes the window');
    } else {
      let candidate = addDays(today, -1);
      for (let i = 0; i < MAX_TO_DATE_LOOKBACK; i++) {
        if (this.isTradingDay(candidate)) {
          toDate = candidate;
          break;
        }
        candidate = addDays(candidate, -1);
      }
    }

    if (!toDate) {
      this.log.warn(`No trading day within ${MAX_TO_DATE_LOOKBACK} days of ${today}`);
      return null;
    }

    let fromDate = toDate;
    let steps = 0;
    let candidate = addDays(toDate, -1);
    while (steps < WINDOW_TRADING_STEPS) {
      if (daysBetween(candidate, toDate) > MAX_FROM_DATE_LOOKBACK_DAYS) {
        this.log.warn(`Could not find ${WINDOW_TRADING_STEPS} trading days within ${MAX_FROM_DATE_LOOKBACK_DAYS} days of ${toDate}`);
        break;
      }
      if (this.isTradingDay(candidate)) {
        steps++;
        fromDate = candidate;
      }
      candidate = addDays(candidate, -1);
    }

    const label = `${formatExchangeDate(fromDate)} → ${formatExchangeDate(toDate)}`;
    this.log.info(`Date range: ${label} (${steps + 1} trading days)`);

    return {
      from_date: fromDate,
      to_date: toDate,
      trading_days: steps + 1,
      complete: steps === WINDOW_TRADING_STEPS,
      label,
    };
  }
}
