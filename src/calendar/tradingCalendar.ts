import { CalendarDataMissingError } from '../core/errors';
import { addDays, isWeekend, localDateInZone, minutesOfDayInZone, parseClock } from '../core/time';
import { InstrumentClass, Market } from '../core/types';
import { HolidayTable, offshoreHolidays } from './holidays';

export interface CalendarOptions {
  timezone: string;
  cutoff: string; // HH:mm, local to `timezone`
}

// No market in scope closes for longer than this; a longer gap means bad data.
const MAX_SCAN_DAYS = 40;

/**
 * Trading days, the 15:00 unknown-price cutoff and T+N confirmation dates for
 * the domestic fund market and the offshore market that QDII funds track.
 *
 * Dates are ISO `YYYY-MM-DD` strings interpreted as calendar days; the cutoff is
 * evaluated in the configured timezone.
 */
export class TradingCalendar {
  private readonly table: HolidayTable;
  private readonly options: CalendarOptions;

  constructor(table: HolidayTable, options: CalendarOptions) {
    this.table = table;
    this.options = options;
    parseClock(options.cutoff);
  }

  get timezone() {
    return this.options.timezone;
  }

  isTradingDay(market: Market, date: string): boolean {
    return market === 'domestic' ? this.isDomesticTradingDay(date) : this.isOffshoreTradingDay(date);
  }

  /** First date strictly after `date` that trades in `market`. */
  nextTradingDay(market: Market, date: string): string {
    return this.scanForward(date, (d) => this.isTradingDay(market, d), `${market} trading day`);
  }

  isBeforeCutoff(instant: Date, cutoff = this.options.cutoff, tz = this.options.timezone): boolean {
    return minutesOfDayInZone(instant, tz) < parseClock(cutoff);
  }

  /**
   * Trade date an order submitted at `submitInstant` is priced on: the same day
   * before the cutoff on a trading day, otherwise the next trading day.
   */
  effectiveTradeDate(submitInstant: Date, market: Market = 'domestic'): string {
    const localDate = localDateInZone(submitInstant, this.options.timezone);
    if (this.isBeforeCutoff(submitInstant) && this.isTradingDay(market, localDate)) {
      return localDate;
    }
    return this.nextTradingDay(market, localDate);
  }

  /**
   * Domestic funds confirm one domestic trading day after the trade date.
   * QDII funds confirm two steps later, where every step must land on a day both
   * the domestic settlement system and the offshore market are open.
   */
  confirmDate(tradeDate: string, instrumentClass: InstrumentClass): string {
    if (instrumentClass === 'domestic') {
      return this.nextTradingDay('domestic', tradeDate);
    }
    let current = tradeDate;
    for (let step = 0; step < 2; step++) {
      current = this.nextJointTradingDay(current);
    }
    return current;
  }

  nextJointTradingDay(date: string): string {
    return this.scanForward(
      date,
      (d) => this.isDomesticTradingDay(d) && this.isOffshoreTradingDay(d),
      'day open in both markets'
    );
  }

  private isDomesticTradingDay(date: string): boolean {
    const year = Number(date.slice(0, 4));
    const entry = this.table.domestic.get(year);
    if (!entry) {
      throw new CalendarDataMissingError('domestic', year);
    }
    if (entry.makeupWorkdays.has(date)) return true;
    if (isWeekend(date)) return false;
    return !entry.holidays.has(date);
  }

  private isOffshoreTradingDay(date: string): boolean {
    if (isWeekend(date)) return false;
    return !offshoreHolidays(Number(date.slice(0, 4))).has(date);
  }

  private scanForward(date: string, accept: (candidate: string) => boolean, label: string): string {
    let candidate = addDays(date, 1);
    for (let i = 0; i < MAX_SCAN_DAYS; i++) {
      if (accept(candidate)) return candidate;
      candidate = addDays(candidate, 1);
    }
    throw new Error(`No ${label} within ${MAX_SCAN_DAYS} days after ${date}`);
  }
}
