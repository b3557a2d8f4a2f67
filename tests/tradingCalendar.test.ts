import { CalendarDataMissingError } from '../src/core/errors';
import { addDays } from '../src/core/time';
import { Market } from '../src/core/types';
import { offshoreHolidays, parseHolidayTable } from '../src/calendar/holidays';
import { makeCalendar } from './fixtures';

describe('TradingCalendar', () => {
  const calendar = makeCalendar();

  it('treats the National Day break as closed and the makeup Saturday as open', () => {
    expect(calendar.isTradingDay('domestic', '2025-10-01')).toBe(false);
    expect(calendar.isTradingDay('domestic', '2025-10-08')).toBe(false);
    expect(calendar.isTradingDay('domestic', '2025-10-09')).toBe(true);
    expect(calendar.isTradingDay('domestic', '2025-10-11')).toBe(true);
    expect(calendar.isTradingDay('domestic', '2025-10-12')).toBe(false);
    expect(calendar.nextTradingDay('domestic', '2025-09-27')).toBe('2025-09-28');
  });

  it('derives offshore holidays with observed shifts', () => {
    expect(calendar.isTradingDay('offshore', '2025-07-04')).toBe(false);
    expect(calendar.isTradingDay('offshore', '2025-11-27')).toBe(false);
    expect(offshoreHolidays(2027).has('2027-06-18')).toBe(true);
    expect(offshoreHolidays(2021).has('2021-12-24')).toBe(true);
    // New Year's Day 2022 fell on a Saturday and was not observed
    expect(calendar.isTradingDay('offshore', '2021-12-31')).toBe(true);
    expect(offshoreHolidays(2022).has('2022-01-01')).toBe(false);
  });

  it('applies the 15:00 cutoff in Shanghai time', () => {
    expect(calendar.isBeforeCutoff(new Date('2025-09-30T06:59:00Z'))).toBe(true);
    expect(calendar.isBeforeCutoff(new Date('2025-09-30T07:00:00Z'))).toBe(false);
    expect(calendar.isBeforeCutoff(new Date('2025-09-30T07:00:00Z'), '16:00')).toBe(true);
  });

  it('rolls late or non-trading submissions to the next trading day', () => {
    expect(calendar.effectiveTradeDate(new Date('2025-09-30T06:00:00Z'))).toBe('2025-09-30');
    expect(calendar.effectiveTradeDate(new Date('2025-09-30T07:30:00Z'))).toBe('2025-10-09');
    expect(calendar.effectiveTradeDate(new Date('2025-10-18T02:00:00Z'))).toBe('2025-10-20');
    // 01:00 local on the 30th, still the 29th in UTC
    expect(calendar.effectiveTradeDate(new Date('2025-09-29T17:00:00Z'))).toBe('2025-09-30');
  });

  it('confirms domestic funds T+1 and QDII funds after two joint trading days', () => {
    expect(calendar.confirmDate('2025-09-30', 'domestic')).toBe('2025-10-09');
    expect(calendar.nextJointTradingDay('2025-09-30')).toBe('2025-10-09');
    expect(calendar.confirmDate('2025-09-30', 'qdii')).toBe('2025-10-10');
    expect(calendar.confirmDate('2025-07-03', 'domestic')).toBe('2025-07-04');
    expect(calendar.confirmDate('2025-07-03', 'qdii')).toBe('2025-07-08');
  });

  const daysOf2025 = () => {
    const days: string[] = [];
    for (let d = '2025-01-01'; d <= '2025-12-31'; d = addDays(d, 1)) days.push(d);
    return days;
  };

  it('always moves forward to an open day', () => {
    const markets: Market[] = ['domestic', 'offshore'];
    for (const market of markets) {
      for (const day of daysOf2025()) {
        const next = calendar.nextTradingDay(market, day);
        expect(next > day).toBe(true);
        expect(calendar.isTradingDay(market, next)).toBe(true);
      }
    }
  });

  it('never confirms QDII before domestic, and neither goes backwards in trade date', () => {
    let previous: { domestic: string; qdii: string } | null = null;
    for (const day of daysOf2025()) {
      const domestic = calendar.confirmDate(day, 'domestic');
      const qdii = calendar.confirmDate(day, 'qdii');
      expect(qdii >= domestic).toBe(true);
      if (previous) {
        expect(domestic >= previous.domestic).toBe(true);
        expect(qdii >= previous.qdii).toBe(true);
      }
      previous = { domestic, qdii };
    }
  });

  it('refuses to guess for a year missing from the holiday table', () => {
    expect(() => calendar.isTradingDay('domestic', '2030-01-02')).toThrow(CalendarDataMissingError);
    expect(() => calendar.confirmDate('2026-12-31', 'domestic')).toThrow(
      'No domestic holiday table for 2027; refusing to guess trading days.'
    );
  });

  it('rejects malformed holiday tables', () => {
    expect(() => parseHolidayTable({ domestic: { '2025': { holidays: ['2025-13-01'] } } })).toThrow(
      /Invalid holiday table/
    );
  });
});
