import fs from 'fs';
import { z } from 'zod';
import { isoDateSchema } from '../core/schema';
import { formatISODate } from '../core/time';

const domesticYearSchema = z.object({
  holidays: z.array(isoDateSchema),
  makeupWorkdays: z.array(isoDateSchema).default([])
});

const holidayTableSchema = z.object({
  domestic: z.record(z.string().regex(/^\d{4}$/), domesticYearSchema)
});

export interface DomesticYear {
  holidays: Set<string>;
  makeupWorkdays: Set<string>;
}

export interface HolidayTable {
  domestic: Map<number, DomesticYear>;
}

export const parseHolidayTable = (raw: unknown): HolidayTable => {
  const result = holidayTableSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid holiday table:\n${errors.join('\n')}`);
  }
  const domestic = new Map<number, DomesticYear>();
  for (const [year, entry] of Object.entries(result.data.domestic)) {
    domestic.set(Number(year), {
      holidays: new Set(entry.holidays),
      makeupWorkdays: new Set(entry.makeupWorkdays)
    });
  }
  return { domestic };
};

export const loadHolidayTable = (filePath: string): HolidayTable =>
  parseHolidayTable(JSON.parse(fs.readFileSync(filePath, 'utf-8')));

// weekday: 0 = Sunday ... 6 = Saturday; month is 1-based
const nthWeekday = (year: number, month: number, weekday: number, n: number): Date => {
  const first = new Date(Date.UTC(year, month - 1, 1));
  const offset = (weekday - first.getUTCDay() + 7) % 7;
  return new Date(Date.UTC(year, month - 1, 1 + offset + (n - 1) * 7));
};

const lastWeekday = (year: number, month: number, weekday: number): Date => {
  const last = new Date(Date.UTC(year, month, 0));
  const offset = (last.getUTCDay() - weekday + 7) % 7;
  return new Date(Date.UTC(year, month - 1, last.getUTCDate() - offset));
};

const observed = (date: Date): Date => {
  const day = date.getUTCDay();
  if (day === 6) return new Date(date.getTime() - 86400000);
  if (day === 0) return new Date(date.getTime() + 86400000);
  return date;
};

export const offshoreHolidays = (year: number): Set<string> => {
  const fixed = (month: number, day: number) => new Date(Date.UTC(year, month - 1, day));
  const dates: Date[] = [
    nthWeekday(year, 1, 1, 3), // Martin Luther King Jr. Day
    nthWeekday(year, 2, 1, 3), // Presidents' Day
    lastWeekday(year, 5, 1), // Memorial Day
    observed(fixed(6, 19)),
    observed(fixed(7, 4)),
    nthWeekday(year, 9, 1, 1), // Labor Day
    nthWeekday(year, 11, 4, 4), // Thanksgiving
    observed(fixed(12, 25))
  ];
  // A Saturday New Year's Day is not moved back into the previous year.
  const newYear = fixed(1, 1);
  if (newYear.getUTCDay() !== 6) dates.push(observed(newYear));
  return new Set(dates.map(formatISODate));
};
