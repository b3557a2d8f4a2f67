const DAY_MS = 86400000;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const parseISODate = (iso: string): Date => {
  if (!ISO_DATE.test(iso)) {
    throw new Error(`Invalid ISO date: ${iso}`);
  }
  const parsed = new Date(`${iso}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime()) || formatISODate(parsed) !== iso) {
    throw new Error(`Invalid ISO date: ${iso}`);
  }
  return parsed;
};

export const isISODate = (value: string): boolean => {
  try {
    parseISODate(value);
    return true;
  } catch {
    return false;
  }
};

export const addDays = (iso: string, days: number): string =>
  formatISODate(new Date(parseISODate(iso).getTime() + days * DAY_MS));

// 0 = Sunday ... 6 = Saturday
export const weekday = (iso: string): number => parseISODate(iso).getUTCDay();

export const isWeekend = (iso: string): boolean => {
  const day = weekday(iso);
  return day === 0 || day === 6;
};

// Wall-clock time in `tz` expressed as a Date whose UTC fields carry the local values.
const tzDate = (date: Date, tz: string): Date => {
  const iso = date.toLocaleString('sv-SE', { timeZone: tz }).replace(' ', 'T');
  return new Date(`${iso}Z`);
};

export const localDateInZone = (instant: Date, tz: string): string => formatISODate(tzDate(instant, tz));

export const minutesOfDayInZone = (instant: Date, tz: string): number => {
  const local = tzDate(instant, tz);
  return local.getUTCHours() * 60 + local.getUTCMinutes();
};

export const parseClock = (clock: string): number => {
  const match = /^(\d{1,2}):(\d{2})$/.exec(clock);
  if (!match) throw new Error(`Invalid clock time: ${clock}`);
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) throw new Error(`Invalid clock time: ${clock}`);
  return hours * 60 + minutes;
};

// Interprets a naive "YYYY-MM-DD HH:mm[:ss]" wall-clock string as local time in `tz`.
export const zonedToInstant = (wallClock: string, tz: string): Date => {
  const normalized = wallClock.trim().replace(' ', 'T');
  const asUtc = new Date(`${normalized.length === 16 ? `${normalized}:00` : normalized}Z`);
  if (Number.isNaN(asUtc.getTime())) {
    throw new Error(`Invalid wall-clock time: ${wallClock}`);
  }
  const offsetMs = tzDate(asUtc, tz).getTime() - asUtc.getTime();
  return new Date(asUtc.getTime() - offsetMs);
};

export const parseInstant = (value?: string): Date => {
  if (!value) return new Date();
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid timestamp: ${value}`);
  }
  return parsed;
};
