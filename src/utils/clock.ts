// src/utils/clock.ts

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export const isClock = (value: string) => CLOCK_PATTERN.test(value);

/** Seconds since midnight for "HH:MM" or "HH:MM:SS". */
export function parseClock(value: string): number {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid time "${value}", expected HH:MM or HH:MM:SS`);
  }
  const [, hours, minutes, seconds = "0"] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/** Drops a zero seconds part so "09:00:00" and "09:00" store identically. */
export function normalizeClock(value: string): string {
  const total = parseClock(value);
  const hh = String(Math.floor(total / 3600)).padStart(2, "0");
  const mm = String(Math.floor((total % 3600) / 60)).padStart(2, "0");
  const ss = total % 60;
  return ss === 0 ? `${hh}:${mm}` : `${hh}:${mm}:${String(ss).padStart(2, "0")}`;
}

export const formatRange = (start: string, end: string) => `${start}-${end}`;
