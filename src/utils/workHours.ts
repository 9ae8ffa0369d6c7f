const TIME_RE = /^(\d{1,2}):(\d{1,2})$/;

// Shifts longer than this get a one hour lunch deduction.
const LUNCH_THRESHOLD_MINUTES = 6 * 60;
const LUNCH_MINUTES = 60;

export const ZERO_HOURS = '0:00';

/** Minutes since midnight for an "H:MM"/"HH:MM" string, or null if it does not parse. */
export function parseClockTime(value: string): number | null {
  const match = TIME_RE.exec(value);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

export function formatDuration(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Worked time between check-in and check-out, rendered as "H:MM".
 * Missing or unparseable times, or a check-out not after the check-in, give "0:00".
 */
export function calculateWorkHours(checkIn?: string | null, checkOut?: string | null): string {
  if (!checkIn || !checkOut) return ZERO_HOURS;

  const start = parseClockTime(checkIn);
  const end = parseClockTime(checkOut);
  if (start === null || end === null || end <= start) return ZERO_HOURS;

  let worked = end - start;
  if (worked > LUNCH_THRESHOLD_MINUTES) worked -= LUNCH_MINUTES;
  return formatDuration(worked);
}
