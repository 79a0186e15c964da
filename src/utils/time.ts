import dayjs from 'dayjs';

export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export const MINUTES_PER_WEEK = 7 * 24 * 60;

/** Index into WEEKDAYS, or -1 when the name is not a weekday. */
export function weekdayIndex(name: string): number {
  const lower = name.toLowerCase();
  return WEEKDAYS.findIndex((day) => day === lower);
}

// dayjs counts from Sunday, WEEKDAYS from Monday
export function todayIndex(date: Date = new Date()): number {
  return (dayjs(date).day() + 6) % 7;
}

export function minuteOfWeek(date: Date): number {
  const d = dayjs(date);
  return todayIndex(date) * 24 * 60 + d.hour() * 60 + d.minute();
}

export function minutesToHHMM(minutes: number): string {
  const hours = String(Math.floor(minutes / 60)).padStart(2);
  return `${hours}:${String(minutes % 60).padStart(2, '0')}`;
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count > 1 ? 's' : ''}`;
}

/**
 * Human-readable distance such as "3 days, 2 hours" or "5 minutes".
 * Minutes are only shown when the hour count is zero.
 */
export function dueMessage(milliseconds: number): string {
  const totalSeconds = Math.floor(Math.abs(milliseconds) / 1000);
  const days = Math.floor(totalSeconds / 86400);
  const seconds = totalSeconds % 86400;

  const parts: string[] = [];
  if (days !== 0) parts.push(plural(days, 'day'));

  const hours = Math.floor(seconds / 3600);
  if (hours !== 0) {
    parts.push(plural(hours, 'hour'));
  } else {
    const minutes = Math.floor(seconds / 60);
    if (minutes !== 0) parts.push(plural(minutes, 'minute'));
  }

  return parts.length === 0 ? 'now' : parts.join(', ');
}
