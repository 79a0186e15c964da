import { color, underline } from '../display/ansi.js';
import { dataRow, sectionRow, type TableRow } from '../display/table.js';
import type { CourseType } from '../types/index.js';
import {
  MINUTES_PER_WEEK,
  WEEKDAYS,
  minuteOfWeek,
  minutesToHHMM,
  weekdayIndex,
} from '../utils/time.js';
import { logger } from '../utils/logger.js';
import type { Course, TimetableEntry } from './course.js';

export interface ScheduledEntry {
  course: Course;
  entry: TimetableEntry;
  day: number;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Flatten all courses' timetables into one list ordered by weekday and start time.
 * Entries naming an unknown weekday are skipped.
 */
export function scheduleEntries(courses: readonly Course[]): ScheduledEntry[] {
  const scheduled: ScheduledEntry[] = [];

  for (const course of courses) {
    for (const entry of course.timetable ?? []) {
      const day = weekdayIndex(entry.weekday);
      if (day === -1) {
        logger.warn(`${course.name}: unknown weekday '${entry.weekday}'`);
        continue;
      }
      scheduled.push({ course, entry, day });
    }
  }

  return scheduled.sort((a, b) => a.day - b.day || a.entry.start - b.entry.start);
}

export function timetableRows(
  entries: readonly ScheduledEntry[],
  courseTypes: readonly CourseType[],
  today: number
): TableRow[] {
  const rows: TableRow[] = [];
  let currentDay = -1;

  for (const { course, entry, day } of entries) {
    if (day !== currentDay) {
      const caption = capitalize(WEEKDAYS[day]);
      rows.push(sectionRow(day === today ? underline(caption) : caption));
      currentDay = day;
    }

    const type = courseTypes.find((t) => t.name === entry.type);
    const name = type ? color(course.name, type.color) : course.name;

    rows.push(
      dataRow(
        `${minutesToHHMM(entry.start)} - ${minutesToHHMM(entry.end)}`,
        name,
        entry.type,
        entry.room ?? ''
      )
    );
  }

  return rows;
}

/**
 * The next entry to start after `now`, with the minutes remaining until it does.
 */
export function nextEntry(
  entries: readonly ScheduledEntry[],
  now: Date
): { scheduled: ScheduledEntry; minutes: number } | undefined {
  const current = minuteOfWeek(now);
  let best: { scheduled: ScheduledEntry; minutes: number } | undefined;

  for (const scheduled of entries) {
    const start = scheduled.day * 24 * 60 + scheduled.entry.start;
    const minutes = (((start - current) % MINUTES_PER_WEEK) + MINUTES_PER_WEEK) % MINUTES_PER_WEEK;
    if (minutes === 0) continue;
    if (!best || minutes < best.minutes) {
      best = { scheduled, minutes };
    }
  }

  return best;
}
