import { dataRow, sectionRow, type TableRow } from '../display/table.js';
import type { CourseType } from '../types/index.js';
import { minutesToHHMM } from '../utils/time.js';
import type { Course } from './course.js';

export function courseDetailRows(course: Course, courseTypes: readonly CourseType[]): TableRow[] {
  const timetable = course.timetable ?? [];
  const hasHomework = timetable.some(
    (entry) => courseTypes.find((t) => t.name === entry.type)?.hasHomework ?? false
  );

  const rows: TableRow[] = [
    sectionRow(course.abbreviation),
    dataRow('Name', course.name),
    dataRow('Website', course.website ?? '-'),
    dataRow('Homework', hasHomework ? 'yes' : 'no'),
    dataRow('Folder', course.folder),
  ];

  if (timetable.length > 0) {
    rows.push(sectionRow('Timetable'));
    for (const entry of timetable) {
      const room = entry.room ? ` (${entry.room})` : '';
      rows.push(
        dataRow(
          entry.weekday,
          `${minutesToHHMM(entry.start)} - ${minutesToHHMM(entry.end)} ${entry.type}${room}`
        )
      );
    }
  }

  return rows;
}
