import { Command } from 'commander';
import { loadCourses } from '../../courses/course.js';
import { nextEntry, scheduleEntries, timetableRows } from '../../courses/timetable.js';
import { printTable } from '../../display/table.js';
import { exitWithError } from '../../utils/exit.js';
import { logger } from '../../utils/logger.js';
import { loadSettings } from '../../utils/settings.js';
import { dueMessage, todayIndex } from '../../utils/time.js';

export const timetableCommand = new Command('timetable')
  .description('Show the weekly timetable of all courses')
  .option('--no-next', 'Do not show when the next class starts')
  .action(async (options: { next: boolean }) => {
    try {
      const settings = await loadSettings();
      const courses = await loadCourses(settings.coursesFolder);
      const entries = scheduleEntries(courses);

      if (entries.length === 0) {
        console.log('No timetable entries found.');
        return;
      }

      const now = new Date();
      printTable(timetableRows(entries, settings.courseTypes, todayIndex(now)));

      const upcoming = options.next ? nextEntry(entries, now) : undefined;
      if (upcoming) {
        const { course, entry } = upcoming.scheduled;
        console.log(`\nNext: ${course.name} (${entry.type}) in ${dueMessage(upcoming.minutes * 60 * 1000)}`);
      }
    } catch (error) {
      logger.error(`Timetable failed: ${error}`);
      exitWithError(String(error));
    }
  });
