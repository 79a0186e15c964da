import { Command } from 'commander';
import { loadCourses } from '../../courses/course.js';
import { courseDetailRows } from '../../courses/details.js';
import { printTable } from '../../display/table.js';
import { InputCancelled, pickOne } from '../../prompt/picker.js';
import { exitWithError } from '../../utils/exit.js';
import { logger } from '../../utils/logger.js';
import { loadSettings } from '../../utils/settings.js';

export const courseCommand = new Command('course')
  .description('Pick a course and show its details')
  .action(async () => {
    try {
      const settings = await loadSettings();
      const courses = await loadCourses(settings.coursesFolder);

      if (courses.length === 0) {
        exitWithError('No courses found.', settings.coursesFolder);
      }

      const course = await pickOne(courses, {
        label: (c) => `${c.name} (${c.abbreviation})`,
      });
      printTable(courseDetailRows(course, settings.courseTypes));
    } catch (error) {
      if (error instanceof InputCancelled) {
        process.exit(0);
      }
      logger.error(`Course lookup failed: ${error}`);
      exitWithError(String(error));
    }
  });
