import fs from 'fs/promises';
import path from 'path';
import { loadFileOrExit } from '../schema/loader.js';
import { schema, type Infer } from '../schema/shape.js';
import { logger } from '../utils/logger.js';

export const COURSE_FILE = 'info.yaml';

export const timetableEntryShape = schema.record('TimetableEntry', {
  type: schema.string(),
  weekday: schema.string(),
  start: schema.number(),
  end: schema.number(),
  room: schema.optional(schema.string()),
});

export const courseShape = schema.record('Course', {
  name: schema.string(),
  abbreviation: schema.string(),
  website: schema.optional(schema.string()),
  timetable: schema.optional(schema.sequence(timetableEntryShape)),
});

export type TimetableEntry = Infer<typeof timetableEntryShape>;

export type Course = Infer<typeof courseShape> & {
  /** Directory the course's info file lives in. */
  folder: string;
};

/**
 * Every directory under `coursesFolder` that holds an info file, sorted by name.
 */
export async function findCourseFolders(coursesFolder: string): Promise<string[]> {
  const entries = await fs.readdir(coursesFolder, { withFileTypes: true });
  const folders: string[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const folder = path.join(coursesFolder, entry.name);
    try {
      await fs.access(path.join(folder, COURSE_FILE));
      folders.push(folder);
    } catch {
      logger.debug(`Skipping ${folder}: no ${COURSE_FILE}`);
    }
  }

  return folders.sort();
}

export async function loadCourse(folder: string): Promise<Course> {
  const info = await loadFileOrExit(courseShape, path.join(folder, COURSE_FILE));
  return { ...info, folder };
}

export async function loadCourses(coursesFolder: string): Promise<Course[]> {
  const folders = await findCourseFolders(coursesFolder);
  const courses: Course[] = [];
  for (const folder of folders) {
    courses.push(await loadCourse(folder));
  }
  return courses;
}
