import path from 'path';
import { Config } from '../types/index.js';
import { loadFileOrExit } from '../schema/loader.js';
import { schema } from '../schema/shape.js';
import { config } from './config.js';

export const courseTypeShape = schema.record('CourseType', {
  name: schema.string(),
  color: schema.number(),
  hasHomework: schema.boolean(),
});

export const settingsShape = schema.record('Settings', {
  coursesFolder: schema.optional(schema.string()),
  courseTypes: schema.optional(schema.sequence(courseTypeShape)),
});

/**
 * The built-in config overlaid with the settings file, if there is one.
 * A relative courses folder is resolved against the settings file's directory.
 */
export async function loadSettings(settingsFile: string = config.paths.settings): Promise<Config> {
  const settings = await loadFileOrExit(settingsShape, settingsFile, { allowMissing: true });

  return {
    ...config,
    coursesFolder:
      settings.coursesFolder !== undefined
        ? path.resolve(path.dirname(settingsFile), settings.coursesFolder)
        : config.coursesFolder,
    courseTypes: settings.courseTypes ?? config.courseTypes,
  };
}
