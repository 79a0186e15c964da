import { Command } from 'commander';
import { courseShape } from '../../courses/course.js';
import { loadFileOrExit } from '../../schema/loader.js';
import { exitWithError, exitWithSuccess } from '../../utils/exit.js';
import { logger } from '../../utils/logger.js';

export const checkCommand = new Command('check')
  .description('Validate a course info file')
  .argument('<file>', 'Path to the info.yaml file')
  .action(async (file: string) => {
    try {
      const course = await loadFileOrExit(courseShape, file);
      exitWithSuccess(`${course.name} is valid.`);
    } catch (error) {
      logger.error(`Check failed: ${error}`);
      exitWithError(String(error), file);
    }
  });
