import { Command } from 'commander';
import { checkCommand } from './commands/check.js';
import { courseCommand } from './commands/course.js';
import { timetableCommand } from './commands/timetable.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('school')
    .description('Course timetables and info files from the terminal')
    .version('1.0.0');

  program.addCommand(checkCommand);
  program.addCommand(timetableCommand);
  program.addCommand(courseCommand);

  return program;
}
