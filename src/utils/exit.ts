import { bold, color } from '../display/ansi.js';

const RED = 9;
const GREEN = 10;

export function formatError(message: string, source?: string): string {
  let prefix = color(bold('ERROR'), RED);
  if (source !== undefined) {
    prefix += color(` in ${source}`, RED);
  }
  return `${prefix}${color(':', RED)} ${message}`;
}

export function formatSuccess(message: string): string {
  return color('SUCCESS: ', GREEN) + message;
}

/**
 * Print an error line, optionally naming the file it concerns, and exit with code 1.
 */
export function exitWithError(message: string, source?: string): never {
  console.log(formatError(message, source));
  process.exit(1);
}

export function exitWithSuccess(message: string): never {
  console.log(formatSuccess(message));
  process.exit(0);
}
