export type KeyPath = readonly (string | number)[];

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Render a key path the way it would be written in the document,
 * e.g. `timetable[2].start`.
 */
export function formatPath(path: KeyPath): string {
  if (path.length === 0) return '<root>';

  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out === '' ? segment : `.${segment}`;
    }
  }
  return out;
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export abstract class LoadError extends Error {
  readonly path: KeyPath;

  protected constructor(message: string, path: KeyPath) {
    super(message);
    this.path = path;
  }
}

export class ParseError extends LoadError {
  readonly line: number;
  readonly column: number;

  constructor(reason: string, line: number, column: number) {
    super(`${reason} (line ${line}, column ${column})`, []);
    this.name = 'ParseError';
    this.line = line;
    this.column = column;
  }
}

export class MissingFieldError extends LoadError {
  readonly field: string;

  constructor(path: KeyPath, field: string) {
    super(`Missing required key '${formatPath([...path, field])}'.`, path);
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

export class TypeMismatchError extends LoadError {
  readonly expected: string;
  readonly actual: unknown;

  constructor(path: KeyPath, expected: string, actual: unknown) {
    super(
      `The key '${formatPath(path)}' expected type '${expected}' but got '${formatValue(actual)}' instead.`,
      path
    );
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export type ValidationError = MissingFieldError | TypeMismatchError;
