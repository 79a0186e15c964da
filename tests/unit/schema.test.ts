import { describe, it, expect } from 'vitest';
import { build } from '../../src/schema/build.js';
import {
  MissingFieldError,
  ParseError,
  TypeMismatchError,
  formatPath,
} from '../../src/schema/errors.js';
import { load, parseDocument } from '../../src/schema/loader.js';
import { describeShape, schema, type Infer, type Shape } from '../../src/schema/shape.js';
import { courseShape } from '../../src/courses/course.js';
import { settingsShape } from '../../src/utils/settings.js';

const colorShape = schema.record('Palette', { color: schema.number() });

describe('parseDocument', () => {
  it('parses an empty document to an empty mapping', () => {
    expect(parseDocument('')).toEqual({ ok: true, value: {} });
    expect(parseDocument('# only a comment\n')).toEqual({ ok: true, value: {} });
  });

  it('parses nested mappings and sequences', () => {
    const result = parseDocument('a:\n  b: 1\nlist:\n  - x\n  - true\n  - null\n');
    expect(result).toEqual({ ok: true, value: { a: { b: 1 }, list: ['x', true, null] } });
  });

  it('reports malformed syntax with its location', () => {
    const result = parseDocument('a: [1, 2');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.path).toEqual([]);
    expect(result.error.line).toBeGreaterThanOrEqual(1);
    expect(result.error.message).toMatch(/\(line \d+, column \d+\)$/);
  });

  it('reports alias expansion that exceeds the alias limit', () => {
    const levels = ['a: &a [x, x, x, x, x, x, x, x, x, x]'];
    for (const name of ['b', 'c', 'd', 'e']) {
      const previous = String.fromCharCode(name.charCodeAt(0) - 1);
      levels.push(`${name}: &${name} [${Array(10).fill(`*${previous}`).join(', ')}]`);
    }

    const result = parseDocument(levels.join('\n') + '\n');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error.message).toMatch(/^Excessive alias count/);
    expect(result.error.line).toBe(1);
    expect(result.error.column).toBe(1);

    expect(load(schema.record('Empty', {}), levels.join('\n')).ok).toBe(false);
  });

  it('keeps a __proto__ key as an own property', () => {
    const result = parseDocument('__proto__: x\n');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.getOwnPropertyDescriptor(result.value, '__proto__')?.value).toBe('x');
    expect(Object.getPrototypeOf(result.value)).toBe(Object.prototype);
  });

  it('rejects duplicate keys', () => {
    const result = parseDocument('a: 1\na: 2\n');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParseError);
  });
});

describe('build', () => {
  it('builds nested records and sequences', () => {
    const result = build(courseShape, {
      name: 'Biology',
      abbreviation: 'BIO',
      timetable: [{ type: 'lab', weekday: 'friday', start: 600, end: 690, room: 'S1' }],
    });

    expect(result).toEqual({
      ok: true,
      value: {
        name: 'Biology',
        abbreviation: 'BIO',
        timetable: [{ type: 'lab', weekday: 'friday', start: 600, end: 690, room: 'S1' }],
      },
    });
  });

  it('ignores keys the record does not declare', () => {
    const result = build(colorShape, { color: 4, shade: 'dark' });
    expect(result).toEqual({ ok: true, value: { color: 4 } });
  });

  it('resolves absent and null optional fields to nothing', () => {
    const result = build(courseShape, { name: 'Chemistry', abbreviation: 'CH', website: null });
    expect(result).toEqual({ ok: true, value: { name: 'Chemistry', abbreviation: 'CH' } });
  });

  it('treats null as a mismatch for required fields', () => {
    const result = build(colorShape, { color: null });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TypeMismatchError);
    expect(result.error.message).toBe("The key 'color' expected type 'number' but got 'null' instead.");
  });

  it('points at the offending sequence element', () => {
    const result = build(courseShape, {
      name: 'Biology',
      abbreviation: 'BIO',
      timetable: [
        { type: 'lab', weekday: 'friday', start: 600, end: 690 },
        { type: 'lab', weekday: 'friday', start: 'soon', end: 690 },
      ],
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.path).toEqual(['timetable', 1, 'start']);
    expect(result.error.message).toBe(
      "The key 'timetable[1].start' expected type 'number' but got 'soon' instead."
    );
  });

  it('names the expected record or list type', () => {
    const notList = build(courseShape, { name: 'x', abbreviation: 'y', timetable: 5 });
    expect(notList.ok).toBe(false);
    if (notList.ok) return;
    expect(notList.error).toBeInstanceOf(TypeMismatchError);
    expect(notList.error.message).toBe(
      "The key 'timetable' expected type 'list of TimetableEntry' but got '5' instead."
    );

    const notRecord = build(courseShape, ['a', 'b']);
    expect(notRecord.ok).toBe(false);
    if (notRecord.ok) return;
    expect(notRecord.error.message).toBe(
      `The key '<root>' expected type 'Course' but got '["a","b"]' instead.`
    );
  });
});

describe('load', () => {
  it('loads an empty document against an all-optional shape', () => {
    const result = load(settingsShape, '');
    expect(result).toEqual({ ok: true, value: {} });
  });

  it('reports a type mismatch on the named field', () => {
    const result = load(colorShape, 'color: blue\n');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TypeMismatchError);
    expect(result.error.path).toEqual(['color']);
    expect(result.error.message).toBe("The key 'color' expected type 'number' but got 'blue' instead.");
  });

  it('reports the missing top-level field rather than the ones present', () => {
    const shape = schema.record('Top', { c: schema.string() });
    const result = load(shape, 'a:\n  b: 1\n');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(MissingFieldError);
    if (!(result.error instanceof MissingFieldError)) return;
    expect(result.error.field).toBe('c');
    expect(result.error.path).toEqual([]);
    expect(result.error.message).toBe("Missing required key 'c'.");
  });

  it('reports missing keys inside nested records with their full path', () => {
    const result = load(courseShape, 'name: A\nabbreviation: B\ntimetable:\n  - type: lab\n');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Missing required key 'timetable[0].weekday'.");
  });

  it('does not read YAML 1.1 words as booleans', () => {
    const result = load(
      schema.record('Flag', { hasHomework: schema.boolean() }),
      'hasHomework: yes\n'
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "The key 'hasHomework' expected type 'boolean' but got 'yes' instead."
    );
  });

  it('builds a field named __proto__', () => {
    const shape = schema.record('Odd', { ['__proto__']: schema.string() });
    const result = load(shape, '__proto__: x\n');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.hasOwn(result.value, '__proto__')).toBe(true);
    expect(Object.getOwnPropertyDescriptor(result.value, '__proto__')?.value).toBe('x');
  });

  it('returns typed values', () => {
    const result = load(colorShape, 'color: 208\n');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const color: number = result.value.color;
    expect(color).toBe(208);
  });
});

function loadOrThrow<S extends Shape>(shape: S, text: string): Infer<S> {
  const result = load(shape, text);
  if (!result.ok) throw result.error;
  return result.value;
}

describe('generic loading', () => {
  it('keeps inferred field types through a generic wrapper', () => {
    const course = loadOrThrow(courseShape, 'name: A\nabbreviation: B\ntimetable: []\n');
    const name: string = course.name;
    const starts: number[] | undefined = course.timetable?.map((entry) => entry.start);

    expect(name).toBe('A');
    expect(starts).toEqual([]);
  });
});

describe('formatPath', () => {
  it('writes keys and indices the way a document would', () => {
    expect(formatPath([])).toBe('<root>');
    expect(formatPath(['a'])).toBe('a');
    expect(formatPath(['a', 0, 'b'])).toBe('a[0].b');
    expect(formatPath([2, 'x'])).toBe('[2].x');
  });
});

describe('describeShape', () => {
  it('describes optional shapes by their inner shape', () => {
    expect(describeShape(schema.optional(schema.sequence(schema.string())))).toBe('list of string');
  });
});
