import { describeShape, type Infer, type RawValue, type Shape } from './shape.js';
import {
  err,
  ok,
  MissingFieldError,
  TypeMismatchError,
  type KeyPath,
  type Result,
  type ValidationError,
} from './errors.js';

type Mapping = { [key: string]: RawValue };

function isMapping(raw: RawValue | undefined): raw is Mapping {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function buildNode(
  shape: Shape,
  raw: RawValue | undefined,
  path: KeyPath
): Result<unknown, ValidationError> {
  switch (shape.kind) {
    case 'optional':
      if (raw === null || raw === undefined) return ok(undefined);
      return buildNode(shape.inner, raw, path);

    case 'scalar':
      if (typeof raw !== shape.type) {
        return err(new TypeMismatchError(path, shape.type, raw));
      }
      return ok(raw);

    case 'sequence': {
      if (!Array.isArray(raw)) {
        return err(new TypeMismatchError(path, describeShape(shape), raw));
      }
      const items: unknown[] = [];
      for (let i = 0; i < raw.length; i++) {
        const item = buildNode(shape.element, raw[i], [...path, i]);
        if (!item.ok) return item;
        items.push(item.value);
      }
      return ok(items);
    }

    case 'record': {
      if (!isMapping(raw)) {
        return err(new TypeMismatchError(path, describeShape(shape), raw));
      }
      const value: Record<string, unknown> = {};
      // Keys the record does not declare are ignored
      for (const [field, fieldShape] of Object.entries(shape.fields)) {
        const fieldRaw = Object.hasOwn(raw, field) ? raw[field] : undefined;
        if (fieldRaw === undefined && fieldShape.kind !== 'optional') {
          return err(new MissingFieldError(path, field));
        }
        const built = buildNode(fieldShape, fieldRaw, [...path, field]);
        if (!built.ok) return built;
        if (built.value !== undefined) {
          Object.defineProperty(value, field, {
            value: built.value,
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
      }
      return ok(value);
    }
  }
}

/**
 * Walk `raw` against `shape` and produce the typed value, or the first
 * field that does not match. Nothing is returned for a partially valid input.
 */
export function build<S extends Shape>(
  shape: S,
  raw: RawValue | undefined,
  path?: KeyPath
): Result<Infer<S>, ValidationError>;
export function build(
  shape: Shape,
  raw: RawValue | undefined,
  path: KeyPath = []
): Result<unknown, ValidationError> {
  return buildNode(shape, raw, path);
}
