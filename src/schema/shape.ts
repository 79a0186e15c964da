export type RawValue = string | number | boolean | null | RawValue[] | { [key: string]: RawValue };

export type ScalarKind = 'string' | 'number' | 'boolean';

interface ScalarTypes {
  string: string;
  number: number;
  boolean: boolean;
}

export interface ScalarShape<K extends ScalarKind = ScalarKind> {
  readonly kind: 'scalar';
  readonly type: K;
}

export interface SequenceShape<E = unknown> {
  readonly kind: 'sequence';
  readonly element: E;
}

export interface RecordShape<F = unknown> {
  readonly kind: 'record';
  readonly name: string;
  readonly fields: F;
}

export interface OptionalShape<S = unknown> {
  readonly kind: 'optional';
  readonly inner: S;
}

export type Shape =
  | ScalarShape
  | SequenceShape<Shape>
  | RecordShape<Fields>
  | OptionalShape<Shape>;

export interface Fields {
  readonly [field: string]: Shape;
}

type OptionalKeys<F> = {
  [K in keyof F]: F[K] extends OptionalShape ? K : never;
}[keyof F];

type RequiredKeys<F> = Exclude<keyof F, OptionalKeys<F>>;

type Simplify<T> = { [K in keyof T]: T[K] };

type InferFields<F> = Simplify<
  { [K in RequiredKeys<F>]: Infer<F[K]> } & { [K in OptionalKeys<F>]?: Infer<F[K]> }
>;

/**
 * The value type produced by building a shape.
 *
 * Tuple-wrapped checks keep this from distributing over the `Shape` union,
 * so it only recurses into concrete shapes.
 */
export type Infer<S> = [S] extends [ScalarShape<infer K extends ScalarKind>]
  ? ScalarTypes[K]
  : [S] extends [SequenceShape<infer E>]
    ? Infer<E>[]
    : [S] extends [RecordShape<infer F>]
      ? InferFields<F>
      : [S] extends [OptionalShape<infer I>]
        ? Infer<I> | undefined
        : never;

export const schema = {
  string: (): ScalarShape<'string'> => ({ kind: 'scalar', type: 'string' }),
  number: (): ScalarShape<'number'> => ({ kind: 'scalar', type: 'number' }),
  boolean: (): ScalarShape<'boolean'> => ({ kind: 'scalar', type: 'boolean' }),

  sequence: <E extends Shape>(element: E): SequenceShape<E> => ({ kind: 'sequence', element }),

  record: <F extends Fields>(name: string, fields: F): RecordShape<F> => ({
    kind: 'record',
    name,
    fields,
  }),

  optional: <S extends Shape>(inner: S): OptionalShape<S> => ({ kind: 'optional', inner }),
};

export function describeShape(shape: Shape): string {
  switch (shape.kind) {
    case 'scalar':
      return shape.type;
    case 'sequence':
      return `list of ${describeShape(shape.element)}`;
    case 'record':
      return shape.name;
    case 'optional':
      return describeShape(shape.inner);
  }
}
