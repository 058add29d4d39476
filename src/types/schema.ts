/**
 * Schema definitions for record <-> CSV mapping.
 *
 * A record type description lists the fields of a record in declaration
 * order. Scalar fields become one column each; unwrap fields contribute the
 * columns of a nested record type in their place.
 */

export type FieldKind = 'string' | 'number' | 'integer' | 'boolean';

export interface ScalarField<K extends FieldKind = FieldKind, O extends boolean = boolean> {
  kind: K;
  /** Whether an empty cell / missing value is allowed (default: false) */
  optional: O;
  /** Column name override (default: the property key) */
  column?: string;
}

export interface UnwrapField<S extends RecordShape = RecordShape> {
  kind: 'unwrap';
  /** The nested record type whose columns are flattened into the parent */
  type: RecordType<S>;
  /** Prepended to every column name the nested type contributes */
  prefix?: string;
}

export type FieldDescriptor = ScalarField | UnwrapField;

export interface RecordShape {
  [key: string]: FieldDescriptor;
}

export interface RecordType<S extends RecordShape = RecordShape> {
  /** Name used in diagnostics */
  name: string;
  fields: S;
  /**
   * Property keys in column order, for field sets whose keys may look like
   * integers (objects list those first). Defaults to the key order of `fields`.
   */
  order?: readonly (keyof S & string)[];
}

interface ScalarValues {
  string: string;
  number: number;
  integer: number;
  boolean: boolean;
}

export type InferField<F> =
  F extends UnwrapField<infer S extends RecordShape>
    ? InferRecord<S>
    : F extends ScalarField<infer K extends FieldKind, infer O extends boolean>
      ? O extends true
        ? ScalarValues[K] | undefined
        : ScalarValues[K]
      : never;

type OptionalKeys<S extends RecordShape> = {
  [P in keyof S]: S[P] extends ScalarField<FieldKind, true> ? P : never;
}[keyof S];

type Simplify<T> = { [K in keyof T]: T[K] };

/**
 * The record type produced by decoding and accepted by encoding.
 * Optional scalar fields become optional properties.
 */
export type InferRecord<S extends RecordShape> = Simplify<
  { [P in Exclude<keyof S, OptionalKeys<S>>]: InferField<S[P]> } & {
    [P in OptionalKeys<S>]?: InferField<S[P]>;
  }
>;

export type RecordOf<R> = R extends RecordType<infer S extends RecordShape> ? InferRecord<S> : never;

/**
 * One position in a CSV line, bound to a scalar field possibly nested
 * inside unwrapped sub-records.
 */
export interface Column {
  name: string;
  /** Property keys from the top-level record down to the scalar field */
  path: readonly string[];
  index: number;
  field: ScalarField;
  get(record: unknown): unknown;
}

export type SchemaNode =
  | { type: 'column'; key: string; column: Column }
  | { type: 'nested'; key: string; recordType: string; nodes: readonly SchemaNode[] };

export interface Schema {
  recordType: string;
  /** Tree mirroring the record's nesting, used to rebuild records on decode */
  nodes: readonly SchemaNode[];
  /** Flattened columns in line order */
  columns: readonly Column[];
}
