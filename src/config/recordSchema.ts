import {
  Column,
  FieldKind,
  RecordShape,
  RecordType,
  ScalarField,
  Schema,
  SchemaNode,
  UnwrapField,
} from '../types/schema';
import { SchemaError } from '../errors';
import { createLogger } from '../logging/logger';

const log = createLogger('Schema');

const SCALAR_KINDS: readonly FieldKind[] = ['string', 'number', 'integer', 'boolean'];

export interface FieldOptions {
  /** Column name to use instead of the property key */
  column?: string;
}

export interface UnwrapOptions {
  /** Prepended to every column name of the nested record type */
  prefix?: string;
}

function scalar<K extends FieldKind>(kind: K, options: FieldOptions = {}): ScalarField<K, false> {
  return options.column === undefined
    ? { kind, optional: false }
    : { kind, optional: false, column: options.column };
}

/**
 * Field descriptor helpers for `recordType()`.
 *
 * @example
 * const Address = recordType('Address', { city: field.string(), zip: field.string() });
 * const Person = recordType('Person', {
 *   name: field.string(),
 *   age: field.optional(field.integer()),
 *   home: field.unwrap(Address, { prefix: 'home_' }),
 * });
 */
export const field = {
  string: (options?: FieldOptions) => scalar('string', options),
  number: (options?: FieldOptions) => scalar('number', options),
  integer: (options?: FieldOptions) => scalar('integer', options),
  boolean: (options?: FieldOptions) => scalar('boolean', options),

  optional: <K extends FieldKind>(descriptor: ScalarField<K, false>): ScalarField<K, true> => ({
    ...descriptor,
    optional: true,
  }),

  unwrap: <S extends RecordShape>(type: RecordType<S>, options: UnwrapOptions = {}): UnwrapField<S> =>
    options.prefix === undefined ? { kind: 'unwrap', type } : { kind: 'unwrap', type, prefix: options.prefix },
};

export function recordType<S extends RecordShape>(name: string, fields: S): RecordType<S> {
  return { name, fields };
}

/**
 * Create a string-only record type from header names.
 * This is useful when you don't know the structure ahead of time.
 * Column names keep the header text; property keys are normalized.
 */
export function dynamicRecordType(
  name: string,
  headers: readonly string[]
): RecordType<Record<string, ScalarField<'string', false>>> {
  const fields: Record<string, ScalarField<'string', false>> = {};
  const order: string[] = [];

  for (const header of headers) {
    const key = header
      .toLowerCase()
      .replace(/[^a-z0-9]/g, '_')
      .replace(/_+/g, '_')
      .replace(/^_|_$/g, '');

    if (key === '') {
      throw new SchemaError(name, `header "${header}" does not produce a property name`);
    }
    if (Object.hasOwn(fields, key)) {
      throw new SchemaError(name, `headers "${fields[key].column}" and "${header}" both map to property "${key}"`);
    }
    fields[key] = field.string({ column: header });
    order.push(key);
  }

  return { name, fields, order };
}

function isRecordType(value: unknown): value is RecordType {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'fields' in value &&
    typeof value.fields === 'object' &&
    value.fields !== null &&
    !Array.isArray(value.fields) &&
    (!('order' in value) ||
      value.order === undefined ||
      (Array.isArray(value.order) && value.order.every(key => typeof key === 'string')))
  );
}

function isScalarField(value: unknown): value is ScalarField {
  if (typeof value !== 'object' || value === null || !('kind' in value) || !('optional' in value)) {
    return false;
  }
  const kind = value.kind;
  return SCALAR_KINDS.some(candidate => candidate === kind) && typeof value.optional === 'boolean';
}

function isUnwrapField(value: unknown): value is UnwrapField {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'unwrap';
}

/**
 * Read a value by walking `path`; a missing sub-record yields undefined.
 * Getters run here, so accessor failures surface to the caller.
 */
function accessor(path: readonly string[]): (record: unknown) => unknown {
  return record => {
    let current: unknown = record;
    for (const key of path) {
      if (typeof current !== 'object' || current === null) {
        return undefined;
      }
      current = Reflect.get(current, key);
    }
    return current;
  };
}

interface BuildState {
  root: string;
  columns: Column[];
  /** column name -> dotted property path that declared it */
  owners: Map<string, string>;
  /** record types currently being expanded, for cycle detection */
  expanding: Set<RecordType>;
}

function buildNodes(type: RecordType, path: readonly string[], prefix: string, state: BuildState): SchemaNode[] {
  const nodes: SchemaNode[] = [];

  for (const key of type.order ?? Object.keys(type.fields)) {
    const descriptor: unknown = type.fields[key];
    const fieldPath = [...path, key];
    const dotted = fieldPath.join('.');

    if (isUnwrapField(descriptor)) {
      const nested: unknown = descriptor.type;
      if (!isRecordType(nested)) {
        throw new SchemaError(
          state.root,
          `unwrap field "${dotted}" does not reference a record type`,
          'pass a value created with recordType() to field.unwrap()'
        );
      }
      if (state.expanding.has(nested)) {
        throw new SchemaError(state.root, `unwrap field "${dotted}" expands "${nested.name}" inside itself`);
      }

      state.expanding.add(nested);
      nodes.push({
        type: 'nested',
        key,
        recordType: nested.name,
        nodes: buildNodes(nested, fieldPath, prefix + (descriptor.prefix ?? ''), state),
      });
      state.expanding.delete(nested);
      continue;
    }

    if (!isScalarField(descriptor)) {
      throw new SchemaError(
        state.root,
        `field "${dotted}" has no resolvable kind`,
        `use one of field.${SCALAR_KINDS.join('(), field.')}() or field.unwrap()`
      );
    }

    const name = prefix + (descriptor.column ?? key);
    const owner = state.owners.get(name);
    if (owner !== undefined) {
      throw new SchemaError(state.root, `column "${name}" is declared by both "${owner}" and "${dotted}"`);
    }
    state.owners.set(name, dotted);

    const column: Column = {
      name,
      path: fieldPath,
      index: state.columns.length,
      field: descriptor,
      get: accessor(fieldPath),
    };
    state.columns.push(column);
    nodes.push({ type: 'column', key, column });
  }

  return nodes;
}

/**
 * Derive the ordered column list of a record type.
 *
 * Scalar fields keep declaration order; an unwrap field is replaced in place
 * by the columns of its nested type, recursively.
 */
export function buildSchema(type: RecordType): Schema {
  const candidate: unknown = type;
  if (!isRecordType(candidate)) {
    throw new SchemaError('<unknown>', 'value is not a record type description');
  }

  const state: BuildState = {
    root: candidate.name,
    columns: [],
    owners: new Map(),
    expanding: new Set([candidate]),
  };
  const nodes = buildNodes(candidate, [], '', state);

  if (state.columns.length === 0) {
    throw new SchemaError(candidate.name, 'record type declares no columns');
  }

  log.debug(`Built schema for "${candidate.name}" with ${state.columns.length} column(s)`);

  return { recordType: candidate.name, nodes, columns: state.columns };
}
