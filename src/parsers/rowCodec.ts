import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { EOL } from 'os';
import { Column, FieldKind, Schema, SchemaNode } from '../types/schema';
import { DecodedRecord, ScalarValue } from '../types/record';
import { MappingError } from '../errors';

/**
 * Per-mapper settings the codec needs, resolved once at build time.
 */
export interface CodecContext {
  separator: string;
  /** Decimal separator of the configured locale */
  decimalSeparator: string;
}

// Cells containing any whitespace are quoted, besides separators and quotes
const QUOTED_MATCH = /\s/;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;
const LINE_TERMINATOR = /^(\r\n|\n|\r)$/;

/**
 * Decimal separator used by `locale`, as reported by Intl.
 */
export function decimalSeparatorFor(locale: string): string {
  const decimal = new Intl.NumberFormat(locale).formatToParts(1.5).find(part => part.type === 'decimal');
  return decimal ? decimal.value : '.';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `string "${value}"`;
  if (typeof value === 'object') return Array.isArray(value) ? 'array' : 'object';
  return `${typeof value} ${String(value)}`;
}

function formatNumber(value: number, decimalSeparator: string): string {
  const text = String(value);
  return decimalSeparator === '.' ? text : text.replace('.', decimalSeparator);
}

function encodeCell(record: unknown, column: Column, context: CodecContext): string {
  const dotted = column.path.join('.');

  let value: unknown;
  try {
    value = column.get(record);
  } catch (error) {
    throw new MappingError(`Cannot read field "${dotted}": ${describe(error)}`, {
      cause: error,
      field: column.name,
    });
  }

  if (value === undefined || value === null) {
    if (column.field.optional) {
      return '';
    }
    throw new MappingError(`Field "${dotted}" is required but has no value`, { field: column.name });
  }

  switch (column.field.kind) {
    case 'string':
      if (typeof value === 'string') return value;
      break;
    case 'number':
      if (typeof value === 'number' && Number.isFinite(value)) return formatNumber(value, context.decimalSeparator);
      break;
    case 'integer':
      if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
      break;
    case 'boolean':
      if (typeof value === 'boolean') return String(value);
      break;
  }

  throw new MappingError(`Field "${dotted}" expects ${column.field.kind} but got ${describeValue(value)}`, {
    field: column.name,
  });
}

/**
 * Encode one record as a CSV line terminated by the platform line separator.
 * Throws MappingError naming the field when any column cannot be encoded.
 */
export function encodeRow(record: unknown, schema: Schema, context: CodecContext): string {
  const cells = schema.columns.map(column => encodeCell(record, column, context));

  return stringify([cells], {
    delimiter: context.separator,
    record_delimiter: EOL,
    quoted_match: QUOTED_MATCH,
    // a lone empty cell would otherwise encode as a blank line
    quoted_empty: cells.length === 1,
    eof: true,
  });
}

/**
 * Column names joined by the separator, without a line terminator.
 */
export function formatHeader(schema: Schema, context: CodecContext): string {
  return stringify([schema.columns.map(column => column.name)], {
    delimiter: context.separator,
    quoted_match: QUOTED_MATCH,
    eof: false,
  });
}

function isRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'))
  );
}

function tokenize(line: string, context: CodecContext): string[] {
  let rows: unknown;
  try {
    rows = parse(line, {
      delimiter: context.separator,
      relax_column_count: true,
    });
  } catch (error) {
    throw new MappingError(`Malformed line: ${describe(error)}`, { cause: error, line });
  }

  if (!isRows(rows) || rows.length !== 1) {
    const count = Array.isArray(rows) ? rows.length : 0;
    throw new MappingError(`Expected exactly one record but found ${count}`, { line });
  }
  return rows[0];
}

function parseNumber(text: string, kind: FieldKind, decimalSeparator: string): number | undefined {
  if (kind === 'integer') {
    const value = Number(text);
    return INTEGER.test(text) && Number.isSafeInteger(value) ? value : undefined;
  }

  if (decimalSeparator !== '.' && text.includes('.')) {
    return undefined;
  }
  const normalized = decimalSeparator === '.' ? text : text.replace(decimalSeparator, '.');
  return DECIMAL.test(normalized) ? Number(normalized) : undefined;
}

function decodeCell(text: string, column: Column, context: CodecContext, line: string): ScalarValue {
  if (text === '' && column.field.optional) {
    return undefined;
  }

  let value: ScalarValue = undefined;
  switch (column.field.kind) {
    case 'string':
      return text;
    case 'number':
    case 'integer':
      value = parseNumber(text, column.field.kind, context.decimalSeparator);
      break;
    case 'boolean':
      value = text === 'true' ? true : text === 'false' ? false : undefined;
      break;
  }

  if (value === undefined) {
    throw new MappingError(`Cannot convert "${text}" to ${column.field.kind} for column "${column.name}"`, {
      field: column.name,
      line,
    });
  }
  return value;
}

function buildRecord(nodes: readonly SchemaNode[], cells: readonly string[], context: CodecContext, line: string): DecodedRecord {
  const record: DecodedRecord = {};

  for (const node of nodes) {
    if (node.type === 'nested') {
      record[node.key] = buildRecord(node.nodes, cells, context, line);
      continue;
    }
    const value = decodeCell(cells[node.column.index], node.column, context, line);
    if (value !== undefined) {
      record[node.key] = value;
    }
  }

  return record;
}

/**
 * Decode one CSV line into a record shaped by the schema.
 * Nothing is returned unless every column converted.
 */
export function decodeRow(line: string, schema: Schema, context: CodecContext): DecodedRecord {
  if (line === '' || LINE_TERMINATOR.test(line)) {
    throw new MappingError('No content to map: the line is empty', { line });
  }

  const cells = tokenize(line, context);
  if (cells.length !== schema.columns.length) {
    throw new MappingError(`Expected ${schema.columns.length} column(s) but found ${cells.length}`, { line });
  }

  return buildRecord(schema.nodes, cells, context, line);
}

function matchesKind(value: unknown, column: Column): boolean {
  if (value === undefined) return column.field.optional;
  switch (column.field.kind) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'integer':
      return typeof value === 'number' && Number.isSafeInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/**
 * Check that a value has every property the schema nodes describe, with
 * values of the declared kinds.
 */
export function conformsTo(value: unknown, nodes: readonly SchemaNode[]): boolean {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const target: object = value;
  return nodes.every(node => {
    const property: unknown = Reflect.get(target, node.key);
    return node.type === 'nested' ? conformsTo(property, node.nodes) : matchesKind(property, node.column);
  });
}
