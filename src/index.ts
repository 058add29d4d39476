export { CsvMapper, CsvMapperBuilder } from './mapper';
export { field, recordType, dynamicRecordType, buildSchema, FieldOptions, UnwrapOptions } from './config/recordSchema';
export { streamFromSource, streamFromReadable, streamToDestination, ReadOptions } from './parsers/csvStream';
export { fileSource, iterableSource, readFileLines } from './parsers/lineReader';
export { CsvMapperError, SchemaError, MappingError, AggregateMappingError, CsvIOError } from './errors';
export {
  Column,
  FieldDescriptor,
  FieldKind,
  InferRecord,
  RecordOf,
  RecordShape,
  RecordType,
  ScalarField,
  Schema,
  SchemaNode,
  UnwrapField,
} from './types/schema';
export { ErrorHandler, LineSource, MapperOptions, ReadPolicy, WritePolicy } from './types/csv';
export { DecodedRecord, ScalarValue } from './types/record';
