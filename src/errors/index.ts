export { CsvMapperError } from './base';
export { SchemaError } from './schemaError';
export { MappingError, AggregateMappingError, MappingErrorDetails } from './mappingError';
export { CsvIOError, IOOperation } from './ioError';
