/**
 * Value types produced while decoding a CSV line.
 *
 * Decoded records are plain objects; nested objects come from unwrapped
 * record types.
 */

export type ScalarValue = string | number | boolean | undefined;

export interface DecodedRecord {
  [key: string]: ScalarValue | DecodedRecord;
}
