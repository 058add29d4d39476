import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { field, recordType } from '../../src/config/recordSchema';

export const FIXTURES = path.join(__dirname, '..', 'fixtures');

export const User = recordType('User', {
  name: field.string(),
  surname: field.string(),
});

export const Inner = recordType('Inner', {
  myText: field.string(),
});

export const Sample = recordType('Sample', {
  inner: field.unwrap(Inner),
  name: field.string(),
  number: field.number(),
});

export function sample(name: string, number: number) {
  return { inner: { myText: 'my text' }, name, number };
}

/** A Sample whose `name` getter throws */
export function brokenSample() {
  return {
    inner: { myText: 'my text' },
    get name(): string {
      throw new Error('boom');
    },
    number: 3,
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'csv-mapper-'));
}
