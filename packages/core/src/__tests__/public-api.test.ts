import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  ErrorCode,
  RecordType,
  concrete,
  genericRecordSchemas,
  genericRecordSchemasWithExtraKeys,
  makeRecordType,
  simpleRecordSchemas,
  simpleRecordSchemasWithExtraKeys,
  takeNames,
  type GeneratorOptions,
  type RecordSample,
} from '../index';

describe('public API surface', () => {
  it('exports usable sample arbitraries', () => {
    const options: GeneratorOptions = { maxFields: 3, total: true };
    const arbitraries: fc.Arbitrary<RecordSample>[] = [
      simpleRecordSchemas(options),
      genericRecordSchemas(options),
      simpleRecordSchemasWithExtraKeys(options),
      genericRecordSchemasWithExtraKeys(options),
    ];

    for (const arbitrary of arbitraries) {
      const [sample] = fc.sample(arbitrary, { numRuns: 1, seed: 13 });
      expect(sample?.type).toBeInstanceOf(RecordType);
    }
  });

  it('exports the record type factory', () => {
    const [name = 'a'] = takeNames(1);
    const type = makeRecordType('HypRecord', [
      { name, slot: concrete('list-of-integer') },
    ]);
    expect(type.isValid({ a: [1, 2] })).toBe(true);
  });

  it('exposes stable error codes', () => {
    expect(ErrorCode.CONSTRUCTION_MISMATCH).toBe('E011');
    expect(ErrorCode.EXTRA_KEY_COLLISION).toBe('E100');
  });
});
