/**
 * Corruption overlay: copies of valid payloads carrying undeclared keys,
 * for exercising how a validator rejects or ignores unknown keys.
 */

import fc from 'fast-check';

import { ErrorCode } from '../errors/codes';
import { LOWERCASE_ALPHABET } from '../naming/attribute-names';
import { GenerationError } from '../types/errors';
import {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateExtraKeyOptions,
  type GeneratorOptions,
} from '../types/options';
import { genericRecordSchemas } from './generic-records';
import { simpleRecordSchemas } from './simple-records';
import type {
  GenericRecordSample,
  PayloadValue,
  RecordSample,
  WithExtraKeys,
} from './types';

export type ExtraKeySettings = Pick<
  GeneratorOptions,
  'extraKeyLength' | 'extraKeyValue'
>;

/**
 * Sets of distinct lowercase keys of exactly `extraKeyLength` characters.
 * Throws ConfigError when `maxFields` names would reach that length.
 */
export function extraKeySets(
  options: GeneratorOptions = {}
): fc.Arbitrary<ReadonlySet<string>> {
  const resolved = resolveOptions(options);
  validateExtraKeyOptions(resolved);
  const { extraKeyLength, maxExtraKeys } = resolved;
  return fc
    .uniqueArray(
      fc.string({
        unit: fc.constantFrom(...LOWERCASE_ALPHABET),
        minLength: extraKeyLength,
        maxLength: extraKeyLength,
      }),
      { maxLength: maxExtraKeys }
    )
    .map((keys): ReadonlySet<string> => new Set(keys));
}

/**
 * Copy the sample's payload and add every key of `extraKeys` with the
 * sentinel value.
 *
 * Throws GenerationError when a declared field name has the extra-key length
 * or appears among the extra keys.
 */
export function applyExtraKeys<S extends RecordSample>(
  sample: S,
  extraKeys: ReadonlySet<string>,
  settings: ExtraKeySettings = {}
): WithExtraKeys<S> {
  const keyLength = settings.extraKeyLength ?? DEFAULT_OPTIONS.extraKeyLength;
  const sentinel = settings.extraKeyValue ?? DEFAULT_OPTIONS.extraKeyValue;

  for (const field of sample.type.fields) {
    if (field.name.length === keyLength || extraKeys.has(field.name)) {
      throw new GenerationError({
        message:
          `Field '${field.name}' of ${sample.type.name} may collide with ` +
          `extra keys of length ${keyLength}`,
        errorCode: ErrorCode.EXTRA_KEY_COLLISION,
        context: { recordName: sample.type.name, field: field.name },
      });
    }
  }

  const payload: Record<string, PayloadValue> = { ...sample.payload };
  for (const key of extraKeys) {
    payload[key] = sentinel;
  }

  return Object.freeze({
    ...sample,
    payload: Object.freeze(payload),
    extraKeys,
  });
}

/**
 * Pair every sample drawn from `source` with a set of extra keys merged into
 * its payload.
 */
export function withExtraKeys<S extends RecordSample>(
  source: fc.Arbitrary<S>,
  options: GeneratorOptions = {}
): fc.Arbitrary<WithExtraKeys<S>> {
  const resolved = resolveOptions(options);
  validateExtraKeyOptions(resolved);
  const keySets = extraKeySets(resolved);
  return source.chain((sample) =>
    keySets.map((keys) => applyExtraKeys(sample, keys, resolved))
  );
}

export function simpleRecordSchemasWithExtraKeys(
  options: GeneratorOptions = {}
): fc.Arbitrary<WithExtraKeys<RecordSample>> {
  return withExtraKeys(simpleRecordSchemas(options), options);
}

export function genericRecordSchemasWithExtraKeys(
  options: GeneratorOptions = {}
): fc.Arbitrary<WithExtraKeys<GenericRecordSample>> {
  return withExtraKeys(genericRecordSchemas(options), options);
}
