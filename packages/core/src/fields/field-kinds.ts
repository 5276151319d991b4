/**
 * Field-kind arbitraries
 *
 * Each kind yields a triple: the declared type tag, an arbitrary for the
 * field's payload value, and an arbitrary for fallback name text. Under a
 * partial record the value arbitrary may produce ABSENT; under a total
 * record it never does.
 */

import fc from 'fast-check';

import { ABSENT, type Absent, type Maybe } from './absent';
import { LOWERCASE_ALPHABET } from '../naming/attribute-names';
import {
  DEFAULT_OPTIONS,
  type TimestampRangeOptions,
} from '../types/options';

export type FieldTypeTag = 'integer' | 'list-of-integer' | 'timestamp';

export const FIELD_TYPE_TAGS: readonly FieldTypeTag[] = [
  'integer',
  'list-of-integer',
  'timestamp',
];

export interface FieldValueByTag {
  integer: number;
  'list-of-integer': readonly number[];
  /** RFC 3339 date-time at whole-second precision */
  timestamp: string;
}

export type FieldValue = FieldValueByTag[FieldTypeTag];

export type FallbackText = string | readonly string[];

export interface FieldKindOf<K extends FieldTypeTag> {
  readonly tag: K;
  readonly value: fc.Arbitrary<Maybe<FieldValueByTag[K]>>;
  readonly fallback: fc.Arbitrary<FallbackText>;
}

export type FieldKind = { [K in FieldTypeTag]: FieldKindOf<K> }[FieldTypeTag];

const lowercaseText = (): fc.Arbitrary<string> =>
  fc.string({ unit: fc.constantFrom(...LOWERCASE_ALPHABET) });

function orAbsent<T>(
  values: fc.Arbitrary<T>,
  total: boolean
): fc.Arbitrary<Maybe<T>> {
  return total ? values : fc.oneof(values, fc.constant<Absent>(ABSENT));
}

/**
 * Drop the sub-second part and format as `YYYY-MM-DDTHH:mm:ssZ`.
 */
export function toWholeSecondTimestamp(date: Date): string {
  const seconds = Math.floor(date.getTime() / 1000);
  return new Date(seconds * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function integerField(
  total = true
): fc.Arbitrary<FieldKindOf<'integer'>> {
  return fc.constant({
    tag: 'integer' as const,
    value: orAbsent(fc.maxSafeInteger(), total),
    fallback: lowercaseText(),
  });
}

export function listOfIntegerField(
  total = true
): fc.Arbitrary<FieldKindOf<'list-of-integer'>> {
  return fc.constant({
    tag: 'list-of-integer' as const,
    value: orAbsent<readonly number[]>(fc.array(fc.maxSafeInteger()), total),
    fallback: lowercaseText().map((text): FallbackText => [text]),
  });
}

export function timestampField(
  total = true,
  range: TimestampRangeOptions = {}
): fc.Arbitrary<FieldKindOf<'timestamp'>> {
  const dates = fc.date({
    min: range.min ?? DEFAULT_OPTIONS.timestamps.min,
    max: range.max ?? DEFAULT_OPTIONS.timestamps.max,
    noInvalidDate: true,
  });
  return fc.constant({
    tag: 'timestamp' as const,
    value: orAbsent(dates.map(toWholeSecondTimestamp), total),
    fallback: lowercaseText(),
  });
}

/** Any of the supported field kinds. */
export function fieldKinds(
  total = true,
  range: TimestampRangeOptions = {}
): fc.Arbitrary<FieldKind> {
  return fc.oneof(
    integerField(total),
    listOfIntegerField(total),
    timestampField(total, range)
  );
}
