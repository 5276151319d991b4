import fc from 'fast-check';

import { isAbsent, type Maybe } from '../fields/absent';
import type { FieldKind, FieldValue } from '../fields/field-kinds';
import { GenerationError } from '../types/errors';
import type { PayloadValue } from './types';

export const RECORD_NAME = 'HypRecord';

/** The given totality, or a fair coin when none is given. */
export function totality(total?: boolean): fc.Arbitrary<boolean> {
  return total === undefined ? fc.boolean() : fc.constant(total);
}

/** One value draw per field kind, in field order. */
export function fieldValues(
  kinds: readonly FieldKind[]
): fc.Arbitrary<Maybe<FieldValue>[]> {
  const arbitraries: fc.Arbitrary<Maybe<FieldValue>>[] = kinds.map(
    (kind) => kind.value
  );
  return fc.tuple(...arbitraries);
}

/**
 * Payload holding every drawn value that is not ABSENT, keyed by the field
 * name at the same position. Walks the fields in naming order.
 */
export function buildPayload(
  names: readonly string[],
  values: readonly Maybe<FieldValue>[]
): Record<string, PayloadValue> {
  if (names.length !== values.length) {
    throw new GenerationError({
      message: `Drew ${values.length} value(s) for ${names.length} field(s)`,
    });
  }
  const payload: Record<string, PayloadValue> = {};
  for (let ix = 0; ix < names.length; ix += 1) {
    const name = names[ix];
    const value = values[ix];
    if (name === undefined || value === undefined || isAbsent(value)) {
      continue;
    }
    payload[name] = value;
  }
  return payload;
}
