import fc from 'fast-check';

import { ABSENT, isAbsent, type Absent, type Maybe } from '../fields/absent';
import { concrete, type RecordType } from '../record/record-type';
import type { Payload } from './types';

export const INHERITED_RECORD_NAME = 'InheritedRecord';
export const INHERITED_FIELD = 'inherited';

/**
 * Half of the draws wrap the record in one derived layer; those draws carry
 * the integer stored under the inherited field.
 */
export function inheritanceOverlay(): fc.Arbitrary<Maybe<number>> {
  return fc.oneof(fc.constant<Absent>(ABSENT), fc.maxSafeInteger());
}

/**
 * Extend `type` with the required `inherited: integer` field and add the
 * drawn value to the payload. ABSENT leaves both untouched.
 */
export function applyInheritance(
  type: RecordType,
  payload: Payload,
  inherited: Maybe<number>,
  debug?: boolean
): { type: RecordType; payload: Payload } {
  if (isAbsent(inherited)) {
    return { type, payload };
  }
  return {
    type: type.extend(
      INHERITED_RECORD_NAME,
      [{ name: INHERITED_FIELD, slot: concrete('integer') }],
      { total: true, debug }
    ),
    payload: { ...payload, [INHERITED_FIELD]: inherited },
  };
}
