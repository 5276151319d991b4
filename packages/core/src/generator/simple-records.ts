/**
 * Simple record schemas: concrete field kinds, an optional inherited layer,
 * and a payload that is valid for the resulting type.
 */

import fc from 'fast-check';

import type { Maybe } from '../fields/absent';
import { fieldKinds, type FieldKind, type FieldValue } from '../fields/field-kinds';
import { takeNames } from '../naming/attribute-names';
import { concrete, makeRecordType } from '../record/record-type';
import { resolveOptions, type GeneratorOptions } from '../types/options';
import { RECORD_NAME, buildPayload, fieldValues, totality } from './fields';
import { applyInheritance, inheritanceOverlay } from './inheritance';
import type { RecordSample } from './types';

export interface SimpleRecordDraw {
  readonly total: boolean;
  readonly kinds: readonly FieldKind[];
  /** One draw per kind, in the same order */
  readonly values: readonly Maybe<FieldValue>[];
  /** Value of the inherited field, or ABSENT for no inherited layer */
  readonly inherited: Maybe<number>;
}

/**
 * Turn one draw into a record type and its payload.
 */
export function assembleSimpleRecord(
  draw: SimpleRecordDraw,
  options: { debug?: boolean } = {}
): RecordSample {
  const names = takeNames(draw.kinds.length);
  const entries = draw.kinds.map((kind, ix) => ({
    name: names[ix] ?? '',
    slot: concrete(kind.tag),
  }));

  const base = makeRecordType(RECORD_NAME, entries, {
    total: draw.total,
    debug: options.debug,
  });
  const { type, payload } = applyInheritance(
    base,
    buildPayload(names, draw.values),
    draw.inherited,
    options.debug
  );

  return Object.freeze({
    type,
    payload: Object.freeze(payload),
    kinds: Object.freeze([...draw.kinds]),
  });
}

/**
 * Arbitrary of simple record types with conformant payloads.
 *
 * @param options.total - Generate records of the given totality (default: random)
 */
export function simpleRecordSchemas(
  options: GeneratorOptions = {}
): fc.Arbitrary<RecordSample> {
  const resolved = resolveOptions(options);

  return totality(resolved.total).chain((total) =>
    fc
      .array(fieldKinds(total, resolved.timestamps), {
        maxLength: resolved.maxFields,
      })
      .chain((kinds) =>
        fc
          .record({
            values: fieldValues(kinds),
            inherited: inheritanceOverlay(),
          })
          .map(({ values, inherited }) =>
            assembleSimpleRecord(
              { total, kinds, values, inherited },
              { debug: resolved.debug }
            )
          )
      )
  );
}
