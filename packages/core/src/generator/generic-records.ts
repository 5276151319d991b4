/**
 * Generic record schemas: up to three fields are declared through type
 * parameters, and the returned type is the generic one instantiated with the
 * kinds those fields were drawn as.
 */

import fc from 'fast-check';

import { fieldKinds, type FieldTypeTag } from '../fields/field-kinds';
import { takeNames } from '../naming/attribute-names';
import {
  concrete,
  makeRecordType,
  typeParameter,
  type FieldEntry,
  type TypeParameter,
} from '../record/record-type';
import { ConfigError, GenerationError } from '../types/errors';
import { resolveOptions, type GeneratorOptions } from '../types/options';
import { RECORD_NAME, buildPayload, fieldValues, totality } from './fields';
import { applyInheritance, inheritanceOverlay } from './inheritance';
import type { SimpleRecordDraw } from './simple-records';
import type { GenericRecordSample } from './types';

export interface GenericRecordDraw extends SimpleRecordDraw {
  /** Positions of the fields declared through a type parameter */
  readonly genericIndices: readonly number[];
}

export function assembleGenericRecord(
  draw: GenericRecordDraw,
  options: { debug?: boolean } = {}
): GenericRecordSample {
  const fieldCount = draw.kinds.length;
  const chosen = new Set(draw.genericIndices);
  const outOfRange = draw.genericIndices.some(
    (ix) => !Number.isInteger(ix) || ix < 0 || ix >= fieldCount
  );
  if (
    chosen.size === 0 ||
    chosen.size !== draw.genericIndices.length ||
    outOfRange
  ) {
    throw new GenerationError({
      message:
        `Generic field positions [${draw.genericIndices.join(', ')}] are not ` +
        `distinct positions among ${fieldCount} field(s)`,
    });
  }

  const names = takeNames(fieldCount);
  const parameters: TypeParameter[] = [];
  const typeArguments: FieldTypeTag[] = [];
  const entries = draw.kinds.map((kind, ix): FieldEntry => {
    const name = names[ix] ?? '';
    if (!chosen.has(ix)) {
      return { name, slot: concrete(kind.tag) };
    }
    const parameter = typeParameter(`T${ix + 1}`);
    parameters.push(parameter);
    typeArguments.push(kind.tag);
    return { name, slot: parameter };
  });

  const generic = makeRecordType(RECORD_NAME, entries, {
    total: draw.total,
    parameters,
    debug: options.debug,
  });
  const { type: template, payload } = applyInheritance(
    generic,
    buildPayload(names, draw.values),
    draw.inherited,
    options.debug
  );

  return Object.freeze({
    type: template.instantiate(typeArguments),
    payload: Object.freeze(payload),
    kinds: Object.freeze([...draw.kinds]),
    template,
    typeArguments: Object.freeze(typeArguments),
  });
}

/**
 * Arbitrary of instantiated generic record types with conformant payloads.
 *
 * @param options.total - Generate records of the given totality (default: random)
 */
export function genericRecordSchemas(
  options: GeneratorOptions = {}
): fc.Arbitrary<GenericRecordSample> {
  const resolved = resolveOptions(options);
  if (resolved.maxFields < 1) {
    throw new ConfigError({
      message: 'Generic records need maxFields >= 1',
      context: { setting: 'maxFields', value: resolved.maxFields },
    });
  }

  return totality(resolved.total).chain((total) =>
    fc
      .array(fieldKinds(total, resolved.timestamps), {
        minLength: 1,
        maxLength: resolved.maxFields,
      })
      .chain((kinds) =>
        fc
          .record({
            values: fieldValues(kinds),
            genericIndices: fc.uniqueArray(
              fc.integer({ min: 0, max: kinds.length - 1 }),
              {
                minLength: 1,
                maxLength: Math.min(resolved.maxTypeParameters, kinds.length),
              }
            ),
            inherited: inheritanceOverlay(),
          })
          .map(({ values, genericIndices, inherited }) =>
            assembleGenericRecord(
              { total, kinds, values, genericIndices, inherited },
              { debug: resolved.debug }
            )
          )
      )
  );
}
