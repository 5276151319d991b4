import type { FieldKind, FieldTypeTag, FieldValue } from '../fields/field-kinds';
import type { RecordType } from '../record/record-type';

export type PayloadValue = FieldValue;

export type Payload = Readonly<Record<string, PayloadValue>>;

/**
 * A generated record type with a payload that is valid for it.
 */
export interface RecordSample {
  readonly type: RecordType;
  readonly payload: Payload;
  /** Kinds drawn for the record's own fields, in naming order */
  readonly kinds: readonly FieldKind[];
}

export interface GenericRecordSample extends RecordSample {
  /** The generic record type before instantiation */
  readonly template: RecordType;
  /** Kinds bound to the template's parameters, in declaration order */
  readonly typeArguments: readonly FieldTypeTag[];
}

/**
 * A sample whose payload also carries undeclared keys.
 */
export type WithExtraKeys<S extends RecordSample> = S & {
  readonly extraKeys: ReadonlySet<string>;
};
