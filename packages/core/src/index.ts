// @recordgen/core entry point
//
// Public API:
// - Sample arbitraries: simpleRecordSchemas / genericRecordSchemas and their
//   extra-key variants. Each draw is a record type plus a payload built for it.
// - Building blocks: field-kind arbitraries, the name supply, and
//   makeRecordType for constructing record types by hand.
// - Errors and options.

// Generators
export {
  simpleRecordSchemas,
  assembleSimpleRecord,
  type SimpleRecordDraw,
} from './generator/simple-records';
export {
  genericRecordSchemas,
  assembleGenericRecord,
  type GenericRecordDraw,
} from './generator/generic-records';
export {
  withExtraKeys,
  applyExtraKeys,
  extraKeySets,
  simpleRecordSchemasWithExtraKeys,
  genericRecordSchemasWithExtraKeys,
  type ExtraKeySettings,
} from './generator/extra-keys';
export {
  INHERITED_FIELD,
  INHERITED_RECORD_NAME,
} from './generator/inheritance';
export { RECORD_NAME } from './generator/fields';
export type {
  Payload,
  PayloadValue,
  RecordSample,
  GenericRecordSample,
  WithExtraKeys,
} from './generator/types';

// Field kinds
export { ABSENT, isAbsent, type Absent, type Maybe } from './fields/absent';
export {
  FIELD_TYPE_TAGS,
  fieldKinds,
  integerField,
  listOfIntegerField,
  timestampField,
  toWholeSecondTimestamp,
  type FallbackText,
  type FieldKind,
  type FieldKindOf,
  type FieldTypeTag,
  type FieldValue,
  type FieldValueByTag,
} from './fields/field-kinds';

// Naming
export {
  attributeNames,
  takeNames,
  countNamesShorterThan,
  isReservedIdentifier,
} from './naming/attribute-names';

// Record types
export {
  RecordType,
  makeRecordType,
  concrete,
  typeParameter,
  propertySchemaFor,
  type ConcreteSlot,
  type TypeParameter,
  type FieldSlot,
  type FieldEntry,
  type FieldDeclaration,
  type PropertySchema,
  type RecordJsonSchema,
  type RecordTypeOptions,
  type MakeRecordTypeOptions,
} from './record/record-type';

// Errors
export { ErrorCode, type Severity } from './errors/codes';
export {
  RecordGenError,
  RecordConstructionError,
  ConstructionMismatchError,
  TypeArgumentError,
  GenerationError,
  ConfigError,
  isRecordGenError,
  type ErrorContext,
  type ErrorParams,
  type SerializedError,
} from './types/errors';

// Options
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateOptions,
  validateExtraKeyOptions,
  type GeneratorOptions,
  type ResolvedOptions,
  type TimestampRangeOptions,
} from './types/options';
