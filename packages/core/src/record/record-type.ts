/**
 * Runtime construction of structural record types.
 *
 * A record type is only known once its fields have been drawn, so it is
 * assembled here as a JSON Schema (draft 2020-12) object schema plus the
 * introspectable list of declared fields. Every construction re-reads the
 * built schema and fails with ConstructionMismatchError when it does not
 * declare exactly the requested fields.
 */

import type { ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes';
import type { FieldTypeTag } from '../fields/field-kinds';
import { isReservedIdentifier } from '../naming/attribute-names';
import {
  ConstructionMismatchError,
  RecordConstructionError,
  TypeArgumentError,
} from '../types/errors';
import { debugLog, isDebugEnv } from '../util/debug';
import { deepFreeze } from '../util/freeze';
import { compileRecordSchema } from './ajv-factory';
import { renderDeclaration } from './declaration';

export interface ConcreteSlot {
  readonly kind: 'concrete';
  readonly tag: FieldTypeTag;
}

export interface TypeParameter {
  readonly kind: 'parameter';
  readonly name: string;
}

/** What a field is declared as: a concrete kind or a type parameter. */
export type FieldSlot = ConcreteSlot | TypeParameter;

export interface FieldEntry {
  readonly name: string;
  readonly slot: FieldSlot;
}

export interface FieldDeclaration extends FieldEntry {
  readonly required: boolean;
  /** Name of the record type that declares the field */
  readonly declaredBy: string;
}

export function concrete(tag: FieldTypeTag): ConcreteSlot {
  return { kind: 'concrete', tag };
}

export function typeParameter(name: string): TypeParameter {
  return { kind: 'parameter', name };
}

export type PropertySchema =
  | { readonly type: 'integer' }
  | { readonly type: 'array'; readonly items: { readonly type: 'integer' } }
  | { readonly type: 'string'; readonly format: 'date-time' }
  | { readonly $ref: string };

export type RecordJsonSchema = {
  readonly title: string;
  readonly type: 'object';
  readonly allOf?: readonly [RecordJsonSchema];
  readonly properties: Readonly<Record<string, PropertySchema>>;
  readonly required?: readonly string[];
  readonly $defs?: Readonly<Record<string, PropertySchema>>;
};

const PROPERTY_SCHEMA_BY_TAG: Readonly<Record<FieldTypeTag, PropertySchema>> =
  deepFreeze<Record<FieldTypeTag, PropertySchema>>({
    integer: { type: 'integer' },
    'list-of-integer': { type: 'array', items: { type: 'integer' } },
    timestamp: { type: 'string', format: 'date-time' },
  });

export function propertySchemaFor(slot: FieldSlot): PropertySchema {
  return slot.kind === 'parameter'
    ? { $ref: `#/$defs/${slot.name}` }
    : PROPERTY_SCHEMA_BY_TAG[slot.tag];
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export interface RecordTypeOptions {
  /** Every own field is required (default: true) */
  total?: boolean;
  /** Type parameters introduced by this record type */
  parameters?: readonly TypeParameter[];
  /** Log the constructed declaration to stderr */
  debug?: boolean;
}

export interface MakeRecordTypeOptions extends RecordTypeOptions {
  /** Record type to inherit fields and type parameters from */
  base?: RecordType;
}

interface RecordTypeInit {
  name: string;
  total: boolean;
  ownFields: readonly FieldDeclaration[];
  parameters: readonly TypeParameter[];
  base: RecordType | undefined;
  schema: RecordJsonSchema;
  template: RecordType | undefined;
  typeArguments: readonly FieldTypeTag[];
}

export class RecordType {
  readonly name: string;
  readonly total: boolean;
  readonly ownFields: readonly FieldDeclaration[];
  /** Inherited fields first, then own fields, in declaration order */
  readonly fields: readonly FieldDeclaration[];
  /** Unbound type parameters; empty for concrete types */
  readonly parameters: readonly TypeParameter[];
  readonly base: RecordType | undefined;
  readonly schema: RecordJsonSchema;
  /** Generic type this one was instantiated from */
  readonly template: RecordType | undefined;
  /** Concrete kinds bound to the template's parameters, in order */
  readonly typeArguments: readonly FieldTypeTag[];

  #validate: ValidateFunction | undefined;

  private constructor(init: RecordTypeInit) {
    this.name = init.name;
    this.total = init.total;
    this.ownFields = Object.freeze([...init.ownFields]);
    this.fields = Object.freeze([
      ...(init.base?.fields ?? []),
      ...init.ownFields,
    ]);
    this.parameters = Object.freeze([...init.parameters]);
    this.base = init.base;
    this.schema = init.schema;
    this.template = init.template;
    this.typeArguments = Object.freeze([...init.typeArguments]);
    Object.freeze(this);
  }

  static define(
    name: string,
    entries: readonly FieldEntry[],
    options: MakeRecordTypeOptions = {}
  ): RecordType {
    const total = options.total ?? true;
    const base = options.base;

    assertIdentifier(name, name);
    const parameters = [
      ...(base?.parameters ?? []),
      ...(options.parameters ?? []),
    ];
    assertDistinctParameters(name, parameters);

    const declared = new Set(parameters.map((p) => p.name));
    const inherited = new Set(base?.fields.map((f) => f.name) ?? []);
    for (const entry of entries) {
      assertIdentifier(name, entry.name);
      if (base && inherited.has(entry.name)) {
        throw new RecordConstructionError({
          message: `Field '${entry.name}' of ${name} shadows a field of ${base.name}`,
          errorCode: ErrorCode.INVALID_FIELD_NAME,
          context: { recordName: name, field: entry.name },
        });
      }
      if (entry.slot.kind === 'parameter' && !declared.has(entry.slot.name)) {
        throw new RecordConstructionError({
          message: `Field '${entry.name}' of ${name} uses undeclared type parameter ${entry.slot.name}`,
          context: { recordName: name, field: entry.name },
        });
      }
    }

    const properties: Record<string, PropertySchema> = {};
    for (const entry of entries) {
      properties[entry.name] = propertySchemaFor(entry.slot);
    }

    const actual = Object.keys(properties);
    if (actual.length !== entries.length) {
      throw new ConstructionMismatchError({
        recordName: name,
        expected: entries.map((e) => e.name),
        actual,
      });
    }

    const required = total ? entries.map((e) => e.name) : [];
    const schema: RecordJsonSchema = {
      title: name,
      type: 'object',
      ...(base ? { allOf: [base.schema] as const } : {}),
      properties,
      ...(required.length > 0 ? { required } : {}),
    };

    const type = new RecordType({
      name,
      total,
      ownFields: entries.map((entry) => ({
        name: entry.name,
        slot: entry.slot,
        required: total,
        declaredBy: name,
      })),
      parameters,
      base,
      schema: deepFreeze(schema),
      template: undefined,
      typeArguments: [],
    });
    debugLog(
      options.debug ?? isDebugEnv(),
      `constructed ${type.declaration()} (${actual.length} own field(s))`
    );
    return type;
  }

  get isGeneric(): boolean {
    return this.parameters.length > 0;
  }

  /** Derive a record type that inherits every field of this one. */
  extend(
    name: string,
    entries: readonly FieldEntry[],
    options: RecordTypeOptions = {}
  ): RecordType {
    return RecordType.define(name, entries, { ...options, base: this });
  }

  /**
   * Bind this type's parameters, in declaration order, to concrete kinds.
   */
  instantiate(typeArguments: readonly FieldTypeTag[]): RecordType {
    if (typeArguments.length !== this.parameters.length) {
      throw new TypeArgumentError({
        message:
          `${this.name} expects ${this.parameters.length} type argument(s), ` +
          `got ${typeArguments.length}`,
        context: {
          recordName: this.name,
          parameters: this.parameters.map((p) => p.name),
          typeArguments: [...typeArguments],
        },
      });
    }
    const bindings = new Map<string, FieldTypeTag>();
    this.parameters.forEach((parameter, ix) => {
      const tag = typeArguments[ix];
      if (tag !== undefined) bindings.set(parameter.name, tag);
    });
    return this.#bind(bindings);
  }

  #bind(bindings: ReadonlyMap<string, FieldTypeTag>): RecordType {
    const lookup = (parameter: TypeParameter): FieldTypeTag => {
      const tag = bindings.get(parameter.name);
      if (tag === undefined) {
        throw new TypeArgumentError({
          message: `No type argument bound to ${parameter.name} of ${this.name}`,
          errorCode: ErrorCode.UNBOUND_TYPE_PARAMETER,
          context: {
            recordName: this.name,
            parameters: this.parameters.map((p) => p.name),
          },
        });
      }
      return tag;
    };

    const typeArguments = this.parameters.map(lookup);
    const $defs: Record<string, PropertySchema> = {};
    this.parameters.forEach((parameter, ix) => {
      const tag = typeArguments[ix];
      if (tag !== undefined) $defs[parameter.name] = PROPERTY_SCHEMA_BY_TAG[tag];
    });

    return new RecordType({
      name: this.name,
      total: this.total,
      ownFields: this.ownFields.map((field) =>
        field.slot.kind === 'parameter'
          ? { ...field, slot: concrete(lookup(field.slot)) }
          : field
      ),
      parameters: [],
      base: this.base ? this.base.#bind(bindings) : undefined,
      schema: deepFreeze({ ...this.schema, $defs }),
      template: this,
      typeArguments,
    });
  }

  /**
   * Ajv validate function for this type, compiled on first use.
   */
  validator(): ValidateFunction {
    if (this.isGeneric) {
      throw new TypeArgumentError({
        message: `${this.name} has unbound type parameter(s); instantiate it before validating`,
        errorCode: ErrorCode.UNBOUND_TYPE_PARAMETER,
        context: {
          recordName: this.name,
          parameters: this.parameters.map((p) => p.name),
        },
      });
    }
    if (!this.#validate) {
      try {
        this.#validate = compileRecordSchema(this.schema);
      } catch (error) {
        throw new RecordConstructionError({
          message: `Failed to compile the schema of ${this.name}`,
          context: { recordName: this.name },
          cause: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
    return this.#validate;
  }

  isValid(payload: unknown): boolean {
    return this.validator()(payload);
  }

  declaration(): string {
    return renderDeclaration(this);
  }
}

/**
 * Build a record type whose fields are exactly `entries`.
 */
export function makeRecordType(
  name: string,
  entries: readonly FieldEntry[],
  options: MakeRecordTypeOptions = {}
): RecordType {
  return RecordType.define(name, entries, options);
}

function assertIdentifier(recordName: string, identifier: string): void {
  if (!IDENTIFIER.test(identifier) || isReservedIdentifier(identifier)) {
    throw new RecordConstructionError({
      message: `'${identifier}' is not a usable identifier in ${recordName}`,
      errorCode: ErrorCode.INVALID_FIELD_NAME,
      context: { recordName, field: identifier },
    });
  }
}

function assertDistinctParameters(
  recordName: string,
  parameters: readonly TypeParameter[]
): void {
  const seen = new Set<string>();
  for (const parameter of parameters) {
    assertIdentifier(recordName, parameter.name);
    if (seen.has(parameter.name)) {
      throw new RecordConstructionError({
        message: `Type parameter ${parameter.name} is declared twice in ${recordName}`,
        context: { recordName },
      });
    }
    seen.add(parameter.name);
  }
}
