import type { AnySchemaObject, ValidateFunction } from 'ajv';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';

let sharedAjv: Ajv2020 | undefined;

/**
 * Shared draft 2020-12 instance used to compile generated record schemas.
 * Formats are validated so timestamp fields must be RFC 3339 date-times.
 */
export function getRecordAjv(): Ajv2020 {
  if (sharedAjv) {
    return sharedAjv;
  }

  const ajv = new Ajv2020({
    strict: true,
    strictTypes: true,
    allowUnionTypes: false,
    validateFormats: true,
    allErrors: true,
    verbose: false,
  });
  addFormats(ajv, ['date-time']);

  sharedAjv = ajv;
  return ajv;
}

/**
 * Compile a schema and drop it from Ajv's schema cache: every generated
 * record type is compiled once and owns its validate function.
 */
export function compileRecordSchema(schema: AnySchemaObject): ValidateFunction {
  const ajv = getRecordAjv();
  const validate = ajv.compile(schema);
  ajv.removeSchema(schema);
  return validate;
}
