import Ajv2020, { type Schema, type ValidateFunction } from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

const ajv = new Ajv2020({
  allErrors: true,
  strict: false,
  // NaN and Infinity are not heights
  strictNumbers: true,
});
addFormats(ajv);

/**
 * Compile a JSON schema into a type guard. Ajv caches the result per schema
 * object, so repeated calls with an imported schema are cheap.
 */
export function compileSchema<T>(schema: Schema): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/** Render a validator's last errors as a single readable line. */
export function schemaErrors(validate: ValidateFunction): string {
  return ajv.errorsText(validate.errors, { separator: "; " });
}
