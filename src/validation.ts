/**
 * JSON Schema validation shared by the config loader and rule options
 */

import { Ajv2020, type ErrorObject, type SchemaObject } from 'ajv/dist/2020.js';

export interface ValidatorOptions {
  /** Coerce strings from the command line into the schema's types */
  coerceTypes?: boolean;
  /** Fill in `default` values from the schema */
  useDefaults?: boolean;
}

export interface SchemaValidator<T> {
  /** With coercion or defaults enabled the value is updated in place */
  isValid(data: unknown): data is T;
  /** Errors of the last failed check */
  errors(): string[];
}

/**
 * Compiles a schema into a reusable validator
 */
export function compileSchema<T = unknown>(schema: SchemaObject, options: ValidatorOptions = {}): SchemaValidator<T> {
  const ajv = new Ajv2020({
    allErrors: true,
    strict: false,
    coerceTypes: options.coerceTypes ?? false,
    useDefaults: options.useDefaults ?? false,
  });
  const validate = ajv.compile<T>(schema);

  return {
    isValid: (data: unknown): data is T => validate(data),
    errors: () => formatSchemaErrors(validate.errors),
  };
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(err => `${err.instancePath || '/'} ${err.message ?? 'is invalid'}`);
}
