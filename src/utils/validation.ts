/**
 * @fileoverview Shared Ajv instance and error formatting helpers.
 * @module age-graph-bridge/utils/validation
 */

import Ajv, {
  type ErrorObject,
  type KeywordDefinition,
  type Options,
  type SchemaObject,
  type ValidateFunction,
} from 'ajv';

const BASE_OPTIONS: Options = {
  allErrors: false,
  allowUnionTypes: true,
};

/** A safe-integer `number` or any `bigint`. */
export function isGraphIdValue(value: unknown): value is number | bigint {
  return typeof value === 'bigint' || (typeof value === 'number' && Number.isSafeInteger(value));
}

/**
 * `{ graphId: true }` accepts null or a graph id. JSON Schema's `integer`
 * neither admits `bigint` nor rejects numbers that were already rounded.
 */
export const graphIdKeyword: KeywordDefinition = {
  keyword: 'graphId',
  schemaType: 'boolean',
  errors: false,
  validate: (enabled: boolean, data: unknown) => !enabled || data === null || isGraphIdValue(data),
};

/** Strict instance for validating decoded data as-is. */
export const ajv = new Ajv(BASE_OPTIONS);
ajv.addKeyword(graphIdKeyword);

/**
 * Instance for configuration sources (environment variables) where values
 * arrive as strings and defaults should be filled in place.
 */
export const configAjv = new Ajv({ ...BASE_OPTIONS, coerceTypes: true, useDefaults: true });

export function compileSchema<T>(schema: SchemaObject, instance: Ajv = ajv): ValidateFunction<T> {
  return instance.compile<T>(schema);
}

/**
 * Property a validation error is about: the unknown key for
 * `additionalProperties`, the missing key for `required`, otherwise the last
 * segment of the instance path. Null for errors on the root value itself.
 */
export function errorPropertyName(error: ErrorObject): string | null {
  if (error.keyword === 'additionalProperties') {
    const extra: unknown = error.params.additionalProperty;
    return typeof extra === 'string' ? extra : null;
  }
  if (error.keyword === 'required') {
    const missing: unknown = error.params.missingProperty;
    return typeof missing === 'string' ? missing : null;
  }
  const segments = error.instancePath.split('/').filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : null;
}

export function describeValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown validation failure';
  return errors
    .map((error) => {
      const property = errorPropertyName(error);
      return property ? `'${property}' ${error.message ?? 'is invalid'}` : error.message ?? 'is invalid';
    })
    .join('; ');
}
