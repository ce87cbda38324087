/**
 * Template Conformance Validation
 *
 * Templates are example-shaped JSON, not JSON Schema. A JSON Schema is
 * derived from the template and checked with Ajv so that model output with
 * missing, extra or re-nested fields can be reported.
 */

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import type { JsonValue, Schema } from './types';

const ajv = new Ajv({
  strict: false,
  allErrors: true,
});

// Compiled validators by serialized derived schema; the template set is small and fixed
const validatorCache = new Map<string, ValidateFunction>();

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export type DerivedJsonSchema = {
  type?: string | string[];
  properties?: Record<string, DerivedJsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  items?: DerivedJsonSchema;
};

const SCALAR_TYPES = ['string', 'number', 'boolean', 'null'];

/**
 * Derive a JSON Schema describing the template's structure.
 * Objects fix their key set, arrays take their item shape from the first
 * element, and scalar leaves accept any JSON scalar.
 */
export function deriveJsonSchema(template: Schema): DerivedJsonSchema {
  if (Array.isArray(template)) {
    return template.length > 0
      ? { type: 'array', items: deriveJsonSchema(template[0]) }
      : { type: 'array' };
  }

  if (template !== null && typeof template === 'object') {
    const properties: Record<string, DerivedJsonSchema> = {};
    for (const [key, value] of Object.entries(template)) {
      properties[key] = deriveJsonSchema(value);
    }
    return {
      type: 'object',
      properties,
      required: Object.keys(template),
      additionalProperties: false,
    };
  }

  return { type: SCALAR_TYPES };
}

function formatError(error: ErrorObject): string {
  const location = error.instancePath || '/';
  if (error.keyword === 'additionalProperties' && 'additionalProperty' in error.params) {
    return `${location}: unexpected field '${String(error.params.additionalProperty)}'`;
  }
  if (error.keyword === 'required' && 'missingProperty' in error.params) {
    return `${location}: missing field '${String(error.params.missingProperty)}'`;
  }
  return `${location}: ${error.message ?? error.keyword}`;
}

/**
 * Check that an extraction result has the same fields and nesting as its template.
 */
export function validateAgainstTemplate(template: Schema, result: JsonValue): ValidationResult {
  const jsonSchema = deriveJsonSchema(template);
  const cacheKey = JSON.stringify(jsonSchema);

  let validate = validatorCache.get(cacheKey);
  if (!validate) {
    validate = ajv.compile(jsonSchema);
    validatorCache.set(cacheKey, validate);
  }

  const valid = validate(result);

  if (valid) {
    return { valid: true };
  }

  return {
    valid: false,
    errors: (validate.errors ?? []).map(formatError),
  };
}
