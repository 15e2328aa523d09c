/**
 * Ajv setup shared by every schema-validated input
 */

import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';

export function createAjv(): Ajv {
  const ajv = new Ajv({
    strict: false,
    allErrors: true,
    verbose: true,
  });
  addFormats(ajv);
  return ajv;
}

/**
 * Join validation errors into one line, e.g.
 * `/links/r1/source must have required property 'port'`
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown validation error';
  return errors
    .map((err) => `${err.instancePath === '' ? '/' : err.instancePath} ${err.message ?? 'is invalid'}`)
    .join('; ');
}
