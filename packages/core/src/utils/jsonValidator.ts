/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import AjvModule, { type SchemaObject, type ErrorObject, type ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';                  // date-time, uri, ...
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

// ajv and ajv-formats are CommonJS; under NodeNext the class hangs off `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/* ------------------------------------------------------------------ */
/* Public API                                                         */
/* ------------------------------------------------------------------ */
export interface ValidationResult {
  ok: boolean;
  errors?: string[];
}

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

// Parsed schemas are cached by file so ajv's own compile cache is hit.
const schemas = new Map<string, SchemaObject>();

/**
 * Locate and parse a JSON-Schema file.
 *
 * Two locations are tried so it works before and after compilation:
 *   1.  ../schemas/…          from src/utils, i.e. src/schemas
 *   2.  ../../src/schemas/…   from dist/utils; the build does not copy the
 *                             schemas, so this maps back to src/schemas
 */
export function loadSchema(schemaFile: string): SchemaObject {
  const cached = schemas.get(schemaFile);
  if (cached) return cached;

  const here = dirname(fileURLToPath(import.meta.url));
  const candidatePaths = [
    resolve(here, '..', 'schemas', schemaFile),
    resolve(here, '..', '..', 'src', 'schemas', schemaFile),
  ];
  const schemaPath = candidatePaths.find((p) => existsSync(p));
  if (!schemaPath) {
    throw new Error(`Schema "${schemaFile}" not found`);
  }

  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf8'));
  schemas.set(schemaFile, schema);
  return schema;
}

/** Compile a schema file into a type guard for `T`. */
export function compileValidator<T>(schemaFile: string): ValidateFunction<T> {
  return ajv.compile<T>(loadSchema(schemaFile));
}

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '(root)'} ${e.message ?? 'is invalid'}`);
}

/**
 * Validate `json` against a JSON-Schema file.
 *
 * @param schemaFile    File name (e.g. `"plan.schema.json"`)
 */
export function validateJson(json: unknown, schemaFile: string): ValidationResult {
  let validate: ValidateFunction<unknown>;
  try {
    validate = compileValidator<unknown>(schemaFile);
  } catch (error) {
    return { ok: false, errors: [error instanceof Error ? error.message : String(error)] };
  }
  return validate(json) ? { ok: true } : { ok: false, errors: formatErrors(validate.errors) };
}
