/**
 * JSON Schema validation engine using ajv.
 *
 * Schemas live in schemas/<name>.schema.json at the package root and are
 * registered together (under their $id) so they can reference each other.
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { readFileSync } from 'node:fs';
import { ConfigError } from './errors.js';
import { isPlainObject } from '../store/json.js';
import { ExitCode } from '../types/exit-codes.js';
import type { CategoryFile, SeasonFile } from '../types/command.js';

/** Schemas shipped with vexcmd, keyed by name. */
export interface SchemaTypes {
  category: CategoryFile;
  season: SeasonFile;
}

export type SchemaName = keyof SchemaTypes;

const SCHEMA_NAMES: readonly SchemaName[] = ['category', 'season'];

/** Singleton ajv instance. */
let ajvInstance: Ajv | null = null;

function isSchemaObject(value: unknown): value is SchemaObject {
  return isPlainObject(value);
}

/** Absolute URL of a shipped schema file. */
export function getSchemaUrl(name: SchemaName): URL {
  return new URL(`../../schemas/${name}.schema.json`, import.meta.url);
}

function loadSchemaFile(name: SchemaName): SchemaObject {
  const url = getSchemaUrl(name);
  const parsed: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (!isSchemaObject(parsed)) {
    throw new ConfigError(
      ExitCode.CONFIG_ERROR,
      `Schema file is not a JSON object: ${url.pathname}`,
    );
  }
  return parsed;
}

function getAjv(): Ajv {
  if (!ajvInstance) {
    ajvInstance = new Ajv({
      allErrors: true,
      strict: false,
      allowUnionTypes: true,
    });
    for (const name of SCHEMA_NAMES) {
      ajvInstance.addSchema(loadSchemaFile(name));
    }
  }
  return ajvInstance;
}

function schemaId(name: SchemaName): string {
  return `${name}.schema.json`;
}

function getValidator<N extends SchemaName>(name: N): ValidateFunction<SchemaTypes[N]> {
  const validate = getAjv().getSchema<SchemaTypes[N]>(schemaId(name));
  if (!validate) {
    throw new ConfigError(ExitCode.CONFIG_ERROR, `Unknown schema: ${name}`);
  }
  return validate;
}

/** Render ajv errors as "path: message" strings. */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((e) => {
    const extra = typeof e.params['additionalProperty'] === 'string'
      ? ` '${e.params['additionalProperty']}'`
      : '';
    return `${e.instancePath || '/'}: ${e.message ?? 'invalid'}${extra}`;
  });
}

/**
 * Validate data against a shipped schema and return it typed.
 * Throws ConfigError(VALIDATION_ERROR) listing every violation.
 */
export function validateAgainstSchema<N extends SchemaName>(
  data: unknown,
  name: N,
  file?: string,
): SchemaTypes[N] {
  const validate = getValidator(name);
  if (validate(data)) {
    return data;
  }
  const errors = formatSchemaErrors(validate.errors).join('; ');
  throw new ConfigError(
    ExitCode.VALIDATION_ERROR,
    `Schema validation failed${file ? ` for ${file}` : ''}: ${errors || 'unknown error'}`,
    { file, fix: `Check the file against schemas/${schemaId(name)}` },
  );
}

/**
 * Check if data is valid against a schema without throwing.
 * Returns an array of error messages (empty if valid).
 */
export function checkSchema(data: unknown, name: SchemaName): string[] {
  const validate = getValidator(name);
  return validate(data) ? [] : formatSchemaErrors(validate.errors);
}
