/**
 * JSON Schema Validation
 *
 * Report contracts live as JSON Schema (draft 2020-12) files under
 * packages/shared/contracts/. The same documents are sent to the model as the
 * output constraint and used by Ajv to validate what comes back.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';

export type JsonSchema = SchemaObject;

// Defaults fill omitted section captions; unknown properties are dropped
// rather than rejected.
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  useDefaults: true,
  removeAdditional: true,
});

const schemaCache = new Map<string, JsonSchema>();

function isJsonObject(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a contract file by name, trying the source tree, the compiled tree and
 * the working directory.
 *
 * @throws Error if the file cannot be found or is not a JSON object
 */
export function loadSchema(schemaName: string): JsonSchema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const possiblePaths = [
    // packages/shared/src -> packages/shared/contracts
    path.join(__dirname, '../contracts', schemaName),
    // dist/packages/shared/src -> packages/shared/contracts
    path.join(__dirname, '../../../../packages/shared/contracts', schemaName),
    path.join(process.cwd(), 'packages/shared/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) {
      continue;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    if (!isJsonObject(parsed)) {
      throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
    }
    logger.debug('Loaded schema', { schema: schemaName, path: schemaPath });
    schemaCache.set(schemaName, parsed);
    return parsed;
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Compile a contract file into a type-guarding validator. Ajv caches compiled
 * functions per schema object, and schema objects are cached per file.
 */
export function compileSchema<T = unknown>(schemaName: string): ValidateFunction<T> {
  return ajv.compile<T>(loadSchema(schemaName));
}

export function formatValidationErrors(errors: ValidateFunction['errors']): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate data against a contract file. The data is normalized in place:
 * schema defaults are applied and properties the schema does not declare are
 * removed.
 */
export function validateAgainstSchema(schemaName: string, data: unknown): ValidationResult {
  const validate = compileSchema(schemaName);

  if (!validate(data)) {
    const errors = formatValidationErrors(validate.errors);
    logger.debug('Schema validation failed', { schema: schemaName, errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
