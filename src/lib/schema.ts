/**
 * JSON Schema validation utilities using Ajv.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
}

// Compiled validators keyed by schema $id
const schemaCache = new Map<string, ValidateFunction>();

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema is not an object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${schemaPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compile(schema: object): ValidateFunction {
  const schemaId = '$id' in schema && typeof schema.$id === 'string' ? schema.$id : JSON.stringify(schema);
  const cached = schemaCache.get(schemaId);
  if (cached) {
    return cached;
  }

  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };
  const ajv = new Ajv({ strict: true, allErrors: true });
  const validate = ajv.compile(schema);
  schemaCache.set(schemaId, validate);
  return validate;
}

/**
 * Validates data against a JSON schema. The type guard `isT` narrows the
 * validated value once the schema accepts it.
 */
export function validateWithSchema<T>(
  data: unknown,
  schema: object,
  isT: (value: unknown) => value is T
): ValidationResult<T> {
  const validate = compile(schema);

  if (validate(data) && isT(data)) {
    return { valid: true, data, errors: [] };
  }

  const errors: string[] = [];
  for (const error of validate.errors ?? []) {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    errors.push(`${path ? `${path}: ` : ''}${message}`);
  }
  if (errors.length === 0) {
    errors.push('value does not have the expected shape');
  }

  return { valid: false, data: null, errors };
}
