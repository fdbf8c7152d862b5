import { readFile } from 'node:fs/promises';

import { Ajv, type SchemaObject, type ValidateFunction } from 'ajv';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, diagAt } from './diagnostics/types.js';
import { dataPath } from './packageRoot.js';

const ajv = new Ajv({ allErrors: true, strict: false });

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const compiled = new Map<string, ValidateFunction>();

/**
 * Compile a schema shipped under `src/schema/`, once per process.
 *
 * The type parameter names the shape the schema guarantees.
 */
export async function schemaValidator<T>(file: string): Promise<(value: unknown) => value is T> {
  let validate = compiled.get(file);
  if (!validate) {
    const schema: unknown = JSON.parse(await readFile(dataPath('schema', file), 'utf8'));
    if (!isSchemaObject(schema)) throw new Error(`schema ${file} is not an object`);
    validate = ajv.compile(schema);
    compiled.set(file, validate);
  }
  const check = validate;
  return (value: unknown): value is T => check(value) === true;
}

/** Errors of the last validation run by {@link schemaValidator} for `file`. */
export function schemaErrors(file: string): string {
  return ajv.errorsText(compiled.get(file)?.errors);
}

/** Read and parse a JSON file, reporting I/O and syntax errors. */
export async function readJsonFile(
  path: string,
  diagnostics: Diagnostic[],
): Promise<{ value: unknown } | undefined> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    diagAt(diagnostics, DiagnosticIds.IoReadFailed, path, `Failed to read file: ${String(err)}`);
    return undefined;
  }
  try {
    const value: unknown = JSON.parse(text);
    return { value };
  } catch (err) {
    diagAt(diagnostics, DiagnosticIds.InputInvalid, path, `Invalid JSON: ${String(err)}`);
    return undefined;
  }
}
