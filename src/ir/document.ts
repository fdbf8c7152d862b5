import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt } from '../diagnostics/types.js';
import { readJsonFile, schemaErrors, schemaValidator } from '../jsonSchema.js';
import type { ScriptIr } from './types.js';

const IR_SCHEMA = 'ir.schema.json';

/** Check an already-parsed value against the IR document schema. */
export async function validateScriptIr(
  value: unknown,
  file: string,
  diagnostics: Diagnostic[],
): Promise<ScriptIr | undefined> {
  const isScript = await schemaValidator<ScriptIr>(IR_SCHEMA);
  if (!isScript(value)) {
    diagAt(diagnostics, DiagnosticIds.InputInvalid, file, `Invalid IR document: ${schemaErrors(IR_SCHEMA)}`);
    return undefined;
  }
  const seen = new Set<string>();
  for (const fn of value.functions) {
    if (seen.has(fn.name)) {
      diagAt(diagnostics, DiagnosticIds.InputInvalid, file, `Function "${fn.name}" is defined more than once.`);
      return undefined;
    }
    seen.add(fn.name);
  }
  return value;
}

/** Read and validate an IR document. */
export async function readScriptIr(path: string, diagnostics: Diagnostic[]): Promise<ScriptIr | undefined> {
  const json = await readJsonFile(path, diagnostics);
  if (!json) return undefined;
  return validateScriptIr(json.value, path, diagnostics);
}

/** Serialized form of an IR document. */
export function formatScriptIr(script: ScriptIr): string {
  return `${JSON.stringify(script, null, 2)}\n`;
}
