import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt, hasErrors } from '../diagnostics/types.js';
import { readJsonFile, schemaErrors, schemaValidator } from '../jsonSchema.js';
import { dataPath } from '../packageRoot.js';
import { buildSignatureTable, type SignatureTable } from './table.js';
import type { InstrLayout, SignatureSource } from './types.js';

const SOURCE_SCHEMA = 'signature-source.schema.json';
const FORMATS_SCHEMA = 'formats.schema.json';

interface BuiltinFormats {
  layouts: Record<string, Omit<InstrLayout, 'name'>>;
  formats: Record<string, { layout: string; sources: string[] }>;
}

/**
 * Check an already-parsed value against the signature source schema.
 *
 * `file` names the source in diagnostics and becomes the source's default name.
 */
export async function validateSignatureSource(
  value: unknown,
  file: string,
  diagnostics: Diagnostic[],
): Promise<SignatureSource | undefined> {
  const isSource = await schemaValidator<SignatureSource>(SOURCE_SCHEMA);
  if (!isSource(value)) {
    diagAt(
      diagnostics,
      DiagnosticIds.SignatureSourceInvalid,
      file,
      `Invalid signature source: ${schemaErrors(SOURCE_SCHEMA)}`,
    );
    return undefined;
  }
  return { ...value, name: value.name ?? file };
}

/** Read and validate one signature source file. */
export async function readSignatureSource(
  path: string,
  diagnostics: Diagnostic[],
): Promise<SignatureSource | undefined> {
  const json = await readJsonFile(path, diagnostics);
  if (!json) return undefined;
  return validateSignatureSource(json.value, path, diagnostics);
}

export interface FormatDefinition {
  layout: InstrLayout;
  /** Built-in sources for the format, in merge order. */
  sources: SignatureSource[];
}

async function readBuiltinFormats(diagnostics: Diagnostic[]): Promise<BuiltinFormats | undefined> {
  const path = dataPath('signatures', 'core', 'formats.json');
  const json = await readJsonFile(path, diagnostics);
  if (!json) return undefined;
  const isFormats = await schemaValidator<BuiltinFormats>(FORMATS_SCHEMA);
  if (!isFormats(json.value)) {
    diagAt(
      diagnostics,
      DiagnosticIds.InputInvalid,
      path,
      `Invalid format table: ${schemaErrors(FORMATS_SCHEMA)}`,
    );
    return undefined;
  }
  return json.value;
}

/** Names of the formats that have a built-in layout. */
export async function builtinFormatNames(diagnostics: Diagnostic[]): Promise<string[]> {
  const formats = await readBuiltinFormats(diagnostics);
  return formats ? Object.keys(formats.formats).sort() : [];
}

/**
 * Load the layout and built-in signature sources of a format.
 *
 * With `noBuiltinSignatures` only the layout is loaded.
 */
export async function loadFormat(
  name: string,
  diagnostics: Diagnostic[],
  options: { noBuiltinSignatures?: boolean } = {},
): Promise<FormatDefinition | undefined> {
  const builtins = await readBuiltinFormats(diagnostics);
  if (!builtins) return undefined;
  const format = builtins.formats[name];
  const layout = format ? builtins.layouts[format.layout] : undefined;
  if (!format || !layout) {
    const known = Object.keys(builtins.formats).sort().join(', ');
    diagAt(
      diagnostics,
      DiagnosticIds.UnknownFormat,
      name,
      `Unknown format "${name}" (expected one of: ${known}).`,
    );
    return undefined;
  }

  const sources: SignatureSource[] = [];
  if (!options.noBuiltinSignatures) {
    for (const file of format.sources) {
      const source = await readSignatureSource(
        dataPath('signatures', 'core', file),
        diagnostics,
      );
      if (source) sources.push(source);
    }
  }
  return { layout: { name: format.layout, ...layout }, sources };
}

export interface TableOptions {
  format: string;
  /** User signature files layered on top of the built-in sources, in order. */
  signatureFiles?: string[];
  noBuiltinSignatures?: boolean;
}

/**
 * Build the signature table for a format from its built-in sources plus user files.
 */
export async function loadSignatureTable(
  options: TableOptions,
  diagnostics: Diagnostic[],
): Promise<SignatureTable | undefined> {
  const format = await loadFormat(options.format, diagnostics, {
    ...(options.noBuiltinSignatures !== undefined
      ? { noBuiltinSignatures: options.noBuiltinSignatures }
      : {}),
  });
  if (!format) return undefined;

  const sources = [...format.sources];
  for (const file of options.signatureFiles ?? []) {
    const source = await readSignatureSource(file, diagnostics);
    if (source) sources.push(source);
  }
  if (hasErrors(diagnostics)) return undefined;
  const table = buildSignatureTable(format.layout, sources, diagnostics);
  return hasErrors(diagnostics) ? undefined : table;
}
