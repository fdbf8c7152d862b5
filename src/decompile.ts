import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { instrSize, readInstrStreams } from './codec/instr.js';
import type { RawInstr } from './codec/types.js';
import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, diagAt, hasErrors } from './diagnostics/types.js';
import type { FunctionBody, NameTables, ScriptIr } from './ir/types.js';
import type { CompileResult, DecompileFn, DecompilerOptions, PipelineDeps } from './pipeline.js';
import { liftFunction } from './raising/lift.js';
import { structureBody } from './raising/structure.js';
import { loadSignatureTable } from './signatures/sources.js';
import type { SignatureTable } from './signatures/table.js';

export interface FunctionDecompileOptions {
  names?: NameTables;
  noStructure?: boolean;
  noIntrinsics?: boolean;
  noArguments?: boolean;
}

/**
 * Read one function's raw instructions back into IR.
 *
 * Never fails: instructions that do not fit their signature stay in pseudo form, and
 * control flow that is not recognized stays as labels and jumps.
 */
export function decompileFunction(
  name: string,
  raws: readonly RawInstr[],
  table: SignatureTable,
  diagnostics: Diagnostic[],
  options: FunctionDecompileOptions = {},
): FunctionBody {
  const last = raws[raws.length - 1];
  const endOffset = last ? last.offset + instrSize(table.layout, last.blob.length) : 0;
  const flat = liftFunction(raws, endOffset, {
    table,
    diagnostics,
    file: name,
    ...(options.names ? { names: options.names } : {}),
    ...(options.noIntrinsics ? { noIntrinsics: true } : {}),
    ...(options.noArguments ? { noArguments: true } : {}),
  });
  return { name, body: options.noStructure ? flat : structureBody(flat) };
}

/**
 * Read a script image (terminal-delimited streams) back into an IR document.
 *
 * Function `i` is named by the sub name table, or `sub<i>`; sub references resolve to
 * those names. Returns `undefined` when the bytes are not a well-formed image.
 */
export function decompileScript(
  bytes: Uint8Array,
  table: SignatureTable,
  diagnostics: Diagnostic[],
  file: string,
  options: FunctionDecompileOptions = {},
): ScriptIr | undefined {
  const streams = readInstrStreams(bytes, table.layout, diagnostics, file);
  if (!streams) return undefined;
  const subNames = streams.map((_, i) => options.names?.sub?.[i] ?? `sub${i}`);
  const names: NameTables = { ...options.names, sub: subNames };
  const functions = streams.map((raws, i) =>
    decompileFunction(subNames[i] ?? `sub${i}`, raws, table, diagnostics, { ...options, names }),
  );
  const { sprite, script } = names;
  return {
    functions,
    ...(sprite || script ? { names: { ...(sprite ? { sprite } : {}), ...(script ? { script } : {}) } } : {}),
  };
}

/**
 * Decompile a binary script image file to an IR document artifact.
 */
export const decompile: DecompileFn = async (
  entryFile: string,
  options: DecompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(entryPath));
  } catch (err) {
    diagAt(diagnostics, DiagnosticIds.IoReadFailed, entryPath, `Failed to read input file: ${String(err)}`);
    return { diagnostics, artifacts: [] };
  }

  const table = await loadSignatureTable(options, diagnostics);
  if (!table) return { diagnostics, artifacts: [] };

  const script = decompileScript(bytes, table, diagnostics, entryPath, {
    ...(options.names ? { names: options.names } : {}),
    ...(options.noStructure ? { noStructure: true } : {}),
    ...(options.noIntrinsics ? { noIntrinsics: true } : {}),
    ...(options.noArguments ? { noArguments: true } : {}),
  });
  if (!script || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };
  return { diagnostics, artifacts: [deps.formats.writeIr(script)] };
};
