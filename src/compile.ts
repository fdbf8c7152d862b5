import { resolve } from 'node:path';

import { encodeInstrStream } from './codec/instr.js';
import type { Diagnostic } from './diagnostics/types.js';
import { hasErrors } from './diagnostics/types.js';
import type { Artifact, CompiledFunction } from './formats/types.js';
import { readScriptIr } from './ir/document.js';
import type { FunctionBody, NameTables, ScriptIr } from './ir/types.js';
import { DebugInfoBuilder } from './lowering/debugInfo.js';
import { flattenFunction, GENERATED_LABEL_PREFIX } from './lowering/flatten.js';
import { resolveLabels } from './lowering/labels.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
import { loadSignatureTable } from './signatures/sources.js';
import type { SignatureTable } from './signatures/table.js';

export interface FunctionCompileOptions {
  names?: NameTables;
  emitDebugInfo?: boolean;
}

/**
 * Compile one function body to its instruction stream.
 *
 * Diagnostics use the function name as their `file`. Returns `undefined` when the
 * body has errors.
 */
export function compileFunction(
  fn: FunctionBody,
  table: SignatureTable,
  diagnostics: Diagnostic[],
  options: FunctionCompileOptions = {},
): CompiledFunction | undefined {
  const file = fn.name;
  const local: Diagnostic[] = [];
  const debug = options.emitDebugInfo ? new DebugInfoBuilder(fn.name) : undefined;
  try {
    const items = flattenFunction(fn.body, {
      table,
      diagnostics: local,
      file,
      ...(options.names ? { names: options.names } : {}),
      ...(debug ? { debug } : {}),
    });
    if (hasErrors(local)) return undefined;

    const resolved = resolveLabels(items, table, local, file);
    if (hasErrors(local)) return undefined;

    const bytes = encodeInstrStream(resolved.instructions, table, local, file);
    if (hasErrors(local)) return undefined;

    if (!debug) return { name: fn.name, bytes };
    for (const [name, label] of resolved.labels) {
      if (name.startsWith(GENERATED_LABEL_PREFIX)) continue;
      debug.add({ kind: 'label', name, offset: label.offset, time: label.time });
    }
    return { name: fn.name, bytes, debug: debug.build() };
  } finally {
    diagnostics.push(...local);
  }
}

/**
 * Compile every function of a script, in order.
 *
 * Sub names default to the function names, so a sub reference names the function it
 * calls. Returns `undefined` when any function has errors; all of them are still
 * checked.
 */
export function compileScript(
  script: ScriptIr,
  table: SignatureTable,
  diagnostics: Diagnostic[],
  options: FunctionCompileOptions = {},
): CompiledFunction[] | undefined {
  const names: NameTables = {
    ...script.names,
    ...options.names,
    sub: options.names?.sub ?? script.names?.sub ?? script.functions.map((fn) => fn.name),
  };
  const compiled: CompiledFunction[] = [];
  let failed = false;
  for (const fn of script.functions) {
    const out = compileFunction(fn, table, diagnostics, { ...options, names });
    if (out) compiled.push(out);
    else failed = true;
  }
  return failed ? undefined : compiled;
}

/**
 * Compile an IR document file to a script image.
 *
 * Produces a `bin` artifact, plus a `debug` artifact with `emitDebugInfo`.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  const script = await readScriptIr(entryPath, diagnostics);
  if (!script) return { diagnostics, artifacts: [] };

  const table = await loadSignatureTable(options, diagnostics);
  if (!table) return { diagnostics, artifacts: [] };

  const functions = compileScript(script, table, diagnostics, {
    ...(options.names ? { names: options.names } : {}),
    ...(options.emitDebugInfo ? { emitDebugInfo: true } : {}),
  });
  if (!functions || hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const artifacts: Artifact[] = [deps.formats.writeBin(functions)];
  if (options.emitDebugInfo) {
    artifacts.push(deps.formats.writeDebugInfo(functions, { format: options.format }));
  }
  return { diagnostics, artifacts };
};
