import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { NameTables } from './ir/types.js';

/**
 * Where the signature table comes from: a built-in format plus user sources.
 */
export interface TableSelection {
  /** Built-in format name (`std12`, `anm`, `ecl`, ...). */
  format: string;
  /** User signature source files, layered over the built-ins in order. */
  signatureFiles?: string[];
  /** Drop the built-in sources of the format; only its layout is kept. */
  noBuiltinSignatures?: boolean;
  /** Sprite, script and sub names for name references. */
  names?: NameTables;
}

/**
 * Options that influence compilation and which artifacts are produced.
 */
export interface CompilerOptions extends TableSelection {
  /** Also produce a debug-info artifact. */
  emitDebugInfo?: boolean;
}

/**
 * Options that influence how binaries are read back into IR.
 */
export interface DecompilerOptions extends TableSelection {
  /** Keep the flat goto/label form. */
  noStructure?: boolean;
  /** Keep intrinsic instructions as raw calls. */
  noIntrinsics?: boolean;
  /** Keep every instruction in pseudo-argument form. */
  noArguments?: boolean;
}

/**
 * Result of a run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;

export type DecompileFn = (
  entryFile: string,
  options: DecompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
