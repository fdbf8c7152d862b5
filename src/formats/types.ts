import type { ScriptIr } from '../ir/types.js';
import type { FunctionDebugInfo } from '../lowering/debugInfo.js';

/**
 * One compiled function: its terminal-delimited instruction stream plus the debug info
 * gathered while lowering it.
 */
export interface CompiledFunction {
  name: string;
  bytes: Uint8Array;
  debug?: FunctionDebugInfo;
}

/**
 * Options for debug-info writing.
 */
export interface WriteDebugInfoOptions {
  /** Format name recorded in the document. */
  format?: string;
}

/**
 * In-memory script image: every function's stream, in order.
 */
export interface BinArtifact {
  kind: 'bin';
  path?: string;
  bytes: Uint8Array;
}

/**
 * In-memory debug-info artifact.
 */
export interface DebugInfoArtifact {
  kind: 'debug';
  path?: string;
  json: DebugInfoJson;
}

/**
 * In-memory IR document artifact.
 */
export interface IrArtifact {
  kind: 'ir';
  path?: string;
  text: string;
}

export type Artifact = BinArtifact | DebugInfoArtifact | IrArtifact;

/**
 * Debug-info document, version 1.
 *
 * Readers must ignore keys they do not know; writers may add more.
 */
export type DebugInfoJson = {
  format: 'ecltk-debug-info';
  version: 1;
  functions: Array<FunctionDebugInfo & { offset: number; size: number }>;
  [key: string]: unknown;
};

/**
 * Format writers used by the pipeline to turn compiled functions and IR into artifacts.
 */
export interface FormatWriters {
  writeBin(functions: readonly CompiledFunction[]): BinArtifact;
  writeDebugInfo(functions: readonly CompiledFunction[], opts?: WriteDebugInfoOptions): DebugInfoArtifact;
  writeIr(script: ScriptIr): IrArtifact;
}
