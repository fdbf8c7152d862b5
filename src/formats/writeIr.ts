import { formatScriptIr } from '../ir/document.js';
import type { ScriptIr } from '../ir/types.js';
import type { IrArtifact } from './types.js';

/** Create an IR document artifact. */
export function writeIr(script: ScriptIr): IrArtifact {
  return { kind: 'ir', text: formatScriptIr(script) };
}
