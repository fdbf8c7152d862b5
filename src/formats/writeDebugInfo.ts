import { sortSymbols } from '../lowering/debugInfo.js';
import type {
  CompiledFunction,
  DebugInfoArtifact,
  DebugInfoJson,
  WriteDebugInfoOptions,
} from './types.js';

/**
 * Create a debug-info artifact: per function, its place in the script image and its
 * symbols in a deterministic order.
 */
export function writeDebugInfo(
  functions: readonly CompiledFunction[],
  opts?: WriteDebugInfoOptions,
): DebugInfoArtifact {
  let offset = 0;
  const entries: DebugInfoJson['functions'] = functions.map((fn) => {
    const entry = {
      name: fn.name,
      offset,
      size: fn.bytes.length,
      symbols: sortSymbols(fn.debug?.symbols ?? []),
    };
    offset += fn.bytes.length;
    return entry;
  });
  return {
    kind: 'debug',
    json: {
      format: 'ecltk-debug-info',
      version: 1,
      ...(opts?.format !== undefined ? { sourceFormat: opts.format } : {}),
      functions: entries,
    },
  };
}
