import type { BinArtifact, CompiledFunction } from './types.js';

/**
 * Create a script image from compiled functions.
 *
 * Streams are concatenated in function order; each already ends in its terminal marker.
 */
export function writeBin(functions: readonly CompiledFunction[]): BinArtifact {
  const size = functions.reduce((n, fn) => n + fn.bytes.length, 0);
  const out = new Uint8Array(size);
  let offset = 0;
  for (const fn of functions) {
    out.set(fn.bytes, offset);
    offset += fn.bytes.length;
  }
  return { kind: 'bin', bytes: out };
}
