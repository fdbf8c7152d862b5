import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

let cached: string | undefined;

/**
 * Directory holding this package's `package.json`.
 *
 * Data files live under `src/` and are found relative to this directory, so the same
 * lookup works from the TypeScript sources and from the compiled `dist/src` tree.
 */
export function packageRoot(): string {
  if (cached !== undefined) return cached;
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) {
      cached = dir;
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) throw new Error('package.json not found above ' + fileURLToPath(import.meta.url));
    dir = parent;
  }
}

/** Absolute path of a data file shipped under `src/`. */
export function dataPath(...segments: string[]): string {
  return join(packageRoot(), 'src', ...segments);
}
