#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import { decompile } from './decompile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';
import { packageRoot } from './packageRoot.js';
import type { CompileResult } from './pipeline.js';

type CliExit = { code: number };

type Command = 'compile' | 'decompile';

type CliOptions = {
  command: Command;
  entryFile: string;
  format: string;
  signatureFiles: string[];
  outputPath?: string;
  noStructure: boolean;
  noIntrinsics: boolean;
  noArguments: boolean;
  noBuiltinSignatures: boolean;
  emitDebugInfo: boolean;
};

function usage(): string {
  return [
    'ecltk <compile|decompile> [options] <file>',
    '',
    'Commands:',
    '  compile               IR document (.json) to script image (.bin)',
    '  decompile             Script image to IR document',
    '',
    'Options:',
    '  -f, --format <name>   Format: std06|std07|std08|std10|std11|std12|std14|std17|anm|ecl',
    '  -m, --signatures <file> Add a signature source (repeatable, applied in order)',
    '  -o, --output <file>   Primary output path',
    '      --no-blocks       Decompile to labels and jumps only',
    '      --no-intrinsics   Decompile intrinsic instructions as raw calls',
    '      --no-arguments    Decompile every instruction to pseudo arguments',
    '      --no-builtin-signatures Use only the format layout and -m sources',
    '      --debug-info      Also write <output>.debug.json when compiling',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function optionValue(argv: string[], i: number, name: string, long: string): { value: string; next: number } {
  const a = argv[i] ?? '';
  if (a.startsWith(`${long}=`)) {
    const v = a.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return { value: v, next: i };
  }
  const v = argv[i + 1];
  if (!v) fail(`${name} expects a value`);
  return { value: v, next: i + 1 };
}

function printVersion(): void {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require(join(packageRoot(), 'package.json'));
  const version =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : '0.0.0';
  process.stdout.write(`${version}\n`);
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let command: Command | undefined;
  let format: string | undefined;
  const signatureFiles: string[] = [];
  let outputPath: string | undefined;
  let noStructure = false;
  let noIntrinsics = false;
  let noArguments = false;
  let noBuiltinSignatures = false;
  let emitDebugInfo = false;
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      printVersion();
      return { code: 0 };
    }
    if (a === '-f' || a === '--format' || a.startsWith('--format=')) {
      const { value, next } = optionValue(argv, i, a, '--format');
      format = value;
      i = next;
      continue;
    }
    if (a === '-m' || a === '--signatures' || a.startsWith('--signatures=')) {
      const { value, next } = optionValue(argv, i, a, '--signatures');
      signatureFiles.push(value);
      i = next;
      continue;
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const { value, next } = optionValue(argv, i, a, '--output');
      outputPath = value;
      i = next;
      continue;
    }
    if (a === '--no-blocks') {
      noStructure = true;
      continue;
    }
    if (a === '--no-intrinsics') {
      noIntrinsics = true;
      continue;
    }
    if (a === '--no-arguments') {
      noArguments = true;
      continue;
    }
    if (a === '--no-builtin-signatures') {
      noBuiltinSignatures = true;
      continue;
    }
    if (a === '--debug-info') {
      emitDebugInfo = true;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (command === undefined) {
      if (a !== 'compile' && a !== 'decompile') fail(`Unknown command "${a}" (expected compile|decompile)`);
      command = a;
      continue;
    }
    if (entryFile !== undefined) {
      fail(`Expected exactly one <file> argument`);
    }
    entryFile = a;
  }

  if (!command) fail(`Expected a command (compile|decompile)`);
  if (!entryFile) fail(`Expected exactly one <file> argument`);
  if (!format) fail(`--format is required`);
  if (command === 'compile' && (noStructure || noIntrinsics || noArguments)) {
    fail(`--no-blocks, --no-intrinsics and --no-arguments only apply to decompile`);
  }
  if (command === 'decompile' && emitDebugInfo) fail(`--debug-info only applies to compile`);

  return {
    command,
    entryFile,
    format,
    signatureFiles,
    ...(outputPath ? { outputPath } : {}),
    noStructure,
    noIntrinsics,
    noArguments,
    noBuiltinSignatures,
    emitDebugInfo,
  };
}

function primaryPath(opts: CliOptions): string {
  if (opts.outputPath) return resolve(opts.outputPath);
  const entry = resolve(opts.entryFile);
  const ext = extname(entry);
  const stem = ext.length > 0 ? entry.slice(0, -ext.length) : entry;
  return `${stem}${opts.command === 'compile' ? '.bin' : '.json'}`;
}

function stripExtension(path: string): string {
  const ext = extname(path);
  return ext.length > 0 ? path.slice(0, -ext.length) : path;
}

async function writeArtifacts(primary: string, artifacts: Artifact[]): Promise<void> {
  const written: string[] = [];
  for (const artifact of artifacts) {
    let path: string;
    let data: string | Uint8Array;
    switch (artifact.kind) {
      case 'bin':
        path = primary;
        data = artifact.bytes;
        break;
      case 'ir':
        path = primary;
        data = artifact.text;
        break;
      case 'debug':
        path = `${stripExtension(primary)}.debug.json`;
        data = `${JSON.stringify(artifact.json, null, 2)}\n`;
        break;
    }
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
    written.push(path);
  }
  for (const path of written) process.stdout.write(`${path}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/** One diagnostic as printed by the CLI. */
export function formatDiagnostic(d: Diagnostic): string {
  let loc = d.file;
  if (d.line !== undefined) {
    loc = d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : `${d.file}:${d.line}`;
  }
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

async function run(opts: CliOptions): Promise<CompileResult> {
  const table = {
    format: opts.format,
    signatureFiles: opts.signatureFiles,
    noBuiltinSignatures: opts.noBuiltinSignatures,
  };
  const deps = { formats: defaultFormatWriters };
  if (opts.command === 'compile') {
    return compile(opts.entryFile, { ...table, emitDebugInfo: opts.emitDebugInfo }, deps);
  }
  return decompile(
    opts.entryFile,
    {
      ...table,
      noStructure: opts.noStructure,
      noIntrinsics: opts.noIntrinsics,
      noArguments: opts.noArguments,
    },
    deps,
  );
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await run(parsed);

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(primaryPath(parsed), res.artifacts);
    return 0;
  } catch (err) {
    if (!(err instanceof Error) || err.name !== 'CliError') throw err;
    process.stderr.write(`ecltk: ${err.message}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function stripExtendedWindowsPrefix(path: string): string {
  if (path.startsWith('\\\\?\\UNC\\')) return `\\\\${path.slice(8)}`;
  if (path.startsWith('\\\\?\\')) return path.slice(4);
  return path;
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = stripExtendedWindowsPrefix(real).replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  const invoked = normalizePathForCompare(invokedAs);
  return invoked.endsWith('/dist/src/cli.js') && normalizePathForCompare(self).endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
