import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { formatDiagnostic, runCli } from '../src/cli.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';

const SCRIPT = {
  functions: [
    {
      name: 'main',
      body: [
        { kind: 'Call', time: 0, callee: { opcode: 2 }, args: [{ kind: 'IntLit', value: 1 }] },
        { kind: 'Label', time: 5, name: 'again' },
        { kind: 'Goto', time: 5, label: 'again' },
      ],
    },
  ],
};

describe('cli', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ecltk-cli-'));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeScript(): Promise<string> {
    const path = join(dir, 'main.json');
    await writeFile(path, JSON.stringify(SCRIPT));
    return path;
  }

  it('compiles next to the input by default', async () => {
    const entry = await writeScript();
    const code = await runCli(['compile', '-f', 'std07', entry]);
    expect(code).toBe(0);
    const out = join(dir, 'main.bin');
    expect(stdout.join('')).toBe(`${out}\n`);
    const bytes = await readFile(out);
    // Two instructions plus the terminal.
    expect(bytes.length).toBe(60);
  });

  it('writes debug info beside the output', async () => {
    const entry = await writeScript();
    const out = join(dir, 'build', 'script.bin');
    const code = await runCli(['compile', '--format=std07', '--debug-info', '-o', out, entry]);
    expect(code).toBe(0);
    const debugPath = join(dir, 'build', 'script.debug.json');
    expect(stdout.join('')).toBe(`${out}\n${debugPath}\n`);
    const debug: unknown = JSON.parse(await readFile(debugPath, 'utf8'));
    expect(debug).toEqual({
      format: 'ecltk-debug-info',
      version: 1,
      sourceFormat: 'std07',
      functions: [
        { name: 'main', offset: 0, size: 60, symbols: [{ kind: 'label', name: 'again', offset: 20, time: 5 }] },
      ],
    });
  });

  it('decompiles a compiled image', async () => {
    const entry = await writeScript();
    expect(await runCli(['compile', '-f', 'std07', entry])).toBe(0);
    const out = join(dir, 'out.json');
    const code = await runCli(['decompile', '-f', 'std07', '--no-blocks', '-o', out, join(dir, 'main.bin')]);
    expect(code).toBe(0);
    const ir: unknown = JSON.parse(await readFile(out, 'utf8'));
    expect(ir).toEqual({
      functions: [
        {
          name: 'sub0',
          body: [
            { kind: 'Call', time: 0, callee: { opcode: 2 }, args: [{ kind: 'IntLit', value: 1 }] },
            { kind: 'Label', time: 0, name: 'label_20' },
            { kind: 'TimeLabel', time: 5 },
            { kind: 'Goto', time: 5, label: 'label_20' },
          ],
        },
      ],
    });
  });

  it('prints diagnostics and fails on errors', async () => {
    const entry = await writeScript();
    const code = await runCli(['compile', '-f', 'nope', entry]);
    expect(code).toBe(1);
    expect(stderr.join('')).toBe(
      `nope: error: [${DiagnosticIds.UnknownFormat}] Unknown format "nope" ` +
        '(expected one of: anm, ecl, std06, std07, std08, std10, std11, std12, std14, std17).\n',
    );
    expect(stdout).toEqual([]);
  });

  it('rejects a missing format', async () => {
    const entry = await writeScript();
    expect(await runCli(['compile', entry])).toBe(2);
    expect(stderr[0]).toBe('ecltk: --format is required\n');
  });

  it('rejects options of the other command', async () => {
    const entry = await writeScript();
    expect(await runCli(['decompile', '-f', 'std07', '--debug-info', entry])).toBe(2);
    expect(stderr[0]).toBe('ecltk: --debug-info only applies to compile\n');
    expect(await runCli(['compile', '-f', 'std07', '--no-blocks', entry])).toBe(2);
    expect(stderr[2]).toBe('ecltk: --no-blocks, --no-intrinsics and --no-arguments only apply to decompile\n');
  });

  it('rejects unknown commands and options', async () => {
    expect(await runCli(['link', 'x'])).toBe(2);
    expect(stderr[0]).toBe('ecltk: Unknown command "link" (expected compile|decompile)\n');
    expect(await runCli(['compile', '--fast', 'x'])).toBe(2);
    expect(stderr[2]).toBe('ecltk: Unknown option "--fast"\n');
    expect(await runCli(['compile', '-f'])).toBe(2);
    expect(stderr[4]).toBe('ecltk: -f expects a value\n');
  });

  it('prints help and version', async () => {
    expect(await runCli(['-h'])).toBe(0);
    expect(stdout.join('').startsWith('ecltk <compile|decompile> [options] <file>\n')).toBe(true);
    stdout.length = 0;
    expect(await runCli(['-V'])).toBe(0);
    expect(stdout).toEqual(['0.1.0\n']);
  });

  it('formats diagnostics with their location', () => {
    expect(formatDiagnostic({ id: DiagnosticIds.UnknownOpcode, severity: 'error', message: 'm', file: 'main' })).toBe(
      'main: error: [ETK200] m',
    );
    expect(
      formatDiagnostic({ id: DiagnosticIds.AliasCollision, severity: 'warning', message: 'm', file: 'f', line: 3 }),
    ).toBe('f:3: warning: [ETK300] m');
    expect(
      formatDiagnostic({ id: DiagnosticIds.Unknown, severity: 'error', message: 'm', file: 'f', line: 3, column: 7 }),
    ).toBe('f:3:7: error: [ETK000] m');
  });
});
