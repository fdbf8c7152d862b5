import { describe, expect, it } from 'vitest';

import { ByteWriter, hexToBytes } from '../src/codec/bytes.js';
import { compileScript } from '../src/compile.js';
import { decompileScript } from '../src/decompile.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { writeBin } from '../src/formats/writeBin.js';
import type { Expr, ScriptIr, Stmt } from '../src/ir/types.js';
import type { SignatureTable } from '../src/signatures/table.js';
import { concat, dwords, ECL_LAYOUT, eclTable } from './helpers/tables.js';

const table = eclTable();

const int = (value: number): Expr => ({ kind: 'IntLit', value });
const i1: Expr = { kind: 'Var', name: 'I1' };
const call = (time: number, opcode: number, args: Expr[] = []): Stmt => ({
  kind: 'Call',
  time,
  callee: { opcode },
  args,
});

const main: Stmt[] = [
  {
    kind: 'Declare',
    time: 0,
    vars: [{ name: 'x', type: 'int', init: { kind: 'EnumConst', enumName: 'Blend', member: 'Add' } }],
  },
  { kind: 'Assign', time: 0, target: { kind: 'Var', name: 'I1' }, op: '=', value: { kind: 'Binop', op: '+', left: { kind: 'Var', name: 'x' }, right: int(2) } },
  {
    kind: 'Call',
    time: 0,
    callee: { name: 'setBlend' },
    args: [{ kind: 'EnumConst', enumName: 'Blend', member: 'Normal' }, { kind: 'FloatLit', value: 1.5 }],
  },
  {
    kind: 'CondChain',
    time: 10,
    branches: [
      { cond: { kind: 'Binop', op: '==', left: i1, right: int(1) }, body: [call(10, 1, [int(1)])] },
      { cond: { kind: 'Binop', op: '<', left: i1, right: int(5) }, body: [call(10, 1, [int(2)])] },
    ],
    elseBody: [call(10, 1, [int(3)])],
  },
  {
    kind: 'While',
    time: 20,
    doWhile: false,
    cond: { kind: 'Binop', op: '<', left: i1, right: int(10) },
    body: [{ kind: 'Assign', time: 20, target: { kind: 'Var', name: 'I1' }, op: '+=', value: int(1) }],
  },
  { kind: 'Times', time: 30, count: int(3), body: [call(30, 51, [{ kind: 'StringLit', value: 'hi' }])] },
  {
    kind: 'Loop',
    time: 40,
    body: [call(40, 1, [int(4)]), { kind: 'Break', time: 40, cond: { kind: 'Binop', op: '>=', left: i1, right: int(3) } }],
  },
  { ...call(50, 1, [int(5)]), diffLabel: 'EN' },
  call(50, 1, [{ kind: 'DiffSwitch', cases: [int(1), int(2)] }]),
  { kind: 'Goto', time: 50, label: 'skip' },
  call(50, 1, [int(9)]),
  { kind: 'Label', time: 50, name: 'skip' },
  { kind: 'InterruptLabel', time: 60, id: 2 },
  call(60, 52, [{ kind: 'NameRef', table: 'sub', name: 'helper' }]),
  {
    kind: 'Assign',
    time: 60,
    target: { kind: 'Var', name: 'F0' },
    op: '=',
    value: { kind: 'Binop', op: '*', left: { kind: 'Var', name: 'F0' }, right: { kind: 'FloatLit', value: 2 } },
  },
  call(70, 1, [int(0)]),
];

const script: ScriptIr = {
  functions: [
    { name: 'main', body: main },
    { name: 'helper', body: [call(0, 0)] },
  ],
};

function compileToBytes(ir: ScriptIr, t: SignatureTable = table): Uint8Array {
  const diagnostics: Diagnostic[] = [];
  const functions = compileScript(ir, t, diagnostics);
  expect(diagnostics).toEqual([]);
  if (!functions) throw new Error('compile failed');
  return writeBin(functions).bytes;
}

function decompileBytes(bytes: Uint8Array): ScriptIr {
  const diagnostics: Diagnostic[] = [];
  const ir = decompileScript(bytes, table, diagnostics, 'image');
  expect(diagnostics).toEqual([]);
  if (!ir) throw new Error('decompile failed');
  return ir;
}

describe('compile / decompile round trip', () => {
  it('recompiles decompiled output to the same bytes', () => {
    const bytes = compileToBytes(script);
    const decompiled = decompileBytes(bytes);
    expect(compileToBytes(decompiled)).toEqual(bytes);
  });

  it('decompiles its own output to the same document', () => {
    const first = decompileBytes(compileToBytes(script));
    const second = decompileBytes(compileToBytes(first));
    expect(second).toEqual(first);
  });

  it('recovers the control flow of the source', () => {
    const decompiled = decompileBytes(compileToBytes(script));
    expect(decompiled.functions.map((fn) => fn.name)).toEqual(['sub0', 'sub1']);
    expect(decompiled.functions[0]?.body.map((s) => s.kind)).toEqual([
      'Assign',
      'Assign',
      'Call',
      'TimeLabel',
      'CondChain',
      'TimeLabel',
      'While',
      'TimeLabel',
      'Times',
      'Loop',
      'TimeLabel',
      'Call',
      'Call',
      'Call',
      'Goto',
      'Call',
      'Label',
      'TimeLabel',
      'InterruptLabel',
      'Call',
      'Assign',
      'TimeLabel',
      'Call',
    ]);
    expect(decompiled.functions[1]?.body).toEqual([{ kind: 'Call', time: 0, callee: { opcode: 0 }, args: [] }]);
  });

  it('recovers guards and sub references', () => {
    const body = decompileBytes(compileToBytes(script)).functions[0]?.body ?? [];
    const guarded = body.filter((s) => s.diffLabel !== undefined).map((s) => s.diffLabel);
    expect(guarded).toEqual(['EN', 'E', 'NHLX567']);
    expect(body).toContainEqual({
      kind: 'Call',
      time: 60,
      callee: { opcode: 52 },
      args: [{ kind: 'NameRef', table: 'sub', name: 'sub1' }],
    });
  });

  it('keeps flat output recompilable', () => {
    const bytes = compileToBytes(script);
    const diagnostics: Diagnostic[] = [];
    const flat = decompileScript(bytes, table, diagnostics, 'image', { noStructure: true });
    expect(diagnostics).toEqual([]);
    if (!flat) throw new Error('decompile failed');
    expect(flat.functions[0]?.body.some((s) => s.kind === 'CondGoto')).toBe(true);
    expect(compileToBytes(flat)).toEqual(bytes);
  });

  it('keeps raw output recompilable', () => {
    const bytes = compileToBytes(script);
    const diagnostics: Diagnostic[] = [];
    const raw = decompileScript(bytes, table, diagnostics, 'image', { noArguments: true });
    expect(diagnostics).toEqual([]);
    if (!raw) throw new Error('decompile failed');
    expect(compileToBytes(raw)).toEqual(bytes);
  });
});

/** One ECL instruction for every difficulty, with no register args. */
function ins(time: number, opcode: number, args: Uint8Array, argCount: number): Uint8Array {
  const out = new ByteWriter();
  out.writeInt('i32', time);
  out.writeInt('u16', opcode);
  out.writeInt('u16', 16 + args.length);
  out.writeInt('u16', 0);
  out.writeInt('u8', 0xff);
  out.writeInt('u8', argCount);
  out.writeInt('u32', 0);
  out.writeBytes(args);
  return out.toBytes();
}

const terminal = hexToBytes(ECL_LAYOUT.terminalBytes);

/** Decompile hand-built bytes, then compile the result again. */
function recompile(bytes: Uint8Array, t: SignatureTable = table): { bytes: Uint8Array; warnings: string[] } {
  const diagnostics: Diagnostic[] = [];
  const ir = decompileScript(bytes, t, diagnostics, 'image');
  expect(diagnostics.every((d) => d.severity === 'warning')).toBe(true);
  if (!ir) throw new Error('decompile failed');
  return { bytes: compileToBytes(ir, t), warnings: diagnostics.map((d) => d.message) };
}

describe('round trip from hand-built binaries', () => {
  it('keeps a jump opcode that another opcode shadows', () => {
    const dup = eclTable({ name: 'dup', signatures: { '4': 'ot' }, intrinsics: { '4': 'Jmp()' } });
    const bytes = concat(
      ins(0, 2, dwords(24, 0), 2),
      ins(10, 1, dwords(5), 1),
      ins(10, 4, dwords(-44, 0), 2),
      terminal,
    );
    expect(recompile(bytes, dup)).toEqual({ bytes, warnings: [] });
  });

  it('keeps strings that do not re-encode and unknown opcodes byte for byte', () => {
    const bytes = concat(
      ins(0, 51, hexToBytes('41004200'), 1),
      ins(0, 51, hexToBytes('41ff0000'), 1),
      ins(0, 51, hexToBytes('68690000'), 1),
      ins(0, 999, dwords(1, 2), 2),
      terminal,
    );
    expect(recompile(bytes)).toEqual({
      bytes,
      warnings: [
        'At offset 0: arg 1 is not a NUL-padded UTF-8 string',
        'At offset 20: arg 1 is not a NUL-padded UTF-8 string',
      ],
    });
  });

  it('compiles a negation to the same bytes as a multiplication by -1', () => {
    const assignF0 = (value: Expr): ScriptIr => ({
      functions: [{ name: 'main', body: [{ kind: 'Assign', time: 0, target: { kind: 'Var', name: 'F0' }, op: '=', value }] }],
    });
    const f1: Expr = { kind: 'Var', name: 'F1' };
    const negated = compileToBytes(assignF0({ kind: 'Unop', op: '-', operand: f1 }));
    const multiplied = compileToBytes(assignF0({ kind: 'Binop', op: '*', left: { kind: 'FloatLit', value: -1 }, right: f1 }));
    expect(negated).toEqual(multiplied);
    expect(negated.length).toBe(16 + 12 + 16);
  });
});
