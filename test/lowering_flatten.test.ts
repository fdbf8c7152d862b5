import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { Expr, Stmt, VarExpr } from '../src/ir/types.js';
import { flattenFunction } from '../src/lowering/flatten.js';
import type { LowItem } from '../src/lowering/types.js';
import type { SignatureTable } from '../src/signatures/table.js';
import { eclTable, STD_LAYOUT, tableFor } from './helpers/tables.js';

const table = eclTable();

function flatten(body: Stmt[], t: SignatureTable = table): { items: LowItem[]; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const items = flattenFunction(body, { table: t, diagnostics, file: 'main' });
  return { items, diagnostics };
}

function clean(body: Stmt[]): LowItem[] {
  const { items, diagnostics } = flatten(body);
  expect(diagnostics).toEqual([]);
  return items;
}

const v = (name: string): VarExpr => ({ kind: 'Var', name });
const int = (value: number): Expr => ({ kind: 'IntLit', value });
const wait = (n: number): Stmt => ({ kind: 'Call', time: 0, callee: { name: 'wait' }, args: [int(n)] });
const assign = (name: string, value: Expr): Stmt => ({ kind: 'Assign', time: 0, target: v(name), op: '=', value });

describe('flattenFunction', () => {
  it('emits plain calls with their args', () => {
    expect(clean([wait(7)])).toEqual([{ kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 7 }] }]);
  });

  it('splits nested arithmetic through the destination register', () => {
    const items = clean([
      assign('I0', { kind: 'Binop', op: '*', left: { kind: 'Binop', op: '+', left: v('I1'), right: int(2) }, right: v('I2') }),
    ]);
    expect(items).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 20,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'reg', reg: 10001, type: 'int' },
          { kind: 'int', value: 2 },
        ],
      },
      {
        kind: 'instr',
        time: 0,
        opcode: 22,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'reg', reg: 10002, type: 'int' },
        ],
      },
    ]);
  });

  it('uses a scratch register when the destination is still read', () => {
    const items = clean([
      assign('I0', { kind: 'Binop', op: '*', left: { kind: 'Binop', op: '+', left: v('I1'), right: int(2) }, right: v('I0') }),
    ]);
    expect(items.map((i) => (i.kind === 'instr' ? [i.opcode, i.args] : i.name))).toEqual([
      [
        20,
        [
          { kind: 'reg', reg: 10002, type: 'int' },
          { kind: 'reg', reg: 10001, type: 'int' },
          { kind: 'int', value: 2 },
        ],
      ],
      [
        22,
        [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'reg', reg: 10002, type: 'int' },
          { kind: 'reg', reg: 10000, type: 'int' },
        ],
      ],
    ]);
  });

  it('negates through multiplication when there is no negation instruction', () => {
    expect(clean([assign('F0', { kind: 'Unop', op: '-', operand: v('F1') })])).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 24,
        args: [
          { kind: 'reg', reg: 10004, type: 'float' },
          { kind: 'float', value: -1 },
          { kind: 'reg', reg: 10005, type: 'float' },
        ],
      },
    ]);
  });

  it('complements through subtraction from -1', () => {
    expect(clean([assign('I0', { kind: 'Unop', op: '~', operand: v('I1') })])).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 21,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'int', value: -1 },
          { kind: 'reg', reg: 10001, type: 'int' },
        ],
      },
    ]);
  });

  it('lowers an if to a negated compare-and-jump over the body', () => {
    const items = clean([
      {
        kind: 'CondChain',
        time: 0,
        branches: [{ cond: { kind: 'Binop', op: '<', left: v('I0'), right: int(5) }, body: [wait(1)] }],
      },
    ]);
    expect(items).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 35,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'int', value: 5 },
          { kind: 'labelOffset', label: '@chain_end_0' },
          { kind: 'labelTime', label: '@chain_end_0' },
        ],
      },
      { kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 1 }] },
      { kind: 'label', name: '@chain_end_0', time: 0 },
    ]);
  });

  it('keeps a comparison of two constants as a compare-and-jump', () => {
    const items = clean([
      { kind: 'Label', time: 0, name: 'top' },
      { kind: 'CondGoto', time: 0, cond: { kind: 'Binop', op: '<', left: int(1), right: int(2) }, label: 'top' },
    ]);
    expect(items[1]).toEqual({
      kind: 'instr',
      time: 0,
      opcode: 32,
      args: [
        { kind: 'int', value: 1 },
        { kind: 'int', value: 2 },
        { kind: 'labelOffset', label: 'top' },
        { kind: 'labelTime', label: 'top' },
      ],
    });
  });

  it('breaks out of the innermost loop', () => {
    const items = clean([{ kind: 'Loop', time: 0, body: [{ kind: 'Loop', time: 0, body: [{ kind: 'Break', time: 0 }] }] }]);
    expect(items.map((i) => (i.kind === 'label' ? i.name : i.opcode))).toEqual([
      '@loop_0',
      '@loop_2',
      2,
      2,
      '@loop_end_3',
      2,
      '@loop_end_1',
    ]);
    const brk = items[2];
    expect(brk?.kind === 'instr' ? brk.args[0] : undefined).toEqual({ kind: 'labelOffset', label: '@loop_end_3' });
  });

  it('counts a times loop down in a scratch register', () => {
    const items = clean([{ kind: 'Times', time: 0, count: int(3), body: [wait(1)] }]);
    expect(items).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 10,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'int', value: 3 },
        ],
      },
      { kind: 'label', name: '@times_0', time: 0 },
      { kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 1 }] },
      {
        kind: 'instr',
        time: 0,
        opcode: 3,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'labelOffset', label: '@times_0' },
          { kind: 'labelTime', label: '@times_0' },
        ],
      },
      { kind: 'label', name: '@times_end_1', time: 0 },
    ]);
  });

  it('drops a times loop with a constant count of zero', () => {
    expect(clean([{ kind: 'Times', time: 0, count: int(0), body: [wait(1)] }])).toEqual([]);
  });

  it('restricts guarded statements to their difficulties', () => {
    const items = clean([{ ...wait(1), diffLabel: 'EN' }]);
    expect(items).toEqual([
      { kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 1 }], difficultyMask: 3 },
    ]);
  });

  it('emits one instruction per distinct difficulty switch case', () => {
    const items = clean([
      { kind: 'Call', time: 0, callee: { opcode: 1 }, args: [{ kind: 'DiffSwitch', cases: [int(1), int(2)] }] },
    ]);
    expect(items).toEqual([
      { kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 1 }], difficultyMask: 1 },
      { kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 2 }], difficultyMask: 254 },
    ]);
  });

  it('assigns a difficulty switch in a condition to a scratch register first', () => {
    const items = clean([
      {
        kind: 'CondChain',
        time: 0,
        branches: [
          {
            cond: { kind: 'Binop', op: '==', left: v('I1'), right: { kind: 'DiffSwitch', cases: [int(1), int(2)] } },
            body: [wait(1)],
          },
        ],
      },
    ]);
    expect(items).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 10,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'int', value: 1 },
        ],
        difficultyMask: 1,
      },
      {
        kind: 'instr',
        time: 0,
        opcode: 10,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'int', value: 2 },
        ],
        difficultyMask: 254,
      },
      {
        kind: 'instr',
        time: 0,
        opcode: 31,
        args: [
          { kind: 'reg', reg: 10001, type: 'int' },
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'labelOffset', label: '@chain_end_0' },
          { kind: 'labelTime', label: '@chain_end_0' },
        ],
      },
      { kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 1 }] },
      { kind: 'label', name: '@chain_end_0', time: 0 },
    ]);
  });

  it('counts a times loop with a difficulty switch count', () => {
    const items = clean([
      { kind: 'Times', time: 0, count: { kind: 'DiffSwitch', cases: [int(2), int(3)] }, body: [wait(1)] },
    ]);
    const reg = (r: number) => ({ kind: 'reg', reg: r, type: 'int' });
    expect(items).toEqual([
      { kind: 'instr', time: 0, opcode: 10, args: [reg(10000), { kind: 'int', value: 2 }], difficultyMask: 1 },
      { kind: 'instr', time: 0, opcode: 10, args: [reg(10000), { kind: 'int', value: 3 }], difficultyMask: 254 },
      { kind: 'instr', time: 0, opcode: 10, args: [reg(10001), reg(10000)] },
      {
        kind: 'instr',
        time: 0,
        opcode: 33,
        args: [
          reg(10001),
          { kind: 'int', value: 0 },
          { kind: 'labelOffset', label: '@times_end_1' },
          { kind: 'labelTime', label: '@times_end_1' },
        ],
      },
      { kind: 'label', name: '@times_0', time: 0 },
      { kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 1 }] },
      {
        kind: 'instr',
        time: 0,
        opcode: 3,
        args: [reg(10001), { kind: 'labelOffset', label: '@times_0' }, { kind: 'labelTime', label: '@times_0' }],
      },
      { kind: 'label', name: '@times_end_1', time: 0 },
    ]);
  });

  it('evaluates a difficulty switch in a while condition once, before the loop', () => {
    const items = clean([
      {
        kind: 'While',
        time: 0,
        doWhile: true,
        cond: { kind: 'Binop', op: '<', left: v('I1'), right: { kind: 'DiffSwitch', cases: [int(4), int(8)] } },
        body: [wait(1)],
      },
    ]);
    expect(items.map((i) => (i.kind === 'label' ? i.name : i.opcode))).toEqual([10, 10, '@while_0', 1, 32, '@while_end_1']);
  });

  it('fills left-out trailing padding with zeros', () => {
    expect(clean([{ kind: 'Call', time: 0, callee: { opcode: 40 }, args: [int(5)] }])).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 40,
        args: [
          { kind: 'int', value: 5 },
          { kind: 'int', value: 0 },
          { kind: 'int', value: 0 },
        ],
      },
    ]);
  });
});

describe('flattenFunction errors', () => {
  function errors(body: Stmt[], t: SignatureTable = table): Array<[string, string]> {
    return flatten(body, t).diagnostics.map((d): [string, string] => [d.id, d.message]);
  }

  it('rejects break outside of a loop', () => {
    expect(flatten([{ kind: 'Break', time: 0 }]).diagnostics).toEqual([
      { id: DiagnosticIds.BreakOutsideLoop, severity: 'error', message: '"break" outside of a loop', file: 'main' },
    ]);
  });

  it('warns when one register is reached through two spellings', () => {
    const { items, diagnostics } = flatten([
      { kind: 'Call', time: 0, callee: { opcode: 1 }, args: [v('I0')] },
      { kind: 'Call', time: 0, callee: { opcode: 1 }, args: [{ kind: 'Reg', reg: 10000, type: 'int' }] },
    ]);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.AliasCollision,
        severity: 'warning',
        message: 'Register 10000 is named both "I0" and "REG[10000]".',
        file: 'main',
      },
    ]);
    expect(items).toHaveLength(2);
  });

  it('keeps a local out of a register its name reaches as an alias outside its block', () => {
    const items = clean([
      {
        kind: 'Loop',
        time: 0,
        body: [
          { kind: 'Declare', time: 0, vars: [{ name: 'I0', type: 'int', init: int(5) }] },
          { kind: 'Break', time: 0 },
        ],
      },
      assign('I0', int(1)),
    ]);
    expect(items.filter((i) => i.kind === 'instr' && i.opcode === 10).map((i) => (i.kind === 'instr' ? i.args : []))).toEqual([
      [
        { kind: 'reg', reg: 10001, type: 'int' },
        { kind: 'int', value: 5 },
      ],
      [
        { kind: 'reg', reg: 10000, type: 'int' },
        { kind: 'int', value: 1 },
      ],
    ]);
  });

  it('runs out of scratch registers for locals', () => {
    const vars = ['a', 'b', 'c', 'd', 'e'].map((name) => ({ name, type: 'int' as const }));
    expect(errors([{ kind: 'Declare', time: 0, vars }])).toEqual([
      [DiagnosticIds.ScratchRegistersExhausted, 'no int scratch register left for local "e"'],
    ]);
  });

  it('reports unknown opcodes and wrong arg counts', () => {
    expect(
      errors([
        { kind: 'Call', time: 0, callee: { opcode: 999 }, args: [] },
        { kind: 'Call', time: 0, callee: { opcode: 20 }, args: [int(1)] },
        { kind: 'Call', time: 0, callee: { opcode: 40 }, args: [] },
        { kind: 'Call', time: 0, callee: { name: 'shoot' }, args: [] },
      ]),
    ).toEqual([
      [DiagnosticIds.UnknownOpcode, 'opcode 999 has no signature'],
      [DiagnosticIds.ArgCountMismatch, 'opcode 20 ("SSS") expects 3 args, got 1'],
      [DiagnosticIds.ArgCountMismatch, 'opcode 40 ("S__") expects 1 to 3 args, got 0'],
      [DiagnosticIds.UnknownName, 'unknown instruction "shoot"'],
    ]);
  });

  it('spells out compound assignments the format has no instruction for', () => {
    expect(clean([{ kind: 'Assign', time: 0, target: v('I0'), op: '-=', value: int(5) }])).toEqual([
      {
        kind: 'instr',
        time: 0,
        opcode: 21,
        args: [
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'reg', reg: 10000, type: 'int' },
          { kind: 'int', value: 5 },
        ],
      },
    ]);
    expect(errors([{ kind: 'Assign', time: 0, target: v('F0'), op: '-=', value: { kind: 'FloatLit', value: 1 } }])).toEqual([
      [DiagnosticIds.IntrinsicNotEncodable, 'no instruction in format "ecl-v2" implements Binop(op="-";type="float")'],
    ]);
  });

  it('reports intrinsics the format cannot encode', () => {
    expect(
      errors([{ kind: 'CondGoto', time: 0, cond: { kind: 'Binop', op: '==', left: v('F0'), right: v('F1') }, label: 'x' }]),
    ).toEqual([
      [
        DiagnosticIds.IntrinsicNotEncodable,
        'no instruction in format "ecl-v2" implements CondJmp(op="==";type="float")',
      ],
    ]);
  });

  it('rejects registers and difficulty in a format without them', () => {
    const std = tableFor(STD_LAYOUT, [{ signatures: { '1': 'S' } }]);
    expect(
      errors(
        [
          { kind: 'Assign', time: 0, target: { kind: 'Reg', reg: 5, type: 'int' }, op: '=', value: int(1) },
          { kind: 'Call', time: 0, callee: { opcode: 1 }, args: [int(1)], diffLabel: 'E' },
        ],
        std,
      ),
    ).toEqual([
      [DiagnosticIds.RegisterUnsupportedInFormat, 'format "std-06" has no registers'],
      [DiagnosticIds.DifficultyUnsupported, 'format "std-06" has no difficulty flags'],
    ]);
  });

  it('keeps going after a failed statement', () => {
    const { items, diagnostics } = flatten([{ kind: 'Break', time: 0 }, wait(2)]);
    expect(diagnostics).toHaveLength(1);
    expect(items).toEqual([{ kind: 'instr', time: 0, opcode: 1, args: [{ kind: 'int', value: 2 }] }]);
  });
});
