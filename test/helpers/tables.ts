import { ByteWriter } from '../../src/codec/bytes.js';
import type { Diagnostic } from '../../src/diagnostics/types.js';
import { buildSignatureTable, type SignatureTable } from '../../src/signatures/table.js';
import type { InstrLayout, SignatureSource } from '../../src/signatures/types.js';

export const ECL_LAYOUT: InstrLayout = {
  name: 'ecl-v2',
  header: [
    { field: 'time', type: 'i32' },
    { field: 'opcode', type: 'u16' },
    { field: 'size', type: 'u16' },
    { field: 'paramMask', type: 'u16' },
    { field: 'difficulty', type: 'u8' },
    { field: 'argCount', type: 'u8' },
    { field: 'zero', type: 'u32' },
  ],
  sizeCounts: 'instr',
  terminalOpcode: 0xffff,
  terminalBytes: '00000000ffff10000000000000000000',
  labelEncoding: 'relative',
};

export const STD_LAYOUT: InstrLayout = {
  name: 'std-06',
  header: [
    { field: 'time', type: 'i32' },
    { field: 'opcode', type: 'u16' },
    { field: 'size', type: 'u16' },
  ],
  sizeCounts: 'args',
  terminalOpcode: 0xffff,
  terminalBytes: 'ffffffffffffffffffffffffffffffffffffffff',
  labelEncoding: 'index',
  instrStride: 20,
};

/**
 * A small register-based instruction set: jumps, int/float arithmetic and compares,
 * a handful of plain calls, four int and two float scratch registers.
 */
export const TEST_ECL_SOURCE: SignatureSource = {
  name: 'test-ecl',
  signatures: {
    '0': '',
    '1': 'S',
    '2': 'ot',
    '3': 'Sot',
    '10': 'SS',
    '11': 'ff',
    '12': 'SS',
    '20': 'SSS',
    '21': 'SSS',
    '22': 'SSS',
    '23': 'fff',
    '24': 'fff',
    '30': 'SSot',
    '31': 'SSot',
    '32': 'SSot',
    '33': 'SSot',
    '34': 'SSot',
    '35': 'SSot',
    '36': 'ffot',
    '37': 'ffot',
    '40': 'S__',
    '50': 'S(enum="Blend")f',
    '51': 'z',
    '52': 'E',
    '53': 'C',
    '54': 'S_',
  },
  intrinsics: {
    '2': 'Jmp()',
    '3': 'CountJmp()',
    '10': 'AssignOp(op="=";type="int")',
    '11': 'AssignOp(op="=";type="float")',
    '12': 'AssignOp(op="+=";type="int")',
    '20': 'Binop(op="+";type="int")',
    '21': 'Binop(op="-";type="int")',
    '22': 'Binop(op="*";type="int")',
    '23': 'Binop(op="+";type="float")',
    '24': 'Binop(op="*";type="float")',
    '30': 'CondJmp(op="==";type="int")',
    '31': 'CondJmp(op="!=";type="int")',
    '32': 'CondJmp(op="<";type="int")',
    '33': 'CondJmp(op="<=";type="int")',
    '34': 'CondJmp(op=">";type="int")',
    '35': 'CondJmp(op=">=";type="int")',
    '36': 'CondJmp(op="<";type="float")',
    '37': 'CondJmp(op=">=";type="float")',
    '40': 'InterruptLabel()',
  },
  insNames: { '1': 'wait', '50': 'setBlend' },
  registers: {
    '10000': { name: 'I0', type: 'int', scratch: true },
    '10001': { name: 'I1', type: 'int', scratch: true },
    '10002': { name: 'I2', type: 'int', scratch: true },
    '10003': { name: 'I3', type: 'int', scratch: true },
    '10004': { name: 'F0', type: 'float', scratch: true },
    '10005': { name: 'F1', type: 'float', scratch: true },
  },
  enums: { Blend: { Normal: 0, Add: 1 } },
};

/** Build a table from in-memory sources, failing the test on any diagnostic. */
export function tableFor(layout: InstrLayout, sources: readonly SignatureSource[]): SignatureTable {
  const diagnostics: Diagnostic[] = [];
  const table = buildSignatureTable(layout, sources, diagnostics);
  if (diagnostics.length > 0) {
    throw new Error(`unexpected diagnostics: ${diagnostics.map((d) => d.message).join('; ')}`);
  }
  return table;
}

export function eclTable(...extra: SignatureSource[]): SignatureTable {
  return tableFor(ECL_LAYOUT, [TEST_ECL_SOURCE, ...extra]);
}

/** Little-endian i32 words. */
export function dwords(...values: number[]): Uint8Array {
  const out = new ByteWriter();
  for (const v of values) out.writeInt('i32', v);
  return out.toBytes();
}

export function f32(value: number): Uint8Array {
  const out = new ByteWriter();
  out.writeF32(value);
  return out.toBytes();
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new ByteWriter();
  for (const p of parts) out.writeBytes(p);
  return out.toBytes();
}
