import { describe, expect, it } from 'vitest';

import { ByteWriter, bytesToHex } from '../src/codec/bytes.js';
import {
  decodeJumpOffset,
  encodeInstrStream,
  encodeJumpOffset,
  headerSize,
  readInstrStreams,
} from '../src/codec/instr.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { concat, ECL_LAYOUT, eclTable, STD_LAYOUT, tableFor } from './helpers/tables.js';

const ECL_TERMINAL = '00000000ffff10000000000000000000';

describe('instruction streams', () => {
  const table = eclTable();

  it('encodes the header fields of the layout, then the terminal', () => {
    const diagnostics: Diagnostic[] = [];
    const bytes = encodeInstrStream([{ time: 10, opcode: 1, args: [{ kind: 'int', value: 3 }] }], table, diagnostics, 'main');
    expect(diagnostics).toEqual([]);
    expect(bytesToHex(bytes)).toBe(`0a000000010014000000ff010000000003000000${ECL_TERMINAL}`);
  });

  it('writes an explicit difficulty mask', () => {
    const bytes = encodeInstrStream(
      [{ time: 0, opcode: 0, args: [], difficultyMask: 3 }],
      table,
      [],
      'main',
    );
    expect(bytesToHex(bytes.subarray(0, 16))).toBe('00000000000010000000030000000000');
  });

  it('counts only argument bytes in std sizes', () => {
    const std = tableFor(STD_LAYOUT, [{ signatures: { '2': 'S__' } }]);
    const bytes = encodeInstrStream(
      [
        {
          time: 0,
          opcode: 2,
          args: [
            { kind: 'int', value: 1 },
            { kind: 'int', value: 0 },
            { kind: 'int', value: 0 },
          ],
        },
      ],
      std,
      [],
      'main',
    );
    expect(bytesToHex(bytes)).toBe(`0000000002000c00010000000000000000000000${'ff'.repeat(20)}`);
  });

  it('reports and skips instructions that cannot be encoded', () => {
    const diagnostics: Diagnostic[] = [];
    const bytes = encodeInstrStream([{ time: 4, opcode: 999, args: [] }], table, diagnostics, 'main');
    expect(bytesToHex(bytes)).toBe(ECL_TERMINAL);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnknownOpcode,
        severity: 'error',
        message: 'At time 4: opcode 999 has no signature',
        file: 'main',
      },
    ]);
  });

  it('reads streams back with offsets relative to each stream', () => {
    const first = encodeInstrStream(
      [
        { time: 10, opcode: 1, args: [{ kind: 'int', value: 3 }] },
        { time: 12, opcode: 0, args: [] },
      ],
      table,
      [],
      'a',
    );
    const second = encodeInstrStream([{ time: 0, opcode: 0, args: [], difficultyMask: 1 }], table, [], 'b');
    const diagnostics: Diagnostic[] = [];
    const streams = readInstrStreams(concat(first, second), ECL_LAYOUT, diagnostics, 'image');
    expect(diagnostics).toEqual([]);
    expect(streams).toEqual([
      [
        {
          offset: 0,
          time: 10,
          opcode: 1,
          paramMask: 0,
          difficultyMask: 255,
          argCount: 1,
          blob: new Uint8Array([3, 0, 0, 0]),
        },
        {
          offset: 20,
          time: 12,
          opcode: 0,
          paramMask: 0,
          difficultyMask: 255,
          argCount: 0,
          blob: new Uint8Array(0),
        },
      ],
      [
        {
          offset: 0,
          time: 0,
          opcode: 0,
          paramMask: 0,
          difficultyMask: 1,
          argCount: 0,
          blob: new Uint8Array(0),
        },
      ],
    ]);
  });

  it('reads an empty stream', () => {
    const bytes = encodeInstrStream([], table, [], 'main');
    expect(readInstrStreams(bytes, ECL_LAYOUT, [], 'image')).toEqual([[]]);
  });

  it('reports truncated data', () => {
    const bytes = encodeInstrStream([{ time: 10, opcode: 1, args: [{ kind: 'int', value: 3 }] }], table, [], 'main');
    const diagnostics: Diagnostic[] = [];
    expect(readInstrStreams(bytes.subarray(0, 18), ECL_LAYOUT, diagnostics, 'image')).toBeUndefined();
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.BinaryFormatError,
        severity: 'error',
        message: 'Truncated instruction stream: unexpected end of data at offset 16 (wanted 4 bytes)',
        file: 'image',
      },
    ]);
  });

  it('reports a stream without a terminal marker', () => {
    const bytes = encodeInstrStream([{ time: 10, opcode: 1, args: [{ kind: 'int', value: 3 }] }], table, [], 'main');
    const diagnostics: Diagnostic[] = [];
    expect(readInstrStreams(bytes.subarray(0, 20), ECL_LAYOUT, diagnostics, 'image')).toBeUndefined();
    expect(diagnostics.map((d) => d.message)).toEqual([
      'Instruction stream starting at offset 0 has no terminal marker.',
    ]);
  });

  it('reports a size smaller than the header', () => {
    const out = new ByteWriter();
    out.writeInt('i32', 0);
    out.writeInt('u16', 1);
    out.writeInt('u16', 8);
    out.writeInt('u16', 0);
    out.writeInt('u8', 255);
    out.writeInt('u8', 0);
    out.writeInt('u32', 0);
    const diagnostics: Diagnostic[] = [];
    expect(readInstrStreams(out.toBytes(), ECL_LAYOUT, diagnostics, 'image')).toBeUndefined();
    expect(diagnostics.map((d) => d.message)).toEqual([
      'instruction at offset 0 declares size 8, smaller than its header',
    ]);
  });

  it('sizes headers from the layout', () => {
    expect(headerSize(ECL_LAYOUT)).toBe(16);
    expect(headerSize(STD_LAYOUT)).toBe(8);
  });
});

describe('jump offsets', () => {
  it('stores relative offsets from the jumping instruction', () => {
    expect(encodeJumpOffset(ECL_LAYOUT, 16, 36)).toBe(-20);
    expect(decodeJumpOffset(ECL_LAYOUT, -20, 36)).toBe(16);
  });

  it('stores instruction indices for fixed-stride layouts', () => {
    expect(encodeJumpOffset(STD_LAYOUT, 40, 20)).toBe(2);
    expect(decodeJumpOffset(STD_LAYOUT, 2, 20)).toBe(40);
  });

  it('stores absolute offsets', () => {
    const layout = { ...ECL_LAYOUT, labelEncoding: 'absolute' as const };
    expect(encodeJumpOffset(layout, 16, 36)).toBe(16);
    expect(decodeJumpOffset(layout, 16, 36)).toBe(16);
  });
});
