import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt } from '../diagnostics/types.js';
import type { SignatureTable } from '../signatures/table.js';
import type { HeaderField, InstrLayout, IntFieldType } from '../signatures/types.js';
import { encodeInstructionArgs, type EncodedArgs } from './args.js';
import { ByteReader, ByteWriter, EndOfDataError, hexToBytes } from './bytes.js';
import type { Instruction, RawInstr } from './types.js';

function fieldWidth(type: IntFieldType): number {
  return Number.parseInt(type.slice(1), 10) / 8;
}

function fullMask(type: IntFieldType): number {
  return 2 ** (fieldWidth(type) * 8) - 1;
}

/** Size in bytes of an instruction header. */
export function headerSize(layout: InstrLayout): number {
  return layout.header.reduce((n, f) => n + fieldWidth(f.type), 0);
}

/** Size in bytes of an encoded instruction with `argBytes` bytes of arguments. */
export function instrSize(layout: InstrLayout, argBytes: number): number {
  return headerSize(layout) + argBytes;
}

function headerValue(
  field: HeaderField,
  layout: InstrLayout,
  instr: Instruction,
  args: EncodedArgs,
): number {
  switch (field.field) {
    case 'time':
      return instr.time;
    case 'opcode':
      return instr.opcode;
    case 'size':
      return layout.sizeCounts === 'instr' ? instrSize(layout, args.blob.length) : args.blob.length;
    case 'paramMask':
      return args.paramMask;
    case 'difficulty':
      return instr.difficultyMask ?? fullMask(field.type);
    case 'argCount':
      return args.argCount;
    case 'arg0':
      return instr.arg0 ?? 0;
    case 'zero':
      return 0;
  }
}

/** Write one instruction given its already-encoded arguments. */
export function writeInstr(
  out: ByteWriter,
  layout: InstrLayout,
  instr: Instruction,
  args: EncodedArgs,
): void {
  for (const field of layout.header) {
    out.writeInt(field.type, headerValue(field, layout, instr, args));
  }
  out.writeBytes(args.blob);
}

export function writeTerminal(out: ByteWriter, layout: InstrLayout): void {
  out.writeBytes(hexToBytes(layout.terminalBytes));
}

/**
 * Encode a linear instruction stream followed by the layout's terminal marker.
 *
 * An instruction whose arguments cannot be encoded is reported and skipped.
 */
export function encodeInstrStream(
  instrs: readonly Instruction[],
  table: SignatureTable,
  diagnostics: Diagnostic[],
  file: string,
): Uint8Array {
  const out = new ByteWriter();
  for (const instr of instrs) {
    const args = encodeInstructionArgs(instr, table);
    if (!args.ok) {
      diagAt(diagnostics, args.id, file, `At time ${instr.time}: ${args.message}`);
      continue;
    }
    writeInstr(out, table.layout, instr, args.value);
  }
  writeTerminal(out, table.layout);
  return out.toBytes();
}

function readOne(
  reader: ByteReader,
  layout: InstrLayout,
  streamStart: number,
): RawInstr | 'terminal' | string {
  const start = reader.offset;
  const raw: RawInstr = { offset: start - streamStart, time: 0, opcode: 0, paramMask: 0, blob: new Uint8Array(0) };
  let size: number | undefined;
  for (const field of layout.header) {
    const value = reader.readInt(field.type);
    switch (field.field) {
      case 'time':
        raw.time = value;
        break;
      case 'opcode':
        raw.opcode = value;
        break;
      case 'size':
        size = value;
        break;
      case 'paramMask':
        raw.paramMask = value;
        break;
      case 'difficulty':
        raw.difficultyMask = value;
        break;
      case 'argCount':
        raw.argCount = value;
        break;
      case 'arg0':
        raw.arg0 = value;
        break;
      case 'zero':
        break;
    }
  }
  if (raw.opcode === layout.terminalOpcode) {
    const rest = layout.terminalBytes.length / 2 - (reader.offset - start);
    if (rest > 0) reader.readBytes(rest);
    return 'terminal';
  }
  if (size === undefined) return `layout "${layout.name}" has no size field`;
  const argBytes = layout.sizeCounts === 'instr' ? size - headerSize(layout) : size;
  if (argBytes < 0) {
    return `instruction at offset ${raw.offset} declares size ${size}, smaller than its header`;
  }
  raw.blob = reader.readBytes(argBytes);
  return raw;
}

/**
 * Read instruction streams until the bytes run out.
 *
 * Each stream ends at a terminal marker; offsets in each {@link RawInstr} are relative
 * to the start of its stream. Returns `undefined` after reporting a
 * `BinaryFormatError`.
 */
export function readInstrStreams(
  bytes: Uint8Array,
  layout: InstrLayout,
  diagnostics: Diagnostic[],
  file: string,
): RawInstr[][] | undefined {
  const reader = new ByteReader(bytes);
  const streams: RawInstr[][] = [];
  let current: RawInstr[] = [];
  let streamStart = 0;
  try {
    while (reader.remaining > 0) {
      const next = readOne(reader, layout, streamStart);
      if (next === 'terminal') {
        streams.push(current);
        current = [];
        streamStart = reader.offset;
      } else if (typeof next === 'string') {
        diagAt(diagnostics, DiagnosticIds.BinaryFormatError, file, next);
        return undefined;
      } else {
        current.push(next);
      }
    }
  } catch (err) {
    if (err instanceof EndOfDataError) {
      diagAt(diagnostics, DiagnosticIds.BinaryFormatError, file, `Truncated instruction stream: ${err.message}`);
      return undefined;
    }
    throw err;
  }
  if (current.length > 0) {
    diagAt(
      diagnostics,
      DiagnosticIds.BinaryFormatError,
      file,
      `Instruction stream starting at offset ${streamStart} has no terminal marker.`,
    );
    return undefined;
  }
  return streams;
}

/** Stored value of a jump from the instruction at `from` to the offset `to`. */
export function encodeJumpOffset(layout: InstrLayout, to: number, from: number): number {
  switch (layout.labelEncoding) {
    case 'absolute':
      return to;
    case 'relative':
      return to - from;
    case 'index':
      return Math.floor(to / (layout.instrStride ?? 1));
  }
}

/** Byte offset a stored jump value of the instruction at `from` points to. */
export function decodeJumpOffset(layout: InstrLayout, value: number, from: number): number {
  switch (layout.labelEncoding) {
    case 'absolute':
      return value;
    case 'relative':
      return from + value;
    case 'index':
      return value * (layout.instrStride ?? 1);
  }
}
