import { DiagnosticIds, type DiagnosticId } from '../diagnostics/types.js';
import { describeSlot } from '../signatures/parse.js';
import type { SignatureTable } from '../signatures/table.js';
import type { ArgSlot, Signature } from '../signatures/types.js';
import { ByteReader, ByteWriter, EndOfDataError } from './bytes.js';
import type { ArgValue, Instruction, PseudoArgs } from './types.js';

export type CodecResult<T> =
  | { ok: true; value: T }
  | { ok: false; id: DiagnosticId; message: string };

function fail<T>(id: DiagnosticId, message: string): CodecResult<T> {
  return { ok: false, id, message };
}

export interface EncodedArgs {
  blob: Uint8Array;
  paramMask: number;
  argCount: number;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: false });

function intFieldFor(slot: ArgSlot): 'i8' | 'i16' | 'i32' | 'u32' {
  if (slot.role === 'color') return 'u32';
  if (slot.width === 1) return 'i8';
  if (slot.width === 2) return 'i16';
  return 'i32';
}

/** Whether `value` fits the slot as either its signed or its unsigned reading. */
function fitsSlot(slot: ArgSlot, value: number): boolean {
  const bits = slot.width * 8;
  return Number.isInteger(value) && value >= -(2 ** (bits - 1)) && value < 2 ** bits;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

function describeValue(arg: ArgValue): string {
  if (arg.kind === 'string') return 'a string';
  const what = arg.kind === 'int' ? 'an int' : 'a float';
  return arg.isReg ? `${what} register` : `${what} value`;
}

function encodeString(slot: ArgSlot, value: string, out: ByteWriter): string | undefined {
  const bytes = textEncoder.encode(value);
  if (slot.stringLen !== undefined) {
    if (bytes.length > slot.stringLen) {
      return `string of ${bytes.length} bytes does not fit in ${slot.stringLen} bytes`;
    }
    out.writeBytes(bytes);
    out.writeBytes(new Uint8Array(slot.stringLen - bytes.length));
    return undefined;
  }
  const block = slot.stringBlockSize ?? 4;
  const padded = Math.ceil((bytes.length + 1) / block) * block;
  out.writeBytes(bytes);
  out.writeBytes(new Uint8Array(padded - bytes.length));
  return undefined;
}

/**
 * Encode argument values against a signature.
 *
 * Walks the slots in order; each slot's type decides how its value is written, so
 * argument order and width come from the signature alone.
 */
export function encodeArgs(
  args: readonly ArgValue[],
  signature: Signature,
  table: SignatureTable,
): CodecResult<EncodedArgs> {
  const slots = signature.slots;
  if (args.length !== slots.length) {
    return fail(
      DiagnosticIds.ArgCountMismatch,
      `opcode ${signature.opcode} ("${signature.text}") expects ${slots.length} args, got ${args.length}`,
    );
  }

  const out = new ByteWriter();
  let paramMask = 0;
  for (let i = 0; i < slots.length; i++) {
    const slot = slots[i];
    const arg = args[i];
    if (!slot || !arg) continue;
    const mismatch = (): CodecResult<EncodedArgs> =>
      fail(
        DiagnosticIds.TypeMismatch,
        `arg ${i + 1} of opcode ${signature.opcode} expects ${slot.type}, got ${describeValue(arg)}`,
      );

    if (arg.kind !== 'string' && arg.isReg) {
      if (!table.hasRegisters) {
        return fail(
          DiagnosticIds.RegisterUnsupportedInFormat,
          `arg ${i + 1} of opcode ${signature.opcode} is a register, but format "${table.layout.name}" has no registers`,
        );
      }
      if (slot.width !== 4) return mismatch();
      if (i >= 32) {
        return fail(DiagnosticIds.TypeMismatch, `register arg ${i + 1} is beyond the parameter mask`);
      }
      paramMask |= 1 << i;
    }

    switch (slot.type) {
      case 'int':
        if (arg.kind !== 'int') return mismatch();
        if (!fitsSlot(slot, arg.value)) {
          return fail(
            DiagnosticIds.TypeMismatch,
            `arg ${i + 1} of opcode ${signature.opcode} (${describeSlot(slot)}) cannot hold ${arg.value}`,
          );
        }
        out.writeInt(intFieldFor(slot), arg.value);
        break;
      case 'float':
        if (arg.kind !== 'float') return mismatch();
        out.writeF32(arg.value);
        break;
      case 'string': {
        if (arg.kind !== 'string') return mismatch();
        const err = encodeString(slot, arg.value, out);
        if (err) return fail(DiagnosticIds.TypeMismatch, `arg ${i + 1}: ${err}`);
        break;
      }
    }
  }
  return { ok: true, value: { blob: out.toBytes(), paramMask: paramMask >>> 0, argCount: args.length } };
}

function readString(slot: ArgSlot, reader: ByteReader): string {
  if (slot.stringLen !== undefined) {
    const bytes = reader.readBytes(slot.stringLen);
    const nul = bytes.indexOf(0);
    return textDecoder.decode(nul < 0 ? bytes : bytes.subarray(0, nul));
  }
  const block = slot.stringBlockSize ?? 4;
  const collected: number[] = [];
  for (;;) {
    const chunk = reader.readBytes(block);
    const nul = chunk.indexOf(0);
    if (nul >= 0) {
      collected.push(...chunk.subarray(0, nul));
      return textDecoder.decode(Uint8Array.from(collected));
    }
    collected.push(...chunk);
  }
}

/**
 * Decode argument bytes against a signature.
 *
 * Fails (so the caller can keep the pseudo form) when the bytes do not fit the
 * signature exactly: wrong length, a register bit on a slot that cannot hold one, or a
 * float register id that is not integral.
 */
export function decodeArgs(
  blob: Uint8Array,
  paramMask: number,
  signature: Signature,
): CodecResult<ArgValue[]> {
  const reader = new ByteReader(blob);
  const out: ArgValue[] = [];
  const slots = signature.slots;
  if (slots.length < 32 && paramMask >>> slots.length !== 0) {
    return fail(DiagnosticIds.ArgDecodeFallback, `parameter mask 0x${paramMask.toString(16)} has bits beyond the ${slots.length} args`);
  }
  try {
    for (let i = 0; i < slots.length; i++) {
      const slot = slots[i];
      if (!slot) continue;
      const isReg = i < 32 && ((paramMask >>> i) & 1) === 1;
      if (isReg && (slot.width !== 4 || slot.type === 'string')) {
        return fail(DiagnosticIds.ArgDecodeFallback, `arg ${i + 1} is marked as a register but is not a dword`);
      }
      switch (slot.type) {
        case 'int': {
          const value = reader.readInt(intFieldFor(slot));
          out.push(isReg ? { kind: 'int', value, isReg: true } : { kind: 'int', value });
          break;
        }
        case 'float': {
          const value = reader.readF32();
          if (isReg) {
            if (!Number.isInteger(value)) {
              return fail(DiagnosticIds.ArgDecodeFallback, `arg ${i + 1} is a float register with non-integral id ${value}`);
            }
            out.push({ kind: 'float', value, isReg: true });
          } else {
            out.push({ kind: 'float', value });
          }
          break;
        }
        case 'string': {
          const start = reader.offset;
          const value = readString(slot, reader);
          // Bytes after the NUL and invalid UTF-8 would not survive a re-encode.
          const again = new ByteWriter();
          const err = encodeString(slot, value, again);
          if (err !== undefined || !sameBytes(again.toBytes(), blob.subarray(start, reader.offset))) {
            return fail(DiagnosticIds.ArgDecodeFallback, `arg ${i + 1} is not a NUL-padded UTF-8 string`);
          }
          out.push({ kind: 'string', value });
          break;
        }
      }
    }
  } catch (err) {
    if (err instanceof EndOfDataError) {
      return fail(
        DiagnosticIds.ArgDecodeFallback,
        `${blob.length} arg bytes are too few for signature "${signature.text}"`,
      );
    }
    throw err;
  }
  if (reader.remaining !== 0) {
    return fail(
      DiagnosticIds.ArgDecodeFallback,
      `${reader.remaining} bytes left over after signature "${signature.text}"`,
    );
  }
  return { ok: true, value: out };
}

/**
 * Encode an instruction's arguments: its pseudo payload verbatim, or its args through
 * the signature of its opcode.
 */
export function encodeInstructionArgs(
  instr: Instruction,
  table: SignatureTable,
): CodecResult<EncodedArgs> {
  if (instr.pseudo) {
    if (instr.pseudo.paramMask !== 0 && !table.hasRegisters) {
      return fail(
        DiagnosticIds.RegisterUnsupportedInFormat,
        `opcode ${instr.opcode} has a parameter mask, but format "${table.layout.name}" has no registers`,
      );
    }
    return {
      ok: true,
      value: {
        blob: instr.pseudo.blob,
        paramMask: instr.pseudo.paramMask,
        argCount: instr.pseudo.argCount ?? Math.ceil(instr.pseudo.blob.length / 4),
      },
    };
  }
  const signature = table.resolve(instr.opcode);
  if (!signature) {
    return fail(DiagnosticIds.UnknownOpcode, `opcode ${instr.opcode} has no signature`);
  }
  return encodeArgs(instr.args, signature, table);
}

/** Pseudo form of raw argument bytes. */
export function pseudoArgs(blob: Uint8Array, paramMask: number, argCount?: number): PseudoArgs {
  return argCount === undefined ? { paramMask, blob } : { paramMask, blob, argCount };
}
