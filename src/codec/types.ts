/**
 * A decoded argument value.
 *
 * `isReg` marks a register reference; `value` is then the register id.
 */
export type ArgValue =
  | { kind: 'int'; value: number; isReg?: boolean }
  | { kind: 'float'; value: number; isReg?: boolean }
  | { kind: 'string'; value: string };

/**
 * Raw argument bytes of an instruction whose arguments were not decoded.
 *
 * Bit i of `paramMask` marks dword i of the blob as a register.
 */
export interface PseudoArgs {
  paramMask: number;
  blob: Uint8Array;
  /** Argument count stored in headers that carry one. */
  argCount?: number;
}

/**
 * One instruction of a linear stream.
 *
 * Either `args` (decoded against a signature) or `pseudo` (raw bytes) is meaningful;
 * when `pseudo` is present `args` is empty.
 */
export interface Instruction {
  time: number;
  opcode: number;
  args: ArgValue[];
  /** Difficulty mask, for layouts that have one. Absent means every difficulty. */
  difficultyMask?: number;
  /** Reserved first argument of timeline headers. */
  arg0?: number;
  pseudo?: PseudoArgs;
}

/**
 * An instruction as it appears in a binary stream: header fields plus argument bytes.
 */
export interface RawInstr {
  /** Byte offset from the start of the stream. */
  offset: number;
  time: number;
  opcode: number;
  paramMask: number;
  difficultyMask?: number;
  argCount?: number;
  arg0?: number;
  blob: Uint8Array;
}
