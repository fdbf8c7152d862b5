import type { ArithOp, AssignOpKind, ComparisonOp, NumericType, UnopKind } from '../ir/ops.js';

/** What a slot means to the lowering and raising passes. */
export type SlotRole =
  | 'value'
  | 'color'
  | 'padding'
  | 'jumpOffset'
  | 'jumpTime'
  | 'sprite'
  | 'script'
  | 'sub'
  | 'string';

/** Name tables consulted when lifting sprite/script/sub numbers. */
export type NameTableKind = 'sprite' | 'script' | 'sub';

/**
 * One argument slot of a signature.
 *
 * `width` is in bytes; strings report 0 because their size depends on the value.
 */
export interface ArgSlot {
  /** Signature letter the slot was parsed from. */
  letter: string;
  type: 'int' | 'float' | 'string';
  width: 0 | 1 | 2 | 4;
  role: SlotRole;
  enumName?: string;
  /** Fixed byte length for string slots. */
  stringLen?: number;
  /** Block size strings are padded to when `stringLen` is absent. */
  stringBlockSize?: number;
}

/**
 * Declarative description of an opcode's argument layout and optional intrinsic binding.
 */
export interface Signature {
  opcode: number;
  /** Signature text as written in the source (`"SSf"`). */
  text: string;
  slots: readonly ArgSlot[];
  intrinsic?: IntrinsicBinding;
}

/**
 * A logical operation an opcode may implement.
 */
export type IntrinsicKind =
  | { kind: 'Jmp' }
  | { kind: 'InterruptLabel' }
  | { kind: 'CountJmp' }
  | { kind: 'AssignOp'; op: AssignOpKind; type: NumericType }
  | { kind: 'Binop'; op: ArithOp | ComparisonOp; type: NumericType }
  | { kind: 'Unop'; op: UnopKind; type: NumericType }
  | { kind: 'CondJmp'; op: ComparisonOp; type: NumericType };

/**
 * Where the jump operands of an intrinsic live.
 *
 * `timeIndex` is absent when the instruction has no time argument; the jump then
 * always takes the destination's time.
 */
export interface JumpOperands {
  offsetIndex: number;
  timeIndex?: number;
}

/** Output operand slot. `floatAsInt` marks a float register stored in an int slot. */
export interface OutOperand {
  index: number;
  floatAsInt: boolean;
}

/**
 * Mapping from the logical operand roles of an intrinsic to physical slot indices.
 */
export interface OperandRoles {
  dest?: OutOperand;
  /** Input operands in logical order (`a`, `b`). */
  inputs: number[];
  jump?: JumpOperands;
  /** Trailing padding slots that must be zero for the intrinsic to be lifted. */
  padding: { index: number; count: number };
}

export interface IntrinsicBinding {
  intrinsic: IntrinsicKind;
  /** Canonical text of the intrinsic, also its lookup key. */
  key: string;
  roles: OperandRoles;
}

/** Header field of a binary instruction layout. */
export type HeaderFieldName =
  | 'time'
  | 'opcode'
  | 'size'
  | 'paramMask'
  | 'difficulty'
  | 'argCount'
  | 'arg0'
  | 'zero';

export type IntFieldType = 'i8' | 'u8' | 'i16' | 'u16' | 'i32' | 'u32';

export interface HeaderField {
  field: HeaderFieldName;
  type: IntFieldType;
}

/**
 * Binary layout of one instruction of a format.
 */
export interface InstrLayout {
  name: string;
  header: readonly HeaderField[];
  /** Whether the `size` field counts the whole instruction or only the argument bytes. */
  sizeCounts: 'instr' | 'args';
  /** Opcode value that marks the end of an instruction stream. */
  terminalOpcode: number;
  /** Hex bytes written as the end marker. */
  terminalBytes: string;
  /** How jump offsets are stored. `index` divides by `instrStride`. */
  labelEncoding: 'absolute' | 'relative' | 'index';
  instrStride?: number;
}

export interface RegisterInfo {
  id: number;
  name?: string;
  type?: NumericType;
  scratch: boolean;
}

/**
 * One declarative signature source, as read from JSON.
 */
export interface SignatureSource {
  name?: string;
  signatures?: Record<string, string | null>;
  intrinsics?: Record<string, string>;
  insNames?: Record<string, string>;
  registers?: Record<string, { name?: string; type?: NumericType; scratch?: boolean }>;
  enums?: Record<string, Record<string, number>>;
  difficultyFlags?: string[];
}
