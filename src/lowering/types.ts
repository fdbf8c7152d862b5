import type { PseudoArgs } from '../codec/types.js';
import type { SourcePos } from '../diagnostics/types.js';
import type { NumericType } from '../ir/ops.js';

/**
 * An instruction operand before labels are resolved.
 *
 * Register operands carry the type they are read as; the slot they land in decides
 * whether the id is written as an int or a float.
 */
export type LowOperand =
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'reg'; reg: number; type: NumericType }
  | { kind: 'labelOffset'; label: string }
  | { kind: 'labelTime'; label: string };

export interface LowInstr {
  kind: 'instr';
  time: number;
  opcode: number;
  /** One operand per signature slot; empty when `pseudo` is set. */
  args: LowOperand[];
  difficultyMask?: number;
  arg0?: number;
  pseudo?: PseudoArgs;
  pos?: SourcePos;
}

export interface LowLabel {
  kind: 'label';
  name: string;
  time: number;
}

export type LowItem = LowInstr | LowLabel;
