import { encodeInstructionArgs } from '../codec/args.js';
import { encodeJumpOffset, instrSize } from '../codec/instr.js';
import type { ArgValue, Instruction } from '../codec/types.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt } from '../diagnostics/types.js';
import type { SignatureTable } from '../signatures/table.js';
import type { ArgSlot } from '../signatures/types.js';
import type { LowInstr, LowItem, LowOperand } from './types.js';

export interface ResolvedLabel {
  offset: number;
  time: number;
}

export interface ResolvedFunction {
  instructions: Instruction[];
  labels: Map<string, ResolvedLabel>;
  /** Byte offset of each instruction from the start of the stream. */
  offsets: number[];
}

type LabelLookup = (label: string) => ResolvedLabel | undefined;

function toArgValue(
  op: LowOperand,
  slot: ArgSlot | undefined,
  lookup: LabelLookup,
  encodeOffset: (to: number) => number,
): ArgValue {
  switch (op.kind) {
    case 'int':
    case 'float':
    case 'string':
      return op;
    case 'reg':
      return { kind: slot?.type === 'float' ? 'float' : 'int', value: op.reg, isReg: true };
    case 'labelOffset':
      return { kind: 'int', value: encodeOffset(lookup(op.label)?.offset ?? 0) };
    case 'labelTime':
      return { kind: 'int', value: lookup(op.label)?.time ?? 0 };
  }
}

function buildInstruction(instr: LowInstr, args: ArgValue[]): Instruction {
  return {
    time: instr.time,
    opcode: instr.opcode,
    args,
    ...(instr.difficultyMask !== undefined ? { difficultyMask: instr.difficultyMask } : {}),
    ...(instr.arg0 !== undefined ? { arg0: instr.arg0 } : {}),
    ...(instr.pseudo ? { pseudo: instr.pseudo } : {}),
  };
}

function labelRefs(instr: LowInstr): string[] {
  return instr.args.flatMap((a) => (a.kind === 'labelOffset' || a.kind === 'labelTime' ? [a.label] : []));
}

/**
 * Assign offsets to labels and replace label operands by their values.
 *
 * Instruction sizes do not depend on label values, so one sizing pass places every
 * label. A label's time is the time of the first instruction at or after it, or its own
 * time when nothing follows. Instructions whose arguments cannot be encoded are
 * reported and dropped.
 */
export function resolveLabels(
  items: readonly LowItem[],
  table: SignatureTable,
  diagnostics: Diagnostic[],
  file: string,
): ResolvedFunction {
  const { layout } = table;
  const labels = new Map<string, ResolvedLabel>();
  const pending: string[] = [];
  const kept: Array<{ instr: LowInstr; offset: number }> = [];
  let offset = 0;

  for (const item of items) {
    if (item.kind === 'label') {
      if (labels.has(item.name)) {
        diagAt(
          diagnostics,
          DiagnosticIds.DuplicateLabel,
          file,
          `Label "${item.name}" is defined more than once.`,
        );
      } else {
        labels.set(item.name, { offset, time: item.time });
        pending.push(item.name);
      }
      continue;
    }
    // Label operands are dwords whatever their value, so zero stands in while sizing.
    const slots = table.resolve(item.opcode)?.slots;
    const placeholderArgs = item.args.map((op, i) =>
      toArgValue(op, slots?.[i], () => undefined, () => 0),
    );
    const sized = encodeInstructionArgs(buildInstruction(item, placeholderArgs), table);
    if (!sized.ok) {
      diagAt(diagnostics, sized.id, file, sized.message, item.pos);
      continue;
    }
    for (const name of pending.splice(0)) {
      const label = labels.get(name);
      if (label) label.time = item.time;
    }
    kept.push({ instr: item, offset });
    offset += instrSize(layout, sized.value.blob.length);
  }

  for (const { instr } of kept) {
    for (const name of labelRefs(instr)) {
      if (!labels.has(name)) {
        diagAt(diagnostics, DiagnosticIds.UndefinedLabel, file, `Label "${name}" is not defined.`, instr.pos);
      }
    }
  }

  const instructions = kept.map(({ instr, offset: from }) => {
    const slots = table.resolve(instr.opcode)?.slots;
    return buildInstruction(
      instr,
      instr.args.map((op, i) =>
        toArgValue(op, slots?.[i], (name) => labels.get(name), (to) => encodeJumpOffset(layout, to, from)),
      ),
    );
  });
  return { instructions, labels, offsets: kept.map((k) => k.offset) };
}
