import { isComparisonOp, type NumericType } from '../ir/ops.js';
import { describeSlot } from './parse.js';
import type { ArgSlot, IntrinsicKind, JumpOperands, OperandRoles, OutOperand } from './types.js';

type Remaining = Array<{ index: number; slot: ArgSlot }>;

class RoleError extends Error {}

function isIntOperandSlot(slot: ArgSlot): boolean {
  return slot.type === 'int' && slot.width === 4 && slot.role === 'value';
}

function isFloatOperandSlot(slot: ArgSlot): boolean {
  return slot.type === 'float' && slot.role === 'value';
}

function takeTrailingPadding(remaining: Remaining): { index: number; count: number } {
  let count = 0;
  let index = remaining.length;
  for (;;) {
    const last = remaining[remaining.length - 1];
    if (!last || last.slot.role !== 'padding') break;
    remaining.pop();
    count++;
    index = last.index;
  }
  return { index, count };
}

function removeFirst(remaining: Remaining, role: ArgSlot['role']): number | undefined {
  const pos = remaining.findIndex((r) => r.slot.role === role);
  if (pos < 0) return undefined;
  const [taken] = remaining.splice(pos, 1);
  return taken?.index;
}

function takeJump(remaining: Remaining): JumpOperands {
  const offsetIndex = removeFirst(remaining, 'jumpOffset');
  const timeIndex = removeFirst(remaining, 'jumpTime');
  if (offsetIndex === undefined) throw new RoleError("missing jump offset ('o')");
  if (timeIndex === undefined) return { offsetIndex };
  if (timeIndex !== offsetIndex + 1 && timeIndex + 1 !== offsetIndex) {
    throw new RoleError("offset ('o') and time ('t') args must be consecutive");
  }
  return { offsetIndex, timeIndex };
}

function takeOutput(remaining: Remaining, type: NumericType): OutOperand {
  const next = remaining.shift();
  if (!next) throw new RoleError('not enough arguments');
  if (type === 'int' && isIntOperandSlot(next.slot)) return { index: next.index, floatAsInt: false };
  if (type === 'float' && isFloatOperandSlot(next.slot)) {
    return { index: next.index, floatAsInt: false };
  }
  if (type === 'float' && isIntOperandSlot(next.slot)) return { index: next.index, floatAsInt: true };
  throw new RoleError(`output arg has unexpected encoding (${describeSlot(next.slot)})`);
}

function takeInput(remaining: Remaining, type: NumericType): number {
  const next = remaining.shift();
  if (!next) throw new RoleError('not enough arguments');
  const ok = type === 'int' ? isIntOperandSlot(next.slot) : isFloatOperandSlot(next.slot);
  if (!ok) throw new RoleError(`input arg has unexpected encoding (${describeSlot(next.slot)})`);
  return next.index;
}

/**
 * Work out which slot holds each operand of an intrinsic.
 *
 * Slots are consumed in a fixed order per intrinsic (padding, jump, destination, inputs)
 * and any slot left over is an error. Returns an error message when the signature cannot
 * realize the intrinsic.
 */
export function deriveOperandRoles(
  intrinsic: IntrinsicKind,
  slots: readonly ArgSlot[],
): OperandRoles | string {
  const remaining: Remaining = slots.map((slot, index) => ({ index, slot }));
  const roles: OperandRoles = { inputs: [], padding: { index: slots.length, count: 0 } };
  try {
    switch (intrinsic.kind) {
      case 'Jmp':
        roles.padding = takeTrailingPadding(remaining);
        roles.jump = takeJump(remaining);
        break;
      case 'InterruptLabel':
        roles.padding = takeTrailingPadding(remaining);
        roles.inputs.push(takeInput(remaining, 'int'));
        break;
      case 'AssignOp':
        roles.dest = takeOutput(remaining, intrinsic.type);
        roles.inputs.push(takeInput(remaining, intrinsic.type));
        break;
      case 'Binop': {
        const outType: NumericType = isComparisonOp(intrinsic.op) ? 'int' : intrinsic.type;
        roles.dest = takeOutput(remaining, outType);
        roles.inputs.push(takeInput(remaining, intrinsic.type));
        roles.inputs.push(takeInput(remaining, intrinsic.type));
        break;
      }
      case 'Unop':
        roles.dest = takeOutput(remaining, intrinsic.type);
        roles.inputs.push(takeInput(remaining, intrinsic.type));
        break;
      case 'CountJmp':
        roles.jump = takeJump(remaining);
        roles.dest = takeOutput(remaining, 'int');
        break;
      case 'CondJmp':
        roles.jump = takeJump(remaining);
        roles.inputs.push(takeInput(remaining, intrinsic.type));
        roles.inputs.push(takeInput(remaining, intrinsic.type));
        break;
    }
  } catch (err) {
    if (err instanceof RoleError) return err.message;
    throw err;
  }

  const leftover = remaining[0];
  if (leftover) {
    return `unexpected ${describeSlot(leftover.slot)} arg at index ${leftover.index + 1}`;
  }
  return roles;
}
