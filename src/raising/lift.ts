import { decodeArgs } from '../codec/args.js';
import { bytesToHex } from '../codec/bytes.js';
import { decodeJumpOffset } from '../codec/instr.js';
import type { ArgValue, RawInstr } from '../codec/types.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, warnAt } from '../diagnostics/types.js';
import { isComparisonOp, type NumericType } from '../ir/ops.js';
import type { CallStmt, Expr, NameTables, Stmt, VarRef } from '../ir/types.js';
import type { SignatureTable } from '../signatures/table.js';
import type { ArgSlot, IntrinsicBinding, Signature } from '../signatures/types.js';

export interface LiftOptions {
  /** Keep every instruction as a raw call. */
  noIntrinsics?: boolean;
  /** Keep every instruction in pseudo-argument form. */
  noArguments?: boolean;
  names?: NameTables;
}

export interface LiftContext extends LiftOptions {
  table: SignatureTable;
  diagnostics: Diagnostic[];
  /** Function name; the `file` of every diagnostic. */
  file: string;
}

/** Label name for a byte offset of the stream. */
export function offsetLabel(offset: number): string {
  return `label_${offset}`;
}

interface Decoded {
  raw: RawInstr;
  signature?: Signature;
  /** Undefined when the instruction stays in pseudo form. */
  args?: ArgValue[];
}

function decode(raw: RawInstr, ctx: LiftContext): Decoded {
  const signature = ctx.table.resolve(raw.opcode);
  if (!signature || ctx.noArguments) return { raw };
  if (raw.argCount !== undefined && raw.argCount !== signature.slots.length) {
    warnAt(
      ctx.diagnostics,
      DiagnosticIds.ArgDecodeFallback,
      ctx.file,
      `At offset ${raw.offset}: header declares ${raw.argCount} args, signature "${signature.text}" has ${signature.slots.length}`,
    );
    return { raw, signature };
  }
  const result = decodeArgs(raw.blob, raw.paramMask, signature);
  if (!result.ok) {
    warnAt(ctx.diagnostics, result.id, ctx.file, `At offset ${raw.offset}: ${result.message}`);
    return { raw, signature };
  }
  // NaN payloads do not survive a literal, so such blobs stay raw.
  if (result.value.some((a) => a.kind === 'float' && !a.isReg && Number.isNaN(a.value))) {
    return { raw, signature };
  }
  return { raw, signature, args: result.value };
}

function floatLit(value: number): Expr {
  if (value === Infinity) return { kind: 'BuiltinConst', name: 'INF' };
  if (value === -Infinity) return { kind: 'Unop', op: '-', operand: { kind: 'BuiltinConst', name: 'INF' } };
  if (Object.is(value, -0)) return { kind: 'Unop', op: '-', operand: { kind: 'FloatLit', value: 0 } };
  return { kind: 'FloatLit', value };
}

function argExpr(arg: ArgValue, slot: ArgSlot | undefined, ctx: LiftContext): Expr {
  if (arg.kind === 'string') return { kind: 'StringLit', value: arg.value };
  if (arg.isReg) return { kind: 'Reg', reg: arg.value, type: arg.kind };
  if (arg.kind === 'float') return floatLit(arg.value);
  if (slot?.enumName !== undefined) {
    const member = ctx.table.enumTable(slot.enumName)?.byValue.get(arg.value);
    if (member !== undefined) return { kind: 'EnumConst', enumName: slot.enumName, member };
  }
  if (slot?.role === 'sprite' || slot?.role === 'script' || slot?.role === 'sub') {
    const name = ctx.names?.[slot.role]?.[arg.value];
    if (name !== undefined) return { kind: 'NameRef', table: slot.role, name };
  }
  if (slot?.role === 'color') return { kind: 'IntLit', value: arg.value, radix: 'hex' };
  return { kind: 'IntLit', value: arg.value };
}

interface StreamInfo {
  /** Instruction start offsets, plus the end of the stream. */
  targets: Map<number, number>;
  endOffset: number;
  endTime: number;
}

/**
 * Lifts one instruction to its intrinsic statement, or returns undefined when the
 * operands do not fit the intrinsic's shape.
 */
function liftIntrinsic(
  d: Decoded & { args: ArgValue[] },
  binding: IntrinsicBinding,
  stream: StreamInfo,
  ctx: LiftContext,
): Stmt | undefined {
  const { raw, args } = d;
  const { intrinsic, roles } = binding;
  if ((raw.arg0 ?? 0) !== 0) return undefined;
  for (let i = roles.padding.index; i < roles.padding.index + roles.padding.count; i++) {
    const pad = args[i];
    if (!pad || pad.kind === 'string' || pad.isReg || pad.value !== 0) return undefined;
  }

  let dest: VarRef | undefined;
  if (roles.dest) {
    const arg = args[roles.dest.index];
    if (!arg || arg.kind === 'string' || !arg.isReg) return undefined;
    let type: NumericType = 'int';
    if (intrinsic.kind === 'AssignOp' || intrinsic.kind === 'Unop') type = intrinsic.type;
    if (intrinsic.kind === 'Binop' && !isComparisonOp(intrinsic.op)) type = intrinsic.type;
    dest = { kind: 'Reg', reg: arg.value, type };
  }

  const inputs: Expr[] = [];
  for (const index of roles.inputs) {
    const arg = args[index];
    if (!arg) return undefined;
    inputs.push(argExpr(arg, d.signature?.slots[index], ctx));
  }

  let label: string | undefined;
  let jumpTime: number | undefined;
  if (roles.jump) {
    const offsetArg = args[roles.jump.offsetIndex];
    if (!offsetArg || offsetArg.kind !== 'int' || offsetArg.isReg) return undefined;
    const target = decodeJumpOffset(ctx.table.layout, offsetArg.value, raw.offset);
    const targetTime = stream.targets.get(target);
    if (targetTime === undefined) return undefined;
    label = offsetLabel(target);
    if (roles.jump.timeIndex !== undefined) {
      const timeArg = args[roles.jump.timeIndex];
      if (!timeArg || timeArg.kind !== 'int' || timeArg.isReg) return undefined;
      if (timeArg.value !== targetTime) jumpTime = timeArg.value;
    }
  }
  const jump = label === undefined ? undefined : { label, ...(jumpTime !== undefined ? { jumpTime } : {}) };
  const [a, b] = inputs;
  const allImmediate = inputs.every((e) => e.kind !== 'Reg');
  const time = raw.time;

  switch (intrinsic.kind) {
    case 'Jmp':
      return jump ? { kind: 'Goto', time, ...jump } : undefined;
    case 'CondJmp':
      if (!jump || !a || !b) return undefined;
      return { kind: 'CondGoto', time, cond: { kind: 'Binop', op: intrinsic.op, left: a, right: b }, ...jump };
    case 'CountJmp':
      if (!jump || !dest) return undefined;
      return { kind: 'CondGoto', time, cond: { kind: 'PreDecrement', target: dest }, ...jump };
    case 'InterruptLabel':
      if (a?.kind !== 'IntLit') return undefined;
      return { kind: 'InterruptLabel', time, id: a.value };
    case 'AssignOp':
      if (!dest || !a) return undefined;
      return { kind: 'Assign', time, target: dest, op: intrinsic.op, value: a };
    case 'Binop':
      // Constant operands would be folded when compiled again.
      if (!dest || !a || !b || allImmediate) return undefined;
      return {
        kind: 'Assign',
        time,
        target: dest,
        op: '=',
        value: { kind: 'Binop', op: intrinsic.op, left: a, right: b },
      };
    case 'Unop':
      if (!dest || !a || allImmediate) return undefined;
      return { kind: 'Assign', time, target: dest, op: '=', value: { kind: 'Unop', op: intrinsic.op, operand: a } };
  }
}

function rawCall(d: Decoded, ctx: LiftContext): CallStmt {
  const { raw } = d;
  const name = ctx.table.insName(raw.opcode);
  const callee = name !== undefined ? { name } : { opcode: raw.opcode };
  const arg0 = raw.arg0 !== undefined && raw.arg0 !== 0 ? { arg0: raw.arg0 } : {};
  if (!d.args) {
    const defaultCount = Math.ceil(raw.blob.length / 4);
    return {
      kind: 'Call',
      time: raw.time,
      callee,
      args: [],
      pseudo: {
        mask: raw.paramMask,
        blob: bytesToHex(raw.blob),
        ...(raw.argCount !== undefined && raw.argCount !== defaultCount ? { argCount: raw.argCount } : {}),
      },
      ...arg0,
    };
  }
  const slots = d.signature?.slots ?? [];
  const args = d.args.map((arg, i) => argExpr(arg, slots[i], ctx));
  // Trailing zero padding is implied.
  let keep = args.length;
  while (keep > 0) {
    const slot = slots[keep - 1];
    const arg = args[keep - 1];
    if (slot?.role !== 'padding' || arg?.kind !== 'IntLit' || arg.value !== 0) break;
    keep--;
  }
  return { kind: 'Call', time: raw.time, callee, args: args.slice(0, keep), ...arg0 };
}

function diffLabel(mask: number | undefined, table: SignatureTable): string | undefined {
  const full = table.fullDifficultyMask();
  // Header bits beyond the table's letters do not select a difficulty.
  if (mask === undefined || (mask & full) === full) return undefined;
  let letters = '';
  for (let bit = 0; bit < table.difficultyBits; bit++) {
    if ((mask >>> bit) & 1) letters += table.difficultyLetters[bit] ?? '';
  }
  return letters;
}

/**
 * Turn one stream of raw instructions into flat statements: calls, intrinsic
 * statements, `label_<offset>` labels for jump targets and time labels wherever the
 * time changes.
 */
export function liftFunction(raws: readonly RawInstr[], endOffset: number, ctx: LiftContext): Stmt[] {
  const decoded = raws.map((raw) => decode(raw, ctx));
  const last = raws[raws.length - 1];
  const stream: StreamInfo = {
    targets: new Map(raws.map((r) => [r.offset, r.time])),
    endOffset,
    endTime: last?.time ?? 0,
  };
  stream.targets.set(endOffset, stream.endTime);

  const lifted = decoded.map((d): Stmt => {
    const bound = d.args && !ctx.noIntrinsics ? d.signature?.intrinsic : undefined;
    // Only the opcode the compiler would pick for an intrinsic is lifted to it.
    const binding = bound && ctx.table.opcodeForIntrinsic(bound.intrinsic) === d.raw.opcode ? bound : undefined;
    const stmt = binding && d.args ? liftIntrinsic({ ...d, args: d.args }, binding, stream, ctx) : undefined;
    const out = stmt ?? rawCall(d, ctx);
    const guard = diffLabel(d.raw.difficultyMask, ctx.table);
    return guard !== undefined ? { ...out, diffLabel: guard } : out;
  });

  const targeted = new Set<string>();
  for (const stmt of lifted) {
    if (stmt.kind === 'Goto' || stmt.kind === 'CondGoto') targeted.add(stmt.label);
  }

  const body: Stmt[] = [];
  let time = 0;
  lifted.forEach((stmt, i) => {
    const raw = raws[i];
    if (!raw) return;
    const label = offsetLabel(raw.offset);
    if (targeted.has(label)) body.push({ kind: 'Label', time, name: label });
    if (raw.time !== time) {
      time = raw.time;
      body.push({ kind: 'TimeLabel', time });
    }
    body.push(stmt);
  });
  const endLabel = offsetLabel(endOffset);
  if (targeted.has(endLabel)) body.push({ kind: 'Label', time, name: endLabel });
  return body;
}
