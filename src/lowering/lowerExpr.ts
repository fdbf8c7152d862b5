import { hexToBytes } from '../codec/bytes.js';
import { pseudoArgs } from '../codec/args.js';
import { DiagnosticIds, type SourcePos } from '../diagnostics/types.js';
import {
  assignOpBinop,
  isComparisonOp,
  negateComparison,
  type ArithOp,
  type AssignOpKind,
  type ComparisonOp,
  type NumericType,
  type ScalarType,
  type UnopKind,
} from '../ir/ops.js';
import type { CallStmt, Callee, Expr, VarRef } from '../ir/types.js';
import { visitExpr } from '../ir/walk.js';
import { intrinsicKey } from '../signatures/parse.js';
import type { SignatureTable } from '../signatures/table.js';
import type { ArgSlot, IntrinsicKind } from '../signatures/types.js';
import { LoweringError } from './errors.js';
import { foldExpr, type FoldContext } from './fold.js';
import { regSpelling, type RegisterScope } from './registers.js';
import type { LowInstr, LowItem, LowOperand } from './types.js';

/** Mutable state shared by the statement and expression lowerers of one function. */
export interface LowerState {
  table: SignatureTable;
  scope: RegisterScope;
  fold: FoldContext;
  out: LowItem[];
  /** Difficulty mask of emitted instructions; the table's full mask means "all". */
  mask: number;
  pos?: SourcePos;
  gensym(prefix: string): string;
}

/** A register written by an instruction, with the type it holds. */
export interface Place {
  reg: number;
  type: NumericType;
}

interface Simple {
  op: LowOperand;
  type: ScalarType;
}

/** An expression that must first be evaluated into a temporary of `tmpType`. */
interface NeedsTemp {
  tmpExpr: Expr;
  tmpType: NumericType;
  /** Type the temporary is read back as; differs from `tmpType` for casts. */
  readType: NumericType;
}

type Classified = { simple: Simple } | { temp: NeedsTemp };

interface JumpTarget {
  label: string;
  time?: number;
}

const regExpr = (reg: number, type: NumericType): Expr => ({ kind: 'Reg', reg, type });

function zeroOperand(slot: ArgSlot): LowOperand {
  if (slot.type === 'string') return { kind: 'string', value: '' };
  if (slot.type === 'float') return { kind: 'float', value: 0 };
  return { kind: 'int', value: 0 };
}

function zeroOf(type: ScalarType): Expr {
  return type === 'float' ? { kind: 'FloatLit', value: 0 } : { kind: 'IntLit', value: 0 };
}

function mismatch(message: string): LoweringError {
  return new LoweringError(DiagnosticIds.TypeMismatch, message);
}

function unsupported(message: string): LoweringError {
  return new LoweringError(DiagnosticIds.UnsupportedExpression, message);
}

/**
 * Lowers expressions to instructions without an evaluation stack.
 *
 * Compound expressions are split into instructions that each apply one intrinsic to
 * simple operands; intermediate values go to the destination register when that is
 * safe, and to scratch registers otherwise.
 */
export class ExprLowerer {
  constructor(private readonly state: LowerState) {}

  fold(expr: Expr): Expr {
    return foldExpr(expr, this.state.fold);
  }

  /**
   * Fold a jump condition. A comparison keeps its shape even when both sides are
   * constant, so the jump it lowers to stays a compare-and-jump.
   */
  foldCond(expr: Expr): Expr {
    if (expr.kind === 'Binop' && isComparisonOp(expr.op)) {
      return { ...expr, left: this.fold(expr.left), right: this.fold(expr.right) };
    }
    if (expr.kind === 'Binop' && (expr.op === '&&' || expr.op === '||')) {
      return { ...expr, left: this.foldCond(expr.left), right: this.foldCond(expr.right) };
    }
    if (expr.kind === 'Unop' && expr.op === '!') {
      return { ...expr, operand: this.foldCond(expr.operand) };
    }
    return this.fold(expr);
  }

  // ------------------
  // Typing and classification.

  private binding(name: string): { reg: number; type: NumericType } {
    const binding = this.state.scope.lookup(name);
    if (!binding) throw new LoweringError(DiagnosticIds.UnknownName, `unknown variable "${name}"`);
    return binding;
  }

  private checkRegisters(): void {
    if (!this.state.table.hasRegisters) {
      throw new LoweringError(
        DiagnosticIds.RegisterUnsupportedInFormat,
        `format "${this.state.table.layout.name}" has no registers`,
      );
    }
  }

  /** The register a variable reference names, with the type it is accessed as. */
  resolvePlace(ref: VarRef): Place {
    this.checkRegisters();
    if (ref.kind === 'Reg') return { reg: ref.reg, type: ref.type };
    const binding = this.binding(ref.name);
    return { reg: binding.reg, type: ref.type ?? binding.type };
  }

  exprType(expr: Expr): ScalarType {
    switch (expr.kind) {
      case 'IntLit':
      case 'EnumConst':
      case 'NameRef':
      case 'LabelProp':
      case 'PreDecrement':
        return 'int';
      case 'FloatLit':
      case 'BuiltinConst':
        return 'float';
      case 'StringLit':
        return 'string';
      case 'Reg':
        return expr.type;
      case 'Var':
        return expr.type ?? this.binding(expr.name).type;
      case 'Binop':
        if (isComparisonOp(expr.op) || expr.op === '&&' || expr.op === '||') return 'int';
        return this.exprType(expr.left);
      case 'Unop':
        if (expr.op === '!') return 'int';
        if (expr.op === 'sin' || expr.op === 'cos' || expr.op === 'sqrt') return 'float';
        return this.exprType(expr.operand);
      case 'Cast':
        return expr.type;
      case 'DiffSwitch': {
        const first = expr.cases[0];
        if (!first) throw unsupported('first case of a difficulty switch is empty');
        return this.exprType(first);
      }
    }
  }

  private numericType(expr: Expr): NumericType {
    const type = this.exprType(expr);
    if (type === 'string') throw mismatch('a string cannot be used in arithmetic');
    return type;
  }

  private classify(expr: Expr): Classified {
    switch (expr.kind) {
      case 'IntLit':
        return { simple: { op: { kind: 'int', value: expr.value }, type: 'int' } };
      case 'FloatLit':
        return { simple: { op: { kind: 'float', value: expr.value }, type: 'float' } };
      case 'StringLit':
        return { simple: { op: { kind: 'string', value: expr.value }, type: 'string' } };
      case 'Reg':
      case 'Var': {
        const place = this.resolvePlace(expr);
        return { simple: { op: { kind: 'reg', reg: place.reg, type: place.type }, type: place.type } };
      }
      case 'LabelProp':
        return {
          simple: {
            op:
              expr.prop === 'offsetof'
                ? { kind: 'labelOffset', label: expr.label }
                : { kind: 'labelTime', label: expr.label },
            type: 'int',
          },
        };
      case 'Cast': {
        const inner = expr.operand;
        if (inner.kind === 'Reg' || inner.kind === 'Var') {
          const place = this.resolvePlace(inner);
          return { simple: { op: { kind: 'reg', reg: place.reg, type: expr.type }, type: expr.type } };
        }
        return { temp: { tmpExpr: inner, tmpType: this.numericType(inner), readType: expr.type } };
      }
      case 'DiffSwitch':
        throw unsupported('a difficulty switch is only allowed in calls, assignments and jumps');
      case 'PreDecrement':
        throw unsupported('a decrement is only allowed as a condition');
      default: {
        const type = this.numericType(expr);
        return { temp: { tmpExpr: expr, tmpType: type, readType: type } };
      }
    }
  }

  private usesReg(expr: Expr, reg: number): boolean {
    let found = false;
    visitExpr(expr, (e) => {
      if (e.kind === 'Reg' && e.reg === reg) found = true;
      if (e.kind === 'Var' && this.state.scope.lookup(e.name)?.reg === reg) found = true;
    });
    return found;
  }

  // ------------------
  // Emitting.

  /** Emit the opcode bound to an intrinsic, placing operands by the binding's roles. */
  emitIntrinsic(
    kind: IntrinsicKind,
    time: number,
    operands: { dest?: Place; inputs: LowOperand[]; jump?: JumpTarget },
  ): void {
    const { table } = this.state;
    const opcode = table.opcodeForIntrinsic(kind);
    const signature = opcode === undefined ? undefined : table.resolve(opcode);
    const binding = signature?.intrinsic;
    if (opcode === undefined || !signature || !binding) {
      throw new LoweringError(
        DiagnosticIds.IntrinsicNotEncodable,
        `no instruction in format "${table.layout.name}" implements ${intrinsicKey(kind)}`,
      );
    }
    const { roles } = binding;
    const args = signature.slots.map(zeroOperand);
    if (roles.dest && operands.dest) {
      args[roles.dest.index] = { kind: 'reg', reg: operands.dest.reg, type: operands.dest.type };
    }
    roles.inputs.forEach((slotIndex, i) => {
      const op = operands.inputs[i];
      if (op) args[slotIndex] = op;
    });
    if (roles.jump && operands.jump) {
      const { label, time: jumpTime } = operands.jump;
      args[roles.jump.offsetIndex] = { kind: 'labelOffset', label };
      if (roles.jump.timeIndex !== undefined) {
        args[roles.jump.timeIndex] =
          jumpTime === undefined ? { kind: 'labelTime', label } : { kind: 'int', value: jumpTime };
      } else if (jumpTime !== undefined) {
        throw unsupported(`jumps in format "${table.layout.name}" cannot carry a time`);
      }
    }
    this.push(opcode, time, args);
  }

  private push(
    opcode: number,
    time: number,
    args: LowOperand[],
    extra: Pick<LowInstr, 'arg0' | 'pseudo'> = {},
  ): void {
    const { state } = this;
    const full = state.table.fullDifficultyMask();
    state.out.push({
      kind: 'instr',
      time,
      opcode,
      args,
      ...extra,
      ...(state.mask !== full ? { difficultyMask: state.mask } : {}),
      ...(state.pos ? { pos: state.pos } : {}),
    });
  }

  label(name: string, time: number): void {
    this.state.out.push({ kind: 'label', name, time });
  }

  /** Evaluate into a fresh scratch register, run `fn` with an expression reading it, then free it. */
  private withTemp(temp: NeedsTemp, time: number, fn: (read: Expr) => void): void {
    const { scope } = this.state;
    const reg = scope.allocate(temp.tmpType, 'a temporary');
    try {
      this.assign(time, { reg, type: temp.tmpType }, '=', temp.tmpExpr);
      fn(regExpr(reg, temp.readType));
    } finally {
      scope.release(reg, temp.tmpType);
    }
  }

  // ------------------
  // Assignments.

  /** Lower `target op= value`; `value` must already be folded. */
  assign(time: number, target: Place, op: AssignOpKind, value: Expr): void {
    if (op !== '=' && this.state.table.opcodeForIntrinsic({ kind: 'AssignOp', op, type: target.type }) === undefined) {
      // `x op= e` is `x = x op e` when the format has no compound instruction.
      const binop = assignOpBinop(op);
      if (binop) {
        this.assignBinop(time, target, binop, regExpr(target.reg, target.type), value);
        return;
      }
    }
    const c = this.classify(value);
    if ('simple' in c) {
      if (c.simple.type !== target.type) {
        throw mismatch(`cannot assign ${c.simple.type} to ${target.type} ${regSpelling(target.reg, target.type)}`);
      }
      this.emitIntrinsic({ kind: 'AssignOp', op, type: target.type }, time, {
        dest: target,
        inputs: [c.simple.op],
      });
      return;
    }
    const { temp } = c;
    if (temp.tmpType !== temp.readType) {
      this.withTemp(temp, time, (read) => this.assign(time, target, op, read));
      return;
    }
    if (op === '=' && value.kind === 'Binop' && value.op !== '&&' && value.op !== '||') {
      this.assignBinop(time, target, value.op, value.left, value.right);
      return;
    }
    if (op === '=' && value.kind === 'Unop') {
      this.assignUnop(time, target, value.op, value.operand);
      return;
    }
    if (op === '=') throw unsupported(`cannot assign this ${value.kind} expression directly`);
    this.withTemp(temp, time, (read) => this.assign(time, target, op, read));
  }

  /** Lower `target = a op b`. */
  private assignBinop(
    time: number,
    target: Place,
    op: ArithOp | ComparisonOp,
    a: Expr,
    b: Expr,
  ): void {
    const ca = this.classify(a);
    if ('temp' in ca) {
      const { temp } = ca;
      if (temp.tmpType === temp.readType && temp.tmpType === target.type && !this.usesReg(b, target.reg)) {
        this.assign(time, target, '=', temp.tmpExpr);
        this.assignBinop(time, target, op, regExpr(target.reg, temp.readType), b);
      } else {
        this.withTemp(temp, time, (read) => this.assignBinop(time, target, op, read, b));
      }
      return;
    }
    const cb = this.classify(b);
    if ('temp' in cb) {
      const { temp } = cb;
      if (temp.tmpType === temp.readType && temp.tmpType === target.type && !this.usesReg(a, target.reg)) {
        this.assign(time, target, '=', temp.tmpExpr);
        this.assignBinop(time, target, op, a, regExpr(target.reg, temp.readType));
      } else {
        this.withTemp(temp, time, (read) => this.assignBinop(time, target, op, a, read));
      }
      return;
    }

    const type = ca.simple.type;
    if (type !== cb.simple.type) {
      throw mismatch(`operands of "${op}" are ${type} and ${cb.simple.type}`);
    }
    if (type === 'string') throw mismatch(`operands of "${op}" cannot be strings`);
    const resultType: NumericType = isComparisonOp(op) ? 'int' : type;
    if (resultType !== target.type) {
      throw mismatch(`cannot assign ${resultType} to ${target.type} ${regSpelling(target.reg, target.type)}`);
    }
    this.emitIntrinsic({ kind: 'Binop', op, type }, time, {
      dest: target,
      inputs: [ca.simple.op, cb.simple.op],
    });
  }

  /** Lower `target = op b`. */
  private assignUnop(time: number, target: Place, op: UnopKind, b: Expr): void {
    const type = this.numericType(b);
    if (op === '-' || op === '~') {
      if (op === '~' && type !== 'int') throw mismatch('"~" needs an int operand');
      if (this.state.table.opcodeForIntrinsic({ kind: 'Unop', op, type }) === undefined) {
        if (op === '-') {
          const minusOne: Expr = type === 'float' ? { kind: 'FloatLit', value: -1 } : { kind: 'IntLit', value: -1 };
          this.assignBinop(time, target, '*', minusOne, b);
        } else {
          this.assignBinop(time, target, '-', { kind: 'IntLit', value: -1 }, b);
        }
        return;
      }
    }

    const cb = this.classify(b);
    if ('temp' in cb) {
      const { temp } = cb;
      if (temp.tmpType === temp.readType && temp.tmpType === target.type) {
        this.assign(time, target, '=', temp.tmpExpr);
        this.assignUnop(time, target, op, regExpr(target.reg, temp.readType));
      } else {
        this.withTemp(temp, time, (read) => this.assignUnop(time, target, op, read));
      }
      return;
    }

    if ((op === 'sin' || op === 'cos' || op === 'sqrt') && type !== 'float') {
      throw mismatch(`"${op}" needs a float operand`);
    }
    if (op === '!' && type !== 'int') throw mismatch('"!" needs an int operand');
    if (type !== target.type) {
      throw mismatch(`cannot assign ${type} to ${target.type} ${regSpelling(target.reg, target.type)}`);
    }
    this.emitIntrinsic({ kind: 'Unop', op, type }, time, { dest: target, inputs: [cb.simple.op] });
  }

  // ------------------
  // Jumps.

  jump(time: number, target: JumpTarget): void {
    this.emitIntrinsic({ kind: 'Jmp' }, time, { inputs: [], jump: target });
  }

  /**
   * Lower `if (cond) goto target` (or `unless` when `sense` is false); `cond` must
   * already be folded.
   */
  condJump(time: number, sense: boolean, cond: Expr, target: JumpTarget): void {
    if (cond.kind === 'PreDecrement') {
      if (sense) {
        const place = this.resolvePlace(cond.target);
        if (place.type !== 'int') throw mismatch('a decrement condition needs an int variable');
        this.emitIntrinsic({ kind: 'CountJmp' }, time, { dest: place, inputs: [], jump: target });
      } else {
        const skip = this.state.gensym('predec_skip');
        this.condJump(time, true, cond, { label: skip });
        this.jump(time, target);
        this.label(skip, time);
      }
      return;
    }
    if (cond.kind === 'Binop' && isComparisonOp(cond.op)) {
      this.compareJump(time, sense, cond.left, cond.op, cond.right, target);
      return;
    }
    if (cond.kind === 'Binop' && (cond.op === '&&' || cond.op === '||')) {
      if ((sense && cond.op === '||') || (!sense && cond.op === '&&')) {
        this.condJump(time, sense, cond.left, target);
        this.condJump(time, sense, cond.right, target);
      } else {
        const skip = this.state.gensym('logic_skip');
        this.condJump(time, !sense, cond.left, { label: skip });
        this.condJump(time, !sense, cond.right, { label: skip });
        this.jump(time, target);
        this.label(skip, time);
      }
      return;
    }
    if (cond.kind === 'Unop' && cond.op === '!') {
      this.condJump(time, !sense, cond.operand, target);
      return;
    }
    this.compareJump(time, sense, cond, '!=', zeroOf(this.exprType(cond)), target);
  }

  private compareJump(
    time: number,
    sense: boolean,
    a: Expr,
    op: ComparisonOp,
    b: Expr,
    target: JumpTarget,
  ): void {
    const ca = this.classify(a);
    if ('temp' in ca) {
      this.withTemp(ca.temp, time, (read) => this.compareJump(time, sense, read, op, b, target));
      return;
    }
    const cb = this.classify(b);
    if ('temp' in cb) {
      this.withTemp(cb.temp, time, (read) => this.compareJump(time, sense, a, op, read, target));
      return;
    }
    const type = ca.simple.type;
    if (type !== cb.simple.type) throw mismatch(`operands of "${op}" are ${type} and ${cb.simple.type}`);
    if (type === 'string') throw mismatch('strings cannot be compared');
    this.emitIntrinsic({ kind: 'CondJmp', op: sense ? op : negateComparison(op), type }, time, {
      inputs: [ca.simple.op, cb.simple.op],
      jump: target,
    });
  }

  // ------------------
  // Other statements.

  interruptLabel(time: number, id: number): void {
    this.emitIntrinsic({ kind: 'InterruptLabel' }, time, { inputs: [{ kind: 'int', value: id }] });
  }

  private resolveCallee(callee: Callee): number {
    if ('opcode' in callee) return callee.opcode;
    const named = this.state.table.opcodeForName(callee.name);
    if (named !== undefined) return named;
    const match = /^ins_(\d+)$/.exec(callee.name);
    if (match?.[1] !== undefined) return Number.parseInt(match[1], 10);
    throw new LoweringError(DiagnosticIds.UnknownName, `unknown instruction "${callee.name}"`);
  }

  /** Lower an instruction call, evaluating complex arguments into temporaries. */
  call(stmt: CallStmt): void {
    const { table, scope } = this.state;
    const opcode = this.resolveCallee(stmt.callee);
    const extra = stmt.arg0 !== undefined ? { arg0: stmt.arg0 } : {};

    if (stmt.pseudo) {
      if (stmt.pseudo.mask !== 0) this.checkRegisters();
      const { mask, blob, argCount } = stmt.pseudo;
      this.push(opcode, stmt.time, [], { ...extra, pseudo: pseudoArgs(hexToBytes(blob), mask, argCount) });
      return;
    }

    const signature = table.resolve(opcode);
    if (!signature) throw new LoweringError(DiagnosticIds.UnknownOpcode, `opcode ${opcode} has no signature`);
    // Trailing padding args may be left out; they are written as zero.
    let required = signature.slots.length;
    while (required > 0 && signature.slots[required - 1]?.role === 'padding') required--;
    if (stmt.args.length < required || stmt.args.length > signature.slots.length) {
      const expected =
        required === signature.slots.length ? `${required}` : `${required} to ${signature.slots.length}`;
      throw new LoweringError(
        DiagnosticIds.ArgCountMismatch,
        `opcode ${opcode} ("${signature.text}") expects ${expected} args, got ${stmt.args.length}`,
      );
    }

    const temps: Place[] = [];
    try {
      const args = signature.slots.map((slot, i): LowOperand => {
        const arg = stmt.args[i];
        if (!arg) return zeroOperand(slot);
        const c = this.classify(this.fold(arg));
        let simple: Simple;
        if ('simple' in c) {
          simple = c.simple;
        } else {
          const reg = scope.allocate(c.temp.tmpType, `arg ${i + 1}`);
          temps.push({ reg, type: c.temp.tmpType });
          this.assign(stmt.time, { reg, type: c.temp.tmpType }, '=', c.temp.tmpExpr);
          simple = { op: { kind: 'reg', reg, type: c.temp.readType }, type: c.temp.readType };
        }
        if (simple.type !== slot.type) {
          throw mismatch(`arg ${i + 1} of opcode ${opcode} expects ${slot.type}, got ${simple.type}`);
        }
        return simple.op;
      });
      this.push(opcode, stmt.time, args, extra);
    } finally {
      for (const temp of temps.reverse()) scope.release(temp.reg, temp.type);
    }
  }
}
