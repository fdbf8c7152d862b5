import { DiagnosticIds } from '../diagnostics/types.js';
import type { BinopKind, UnopKind } from '../ir/ops.js';
import type { Expr, NameTables } from '../ir/types.js';
import { mapExpr } from '../ir/walk.js';
import type { SignatureTable } from '../signatures/table.js';
import { LoweringError } from './errors.js';

export interface FoldContext {
  table: SignatureTable;
  names?: NameTables;
  /** Called for every enum member an expression references. */
  onConstant?: (name: string, value: number) => void;
}

const intLit = (value: number): Expr => ({ kind: 'IntLit', value: value | 0 });
const floatLit = (value: number): Expr => ({ kind: 'FloatLit', value: Math.fround(value) });

function compare(op: BinopKind, a: number, b: number): number | undefined {
  switch (op) {
    case '==':
      return a === b ? 1 : 0;
    case '!=':
      return a !== b ? 1 : 0;
    case '<':
      return a < b ? 1 : 0;
    case '<=':
      return a <= b ? 1 : 0;
    case '>':
      return a > b ? 1 : 0;
    case '>=':
      return a >= b ? 1 : 0;
    default:
      return undefined;
  }
}

function foldIntBinop(op: BinopKind, a: number, b: number): Expr | undefined {
  switch (op) {
    case '+':
      return intLit(a + b);
    case '-':
      return intLit(a - b);
    case '*':
      return intLit(Math.imul(a, b));
    case '/':
    case '%':
      if (b === 0) throw new LoweringError(DiagnosticIds.ConstDivideByZero, `constant ${a} ${op} 0`);
      return intLit(op === '/' ? Math.trunc(a / b) : a % b);
    case '&':
      return intLit(a & b);
    case '|':
      return intLit(a | b);
    case '^':
      return intLit(a ^ b);
    case '&&':
      return intLit(a !== 0 && b !== 0 ? 1 : 0);
    case '||':
      return intLit(a !== 0 || b !== 0 ? 1 : 0);
    default: {
      const cmp = compare(op, a, b);
      return cmp === undefined ? undefined : intLit(cmp);
    }
  }
}

function foldFloatBinop(op: BinopKind, a: number, b: number): Expr | undefined {
  switch (op) {
    case '+':
      return floatLit(a + b);
    case '-':
      return floatLit(a - b);
    case '*':
      return floatLit(a * b);
    case '/':
      return floatLit(a / b);
    default: {
      const cmp = compare(op, a, b);
      return cmp === undefined ? undefined : intLit(cmp);
    }
  }
}

function foldUnop(op: UnopKind, operand: Expr): Expr | undefined {
  if (operand.kind === 'IntLit') {
    switch (op) {
      case '-':
        return intLit(-operand.value);
      case '~':
        return intLit(~operand.value);
      case '!':
        return intLit(operand.value === 0 ? 1 : 0);
      default:
        return undefined;
    }
  }
  if (operand.kind === 'FloatLit') {
    switch (op) {
      case '-':
        return floatLit(-operand.value);
      case 'sin':
        return floatLit(Math.sin(operand.value));
      case 'cos':
        return floatLit(Math.cos(operand.value));
      case 'sqrt':
        return floatLit(Math.sqrt(operand.value));
      default:
        return undefined;
    }
  }
  return undefined;
}

/** Replace `null` cases of a difficulty switch by the case before them. */
export function fillSwitchCases(cases: ReadonlyArray<Expr | null>): Expr[] {
  const out: Expr[] = [];
  let prev: Expr | undefined;
  for (const c of cases) {
    const next = c ?? prev;
    if (!next) {
      throw new LoweringError(DiagnosticIds.UnsupportedExpression, 'first case of a difficulty switch is empty');
    }
    out.push(next);
    prev = next;
  }
  return out;
}

function foldNode(expr: Expr, ctx: FoldContext): Expr {
  switch (expr.kind) {
    case 'EnumConst': {
      const value = ctx.table.enumTable(expr.enumName)?.members.get(expr.member);
      if (value === undefined) {
        throw new LoweringError(DiagnosticIds.UnknownName, `unknown enum member ${expr.enumName}.${expr.member}`);
      }
      ctx.onConstant?.(`${expr.enumName}.${expr.member}`, value);
      return intLit(value);
    }
    case 'BuiltinConst':
      return floatLit(expr.name === 'INF' ? Infinity : expr.name === 'NAN' ? NaN : Math.PI);
    case 'NameRef': {
      const index = ctx.names?.[expr.table]?.indexOf(expr.name) ?? -1;
      if (index < 0) {
        throw new LoweringError(DiagnosticIds.UnknownName, `unknown ${expr.table} name "${expr.name}"`);
      }
      return intLit(index);
    }
    case 'Binop': {
      const { left, right } = expr;
      if (left.kind === 'IntLit' && right.kind === 'IntLit') {
        return foldIntBinop(expr.op, left.value, right.value) ?? expr;
      }
      if (left.kind === 'FloatLit' && right.kind === 'FloatLit') {
        return foldFloatBinop(expr.op, left.value, right.value) ?? expr;
      }
      return expr;
    }
    case 'Unop':
      return foldUnop(expr.op, expr.operand) ?? expr;
    case 'Cast': {
      const { operand } = expr;
      if (operand.kind === 'IntLit') return expr.type === 'int' ? operand : floatLit(operand.value);
      if (operand.kind === 'FloatLit') {
        return expr.type === 'float' ? operand : intLit(Number.isNaN(operand.value) ? 0 : Math.trunc(operand.value));
      }
      return expr;
    }
    case 'DiffSwitch': {
      const cases = fillSwitchCases(expr.cases);
      const first = cases[0];
      if (!first) throw new LoweringError(DiagnosticIds.UnsupportedExpression, 'empty difficulty switch');
      const key = JSON.stringify(first);
      return cases.every((c) => JSON.stringify(c) === key) ? first : expr;
    }
    default:
      return expr;
  }
}

/**
 * Fold constant subexpressions.
 *
 * Enum members, builtin constants and names become literals; int arithmetic wraps to
 * 32 bits and float results are rounded to single precision. A difficulty switch whose
 * cases are all equal collapses to that case.
 */
export function foldExpr(expr: Expr, ctx: FoldContext): Expr {
  return mapExpr(expr, (e) => foldNode(e, ctx));
}
