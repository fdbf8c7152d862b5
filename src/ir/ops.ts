/** Value types that can live in a register. */
export type NumericType = 'int' | 'float';

/** Value types an expression or argument slot can have. */
export type ScalarType = NumericType | 'string';

export type ComparisonOp = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type ArithOp = '+' | '-' | '*' | '/' | '%' | '&' | '|' | '^';
export type LogicOp = '&&' | '||';
export type BinopKind = ArithOp | ComparisonOp | LogicOp;
export type UnopKind = '-' | '~' | '!' | 'sin' | 'cos' | 'sqrt';
export type AssignOpKind = '=' | '+=' | '-=' | '*=' | '/=' | '%=' | '&=' | '|=' | '^=';

export const COMPARISON_OPS: readonly ComparisonOp[] = ['==', '!=', '<', '<=', '>', '>='];
export const ARITH_OPS: readonly ArithOp[] = ['+', '-', '*', '/', '%', '&', '|', '^'];
export const UNOP_KINDS: readonly UnopKind[] = ['-', '~', '!', 'sin', 'cos', 'sqrt'];
export const ASSIGN_OPS: readonly AssignOpKind[] = [
  '=',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '&=',
  '|=',
  '^=',
];

export function isComparisonOp(op: string): op is ComparisonOp {
  return COMPARISON_OPS.some((o) => o === op);
}

export function isArithOp(op: string): op is ArithOp {
  return ARITH_OPS.some((o) => o === op);
}

export function isUnopKind(op: string): op is UnopKind {
  return UNOP_KINDS.some((o) => o === op);
}

export function isAssignOp(op: string): op is AssignOpKind {
  return ASSIGN_OPS.some((o) => o === op);
}

export function negateComparison(op: ComparisonOp): ComparisonOp {
  switch (op) {
    case '==':
      return '!=';
    case '!=':
      return '==';
    case '<':
      return '>=';
    case '<=':
      return '>';
    case '>':
      return '<=';
    case '>=':
      return '<';
  }
}

/** The binary operator applied by a compound assignment (`+=` applies `+`). */
export function assignOpBinop(op: AssignOpKind): ArithOp | undefined {
  if (op === '=') return undefined;
  const binop = op.slice(0, -1);
  return isArithOp(binop) ? binop : undefined;
}
