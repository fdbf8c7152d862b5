import type { SourcePos } from '../diagnostics/types.js';
import type { NameTableKind } from '../signatures/types.js';
import type { AssignOpKind, BinopKind, NumericType, UnopKind } from './ops.js';

/**
 * Base shape for all IR expression nodes.
 */
interface BaseExpr {
  kind: string;
}

export interface IntLitExpr extends BaseExpr {
  kind: 'IntLit';
  value: number;
  /** Render hint for decompiled output. */
  radix?: 'dec' | 'hex';
}

export interface FloatLitExpr extends BaseExpr {
  kind: 'FloatLit';
  value: number;
}

export interface StringLitExpr extends BaseExpr {
  kind: 'StringLit';
  value: string;
}

/** Raw register reference (`$REG[10000]` for int, `%REG[10000]` for float). */
export interface RegExpr extends BaseExpr {
  kind: 'Reg';
  reg: number;
  type: NumericType;
}

/**
 * Named variable: a local declared in the body, or a register alias from the table.
 *
 * `type` overrides the read type (reading an int register as a float).
 */
export interface VarExpr extends BaseExpr {
  kind: 'Var';
  name: string;
  type?: NumericType;
}

export interface BinopExpr extends BaseExpr {
  kind: 'Binop';
  op: BinopKind;
  left: Expr;
  right: Expr;
}

export interface UnopExpr extends BaseExpr {
  kind: 'Unop';
  op: UnopKind;
  operand: Expr;
}

export interface CastExpr extends BaseExpr {
  kind: 'Cast';
  type: NumericType;
  operand: Expr;
}

export interface EnumConstExpr extends BaseExpr {
  kind: 'EnumConst';
  enumName: string;
  member: string;
}

export interface BuiltinConstExpr extends BaseExpr {
  kind: 'BuiltinConst';
  name: 'INF' | 'NAN' | 'PI';
}

/**
 * Per-difficulty alternatives; `null` repeats the previous alternative.
 */
export interface DiffSwitchExpr extends BaseExpr {
  kind: 'DiffSwitch';
  cases: Array<Expr | null>;
}

/** Reference to a sub, script or sprite by name. */
export interface NameRefExpr extends BaseExpr {
  kind: 'NameRef';
  table: NameTableKind;
  name: string;
}

export interface LabelPropExpr extends BaseExpr {
  kind: 'LabelProp';
  prop: 'offsetof' | 'timeof';
  label: string;
}

/** `--x`; only valid as a condition. */
export interface PreDecrementExpr extends BaseExpr {
  kind: 'PreDecrement';
  target: VarRef;
}

export type VarRef = RegExpr | VarExpr;

/** Names of subs, scripts and sprites, indexed by number. */
export type NameTables = Partial<Record<NameTableKind, readonly string[]>>;

export type Expr =
  | IntLitExpr
  | FloatLitExpr
  | StringLitExpr
  | RegExpr
  | VarExpr
  | BinopExpr
  | UnopExpr
  | CastExpr
  | EnumConstExpr
  | BuiltinConstExpr
  | DiffSwitchExpr
  | NameRefExpr
  | LabelPropExpr
  | PreDecrementExpr;

/**
 * Base shape for all IR statements.
 *
 * `time` is explicit on every statement. `diffLabel` restricts the statement to the
 * difficulties named by its letters.
 */
interface BaseStmt {
  kind: string;
  time: number;
  diffLabel?: string;
  pos?: SourcePos;
}

/** Callee of an instruction call: an opcode number or an instruction name. */
export type Callee = { opcode: number } | { name: string };

/** Instruction call. `blob` (hex) with `mask` is the pseudo-argument form. */
export interface CallStmt extends BaseStmt {
  kind: 'Call';
  callee: Callee;
  args: Expr[];
  pseudo?: { mask: number; blob: string; argCount?: number };
  arg0?: number;
}

export interface AssignStmt extends BaseStmt {
  kind: 'Assign';
  target: VarRef;
  op: AssignOpKind;
  value: Expr;
}

export interface GotoStmt extends BaseStmt {
  kind: 'Goto';
  label: string;
  /** Explicit jump time; absent means the label's time. */
  jumpTime?: number;
}

export interface CondGotoStmt extends BaseStmt {
  kind: 'CondGoto';
  cond: Expr;
  label: string;
  jumpTime?: number;
}

export interface InterruptLabelStmt extends BaseStmt {
  kind: 'InterruptLabel';
  id: number;
}

export interface CondBranch {
  cond: Expr;
  body: Stmt[];
}

export interface CondChainStmt extends BaseStmt {
  kind: 'CondChain';
  branches: CondBranch[];
  elseBody?: Stmt[];
}

/** `loop { ... }`: runs until a `break`. */
export interface LoopStmt extends BaseStmt {
  kind: 'Loop';
  body: Stmt[];
}

/** `while (c) { ... }`, or `do { ... } while (c)` when `doWhile`. */
export interface WhileStmt extends BaseStmt {
  kind: 'While';
  doWhile: boolean;
  cond: Expr;
  body: Stmt[];
}

/** `times(count) { ... }`, counting down in `clobber` (or a scratch register). */
export interface TimesStmt extends BaseStmt {
  kind: 'Times';
  count: Expr;
  clobber?: VarRef;
  body: Stmt[];
}

export interface BreakStmt extends BaseStmt {
  kind: 'Break';
  cond?: Expr;
}

export interface LabelStmt extends BaseStmt {
  kind: 'Label';
  name: string;
}

/** Sets the time of the statements that follow. */
export interface TimeLabelStmt extends BaseStmt {
  kind: 'TimeLabel';
}

export interface LocalDecl {
  name: string;
  type: NumericType;
  init?: Expr;
}

/** Declares locals for the rest of the enclosing block. */
export interface DeclareStmt extends BaseStmt {
  kind: 'Declare';
  vars: LocalDecl[];
}

export type Stmt =
  | CallStmt
  | AssignStmt
  | GotoStmt
  | CondGotoStmt
  | InterruptLabelStmt
  | CondChainStmt
  | LoopStmt
  | WhileStmt
  | TimesStmt
  | BreakStmt
  | LabelStmt
  | TimeLabelStmt
  | DeclareStmt;

export interface FunctionBody {
  name: string;
  body: Stmt[];
}

/**
 * A document of functions, as exchanged with front ends and printers.
 *
 * `names` supplies the sprite and script tables used by name references; sub names
 * default to the function names.
 */
export interface ScriptIr {
  functions: FunctionBody[];
  names?: NameTables;
}
