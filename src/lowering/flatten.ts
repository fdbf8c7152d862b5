import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt } from '../diagnostics/types.js';
import type {
  AssignStmt,
  CallStmt,
  CondChainStmt,
  CondGotoStmt,
  Expr,
  NameTables,
  Stmt,
  TimesStmt,
  WhileStmt,
} from '../ir/types.js';
import { mapExpr, stmtExprs, visitExpr } from '../ir/walk.js';
import type { SignatureTable } from '../signatures/table.js';
import type { DebugInfoBuilder } from './debugInfo.js';
import { LoweringError } from './errors.js';
import { fillSwitchCases } from './fold.js';
import { ExprLowerer, type LowerState, type Place } from './lowerExpr.js';
import { collectUsedRegisters, RegisterScope, reportAliasCollisions } from './registers.js';
import type { LowItem } from './types.js';

export interface FlattenContext {
  table: SignatureTable;
  diagnostics: Diagnostic[];
  /** Function name; the `file` of every diagnostic about the body. */
  file: string;
  names?: NameTables;
  debug?: DebugInfoBuilder;
}

/** Prefix of compiler-generated labels; user labels cannot start with it. */
export const GENERATED_LABEL_PREFIX = '@';

type SwitchableStmt = CallStmt | AssignStmt | CondGotoStmt;

/** Parse a difficulty guard into a mask. */
export function difficultyMask(letters: string, table: SignatureTable): number {
  if (table.difficultyBits === 0) {
    throw new LoweringError(
      DiagnosticIds.DifficultyUnsupported,
      `format "${table.layout.name}" has no difficulty flags`,
    );
  }
  let mask = 0;
  for (const letter of letters) {
    const bit = table.difficultyLetters.indexOf(letter);
    if (bit < 0) throw new LoweringError(DiagnosticIds.UnknownName, `unknown difficulty flag "${letter}"`);
    mask |= 1 << bit;
  }
  return mask;
}

function hasSwitch(stmt: Stmt): boolean {
  let found = false;
  for (const expr of stmtExprs(stmt)) {
    visitExpr(expr, (e) => {
      if (e.kind === 'DiffSwitch') found = true;
    });
  }
  return found;
}

/** The statement as seen by one difficulty: every switch replaced by its case. */
function selectDifficulty(stmt: SwitchableStmt, bit: number): SwitchableStmt {
  const pick = (expr: Expr): Expr =>
    mapExpr(expr, (e) => {
      if (e.kind !== 'DiffSwitch') return e;
      const cases = fillSwitchCases(e.cases);
      return cases[Math.min(bit, cases.length - 1)] ?? e;
    });
  switch (stmt.kind) {
    case 'Call':
      return { ...stmt, args: stmt.args.map(pick) };
    case 'Assign':
      return { ...stmt, value: pick(stmt.value) };
    case 'CondGoto':
      return { ...stmt, cond: pick(stmt.cond) };
  }
}

/**
 * Lowers one structured function body to a flat list of instructions and labels.
 */
class Flattener {
  private readonly state: LowerState;
  private readonly exprs: ExprLowerer;
  /** Exit labels of the enclosing loops, innermost last. */
  private readonly loops: string[] = [];
  private time = 0;
  private nextLabel = 0;

  constructor(
    private readonly ctx: FlattenContext,
    scope: RegisterScope,
  ) {
    const debug = ctx.debug;
    this.state = {
      table: ctx.table,
      scope,
      fold: {
        table: ctx.table,
        ...(ctx.names ? { names: ctx.names } : {}),
        ...(debug ? { onConstant: (name: string, value: number) => debug.add({ kind: 'constant', name, value }) } : {}),
      },
      out: [],
      mask: ctx.table.fullDifficultyMask(),
      gensym: (prefix) => `${GENERATED_LABEL_PREFIX}${prefix}_${this.nextLabel++}`,
    };
    this.exprs = new ExprLowerer(this.state);
  }

  run(body: readonly Stmt[]): LowItem[] {
    this.block(body);
    return this.state.out;
  }

  private block(body: readonly Stmt[]): void {
    const { scope } = this.state;
    scope.pushFrame();
    try {
      for (const stmt of body) this.stmt(stmt);
    } finally {
      scope.popFrame();
    }
  }

  private stmt(stmt: Stmt): void {
    const { state } = this;
    this.time = stmt.time;
    const savedMask = state.mask;
    const savedPos = state.pos;
    if (stmt.pos) state.pos = stmt.pos;
    else delete state.pos;
    try {
      if (stmt.diffLabel !== undefined) {
        state.mask &= difficultyMask(stmt.diffLabel, state.table);
        // A guard that selects no difficulty removes the statement.
        if (state.mask === 0) return;
      }
      this.dispatch(stmt);
    } catch (err) {
      if (!(err instanceof LoweringError)) throw err;
      diagAt(this.ctx.diagnostics, err.id, this.ctx.file, err.message, err.pos ?? stmt.pos);
    } finally {
      state.mask = savedMask;
      if (savedPos) state.pos = savedPos;
      else delete state.pos;
    }
  }

  private dispatch(stmt: Stmt): void {
    const { exprs } = this;
    switch (stmt.kind) {
      case 'Call':
      case 'Assign':
      case 'CondGoto':
        this.switchable(stmt);
        return;
      case 'Goto':
        exprs.jump(stmt.time, { label: stmt.label, ...(stmt.jumpTime !== undefined ? { time: stmt.jumpTime } : {}) });
        return;
      case 'InterruptLabel':
        exprs.interruptLabel(stmt.time, stmt.id);
        return;
      case 'Label':
        exprs.label(stmt.name, stmt.time);
        return;
      case 'TimeLabel':
        return;
      case 'Declare':
        for (const v of stmt.vars) {
          const binding = this.state.scope.declare(v.name, v.type);
          this.ctx.debug?.add({ kind: 'register', name: v.name, register: binding.reg, type: v.type, scope: 'local' });
          if (v.init) {
            this.switchable({
              kind: 'Assign',
              time: stmt.time,
              target: { kind: 'Reg', reg: binding.reg, type: binding.type },
              op: '=',
              value: v.init,
            });
          }
        }
        return;
      case 'CondChain':
        this.condChain(stmt);
        return;
      case 'Loop': {
        const entry = this.state.gensym('loop');
        const exit = this.state.gensym('loop_end');
        exprs.label(entry, stmt.time);
        this.loopBody(stmt.body, exit);
        exprs.jump(this.time, { label: entry });
        exprs.label(exit, this.time);
        return;
      }
      case 'While':
        this.whileLoop(stmt);
        return;
      case 'Times':
        this.withSwitchesHoisted(stmt.count, stmt.time, (count) => this.times(stmt, count));
        return;
      case 'Break': {
        const exit = this.loops[this.loops.length - 1];
        if (exit === undefined) throw new LoweringError(DiagnosticIds.BreakOutsideLoop, '"break" outside of a loop');
        if (stmt.cond) {
          this.withSwitchesHoisted(stmt.cond, stmt.time, (cond) =>
            exprs.condJump(stmt.time, true, exprs.foldCond(cond), { label: exit }),
          );
        } else exprs.jump(stmt.time, { label: exit });
        return;
      }
    }
  }

  /**
   * Lower a statement that may hold difficulty switches: one variant per distinct
   * selection, each restricted to the difficulties that select it.
   */
  private switchable(stmt: SwitchableStmt): void {
    const { state } = this;
    if (!hasSwitch(stmt)) {
      this.simple(stmt);
      return;
    }
    const { table } = state;
    this.requireDifficulty();
    const variants = new Map<string, { stmt: SwitchableStmt; mask: number }>();
    for (let bit = 0; bit < table.difficultyBits; bit++) {
      const variant = selectDifficulty(stmt, bit);
      const key = JSON.stringify(variant);
      const found = variants.get(key);
      if (found) found.mask |= 1 << bit;
      else variants.set(key, { stmt: variant, mask: 1 << bit });
    }
    if (variants.size === 1) {
      for (const { stmt: only } of variants.values()) this.simple(only);
      return;
    }
    const outer = state.mask;
    try {
      for (const variant of variants.values()) {
        state.mask = outer & variant.mask;
        if (state.mask !== 0) this.simple(variant.stmt);
      }
    } finally {
      state.mask = outer;
    }
  }

  private requireDifficulty(): void {
    const { table } = this.state;
    if (table.difficultyBits === 0) {
      throw new LoweringError(
        DiagnosticIds.DifficultyUnsupported,
        `format "${table.layout.name}" has no difficulty flags`,
      );
    }
  }

  /**
   * Run `fn` on `expr` with every difficulty switch in it first assigned to a scratch
   * register. Conditions and loop counts only take the register; it stays allocated
   * until `fn` returns.
   */
  private withSwitchesHoisted(expr: Expr, time: number, fn: (hoisted: Expr) => void): void {
    const { exprs, state } = this;
    const held: Place[] = [];
    try {
      const hoisted = mapExpr(expr, (e) => {
        if (e.kind !== 'DiffSwitch') return e;
        const folded = exprs.fold(e);
        if (folded.kind !== 'DiffSwitch') return folded;
        this.requireDifficulty();
        const type = exprs.exprType(folded);
        if (type === 'string') {
          throw new LoweringError(DiagnosticIds.TypeMismatch, 'a difficulty switch of strings cannot be compared or counted');
        }
        const reg = state.scope.allocate(type, 'a difficulty switch');
        held.push({ reg, type });
        this.switchable({ kind: 'Assign', time, target: { kind: 'Reg', reg, type }, op: '=', value: folded });
        return { kind: 'Reg', reg, type };
      });
      fn(hoisted);
    } finally {
      for (const place of held) state.scope.release(place.reg, place.type);
    }
  }

  private simple(stmt: SwitchableStmt): void {
    const { exprs } = this;
    switch (stmt.kind) {
      case 'Call':
        exprs.call(stmt);
        return;
      case 'Assign': {
        const target: Place = exprs.resolvePlace(stmt.target);
        exprs.assign(stmt.time, target, stmt.op, exprs.fold(stmt.value));
        return;
      }
      case 'CondGoto':
        exprs.condJump(stmt.time, true, exprs.foldCond(stmt.cond), {
          label: stmt.label,
          ...(stmt.jumpTime !== undefined ? { time: stmt.jumpTime } : {}),
        });
        return;
    }
  }

  private loopBody(body: readonly Stmt[], exit: string): void {
    this.loops.push(exit);
    try {
      this.block(body);
    } finally {
      this.loops.pop();
    }
  }

  /** `unless (c1) goto n1; A; goto end; n1: unless (c2) goto n2; B; goto end; n2: C; end:` */
  private condChain(stmt: CondChainStmt): void {
    const { exprs, state } = this;
    const end = state.gensym('chain_end');
    stmt.branches.forEach((branch, i) => {
      const last = i === stmt.branches.length - 1 && !stmt.elseBody;
      const next = last ? end : state.gensym('chain_next');
      this.withSwitchesHoisted(branch.cond, this.time, (cond) =>
        exprs.condJump(this.time, false, exprs.foldCond(cond), { label: next }),
      );
      this.block(branch.body);
      if (!last) {
        exprs.jump(this.time, { label: end });
        exprs.label(next, this.time);
      }
    });
    if (stmt.elseBody) this.block(stmt.elseBody);
    exprs.label(end, this.time);
  }

  /** A switch in the condition is evaluated once, before the loop. */
  private whileLoop(stmt: WhileStmt): void {
    const { exprs, state } = this;
    const entry = state.gensym('while');
    const exit = state.gensym('while_end');
    this.withSwitchesHoisted(stmt.cond, stmt.time, (hoisted) => {
      const cond = exprs.foldCond(hoisted);
      if (!stmt.doWhile) exprs.condJump(stmt.time, false, cond, { label: exit });
      exprs.label(entry, stmt.time);
      this.loopBody(stmt.body, exit);
      exprs.condJump(this.time, true, cond, { label: entry });
      exprs.label(exit, this.time);
    });
  }

  /** `ctr = n; [unless (ctr > 0) goto exit;] entry: body; if (--ctr) goto entry; exit:` */
  private times(stmt: TimesStmt, hoisted: Expr): void {
    const { exprs, state } = this;
    const count = exprs.fold(hoisted);
    if (count.kind === 'IntLit' && count.value <= 0) return;

    const counter: Place = stmt.clobber
      ? exprs.resolvePlace(stmt.clobber)
      : { reg: state.scope.allocate('int', 'a loop counter'), type: 'int' };
    try {
      if (counter.type !== 'int') {
        throw new LoweringError(DiagnosticIds.TypeMismatch, 'a loop counter must be an int');
      }
      const entry = state.gensym('times');
      const exit = state.gensym('times_end');
      const ctr: Expr = { kind: 'Reg', reg: counter.reg, type: 'int' };
      exprs.assign(stmt.time, counter, '=', count);
      if (count.kind !== 'IntLit') {
        const positive: Expr = { kind: 'Binop', op: '>', left: ctr, right: { kind: 'IntLit', value: 0 } };
        exprs.condJump(stmt.time, false, positive, { label: exit });
      }
      exprs.label(entry, stmt.time);
      this.loopBody(stmt.body, exit);
      exprs.condJump(this.time, true, { kind: 'PreDecrement', target: { kind: 'Reg', reg: counter.reg, type: 'int' } }, { label: entry });
      exprs.label(exit, this.time);
    } finally {
      if (!stmt.clobber) state.scope.release(counter.reg, 'int');
    }
  }
}

/**
 * Flatten a structured function body into instructions and labels.
 *
 * Errors are reported per statement; the returned list is only meaningful when no
 * error was reported.
 */
export function flattenFunction(body: readonly Stmt[], ctx: FlattenContext): LowItem[] {
  const used = collectUsedRegisters(body, ctx.table);
  reportAliasCollisions(used, ctx.diagnostics, ctx.file);
  if (ctx.debug) {
    for (const [reg, spellings] of used) {
      for (const name of spellings) {
        const alias = ctx.table.registerByAlias(name);
        if (alias?.id !== reg) continue;
        ctx.debug.add({ kind: 'register', name, register: reg, type: alias.type ?? 'int', scope: 'alias' });
      }
    }
  }
  const scope = new RegisterScope(ctx.table, new Set(used.keys()));
  return new Flattener(ctx, scope).run(body);
}
