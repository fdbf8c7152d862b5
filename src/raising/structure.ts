import { isComparisonOp, negateComparison } from '../ir/ops.js';
import type {
  CondChainStmt,
  CondGotoStmt,
  Expr,
  GotoStmt,
  Stmt,
  TimesStmt,
  WhileStmt,
} from '../ir/types.js';
import { stmtExprs, visitExpr, visitStmts } from '../ir/walk.js';
import { buildBlockArena, type BlockArena } from './cfg.js';

type JumpStmt = GotoStmt | CondGotoStmt;

/** Jumps that can become control flow: no difficulty guard and no explicit time. */
function isStructural(stmt: Stmt | undefined): stmt is JumpStmt {
  if (!stmt || (stmt.kind !== 'Goto' && stmt.kind !== 'CondGoto')) return false;
  return stmt.diffLabel === undefined && stmt.jumpTime === undefined;
}

/** Logical negation of a condition, flipping comparisons where possible. */
export function negateCond(cond: Expr): Expr {
  if (cond.kind === 'Binop' && isComparisonOp(cond.op)) return { ...cond, op: negateComparison(cond.op) };
  if (cond.kind === 'Unop' && cond.op === '!') return cond.operand;
  return { kind: 'Unop', op: '!', operand: cond };
}

function canonical(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v === null || typeof v !== 'object' || Array.isArray(v)) return v;
    return Object.fromEntries(Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  });
}

export function sameExpr(a: Expr, b: Expr): boolean {
  return canonical(a) === canonical(b);
}

/**
 * Recovers nested control flow from a flat statement list.
 *
 * Works on index ranges of the flat list and its basic-block arena. A label whose block
 * has a later predecessor jumping back to it starts a loop; a forward conditional jump within the range starts an `if`, with an `else`
 * when the `if` body ends in a forward jump. Inside a loop, jumps to the labels right
 * after it become `break`. Labels are kept where they were; unused ones are pruned
 * afterwards.
 */
class Structurer {
  private readonly arena: BlockArena;
  private readonly labelIndex: ReadonlyMap<string, number>;
  private readonly labelRefs: Map<string, number>;

  constructor(private readonly flat: readonly Stmt[]) {
    this.arena = buildBlockArena(flat);
    this.labelIndex = this.arena.labelAt;
    this.labelRefs = referenceCounts(flat);
  }

  private labelRun(from: number): Set<string> {
    const names = new Set<string>();
    for (let i = from; i < this.flat.length; i++) {
      const stmt = this.flat[i];
      if (stmt?.kind !== 'Label') break;
      names.add(stmt.name);
    }
    return names;
  }

  range(from: number, to: number, loopExit: ReadonlySet<string>): Stmt[] {
    const out: Stmt[] = [];
    let i = from;
    while (i < to) {
      const stmt = this.flat[i];
      if (!stmt) break;
      const next =
        this.loop(stmt, i, to, out) ??
        this.breakStmt(stmt, i, loopExit, out) ??
        this.ifChain(stmt, i, to, loopExit, out);
      if (next !== undefined) {
        i = next;
        continue;
      }
      out.push(stmt);
      i++;
    }
    return out;
  }

  private loop(stmt: Stmt, i: number, to: number, out: Stmt[]): number | undefined {
    if (stmt.kind !== 'Label') return undefined;
    const block = this.arena.blocks[this.arena.blockOf[i] ?? -1];
    // The last back edge inside the range closes the loop.
    let j = -1;
    for (const pred of block?.preds ?? []) {
      const k = (this.arena.blocks[pred]?.end ?? 0) - 1;
      const jump = this.flat[k];
      if (k > i && k < to && k > j && isStructural(jump) && jump.label === stmt.name) j = k;
    }
    const back = this.flat[j];
    if (!isStructural(back)) return undefined;
    const body = [stmt, ...this.range(i + 1, j, this.labelRun(j + 1))];
    if (back.kind === 'Goto') {
      out.push({ kind: 'Loop', time: stmt.time, body });
    } else {
      out.push({ kind: 'While', time: stmt.time, doWhile: true, cond: back.cond, body });
    }
    return j + 1;
  }

  private breakStmt(stmt: Stmt, i: number, loopExit: ReadonlySet<string>, out: Stmt[]): number | undefined {
    if (!isStructural(stmt) || !loopExit.has(stmt.label)) return undefined;
    out.push(stmt.kind === 'CondGoto' ? { kind: 'Break', time: stmt.time, cond: stmt.cond } : { kind: 'Break', time: stmt.time });
    return i + 1;
  }

  private ifChain(
    stmt: Stmt,
    i: number,
    to: number,
    loopExit: ReadonlySet<string>,
    out: Stmt[],
  ): number | undefined {
    if (!isStructural(stmt) || stmt.kind !== 'CondGoto') return undefined;
    const t = this.labelIndex.get(stmt.label);
    if (t === undefined || t <= i || t > to) return undefined;
    const cond = negateCond(stmt.cond);

    const skip = this.flat[t - 1];
    const m = t - 1 > i && isStructural(skip) && skip.kind === 'Goto' ? this.labelIndex.get(skip.label) : undefined;
    if (m === undefined || m <= t || m > to) {
      out.push({ kind: 'CondChain', time: stmt.time, branches: [{ cond, body: this.range(i + 1, t, loopExit) }] });
      return t;
    }

    const body = this.range(i + 1, t - 1, loopExit);
    const elseBody = this.range(t, m, loopExit);
    const chain: CondChainStmt = { kind: 'CondChain', time: stmt.time, branches: [{ cond, body }] };
    // The else body opens with the label this jump targeted; if nothing else uses it,
    // it does not stop a nested chain from becoming `elseif`.
    const [entry, ...afterEntry] = elseBody;
    const rest =
      entry?.kind === 'Label' && entry.name === stmt.label && this.labelRefs.get(entry.name) === 1
        ? afterEntry
        : elseBody;
    const [only] = rest;
    if (rest.length === 1 && only?.kind === 'CondChain' && only.diffLabel === undefined) {
      chain.branches.push(...only.branches);
      if (only.elseBody) chain.elseBody = only.elseBody;
    } else {
      chain.elseBody = elseBody;
    }
    out.push(chain);
    return m;
  }
}

function mapBodies(body: readonly Stmt[], fn: (body: Stmt[]) => Stmt[]): Stmt[] {
  const rebuilt = body.map((stmt): Stmt => {
    switch (stmt.kind) {
      case 'CondChain':
        return {
          ...stmt,
          branches: stmt.branches.map((b) => ({ ...b, body: mapBodies(b.body, fn) })),
          ...(stmt.elseBody ? { elseBody: mapBodies(stmt.elseBody, fn) } : {}),
        };
      case 'Loop':
      case 'While':
      case 'Times':
        return { ...stmt, body: mapBodies(stmt.body, fn) };
      default:
        return stmt;
    }
  });
  return fn(rebuilt);
}

function singleIf(stmt: Stmt | undefined): CondChainStmt | undefined {
  if (stmt?.kind !== 'CondChain' || stmt.elseBody || stmt.branches.length !== 1) return undefined;
  return stmt;
}

function onlyDoWhile(body: readonly Stmt[]): WhileStmt | undefined {
  const [only] = body;
  return body.length === 1 && only?.kind === 'While' && only.doWhile ? only : undefined;
}

/** `if (c) { do { ... } while (c) }` is `while (c) { ... }`. */
function whileLoops(body: Stmt[]): Stmt[] {
  return body.map((stmt) => {
    const chain = singleIf(stmt);
    const branch = chain?.branches[0];
    const inner = branch ? onlyDoWhile(branch.body) : undefined;
    if (!chain || !branch || !inner || !sameExpr(branch.cond, inner.cond)) return stmt;
    return { kind: 'While', time: chain.time, doWhile: false, cond: inner.cond, body: inner.body };
  });
}

const LITERAL_KINDS: ReadonlySet<Expr['kind']> = new Set<Expr['kind']>(['IntLit', 'EnumConst', 'NameRef']);

/**
 * `R = n; do { ... } while (--R)` with a literal `n > 0`, or
 * `R = e; if (R > 0) { do { ... } while (--R) }`, is `times(e) clobber R { ... }`.
 */
function timesLoops(body: Stmt[]): Stmt[] {
  const out: Stmt[] = [];
  for (let i = 0; i < body.length; i++) {
    const stmt = body[i];
    if (!stmt) continue;
    const times = stmt.kind === 'Assign' ? timesAt(stmt, body[i + 1]) : undefined;
    if (times) {
      out.push(times);
      i++;
    } else {
      out.push(stmt);
    }
  }
  return out;
}

function timesAt(assign: Stmt, next: Stmt | undefined): TimesStmt | undefined {
  if (assign.kind !== 'Assign' || assign.op !== '=' || assign.diffLabel !== undefined) return undefined;
  const { target, value } = assign;
  if (target.kind !== 'Reg' || target.type !== 'int') return undefined;
  let loop: WhileStmt | undefined;
  if (value.kind === 'IntLit') {
    if (value.value <= 0 || next?.kind !== 'While' || !next.doWhile) return undefined;
    loop = next;
  } else {
    const chain = singleIf(next);
    const branch = chain?.branches[0];
    const positive: Expr = { kind: 'Binop', op: '>', left: target, right: { kind: 'IntLit', value: 0 } };
    if (LITERAL_KINDS.has(value.kind) || !branch || !sameExpr(branch.cond, positive)) return undefined;
    loop = onlyDoWhile(branch.body);
  }
  if (!loop || loop.cond.kind !== 'PreDecrement' || !sameExpr(loop.cond.target, target)) return undefined;
  return { kind: 'Times', time: assign.time, count: value, clobber: target, body: loop.body };
}

/** How often each label is named by a jump or a label property. */
function referenceCounts(body: readonly Stmt[]): Map<string, number> {
  const counts = new Map<string, number>();
  const add = (name: string) => counts.set(name, (counts.get(name) ?? 0) + 1);
  visitStmts(body, (stmt) => {
    if (stmt.kind === 'Goto' || stmt.kind === 'CondGoto') add(stmt.label);
    for (const expr of stmtExprs(stmt)) {
      visitExpr(expr, (e) => {
        if (e.kind === 'LabelProp') add(e.label);
      });
    }
  });
  return counts;
}

/** Recover structured control flow from a lifted, flat function body. */
export function structureBody(flat: readonly Stmt[]): Stmt[] {
  const structured = new Structurer(flat).range(0, flat.length, new Set());
  const loops = mapBodies(mapBodies(structured, whileLoops), timesLoops);
  const used = referenceCounts(loops);
  return mapBodies(loops, (body) => body.filter((s) => s.kind !== 'Label' || used.has(s.name)));
}
