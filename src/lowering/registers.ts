import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, warnAt } from '../diagnostics/types.js';
import type { NumericType } from '../ir/ops.js';
import type { Expr, Stmt } from '../ir/types.js';
import { childBodies, stmtExprs, visitExpr } from '../ir/walk.js';
import type { SignatureTable } from '../signatures/table.js';
import { LoweringError } from './errors.js';

/** A name bound to a register. */
export interface VarBinding {
  name: string;
  reg: number;
  type: NumericType;
  local: boolean;
}

/** Register spelling used in messages. */
export function regSpelling(reg: number, type: NumericType): string {
  return `${type === 'float' ? '%' : '$'}REG[${reg}]`;
}

/**
 * Registers a body names explicitly, by raw id or through an alias.
 *
 * A name counts as a local only inside the block that declares it, from its
 * declaration on; elsewhere it is the register alias of that name.
 */
export function collectUsedRegisters(
  body: readonly Stmt[],
  table: SignatureTable,
): Map<number, Set<string>> {
  const used = new Map<number, Set<string>>();
  const note = (reg: number, spelling: string) => {
    let spellings = used.get(reg);
    if (!spellings) {
      spellings = new Set();
      used.set(reg, spellings);
    }
    spellings.add(spelling);
  };
  const frames: Set<string>[] = [];
  const noteExpr = (expr: Expr) =>
    visitExpr(expr, (e) => {
      if (e.kind === 'Reg') note(e.reg, `REG[${e.reg}]`);
      if (e.kind === 'Var' && !frames.some((f) => f.has(e.name))) {
        const alias = table.registerByAlias(e.name);
        if (alias) note(alias.id, e.name);
      }
    });
  const walk = (stmts: readonly Stmt[]): void => {
    const frame = new Set<string>();
    frames.push(frame);
    for (const stmt of stmts) {
      if (stmt.kind === 'Declare') {
        for (const v of stmt.vars) {
          frame.add(v.name);
          if (v.init) noteExpr(v.init);
        }
      } else {
        for (const expr of stmtExprs(stmt)) noteExpr(expr);
      }
      for (const child of childBodies(stmt)) walk(child);
    }
    frames.pop();
  };
  walk(body);
  return used;
}

/** Warn about registers that one body reaches through more than one spelling. */
export function reportAliasCollisions(
  used: ReadonlyMap<number, ReadonlySet<string>>,
  diagnostics: Diagnostic[],
  file: string,
): void {
  for (const [reg, spellings] of [...used].sort(([a], [b]) => a - b)) {
    if (spellings.size < 2) continue;
    const names = [...spellings].sort().map((s) => `"${s}"`);
    warnAt(
      diagnostics,
      DiagnosticIds.AliasCollision,
      file,
      `Register ${reg} is named both ${names.join(' and ')}.`,
    );
  }
}

/**
 * Variable scopes and scratch register allocation for one function body.
 *
 * Scratch registers the body names explicitly are never handed out. Allocation always
 * takes the lowest free id, so output is deterministic.
 */
export class RegisterScope {
  private readonly free: Record<NumericType, number[]>;
  private readonly frames: Array<Map<string, VarBinding>> = [new Map()];

  constructor(
    private readonly table: SignatureTable,
    usedRegs: ReadonlySet<number>,
  ) {
    this.free = {
      int: table.scratchRegisters('int').filter((r) => !usedRegs.has(r)),
      float: table.scratchRegisters('float').filter((r) => !usedRegs.has(r)),
    };
  }

  allocate(type: NumericType, what: string): number {
    const reg = this.free[type].shift();
    if (reg === undefined) {
      throw new LoweringError(
        DiagnosticIds.ScratchRegistersExhausted,
        `no ${type} scratch register left for ${what}`,
      );
    }
    return reg;
  }

  release(reg: number, type: NumericType): void {
    const pool = this.free[type];
    pool.push(reg);
    pool.sort((a, b) => a - b);
  }

  pushFrame(): void {
    this.frames.push(new Map());
  }

  /** Leave a block, releasing the registers of the locals it declared. */
  popFrame(): void {
    const frame = this.frames.pop();
    for (const binding of frame?.values() ?? []) this.release(binding.reg, binding.type);
  }

  declare(name: string, type: NumericType): VarBinding {
    const frame = this.frames[this.frames.length - 1];
    const existing = frame?.get(name);
    if (existing) this.release(existing.reg, existing.type);
    const binding: VarBinding = { name, reg: this.allocate(type, `local "${name}"`), type, local: true };
    frame?.set(name, binding);
    return binding;
  }

  /** Resolve a local (innermost first) or a register alias. */
  lookup(name: string): VarBinding | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const found = this.frames[i]?.get(name);
      if (found) return found;
    }
    const alias = this.table.registerByAlias(name);
    if (!alias) return undefined;
    return { name, reg: alias.id, type: alias.type ?? 'int', local: false };
  }
}
