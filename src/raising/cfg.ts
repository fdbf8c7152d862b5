import type { CondGotoStmt, GotoStmt, Stmt } from '../ir/types.js';

/** A straight-line run of a flat body: statements `start` up to, not including, `end`. */
export interface BasicBlock {
  start: number;
  end: number;
  /** Indices into the arena. */
  succs: number[];
  preds: number[];
}

/**
 * Basic blocks of one flat body, addressed by index.
 *
 * A block starts at the first statement, at a run of labels and after every jump.
 */
export interface BlockArena {
  blocks: BasicBlock[];
  /** Block index of each flat statement. */
  blockOf: number[];
  /** Flat index of the first `Label` statement of each name. */
  labelAt: Map<string, number>;
}

function isJump(stmt: Stmt | undefined): stmt is GotoStmt | CondGotoStmt {
  return stmt?.kind === 'Goto' || stmt?.kind === 'CondGoto';
}

export function buildBlockArena(flat: readonly Stmt[]): BlockArena {
  const labelAt = new Map<string, number>();
  const starts: number[] = [];
  flat.forEach((stmt, i) => {
    if (stmt.kind === 'Label' && !labelAt.has(stmt.name)) labelAt.set(stmt.name, i);
    const prev = flat[i - 1];
    if (i === 0 || isJump(prev) || (stmt.kind === 'Label' && prev?.kind !== 'Label')) starts.push(i);
  });

  const blockOf: number[] = [];
  const blocks = starts.map((start, b): BasicBlock => {
    const end = starts[b + 1] ?? flat.length;
    for (let i = start; i < end; i++) blockOf.push(b);
    return { start, end, succs: [], preds: [] };
  });

  const link = (from: number, to: number | undefined): void => {
    const source = blocks[from];
    const target = to === undefined ? undefined : blocks[to];
    if (!source || !target || to === undefined || source.succs.includes(to)) return;
    source.succs.push(to);
    target.preds.push(from);
  };
  blocks.forEach((block, b) => {
    const last = flat[block.end - 1];
    if (isJump(last)) {
      const target = labelAt.get(last.label);
      link(b, target === undefined ? undefined : blockOf[target]);
    }
    // A guarded goto still falls through on the other difficulties.
    const unconditional = last?.kind === 'Goto' && last.diffLabel === undefined;
    if (!unconditional) link(b, b + 1);
  });
  return { blocks, blockOf, labelAt };
}
