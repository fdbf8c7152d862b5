import type { DiagnosticId, SourcePos } from '../diagnostics/types.js';

/**
 * Aborts lowering of the current statement.
 *
 * Thrown anywhere below a statement and reported once, with the statement's position,
 * by the statement loop of the flattener.
 */
export class LoweringError extends Error {
  constructor(
    readonly id: DiagnosticId,
    message: string,
    readonly pos?: SourcePos,
  ) {
    super(message);
    this.name = 'LoweringError';
  }
}
