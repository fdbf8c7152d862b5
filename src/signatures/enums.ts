import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt } from '../diagnostics/types.js';

/** One source's enum definitions. */
export interface EnumContribution {
  source: string;
  enums: Record<string, Record<string, number>>;
}

/** Merged enum: member name to value, plus the reverse mapping used by decoding. */
export interface MergedEnum {
  readonly name: string;
  readonly members: ReadonlyMap<string, number>;
  readonly byValue: ReadonlyMap<number, string>;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Accumulate enum definitions from several sources into one table per enum.
 *
 * Enums are open: every contribution adds members. The result does not depend on the
 * order of contributions unless they conflict; a member bound to two different values
 * is reported as `EnumValueConflict` and keeps its first value. When several members
 * share a value, the reverse mapping picks the smallest name so decoding is stable too.
 */
export function mergeEnums(
  contributions: readonly EnumContribution[],
  diagnostics: Diagnostic[],
): Map<string, MergedEnum> {
  const members = new Map<string, Map<string, { value: number; source: string }>>();
  for (const contribution of contributions) {
    for (const [enumName, defs] of Object.entries(contribution.enums)) {
      let table = members.get(enumName);
      if (!table) {
        table = new Map();
        members.set(enumName, table);
      }
      for (const [member, value] of Object.entries(defs)) {
        const prev = table.get(member);
        if (prev === undefined) {
          table.set(member, { value, source: contribution.source });
          continue;
        }
        if (prev.value !== value) {
          diagAt(
            diagnostics,
            DiagnosticIds.EnumValueConflict,
            contribution.source,
            `Enum member ${enumName}.${member} is ${value} here but ${prev.value} in "${prev.source}".`,
          );
        }
      }
    }
  }

  const out = new Map<string, MergedEnum>();
  for (const enumName of [...members.keys()].sort(compareNames)) {
    const table = members.get(enumName) ?? new Map<string, { value: number }>();
    const sortedMembers = [...table.entries()].sort(([a], [b]) => compareNames(a, b));
    const byName = new Map<string, number>();
    const byValue = new Map<number, string>();
    for (const [member, { value }] of sortedMembers) {
      byName.set(member, value);
      if (!byValue.has(value)) byValue.set(value, member);
    }
    out.set(enumName, { name: enumName, members: byName, byValue });
  }
  return out;
}
