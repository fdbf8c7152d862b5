import type { NumericType } from '../ir/ops.js';

export interface RegisterSymbol {
  kind: 'register';
  name: string;
  register: number;
  type: NumericType;
  /** `local` for declared variables, `alias` for table aliases. */
  scope: 'local' | 'alias';
}

export interface ConstantSymbol {
  kind: 'constant';
  name: string;
  value: number;
}

export interface LabelSymbol {
  kind: 'label';
  name: string;
  offset: number;
  time: number;
}

export type DebugSymbol = RegisterSymbol | ConstantSymbol | LabelSymbol;

/**
 * Debug info of one compiled function.
 *
 * Consumers must ignore symbol kinds and keys they do not know.
 */
export interface FunctionDebugInfo {
  name: string;
  symbols: DebugSymbol[];
}

function symbolKey(symbol: DebugSymbol): string {
  switch (symbol.kind) {
    case 'register':
      return `register:${symbol.scope}:${symbol.name}:${symbol.register}`;
    case 'constant':
      return `constant:${symbol.name}`;
    case 'label':
      return `label:${symbol.name}`;
  }
}

/** Collects symbols while a function is lowered; duplicates are kept once. */
export class DebugInfoBuilder {
  private readonly symbols = new Map<string, DebugSymbol>();

  constructor(private readonly name: string) {}

  add(symbol: DebugSymbol): void {
    const key = symbolKey(symbol);
    if (!this.symbols.has(key)) this.symbols.set(key, symbol);
  }

  build(): FunctionDebugInfo {
    return { name: this.name, symbols: [...this.symbols.values()] };
  }
}

/** Order symbols by kind, then name, then register. */
export function sortSymbols(symbols: readonly DebugSymbol[]): DebugSymbol[] {
  return [...symbols].sort((a, b) => {
    if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    const ra = a.kind === 'register' ? a.register : 0;
    const rb = b.kind === 'register' ? b.register : 0;
    return ra - rb;
  });
}
