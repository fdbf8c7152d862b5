import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt } from '../diagnostics/types.js';
import {
  isArithOp,
  isAssignOp,
  isComparisonOp,
  isUnopKind,
  type NumericType,
} from '../ir/ops.js';
import type { ArgSlot, IntrinsicKind } from './types.js';

type SlotTemplate = Omit<ArgSlot, 'letter' | 'enumName' | 'stringLen' | 'stringBlockSize'>;

const SLOT_LETTERS: Readonly<Record<string, SlotTemplate>> = {
  S: { type: 'int', width: 4, role: 'value' },
  s: { type: 'int', width: 2, role: 'value' },
  b: { type: 'int', width: 1, role: 'value' },
  C: { type: 'int', width: 4, role: 'color' },
  f: { type: 'float', width: 4, role: 'value' },
  _: { type: 'int', width: 4, role: 'padding' },
  '-': { type: 'int', width: 1, role: 'padding' },
  o: { type: 'int', width: 4, role: 'jumpOffset' },
  t: { type: 'int', width: 4, role: 'jumpTime' },
  n: { type: 'int', width: 4, role: 'sprite' },
  N: { type: 'int', width: 4, role: 'script' },
  E: { type: 'int', width: 4, role: 'sub' },
  z: { type: 'string', width: 0, role: 'string' },
};

/** Human-readable name of a slot, used in diagnostics. */
export function describeSlot(slot: ArgSlot): string {
  switch (slot.role) {
    case 'padding':
      return 'padding';
    case 'jumpOffset':
      return "jump offset ('o')";
    case 'jumpTime':
      return "jump time ('t')";
    case 'string':
      return 'string';
    default:
      return slot.type === 'float' ? 'float' : `${slot.width * 8}-bit ${slot.role}`;
  }
}

function parseAttrs(body: string): Map<string, string> | string {
  const out = new Map<string, string>();
  for (const part of body.split(';')) {
    const trimmed = part.trim();
    if (trimmed.length === 0) continue;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) return `expected key=value in "${trimmed}"`;
    const key = trimmed.slice(0, eq).trim();
    let value = trimmed.slice(eq + 1).trim();
    if (value.startsWith('"')) {
      if (value.length < 2 || !value.endsWith('"')) return `unterminated string in "${trimmed}"`;
      value = value.slice(1, -1);
    }
    if (out.has(key)) return `duplicate attribute "${key}"`;
    out.set(key, value);
  }
  return out;
}

function positiveInt(text: string): number | undefined {
  if (!/^\d+$/.test(text)) return undefined;
  const n = Number.parseInt(text, 10);
  return n > 0 ? n : undefined;
}

function buildSlot(letter: string, attrs: Map<string, string>): ArgSlot | string {
  const template = SLOT_LETTERS[letter];
  if (!template) return `unknown signature letter '${letter}'`;
  const slot: ArgSlot = { letter, ...template };
  for (const [key, value] of attrs) {
    if (key === 'enum' && template.role === 'value' && template.type === 'int') {
      slot.enumName = value;
    } else if (key === 'len' && template.type === 'string') {
      const n = positiveInt(value);
      if (n === undefined) return `invalid string length "${value}"`;
      slot.stringLen = n;
    } else if (key === 'bs' && template.type === 'string') {
      const n = positiveInt(value);
      if (n === undefined) return `invalid block size "${value}"`;
      slot.stringBlockSize = n;
    } else {
      return `attribute "${key}" is not valid for '${letter}'`;
    }
  }
  if (slot.type === 'string' && slot.stringLen === undefined) {
    slot.stringBlockSize = slot.stringBlockSize ?? 4;
  }
  return slot;
}

/**
 * Parse signature text (`"SS(enum=\"Blend\")f_"`) into slot descriptors.
 *
 * Reports `SignatureSyntax` and returns `undefined` on malformed text.
 */
export function parseSignatureText(
  text: string,
  diagnostics: Diagnostic[],
  file: string,
  opcode: number,
): ArgSlot[] | undefined {
  const slots: ArgSlot[] = [];
  let i = 0;
  const fail = (message: string): undefined => {
    diagAt(
      diagnostics,
      DiagnosticIds.SignatureSyntax,
      file,
      `Bad signature "${text}" for opcode ${opcode}: ${message}`,
    );
    return undefined;
  };

  while (i < text.length) {
    const letter = text.charAt(i);
    i++;
    if (/\s/.test(letter)) continue;
    let attrs = new Map<string, string>();
    if (text.charAt(i) === '(') {
      const close = text.indexOf(')', i);
      if (close < 0) return fail(`unclosed '(' after '${letter}'`);
      const parsed = parseAttrs(text.slice(i + 1, close));
      if (typeof parsed === 'string') return fail(parsed);
      attrs = parsed;
      i = close + 1;
    }
    const slot = buildSlot(letter, attrs);
    if (typeof slot === 'string') return fail(slot);
    slots.push(slot);
  }
  return slots;
}

function parseNumericType(text: string | undefined): NumericType | undefined {
  return text === 'int' || text === 'float' ? text : undefined;
}

/**
 * Parse intrinsic text such as `CondJmp(op="<";type="int")`.
 *
 * Returns an error message instead of a kind when the text is malformed.
 */
export function parseIntrinsicText(text: string): IntrinsicKind | string {
  const trimmed = text.trim();
  const open = trimmed.indexOf('(');
  const name = open < 0 ? trimmed : trimmed.slice(0, open).trim();
  let attrs = new Map<string, string>();
  if (open >= 0) {
    if (!trimmed.endsWith(')')) return `missing ')' in "${text}"`;
    const parsed = parseAttrs(trimmed.slice(open + 1, -1));
    if (typeof parsed === 'string') return parsed;
    attrs = parsed;
  }
  const op = attrs.get('op');
  const type = parseNumericType(attrs.get('type'));
  const expectAttrs = (...keys: string[]): string | undefined => {
    for (const key of attrs.keys()) {
      if (!keys.includes(key)) return `unexpected attribute "${key}" for ${name}`;
    }
    for (const key of keys) {
      if (!attrs.has(key)) return `${name} requires attribute "${key}"`;
    }
    if (keys.includes('type') && type === undefined) {
      return `invalid type "${attrs.get('type') ?? ''}" (expected int|float)`;
    }
    return undefined;
  };

  switch (name) {
    case 'Jmp':
    case 'InterruptLabel':
    case 'CountJmp': {
      const err = expectAttrs();
      return err ?? { kind: name };
    }
    case 'AssignOp': {
      const err = expectAttrs('op', 'type');
      if (err) return err;
      if (op === undefined || !isAssignOp(op) || type === undefined) {
        return `invalid assignment op "${op ?? ''}"`;
      }
      return { kind: 'AssignOp', op, type };
    }
    case 'Binop': {
      const err = expectAttrs('op', 'type');
      if (err) return err;
      if (op === undefined || !(isArithOp(op) || isComparisonOp(op)) || type === undefined) {
        return `invalid binary op "${op ?? ''}"`;
      }
      return { kind: 'Binop', op, type };
    }
    case 'Unop': {
      const err = expectAttrs('op', 'type');
      if (err) return err;
      if (op === undefined || !isUnopKind(op) || type === undefined) {
        return `invalid unary op "${op ?? ''}"`;
      }
      return { kind: 'Unop', op, type };
    }
    case 'CondJmp': {
      const err = expectAttrs('op', 'type');
      if (err) return err;
      if (op === undefined || !isComparisonOp(op) || type === undefined) {
        return `invalid comparison op "${op ?? ''}"`;
      }
      return { kind: 'CondJmp', op, type };
    }
    default:
      return `unknown intrinsic "${name}"`;
  }
}

/** Canonical text of an intrinsic; the same kind always yields the same key. */
export function intrinsicKey(kind: IntrinsicKind): string {
  switch (kind.kind) {
    case 'Jmp':
    case 'InterruptLabel':
    case 'CountJmp':
      return `${kind.kind}()`;
    default:
      return `${kind.kind}(op="${kind.op}";type="${kind.type}")`;
  }
}
