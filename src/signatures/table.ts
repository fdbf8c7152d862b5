import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds, diagAt } from '../diagnostics/types.js';
import type { NumericType } from '../ir/ops.js';
import { mergeEnums, type MergedEnum } from './enums.js';
import { deriveOperandRoles } from './intrinsics.js';
import { intrinsicKey, parseIntrinsicText, parseSignatureText } from './parse.js';
import type {
  InstrLayout,
  IntFieldType,
  IntrinsicBinding,
  IntrinsicKind,
  RegisterInfo,
  Signature,
  SignatureSource,
} from './types.js';

/** Letters of the difficulty mask bits when no source names them. */
export const DEFAULT_DIFFICULTY_LETTERS: readonly string[] = ['E', 'N', 'H', 'L', 'X', '5', '6', '7'];

function fieldBits(type: IntFieldType): number {
  return Number.parseInt(type.slice(1), 10);
}

interface SignatureTableInit {
  layout: InstrLayout;
  signatures: Map<number, Signature>;
  intrinsicOpcodes: Map<string, number>;
  insNames: Map<number, string>;
  enums: Map<string, MergedEnum>;
  registers: Map<number, RegisterInfo>;
  difficultyLetters: string[];
}

/**
 * Immutable registry of everything the codec, flattener and structurer need to know
 * about one format: signatures, intrinsic bindings, names, enums, registers and the
 * binary instruction layout.
 *
 * Build it once with {@link buildSignatureTable} and pass it to every call.
 */
export class SignatureTable {
  readonly layout: InstrLayout;
  /** Whether instructions carry a parameter mask, i.e. may take register operands. */
  readonly hasRegisters: boolean;
  /** Width in bits of the difficulty mask, or 0 when the layout has none. */
  readonly difficultyBits: number;
  readonly difficultyLetters: readonly string[];

  private readonly signatures: ReadonlyMap<number, Signature>;
  private readonly intrinsicOpcodes: ReadonlyMap<string, number>;
  private readonly insNames: ReadonlyMap<number, string>;
  private readonly insOpcodes: ReadonlyMap<string, number>;
  private readonly enums: ReadonlyMap<string, MergedEnum>;
  private readonly registers: ReadonlyMap<number, RegisterInfo>;
  private readonly aliases: ReadonlyMap<string, RegisterInfo>;

  constructor(init: SignatureTableInit) {
    this.layout = init.layout;
    this.hasRegisters = init.layout.header.some((f) => f.field === 'paramMask');
    const diffField = init.layout.header.find((f) => f.field === 'difficulty');
    this.difficultyBits = diffField ? fieldBits(diffField.type) : 0;
    this.difficultyLetters = Object.freeze(init.difficultyLetters.slice(0, this.difficultyBits));
    this.signatures = init.signatures;
    this.intrinsicOpcodes = init.intrinsicOpcodes;
    this.insNames = init.insNames;
    this.insOpcodes = new Map([...init.insNames].map(([opcode, name]) => [name, opcode]));
    this.enums = init.enums;
    this.registers = init.registers;
    const aliases = new Map<string, RegisterInfo>();
    for (const reg of init.registers.values()) {
      if (reg.name !== undefined) aliases.set(reg.name, reg);
    }
    this.aliases = aliases;
    Object.freeze(this);
  }

  resolve(opcode: number): Signature | undefined {
    return this.signatures.get(opcode);
  }

  opcodes(): number[] {
    return [...this.signatures.keys()].sort((a, b) => a - b);
  }

  /** Opcode implementing an intrinsic, if any opcode binds it. */
  opcodeForIntrinsic(kind: IntrinsicKind): number | undefined {
    return this.intrinsicOpcodes.get(intrinsicKey(kind));
  }

  intrinsicFor(opcode: number): IntrinsicBinding | undefined {
    return this.signatures.get(opcode)?.intrinsic;
  }

  insName(opcode: number): string | undefined {
    return this.insNames.get(opcode);
  }

  opcodeForName(name: string): number | undefined {
    return this.insOpcodes.get(name);
  }

  enumTable(name: string): MergedEnum | undefined {
    return this.enums.get(name);
  }

  enumNames(): string[] {
    return [...this.enums.keys()];
  }

  register(id: number): RegisterInfo | undefined {
    return this.registers.get(id);
  }

  registerByAlias(name: string): RegisterInfo | undefined {
    return this.aliases.get(name);
  }

  /** Scratch registers of a type, in ascending id order. */
  scratchRegisters(type: NumericType): number[] {
    return [...this.registers.values()]
      .filter((r) => r.scratch && r.type === type)
      .map((r) => r.id)
      .sort((a, b) => a - b);
  }

  /** Mask with every difficulty bit set. */
  fullDifficultyMask(): number {
    return this.difficultyBits === 0 ? 0 : 2 ** this.difficultyBits - 1;
  }
}

function parseOpcodeKey(
  key: string,
  diagnostics: Diagnostic[],
  file: string,
): number | undefined {
  if (/^\d+$/.test(key)) {
    const n = Number.parseInt(key, 10);
    if (n <= 0xffff) return n;
  }
  diagAt(diagnostics, DiagnosticIds.SignatureSyntax, file, `Invalid opcode "${key}".`);
  return undefined;
}

function parseRegisterKey(key: string, diagnostics: Diagnostic[], file: string): number | undefined {
  if (/^-?\d+$/.test(key)) return Number.parseInt(key, 10);
  diagAt(diagnostics, DiagnosticIds.SignatureSyntax, file, `Invalid register id "${key}".`);
  return undefined;
}

/**
 * Merge signature sources, in order, into a {@link SignatureTable}.
 *
 * Later sources replace signatures, intrinsic bindings, names and register entries of
 * earlier ones; enums accumulate (see {@link mergeEnums}). Malformed entries are
 * reported and skipped, so one bad signature does not hide the rest of the table.
 */
export function buildSignatureTable(
  layout: InstrLayout,
  sources: readonly SignatureSource[],
  diagnostics: Diagnostic[],
): SignatureTable {
  const signatureTexts = new Map<number, { text: string; file: string }>();
  const intrinsicTexts = new Map<number, { text: string; file: string; order: number }>();
  const insNames = new Map<number, string>();
  const registers = new Map<number, RegisterInfo>();
  let difficultyLetters: string[] = [...DEFAULT_DIFFICULTY_LETTERS];
  let order = 0;

  sources.forEach((source, sourceIndex) => {
    const file = source.name ?? `<source ${sourceIndex}>`;
    for (const [key, text] of Object.entries(source.signatures ?? {})) {
      const opcode = parseOpcodeKey(key, diagnostics, file);
      if (opcode === undefined) continue;
      if (text === null) {
        signatureTexts.delete(opcode);
        intrinsicTexts.delete(opcode);
      } else {
        signatureTexts.set(opcode, { text, file });
      }
    }
    for (const [key, text] of Object.entries(source.intrinsics ?? {})) {
      const opcode = parseOpcodeKey(key, diagnostics, file);
      if (opcode === undefined) continue;
      intrinsicTexts.set(opcode, { text, file, order: order++ });
    }
    for (const [key, name] of Object.entries(source.insNames ?? {})) {
      const opcode = parseOpcodeKey(key, diagnostics, file);
      if (opcode === undefined) continue;
      for (const [other, otherName] of insNames) {
        if (otherName === name) insNames.delete(other);
      }
      insNames.set(opcode, name);
    }
    for (const [key, entry] of Object.entries(source.registers ?? {})) {
      const id = parseRegisterKey(key, diagnostics, file);
      if (id === undefined) continue;
      const prev = registers.get(id);
      const name = entry.name ?? prev?.name;
      const type = entry.type ?? prev?.type;
      registers.set(id, {
        id,
        ...(name !== undefined ? { name } : {}),
        ...(type !== undefined ? { type } : {}),
        scratch: entry.scratch ?? prev?.scratch ?? false,
      });
      if (entry.name === undefined) continue;
      // A later alias for a name takes the name away from the register that had it.
      for (const other of registers.values()) {
        if (other.id === id || other.name !== entry.name) continue;
        registers.set(other.id, {
          id: other.id,
          scratch: other.scratch,
          ...(other.type ? { type: other.type } : {}),
        });
      }
    }
    if (source.difficultyFlags) difficultyLetters = [...source.difficultyFlags];
  });

  const enums = mergeEnums(
    sources.map((s, i) => ({ source: s.name ?? `<source ${i}>`, enums: s.enums ?? {} })),
    diagnostics,
  );

  const signatures = new Map<number, Signature>();
  const bound: Array<{ opcode: number; binding: IntrinsicBinding; order: number }> = [];
  for (const opcode of [...signatureTexts.keys()].sort((a, b) => a - b)) {
    const entry = signatureTexts.get(opcode);
    if (!entry) continue;
    const slots = parseSignatureText(entry.text, diagnostics, entry.file, opcode);
    if (!slots) continue;
    for (const slot of slots) {
      if (slot.enumName !== undefined && !enums.has(slot.enumName)) {
        diagAt(
          diagnostics,
          DiagnosticIds.UnknownName,
          entry.file,
          `Signature for opcode ${opcode} names unknown enum "${slot.enumName}".`,
        );
      }
    }
    const signature: Signature = { opcode, text: entry.text, slots: Object.freeze(slots) };

    const intrinsicEntry = intrinsicTexts.get(opcode);
    if (intrinsicEntry) {
      const kind = parseIntrinsicText(intrinsicEntry.text);
      if (typeof kind === 'string') {
        diagAt(diagnostics, DiagnosticIds.IntrinsicSyntax, intrinsicEntry.file, `Opcode ${opcode}: ${kind}`);
      } else {
        const roles = deriveOperandRoles(kind, slots);
        if (typeof roles === 'string') {
          diagAt(
            diagnostics,
            DiagnosticIds.IntrinsicSignatureError,
            intrinsicEntry.file,
            `Bad signature "${entry.text}" for intrinsic ${intrinsicKey(kind)} on opcode ${opcode}: ${roles}`,
          );
        } else {
          const binding: IntrinsicBinding = { intrinsic: kind, key: intrinsicKey(kind), roles };
          signature.intrinsic = binding;
          bound.push({ opcode, binding, order: intrinsicEntry.order });
        }
      }
    }
    signatures.set(opcode, Object.freeze(signature));
  }

  for (const [opcode, entry] of intrinsicTexts) {
    if (!signatureTexts.has(opcode)) {
      diagAt(
        diagnostics,
        DiagnosticIds.IntrinsicSyntax,
        entry.file,
        `Intrinsic ${entry.text} is bound to opcode ${opcode}, which has no signature.`,
      );
    }
  }

  const intrinsicOpcodes = new Map<string, number>();
  for (const { opcode, binding } of bound.sort((a, b) => a.order - b.order)) {
    intrinsicOpcodes.set(binding.key, opcode);
  }

  return new SignatureTable({
    layout,
    signatures,
    intrinsicOpcodes,
    insNames,
    enums,
    registers,
    difficultyLetters,
  });
}
