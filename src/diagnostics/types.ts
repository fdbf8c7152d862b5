/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source position.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `ETK101`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Source document, signature source or function the diagnostic belongs to. */
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * Ranges: 0xx I/O and input documents, 1xx signatures, 2xx argument codec,
 * 3xx lowering and 5xx binary layout.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'ETK000',

  /** Failed to read an input file from disk. */
  IoReadFailed: 'ETK001',

  /** Input document is not valid JSON or does not match its schema. */
  InputInvalid: 'ETK002',

  /** A signature source document does not match the source schema. */
  SignatureSourceInvalid: 'ETK003',

  /** Unknown format name (no built-in layout). */
  UnknownFormat: 'ETK004',

  /** Malformed signature text. */
  SignatureSyntax: 'ETK100',

  /** Malformed intrinsic text, or an intrinsic bound to an opcode with no signature. */
  IntrinsicSyntax: 'ETK101',

  /** A signature cannot realize the operand roles of its bound intrinsic. */
  IntrinsicSignatureError: 'ETK102',

  /** The same enum member is bound to two different values across sources. */
  EnumValueConflict: 'ETK103',

  /** Opcode has no signature in the active table. */
  UnknownOpcode: 'ETK200',

  /** Argument count does not match the signature. */
  ArgCountMismatch: 'ETK201',

  /** Argument value does not fit its slot type. */
  TypeMismatch: 'ETK202',

  /** Register operand used in a format whose layout has no parameter mask. */
  RegisterUnsupportedInFormat: 'ETK203',

  /** Unknown enum, enum member, register alias, name or instruction name. */
  UnknownName: 'ETK204',

  /** Blob did not match the signature; the instruction was kept in pseudo form. */
  ArgDecodeFallback: 'ETK205',

  /** Two spellings refer to the same register within one body (warning). */
  AliasCollision: 'ETK300',

  /** `break` used outside of any loop. */
  BreakOutsideLoop: 'ETK301',

  /** No opcode in the active table implements the requested intrinsic. */
  IntrinsicNotEncodable: 'ETK302',

  /** A label is defined twice in one body. */
  DuplicateLabel: 'ETK303',

  /** A jump or label property names a label that is not defined. */
  UndefinedLabel: 'ETK304',

  /** No scratch register of the needed type is free. */
  ScratchRegistersExhausted: 'ETK305',

  /** Difficulty switch or guard in a format without difficulty masks. */
  DifficultyUnsupported: 'ETK306',

  /** Division or modulo by zero in a constant expression. */
  ConstDivideByZero: 'ETK307',

  /** Expression shape cannot be lowered (e.g. a string in arithmetic). */
  UnsupportedExpression: 'ETK308',

  /** Malformed or truncated binary instruction stream. */
  BinaryFormatError: 'ETK500',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Source position attached to IR statements by the front end.
 */
export interface SourcePos {
  line: number;
  column?: number;
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/** Push an error diagnostic, with a position when one is known. */
export function diagAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  file: string,
  message: string,
  pos?: SourcePos,
): void {
  diagnostics.push({
    id,
    severity: 'error',
    message,
    file,
    ...(pos ? { line: pos.line } : {}),
    ...(pos?.column !== undefined ? { column: pos.column } : {}),
  });
}

/** Push a warning diagnostic, with a position when one is known. */
export function warnAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  file: string,
  message: string,
  pos?: SourcePos,
): void {
  diagnostics.push({
    id,
    severity: 'warning',
    message,
    file,
    ...(pos ? { line: pos.line } : {}),
    ...(pos?.column !== undefined ? { column: pos.column } : {}),
  });
}
