/**
 * Severity level for a diagnostic. Every condition diagnosed today is an error.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic with an optional source location.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `LOL301`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 *
 * `LOL0xx` are driver/I-O problems, `LOL1xx` lexical, `LOL2xx` syntax, `LOL3xx` semantic.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'LOL000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'LOL001',

  /** Unexpected exception inside a pipeline stage. */
  InternalError: 'LOL002',

  /** Entry file does not carry the `.lol` extension. */
  InvalidEntryExtension: 'LOL003',

  /** `#WORD` outside the closed hashtag-word set. */
  UnrecognizedHashWord: 'LOL100',

  /** `#OBTW` comment reaches end of input without `#TLDR`. */
  UnclosedComment: 'LOL101',

  /** Generic syntax error (expected token not found, malformed section/style). */
  ParseError: 'LOL200',

  /** Anything other than blank lines after `#KTHXBYE`. */
  TrailingTokens: 'LOL201',

  /** Same name declared twice in one scope. */
  VariableRedeclared: 'LOL300',

  /** Reference to a name no enclosing scope declares. */
  VariableUndeclared: 'LOL301',

  /** Reference to a declared name that never received a value. */
  VariableUnassigned: 'LOL302',

  /** Assignment whose declaration left scope before the value arrived. */
  AssignToUndeclared: 'LOL303',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Thrown by the lexer and parser for conditions that end a stage immediately.
 *
 * Stage entry points catch it and push the diagnostic onto the regular diagnostics list.
 */
export class DiagnosticError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = 'DiagnosticError';
    this.diagnostic = diagnostic;
  }
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
