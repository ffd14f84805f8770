// Failure conditions of a parse. Every one of them is terminal: the parser
// stops at the first offending line and hands back no partial tree.
export type DisasmErrorKind =
  | 'EmptyInput'
  | 'MalformedHeader'
  | 'UnrecognizedLine'
  | 'MissingSection'
  | 'MissingSymbol'
  | 'IoFailure';

export class DisasmError extends Error {
  constructor(
    public readonly kind: DisasmErrorKind,
    message: string,
    public readonly line?: string,       // verbatim offending line, when there is one
    public readonly lineNumber?: number, // 1-based, counted over the raw input (blank lines included)
  ) {
    super(message);
    this.name = 'DisasmError';
  }

  static emptyInput(): DisasmError {
    return new DisasmError('EmptyInput', 'the input does not contain any text');
  }

  static malformedHeader(line: string, lineNumber?: number): DisasmError {
    return new DisasmError('MalformedHeader', `incorrect format for the first line: '${line}'`, line, lineNumber);
  }

  static unrecognizedLine(line: string, lineNumber?: number): DisasmError {
    return new DisasmError('UnrecognizedLine', `unrecognized format for the following line: '${line}'`, line, lineNumber);
  }

  static missingSection(what: 'symbol' | 'instruction', line?: string, lineNumber?: number): DisasmError {
    return new DisasmError('MissingSection', `attempted to add ${what === 'symbol' ? 'a symbol' : 'an instruction'} without first defining a section`, line, lineNumber);
  }

  static missingSymbol(line?: string, lineNumber?: number): DisasmError {
    return new DisasmError('MissingSymbol', 'attempted to add an instruction without first defining a symbol', line, lineNumber);
  }

  static ioFailure(message: string): DisasmError {
    return new DisasmError('IoFailure', message);
  }

  // Same error with the position of the line that caused it filled in.
  at(line: string, lineNumber: number): DisasmError {
    if (this.line !== undefined && this.lineNumber !== undefined) return this;
    return new DisasmError(this.kind, this.message, this.line ?? line, this.lineNumber ?? lineNumber);
  }
}

export function isDisasmError(value: unknown, kind?: DisasmErrorKind): value is DisasmError {
  return value instanceof DisasmError && (kind === undefined || value.kind === kind);
}
