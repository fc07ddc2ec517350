export type CompileErrorCode =
  | 'ARRAY_NOT_FOUND'
  | 'MALFORMED_ELEMENT'
  | 'NO_ENTRIES'
  | 'UNKNOWN_REFERENCE'
  | 'INVARIANT_VIOLATION';

/**
 * Base class for failures that abort a filter-band compile.
 * Recoverable conditions are reported as warnings instead.
 */
export class FilterBandCompileError extends Error {
  readonly code: CompileErrorCode;

  constructor(code: CompileErrorCode, message: string) {
    super(message);
    this.name = 'FilterBandCompileError';
    this.code = code;
  }
}

/** The named array literal is not in the source at all */
export class ArrayLiteralNotFoundError extends FilterBandCompileError {
  readonly arrayName: string;

  constructor(arrayName: string) {
    super('ARRAY_NOT_FOUND', `Could not locate ${arrayName} array literal in firmware source`);
    this.name = 'ArrayLiteralNotFoundError';
    this.arrayName = arrayName;
  }
}

export class MalformedArrayElementError extends FilterBandCompileError {
  readonly index: number;
  readonly line: number;

  constructor(index: number, line: number, text: string) {
    const snippet = text.replace(/\s+/g, ' ').trim().slice(0, 120);
    super('MALFORMED_ELEMENT', `Array element ${index} (line ${line}) does not match the filter-band layout: ${snippet}`);
    this.name = 'MalformedArrayElementError';
    this.index = index;
    this.line = line;
  }
}

/** The array literal was found but held no elements */
export class EmptyFilterTableError extends FilterBandCompileError {
  constructor(arrayName: string) {
    super('NO_ENTRIES', `No entries parsed for ${arrayName}`);
    this.name = 'EmptyFilterTableError';
  }
}

export class UnknownReferenceError extends FilterBandCompileError {
  readonly field: string;
  readonly token: string;

  constructor(field: string, token: string, index: number) {
    super('UNKNOWN_REFERENCE', `Entry ${index}: unknown ${field} '${token}'`);
    this.name = 'UnknownReferenceError';
    this.field = field;
    this.token = token;
  }
}

export class ModelInvariantError extends FilterBandCompileError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'ModelInvariantError';
  }
}
