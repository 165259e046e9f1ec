export type FormulaErrorCode =
  | 'MALFORMED_LINE'
  | 'UNDECLARED_VARIABLE'
  | 'DUPLICATE_QUANTIFICATION'
  | 'DEPTH_OUT_OF_RANGE'
  | 'STRUCTURAL_MISMATCH'
  | 'UNSUPPORTED_MERGE';

/**
 * Position in the input text, line and column are 1-based.
 */
export type SourceSpan = {
  offset: number;
  line: number;
  column: number;
};

export type FormulaErrorDetails = {
  code: FormulaErrorCode;
  message: string;
  span?: SourceSpan;
  variable?: number;
  expected?: string;
};

export class FormulaError extends Error {
  public readonly details: FormulaErrorDetails;

  public constructor(details: FormulaErrorDetails) {
    super(details.span ? `${details.message} (line ${details.span.line}, column ${details.span.column})` : details.message);
    this.name = 'FormulaError';
    this.details = details;
  }

  public get code(): FormulaErrorCode {
    return this.details.code;
  }
}

export function isFormulaError(error: unknown): error is FormulaError {
  return error instanceof FormulaError;
}

export function getSpan(input: string, offset: number): SourceSpan {
  const before = input.slice(0, offset);
  const lastNewline = before.lastIndexOf('\n');
  return {
    offset,
    line: before.split('\n').length,
    column: offset - lastNewline,
  };
}

export function createMalformedLineError(input: string, offset: number, expected?: string): FormulaError {
  return new FormulaError({
    code: 'MALFORMED_LINE',
    message: expected ? `Malformed line, expected ${expected}` : 'Malformed line',
    span: getSpan(input, offset),
    expected,
  });
}

export function createStructuralMismatchError(input: string, offset: number, message: string): FormulaError {
  return new FormulaError({
    code: 'STRUCTURAL_MISMATCH',
    message,
    span: getSpan(input, offset),
  });
}

export function createUndeclaredVariableError(
  input: string,
  offset: number,
  variable: number,
  declared: number,
): FormulaError {
  return new FormulaError({
    code: 'UNDECLARED_VARIABLE',
    message: `Variable ${variable} is outside the declared range 1..${declared}`,
    span: getSpan(input, offset),
    variable,
  });
}

export function createDuplicateQuantificationError(input: string, offset: number, variable: number): FormulaError {
  return new FormulaError({
    code: 'DUPLICATE_QUANTIFICATION',
    message: `Variable ${variable} is quantified more than once`,
    span: getSpan(input, offset),
    variable,
  });
}

export function createDepthOutOfRangeError(depth: number, available: number): FormulaError {
  return new FormulaError({
    code: 'DEPTH_OUT_OF_RANGE',
    message: `Split depth ${depth} is out of range, the quantifier prefix has ${available} variables`,
  });
}

export function createUnsupportedMergeError(message: string, variable?: number): FormulaError {
  return new FormulaError({
    code: 'UNSUPPORTED_MERGE',
    message,
    variable,
  });
}
