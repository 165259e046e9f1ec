import {
  createDuplicateQuantificationError,
  createMalformedLineError,
  createStructuralMismatchError,
  createUndeclaredVariableError,
} from './ErrorUtil';
import type { FormulaError } from './ErrorUtil';
import type { AssumptionLine, Clause, Formula, IntegerConstraint, QuantifierBlock } from './FormulaUtil';
import type { Located, RawConstraint, RawDocument } from './GrammarUtil';
import { extractDocument, matchQdimacs } from './GrammarUtil';
import { getLogger } from './LogUtil';

const logger = getLogger('Parse');

// A line consisting of integers (with an optional quantifier) that was not closed with a 0
const UNTERMINATED_LINE = /^\s*(?:[ae]\s+)?-?\d+(?:\s+-?\d+)*\s*$/u;
const FAILURE_MESSAGE = /^Line (\d+), col (\d+): (.*)$/u;

/**
 * Parses the extended (Q)DIMACS text into a validated {@link Formula}.
 * Throws a {@link FormulaError} pointing at the offending line and column.
 */
export function parseQdimacs(input: string): Formula {
  const match = matchQdimacs(input);
  if (match.failed()) {
    throw toGrammarError(input, match.shortMessage ?? '');
  }
  const raw = extractDocument(match);
  const formula = validateDocument(input, raw);
  logger.debug(`Parsed ${formula.quantifiers.length} quantifier blocks and ${formula.clauses.length} clauses`);
  return formula;
}

function toGrammarError(input: string, message: string): FormulaError {
  const parsed = FAILURE_MESSAGE.exec(message);
  if (!parsed) {
    return createMalformedLineError(input, 0, message);
  }
  const [ , line, column, expected ] = parsed;
  const offset = toOffset(input, Number.parseInt(line, 10), Number.parseInt(column, 10));

  if (offset >= input.length) {
    return createStructuralMismatchError(input, offset, `Premature end of input, ${expected}`);
  }
  const lineStart = input.lastIndexOf('\n', offset - 1) + 1;
  const lineEnd = input.indexOf('\n', offset);
  const lineText = input.slice(lineStart, lineEnd < 0 ? input.length : lineEnd).replace(/\r$/u, '');
  if (offset - lineStart >= lineText.length && UNTERMINATED_LINE.test(lineText)) {
    return createStructuralMismatchError(input, offset, 'Line is missing its terminating 0');
  }
  return createMalformedLineError(input, offset, expected.replace(/^expected /u, ''));
}

function toOffset(input: string, line: number, column: number): number {
  let offset = 0;
  for (let current = 1; current < line; ++current) {
    const newline = input.indexOf('\n', offset);
    if (newline < 0) {
      return input.length;
    }
    offset = newline + 1;
  }
  return Math.min(offset + column - 1, input.length);
}

function validateVariable(input: string, variable: Located<number>, declared: number): number {
  const id = Math.abs(variable.value);
  if (id < 1 || id > declared) {
    throw createUndeclaredVariableError(input, variable.offset, id, declared);
  }
  return variable.value;
}

function validateConstraint(input: string, constraint: RawConstraint, declared: number): IntegerConstraint {
  const result: IntegerConstraint = { comparison: constraint.comparison, value: constraint.value };
  if (constraint.operands) {
    result.operands = constraint.operands.map((operand): number => validateVariable(input, operand, declared));
  }
  return result;
}

/**
 * Checks the variable bounds and quantifier uniqueness of a grammar match and strips the source offsets.
 */
export function validateDocument(input: string, raw: RawDocument): Formula {
  const declared = raw.header.value.variableCount;

  const quantified = new Set<number>();
  const quantifiers = raw.quantifiers.map((block): QuantifierBlock => ({
    kind: block.kind,
    variables: block.variables.map((variable): number => {
      const id = validateVariable(input, variable, declared);
      if (quantified.has(id)) {
        throw createDuplicateQuantificationError(input, variable.offset, id);
      }
      quantified.add(id);
      return id;
    }),
  }));

  const clauses = raw.clauses.map((clause): Clause =>
    clause.map((literal): number => validateVariable(input, literal, declared)));

  const assumptions = raw.assumptions.map((line): AssumptionLine => ({
    marker: line.marker,
    constraints: line.constraints.map((constraint): IntegerConstraint =>
      validateConstraint(input, constraint, declared)),
  }));

  if (clauses.length !== raw.header.value.clauseCount) {
    logger.warn(`Problem line declares ${raw.header.value.clauseCount} clauses but ${clauses.length} were found`);
  }

  return {
    header: { ...raw.header.value },
    quantifiers,
    clauses,
    assumptions,
  };
}
