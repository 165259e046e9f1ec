import { stringifyFormula } from '../src/EmitUtil';
import type { FormulaError } from '../src/ErrorUtil';
import { isFormulaError } from '../src/ErrorUtil';
import { parseQdimacs } from '../src/ParseUtil';

function parseError(input: string): FormulaError {
  try {
    parseQdimacs(input);
  } catch (error: unknown) {
    if (isFormulaError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the input to be rejected');
}

describe('ParseUtil', (): void => {
  describe('parseQdimacs', (): void => {
    it('parses the header, quantifier blocks and clauses.', async(): Promise<void> => {
      const formula = parseQdimacs('c example\np cnf 3 2\ne 1 2 3 0\n1 2 0\n-1 3 0\n');
      expect(formula).toEqual({
        header: { variableCount: 3, clauseCount: 2 },
        quantifiers: [{ kind: 'existential', variables: [ 1, 2, 3 ]}],
        clauses: [[ 1, 2 ], [ -1, 3 ]],
        assumptions: [],
      });
    });

    it('keeps the order of mixed quantifier blocks.', async(): Promise<void> => {
      const formula = parseQdimacs('p cnf 4 1\na 1 2 0\ne 3 4 0\n1 -3 4 0');
      expect(formula.quantifiers).toEqual([
        { kind: 'universal', variables: [ 1, 2 ]},
        { kind: 'existential', variables: [ 3, 4 ]},
      ]);
      expect(formula.clauses).toEqual([[ 1, -3, 4 ]]);
    });

    it('parses assumption lines before the problem line.', async(): Promise<void> => {
      const formula = parseQdimacs('cs int [1 2 3] < 5 ; = {0101}\nc comment\ns int > -2\np cnf 3 0\n');
      expect(formula.assumptions).toEqual([
        {
          marker: 'cs',
          constraints: [
            { comparison: '<', operands: [ 1, 2, 3 ], value: { type: 'integer', value: 5 }},
            { comparison: '=', value: { type: 'bits', bits: '0101' }},
          ],
        },
        {
          marker: 's',
          constraints: [{ comparison: '>', value: { type: 'integer', value: -2 }}],
        },
      ]);
    });

    it('accepts empty clauses, no clauses and a trailing blank line.', async(): Promise<void> => {
      expect(parseQdimacs('p cnf 1 2\n1 0\n0\n\n').clauses).toEqual([[ 1 ], []]);
      expect(parseQdimacs('p cnf 2 0\ne 1 2 0\n').clauses).toEqual([]);
    });

    it('accepts Windows line endings.', async(): Promise<void> => {
      expect(parseQdimacs('p cnf 1 1\r\na 1 0\r\n-1 0\r\n')).toEqual({
        header: { variableCount: 1, clauseCount: 1 },
        quantifiers: [{ kind: 'universal', variables: [ 1 ]}],
        clauses: [[ -1 ]],
        assumptions: [],
      });
    });

    it('rejects variables above the declared count.', async(): Promise<void> => {
      const error = parseError('p cnf 2 1\n1 3 0\n');
      expect(error.code).toBe('UNDECLARED_VARIABLE');
      expect(error.details.variable).toBe(3);
      expect(error.details.span).toEqual({ offset: 12, line: 2, column: 3 });
    });

    it('rejects undeclared negated literals and quantified variables.', async(): Promise<void> => {
      expect(parseError('p cnf 2 1\n-4 0\n').details.variable).toBe(4);
      const error = parseError('p cnf 2 0\ne 1 5 0\n');
      expect(error.code).toBe('UNDECLARED_VARIABLE');
      expect(error.details.span).toEqual({ offset: 14, line: 2, column: 5 });
    });

    it('rejects undeclared assumption operands.', async(): Promise<void> => {
      const error = parseError('cs int [1 7] < 2\np cnf 2 0\n');
      expect(error.code).toBe('UNDECLARED_VARIABLE');
      expect(error.details.variable).toBe(7);
    });

    it('rejects variables that are quantified twice.', async(): Promise<void> => {
      const error = parseError('p cnf 3 0\ne 1 2 0\na 2 3 0\n');
      expect(error.code).toBe('DUPLICATE_QUANTIFICATION');
      expect(error.details.variable).toBe(2);
      expect(error.details.span).toEqual({ offset: 20, line: 3, column: 3 });
      expect(parseError('p cnf 3 0\ne 1 1 0\n').code).toBe('DUPLICATE_QUANTIFICATION');
    });

    it('reports a clause without terminating 0 as a structural mismatch.', async(): Promise<void> => {
      const error = parseError('p cnf 2 1\n1 2\n');
      expect(error.code).toBe('STRUCTURAL_MISMATCH');
      expect(error.details.span).toEqual({ offset: 13, line: 2, column: 4 });
      expect(parseError('p cnf 2 1\ne 1 2\n1 0\n').code).toBe('STRUCTURAL_MISMATCH');
    });

    it('reports input without a problem line as a structural mismatch.', async(): Promise<void> => {
      const error = parseError('c only a comment\n');
      expect(error.code).toBe('STRUCTURAL_MISMATCH');
      expect(error.details.span).toEqual({ offset: 17, line: 2, column: 1 });
    });

    it('reports unexpected content as a malformed line.', async(): Promise<void> => {
      const error = parseError('p cnf 2 1\n1 x 0\n');
      expect(error.code).toBe('MALFORMED_LINE');
      expect(error.details.span).toEqual({ offset: 12, line: 2, column: 3 });
      expect(error.message).toMatch(/\(line 2, column 3\)$/u);
    });

    it('rejects comments after the problem line.', async(): Promise<void> => {
      const error = parseError('p cnf 1 1\nc late\n1 0\n');
      expect(error.code).toBe('MALFORMED_LINE');
      expect(error.details.span?.line).toBe(2);
      expect(error.details.span?.column).toBe(1);
    });
  });

  it('reproduces the input when emitting a parsed formula.', async(): Promise<void> => {
    const input = 'cs int [1 2] < 3 ; = {01}\np cnf 3 2\ne 1 0\na 2 0\ne 3 0\n1 -2 3 0\n-3 0\n';
    const formula = parseQdimacs(input);
    const emitted = stringifyFormula(formula);
    expect(emitted).toBe(input);
    expect(parseQdimacs(emitted)).toEqual(formula);
  });

  it('keeps the structure when the declared header is larger than needed.', async(): Promise<void> => {
    const formula = parseQdimacs('p cnf 10 1\ne 2 0\na 1 0\n-1 2 0\n');
    const reparsed = parseQdimacs(stringifyFormula(formula));
    expect(reparsed.header).toEqual({ variableCount: 2, clauseCount: 1 });
    expect(reparsed.quantifiers).toEqual(formula.quantifiers);
    expect(reparsed.clauses).toEqual(formula.clauses);
  });
});
