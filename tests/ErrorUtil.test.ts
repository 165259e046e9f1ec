import {
  createDepthOutOfRangeError,
  createMalformedLineError,
  FormulaError,
  getSpan,
  isFormulaError,
} from '../src/ErrorUtil';

describe('ErrorUtil', (): void => {
  it('computes 1-based lines and columns.', async(): Promise<void> => {
    expect(getSpan('ab\ncd', 0)).toEqual({ offset: 0, line: 1, column: 1 });
    expect(getSpan('ab\ncd', 4)).toEqual({ offset: 4, line: 2, column: 2 });
  });

  it('adds the location to the message.', async(): Promise<void> => {
    const error = createMalformedLineError('ab\ncd', 4, '"0"');
    expect(error).toBeInstanceOf(FormulaError);
    expect(error.code).toBe('MALFORMED_LINE');
    expect(error.message).toBe('Malformed line, expected "0" (line 2, column 2)');
    expect(error.details.expected).toBe('"0"');
  });

  it('leaves messages without location unchanged.', async(): Promise<void> => {
    const error = createDepthOutOfRangeError(5, 3);
    expect(error.message).toBe('Split depth 5 is out of range, the quantifier prefix has 3 variables');
    expect(error.details.span).toBeUndefined();
  });

  it('recognizes formula errors.', async(): Promise<void> => {
    expect(isFormulaError(createDepthOutOfRangeError(1, 0))).toBe(true);
    expect(isFormulaError(new Error('other'))).toBe(false);
  });
});
