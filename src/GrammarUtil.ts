import type { ActionDict, Grammar, MatchResult, Node, Semantics } from 'ohm-js';
import { grammar } from 'ohm-js';
import type { Comparison, ConstraintValue, ProblemHeader, QuantifierKind } from './FormulaUtil';

export const QDIMACS_GRAMMAR = String.raw`
Qdimacs {
  document = preambleLine* problemLine quantifierLine* clauseLine* blankLine*

  preambleLine = assumptionLine | commentLine
  commentLine = "c" (ws (~nl any)*)? eol

  assumptionLine = assumptionMarker constraint (ws* ";" ws* constraint)* ws* eol
  assumptionMarker = "cs int" ws*  -- cs
                   | "s int" ws+   -- s
  constraint = operandList? ws* comparison ws* value
  operandList = "[" ws* variableId (ws+ variableId)* ws* "]"
  comparison = "<" | ">" | "="
  value = bitPattern | integer
  bitPattern = "{" bit+ "}"
  bit = "0" | "1"
  integer = "-"? digit+

  problemLine = "p" ws+ "cnf" ws+ natural ws+ natural ws* eol
  quantifierLine = ws* quantifier (ws+ variableId)+ ws+ "0" ws* eol
  quantifier = "e" | "a"
  clauseLine = ws* (literal ws+)* "0" ws* eol
  literal = "-"? variableId

  variableId = "1".."9" digit*
  natural = digit+
  blankLine = ws* nl
  eol = nl | end
  nl = "\r\n" | "\n"
  ws = " " | "\t"
}
`;

/**
 * A value together with the offset in the input where it was found.
 */
export type Located<T> = {
  value: T;
  offset: number;
};

export type RawConstraint = {
  comparison: Comparison;
  operands?: Located<number>[];
  value: ConstraintValue;
};

export type RawAssumptionLine = {
  marker: 'cs' | 's';
  constraints: RawConstraint[];
};

export type RawQuantifierBlock = {
  kind: QuantifierKind;
  variables: Located<number>[];
};

export type RawDocument = {
  assumptions: RawAssumptionLine[];
  header: Located<ProblemHeader>;
  quantifiers: RawQuantifierBlock[];
  clauses: Located<number>[][];
};

export function parseComparison(input: string): Comparison {
  switch (input) {
    case '<':
    case '>':
    case '=':
      return input;
    default:
      throw new Error(`Unknown comparison operator ${input}`);
  }
}

function extractAll<T>(iteration: Node, extract: (child: Node) => T): T[] {
  return iteration.children.map(extract);
}

const extractActions: ActionDict<unknown> = {
  document(preamble: Node, problem: Node, quantifiers: Node, clauses: Node, _blank: Node): RawDocument {
    const assumptions: RawAssumptionLine[] = [];
    for (const line of preamble.children) {
      const assumption: RawAssumptionLine | undefined = line.extract();
      if (assumption) {
        assumptions.push(assumption);
      }
    }
    return {
      assumptions,
      header: problem.extract(),
      quantifiers: extractAll(quantifiers, (line): RawQuantifierBlock => line.extract()),
      clauses: extractAll(clauses, (line): Located<number>[] => line.extract()),
    };
  },

  commentLine(_c: Node, _ws: Node, _text: Node, _eol: Node): undefined {
    return undefined;
  },

  assumptionLine(
    marker: Node,
    first: Node,
    _ws1: Node,
    _separators: Node,
    _ws2: Node,
    rest: Node,
    _ws3: Node,
    _eol: Node,
  ): RawAssumptionLine {
    return {
      marker: marker.sourceString.startsWith('cs') ? 'cs' : 's',
      constraints: [ first.extract(), ...extractAll(rest, (child): RawConstraint => child.extract()) ],
    };
  },

  constraint(operands: Node, _ws1: Node, comparison: Node, _ws2: Node, value: Node): RawConstraint {
    const constraint: RawConstraint = {
      comparison: parseComparison(comparison.sourceString),
      value: value.extract(),
    };
    if (operands.children.length > 0) {
      constraint.operands = operands.children[0].extract();
    }
    return constraint;
  },

  operandList(_open: Node, _ws1: Node, first: Node, _ws2: Node, rest: Node, _ws3: Node, _close: Node): Located<number>[] {
    return [ first.extract(), ...extractAll(rest, (child): Located<number> => child.extract()) ];
  },

  bitPattern(_open: Node, bits: Node, _close: Node): ConstraintValue {
    return { type: 'bits', bits: bits.sourceString };
  },

  integer(_sign: Node, _digits: Node): ConstraintValue {
    return { type: 'integer', value: Number.parseInt(this.sourceString, 10) };
  },

  problemLine(
    _p: Node,
    _ws1: Node,
    _cnf: Node,
    _ws2: Node,
    variableCount: Node,
    _ws3: Node,
    clauseCount: Node,
    _ws4: Node,
    _eol: Node,
  ): Located<ProblemHeader> {
    return {
      value: {
        variableCount: Number.parseInt(variableCount.sourceString, 10),
        clauseCount: Number.parseInt(clauseCount.sourceString, 10),
      },
      offset: this.source.startIdx,
    };
  },

  quantifierLine(
    _ws1: Node,
    quantifier: Node,
    _ws2: Node,
    variables: Node,
    _ws3: Node,
    _zero: Node,
    _ws4: Node,
    _eol: Node,
  ): RawQuantifierBlock {
    return {
      kind: quantifier.sourceString === 'a' ? 'universal' : 'existential',
      variables: extractAll(variables, (child): Located<number> => child.extract()),
    };
  },

  clauseLine(_ws1: Node, literals: Node, _ws2: Node, _zero: Node, _ws3: Node, _eol: Node): Located<number>[] {
    return extractAll(literals, (child): Located<number> => child.extract());
  },

  literal(_sign: Node, _variable: Node): Located<number> {
    return { value: Number.parseInt(this.sourceString, 10), offset: this.source.startIdx };
  },

  variableId(_head: Node, _tail: Node): Located<number> {
    return { value: Number.parseInt(this.sourceString, 10), offset: this.source.startIdx };
  },
};

let cached: { grammar: Grammar; semantics: Semantics } | undefined;

function getGrammar(): { grammar: Grammar; semantics: Semantics } {
  if (!cached) {
    const qdimacs = grammar(QDIMACS_GRAMMAR);
    const semantics = qdimacs.createSemantics().addOperation('extract', extractActions);
    cached = { grammar: qdimacs, semantics };
  }
  return cached;
}

export function matchQdimacs(input: string): MatchResult {
  return getGrammar().grammar.match(input);
}

export function extractDocument(match: MatchResult): RawDocument {
  return getGrammar().semantics(match).extract();
}
