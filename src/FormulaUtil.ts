export type QuantifierKind = 'existential' | 'universal';

/**
 * A nonzero integer, the absolute value is the variable id and a negative sign means negated.
 */
export type Literal = number;

export type Clause = Literal[];

export type QuantifierBlock = {
  kind: QuantifierKind;
  variables: number[];
};

export type ProblemHeader = {
  variableCount: number;
  clauseCount: number;
};

export type Comparison = '<' | '>' | '=';

export type ConstraintValue =
  { type: 'integer'; value: number } |
  { type: 'bits'; bits: string };

export type IntegerConstraint = {
  comparison: Comparison;
  operands?: number[];
  value: ConstraintValue;
};

// One `cs int` or `s int` line, the constraints are the `;` separated parts
export type AssumptionLine = {
  marker: 'cs' | 's';
  constraints: IntegerConstraint[];
};

export type Formula = {
  header: ProblemHeader;
  quantifiers: QuantifierBlock[];
  clauses: Clause[];
  assumptions: AssumptionLine[];
};

// Insertion order is the order in which the variables were fixed
export type Assignment = Map<number, boolean>;

export function literalVariable(literal: Literal): number {
  return Math.abs(literal);
}

export function isNegated(literal: Literal): boolean {
  return literal < 0;
}

export function toLiteral(variable: number, value: boolean): Literal {
  return value ? variable : -variable;
}

export function quantifierPrefix(quantifiers: QuantifierBlock[]): number[] {
  return quantifiers.flatMap((block): number[] => block.variables);
}

export function quantifierKinds(quantifiers: QuantifierBlock[]): Map<number, QuantifierKind> {
  const kinds = new Map<number, QuantifierKind>();
  for (const block of quantifiers) {
    for (const variable of block.variables) {
      kinds.set(variable, block.kind);
    }
  }
  return kinds;
}

export function cloneClauses(clauses: Clause[]): Clause[] {
  return clauses.map((clause): Clause => [ ...clause ]);
}

export function cloneQuantifiers(quantifiers: QuantifierBlock[]): QuantifierBlock[] {
  return quantifiers.map((block): QuantifierBlock => ({ kind: block.kind, variables: [ ...block.variables ]}));
}

export function cloneAssumptions(assumptions: AssumptionLine[]): AssumptionLine[] {
  return assumptions.map((line): AssumptionLine => ({
    marker: line.marker,
    constraints: line.constraints.map((constraint): IntegerConstraint => ({
      comparison: constraint.comparison,
      ...(constraint.operands ? { operands: [ ...constraint.operands ]} : {}),
      value: { ...constraint.value },
    })),
  }));
}

export function cloneFormula(formula: Formula): Formula {
  return {
    header: { ...formula.header },
    quantifiers: cloneQuantifiers(formula.quantifiers),
    clauses: cloneClauses(formula.clauses),
    assumptions: cloneAssumptions(formula.assumptions),
  };
}

function* referencedVariables(formula: Formula): IterableIterator<number> {
  yield* quantifierPrefix(formula.quantifiers);
  for (const clause of formula.clauses) {
    for (const literal of clause) {
      yield literalVariable(literal);
    }
  }
  for (const line of formula.assumptions) {
    for (const constraint of line.constraints) {
      yield* constraint.operands ?? [];
    }
  }
}

/**
 * Highest variable id referenced anywhere in the formula, 0 if there is none.
 */
export function maxVariable(formula: Formula): number {
  let max = 0;
  for (const variable of referencedVariables(formula)) {
    max = Math.max(max, variable);
  }
  return max;
}

export function recountHeader(formula: Formula): ProblemHeader {
  return { variableCount: maxVariable(formula), clauseCount: formula.clauses.length };
}

export type CompactResult = {
  formula: Formula;
  // Old variable id to new variable id
  mapping: Map<number, number>;
};

/**
 * Renumbers all variables to 1..n: quantified variables in prefix order first,
 * followed by free variables in order of first occurrence.
 */
export function compactVariables(formula: Formula): CompactResult {
  const mapping = new Map<number, number>();
  for (const variable of referencedVariables(formula)) {
    if (!mapping.has(variable)) {
      mapping.set(variable, mapping.size + 1);
    }
  }
  const rename = (variable: number): number => mapping.get(variable) ?? variable;

  const compacted: Formula = {
    header: { variableCount: mapping.size, clauseCount: formula.clauses.length },
    quantifiers: formula.quantifiers.map((block): QuantifierBlock => ({
      kind: block.kind,
      variables: block.variables.map(rename),
    })),
    clauses: formula.clauses.map((clause): Clause =>
      clause.map((literal): Literal => toLiteral(rename(literalVariable(literal)), !isNegated(literal)))),
    assumptions: cloneAssumptions(formula.assumptions).map((line): AssumptionLine => ({
      marker: line.marker,
      constraints: line.constraints.map((constraint): IntegerConstraint => constraint.operands ?
        { ...constraint, operands: constraint.operands.map(rename) } :
        constraint),
    })),
  };
  return { formula: compacted, mapping };
}
