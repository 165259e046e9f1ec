import { createDepthOutOfRangeError } from './ErrorUtil';
import type { Assignment, Clause, Formula, QuantifierBlock } from './FormulaUtil';
import { cloneAssumptions, cloneClauses, cloneFormula, quantifierPrefix, toLiteral } from './FormulaUtil';
import { getLogger } from './LogUtil';
import { assignedQuantifiers, existentializeAssigned, removeAssigned } from './QuantifierUtil';
import { hasEmptyClause, simplifyClauses } from './SimplifyUtil';

const logger = getLogger('Split');

/**
 * `simplify` substitutes the fixed values and removes the variables from the prefix,
 * `assume` keeps the formula intact and adds a unit clause per fixed variable.
 */
export type SplitMode = 'simplify' | 'assume';
export const SPLIT_MODES = [ 'simplify', 'assume' ] as const satisfies readonly SplitMode[];

export type SplitOptions = {
  depth: number;
  mode?: SplitMode;
};

export type SplitResult = {
  // Binary encoding of the assignment, the first split variable is the most significant bit
  index: number;
  assignment: Assignment;
  // The fixed variables with the quantifier kind they had in the input
  fixed: QuantifierBlock[];
  formula: Formula;
};

export function validateDepth(formula: Formula, depth: number): void {
  const available = quantifierPrefix(formula.quantifiers).length;
  if (!Number.isInteger(depth) || depth < 0 || depth > available) {
    throw createDepthOutOfRangeError(depth, available);
  }
}

// The first fixed variable is the most significant bit
export function indexForAssignment(assignment: Assignment): number {
  let index = 0;
  for (const value of assignment.values()) {
    index = (index * 2) + (value ? 1 : 0);
  }
  return index;
}

/**
 * One character per fixed variable in prefix order, `f` for false and `t` for true.
 */
export function branchPattern(assignment: Assignment): string {
  return [ ...assignment.values() ].map((value): string => value ? 't' : 'f').join('');
}

/**
 * Depth-first enumeration of all assignments to the given variables, false before true.
 */
export function* enumerateAssignments(variables: number[], partial: Assignment = new Map()): IterableIterator<Assignment> {
  if (partial.size === variables.length) {
    yield new Map(partial);
    return;
  }
  const variable = variables[partial.size];
  for (const value of [ false, true ]) {
    partial.set(variable, value);
    yield* enumerateAssignments(variables, partial);
    partial.delete(variable);
  }
}

/**
 * Creates the formula of a single branch, sharing no arrays with the input.
 */
export function applyAssignment(formula: Formula, assignment: Assignment, mode: SplitMode = 'simplify'): Formula {
  if (assignment.size === 0) {
    return cloneFormula(formula);
  }

  let quantifiers: QuantifierBlock[];
  let clauses: Clause[];
  if (mode === 'assume') {
    quantifiers = existentializeAssigned(formula.quantifiers, assignment);
    clauses = cloneClauses(formula.clauses);
    for (const [ variable, value ] of assignment) {
      clauses.push([ toLiteral(variable, value) ]);
    }
  } else {
    quantifiers = removeAssigned(formula.quantifiers, assignment);
    clauses = simplifyClauses(formula.clauses, assignment);
  }

  return {
    header: { variableCount: formula.header.variableCount, clauseCount: clauses.length },
    quantifiers,
    clauses,
    assumptions: cloneAssumptions(formula.assumptions),
  };
}

/**
 * Yields the 2^depth branches of the formula ordered by index.
 * Every result is independent, so callers can write and discard them one at a time.
 */
export function* generateSplits(formula: Formula, options: SplitOptions): IterableIterator<SplitResult> {
  validateDepth(formula, options.depth);
  const mode = options.mode ?? 'simplify';
  const variables = quantifierPrefix(formula.quantifiers).slice(0, options.depth);
  logger.verbose(`Splitting on ${variables.length} variables (${mode}) into ${2 ** variables.length} branches`);

  for (const assignment of enumerateAssignments(variables)) {
    const index = indexForAssignment(assignment);
    const branch = applyAssignment(formula, assignment, mode);
    logger.debug(`Branch ${index} (${branchPattern(assignment)}) has ${branch.clauses.length} clauses${
      hasEmptyClause(branch.clauses) ? ', including the empty clause' : ''}`);
    yield {
      index,
      assignment,
      fixed: assignedQuantifiers(formula.quantifiers, assignment),
      formula: branch,
    };
  }
}

export function splitFormula(formula: Formula, options: SplitOptions): SplitResult[] {
  return [ ...generateSplits(formula, options) ];
}
