import type { Assignment, Clause, Literal } from './FormulaUtil';
import { isNegated, literalVariable } from './FormulaUtil';

/**
 * Value of the literal under the assignment, `undefined` if its variable is not assigned.
 */
export function evaluateLiteral(literal: Literal, assignment: Assignment): boolean | undefined {
  const value = assignment.get(literalVariable(literal));
  if (value === undefined) {
    return;
  }
  return isNegated(literal) ? !value : value;
}

/**
 * Returns `true` if the clause is satisfied by the assignment,
 * otherwise a new clause without the falsified literals.
 * An empty result means the clause can no longer be satisfied.
 */
export function simplifyClause(clause: Clause, assignment: Assignment): Clause | true {
  const result: Clause = [];
  for (const literal of clause) {
    const value = evaluateLiteral(literal, assignment);
    if (value === true) {
      return true;
    }
    if (value === undefined) {
      result.push(literal);
    }
  }
  return result;
}

export function simplifyClauses(clauses: Clause[], assignment: Assignment): Clause[] {
  const result: Clause[] = [];
  for (const clause of clauses) {
    const simplified = simplifyClause(clause, assignment);
    if (simplified !== true) {
      result.push(simplified);
    }
  }
  return result;
}

export function hasEmptyClause(clauses: Clause[]): boolean {
  return clauses.some((clause): boolean => clause.length === 0);
}
