import type {
  AssumptionLine,
  Clause,
  ConstraintValue,
  Formula,
  IntegerConstraint,
  ProblemHeader,
  QuantifierBlock,
} from './FormulaUtil';
import { recountHeader } from './FormulaUtil';

export type EmitOptions = {
  /**
   * Written as `c` lines at the top of the output.
   */
  comments?: string[];
  /**
   * Write the header stored in the formula instead of recounting variables and clauses.
   */
  keepHeader?: boolean;
};

export function stringifyValue(value: ConstraintValue): string {
  return value.type === 'bits' ? `{${value.bits}}` : `${value.value}`;
}

export function stringifyConstraint(constraint: IntegerConstraint): string {
  const operands = constraint.operands ? `[${constraint.operands.join(' ')}] ` : '';
  return `${operands}${constraint.comparison} ${stringifyValue(constraint.value)}`;
}

export function stringifyAssumption(line: AssumptionLine): string {
  return `${line.marker} int ${line.constraints.map(stringifyConstraint).join(' ; ')}`;
}

export function stringifyHeader(header: ProblemHeader): string {
  return `p cnf ${header.variableCount} ${header.clauseCount}`;
}

export function stringifyQuantifierBlock(block: QuantifierBlock): string {
  return `${block.kind === 'universal' ? 'a' : 'e'} ${block.variables.join(' ')} 0`;
}

export function stringifyClause(clause: Clause): string {
  return [ ...clause, 0 ].join(' ');
}

/**
 * Serializes the formula in the same extended format {@link parseQdimacs} reads.
 */
export function stringifyFormula(formula: Formula, options: EmitOptions = {}): string {
  const lines: string[] = [];
  for (const comment of options.comments ?? []) {
    lines.push(comment.length > 0 ? `c ${comment}` : 'c');
  }
  lines.push(...formula.assumptions.map(stringifyAssumption));
  lines.push(stringifyHeader(options.keepHeader ? formula.header : recountHeader(formula)));
  lines.push(...formula.quantifiers.map(stringifyQuantifierBlock));
  lines.push(...formula.clauses.map(stringifyClause));
  return `${lines.join('\n')}\n`;
}
