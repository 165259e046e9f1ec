import { createUnsupportedMergeError } from './ErrorUtil';
import type { Clause, Formula, QuantifierBlock } from './FormulaUtil';
import { cloneAssumptions, quantifierPrefix, toLiteral } from './FormulaUtil';
import { getLogger } from './LogUtil';
import { removeAssigned } from './QuantifierUtil';
import type { SplitResult } from './SplitUtil';

const logger = getLogger('Merge');

export type MergeResult = {
  formula: Formula;
  // Selector variable of every branch, in the order the branches were given
  selectors: number[];
};

function checkBranches(branches: SplitResult[]): number[] {
  if (branches.length === 0) {
    throw createUnsupportedMergeError('Cannot merge an empty list of branches');
  }
  const splitVariables = [ ...branches[0].assignment.keys() ];
  for (const branch of branches) {
    const variables = [ ...branch.assignment.keys() ];
    if (variables.length !== splitVariables.length ||
      variables.some((variable, idx): boolean => variable !== splitVariables[idx])) {
      throw createUnsupportedMergeError(`Branch ${branch.index} was split on different variables than branch ${
        branches[0].index}`);
    }
    for (const block of branch.fixed) {
      if (block.kind === 'universal') {
        throw createUnsupportedMergeError(
          `Variable ${block.variables[0]} is universally quantified, such branches are combined by conjunction`,
          block.variables[0],
        );
      }
    }
  }
  return splitVariables;
}

/**
 * Builds one formula that is satisfiable exactly when one of the branches is.
 * Every branch gets a selector variable; a true selector forces the fixed values of its branch
 * and all of its clauses, and at least one selector has to be true.
 */
export function buildMergeFormula(branches: SplitResult[]): MergeResult {
  const splitVariables = checkBranches(branches);
  const base = branches.reduce((max, branch): number => Math.max(max, branch.formula.header.variableCount), 0);
  const selectors = branches.map((branch, idx): number => base + idx + 1);

  const clauses: Clause[] = [ [ ...selectors ] ];
  for (const [ idx, branch ] of branches.entries()) {
    const guard = -selectors[idx];
    // Branches split in assume mode already carry the fixed values as unit clauses
    const units = new Set(branch.formula.clauses.filter((clause): boolean => clause.length === 1)
      .map((clause): number => clause[0]));
    for (const [ variable, value ] of branch.assignment) {
      const literal = toLiteral(variable, value);
      if (!units.has(literal)) {
        clauses.push([ guard, literal ]);
      }
    }
    for (const clause of branch.formula.clauses) {
      clauses.push([ guard, ...clause ]);
    }
  }

  // Both split modes agree on the prefix once the fixed variables are taken out
  const remaining = removeAssigned(branches[0].formula.quantifiers, branches[0].assignment);
  const outer: QuantifierBlock = { kind: 'existential', variables: [ ...selectors, ...splitVariables ]};
  const quantifiers: QuantifierBlock[] = [ outer ];
  for (const block of remaining) {
    if (quantifiers.length === 1 && block.kind === 'existential') {
      outer.variables.push(...block.variables);
    } else {
      quantifiers.push(block);
    }
  }

  logger.verbose(`Merged ${branches.length} branches over ${quantifierPrefix(quantifiers).length
  } quantified variables into ${clauses.length} clauses`);

  return {
    formula: {
      header: { variableCount: base + selectors.length, clauseCount: clauses.length },
      quantifiers,
      clauses,
      assumptions: cloneAssumptions(branches[0].formula.assumptions),
    },
    selectors,
  };
}
