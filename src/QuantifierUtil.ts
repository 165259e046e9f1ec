import type { Assignment, QuantifierBlock, QuantifierKind } from './FormulaUtil';
import { quantifierKinds } from './FormulaUtil';

/**
 * Removes every assigned variable from the prefix, blocks that end up empty are dropped.
 */
export function removeAssigned(quantifiers: QuantifierBlock[], assignment: Assignment): QuantifierBlock[] {
  const result: QuantifierBlock[] = [];
  for (const block of quantifiers) {
    const variables = block.variables.filter((variable): boolean => !assignment.has(variable));
    if (variables.length > 0) {
      result.push({ kind: block.kind, variables });
    }
  }
  return result;
}

/**
 * Keeps every variable in place but makes the assigned ones existential.
 * Neighbouring blocks that end up with the same kind are merged, so the prefix keeps alternating.
 */
export function existentializeAssigned(quantifiers: QuantifierBlock[], assignment: Assignment): QuantifierBlock[] {
  const result: QuantifierBlock[] = [];
  for (const block of quantifiers) {
    for (const variable of block.variables) {
      const kind: QuantifierKind = block.kind === 'universal' && !assignment.has(variable) ? 'universal' : 'existential';
      const last = result.at(-1);
      if (last?.kind === kind) {
        last.variables.push(variable);
      } else {
        result.push({ kind, variables: [ variable ]});
      }
    }
  }
  return result;
}

/**
 * The assigned variables in assignment order, grouped by the quantifier kind they have in the prefix.
 */
export function assignedQuantifiers(quantifiers: QuantifierBlock[], assignment: Assignment): QuantifierBlock[] {
  const kinds = quantifierKinds(quantifiers);
  const result: QuantifierBlock[] = [];
  for (const variable of assignment.keys()) {
    const kind = kinds.get(variable);
    if (!kind) {
      continue;
    }
    const last = result.at(-1);
    if (last?.kind === kind) {
      last.variables.push(variable);
    } else {
      result.push({ kind, variables: [ variable ]});
    }
  }
  return result;
}
