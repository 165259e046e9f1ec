import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { Command, InvalidArgumentError, Option } from '@commander-js/extra-typings';
import { stringifyFormula } from './EmitUtil';
import { isFormulaError } from './ErrorUtil';
import type { Formula } from './FormulaUtil';
import { compactVariables } from './FormulaUtil';
import type { LogLevel } from './LogUtil';
import { getLogger, LOG_LEVELS, setLogLevel } from './LogUtil';
import { buildMergeFormula } from './MergeUtil';
import { parseQdimacs } from './ParseUtil';
import type { SplitMode, SplitResult } from './SplitUtil';
import { branchPattern, generateSplits, SPLIT_MODES } from './SplitUtil';

const logger = getLogger('Run');

export const DEFAULT_DEPTH = 4;

export type SplitterOptions = {
  input: string;
  // Used in the names of the outputs
  name: string;
  depth?: number;
  mode?: SplitMode;
  merge?: boolean;
  compact?: boolean;
  logLevel?: LogLevel;
};

export type SplitterOutput = {
  type: 'branch' | 'merge';
  name: string;
  text: string;
};

// The branch of a depth 0 split has an empty pattern
function branchLabel(pattern: string): string {
  return pattern.length > 0 ? pattern : 'root';
}

export function branchFileName(pattern: string, name: string): string {
  return `${branchLabel(pattern)}:${name}`;
}

export function mergeFileName(name: string): string {
  return `merge:${name}`;
}

function emitBranch(branch: Formula, compact: boolean, comments: string[]): string {
  return stringifyFormula(compact ? compactVariables(branch).formula : branch, { comments });
}

/**
 * Parses the input and yields the text of every branch, followed by the merge formula if requested.
 */
export function* run(opts: SplitterOptions): IterableIterator<SplitterOutput> {
  setLogLevel(opts.logLevel ?? 'error');

  const formula = parseQdimacs(opts.input);
  const depth = opts.depth ?? DEFAULT_DEPTH;
  const branches: SplitResult[] = [];

  for (const branch of generateSplits(formula, { depth, mode: opts.mode })) {
    const pattern = branchPattern(branch.assignment);
    yield {
      type: 'branch',
      name: branchFileName(pattern, opts.name),
      text: emitBranch(branch.formula, opts.compact ?? false, [
        `branch ${branch.index} (${branchLabel(pattern)}) of ${opts.name}`,
      ]),
    };
    // Branches are only kept in memory when they are needed for the merge formula
    if (opts.merge) {
      branches.push(branch);
    }
  }

  if (opts.merge) {
    const { formula: merged, selectors } = buildMergeFormula(branches);
    yield {
      type: 'merge',
      name: mergeFileName(opts.name),
      text: stringifyFormula(merged, {
        comments: [ `merge of ${branches.length} branches of ${opts.name}, selectors ${selectors.join(' ')}` ],
      }),
    };
  }
}

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError('Depth has to be a non-negative integer.');
  }
  return depth;
}

export function runCli(args: string[]): void {
  const program = new Command()
    .name('qsplit')
    .description('Splits a QDIMACS formula on the first variables of its quantifier prefix.')
    .showHelpAfterError()
    .requiredOption('-s, --split <file>', 'formula to split')
    .option('-d, --depth <number>', 'amount of prefix variables to split on', parseDepth, DEFAULT_DEPTH)
    .addOption(new Option('--mode <mode>', 'how fixed variables are handled').choices(SPLIT_MODES).default('simplify' as const))
    .option('-m, --merge', 'also write the merge formula selecting between the branches')
    .option('--compact', 'renumber the variables of every branch to 1..n')
    .option('-o, --outDir <dir>', 'output directory, defaults to the directory of the input')
    .addOption(new Option(
      '-l, --logLevel <level>',
      'logger level',
    ).choices(LOG_LEVELS).default('info' as const));

  program.parse(args);
  const opts = program.opts();

  const outDir = opts.outDir ?? dirname(opts.split);
  mkdirSync(outDir, { recursive: true });

  let count = 0;
  try {
    for (const output of run({
      input: readFileSync(opts.split).toString(),
      name: basename(opts.split),
      depth: opts.depth,
      mode: opts.mode,
      merge: opts.merge,
      compact: opts.compact,
      logLevel: opts.logLevel,
    })) {
      const path = join(outDir, output.name);
      writeFileSync(path, output.text);
      logger.verbose(`Wrote ${output.type} ${path}`);
      count += 1;
    }
  } catch (error: unknown) {
    if (isFormulaError(error)) {
      program.error(`${opts.split}: ${error.message}`);
    }
    throw error;
  }
  logger.info(`Wrote ${count} files to ${outDir}`);
}
