export * from './EmitUtil';
export * from './ErrorUtil';
export * from './FormulaUtil';
export * from './GrammarUtil';
export * from './LogUtil';
export * from './MergeUtil';
export * from './ParseUtil';
export * from './QuantifierUtil';
export * from './Run';
export * from './SimplifyUtil';
export * from './SplitUtil';
