export * from './tree/types';
export * from './tree/builders';
export { parseSelector, parseSelectorList, selectorToString, selectorsEqual, joinSelectors } from './tree/selector';
export { parseValue } from './tree/value-parser';

export { evaluate } from './eval/evaluate';
export type { EvaluateOptions, ImportResolver } from './eval/options';
export { DEFAULT_OPTIONS } from './eval/options';
export { EvaluationError, isEvaluationError } from './eval/errors';
export type { EvaluationErrorKind } from './eval/errors';
export type { CustomFunction, FunctionRegistry } from './eval/functions';
export { createFunctionRegistry } from './eval/functions';
export { Frame, lookupMixins, lookupVariable } from './eval/scope';
export type { MixinCandidate, ScopeRef } from './eval/scope';
export { resolveExtends } from './eval/extend';
export { isEffectivelyVisible, markReference, ensureVisible } from './eval/visibility';
export { bubbleAtRules, flattenNestedAtRule } from './eval/bubbling';

export { toCSS } from './output/to-css';
export { valueToCSS } from './output/value-css';
