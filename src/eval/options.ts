import type { ImportOptions, RuleBlock, Selector, Stylesheet, Value } from '../tree/types';
import type { CustomFunction, FunctionRegistry } from './functions';
import { createFunctionRegistry } from './functions';
import type { Frame, MixinCandidate } from './scope';

/**
 * Import collaborator. Receives the evaluated path text and the import mode;
 * returns the already-parsed sub-tree, or an Error to fail evaluation.
 */
export type ImportResolver = (path: string, mode: ImportOptions) => Stylesheet | Error;

export interface EvaluateOptions {
    /** Injected into the root frame. Names with or without `@`; strings are parsed as values. */
    globalVariables?: Record<string, Value | string>;
    resolveImport?: ImportResolver;
    /** Layered over the built-in functions; entries here win */
    functions?: Record<string, CustomFunction>;
    /** Nested mixin / detached-block call depth before `RecursionLimit` */
    maxCallDepth?: number;
    /** Arithmetic on two different non-empty units raises instead of keeping the left unit */
    strictUnits?: boolean;
    /** Warn about visible extends that matched nothing */
    warnUnmatchedExtends?: boolean;
}

export interface ResolvedOptions {
    globalVariables: Record<string, Value | string>;
    resolveImport?: ImportResolver;
    functions: Record<string, CustomFunction>;
    maxCallDepth: number;
    strictUnits: boolean;
    warnUnmatchedExtends: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
    globalVariables: {},
    functions: {},
    maxCallDepth: 256,
    strictUnits: false,
    warnUnmatchedExtends: true,
};

export function resolveOptions(options: EvaluateOptions = {}): ResolvedOptions {
    return {
        globalVariables: options.globalVariables ?? DEFAULT_OPTIONS.globalVariables,
        resolveImport: options.resolveImport,
        functions: options.functions ?? DEFAULT_OPTIONS.functions,
        maxCallDepth: options.maxCallDepth ?? DEFAULT_OPTIONS.maxCallDepth,
        strictUnits: options.strictUnits ?? DEFAULT_OPTIONS.strictUnits,
        warnUnmatchedExtends: options.warnUnmatchedExtends ?? DEFAULT_OPTIONS.warnUnmatchedExtends,
    };
}

/**
 * Per-evaluation mutable state. One is created for every `evaluate()` call
 * so concurrent evaluations never share caches or import bookkeeping.
 */
export interface EvalState {
    options: ResolvedOptions;
    functions: FunctionRegistry;
    /** Import-once keys: resolved paths */
    imported: Set<string>;
    /** Rule blocks whose body is being evaluated; they cannot be called as mixins from inside */
    activeBlocks: Set<RuleBlock>;
    /** Member frames of namespaces already looked into */
    namespaces: WeakMap<MixinCandidate, Frame>;
}

export function createEvalState(options: EvaluateOptions = {}): EvalState {
    const resolved = resolveOptions(options);
    return {
        options: resolved,
        functions: createFunctionRegistry(resolved.functions),
        imported: new Set(),
        activeBlocks: new Set(),
        namespaces: new WeakMap(),
    };
}

/** Everything a statement needs to know about where it is being evaluated */
export interface EvalContext {
    state: EvalState;
    /** Innermost frame; snapshotted at each lookup */
    frame: Frame;
    /** Joined selectors of the enclosing rule block, [] outside any block */
    selectors: Selector[];
    /** Output produced here inherits `blocksOutput` (reference import) */
    blocking: boolean;
    /** Inside an `!important` mixin call */
    important: boolean;
    /** Nested mixin / detached call depth */
    depth: number;
    /** Value of `default()` while evaluating a mixin guard */
    guardDefault?: boolean;
}
