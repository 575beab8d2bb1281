import type { AtRule, ConditionalAtRule, Declaration, DetachedCall, ExtendClause, Import, MixinDefinition, RuleBlock, Selector, Statement, Stylesheet, Value } from '../tree/types';
import { assertNever } from '../tree/types';
import { hasInterpolation, joinSelectors, parseSelectorList, selectorToString, simpleMixinName } from '../tree/selector';
import { parseValue } from '../tree/value-parser';
import { unquotedText } from '../output/value-css';
import { bubbleAtRules } from './bubbling';
import { EvaluationError, warn } from './errors';
import { resolveExtends } from './extend';
import { evalCondition } from './guards';
import type { MixinHost } from './mixins';
import { resolveInvocation } from './mixins';
import type { EvalContext, EvaluateOptions } from './options';
import { createEvalState } from './options';
import type { MixinCandidate } from './scope';
import { Frame } from './scope';
import { evalValue, interpolate, resolveVariable } from './values';
import { markReference } from './visibility';

/**
 * Resolve a parsed stylesheet into a concrete tree.
 *
 * Pipeline:
 *   1. One depth-first walk binds variables and mixins, calls mixins,
 *      joins selectors and inlines imports
 *   2. Nested rule blocks and conditional at-rules are flattened and
 *      same-kind at-rules merged (bubbling)
 *   3. Extends are closed transitively over each at-rule scope
 *
 * The first error aborts the whole evaluation. The input tree is not
 * modified.
 */
export function evaluate(root: Stylesheet, options: EvaluateOptions = {}): Stylesheet {
    const state = createEvalState(options);
    const ctx: EvalContext = { state, frame: new Frame(), selectors: [], blocking: root.blocksOutput, important: false, depth: 0 };

    for (const [name, raw] of Object.entries(state.options.globalVariables)) {
        const value = typeof raw === 'string' ? parseValue(raw) : raw;
        ctx.frame.defineVariable(name.startsWith('@') ? name : `@${name}`, evalValue(value, ctx, root.pos));
    }

    const evaluated: Stylesheet = {
        type: 'Stylesheet',
        rules: dropExtends(evalRules(root.rules, ctx)),
        pos: root.pos,
        visibility: root.visibility,
        blocksOutput: root.blocksOutput,
    };

    const flat = bubbleAtRules(evaluated);
    resolveExtends(flat, { warnUnmatched: state.options.warnUnmatchedExtends });
    return flat;
}

const host: MixinHost = { evalRules, collectNamespace };

export function evalRules(rules: Statement[], ctx: EvalContext): Statement[] {
    const out: Statement[] = [];
    for (const rule of rules) {
        evalStatement(rule, ctx, out);
    }
    return out;
}

function evalStatement(node: Statement, ctx: EvalContext, out: Statement[]): void {
    switch (node.type) {
        case 'Declaration':
            evalDeclaration(node, ctx, out);
            break;
        case 'RuleBlock':
            evalRuleBlock(node, ctx, out);
            break;
        case 'MixinDefinition':
            defineMixin(node, ctx);
            break;
        case 'MixinInvocation':
            // Only the content is kept; ensureVisible has already marked it where needed
            out.push(...resolveInvocation(node, ctx, host).rules);
            break;
        case 'ConditionalAtRule':
            evalConditionalAtRule(node, ctx, out);
            break;
        case 'AtRule':
            evalAtRule(node, ctx, out);
            break;
        case 'ExtendClause':
            out.push({ type: 'ExtendClause', target: node.target, mode: node.mode, pos: node.pos, visibility: node.visibility, blocksOutput: ctx.blocking || node.blocksOutput });
            break;
        case 'DetachedCall':
            evalDetachedCall(node, ctx, out);
            break;
        case 'Import':
            evalImport(node, ctx, out);
            break;
        default:
            assertNever(node);
    }
}

function evalDeclaration(decl: Declaration, ctx: EvalContext, out: Statement[]): void {
    const value = evalValue(decl.value, ctx, decl.pos);
    if (decl.variable) {
        ctx.frame.defineVariable(decl.name, value);
        return;
    }
    out.push({
        type: 'Declaration',
        name: decl.name.includes('@{') ? interpolate(decl.name, ctx, decl.pos) : decl.name,
        value,
        important: decl.important || ctx.important,
        variable: false,
        pos: decl.pos,
        visibility: decl.visibility,
        blocksOutput: ctx.blocking || decl.blocksOutput,
    });
}

function defineMixin(def: MixinDefinition, ctx: EvalContext): void {
    ctx.frame.defineMixin(def.name, { definition: def, source: 'definition', blocksOutput: ctx.blocking || def.blocksOutput });
}

/** A rule block called as a mixin behaves like a parameterless definition */
function rulesetDefinition(block: RuleBlock, name: string): MixinDefinition {
    return {
        type: 'MixinDefinition',
        name,
        params: [],
        guard: block.guard,
        rules: block.rules,
        pos: block.pos,
        visibility: block.visibility,
        blocksOutput: block.blocksOutput,
    };
}

function evalRuleBlock(block: RuleBlock, ctx: EvalContext, out: Statement[]): void {
    const blocking = ctx.blocking || block.blocksOutput;
    for (const sel of block.selectors) {
        const name = simpleMixinName(sel);
        if (name) ctx.frame.defineMixin(name, { definition: rulesetDefinition(block, name), source: 'ruleset', origin: block, blocksOutput: blocking });
    }

    if (block.guard && !evalCondition(block.guard, ctx, block.pos)) return;

    const own = block.selectors.flatMap((sel) => (hasInterpolation(sel) ? reparseSelector(sel, ctx) : [sel]));
    const selectors = joinSelectors(ctx.selectors, own);

    const body = whileActive(block, ctx, () => evalRules(block.rules, { ...ctx, frame: new Frame(ctx.frame.ref()), selectors, blocking }));

    const rules: Statement[] = [];
    const extendClauses: ExtendClause[] = block.extends.map((clause) => ({ ...clause, blocksOutput: blocking || clause.blocksOutput }));
    for (const rule of body) {
        if (rule.type === 'ExtendClause') extendClauses.push(rule);
        else rules.push(rule);
    }

    out.push({ type: 'RuleBlock', selectors, rules, extends: extendClauses, pos: block.pos, visibility: block.visibility, blocksOutput: blocking });
}

function reparseSelector(sel: Selector, ctx: EvalContext): Selector[] {
    const text = interpolate(selectorToString(sel), ctx, sel.pos);
    return parseSelectorList(text, sel.pos).map((parsed) => ({ ...parsed, extends: [...parsed.extends, ...sel.extends] }));
}

function evalConditionalAtRule(at: ConditionalAtRule, ctx: EvalContext, out: Statement[]): void {
    const blocking = ctx.blocking || at.blocksOutput;
    const features = evalValue(at.features, ctx, at.pos);
    const body = evalRules(at.rules, { ...ctx, frame: new Frame(ctx.frame.ref()), blocking });
    out.push({
        type: 'ConditionalAtRule',
        kind: at.kind,
        features,
        // Inside a rule block, `&:extend()` belongs to the block the at-rule wraps
        rules: ctx.selectors.length > 0 ? body : dropExtends(body),
        pos: at.pos,
        visibility: at.visibility,
        blocksOutput: blocking,
    });
}

/** Body at-rules are rooted: their rule blocks do not join enclosing selectors */
function evalAtRule(at: AtRule, ctx: EvalContext, out: Statement[]): void {
    const blocking = ctx.blocking || at.blocksOutput;
    const prelude = at.prelude ? evalValue(at.prelude, ctx, at.pos) : undefined;
    const node: AtRule = { type: 'AtRule', name: at.name, prelude, pos: at.pos, visibility: at.visibility, blocksOutput: blocking };
    if (at.rules) {
        node.rules = dropExtends(evalRules(at.rules, { ...ctx, frame: new Frame(ctx.frame.ref()), selectors: [], blocking }));
    }
    out.push(node);
}

function evalDetachedCall(call: DetachedCall, ctx: EvalContext, out: Statement[]): void {
    const value = resolveVariable(call.name, ctx, call.pos);
    if (value.type !== 'DetachedBlock') {
        throw new EvaluationError('InvalidOperationType', `${call.name} is not a detached ruleset`, call.pos, `${call.name}()`);
    }
    const depth = ctx.depth + 1;
    if (depth > ctx.state.options.maxCallDepth) {
        throw new EvaluationError('RecursionLimit', `Maximum call depth of ${ctx.state.options.maxCallDepth} exceeded in ${call.name}()`, call.pos, `${call.name}()`);
    }
    const frame = new Frame(value.closure ?? ctx.frame.ref());
    out.push(...evalRules(value.rules, { ...ctx, frame, depth }));
}

// =============================================================================
// Imports
// =============================================================================

function importTarget(path: Value): string {
    if (path.type === 'Call' && path.name.toLowerCase() === 'url' && path.args.length > 0) return unquotedText(path.args[0]);
    return unquotedText(path);
}

function isOpaqueImport(imp: Import, path: Value, target: string): boolean {
    return imp.options.css || /\.css(\?.*)?$/i.test(target) || (path.type === 'Call' && path.name.toLowerCase() === 'url');
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function evalImport(imp: Import, ctx: EvalContext, out: Statement[]): void {
    const blocking = ctx.blocking || imp.blocksOutput;
    const path = evalValue(imp.path, ctx, imp.pos);
    const target = importTarget(path);

    if (isOpaqueImport(imp, path, target)) {
        out.push({ type: 'Import', path, options: imp.options, pos: imp.pos, visibility: imp.visibility, blocksOutput: blocking });
        return;
    }

    // Keyed by path alone: a reference import followed by a plain one still loads once
    if (!imp.options.multiple && ctx.state.imported.has(target)) {
        warn(`Skipping duplicate import of "${target}"`, imp.pos);
        return;
    }
    ctx.state.imported.add(target);

    const construct = `@import "${target}"`;
    const resolver = ctx.state.options.resolveImport;
    if (!resolver) {
        throw new EvaluationError('ImportResolutionFailure', `Cannot import "${target}": no import resolver configured`, imp.pos, construct);
    }
    let sheet: Stylesheet | Error;
    try {
        sheet = resolver(target, imp.options);
    } catch (error) {
        throw new EvaluationError('ImportResolutionFailure', `Cannot import "${target}": ${describe(error)}`, imp.pos, construct, { cause: error });
    }
    if (sheet instanceof Error) {
        throw new EvaluationError('ImportResolutionFailure', `Cannot import "${target}": ${sheet.message}`, imp.pos, construct, { cause: sheet });
    }

    const source = imp.options.reference ? markReference(sheet) : sheet;
    out.push(...evalRules(source.rules, { ...ctx, blocking }));
}

// =============================================================================
// Namespaces
// =============================================================================

/**
 * Bind a namespace's variables and callable members in a frame of their
 * own, without producing output. A namespace whose guard fails has no
 * members.
 */
function collectNamespace(candidate: MixinCandidate, ctx: EvalContext): Frame {
    const cached = ctx.state.namespaces.get(candidate);
    if (cached) return cached;

    const frame = new Frame(candidate.scope);
    ctx.state.namespaces.set(candidate, frame);
    const nsCtx: EvalContext = { ...ctx, frame, guardDefault: undefined };
    const { definition } = candidate;
    if (definition.guard && !evalCondition(definition.guard, nsCtx, definition.pos)) return frame;

    for (const rule of definition.rules) {
        if (rule.type === 'Declaration' && rule.variable) {
            frame.defineVariable(rule.name, evalValue(rule.value, nsCtx, rule.pos));
        } else if (rule.type === 'MixinDefinition') {
            frame.defineMixin(rule.name, { definition: rule, source: 'definition', blocksOutput: candidate.blocksOutput || rule.blocksOutput });
        } else if (rule.type === 'RuleBlock') {
            for (const sel of rule.selectors) {
                const name = simpleMixinName(sel);
                if (name) frame.defineMixin(name, { definition: rulesetDefinition(rule, name), source: 'ruleset', origin: rule, blocksOutput: candidate.blocksOutput || rule.blocksOutput });
            }
        }
    }
    return frame;
}

// =============================================================================
// Helpers
// =============================================================================

/** Run `fn` with `block` excluded from mixin lookup */
export function whileActive<T>(block: RuleBlock, ctx: EvalContext, fn: () => T): T {
    ctx.state.activeBlocks.add(block);
    try {
        return fn();
    } finally {
        ctx.state.activeBlocks.delete(block);
    }
}

/** Extends with no enclosing rule block have nothing to attach to */
function dropExtends(rules: Statement[]): Statement[] {
    return rules.filter((rule) => {
        if (rule.type !== 'ExtendClause') return true;
        warn(`:extend(${selectorToString(rule.target)}) outside of a rule block is ignored`, rule.pos);
        return false;
    });
}
