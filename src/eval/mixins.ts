import type { MixinArgument, MixinInvocation, RuleBlock, Statement, Value } from '../tree/types';
import { valueToCSS } from '../output/value-css';
import { EvaluationError } from './errors';
import type { GuardOutcome } from './guards';
import { classifyGuard } from './guards';
import type { EvalContext } from './options';
import type { MixinCandidate } from './scope';
import { Frame, lookupMixins, lookupOwnMixins } from './scope';
import { evalValue } from './values';
import { ensureVisible } from './visibility';

/** Callbacks into the orchestrator */
export interface MixinHost {
    evalRules(rules: Statement[], ctx: EvalContext): Statement[];
    /** Frame holding a namespace's own members */
    collectNamespace(candidate: MixinCandidate, ctx: EvalContext): Frame;
}

interface Match {
    candidate: MixinCandidate;
    frame: Frame;
    outcome: GuardOutcome;
}

export function invocationText(call: MixinInvocation): string {
    const args = call.args.map((arg) => (arg.name ? `${arg.name}: ${valueToCSS(arg.value)}` : valueToCSS(arg.value)));
    return `${call.path.join(' > ')}(${args.join(', ')})${call.important ? ' !important' : ''}`;
}

/**
 * Resolve a mixin call to a synthesized rule block.
 *
 * Every candidate whose parameters accept the arguments and whose guard
 * holds is selected, and their bodies are concatenated in definition order.
 * Each body runs in its own frame chained to the definition's scope, with
 * copies of the definition's nodes, so the same mixin can be invoked any
 * number of times.
 *
 * `default()` in a guard is true only when no unconditionally matching
 * candidate exists.
 */
export function resolveInvocation(call: MixinInvocation, ctx: EvalContext, host: MixinHost): RuleBlock {
    const construct = invocationText(call);
    const args: MixinArgument[] = call.args.map((arg) => ({ name: arg.name, value: evalValue(arg.value, ctx, call.pos) }));

    const candidates = findCandidates(call.path, ctx, host);
    if (candidates.length === 0) {
        throw new EvaluationError('UndefinedMixin', `${construct} is undefined`, call.pos, construct);
    }

    const matches: Match[] = [];
    for (const candidate of candidates) {
        const frame = bindArguments(candidate, args, ctx, call);
        if (!frame) continue;
        const outcome = classifyGuard(candidate.definition.guard, { ...ctx, frame }, call.pos);
        if (outcome !== 'never') matches.push({ candidate, frame, outcome });
    }

    const unconditional = matches.some((m) => m.outcome === 'always');
    const dependent: GuardOutcome = unconditional ? 'when-not' : 'when-default';
    const selected = matches.filter((m) => m.outcome === 'always' || m.outcome === dependent);
    if (selected.length === 0) {
        throw new EvaluationError('NoMatchingGuard', `No matching definition was found for \`${construct}\``, call.pos, construct);
    }

    const depth = ctx.depth + 1;
    if (depth > ctx.state.options.maxCallDepth) {
        throw new EvaluationError('RecursionLimit', `Maximum call depth of ${ctx.state.options.maxCallDepth} exceeded in ${construct}`, call.pos, construct);
    }

    const rules: Statement[] = [];
    for (const { candidate, frame } of selected) {
        const body = new Frame(frame.ref());
        const origin = candidate.origin;
        if (origin) ctx.state.activeBlocks.add(origin);
        try {
            const produced = host.evalRules(candidate.definition.rules, {
                ...ctx,
                frame: body,
                important: ctx.important || call.important,
                depth,
                guardDefault: undefined,
            });
            // Content of a reference-imported definition becomes output once invoked
            if (candidate.blocksOutput && !ctx.blocking) produced.forEach(ensureVisible);
            rules.push(...produced);
        } finally {
            if (origin) ctx.state.activeBlocks.delete(origin);
        }
    }

    return {
        type: 'RuleBlock',
        selectors: [],
        rules,
        extends: [],
        pos: call.pos,
        visibility: 'visible',
        blocksOutput: false,
    };
}

/**
 * Look the first path segment up through the scope chain, then each further
 * segment only among the previous match's own members.
 */
function findCandidates(path: string[], ctx: EvalContext, host: MixinHost): MixinCandidate[] {
    const [head, ...rest] = path;
    const callable = (candidate: MixinCandidate): boolean => !candidate.origin || !ctx.state.activeBlocks.has(candidate.origin);
    let found = lookupMixins(head, ctx.frame.ref(), callable);
    for (const segment of rest) {
        const next: MixinCandidate[] = [];
        for (const namespace of found) {
            const members = host.collectNamespace(namespace, ctx);
            next.push(...lookupOwnMixins(segment, members).filter(callable));
        }
        found = next;
    }
    return found;
}

/**
 * Bind call arguments to a candidate's parameters in a fresh frame chained
 * to the definition's scope. Returns undefined when the arguments do not fit.
 */
function bindArguments(candidate: MixinCandidate, args: MixinArgument[], ctx: EvalContext, call: MixinInvocation): Frame | undefined {
    const params = candidate.definition.params;
    const frame = new Frame(candidate.scope);

    const named = new Map<string, Value>();
    const positional: Value[] = [];
    for (const arg of args) {
        if (arg.name) named.set(arg.name, arg.value);
        else positional.push(arg.value);
    }
    for (const name of named.keys()) {
        if (!params.some((p) => p.name === name)) return undefined;
    }

    const bound: Value[] = [];
    let next = 0;
    for (const param of params) {
        if (param.variadic) {
            const restValues = positional.slice(next);
            next = positional.length;
            if (param.name) frame.defineVariable(param.name, { type: 'Expression', items: restValues });
            bound.push(...restValues);
            continue;
        }

        if (param.pattern) {
            const arg = positional[next++];
            if (arg === undefined || valueToCSS(arg) !== valueToCSS(param.pattern)) return undefined;
            bound.push(arg);
            continue;
        }

        let value = param.name ? named.get(param.name) : undefined;
        if (value === undefined && next < positional.length) value = positional[next++];
        if (value === undefined && param.defaultValue) {
            value = evalValue(param.defaultValue, { ...ctx, frame, guardDefault: undefined }, call.pos);
        }
        if (value === undefined) return undefined;
        if (param.name) frame.defineVariable(param.name, value);
        bound.push(value);
    }

    if (next < positional.length) return undefined;
    frame.defineVariable('@arguments', bound.length === 1 ? bound[0] : { type: 'Expression', items: bound });
    return frame;
}
