import type { MixinDefinition, RuleBlock, Value } from '../tree/types';

/**
 * Something a mixin invocation can resolve to: a real definition, or a
 * rule block with a plain class/id selector called as a zero-parameter
 * mixin (`.button();`).
 */
export interface MixinCandidate {
    definition: MixinDefinition;
    source: 'definition' | 'ruleset';
    /** The rule block this candidate was derived from, when `source` is 'ruleset' */
    origin?: RuleBlock;
    /** Lexical scope of the definition; parameter frames chain to it */
    scope: ScopeRef;
    /** The definition came in through a reference-mode import */
    blocksOutput: boolean;
}

interface Binding<T> {
    /** Position in the frame's insertion order */
    index: number;
    value: T;
}

/**
 * A view of a frame that only sees bindings made before it was taken.
 * Frames are append-only, so a ref is an immutable snapshot: code that
 * holds one never observes siblings bound later.
 */
export interface ScopeRef {
    frame: Frame;
    limit: number;
}

/**
 * One lexical scope: variable and mixin bindings in insertion order.
 *
 * Variables rebound in the same frame shadow earlier bindings (last one
 * visible from the snapshot wins). Mixin names keep every definition, in
 * order, since same-named definitions form an overload set.
 */
export class Frame {
    private readonly variables = new Map<string, Binding<Value>[]>();
    private readonly mixins = new Map<string, Binding<MixinCandidate>[]>();
    private size = 0;

    constructor(readonly parent?: ScopeRef) {}

    /** Snapshot of everything bound so far */
    ref(): ScopeRef {
        return { frame: this, limit: this.size };
    }

    defineVariable(name: string, value: Value): void {
        push(this.variables, name, { index: this.size++, value });
    }

    /**
     * Bind a mixin candidate. Its scope includes its own binding so the
     * body can call itself recursively.
     */
    defineMixin(name: string, candidate: Omit<MixinCandidate, 'scope'>): MixinCandidate {
        const bound: MixinCandidate = { ...candidate, scope: { frame: this, limit: this.size + 1 } };
        push(this.mixins, name, { index: this.size++, value: bound });
        return bound;
    }

    variableAt(name: string, limit: number): Value | undefined {
        const bindings = this.variables.get(name);
        if (!bindings) return undefined;
        for (let i = bindings.length - 1; i >= 0; i--) {
            if (bindings[i].index < limit) return bindings[i].value;
        }
        return undefined;
    }

    mixinsAt(name: string, limit: number): MixinCandidate[] {
        const bindings = this.mixins.get(name) ?? [];
        return bindings.filter((b) => b.index < limit).map((b) => b.value);
    }
}

function push<T>(map: Map<string, Binding<T>[]>, name: string, binding: Binding<T>): void {
    const list = map.get(name);
    if (list) list.push(binding);
    else map.set(name, [binding]);
}

/**
 * Resolve a variable walking outward from `scope`. The innermost frame that
 * binds `name` decides.
 */
export function lookupVariable(name: string, scope: ScopeRef): Value | undefined {
    let ref: ScopeRef | undefined = scope;
    while (ref) {
        const value = ref.frame.variableAt(name, ref.limit);
        if (value !== undefined) return value;
        ref = ref.frame.parent;
    }
    return undefined;
}

/**
 * All mixin candidates for `name`, in definition order, from the innermost
 * frame that binds it. Outer frames are not merged in: an inner overload set
 * shadows the outer one entirely. Candidates rejected by `accept` do not
 * count as bindings.
 */
export function lookupMixins(name: string, scope: ScopeRef, accept: (candidate: MixinCandidate) => boolean = () => true): MixinCandidate[] {
    let ref: ScopeRef | undefined = scope;
    while (ref) {
        const found = ref.frame.mixinsAt(name, ref.limit).filter(accept);
        if (found.length > 0) return found;
        ref = ref.frame.parent;
    }
    return [];
}

/** Candidates bound directly in `frame` (namespace member lookup) */
export function lookupOwnMixins(name: string, frame: Frame): MixinCandidate[] {
    return frame.mixinsAt(name, Number.POSITIVE_INFINITY);
}
