import type { AtRule, ConditionalAtRule, Container, Import, RuleBlock, Statement, Stylesheet, Value } from '../tree/types';
import { assertNever } from '../tree/types';
import { withoutExtends } from '../tree/selector';

const AND: Value = { type: 'Keyword', value: 'and' };

/**
 * Split a feature value into OR-alternatives of AND-terms:
 *   `screen and (color), print` → [[screen, (color)], [print]]
 */
function normalizeFeatures(features: Value): Value[][] {
    const alternatives = features.type === 'ValueList' ? features.items : [features];
    return alternatives.map((alt) => {
        if (alt.type !== 'Expression') return [alt];
        const terms: Value[] = [];
        let current: Value[] = [];
        for (const item of alt.items) {
            if (item.type === 'Keyword' && item.value.toLowerCase() === 'and') {
                if (current.length > 0) terms.push(joinSpaced(current));
                current = [];
            } else {
                current.push(item);
            }
        }
        if (current.length > 0) terms.push(joinSpaced(current));
        return terms;
    });
}

function joinSpaced(items: Value[]): Value {
    return items.length === 1 ? items[0] : { type: 'Expression', items };
}

function joinAnd(terms: Value[]): Value {
    if (terms.length === 1) return terms[0];
    const items: Value[] = [];
    terms.forEach((term, i) => {
        if (i > 0) items.push(AND);
        items.push(term);
    });
    return { type: 'Expression', items };
}

/**
 * Combine the features of a chain of nested conditional at-rules (outermost
 * first, the rule being emitted last) into one feature list.
 *
 * Every combination of one OR-alternative per ancestor becomes one
 * alternative of the result, its AND-terms concatenated outer to inner.
 * Alternatives of earlier ancestors vary fastest:
 *
 *   (a), (b)  >  (c)   →   (a) and (c), (b) and (c)
 *
 * A chain mixing at-rule kinds is not merged; the last rule's own features
 * come back unchanged.
 */
export function flattenNestedAtRule(path: ConditionalAtRule[]): Value {
    const self = path[path.length - 1];
    if (!self) return { type: 'ValueList', items: [] };
    if (path.length === 1 || path.some((at) => at.kind !== self.kind)) return self.features;

    let combos: Value[][] = [[]];
    for (const at of path) {
        const next: Value[][] = [];
        for (const alternative of normalizeFeatures(at.features)) {
            for (const combo of combos) {
                next.push([...combo, ...alternative]);
            }
        }
        combos = next;
    }
    return { type: 'ValueList', items: combos.map(joinAnd) };
}

// =============================================================================
// Whole-tree flattening
// =============================================================================

interface FlattenEnv {
    /** Where rule blocks and at-rules at this level go */
    list: Statement[];
    /** Where merged same-kind at-rules and rooted at-rules go */
    hoist: Statement[];
    /** Conditional at-rules enclosing this point, outermost first */
    atPath: ConditionalAtRule[];
    /** Output block that bare declarations inside an at-rule belong to */
    enclosing?: RuleBlock;
    imports: Import[];
}

/**
 * Flatten the evaluated tree for output:
 *
 *   - nested rule blocks follow their parent at the same level
 *   - conditional at-rules move out of rule blocks; one nested in another
 *     of the same kind is merged into a single root at-rule
 *   - declarations directly inside a bubbled at-rule are wrapped in a rule
 *     block with the enclosing block's selectors
 *   - body at-rules (`@font-face`) move to the root, plain CSS imports to
 *     the top
 *
 * Parent back-references are set on the result.
 */
export function bubbleAtRules(sheet: Stylesheet): Stylesheet {
    const root: Stylesheet = { type: 'Stylesheet', rules: [], pos: sheet.pos, visibility: sheet.visibility, blocksOutput: sheet.blocksOutput };
    const env: FlattenEnv = { list: root.rules, hoist: root.rules, atPath: [], imports: [] };
    for (const rule of sheet.rules) {
        flattenStatement(rule, env, (node) => root.rules.push(node));
    }
    root.rules.unshift(...env.imports);
    linkParents(root);
    return root;
}

function flattenStatement(node: Statement, env: FlattenEnv, emit: (node: Statement) => void): void {
    switch (node.type) {
        case 'RuleBlock':
            flattenRuleBlock(node, env);
            break;
        case 'ConditionalAtRule':
            flattenConditional(node, env);
            break;
        case 'AtRule':
            if (node.rules) flattenRooted(node, env);
            else emit(node);
            break;
        case 'Import':
            env.imports.push(node);
            break;
        case 'Declaration':
        case 'ExtendClause':
        case 'MixinDefinition':
        case 'MixinInvocation':
        case 'DetachedCall':
            emit(node);
            break;
        default:
            assertNever(node);
    }
}

function flattenRuleBlock(block: RuleBlock, env: FlattenEnv): void {
    const out: RuleBlock = { ...block, rules: [], extends: [...block.extends], parent: undefined };
    env.list.push(out);
    const inner: FlattenEnv = { ...env, enclosing: out };
    for (const rule of block.rules) {
        flattenStatement(rule, inner, (node) => {
            if (node.type === 'ExtendClause') out.extends.push(node);
            else out.rules.push(node);
        });
    }
}

function flattenConditional(at: ConditionalAtRule, env: FlattenEnv): void {
    const path = [...env.atPath, at];
    const merged = path.every((a) => a.kind === at.kind);
    const out: ConditionalAtRule = { ...at, features: flattenNestedAtRule(path), rules: [], parent: undefined };
    (merged ? env.hoist : env.list).push(out);

    const enclosing = env.enclosing;
    const wrapper: RuleBlock | undefined = enclosing
        ? {
              type: 'RuleBlock',
              selectors: enclosing.selectors.map(withoutExtends),
              rules: [],
              extends: [],
              pos: at.pos,
              visibility: enclosing.visibility,
              blocksOutput: enclosing.blocksOutput,
          }
        : undefined;

    const inner: FlattenEnv = { ...env, list: out.rules, atPath: path };
    for (const rule of at.rules) {
        flattenStatement(rule, inner, (node) => {
            if (!wrapper) out.rules.push(node);
            else if (node.type === 'ExtendClause') wrapper.extends.push(node);
            else wrapper.rules.push(node);
        });
    }
    if (wrapper && (wrapper.rules.length > 0 || wrapper.extends.length > 0)) out.rules.unshift(wrapper);
}

/** `@font-face`, `@keyframes`: hoisted, and nothing bubbles out of them */
function flattenRooted(at: AtRule, env: FlattenEnv): void {
    const out: AtRule = { ...at, rules: [], parent: undefined };
    const rules: Statement[] = [];
    out.rules = rules;
    env.hoist.push(out);
    const inner: FlattenEnv = { list: rules, hoist: rules, atPath: [], imports: env.imports };
    for (const rule of at.rules ?? []) {
        flattenStatement(rule, inner, (node) => rules.push(node));
    }
}

function childrenOf(node: Container): Statement[] {
    return node.type === 'AtRule' ? (node.rules ?? []) : node.rules;
}

function linkParents(container: Container): void {
    for (const child of childrenOf(container)) {
        child.parent = container;
        if (child.type === 'RuleBlock' || child.type === 'ConditionalAtRule' || child.type === 'AtRule' || child.type === 'MixinDefinition') {
            linkParents(child);
        }
    }
    if (container.type === 'RuleBlock') {
        for (const clause of container.extends) clause.parent = container;
    }
}
