import type { Element, ExtendClause, RuleBlock, Selector, Statement, Stylesheet } from '../tree/types';
import { selectorKey, selectorToString, selectorsEqual, withoutExtends } from '../tree/selector';
import { warn } from './errors';
import { isEffectivelyVisible } from './visibility';

export interface ExtendOptions {
    /** Warn about visible extends that matched nothing (default true) */
    warnUnmatched?: boolean;
}

interface Extension {
    id: number;
    /** Lineage key: extending selector, target and mode */
    key: string;
    /** Selector that gets added to matched blocks, extends stripped */
    extender: Selector;
    clause: ExtendClause;
    owner: RuleBlock;
    /** Whether selectors this extend adds are printed */
    visible: boolean;
    matched: boolean;
}

/**
 * Group rule blocks into extend scopes. Rule blocks reachable without
 * crossing an at-rule share a scope; every at-rule body starts a new one.
 */
function collectScopes(rules: Statement[], current: RuleBlock[], scopes: RuleBlock[][]): void {
    for (const rule of rules) {
        if (rule.type === 'RuleBlock') {
            current.push(rule);
            collectScopes(rule.rules, current, scopes);
        } else if (rule.type === 'ConditionalAtRule' || (rule.type === 'AtRule' && rule.rules)) {
            const inner: RuleBlock[] = [];
            scopes.push(inner);
            collectScopes(rule.rules ?? [], inner, scopes);
        }
    }
}

function collectExtensions(blocks: RuleBlock[], nextId: () => number): Extension[] {
    const extensions: Extension[] = [];
    for (const block of blocks) {
        const visible = isEffectivelyVisible(block);
        for (const selector of block.selectors) {
            // Selectors added by earlier extends declare nothing themselves
            if (selector.extended) continue;
            const extender = withoutExtends(selector);
            for (const clause of [...selector.extends, ...block.extends]) {
                const key = `${selectorKey(extender)} -> ${selectorKey(clause.target)} ${clause.mode}`;
                extensions.push({ id: nextId(), key, extender, clause, owner: block, visible, matched: false });
            }
        }
    }
    return extensions;
}

/**
 * Apply every `:extend()` transitively, in place.
 *
 * Within one scope, each extend adds its extending selector to every rule
 * block with a selector matching the target, and repeats until nothing
 * changes, so `.c` extending `.b` extending `.a` reaches the `.a` block.
 * Selectors are never duplicated. A selector produced by an extend is never
 * matched by that same extend again, which ends cycles like
 * `.a:extend(.b)` + `.b:extend(.a)` silently. That lineage is recorded on
 * the added selectors, so running it again on its own output adds nothing.
 *
 * Extends never cross at-rule boundaries. Block visibility flags are
 * untouched; an added selector carries the visibility of the block that
 * declared the extend.
 */
export function resolveExtends(sheet: Stylesheet, options: ExtendOptions = {}): Stylesheet {
    const root: RuleBlock[] = [];
    const scopes: RuleBlock[][] = [root];
    collectScopes(sheet.rules, root, scopes);

    let counter = 0;
    const nextId = (): number => counter++;
    for (const blocks of scopes) {
        const extensions = collectExtensions(blocks, nextId);
        if (extensions.length === 0) continue;
        closeOver(blocks, extensions);

        if (options.warnUnmatched ?? true) {
            for (const ext of extensions) {
                if (!ext.matched && isEffectivelyVisible(ext.owner)) {
                    warn(`extend "${selectorToString(ext.clause.target)}" of "${selectorToString(ext.extender)}" has no matches`, ext.clause.pos);
                }
            }
        }
    }
    return sheet;
}

function closeOver(blocks: RuleBlock[], extensions: Extension[]): void {
    // (extension, matched selector) pairs already applied, per block
    const applied = new Map<RuleBlock, Set<string>>();

    let changed = true;
    while (changed) {
        changed = false;
        for (const ext of extensions) {
            for (const block of blocks) {
                let done = applied.get(block);
                if (!done) {
                    done = new Set();
                    applied.set(block, done);
                }
                for (const selector of [...block.selectors]) {
                    const via = selector.extended?.via ?? [];
                    if (via.includes(ext.key)) continue;
                    const pair = `${ext.id}|${selectorKey(selector)}`;
                    if (done.has(pair)) continue;

                    const produced = extendSelector(selector, ext);
                    if (produced.length === 0) continue;
                    done.add(pair);
                    ext.matched = true;

                    for (const added of produced) {
                        const existing = block.selectors.find((sel) => selectorsEqual(sel, added));
                        if (existing) {
                            if (ext.visible && existing.extended && !existing.extended.visible) existing.extended = { ...existing.extended, visible: true };
                            continue;
                        }
                        block.selectors.push({ ...added, extended: { visible: ext.visible, via: [...via, ext.key] } });
                        changed = true;
                    }
                }
            }
        }
    }
}

/**
 * Selectors `ext` derives from `selector`: the extender itself on an exact
 * match; for `all`, `selector` with every occurrence of the target replaced.
 */
function extendSelector(selector: Selector, ext: Extension): Selector[] {
    const target = ext.clause.target;
    if (ext.clause.mode === 'exact') {
        return selectorsEqual(selector, target) ? [withoutExtends(ext.extender)] : [];
    }

    const replaced = replaceAll(selector.elements, target.elements, ext.extender.elements);
    if (!replaced) return [];
    return [{ type: 'Selector', elements: replaced, extends: [], pos: ext.extender.pos }];
}

function elementMatches(candidate: Element, wanted: Element, first: boolean): boolean {
    if (candidate.value !== wanted.value) return false;
    return first || candidate.combinator === wanted.combinator;
}

/** Replace each non-overlapping occurrence of `target`; undefined when there is none */
function replaceAll(elements: Element[], target: Element[], replacement: Element[]): Element[] | undefined {
    if (target.length === 0 || replacement.length === 0) return undefined;
    const out: Element[] = [];
    let found = false;
    let i = 0;
    while (i < elements.length) {
        const matches = i + target.length <= elements.length && target.every((wanted, k) => elementMatches(elements[i + k], wanted, k === 0));
        if (matches) {
            found = true;
            replacement.forEach((el, k) => {
                out.push(k === 0 ? { ...el, combinator: elements[i].combinator } : { ...el });
            });
            i += target.length;
        } else {
            out.push({ ...elements[i] });
            i++;
        }
    }
    return found ? out : undefined;
}
