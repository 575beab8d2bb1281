import selectorParser from 'postcss-selector-parser';
import type { Combinator, Element, ExtendClause, ExtendMode, Selector, SourcePosition } from './types';

const DEFAULT_POS: SourcePosition = { line: 1, column: 1 };

/** Placeholder that survives postcss-selector-parser in place of `@{name}` */
const INTERP_TOKEN = /__tsr(\d+)__/g;

/**
 * Parse a selector list such as `.a, .b > .c:extend(.d all)` into the
 * element-sequence model.
 *
 * Uses postcss-selector-parser for the CSS selector grammar. Each simple
 * selector (tag, class, id, attribute, pseudo, `&`) becomes one Element
 * carrying the combinator that precedes it; `:extend(...)` pseudo-classes
 * are lifted out into ExtendClauses. `@{var}` interpolations are kept
 * verbatim in element values and resolved at evaluation time.
 */
export function parseSelectorList(text: string, pos: SourcePosition = DEFAULT_POS): Selector[] {
    const interpolations: string[] = [];
    const masked = text.replace(/@\{[\w-]+\}/g, (match) => {
        interpolations.push(match);
        return `__tsr${interpolations.length - 1}__`;
    });
    const unmask = (value: string): string => value.replace(INTERP_TOKEN, (_, i: string) => interpolations[Number(i)] ?? '');

    const ast = selectorParser().astSync(masked);
    const selectors: Selector[] = [];
    for (const sel of ast.nodes) {
        selectors.push(convertSelector(sel, pos, unmask));
    }
    return selectors;
}

/** Parse a single selector; only the first of a comma list is kept */
export function parseSelector(text: string, pos: SourcePosition = DEFAULT_POS): Selector {
    const [first] = parseSelectorList(text, pos);
    if (!first) throw new Error(`Empty selector: "${text}"`);
    return first;
}

function convertSelector(sel: selectorParser.Selector, pos: SourcePosition, unmask: (value: string) => string): Selector {
    const elements: Element[] = [];
    const extendClauses: ExtendClause[] = [];
    let pending: Combinator = '';

    for (const node of sel.nodes) {
        switch (node.type) {
            case 'combinator':
                pending = toCombinator(node.value);
                break;
            case 'comment':
                break;
            case 'pseudo':
                if (node.value === ':extend') {
                    for (const inner of node.nodes) {
                        extendClauses.push(parseExtendTarget(unmask(String(inner).trim()), pos));
                    }
                    break;
                }
                elements.push({ type: 'Element', combinator: pending, value: unmask(String(node).trim()) });
                pending = '';
                break;
            default:
                elements.push({ type: 'Element', combinator: pending, value: unmask(String(node).trim()) });
                pending = '';
                break;
        }
    }

    return { type: 'Selector', elements, extends: extendClauses, pos };
}

/**
 * Parse the argument of `:extend(...)`: a selector optionally followed by
 * the `all` keyword.
 */
export function parseExtendTarget(text: string, pos: SourcePosition = DEFAULT_POS): ExtendClause {
    const match = text.match(/^([\s\S]*?)\s+all$/);
    const mode: ExtendMode = match ? 'all' : 'exact';
    const target = parseSelector(match ? match[1] : text, pos);
    return { type: 'ExtendClause', target, mode, pos, visibility: 'inherit', blocksOutput: false };
}

function toCombinator(raw: string): Combinator {
    const value = raw.trim();
    if (value === '>' || value === '+' || value === '~') return value;
    return ' ';
}

// =============================================================================
// Printing and structural equality
// =============================================================================

export function elementsToString(elements: Element[]): string {
    let out = '';
    elements.forEach((el, i) => {
        if (el.combinator === '') {
            out += el.value;
        } else if (el.combinator === ' ') {
            out += i === 0 ? el.value : ` ${el.value}`;
        } else {
            out += i === 0 ? `${el.combinator} ${el.value}` : ` ${el.combinator} ${el.value}`;
        }
    });
    return out;
}

export function selectorToString(sel: Selector): string {
    return elementsToString(sel.elements);
}

/**
 * Identity key for structural comparison. A leading descendant combinator
 * is meaningless and compares equal to none.
 */
export function selectorKey(sel: Selector): string {
    const [first, ...rest] = sel.elements;
    if (!first) return '';
    const head: Element = first.combinator === ' ' ? { ...first, combinator: '' } : first;
    return elementsToString([head, ...rest]);
}

export function selectorsEqual(a: Selector, b: Selector): boolean {
    return selectorKey(a) === selectorKey(b);
}

/** Copy of a selector without its extend clauses */
export function withoutExtends(sel: Selector): Selector {
    return { type: 'Selector', elements: sel.elements.map((el) => ({ ...el })), extends: [], pos: sel.pos };
}

/**
 * The mixin name a rule block can be called by: a selector made of exactly
 * one class or id, such as `.button` or `#ns`.
 */
export function simpleMixinName(sel: Selector): string | undefined {
    if (sel.elements.length !== 1) return undefined;
    const value = sel.elements[0].value;
    return /^[.#][\w-]+$/.test(value) ? value : undefined;
}

export function hasInterpolation(sel: Selector): boolean {
    return sel.elements.some((el) => el.value.includes('@{'));
}

// =============================================================================
// Nesting
// =============================================================================

/** A fragment like `-title` in `&-title` that glues onto the parent's last element */
const SUFFIX = /^[\w-]/;

/**
 * Join nested selectors with their parent's selector list.
 *
 * Produces the cartesian product child-major:
 *   `.a, .b { .c, .d {} }` → `.a .c, .b .c, .a .d, .b .d`
 *
 * `&` is replaced by the parent selector; without `&` the child is appended
 * with a descendant combinator (or its own leading `>`, `+`, `~`).
 * At the root there is no parent and `&` is dropped.
 */
export function joinSelectors(parents: Selector[], children: Selector[]): Selector[] {
    if (parents.length === 0) {
        return children.map((child) => ({ ...child, elements: stripNesting(child.elements) }));
    }

    const result: Selector[] = [];
    for (const child of children) {
        for (const parent of parents) {
            result.push({ type: 'Selector', elements: joinElements(parent.elements, child.elements), extends: child.extends, pos: child.pos });
        }
    }
    return result;
}

function joinElements(parent: Element[], child: Element[]): Element[] {
    if (!child.some((el) => el.value === '&')) {
        const [first, ...rest] = child;
        if (!first) return parent.map((el) => ({ ...el }));
        const combinator: Combinator = first.combinator === '' ? ' ' : first.combinator;
        return [...parent.map((el) => ({ ...el })), { ...first, combinator }, ...rest.map((el) => ({ ...el }))];
    }

    const out: Element[] = [];
    let afterNesting = false;
    for (const el of child) {
        if (el.value === '&') {
            parent.forEach((p, i) => {
                out.push(i === 0 && out.length > 0 ? { ...p, combinator: el.combinator } : { ...p });
            });
            afterNesting = true;
            continue;
        }
        const last = out[out.length - 1];
        if (afterNesting && last && el.combinator === '' && SUFFIX.test(el.value)) {
            out[out.length - 1] = { ...last, value: last.value + el.value };
        } else {
            out.push({ ...el });
        }
        afterNesting = false;
    }
    return out;
}

function stripNesting(elements: Element[]): Element[] {
    const out: Element[] = [];
    for (const el of elements) {
        if (el.value === '&') continue;
        out.push(out.length === 0 ? { ...el, combinator: '' } : { ...el });
    }
    return out;
}
