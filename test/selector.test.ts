import { describe, it, expect } from 'vitest';
import { hasInterpolation, joinSelectors, parseSelector, parseSelectorList, selectorToString, selectorsEqual, simpleMixinName } from '../src/tree/selector';

const text = (list: ReturnType<typeof parseSelectorList>) => list.map(selectorToString);

describe('parseSelectorList', () => {
    it('splits a comma list and keeps combinators', () => {
        expect(text(parseSelectorList('.a, .b > .c'))).toEqual(['.a', '.b > .c']);
    });

    it('keeps compound selectors together', () => {
        const sel = parseSelector('a.link:hover');
        expect(sel.elements.map((el) => el.value)).toEqual(['a', '.link', ':hover']);
        expect(sel.elements.map((el) => el.combinator)).toEqual(['', '', '']);
        expect(selectorToString(sel)).toBe('a.link:hover');
    });

    it('lifts :extend() out of the selector', () => {
        const sel = parseSelector('.b:extend(.a all)');
        expect(selectorToString(sel)).toBe('.b');
        expect(sel.extends).toHaveLength(1);
        expect(sel.extends[0].mode).toBe('all');
        expect(selectorToString(sel.extends[0].target)).toBe('.a');
    });

    it('reads several extend targets', () => {
        const sel = parseSelector('.c:extend(.a, .b)');
        expect(sel.extends.map((clause) => selectorToString(clause.target))).toEqual(['.a', '.b']);
        expect(sel.extends.map((clause) => clause.mode)).toEqual(['exact', 'exact']);
    });

    it('preserves @{var} interpolation', () => {
        const sel = parseSelector('.col-@{size}');
        expect(selectorToString(sel)).toBe('.col-@{size}');
        expect(hasInterpolation(sel)).toBe(true);
    });
});

describe('selector helpers', () => {
    it('compares selectors structurally', () => {
        expect(selectorsEqual(parseSelector('.a  >  .b'), parseSelector('.a > .b'))).toBe(true);
        expect(selectorsEqual(parseSelector('.a .b'), parseSelector('.a > .b'))).toBe(false);
    });

    it('recognises callable rule-block names', () => {
        expect(simpleMixinName(parseSelector('.button'))).toBe('.button');
        expect(simpleMixinName(parseSelector('#ns'))).toBe('#ns');
        expect(simpleMixinName(parseSelector('.a .b'))).toBeUndefined();
        expect(simpleMixinName(parseSelector('div'))).toBeUndefined();
    });
});

describe('joinSelectors', () => {
    it('builds the child-major cartesian product', () => {
        const joined = joinSelectors(parseSelectorList('.a, .b'), parseSelectorList('.c, .d'));
        expect(text(joined)).toEqual(['.a .c', '.b .c', '.a .d', '.b .d']);
    });

    it('substitutes & and glues suffixes onto the parent', () => {
        const parent = parseSelectorList('.card');
        expect(text(joinSelectors(parent, parseSelectorList('&:hover')))).toEqual(['.card:hover']);
        expect(text(joinSelectors(parent, parseSelectorList('&-title')))).toEqual(['.card-title']);
        expect(text(joinSelectors(parent, parseSelectorList('& + &')))).toEqual(['.card + .card']);
        expect(text(joinSelectors(parent, parseSelectorList('.dark &')))).toEqual(['.dark .card']);
    });

    it('keeps a leading child combinator', () => {
        expect(text(joinSelectors(parseSelectorList('.list'), parseSelectorList('> li')))).toEqual(['.list > li']);
    });

    it('drops & at the root', () => {
        expect(text(joinSelectors([], parseSelectorList('.a')))).toEqual(['.a']);
    });
});
