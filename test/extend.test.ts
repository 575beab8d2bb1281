import { describe, it, expect, vi, afterEach } from 'vitest';
import { evaluate } from '../src/eval/evaluate';
import { resolveExtends } from '../src/eval/extend';
import { toCSS } from '../src/output/to-css';
import { selectorToString } from '../src/tree/selector';
import { decl, extend, media, rule, stylesheet } from '../src/tree/builders';
import type { RuleBlock, Statement, Stylesheet } from '../src/tree/types';

function compile(rules: Statement[]): string {
    return toCSS(evaluate(stylesheet(rules)));
}

function selectorSets(sheet: Stylesheet): string[][] {
    return sheet.rules.filter((node): node is RuleBlock => node.type === 'RuleBlock').map((block) => block.selectors.map(selectorToString));
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('resolveExtends', () => {
    it('closes extends transitively', () => {
        const css = compile([rule('.a', [decl('color', 'black')]), rule('.b:extend(.a)', []), rule('.c:extend(.b)', [])]);
        expect(css).toBe('.a, .b, .c {\n  color: black;\n}');
    });

    it('adds nothing when run again', () => {
        const sheet = evaluate(stylesheet([rule('.a', [decl('color', 'black')]), rule('.b:extend(.a)', []), rule('.c:extend(.b)', [])]));
        const first = selectorSets(sheet);
        resolveExtends(sheet);
        expect(selectorSets(sheet)).toEqual(first);
        expect(first[0]).toEqual(['.a', '.b', '.c']);
    });

    it('does not grow all-mode selectors when run again', () => {
        const sheet = evaluate(stylesheet([rule('.a .b:extend(.b all)', [decl('x', 'y')])]));
        expect(selectorSets(sheet)).toEqual([['.a .b', '.a .a .b']]);
        resolveExtends(sheet);
        resolveExtends(sheet);
        expect(selectorSets(sheet)).toEqual([['.a .b', '.a .a .b']]);
        expect(toCSS(sheet)).toBe('.a .b, .a .a .b {\n  x: y;\n}');
    });

    it('accepts the statement form inside a block', () => {
        expect(compile([rule('.a', [decl('color', 'red')]), rule('.b', [extend('.a')])])).toBe('.a, .b {\n  color: red;\n}');
    });

    it('matches nested selectors exactly', () => {
        const css = compile([rule('.p', [rule('.c', [decl('x', 'y')])]), rule('.d:extend(.p .c)', [])]);
        expect(css).toBe('.p .c, .d {\n  x: y;\n}');
    });

    it('replaces every occurrence in all mode', () => {
        expect(compile([rule('.a:hover', [decl('color', 'red')]), rule('.b:extend(.a all)', [])])).toBe('.a:hover, .b:hover {\n  color: red;\n}');
        expect(compile([rule('.a .a', [decl('color', 'red')]), rule('.b:extend(.a all)', [])])).toBe('.a .a, .b .b {\n  color: red;\n}');
    });

    it('needs the whole selector in exact mode', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(compile([rule('.a:hover', [decl('color', 'red')]), rule('.b:extend(.a)', [])])).toBe('.a:hover {\n  color: red;\n}');
        expect(warn).toHaveBeenCalledWith('[tessera] extend ".a" of ".b" has no matches (<input>:1:1)');
    });

    it('ends extend cycles silently', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const css = compile([rule('.a:extend(.b)', [decl('color', 'red')]), rule('.b:extend(.a)', [decl('color', 'blue')])]);
        expect(css).toBe('.a, .b {\n  color: red;\n}\n.b, .a {\n  color: blue;\n}');
        expect(warn).not.toHaveBeenCalled();
    });
});

describe('extend scopes', () => {
    it('keeps an extend inside an at-rule away from root blocks', () => {
        const css = compile([rule('.a', [decl('color', 'red')]), media('print', [rule('.b:extend(.a)', [decl('x', 'y')]), rule('.a', [decl('color', 'blue')])])]);
        expect(css).toBe('.a {\n  color: red;\n}\n@media print {\n  .b {\n    x: y;\n  }\n  .a, .b {\n    color: blue;\n  }\n}');
    });

    it('keeps a root extend away from at-rule blocks', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const css = compile([rule('.c:extend(.x)', [decl('x', 'y')]), media('print', [rule('.x', [decl('color', 'blue')])])]);
        expect(css).toBe('.c {\n  x: y;\n}\n@media print {\n  .x {\n    color: blue;\n  }\n}');
        expect(warn).toHaveBeenCalledWith('[tessera] extend ".x" of ".c" has no matches (<input>:1:1)');
    });

    it('ignores an extend outside any rule block', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(compile([rule('.a', [decl('color', 'red')]), extend('.a')])).toBe('.a {\n  color: red;\n}');
        expect(warn).toHaveBeenCalledWith('[tessera] :extend(.a) outside of a rule block is ignored (<input>:1:1)');
    });
});
