import { describe, it, expect } from 'vitest';
import { evaluate } from '../src/eval/evaluate';
import { EvaluationError } from '../src/eval/errors';
import type { EvaluateOptions } from '../src/eval/options';
import { toCSS } from '../src/output/to-css';
import { arg, callDetached, cmp, detached, decl, fn, include, mixin, op, rule, stylesheet, truthy, variable } from '../src/tree/builders';
import type { Statement } from '../src/tree/types';

function compile(rules: Statement[], options?: EvaluateOptions): string {
    return toCSS(evaluate(stylesheet(rules), options));
}

function evaluationError(run: () => unknown): EvaluationError {
    try {
        run();
    } catch (error) {
        if (error instanceof EvaluationError) return error;
        throw error;
    }
    throw new Error('expected an EvaluationError');
}

describe('mixin arguments', () => {
    const border = mixin('.border', ['@w: 1px', '@c'], [decl('border', '@w solid @c')]);

    it('binds positional arguments', () => {
        expect(compile([border, rule('.box', [include('.border', ['2px', 'red'])])])).toBe('.box {\n  border: 2px solid red;\n}');
    });

    it('binds named arguments and falls back to defaults', () => {
        expect(compile([border, rule('.box', [include('.border', [arg('c', 'blue')])])])).toBe('.box {\n  border: 1px solid blue;\n}');
    });

    it('lets defaults refer to earlier parameters', () => {
        const square = mixin('.square', ['@size', '@h: @size'], [decl('width', '@size'), decl('height', '@h')]);
        expect(compile([square, rule('.s', [include('.square', ['4px'])])])).toBe('.s {\n  width: 4px;\n  height: 4px;\n}');
    });

    it('captures the rest of the arguments', () => {
        const shadow = mixin('.shadow', ['@rest...'], [decl('box-shadow', '@rest')]);
        expect(compile([shadow, rule('.a', [include('.shadow', ['1px', '2px', 'black'])])])).toBe('.a {\n  box-shadow: 1px 2px black;\n}');
    });

    it('binds @arguments to every parameter value', () => {
        const shadow = mixin('.box-shadow', ['@x: 0', '@y: 0', '@c: black'], [decl('box-shadow', '@arguments')]);
        expect(compile([shadow, rule('.a', [include('.box-shadow', ['2px', '5px'])])])).toBe('.a {\n  box-shadow: 2px 5px black;\n}');
    });

    it('matches pattern parameters by their text', () => {
        const rules = [mixin('.mode', ['dark', '@c'], [decl('color', '@c')]), mixin('.mode', ['light', '@c'], [decl('background', '@c')]), rule('.a', [include('.mode', ['dark', 'red'])])];
        expect(compile(rules)).toBe('.a {\n  color: red;\n}');
    });

    it('rejects calls with too many arguments', () => {
        const rules = [mixin('.one', ['@a'], [decl('width', '@a')]), rule('.a', [include('.one', ['1px', '2px'])])];
        expect(evaluationError(() => compile(rules)).kind).toBe('NoMatchingGuard');
    });

    it('marks every declaration important for an !important call', () => {
        const rules = [mixin('.m', [], [decl('color', 'red'), decl('margin', '0')]), rule('.a', [include('.m', [], { important: true })])];
        expect(compile(rules)).toBe('.a {\n  color: red !important;\n  margin: 0 !important;\n}');
    });
});

describe('guards', () => {
    it('selects only the definition whose guard holds', () => {
        const rules = [
            mixin('.m', ['@a'], [decl('color', 'black')], { guard: cmp('@a', '>', 10) }),
            mixin('.m', ['@a'], [decl('color', 'white')], { guard: cmp('@a', '<=', 10) }),
            rule('.x', [include('.m', [20])]),
        ];
        expect(compile(rules)).toBe('.x {\n  color: black;\n}');
    });

    it('concatenates every matching definition in definition order', () => {
        const rules = [
            mixin('.m', ['@a'], [decl('color', 'black')], { guard: cmp('@a', '>=', 10) }),
            mixin('.m', ['@a'], [decl('color', 'white')], { guard: cmp('@a', '>', 5) }),
            rule('.x', [include('.m', [20])]),
        ];
        expect(compile(rules)).toBe('.x {\n  color: black;\n  color: white;\n}');
    });

    it('fails with NoMatchingGuard when no guard holds', () => {
        const rules = [mixin('.m', ['@a'], [decl('color', 'black')], { guard: cmp('@a', '>', 10) }), rule('.x', [include('.m', [1], { at: { file: 'main.tss', line: 7, column: 3 } })])];
        const error = evaluationError(() => compile(rules));
        expect(error.kind).toBe('NoMatchingGuard');
        expect(error.message).toBe('No matching definition was found for `.m(1)` (main.tss:7:3)');
    });

    it('uses default() only when nothing else matches', () => {
        const defs = [mixin('.m', ['@a'], [decl('width', 'exact')], { guard: cmp('@a', '=', 1) }), mixin('.m', ['@a'], [decl('width', 'fallback')], { guard: truthy(fn('default')) })];
        expect(compile([...defs, rule('.one', [include('.m', [1])])])).toBe('.one {\n  width: exact;\n}');
        expect(compile([...defs, rule('.two', [include('.m', [2])])])).toBe('.two {\n  width: fallback;\n}');
    });

    it('evaluates each matched definition in its own frame', () => {
        const rules = [
            mixin('.m', ['@a'], [variable('x', '1px'), decl('a', '@x')], { guard: cmp('@a', '>', 0) }),
            mixin('.m', ['@a'], [decl('b', '@x')], { guard: cmp('@a', '>', 0) }),
            rule('.x', [include('.m', [1])]),
        ];
        expect(evaluationError(() => compile(rules)).kind).toBe('UndefinedVariable');
    });

    it('drops a rule block whose guard is false', () => {
        const rules = [variable('mode', 'dark'), rule('.a', [decl('color', 'white')], { guard: cmp('@mode', '=', 'dark') }), rule('.b', [decl('color', 'black')], { guard: cmp('@mode', '=', 'light') })];
        expect(compile(rules)).toBe('.a {\n  color: white;\n}');
    });
});

describe('mixin lookup', () => {
    it('reports an undefined mixin at the call site', () => {
        const error = evaluationError(() => compile([rule('.a', [include('.missing', [], { at: { file: 'main.tss', line: 3, column: 5 } })])]));
        expect(error.kind).toBe('UndefinedMixin');
        expect(error.position).toEqual({ file: 'main.tss', line: 3, column: 5 });
        expect(error.construct).toBe('.missing()');
        expect(error.message).toBe('.missing() is undefined (main.tss:3:5)');
    });

    it('calls a rule block with a simple selector as a mixin', () => {
        const rules = [rule('.bordered', [decl('border', '1px solid')]), rule('.card', [include('.bordered')])];
        expect(compile(rules)).toBe('.bordered {\n  border: 1px solid;\n}\n.card {\n  border: 1px solid;\n}');
    });

    it('never lets a rule block call itself', () => {
        const rules = [mixin('.a', [], [decl('margin', '0')]), rule('.a', [include('.a')])];
        expect(compile(rules)).toBe('.a {\n  margin: 0;\n}');
    });

    it('resolves namespaced calls inside the namespace only', () => {
        const rules = [rule('#ns', [variable('c', 'red'), mixin('.m', [], [decl('color', '@c')])]), rule('.use', [include('#ns > .m')]), rule('.also', [include('#ns.m')])];
        expect(compile(rules)).toBe('.use {\n  color: red;\n}\n.also {\n  color: red;\n}');
    });

    it('does not find namespace members without the namespace', () => {
        const rules = [rule('#ns', [mixin('.m', [], [decl('color', 'red')])]), rule('.use', [include('.m')])];
        expect(evaluationError(() => compile(rules)).kind).toBe('UndefinedMixin');
    });

    it('supports recursion ended by a guard', () => {
        // The terminating overload comes first: a body only sees definitions bound before it
        const rules = [
            mixin('.loop', ['@i'], [], { guard: cmp('@i', '=', 0) }),
            mixin('.loop', ['@i'], [rule('.w-@{i}', [decl('width', '@i * 10px')]), include('.loop', [op('-', '@i', 1)])], { guard: cmp('@i', '>', 0) }),
            include('.loop', [2]),
        ];
        expect(compile(rules)).toBe('.w-2 {\n  width: 20px;\n}\n.w-1 {\n  width: 10px;\n}');
    });

    it('stops runaway recursion', () => {
        const rules = [mixin('.loop', [], [include('.loop')]), rule('.a', [include('.loop')])];
        expect(evaluationError(() => compile(rules, { maxCallDepth: 10 })).kind).toBe('RecursionLimit');
    });
});

describe('detached blocks', () => {
    it('runs the captured rules where called', () => {
        const rules = [variable('d', detached([decl('color', 'blue')])), rule('.x', [callDetached('d')])];
        expect(compile(rules)).toBe('.x {\n  color: blue;\n}');
    });

    it('resolves variables in the defining scope', () => {
        const rules = [variable('c', 'red'), variable('d', detached([decl('color', '@c')])), rule('.x', [variable('c', 'green'), callDetached('d')])];
        expect(compile(rules)).toBe('.x {\n  color: red;\n}');
    });

    it('refuses to call a plain value', () => {
        const error = evaluationError(() => compile([variable('d', '1px'), rule('.x', [callDetached('d')])]));
        expect(error.kind).toBe('InvalidOperationType');
        expect(error.construct).toBe('@d()');
    });
});
