import { describe, it, expect } from 'vitest';
import { Frame, lookupMixins, lookupOwnMixins, lookupVariable } from '../src/eval/scope';
import { dim, mixin } from '../src/tree/builders';

describe('lookupVariable', () => {
    it('returns undefined when nothing binds the name', () => {
        expect(lookupVariable('@missing', new Frame().ref())).toBeUndefined();
    });

    it('does not see bindings made after the snapshot', () => {
        const frame = new Frame();
        frame.defineVariable('@a', dim(1));
        const early = frame.ref();
        frame.defineVariable('@a', dim(2));
        frame.defineVariable('@b', dim(3));

        expect(lookupVariable('@a', early)).toEqual(dim(1));
        expect(lookupVariable('@b', early)).toBeUndefined();
        expect(lookupVariable('@a', frame.ref())).toEqual(dim(2));
    });

    it('lets inner frames shadow outer ones', () => {
        const outer = new Frame();
        outer.defineVariable('@a', dim(1, 'px'));
        outer.defineVariable('@b', dim(2, 'px'));
        const inner = new Frame(outer.ref());
        inner.defineVariable('@a', dim(10, 'px'));

        expect(lookupVariable('@a', inner.ref())).toEqual(dim(10, 'px'));
        expect(lookupVariable('@b', inner.ref())).toEqual(dim(2, 'px'));
    });

    it('chains a child to its parent as of its creation', () => {
        const outer = new Frame();
        const inner = new Frame(outer.ref());
        outer.defineVariable('@late', dim(1));
        expect(lookupVariable('@late', inner.ref())).toBeUndefined();
    });
});

describe('lookupMixins', () => {
    const definition = (name: string) => ({ definition: mixin(name, [], []), source: 'definition' as const, blocksOutput: false });

    it('keeps every overload in definition order', () => {
        const frame = new Frame();
        const first = frame.defineMixin('.m', definition('.m'));
        const second = frame.defineMixin('.m', definition('.m'));
        expect(lookupMixins('.m', frame.ref())).toEqual([first, second]);
    });

    it('stops at the first frame that binds the name', () => {
        const outer = new Frame();
        outer.defineMixin('.m', definition('.m'));
        outer.defineMixin('.m', definition('.m'));
        const inner = new Frame(outer.ref());
        const shadow = inner.defineMixin('.m', definition('.m'));

        expect(lookupMixins('.m', inner.ref())).toEqual([shadow]);
    });

    it('keeps searching outward past rejected candidates', () => {
        const outer = new Frame();
        const kept = outer.defineMixin('.m', definition('.m'));
        const inner = new Frame(outer.ref());
        const rejected = inner.defineMixin('.m', definition('.m'));

        expect(lookupMixins('.m', inner.ref(), (candidate) => candidate !== rejected)).toEqual([kept]);
    });

    it('gives a definition a scope that includes itself', () => {
        const frame = new Frame();
        const candidate = frame.defineMixin('.loop', definition('.loop'));
        expect(lookupMixins('.loop', candidate.scope)).toEqual([candidate]);
    });

    it('looks up namespace members without a snapshot limit', () => {
        const frame = new Frame();
        const early = frame.ref();
        const member = frame.defineMixin('.m', definition('.m'));
        expect(lookupMixins('.m', early)).toEqual([]);
        expect(lookupOwnMixins('.m', frame)).toEqual([member]);
    });
});
