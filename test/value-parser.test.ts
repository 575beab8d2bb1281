import { describe, it, expect } from 'vitest';
import { parseValue } from '../src/tree/value-parser';
import { valueToCSS } from '../src/output/value-css';

describe('parseValue', () => {
    it('parses dimensions', () => {
        expect(parseValue('10px')).toEqual({ type: 'Dimension', value: 10, unit: 'px' });
        expect(parseValue('-1.5em')).toEqual({ type: 'Dimension', value: -1.5, unit: 'em' });
        expect(parseValue('50%')).toEqual({ type: 'Dimension', value: 50, unit: '%' });
    });

    it('parses space-separated values into an expression', () => {
        expect(parseValue('1px solid #fff')).toEqual({
            type: 'Expression',
            items: [
                { type: 'Dimension', value: 1, unit: 'px' },
                { type: 'Keyword', value: 'solid' },
                { type: 'Color', rgb: [255, 255, 255], alpha: 1, raw: '#fff' },
            ],
        });
    });

    it('gives * precedence over +', () => {
        expect(parseValue('@a + 2 * 3px')).toEqual({
            type: 'Operation',
            op: '+',
            left: { type: 'VariableRef', name: '@a' },
            right: {
                type: 'Operation',
                op: '*',
                left: { type: 'Dimension', value: 2, unit: '' },
                right: { type: 'Dimension', value: 3, unit: 'px' },
            },
        });
    });

    it('keeps / literal outside parentheses', () => {
        const value = parseValue('12px/1.5');
        expect(value.type).toBe('Expression');
        expect(valueToCSS(value)).toBe('12px/1.5');
    });

    it('divides inside parentheses', () => {
        expect(parseValue('(@a / 2)')).toEqual({
            type: 'Operation',
            op: '/',
            left: { type: 'VariableRef', name: '@a' },
            right: { type: 'Dimension', value: 2, unit: '' },
        });
    });

    it('parses media features into a list', () => {
        expect(parseValue('(orientation: landscape), (orientation: portrait)')).toEqual({
            type: 'ValueList',
            items: [
                { type: 'MediaFeature', name: 'orientation', value: { type: 'Keyword', value: 'landscape' } },
                { type: 'MediaFeature', name: 'orientation', value: { type: 'Keyword', value: 'portrait' } },
            ],
        });
        expect(valueToCSS(parseValue('screen and (color)'))).toBe('screen and (color)');
    });

    it('parses strings and escaped strings', () => {
        expect(parseValue('"a b"')).toEqual({ type: 'Quoted', value: 'a b', quote: '"', escaped: false });
        expect(parseValue("~'raw'")).toEqual({ type: 'Quoted', value: 'raw', quote: "'", escaped: true });
    });

    it('parses function calls with comma-separated arguments', () => {
        expect(parseValue('fade(@c, 10%)')).toEqual({
            type: 'Call',
            name: 'fade',
            args: [
                { type: 'VariableRef', name: '@c' },
                { type: 'Dimension', value: 10, unit: '%' },
            ],
        });
    });

    it('negates variables', () => {
        expect(parseValue('-@gap')).toEqual({
            type: 'Operation',
            op: '*',
            left: { type: 'Dimension', value: -1, unit: '' },
            right: { type: 'VariableRef', name: '@gap' },
        });
    });
});

describe('valueToCSS', () => {
    it('trims float noise', () => {
        expect(valueToCSS({ type: 'Dimension', value: 0.1 + 0.2, unit: 'em' })).toBe('0.3em');
    });

    it('prints computed colors as hex, translucent ones as rgba', () => {
        expect(valueToCSS({ type: 'Color', rgb: [51, 51, 51], alpha: 1 })).toBe('#333333');
        expect(valueToCSS({ type: 'Color', rgb: [300, -4, 0], alpha: 0.5 })).toBe('rgba(255, 0, 0, 0.5)');
    });
});
