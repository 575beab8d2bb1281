import valueParser from 'postcss-value-parser';
import type { ArithmeticOperator, Color, Value } from './types';

type Token = { kind: 'operand'; value: Value } | { kind: 'op'; op: ArithmeticOperator };

const HEX_COLOR = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse value or media-feature text into Value nodes.
 *
 *   `1px solid @c`                    → Expression
 *   `@a + 2 * 3px`                    → Operation tree (usual precedence)
 *   `(orientation: landscape), print` → ValueList [MediaFeature, Keyword]
 *   `~"raw"`                          → escaped Quoted
 *
 * `/` divides only inside parentheses; elsewhere it stays literal so
 * shorthands like `12px/1.5` survive.
 */
export function parseValue(text: string): Value {
    const parsed = valueParser(text.trim());
    return convertList(parsed.nodes, false);
}

export function parseHexColor(hex: string): Color | undefined {
    const match = hex.match(HEX_COLOR);
    if (!match) return undefined;
    let digits = match[1];
    if (digits.length <= 4) {
        digits = digits
            .split('')
            .map((d) => d + d)
            .join('');
    }
    const rgb: [number, number, number] = [parseInt(digits.slice(0, 2), 16), parseInt(digits.slice(2, 4), 16), parseInt(digits.slice(4, 6), 16)];
    const alpha = digits.length === 8 ? parseInt(digits.slice(6, 8), 16) / 255 : 1;
    return { type: 'Color', rgb, alpha, raw: hex };
}

function convertList(nodes: valueParser.Node[], inParens: boolean): Value {
    const groups: valueParser.Node[][] = [[]];
    for (const node of nodes) {
        if (node.type === 'div' && node.value === ',') groups.push([]);
        else groups[groups.length - 1].push(node);
    }
    const items = groups.map((group) => convertSpaced(group, inParens));
    return items.length === 1 ? items[0] : { type: 'ValueList', items };
}

function convertSpaced(nodes: valueParser.Node[], inParens: boolean): Value {
    const tokens: Token[] = [];
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes[i];
        switch (node.type) {
            case 'space':
            case 'comment':
                break;
            case 'div':
                if (node.value === '/' && inParens) tokens.push({ kind: 'op', op: '/' });
                else tokens.push(operand({ type: 'Keyword', value: node.value }));
                break;
            case 'word': {
                const next = nodes[i + 1];
                if (node.value === '~' && next && next.type === 'string') {
                    tokens.push(operand({ type: 'Quoted', value: next.value, quote: quoteOf(next), escaped: true }));
                    i++;
                } else if (node.value === '+' || node.value === '-' || node.value === '*') {
                    tokens.push({ kind: 'op', op: node.value });
                } else {
                    tokens.push(operand(convertWord(node.value)));
                }
                break;
            }
            case 'string':
                tokens.push(operand({ type: 'Quoted', value: node.value, quote: quoteOf(node), escaped: false }));
                break;
            case 'function':
                tokens.push(operand(convertFunction(node)));
                break;
            case 'unicode-range':
                tokens.push(operand({ type: 'Keyword', value: node.value }));
                break;
        }
    }
    return combine(tokens);
}

function operand(value: Value): Token {
    return { kind: 'operand', value };
}

function quoteOf(node: valueParser.StringNode): '"' | "'" {
    return node.quote === "'" ? "'" : '"';
}

function convertWord(word: string): Value {
    if (word.startsWith('@')) return { type: 'VariableRef', name: word };
    if (word.startsWith('-@')) {
        return { type: 'Operation', op: '*', left: { type: 'Dimension', value: -1, unit: '' }, right: { type: 'VariableRef', name: word.slice(1) } };
    }
    const color = parseHexColor(word);
    if (color) return color;
    const dimension = valueParser.unit(word);
    if (dimension && dimension.number !== '' && !Number.isNaN(Number(dimension.number))) {
        return { type: 'Dimension', value: Number(dimension.number), unit: dimension.unit };
    }
    return { type: 'Keyword', value: word };
}

function convertFunction(node: valueParser.FunctionNode): Value {
    if (node.value === '') {
        const colon = node.nodes.findIndex((n) => n.type === 'div' && n.value === ':');
        if (colon >= 0) {
            return {
                type: 'MediaFeature',
                name: valueParser.stringify(node.nodes.slice(0, colon)).trim(),
                value: convertList(node.nodes.slice(colon + 1), true),
            };
        }
        const significant = node.nodes.filter((n) => n.type !== 'space' && n.type !== 'comment');
        const [only] = significant;
        if (significant.length === 1 && only.type === 'word' && convertWord(only.value).type === 'Keyword') {
            return { type: 'MediaFeature', name: only.value };
        }
        // Plain grouping
        return convertList(node.nodes, true);
    }

    if (node.value.toLowerCase() === 'url') {
        const [only] = node.nodes;
        const arg: Value = node.nodes.length === 1 && only.type === 'string' ? { type: 'Quoted', value: only.value, quote: quoteOf(only), escaped: false } : { type: 'Keyword', value: valueParser.stringify(node.nodes) };
        return { type: 'Call', name: node.value, args: [arg] };
    }

    const groups: valueParser.Node[][] = [[]];
    for (const n of node.nodes) {
        if (n.type === 'div' && n.value === ',') groups.push([]);
        else groups[groups.length - 1].push(n);
    }
    const args = node.nodes.length === 0 ? [] : groups.map((group) => convertSpaced(group, true));
    return { type: 'Call', name: node.value, args };
}

/**
 * Fold operand/operator runs into Operation trees; bare neighbours form an
 * Expression. `*` and `/` bind tighter than `+` and `-`.
 */
function combine(tokens: Token[]): Value {
    const items: Value[] = [];
    let i = 0;
    while (i < tokens.length) {
        const token = tokens[i];
        if (token.kind === 'op') {
            items.push({ type: 'Keyword', value: token.op });
            i++;
            continue;
        }
        const operands: Value[] = [token.value];
        const ops: ArithmeticOperator[] = [];
        let j = i + 1;
        while (j + 1 < tokens.length) {
            const op = tokens[j];
            const right = tokens[j + 1];
            if (op.kind !== 'op' || right.kind !== 'operand') break;
            ops.push(op.op);
            operands.push(right.value);
            j += 2;
        }
        items.push(withPrecedence(operands, ops));
        i = j;
    }
    if (items.length === 0) return { type: 'Keyword', value: '' };
    return items.length === 1 ? items[0] : { type: 'Expression', items };
}

function withPrecedence(operands: Value[], ops: ArithmeticOperator[]): Value {
    const terms: Value[] = [operands[0]];
    const additive: ArithmeticOperator[] = [];
    ops.forEach((op, k) => {
        const right = operands[k + 1];
        if (op === '*' || op === '/') {
            terms[terms.length - 1] = { type: 'Operation', op, left: terms[terms.length - 1], right };
        } else {
            additive.push(op);
            terms.push(right);
        }
    });
    return additive.reduce<Value>((left, op, k) => ({ type: 'Operation', op, left, right: terms[k + 1] }), terms[0]);
}
