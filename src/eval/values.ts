import type { ArithmeticOperator, Color, Dimension, SourcePosition, Value } from '../tree/types';
import { assertNever } from '../tree/types';
import { unquotedText, valueToCSS } from '../output/value-css';
import { EvaluationError } from './errors';
import type { EvalContext } from './options';
import { lookupVariable } from './scope';

/** The part of the evaluation context values depend on */
export type ValueContext = Pick<EvalContext, 'state' | 'frame' | 'guardDefault'>;

/**
 * Reduce a value to its concrete form: variables looked up, operations
 * computed, functions called, strings interpolated. Detached blocks capture
 * the current scope as their closure.
 *
 * `pos` is the position of the statement the value belongs to, used when
 * the value itself carries none.
 */
export function evalValue(value: Value, ctx: ValueContext, pos: SourcePosition): Value {
    switch (value.type) {
        case 'Dimension':
        case 'Color':
        case 'Keyword':
            return value;
        case 'Quoted':
            return value.value.includes('@{') ? { ...value, value: interpolate(value.value, ctx, pos) } : value;
        case 'Expression': {
            const items = value.items.map((item) => evalValue(item, ctx, pos));
            return items.length === 1 ? items[0] : { type: 'Expression', items };
        }
        case 'ValueList': {
            const items = value.items.map((item) => evalValue(item, ctx, pos));
            return items.length === 1 ? items[0] : { type: 'ValueList', items };
        }
        case 'VariableRef':
            return resolveVariable(value.name, ctx, value.pos ?? pos);
        case 'Operation': {
            const left = evalValue(value.left, ctx, pos);
            const right = evalValue(value.right, ctx, pos);
            return operate(value.op, left, right, ctx.state.options.strictUnits, value.pos ?? pos);
        }
        case 'Call':
            return evalCall(value.name, value.args, ctx, value.pos ?? pos);
        case 'MediaFeature':
            return value.value ? { ...value, value: evalValue(value.value, ctx, pos) } : value;
        case 'DetachedBlock':
            return value.closure ? value : { ...value, closure: ctx.frame.ref() };
        default:
            return assertNever(value);
    }
}

/**
 * `@name` or, with a double sigil, `@@name`: the value of `@name` names the
 * variable to read.
 */
export function resolveVariable(name: string, ctx: ValueContext, pos: SourcePosition): Value {
    if (name.startsWith('@@')) {
        const inner = resolveVariable(name.slice(1), ctx, pos);
        return resolveVariable(`@${unquotedText(inner)}`, ctx, pos);
    }
    const found = lookupVariable(name, ctx.frame.ref());
    if (found === undefined) {
        throw new EvaluationError('UndefinedVariable', `variable ${name} is undefined`, pos, name);
    }
    return found;
}

/** Replace every `@{name}` in `text` with the variable's unquoted CSS text */
export function interpolate(text: string, ctx: ValueContext, pos: SourcePosition): string {
    return text.replace(/@\{([\w-]+)\}/g, (_, name: string) => unquotedText(resolveVariable(`@${name}`, ctx, pos)));
}

function evalCall(name: string, args: Value[], ctx: ValueContext, pos: SourcePosition): Value {
    if (name === 'default' && args.length === 0) {
        // Only meaningful inside a mixin guard; elsewhere it stays literal
        if (ctx.guardDefault === undefined) return { type: 'Call', name, args };
        return { type: 'Keyword', value: ctx.guardDefault ? 'true' : 'false' };
    }
    const evaluated = args.map((arg) => evalValue(arg, ctx, pos));
    return ctx.state.functions.call(name, evaluated) ?? { type: 'Call', name, args: evaluated };
}

// =============================================================================
// Arithmetic
// =============================================================================

function invalidOperation(op: ArithmeticOperator, left: Value, right: Value, pos: SourcePosition): EvaluationError {
    const construct = `${valueToCSS(left)} ${op} ${valueToCSS(right)}`;
    return new EvaluationError('InvalidOperationType', `Operation on an invalid type: ${construct}`, pos, construct);
}

function apply(op: ArithmeticOperator, a: number, b: number): number {
    switch (op) {
        case '+':
            return a + b;
        case '-':
            return a - b;
        case '*':
            return a * b;
        case '/':
            return a / b;
    }
}

/**
 * Compute `left op right`.
 *
 * Dimensions: a unitless side takes the other side's unit; two different
 * units keep the left one (or fail under `strictUnits`). Colors combine
 * per channel, with a dimension applied to every channel.
 */
export function operate(op: ArithmeticOperator, left: Value, right: Value, strictUnits: boolean, pos: SourcePosition): Value {
    if (left.type === 'Dimension' && right.type === 'Dimension') {
        return operateDimensions(op, left, right, strictUnits, pos);
    }
    const l = asColor(left);
    const r = asColor(right);
    if (l && r && (left.type === 'Color' || right.type === 'Color')) {
        if (op === '/' && r.rgb.some((c) => c === 0)) throw divisionByZero(left, right, pos);
        const rgb: [number, number, number] = [apply(op, l.rgb[0], r.rgb[0]), apply(op, l.rgb[1], r.rgb[1]), apply(op, l.rgb[2], r.rgb[2])];
        return { type: 'Color', rgb, alpha: left.type === 'Color' ? l.alpha : r.alpha };
    }
    throw invalidOperation(op, left, right, pos);
}

function operateDimensions(op: ArithmeticOperator, left: Dimension, right: Dimension, strictUnits: boolean, pos: SourcePosition): Dimension {
    if (op === '/' && right.value === 0) throw divisionByZero(left, right, pos);
    let unit = left.unit;
    if (unit === '') {
        unit = right.unit;
    } else if (right.unit !== '' && right.unit !== left.unit && strictUnits) {
        const construct = `${valueToCSS(left)} ${op} ${valueToCSS(right)}`;
        throw new EvaluationError('InvalidOperationType', `Incompatible units: ${construct}`, pos, construct);
    }
    return { type: 'Dimension', value: apply(op, left.value, right.value), unit };
}

function divisionByZero(left: Value, right: Value, pos: SourcePosition): EvaluationError {
    const construct = `${valueToCSS(left)} / ${valueToCSS(right)}`;
    return new EvaluationError('InvalidOperationType', `Division by zero: ${construct}`, pos, construct);
}

function asColor(value: Value): Color | undefined {
    if (value.type === 'Color') return value;
    if (value.type === 'Dimension') return { type: 'Color', rgb: [value.value, value.value, value.value], alpha: 1 };
    return undefined;
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Order two evaluated values: -1, 0, 1, or undefined when they cannot be
 * compared (different kinds, incompatible units, unordered colors).
 */
export function compare(a: Value, b: Value): -1 | 0 | 1 | undefined {
    if (a.type === 'Dimension' && b.type === 'Dimension') {
        if (a.unit !== b.unit && a.unit !== '' && b.unit !== '') return undefined;
        return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
    }
    if (a.type === 'Color' && b.type === 'Color') {
        const same = a.alpha === b.alpha && a.rgb.every((c, i) => Math.round(c) === Math.round(b.rgb[i]));
        return same ? 0 : undefined;
    }
    if (isText(a) && isText(b)) {
        return unquotedText(a) === unquotedText(b) ? 0 : undefined;
    }
    return valueToCSS(a) === valueToCSS(b) ? 0 : undefined;
}

function isText(value: Value): boolean {
    return value.type === 'Keyword' || value.type === 'Quoted';
}
