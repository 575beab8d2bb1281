import type { Condition, SourcePosition } from '../tree/types';
import { assertNever } from '../tree/types';
import type { ValueContext } from './values';
import { compare, evalValue } from './values';

export function evalCondition(condition: Condition, ctx: ValueContext, pos: SourcePosition): boolean {
    switch (condition.type) {
        case 'Comparison': {
            const order = compare(evalValue(condition.left, ctx, pos), evalValue(condition.right, ctx, pos));
            switch (condition.op) {
                case '<':
                    return order === -1;
                case '<=':
                case '=<':
                    return order === -1 || order === 0;
                case '=':
                    return order === 0;
                case '>=':
                    return order === 0 || order === 1;
                case '>':
                    return order === 1;
            }
        }
        case 'And':
            return evalCondition(condition.left, ctx, pos) && evalCondition(condition.right, ctx, pos);
        case 'Or':
            return evalCondition(condition.left, ctx, pos) || evalCondition(condition.right, ctx, pos);
        case 'Not':
            return !evalCondition(condition.condition, ctx, pos);
        case 'Truthy': {
            const value = evalValue(condition.value, ctx, pos);
            return value.type === 'Keyword' && value.value === 'true';
        }
        default:
            return assertNever(condition);
    }
}

/**
 * How a mixin guard depends on `default()`:
 *
 *   'always'        true whatever default() returns
 *   'when-default'  true only while default() is true
 *   'when-not'      true only while default() is false
 *   'never'         false either way
 */
export type GuardOutcome = 'always' | 'when-default' | 'when-not' | 'never';

export function classifyGuard(condition: Condition | undefined, ctx: ValueContext, pos: SourcePosition): GuardOutcome {
    if (!condition) return 'always';
    const ifDefault = evalCondition(condition, { ...ctx, guardDefault: true }, pos);
    const ifNotDefault = evalCondition(condition, { ...ctx, guardDefault: false }, pos);
    if (ifDefault && ifNotDefault) return 'always';
    if (ifDefault) return 'when-default';
    if (ifNotDefault) return 'when-not';
    return 'never';
}
