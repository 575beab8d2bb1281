import type { Dimension, Keyword, Value } from '../tree/types';
import { unquotedText } from '../output/value-css';

/**
 * A function callable from values. Receives evaluated arguments; returning
 * undefined leaves the call in the output as written.
 */
export type CustomFunction = (...args: Value[]) => Value | undefined;

export interface FunctionRegistry {
    /** undefined means not registered, or declined the arguments */
    call(name: string, args: Value[]): Value | undefined;
}

const TRUE: Keyword = { type: 'Keyword', value: 'true' };
const FALSE: Keyword = { type: 'Keyword', value: 'false' };

function bool(value: boolean): Keyword {
    return value ? TRUE : FALSE;
}

function isDimension(value: Value | undefined): value is Dimension {
    return value !== undefined && value.type === 'Dimension';
}

function hasUnit(value: Value | undefined, unit: string): boolean {
    return isDimension(value) && value.unit === unit;
}

function mapNumber(fn: (n: number) => number): CustomFunction {
    return (value) => (isDimension(value) ? { ...value, value: fn(value.value) } : undefined);
}

/** min()/max(): all arguments must be dimensions of one unit (or unitless) */
function pick(better: (a: number, b: number) => boolean): CustomFunction {
    return (...args) => {
        if (args.length === 0 || !args.every(isDimension)) return undefined;
        const dims = args.filter(isDimension);
        const units = new Set(dims.map((d) => d.unit).filter(Boolean));
        if (units.size > 1) return undefined;
        return dims.reduce((best, d) => (better(d.value, best.value) ? d : best));
    };
}

export const BUILTIN_FUNCTIONS: Record<string, CustomFunction> = {
    // Type predicates
    isnumber: (v) => bool(isDimension(v)),
    isstring: (v) => bool(v !== undefined && v.type === 'Quoted'),
    iscolor: (v) => bool(v !== undefined && v.type === 'Color'),
    iskeyword: (v) => bool(v !== undefined && v.type === 'Keyword'),
    ispixel: (v) => bool(hasUnit(v, 'px')),
    ispercentage: (v) => bool(hasUnit(v, '%')),
    isem: (v) => bool(hasUnit(v, 'em')),
    isunit: (v, unit) => bool(unit !== undefined && hasUnit(v, unquotedText(unit))),

    // Math
    percentage: (v) => (isDimension(v) ? { type: 'Dimension', value: v.value * 100, unit: '%' } : undefined),
    round: (v, places) => {
        if (!isDimension(v)) return undefined;
        const digits = isDimension(places) ? places.value : 0;
        const factor = Math.pow(10, digits);
        return { ...v, value: Math.round(v.value * factor) / factor };
    },
    ceil: mapNumber(Math.ceil),
    floor: mapNumber(Math.floor),
    abs: mapNumber(Math.abs),
    min: pick((a, b) => a < b),
    max: pick((a, b) => a > b),

    // Units and strings
    unit: (v, unit) => (isDimension(v) ? { type: 'Dimension', value: v.value, unit: unit === undefined ? '' : unquotedText(unit) } : undefined),
    e: (v) => (v !== undefined ? { type: 'Quoted', value: unquotedText(v), quote: '"', escaped: true } : undefined),
};

/**
 * Built-ins plus caller-supplied functions. Names are case-insensitive;
 * user entries shadow built-ins of the same name.
 */
export function createFunctionRegistry(extra: Record<string, CustomFunction> = {}): FunctionRegistry {
    const table = new Map<string, CustomFunction>();
    for (const [name, fn] of Object.entries(BUILTIN_FUNCTIONS)) table.set(name, fn);
    for (const [name, fn] of Object.entries(extra)) table.set(name.toLowerCase(), fn);

    return {
        call(name, args) {
            const fn = table.get(name.toLowerCase());
            return fn ? fn(...args) : undefined;
        },
    };
}
