import type { Color, Value } from '../tree/types';
import { assertNever } from '../tree/types';

/** Drop float noise: 0.1 + 0.2 prints as 0.3 */
export function formatNumber(value: number): string {
    const rounded = parseFloat(value.toFixed(8));
    return Object.is(rounded, -0) ? '0' : String(rounded);
}

function channel(value: number): number {
    return Math.round(Math.min(255, Math.max(0, value)));
}

export function colorToCSS(color: Color): string {
    if (color.raw) return color.raw;
    const [r, g, b] = color.rgb.map(channel);
    const alpha = Math.min(1, Math.max(0, color.alpha));
    if (alpha < 1) return `rgba(${r}, ${g}, ${b}, ${formatNumber(alpha)})`;
    return '#' + [r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('');
}

/**
 * Render a value as CSS text.
 *
 * Works on evaluated and unevaluated values alike: variable references and
 * operations print as written, which is what error messages and
 * pass-through calls need.
 */
export function valueToCSS(value: Value): string {
    switch (value.type) {
        case 'Dimension':
            return formatNumber(value.value) + value.unit;
        case 'Color':
            return colorToCSS(value);
        case 'Keyword':
            return value.value;
        case 'Quoted':
            return value.escaped ? value.value : `${value.quote}${value.value}${value.quote}`;
        case 'Expression':
            return expressionToCSS(value.items);
        case 'ValueList':
            return value.items.map(valueToCSS).join(', ');
        case 'VariableRef':
            return value.name;
        case 'Operation':
            return `${valueToCSS(value.left)} ${value.op} ${valueToCSS(value.right)}`;
        case 'Call':
            return `${value.name}(${value.args.map(valueToCSS).join(', ')})`;
        case 'MediaFeature':
            return value.value ? `(${value.name}: ${valueToCSS(value.value)})` : `(${value.name})`;
        case 'DetachedBlock':
            return '{...}';
        default:
            return assertNever(value);
    }
}

/** Space-joined, except around a literal `/` (`12px/1.5`) */
function expressionToCSS(items: Value[]): string {
    let out = '';
    items.forEach((item, i) => {
        const text = valueToCSS(item);
        const slash = item.type === 'Keyword' && item.value === '/';
        const afterSlash = i > 0 && isSlash(items[i - 1]);
        out += i === 0 || slash || afterSlash ? text : ` ${text}`;
    });
    return out;
}

function isSlash(value: Value): boolean {
    return value.type === 'Keyword' && value.value === '/';
}

/** Text of a value with the quotes of a quoted string removed */
export function unquotedText(value: Value): string {
    return value.type === 'Quoted' ? value.value : valueToCSS(value);
}
