import type {
    AndCondition,
    ArithmeticOperator,
    AtRule,
    Call,
    Color,
    Comparison,
    ComparisonOperator,
    Condition,
    ConditionalAtRule,
    ConditionalAtRuleKind,
    DetachedBlock,
    DetachedCall,
    Dimension,
    Declaration,
    Expression,
    ExtendClause,
    Import,
    ImportOptions,
    Keyword,
    MediaFeature,
    MixinArgument,
    MixinDefinition,
    MixinInvocation,
    MixinParam,
    NotCondition,
    Operation,
    OrCondition,
    Quoted,
    RuleBlock,
    Selector,
    SourcePosition,
    Statement,
    Stylesheet,
    Truthy,
    Value,
    ValueList,
    VariableRef,
    Visibility,
} from './types';
import { parseExtendTarget, parseSelectorList } from './selector';
import { parseHexColor, parseValue } from './value-parser';

/** A value node, CSS text to parse, or a unitless number */
export type ValueInput = Value | string | number;

export interface NodeOptions {
    at?: Partial<SourcePosition>;
    visibility?: Visibility;
    blocksOutput?: boolean;
}

function position(at: Partial<SourcePosition> = {}): SourcePosition {
    return { file: at.file, line: at.line ?? 1, column: at.column ?? 1 };
}

function base(opts: NodeOptions = {}): { pos: SourcePosition; visibility: Visibility; blocksOutput: boolean } {
    return { pos: position(opts.at), visibility: opts.visibility ?? 'inherit', blocksOutput: opts.blocksOutput ?? false };
}

export function toValue(input: ValueInput): Value {
    if (typeof input === 'number') return dim(input);
    if (typeof input === 'string') return parseValue(input);
    return input;
}

function variableName(name: string): string {
    return name.startsWith('@') ? name : `@${name}`;
}

// =============================================================================
// Statements
// =============================================================================

export function stylesheet(rules: Statement[], opts: NodeOptions = {}): Stylesheet {
    return { type: 'Stylesheet', rules, ...base(opts) };
}

/** `rule('.a, .b:extend(.c)', [...])` */
export function rule(selectors: string | Selector[], rules: Statement[], opts: NodeOptions & { guard?: Condition } = {}): RuleBlock {
    const common = base(opts);
    const parsed = typeof selectors === 'string' ? parseSelectorList(selectors, common.pos) : selectors;
    return { type: 'RuleBlock', selectors: parsed, rules, guard: opts.guard, extends: [], ...common };
}

/** A trailing `!important` in value text sets the flag */
export function decl(name: string, value: ValueInput, opts: NodeOptions & { important?: boolean } = {}): Declaration {
    let important = opts.important ?? false;
    let input = value;
    if (typeof input === 'string' && /\s*!important\s*$/.test(input)) {
        important = true;
        input = input.replace(/\s*!important\s*$/, '');
    }
    return { type: 'Declaration', name, value: toValue(input), important, variable: false, ...base(opts) };
}

export function variable(name: string, value: ValueInput, opts: NodeOptions = {}): Declaration {
    return { type: 'Declaration', name: variableName(name), value: toValue(value), important: false, variable: true, ...base(opts) };
}

export function param(name: string, defaultValue?: ValueInput): MixinParam {
    return { name: variableName(name), defaultValue: defaultValue === undefined ? undefined : toValue(defaultValue), variadic: false };
}

/** `...` or `@rest...` */
export function restParam(name?: string): MixinParam {
    return { name: name === undefined ? undefined : variableName(name), variadic: true };
}

/** Literal parameter the argument must equal, e.g. `.m(dark; @c)` */
export function patternParam(value: ValueInput): MixinParam {
    return { pattern: toValue(value), variadic: false };
}

/**
 * Parameter shorthand: `'@a'`, `'@a: 10px'`, `'...'`, `'@rest...'`;
 * anything else is a pattern.
 */
function toParam(input: MixinParam | string): MixinParam {
    if (typeof input !== 'string') return input;
    const text = input.trim();
    if (text === '...') return restParam();
    if (text.startsWith('@') && text.endsWith('...')) return restParam(text.slice(0, -3));
    if (text.startsWith('@')) {
        const colon = text.indexOf(':');
        return colon < 0 ? param(text) : param(text.slice(0, colon).trim(), text.slice(colon + 1).trim());
    }
    return patternParam(text);
}

export function mixin(name: string, params: Array<MixinParam | string>, rules: Statement[], opts: NodeOptions & { guard?: Condition } = {}): MixinDefinition {
    return { type: 'MixinDefinition', name, params: params.map(toParam), guard: opts.guard, rules, ...base(opts) };
}

export function arg(name: string, value: ValueInput): MixinArgument {
    return { name: variableName(name), value: toValue(value) };
}

/** Split `#ns > .m` or `#ns.m` into path segments */
export function mixinPath(text: string): string[] {
    return text
        .split(/\s*>\s*|\s+|(?=[.#])/)
        .map((segment) => segment.trim())
        .filter(Boolean);
}

export function include(path: string, args: Array<ValueInput | MixinArgument> = [], opts: NodeOptions & { important?: boolean } = {}): MixinInvocation {
    const converted = args.map((a): MixinArgument => {
        if (typeof a === 'object' && !('type' in a)) return a;
        return { value: toValue(a) };
    });
    return { type: 'MixinInvocation', path: mixinPath(path), args: converted, important: opts.important ?? false, ...base(opts) };
}

function conditional(kind: ConditionalAtRuleKind, features: ValueInput, rules: Statement[], opts: NodeOptions): ConditionalAtRule {
    return { type: 'ConditionalAtRule', kind, features: toValue(features), rules, ...base(opts) };
}

export function media(features: ValueInput, rules: Statement[], opts: NodeOptions = {}): ConditionalAtRule {
    return conditional('media', features, rules, opts);
}

export function supports(features: ValueInput, rules: Statement[], opts: NodeOptions = {}): ConditionalAtRule {
    return conditional('supports', features, rules, opts);
}

export function container(features: ValueInput, rules: Statement[], opts: NodeOptions = {}): ConditionalAtRule {
    return conditional('container', features, rules, opts);
}

/** Generic at-rule; pass `rules` for a body (`@font-face`), omit for `@charset "x";` */
export function atRule(name: string, prelude?: ValueInput, rules?: Statement[], opts: NodeOptions = {}): AtRule {
    return { type: 'AtRule', name: name.replace(/^@/, ''), prelude: prelude === undefined ? undefined : toValue(prelude), rules, ...base(opts) };
}

/** Statement form `&:extend(.a all);` */
export function extend(target: string, opts: NodeOptions = {}): ExtendClause {
    const common = base(opts);
    return { ...parseExtendTarget(target, common.pos), ...common };
}

export function callDetached(name: string, opts: NodeOptions = {}): DetachedCall {
    return { type: 'DetachedCall', name: variableName(name), ...base(opts) };
}

export function importRule(path: ValueInput, opts: NodeOptions & Partial<ImportOptions> = {}): Import {
    const options: ImportOptions = { reference: opts.reference ?? false, css: opts.css ?? false, multiple: opts.multiple ?? false };
    return { type: 'Import', path: typeof path === 'string' && !/^(["']|url\()/.test(path) ? str(path) : toValue(path), options, ...base(opts) };
}

// =============================================================================
// Values
// =============================================================================

export function dim(value: number, unit = ''): Dimension {
    return { type: 'Dimension', value, unit };
}

export function kw(value: string): Keyword {
    return { type: 'Keyword', value };
}

export function str(value: string, quote: '"' | "'" = '"'): Quoted {
    return { type: 'Quoted', value, quote, escaped: false };
}

/** `~"..."` */
export function escaped(value: string): Quoted {
    return { type: 'Quoted', value, quote: '"', escaped: true };
}

export function color(hex: string): Color {
    const parsed = parseHexColor(hex);
    if (!parsed) throw new Error(`Invalid hex color: "${hex}"`);
    return parsed;
}

export function ref(name: string): VariableRef {
    return { type: 'VariableRef', name: variableName(name) };
}

export function op(operator: ArithmeticOperator, left: ValueInput, right: ValueInput): Operation {
    return { type: 'Operation', op: operator, left: toValue(left), right: toValue(right) };
}

export function expr(...items: ValueInput[]): Expression {
    return { type: 'Expression', items: items.map(toValue) };
}

export function list(...items: ValueInput[]): ValueList {
    return { type: 'ValueList', items: items.map(toValue) };
}

export function fn(name: string, ...args: ValueInput[]): Call {
    return { type: 'Call', name, args: args.map(toValue) };
}

export function feature(name: string, value?: ValueInput): MediaFeature {
    return { type: 'MediaFeature', name, value: value === undefined ? undefined : toValue(value) };
}

export function detached(rules: Statement[]): DetachedBlock {
    return { type: 'DetachedBlock', rules };
}

// =============================================================================
// Conditions
// =============================================================================

export function cmp(left: ValueInput, operator: ComparisonOperator, right: ValueInput): Comparison {
    return { type: 'Comparison', op: operator, left: toValue(left), right: toValue(right) };
}

export function and(left: Condition, right: Condition): AndCondition {
    return { type: 'And', left, right };
}

export function or(left: Condition, right: Condition): OrCondition {
    return { type: 'Or', left, right };
}

export function not(condition: Condition): NotCondition {
    return { type: 'Not', condition };
}

export function truthy(value: ValueInput): Truthy {
    return { type: 'Truthy', value: toValue(value) };
}
